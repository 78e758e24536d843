import type OpenAI from "openai";
import type {
  Response,
  ResponseCreateParamsNonStreaming,
} from "openai/resources/responses/responses.js";
import type { ImageDetail } from "../../messages/types.js";

/* Wire messages, as produced by the codec */

export type WireMessage = WireSystemMessage | WireUserMessage | WireAssistantMessage | WireToolMessage;

export interface WireSystemMessage {
  role: "system";
  content: string;
  name?: string;
}

export interface WireUserMessage {
  role: "user";
  content: string | WireContentPart[];
  name?: string;
}

export interface WireAssistantMessage {
  role: "assistant";
  content: string;
  tool_calls?: WireToolCall[];
  name?: string;
}

export interface WireToolMessage {
  role: "tool";
  content: string;
  tool_call_id: string;
}

export type WireContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail: ImageDetail } }
  | { type: "input_audio"; input_audio: { data: string; format: "wav" | "mp3" } };

export interface WireToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

export interface WireTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/* SDK shapes this core reads and writes */

export type ChatCompletionChunk = OpenAI.Chat.Completions.ChatCompletionChunk;
export type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
export type ChatRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
export type ChatStreamRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming;

export type Completion = OpenAI.Completions.Completion;
/** Streamed completion fragments leave `finish_reason` null until the last one */
export type CompletionFragment = Omit<Completion, "choices"> & {
  choices: Array<
    Omit<Completion["choices"][number], "finish_reason"> & {
      finish_reason: Completion["choices"][number]["finish_reason"] | null;
    }
  >;
};
export type CompletionRequest = OpenAI.Completions.CompletionCreateParamsNonStreaming;
export type CompletionStreamRequest = OpenAI.Completions.CompletionCreateParamsStreaming;

export type ResponsesRequest = ResponseCreateParamsNonStreaming;
export type ResponsesResponse = Response;

export interface TransportRequestOptions {
  signal?: AbortSignal;
}

/**
 * The network side of an invocation. Every method resolves once the remote
 * service has accepted the request; streaming methods then yield fragments as
 * they arrive.
 */
export interface OpenAITransport {
  chatStream(
    request: ChatStreamRequest,
    options?: TransportRequestOptions,
  ): Promise<AsyncIterable<ChatCompletionChunk>>;
  chatBlock(request: ChatRequest, options?: TransportRequestOptions): Promise<ChatCompletion>;
  completeStream(
    request: CompletionStreamRequest,
    options?: TransportRequestOptions,
  ): Promise<AsyncIterable<CompletionFragment>>;
  completeBlock(request: CompletionRequest, options?: TransportRequestOptions): Promise<Completion>;
  respond(request: ResponsesRequest, options?: TransportRequestOptions): Promise<ResponsesResponse>;
}
