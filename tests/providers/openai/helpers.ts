import { vi } from "vitest";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  CompletionFragment,
  OpenAITransport,
  ResponsesResponse,
} from "../../../src/providers/openai/types.js";
import type { ResponseContext } from "../../../src/providers/types.js";
import type { Tokenizer, TokenizerResolver } from "../../../src/tokens/tokenizer.js";
import { Tracer } from "../../../src/tracer/tracer.js";
import type { SpanData, SpanEvent, TraceWriter, TracingContext } from "../../../src/tracer/types.js";

/** One token per whitespace-separated word */
export const wordTokenizer: Tokenizer = {
  name: "words",
  count: (text) => text.split(/\s+/).filter(Boolean).length,
};

export const words: TokenizerResolver = () => wordTokenizer;

export function responseContext(overrides: Partial<ResponseContext> = {}): ResponseContext {
  return {
    model: "gpt-4",
    promptMessages: [{ role: "user", content: "hi" }],
    tokenizer: words,
    ...overrides,
  };
}

/*
 Fragments
 */

type ChunkDelta = ChatCompletionChunk["choices"][number]["delta"];
type ChunkFinishReason = ChatCompletionChunk["choices"][number]["finish_reason"];

export function fragment(
  delta: ChunkDelta,
  finishReason: ChunkFinishReason = null,
  options: { model?: string; index?: number } = {},
): ChatCompletionChunk {
  return {
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: 1700000000,
    model: options.model ?? "gpt-4",
    choices: [{ index: options.index ?? 0, delta, finish_reason: finishReason }],
  };
}

export function usageFragment(promptTokens: number, completionTokens: number): ChatCompletionChunk {
  return {
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: 1700000000,
    model: "gpt-4",
    choices: [],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  };
}

export function completionFragment(
  text: string,
  finishReason: "stop" | "length" | "content_filter" | null = null,
): CompletionFragment {
  return {
    id: "cmpl-test",
    object: "text_completion",
    created: 1700000000,
    model: "gpt-3.5-turbo-instruct",
    choices: [{ index: 0, text, finish_reason: finishReason, logprobs: null }],
  };
}

export function chatCompletion(
  message: Partial<ChatCompletion["choices"][number]["message"]>,
  options: {
    finishReason?: ChatCompletion["choices"][number]["finish_reason"];
    usage?: { prompt: number; completion: number };
  } = {},
): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1700000000,
    model: "gpt-4",
    choices: [
      {
        index: 0,
        finish_reason: options.finishReason ?? "stop",
        logprobs: null,
        message: { role: "assistant", content: null, refusal: null, ...message },
      },
    ],
    ...(options.usage
      ? {
          usage: {
            prompt_tokens: options.usage.prompt,
            completion_tokens: options.usage.completion,
            total_tokens: options.usage.prompt + options.usage.completion,
          },
        }
      : {}),
  };
}

export function responsesResponse(
  text: string,
  usage?: { input: number; output: number },
): ResponsesResponse {
  return {
    id: "resp-test",
    object: "response",
    created_at: 1700000000,
    model: "o3-pro",
    output: [],
    output_text: text,
    error: null,
    incomplete_details: null,
    instructions: null,
    metadata: null,
    parallel_tool_calls: false,
    temperature: null,
    tool_choice: "auto",
    tools: [],
    top_p: null,
    ...(usage
      ? {
          usage: {
            input_tokens: usage.input,
            input_tokens_details: { cached_tokens: 0 },
            output_tokens: usage.output,
            output_tokens_details: { reasoning_tokens: 0 },
            total_tokens: usage.input + usage.output,
          },
        }
      : {}),
  };
}

export async function* fromArray<T>(items: Array<T>): AsyncGenerator<T, void, unknown> {
  for (const item of items) {
    yield item;
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<Array<T>> {
  const result: Array<T> = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

/*
 Transport
 */

function unexpected(method: string) {
  return async (): Promise<never> => {
    throw new Error(`Unexpected ${method} call`);
  };
}

export function fakeTransport(overrides: Partial<OpenAITransport> = {}): OpenAITransport {
  return {
    chatStream: overrides.chatStream ?? unexpected("chatStream"),
    chatBlock: overrides.chatBlock ?? unexpected("chatBlock"),
    completeStream: overrides.completeStream ?? unexpected("completeStream"),
    completeBlock: overrides.completeBlock ?? unexpected("completeBlock"),
    respond: overrides.respond ?? unexpected("respond"),
  };
}

export function chatStreamOf(fragments: Array<ChatCompletionChunk>) {
  return vi.fn<OpenAITransport["chatStream"]>(async () => fromArray(fragments));
}

/*
 Tracing
 */

export class RecordingWriter implements TraceWriter {
  started: Array<SpanData> = [];
  ended: Array<SpanData> = [];
  events: Array<SpanEvent & { span: string }> = [];

  onSpanStart(span: SpanData): void {
    this.started.push(span);
  }

  onSpanEnd(span: SpanData): void {
    this.ended.push(span);
  }

  onEvent(span: SpanData, event: SpanEvent): void {
    this.events.push({ ...event, span: span.name });
  }

  messages(level: SpanEvent["level"]): Array<string> {
    return this.events.filter((e) => e.level === level).map((e) => e.name);
  }
}

export function recordingTracer(): { writer: RecordingWriter; tracer: Tracer; span: TracingContext } {
  const writer = new RecordingWriter();
  const tracer = new Tracer({ minLevel: "debug", writers: [writer] });
  return { writer, tracer, span: tracer.startSpan("test") };
}
