import type { Credentials } from "../config/schemas.js";
import type { AssistantPromptMessage, PromptMessage, PromptMessageTool } from "../messages/types.js";
import type { TokenizerResolver } from "../tokens/tokenizer.js";
import type { TracingContext } from "../tracer/types.js";
import type { PricingLookup, Usage } from "./usage.js";

export type ModelMode = "chat" | "completion";

export type ModelModeResolver = (model: string, credentials: Credentials) => ModelMode;

/*
 Results
 */

export interface ResultChunkDelta {
  index: number;
  message: AssistantPromptMessage;
  finishReason?: string;
  usage?: Usage;
}

export interface ResultChunk {
  model: string;
  promptMessages: Array<PromptMessage>;
  systemFingerprint?: string;
  delta: ResultChunkDelta;
}

export interface LLMResult {
  model: string;
  promptMessages: Array<PromptMessage>;
  message: AssistantPromptMessage;
  usage?: Usage;
  systemFingerprint?: string;
}

/*
 Invocation
 */

export interface InvokeParams<Parameters> {
  model: string;
  credentials: Credentials;
  promptMessages: Array<PromptMessage>;
  parameters?: Parameters;
  tools?: Array<PromptMessageTool>;
  stop?: Array<string>;
  stream?: boolean;
  user?: string;
  signal?: AbortSignal;
  context?: { tracer?: TracingContext };
}

export interface CountTokensParams {
  model: string;
  credentials: Credentials;
  promptMessages: Array<PromptMessage>;
  tools?: Array<PromptMessageTool>;
  context?: { tracer?: TracingContext };
}

export interface LargeLanguageModel<Parameters> {
  get name(): string;

  invoke(params: InvokeParams<Parameters> & { stream: true }): Promise<AsyncGenerator<ResultChunk, void, unknown>>;
  invoke(params: InvokeParams<Parameters> & { stream?: false }): Promise<LLMResult>;
  invoke(
    params: InvokeParams<Parameters>,
  ): Promise<LLMResult | AsyncGenerator<ResultChunk, void, unknown>>;

  countTokens(params: CountTokensParams): number;
}

/**
 * Everything the block and streaming handlers need besides the wire response
 * itself.
 */
export interface ResponseContext {
  model: string;
  promptMessages: Array<PromptMessage>;
  tools?: Array<PromptMessageTool>;
  pricing?: PricingLookup;
  tokenizer?: TokenizerResolver;
  /** `performance.now()` at invocation start, for usage latency */
  startedAt?: number;
  tracer?: TracingContext;
}
