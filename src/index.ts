// Provider
export { NAME, openai, OpenAILargeLanguageModel } from "./providers/openai/provider.js";
export type { OpenAIProviderOptions } from "./providers/openai/provider.js";
export {
  COMPLETION_MODELS,
  createModelModeResolver,
  defaultModelModeResolver,
  DEFAULT_MODEL,
  Models,
  resolveBaseModel,
} from "./providers/openai/models.js";
export {
  OpenAIModelParametersSchema,
  parseModelParameters,
  toResponseFormat,
} from "./providers/openai/parameters.js";
export type { OpenAIModelParameters, ResponseFormat } from "./providers/openai/parameters.js";
export { createOpenAIClient, openaiTransport } from "./providers/openai/transport.js";
export type { ClientFactory } from "./providers/openai/transport.js";
export type { OpenAITransport } from "./providers/openai/types.js";
export type {
  CountTokensParams,
  InvokeParams,
  LargeLanguageModel,
  LLMResult,
  ModelMode,
  ModelModeResolver,
  ResultChunk,
  ResultChunkDelta,
} from "./providers/types.js";
export { calculateUsage } from "./providers/usage.js";
export type { ModelPricing, PricingLookup, Usage } from "./providers/usage.js";

// Aggregation
export {
  aggregateChatStream,
  applyFragment,
  createAggregationState,
  createStreamingAdapter,
  finalizeAggregation,
} from "./providers/openai/createStreamingAdapter.js";
export type { AggregationPhase, AggregationState } from "./providers/openai/createStreamingAdapter.js";
export { aggregateCompletionStream } from "./providers/openai/createCompletionStreamingAdapter.js";

// Messages
export { convertPromptMessages, convertTools, toWire } from "./providers/openai/codec.js";
export type {
  AssistantPromptMessage,
  PromptContentPart,
  PromptMessage,
  PromptMessageRole,
  PromptMessageTool,
  SystemPromptMessage,
  ToolCall,
  ToolParameters,
  ToolPromptMessage,
  UserPromptMessage,
} from "./messages/types.js";
export { assistantMessage, defineTool, getTextContent } from "./messages/utils.js";

// Token estimation
export { estimateMessages, estimateText, estimateTools } from "./tokens/estimate.js";
export type { EstimateOptions } from "./tokens/estimate.js";
export { encodingForModel, resolveTokenizer, tiktokenTokenizer } from "./tokens/tokenizer.js";
export type { Tokenizer, TokenizerResolver } from "./tokens/tokenizer.js";

// Config
export {
  getProviderConfig,
  parseProviderConfig,
  pricingFromConfig,
  providerOptionsFromConfig,
  tracerFromConfig,
} from "./config/loaders.js";
export type { Credentials, ProviderConfig } from "./config/schemas.js";

// Errors
export {
  ConfigurationError,
  ContractViolationError,
  InvalidRequestError,
  RelayError,
  UnsupportedModelError,
} from "./errors/RelayError.js";

// Tracing
export { SimpleWriter, Tracer } from "./tracer/index.js";
export type { SimpleWriterOptions, TraceWriter, TracingContext } from "./tracer/index.js";
