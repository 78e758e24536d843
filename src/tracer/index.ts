export { Tracer } from "./tracer.js";
export type {
  EventLevel,
  LLMSpanResult,
  SpanData,
  SpanEvent,
  SpanOptions,
  SpanResult,
  SpanStatus,
  SpanType,
  TokenUsage,
  TraceWriter,
  TracingContext,
} from "./types.js";
export { SimpleWriter } from "./writers/simple.js";
export type { SimpleWriterOptions } from "./writers/simple.js";
