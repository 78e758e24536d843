export type SpanStatus = "ok" | "error";

export type EventLevel = "debug" | "info" | "warn" | "error";

export const EVENT_LEVEL_ORDER: Record<EventLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Provider invocations open "llm" spans; callers may use their own kinds
export type SpanType = string;

export interface SpanEvent {
  name: string;
  timestamp: number;
  level: EventLevel;
  attributes?: Record<string, unknown>;
}

export interface SpanData {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  type?: SpanType;
  startTime: number;
  endTime?: number;
  status: SpanStatus;
  attributes: Record<string, unknown>;
  events: SpanEvent[];
  result?: SpanResult;
}

export interface SpanOptions {
  type?: SpanType;
}

export type SpanResult = LLMSpanResult;

/** Outcome of one provider invocation, set once usage is known */
export interface LLMSpanResult {
  kind: "llm";
  model: string;
  mode: "chat" | "completion" | "responses";
  stream: boolean;
  usage?: TokenUsage;
  finishReason?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface TraceWriter {
  onSpanStart(span: SpanData): void;
  onSpanEnd(span: SpanData): void;
  onEvent?(span: SpanData, event: SpanEvent): void;
}

/**
 * Tracing context for a span. Created by Tracer.startSpan().
 * Can create child spans and log events within the span's scope.
 */
export interface TracingContext {
  startSpan(name: string, options?: SpanOptions): TracingContext;
  end(status?: SpanStatus): void;

  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  setAttributes(attributes: Record<string, unknown>): void;
  setResult(result: SpanResult): void;
}
