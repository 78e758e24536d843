import { randomUUID } from "node:crypto";
import {
  EVENT_LEVEL_ORDER,
  type EventLevel,
  type SpanData,
  type SpanOptions,
  type SpanResult,
  type SpanStatus,
  type TraceWriter,
  type TracingContext,
} from "./types.js";

/**
 * Root of a trace: holds the writers and the minimum event level, and opens
 * top-level spans. Events are only ever logged on spans.
 */
export class Tracer {
  private readonly writers: ReadonlyArray<TraceWriter>;
  private readonly minLevel: EventLevel;

  constructor(options: { minLevel?: EventLevel; writers?: TraceWriter[] } = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.writers = [...new Set(options.writers ?? [])];
  }

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return this.open(name, options);
  }

  /** @internal */
  open(name: string, options: SpanOptions | undefined, parent?: SpanData): TracingContext {
    const data: SpanData = {
      traceId: parent?.traceId ?? randomUUID(),
      spanId: randomUUID(),
      ...(parent ? { parentSpanId: parent.spanId } : {}),
      name,
      type: options?.type,
      startTime: performance.now(),
      status: "ok",
      attributes: {},
      events: [],
    };

    for (const writer of this.writers) writer.onSpanStart(data);
    return new Span(data, this);
  }

  /** @internal */
  emit(span: SpanData, level: EventLevel, name: string, attributes?: Record<string, unknown>) {
    if (EVENT_LEVEL_ORDER[level] < EVENT_LEVEL_ORDER[this.minLevel]) return;

    const event = { name, timestamp: performance.now(), level, attributes };
    span.events.push(event);
    for (const writer of this.writers) writer.onEvent?.(span, event);
  }

  /** @internal */
  close(span: SpanData) {
    for (const writer of this.writers) writer.onSpanEnd(span);
  }
}

class Span implements TracingContext {
  private ended = false;

  constructor(
    private readonly data: SpanData,
    private readonly tracer: Tracer,
  ) {}

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return this.tracer.open(name, options, this.data);
  }

  end(status: SpanStatus = "ok"): void {
    if (this.ended) return;

    this.ended = true;
    this.data.endTime = performance.now();
    this.data.status = status;
    this.tracer.close(this.data);
  }

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  setAttributes(attributes: Record<string, unknown>): void {
    if (this.ended) return;
    Object.assign(this.data.attributes, attributes);
  }

  setResult(result: SpanResult): void {
    if (this.ended) return;
    this.data.result = result;
  }

  private log(level: EventLevel, message: string, attributes?: Record<string, unknown>) {
    if (this.ended) return;
    this.tracer.emit(this.data, level, message, attributes);
  }
}
