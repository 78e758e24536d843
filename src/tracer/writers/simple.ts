import {
  EVENT_LEVEL_ORDER,
  type EventLevel,
  type LLMSpanResult,
  type SpanData,
  type SpanEvent,
  type TraceWriter,
} from "../types.js";

export interface SimpleWriterOptions {
  /** Minimum event level to display (default: "info") */
  minLevel?: EventLevel;
  /** Show timestamps (default: true) */
  showTimestamp?: boolean;
  /** Show duration on span end (default: true) */
  showDuration?: boolean;
  /** Custom output function (default: console.log) */
  output?: (line: string) => void;
}

/**
 * Prints spans as an indented tree, one line per span start, end and event.
 * An `llm` result is summarized under the span's end line.
 */
export class SimpleWriter implements TraceWriter {
  private readonly minLevel: EventLevel;
  private readonly showTimestamp: boolean;
  private readonly showDuration: boolean;
  private readonly output: (line: string) => void;

  private readonly depths = new Map<string, number>();

  constructor(options: SimpleWriterOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.showTimestamp = options.showTimestamp ?? true;
    this.showDuration = options.showDuration ?? true;
    this.output = options.output ?? console.log;
  }

  onSpanStart(span: SpanData): void {
    const parentDepth = span.parentSpanId ? this.depths.get(span.parentSpanId) : undefined;
    const depth = parentDepth === undefined ? 0 : parentDepth + 1;
    this.depths.set(span.spanId, depth);

    this.print(depth, `START ${label(span)}`);
  }

  onSpanEnd(span: SpanData): void {
    const depth = this.depths.get(span.spanId) ?? 0;
    this.depths.delete(span.spanId);

    const status = span.status === "error" ? " [ERROR]" : "";
    this.print(depth, `END   ${label(span)}${this.duration(span)}${status}`);

    if (span.result?.kind === "llm") {
      this.print(depth + 1, `INFO  LLM complete ${summarize(span.result)}`);
    }
  }

  onEvent(span: SpanData, event: SpanEvent): void {
    if (EVENT_LEVEL_ORDER[event.level] < EVENT_LEVEL_ORDER[this.minLevel]) return;

    const depth = this.depths.get(span.spanId) ?? 0;
    const attrs = Object.entries(event.attributes ?? {})
      .map(([k, v]) => ` ${k}=${JSON.stringify(v)}`)
      .join("");
    this.print(depth + 1, `${event.level.toUpperCase().padEnd(5)} ${event.name}${attrs}`);
  }

  private print(depth: number, text: string) {
    this.output(`${this.timestamp()}${"  ".repeat(depth)}${text}`);
  }

  private timestamp(): string {
    if (!this.showTimestamp) return "";
    const now = new Date();
    const ms = now.getMilliseconds().toString().padStart(3, "0");
    return `[${now.toTimeString().slice(0, 8)}.${ms}] `;
  }

  private duration(span: SpanData): string {
    if (!this.showDuration || span.endTime === undefined) return "";
    const ms = span.endTime - span.startTime;
    return ms < 1000 ? ` (${Math.round(ms)}ms)` : ` (${(ms / 1000).toFixed(2)}s)`;
  }
}

function label(span: SpanData): string {
  return span.type ? `[${span.type}] ${span.name}` : span.name;
}

function summarize(result: LLMSpanResult): string {
  const parts = [`model=${result.model}`, `mode=${result.mode}`];
  if (result.stream) parts.push("stream=true");
  if (result.finishReason) parts.push(`finishReason=${result.finishReason}`);
  if (result.usage) {
    parts.push(`inputTokens=${result.usage.inputTokens}`, `outputTokens=${result.usage.outputTokens}`);
  }
  return parts.join(" ");
}
