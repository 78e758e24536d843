import type { ToolCall } from "../../messages/types.js";
import { assistantMessage } from "../../messages/utils.js";
import type { ResponseContext, ResultChunk } from "../types.js";
import { settleChatUsage } from "./accounting.js";
import type { ChatCompletionChunk } from "./types.js";
import { FinishReason, isTerminalFinishReason, legacyFunctionCall } from "./utils.js";

export type AggregationPhase = "streaming" | "tool_calls_complete" | "content_complete" | "done";

/**
 * Everything one chat stream accumulates. Owned by a single invocation.
 */
export interface AggregationState {
  phase: AggregationPhase;
  /** All content text seen so far */
  text: string;
  /** Multi-call tool calls by wire index; insertion order is first-seen order */
  toolCalls: Map<number, ToolCall>;
  /** Legacy function call still receiving argument fragments */
  pendingFunctionCall?: ToolCall;
  /** Every completed legacy function call */
  legacyToolCalls: Array<ToolCall>;
  /** Completed legacy calls not yet handed out in a chunk */
  undeliveredToolCalls: Array<ToolCall>;
  promptTokens?: number;
  completionTokens?: number;
  /** Terminal chunk, held until usage is known */
  finalChunk?: ResultChunk;
  systemFingerprint?: string;
}

export function createAggregationState(): AggregationState {
  return {
    phase: "streaming",
    text: "",
    toolCalls: new Map(),
    legacyToolCalls: [],
    undeliveredToolCalls: [],
  };
}

type ChoiceDelta = ChatCompletionChunk["choices"][number]["delta"];

/**
 * Applies one wire fragment to `state`, returning the chunks to emit now (zero
 * or one).
 */
export function applyFragment(
  state: AggregationState,
  fragment: ChatCompletionChunk,
  context: ResponseContext,
): Array<ResultChunk> {
  const tracer = context.tracer;

  if (fragment.usage) {
    state.promptTokens = fragment.usage.prompt_tokens;
    state.completionTokens = fragment.usage.completion_tokens;
  }
  if (fragment.system_fingerprint) {
    state.systemFingerprint = fragment.system_fingerprint;
  }

  const choice = fragment.choices[0];
  if (!choice) {
    return [];
  }

  if (state.phase !== "streaming") {
    tracer?.debug("Ignoring fragment after the stream finished", {
      phase: state.phase,
      finishReason: choice.finish_reason,
    });
    return [];
  }

  const delta = choice.delta;
  const finishReason = isTerminalFinishReason(context.model, choice.finish_reason)
    ? (choice.finish_reason ?? undefined)
    : undefined;

  if (finishReason === undefined && isKeepAlive(delta)) {
    return [];
  }

  if (delta.tool_calls) {
    mergeToolCalls(state, delta.tool_calls, context);
  }

  if (!bufferFunctionCall(state, delta, finishReason !== undefined)) {
    return [];
  }

  const model = fragment.model || context.model;
  const systemFingerprint = fragment.system_fingerprint ?? undefined;

  if (finishReason === FinishReason.ToolCalls) {
    state.phase = "tool_calls_complete";
    const toolCalls = [...state.toolCalls.values()].map(cloneToolCall);
    return [
      {
        model,
        promptMessages: context.promptMessages,
        systemFingerprint,
        delta: {
          index: choice.index,
          message: assistantMessage("", [...toolCalls, ...takeUndelivered(state)]),
          finishReason,
        },
      },
    ];
  }

  const content = delta.content ?? "";
  state.text += content;

  const chunk: ResultChunk = {
    model,
    promptMessages: context.promptMessages,
    systemFingerprint,
    delta: {
      index: choice.index,
      message: assistantMessage(content, takeUndelivered(state)),
      ...(finishReason !== undefined ? { finishReason } : {}),
    },
  };

  if (finishReason !== undefined) {
    state.phase = "content_complete";
    state.finalChunk = chunk;
    return [];
  }

  return [chunk];
}

function isKeepAlive(delta: ChoiceDelta): boolean {
  return !delta.content && delta.tool_calls == null && delta.function_call == null;
}

function mergeToolCalls(
  state: AggregationState,
  deltas: NonNullable<ChoiceDelta["tool_calls"]>,
  context: ResponseContext,
) {
  for (const toolCallDelta of deltas) {
    const existing = state.toolCalls.get(toolCallDelta.index);

    if (!existing) {
      if (!toolCallDelta.id) {
        context.tracer?.debug("Ignoring tool call fragment for an unknown index", {
          index: toolCallDelta.index,
        });
        continue;
      }
      state.toolCalls.set(toolCallDelta.index, {
        id: toolCallDelta.id,
        type: "function",
        function: {
          name: toolCallDelta.function?.name ?? "",
          arguments: toolCallDelta.function?.arguments ?? "",
        },
      });
      continue;
    }

    if (toolCallDelta.id) existing.id = toolCallDelta.id;
    if (toolCallDelta.function?.name) existing.function.name = toolCallDelta.function.name;
    if (toolCallDelta.function?.arguments) {
      existing.function.arguments += toolCallDelta.function.arguments;
    }
  }
}

/**
 * Feeds the legacy function-call buffer. Returns false when output for this
 * fragment is suspended because a call is still being received.
 */
function bufferFunctionCall(state: AggregationState, delta: ChoiceDelta, terminal: boolean): boolean {
  const functionCall = delta.function_call;

  if (functionCall) {
    if (state.pendingFunctionCall && functionCall.name) {
      closeFunctionCall(state);
    }

    if (state.pendingFunctionCall) {
      state.pendingFunctionCall.function.arguments += functionCall.arguments ?? "";
    } else {
      state.pendingFunctionCall = legacyFunctionCall(functionCall);
    }

    if (!terminal) {
      return false;
    }
  }

  if (state.pendingFunctionCall) {
    closeFunctionCall(state);
  }
  return true;
}

function closeFunctionCall(state: AggregationState) {
  const call = state.pendingFunctionCall;
  if (!call) return;
  state.pendingFunctionCall = undefined;
  state.legacyToolCalls.push(call);
  state.undeliveredToolCalls.push(call);
}

function takeUndelivered(state: AggregationState): Array<ToolCall> {
  const calls = state.undeliveredToolCalls.map(cloneToolCall);
  state.undeliveredToolCalls = [];
  return calls;
}

function cloneToolCall(call: ToolCall): ToolCall {
  return { ...call, function: { ...call.function } };
}

/**
 * Closes the aggregation: flushes any open legacy call, fills in the token
 * counts the wire did not report, and returns the usage-bearing last chunk.
 */
export function finalizeAggregation(state: AggregationState, context: ResponseContext): ResultChunk {
  closeFunctionCall(state);

  const usage = settleChatUsage(
    context,
    { promptTokens: state.promptTokens, completionTokens: state.completionTokens },
    assistantMessage(state.text, [...state.toolCalls.values(), ...state.legacyToolCalls]),
  );

  const held: ResultChunk = state.finalChunk ?? {
    model: context.model,
    promptMessages: context.promptMessages,
    systemFingerprint: state.systemFingerprint,
    // after a tool_calls finish the terminal marker has already gone out
    delta: { index: 0, message: assistantMessage("") },
  };

  const leftover = takeUndelivered(state);
  state.phase = "done";
  state.finalChunk = undefined;

  return {
    ...held,
    delta: {
      ...held.delta,
      message: assistantMessage(held.delta.message.content, [
        ...held.delta.message.toolCalls,
        ...leftover,
      ]),
      usage,
    },
  };
}

/**
 * Closure form of the aggregation step functions, one per stream.
 */
export function createStreamingAdapter(context: ResponseContext) {
  const state = createAggregationState();

  function handleChunk(fragment: ChatCompletionChunk): Array<ResultChunk> {
    return applyFragment(state, fragment, context);
  }

  function finalize(): ResultChunk {
    return finalizeAggregation(state, context);
  }

  return { handleChunk, finalize, state };
}

/**
 * Normalized chunks for a chat completion stream. Chunks are produced as
 * fragments are pulled; the usage-bearing chunk comes last. A consumer that
 * stops early gets no usage.
 */
export async function* aggregateChatStream(
  fragments: AsyncIterable<ChatCompletionChunk>,
  context: ResponseContext,
): AsyncGenerator<ResultChunk, void, unknown> {
  const adapter = createStreamingAdapter(context);

  for await (const fragment of fragments) {
    for (const chunk of adapter.handleChunk(fragment)) {
      yield chunk;
    }
  }

  yield adapter.finalize();
}
