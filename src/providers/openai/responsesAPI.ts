import type { PromptMessage, PromptMessageRole } from "../../messages/types.js";
import { assistantMessage, getTextContent } from "../../messages/utils.js";
import type { TracingContext } from "../../tracer/types.js";
import type { LLMResult, ResponseContext, ResultChunk } from "../types.js";
import { calculateUsage } from "../usage.js";
import { adjustForModel, type ChatRequestParams } from "./chatRequest.js";
import type { OpenAITransport, ResponsesRequest, ResponsesResponse } from "./types.js";
import { enforceStopTokens, FinishReason } from "./utils.js";

/**
 * Line prefix per role in the flattened input. `null` leaves the role out:
 * the endpoint takes no system turn in this form.
 */
const ROLE_PREFIXES: Record<PromptMessageRole, string | null> = {
  system: null,
  user: "user",
  assistant: "assistant",
  tool: "tool",
};

/**
 * Flattens a conversation to `<role>: <text>` paragraphs. Messages without
 * text are left out.
 */
export function buildResponsesInput(
  messages: Array<PromptMessage>,
  tracer?: TracingContext,
): string {
  const parts: Array<string> = [];

  for (const message of messages) {
    const prefix = ROLE_PREFIXES[message.role];
    if (prefix === null) {
      tracer?.debug("Leaving message out of the flattened input", { role: message.role });
      continue;
    }

    const text = getTextContent(message.content);
    if (text) {
      parts.push(`${prefix}: ${text}`);
    }
  }

  return parts.join("\n\n");
}

export function buildResponsesRequest(params: ChatRequestParams, tracer?: TracingContext): ResponsesRequest {
  const { model, promptMessages, user } = params;
  const { parameters } = adjustForModel(model, params.parameters);
  const maxOutputTokens = parameters.max_completion_tokens ?? parameters.max_tokens;

  return {
    model,
    input: buildResponsesInput(promptMessages, tracer),
    ...(parameters.temperature !== undefined ? { temperature: parameters.temperature } : {}),
    ...(parameters.top_p !== undefined ? { top_p: parameters.top_p } : {}),
    ...(maxOutputTokens !== undefined ? { max_output_tokens: maxOutputTokens } : {}),
    ...(parameters.reasoning_effort ? { reasoning: { effort: parameters.reasoning_effort } } : {}),
    ...(user ? { user } : {}),
  };
}

export async function createResponsesRequest(params: {
  transport: OpenAITransport;
  request: ChatRequestParams;
  context: ResponseContext;
  signal?: AbortSignal;
}): Promise<LLMResult> {
  const { transport, request, context, signal } = params;
  const tracer = context.tracer;

  const body = buildResponsesRequest(request, tracer);
  tracer?.debug("Responses request", { request: body });

  let response: ResponsesResponse;
  try {
    response = await transport.respond(body, { signal });
  } catch (e) {
    tracer?.error("Error fetching response", {
      error: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }

  return handleResponsesResponse(response, context);
}

/**
 * The endpoint reports usage only sometimes; without it the result carries
 * none.
 */
export function handleResponsesResponse(
  response: ResponsesResponse,
  context: ResponseContext,
): LLMResult {
  const usage = response.usage
    ? calculateUsage({
        model: context.model,
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        pricing: context.pricing,
        startedAt: context.startedAt,
      })
    : undefined;

  return {
    model: response.model,
    promptMessages: context.promptMessages,
    message: assistantMessage(response.output_text || ""),
    ...(usage ? { usage } : {}),
  };
}

/**
 * Delivers a block result to a caller that asked for a stream: one terminal
 * chunk, cut at the first stop sequence.
 */
export async function* blockResultAsStream(
  result: LLMResult,
  stop?: Array<string>,
): AsyncGenerator<ResultChunk, void, unknown> {
  const content = enforceStopTokens(result.message.content, stop);

  yield {
    model: result.model,
    promptMessages: result.promptMessages,
    ...(result.systemFingerprint ? { systemFingerprint: result.systemFingerprint } : {}),
    delta: {
      index: 0,
      message: assistantMessage(content, result.message.toolCalls),
      finishReason: FinishReason.Stop,
      ...(result.usage ? { usage: result.usage } : {}),
    },
  };
}
