import { ContractViolationError } from "../../errors/RelayError.js";
import { assistantMessage } from "../../messages/utils.js";
import type { LLMResult, ResponseContext, ResultChunk } from "../types.js";
import { settleTextUsage } from "./accounting.js";
import { adjustForModel, type ChatRequestParams } from "./chatRequest.js";
import { aggregateCompletionStream } from "./createCompletionStreamingAdapter.js";
import type {
  Completion,
  CompletionFragment,
  CompletionRequest,
  OpenAITransport,
} from "./types.js";
import { getPromptText } from "./utils.js";

export type CompletionRequestParams = Omit<ChatRequestParams, "tools">;

export function buildCompletionRequest(params: CompletionRequestParams): CompletionRequest {
  const { model, promptMessages, user } = params;
  const { parameters, stop } = adjustForModel(model, params.parameters, params.stop);

  return {
    model,
    prompt: getPromptText(promptMessages),
    ...(parameters.temperature !== undefined ? { temperature: parameters.temperature } : {}),
    ...(parameters.top_p !== undefined ? { top_p: parameters.top_p } : {}),
    ...(parameters.max_tokens !== undefined ? { max_tokens: parameters.max_tokens } : {}),
    ...(parameters.presence_penalty !== undefined
      ? { presence_penalty: parameters.presence_penalty }
      : {}),
    ...(parameters.frequency_penalty !== undefined
      ? { frequency_penalty: parameters.frequency_penalty }
      : {}),
    ...(parameters.seed !== undefined ? { seed: parameters.seed } : {}),
    ...(parameters.n !== undefined ? { n: parameters.n } : {}),
    ...(parameters.logit_bias ? { logit_bias: parameters.logit_bias } : {}),
    ...(stop && stop.length > 0 ? { stop } : {}),
    ...(user ? { user } : {}),
  };
}

export async function createCompletionRequest(params: {
  transport: OpenAITransport;
  request: CompletionRequestParams;
  context: ResponseContext;
  signal?: AbortSignal;
}): Promise<LLMResult> {
  const { transport, request, context, signal } = params;
  const tracer = context.tracer;

  const body = buildCompletionRequest(request);
  tracer?.debug("Completion request", { request: body });

  let response: Completion;
  try {
    response = await transport.completeBlock(body, { signal });
  } catch (e) {
    tracer?.error("Error fetching completion", {
      error: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }

  return handleCompletionResponse(response, context, getPromptText(request.promptMessages));
}

export async function createCompletionStreamingRequest(params: {
  transport: OpenAITransport;
  request: CompletionRequestParams;
  context: ResponseContext;
  signal?: AbortSignal;
}): Promise<AsyncGenerator<ResultChunk, void, unknown>> {
  const { transport, request, context, signal } = params;
  const tracer = context.tracer;

  const prompt = getPromptText(request.promptMessages);
  const body = {
    ...buildCompletionRequest(request),
    stream: true as const,
    stream_options: { include_usage: true },
  };
  tracer?.debug("Completion streaming request", { request: body });

  let fragments: AsyncIterable<CompletionFragment>;
  try {
    fragments = await transport.completeStream(body, { signal });
  } catch (e) {
    tracer?.error("Error opening completion stream", {
      error: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }

  return aggregateCompletionStream(fragments, context, prompt);
}

export function handleCompletionResponse(
  response: Completion,
  context: ResponseContext,
  prompt: string,
): LLMResult {
  const choice = response.choices[0];
  if (!choice) {
    throw new ContractViolationError("Completion response has no choices", {
      details: { id: response.id },
    });
  }

  const message = assistantMessage(choice.text);
  const usage = settleTextUsage(
    context,
    {
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
    },
    prompt,
    choice.text,
  );

  return {
    model: response.model,
    promptMessages: context.promptMessages,
    message,
    usage,
    ...(response.system_fingerprint ? { systemFingerprint: response.system_fingerprint } : {}),
  };
}
