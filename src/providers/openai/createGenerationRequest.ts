import { ContractViolationError } from "../../errors/RelayError.js";
import { assistantMessage } from "../../messages/utils.js";
import type { LLMResult, ResponseContext } from "../types.js";
import { settleChatUsage } from "./accounting.js";
import { buildChatRequest, type ChatRequestParams } from "./chatRequest.js";
import type { ChatCompletion, OpenAITransport } from "./types.js";
import { extractToolCalls } from "./utils.js";

export async function createGenerationRequest(params: {
  transport: OpenAITransport;
  request: ChatRequestParams;
  context: ResponseContext;
  signal?: AbortSignal;
}): Promise<LLMResult> {
  const { transport, request, context, signal } = params;
  const tracer = context.tracer;

  const body = buildChatRequest(request);
  tracer?.debug("Chat completion request", { request: body });

  let response: ChatCompletion;
  try {
    response = await transport.chatBlock(body, { signal });
  } catch (e) {
    tracer?.error("Error fetching chat completion", {
      error: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }

  return handleChatResponse(response, context);
}

export function handleChatResponse(response: ChatCompletion, context: ResponseContext): LLMResult {
  const choice = response.choices[0];
  if (!choice) {
    throw new ContractViolationError("Chat completion response has no choices", {
      details: { id: response.id },
    });
  }

  const message = assistantMessage(choice.message.content ?? "", extractToolCalls(choice.message));

  const usage = settleChatUsage(
    context,
    {
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
    },
    message,
  );

  return {
    model: response.model,
    promptMessages: context.promptMessages,
    message,
    usage,
    ...(response.system_fingerprint ? { systemFingerprint: response.system_fingerprint } : {}),
  };
}
