import type { PromptMessage, PromptMessageTool } from "../../messages/types.js";
import { convertPromptMessages, convertTools } from "./codec.js";
import { isOSeriesModel, resolveBaseModel } from "./models.js";
import { type OpenAIModelParameters, toResponseFormat } from "./parameters.js";
import type { ChatRequest, ChatStreamRequest } from "./types.js";
import { clearIllegalPromptMessages } from "./utils.js";

export interface ChatRequestParams {
  model: string;
  promptMessages: Array<PromptMessage>;
  parameters: OpenAIModelParameters;
  tools?: Array<PromptMessageTool>;
  stop?: Array<string>;
  user?: string;
}

/**
 * Sampling parameters after model-family adjustments. Reasoning models take
 * `max_completion_tokens` in place of `max_tokens` and no stop sequences.
 */
export function adjustForModel(
  model: string,
  parameters: OpenAIModelParameters,
  stop?: Array<string>,
): { parameters: OpenAIModelParameters; stop?: Array<string> } {
  if (!isOSeriesModel(resolveBaseModel(model))) {
    return { parameters, stop };
  }

  const { max_tokens: maxTokens, ...rest } = parameters;
  return {
    parameters: maxTokens !== undefined ? { ...rest, max_completion_tokens: maxTokens } : rest,
  };
}

export function buildChatRequest(params: ChatRequestParams): ChatRequest {
  const { model, promptMessages, tools, user } = params;
  const { parameters, stop } = adjustForModel(model, params.parameters, params.stop);

  const messages = convertPromptMessages(
    clearIllegalPromptMessages(resolveBaseModel(model), promptMessages),
  );
  const chatTools = convertTools(tools);
  const responseFormat = toResponseFormat(parameters);
  const toolChoice = parameters.tool_choice ?? (chatTools ? "auto" : undefined);

  return {
    model,
    messages,
    ...(chatTools ? { tools: chatTools } : {}),
    ...(toolChoice ? { tool_choice: toolChoice } : {}),
    ...(responseFormat ? { response_format: responseFormat } : {}),
    ...(parameters.temperature !== undefined ? { temperature: parameters.temperature } : {}),
    ...(parameters.top_p !== undefined ? { top_p: parameters.top_p } : {}),
    ...(parameters.max_tokens !== undefined ? { max_tokens: parameters.max_tokens } : {}),
    ...(parameters.max_completion_tokens !== undefined
      ? { max_completion_tokens: parameters.max_completion_tokens }
      : {}),
    ...(parameters.presence_penalty !== undefined
      ? { presence_penalty: parameters.presence_penalty }
      : {}),
    ...(parameters.frequency_penalty !== undefined
      ? { frequency_penalty: parameters.frequency_penalty }
      : {}),
    ...(parameters.seed !== undefined ? { seed: parameters.seed } : {}),
    ...(parameters.n !== undefined ? { n: parameters.n } : {}),
    ...(parameters.logit_bias ? { logit_bias: parameters.logit_bias } : {}),
    ...(parameters.reasoning_effort ? { reasoning_effort: parameters.reasoning_effort } : {}),
    ...(stop && stop.length > 0 ? { stop } : {}),
    ...(user ? { user } : {}),
  };
}

export function buildChatStreamRequest(params: ChatRequestParams): ChatStreamRequest {
  return {
    ...buildChatRequest(params),
    stream: true,
    stream_options: { include_usage: true },
  };
}
