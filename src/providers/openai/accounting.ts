import { UnsupportedModelError } from "../../errors/RelayError.js";
import type { AssistantPromptMessage } from "../../messages/types.js";
import { estimateMessages, estimateText } from "../../tokens/estimate.js";
import type { ResponseContext } from "../types.js";
import { calculateUsage, type Usage } from "../usage.js";

/** Token counts as reported by the service; absent ones get estimated */
export interface ReportedTokens {
  promptTokens?: number;
  completionTokens?: number;
}

export function settleChatUsage(
  context: ResponseContext,
  reported: ReportedTokens,
  output: AssistantPromptMessage,
): Usage {
  const options = { tokenizer: context.tokenizer, context: { tracer: context.tracer } };

  const promptTokens =
    reported.promptTokens ??
    estimateOrZero(context, () =>
      estimateMessages(context.model, context.promptMessages, context.tools, options),
    );
  const completionTokens =
    reported.completionTokens ??
    estimateOrZero(context, () => estimateMessages(context.model, [output], undefined, options));

  return toUsage(context, promptTokens, completionTokens);
}

export function settleTextUsage(
  context: ResponseContext,
  reported: ReportedTokens,
  prompt: string,
  completion: string,
): Usage {
  const options = { tokenizer: context.tokenizer, context: { tracer: context.tracer } };

  const promptTokens =
    reported.promptTokens ?? estimateText(context.model, prompt, undefined, options);
  const completionTokens =
    reported.completionTokens ?? estimateText(context.model, completion, undefined, options);

  return toUsage(context, promptTokens, completionTokens);
}

function toUsage(context: ResponseContext, promptTokens: number, completionTokens: number): Usage {
  return calculateUsage({
    model: context.model,
    promptTokens,
    completionTokens,
    pricing: context.pricing,
    startedAt: context.startedAt,
  });
}

/** A missing accounting convention never fails a generation that already ran. */
function estimateOrZero(context: ResponseContext, estimate: () => number): number {
  try {
    return estimate();
  } catch (e) {
    if (e instanceof UnsupportedModelError) {
      context.tracer?.warn("Token usage not reported and cannot be estimated", { model: e.model });
      return 0;
    }
    throw e;
  }
}
