import { assistantMessage } from "../../messages/utils.js";
import type { ResponseContext, ResultChunk } from "../types.js";
import { settleTextUsage } from "./accounting.js";
import type { CompletionFragment } from "./types.js";

/**
 * Text completion streams carry no tool calls, so the only state is the text
 * so far, reported usage and the held terminal chunk.
 */
export function createCompletionStreamingAdapter(context: ResponseContext, prompt: string) {
  let text = "";
  let promptTokens: number | undefined;
  let completionTokens: number | undefined;
  let finalChunk: ResultChunk | undefined;

  function handleChunk(fragment: CompletionFragment): Array<ResultChunk> {
    if (fragment.usage) {
      promptTokens = fragment.usage.prompt_tokens;
      completionTokens = fragment.usage.completion_tokens;
    }

    const choice = fragment.choices[0];
    if (!choice || finalChunk) {
      return [];
    }

    const finishReason: string | undefined = choice.finish_reason ?? undefined;
    if (finishReason === undefined && !choice.text) {
      return [];
    }

    const content = choice.text ?? "";
    text += content;

    const chunk: ResultChunk = {
      model: fragment.model || context.model,
      promptMessages: context.promptMessages,
      ...(fragment.system_fingerprint ? { systemFingerprint: fragment.system_fingerprint } : {}),
      delta: {
        index: choice.index,
        message: assistantMessage(content),
        ...(finishReason !== undefined ? { finishReason } : {}),
      },
    };

    if (finishReason !== undefined) {
      finalChunk = chunk;
      return [];
    }
    return [chunk];
  }

  function finalize(): ResultChunk {
    const usage = settleTextUsage(context, { promptTokens, completionTokens }, prompt, text);
    const held: ResultChunk = finalChunk ?? {
      model: context.model,
      promptMessages: context.promptMessages,
      delta: { index: 0, message: assistantMessage("") },
    };
    return { ...held, delta: { ...held.delta, usage } };
  }

  return { handleChunk, finalize };
}

export async function* aggregateCompletionStream(
  fragments: AsyncIterable<CompletionFragment>,
  context: ResponseContext,
  prompt: string,
): AsyncGenerator<ResultChunk, void, unknown> {
  const adapter = createCompletionStreamingAdapter(context, prompt);

  for await (const fragment of fragments) {
    for (const chunk of adapter.handleChunk(fragment)) {
      yield chunk;
    }
  }

  yield adapter.finalize();
}
