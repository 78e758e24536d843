import type { ResponseContext, ResultChunk } from "../types.js";
import { buildChatStreamRequest, type ChatRequestParams } from "./chatRequest.js";
import { aggregateChatStream } from "./createStreamingAdapter.js";
import type { ChatCompletionChunk, OpenAITransport } from "./types.js";

/**
 * Opens a chat completion stream. Resolves once the service has accepted the
 * request; the returned generator then pulls fragments on demand.
 */
export async function createStreamingRequest(params: {
  transport: OpenAITransport;
  request: ChatRequestParams;
  context: ResponseContext;
  signal?: AbortSignal;
}): Promise<AsyncGenerator<ResultChunk, void, unknown>> {
  const { transport, request, context, signal } = params;
  const tracer = context.tracer;

  const body = buildChatStreamRequest(request);
  tracer?.debug("Chat completion streaming request", { request: body });

  let fragments: AsyncIterable<ChatCompletionChunk>;
  try {
    fragments = await transport.chatStream(body, { signal });
  } catch (e) {
    tracer?.error("Error opening chat completion stream", {
      error: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }

  tracer?.info("Stream response initiated", { model: request.model });
  return aggregateChatStream(fragments, context);
}
