import { estimateMessages, estimateText } from "../../tokens/estimate.js";
import type { TokenizerResolver } from "../../tokens/tokenizer.js";
import type { LLMSpanResult, SpanStatus, TracingContext } from "../../tracer/types.js";
import type {
  CountTokensParams,
  InvokeParams,
  LargeLanguageModel,
  LLMResult,
  ModelModeResolver,
  ResponseContext,
  ResultChunk,
} from "../types.js";
import type { PricingLookup, Usage } from "../usage.js";
import type { ChatRequestParams } from "./chatRequest.js";
import { createCompletionRequest, createCompletionStreamingRequest } from "./completion.js";
import { createGenerationRequest } from "./createGenerationRequest.js";
import { createStreamingRequest } from "./createStreamingRequest.js";
import {
  DEFAULT_MODEL as _DEFAULT_MODEL,
  defaultModelModeResolver,
  isResponsesOnlyModel,
  Models as _Models,
  resolveBaseModel,
} from "./models.js";
import { type OpenAIModelParameters, parseModelParameters, toResponseFormat } from "./parameters.js";
import { blockResultAsStream, createResponsesRequest } from "./responsesAPI.js";
import { type ClientFactory, createOpenAIClient } from "./transport.js";
import { getPromptText } from "./utils.js";

export const NAME = "OpenAI" as const;

type Route = LLMSpanResult["mode"];

export interface OpenAIProviderOptions {
  createClient?: ClientFactory;
  resolveModelMode?: ModelModeResolver;
  pricing?: PricingLookup;
  tokenizer?: TokenizerResolver;
}

export class OpenAILargeLanguageModel implements LargeLanguageModel<OpenAIModelParameters> {
  private readonly createClient: ClientFactory;
  private readonly resolveModelMode: ModelModeResolver;
  private readonly pricing?: PricingLookup;
  private readonly tokenizer?: TokenizerResolver;

  constructor(options: OpenAIProviderOptions = {}) {
    this.createClient = options.createClient ?? createOpenAIClient;
    this.resolveModelMode = options.resolveModelMode ?? defaultModelModeResolver;
    this.pricing = options.pricing;
    this.tokenizer = options.tokenizer;
  }

  get name() {
    return NAME;
  }

  invoke(
    params: InvokeParams<OpenAIModelParameters> & { stream: true },
  ): Promise<AsyncGenerator<ResultChunk, void, unknown>>;
  invoke(params: InvokeParams<OpenAIModelParameters> & { stream?: false }): Promise<LLMResult>;
  invoke(
    params: InvokeParams<OpenAIModelParameters>,
  ): Promise<LLMResult | AsyncGenerator<ResultChunk, void, unknown>>;
  async invoke(
    params: InvokeParams<OpenAIModelParameters>,
  ): Promise<LLMResult | AsyncGenerator<ResultChunk, void, unknown>> {
    const { model, credentials, promptMessages, tools, stop, user, signal } = params;
    const stream = params.stream ?? false;
    const route = this.route(model, params.credentials);

    const span = params.context?.tracer?.startSpan(`${NAME} ${route}`, { type: "llm" });
    span?.setAttributes({ model, mode: route, stream });

    const context: ResponseContext = {
      model,
      promptMessages,
      tools,
      pricing: this.pricing,
      tokenizer: this.tokenizer,
      startedAt: performance.now(),
      tracer: span,
    };

    try {
      const request: ChatRequestParams = {
        model,
        promptMessages,
        parameters: parseModelParameters(params.parameters ?? {}),
        tools,
        stop,
        user,
      };

      if (route === "completion") {
        if (tools && tools.length > 0) {
          span?.warn("Text completion models take no tools; ignoring them", { count: tools.length });
        }
      } else {
        // a malformed structured-output request fails before anything is sent
        toResponseFormat(request.parameters);
      }

      const transport = this.createClient(credentials);
      const call = { transport, request, context, signal };

      if (route === "responses") {
        const result = await createResponsesRequest(call);
        if (stream) {
          return traceStream(blockResultAsStream(result, stop), span, { model, route });
        }
        return traceResult(result, span, { model, route, stream });
      }

      if (route === "completion") {
        if (stream) {
          return traceStream(await createCompletionStreamingRequest(call), span, { model, route });
        }
        return traceResult(await createCompletionRequest(call), span, { model, route, stream });
      }

      if (stream) {
        return traceStream(await createStreamingRequest(call), span, { model, route });
      }
      return traceResult(await createGenerationRequest(call), span, { model, route, stream });
    } catch (e) {
      span?.error(e instanceof Error ? e.message : String(e));
      span?.end("error");
      throw e;
    }
  }

  /**
   * Tokens the prompt will cost. Chat models count with the message accounting,
   * text completion models count the plain prompt.
   */
  countTokens(params: CountTokensParams): number {
    const { model, credentials, promptMessages, tools } = params;
    const options = { tokenizer: this.tokenizer, context: params.context };
    const baseModel = resolveBaseModel(model);

    if (this.resolveModelMode(baseModel, credentials) === "chat") {
      return estimateMessages(baseModel, promptMessages, tools, options);
    }
    return estimateText(baseModel, getPromptText(promptMessages), undefined, options);
  }

  private route(model: string, credentials: InvokeParams<OpenAIModelParameters>["credentials"]): Route {
    if (this.resolveModelMode(resolveBaseModel(model), credentials) === "completion") {
      return "completion";
    }
    return isResponsesOnlyModel(model) ? "responses" : "chat";
  }
}

function spanResult(
  base: { model: string; route: Route; stream: boolean },
  usage: Usage | undefined,
  finishReason: string | undefined,
): LLMSpanResult {
  return {
    kind: "llm",
    model: base.model,
    mode: base.route,
    stream: base.stream,
    ...(usage
      ? {
          usage: {
            inputTokens: usage.promptTokens,
            outputTokens: usage.completionTokens,
            totalTokens: usage.totalTokens,
          },
        }
      : {}),
    ...(finishReason ? { finishReason } : {}),
  };
}

function traceResult(
  result: LLMResult,
  span: TracingContext | undefined,
  base: { model: string; route: Route; stream: boolean },
): LLMResult {
  span?.setResult(spanResult(base, result.usage, undefined));
  span?.end();
  return result;
}

async function* traceStream(
  chunks: AsyncGenerator<ResultChunk, void, unknown>,
  span: TracingContext | undefined,
  base: { model: string; route: Route },
): AsyncGenerator<ResultChunk, void, unknown> {
  let status: SpanStatus = "ok";
  let finishReason: string | undefined;
  try {
    for await (const chunk of chunks) {
      finishReason = chunk.delta.finishReason ?? finishReason;
      if (chunk.delta.usage) {
        span?.setResult(spanResult({ ...base, stream: true }, chunk.delta.usage, finishReason));
      }
      yield chunk;
    }
  } catch (e) {
    status = "error";
    span?.error(e instanceof Error ? e.message : String(e));
    throw e;
  } finally {
    span?.end(status);
  }
}

export function openai(options: OpenAIProviderOptions = {}): OpenAILargeLanguageModel {
  return new OpenAILargeLanguageModel(options);
}

export namespace openai {
  export const MODELS = _Models;
  export const DEFAULT_MODEL = _DEFAULT_MODEL;
}
