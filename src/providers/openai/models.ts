import type { Credentials } from "../../config/schemas.js";
import type { ModelMode, ModelModeResolver } from "../types.js";

export const Models = {
  GPT_5: "gpt-5",
  GPT_5_MINI: "gpt-5-mini",
  GPT_4_1: "gpt-4.1",
  GPT_4O: "gpt-4o",
  GPT_4O_MINI: "gpt-4o-mini",
  CHATGPT_4O_LATEST: "chatgpt-4o-latest",
  GPT_4_TURBO: "gpt-4-turbo",
  GPT_4_TURBO_2024_04_09: "gpt-4-turbo-2024-04-09",
  GPT_4: "gpt-4",
  GPT_3_5_TURBO: "gpt-3.5-turbo",
  GPT_3_5_TURBO_0301: "gpt-3.5-turbo-0301",
  GPT_3_5_TURBO_INSTRUCT: "gpt-3.5-turbo-instruct",
  O1: "o1",
  O3: "o3",
  O3_MINI: "o3-mini",
  O3_PRO: "o3-pro",
  O4_MINI: "o4-mini",
  DAVINCI_002: "davinci-002",
  BABBAGE_002: "babbage-002",
} as const;

export const DEFAULT_MODEL = Models.GPT_4O_MINI;

/** Reasoning families that take `max_completion_tokens` and reject `stop` */
export const O_SERIES_PREFIXES = ["o1", "o3", "o4"] as const;

/** Models that reject more than one user message with multi-part content */
export const SINGLE_MULTIPART_USER_MODELS: ReadonlyArray<string> = [
  Models.GPT_4_TURBO,
  Models.GPT_4_TURBO_2024_04_09,
];

export const COMPLETION_MODELS: ReadonlyArray<string> = [
  Models.GPT_3_5_TURBO_INSTRUCT,
  Models.DAVINCI_002,
  Models.BABBAGE_002,
];

const FINE_TUNE_PREFIX = "ft:";

/**
 * Fine-tuned models are named `ft:<base-model>:<org>:<suffix>:<id>`; the base
 * model decides mode, tokenizer and accounting.
 */
export function resolveBaseModel(model: string): string {
  if (model.startsWith(FINE_TUNE_PREFIX)) {
    return model.split(":")[1] ?? model;
  }
  return model;
}

export function isOSeriesModel(model: string): boolean {
  return O_SERIES_PREFIXES.some((prefix) => model.startsWith(prefix));
}

/** Models served only through the single-request Responses endpoint */
export function isResponsesOnlyModel(model: string): boolean {
  return model.includes(Models.O3_PRO);
}

export function createModelModeResolver(
  completionModels: ReadonlyArray<string> = COMPLETION_MODELS,
): ModelModeResolver {
  return (model: string, _credentials: Credentials): ModelMode =>
    completionModels.some((m) => model === m || model.startsWith(`${m}-`)) ? "completion" : "chat";
}

export const defaultModelModeResolver = createModelModeResolver();
