import { UnsupportedModelError } from "../errors/RelayError.js";
import { resolveBaseModel } from "../providers/openai/models.js";

export interface AccountingConvention {
  readonly name: string;
  /** Delimiter overhead charged for every message */
  readonly tokensPerMessage: number;
  /** Charged when a message carries `name`; negative where name replaces role */
  readonly tokensPerName: number;
}

/** Every reply is primed with `<|start|>assistant<|message|>` */
export const REPLY_PRIMING_TOKENS = 3;

/** Charged per `enum` value and per `required` entry in a tool schema */
export const SCHEMA_LIST_ITEM_TOKENS = 3;

// every message follows <|im_start|>{role/name}\n{content}<|im_end|>\n
const IM_DELIMITED: AccountingConvention = {
  name: "im-delimited",
  tokensPerMessage: 4,
  tokensPerName: -1,
};

const CHAT_ML: AccountingConvention = {
  name: "chat-ml",
  tokensPerMessage: 3,
  tokensPerName: 1,
};

const CONVENTIONS: ReadonlyArray<{
  matches: (model: string) => boolean;
  convention: AccountingConvention;
}> = [
  { matches: (model) => model.startsWith("gpt-3.5-turbo-0301"), convention: IM_DELIMITED },
  {
    matches: (model) =>
      ["gpt-3.5-turbo", "gpt-4", "gpt-5", "o1", "o3", "o4"].some((prefix) => model.startsWith(prefix)),
    convention: CHAT_ML,
  },
];

/** Families whose tokens are counted as if they were `gpt-4o` */
const GPT_4O_ALIASES = ["o1", "o3", "o4", "gpt-4.1", "gpt-4.5"];

/**
 * The model name token accounting is keyed on: fine-tune prefix removed, and
 * newer families folded onto `gpt-4o`.
 */
export function countingModel(model: string): string {
  const base = resolveBaseModel(model);
  if (base === "chatgpt-4o-latest" || GPT_4O_ALIASES.some((prefix) => base.startsWith(prefix))) {
    return "gpt-4o";
  }
  return base;
}

export function accountingConventionFor(model: string): AccountingConvention {
  const entry = CONVENTIONS.find(({ matches }) => matches(model));
  if (!entry) {
    throw new UnsupportedModelError(model);
  }
  return entry.convention;
}
