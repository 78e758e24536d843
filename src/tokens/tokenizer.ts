import { get_encoding, type Tiktoken, type TiktokenEncoding } from "tiktoken";
import type { TracingContext } from "../tracer/types.js";

export interface Tokenizer {
  readonly name: string;
  count(text: string): number;
}

export type TokenizerResolver = (model: string, context?: { tracer?: TracingContext }) => Tokenizer;

export const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

/**
 * Model name prefix → encoding. First match wins, so longer prefixes of the same
 * family come first.
 */
const ENCODING_FAMILIES: ReadonlyArray<readonly [prefix: string, encoding: TiktokenEncoding]> = [
  ["gpt-4o", "o200k_base"],
  ["chatgpt-4o", "o200k_base"],
  ["gpt-4.1", "o200k_base"],
  ["gpt-4.5", "o200k_base"],
  ["gpt-5", "o200k_base"],
  ["o1", "o200k_base"],
  ["o3", "o200k_base"],
  ["o4", "o200k_base"],
  ["gpt-4", "cl100k_base"],
  ["gpt-3.5-turbo", "cl100k_base"],
  ["gpt-35-turbo", "cl100k_base"],
  ["text-embedding-", "cl100k_base"],
  ["davinci-002", "cl100k_base"],
  ["babbage-002", "cl100k_base"],
  ["text-davinci-", "p50k_base"],
  ["code-davinci-", "p50k_base"],
  ["davinci", "r50k_base"],
  ["curie", "r50k_base"],
  ["babbage", "r50k_base"],
  ["ada", "r50k_base"],
];

export function encodingForModel(model: string): TiktokenEncoding | undefined {
  return ENCODING_FAMILIES.find(([prefix]) => model.startsWith(prefix))?.[1];
}

const tokenizers = new Map<TiktokenEncoding, Tokenizer>();

export function tiktokenTokenizer(encoding: TiktokenEncoding): Tokenizer {
  let tokenizer = tokenizers.get(encoding);
  if (!tokenizer) {
    const tiktoken: Tiktoken = get_encoding(encoding);
    tokenizer = {
      name: encoding,
      // special-token text counts as ordinary text
      count: (text) => (text ? tiktoken.encode(text, [], []).length : 0),
    };
    tokenizers.set(encoding, tokenizer);
  }
  return tokenizer;
}

/**
 * Tokenizer for a model family. Unknown models get the general-purpose default
 * encoding: the count is an approximation either way.
 */
export const resolveTokenizer: TokenizerResolver = (model, context) => {
  const encoding = encodingForModel(model);
  if (encoding) {
    return tiktokenTokenizer(encoding);
  }

  context?.tracer?.warn(`No tokenizer known for model ${model}, using ${DEFAULT_ENCODING}`);
  return tiktokenTokenizer(DEFAULT_ENCODING);
};
