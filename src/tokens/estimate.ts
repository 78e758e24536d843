import type { PromptMessage, PromptMessageTool } from "../messages/types.js";
import { convertPromptMessages } from "../providers/openai/codec.js";
import type { WireContentPart, WireMessage, WireToolCall } from "../providers/openai/types.js";
import type { TracingContext } from "../tracer/types.js";
import {
  accountingConventionFor,
  type AccountingConvention,
  countingModel,
  REPLY_PRIMING_TOKENS,
  SCHEMA_LIST_ITEM_TOKENS,
} from "./conventions.js";
import { resolveTokenizer, type Tokenizer, type TokenizerResolver } from "./tokenizer.js";

export interface EstimateOptions {
  tokenizer?: TokenizerResolver;
  context?: { tracer?: TracingContext };
}

/**
 * Tokens in a plain prompt, as sent to a text completion model.
 */
export function estimateText(
  model: string,
  text: string,
  tools?: Array<PromptMessageTool>,
  options: EstimateOptions = {},
): number {
  const tokenizer = (options.tokenizer ?? resolveTokenizer)(model, options.context);

  let numTokens = tokenizer.count(text);
  if (tools && tools.length > 0) {
    numTokens += estimateTools(tokenizer, tools);
  }
  return numTokens;
}

/**
 * Tokens a chat model will bill for `messages`, following the service's
 * documented message-to-token accounting. Image and audio parts are not
 * counted.
 *
 * @throws UnsupportedModelError when the model family has no known accounting
 * convention.
 */
export function estimateMessages(
  model: string,
  messages: Array<PromptMessage>,
  tools?: Array<PromptMessageTool>,
  options: EstimateOptions = {},
): number {
  const accountedModel = countingModel(model);
  const tokenizer = (options.tokenizer ?? resolveTokenizer)(accountedModel, options.context);
  const convention = accountingConventionFor(accountedModel);

  let numTokens = 0;
  for (const message of convertPromptMessages(messages)) {
    numTokens += countWireMessage(tokenizer, convention, message);
  }

  numTokens += REPLY_PRIMING_TOKENS;

  if (tools && tools.length > 0) {
    numTokens += estimateTools(tokenizer, tools);
  }

  return numTokens;
}

function countWireMessage(
  tokenizer: Tokenizer,
  convention: AccountingConvention,
  message: WireMessage,
): number {
  const count = (text: string) => tokenizer.count(text);

  let numTokens = convention.tokensPerMessage;
  numTokens += count(message.role);
  numTokens += count(contentText(message.content));

  if (message.role === "assistant" && message.tool_calls) {
    numTokens += countToolCalls(tokenizer, message.tool_calls);
  }

  if (message.role === "tool") {
    numTokens += count(message.tool_call_id);
  } else if (message.name !== undefined) {
    numTokens += count(message.name);
    numTokens += convention.tokensPerName;
  }

  return numTokens;
}

function contentText(content: string | WireContentPart[]): string {
  if (typeof content === "string") {
    return content;
  }
  // TODO: count image parts; the cost depends on the resolution, which needs the image fetched
  return content.map((part) => (part.type === "text" ? part.text : "")).join("");
}

function countToolCalls(tokenizer: Tokenizer, toolCalls: Array<WireToolCall>): number {
  const count = (text: string) => tokenizer.count(text);

  let numTokens = 0;
  for (const call of toolCalls) {
    numTokens += count("id") * 2 + count(call.id);
    numTokens += count("type") * 2 + count(call.type);
    numTokens += count("function");
    numTokens += count("name") + count(call.function.name);
    numTokens += count("arguments") + count(call.function.arguments);
  }
  return numTokens;
}

/**
 * Tokens charged for the tool declarations sent alongside a prompt.
 */
export function estimateTools(tokenizer: Tokenizer, tools: Array<PromptMessageTool>): number {
  const count = (text: string) => tokenizer.count(text);

  let numTokens = 0;
  for (const tool of tools) {
    numTokens += count("type");
    numTokens += count("function");

    numTokens += count("name");
    numTokens += count(tool.name);
    numTokens += count("description");
    numTokens += count(tool.description);

    const parameters = tool.parameters;
    numTokens += count("parameters");
    if (parameters.title !== undefined) {
      numTokens += count("title");
      numTokens += count(parameters.title);
    }
    numTokens += count("type");
    numTokens += count(parameters.type);

    if (parameters.properties) {
      numTokens += count("properties");
      for (const [key, field] of Object.entries(parameters.properties)) {
        numTokens += count(key);
        for (const [fieldKey, fieldValue] of Object.entries(field)) {
          numTokens += count(fieldKey);
          if (fieldKey === "enum" && Array.isArray(fieldValue)) {
            for (const option of fieldValue) {
              numTokens += SCHEMA_LIST_ITEM_TOKENS;
              numTokens += count(String(option));
            }
          } else {
            numTokens += count(fieldKey);
            numTokens += count(stringifyField(fieldValue));
          }
        }
      }
    }

    if (parameters.required) {
      numTokens += count("required");
      for (const required of parameters.required) {
        numTokens += SCHEMA_LIST_ITEM_TOKENS;
        numTokens += count(required);
      }
    }
  }

  return numTokens;
}

function stringifyField(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? "";
}
