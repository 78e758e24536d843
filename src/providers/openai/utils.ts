import { ContractViolationError } from "../../errors/RelayError.js";
import type { PromptContentPart, PromptMessage, ToolCall } from "../../messages/types.js";
import { SINGLE_MULTIPART_USER_MODELS } from "./models.js";
import type { ChatCompletion } from "./types.js";

export const FinishReason = {
  Stop: "stop",
  Length: "length",
  ToolCalls: "tool_calls",
  FunctionCall: "function_call",
  ContentFilter: "content_filter",
} as const;

/**
 * Families that put more than the bare reason in `finish_reason`. For them only
 * a value starting with one of the listed reasons ends the stream.
 */
const FINISH_REASON_FAMILIES: ReadonlyArray<{ prefix: string; terminal: ReadonlyArray<string> }> = [
  { prefix: "yi-", terminal: [FinishReason.Length, FinishReason.Stop, FinishReason.ContentFilter] },
];

export function isTerminalFinishReason(model: string, finishReason: string | null | undefined): boolean {
  if (finishReason == null) {
    return false;
  }

  const family = FINISH_REASON_FAMILIES.find(({ prefix }) => model.startsWith(prefix));
  if (family) {
    return family.terminal.some((reason) => finishReason.startsWith(reason));
  }
  return true;
}

/*
 Tool calls from block responses
 */

type ResponseMessage = ChatCompletion["choices"][number]["message"];

export function extractToolCalls(message: ResponseMessage): Array<ToolCall> {
  if (message.tool_calls && message.tool_calls.length > 0) {
    return message.tool_calls.map((call) => {
      if (call.type !== "function") {
        throw new ContractViolationError("Unsupported tool call type in response", {
          details: { toolCall: call },
        });
      }
      return {
        id: call.id || "",
        type: "function" as const,
        function: {
          name: call.function.name || "",
          arguments: call.function.arguments || "",
        },
      };
    });
  }

  if (message.function_call) {
    return [legacyFunctionCall(message.function_call)];
  }

  return [];
}

/** Legacy function calls carry no id; the function name stands in for it. */
export function legacyFunctionCall(functionCall: { name?: string; arguments?: string }): ToolCall {
  const name = functionCall.name || "";
  return {
    id: name,
    type: "function",
    function: { name, arguments: functionCall.arguments || "" },
  };
}

/*
 Prompt adjustments
 */

/**
 * Some models reject a conversation with more than one user message when any of
 * them is multi-part; for those, multi-part content is flattened to text with
 * images replaced by a placeholder.
 */
export function clearIllegalPromptMessages(
  model: string,
  messages: Array<PromptMessage>,
): Array<PromptMessage> {
  if (!SINGLE_MULTIPART_USER_MODELS.includes(model)) {
    return messages;
  }

  const userMessageCount = messages.filter((m) => m.role === "user").length;
  if (userMessageCount <= 1) {
    return messages;
  }

  return messages.map((m) =>
    m.role === "user" && typeof m.content !== "string"
      ? { ...m, content: m.content.map(flattenContentPart).join("\n") }
      : m,
  );
}

function flattenContentPart(part: PromptContentPart): string {
  switch (part.type) {
    case "text":
      return part.text;
    case "image":
      return "[IMAGE]";
    case "audio":
      return "";
  }
}

/**
 * Cuts `text` at the earliest occurrence of any stop sequence.
 */
export function enforceStopTokens(text: string, stop?: Array<string>): string {
  if (!stop || stop.length === 0) {
    return text;
  }

  let cut = text.length;
  for (const sequence of stop) {
    if (!sequence) continue;
    const index = text.indexOf(sequence);
    if (index !== -1 && index < cut) {
      cut = index;
    }
  }
  return text.slice(0, cut);
}

export function getPromptText(messages: Array<PromptMessage>): string {
  const first = messages[0];
  if (!first || typeof first.content !== "string") {
    throw new ContractViolationError("Text completion models take a single plain-text prompt");
  }
  return first.content;
}
