import { ContractViolationError } from "../../errors/RelayError.js";
import type {
  AssistantPromptMessage,
  PromptContentPart,
  PromptMessage,
  PromptMessageTool,
  UserPromptMessage,
} from "../../messages/types.js";
import type { WireContentPart, WireMessage, WireTool } from "./types.js";

const BASE64_MARKER = ";base64,";

export function convertPromptMessages(messages: Array<PromptMessage>): Array<WireMessage> {
  return messages.map(toWire);
}

export function toWire(message: PromptMessage): WireMessage {
  switch (message.role) {
    case "system":
      return withName({ role: "system", content: message.content }, message.name);
    case "user":
      return withName(convertUserMessage(message), message.name);
    case "assistant":
      return withName(convertAssistantMessage(message), message.name);
    case "tool":
      // the tool role rejects `name`
      return { role: "tool", content: message.content, tool_call_id: message.toolCallId };
    default:
      return unknownMessage(message);
  }
}

export function convertTools(tools?: Array<PromptMessageTool>): Array<WireTool> | undefined {
  if (tools && tools.length > 0) {
    return tools.map((tool) => ({
      type: "function" as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }
  return undefined;
}

function convertUserMessage(msg: UserPromptMessage): WireMessage {
  if (typeof msg.content === "string") {
    return { role: "user", content: msg.content };
  }
  return { role: "user", content: msg.content.map(convertContentPart) };
}

function convertAssistantMessage(msg: AssistantPromptMessage): WireMessage {
  if (msg.toolCalls.length === 0) {
    return { role: "assistant", content: msg.content };
  }

  return {
    role: "assistant",
    content: msg.content,
    tool_calls: msg.toolCalls.map((call) => ({
      id: call.id,
      type: call.type || "function",
      function: {
        name: call.function.name,
        arguments: call.function.arguments,
      },
    })),
  };
}

function convertContentPart(part: PromptContentPart): WireContentPart {
  switch (part.type) {
    case "text":
      return { type: "text", text: part.text };
    case "image":
      return { type: "image_url", image_url: { url: part.url, detail: part.detail } };
    case "audio":
      return {
        type: "input_audio",
        input_audio: { data: extractBase64Payload(part.data), format: part.format },
      };
    default:
      return unknownContentPart(part);
  }
}

function extractBase64Payload(data: string): string {
  const markerIndex = data.indexOf(BASE64_MARKER);
  if (markerIndex === -1) {
    throw new ContractViolationError("Audio content must be a base64 data URI", {
      details: { prefix: data.slice(0, 32) },
    });
  }
  return data.slice(markerIndex + BASE64_MARKER.length);
}

function withName<T extends WireMessage>(wire: T, name: string | undefined): T {
  return name ? { ...wire, name } : wire;
}

function unknownMessage(message: never): never {
  throw new ContractViolationError("Got unknown prompt message variant", {
    details: { message },
  });
}

function unknownContentPart(part: never): never {
  throw new ContractViolationError("Got unknown prompt content part", { details: { part } });
}
