export type PromptMessage =
  | SystemPromptMessage
  | UserPromptMessage
  | AssistantPromptMessage
  | ToolPromptMessage;

export type PromptMessageRole = PromptMessage["role"];

export interface SystemPromptMessage {
  role: "system";
  content: string;
  name?: string;
}

export interface UserPromptMessage {
  role: "user";
  content: string | Array<PromptContentPart>;
  name?: string;
}

export interface AssistantPromptMessage {
  role: "assistant";
  content: string;
  toolCalls: Array<ToolCall>;
  name?: string;
}

export interface ToolPromptMessage {
  role: "tool";
  content: string;
  toolCallId: string;
  name?: string;
}

export type PromptContentPart = TextContentPart | ImageContentPart | AudioContentPart;

export interface TextContentPart {
  type: "text";
  text: string;
}

export type ImageDetail = "low" | "high" | "auto";

export interface ImageContentPart {
  type: "image";
  /** Remote URL or a `data:` URI */
  url: string;
  detail: ImageDetail;
}

export interface AudioContentPart {
  type: "audio";
  /** `data:<mime>;base64,<payload>` */
  data: string;
  format: "wav" | "mp3";
}

export interface ToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    /** Usually JSON, but passed through verbatim */
    arguments: string;
  };
}

export interface PromptMessageTool {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/**
 * JSON schema of a tool's arguments. Only the keys the token estimator walks are
 * spelled out; anything else a schema carries is passed through to the wire.
 */
export interface ToolParameters {
  type: string;
  title?: string;
  properties?: Record<string, Record<string, unknown>>;
  required?: string[];
  [key: string]: unknown;
}
