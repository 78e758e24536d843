import { z } from "zod";
import type {
  AssistantPromptMessage,
  PromptContentPart,
  PromptMessageTool,
  ToolCall,
  ToolParameters,
} from "./types.js";

export function assistantMessage(
  content: string = "",
  toolCalls: Array<ToolCall> = [],
): AssistantPromptMessage {
  return { role: "assistant", content, toolCalls };
}

/**
 * Plain text of a message. Text parts of multi-part content are joined with a
 * newline; image and audio parts contribute nothing.
 */
export function getTextContent(content: string | Array<PromptContentPart>): string {
  if (typeof content === "string") {
    return content;
  }

  return content
    .filter((part) => part.type === "text")
    .map((part) => part.text)
    .join("\n");
}

/**
 * Declares a tool from a zod schema. The schema is rendered to JSON schema the
 * same way it goes over the wire.
 */
export function defineTool(
  name: string,
  description: string,
  schema: z.ZodObject,
): PromptMessageTool {
  const jsonSchema = z.toJSONSchema(schema);

  const properties: Record<string, Record<string, unknown>> = {};
  for (const [key, value] of Object.entries(jsonSchema.properties ?? {})) {
    if (typeof value === "object") {
      properties[key] = { ...value };
    }
  }

  const parameters: ToolParameters = {
    type: "object",
    properties,
    ...(jsonSchema.required ? { required: jsonSchema.required } : {}),
    ...(jsonSchema.additionalProperties === false ? { additionalProperties: false } : {}),
  };
  return { name, description, parameters };
}
