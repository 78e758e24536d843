import { z } from "zod";
import { formatZodError } from "../../config/loaders.js";
import { InvalidRequestError } from "../../errors/RelayError.js";

export const OpenAIModelParametersSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  max_tokens: z.int().positive().optional(),
  max_completion_tokens: z.int().positive().optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  seed: z.int().optional(),
  n: z.int().positive().optional(),
  logit_bias: z.record(z.string(), z.number()).optional(),
  tool_choice: z.enum(["auto", "none", "required"]).optional(),
  reasoning_effort: z.enum(["low", "medium", "high"]).optional(),
  response_format: z.string().optional(),
  /** JSON-encoded schema, required when `response_format` is `json_schema` */
  json_schema: z.string().optional(),
});

export type OpenAIModelParameters = z.infer<typeof OpenAIModelParametersSchema>;

const JsonSchemaFormatSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  schema: z.record(z.string(), z.unknown()).optional(),
  strict: z.boolean().nullable().optional(),
});

export type JsonSchemaFormat = z.infer<typeof JsonSchemaFormatSchema>;

export type ResponseFormat =
  | { type: "text" }
  | { type: "json_object" }
  | { type: "json_schema"; json_schema: JsonSchemaFormat };

export function parseModelParameters(raw: unknown = {}): OpenAIModelParameters {
  const parsed = OpenAIModelParametersSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidRequestError(`Invalid model parameters:\n${formatZodError(parsed.error)}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/**
 * The wire `response_format` for the caller's `response_format` / `json_schema`
 * pair. A `json_schema` without `response_format` is ignored.
 */
export function toResponseFormat(parameters: OpenAIModelParameters): ResponseFormat | undefined {
  const { response_format: format, json_schema: jsonSchema } = parameters;
  if (!format) {
    return undefined;
  }

  switch (format) {
    case "text":
      return { type: "text" };
    case "json_object":
      return { type: "json_object" };
    case "json_schema":
      return { type: "json_schema", json_schema: parseJsonSchema(jsonSchema) };
    default:
      throw new InvalidRequestError(`Unsupported response format: ${format}`, {
        details: { response_format: format },
      });
  }
}

function parseJsonSchema(jsonSchema: string | undefined): JsonSchemaFormat {
  if (!jsonSchema) {
    throw new InvalidRequestError("Must define JSON Schema when the response format is json_schema");
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(jsonSchema);
  } catch (e) {
    throw new InvalidRequestError(`not correct json_schema format: ${jsonSchema}`, { cause: e });
  }

  const parsed = JsonSchemaFormatSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidRequestError(
      `not correct json_schema format: ${jsonSchema}\n${formatZodError(parsed.error)}`,
      { details: { issues: parsed.error.issues } },
    );
  }
  return parsed.data;
}
