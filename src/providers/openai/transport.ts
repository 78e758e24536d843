import OpenAI from "openai";
import type { Credentials } from "../../config/schemas.js";
import type { OpenAITransport } from "./types.js";

export type ClientFactory = (credentials: Credentials) => OpenAITransport;

export function openaiTransport(client: OpenAI): OpenAITransport {
  return {
    chatStream: (request, options) => client.chat.completions.create(request, options),
    chatBlock: (request, options) => client.chat.completions.create(request, options),
    completeStream: (request, options) => client.completions.create(request, options),
    completeBlock: (request, options) => client.completions.create(request, options),
    respond: (request, options) => client.responses.create(request, options),
  };
}

export const createOpenAIClient: ClientFactory = (credentials) =>
  openaiTransport(
    new OpenAI({
      apiKey: credentials["api-key"],
      ...(credentials["base-url"] ? { baseURL: credentials["base-url"] } : {}),
      ...(credentials.organization ? { organization: credentials.organization } : {}),
    }),
  );
