import { describe, expect, test } from "vitest";
import { InvalidRequestError } from "../../../src/errors/RelayError.js";
import type { PromptMessageTool } from "../../../src/messages/types.js";
import {
  adjustForModel,
  buildChatRequest,
  buildChatStreamRequest,
} from "../../../src/providers/openai/chatRequest.js";

const SEARCH_TOOL: PromptMessageTool = {
  name: "search",
  description: "Search the web",
  parameters: { type: "object", properties: { q: { type: "string" } } },
};

describe("adjustForModel", () => {
  test("leaves chat models alone", () => {
    expect(adjustForModel("gpt-4o", { max_tokens: 10 }, ["END"])).toEqual({
      parameters: { max_tokens: 10 },
      stop: ["END"],
    });
  });

  test("renames max_tokens and drops stop for reasoning models", () => {
    expect(adjustForModel("o3-mini", { max_tokens: 10, temperature: 1 }, ["END"])).toEqual({
      parameters: { max_completion_tokens: 10, temperature: 1 },
    });
  });

  test("applies to fine-tunes of reasoning models", () => {
    expect(adjustForModel("ft:o4-mini:acme::abc", { max_tokens: 5 })).toEqual({
      parameters: { max_completion_tokens: 5 },
    });
  });
});

describe("buildChatRequest", () => {
  test("minimal request", () => {
    expect(
      buildChatRequest({
        model: "gpt-4o",
        promptMessages: [{ role: "user", content: "hi" }],
        parameters: {},
      }),
    ).toEqual({ model: "gpt-4o", messages: [{ role: "user", content: "hi" }] });
  });

  test("tools default the tool choice to auto", () => {
    const request = buildChatRequest({
      model: "gpt-4o",
      promptMessages: [{ role: "user", content: "hi" }],
      parameters: {},
      tools: [SEARCH_TOOL],
    });

    expect(request.tool_choice).toBe("auto");
    expect(request.tools).toHaveLength(1);
  });

  test("an explicit tool choice wins", () => {
    const request = buildChatRequest({
      model: "gpt-4o",
      promptMessages: [{ role: "user", content: "hi" }],
      parameters: { tool_choice: "none" },
      tools: [SEARCH_TOOL],
    });

    expect(request.tool_choice).toBe("none");
  });

  test("passes sampling parameters, stop and user", () => {
    expect(
      buildChatRequest({
        model: "gpt-4o",
        promptMessages: [{ role: "user", content: "hi" }],
        parameters: { temperature: 0.5, seed: 7, response_format: "json_object" },
        stop: ["\n\n"],
        user: "user-1",
      }),
    ).toEqual({
      model: "gpt-4o",
      messages: [{ role: "user", content: "hi" }],
      response_format: { type: "json_object" },
      temperature: 0.5,
      seed: 7,
      stop: ["\n\n"],
      user: "user-1",
    });
  });

  test("an empty stop list is left out", () => {
    const request = buildChatRequest({
      model: "gpt-4o",
      promptMessages: [{ role: "user", content: "hi" }],
      parameters: {},
      stop: [],
    });

    expect(request).not.toHaveProperty("stop");
  });

  test("an invalid response format is rejected", () => {
    expect(() =>
      buildChatRequest({
        model: "gpt-4o",
        promptMessages: [{ role: "user", content: "hi" }],
        parameters: { response_format: "json_schema" },
      }),
    ).toThrow(InvalidRequestError);
  });

  test("flattens multi-part history for restricted models", () => {
    const request = buildChatRequest({
      model: "gpt-4-turbo",
      promptMessages: [
        { role: "user", content: [{ type: "text", text: "first" }] },
        { role: "user", content: "second" },
      ],
      parameters: {},
    });

    expect(request.messages).toEqual([
      { role: "user", content: "first" },
      { role: "user", content: "second" },
    ]);
  });
});

describe("buildChatStreamRequest", () => {
  test("asks for usage in the stream", () => {
    expect(
      buildChatStreamRequest({
        model: "o1",
        promptMessages: [{ role: "user", content: "hi" }],
        parameters: { max_tokens: 100 },
        stop: ["x"],
      }),
    ).toEqual({
      model: "o1",
      messages: [{ role: "user", content: "hi" }],
      max_completion_tokens: 100,
      stream: true,
      stream_options: { include_usage: true },
    });
  });
});
