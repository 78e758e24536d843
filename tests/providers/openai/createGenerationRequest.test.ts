import { describe, expect, test, vi } from "vitest";
import { ContractViolationError } from "../../../src/errors/RelayError.js";
import {
  createGenerationRequest,
  handleChatResponse,
} from "../../../src/providers/openai/createGenerationRequest.js";
import type { ChatCompletion, OpenAITransport } from "../../../src/providers/openai/types.js";
import { chatCompletion, fakeTransport, recordingTracer, responseContext } from "./helpers.js";

const request = {
  model: "gpt-4",
  promptMessages: [{ role: "user" as const, content: "hi" }],
  parameters: {},
};

describe("handleChatResponse", () => {
  test("uses reported usage", () => {
    const result = handleChatResponse(
      chatCompletion({ content: "Hello world" }, { usage: { prompt: 5, completion: 7 } }),
      responseContext(),
    );

    expect(result.message).toEqual({ role: "assistant", content: "Hello world", toolCalls: [] });
    expect(result.usage).toMatchObject({ promptTokens: 5, completionTokens: 7, totalTokens: 12 });
  });

  test("estimates missing usage", () => {
    const result = handleChatResponse(chatCompletion({ content: "Hello world" }), responseContext());

    // prompt: 3 + user + hi + 3; completion: 3 + assistant + 2 words + 3
    expect(result.usage).toMatchObject({ promptTokens: 8, completionTokens: 9, totalTokens: 17 });
  });

  test("collects tool calls", () => {
    const result = handleChatResponse(
      chatCompletion(
        { tool_calls: [{ id: "call_1", type: "function", function: { name: "f", arguments: "{}" } }] },
        { finishReason: "tool_calls" },
      ),
      responseContext(),
    );

    expect(result.message).toEqual({
      role: "assistant",
      content: "",
      toolCalls: [{ id: "call_1", type: "function", function: { name: "f", arguments: "{}" } }],
    });
  });

  test("carries the system fingerprint", () => {
    const response: ChatCompletion = { ...chatCompletion({ content: "ok" }), system_fingerprint: "fp_1" };
    expect(handleChatResponse(response, responseContext()).systemFingerprint).toBe("fp_1");
  });

  test("a response without choices is rejected", () => {
    const response: ChatCompletion = { ...chatCompletion({ content: "ok" }), choices: [] };
    expect(() => handleChatResponse(response, responseContext())).toThrow(ContractViolationError);
  });
});

describe("createGenerationRequest", () => {
  test("sends the block request", async () => {
    const chatBlock = vi.fn<OpenAITransport["chatBlock"]>(async () =>
      chatCompletion({ content: "Hello" }, { usage: { prompt: 1, completion: 1 } }),
    );

    const result = await createGenerationRequest({
      transport: fakeTransport({ chatBlock }),
      request,
      context: responseContext(),
    });

    expect(chatBlock).toHaveBeenCalledWith(
      { model: "gpt-4", messages: [{ role: "user", content: "hi" }] },
      { signal: undefined },
    );
    expect(result.message.content).toBe("Hello");
  });

  test("logs and rethrows transport failures", async () => {
    const { writer, span } = recordingTracer();
    const failure = new Error("connection reset");

    await expect(
      createGenerationRequest({
        transport: fakeTransport({
          chatBlock: async () => {
            throw failure;
          },
        }),
        request,
        context: responseContext({ tracer: span }),
      }),
    ).rejects.toBe(failure);

    expect(writer.messages("error")).toEqual(["Error fetching chat completion"]);
  });
});
