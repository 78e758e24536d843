import { describe, expect, test, vi } from "vitest";
import type { Credentials } from "../../../src/config/schemas.js";
import { InvalidRequestError } from "../../../src/errors/RelayError.js";
import { openai, OpenAILargeLanguageModel } from "../../../src/providers/openai/provider.js";
import type { OpenAITransport } from "../../../src/providers/openai/types.js";
import {
  chatCompletion,
  chatStreamOf,
  collect,
  completionFragment,
  fakeTransport,
  fragment,
  fromArray,
  recordingTracer,
  responsesResponse,
  usageFragment,
  words,
} from "./helpers.js";

const credentials: Credentials = { "api-key": "test-secret" };

function providerWith(transport: OpenAITransport) {
  const createClient = vi.fn((_credentials: Credentials) => transport);
  return { createClient, provider: openai({ createClient, tokenizer: words }) };
}

describe("OpenAILargeLanguageModel", () => {
  test("is named after the service", () => {
    expect(new OpenAILargeLanguageModel().name).toBe("OpenAI");
    expect(openai.DEFAULT_MODEL).toBe("gpt-4o-mini");
  });

  describe("invoke", () => {
    test("blocking chat", async () => {
      const chatBlock = vi.fn<OpenAITransport["chatBlock"]>(async () =>
        chatCompletion({ content: "Hello" }, { usage: { prompt: 3, completion: 1 } }),
      );
      const { provider, createClient } = providerWith(fakeTransport({ chatBlock }));

      const result = await provider.invoke({
        model: "gpt-4",
        credentials,
        promptMessages: [{ role: "user", content: "hi" }],
      });

      expect(createClient).toHaveBeenCalledWith(credentials);
      expect(chatBlock).toHaveBeenCalledTimes(1);
      expect(result.message.content).toBe("Hello");
      expect(result.usage?.totalTokens).toBe(4);
    });

    test("streaming chat", async () => {
      const chatStream = chatStreamOf([
        fragment({ role: "assistant", content: "Hel" }),
        fragment({ content: "lo" }),
        fragment({}, "stop"),
        usageFragment(5, 2),
      ]);
      const { provider } = providerWith(fakeTransport({ chatStream }));

      const chunks = await collect(
        await provider.invoke({
          model: "gpt-4",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
          stream: true,
        }),
      );

      expect(chunks.map((c) => c.delta.message.content)).toEqual(["Hel", "lo", ""]);
      expect(chunks[2]?.delta).toMatchObject({
        finishReason: "stop",
        usage: { promptTokens: 5, completionTokens: 2 },
      });
    });

    test("text completion models use the completion endpoint", async () => {
      const completeStream = vi.fn<OpenAITransport["completeStream"]>(async () =>
        fromArray([completionFragment("Hi", "stop")]),
      );
      const { provider } = providerWith(fakeTransport({ completeStream }));

      const chunks = await collect(
        await provider.invoke({
          model: "gpt-3.5-turbo-instruct",
          credentials,
          promptMessages: [{ role: "user", content: "Say hi" }],
          stream: true,
        }),
      );

      expect(completeStream).toHaveBeenCalledTimes(1);
      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.delta.usage).toMatchObject({ promptTokens: 2, completionTokens: 1 });
    });

    test("a custom mode resolver routes fine-tunes by their base model", async () => {
      const completeBlock = vi.fn<OpenAITransport["completeBlock"]>(async () => ({
        id: "cmpl-test",
        object: "text_completion" as const,
        created: 1700000000,
        model: "ft:davinci-002:acme::abc",
        choices: [{ index: 0, text: "ok", finish_reason: "stop" as const, logprobs: null }],
      }));
      const provider = openai({
        createClient: () => fakeTransport({ completeBlock }),
        resolveModelMode: (model) => (model === "davinci-002" ? "completion" : "chat"),
        tokenizer: words,
      });

      const result = await provider.invoke({
        model: "ft:davinci-002:acme::abc",
        credentials,
        promptMessages: [{ role: "user", content: "Say ok" }],
      });

      expect(completeBlock).toHaveBeenCalledTimes(1);
      expect(result.message.content).toBe("ok");
    });

    test("responses-only models never open a chat stream", async () => {
      const respond = vi.fn<OpenAITransport["respond"]>(async () =>
        responsesResponse("Answer. More", { input: 2, output: 2 }),
      );
      const chatStream = vi.fn<OpenAITransport["chatStream"]>();
      const { provider } = providerWith(fakeTransport({ respond, chatStream }));

      const chunks = await collect(
        await provider.invoke({
          model: "o3-pro",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
          stop: ["."],
          stream: true,
        }),
      );

      expect(respond).toHaveBeenCalledTimes(1);
      expect(chatStream).not.toHaveBeenCalled();
      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.delta).toMatchObject({
        message: { content: "Answer" },
        finishReason: "stop",
        usage: { promptTokens: 2, completionTokens: 2 },
      });
    });

    test("an invalid response format fails before any request", async () => {
      const chatBlock = vi.fn<OpenAITransport["chatBlock"]>();
      const { provider } = providerWith(fakeTransport({ chatBlock }));

      await expect(
        provider.invoke({
          model: "gpt-4",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
          parameters: { response_format: "json_schema" },
        }),
      ).rejects.toThrow(InvalidRequestError);
      expect(chatBlock).not.toHaveBeenCalled();
    });

    test.each([
      [{ response_format: "json_schema" }],
      [{ response_format: "json_schema", json_schema: "{not json" }],
    ])("responses-only models reject an invalid response format before any request (%o)", async (parameters) => {
      const respond = vi.fn<OpenAITransport["respond"]>(async () => responsesResponse("ok"));
      const { provider, createClient } = providerWith(fakeTransport({ respond }));

      await expect(
        provider.invoke({
          model: "o3-pro",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
          parameters,
        }),
      ).rejects.toThrow(InvalidRequestError);
      expect(createClient).not.toHaveBeenCalled();
      expect(respond).not.toHaveBeenCalled();
    });

    test("warns that tools are dropped for text completion models", async () => {
      const { writer, tracer } = recordingTracer();
      const { provider } = providerWith(
        fakeTransport({
          completeStream: async () => fromArray([completionFragment("Hi", "stop")]),
        }),
      );

      await collect(
        await provider.invoke({
          model: "gpt-3.5-turbo-instruct",
          credentials,
          promptMessages: [{ role: "user", content: "Say hi" }],
          tools: [{ name: "noop", description: "Does nothing", parameters: { type: "object" } }],
          stream: true,
          context: { tracer: tracer.startSpan("run") },
        }),
      );

      expect(writer.messages("warn")).toEqual(["Text completion models take no tools; ignoring them"]);
    });
  });

  describe("tracing", () => {
    test("a blocking call ends its span with the result", async () => {
      const { writer, tracer } = recordingTracer();
      const { provider } = providerWith(
        fakeTransport({
          chatBlock: async () => chatCompletion({ content: "Hello" }, { usage: { prompt: 3, completion: 1 } }),
        }),
      );

      await provider.invoke({
        model: "gpt-4",
        credentials,
        promptMessages: [{ role: "user", content: "hi" }],
        context: { tracer: tracer.startSpan("run") },
      });

      const span = writer.ended.find((s) => s.name === "OpenAI chat");
      expect(span?.type).toBe("llm");
      expect(span?.status).toBe("ok");
      expect(span?.attributes).toEqual({ model: "gpt-4", mode: "chat", stream: false });
      expect(span?.result).toEqual({
        kind: "llm",
        model: "gpt-4",
        mode: "chat",
        stream: false,
        usage: { inputTokens: 3, outputTokens: 1, totalTokens: 4 },
      });
    });

    test("a stream ends its span once drained", async () => {
      const { writer, tracer } = recordingTracer();
      const { provider } = providerWith(
        fakeTransport({
          chatStream: chatStreamOf([fragment({ content: "Hi" }, "stop"), usageFragment(3, 1)]),
        }),
      );

      const chunks = await provider.invoke({
        model: "gpt-4",
        credentials,
        promptMessages: [{ role: "user", content: "hi" }],
        stream: true,
        context: { tracer: tracer.startSpan("run") },
      });
      expect(writer.ended.some((s) => s.name === "OpenAI chat")).toBe(false);

      await collect(chunks);

      const span = writer.ended.find((s) => s.name === "OpenAI chat");
      expect(span?.result).toEqual({
        kind: "llm",
        model: "gpt-4",
        mode: "chat",
        stream: true,
        usage: { inputTokens: 3, outputTokens: 1, totalTokens: 4 },
        finishReason: "stop",
      });
    });

    test("a tool call stream records its finish reason once", async () => {
      const { writer, tracer } = recordingTracer();
      const { provider } = providerWith(
        fakeTransport({
          chatStream: chatStreamOf([
            fragment({ tool_calls: [{ index: 0, id: "call_1", function: { name: "f", arguments: "{}" } }] }),
            fragment({}, "tool_calls"),
            usageFragment(3, 5),
          ]),
        }),
      );

      const chunks = await collect(
        await provider.invoke({
          model: "gpt-4",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
          stream: true,
          context: { tracer: tracer.startSpan("run") },
        }),
      );

      expect(chunks.map((c) => c.delta.finishReason)).toEqual([undefined, "tool_calls", undefined]);
      const span = writer.ended.find((s) => s.name === "OpenAI chat");
      expect(span?.result).toMatchObject({ finishReason: "tool_calls", usage: { inputTokens: 3, outputTokens: 5 } });
    });

    test("a failed request ends its span with an error", async () => {
      const { writer, tracer } = recordingTracer();
      const { provider } = providerWith(
        fakeTransport({
          chatBlock: async () => {
            throw new Error("rate limited");
          },
        }),
      );

      await expect(
        provider.invoke({
          model: "gpt-4",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
          context: { tracer: tracer.startSpan("run") },
        }),
      ).rejects.toThrow("rate limited");

      const span = writer.ended.find((s) => s.name === "OpenAI chat");
      expect(span?.status).toBe("error");
      expect(writer.messages("error")).toEqual(["Error fetching chat completion", "rate limited"]);
    });
  });

  describe("countTokens", () => {
    const provider = openai({ tokenizer: words });

    test("chat models use message accounting", () => {
      expect(
        provider.countTokens({
          model: "gpt-4",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
        }),
      ).toBe(8);
    });

    test("fine-tuned chat models count as their base model", () => {
      expect(
        provider.countTokens({
          model: "ft:gpt-4o-mini-2024-07-18:acme::abc",
          credentials,
          promptMessages: [{ role: "user", content: "hi" }],
        }),
      ).toBe(8);
    });

    test("text completion models count the plain prompt", () => {
      expect(
        provider.countTokens({
          model: "gpt-3.5-turbo-instruct",
          credentials,
          promptMessages: [{ role: "user", content: "Say this is a test" }],
        }),
      ).toBe(5);
    });
  });
});
