// ============================================
// OpenAI adapter tests — message/tool translation
// ============================================

import { describe, it, expect } from "vitest";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions.js";
import { OpenAITextGenerator, type ChatCompletionsClient } from "../src/llm/client.js";
import { CREATE_BOOKING_TOOL } from "../src/booking/tool.js";

type CompletionResponse = Awaited<ReturnType<ChatCompletionsClient["chat"]["completions"]["create"]>>;

function fakeClient(reply: CompletionResponse | Error) {
  const bodies: ChatCompletionCreateParamsNonStreaming[] = [];
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        create: async (body) => {
          bodies.push(body);
          if (reply instanceof Error) throw reply;
          return reply;
        },
      },
    },
  };
  return { client, bodies };
}

const TEXT_REPLY: CompletionResponse = {
  choices: [{ finish_reason: "stop", message: { content: "Hello!" } }],
};

describe("OpenAITextGenerator", () => {
  it("translates messages and tools to chat completion params", async () => {
    const { client, bodies } = fakeClient(TEXT_REPLY);
    const generator = new OpenAITextGenerator(client);

    await generator.generate({
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "book it" },
        {
          role: "assistant",
          content: "",
          toolCalls: [{ id: "call-1", name: "create_booking", arguments: "{}" }],
        },
        { role: "tool", toolCallId: "call-1", name: "create_booking", content: "{\"result\":{}}" },
      ],
      tools: [CREATE_BOOKING_TOOL],
      toolChoice: "none",
    });

    const body = bodies[0];
    expect(body?.model).toBe("gpt-4o-mini");
    expect(body?.temperature).toBe(0.2);
    expect(body?.max_tokens).toBe(1000);
    expect(body?.tool_choice).toBe("none");
    expect(body?.parallel_tool_calls).toBe(false);
    expect(body?.messages).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "book it" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "call-1", type: "function", function: { name: "create_booking", arguments: "{}" } }],
      },
      { role: "tool", tool_call_id: "call-1", content: "{\"result\":{}}" },
    ]);
    expect(body?.tools).toEqual([
      {
        type: "function",
        function: {
          name: "create_booking",
          description: CREATE_BOOKING_TOOL.description,
          parameters: CREATE_BOOKING_TOOL.parameters,
        },
      },
    ]);
  });

  it("omits tools when none are declared", async () => {
    const { client, bodies } = fakeClient(TEXT_REPLY);
    const generator = new OpenAITextGenerator(client, { model: "test-model", temperature: 0, maxTokens: 50 });

    const result = await generator.generate({ messages: [{ role: "user", content: "hi" }] });

    expect(result).toEqual({ text: "Hello!", toolCall: undefined, message: { role: "assistant", content: "Hello!" } });
    expect(bodies[0]).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0,
      max_tokens: 50,
    });
  });

  it("returns the first function tool call", async () => {
    const { client } = fakeClient({
      choices: [
        {
          finish_reason: "tool_calls",
          message: {
            content: null,
            tool_calls: [
              { id: "call-a", type: "function", function: { name: "create_booking", arguments: "{\"name\":\"Jane\"}" } },
              { id: "call-b", type: "function", function: { name: "other", arguments: "{}" } },
            ],
          },
        },
      ],
    });
    const generator = new OpenAITextGenerator(client);

    const result = await generator.generate({ messages: [{ role: "user", content: "book" }], tools: [CREATE_BOOKING_TOOL] });

    expect(result.text).toBe("");
    expect(result.toolCall).toEqual({ id: "call-a", name: "create_booking", arguments: "{\"name\":\"Jane\"}" });
    expect(result.message.toolCalls).toHaveLength(2);
  });

  it("wraps request failures as generation errors", async () => {
    const { client } = fakeClient(new Error("429 Too Many Requests"));
    const generator = new OpenAITextGenerator(client);

    await expect(generator.generate({ messages: [{ role: "user", content: "hi" }] })).rejects.toMatchObject({
      code: "GENERATION_FAILED",
    });
  });

  it("fails when the response has no choices", async () => {
    const { client } = fakeClient({ choices: [] });
    const generator = new OpenAITextGenerator(client);

    await expect(generator.generate({ messages: [{ role: "user", content: "hi" }] })).rejects.toMatchObject({
      code: "GENERATION_FAILED",
      message: "No response choice from LLM",
    });
  });
});
