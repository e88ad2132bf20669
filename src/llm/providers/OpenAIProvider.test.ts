import { describe, it, expect, vi, beforeEach } from "vitest";
import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { OpenAIProvider, parseArguments } from "./OpenAIProvider";
import { getToolDefinitions } from "../../tools/definitions";
import { ConfigurationError } from "../../errors";

function fakeHttp(data: unknown) {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async config => {
      calls.push(config);
      const response: AxiosResponse = { data, status: 200, statusText: "OK", headers: {}, config };
      return response;
    }
  });
  return { http, calls };
}

const tools = getToolDefinitions({ allowWrite: false });

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("parseArguments", () => {
  it("parses JSON objects", () => {
    expect(parseArguments('{"query":"drill","page":2}')).toEqual({ query: "drill", page: 2 });
  });

  it("falls back to an empty object for empty, invalid or non-object input", () => {
    expect(parseArguments(undefined)).toEqual({});
    expect(parseArguments("{not json")).toEqual({});
    expect(parseArguments("[1,2]")).toEqual({});
    expect(parseArguments('"text"')).toEqual({});
  });
});

describe("OpenAIProvider", () => {
  it("requires an API key", async () => {
    const llm = new OpenAIProvider({ model: "gpt-4o", baseUrl: "https://llm.test/v1" });

    await expect(llm.complete([{ role: "user", content: "hi" }], tools)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("posts the conversation with tools and returns tool calls", async () => {
    const { http, calls } = fakeHttp({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: "call_1", type: "function", function: { name: "search_items", arguments: '{"query":"drill"}' } }]
          }
        }
      ]
    });
    const llm = new OpenAIProvider({ apiKey: "test-key", model: "gpt-4o", baseUrl: "https://llm.test/v1", http });

    const reply = await llm.complete(
      [
        { role: "system", content: "sys" },
        { role: "user", content: "find my drill" },
        { role: "assistant", content: null, toolCalls: [{ id: "call_0", name: "list_locations", arguments: {} }] },
        { role: "tool", toolCallId: "call_0", content: "No locations found." }
      ],
      tools
    );

    expect(reply).toEqual({ type: "tool_calls", calls: [{ id: "call_1", name: "search_items", arguments: { query: "drill" } }] });
    expect(calls[0].url).toBe("https://llm.test/v1/chat/completions");
    expect(calls[0].headers.get("Authorization")).toBe("Bearer test-key");

    const body = JSON.parse(String(calls[0].data));
    expect(body.model).toBe("gpt-4o");
    expect(body.temperature).toBe(0);
    expect(body.tool_choice).toBe("auto");
    expect(body.tools).toHaveLength(tools.length);
    expect(body.messages).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "find my drill" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "call_0", type: "function", function: { name: "list_locations", arguments: "{}" } }]
      },
      { role: "tool", tool_call_id: "call_0", content: "No locations found." }
    ]);
  });

  it("omits tools when none are offered and returns plain messages", async () => {
    const { http, calls } = fakeHttp({ choices: [{ message: { content: "Your drill is in the garage." } }] });
    const llm = new OpenAIProvider({ apiKey: "test-key", model: "gpt-4o", baseUrl: "https://llm.test/v1", http });

    const reply = await llm.complete([{ role: "user", content: "where is my drill?" }], []);

    expect(reply).toEqual({ type: "message", content: "Your drill is in the garage." });
    expect(JSON.parse(String(calls[0].data))).not.toHaveProperty("tools");
  });

  it("rejects a response without choices", async () => {
    const { http } = fakeHttp({ choices: [] });
    const llm = new OpenAIProvider({ apiKey: "test-key", model: "gpt-4o", baseUrl: "https://llm.test/v1", http });

    await expect(llm.complete([{ role: "user", content: "hi" }], tools)).rejects.toThrow(
      "Unexpected response from chat/completions"
    );
  });
});
