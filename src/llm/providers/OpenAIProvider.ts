import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import type { ChatMessage, LLMProvider, LLMReply, ToolCall } from "../LLMProvider";
import type { ToolDefinition } from "../../tools/definitions";
import { ConfigurationError } from "../../errors";

export type OpenAIProviderOptions = {
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().nullish() })
              })
            )
            .nullish()
        })
      })
    )
    .min(1)
});

export function parseArguments(raw?: string | null): Record<string, unknown> {
  if (!raw) return {};
  try {
    const data: unknown = JSON.parse(raw);
    if (data && typeof data === "object" && !Array.isArray(data)) {
      return Object.fromEntries(Object.entries(data));
    }
    return {};
  } catch (e) {
    console.error("OpenAI tool arguments parse error:", e, "raw:", raw);
    return {};
  }
}

function toWire(m: ChatMessage) {
  switch (m.role) {
    case "tool":
      return { role: "tool", tool_call_id: m.toolCallId, content: m.content };
    case "assistant":
      return {
        role: "assistant",
        content: m.content,
        ...(m.toolCalls && m.toolCalls.length > 0 && {
          tool_calls: m.toolCalls.map(c => ({
            id: c.id,
            type: "function",
            function: { name: c.name, arguments: JSON.stringify(c.arguments) }
          }))
        })
      };
    default:
      return { role: m.role, content: m.content };
  }
}

export class OpenAIProvider implements LLMProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.http = options.http ?? axios.create();
  }

  async complete(messages: ChatMessage[], tools: ToolDefinition[]): Promise<LLMReply> {
    if (!this.options.apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is not set.");
    }
    const resp = await this.http.post(
      `${this.options.baseUrl}/chat/completions`,
      {
        model: this.options.model,
        messages: messages.map(toWire),
        ...(tools.length > 0 && { tools, tool_choice: "auto" }),
        temperature: 0
      },
      {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        timeout: this.options.timeoutMs
      }
    );

    const parsed = completionSchema.safeParse(resp.data);
    if (!parsed.success) {
      throw new Error("Unexpected response from chat/completions");
    }
    const message = parsed.data.choices[0].message;
    const calls: ToolCall[] = (message.tool_calls || []).map(c => ({
      id: c.id,
      name: c.function.name,
      arguments: parseArguments(c.function.arguments)
    }));
    if (calls.length) return { type: "tool_calls", calls };
    return { type: "message", content: message.content || "" };
  }
}
