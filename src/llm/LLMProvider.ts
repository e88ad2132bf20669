import type { ToolDefinition } from "../tools/definitions";

export type ToolCall = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export type LLMReply = { type: "message"; content: string } | { type: "tool_calls"; calls: ToolCall[] };

export interface LLMProvider {
  complete(messages: ChatMessage[], tools: ToolDefinition[]): Promise<LLMReply>;
}
