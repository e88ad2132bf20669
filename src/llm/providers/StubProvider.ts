import type { ChatMessage, LLMProvider, LLMReply, ToolCall } from "../LLMProvider";
import type { ToolDefinition } from "../../tools/definitions";

const ITEM_ID = /\bitem\s+([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})\b/i;

/** Keyword router for running without a model. Picks one tool, then echoes its output. */
export class StubProvider implements LLMProvider {
  async complete(messages: ChatMessage[], tools: ToolDefinition[]): Promise<LLMReply> {
    const last = messages[messages.length - 1];
    if (!last) return { type: "message", content: "No message received." };

    if (last.role === "tool") {
      const results: string[] = [];
      for (let i = messages.length - 1; i >= 0; i--) {
        const m = messages[i];
        if (m.role !== "tool") break;
        results.unshift(m.content);
      }
      return { type: "message", content: results.join("\n\n") };
    }

    if (last.role !== "user") return { type: "message", content: "" };

    const call = this.route(last.content, messages.length);
    if (!tools.some(t => t.function.name === call.name)) {
      return { type: "message", content: `The ${call.name} tool is not available.` };
    }
    return { type: "tool_calls", calls: [call] };
  }

  private route(text: string, turn: number): ToolCall {
    const t = (text || "").trim();
    const id = `stub-${turn}`;
    const itemMatch = t.match(ITEM_ID);
    if (itemMatch) return { id, name: "get_item_details", arguments: { item_id: itemMatch[1] } };
    if (/\blocations?\b/i.test(t)) return { id, name: "list_locations", arguments: {} };
    if (/\blabels?\b/i.test(t)) return { id, name: "list_labels", arguments: {} };
    return { id, name: "search_items", arguments: { query: t } };
  }
}
