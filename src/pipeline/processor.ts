import type { ChatMessage, LLMProvider } from "../llm/LLMProvider";
import { getToolDefinitions, type ToolContext } from "../tools/definitions";
import { executeToolForLLM } from "../tools/executor";
import { errorMessage } from "../errors";

export const MAX_TOOL_ROUNDS = 5;

export const SYSTEM_PROMPT = [
  "You help the user find and manage items in their Homebox home inventory.",
  "Use the tools to look things up instead of guessing. IDs come from earlier tool results.",
  "Answer briefly and mention where items are stored when you know it."
].join(" ");

export class Processor {
  constructor(private llm: LLMProvider, private tools: ToolContext) {}

  async handleIncomingText(text: string) {
    const definitions = getToolDefinitions({ allowWrite: this.tools.allowWrite });
    const messages: ChatMessage[] = [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: text }
    ];

    try {
      for (let round = 0; round < MAX_TOOL_ROUNDS; round++) {
        const reply = await this.llm.complete(messages, definitions);
        if (reply.type === "message") return reply.content;

        messages.push({ role: "assistant", content: null, toolCalls: reply.calls });
        for (const call of reply.calls) {
          const content = await executeToolForLLM(call.name, call.arguments, this.tools);
          messages.push({ role: "tool", toolCallId: call.id, content });
        }
      }
    } catch (e) {
      console.error("processText error", e);
      return `Error: ${errorMessage(e)}`;
    }
    return "I could not complete the request within the tool-call limit.";
  }
}
