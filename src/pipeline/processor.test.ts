import { describe, it, expect, vi, beforeEach } from "vitest";
import { Processor, MAX_TOOL_ROUNDS, SYSTEM_PROMPT } from "./processor";
import { StubProvider } from "../llm/providers/StubProvider";
import { MockInventoryAdapter } from "../inventory/MockInventoryAdapter";
import type { LLMProvider } from "../llm/LLMProvider";
import type { ToolContext } from "../tools/definitions";

function context(allowWrite = false): ToolContext {
  return { inventory: new MockInventoryAdapter(), allowWrite, defaultPageSize: 20 };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("Processor", () => {
  it("runs a tool call and returns the provider's final answer", async () => {
    const processor = new Processor(new StubProvider(), context());

    const reply = await processor.handleIncomingText("locations");

    expect(reply).toBe(
      "Found 2 locations:\n\n1. Garage\n   Description: Shelving by the side door\n   ID: loc-garage\n\n2. Office\n   ID: loc-office\n\n"
    );
  });

  it("feeds tool output back to the provider as tool messages", async () => {
    const complete = vi
      .fn<Parameters<LLMProvider["complete"]>, ReturnType<LLMProvider["complete"]>>()
      .mockResolvedValueOnce({ type: "tool_calls", calls: [{ id: "c1", name: "get_item_details", arguments: { item_id: "nope" } }] })
      .mockResolvedValueOnce({ type: "message", content: "That item does not exist." });
    const processor = new Processor({ complete }, context());

    const reply = await processor.handleIncomingText("what is item nope?");

    expect(reply).toBe("That item does not exist.");
    const [messages, tools] = complete.mock.calls[1];
    expect(messages).toEqual([
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: "what is item nope?" },
      {
        role: "assistant",
        content: null,
        toolCalls: [{ id: "c1", name: "get_item_details", arguments: { item_id: "nope" } }]
      },
      { role: "tool", toolCallId: "c1", content: "Error retrieving item details: item not found: nope" }
    ]);
    expect(tools.map(t => t.function.name)).not.toContain("create_item");
  });

  it("offers write tools when writes are allowed", async () => {
    const complete = vi
      .fn<Parameters<LLMProvider["complete"]>, ReturnType<LLMProvider["complete"]>>()
      .mockResolvedValue({ type: "message", content: "ok" });

    await new Processor({ complete }, context(true)).handleIncomingText("hi");

    expect(complete.mock.calls[0][1].map(t => t.function.name)).toContain("update_item_quantity");
  });

  it("stops after the tool-call limit", async () => {
    const complete = vi
      .fn<Parameters<LLMProvider["complete"]>, ReturnType<LLMProvider["complete"]>>()
      .mockResolvedValue({ type: "tool_calls", calls: [{ id: "c", name: "list_labels", arguments: {} }] });

    const reply = await new Processor({ complete }, context()).handleIncomingText("loop");

    expect(reply).toBe("I could not complete the request within the tool-call limit.");
    expect(complete).toHaveBeenCalledTimes(MAX_TOOL_ROUNDS);
  });

  it("surfaces provider failures as text", async () => {
    const complete = vi
      .fn<Parameters<LLMProvider["complete"]>, ReturnType<LLMProvider["complete"]>>()
      .mockRejectedValue(new Error("rate limited"));

    expect(await new Processor({ complete }, context()).handleIncomingText("hi")).toBe("Error: rate limited");
  });
});
