/**
 * Routes LLM tool calls to the inventory tools.
 *
 * Never throws: every outcome is a ToolResult, so the caller can always hand the
 * model some text.
 */

import { ConfigurationError, errorMessage } from "../errors";
import { findTool, type ToolContext } from "./definitions";

export type ToolErrorCode = "unknown_tool" | "disabled" | "invalid_arguments" | "configuration" | "inventory";

export type ToolResult =
  | { success: true; output: string }
  | { success: false; code: ToolErrorCode; error: string };

function normalizeArgs(args: unknown) {
  return args === undefined || args === null ? {} : args;
}

export async function executeTool(name: string, args: unknown, ctx: ToolContext): Promise<ToolResult> {
  const tool = findTool(name);
  if (!tool) {
    return { success: false, code: "unknown_tool", error: `Unknown tool: ${name}` };
  }
  if (tool.write && !ctx.allowWrite) {
    return { success: false, code: "disabled", error: `Tool ${name} is disabled (set TOOLS_ALLOW_WRITE=true)` };
  }

  const call = tool.prepare(normalizeArgs(args));
  if (!call.success) {
    return { success: false, code: "invalid_arguments", error: `Invalid arguments for ${name}: ${call.issues}` };
  }

  const started = Date.now();
  try {
    const output = await call.run(ctx);
    console.log(`tool ${name} ok in ${Date.now() - started}ms`);
    return { success: true, output };
  } catch (e) {
    console.error(`tool ${name} failed in ${Date.now() - started}ms`, e);
    if (e instanceof ConfigurationError) {
      return { success: false, code: "configuration", error: `Error: ${e.message}` };
    }
    return { success: false, code: "inventory", error: `${tool.errorPrefix}: ${errorMessage(e)}` };
  }
}

/** The text the model sees for a call, success or not. */
export async function executeToolForLLM(name: string, args: unknown, ctx: ToolContext) {
  const result = await executeTool(name, args, ctx);
  return result.success ? result.output : result.error;
}
