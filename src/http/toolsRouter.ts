import express from "express";
import { getToolDefinitions, type ToolContext } from "../tools/definitions";
import { executeTool, type ToolErrorCode } from "../tools/executor";

const statusFor: Record<ToolErrorCode, number> = {
  unknown_tool: 404,
  disabled: 403,
  invalid_arguments: 400,
  configuration: 500,
  inventory: 502
};

export function toolsRouter(ctx: ToolContext) {
  const router = express.Router();

  router.get("/tools", (_req, res) => {
    res.send({ tools: getToolDefinitions({ allowWrite: ctx.allowWrite }) });
  });

  router.post("/tools/:name", async (req, res) => {
    const result = await executeTool(req.params.name, req.body, ctx);
    if (result.success) return res.send({ result: result.output });
    res.status(statusFor[result.code]).send({ error: result.error });
  });

  return router;
}
