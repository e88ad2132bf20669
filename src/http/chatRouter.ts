import express from "express";
import type { Processor } from "../pipeline/processor";

export function chatRouter(processor: Processor) {
  const router = express.Router();

  router.post("/chat", async (req, res) => {
    const message: unknown = req.body?.message;
    if (typeof message !== "string" || !message.trim()) {
      return res.status(400).send({ error: "message is required" });
    }
    const reply = await processor.handleIncomingText(message);
    res.send({ reply });
  });

  return router;
}
