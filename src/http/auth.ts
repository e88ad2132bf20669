import type { RequestHandler } from "express";

/** Bearer-token gate for callers of the tool API. No key configured means open access. */
export function requireApiKey(apiKey?: string): RequestHandler {
  return (req, res, next) => {
    if (!apiKey) return next();
    const header = req.get("authorization") || "";
    const match = header.match(/^Bearer\s+(.+)$/i);
    if (!match || match[1].trim() !== apiKey) {
      return res.status(401).send({ error: "Unauthorized" });
    }
    next();
  };
}
