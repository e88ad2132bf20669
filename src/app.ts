import express, { type ErrorRequestHandler } from "express";
import bodyParser from "body-parser";
import type { AppConfig } from "./config";
import type { InventoryAdapter } from "./inventory/InventoryAdapter";
import { HomeboxAdapter } from "./inventory/HomeboxAdapter";
import { MockInventoryAdapter } from "./inventory/MockInventoryAdapter";
import type { LLMProvider } from "./llm/LLMProvider";
import { StubProvider } from "./llm/providers/StubProvider";
import { OpenAIProvider } from "./llm/providers/OpenAIProvider";
import { Processor } from "./pipeline/processor";
import type { ToolContext } from "./tools/definitions";
import { requireApiKey } from "./http/auth";
import { toolsRouter } from "./http/toolsRouter";
import { chatRouter } from "./http/chatRouter";

export function createProviders(config: AppConfig): { llm: LLMProvider; inventory: InventoryAdapter } {
  const inventory =
    config.inventoryProvider === "mock"
      ? new MockInventoryAdapter()
      : new HomeboxAdapter({
          baseUrl: config.homeboxUrl,
          token: config.homeboxToken,
          username: config.homeboxUsername,
          password: config.homeboxPassword,
          cfClientId: config.cfClientId,
          cfClientSecret: config.cfClientSecret,
          timeoutMs: config.requestTimeoutMs
        });
  if (config.llmProvider === "openai") {
    const llm = new OpenAIProvider({
      apiKey: config.openaiKey,
      model: config.openaiModel,
      baseUrl: config.openaiBaseUrl,
      timeoutMs: config.requestTimeoutMs
    });
    return { llm, inventory };
  }
  return { llm: new StubProvider(), inventory };
}

const handleErrors: ErrorRequestHandler = (err, _req, res, _next) => {
  // body-parser tags malformed JSON with a 4xx status
  const status = typeof err?.status === "number" && err.status >= 400 && err.status < 500 ? err.status : 500;
  if (status === 500) console.error("request error", err);
  res.status(status).send({ error: status === 500 ? "Internal error" : "Invalid request body" });
};

export function createApp(config: AppConfig, providers = createProviders(config)) {
  const app = express();

  const ctx: ToolContext = {
    inventory: providers.inventory,
    allowWrite: config.allowWrite,
    defaultPageSize: config.defaultPageSize
  };
  const processor = new Processor(providers.llm, ctx);

  app.get("/health", (_req, res) => res.send({ ok: true }));

  app.use(requireApiKey(config.toolsApiKey));
  app.use(bodyParser.json());
  app.use("/", toolsRouter(ctx));
  app.use("/", chatRouter(processor));
  app.use(handleErrors);

  return app;
}
