import dotenv from "dotenv";
dotenv.config();

export type InventoryProviderName = "homebox" | "mock";
export type LLMProviderName = "stub" | "openai";

export type AppConfig = {
  port: number;
  homeboxUrl: string;
  homeboxToken?: string;
  homeboxUsername?: string;
  homeboxPassword?: string;
  cfClientId?: string;
  cfClientSecret?: string;
  inventoryProvider: InventoryProviderName;
  llmProvider: LLMProviderName;
  openaiKey?: string;
  openaiModel: string;
  openaiBaseUrl: string;
  toolsApiKey?: string;
  allowWrite: boolean;
  defaultPageSize: number;
  requestTimeoutMs: number;
};

type Env = Record<string, string | undefined>;

function optional(value: string | undefined) {
  const v = (value || "").trim();
  return v ? v : undefined;
}

function positiveInt(value: string | undefined, fallback: number) {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function flag(value: string | undefined) {
  return ["1", "true", "yes", "on"].includes((value || "").trim().toLowerCase());
}

export function loadConfig(env: Env): AppConfig {
  return {
    port: positiveInt(env.PORT, 3000),
    homeboxUrl: (env.HOMEBOX_URL || "").trim(),
    homeboxToken: optional(env.HOMEBOX_TOKEN),
    homeboxUsername: optional(env.HOMEBOX_USERNAME),
    homeboxPassword: optional(env.HOMEBOX_PASSWORD),
    cfClientId: optional(env.CF_ACCESS_CLIENT_ID),
    cfClientSecret: optional(env.CF_ACCESS_CLIENT_SECRET),
    inventoryProvider: env.INVENTORY_PROVIDER === "mock" ? "mock" : "homebox",
    llmProvider: env.LLM_PROVIDER === "openai" ? "openai" : "stub",
    openaiKey: optional(env.OPENAI_API_KEY),
    openaiModel: optional(env.OPENAI_MODEL) || "gpt-4o",
    openaiBaseUrl: (optional(env.OPENAI_BASE_URL) || "https://api.openai.com/v1").replace(/\/+$/, ""),
    toolsApiKey: optional(env.TOOLS_API_KEY),
    allowWrite: flag(env.TOOLS_ALLOW_WRITE),
    defaultPageSize: Math.min(positiveInt(env.DEFAULT_PAGE_SIZE, 20), 100),
    requestTimeoutMs: positiveInt(env.REQUEST_TIMEOUT_MS, 15000)
  };
}

export const config = loadConfig(process.env);
