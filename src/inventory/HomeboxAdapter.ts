import axios, { AxiosInstance, AxiosRequestConfig } from "axios";
import { z } from "zod";
import { InventoryAdapter } from "./InventoryAdapter";
import { ConfigurationError, HomeboxRequestError, HomeboxResponseError } from "../errors";
import {
  itemDetailsSchema,
  itemPageSchema,
  itemSummarySchema,
  labelListSchema,
  locationListSchema,
  loginResponseSchema
} from "../types";
import type { ItemQuery, NewItem } from "../types";

export type HomeboxAdapterOptions = {
  baseUrl: string;
  token?: string;
  username?: string;
  password?: string;
  cfClientId?: string;
  cfClientSecret?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

export function normalizeBaseUrl(url: string) {
  const base = (url || "").trim().replace(/\/+$/, "");
  if (!base) {
    throw new ConfigurationError("Homebox API URL is required. Please set HOMEBOX_URL.");
  }
  return base.endsWith("/api") ? base : `${base}/api`;
}

export function buildHeaders(auth: { cfClientId?: string; cfClientSecret?: string; token?: string }) {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json"
  };
  // Access only honours the pair; one without the other gets a login page back.
  if (auth.cfClientId && auth.cfClientSecret) {
    headers["CF-Access-Client-Id"] = auth.cfClientId;
    headers["CF-Access-Client-Secret"] = auth.cfClientSecret;
  }
  if (auth.token) {
    headers.Authorization = /^bearer /i.test(auth.token) ? auth.token : `Bearer ${auth.token}`;
  }
  return headers;
}

function toRequestError(e: unknown) {
  if (!axios.isAxiosError(e)) return e;
  const status = e.response?.status ?? 0;
  const body: unknown = e.response?.data;
  const detail =
    body && typeof body === "object" && "error" in body && typeof body.error === "string" ? body.error : undefined;
  return new HomeboxRequestError(status, detail ? `${e.message}: ${detail}` : e.message);
}

export class HomeboxAdapter implements InventoryAdapter {
  private readonly http: AxiosInstance;
  private session?: Promise<string>;

  constructor(private readonly options: HomeboxAdapterOptions) {
    this.http = options.http ?? axios.create();
  }

  async searchItems(query: ItemQuery) {
    return this.request(
      {
        method: "GET",
        url: "/v1/items",
        params: {
          q: query.query || undefined,
          locations: query.locationIds?.length ? query.locationIds : undefined,
          labels: query.labelIds?.length ? query.labelIds : undefined,
          page: query.page,
          pageSize: query.pageSize
        }
      },
      itemPageSchema
    );
  }

  async getItem(id: string) {
    return this.request({ method: "GET", url: `/v1/items/${encodeURIComponent(id)}` }, itemDetailsSchema);
  }

  async listLocations() {
    return this.request({ method: "GET", url: "/v1/locations" }, locationListSchema);
  }

  async listLabels() {
    return this.request({ method: "GET", url: "/v1/labels" }, labelListSchema);
  }

  async createItem(item: NewItem) {
    return this.request(
      {
        method: "POST",
        url: "/v1/items",
        data: {
          name: item.name,
          description: item.description ?? "",
          locationId: item.locationId,
          labelIds: item.labelIds ?? []
        }
      },
      itemSummarySchema
    );
  }

  async updateItemQuantity(id: string, quantity: number) {
    return this.request(
      { method: "PATCH", url: `/v1/items/${encodeURIComponent(id)}`, data: { id, quantity } },
      itemSummarySchema
    );
  }

  private canLogin() {
    return !this.options.token && !!this.options.username && !!this.options.password;
  }

  /** Shared login promise; concurrent requests wait on the same login. */
  private startSession(baseURL: string) {
    if (!this.session) {
      const pending: Promise<string> = this.login(baseURL).catch((e: unknown) => {
        // a failed login must not be cached, but a newer one may already have replaced it
        if (this.session === pending) this.session = undefined;
        throw e;
      });
      this.session = pending;
    }
    return this.session;
  }

  private async login(baseURL: string) {
    try {
      const resp = await this.http.request({
        method: "POST",
        baseURL,
        url: "/v1/users/login",
        data: { username: this.options.username, password: this.options.password, stayLoggedIn: true },
        headers: buildHeaders({ cfClientId: this.options.cfClientId, cfClientSecret: this.options.cfClientSecret }),
        timeout: this.options.timeoutMs
      });
      const parsed = loginResponseSchema.safeParse(resp.data);
      if (!parsed.success) {
        throw new HomeboxResponseError("Unexpected response from /v1/users/login: missing token");
      }
      console.log("homebox login ok", parsed.data.expiresAt ? `(expires ${parsed.data.expiresAt})` : "");
      return parsed.data.token;
    } catch (e) {
      throw toRequestError(e);
    }
  }

  private async request<T>(
    config: AxiosRequestConfig,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    retried = false
  ): Promise<T> {
    const baseURL = normalizeBaseUrl(this.options.baseUrl);
    const session = this.options.token || !this.canLogin() ? undefined : this.startSession(baseURL);
    const token = this.options.token || (await session);
    let data: unknown;
    try {
      const resp = await this.http.request({
        ...config,
        baseURL,
        headers: buildHeaders({
          cfClientId: this.options.cfClientId,
          cfClientSecret: this.options.cfClientSecret,
          token
        }),
        // Homebox expects repeated keys (locations=a&locations=b), not locations[]=a
        paramsSerializer: { indexes: null },
        timeout: this.options.timeoutMs
      });
      data = resp.data;
    } catch (e) {
      if (!retried && this.canLogin() && axios.isAxiosError(e) && e.response?.status === 401) {
        console.log("homebox session rejected, logging in again");
        if (this.session === session) this.session = undefined;
        return this.request(config, schema, true);
      }
      throw toRequestError(e);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length ? ` at ${issue.path.join(".")}` : "";
      throw new HomeboxResponseError(`Unexpected response from ${config.url}: ${issue?.message ?? "invalid payload"}${where}`);
    }
    return parsed.data;
  }
}
