import type { z } from "zod";
import { ServiceErrorBodySchema, serviceErrorMessage } from "@agent-escrow/types/rest";
import { ProtocolError, TransportError, errorFromResponse } from "../errors.js";
import { formatIssues } from "../config.js";
import { silentLogger, type Logger } from "../logger.js";

export type HttpMethod = "GET" | "POST" | "PATCH";

export interface ServiceClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetcher?: typeof fetch;
  logger?: Logger;
}

export interface RequestOptions<S extends z.ZodTypeAny> {
  method?: HttpMethod;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  schema: S;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Thin JSON transport for the payment and registry services. Authenticates with
 * the static `token` header and turns every failure into a tagged EscrowError:
 * HTTP status decides auth/client/server, an unreadable or off-schema 2xx body
 * is a protocol error, and a request that never got a status is a transport
 * error. Nothing is retried here.
 */
export class ServiceClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetcher: typeof fetch;
  private readonly logger: Logger;

  constructor(options: ServiceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetcher = options.fetcher ?? fetch;
    this.logger = options.logger ?? silentLogger();
  }

  async request<S extends z.ZodTypeAny>(path: string, options: RequestOptions<S>): Promise<z.infer<S>> {
    const method = options.method ?? "GET";
    const url = this.buildUrl(path, options.query);

    this.logger.debug({ method, path }, "Sending service request");

    let response: Response;
    let text: string;
    try {
      response = await this.fetchWithTimeout(url, {
        method,
        headers: {
          token: this.apiKey,
          accept: "application/json",
          "content-type": "application/json"
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body)
      });
      text = await response.text();
    } catch (error) {
      this.logger.warn({ method, path, error: errorText(error) }, "Service request failed");
      throw new TransportError(
        isAbortError(error)
          ? `${method} ${path} timed out after ${this.timeoutMs}ms`
          : `${method} ${path} failed: ${errorText(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      this.logger.warn({ method, path, status: response.status }, "Service rejected request");
      throw errorFromResponse(response.status, readErrorMessage(text, response.statusText), {
        method,
        path,
        body: text
      });
    }

    const json = parseJson(text);
    if (!json.ok) {
      throw new ProtocolError(`${method} ${path} returned a non-JSON body`, {
        status: response.status,
        details: { body: text }
      });
    }

    const parsed = options.schema.safeParse(json.value);
    if (!parsed.success) {
      throw new ProtocolError(`${method} ${path} returned an unexpected response shape`, {
        status: response.status,
        details: { issues: formatIssues(parsed.error) }
      });
    }

    this.logger.debug({ method, path, status: response.status }, "Service request completed");
    return parsed.data;
  }

  private buildUrl(path: string, query: RequestOptions<z.ZodTypeAny>["query"]): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      return await this.fetcher(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }
}

type JsonParseResult = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function readErrorMessage(text: string, fallback: string): string {
  const json = parseJson(text);
  if (json.ok) {
    const parsed = ServiceErrorBodySchema.safeParse(json.value);
    const message = parsed.success ? serviceErrorMessage(parsed.data) : undefined;
    if (message) return message;
  }
  return text.trim().length > 0 ? text.trim() : fallback;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
