import { z } from "zod";
import type { Credential } from "@/sync/types/api";
import { AuthError, HttpStatusError, MalformedResponseError, NetworkError, describeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { canonicalQuery, formatTimestamp, generateNonce, signHeaders, type QueryParams } from "./signing";

const log = createChildLogger("onshape-client");

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

/** The slice of a fetch `Response` the client reads. */
export interface TransportResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

export const fetchTransport: HttpTransport = (request) =>
  fetch(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
  });

export interface ApiResponse {
  status: number;
  payload: unknown;
  retryAfterMs: number | null;
}

export interface OnshapeClientOptions {
  transport?: HttpTransport;
  clock?: () => Date;
  nonce?: () => string;
}

const currentUserSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
});

export type OnshapeUser = z.infer<typeof currentUserSchema>;

export class OnshapeClient {
  private readonly credential: Credential;
  private readonly transport: HttpTransport;
  private readonly clock: () => Date;
  private readonly nonce: () => string;
  private readonly basePath: string;

  constructor(credential: Credential, options: OnshapeClientOptions = {}) {
    this.credential = credential;
    this.transport = options.transport ?? fetchTransport;
    this.clock = options.clock ?? (() => new Date());
    this.nonce = options.nonce ?? generateNonce;
    const base = new URL(credential.baseUrl);
    this.basePath = `${base.pathname.replace(/\/+$/, "")}/${credential.apiVersion}`;
  }

  /**
   * Sign and send one request. The signature is computed here, at send time,
   * so a request that waited in the governor's queue is never stale.
   */
  async send(method: HttpMethod, endpoint: string, query: QueryParams = {}, body?: unknown): Promise<ApiResponse> {
    const path = `${this.basePath}/${endpoint.replace(/^\/+/, "")}`;
    const queryString = canonicalQuery(query);
    const bodyText = body === undefined ? null : JSON.stringify(body);
    const contentType = bodyText === null ? "" : "application/json";

    const url = new URL(this.credential.baseUrl);
    url.pathname = path;
    url.search = queryString;

    const headers: Record<string, string> = {
      ...signHeaders(this.credential.accessKey, this.credential.secretKey, {
        method,
        path,
        query,
        contentType,
        timestamp: formatTimestamp(this.clock()),
        nonce: this.nonce(),
      }),
      Accept: "application/json",
    };
    if (contentType) headers["Content-Type"] = contentType;

    log.debug("Onshape API request", { method, path, query: queryString });

    let response: TransportResponse;
    let text: string;
    try {
      response = await this.transport({
        url: url.toString(),
        method,
        headers,
        body: bodyText ?? undefined,
      });
      text = await response.text();
    } catch (error) {
      throw new NetworkError(`Onshape request failed: ${describeError(error)}`, { cause: error });
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(response.status);
    }

    const retryAfterMs = parseRetryAfter(response.headers.get("Retry-After"), this.clock());
    const ok = response.status >= 200 && response.status < 300;

    if (text.trim() === "") {
      return { status: response.status, payload: null, retryAfterMs };
    }

    try {
      return { status: response.status, payload: JSON.parse(text), retryAfterMs };
    } catch (error) {
      if (ok) {
        throw new MalformedResponseError(`Onshape returned a non-JSON body for ${path}`, { cause: error });
      }
      return { status: response.status, payload: text, retryAfterMs };
    }
  }

  async getCurrentUser(): Promise<OnshapeUser> {
    const payload = expectSuccess(await this.send("GET", "users/current"));
    const parsed = currentUserSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponseError("Unexpected users/current payload");
    }
    return parsed.data;
  }

  async testConnection(): Promise<{ connected: true; user: OnshapeUser } | { connected: false; error: string }> {
    try {
      const user = await this.getCurrentUser();
      return { connected: true, user };
    } catch (error) {
      log.warn("Onshape connection test failed", { error: describeError(error) });
      return { connected: false, error: describeError(error) };
    }
  }
}

/** Returns the payload of a 2xx response; anything else becomes an `HttpStatusError`. */
export function expectSuccess(response: ApiResponse): unknown {
  if (response.status >= 200 && response.status < 300) {
    return response.payload;
  }
  throw new HttpStatusError(response.status, response.retryAfterMs);
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now: Date): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now.getTime());
}
