/**
 * fetch-based HTTP transport
 * Builds the URL and body from a resolved request and enforces the per-request timeout
 */

import { Agent, fetch as undiciFetch } from "undici";
import { TransportError } from "./errors.js";
import { toJson } from "./json.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "./types.js";

/**
 * Subset of fetch the transport needs. Tests inject one that dispatches
 * to an in-process app instead of the network.
 */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  status: number;
  headers: { forEach(callback: (value: string, key: string) => void): void };
  text(): Promise<string>;
}

export interface FetchTransportOptions {
  fetch?: FetchLike;
}

/**
 * Appends query parameters to a URL. Arrays repeat the key; null and undefined are dropped.
 */
export function buildUrl(url: string, query: Record<string, unknown>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item === null || item === undefined) continue;
      params.append(key, typeof item === "object" ? toJson(item) : String(item));
    }
  }

  const search = params.toString();
  if (!search) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${search}`;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

/**
 * Encodes a body: objects and arrays as JSON, everything else as text.
 */
export function encodeBody(
  body: unknown,
  headers: Record<string, string>
): { body?: string; headers: Record<string, string> } {
  if (body === undefined || body === null) {
    return { headers };
  }
  if (typeof body === "object") {
    const withType = hasHeader(headers, "content-type")
      ? headers
      : { ...headers, "Content-Type": "application/json" };
    return { body: toJson(body), headers: withType };
  }
  return { body: String(body), headers };
}

function causeCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

function classify(error: unknown, request: HttpRequest): TransportError {
  const target = `${request.method} ${request.url}`;
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return new TransportError("timeout", `${target} timed out after ${request.timeoutMs}ms`, { cause: error });
  }

  const code = causeCode(error);
  const reason = error instanceof Error ? error.message : String(error);
  if (code && (code.startsWith("ERR_TLS") || code.includes("CERT") || code === "DEPTH_ZERO_SELF_SIGNED_CERT")) {
    return new TransportError("tls", `${target} failed TLS verification (${code})`, { cause: error });
  }
  if (code && ["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH", "UND_ERR_SOCKET"].includes(code)) {
    return new TransportError("connection", `${target} connection failed (${code})`, { cause: error });
  }
  return new TransportError("other", `${target} failed: ${reason}`, { cause: error });
}

export class FetchTransport implements HttpTransport {
  private readonly fetchImpl: FetchLike;
  private insecureAgent: Agent | null = null;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const url = buildUrl(request.url, request.query);
    const encoded = encodeBody(request.body, request.headers);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);

    const init: FetchInit = {
      method: request.method,
      headers: encoded.headers,
      ...(encoded.body !== undefined ? { body: encoded.body } : {}),
      signal: controller.signal,
    };

    try {
      const response: FetchResponseLike = request.verifyTls
        ? await this.fetchImpl(url, init)
        : await undiciFetch(url, { ...init, dispatcher: this.getInsecureAgent() });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return { status: response.status, headers, body: await response.text() };
    } catch (error) {
      throw classify(error, request);
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    if (this.insecureAgent) {
      await this.insecureAgent.close();
      this.insecureAgent = null;
    }
  }

  private getInsecureAgent(): Agent {
    if (!this.insecureAgent) {
      this.insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return this.insecureAgent;
  }
}
