/**
 * Shared test fixtures: an in-process demo API and a scripted transport
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import { Hono } from "hono";
import type { FetchLike } from "../http-client.js";
import type { HttpRequest, HttpResponse, HttpTransport, ScenarioResult } from "../types.js";

/**
 * Small user API used as the system under test
 */
export function createDemoApi(): Hono {
  const app = new Hono();
  const users = new Map<number, { id: number; name: string; roles: string[] }>();
  let nextId = 7;

  app.post("/users", async (c) => {
    const body: unknown = await c.req.json();
    const name = typeof body === "object" && body !== null && "name" in body && typeof body.name === "string" ? body.name : "";
    const user = { id: nextId++, name, roles: ["admin", "user"] };
    users.set(user.id, user);
    c.header("Set-Cookie", "session=abc123; Path=/; HttpOnly");
    c.header("X-Request-Id", "req-1");
    return c.json({ data: user }, 201);
  });

  app.get("/users/:id", (c) => {
    const user = users.get(Number(c.req.param("id")));
    if (!user) return c.json({ error: "not found" }, 404);
    return c.json({ data: { ...user, items: [{ id: 1 }, { id: 2 }] } });
  });

  app.delete("/users/:id", (c) => {
    users.delete(Number(c.req.param("id")));
    return c.body(null, 204);
  });

  app.get("/echo", (c) => {
    return c.json({
      query: c.req.queries(),
      authorization: c.req.header("authorization") ?? null,
    });
  });

  return app;
}

/**
 * fetch implementation that dispatches to an in-process hono app
 */
export function fetchVia(app: Hono): FetchLike {
  return async (url, init) => app.request(url, init);
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(body),
  };
}

/**
 * Transport that records every request and answers from a handler
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(
    private readonly handler: (request: HttpRequest) => HttpResponse | Promise<HttpResponse> = () => jsonResponse(200, {})
  ) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.handler(request);
  }
}

/**
 * Minimal one-step scenario result
 */
export function scenarioResult(passed: boolean, overrides: Partial<ScenarioResult> = {}): ScenarioResult {
  return {
    name: "Demo",
    description: "",
    passed,
    total_steps: 1,
    passed_steps: passed ? 1 : 0,
    failed_steps: passed ? 0 : 1,
    skipped_steps: 0,
    duration_ms: 25,
    setup_results: [],
    step_results: [],
    teardown_results: [],
    errors: [],
    context_snapshot: { global: {}, scenario: {}, step: {} },
    ...overrides,
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `apiflow-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
