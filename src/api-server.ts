/**
 * HTTP API Server for apiflow
 * Provides REST endpoints for scenario discovery, validation, execution and results
 */

import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { ApiflowConfig } from "./config.js";
import { ApiflowError, MalformedScenarioError, MalformedStepError, errorMessage } from "./errors.js";
import { toJson } from "./json.js";
import { silentLogger, type Logger } from "./logger.js";
import { parseScenarioFile, parseScenarioText, validateScenario } from "./scenario-parser.js";
import { runScenario, type RunScenarioOptions } from "./scenario-runner.js";
import * as storage from "./storage.js";
import type { HttpTransport } from "./types.js";

/**
 * Server configuration options
 */
export interface ApiServerOptions {
  scenariosDir: string;
  storageDir: string;
  /** Runs kept per scenario (default 50) */
  resultRetention?: number;
  /** Defaults applied to every run; a request body may override them */
  run?: Omit<RunScenarioOptions, "context" | "onEvent" | "logger">;
  logger?: Logger;
}

/**
 * Active scenario run tracking — prevents concurrent runs
 */
type ActiveRun = {
  scenarioId: string;
  startedAt: string;
};

const RunBodySchema = z
  .object({
    baseUrl: z.string().url().optional(),
    authToken: z.string().optional(),
    timeoutSeconds: z.number().positive().optional(),
    verifyTls: z.boolean().optional(),
    variables: z.record(z.unknown()).optional(),
  })
  .strict();

const ValidateBodySchema = z.object({ source: z.string().min(1) });

class BadRequestError extends ApiflowError {
  constructor(message: string) {
    super("BAD_REQUEST", message);
  }
}

function readJsonBody(text: string): unknown {
  if (text.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new BadRequestError(`Invalid JSON body: ${errorMessage(error)}`);
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new BadRequestError(`Invalid request body: ${detail}`);
  }
  return parsed.data;
}

/**
 * JSON response for run results, which may carry bigint values that c.json cannot encode
 */
function resultJson(c: Context, payload: unknown): Response {
  c.header("Content-Type", "application/json; charset=UTF-8");
  return c.body(toJson(payload));
}

function statusFor(error: Error): 400 | 500 {
  if (error instanceof BadRequestError || error instanceof MalformedScenarioError || error instanceof MalformedStepError) {
    return 400;
  }
  if (error.message.startsWith("Invalid ID")) return 400;
  return 500;
}

/**
 * Create and configure the Hono API server
 */
export function createApiServer(options: ApiServerOptions): { app: Hono } {
  const app = new Hono();
  const logger = options.logger ?? silentLogger();
  const retention = options.resultRetention ?? 50;

  // Track active run
  let activeRun: ActiveRun | null = null;

  /**
   * Error handling middleware
   */
  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) {
      logger.error({ err }, "request failed");
    }
    return c.json({ error: err.message || "Internal server error" }, status);
  });

  /**
   * Health check endpoint
   */
  app.get("/api/health", (c) => {
    return c.json({ status: "ok", scenariosDir: options.scenariosDir, running: activeRun });
  });

  /**
   * GET /api/scenarios — List scenario files
   */
  app.get("/api/scenarios", async (c) => {
    const scenarios = await storage.listScenarios(options.scenariosDir);
    return c.json({ scenarios });
  });

  /**
   * POST /api/scenarios/validate — Validate scenario source without running it
   * Body: { source: string } (YAML or JSON text)
   */
  app.post("/api/scenarios/validate", async (c) => {
    const body = parseBody(ValidateBodySchema, readJsonBody(await c.req.text()));

    try {
      const scenario = parseScenarioText(body.source);
      const errors = validateScenario(scenario);
      return c.json({ valid: errors.length === 0, name: scenario.name, errors });
    } catch (error) {
      if (error instanceof MalformedScenarioError || error instanceof MalformedStepError) {
        return c.json({ valid: false, errors: [error.message] });
      }
      throw error;
    }
  });

  /**
   * GET /api/scenarios/:id — Get a parsed scenario
   */
  app.get("/api/scenarios/:id", async (c) => {
    const id = c.req.param("id");
    const entry = await storage.findScenario(options.scenariosDir, id);
    if (!entry) {
      return c.json({ error: `Scenario not found: ${id}` }, 404);
    }

    const scenario = await parseScenarioFile(entry.file);
    return c.json({ id, file: entry.file, scenario, errors: validateScenario(scenario) });
  });

  /**
   * POST /api/scenarios/:id/run — Execute a scenario and save its result
   * Body (optional): { baseUrl?, authToken?, timeoutSeconds?, verifyTls?, variables? }
   */
  app.post("/api/scenarios/:id/run", async (c) => {
    const id = c.req.param("id");
    const overrides = parseBody(RunBodySchema, readJsonBody(await c.req.text()));

    // Check activeRun mutex and claim it before the first await
    if (activeRun) {
      return c.json({ error: "Scenario already running", activeRun }, 409);
    }
    activeRun = { scenarioId: id, startedAt: new Date().toISOString() };

    try {
      const entry = await storage.findScenario(options.scenariosDir, id);
      if (!entry) {
        return c.json({ error: `Scenario not found: ${id}` }, 404);
      }

      const scenario = await parseScenarioFile(entry.file);
      const result = await runScenario(scenario, {
        ...options.run,
        ...overrides,
        variables: { ...options.run?.variables, ...overrides.variables },
        logger: logger.child({ scenario: id }),
      });

      const run = await storage.saveRun(options.storageDir, id, result, retention, logger);
      return resultJson(c, { runId: run.id, run });
    } finally {
      // Always clear activeRun, even if execution fails
      activeRun = null;
    }
  });

  /**
   * GET /api/scenarios/:id/results — List saved runs
   * Query params: ?status=passed|failed&limit=10
   */
  app.get("/api/scenarios/:id/results", async (c) => {
    const id = c.req.param("id");
    const statusParam = c.req.query("status");
    const status = statusParam === "passed" || statusParam === "failed" ? statusParam : undefined;
    const limitParam = Number.parseInt(c.req.query("limit") ?? "", 10);
    const limit = Number.isFinite(limitParam) && limitParam > 0 ? limitParam : undefined;

    const runs = await storage.listRuns(options.storageDir, id, { status, limit }, logger);
    return resultJson(c, { runs });
  });

  /**
   * GET /api/scenarios/:id/results/:runId — Get a specific run
   */
  app.get("/api/scenarios/:id/results/:runId", async (c) => {
    const id = c.req.param("id");
    const runId = c.req.param("runId");

    const run = await storage.getRun(options.storageDir, id, runId);
    if (!run) {
      return c.json({ error: `Result not found: ${runId}` }, 404);
    }
    return resultJson(c, { run });
  });

  app.notFound((c) => c.json({ error: `Not found: ${c.req.path}` }, 404));

  return { app };
}

/**
 * Start the HTTP server
 */
export async function startServer(
  config: ApiflowConfig,
  logger: Logger,
  transport?: HttpTransport
): Promise<ReturnType<typeof serve>> {
  await storage.initStorage(config.storageDir);

  const { app } = createApiServer({
    scenariosDir: config.scenariosDir,
    storageDir: config.storageDir,
    resultRetention: config.resultRetention,
    run: {
      baseUrl: config.baseUrl,
      authToken: config.authToken,
      timeoutSeconds: config.timeoutSeconds,
      verifyTls: config.verifyTls,
      transport,
    },
    logger,
  });

  const server = serve({ fetch: app.fetch, port: config.port });
  logger.info(`apiflow API listening on http://localhost:${config.port}`);
  logger.info(`Serving scenarios from ${config.scenariosDir}`);
  return server;
}
