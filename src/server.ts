/**
 * MCP server for apiflow
 * Exposes scenario execution, validation and result lookup as tools over stdio
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ApiflowConfig } from "./config.js";
import { MalformedScenarioError, MalformedStepError, errorMessage } from "./errors.js";
import { toJson } from "./json.js";
import { silentLogger, type Logger } from "./logger.js";
import { summarizeResult } from "./report.js";
import { parseScenarioFile, parseScenarioText, validateScenario } from "./scenario-parser.js";
import { runScenario, type RunScenarioOptions } from "./scenario-runner.js";
import * as storage from "./storage.js";
import type { ScenarioConfig } from "./types.js";

/**
 * Everything a tool handler needs
 */
export interface ToolContext {
  scenariosDir: string;
  storageDir: string;
  resultRetention: number;
  run: Omit<RunScenarioOptions, "context" | "onEvent" | "logger">;
  logger: Logger;
}

/**
 * Tool definition interface for tool registry pattern
 */
export interface ToolDef {
  name: string;
  description: string;
  inputSchema: { type: "object"; properties: Record<string, object>; required?: string[] };
  handler: (args: unknown, ctx: ToolContext) => Promise<unknown>;
}

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * A scenario given inline, as a file path, or by its id in the scenarios directory
 */
const ScenarioSourceSchema = z.object({
  source: z.string().min(1).optional(),
  file: z.string().min(1).optional(),
  id: z.string().min(1).optional(),
});

const RunScenarioInputSchema = ScenarioSourceSchema.extend({
  baseUrl: z.string().url().optional(),
  authToken: z.string().optional(),
  timeoutSeconds: z.number().positive().optional(),
  verifyTls: z.boolean().optional(),
  variables: z.record(z.unknown()).optional(),
  save: z.boolean().optional(),
});

const ListResultsInputSchema = z.object({
  scenarioId: z.string().min(1, "scenarioId is required"),
  status: z.enum(["passed", "failed"]).optional(),
  limit: z.number().int().positive().optional(),
});

function validationError(error: z.ZodError): Error {
  return new Error(`Validation error: ${error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ")}`);
}

/**
 * Loads the scenario named by exactly one of `source`, `file` or `id`.
 * Returns the scenario id used for saving, when there is one.
 */
async function loadScenario(
  input: z.infer<typeof ScenarioSourceSchema>,
  ctx: ToolContext
): Promise<{ scenario: ScenarioConfig; scenarioId?: string }> {
  const given = [input.source, input.file, input.id].filter((value) => value !== undefined);
  if (given.length !== 1) {
    throw new Error("Provide exactly one of 'source', 'file' or 'id'");
  }

  if (input.source !== undefined) {
    return { scenario: parseScenarioText(input.source) };
  }
  if (input.file !== undefined) {
    return { scenario: await parseScenarioFile(input.file) };
  }

  const id = input.id ?? "";
  const entry = await storage.findScenario(ctx.scenariosDir, id);
  if (!entry) {
    throw new Error(`Scenario not found: ${id}`);
  }
  return { scenario: await parseScenarioFile(entry.file), scenarioId: id };
}

const runScenarioTool: ToolDef = {
  name: "run_scenario",
  description: `Run an API scenario (setup, steps, teardown) and return a summary of every step.

Provide exactly one of:
- \`source\`: scenario YAML or JSON text
- \`file\`: path to a scenario file
- \`id\`: scenario id from \`list_scenarios\`

Optional: \`baseUrl\`, \`authToken\`, \`timeoutSeconds\`, \`verifyTls\`, \`variables\` (seeded into global scope),
\`save\` (store the run; requires \`id\`).`,
  inputSchema: {
    type: "object",
    properties: {
      source: { type: "string", description: "Scenario document text" },
      file: { type: "string", description: "Path to a scenario file" },
      id: { type: "string", description: "Scenario id in the scenarios directory" },
      baseUrl: { type: "string", description: "Base URL used when the scenario config has no base_url" },
      authToken: { type: "string", description: "Bearer token for steps without an Authorization header" },
      timeoutSeconds: { type: "number", description: "Per-request timeout in seconds" },
      verifyTls: { type: "boolean", description: "Verify TLS certificates (default true)" },
      variables: { type: "object", description: "Extra global variables" },
      save: { type: "boolean", description: "Save the run result (only with id)" },
    },
  },
  handler: async (args, ctx) => {
    const parsed = RunScenarioInputSchema.safeParse(args);
    if (!parsed.success) throw validationError(parsed.error);
    const { source, file, id, save, ...overrides } = parsed.data;

    const { scenario, scenarioId } = await loadScenario({ source, file, id }, ctx);
    if (save && !scenarioId) {
      throw new Error("'save' requires a scenario 'id'");
    }

    const result = await runScenario(scenario, {
      ...ctx.run,
      ...overrides,
      variables: { ...ctx.run.variables, ...overrides.variables },
      logger: ctx.logger,
    });

    const summary = summarizeResult(result);
    if (save && scenarioId) {
      const run = await storage.saveRun(ctx.storageDir, scenarioId, result, ctx.resultRetention, ctx.logger);
      return { runId: run.id, ...summary };
    }
    return summary;
  },
};

const validateScenarioTool: ToolDef = {
  name: "validate_scenario",
  description: `Parse and validate a scenario without running it.

Provide exactly one of \`source\`, \`file\` or \`id\`. Returns \`{ valid, errors }\`; parse failures are reported as errors.`,
  inputSchema: {
    type: "object",
    properties: {
      source: { type: "string", description: "Scenario document text" },
      file: { type: "string", description: "Path to a scenario file" },
      id: { type: "string", description: "Scenario id in the scenarios directory" },
    },
  },
  handler: async (args, ctx) => {
    const parsed = ScenarioSourceSchema.safeParse(args);
    if (!parsed.success) throw validationError(parsed.error);

    try {
      const { scenario } = await loadScenario(parsed.data, ctx);
      const errors = validateScenario(scenario);
      return { valid: errors.length === 0, name: scenario.name, errors };
    } catch (error) {
      if (error instanceof MalformedScenarioError || error instanceof MalformedStepError) {
        return { valid: false, errors: [error.message] };
      }
      throw error;
    }
  },
};

const listScenariosTool: ToolDef = {
  name: "list_scenarios",
  description: "List scenario files in the scenarios directory with their ids, names and parse errors.",
  inputSchema: { type: "object", properties: {} },
  handler: async (_args, ctx) => {
    return { scenarios: await storage.listScenarios(ctx.scenariosDir) };
  },
};

const listResultsTool: ToolDef = {
  name: "list_results",
  description: `List saved runs for a scenario, newest first.

Input: \`scenarioId\` (required), \`status\` ("passed" | "failed", optional), \`limit\` (optional).`,
  inputSchema: {
    type: "object",
    properties: {
      scenarioId: { type: "string", description: "Scenario id" },
      status: { type: "string", enum: ["passed", "failed"] },
      limit: { type: "number", description: "Maximum number of runs" },
    },
    required: ["scenarioId"],
  },
  handler: async (args, ctx) => {
    const parsed = ListResultsInputSchema.safeParse(args);
    if (!parsed.success) throw validationError(parsed.error);
    const { scenarioId, status, limit } = parsed.data;

    const runs = await storage.listRuns(ctx.storageDir, scenarioId, { status, limit }, ctx.logger);
    return {
      results: runs.map((run) => ({
        runId: run.id,
        status: run.status,
        completedAt: run.completedAt,
        duration_ms: run.duration_ms,
        failed_steps: run.result.failed_steps,
      })),
    };
  },
};

export const TOOLS: ToolDef[] = [runScenarioTool, validateScenarioTool, listScenariosTool, listResultsTool];

/**
 * Dispatch a tool call. Handler errors become `isError` responses.
 */
export async function callTool(name: string, args: unknown, ctx: ToolContext): Promise<ToolResponse> {
  const tool = TOOLS.find((t) => t.name === name);
  if (!tool) {
    return { content: [{ type: "text", text: `Unknown tool: ${name}` }], isError: true };
  }

  try {
    const result = await tool.handler(args ?? {}, ctx);
    return { content: [{ type: "text", text: toJson(result, 2) }] };
  } catch (error) {
    ctx.logger.warn({ tool: name, err: errorMessage(error) }, "tool call failed");
    return { content: [{ type: "text", text: `Error: ${errorMessage(error)}` }], isError: true };
  }
}

export function toolContextFromConfig(config: ApiflowConfig, logger: Logger = silentLogger()): ToolContext {
  return {
    scenariosDir: config.scenariosDir,
    storageDir: config.storageDir,
    resultRetention: config.resultRetention,
    run: {
      baseUrl: config.baseUrl,
      authToken: config.authToken,
      timeoutSeconds: config.timeoutSeconds,
      verifyTls: config.verifyTls,
    },
    logger,
  };
}

/**
 * Create and configure the MCP server
 */
export function createMcpServer(ctx: ToolContext): Server {
  const server = new Server(
    {
      name: "apiflow",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return callTool(request.params.name, request.params.arguments, ctx);
  });

  return server;
}

/**
 * Start the MCP server with stdio transport
 */
export async function startMcpServer(config: ApiflowConfig, logger: Logger): Promise<void> {
  const server = createMcpServer(toolContextFromConfig(config, logger));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("apiflow MCP server started");
}
