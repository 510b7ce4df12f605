#!/usr/bin/env node

/**
 * CLI entry point for apiflow
 * Enables: apiflow run|validate|serve|mcp [options]
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { startServer } from "./api-server.js";
import { loadConfig, type ApiflowConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { formatScenarioResult } from "./report.js";
import { parseScenarioFile, validateScenario } from "./scenario-parser.js";
import { startMcpServer } from "./server.js";
import { collectScenarioFiles, runSuite } from "./suite-runner.js";

export interface CliArgs {
  command: string | null;
  targets: string[];
  configPath?: string;
  baseUrl?: string;
  timeoutSeconds?: number;
  authToken?: string;
  verifyTls?: boolean;
  port?: number;
  save: boolean;
  stopOnFailure: boolean;
  verbose: boolean;
  showHelp: boolean;
}

/**
 * Parse command-line arguments
 *
 * @throws {Error} When an option is missing its value or a number is invalid
 */
export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    command: null,
    targets: [],
    save: false,
    stopOnFailure: false,
    verbose: false,
    showHelp: false,
  };

  const value = (i: number, flag: string): string => {
    const val = args[i];
    if (val === undefined || val.startsWith("--")) {
      throw new Error(`Option ${flag} requires a value`);
    }
    return val;
  };

  const number = (raw: string, flag: string): number => {
    const n = Number(raw);
    if (!Number.isFinite(n) || n <= 0) {
      throw new Error(`Option ${flag} expects a positive number, got '${raw}'`);
    }
    return n;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      parsed.showHelp = true;
    } else if (arg === "--config") {
      parsed.configPath = value(++i, arg);
    } else if (arg === "--base-url") {
      parsed.baseUrl = value(++i, arg);
    } else if (arg === "--timeout") {
      parsed.timeoutSeconds = number(value(++i, arg), arg);
    } else if (arg === "--token") {
      parsed.authToken = value(++i, arg);
    } else if (arg === "--no-verify-tls") {
      parsed.verifyTls = false;
    } else if (arg === "--port") {
      parsed.port = number(value(++i, arg), arg);
    } else if (arg === "--save") {
      parsed.save = true;
    } else if (arg === "--stop-on-failure") {
      parsed.stopOnFailure = true;
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true;
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown option '${arg}'`);
    } else if (!parsed.command) {
      // First non-flag argument is the command
      parsed.command = arg;
    } else {
      parsed.targets.push(arg);
    }
  }

  return parsed;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
apiflow - multi-step API scenario runner

USAGE:
  apiflow <command> [OPTIONS]

COMMANDS:
  run <file|dir>...      Run scenario files (directories expand to *.yaml, *.yml, *.json)
  validate <file>...     Parse and validate scenario files without running them
  serve                  Start the HTTP API
  mcp                    Start the MCP tool server on stdio

OPTIONS:
  --config <path>        Config file (default: ./apiflow.config.json)
  --base-url <url>       Base URL when a scenario config has no base_url
  --timeout <seconds>    Per-request timeout (default: 30)
  --token <token>        Bearer token for requests without an Authorization header
  --no-verify-tls        Skip TLS certificate verification
  --save                 Save run results to the storage directory
  --stop-on-failure      Skip remaining scenarios after the first failure
  --port <number>        HTTP port for serve (default: 3000)
  --verbose, -v          Log every step as it runs
  --help, -h             Show this help message

EXAMPLES:
  apiflow run scenarios/checkout.yaml --base-url http://localhost:8080
  apiflow run scenarios --save --stop-on-failure
  apiflow validate scenarios/*.yaml
  apiflow serve --port 8000
`);
}

function withOverrides(config: ApiflowConfig, args: CliArgs): ApiflowConfig {
  return {
    ...config,
    ...(args.baseUrl !== undefined ? { baseUrl: args.baseUrl } : {}),
    ...(args.timeoutSeconds !== undefined ? { timeoutSeconds: args.timeoutSeconds } : {}),
    ...(args.authToken !== undefined ? { authToken: args.authToken } : {}),
    ...(args.verifyTls !== undefined ? { verifyTls: args.verifyTls } : {}),
    ...(args.port !== undefined ? { port: args.port } : {}),
  };
}

async function runCommand(config: ApiflowConfig, args: CliArgs): Promise<number> {
  if (args.targets.length === 0) {
    console.error("Error: run needs at least one scenario file or directory");
    return 1;
  }

  const logger = createLogger({ logLevel: args.verbose ? config.logLevel : "warn" }, { stderr: true });
  const files = await collectScenarioFiles(args.targets);

  const suite = await runSuite({
    files,
    stopOnFailure: args.stopOnFailure,
    ...(args.save ? { storageDir: config.storageDir, resultRetention: config.resultRetention } : {}),
    run: {
      baseUrl: config.baseUrl,
      authToken: config.authToken,
      timeoutSeconds: config.timeoutSeconds,
      verifyTls: config.verifyTls,
      logger,
    },
  });

  for (const entry of suite.scenarios) {
    if (entry.result) {
      console.log(formatScenarioResult(entry.result).join("\n"));
    } else if (entry.status === "skipped") {
      console.log(`Scenario: ${entry.name}\n  SKIPPED (stopped after an earlier failure)`);
    } else {
      console.log(`Scenario: ${entry.name}\n  ERROR ${entry.error ?? "unknown error"}`);
    }
    if (entry.runId) console.log(`Saved run ${entry.runId}`);
    console.log("");
  }

  console.log(`${suite.passed} passed, ${suite.failed} failed, ${suite.skipped} skipped (${suite.total} scenarios) in ${suite.duration_ms}ms`);
  return suite.failed > 0 ? 1 : 0;
}

async function validateCommand(args: CliArgs): Promise<number> {
  if (args.targets.length === 0) {
    console.error("Error: validate needs at least one scenario file or directory");
    return 1;
  }

  let invalid = 0;
  for (const file of await collectScenarioFiles(args.targets)) {
    try {
      const scenario = await parseScenarioFile(file);
      const errors = validateScenario(scenario);
      if (errors.length === 0) {
        console.log(`OK   ${file} (${scenario.name})`);
      } else {
        invalid++;
        console.log(`FAIL ${file}`);
        for (const error of errors) console.log(`  - ${error}`);
      }
    } catch (error) {
      invalid++;
      console.log(`FAIL ${file}`);
      console.log(`  - ${errorMessage(error)}`);
    }
  }
  return invalid > 0 ? 1 : 0;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.showHelp || !args.command) {
    printHelp();
    process.exit(0);
  }

  const config = withOverrides(loadConfig(args.configPath), args);

  switch (args.command) {
    case "run":
      process.exit(await runCommand(config, args));
      break;
    case "validate":
      process.exit(await validateCommand(args));
      break;
    case "serve":
      await startServer(config, createLogger(config));
      break;
    case "mcp":
      // stdout carries the MCP protocol, logs go to stderr
      await startMcpServer(config, createLogger(config, { stderr: true }));
      break;
    default:
      console.error(`Error: Unknown command '${args.command}'`);
      console.error(`Run 'apiflow --help' for usage information`);
      process.exit(1);
  }
}

/**
 * True when this module is the process entry point (directly or through the bin symlink)
 */
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err) => {
    console.error("Fatal error:", errorMessage(err));
    process.exit(1);
  });
}
