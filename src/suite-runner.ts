/**
 * Suite runner for executing several scenario files in sequence
 * Each scenario gets a fresh context; results can be saved to storage
 */

import fs from "fs/promises";
import path from "path";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { parseScenarioFile } from "./scenario-parser.js";
import { runScenario, type RunScenarioOptions } from "./scenario-runner.js";
import * as storage from "./storage.js";
import type { OnEvent, ScenarioResult, SuiteResult, SuiteScenarioResult } from "./types.js";

/**
 * Options for running a suite of scenarios
 */
export interface SuiteOptions {
  /** Scenario files to run, in order */
  files: string[];
  /** Passed to every scenario run */
  run?: Omit<RunScenarioOptions, "context" | "onEvent">;
  /** Skip the remaining scenarios after the first failure (default false) */
  stopOnFailure?: boolean;
  /** When set, each run is saved under this storage directory */
  storageDir?: string;
  /** Runs kept per scenario when saving (default 50) */
  resultRetention?: number;
}

/**
 * Event types emitted during suite execution
 */
export type SuiteEvent =
  | { type: "suite:start"; total: number }
  | { type: "suite:scenario_start"; file: string; index: number }
  | {
      type: "suite:scenario_complete";
      file: string;
      name: string;
      index: number;
      status: "passed" | "failed" | "skipped";
      duration_ms: number;
      error?: string;
    }
  | { type: "suite:complete"; result: SuiteResult };

export type OnSuiteEvent = (event: SuiteEvent) => void;

/**
 * Safely emit a suite event, ignoring listener errors
 */
function emitSuiteEvent(onSuiteEvent: OnSuiteEvent | undefined, event: SuiteEvent): void {
  if (onSuiteEvent) {
    try {
      onSuiteEvent(event);
    } catch { /* ignore listener errors */ }
  }
}

/**
 * Expand files and directories into a list of scenario files.
 * Directory entries are sorted by name; explicit files keep their order.
 */
export async function collectScenarioFiles(targets: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const target of targets) {
    const stats = await fs.stat(target);
    if (!stats.isDirectory()) {
      files.push(target);
      continue;
    }
    const entries = (await fs.readdir(target)).sort();
    for (const entry of entries) {
      if (storage.SCENARIO_EXTENSIONS.includes(path.extname(entry).toLowerCase())) {
        files.push(path.join(target, entry));
      }
    }
  }
  return files;
}

function scenarioIdFor(file: string): string {
  return storage.slugify(path.basename(file, path.extname(file)));
}

async function saveResult(
  options: SuiteOptions,
  file: string,
  result: ScenarioResult,
  logger?: Logger
): Promise<string | undefined> {
  if (!options.storageDir) return undefined;
  const saved = await storage.saveRun(options.storageDir, scenarioIdFor(file), result, options.resultRetention ?? 50, logger);
  return saved.id;
}

/**
 * Run a suite of scenario files sequentially
 *
 * A file that cannot be parsed counts as failed; it never stops the suite
 * unless `stopOnFailure` is set.
 *
 * @param onSuiteEvent - Optional callback for suite-level events
 * @param onScenarioEvent - Optional callback for step events of each scenario
 */
export async function runSuite(
  options: SuiteOptions,
  onSuiteEvent?: OnSuiteEvent,
  onScenarioEvent?: OnEvent
): Promise<SuiteResult> {
  const startTime = Date.now();
  const { files, stopOnFailure } = options;
  const logger = options.run?.logger;
  const results: SuiteScenarioResult[] = [];
  let passed = 0;
  let failed = 0;
  let skipped = 0;
  let stopped = false;

  emitSuiteEvent(onSuiteEvent, { type: "suite:start", total: files.length });

  for (let index = 0; index < files.length; index++) {
    const file = files[index];

    if (stopped) {
      const name = path.basename(file);
      results.push({ file, name, status: "skipped", duration_ms: 0 });
      skipped++;
      emitSuiteEvent(onSuiteEvent, { type: "suite:scenario_complete", file, name, index, status: "skipped", duration_ms: 0 });
      continue;
    }

    emitSuiteEvent(onSuiteEvent, { type: "suite:scenario_start", file, index });
    const scenarioStart = Date.now();

    let entry: SuiteScenarioResult;
    try {
      const scenario = await parseScenarioFile(file);
      const result = await runScenario(scenario, { ...options.run, onEvent: onScenarioEvent });
      const runId = await saveResult(options, file, result, logger);

      entry = {
        file,
        name: scenario.name,
        status: result.passed ? "passed" : "failed",
        duration_ms: result.duration_ms,
        result,
        ...(runId ? { runId } : {}),
      };
    } catch (error) {
      entry = {
        file,
        name: path.basename(file),
        status: "failed",
        duration_ms: Date.now() - scenarioStart,
        error: errorMessage(error),
      };
      logger?.error({ file, err: entry.error }, "scenario could not be run");
    }

    results.push(entry);
    if (entry.status === "passed") {
      passed++;
    } else {
      failed++;
      if (stopOnFailure) stopped = true;
    }

    emitSuiteEvent(onSuiteEvent, {
      type: "suite:scenario_complete",
      file,
      name: entry.name,
      index,
      status: entry.status,
      duration_ms: entry.duration_ms,
      ...(entry.error ? { error: entry.error } : {}),
    });
  }

  const suiteResult: SuiteResult = {
    total: files.length,
    passed,
    failed,
    skipped,
    duration_ms: Date.now() - startTime,
    scenarios: results,
  };

  emitSuiteEvent(onSuiteEvent, { type: "suite:complete", result: suiteResult });

  return suiteResult;
}
