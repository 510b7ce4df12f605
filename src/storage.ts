/**
 * Storage layer for apiflow
 * Discovers scenario files and persists run results to disk
 */

import fs from "fs/promises";
import path from "path";
import { errorMessage } from "./errors.js";
import { parseJson, toJson } from "./json.js";
import type { Logger } from "./logger.js";
import { parseScenarioFile } from "./scenario-parser.js";
import type { SavedRun, ScenarioEntry, ScenarioResult } from "./types.js";

export const SCENARIO_EXTENSIONS = [".yaml", ".yml", ".json"];

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isSavedRun(value: unknown): value is SavedRun {
  if (typeof value !== "object" || value === null) return false;
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "scenarioId" in value &&
    typeof value.scenarioId === "string" &&
    "completedAt" in value &&
    typeof value.completedAt === "string" &&
    "status" in value &&
    (value.status === "passed" || value.status === "failed") &&
    "result" in value &&
    typeof value.result === "object"
  );
}

async function readRun(file: string): Promise<SavedRun> {
  const content = await fs.readFile(file, "utf-8");
  const run = parseJson(content);
  if (!isSavedRun(run)) {
    throw new Error(`not a saved run: ${path.basename(file)}`);
  }
  return run;
}

/** Newest first; the id's counter suffix breaks ties within one millisecond */
function newestFirst(a: SavedRun, b: SavedRun): number {
  const diff = new Date(b.completedAt).getTime() - new Date(a.completedAt).getTime();
  return diff !== 0 ? diff : b.id.localeCompare(a.id);
}

/**
 * Create the storage directory and its results/ subdirectory
 */
export async function initStorage(storageDir: string): Promise<void> {
  if (!storageDir) {
    throw new Error("Invalid storage directory: storageDir must be a non-empty string");
  }
  try {
    await fs.mkdir(path.join(storageDir, "results"), { recursive: true });
  } catch (error) {
    throw new Error(`Failed to initialize storage: ${errorMessage(error)}`);
  }
}

/**
 * List scenario files in a directory
 *
 * Files that fail to parse are still listed, with `error` set, so callers can report them.
 *
 * @returns Entries sorted by id
 */
export async function listScenarios(scenariosDir: string): Promise<ScenarioEntry[]> {
  let files: string[];
  try {
    files = await fs.readdir(scenariosDir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw new Error(`Failed to list scenarios: ${errorMessage(error)}`);
  }

  const entries: ScenarioEntry[] = [];
  for (const file of files.sort()) {
    const ext = path.extname(file).toLowerCase();
    if (!SCENARIO_EXTENSIONS.includes(ext)) continue;

    const base = path.basename(file, path.extname(file));
    let id: string;
    try {
      id = slugify(base);
    } catch {
      // No usable id (e.g. "___.yaml"), nothing can address it
      continue;
    }

    const fullPath = path.join(scenariosDir, file);
    try {
      const scenario = await parseScenarioFile(fullPath);
      entries.push({ id, file: fullPath, name: scenario.name, description: scenario.description });
    } catch (error) {
      entries.push({ id, file: fullPath, name: base, description: "", error: errorMessage(error) });
    }
  }

  entries.sort((a, b) => a.id.localeCompare(b.id));
  return entries;
}

/**
 * Find a scenario file by id
 *
 * @returns The entry, or null if no file has that id
 */
export async function findScenario(scenariosDir: string, id: string): Promise<ScenarioEntry | null> {
  validateId(id);
  const entries = await listScenarios(scenariosDir);
  return entries.find((entry) => entry.id === id) ?? null;
}

// Global counter for ensuring unique run IDs within same millisecond
let runIdCounter = 0;

/**
 * Save a scenario run result
 * Writes results/{scenarioId}/{runId}.json and applies the retention limit
 *
 * @param limit Runs kept per scenario (default: 50)
 */
export async function saveRun(
  storageDir: string,
  scenarioId: string,
  result: ScenarioResult,
  limit: number = 50,
  logger?: Logger
): Promise<SavedRun> {
  validateId(scenarioId);
  const now = new Date();
  const timestamp = now.toISOString().replace(/[:.]/g, "-");
  const runId = `${timestamp}-${String(++runIdCounter).padStart(6, "0")}`;

  const resultsDir = path.join(storageDir, "results", scenarioId);

  try {
    await fs.mkdir(resultsDir, { recursive: true });

    const run: SavedRun = {
      id: runId,
      scenarioId,
      status: result.passed ? "passed" : "failed",
      result,
      startedAt: new Date(now.getTime() - result.duration_ms).toISOString(),
      completedAt: now.toISOString(),
      duration_ms: result.duration_ms,
    };

    // Write atomically (write to temp file, then rename)
    const resultPath = path.join(resultsDir, `${runId}.json`);
    const tempPath = `${resultPath}.tmp`;
    await fs.writeFile(tempPath, toJson(run, 2), "utf-8");
    await fs.rename(tempPath, resultPath);

    await enforceRetention(resultsDir, limit, logger);

    return run;
  } catch (error) {
    throw new Error(`Failed to save run: ${errorMessage(error)}`);
  }
}

/**
 * List saved runs for a scenario
 *
 * @returns Runs sorted newest first
 */
export async function listRuns(
  storageDir: string,
  scenarioId: string,
  filter?: { status?: "passed" | "failed"; limit?: number },
  logger?: Logger
): Promise<SavedRun[]> {
  validateId(scenarioId);
  const resultsDir = path.join(storageDir, "results", scenarioId);

  let files: string[];
  try {
    files = await fs.readdir(resultsDir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw new Error(`Failed to list runs: ${errorMessage(error)}`);
  }

  const runs: SavedRun[] = [];
  for (const file of files) {
    if (!file.endsWith(".json")) continue;

    try {
      const run = await readRun(path.join(resultsDir, file));
      if (filter?.status && run.status !== filter.status) continue;
      runs.push(run);
    } catch (error) {
      logger?.warn({ file, err: errorMessage(error) }, "skipped corrupted result file");
    }
  }

  runs.sort(newestFirst);

  if (filter?.limit) {
    runs.length = Math.min(runs.length, filter.limit);
  }

  return runs;
}

/**
 * Get a specific run
 *
 * @returns The run, or null if not found
 */
export async function getRun(storageDir: string, scenarioId: string, runId: string): Promise<SavedRun | null> {
  validateId(scenarioId);
  validateId(runId);
  const runPath = path.join(storageDir, "results", scenarioId, `${runId}.json`);

  try {
    return await readRun(runPath);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new Error(`Failed to get run: ${errorMessage(error)}`);
  }
}

/**
 * Keeps only the most recent `maxResults` runs in a results directory
 */
async function enforceRetention(resultsDir: string, maxResults: number, logger?: Logger): Promise<void> {
  const files = (await fs.readdir(resultsDir)).filter((file) => file.endsWith(".json"));
  if (files.length <= maxResults) return;

  const runs: SavedRun[] = [];
  for (const file of files) {
    try {
      runs.push(await readRun(path.join(resultsDir, file)));
    } catch (error) {
      logger?.warn({ file, err: errorMessage(error) }, "retention skipped unreadable result file");
    }
  }

  runs.sort(newestFirst);
  for (const run of runs.slice(maxResults)) {
    await fs.unlink(path.join(resultsDir, `${run.id}.json`));
  }
}

/**
 * Validate that an ID is safe for use in file paths (no path traversal)
 */
export function validateId(id: string): void {
  if (id.length === 0) {
    throw new Error("Invalid ID: must not be empty");
  }
  if (id.includes("..") || id.includes("/") || id.includes("\\")) {
    throw new Error(`Invalid ID: contains path traversal characters: ${id}`);
  }
}

/**
 * Convert a name to a file-safe slug
 *
 * @throws {Error} If the slug is empty or longer than 100 characters
 */
export function slugify(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (!slug) {
    throw new Error("Invalid name: slug cannot be empty");
  }
  if (slug.length > 100) {
    throw new Error("Invalid name: slug cannot exceed 100 characters");
  }
  return slug;
}
