/**
 * Scenario definition parsing and structural validation
 * Turns a YAML/JSON scenario document into an immutable ScenarioConfig
 */

import fs from "fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { MalformedScenarioError, MalformedStepError, ScenarioFileError, errorMessage } from "./errors.js";
import type { ConditionConfig, ExtractRule, Phase, ScenarioConfig, StepConfig } from "./types.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH", "HEAD", "OPTIONS"];

const PHASES: Phase[] = ["setup", "steps", "teardown"];

/** Accepts a missing or `null` YAML value as an empty record */
const record = z.record(z.unknown()).nullish().transform((value) => value ?? {});

const ExtractRuleSchema = z.object({
  name: z.string().optional(),
  path: z.string().optional(),
  header: z.string().optional(),
  cookie: z.string().optional(),
  regex: z.string().optional(),
  group: z.number().int().nonnegative().optional(),
});

const StepFieldsSchema = z.object({
  request: z
    .object({
      headers: record,
      query: record,
      body: z.unknown().optional(),
    })
    .nullish()
    .transform((value) => value ?? { headers: {}, query: {} }),
  extract: z.array(ExtractRuleSchema).nullish().transform((value) => value ?? []),
  assert: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((value) => (value == null ? [] : typeof value === "string" ? [value] : value)),
  vars: record,
  when: z.string().optional(),
  condition: z
    .object({
      if: z.string().optional(),
      then: z.array(z.unknown()).nullish(),
      else: z.array(z.unknown()).nullish(),
    })
    .optional(),
  loop: z.record(z.unknown()).optional(),
  parallel: z.record(z.unknown()).optional(),
});

const ScenarioSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  version: z.union([z.string(), z.number()]).nullish(),
  config: record,
  setup: z.array(z.unknown()).nullish(),
  steps: z.array(z.unknown()).nullish(),
  teardown: z.array(z.unknown()).nullish(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parses one step. Failures are plain Errors; the caller attaches the position.
 */
function parseStep(raw: unknown): StepConfig {
  if (!isRecord(raw)) {
    throw new Error("step must be a mapping");
  }

  const name = raw.name;
  if (typeof name !== "string" || name.trim() === "") {
    throw new Error("step is missing 'name'");
  }

  const api = raw.api;
  if (typeof api !== "string" || api.trim() === "") {
    throw new Error(`step '${name}' is missing 'api'`);
  }
  if (api.trim().split(/\s+/).length !== 2) {
    throw new Error(`step '${name}' has malformed api '${api}', expected 'METHOD /path'`);
  }

  const fields = StepFieldsSchema.safeParse(raw);
  if (!fields.success) {
    throw new Error(`step '${name}': ${formatZodError(fields.error)}`);
  }
  const data = fields.data;

  const step: StepConfig = {
    name,
    api: api.trim(),
    request: {
      headers: data.request.headers,
      query: data.request.query,
      ...(data.request.body !== undefined ? { body: data.request.body } : {}),
    },
    extract: data.extract.map((rule): ExtractRule => ({ ...rule })),
    assert: data.assert,
    vars: data.vars,
  };

  if (data.when !== undefined) step.when = data.when;
  if (data.condition) step.condition = parseCondition(data.condition);
  if (data.loop) step.loop = data.loop;
  if (data.parallel) step.parallel = data.parallel;

  return step;
}

function parseCondition(raw: { if?: string; then?: unknown[] | null; else?: unknown[] | null }): ConditionConfig {
  const branch = (label: "then" | "else", entries: unknown[] | null | undefined): StepConfig[] =>
    (entries ?? []).map((entry, i) => {
      try {
        return parseStep(entry);
      } catch (error) {
        throw new Error(`condition.${label}[${i + 1}]: ${errorMessage(error)}`);
      }
    });

  return {
    ...(raw.if !== undefined ? { if: raw.if } : {}),
    then: branch("then", raw.then),
    else: branch("else", raw.else),
  };
}

function parseSteps(entries: unknown[] | null | undefined, phase: Phase): StepConfig[] {
  return (entries ?? []).map((entry, i) => {
    try {
      return parseStep(entry);
    } catch (error) {
      throw new MalformedStepError(phase, i + 1, errorMessage(error));
    }
  });
}

/**
 * Unquoted YAML versions arrive as numbers; `2.0` keeps its decimal place
 */
function formatVersion(version: string | number | null | undefined): string {
  if (version == null) return "2.0";
  if (typeof version === "number" && Number.isInteger(version)) return version.toFixed(1);
  return String(version);
}

/**
 * Parses a scenario document (already decoded from YAML or JSON).
 *
 * @throws {MalformedScenarioError} root lacks `scenario`, name is missing or `steps` is empty
 * @throws {MalformedStepError} a step lacks a name or a well-formed `api`
 */
export function parseScenario(raw: unknown): ScenarioConfig {
  if (!isRecord(raw)) {
    throw new MalformedScenarioError("Scenario document must be a mapping");
  }
  if (!("scenario" in raw)) {
    throw new MalformedScenarioError("Missing 'scenario' root key");
  }

  const parsed = ScenarioSchema.safeParse(raw.scenario);
  if (!parsed.success) {
    throw new MalformedScenarioError(`Invalid scenario: ${formatZodError(parsed.error)}`);
  }
  const data = parsed.data;

  if (!data.name || data.name.trim() === "") {
    throw new MalformedScenarioError("Scenario is missing 'name'");
  }

  const [setup, steps, teardown] = PHASES.map((phase) => parseSteps(data[phase], phase));
  if (steps.length === 0) {
    throw new MalformedScenarioError("Scenario must contain at least one step");
  }

  return {
    name: data.name,
    description: data.description ?? "",
    version: formatVersion(data.version),
    config: data.config,
    setup,
    steps,
    teardown,
  };
}

/**
 * Parses scenario source text (YAML, or JSON which YAML accepts).
 */
export function parseScenarioText(text: string): ScenarioConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new MalformedScenarioError(`Invalid YAML: ${errorMessage(error)}`);
  }
  return parseScenario(raw);
}

export async function parseScenarioFile(file: string): Promise<ScenarioConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf-8");
  } catch (error) {
    throw new ScenarioFileError(file, errorMessage(error));
  }
  return parseScenarioText(text);
}

function validateStep(step: StepConfig, label: string, errors: string[]): void {
  const name = step.name.trim() === "" ? `(${label})` : `'${step.name}'`;
  if (step.name.trim() === "") {
    errors.push(`${label} is missing a name`);
  }

  const parts = step.api.trim().split(/\s+/);
  if (step.api.trim() === "") {
    errors.push(`Step ${name} is missing an api definition`);
  } else if (parts.length !== 2) {
    errors.push(`Step ${name} has malformed api '${step.api}', expected 'METHOD /path'`);
  } else if (!HTTP_METHODS.includes(parts[0].toUpperCase())) {
    errors.push(`Step ${name} uses unsupported HTTP method '${parts[0]}'`);
  }

  for (const [i, rule] of step.extract.entries()) {
    if (!rule.name) {
      errors.push(`Step ${name} extract rule ${i + 1} is missing 'name'`);
    } else if (
      rule.path === undefined &&
      rule.header === undefined &&
      rule.cookie === undefined &&
      rule.regex === undefined
    ) {
      errors.push(`Step ${name} extract rule '${rule.name}' has no path, header, cookie or regex`);
    }
  }

  if (step.condition) {
    if (!step.condition.if) {
      errors.push(`Step ${name} condition is missing 'if'`);
    }
    for (const branch of ["then", "else"] as const) {
      step.condition[branch].forEach((nested, i) => validateStep(nested, `${label} ${branch} step ${i + 1}`, errors));
    }
  }
}

/**
 * Non-fatal structural checks. Returns every violation; an empty list means valid.
 */
export function validateScenario(config: ScenarioConfig): string[] {
  const errors: string[] = [];

  if (!config.name || config.name.trim() === "") {
    errors.push("Scenario name must not be empty");
  }
  if (config.steps.length === 0) {
    errors.push("Scenario must contain at least one step");
  }

  for (const phase of PHASES) {
    config[phase].forEach((step, i) => validateStep(step, `${phase} step ${i + 1}`, errors));
  }

  return errors;
}
