/**
 * Scenario runner
 * Drives setup → steps → teardown, resolving each step's templates, sending
 * the request, extracting variables and checking assertions
 */

import { ConditionEvaluator } from "./condition.js";
import { ContextStore, stringifyValue } from "./context.js";
import {
  FatalScenarioError,
  StepAssertionError,
  StepExecutionError,
  StepRequestError,
  TransportError,
  errorMessage,
} from "./errors.js";
import { extract, extractHeader } from "./extractor.js";
import { FetchTransport } from "./http-client.js";
import { parseJson } from "./json.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  OnEvent,
  Phase,
  RunEvent,
  ScenarioConfig,
  ScenarioResult,
  StepConfig,
  StepResult,
} from "./types.js";

export const DEFAULT_TIMEOUT_SECONDS = 30;

export interface RunScenarioOptions {
  /** Defaults to a FetchTransport */
  transport?: HttpTransport;
  /** Seeds `base_url` when the scenario config does not set one */
  baseUrl?: string;
  /** Per-request timeout, overridden by a numeric `timeout` in the scenario config */
  timeoutSeconds?: number;
  verifyTls?: boolean;
  /** Sent as a bearer token unless a step sets its own Authorization header */
  authToken?: string;
  /** Extra global variables, applied before the scenario config */
  variables?: Record<string, unknown>;
  /** Store to run in. Its global scope is kept; scenario scope is cleared first. */
  context?: ContextStore;
  logger?: Logger;
  onEvent?: OnEvent;
}

interface RunState {
  store: ContextStore;
  evaluator: ConditionEvaluator;
  transport: HttpTransport;
  logger: Logger;
  onEvent?: OnEvent;
  authToken?: string;
  timeoutSeconds: number;
  verifyTls: boolean;
  counts: { passed: number; failed: number; skipped: number };
}

interface StepOutcome {
  result: StepResult;
  /** Decoded response body; absent when no response was received */
  body?: unknown;
}

/**
 * Safely emit an event if an onEvent callback is provided
 */
function emit(onEvent: OnEvent | undefined, event: RunEvent): void {
  if (onEvent) {
    try {
      onEvent(event);
    } catch {
      // Listener errors must not affect the run
    }
  }
}

/**
 * Joins the base URL and a step path. Absolute URLs in the path are used as-is.
 */
export function joinUrl(base: string, path: string): string {
  if (/^https?:\/\//i.test(path)) return path;
  const prefix = base.replace(/\/+$/, "");
  return `${prefix}${path.startsWith("/") ? path : `/${path}`}`;
}

/**
 * Decodes a response body as JSON, falling back to the raw text
 */
export function decodeBody(text: string): unknown {
  if (text.trim() === "") return text;
  try {
    return parseJson(text);
  } catch {
    return text;
  }
}

function resolveRecord(store: ContextStore, template: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(template)) {
    out[key] = store.resolve(value);
  }
  return out;
}

function resolveHeaders(store: ContextStore, template: Record<string, unknown>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(resolveRecord(store, template))) {
    if (value === null || value === undefined) continue;
    headers[key] = stringifyValue(value);
  }
  return headers;
}

function newStepResult(step: StepConfig): StepResult {
  return {
    name: step.name,
    api: step.api,
    passed: false,
    duration_ms: 0,
    extracted: {},
    errors: [],
    warnings: [],
    skipped: false,
  };
}

/**
 * Builds the transport request for a step from the current context
 */
function buildRequest(state: RunState, step: StepConfig): HttpRequest {
  const { store } = state;
  const tokens = step.api.trim().split(/\s+/);
  if (tokens.length !== 2) {
    throw new StepRequestError(`malformed api '${step.api}', expected 'METHOD /path'`);
  }

  const method = store.resolveText(tokens[0]).toUpperCase();
  const path = store.resolveText(tokens[1]);

  const base = store.get("base_url");
  if (!/^https?:\/\//i.test(path) && (typeof base !== "string" || base === "")) {
    throw new StepExecutionError("no base_url configured");
  }
  const url = joinUrl(typeof base === "string" ? base : "", path);

  const headers = resolveHeaders(store, step.request.headers);
  if (state.authToken && extractHeader(headers, "authorization") === undefined) {
    headers.Authorization = `Bearer ${state.authToken}`;
  }

  const configured = store.get("timeout");
  const seconds = typeof configured === "number" && configured > 0 ? configured : state.timeoutSeconds;

  const request: HttpRequest = {
    method,
    url,
    headers,
    query: resolveRecord(store, step.request.query),
    timeoutMs: Math.round(seconds * 1000),
    verifyTls: state.verifyTls,
  };
  if (step.request.body !== undefined) {
    request.body = store.resolve(step.request.body);
  }
  return request;
}

async function send(state: RunState, request: HttpRequest): Promise<HttpResponse> {
  try {
    return await state.transport.request(request);
  } catch (error) {
    if (error instanceof TransportError) {
      throw new StepRequestError(error.message);
    }
    throw error;
  }
}

/**
 * Runs one step's procedure. Step failures are recorded in the result;
 * only FatalScenarioError escapes.
 */
async function executeStep(state: RunState, step: StepConfig): Promise<StepOutcome> {
  const { store, evaluator, logger } = state;
  const result = newStepResult(step);
  const startTime = Date.now();
  let body: unknown;
  let received = false;

  store.clearStep();

  if (step.loop) result.warnings.push("loop configuration is not executed");
  if (step.parallel) result.warnings.push("parallel configuration is not executed");

  try {
    for (const [name, template] of Object.entries(step.vars)) {
      store.set(name, store.resolve(template), "step");
    }

    if (step.when !== undefined && !evaluator.evaluate(step.when)) {
      result.skipped = true;
      result.passed = true;
      result.skip_reason = `when condition is false: ${step.when}`;
      result.duration_ms = Date.now() - startTime;
      return { result };
    }

    const request = buildRequest(state, step);
    // Whole-marker templates hand back the store's own values
    result.request = structuredClone({
      method: request.method,
      url: request.url,
      headers: request.headers,
      query: request.query,
      ...(request.body !== undefined ? { body: request.body } : {}),
    });

    const response = await send(state, request);
    body = decodeBody(response.body);
    received = true;
    result.status_code = response.status;
    result.response = { headers: response.headers, body };

    const extracted = extract(body, step.extract, response.headers);
    for (const [name, value] of Object.entries(extracted)) {
      store.set(name, structuredClone(value), "scenario");
    }
    result.extracted = extracted;
    if (Object.keys(extracted).length > 0) {
      logger.debug({ step: step.name, extracted }, "extracted variables");
    }

    if (step.assert.length > 0) {
      for (const rule of step.assert) {
        const expression = rule.replace(/\bstatus_code\b/g, String(response.status));
        if (!evaluator.evaluate(expression, body)) {
          result.errors.push(new StepAssertionError(rule).message);
        }
      }
      if (result.errors.length > 0) result.failure = "assertion";
    } else if (response.status < 200 || response.status >= 300) {
      result.errors.push(`Unexpected status code: ${response.status}`);
      result.failure = "status";
    }
  } catch (error) {
    if (error instanceof FatalScenarioError) throw error;

    if (error instanceof StepRequestError) {
      result.errors.push(error.message);
      result.failure = "request";
    } else {
      const wrapped = error instanceof StepExecutionError ? error : new StepExecutionError(errorMessage(error));
      result.errors.push(wrapped.message);
      result.failure = "execution";
    }
  }

  result.passed = result.errors.length === 0;
  result.duration_ms = Date.now() - startTime;
  return received ? { result, body } : { result };
}

function record(state: RunState, phase: Phase, index: number, result: StepResult): void {
  const { logger, counts } = state;
  const label = `${phase} ${index + 1}: ${result.name}`;

  for (const warning of result.warnings) {
    logger.warn({ step: result.name }, warning);
  }

  if (result.skipped) {
    counts.skipped++;
    logger.info(`${label} skipped (${result.skip_reason ?? "skipped"})`);
    emit(state.onEvent, { type: "step:skip", phase, index, name: result.name, reason: result.skip_reason ?? "" });
  } else if (result.passed) {
    counts.passed++;
    logger.info(`${label} passed in ${result.duration_ms}ms`);
    emit(state.onEvent, { type: "step:pass", phase, index, name: result.name, duration_ms: result.duration_ms });
  } else {
    counts.failed++;
    logger.warn({ errors: result.errors }, `${label} failed`);
    emit(state.onEvent, {
      type: "step:fail",
      phase,
      index,
      name: result.name,
      duration_ms: result.duration_ms,
      errors: result.errors,
    });
  }
}

async function runStep(state: RunState, step: StepConfig, phase: Phase, index: number): Promise<StepResult> {
  emit(state.onEvent, { type: "step:start", phase, index, name: step.name });

  const { result, body } = await executeStep(state, step);

  const condition = step.condition && !result.skipped && result.response !== undefined ? step.condition : undefined;
  if (condition && !condition.if) {
    result.warnings.push("condition has no 'if' expression, no branch taken");
  }
  record(state, phase, index, result);

  const expression = condition?.if;
  if (!condition || !expression) {
    return result;
  }

  const taken = state.evaluator.evaluate(expression, body) ? "then" : "else";
  const branchSteps = condition[taken];
  state.logger.info(`${step.name}: condition '${expression}' selected ${taken} (${branchSteps.length} steps)`);
  emit(state.onEvent, { type: "branch", phase, name: step.name, taken, steps: branchSteps.length });

  const results: StepResult[] = [];
  for (const nested of branchSteps) {
    results.push(await runStep(state, nested, phase, index));
  }
  result.branch = { taken, condition: expression, results };
  return result;
}

async function runPhase(state: RunState, phase: Phase, steps: StepConfig[], results: StepResult[]): Promise<void> {
  if (steps.length === 0) return;

  state.logger.info(`Running ${phase} (${steps.length} steps)`);
  emit(state.onEvent, { type: "phase:start", phase, steps: steps.length });

  for (let i = 0; i < steps.length; i++) {
    // Pushed one at a time so a later scenario-level error keeps earlier results
    results.push(await runStep(state, steps[i], phase, i));
  }
}

/**
 * Runs a parsed scenario.
 *
 * Teardown always runs. A scenario-level error (anything other than a step
 * failure) skips the phases that have not started yet and is recorded in
 * `errors`.
 */
export async function runScenario(scenario: ScenarioConfig, options: RunScenarioOptions = {}): Promise<ScenarioResult> {
  const startTime = Date.now();
  const logger = options.logger ?? silentLogger();
  const store = options.context ?? new ContextStore();

  store.clearScenario();
  if (options.baseUrl !== undefined) store.set("base_url", options.baseUrl, "global");
  for (const [name, value] of Object.entries(options.variables ?? {})) {
    store.set(name, value, "global");
  }
  for (const [name, value] of Object.entries(scenario.config)) {
    store.set(name, value, "global");
  }

  let ownTransport: FetchTransport | null = null;
  let transport = options.transport;
  if (!transport) {
    ownTransport = new FetchTransport();
    transport = ownTransport;
  }

  const state: RunState = {
    store,
    evaluator: new ConditionEvaluator(store, logger),
    transport,
    logger,
    onEvent: options.onEvent,
    authToken: options.authToken,
    timeoutSeconds: options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    verifyTls: options.verifyTls ?? true,
    counts: { passed: 0, failed: 0, skipped: 0 },
  };

  const setupResults: StepResult[] = [];
  const stepResults: StepResult[] = [];
  const teardownResults: StepResult[] = [];
  const errors: string[] = [];

  const phases: Array<[Phase, StepConfig[], StepResult[]]> = [
    ["setup", scenario.setup, setupResults],
    ["steps", scenario.steps, stepResults],
    ["teardown", scenario.teardown, teardownResults],
  ];

  logger.info(`Scenario: ${scenario.name}`);

  let aborted = false;
  for (const [phase, steps, results] of phases) {
    if (aborted && phase !== "teardown") continue;
    try {
      await runPhase(state, phase, steps, results);
    } catch (error) {
      aborted = true;
      const message = `Scenario error in ${phase}: ${errorMessage(error)}`;
      errors.push(message);
      logger.error({ err: error }, message);
    }
  }

  const { counts } = state;
  const result: ScenarioResult = {
    name: scenario.name,
    description: scenario.description,
    passed: counts.failed === 0 && errors.length === 0,
    total_steps: counts.passed + counts.failed + counts.skipped,
    passed_steps: counts.passed,
    failed_steps: counts.failed,
    skipped_steps: counts.skipped,
    duration_ms: Date.now() - startTime,
    setup_results: setupResults,
    step_results: stepResults,
    teardown_results: teardownResults,
    errors,
    context_snapshot: store.snapshot(),
  };

  logger.info(
    `${scenario.name}: ${result.passed ? "passed" : "failed"} ` +
      `(${result.passed_steps} passed, ${result.failed_steps} failed, ${result.skipped_steps} skipped) in ${result.duration_ms}ms`
  );
  emit(options.onEvent, { type: "scenario:complete", result });

  if (ownTransport) {
    await ownTransport.close();
  }

  return result;
}
