/**
 * Type definitions for apiflow
 * Defines scenario definitions, transport contracts, and execution results
 */

/**
 * Variable scope. Reads search step → scenario → global; writes target exactly one.
 */
export type Scope = "global" | "scenario" | "step";

export const SCOPES: readonly Scope[] = ["global", "scenario", "step"];

/**
 * Declarative instruction for pulling a named value out of a response.
 * Exactly one source (`path`, `header`, `cookie`, `regex`) is consulted, in that order.
 */
export interface ExtractRule {
  /** Variable name written into scenario scope. Rules without one are skipped. */
  name?: string;
  /** Structured query such as `$.data.items[*].id` */
  path?: string;
  /** Response header name (case-insensitive) */
  header?: string;
  /** Cookie name looked up in the `Set-Cookie` header */
  cookie?: string;
  /** Pattern applied to the JSON-serialized response body */
  regex?: string;
  /** Capture group for `regex` (default 0) */
  group?: number;
}

/**
 * Request template. Every value may embed `${...}` markers.
 */
export interface RequestTemplate {
  headers: Record<string, unknown>;
  query: Record<string, unknown>;
  body?: unknown;
}

/**
 * Conditional branch: `if` selects between the `then` and `else` step lists.
 */
export interface ConditionConfig {
  if?: string;
  then: StepConfig[];
  else: StepConfig[];
}

/**
 * A single parsed step. Produced once by the parser and never mutated.
 */
export interface StepConfig {
  name: string;
  /** `METHOD /path`, path may embed templates */
  api: string;
  request: RequestTemplate;
  extract: ExtractRule[];
  assert: string[];
  /** Templates written into step scope before the request is built */
  vars: Record<string, unknown>;
  /** Guard expression; the step is skipped when it evaluates to false */
  when?: string;
  condition?: ConditionConfig;
  /** Structural placeholder, never executed */
  loop?: Record<string, unknown>;
  /** Structural placeholder, never executed */
  parallel?: Record<string, unknown>;
}

export type Phase = "setup" | "steps" | "teardown";

/**
 * Parsed scenario document
 */
export interface ScenarioConfig {
  name: string;
  description: string;
  version: string;
  /** Seeds the global scope (`base_url`, `timeout`, ...) */
  config: Record<string, unknown>;
  setup: StepConfig[];
  steps: StepConfig[];
  teardown: StepConfig[];
}

/**
 * Fully resolved request handed to the transport
 */
export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  query: Record<string, unknown>;
  body?: unknown;
  timeoutMs: number;
  verifyTls: boolean;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport collaborator. Failures surface as TransportError.
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export type StepFailure = "request" | "assertion" | "status" | "execution";

export interface BranchResult {
  taken: "then" | "else";
  condition: string;
  results: StepResult[];
}

/**
 * Outcome of one executed (or skipped) step
 */
export interface StepResult {
  name: string;
  api: string;
  passed: boolean;
  status_code?: number;
  duration_ms: number;
  request?: {
    method: string;
    url: string;
    headers: Record<string, string>;
    query: Record<string, unknown>;
    body?: unknown;
  };
  response?: {
    headers: Record<string, string>;
    body: unknown;
  };
  extracted: Record<string, unknown>;
  errors: string[];
  warnings: string[];
  failure?: StepFailure;
  skipped: boolean;
  skip_reason?: string;
  branch?: BranchResult;
}

export interface ContextSnapshot {
  global: Record<string, unknown>;
  scenario: Record<string, unknown>;
  step: Record<string, unknown>;
}

/**
 * Aggregate result of one scenario run
 */
export interface ScenarioResult {
  name: string;
  description: string;
  passed: boolean;
  total_steps: number;
  passed_steps: number;
  failed_steps: number;
  skipped_steps: number;
  duration_ms: number;
  setup_results: StepResult[];
  step_results: StepResult[];
  teardown_results: StepResult[];
  /** Scenario-level errors (not step failures) */
  errors: string[];
  context_snapshot: ContextSnapshot;
}

/**
 * Events emitted while a scenario runs
 */
export type RunEvent =
  | { type: "phase:start"; phase: Phase; steps: number }
  | { type: "step:start"; phase: Phase; index: number; name: string }
  | { type: "step:pass"; phase: Phase; index: number; name: string; duration_ms: number }
  | { type: "step:fail"; phase: Phase; index: number; name: string; duration_ms: number; errors: string[] }
  | { type: "step:skip"; phase: Phase; index: number; name: string; reason: string }
  | { type: "branch"; phase: Phase; name: string; taken: "then" | "else"; steps: number }
  | { type: "scenario:complete"; result: ScenarioResult };

export type OnEvent = (event: RunEvent) => void;

/**
 * Scenario file discovered on disk
 */
export interface ScenarioEntry {
  id: string;
  file: string;
  name: string;
  description: string;
  /** Set when the file could not be parsed */
  error?: string;
}

/**
 * Persisted scenario run
 */
export interface SavedRun {
  id: string;
  scenarioId: string;
  status: "passed" | "failed";
  result: ScenarioResult;
  startedAt: string;
  completedAt: string;
  duration_ms: number;
}

export interface SuiteScenarioResult {
  file: string;
  name: string;
  status: "passed" | "failed" | "skipped";
  duration_ms: number;
  result?: ScenarioResult;
  error?: string;
  /** Set when the run was saved */
  runId?: string;
}

export interface SuiteResult {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration_ms: number;
  scenarios: SuiteScenarioResult[];
}
