/**
 * Error taxonomy for apiflow
 */

import type { Phase } from "./types.js";

export class ApiflowError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// Definition errors: fatal, raised before anything executes

export class MalformedScenarioError extends ApiflowError {
  constructor(message: string) {
    super("MALFORMED_SCENARIO", message);
  }
}

export class MalformedStepError extends ApiflowError {
  readonly phase: Phase;
  /** 1-based position within its phase */
  readonly index: number;

  constructor(phase: Phase, index: number, reason: string) {
    super("MALFORMED_STEP", `Invalid step ${index} in ${phase}: ${reason}`);
    this.phase = phase;
    this.index = index;
  }
}

export class ScenarioFileError extends ApiflowError {
  readonly file: string;

  constructor(file: string, reason: string) {
    super("SCENARIO_FILE", `Cannot read scenario file ${file}: ${reason}`);
    this.file = file;
  }
}

// Context errors

export class InvalidScopeError extends ApiflowError {
  constructor(scope: string) {
    super("INVALID_SCOPE", `Invalid scope: ${scope}`);
  }
}

export class UnknownFunctionError extends ApiflowError {
  constructor(name: string) {
    super("UNKNOWN_FUNCTION", `Unknown function: ${name}`);
  }
}

export class TemplateSyntaxError extends ApiflowError {
  constructor(expression: string, reason: string) {
    super("TEMPLATE_SYNTAX", `Invalid template expression '${expression}': ${reason}`);
  }
}

// Transport

export type TransportErrorKind = "timeout" | "connection" | "tls" | "other";

export class TransportError extends ApiflowError {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super("TRANSPORT_ERROR", message);
    this.kind = kind;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// Step failures: always captured into the StepResult, never raised to the caller

export class StepRequestError extends ApiflowError {
  constructor(reason: string) {
    super("STEP_REQUEST", `Request failed: ${reason}`);
  }
}

export class StepAssertionError extends ApiflowError {
  readonly rule: string;

  constructor(rule: string) {
    super("STEP_ASSERTION", `Assertion failed: ${rule}`);
    this.rule = rule;
  }
}

export class StepExecutionError extends ApiflowError {
  constructor(reason: string) {
    super("STEP_EXECUTION", `Step execution error: ${reason}`);
  }
}

/**
 * Errors that cross the per-step boundary and stop the remaining phases.
 */
export class FatalScenarioError extends ApiflowError {}

export class ConfigurationError extends FatalScenarioError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
