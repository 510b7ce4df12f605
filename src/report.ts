/**
 * Plain-text and summary rendering of scenario results for the CLI and tool server
 */

import type { Phase, ScenarioResult, StepResult } from "./types.js";

export interface FlatStep {
  phase: Phase;
  /** 0 for phase steps, +1 per branch level */
  depth: number;
  result: StepResult;
}

/**
 * Lists every step result in execution order, branch steps right after their parent
 */
export function flattenSteps(result: ScenarioResult): FlatStep[] {
  const flat: FlatStep[] = [];
  const visit = (phase: Phase, steps: StepResult[], depth: number): void => {
    for (const step of steps) {
      flat.push({ phase, depth, result: step });
      if (step.branch) visit(phase, step.branch.results, depth + 1);
    }
  };

  visit("setup", result.setup_results, 0);
  visit("steps", result.step_results, 0);
  visit("teardown", result.teardown_results, 0);
  return flat;
}

export function formatStep({ phase, depth, result }: FlatStep): string[] {
  const indent = "  ".repeat(depth + 1);
  let line: string;
  if (result.skipped) {
    line = `${indent}SKIP [${phase}] ${result.name} (${result.skip_reason ?? "skipped"})`;
  } else {
    const status = result.status_code !== undefined ? `${result.status_code}, ` : "";
    line = `${indent}${result.passed ? "PASS" : "FAIL"} [${phase}] ${result.name} (${status}${result.duration_ms}ms)`;
  }

  return [
    line,
    ...result.errors.map((error) => `${indent}    - ${error}`),
    ...result.warnings.map((warning) => `${indent}    ! ${warning}`),
  ];
}

export function formatScenarioResult(result: ScenarioResult): string[] {
  const lines = [`Scenario: ${result.name}`];
  for (const step of flattenSteps(result)) {
    lines.push(...formatStep(step));
  }
  for (const error of result.errors) {
    lines.push(`  ERROR ${error}`);
  }
  lines.push(
    `Result: ${result.passed ? "passed" : "failed"}, ` +
      `${result.passed_steps} passed, ${result.failed_steps} failed, ${result.skipped_steps} skipped ` +
      `in ${result.duration_ms}ms`
  );
  return lines;
}

/**
 * Compact, JSON-friendly view of a result without request/response payloads
 */
export function summarizeResult(result: ScenarioResult) {
  return {
    name: result.name,
    passed: result.passed,
    total_steps: result.total_steps,
    passed_steps: result.passed_steps,
    failed_steps: result.failed_steps,
    skipped_steps: result.skipped_steps,
    duration_ms: result.duration_ms,
    errors: result.errors,
    steps: flattenSteps(result).map(({ phase, depth, result: step }) => ({
      phase,
      depth,
      name: step.name,
      passed: step.passed,
      skipped: step.skipped,
      ...(step.status_code !== undefined ? { status_code: step.status_code } : {}),
      errors: step.errors,
      warnings: step.warnings,
    })),
    variables: result.context_snapshot.scenario,
  };
}
