/**
 * Scoped variable storage and `${...}` template resolution
 *
 * Three fixed scopes are searched step → scenario → global on read.
 * Templates are compiled once into a small AST (literal text, variable
 * references and function calls) and cached by source string.
 */

import { createBuiltins, type TemplateArg, type TemplateFunction } from "./builtins.js";
import { InvalidScopeError, TemplateSyntaxError, UnknownFunctionError } from "./errors.js";
import { toJson } from "./json.js";
import type { ContextSnapshot, Scope } from "./types.js";

export type TemplatePart =
  | { kind: "literal"; text: string }
  | { kind: "var"; name: string }
  | { kind: "call"; name: string; args: TemplateArg[] };

export interface CompiledTemplate {
  parts: TemplatePart[];
  /** True when the whole string is a single `${expr}` marker; the value keeps its native type */
  whole: boolean;
}

const MARKER = /\$\{([^}]+)\}/g;
const CALL = /^([A-Za-z_][A-Za-z0-9_]*)\s*\(([\s\S]*)\)$/;
const INTEGER = /^-?\d+$/;
const CACHE_LIMIT = 500;

const templateCache = new Map<string, CompiledTemplate>();

/**
 * Splits call arguments on commas that are not inside quotes.
 */
function splitArgs(source: string, expression: string): string[] {
  const args: string[] = [];
  let current = "";
  let quote: string | null = null;

  for (const ch of source) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = null;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      current += ch;
    } else if (ch === ",") {
      args.push(current);
      current = "";
    } else {
      current += ch;
    }
  }

  if (quote) {
    throw new TemplateSyntaxError(expression, "unterminated string argument");
  }
  args.push(current);
  return args;
}

function parseArg(raw: string, expression: string): TemplateArg {
  const arg = raw.trim();
  if (arg === "") {
    throw new TemplateSyntaxError(expression, "empty argument");
  }
  const first = arg[0];
  if ((first === "'" || first === '"') && arg.length >= 2 && arg.endsWith(first)) {
    return arg.slice(1, -1);
  }
  if (INTEGER.test(arg)) {
    return Number.parseInt(arg, 10);
  }
  // Bare identifiers pass through as-is
  return arg;
}

export function parseExpression(source: string): TemplatePart {
  const expression = source.trim();
  const call = CALL.exec(expression);
  if (call) {
    const [, name, argSource] = call;
    const args = argSource.trim() === ""
      ? []
      : splitArgs(argSource, expression).map((arg) => parseArg(arg, expression));
    return { kind: "call", name, args };
  }
  return { kind: "var", name: expression };
}

/**
 * Compiles a template string, reusing the cached AST when available.
 */
export function compileTemplate(text: string): CompiledTemplate {
  const cached = templateCache.get(text);
  if (cached) return cached;

  let compiled: CompiledTemplate;
  if (text.startsWith("${") && text.endsWith("}") && text.split("${").length === 2) {
    compiled = { parts: [parseExpression(text.slice(2, -1))], whole: true };
  } else {
    const parts: TemplatePart[] = [];
    let last = 0;
    for (const match of text.matchAll(MARKER)) {
      const start = match.index ?? 0;
      if (start > last) {
        parts.push({ kind: "literal", text: text.slice(last, start) });
      }
      parts.push(parseExpression(match[1]));
      last = start + match[0].length;
    }
    if (last < text.length) {
      parts.push({ kind: "literal", text: text.slice(last) });
    }
    compiled = { parts, whole: false };
  }

  if (templateCache.size >= CACHE_LIMIT) {
    const oldest = templateCache.keys().next();
    if (!oldest.done) templateCache.delete(oldest.value);
  }
  templateCache.set(text, compiled);
  return compiled;
}

/**
 * Converts a value to its interpolated string form.
 * Objects and arrays are JSON-serialized; null and undefined become "".
 */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return toJson(value);
  }
  return String(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function walkDotted(root: unknown, segments: string[]): unknown {
  let current = root;
  for (const segment of segments) {
    if (Array.isArray(current) && INTEGER.test(segment)) {
      current = current[Number(segment)];
    } else if (isPlainObject(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export class ContextStore {
  private readonly globalVars = new Map<string, unknown>();
  private readonly scenarioVars = new Map<string, unknown>();
  private stepVars = new Map<string, unknown>();
  private readonly functions: Map<string, TemplateFunction>;

  constructor() {
    this.functions = createBuiltins();
  }

  set(name: string, value: unknown, scope: Scope = "scenario"): void {
    this.scopeMap(scope).set(name, value);
  }

  /**
   * Looks a name up step → scenario → global. A dotted name that is not
   * stored verbatim walks into the value of its first segment.
   */
  get(name: string, defaultValue?: unknown): unknown {
    for (const vars of [this.stepVars, this.scenarioVars, this.globalVars]) {
      if (vars.has(name)) return vars.get(name);
    }

    const [head, ...rest] = name.split(".");
    if (rest.length > 0) {
      for (const vars of [this.stepVars, this.scenarioVars, this.globalVars]) {
        if (vars.has(head)) {
          const value = walkDotted(vars.get(head), rest);
          return value === undefined ? defaultValue : value;
        }
      }
    }

    return defaultValue;
  }

  has(name: string): boolean {
    return this.stepVars.has(name) || this.scenarioVars.has(name) || this.globalVars.has(name);
  }

  clearStep(): void {
    this.stepVars = new Map();
  }

  /** Clears scenario scope and, with it, step scope */
  clearScenario(): void {
    this.scenarioVars.clear();
    this.clearStep();
  }

  registerFunction(name: string, fn: TemplateFunction): void {
    this.functions.set(name, fn);
  }

  /**
   * Resolves `${...}` markers anywhere inside a value.
   *
   * @example
   * store.set("count", 5);
   * store.resolve("${count}")       // 5
   * store.resolve("n=${count}")     // "n=5"
   * store.resolve({ ids: ["${count}"] }) // { ids: [5] }
   */
  resolve(template: unknown): unknown {
    if (typeof template === "string") {
      return this.resolveString(template);
    }
    if (Array.isArray(template)) {
      return template.map((item) => this.resolve(item));
    }
    if (isPlainObject(template)) {
      const out: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(template)) {
        out[key] = this.resolve(value);
      }
      return out;
    }
    return template;
  }

  /**
   * Resolves a template that must produce a string (paths, header values).
   */
  resolveText(template: string): string {
    const value = this.resolveString(template);
    return typeof value === "string" ? value : stringifyValue(value);
  }

  /**
   * Evaluates the inside of a single `${...}` marker.
   */
  evaluate(expression: string): unknown {
    return this.evaluatePart(parseExpression(expression));
  }

  snapshot(): ContextSnapshot {
    return {
      global: structuredClone(Object.fromEntries(this.globalVars)),
      scenario: structuredClone(Object.fromEntries(this.scenarioVars)),
      step: structuredClone(Object.fromEntries(this.stepVars)),
    };
  }

  private resolveString(text: string): unknown {
    if (!text.includes("${")) return text;

    const compiled = compileTemplate(text);
    if (compiled.whole) {
      return this.evaluatePart(compiled.parts[0]);
    }
    return compiled.parts.map((part) => stringifyValue(this.evaluatePart(part))).join("");
  }

  private evaluatePart(part: TemplatePart): unknown {
    switch (part.kind) {
      case "literal":
        return part.text;
      case "var":
        return this.get(part.name);
      case "call": {
        const fn = this.functions.get(part.name);
        if (!fn) {
          throw new UnknownFunctionError(part.name);
        }
        return fn(...part.args);
      }
    }
  }

  private scopeMap(scope: Scope): Map<string, unknown> {
    switch (scope) {
      case "global":
        return this.globalVars;
      case "scenario":
        return this.scenarioVars;
      case "step":
        return this.stepVars;
      default:
        throw new InvalidScopeError(String(scope));
    }
  }
}
