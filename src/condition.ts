/**
 * Boolean condition evaluation for assertions, guards and branches
 *
 * An expression goes through three stages:
 * 1. `response.<path>` references are replaced with literals taken from the response
 * 2. `${var}` markers are resolved through the context store
 * 3. the text is parsed by a recursive-descent parser over comparison,
 *    membership and logical operators and evaluated to a boolean
 *
 * When stage 3 fails, a single-operator fallback parser gets one more try.
 * Nothing here ever throws: an expression that cannot be evaluated is false.
 */

import type { Logger } from "./logger.js";
import type { ContextStore } from "./context.js";
import { stringifyValue } from "./context.js";
import { errorMessage } from "./errors.js";
import { queryPath } from "./extractor.js";
import { parseNumber } from "./json.js";

export type CompareOp = "==" | "!=" | ">" | ">=" | "<" | "<=" | "in" | "not in";

export type ConditionNode =
  | { type: "literal"; value: unknown }
  | { type: "identifier"; name: string }
  | { type: "list"; items: ConditionNode[] }
  | { type: "len"; arg: ConditionNode }
  | { type: "negate"; operand: ConditionNode }
  | { type: "not"; operand: ConditionNode }
  | { type: "logical"; op: "and" | "or"; left: ConditionNode; right: ConditionNode }
  | { type: "compare"; ops: CompareOp[]; operands: ConditionNode[] };

type Token =
  | { kind: "number"; value: number | bigint }
  | { kind: "string"; value: string }
  | { kind: "name"; value: string }
  | { kind: "op"; value: string };

export class ConditionSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConditionSyntaxError";
  }
}

/** Operators tried by the fallback parser, in order; the first one found wins */
const FALLBACK_OPERATORS: CompareOp[] = ["==", "!=", ">", ">=", "<", "<=", "in", "not in"];

const KEYWORDS: Record<string, unknown> = {
  True: true,
  true: true,
  False: false,
  false: false,
  None: null,
  none: null,
  null: null,
};

const RESPONSE_REF = /response\.([A-Za-z0-9_.[\]*]+)/g;

// --- tokenizer --------------------------------------------------------------

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(text[i + 1] ?? ""))) {
      const match = /^(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?/.exec(text.slice(i));
      if (!match) throw new ConditionSyntaxError(`bad number at ${i}`);
      tokens.push({ kind: "number", value: parseNumber(match[0]) });
      i += match[0].length;
      continue;
    }

    if (ch === "'" || ch === '"') {
      let value = "";
      let j = i + 1;
      let closed = false;
      while (j < text.length) {
        const c = text[j];
        if (c === "\\" && j + 1 < text.length) {
          value += text[j + 1];
          j += 2;
          continue;
        }
        if (c === ch) {
          closed = true;
          break;
        }
        value += c;
        j++;
      }
      if (!closed) throw new ConditionSyntaxError("unterminated string");
      tokens.push({ kind: "string", value });
      i = j + 1;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*/.exec(text.slice(i));
      if (!match) throw new ConditionSyntaxError(`bad name at ${i}`);
      tokens.push({ kind: "name", value: match[0] });
      i += match[0].length;
      continue;
    }

    const two = text.slice(i, i + 2);
    if (two === "==" || two === "!=" || two === ">=" || two === "<=") {
      tokens.push({ kind: "op", value: two });
      i += 2;
      continue;
    }

    if ("<>()[],-".includes(ch)) {
      tokens.push({ kind: "op", value: ch });
      i++;
      continue;
    }

    throw new ConditionSyntaxError(`unexpected character '${ch}' at ${i}`);
  }

  return tokens;
}

// --- parser -----------------------------------------------------------------

const SYMBOL_OPS = ["==", "!=", ">", ">=", "<", "<="] as const;

function isSymbolOp(value: string): value is (typeof SYMBOL_OPS)[number] {
  return SYMBOL_OPS.some((op) => op === value);
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ConditionNode {
    if (this.tokens.length === 0) {
      throw new ConditionSyntaxError("empty expression");
    }
    const node = this.parseOr();
    if (this.pos < this.tokens.length) {
      throw new ConditionSyntaxError(`unexpected token '${this.tokens[this.pos].value}'`);
    }
    return node;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private isName(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "name" && token.value === value;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token?.kind === "op" && token.value === value;
  }

  private expectOp(value: string): void {
    if (!this.isOp(value)) {
      throw new ConditionSyntaxError(`expected '${value}'`);
    }
    this.pos++;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.isName("or")) {
      this.pos++;
      left = { type: "logical", op: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseNot();
    while (this.isName("and")) {
      this.pos++;
      left = { type: "logical", op: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ConditionNode {
    if (this.isName("not")) {
      this.pos++;
      return { type: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionNode {
    const operands = [this.parseUnary()];
    const ops: CompareOp[] = [];

    for (;;) {
      const op = this.readCompareOp();
      if (!op) break;
      ops.push(op);
      operands.push(this.parseUnary());
    }

    return ops.length === 0 ? operands[0] : { type: "compare", ops, operands };
  }

  private readCompareOp(): CompareOp | null {
    const token = this.peek();
    if (!token) return null;

    if (token.kind === "op" && isSymbolOp(token.value)) {
      this.pos++;
      return token.value;
    }
    if (this.isName("in")) {
      this.pos++;
      return "in";
    }
    if (this.isName("not") && this.isName("in", 1)) {
      this.pos += 2;
      return "not in";
    }
    return null;
  }

  private parseUnary(): ConditionNode {
    if (this.isOp("-")) {
      this.pos++;
      return { type: "negate", operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    const token = this.peek();
    if (!token) {
      throw new ConditionSyntaxError("unexpected end of expression");
    }
    this.pos++;

    switch (token.kind) {
      case "number":
      case "string":
        return { type: "literal", value: token.value };

      case "name": {
        if (Object.hasOwn(KEYWORDS, token.value)) {
          return { type: "literal", value: KEYWORDS[token.value] };
        }
        if (["and", "or", "not", "in"].includes(token.value)) {
          throw new ConditionSyntaxError(`unexpected keyword '${token.value}'`);
        }
        if (this.isOp("(")) {
          if (token.value !== "len") {
            throw new ConditionSyntaxError(`unknown function '${token.value}'`);
          }
          this.pos++;
          const arg = this.parseOr();
          this.expectOp(")");
          return { type: "len", arg };
        }
        return { type: "identifier", name: token.value };
      }

      case "op": {
        if (token.value === "(") {
          const inner = this.parseOr();
          this.expectOp(")");
          return inner;
        }
        if (token.value === "[") {
          const items: ConditionNode[] = [];
          if (!this.isOp("]")) {
            items.push(this.parseOr());
            while (this.isOp(",")) {
              this.pos++;
              if (this.isOp("]")) break;
              items.push(this.parseOr());
            }
          }
          this.expectOp("]");
          return { type: "list", items };
        }
        throw new ConditionSyntaxError(`unexpected '${token.value}'`);
      }
    }
  }
}

export function parseCondition(text: string): ConditionNode {
  return new Parser(tokenize(text)).parse();
}

// --- evaluation -------------------------------------------------------------

export type Lookup = (name: string) => { found: true; value: unknown } | { found: false };

const noIdentifiers: Lookup = () => ({ found: false });

export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (typeof value === "bigint") return value !== 0n;
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === "number" || typeof value === "bigint";
}

/** Sign of a - b across number and bigint; NaN when either side is NaN */
function numericOrder(a: number | bigint, b: number | bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  if ((typeof a === "number" && Number.isNaN(a)) || (typeof b === "number" && Number.isNaN(b))) {
    return Number.NaN;
  }
  return 0;
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (isNumeric(a) && isNumeric(b)) return numericOrder(a, b) === 0;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }
  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toOrdinal(value: unknown): number | bigint | string | null {
  if (isNumeric(value) || typeof value === "string") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  return null;
}

/**
 * Applies one comparison or membership operator. Incompatible operands throw a TypeError.
 */
export function compareValues(op: CompareOp, left: unknown, right: unknown): boolean {
  switch (op) {
    case "==":
      return deepEqual(left, right);
    case "!=":
      return !deepEqual(left, right);
    case "in":
      return contains(right, left);
    case "not in":
      return !contains(right, left);
  }

  const a = toOrdinal(left);
  const b = toOrdinal(right);
  if (isNumeric(a) && isNumeric(b)) {
    return ordered(op, numericOrder(a, b));
  }
  if (typeof a === "string" && typeof b === "string") {
    return ordered(op, a < b ? -1 : a > b ? 1 : 0);
  }
  throw new TypeError(`'${op}' not supported between ${describe(left)} and ${describe(right)}`);
}

function ordered(op: ">" | ">=" | "<" | "<=", diff: number): boolean {
  switch (op) {
    case ">":
      return diff > 0;
    case ">=":
      return diff >= 0;
    case "<":
      return diff < 0;
    case "<=":
      return diff <= 0;
  }
}

function contains(container: unknown, item: unknown): boolean {
  if (typeof container === "string") {
    if (typeof item !== "string") {
      throw new TypeError(`'in <string>' requires string as left operand, not ${describe(item)}`);
    }
    return container.includes(item);
  }
  if (Array.isArray(container)) {
    return container.some((element) => deepEqual(element, item));
  }
  if (isRecord(container)) {
    return typeof item === "string" && Object.prototype.hasOwnProperty.call(container, item);
  }
  throw new TypeError(`argument of type ${describe(container)} is not iterable`);
}

function describe(value: unknown): string {
  if (value === null || value === undefined) return "none";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

export function evaluateNode(node: ConditionNode, lookup: Lookup = noIdentifiers): unknown {
  switch (node.type) {
    case "literal":
      return node.value;
    case "identifier": {
      const hit = lookup(node.name);
      if (!hit.found) {
        throw new ReferenceError(`name '${node.name}' is not defined`);
      }
      return hit.value;
    }
    case "list":
      return node.items.map((item) => evaluateNode(item, lookup));
    case "len": {
      const value = evaluateNode(node.arg, lookup);
      if (typeof value === "string" || Array.isArray(value)) return value.length;
      if (isRecord(value)) return Object.keys(value).length;
      throw new TypeError(`object of type ${describe(value)} has no len()`);
    }
    case "negate": {
      const value = evaluateNode(node.operand, lookup);
      if (!isNumeric(value)) {
        throw new TypeError(`bad operand type for unary -: ${describe(value)}`);
      }
      return -value;
    }
    case "not":
      return !isTruthy(evaluateNode(node.operand, lookup));
    case "logical": {
      const left = isTruthy(evaluateNode(node.left, lookup));
      if (node.op === "and") return left && isTruthy(evaluateNode(node.right, lookup));
      return left || isTruthy(evaluateNode(node.right, lookup));
    }
    case "compare": {
      // Chained comparisons: a < b < c means a < b and b < c
      let left = evaluateNode(node.operands[0], lookup);
      for (let i = 0; i < node.ops.length; i++) {
        const right = evaluateNode(node.operands[i + 1], lookup);
        if (!compareValues(node.ops[i], left, right)) return false;
        left = right;
      }
      return true;
    }
  }
}

// --- fallback ---------------------------------------------------------------

/**
 * Parses one side of a fallback comparison as a literal; unrecognized text stays a raw string.
 */
export function parseLiteral(raw: string): unknown {
  const text = raw.trim();
  const lower = text.toLowerCase();

  if (lower === "none" || lower === "null") return null;
  if (lower === "true") return true;
  if (lower === "false") return false;

  if (text.length >= 2 && ((text.startsWith("'") && text.endsWith("'")) || (text.startsWith('"') && text.endsWith('"')))) {
    return text.slice(1, -1);
  }

  if (/^[-+]?\d+$/.test(text)) return parseNumber(text.replace(/^\+/, ""));
  if (text.includes(".") && /^[-+]?(\d+\.\d*|\.\d+)([eE][-+]?\d+)?$/.test(text)) return Number(text);

  if (text.startsWith("[") && text.endsWith("]")) {
    try {
      return evaluateNode(parseCondition(text));
    } catch {
      // not a literal list, keep the raw text
    }
  }

  return text;
}

/**
 * Single-operator evaluation used when the expression parser gives up.
 */
export function fallbackEvaluate(expression: string): boolean {
  const expr = expression.trim();

  for (const op of FALLBACK_OPERATORS) {
    const at = expr.indexOf(op);
    if (at === -1) continue;

    const left = parseLiteral(expr.slice(0, at));
    const right = parseLiteral(expr.slice(at + op.length));
    try {
      return compareValues(op, left, right);
    } catch {
      return false;
    }
  }

  const lower = expr.toLowerCase();
  return lower === "true" || lower === "1";
}

// --- evaluator --------------------------------------------------------------

/**
 * Renders a response value as expression text: strings quoted, other values stringified.
 */
export function renderLiteral(value: unknown): string {
  if (value === null || value === undefined) return "None";
  if (typeof value === "string") {
    return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
  }
  return stringifyValue(value);
}

export class ConditionEvaluator {
  constructor(
    private readonly context: ContextStore,
    private readonly logger?: Logger
  ) {}

  /**
   * Evaluates an expression against the context and an optional response body.
   *
   * @example
   * context.set("age", 25);
   * evaluator.evaluate("age > 18 and response.data.ok == True", { data: { ok: true } }) // true
   */
  evaluate(expression: string, response?: unknown): boolean {
    let substituted: string;
    try {
      substituted = this.substitute(expression, response);
    } catch (error) {
      this.logger?.debug({ expression, err: errorMessage(error) }, "condition substitution failed");
      return false;
    }

    try {
      const node = parseCondition(substituted);
      return isTruthy(evaluateNode(node, (name) => this.lookup(name)));
    } catch (error) {
      this.logger?.debug({ expression: substituted, err: errorMessage(error) }, "falling back to single-operator evaluation");
      return fallbackEvaluate(substituted);
    }
  }

  /**
   * Performs the response and `${var}` substitutions without evaluating.
   */
  substitute(expression: string, response?: unknown): string {
    let text = expression;
    if (response !== undefined && response !== null && text.includes("response.")) {
      text = text.replace(RESPONSE_REF, (_match, path: string) => renderLiteral(queryPath(response, path)));
    }

    const resolved = this.context.resolve(text);
    return typeof resolved === "string" ? resolved : renderLiteral(resolved);
  }

  private lookup(name: string): { found: true; value: unknown } | { found: false } {
    const value = this.context.get(name);
    if (value === undefined && !this.context.has(name)) {
      return { found: false };
    }
    return { found: true, value };
  }
}
