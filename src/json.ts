/**
 * JSON helpers that keep integers beyond Number.MAX_SAFE_INTEGER exact.
 * Such integers decode to bigint and encode back as plain JSON numbers.
 */

import { parse, stringify } from "lossless-json";

const INTEGER = /^-?\d+$/;

/**
 * Number parser for lossless-json: unsafe integers become bigint, everything else a number
 */
export function parseNumber(text: string): number | bigint {
  const value = Number(text);
  if (INTEGER.test(text) && !Number.isSafeInteger(value)) {
    return BigInt(text);
  }
  return value;
}

/**
 * Like JSON.parse, but integers outside the safe range come back as bigint
 *
 * @throws {SyntaxError} when the text is not valid JSON
 */
export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber);
}

/**
 * Like JSON.stringify, with bigint written as a JSON number
 */
export function toJson(value: unknown, space?: number): string {
  return stringify(value, undefined, space) ?? "";
}

function escapeNonAscii(text: string): string {
  return text.replace(/[\u007f-\uffff]/g, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`);
}

function quote(text: string): string {
  return escapeNonAscii(JSON.stringify(text));
}

/**
 * Serializes with `", "` and `": "` separators and non-ASCII characters escaped,
 * the text that regex extraction rules are written against.
 */
export function toSpacedJson(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return quote(value);
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NaN";
    if (!Number.isFinite(value)) return value > 0 ? "Infinity" : "-Infinity";
    return String(value);
  }
  if (typeof value === "boolean") return value ? "true" : "false";
  if (Array.isArray(value)) {
    return `[${value.map((item) => toSpacedJson(item)).join(", ")}]`;
  }
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .map(([key, item]) => `${quote(key)}: ${toSpacedJson(item)}`);
    return `{${entries.join(", ")}}`;
  }
  return quote(String(value));
}
