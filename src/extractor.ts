/**
 * Response data extraction: path queries, headers, cookies and regular expressions
 */

import { toSpacedJson } from "./json.js";
import type { ExtractRule } from "./types.js";

/**
 * Walks a path such as `$.data.items[0].name` or `data.items[*].id`.
 *
 * Segments are dot-separated and may carry an `[index]` or `[*]` suffix.
 * `[*]` returns the whole array when it ends the path, otherwise the rest of
 * the path is applied to every element. Missing keys, out-of-range indices and
 * type mismatches give `undefined`.
 */
export function queryPath(data: unknown, path: string): unknown {
  if (typeof data !== "object" || data === null) {
    return undefined;
  }

  let rest = path;
  if (rest.startsWith("$.")) {
    rest = rest.slice(2);
  } else if (rest.startsWith("$")) {
    rest = rest.slice(1);
  }

  if (!rest) return data;
  return traverse(data, rest);
}

function traverse(data: unknown, path: string): unknown {
  if (!path) return data;

  const dot = path.indexOf(".");
  const first = dot === -1 ? path : path.slice(0, dot);
  const rest = dot === -1 ? "" : path.slice(dot + 1);

  const open = first.indexOf("[");
  if (open === -1) {
    if (!isRecord(data)) return undefined;
    const value = data[first];
    return rest ? traverse(value, rest) : value;
  }

  const close = first.indexOf("]", open);
  if (close === -1) return undefined;

  const key = first.slice(0, open);
  const indexPart = first.slice(open + 1, close);
  const arr = isRecord(data) ? data[key] : data;
  if (!Array.isArray(arr)) return undefined;

  if (indexPart === "*") {
    if (!rest) return arr;
    return arr.map((item) => traverse(item, rest) ?? null);
  }

  if (!/^-?\d+$/.test(indexPart)) return undefined;
  let index = Number(indexPart);
  if (index < 0) index += arr.length;
  if (index < 0 || index >= arr.length) return undefined;

  const item: unknown = arr[index];
  return rest ? traverse(item, rest) : item;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive header lookup
 */
export function extractHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/**
 * Reads a cookie value out of the `Set-Cookie` header.
 * Several cookies joined with ", " (as fetch reports them) are supported.
 */
export function extractCookie(headers: Record<string, string>, name: string): string | undefined {
  const setCookie = extractHeader(headers, "set-cookie");
  if (!setCookie) return undefined;

  const match = new RegExp(`(?:^|[;,]\\s*)${escapeRegExp(name)}=([^;,]+)`).exec(setCookie);
  return match ? match[1] : undefined;
}

/**
 * First match of `pattern` in `text`; `undefined` when nothing matches or the group did not participate.
 */
export function extractRegex(text: string, pattern: string, group = 0): string | undefined {
  const match = new RegExp(pattern).exec(text);
  if (!match) return undefined;
  return match[group] ?? undefined;
}

function serializeBody(body: unknown): string {
  if (typeof body === "object" && body !== null) {
    return toSpacedJson(body);
  }
  return body === undefined || body === null ? "" : String(body);
}

/**
 * Applies extraction rules to a response and returns the values that were found.
 *
 * @example
 * extract({ data: { id: 7 } }, [{ name: "user_id", path: "$.data.id" }])
 * // { user_id: 7 }
 */
export function extract(
  body: unknown,
  rules: ExtractRule[],
  headers?: Record<string, string>
): Record<string, unknown> {
  const extracted: Record<string, unknown> = {};

  for (const rule of rules) {
    if (!rule.name) continue;

    let value: unknown;
    if (rule.path !== undefined) {
      value = queryPath(body, rule.path);
    } else if (rule.header !== undefined && headers) {
      value = extractHeader(headers, rule.header);
    } else if (rule.cookie !== undefined && headers) {
      value = extractCookie(headers, rule.cookie);
    } else if (rule.regex !== undefined) {
      value = extractRegex(serializeBody(body), rule.regex, rule.group ?? 0);
    }

    if (value !== undefined && value !== null) {
      extracted[rule.name] = value;
    }
  }

  return extracted;
}
