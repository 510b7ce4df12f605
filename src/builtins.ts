/**
 * Builtin template functions available as `${name(args)}`
 */

import { createHash, randomInt, randomUUID } from "node:crypto";

export type TemplateArg = string | number;
export type TemplateFunction = (...args: TemplateArg[]) => unknown;

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

function toInteger(value: TemplateArg | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new TypeError(`${label} must be an integer, got '${value}'`);
  }
  return parsed;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

function dayOfYear(date: Date): number {
  const start = new Date(date.getFullYear(), 0, 1);
  const startUtc = Date.UTC(start.getFullYear(), 0, 1);
  const dateUtc = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.floor((dateUtc - startUtc) / 86_400_000) + 1;
}

/**
 * strftime directives, evaluated against local time
 */
const DIRECTIVES: Record<string, (date: Date) => string> = {
  Y: (d) => String(d.getFullYear()),
  y: (d) => pad(d.getFullYear() % 100),
  m: (d) => pad(d.getMonth() + 1),
  d: (d) => pad(d.getDate()),
  H: (d) => pad(d.getHours()),
  I: (d) => pad(d.getHours() % 12 === 0 ? 12 : d.getHours() % 12),
  p: (d) => (d.getHours() < 12 ? "AM" : "PM"),
  M: (d) => pad(d.getMinutes()),
  S: (d) => pad(d.getSeconds()),
  f: (d) => pad(d.getMilliseconds() * 1000, 6),
  j: (d) => pad(dayOfYear(d), 3),
  a: (d) => WEEKDAYS[d.getDay()].slice(0, 3),
  A: (d) => WEEKDAYS[d.getDay()],
  b: (d) => MONTHS[d.getMonth()].slice(0, 3),
  B: (d) => MONTHS[d.getMonth()],
  "%": () => "%",
};

/**
 * Formats a date with strftime-style directives. Unknown directives are kept verbatim.
 *
 * @example
 * formatDate(new Date(2024, 0, 5), "%Y/%m/%d") // "2024/01/05"
 */
export function formatDate(date: Date, format: string): string {
  return format.replace(/%(.)/g, (match, directive: string) => {
    const render = DIRECTIVES[directive];
    return render ? render(date) : match;
  });
}

export function createBuiltins(): Map<string, TemplateFunction> {
  return new Map<string, TemplateFunction>([
    ["timestamp", () => Math.floor(Date.now() / 1000)],
    ["uuid", () => randomUUID()],
    [
      "random_string",
      (length) => {
        const size = toInteger(length, 10, "random_string length");
        let out = "";
        for (let i = 0; i < size; i++) {
          out += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
        }
        return out;
      },
    ],
    [
      "random_int",
      (min, max) => {
        const low = toInteger(min, 0, "random_int min");
        const high = toInteger(max, 100, "random_int max");
        if (high < low) {
          throw new RangeError(`random_int range is empty: [${low}, ${high}]`);
        }
        // randomInt's upper bound is exclusive
        return randomInt(low, high + 1);
      },
    ],
    ["date", (format) => formatDate(new Date(), format === undefined ? "%Y-%m-%d" : String(format))],
    [
      "md5",
      (text) => {
        if (text === undefined) {
          throw new TypeError("md5 requires a text argument");
        }
        return createHash("md5").update(String(text)).digest("hex");
      },
    ],
  ]);
}
