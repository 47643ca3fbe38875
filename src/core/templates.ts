/**
 * Dot-path lookup, `{{ path }}` substitution and step conditions over the
 * results of earlier task steps.
 */
import { isRecord } from "../utils/guards.js";

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;
const WHOLE_PLACEHOLDER = /^\{\{\s*([\w.-]+)\s*\}\}$/;

/** `discover.data.0.name` → results.discover.data[0].name; undefined when any hop is missing. */
export function resolvePath(path: string, root: unknown): unknown {
  let current: unknown = root;
  for (const part of path.split(".")) {
    if (Array.isArray(current)) {
      if (part === "length") {
        current = current.length;
        continue;
      }
      const index = Number(part);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, part)) {
      current = current[part];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Empty strings, zero, null, empty arrays and empty objects are false. */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * Substitute placeholders in strings, recursively through arrays and objects.
 * A string that is exactly one placeholder takes the referenced value as is.
 */
export function renderTemplate(value: unknown, results: Record<string, unknown>): unknown {
  if (typeof value === "string") {
    const whole = value.match(WHOLE_PLACEHOLDER);
    if (whole?.[1] !== undefined) {
      return resolvePath(whole[1], results);
    }
    return value.replace(PLACEHOLDER, (_m, path: string) => stringify(resolvePath(path, results)));
  }
  if (Array.isArray(value)) {
    return value.map((v) => renderTemplate(v, results));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = renderTemplate(v, results);
    }
    return out;
  }
  return value;
}

export function renderText(template: string, results: Record<string, unknown>): string {
  return stringify(renderTemplate(template, results));
}

/**
 * `a.b == value`, `a.b != value`, `a.b` (truthy) or `!a.b`. Comparison is
 * on the string form; quotes around the right-hand side are optional.
 */
export function evaluateCondition(condition: string, results: Record<string, unknown>): boolean {
  const expr = condition.trim();
  if (expr === "") return true;

  for (const op of ["!=", "=="] as const) {
    const at = expr.indexOf(op);
    if (at === -1) continue;
    const left = stringify(resolvePath(expr.slice(0, at).trim(), results));
    const right = expr
      .slice(at + op.length)
      .trim()
      .replace(/^['"]|['"]$/g, "");
    return op === "==" ? left === right : left !== right;
  }

  if (expr.startsWith("!")) {
    return !isTruthy(resolvePath(expr.slice(1).trim(), results));
  }
  return isTruthy(resolvePath(expr, results));
}
