/**
 * Typed accessors for function arguments. Arguments are schema-validated
 * before a handler runs, so a mismatch here is a programming error.
 */

export function str(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw new TypeError(`Argument "${key}" must be a string`);
  }
  return value;
}

export function optStr(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

export function num(args: Record<string, unknown>, key: string): number {
  const value = args[key];
  if (typeof value !== "number") {
    throw new TypeError(`Argument "${key}" must be a number`);
  }
  return value;
}

export function optNum(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === "number" ? value : undefined;
}

export function strList(args: Record<string, unknown>, key: string): string[] {
  const value = args[key];
  if (!Array.isArray(value)) {
    throw new TypeError(`Argument "${key}" must be an array`);
  }
  return value.filter((item): item is string => typeof item === "string");
}
