/**
 * Total lookups over decoded YAML.
 *
 * Documents are decoded with `mapAsMap`, so every mapping is an ordered
 * `Map`. None of these helpers throw: a missing segment, a `null` or a value
 * of the wrong kind anywhere along a path resolves to the caller's default.
 */

export type YamlMapping = Map<unknown, unknown>;

export type KeyPath = readonly string[];

export function isMapping(value: unknown): value is YamlMapping {
  return value instanceof Map;
}

/** Value at `path`, or undefined at the first missing or non-mapping segment. */
export function getIn(root: unknown, path: KeyPath): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (!isMapping(current)) return undefined;
    current = current.get(key);
  }
  return current;
}

/** Mapping at `path`; anything else (including `null`) is an empty mapping. */
export function getMapping(root: unknown, path: KeyPath): YamlMapping {
  const value = getIn(root, path);
  return isMapping(value) ? value : new Map();
}

/** Scalars rendered as text; undefined for nulls, sequences and mappings. */
export function scalarToString(value: unknown): string | undefined {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "bigint":
    case "boolean":
      return String(value);
    default:
      return undefined;
  }
}

export function getString(root: unknown, path: KeyPath, fallback = ""): string {
  return scalarToString(getIn(root, path)) ?? fallback;
}

/** Sequence of scalars as strings. Nested collections and nulls are dropped. */
export function getStringList(root: unknown, path: KeyPath): string[] {
  const value = getIn(root, path);
  if (!Array.isArray(value)) return [];

  const items: string[] = [];
  for (const item of value) {
    const text = scalarToString(item);
    if (text !== undefined) items.push(text);
  }
  return items;
}

/**
 * Truthiness of a decoded value: empty strings, zero, empty sequences and
 * empty mappings are false. Non-empty strings are true, including "false".
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isMapping(value)) return value.size > 0;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (typeof value === "bigint") return value !== 0n;
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "boolean") return value;
  return true;
}
