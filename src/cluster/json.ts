/**
 * Narrowing helpers for JSON returned by `oc ... -o json`.
 *
 * Cluster objects are read as plain JSON and walked with these helpers, so a
 * missing or mistyped field reads as `undefined` instead of throwing.
 *
 * @packageDocumentation
 */

/**
 * A decoded JSON object.
 */
export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a nested value by key path.
 *
 * @param value - Root value.
 * @param keys - Object keys to follow.
 * @returns The value at the path, or undefined if any step is missing.
 */
export function getPath(value: unknown, ...keys: readonly string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function getString(value: unknown, ...keys: readonly string[]): string | undefined {
  const found = getPath(value, ...keys);
  return typeof found === 'string' ? found : undefined;
}

export function getNumber(value: unknown, ...keys: readonly string[]): number | undefined {
  const found = getPath(value, ...keys);
  return typeof found === 'number' ? found : undefined;
}

export function getObject(value: unknown, ...keys: readonly string[]): JsonObject | undefined {
  const found = getPath(value, ...keys);
  return isJsonObject(found) ? found : undefined;
}

/**
 * Reads an array at a path, keeping only its object elements.
 */
export function getObjects(value: unknown, ...keys: readonly string[]): JsonObject[] {
  const found = getPath(value, ...keys);
  return Array.isArray(found) ? found.filter(isJsonObject) : [];
}

/**
 * Reads a string-to-string map such as labels or annotations.
 */
export function getStringMap(value: unknown, ...keys: readonly string[]): Record<string, string> {
  const found = getObject(value, ...keys);
  const result: Record<string, string> = {};
  if (found === undefined) {
    return result;
  }
  for (const [key, entry] of Object.entries(found)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
}

/**
 * Parses text as JSON, returning undefined instead of throwing.
 */
export function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Returns the object at a path, creating empty objects for missing or
 * non-object steps.
 */
export function ensureObject(root: JsonObject, ...keys: readonly string[]): JsonObject {
  let current = root;
  for (const key of keys) {
    const next = current[key];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: JsonObject = {};
      current[key] = created;
      current = created;
    }
  }
  return current;
}

/**
 * Sets a nested value, creating intermediate objects as needed.
 *
 * @param root - Object to modify in place.
 * @param keys - Non-empty key path; the last key receives the value.
 */
export function setPath(root: JsonObject, keys: readonly string[], value: unknown): void {
  const last = keys[keys.length - 1];
  if (last === undefined) {
    return;
  }
  ensureObject(root, ...keys.slice(0, -1))[last] = value;
}
