/** Builds the error thrown for one invalid field. */
export type FieldErrorFactory = (message: string) => Error;

/** Narrow a parsed YAML value to a plain mapping. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read an optional nested mapping; `undefined` when absent. */
export function readOptionalRecord(
  obj: Record<string, unknown>,
  key: string,
  fail: FieldErrorFactory
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!isRecord(value)) {
    throw fail(`'${key}' must be a mapping`);
  }

  return value;
}

/** Read an optional string field. Numbers are accepted and stringified. */
export function readOptionalString(
  obj: Record<string, unknown>,
  key: string,
  fail: FieldErrorFactory
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'number') {
    return String(value);
  }

  if (typeof value !== 'string') {
    throw fail(`'${key}' must be a string`);
  }

  return value;
}

/** Read an optional boolean field. */
export function readOptionalBoolean(
  obj: Record<string, unknown>,
  key: string,
  fail: FieldErrorFactory
): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'boolean') {
    throw fail(`'${key}' must be true or false`);
  }

  return value;
}

/** Read an optional positive integer field. */
export function readOptionalPositiveInteger(
  obj: Record<string, unknown>,
  key: string,
  fail: FieldErrorFactory
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw fail(`'${key}' must be a positive integer`);
  }

  return value;
}

/** Read an optional enum field and validate membership. */
export function readOptionalEnum<T extends string>(
  obj: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  fail: FieldErrorFactory
): T | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw fail(`'${key}' must be one of ${allowed.map((item) => `'${item}'`).join(', ')}`);
  }

  return match;
}

/** Read an optional string-to-string mapping. */
export function readOptionalStringMap(
  obj: Record<string, unknown>,
  key: string,
  fail: FieldErrorFactory
): Record<string, string> | undefined {
  const value = readOptionalRecord(obj, key, fail);
  if (value === undefined) {
    return undefined;
  }

  const out: Record<string, string> = {};
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw fail(`'${key}.${entryKey}' must be a string`);
    }
    out[entryKey] = entryValue;
  }

  return out;
}

/** Read an optional string-array field. */
export function readOptionalStringArray(
  obj: Record<string, unknown>,
  key: string,
  fail: FieldErrorFactory
): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw fail(`'${key}' must be an array of strings`);
  }

  return value;
}
