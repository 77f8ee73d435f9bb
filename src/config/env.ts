/**
 * Environment variable readers used by the compiler configuration. Values are
 * trimmed; a blank variable counts as unset.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

function readRaw(name: string): string | undefined {
  const raw = process.env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Boolean value of {@link name}, case-insensitive. Unrecognised literals fall
 * back to {@link defaultValue} like an unset variable.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

export function readOptionalBool(name: string): boolean | undefined {
  const value = readRaw(name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  return FALSE_LITERALS.has(value) ? false : undefined;
}

/** Trimmed value of {@link name}, `undefined` when unset or blank. */
export function readOptionalString(name: string): string | undefined {
  return readRaw(name);
}
