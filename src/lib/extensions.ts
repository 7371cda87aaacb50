import { ValidationError } from "@/lib/errors";

export const STEP_FAMILY: readonly string[] = [".step", ".stp"];

/** `*.PDF`, `pdf` and `.pdf` all become `.pdf`. */
export function normalizeExtension(ext: string): string {
  let value = ext.trim().toLowerCase();
  if (value.startsWith("*")) value = value.slice(1);
  if (!value.startsWith(".")) value = `.${value}`;
  return value;
}

export function splitExtensions(input: string | readonly string[]): string[] {
  const parts = typeof input === "string" ? input.split(",") : [...input];
  return parts.filter((part) => part.trim().length > 0).map(normalizeExtension);
}

function withFamilies(extensions: Iterable<string>): Set<string> {
  const set = new Set(extensions);
  if (STEP_FAMILY.some((ext) => set.has(ext))) {
    STEP_FAMILY.forEach((ext) => set.add(ext));
  }
  return set;
}

/**
 * Validates a comma separated selection against the allowed extensions.
 * Selecting either STEP spelling selects both.
 */
export function parseExtensions(input: string | readonly string[], allowed: string | readonly string[]): string[] {
  const allowedSet = withFamilies(splitExtensions(allowed));
  const requested = splitExtensions(input);
  const allowedList = [...allowedSet].map((ext) => ext.slice(1)).sort().join(", ");

  const invalid = requested.filter((ext) => !allowedSet.has(ext));
  if (invalid.length > 0) {
    const names = invalid.map((ext) => ext.slice(1)).sort().join(", ");
    throw new ValidationError(`Invalid extensions: ${names}. Allowed extensions: ${allowedList}.`, { invalid });
  }
  if (requested.length === 0) {
    throw new ValidationError(`No extensions given (allowed: ${allowedList}).`);
  }

  return [...withFamilies(requested)].sort();
}

/** Groups selected extensions so that each STEP spelling counts as one family. */
export function extensionFamilies(extensions: readonly string[]): string[][] {
  const families: string[][] = [];
  const step = extensions.filter((ext) => STEP_FAMILY.includes(ext));
  if (step.length > 0) families.push(step);
  for (const ext of extensions) {
    if (!STEP_FAMILY.includes(ext)) families.push([ext]);
  }
  return families;
}
