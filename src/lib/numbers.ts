/**
 * Parses numbers written with either decimal convention: `1.234,56`,
 * `2,500.75` and `1,5` all come out as expected. Returns null when nothing
 * numeric remains.
 */
export function normalizeNumber(value: unknown): number | null {
  if (value == null) return null;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (!/^[-+]?[\d.,\s]+$/.test(trimmed)) {
    return null;
  }

  const cleaned = trimmed.replace(/\s/g, "");
  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");
  let normalised = cleaned;

  if (lastComma > -1 && lastComma > lastDot) {
    normalised = cleaned.replace(/\./g, "").replace(/,/g, ".");
  } else {
    normalised = cleaned.replace(/,/g, "");
  }

  const parsed = Number(normalised);
  return Number.isFinite(parsed) ? parsed : null;
}

export function formatNumber(value: number | null | undefined): string {
  if (value == null) return "";
  return Number(value).toLocaleString("en-US", { minimumFractionDigits: 0, maximumFractionDigits: 2 });
}

/** Two decimals for numeric text, anything else unchanged. */
export function formatDecimal(value: string | undefined): string {
  if (!value) return "";
  const parsed = normalizeNumber(value);
  return parsed == null ? value : parsed.toFixed(2);
}
