import { MissingColumnError } from "@/lib/errors";

export interface ColumnSpec<F extends string> {
  field: F;
  column: string;
  required: boolean;
  aliases?: readonly string[];
}

export type ColumnSchema<F extends string> = readonly ColumnSpec<F>[];

export type ColumnMapping<F extends string> = Partial<Record<F, number>>;

export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, "").trim().toLowerCase();
}

/**
 * Maps each schema field to the index of its header, checked once per file.
 * Required fields without a header throw MissingColumnError.
 */
export function resolveColumns<F extends string>(
  headers: readonly string[],
  schema: ColumnSchema<F>,
  source: string | null = null
): ColumnMapping<F> {
  const normalized = headers.map(normalizeHeader);
  const mapping: ColumnMapping<F> = {};

  for (const spec of schema) {
    const names = [spec.column, ...(spec.aliases ?? [])].map(normalizeHeader);
    const index = normalized.findIndex((header) => names.includes(header));
    if (index >= 0) {
      mapping[spec.field] = index;
    } else if (spec.required) {
      throw new MissingColumnError(spec.column, source);
    }
  }

  return mapping;
}

/** Reads the mapped cells of one row; unmapped and empty cells are left out. */
export function readRow<F extends string>(
  row: readonly string[],
  schema: ColumnSchema<F>,
  mapping: ColumnMapping<F>
): Partial<Record<F, string>> {
  const values: Partial<Record<F, string>> = {};
  for (const spec of schema) {
    const index = mapping[spec.field];
    if (index === undefined) continue;
    const cell = (row[index] ?? "").trim();
    if (cell) values[spec.field] = cell;
  }
  return values;
}

export function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.trim() === "");
}
