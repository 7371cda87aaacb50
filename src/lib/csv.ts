import { promises as fs } from "node:fs";
import { parse } from "csv-parse/sync";
import { writeToString } from "fast-csv";

export interface CsvTable {
  headers: string[];
  rows: string[][];
  delimiter: string;
}

const DELIMITER_CANDIDATES = [",", ";", "\t", "|"] as const;

/** Picks the candidate that occurs most often in the header line. */
export function sniffDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/).find((line) => line.trim().length > 0) ?? "";
  let best: string = DELIMITER_CANDIDATES[0];
  let bestCount = 0;
  for (const candidate of DELIMITER_CANDIDATES) {
    const count = firstLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

export function parseCsvText(text: string, delimiter = sniffDelimiter(text)): CsvTable {
  const records: string[][] = parse(text, {
    delimiter,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: false,
  });
  const [headers = [], ...rows] = records;
  return { headers, rows, delimiter };
}

/**
 * Exports from spreadsheet tools are often Windows-1252; fall back to latin1
 * when the bytes are not valid UTF-8.
 */
export function decodeText(buffer: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    return buffer.toString("latin1");
  }
}

export async function readCsvFile(file: string): Promise<CsvTable> {
  return parseCsvText(decodeText(await fs.readFile(file)));
}

export async function writeCsvFile(file: string, headers: string[], rows: string[][]): Promise<void> {
  const body = await writeToString([headers, ...rows], { headers: false, includeEndRowDelimiter: true });
  await fs.writeFile(file, body, "utf8");
}
