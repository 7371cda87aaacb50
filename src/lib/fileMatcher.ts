import { promises as fs } from "node:fs";
import path from "node:path";
import * as ExcelJS from "exceljs";
import { NotFoundError, toError } from "@/lib/errors";
import { extensionFamilies } from "@/lib/extensions";
import { matcherLogger } from "@/lib/logger";
import { writeCsvFile } from "@/lib/csv";
import type { BomCheckRow, CopyFailure, LineItem, MatchResult } from "@/types/bom";

export interface SourceFile {
  path: string;
  name: string;
  stem: string;
  ext: string;
}

export interface CopyOutcome {
  results: MatchResult[];
  failures: CopyFailure[];
  copiedCount: number;
}

export interface FlatCopyOutcome {
  copied: string[];
  failures: Array<Pick<CopyFailure, "sourcePath" | "destinationPath" | "error">>;
}

export interface MatchAndCopyOptions {
  sourceDir: string;
  destRoot: string;
  extensions: readonly string[];
  items: readonly LineItem[];
}

export const UNKNOWN_TAG_FOLDER = "_Unknown";

/** Regular files directly inside `dir` whose extension is selected. */
export async function scanSource(dir: string, extensions: readonly string[]): Promise<SourceFile[]> {
  const stat = await fs.stat(dir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new NotFoundError(`Source folder not found: ${dir}`, "folder", dir);
  }

  const selected = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await fs.readdir(dir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => {
      const ext = path.extname(entry.name);
      return {
        path: path.join(dir, entry.name),
        name: entry.name,
        stem: entry.name.slice(0, entry.name.length - ext.length),
        ext: ext.toLowerCase(),
      };
    })
    .filter((file) => selected.has(file.ext))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * One result per item, in item order. A file matches when its stem contains
 * the part number, ignoring case.
 */
export function matchItems(items: readonly LineItem[], files: readonly SourceFile[]): MatchResult[] {
  return items.map((item) => {
    const needle = item.partNumber.toLowerCase();
    return {
      item,
      files: files.filter((file) => file.stem.toLowerCase().includes(needle)).map((file) => file.path),
      copied: [],
      failures: [],
    };
  });
}

/** Folder name for a production tag; never escapes the destination root. */
export function safeTagFolder(tag: string): string {
  const cleaned = Array.from(tag.trim())
    .map((char) => (/[<>:"/\\|?*]/.test(char) || char.charCodeAt(0) < 32 ? "_" : char))
    .join("")
    .trim();
  if (!cleaned || cleaned === "." || cleaned === "..") return UNKNOWN_TAG_FOLDER;
  return cleaned;
}

export async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/** `name.ext`, then `name (1).ext`, `name (2).ext`, ... */
export async function uniquePath(file: string): Promise<string> {
  if (!(await pathExists(file))) return file;
  const ext = path.extname(file);
  const base = file.slice(0, file.length - ext.length);
  for (let index = 1; ; index++) {
    const candidate = `${base} (${index})${ext}`;
    if (!(await pathExists(candidate))) return candidate;
  }
}

/**
 * Copies every matched file into `destRoot/<tag>/`. The tag folder is created
 * even when nothing matched. A failed copy is recorded and the batch goes on.
 */
export async function copyMatches(results: readonly MatchResult[], destRoot: string): Promise<CopyOutcome> {
  const failures: CopyFailure[] = [];
  let copiedCount = 0;

  for (const result of results) {
    const folder = path.join(destRoot, safeTagFolder(result.item.productionTag));
    await fs.mkdir(folder, { recursive: true });

    for (const sourcePath of result.files) {
      let destinationPath = path.join(folder, path.basename(sourcePath));
      try {
        destinationPath = await uniquePath(destinationPath);
        await fs.copyFile(sourcePath, destinationPath);
        result.copied.push(destinationPath);
        copiedCount += 1;
      } catch (error) {
        const failure: CopyFailure = {
          partNumber: result.item.partNumber,
          productionTag: result.item.productionTag,
          sourcePath,
          destinationPath,
          error: toError(error),
        };
        result.failures.push(failure);
        failures.push(failure);
        matcherLogger.warn({ sourcePath, destinationPath, err: failure.error }, "copy failed");
      }
    }
  }

  matcherLogger.info({ destRoot, copied: copiedCount, failed: failures.length }, "copy finished");
  return { results: [...results], failures, copiedCount };
}

/** Copies every selected source file straight into `dest`, without a BOM. */
export async function copyFlat(sourceDir: string, dest: string, extensions: readonly string[]): Promise<FlatCopyOutcome> {
  const files = await scanSource(sourceDir, extensions);
  const stat = await fs.stat(dest).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new NotFoundError(`Destination folder not found: ${dest}`, "folder", dest);
  }

  const outcome: FlatCopyOutcome = { copied: [], failures: [] };
  for (const file of files) {
    let destinationPath = path.join(dest, file.name);
    try {
      destinationPath = await uniquePath(destinationPath);
      await fs.copyFile(file.path, destinationPath);
      outcome.copied.push(destinationPath);
    } catch (error) {
      const failure = { sourcePath: file.path, destinationPath, error: toError(error) };
      outcome.failures.push(failure);
      matcherLogger.warn({ sourcePath: file.path, destinationPath, err: failure.error }, "copy failed");
    }
  }

  matcherLogger.info({ dest, copied: outcome.copied.length, failed: outcome.failures.length }, "flat copy finished");
  return outcome;
}

export async function matchAndCopy(options: MatchAndCopyOptions): Promise<CopyOutcome> {
  const files = await scanSource(options.sourceDir, options.extensions);
  const results = matchItems(options.items, files);
  matcherLogger.debug(
    { files: files.length, items: results.length, unmatched: results.filter((result) => result.files.length === 0).length },
    "items matched"
  );
  await fs.mkdir(options.destRoot, { recursive: true });
  return copyMatches(results, options.destRoot);
}

/**
 * Reports, without copying, which extensions were found per item. An item is
 * `found` when every selected extension family has at least one file.
 */
export async function checkBom(
  items: readonly LineItem[],
  sourceDir: string,
  extensions: readonly string[]
): Promise<BomCheckRow[]> {
  const files = await scanSource(sourceDir, extensions);
  const families = extensionFamilies(extensions);

  return matchItems(items, files).map((result): BomCheckRow => {
    const found = new Set(result.files.map((file) => path.extname(file).toLowerCase()));
    const complete = families.every((family) => family.some((ext) => found.has(ext)));
    return {
      item: result.item,
      foundExtensions: [...found].map((ext) => ext.slice(1)).sort(),
      status: complete ? "found" : "missing",
    };
  });
}

const CHECK_COLUMNS = ["PartNumber", "Description", "Production", "Quantity", "Files found", "Status"];

function checkRowCells(row: BomCheckRow): string[] {
  return [
    row.item.partNumber,
    row.item.description,
    row.item.productionTag,
    String(row.item.quantity),
    row.foundExtensions.join(", "),
    row.status,
  ];
}

export async function writeCheckReport(file: string, rows: readonly BomCheckRow[]): Promise<void> {
  if (path.extname(file).toLowerCase() !== ".xlsx") {
    await writeCsvFile(file, CHECK_COLUMNS, rows.map(checkRowCells));
    return;
  }

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Check");
  sheet.addRow(CHECK_COLUMNS).font = { bold: true };
  rows.forEach((row) => sheet.addRow(checkRowCells(row)));
  await workbook.xlsx.writeFile(file);
}
