import path from "node:path";
import * as ExcelJS from "exceljs";
import { isBlankRow, readRow, resolveColumns, type ColumnSchema } from "@/lib/columnSchema";
import { parseCsvText, readCsvFile } from "@/lib/csv";
import { BomParseError, ValidationError } from "@/lib/errors";
import { bomLogger } from "@/lib/logger";
import { normalizeNumber } from "@/lib/numbers";
import type { BomFormat, LineItem } from "@/types/bom";

type BomField = keyof LineItem;

export const bomColumns: ColumnSchema<BomField> = [
  { field: "partNumber", column: "PartNumber", required: true, aliases: ["Part Number", "Part", "PN", "Artikelnummer"] },
  { field: "quantity", column: "Quantity", required: true, aliases: ["Qty", "Qty.", "Aantal", "Stuks"] },
  { field: "productionTag", column: "Production", required: true, aliases: ["Productie", "Group", "Tag"] },
  { field: "description", column: "Description", required: false, aliases: ["Omschrijving", "Beschrijving"] },
  { field: "material", column: "Material", required: false, aliases: ["Materiaal", "Grade"] },
  { field: "finish", column: "Finish", required: false },
  { field: "ralColor", column: "RAL color", required: false, aliases: ["RAL colour"] },
  { field: "area", column: "Area", required: false, aliases: ["Oppervlakte", "Area (m2)", "Oppervlakte (m2)"] },
  { field: "weight", column: "Weight", required: false, aliases: ["Gewicht", "Weight (kg)", "Gewicht (kg)"] },
];

const DELIMITED_EXTENSIONS = new Set([".csv", ".txt", ".tsv"]);

export function detectBomFormat(file: string): BomFormat {
  const ext = path.extname(file).toLowerCase();
  if (DELIMITED_EXTENSIONS.has(ext)) return "delimited";
  if (ext === ".xlsx") return "spreadsheet";
  throw new ValidationError(`Unsupported BOM format '${ext || file}'; use .csv, .tsv, .txt or .xlsx`, { file });
}

/**
 * Turns a header row plus data rows into line items, in row order.
 * Blank rows are skipped; row numbers in errors count data rows from 1.
 */
export function parseBomRows(headers: readonly string[], rows: readonly string[][], source: string | null = null): LineItem[] {
  const mapping = resolveColumns(headers, bomColumns, source);
  const items: LineItem[] = [];

  rows.forEach((row, index) => {
    if (isBlankRow(row)) return;
    const rowNumber = index + 1;
    const values = readRow(row, bomColumns, mapping);

    if (!values.partNumber) {
      throw new BomParseError(rowNumber, "PartNumber", "", "is required");
    }
    if (!values.productionTag) {
      throw new BomParseError(rowNumber, "Production", "", "is required");
    }

    const rawQuantity = values.quantity ?? "";
    const quantity = normalizeNumber(rawQuantity);
    if (quantity == null) {
      throw new BomParseError(rowNumber, "Quantity", rawQuantity, "is not a number");
    }
    if (quantity <= 0) {
      throw new BomParseError(rowNumber, "Quantity", rawQuantity, "must be positive");
    }

    items.push({
      partNumber: values.partNumber,
      description: values.description ?? values.partNumber,
      material: values.material,
      quantity,
      productionTag: values.productionTag,
      finish: values.finish,
      ralColor: values.ralColor,
      area: values.area,
      weight: values.weight,
    });
  });

  return items;
}

/** Parses delimited text, e.g. rows pasted from a spreadsheet (tab separated). */
export function parseBomText(text: string, source: string | null = null): LineItem[] {
  const table = parseCsvText(text);
  return parseBomRows(table.headers, table.rows, source);
}

export async function readBom(file: string): Promise<LineItem[]> {
  const format = detectBomFormat(file);
  const source = path.basename(file);
  const table = format === "delimited" ? await readCsvFile(file) : await readWorksheet(file);
  const items = parseBomRows(table.headers, table.rows, source);
  bomLogger.info({ file, format, items: items.length }, "BOM loaded");
  return items;
}

async function readWorksheet(file: string): Promise<{ headers: string[]; rows: string[][] }> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new ValidationError(`Workbook ${path.basename(file)} has no sheets`, { file });
  }

  const columnCount = sheet.columnCount;
  const records: string[][] = [];
  for (let rowIndex = 1; rowIndex <= sheet.rowCount; rowIndex++) {
    const row = sheet.getRow(rowIndex);
    const cells: string[] = [];
    for (let column = 1; column <= columnCount; column++) {
      cells.push(cellText(row.getCell(column).value));
    }
    records.push(cells);
  }

  const [headers = [], ...rows] = records;
  return { headers, rows };
}

export function cellText(value: ExcelJS.CellValue): string {
  if (value == null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if ("richText" in value) return value.richText.map((run) => run.text).join("");
  if ("hyperlink" in value) return value.text;
  if ("formula" in value || "sharedFormula" in value) {
    const result = value.result;
    if (result == null || typeof result === "object") return result instanceof Date ? cellText(result) : "";
    return String(result);
  }
  return "";
}
