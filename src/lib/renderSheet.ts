import * as ExcelJS from "exceljs";
import { documentRows } from "@/lib/documentRows";
import type { OrderDocument } from "@/types/document";

/**
 * Header fields in columns A/B from A1, one blank row, then the item table.
 */
export async function renderSheet(document: OrderDocument): Promise<Buffer> {
  const table = documentRows(document);
  const workbook = new ExcelJS.Workbook();
  workbook.creator = document.issuer.companyName;
  const sheet = workbook.addWorksheet(document.fileLabel);

  table.fields.forEach((field) => {
    const row = sheet.addRow([field.label, field.value]);
    row.getCell(1).font = { bold: true };
  });
  sheet.addRow([]);

  sheet.addRow(table.columns).font = { bold: true };
  table.rows.forEach((cells) => sheet.addRow(cells));

  sheet.getColumn(1).width = 18;
  sheet.getColumn(2).width = 22;
  sheet.getColumn(3).width = 36;

  return Buffer.from(await workbook.xlsx.writeBuffer());
}
