import { promises as fs } from "node:fs";
import PDFDocument from "pdfkit";
import { documentTypeDefinitions } from "@/config/documentTypes";
import { documentRows } from "@/lib/documentRows";
import { RenderError, toError } from "@/lib/errors";
import { documentLogger } from "@/lib/logger";
import type { BrandingProfile, DocumentTable, OrderDocument } from "@/types/document";

// Relative column widths; unknown columns get DEFAULT_WEIGHT.
const COLUMN_WEIGHTS: Record<string, number> = {
  "#": 6,
  "Part number": 17,
  Description: 29,
  Material: 13,
  Qty: 8,
  Production: 14,
  Files: 13,
};
const DEFAULT_WEIGHT = 11;
const RIGHT_ALIGNED = new Set(["Qty", "Files", "Area (m2)", "Weight (kg)"]);
const UNMATCHED_FILL = "#fde8e8";

export async function renderPdf(document: OrderDocument): Promise<Buffer> {
  const logo = await loadLogo(document.issuer);
  const table = documentRows(document);

  return new Promise<Buffer>((resolve, reject) => {
    try {
      const doc = new PDFDocument({ size: "A4", margin: 50, compress: false });
      const buffers: Buffer[] = [];
      doc.on("data", (chunk: Buffer) => buffers.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(buffers)));
      doc.on("error", reject);

      drawHeader(doc, document, logo);
      drawKeyDetails(doc, table);
      drawPartySection(doc, document);
      drawItemsTable(doc, table);
      drawFooterNote(doc, document);

      doc.end();
    } catch (error) {
      reject(new RenderError(`Could not render ${document.number}: ${toError(error).message}`, document.type));
    }
  });
}

async function loadLogo(brand: BrandingProfile): Promise<Buffer | null> {
  if (!brand.logoPath) return null;
  try {
    return await fs.readFile(brand.logoPath);
  } catch (error) {
    documentLogger.warn({ logoPath: brand.logoPath, err: toError(error) }, "no logo available");
    return null;
  }
}

function drawHeader(doc: PDFKit.PDFDocument, document: OrderDocument, logo: Buffer | null) {
  const brand = document.issuer;
  const headerY = doc.y;
  doc.fillColor(brand.primaryColor).fontSize(20).text(brand.companyName);

  if (logo) {
    doc.image(logo, doc.page.width - 160, headerY - 20, { fit: [110, 60], align: "right" });
  }

  doc.moveDown(0.5);
  doc.fontSize(10).fillColor("#4b5563");
  brand.addressLines.forEach((line) => doc.text(line));
  brand.contactLines.forEach((line) => doc.text(line));
  if (brand.vatNumber) doc.text(`VAT: ${brand.vatNumber}`);

  doc.moveDown(0.8);
  doc.fillColor(brand.accentColor).fontSize(16).text(`${document.title} ${document.number}`);
  doc.fillColor("#111827");
}

function drawKeyDetails(doc: PDFKit.PDFDocument, table: DocumentTable) {
  const marginLeft = doc.page.margins?.left ?? 72;
  const marginRight = doc.page.margins?.right ?? 72;
  const availableWidth = doc.page.width - marginLeft - marginRight;
  const columnCount = 2;
  const gap = 18;
  const boxWidth = (availableWidth - gap) / columnCount;

  let cursorY = doc.y + 12;

  for (let index = 0; index < table.fields.length; index += columnCount) {
    const rowFields = table.fields.slice(index, index + columnCount);
    let rowHeight = 0;

    rowFields.forEach((field, column) => {
      const x = marginLeft + column * (boxWidth + gap);
      const valueText = field.value.trim() ? field.value : "-";
      const valueHeight = doc.heightOfString(valueText, { width: boxWidth - 16 });
      const boxHeight = Math.max(32, valueHeight + 20);
      rowHeight = Math.max(rowHeight, boxHeight);

      doc.lineWidth(0.5).strokeColor("#d1d5db").rect(x, cursorY, boxWidth, boxHeight).stroke();
      doc.fontSize(9).fillColor("#6b7280").text(field.label.toUpperCase(), x + 8, cursorY + 6, { width: boxWidth - 16 });
      doc.fontSize(10).fillColor("#1f2937").text(valueText, x + 8, cursorY + 18, { width: boxWidth - 16 });
    });

    cursorY += rowHeight + 8;
  }

  doc.y = cursorY;
  doc.x = marginLeft;
  doc.fillColor("#111827");
}

function drawPartySection(doc: PDFKit.PDFDocument, document: OrderDocument) {
  const party = document.party;
  const marginLeft = doc.page.margins?.left ?? 72;

  doc.moveDown(0.5);
  doc.x = marginLeft;
  doc.fontSize(12).fillColor("#111827").text(documentTypeDefinitions[document.type].partyLabel, { underline: true });

  doc.fontSize(10).fillColor("#374151");
  if (!party) {
    doc.text("No party selected");
    return;
  }

  const lines = [party.name];
  if (party.addressLine1) lines.push(party.addressLine1);
  if (party.addressLine2) lines.push(party.addressLine2);
  if (party.vatNumber) lines.push(`VAT: ${party.vatNumber}`);
  if (party.email) lines.push(`Email: ${party.email}`);
  if (party.phone) lines.push(`Tel: ${party.phone}`);
  lines.forEach((line) => doc.text(line));
}

function drawItemsTable(doc: PDFKit.PDFDocument, table: DocumentTable) {
  const marginLeft = doc.page.margins?.left ?? 72;
  const marginRight = doc.page.margins?.right ?? 72;
  const tableWidth = doc.page.width - marginLeft - marginRight;
  const weights = table.columns.map((column) => COLUMN_WEIGHTS[column] ?? DEFAULT_WEIGHT);
  const totalWeight = weights.reduce((sum, weight) => sum + weight, 0);
  const widths = weights.map((weight) => (weight / totalWeight) * tableWidth);
  const offsets = widths.map((_, column) => widths.slice(0, column).reduce((sum, width) => sum + width, 0));
  const unmatched = new Set(table.unmatchedRows);

  doc.moveDown(1);
  let cursorY = doc.y;

  const drawCells = (cells: readonly string[], top: number) => {
    cells.forEach((cell, column) => {
      doc.text(cell, marginLeft + offsets[column] + 4, top, {
        width: widths[column] - 8,
        align: RIGHT_ALIGNED.has(table.columns[column]) ? "right" : "left",
      });
    });
  };

  const drawHeaderRow = () => {
    doc.lineWidth(0.5).fillColor("#e2e8f0").rect(marginLeft, cursorY, tableWidth, 22).fill();
    doc.strokeColor("#cbd5e1").rect(marginLeft, cursorY, tableWidth, 22).stroke();
    doc.fontSize(9).fillColor("#1f2937");
    drawCells(table.columns, cursorY + 6);
    cursorY += 22;
  };

  const ensureRowFits = (rowHeight: number) => {
    const bottomMargin = doc.page.margins?.bottom ?? 72;
    if (cursorY + rowHeight > doc.page.height - bottomMargin) {
      doc.addPage();
      cursorY = doc.y;
      drawHeaderRow();
    }
  };

  drawHeaderRow();

  table.rows.forEach((cells, index) => {
    doc.fontSize(9);
    const cellHeights = cells.map((cell, column) => doc.heightOfString(cell, { width: widths[column] - 8 }));
    const rowHeight = Math.max(20, ...cellHeights.map((height) => height + 10));

    ensureRowFits(rowHeight);

    if (unmatched.has(index)) {
      doc.fillColor(UNMATCHED_FILL).rect(marginLeft, cursorY, tableWidth, rowHeight).fill();
    }
    doc.fillColor(unmatched.has(index) ? "#b91c1c" : "#1f2937");
    drawCells(cells, cursorY + 5);

    cursorY += rowHeight;
    doc
      .moveTo(marginLeft, cursorY)
      .lineTo(marginLeft + tableWidth, cursorY)
      .strokeColor("#e5e7eb")
      .stroke();
  });

  doc.y = cursorY + 6;
  doc.x = marginLeft;
  doc.fillColor("#111827");
}

function drawFooterNote(doc: PDFKit.PDFDocument, document: OrderDocument) {
  if (!document.footerNote) return;
  const marginLeft = doc.page.margins?.left ?? 72;
  const marginRight = doc.page.margins?.right ?? 72;

  doc.moveDown(1);
  doc.x = marginLeft;
  doc.fontSize(9).fillColor("#374151").text(document.footerNote, { width: doc.page.width - marginLeft - marginRight });
  doc.fillColor("#111827");
}
