import { documentTypeDefinitions, UNMATCHED_MARKER } from "@/config/documentTypes";
import { formatDecimal, formatNumber } from "@/lib/numbers";
import type { DocumentLine, DocumentTable, HeaderField, OrderDocument } from "@/types/document";

export const DOCUMENT_COLUMNS = ["#", "Part number", "Description", "Material", "Qty", "Production", "Files"];

interface OptionalColumn {
  column: string;
  value: (line: DocumentLine) => string;
}

// Appended only when at least one line has a value.
const OPTIONAL_COLUMNS: OptionalColumn[] = [
  { column: "Finish", value: (line) => line.finish ?? "" },
  { column: "RAL color", value: (line) => line.ralColor ?? "" },
  { column: "Area (m2)", value: (line) => formatDecimal(line.area) },
  { column: "Weight (kg)", value: (line) => formatDecimal(line.weight) },
];

/** Header fields and item rows shared by the PDF and the spreadsheet. */
export function documentRows(document: OrderDocument): DocumentTable {
  const fields: HeaderField[] = [
    { label: "Document number", value: document.number },
    { label: "Date", value: document.date },
    { label: "Project number", value: document.project.number ?? "" },
    { label: "Project name", value: document.project.name ?? "" },
  ];
  if (document.type === "quote-request" && document.deadline) {
    fields.push({ label: "Reply deadline", value: document.deadline });
  }
  fields.push({ label: documentTypeDefinitions[document.type].partyLabel, value: document.party?.name ?? "" });

  const extras = OPTIONAL_COLUMNS.filter((optional) => document.lines.some((line) => optional.value(line) !== ""));

  const rows = document.lines.map((line) => [
    String(line.index),
    line.partNumber,
    line.description,
    line.material ?? "",
    formatNumber(line.quantity),
    line.productionTag,
    line.matched ? String(line.fileCount) : UNMATCHED_MARKER,
    ...extras.map((optional) => optional.value(line)),
  ]);

  const unmatchedRows = document.lines.flatMap((line, index) => (line.matched ? [] : [index]));

  return { fields, columns: [...DOCUMENT_COLUMNS, ...extras.map((optional) => optional.column)], rows, unmatchedRows };
}

