import { promises as fs } from "node:fs";
import path from "node:path";
import { documentTypeDefinitions } from "@/config/documentTypes";
import type { DocumentCounter } from "@/lib/documentCounter";
import { RenderError, ValidationError } from "@/lib/errors";
import { pathExists } from "@/lib/fileMatcher";
import { documentLogger } from "@/lib/logger";
import { renderPdf } from "@/lib/renderPdf";
import { renderSheet } from "@/lib/renderSheet";
import type { MatchResult } from "@/types/bom";
import type {
  BrandingProfile,
  DocumentType,
  OrderDocument,
  ProjectInfo,
  RenderedDocument,
} from "@/types/document";
import type { Party } from "@/types/party";

export { documentRows } from "@/lib/documentRows";

export interface NumberingOptions {
  quotePrefix?: string;
}

export interface BuildDocumentInput {
  type: DocumentType;
  number: string;
  issuer: BrandingProfile;
  party?: Party;
  project?: ProjectInfo;
  deadline?: string;
  footerNote?: string;
  results: readonly MatchResult[];
  date: Date;
}

export function documentNumberPrefix(type: DocumentType, options: NumberingOptions = {}): string {
  if (type === "quote") return options.quotePrefix ?? documentTypeDefinitions.quote.numberPrefix;
  return documentTypeDefinitions[type].numberPrefix;
}

/**
 * `BB-` + `1234` gives `BB-1234`; a suffix that already starts with the
 * prefix is not prefixed twice. Counter values are padded to four digits.
 */
export function formatDocumentNumber(type: DocumentType, suffix: string | number, options: NumberingOptions = {}): string {
  const prefix = documentNumberPrefix(type, options);
  let text = typeof suffix === "number" ? String(suffix).padStart(4, "0") : suffix.trim();
  if (prefix && text.toUpperCase().startsWith(prefix.toUpperCase())) {
    text = text.slice(prefix.length);
  }
  return `${prefix}${text}`;
}

/** Uses the requested suffix when given, otherwise the next counter value. */
export async function assignDocumentNumber(
  type: DocumentType,
  counter: DocumentCounter,
  requested?: string,
  options: NumberingOptions = {}
): Promise<string> {
  if (requested && requested.trim()) return formatDocumentNumber(type, requested, options);
  return formatDocumentNumber(type, await counter.next(type), options);
}

export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/** Accepts `YYYY-MM-DD` naming a real calendar day and returns it unchanged. */
export function validateDeadline(value: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (match) {
    const [year, month, day] = match.slice(1).map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
      return value.trim();
    }
  }
  throw new ValidationError(`Invalid deadline '${value}'; use YYYY-MM-DD`, { deadline: value });
}

export function buildDocument(input: BuildDocumentInput): OrderDocument {
  const definition = documentTypeDefinitions[input.type];

  if (definition.requiresParty && !input.party) {
    throw new RenderError(`A ${definition.title.toLowerCase()} needs a ${definition.partyRole}`, input.type);
  }

  let deadline: string | undefined;
  if (input.deadline) {
    if (definition.acceptsDeadline) {
      deadline = input.deadline;
    } else {
      documentLogger.warn({ type: input.type, deadline: input.deadline }, "deadline ignored for this document type");
    }
  }

  return {
    type: input.type,
    number: input.number,
    title: definition.title,
    fileLabel: definition.fileLabel,
    date: formatDate(input.date),
    issuer: input.issuer,
    party: input.party,
    partyRole: definition.partyRole,
    project: { ...input.project },
    deadline,
    footerNote: input.type === "order" ? input.footerNote : undefined,
    lines: input.results.map((result, index) => ({
      index: index + 1,
      partNumber: result.item.partNumber,
      description: result.item.description,
      material: result.item.material,
      quantity: result.item.quantity,
      productionTag: result.item.productionTag,
      finish: result.item.finish,
      ralColor: result.item.ralColor,
      area: result.item.area,
      weight: result.item.weight,
      matched: result.files.length > 0,
      fileCount: result.files.length,
    })),
  };
}

export function documentFileName(document: OrderDocument, extension: string): string {
  const number = document.number.replace(/[^a-zA-Z0-9_-]/g, "_");
  return `${document.fileLabel}_${number}_${document.date}${extension}`;
}

/** The first of `name`, `name (1)`, ... that is free for both the PDF and the sheet. */
async function freeDocumentPaths(document: OrderDocument, dir: string): Promise<RenderedDocument> {
  const stem = documentFileName(document, "");
  for (let index = 0; ; index++) {
    const name = index === 0 ? stem : `${stem} (${index})`;
    const pdfPath = path.join(dir, `${name}.pdf`);
    const sheetPath = path.join(dir, `${name}.xlsx`);
    if (!(await pathExists(pdfPath)) && !(await pathExists(sheetPath))) return { pdfPath, sheetPath };
  }
}

/** Writes the PDF and the sheet side by side; existing files are never replaced. */
export async function writeDocument(document: OrderDocument, dir: string): Promise<RenderedDocument> {
  await fs.mkdir(dir, { recursive: true });
  const { pdfPath, sheetPath } = await freeDocumentPaths(document, dir);

  await fs.writeFile(pdfPath, await renderPdf(document), { flag: "wx" });
  await fs.writeFile(sheetPath, await renderSheet(document), { flag: "wx" });

  documentLogger.info({ type: document.type, number: document.number, pdfPath, sheetPath }, "document written");
  return { pdfPath, sheetPath };
}
