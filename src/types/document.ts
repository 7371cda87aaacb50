import type { Party, PartyKind } from "@/types/party";

export type DocumentType = "order" | "quote" | "quote-request";

export const documentTypes: readonly DocumentType[] = ["order", "quote", "quote-request"];

export interface BrandingProfile {
  companyName: string;
  addressLines: string[];
  contactLines: string[];
  vatNumber?: string;
  logoPath?: string;
  primaryColor: string;
  accentColor: string;
}

export interface ProjectInfo {
  number?: string;
  name?: string;
}

export interface DocumentLine {
  index: number;
  partNumber: string;
  description: string;
  material?: string;
  quantity: number;
  productionTag: string;
  finish?: string;
  ralColor?: string;
  area?: string;
  weight?: string;
  matched: boolean;
  fileCount: number;
}

export interface OrderDocument {
  type: DocumentType;
  number: string;
  title: string;
  fileLabel: string;
  date: string;
  issuer: BrandingProfile;
  party?: Party;
  partyRole: PartyKind;
  project: ProjectInfo;
  deadline?: string;
  footerNote?: string;
  lines: DocumentLine[];
}

export interface HeaderField {
  label: string;
  value: string;
}

export interface DocumentTable {
  fields: HeaderField[];
  columns: string[];
  rows: string[][];
  unmatchedRows: number[];
}

export interface RenderedDocument {
  pdfPath: string;
  sheetPath: string;
}
