export type BomFormat = "delimited" | "spreadsheet";

export interface LineItem {
  partNumber: string;
  description: string;
  material?: string;
  quantity: number;
  productionTag: string;
  finish?: string;
  ralColor?: string;
  area?: string;
  weight?: string;
}

export interface CopyFailure {
  partNumber: string;
  productionTag: string;
  sourcePath: string;
  destinationPath: string;
  error: Error;
}

export interface MatchResult {
  item: LineItem;
  files: string[];
  copied: string[];
  failures: CopyFailure[];
}

export type CheckStatus = "found" | "missing";

export interface BomCheckRow {
  item: LineItem;
  foundExtensions: string[];
  status: CheckStatus;
}
