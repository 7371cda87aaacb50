export type PartyKind = "supplier" | "client";

export interface Party {
  name: string;
  vatNumber?: string;
  addressLine1?: string;
  addressLine2?: string;
  phone?: string;
  email?: string;
  favorite: boolean;
}

export interface Supplier extends Party {
  description?: string;
}

export type Client = Party;

/** Field values applied to every imported row that leaves them empty. */
export type PartyDefaults = Partial<Pick<Supplier, "vatNumber" | "addressLine1" | "addressLine2" | "phone" | "email" | "description">>;

export interface CsvImportSummary {
  applied: number;
  skipped: number;
}
