import { z } from "zod";
import type { ColumnSchema } from "@/lib/columnSchema";
import { ValidationError } from "@/lib/errors";
import type { Client, PartyKind, Supplier } from "@/types/party";

const optionalString = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((value) => {
    if (value == null) return undefined;
    const trimmed = String(value).trim();
    return trimmed.length > 0 ? trimmed : undefined;
  });

const favoriteFlag = z
  .union([z.boolean(), z.string(), z.null(), z.undefined()])
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value !== "string") return false;
    return ["1", "true", "yes", "y", "ja", "x", "*"].includes(value.trim().toLowerCase());
  });

const partyName = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .refine((value) => value.length > 0 && value !== "-", "Party name is required");

export const clientSchema = z.object({
  name: partyName,
  vatNumber: optionalString,
  addressLine1: optionalString,
  addressLine2: optionalString,
  phone: optionalString,
  email: optionalString,
  favorite: favoriteFlag,
});

export const supplierSchema = clientSchema.extend({
  description: optionalString,
});

type PartyField = keyof Supplier;

const partyColumns: ColumnSchema<PartyField> = [
  { field: "name", column: "name", required: true, aliases: ["supplier", "client", "leverancier", "naam", "supplier name"] },
  {
    field: "vatNumber",
    column: "vatNumber",
    required: false,
    aliases: ["vat", "vat number", "vat no", "vat id", "btw", "btw nummer", "btw-nummer", "btw nr"],
  },
  {
    field: "addressLine1",
    column: "addressLine1",
    required: false,
    aliases: ["address", "address 1", "address_1", "adres", "adres 1", "adres_1", "straat"],
  },
  { field: "addressLine2", column: "addressLine2", required: false, aliases: ["address 2", "address_2", "adres 2", "adres_2"] },
  { field: "phone", column: "phone", required: false, aliases: ["tel", "telephone", "phone number", "telefoon"] },
  { field: "email", column: "email", required: false, aliases: ["e-mail", "mail", "sales email", "sales e-mail"] },
  { field: "favorite", column: "favorite", required: false, aliases: ["fav", "favoriet"] },
];

export const clientColumns: ColumnSchema<PartyField> = partyColumns;

export const supplierColumns: ColumnSchema<PartyField> = [
  ...partyColumns.slice(0, 6),
  { field: "description", column: "description", required: false, aliases: ["notes", "omschrijving", "beschrijving"] },
  ...partyColumns.slice(6),
];

export function normalizeSupplier(raw: unknown): Supplier {
  const parsed = supplierSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join(" | "), raw);
  }
  return parsed.data;
}

export function normalizeClient(raw: unknown): Client {
  const parsed = clientSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join(" | "), raw);
  }
  return parsed.data;
}

export function normalizeParty(kind: PartyKind, raw: unknown): Supplier {
  return kind === "supplier" ? normalizeSupplier(raw) : normalizeClient(raw);
}

const VAT_PATTERN = /^[A-Z]{2}[A-Z0-9]{2,12}$/;

/**
 * Normalizes a VAT number to upper case without spaces or dots.
 * Returns undefined when it is not two letters followed by 2-12 alphanumerics
 * containing at least one digit.
 */
export function validateVat(vat: string | null | undefined): string | undefined {
  const value = (vat ?? "").replace(/[\s.]/g, "").toUpperCase();
  if (!VAT_PATTERN.test(value)) return undefined;
  if (!/\d/.test(value.slice(2))) return undefined;
  return value;
}
