import type { DocumentType } from "@/types/document";
import type { PartyKind } from "@/types/party";

export interface DocumentTypeDefinition {
  title: string;
  fileLabel: string;
  numberPrefix: string;
  partyRole: PartyKind;
  partyLabel: string;
  requiresParty: boolean;
  acceptsDeadline: boolean;
}

export const documentTypeDefinitions: Record<DocumentType, DocumentTypeDefinition> = {
  order: {
    title: "Purchase order",
    fileLabel: "Order",
    numberPrefix: "BB-",
    partyRole: "supplier",
    partyLabel: "Ordered from",
    requiresParty: true,
    acceptsDeadline: false,
  },
  quote: {
    title: "Quote",
    fileLabel: "Quote",
    // overridden by BOM_DISPATCH_QUOTE_PREFIX
    numberPrefix: "",
    partyRole: "client",
    partyLabel: "Quoted to",
    requiresParty: true,
    acceptsDeadline: false,
  },
  "quote-request": {
    title: "Request for quotation",
    fileLabel: "QuoteRequest",
    numberPrefix: "OFF-",
    partyRole: "supplier",
    partyLabel: "Requested from",
    requiresParty: false,
    acceptsDeadline: true,
  },
};

export const DEFAULT_FOOTER_NOTE =
  "Please confirm any deviations in writing. Delivery time by agreement. Payment terms: 30 days net. " +
  "Quote our production reference on delivery.";

export const UNMATCHED_MARKER = "NO FILE";
