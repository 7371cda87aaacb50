import path from "node:path";
import { DEFAULT_FOOTER_NOTE, documentTypeDefinitions } from "@/config/documentTypes";
import { readBom } from "@/lib/bomReader";
import { assignDocumentNumber, buildDocument, formatDate, validateDeadline, writeDocument } from "@/lib/documentBuilder";
import { NotFoundError, RenderError, ValidationError } from "@/lib/errors";
import { parseExtensions } from "@/lib/extensions";
import { matchAndCopy, pathExists, safeTagFolder } from "@/lib/fileMatcher";
import type { RunContext } from "@/lib/runContext";
import type { CopyFailure, LineItem, MatchResult } from "@/types/bom";
import type { DocumentType, OrderDocument, ProjectInfo, RenderedDocument } from "@/types/document";
import type { Party } from "@/types/party";

export interface CopyPerProductionOptions {
  sourceDir: string;
  dest: string;
  /** BOM file; ignored when `items` is given */
  bom?: string;
  items?: LineItem[];
  extensions: string | readonly string[];
  docType?: DocumentType;
  docNumber?: string;
  supplier?: string;
  /** Per production tag supplier names; with `rememberDefaults` they replace the stored defaults */
  supplierFor?: Record<string, string>;
  client?: string;
  project?: ProjectInfo;
  deadline?: string;
  note?: string;
  bundle?: boolean;
  rememberDefaults?: boolean;
}

export interface CopyPerProductionResult {
  outputRoot: string;
  results: MatchResult[];
  failures: CopyFailure[];
  copiedCount: number;
  document: OrderDocument;
  files: RenderedDocument;
}

export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** 0 → A, 25 → Z, 26 → AA */
function letterSuffix(index: number): string {
  let remaining = index;
  let suffix = "";
  do {
    suffix = String.fromCharCode(65 + (remaining % 26)) + suffix;
    remaining = Math.floor(remaining / 26) - 1;
  } while (remaining >= 0);
  return suffix;
}

/**
 * `<date>_<project number or "project">[_<slug>]` under `dest`; when taken,
 * `-A`, `-B`, ... is appended.
 */
export async function bundleDirectory(dest: string, project: ProjectInfo, date: Date): Promise<string> {
  const parts = [formatDate(date), project.number ? safeTagFolder(project.number) : "project"];
  const slug = project.name ? slugify(project.name) : "";
  if (slug) parts.push(slug);

  const base = path.join(dest, parts.join("_"));
  if (!(await pathExists(base))) return base;
  for (let index = 0; ; index++) {
    const candidate = `${base}-${letterSuffix(index)}`;
    if (!(await pathExists(candidate))) return candidate;
  }
}

function productionTags(items: readonly LineItem[]): string[] {
  return [...new Set(items.map((item) => item.productionTag))];
}

function requireSupplier(ctx: RunContext, name: string): Party {
  const supplier = ctx.suppliers.get(name);
  if (!supplier) throw new NotFoundError(`Supplier '${name}' not found`, "supplier", name);
  return supplier;
}

/**
 * Without an explicit supplier every production tag resolves through its
 * override or stored default, and all of them must agree.
 */
function resolveParty(ctx: RunContext, type: DocumentType, options: CopyPerProductionOptions, items: readonly LineItem[]): Party | undefined {
  if (documentTypeDefinitions[type].partyRole === "client") {
    if (!options.client) return undefined;
    const client = ctx.clients.get(options.client);
    if (!client) throw new NotFoundError(`Client '${options.client}' not found`, "client", options.client);
    return client;
  }

  const overrides = options.supplierFor ?? {};
  for (const name of Object.values(overrides)) requireSupplier(ctx, name);
  if (options.supplier) return requireSupplier(ctx, options.supplier);

  const byTag = new Map<string, Party>();
  for (const tag of productionTags(items)) {
    const override = overrides[tag];
    if (override) {
      byTag.set(tag, requireSupplier(ctx, override));
      continue;
    }
    const defaultName = ctx.suppliers.getDefault(tag);
    if (!defaultName) continue;
    const supplier = ctx.suppliers.get(defaultName);
    if (supplier) {
      byTag.set(tag, supplier);
    } else {
      ctx.logger.warn({ productionTag: tag, supplier: defaultName }, "default supplier no longer exists");
    }
  }

  const distinct = new Set([...byTag.values()].map((supplier) => supplier.name));
  if (distinct.size > 1) {
    const listing = [...byTag].map(([tag, supplier]) => `${tag}: ${supplier.name}`).join(", ");
    throw new ValidationError(`Production tags map to different suppliers (${listing}); pass --supplier`);
  }
  return byTag.values().next().value;
}

/** Explicit per-tag choices replace stored defaults; other tags only get one when they have none. */
async function rememberSupplierDefaults(ctx: RunContext, party: Party, options: CopyPerProductionOptions, items: readonly LineItem[]): Promise<void> {
  const overrides = options.supplierFor ?? {};
  for (const tag of productionTags(items)) {
    const override = overrides[tag];
    if (override) {
      ctx.suppliers.setDefault(tag, override);
    } else if (!ctx.suppliers.getDefault(tag)) {
      ctx.suppliers.setDefault(tag, party.name);
    }
  }
  await ctx.suppliers.save();
}

/**
 * Reads the BOM, copies the matched drawings into one folder per production
 * tag and writes the document for the run into the output root.
 */
export async function copyPerProduction(ctx: RunContext, options: CopyPerProductionOptions): Promise<CopyPerProductionResult> {
  const type = options.docType ?? "order";
  const definition = documentTypeDefinitions[type];

  let items: LineItem[];
  if (options.items) {
    items = options.items;
  } else if (options.bom) {
    items = await readBom(options.bom);
  } else {
    throw new ValidationError("No BOM given");
  }

  const extensions = parseExtensions(options.extensions, ctx.env.BOM_DISPATCH_ALLOWED_EXTS);
  const deadline = options.deadline ? validateDeadline(options.deadline) : undefined;
  const project = options.project ?? {};

  const party = resolveParty(ctx, type, options, items);
  if (definition.requiresParty && !party) {
    throw new RenderError(`A ${definition.title.toLowerCase()} needs a ${definition.partyRole}`, type);
  }

  const now = ctx.now();
  const outputRoot = options.bundle ? await bundleDirectory(options.dest, project, now) : path.resolve(options.dest);

  const outcome = await matchAndCopy({ sourceDir: options.sourceDir, destRoot: outputRoot, extensions, items });

  if (options.rememberDefaults && party && definition.partyRole === "supplier") {
    await rememberSupplierDefaults(ctx, party, options, items);
  }

  const number = await assignDocumentNumber(type, ctx.counter, options.docNumber, {
    quotePrefix: ctx.env.BOM_DISPATCH_QUOTE_PREFIX,
  });
  const document = buildDocument({
    type,
    number,
    issuer: ctx.branding,
    party,
    project,
    deadline,
    footerNote: options.note ?? ctx.env.BOM_DISPATCH_FOOTER_NOTE ?? DEFAULT_FOOTER_NOTE,
    results: outcome.results,
    date: now,
  });
  const files = await writeDocument(document, outputRoot);

  ctx.logger.info(
    { outputRoot, type, number, copied: outcome.copiedCount, failed: outcome.failures.length },
    "copy per production finished"
  );

  return {
    outputRoot,
    results: outcome.results,
    failures: outcome.failures,
    copiedCount: outcome.copiedCount,
    document,
    files,
  };
}
