import { promises as fs } from "node:fs";
import path from "node:path";
import { isBlankRow, readRow, resolveColumns, type ColumnSchema } from "@/lib/columnSchema";
import { readCsvFile, writeCsvFile } from "@/lib/csv";
import { CsvImportError, DuplicateKeyError, NotFoundError, StoreLoadError, toError } from "@/lib/errors";
import { storeLogger } from "@/lib/logger";
import { clientColumns, normalizeClient, normalizeSupplier, supplierColumns, validateVat } from "@/lib/partySchema";
import type { Client, CsvImportSummary, Party, PartyDefaults, PartyKind, Supplier } from "@/types/party";

export const SUPPLIERS_FILE = "suppliers.json";
export const CLIENTS_FILE = "clients.json";

type Normalizer<T extends Party> = (raw: unknown) => T;

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function byFavoriteThenName(a: Party, b: Party): number {
  if (a.favorite !== b.favorite) return a.favorite ? -1 : 1;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

/**
 * A flat party collection held in memory and written back as a whole.
 * Names are unique case-insensitively.
 */
export abstract class PartyStore<T extends Party> {
  protected records: T[];

  protected constructor(
    readonly kind: PartyKind,
    readonly file: string,
    records: T[],
    private readonly normalize: Normalizer<T>,
    private readonly columns: ColumnSchema<keyof Supplier>
  ) {
    this.records = records;
  }

  get size(): number {
    return this.records.length;
  }

  list(): T[] {
    return [...this.records].sort(byFavoriteThenName);
  }

  find(query: string): T[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return this.list();
    return this.records
      .filter((record) =>
        Object.values(record)
          .filter((value): value is string => typeof value === "string")
          .join(" ")
          .toLowerCase()
          .includes(needle)
      )
      .sort(byFavoriteThenName);
  }

  get(name: string): T | undefined {
    return this.records.find((record) => sameName(record.name, name));
  }

  add(party: T): T {
    if (this.get(party.name)) {
      throw new DuplicateKeyError(party.name, this.kind);
    }
    this.records.push(party);
    return party;
  }

  /**
   * Merges non-empty fields into the record with the same name, or appends.
   * An upsert sets the favorite flag but never clears it.
   */
  upsert(party: T): T {
    const current = this.get(party.name);
    if (!current) {
      this.records.push(party);
      return party;
    }
    for (const [key, value] of Object.entries(party)) {
      if (key === "name" || value === undefined || value === "" || value === false) continue;
      Object.assign(current, { [key]: value });
    }
    return current;
  }

  remove(name: string): boolean {
    const index = this.records.findIndex((record) => sameName(record.name, name));
    if (index < 0) return false;
    this.records.splice(index, 1);
    return true;
  }

  /** Removes every record; returns how many there were. */
  clear(): number {
    const removed = this.records.length;
    this.records = [];
    return removed;
  }

  toggleFavorite(name: string): boolean {
    const record = this.get(name);
    if (!record) return false;
    record.favorite = !record.favorite;
    return true;
  }

  /**
   * Upserts every row of a CSV. Empty cells take the value from `defaults`.
   * Rows applied before a failing row stay applied.
   */
  async importCsv(file: string, defaults: PartyDefaults = {}): Promise<CsvImportSummary> {
    const table = await readCsvFile(file);
    const mapping = resolveColumns(table.headers, this.columns, path.basename(file));
    const summary: CsvImportSummary = { applied: 0, skipped: 0 };

    table.rows.forEach((row, index) => {
      const rowNumber = index + 1;
      const values = readRow(row, this.columns, mapping);
      if (isBlankRow(row) || !values.name || values.name === "-") {
        summary.skipped += 1;
        return;
      }

      const merged = { ...defaults, ...values };
      if (merged.vatNumber !== undefined) {
        const vat = validateVat(merged.vatNumber);
        if (!vat) {
          throw new CsvImportError(rowNumber, summary.applied, `invalid VAT number '${merged.vatNumber}'`);
        }
        merged.vatNumber = vat;
      }

      let party: T;
      try {
        party = this.normalize(merged);
      } catch (error) {
        throw new CsvImportError(rowNumber, summary.applied, toError(error).message);
      }
      this.upsert(party);
      summary.applied += 1;
    });

    storeLogger.info({ kind: this.kind, file, ...summary }, "CSV imported");
    return summary;
  }

  async exportCsv(file: string): Promise<number> {
    const headers = this.columns.map((spec) => spec.column);
    const rows = this.records.map((record) =>
      this.columns.map((spec) => {
        const value: unknown = Object.entries(record).find(([key]) => key === spec.field)?.[1];
        return value === undefined ? "" : String(value);
      })
    );
    await writeCsvFile(file, headers, rows);
    storeLogger.info({ kind: this.kind, file, count: rows.length }, "CSV exported");
    return rows.length;
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, `${JSON.stringify(this.serialize(), null, 2)}\n`, "utf8");
    storeLogger.debug({ kind: this.kind, file: this.file, count: this.records.length }, "store saved");
  }

  protected abstract serialize(): Record<string, unknown>;
}

async function readStoreFile(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw new StoreLoadError(file, toError(error));
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StoreLoadError(file, toError(error));
  }
}

function loadRecords<T extends Party>(data: unknown, key: string, normalize: Normalizer<T>, file: string): T[] {
  let raw: unknown = [];
  if (Array.isArray(data)) {
    raw = data;
  } else if (data && typeof data === "object" && key in data) {
    raw = Object.entries(data).find(([entry]) => entry === key)?.[1];
  }
  if (!Array.isArray(raw)) return [];

  const records: T[] = [];
  raw.forEach((entry: unknown, index) => {
    // legacy files stored bare names
    const candidate = typeof entry === "string" ? { name: entry } : entry;
    try {
      records.push(normalize(candidate));
    } catch (error) {
      storeLogger.warn({ file, index, err: toError(error) }, "skipping invalid record");
    }
  });
  return records;
}

function loadDefaults(data: unknown): Record<string, string> {
  if (!data || typeof data !== "object" || Array.isArray(data)) return {};
  const raw = Object.entries(data).find(([key]) => key === "defaultsByProduction")?.[1];
  if (!raw || typeof raw !== "object") return {};
  return Object.fromEntries(
    Object.entries(raw).filter((entry): entry is [string, string] => typeof entry[1] === "string")
  );
}

export class SupplierStore extends PartyStore<Supplier> {
  private defaultsByProduction: Record<string, string>;

  private constructor(file: string, records: Supplier[], defaults: Record<string, string>) {
    super("supplier", file, records, normalizeSupplier, supplierColumns);
    this.defaultsByProduction = defaults;
  }

  static empty(file: string): SupplierStore {
    return new SupplierStore(file, [], {});
  }

  static async load(file: string): Promise<SupplierStore> {
    const data = await readStoreFile(file);
    return new SupplierStore(file, loadRecords(data, "suppliers", normalizeSupplier, file), loadDefaults(data));
  }

  override remove(name: string): boolean {
    if (!super.remove(name)) return false;
    for (const [tag, supplier] of Object.entries(this.defaultsByProduction)) {
      if (sameName(supplier, name)) delete this.defaultsByProduction[tag];
    }
    return true;
  }

  override clear(): number {
    this.defaultsByProduction = {};
    return super.clear();
  }

  setDefault(productionTag: string, supplierName: string): void {
    const supplier = this.get(supplierName);
    if (!supplier) {
      throw new NotFoundError(`Supplier '${supplierName}' not found`, "supplier", supplierName);
    }
    this.defaultsByProduction[productionTag] = supplier.name;
  }

  getDefault(productionTag: string): string | undefined {
    return this.defaultsByProduction[productionTag];
  }

  protected serialize(): Record<string, unknown> {
    return { suppliers: this.records, defaultsByProduction: this.defaultsByProduction };
  }
}

export class ClientStore extends PartyStore<Client> {
  private constructor(file: string, records: Client[]) {
    super("client", file, records, normalizeClient, clientColumns);
  }

  static empty(file: string): ClientStore {
    return new ClientStore(file, []);
  }

  static async load(file: string): Promise<ClientStore> {
    const data = await readStoreFile(file);
    return new ClientStore(file, loadRecords(data, "clients", normalizeClient, file));
  }

  protected serialize(): Record<string, unknown> {
    return { clients: this.records };
  }
}
