import { Command } from "commander";
import chalk from "chalk";
import { CsvImportError, NotFoundError, ValidationError } from "@/lib/errors";
import { normalizeParty, validateVat } from "@/lib/partySchema";
import type { PartyStore } from "@/lib/partyStore";
import type { RunContext } from "@/lib/runContext";
import type { Party, PartyDefaults, PartyKind } from "@/types/party";
import { field, heading, success, table } from "@/cli/format";

export type ContextLoader = () => Promise<RunContext>;

interface PartyFieldOptions {
  vat?: string;
  address1?: string;
  address2?: string;
  phone?: string;
  email?: string;
  description?: string;
}

const LABELS: Record<PartyKind, { one: string; many: string }> = {
  supplier: { one: "Supplier", many: "Suppliers" },
  client: { one: "Client", many: "Clients" },
};

function storeFor(ctx: RunContext, kind: PartyKind): PartyStore<Party> {
  return kind === "supplier" ? ctx.suppliers : ctx.clients;
}

function checkedVat(vat: string | undefined): string | undefined {
  if (vat === undefined) return undefined;
  const normalized = validateVat(vat);
  if (!normalized) throw new ValidationError(`Invalid VAT number '${vat}'`, { vat });
  return normalized;
}

function fieldValues(kind: PartyKind, opts: PartyFieldOptions): PartyDefaults {
  return {
    vatNumber: checkedVat(opts.vat),
    addressLine1: opts.address1,
    addressLine2: opts.address2,
    phone: opts.phone,
    email: opts.email,
    description: kind === "supplier" ? opts.description : undefined,
  };
}

function partyRows(parties: readonly Party[]): Record<string, string>[] {
  return parties.map((party) => ({
    Name: party.favorite ? `${chalk.yellow("★")} ${party.name}` : party.name,
    VAT: party.vatNumber ?? "",
    Address: [party.addressLine1, party.addressLine2].filter(Boolean).join(", "),
    Email: party.email ?? "",
    Phone: party.phone ?? "",
  }));
}

function addFieldOptions(command: Command, kind: PartyKind): Command {
  command
    .option("--vat <number>", "VAT number")
    .option("--address-1 <text>", "First address line")
    .option("--address-2 <text>", "Second address line")
    .option("--phone <number>", "Phone number")
    .option("--email <address>", "Email address");
  if (kind === "supplier") command.option("--description <text>", "What the supplier does");
  return command;
}

function registerPartyCommands(program: Command, kind: PartyKind, loadContext: ContextLoader): Command {
  const label = LABELS[kind];
  const group = program.command(`${kind}s`).description(`Manage ${label.many.toLowerCase()}`);

  group
    .command("list")
    .description(`List ${label.many.toLowerCase()}, favorites first`)
    .action(async () => {
      const store = storeFor(await loadContext(), kind);
      heading(`${label.many} (${store.size})`);
      table(partyRows(store.list()));
    });

  group
    .command("find <query>")
    .description("Search every field")
    .action(async (query: string) => {
      const matches = storeFor(await loadContext(), kind).find(query);
      heading(`${label.many}: "${query}" (${matches.length} results)`);
      table(partyRows(matches));
    });

  addFieldOptions(group.command("add <name>").description(`Add a ${kind}`), kind).action(
    async (name: string, opts: PartyFieldOptions) => {
      const store = storeFor(await loadContext(), kind);
      const party = store.add(normalizeParty(kind, { name, ...fieldValues(kind, opts), favorite: false }));
      await store.save();
      success(`Added ${kind} '${party.name}'`);
      field("VAT", party.vatNumber);
    }
  );

  group
    .command("remove <name>")
    .description(`Remove a ${kind}`)
    .action(async (name: string) => {
      const store = storeFor(await loadContext(), kind);
      if (!store.remove(name)) throw new NotFoundError(`${label.one} '${name}' not found`, kind, name);
      await store.save();
      success(`Removed ${kind} '${name}'`);
    });

  group
    .command("fav <name>")
    .description("Toggle the favorite flag")
    .action(async (name: string) => {
      const store = storeFor(await loadContext(), kind);
      if (!store.toggleFavorite(name)) throw new NotFoundError(`${label.one} '${name}' not found`, kind, name);
      await store.save();
      const party = store.get(name);
      success(party?.favorite ? `'${party.name}' is now a favorite` : `'${party?.name ?? name}' is no longer a favorite`);
    });

  addFieldOptions(
    group.command("import-csv <path>").description("Upsert rows from a CSV; the options fill empty cells"),
    kind
  ).action(async (file: string, opts: PartyFieldOptions) => {
    const store = storeFor(await loadContext(), kind);
    try {
      const summary = await store.importCsv(file, fieldValues(kind, opts));
      await store.save();
      success(`Imported ${summary.applied} ${kind}(s), skipped ${summary.skipped}`);
    } catch (err) {
      if (err instanceof CsvImportError && err.applied > 0) await store.save();
      throw err;
    }
  });

  group
    .command("export-csv <path>")
    .description(`Write all ${label.many.toLowerCase()} to a CSV`)
    .action(async (file: string) => {
      const count = await storeFor(await loadContext(), kind).exportCsv(file);
      success(`Exported ${count} ${kind}(s) to ${file}`);
    });

  return group;
}

export function registerSupplierCommands(program: Command, loadContext: ContextLoader): void {
  const group = registerPartyCommands(program, "supplier", loadContext);

  group
    .command("set-default <production> <name>")
    .description("Set the default supplier for a production tag")
    .action(async (production: string, name: string) => {
      const { suppliers } = await loadContext();
      suppliers.setDefault(production, name);
      await suppliers.save();
      success(`Default for '${production}' is now '${suppliers.getDefault(production) ?? name}'`);
    });

  group
    .command("clear")
    .description("Remove every supplier and production default")
    .action(async () => {
      const { suppliers } = await loadContext();
      const removed = suppliers.clear();
      await suppliers.save();
      success(`Removed ${removed} supplier(s) and all production defaults`);
    });

  group
    .command("get-default <production>")
    .description("Show the default supplier for a production tag")
    .action(async (production: string) => {
      const { suppliers } = await loadContext();
      field(production, suppliers.getDefault(production));
    });
}

export function registerClientCommands(program: Command, loadContext: ContextLoader): void {
  registerPartyCommands(program, "client", loadContext);
}
