import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import { field, heading, statusColor, success, table, warn } from "@/cli/format";
import { loadItems } from "@/cli/input";
import { UNMATCHED_MARKER } from "@/config/documentTypes";
import { copyPerProduction } from "@/lib/copyPerProduction";
import { validateDeadline } from "@/lib/documentBuilder";
import { documentTypes, type DocumentType } from "@/types/document";
import type { ContextLoader } from "@/cli/commands/parties";

interface CopyPerProdOptions {
  source: string;
  dest: string;
  bom: string;
  exts: string;
  docType: DocumentType;
  docNumber?: string;
  supplier?: string;
  supplierFor: Record<string, string>;
  client?: string;
  projectNumber?: string;
  projectName?: string;
  deadline?: string;
  note?: string;
  bundle?: boolean;
  rememberDefaults?: boolean;
}

/** Collects repeated `TAG=NAME` values */
export function collectAssignment(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf("=");
  const tag = value.slice(0, separator).trim();
  const name = value.slice(separator + 1).trim();
  if (separator < 0 || !tag || !name) {
    throw new InvalidArgumentError(`Expected PRODUCTION=NAME, got '${value}'.`);
  }
  return { ...previous, [tag]: name };
}

export function registerCopyPerProdCommand(program: Command, loadContext: ContextLoader): void {
  program
    .command("copy-per-prod")
    .description("Copy the drawings of every BOM line into one folder per production tag and write the document")
    .requiredOption("--source <dir>", "Folder with the drawings")
    .requiredOption("--dest <dir>", "Destination folder")
    .requiredOption("--bom <path>", "BOM file (.csv, .tsv, .txt, .xlsx) or - for stdin")
    .requiredOption("--exts <list>", "Comma separated extensions, e.g. pdf,dxf")
    .addOption(new Option("--doc-type <type>", "Document to write").choices(documentTypes).default("order"))
    .option("--doc-number <n>", "Document number; the next number in sequence when omitted")
    .option("--supplier <name>", "Supplier for orders and quote requests")
    .option("--supplier-for <production=name>", "Supplier for one production tag (repeatable)", collectAssignment, {})
    .option("--client <name>", "Client for quotes")
    .option("--project-number <n>", "Project number")
    .option("--project-name <name>", "Project name")
    .option("--deadline <yyyy-mm-dd>", "Reply deadline on quote requests", validateDeadline)
    .option("--note <text>", "Footer note on orders")
    .option("--bundle", "Write into a dated project folder under --dest")
    .option("--remember-defaults", "Store the supplier as default for production tags without one, and every --supplier-for choice")
    .action(async (opts: CopyPerProdOptions) => {
      const ctx = await loadContext();
      const items = await loadItems(opts.bom);

      const result = await copyPerProduction(ctx, {
        sourceDir: opts.source,
        dest: opts.dest,
        items,
        extensions: opts.exts,
        docType: opts.docType,
        docNumber: opts.docNumber,
        supplier: opts.supplier,
        supplierFor: opts.supplierFor,
        client: opts.client,
        project: { number: opts.projectNumber, name: opts.projectName },
        deadline: opts.deadline,
        note: opts.note,
        bundle: opts.bundle,
        rememberDefaults: opts.rememberDefaults,
      });

      heading(`${result.document.title} ${result.document.number}`);
      table(
        result.results.map((entry) => ({
          Part: entry.item.partNumber,
          Production: entry.item.productionTag,
          Files: String(entry.copied.length),
          Status:
            entry.files.length === 0
              ? chalk.red(UNMATCHED_MARKER)
              : statusColor(entry.failures.length > 0 ? "failed" : "copied"),
        }))
      );

      field("Output", result.outputRoot);
      field("Copied", result.copiedCount);
      field("Party", result.document.party?.name);
      for (const failure of result.failures) {
        warn(`Could not copy ${failure.sourcePath} to ${failure.destinationPath}: ${failure.error.message}`);
      }
      success(`Wrote ${result.files.pdfPath}`);
      success(`Wrote ${result.files.sheetPath}`);
    });
}
