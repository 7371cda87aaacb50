import { Command } from "commander";
import { field, heading, statusColor, success, table } from "@/cli/format";
import { loadItems } from "@/cli/input";
import { parseExtensions } from "@/lib/extensions";
import { checkBom, writeCheckReport } from "@/lib/fileMatcher";
import { formatNumber } from "@/lib/numbers";
import type { ContextLoader } from "@/cli/commands/parties";

interface CheckOptions {
  source: string;
  bom: string;
  exts: string;
  out?: string;
}

export function registerBomCommands(program: Command, loadContext: ContextLoader): void {
  const bom = program.command("bom").description("Inspect a BOM against the drawings folder");

  bom
    .command("check")
    .description("Report which extensions exist per BOM line, without copying")
    .requiredOption("--source <dir>", "Folder with the drawings")
    .requiredOption("--bom <path>", "BOM file (.csv, .tsv, .txt, .xlsx) or - for stdin")
    .requiredOption("--exts <list>", "Comma separated extensions, e.g. pdf,dxf")
    .option("--out <file>", "Write the report to .xlsx or .csv")
    .action(async (opts: CheckOptions) => {
      const ctx = await loadContext();
      const extensions = parseExtensions(opts.exts, ctx.env.BOM_DISPATCH_ALLOWED_EXTS);
      const items = await loadItems(opts.bom);
      const rows = await checkBom(items, opts.source, extensions);

      heading(`BOM check (${rows.length} lines)`);
      table(
        rows.map((row) => ({
          Part: row.item.partNumber,
          Production: row.item.productionTag,
          Qty: formatNumber(row.item.quantity),
          Found: row.foundExtensions.join(", "),
          Status: statusColor(row.status),
        }))
      );
      field("Complete", `${rows.filter((row) => row.status === "found").length} of ${rows.length}`);

      if (opts.out) {
        await writeCheckReport(opts.out, rows);
        success(`Report written to ${opts.out}`);
      }
    });
}
