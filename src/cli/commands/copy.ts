import { Command } from "commander";
import { success, warn } from "@/cli/format";
import { parseExtensions } from "@/lib/extensions";
import { copyFlat } from "@/lib/fileMatcher";
import type { ContextLoader } from "@/cli/commands/parties";

interface CopyOptions {
  source: string;
  dest: string;
  exts: string;
}

export function registerCopyCommand(program: Command, loadContext: ContextLoader): void {
  program
    .command("copy")
    .description("Copy every drawing with a selected extension into one folder, without a BOM")
    .requiredOption("--source <dir>", "Folder with the drawings")
    .requiredOption("--dest <dir>", "Existing destination folder")
    .requiredOption("--exts <list>", "Comma separated extensions, e.g. pdf,dxf")
    .action(async (opts: CopyOptions) => {
      const ctx = await loadContext();
      const extensions = parseExtensions(opts.exts, ctx.env.BOM_DISPATCH_ALLOWED_EXTS);
      const outcome = await copyFlat(opts.source, opts.dest, extensions);

      for (const failure of outcome.failures) {
        warn(`Could not copy ${failure.sourcePath} to ${failure.destinationPath}: ${failure.error.message}`);
      }
      success(`Copied ${outcome.copied.length} file(s) to ${opts.dest}`);
    });
}
