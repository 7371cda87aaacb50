import { Command, CommanderError } from "commander";
import { registerBomCommands } from "@/cli/commands/bom";
import { registerCopyCommand } from "@/cli/commands/copy";
import { registerCopyPerProdCommand } from "@/cli/commands/copyPerProd";
import { registerClientCommands, registerSupplierCommands, type ContextLoader } from "@/cli/commands/parties";
import { error } from "@/cli/format";
import { isCustomError, toError } from "@/lib/errors";
import { cliLogger } from "@/lib/logger";

export function createProgram(loadContext: ContextLoader): Command {
  const program = new Command();

  program
    .name("bom-dispatch")
    .description("Copy drawings per production tag and write purchase orders, quotes and quote requests")
    .version("0.1.0")
    .exitOverride();

  registerSupplierCommands(program, loadContext);
  registerClientCommands(program, loadContext);
  registerBomCommands(program, loadContext);
  registerCopyCommand(program, loadContext);
  registerCopyPerProdCommand(program, loadContext);

  return program;
}

/** Loads the context on first use and hands every later caller the same one. */
function once(loadContext: ContextLoader): ContextLoader {
  let pending: ReturnType<ContextLoader> | undefined;
  return () => {
    pending ??= loadContext();
    return pending;
  };
}

/**
 * Runs one command and resolves to the process exit code: 0 on success,
 * 2 for usage and input errors, 1 for anything else.
 */
export async function runCli(argv: readonly string[], loadContext: ContextLoader): Promise<number> {
  const program = createProgram(once(loadContext));
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 2;
    }
    const failure = toError(err);
    cliLogger.debug({ err: failure }, "command failed");
    error(failure.message);
    return isCustomError(err) ? err.exitCode : 1;
  }
}
