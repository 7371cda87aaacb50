/**
 * Structured logging with pino. Logs go to stderr so command output on
 * stdout stays clean; development runs are pretty-printed.
 */
import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";
import { env, isDev, isTest } from "@/config/env";

function resolveLevel(): LevelWithSilent {
  if (isTest) return "silent";
  return env.LOG_LEVEL ?? (isDev ? "debug" : "info");
}

const logger: Logger = isDev
  ? pino(
      { level: resolveLevel() },
      pino.transport({
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      })
    )
  : pino(
      {
        level: resolveLevel(),
        formatters: {
          level: (label: string) => ({ level: label }),
        },
      },
      pino.destination(2)
    );

export const storeLogger: Logger = logger.child({ module: "store" });
export const bomLogger: Logger = logger.child({ module: "bom" });
export const matcherLogger: Logger = logger.child({ module: "matcher" });
export const documentLogger: Logger = logger.child({ module: "documents" });
export const cliLogger: Logger = logger.child({ module: "cli" });

export default logger;
