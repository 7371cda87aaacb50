/**
 * Environment configuration, validated once at startup.
 *
 * dotenv runs before the schema so a local `.env` can set any of these.
 */
import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((value) => {
    if (typeof value !== "string") return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  /** Directory holding suppliers.json, clients.json, counters.json and company.json */
  BOM_DISPATCH_DATA_DIR: optionalString,

  /** Extensions `--exts` is allowed to select */
  BOM_DISPATCH_ALLOWED_EXTS: z.string().default("pdf,dxf,dwg,step,stp"),

  /** Document-number prefix for quotes; orders and quote requests have fixed prefixes */
  BOM_DISPATCH_QUOTE_PREFIX: z.string().default(""),

  BOM_DISPATCH_FOOTER_NOTE: optionalString,

  XDG_DATA_HOME: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join(" | ")}`);
  }
  return parsed.data;
}

export function resolveDataDir(env: Env): string {
  if (env.BOM_DISPATCH_DATA_DIR) return path.resolve(env.BOM_DISPATCH_DATA_DIR);
  const base = env.XDG_DATA_HOME ?? path.join(os.homedir(), ".local", "share");
  return path.join(base, "bom-dispatch");
}

export const env: Env = parseEnv(process.env);

export const isTest = env.NODE_ENV === "test" || process.env.VITEST !== undefined;
export const isDev = env.NODE_ENV === "development" && !isTest;
