import path from "node:path";
import type { Logger } from "pino";
import { loadBranding } from "@/config/branding";
import { resolveDataDir, type Env } from "@/config/env";
import { COUNTERS_FILE, DocumentCounter } from "@/lib/documentCounter";
import logger from "@/lib/logger";
import { CLIENTS_FILE, ClientStore, SUPPLIERS_FILE, SupplierStore } from "@/lib/partyStore";
import type { BrandingProfile } from "@/types/document";

/** Everything a command needs, built once per invocation. */
export interface RunContext {
  env: Env;
  dataDir: string;
  branding: BrandingProfile;
  logger: Logger;
  suppliers: SupplierStore;
  clients: ClientStore;
  counter: DocumentCounter;
  now: () => Date;
}

export async function createRunContext(env: Env, overrides: Partial<RunContext> = {}): Promise<RunContext> {
  const dataDir = overrides.dataDir ?? resolveDataDir(env);

  const [branding, suppliers, clients, counter] = await Promise.all([
    overrides.branding ?? loadBranding(dataDir),
    overrides.suppliers ?? SupplierStore.load(path.join(dataDir, SUPPLIERS_FILE)),
    overrides.clients ?? ClientStore.load(path.join(dataDir, CLIENTS_FILE)),
    overrides.counter ?? DocumentCounter.load(path.join(dataDir, COUNTERS_FILE)),
  ]);

  return {
    env,
    dataDir,
    branding,
    logger: overrides.logger ?? logger,
    suppliers,
    clients,
    counter,
    now: overrides.now ?? (() => new Date()),
  };
}
