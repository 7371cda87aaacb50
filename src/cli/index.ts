#!/usr/bin/env tsx
import { runCli } from "@/cli/program";
import { env } from "@/config/env";
import { createRunContext } from "@/lib/runContext";

void runCli(process.argv, () => createRunContext(env)).then((code) => {
  process.exitCode = code;
});
