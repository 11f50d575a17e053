#!/usr/bin/env node

import { createProgram } from "./program.js";
import { install } from "./commands/install.js";
import { EXIT } from "./commands/exit-codes.js";

const program = createProgram(async (opts) => {
  const res = await install(opts);
  process.exit(res.exitCode);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exit(EXIT.FAILURE);
});
