#!/usr/bin/env node

import { createCli } from './cli/program.js';
import { ExitCodes, printError, processOutput } from './lib/output.js';

try {
  const cli = createCli();
  process.exitCode = await cli.run(process.argv.slice(2), processOutput);
} catch (err) {
  printError(processOutput, err instanceof Error ? err.message : String(err));
  process.exitCode = ExitCodes.FAILURE;
}
