#!/usr/bin/env node
/**
 * Executable entry point. Loads `.env` before anything reads the environment.
 */
import 'dotenv/config';

import { runCli } from '../src/runner.js';

runCli(process.argv).catch((error: unknown) => {
  // `runCli` reports its own failures; anything reaching here escaped wiring.
  console.error(error instanceof Error && error.message ? error.message : String(error));
  process.exitCode = 1;
});
