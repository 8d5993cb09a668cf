/**
 * Public entry point for the shellcourier CLI package.
 */
export { runCli, type CliDependencies, type PollerHandle, type SignalSource } from './src/runner.js';
export { CliUsageError, USAGE, parseCliArgs, type CliOptions } from './src/cliOptions.js';
