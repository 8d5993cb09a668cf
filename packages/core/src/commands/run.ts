import type { SpawnOptions } from 'node:child_process';

import { DEFAULT_COMMAND_TIMEOUT_SEC } from '../constants.js';
import { silentLogger } from '../utils/logger.js';
import { DEFAULT_SHELL, resolveTimeoutMs } from './commandHelpers.js';
import { startExecution } from './commandExecutionLifecycle.js';
import { createExecutionState, type ExecutionSetup } from './commandExecutionTypes.js';
import type { CommandResult, RunOptions } from './commandTypes.js';

export type { CommandResult, RunOptions } from './commandTypes.js';

export type CommandRunner = (command: string, options?: RunOptions) => Promise<CommandResult>;

function createSpawnOptions(cwd: string | undefined): SpawnOptions {
  return {
    cwd: cwd ?? process.cwd(),
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: true,
  };
}

/**
 * Runs one command line through `sh -c` and captures its outcome.
 *
 * Resolves for any process that ran to completion, whatever its exit status.
 * Rejects with `CommandTimeoutError` when the wall-clock limit is hit (the
 * process group is terminated) and with `CommandSpawnError` when the shell
 * could not be started.
 */
export function runCommand(command: string, options: RunOptions = {}): Promise<CommandResult> {
  const timeoutSec = options.timeoutSec ?? DEFAULT_COMMAND_TIMEOUT_SEC;

  const setup: ExecutionSetup = {
    command,
    shell: options.shell ?? DEFAULT_SHELL,
    spawnOptions: createSpawnOptions(options.cwd),
    timeoutSec,
    timeoutMs: resolveTimeoutMs(timeoutSec),
    logger: options.logger ?? silentLogger,
  };

  return new Promise<CommandResult>((resolve, reject) => {
    startExecution(createExecutionState(setup, resolve, reject));
  });
}
