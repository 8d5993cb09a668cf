import type { ChildProcess, SpawnOptions } from 'node:child_process';

import type { Logger } from '../utils/logger.js';
import type { CommandResult } from './commandTypes.js';

export interface ExecutionSetup {
  command: string;
  shell: string;
  spawnOptions: SpawnOptions;
  timeoutSec: number;
  timeoutMs: number;
  logger: Logger;
}

export interface CommandExecutionState {
  setup: ExecutionSetup;
  child: ChildProcess | null;
  stdoutChunks: Buffer[];
  stderrChunks: Buffer[];
  timedOut: boolean;
  settled: boolean;
  exited: boolean;
  timeoutHandle: NodeJS.Timeout | undefined;
  forceKillHandle: NodeJS.Timeout | undefined;
  resolve: (result: CommandResult) => void;
  reject: (error: Error) => void;
}

export function createExecutionState(
  setup: ExecutionSetup,
  resolve: (result: CommandResult) => void,
  reject: (error: Error) => void,
): CommandExecutionState {
  return {
    setup,
    child: null,
    stdoutChunks: [],
    stderrChunks: [],
    timedOut: false,
    settled: false,
    exited: false,
    timeoutHandle: undefined,
    forceKillHandle: undefined,
    resolve,
    reject,
  };
}
