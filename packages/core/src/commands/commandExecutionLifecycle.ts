import { spawn } from 'node:child_process';

import { FORCE_KILL_DELAY_MS } from '../constants.js';
import { createCommandResult } from '../contracts/task.js';
import { CommandSpawnError, CommandTimeoutError, describeError } from '../errors.js';
import { decodeOutput, logCommandOutcome } from './commandHelpers.js';
import type { CommandExecutionState } from './commandExecutionTypes.js';

export function startExecution(state: CommandExecutionState): void {
  const { command, shell, spawnOptions } = state.setup;

  try {
    state.child = spawn(shell, ['-c', command], spawnOptions);
  } catch (error) {
    failToStart(state, error);
    return;
  }

  attachChildListeners(state);
  registerTimeout(state);
}

function attachChildListeners(state: CommandExecutionState): void {
  const { child } = state;
  if (!child) {
    return;
  }

  child.stdout?.on('data', (chunk: Buffer) => {
    state.stdoutChunks.push(chunk);
  });

  child.stderr?.on('data', (chunk: Buffer) => {
    state.stderrChunks.push(chunk);
  });

  // `error` fires without a preceding exit when the shell cannot be spawned
  // (missing binary, missing cwd).
  child.on('error', (error) => {
    if (state.exited) {
      return;
    }
    state.exited = true;
    clearPendingTimers(state);
    failToStart(state, error);
  });

  child.on('close', (code, signal) => {
    state.exited = true;
    clearPendingTimers(state);
    if (state.timedOut) {
      state.setup.logger.debug('Timed out command exited', {
        cmd: state.setup.command,
        signal: signal ?? undefined,
      });
    }
    complete(state, code);
  });
}

function registerTimeout(state: CommandExecutionState): void {
  if (state.setup.timeoutMs <= 0) {
    return;
  }

  state.timeoutHandle = setTimeout(() => {
    state.timeoutHandle = undefined;
    if (state.settled) {
      return;
    }
    state.timedOut = true;
    terminateChild(state);

    const { command, timeoutSec, logger } = state.setup;
    const error = new CommandTimeoutError(command, timeoutSec);
    logger.error('Command timed out', { cmd: command, timeoutSec });
    settle(state, () => state.reject(error));
  }, state.setup.timeoutMs);
}

// The shell runs detached in its own process group so the signal reaches
// every descendant, not only `sh` itself.
function signalChild(state: CommandExecutionState, signal: NodeJS.Signals): void {
  const { child } = state;
  if (!child || state.exited) {
    return;
  }

  if (typeof child.pid === 'number') {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch {
      // Group already gone or not a group leader; fall back to the direct child.
    }
  }

  try {
    child.kill(signal);
  } catch (error) {
    state.setup.logger.warn('Failed to signal command process', {
      cmd: state.setup.command,
      signal,
      err: describeError(error),
    });
  }
}

function terminateChild(state: CommandExecutionState): void {
  signalChild(state, 'SIGTERM');

  state.forceKillHandle = setTimeout(() => {
    state.forceKillHandle = undefined;
    signalChild(state, 'SIGKILL');
  }, FORCE_KILL_DELAY_MS);
}

function complete(state: CommandExecutionState, code: number | null): void {
  if (state.settled) {
    return;
  }

  const result = createCommandResult(
    state.setup.command,
    code,
    decodeOutput(state.stdoutChunks),
    decodeOutput(state.stderrChunks),
  );

  logCommandOutcome(state.setup.logger, result);
  settle(state, () => state.resolve(result));
}

function failToStart(state: CommandExecutionState, cause: unknown): void {
  if (state.settled) {
    return;
  }

  const { command, logger } = state.setup;
  const error = new CommandSpawnError(command, cause);
  logger.error('Command could not be started', { cmd: command, err: describeError(cause) });
  settle(state, () => state.reject(error));
}

function settle(state: CommandExecutionState, deliver: () => void): void {
  if (state.settled) {
    return;
  }
  state.settled = true;
  if (state.timeoutHandle) {
    clearTimeout(state.timeoutHandle);
    state.timeoutHandle = undefined;
  }
  deliver();
}

function clearPendingTimers(state: CommandExecutionState): void {
  if (state.timeoutHandle) {
    clearTimeout(state.timeoutHandle);
    state.timeoutHandle = undefined;
  }

  if (state.forceKillHandle) {
    clearTimeout(state.forceKillHandle);
    state.forceKillHandle = undefined;
  }
}
