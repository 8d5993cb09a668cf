import type { Logger } from '../utils/logger.js';
import type { CommandResult } from './commandTypes.js';

export const DEFAULT_SHELL = 'sh';

export const decodeOutput = (chunks: readonly Buffer[]): string =>
  Buffer.concat(chunks).toString('utf8');

export const resolveTimeoutMs = (timeoutSec: number | undefined): number => {
  if (typeof timeoutSec !== 'number' || !Number.isFinite(timeoutSec) || timeoutSec <= 0) {
    return 0;
  }
  return Math.round(timeoutSec * 1000);
};

export const logCommandOutcome = (logger: Logger, result: CommandResult): void => {
  if (result.success) {
    logger.info('Command succeeded', { cmd: result.command });
    return;
  }
  logger.error('Command failed', {
    cmd: result.command,
    code: result.exit_code,
    stderr: result.stderr,
  });
};
