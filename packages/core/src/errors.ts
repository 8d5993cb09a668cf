/**
 * Error taxonomy shared by the pipeline.
 *
 * Every failure that can cross a module boundary carries a stable `code` so
 * callers can branch on the kind of failure without string matching.
 */

export type ShellcourierErrorCode =
  | 'COMMAND_TIMEOUT'
  | 'COMMAND_SPAWN'
  | 'GATEWAY'
  | 'CONFIG'
  | 'TELEGRAM_API';

export class ShellcourierError extends Error {
  readonly code: ShellcourierErrorCode;

  constructor(code: ShellcourierErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CommandTimeoutError extends ShellcourierError {
  readonly command: string;

  readonly timeoutSec: number;

  constructor(command: string, timeoutSec: number) {
    super('COMMAND_TIMEOUT', `Command timed out after ${timeoutSec}s: ${command}`);
    this.command = command;
    this.timeoutSec = timeoutSec;
  }
}

export class CommandSpawnError extends ShellcourierError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super('COMMAND_SPAWN', `Command failed to start: ${command} (${describeError(cause)})`, {
      cause,
    });
    this.command = command;
  }
}

export class GatewayError extends ShellcourierError {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, cause?: unknown) {
    super('GATEWAY', message, { cause });
    this.statusCode = statusCode;
  }
}

export class ConfigError extends ShellcourierError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG', message, { cause });
  }
}

export class TelegramApiError extends ShellcourierError {
  readonly method: string;

  constructor(method: string, message: string) {
    super('TELEGRAM_API', `Telegram ${method} failed: ${message}`);
    this.method = method;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
};
