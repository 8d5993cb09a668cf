import type { Logger } from '../utils/logger.js';

export type { CommandResult } from '../contracts/task.js';

export interface RunOptions {
  /** Working directory for the shell; defaults to the process cwd. */
  cwd?: string;
  /** Wall-clock limit in seconds; `0` or a negative value disables it. */
  timeoutSec?: number;
  /** POSIX shell used as `<shell> -c <command>`. */
  shell?: string;
  logger?: Logger;
}
