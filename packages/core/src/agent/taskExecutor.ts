/**
 * Sequential, fail-stop driver for a planned command list.
 *
 * Commands run one at a time in plan order. The first command that does not
 * succeed (non-zero exit, timeout or spawn failure) ends the run, so the
 * returned report is the prefix of the plan that was actually attempted.
 */
import { DEFAULT_COMMAND_TIMEOUT_SEC } from '../constants.js';
import { runCommand, type CommandRunner } from '../commands/run.js';
import type { CommandResult, ExecutionReport, TaskCommand } from '../contracts/task.js';
import { describeError } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface TaskExecutorOptions {
  /** Working directory for every command; defaults to the process cwd. */
  readonly workingDir?: string | null;
  /** Per-command timeout in seconds. */
  readonly timeoutSec?: number;
  readonly runCommandFn?: CommandRunner;
  readonly logger?: Logger;
}

export class TaskExecutor {
  private readonly workingDir: string | undefined;

  private readonly timeoutSec: number;

  private readonly runCommandFn: CommandRunner;

  private readonly logger: Logger;

  constructor(options: TaskExecutorOptions = {}) {
    this.workingDir = options.workingDir ?? undefined;
    this.timeoutSec = options.timeoutSec ?? DEFAULT_COMMAND_TIMEOUT_SEC;
    this.runCommandFn = options.runCommandFn ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async runAll(commands: readonly TaskCommand[]): Promise<ExecutionReport> {
    const results: CommandResult[] = [];

    for (const task of commands) {
      this.logger.info('Running task', { desc: task.description, cmd: task.command });

      const result = await this.attempt(task);
      results.push(result);

      if (!result.success) {
        this.logger.info('Command failed, skipping remaining tasks', {
          attempted: results.length,
          planned: commands.length,
        });
        break;
      }
    }

    return results;
  }

  private async attempt(task: TaskCommand): Promise<CommandResult> {
    try {
      return await this.runCommandFn(task.command, {
        cwd: this.workingDir,
        timeoutSec: this.timeoutSec,
        logger: this.logger,
      });
    } catch (error) {
      const message = describeError(error);
      this.logger.error('Command raised an error', { cmd: task.command, err: message });
      return {
        command: task.command,
        success: false,
        exit_code: null,
        stdout: '',
        stderr: message,
      };
    }
  }
}

export const createTaskExecutor = (options: TaskExecutorOptions = {}): TaskExecutor =>
  new TaskExecutor(options);
