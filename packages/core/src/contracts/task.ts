import { z } from 'zod';

/**
 * Shape the model is asked to produce: an ordered list of shell commands with
 * a short human readable description each. Unknown keys are ignored.
 */
export const TaskCommandSchema = z.object({
  command: z.string(),
  description: z.string().default(''),
});

export const TaskCommandListSchema = z.array(TaskCommandSchema);

/** One planned shell invocation. */
export interface TaskCommand {
  readonly command: string;
  readonly description: string;
}

/**
 * Outcome of attempting one {@link TaskCommand}.
 *
 * `success` is true iff the process exited with status zero; `exit_code` is
 * null when the process was killed, timed out or never started.
 */
export interface CommandResult {
  readonly command: string;
  readonly success: boolean;
  readonly exit_code: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

/** Results of the commands actually attempted, index-aligned with the plan. */
export type ExecutionReport = readonly CommandResult[];

export const createCommandResult = (
  command: string,
  exitCode: number | null,
  stdout: string,
  stderr: string,
): CommandResult => ({
  command,
  success: exitCode === 0,
  exit_code: exitCode,
  stdout,
  stderr,
});
