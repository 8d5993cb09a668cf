import type { TaskCommand } from '../../contracts/task.js';

export const STRATEGY_CODE_FENCE = 'code_fence' as const;
export const STRATEGY_BRACKET_SLICE = 'bracket_slice' as const;
export const STRATEGY_WHOLE_TEXT = 'whole_text' as const;

export type RecoveryStrategy =
  | typeof STRATEGY_CODE_FENCE
  | typeof STRATEGY_BRACKET_SLICE
  | typeof STRATEGY_WHOLE_TEXT;

export interface JsonCandidate {
  readonly text: string;
  readonly strategy: RecoveryStrategy;
}

export interface ParseSuccess {
  readonly ok: true;
  readonly commands: readonly TaskCommand[];
  readonly recovery: { strategy: RecoveryStrategy };
}

export interface ParseFailure {
  readonly ok: false;
  readonly error: Error;
  readonly recovery: { strategy: RecoveryStrategy };
}

export type ParseResult = ParseSuccess | ParseFailure;
