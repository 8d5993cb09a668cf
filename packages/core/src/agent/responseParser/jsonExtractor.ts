import {
  STRATEGY_BRACKET_SLICE,
  STRATEGY_CODE_FENCE,
  STRATEGY_WHOLE_TEXT,
  type JsonCandidate,
} from './parserTypes.js';

const FENCE = '```';

// The language tag (```json) sits on the fence line, so content starts after
// the first newline; a fence with no newline at all starts right after it.
export const extractFromCodeFence = (input: string): string | null => {
  const start = input.indexOf(FENCE);
  if (start === -1) {
    return null;
  }

  const afterFence = input.slice(start + FENCE.length);
  const newline = afterFence.indexOf('\n');
  const content = afterFence.slice(newline === -1 ? 0 : newline + 1);

  const end = content.indexOf(FENCE);
  if (end === -1) {
    return null;
  }

  return content.slice(0, end).trim();
};

export const extractBracketSlice = (input: string): string | null => {
  const start = input.indexOf('[');
  const end = input.lastIndexOf(']');
  if (start === -1 || end === -1 || end < start) {
    return null;
  }

  return input.slice(start, end + 1);
};

/**
 * Picks the text most likely to hold the JSON array, in fixed order:
 * fenced block, then first `[` to last `]`, then the whole trimmed text.
 */
export const extractJsonCandidate = (input: string): JsonCandidate => {
  const fenced = extractFromCodeFence(input);
  if (fenced !== null) {
    return { text: fenced, strategy: STRATEGY_CODE_FENCE };
  }

  const sliced = extractBracketSlice(input);
  if (sliced !== null) {
    return { text: sliced, strategy: STRATEGY_BRACKET_SLICE };
  }

  return { text: input.trim(), strategy: STRATEGY_WHOLE_TEXT };
};
