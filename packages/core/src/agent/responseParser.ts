export type {
  RecoveryStrategy,
  JsonCandidate,
  ParseSuccess,
  ParseFailure,
  ParseResult,
} from './responseParser/parserTypes.js';

export { extractJsonCandidate } from './responseParser/jsonExtractor.js';
export { parseTaskCommands } from './responseParser/parserStrategies.js';

import type { TaskCommand } from '../contracts/task.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseTaskCommands } from './responseParser/parserStrategies.js';

/**
 * Turns raw model text into the ordered command list.
 *
 * Malformed output never reaches the caller as an error: it is logged as a
 * warning and reported as "no commands".
 */
export const extractTaskCommands = (
  rawContent: string,
  logger: Logger = silentLogger,
): readonly TaskCommand[] => {
  const result = parseTaskCommands(rawContent);
  if (result.ok) {
    return result.commands;
  }

  logger.warn('Unable to decode command list from model response', {
    err: result.error.message,
    strategy: result.recovery.strategy,
    text: rawContent,
  });
  return [];
};
