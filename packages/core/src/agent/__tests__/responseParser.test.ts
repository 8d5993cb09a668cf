import { describe, expect, jest, test } from '@jest/globals';

import type { Logger } from '../../utils/logger.js';
import {
  extractJsonCandidate,
  extractTaskCommands,
  parseTaskCommands,
} from '../responseParser.js';

const createLogger = () => ({
  debug: jest.fn<Logger['debug']>(),
  info: jest.fn<Logger['info']>(),
  warn: jest.fn<Logger['warn']>(),
  error: jest.fn<Logger['error']>(),
});

describe('extractJsonCandidate', () => {
  test('prefers the first fenced block and skips the language tag', () => {
    const text = 'Plan:\n```json\n [ {"command":"ls"} ] \n```\nand [ignored]';

    expect(extractJsonCandidate(text)).toEqual({
      text: '[ {"command":"ls"} ]',
      strategy: 'code_fence',
    });
  });

  test('reads from right after the fence when it has no newline', () => {
    expect(extractJsonCandidate('```[1]```')).toEqual({ text: '[1]', strategy: 'code_fence' });
  });

  test('falls back to the bracket slice when the closing fence is missing', () => {
    const text = '```json\n[{"command":"pwd"}] trailing';

    expect(extractJsonCandidate(text)).toEqual({
      text: '[{"command":"pwd"}]',
      strategy: 'bracket_slice',
    });
  });

  test('slices from the first [ to the last ]', () => {
    expect(extractJsonCandidate('Sure! [1, [2]] done')).toEqual({
      text: '[1, [2]]',
      strategy: 'bracket_slice',
    });
  });

  test('uses the trimmed whole text when no brackets line up', () => {
    expect(extractJsonCandidate('  ] nothing [  ')).toEqual({
      text: '] nothing [',
      strategy: 'whole_text',
    });
  });
});

describe('parseTaskCommands', () => {
  test('defaults missing descriptions and drops unknown keys', () => {
    const result = parseTaskCommands('[{"command":"df -h","extra":1},{"command":"uptime","description":"Load"}]');

    expect(result).toEqual({
      ok: true,
      commands: [
        { command: 'df -h', description: '' },
        { command: 'uptime', description: 'Load' },
      ],
      recovery: { strategy: 'bracket_slice' },
    });
  });

  test('returns frozen commands', () => {
    const result = parseTaskCommands('[{"command":"ls"}]');
    if (!result.ok) {
      throw result.error;
    }

    expect(Object.isFrozen(result.commands)).toBe(true);
    expect(Object.isFrozen(result.commands[0])).toBe(true);
  });

  test('reports JSON syntax errors', () => {
    const result = parseTaskCommands('[{"command": }]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Failed to parse command list JSON: /);
      expect(result.recovery).toEqual({ strategy: 'bracket_slice' });
    }
  });

  test('reports schema mismatches with their path', () => {
    const result = parseTaskCommands('[{"command": 42}]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(
        /^Command list did not match the expected shape: 0\.command: /,
      );
    }
  });
});

describe('extractTaskCommands', () => {
  test('extracts a fenced list', () => {
    const raw = 'Here you go:\n```json\n[{"command":"df -h","description":"Disk"}]\n```';

    expect(extractTaskCommands(raw)).toEqual([{ command: 'df -h', description: 'Disk' }]);
  });

  test('returns an empty list for an explicit empty array', () => {
    const logger = createLogger();

    expect(extractTaskCommands('[]', logger)).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('logs a warning and returns no commands for prose', () => {
    const logger = createLogger();

    expect(extractTaskCommands('I cannot help with that.', logger)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Unable to decode command list from model response',
      expect.objectContaining({ strategy: 'whole_text', text: 'I cannot help with that.' }),
    );
  });

  test('rejects a top-level object', () => {
    expect(extractTaskCommands('{"command":"ls"}')).toEqual([]);
  });
});
