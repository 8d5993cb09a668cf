import { TaskCommandListSchema } from '../../contracts/task.js';
import { describeError } from '../../errors.js';
import { extractJsonCandidate } from './jsonExtractor.js';
import type { ParseResult } from './parserTypes.js';

const formatSchemaIssues = (issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>) =>
  issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');

export const parseTaskCommands = (rawContent: string): ParseResult => {
  const candidate = extractJsonCandidate(rawContent);
  const recovery = { strategy: candidate.strategy };

  let decoded: unknown;
  try {
    decoded = JSON.parse(candidate.text);
  } catch (error) {
    return {
      ok: false,
      error: new Error(`Failed to parse command list JSON: ${describeError(error)}`),
      recovery,
    };
  }

  const validated = TaskCommandListSchema.safeParse(decoded);
  if (!validated.success) {
    return {
      ok: false,
      error: new Error(
        `Command list did not match the expected shape: ${formatSchemaIssues(validated.error.issues)}`,
      ),
      recovery,
    };
  }

  return {
    ok: true,
    commands: Object.freeze(validated.data.map((entry) => Object.freeze({ ...entry }))),
    recovery,
  };
};
