/**
 * Chat-facing renderings of a plan and of its execution report.
 */
import { REPORT_STDERR_LIMIT, REPORT_STDOUT_LIMIT } from '../constants.js';
import type { ExecutionReport, TaskCommand } from '../contracts/task.js';
import { truncateText } from '../utils/text.js';

export const MESSAGES = {
  analyzing: '🔄 Analyzing task...',
  nothingToRun: 'ℹ️ No commands need to be executed for this message.',
  gatewayFailed: (detail: string): string => `❌ Model call failed: ${detail}`,
} as const;

const UNKNOWN_DESCRIPTION = 'unknown';

export function formatPlan(commands: readonly TaskCommand[]): string {
  const lines = commands.map(
    (task, index) => `${index + 1}. ${task.description} → \`${task.command}\``,
  );
  return `📝 Execution plan:\n${lines.join('\n')}`;
}

export function formatReport(
  commands: readonly TaskCommand[],
  results: ExecutionReport,
): string {
  let report = '📋 Task execution report\n\n';

  results.forEach((result, index) => {
    const description = commands[index]?.description ?? UNKNOWN_DESCRIPTION;
    const status = result.success ? '✅' : '❌';

    report += `${status} ${description}\n`;
    report += `  Command: ${result.command}\n`;
    if (result.stdout) {
      report += `  Output:\n${truncateText(result.stdout, REPORT_STDOUT_LIMIT)}\n`;
    }
    if (result.stderr) {
      report += `  Error:\n${truncateText(result.stderr, REPORT_STDERR_LIMIT)}\n`;
    }
    report += '\n';
  });

  return report;
}
