/**
 * Argument parsing for the `shellcourier` executable.
 */

export interface CliOptions {
  configPath?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = [
  'Usage: shellcourier [--config <path>] [--help]',
  '',
  'Options:',
  '  -c, --config <path>  Configuration file (default: ./config.json)',
  '  -h, --help           Show this help and exit',
  '',
  'Environment:',
  '  TELEGRAM_BOT_TOKEN, AGENT_API_KEY (or OPENAI_API_KEY), AGENT_BASE_URL,',
  '  AGENT_MODEL override the matching config values. LOG_LEVEL sets verbosity.',
].join('\n');

/**
 * Parses the arguments that follow the script path (`process.argv.slice(2)`).
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
      continue;
    }

    if (arg === '-c' || arg === '--config') {
      const value = args[index + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliUsageError(`${arg} expects a file path`);
      }
      options.configPath = value;
      index += 1;
      continue;
    }

    if (arg.startsWith('--config=')) {
      const value = arg.slice('--config='.length);
      if (!value) {
        throw new CliUsageError('--config expects a file path');
      }
      options.configPath = value;
      continue;
    }

    throw new CliUsageError(`Unknown argument: ${arg}`);
  }

  return options;
}
