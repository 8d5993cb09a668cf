/**
 * CLI bootstrap: parse arguments, load configuration, wire the pipeline and
 * keep the Telegram poller running until a termination signal arrives.
 */
import chalk from 'chalk';
import {
  ChatAuthorizationPolicy,
  TelegramBotApi,
  createConsoleLogger,
  createMessageHandler,
  createModelGateway,
  createTaskExecutor,
  createTelegramPoller,
  loadAppConfig,
  maskSecret,
  parseLogLevel,
  type Logger,
  type ResolvedAppConfig,
  type TelegramPollerOptions,
} from '@shellcourier/core';

import { USAGE, parseCliArgs, type CliOptions } from './cliOptions.js';

type CliIo = {
  stdout?: (message: string) => void;
  stderr?: (message: string) => void;
};

type ResolvedCliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
};

export interface PollerHandle {
  start(): Promise<void>;
  stop(): void;
  idle(): Promise<void>;
}

export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
  loadConfig?: typeof loadAppConfig;
  createPoller?: (options: TelegramPollerOptions) => PollerHandle;
  signals?: SignalSource;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function resolveIo(io?: CliIo): ResolvedCliIo {
  const target = io ?? {};
  const stdout = typeof target.stdout === 'function' ? target.stdout : console.log;
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr };
}

const describeFailure = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);

function describeAllowList(config: ResolvedAppConfig): string {
  const ids = config.telegram.allowedChatIds;
  return ids.length === 0 ? 'all chats' : ids.join(',');
}

function buildPollerOptions(config: ResolvedAppConfig, logger: Logger): TelegramPollerOptions {
  const gateway = createModelGateway(config.llm, { logger });
  const executor = createTaskExecutor({
    workingDir: config.executor.workingDir,
    timeoutSec: config.executor.timeoutSecs,
    logger,
  });
  const handler = createMessageHandler({
    gateway,
    executor,
    policy: new ChatAuthorizationPolicy(config.telegram.allowedChatIds),
    echoResult: config.executor.echoResult,
    logger,
  });

  return {
    api: new TelegramBotApi({ token: config.telegram.botToken }),
    handler,
    logger,
  };
}

async function serve(
  options: CliOptions,
  deps: CliDependencies,
  logger: Logger,
): Promise<void> {
  const loadConfig = deps.loadConfig ?? loadAppConfig;
  const config = loadConfig(options.configPath, {
    cwd: deps.cwd ?? process.cwd(),
    env: deps.env ?? process.env,
  });

  logger.info('Starting shellcourier', {
    model: config.llm.model,
    token: maskSecret(config.telegram.botToken),
    allowed: describeAllowList(config),
    workingDir: config.executor.workingDir ?? deps.cwd ?? process.cwd(),
  });

  const createPoller = deps.createPoller ?? createTelegramPoller;
  const poller = createPoller(buildPollerOptions(config, logger));

  const signals = deps.signals ?? process;
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info('Shutting down', { signal });
    poller.stop();
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.once(signal, onSignal);
  }

  try {
    await poller.start();
    await poller.idle();
    logger.info('Stopped');
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.removeListener(signal, onSignal);
    }
  }
}

export async function runCli(
  argv: string[] = process.argv,
  io?: CliIo,
  deps: CliDependencies = {},
): Promise<void> {
  const { stdout, stderr } = resolveIo(io);

  let options: CliOptions;
  try {
    options = parseCliArgs(argv.slice(2));
  } catch (error) {
    stderr(chalk.red(describeFailure(error)));
    stderr(USAGE);
    process.exitCode = 1;
    return;
  }

  if (options.help) {
    stdout(USAGE);
    return;
  }

  const env = deps.env ?? process.env;
  const logger = deps.logger ?? createConsoleLogger({ level: parseLogLevel(env.LOG_LEVEL) });

  try {
    await serve(options, deps, logger);
  } catch (error) {
    stderr(chalk.red(describeFailure(error)));
    process.exitCode = 1;
  }
}
