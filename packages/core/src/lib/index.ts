/**
 * Aggregated library entry for the shellcourier core runtime.
 *
 * Responsibilities:
 * - Provide a CLI-agnostic export surface for package consumers.
 * - Surface the message pipeline, configuration helpers, the Telegram binding
 *   and the shared utilities the CLI wires together.
 */

export * from '../constants.js';
export * from '../errors.js';
export * from '../contracts/index.js';

export {
  extractTaskCommands,
  extractJsonCandidate,
  parseTaskCommands,
  type RecoveryStrategy,
  type JsonCandidate,
  type ParseResult,
} from '../agent/responseParser.js';
export { runCommand, type CommandRunner, type RunOptions } from '../commands/run.js';
export {
  TaskExecutor,
  createTaskExecutor,
  type TaskExecutorOptions,
} from '../agent/taskExecutor.js';
export { ChatAuthorizationPolicy } from '../agent/authorization.js';
export { MESSAGES, formatPlan, formatReport } from '../agent/reportFormatter.js';
export {
  MessageHandler,
  createMessageHandler,
  type CommandExtractor,
  type MessageHandlerOptions,
  type MessageOutcome,
  type PlanExecutor,
} from '../agent/messageHandler.js';

export {
  OpenAICompatibleGateway,
  createModelGateway,
  normalizeBaseUrl,
  type ModelGateway,
  type ModelGatewayConfig,
  type ModelGatewayDependencies,
} from '../openai/client.js';

export { DEFAULT_SYSTEM_PROMPT, resolveSystemPrompt } from '../config/systemPrompt.js';
export {
  AppConfigSchema,
  DEFAULT_CONFIG_FILE,
  applyEnvOverrides,
  loadAppConfig,
  parseAppConfig,
  resolveConfigPath,
  type AppConfig,
  type LoadAppConfigOptions,
  type ResolvedAppConfig,
} from '../config/appConfig.js';

export { TelegramBotApi, type TelegramBotApiOptions } from '../bindings/telegram/api.js';
export {
  TelegramPoller,
  createTelegramPoller,
  type InboundMessageHandler,
  type TelegramApiLike,
  type TelegramPollerOptions,
} from '../bindings/telegram.js';
export { toInboundMessage } from '../bindings/telegram/updates.js';

export { HttpClient, type HttpClientInterface } from '../utils/fetch.js';
export {
  createConsoleLogger,
  parseLogLevel,
  silentLogger,
  type LogLevel,
  type Logger,
} from '../utils/logger.js';
export { maskSecret, truncateText } from '../utils/text.js';
