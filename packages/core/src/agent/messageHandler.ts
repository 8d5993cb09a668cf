/**
 * Per-message pipeline: authorize, ask the model, extract the plan, run it,
 * report back.
 *
 * Each call to `handle` is independent; the only shared state is the
 * read-only configuration captured at construction. Every outbound send is
 * best-effort, and no per-message failure escapes `handle`.
 */
import type { ChatTransport, InboundMessage } from '../contracts/chat.js';
import type { ExecutionReport, TaskCommand } from '../contracts/task.js';
import { describeError } from '../errors.js';
import type { ModelGateway } from '../openai/client.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ChatAuthorizationPolicy } from './authorization.js';
import { MESSAGES, formatPlan, formatReport } from './reportFormatter.js';
import { extractTaskCommands } from './responseParser.js';

export interface PlanExecutor {
  runAll(commands: readonly TaskCommand[]): Promise<ExecutionReport>;
}

export type CommandExtractor = (rawContent: string, logger?: Logger) => readonly TaskCommand[];

export interface MessageHandlerOptions {
  readonly gateway: ModelGateway;
  readonly executor: PlanExecutor;
  readonly policy?: ChatAuthorizationPolicy;
  /** Send the execution report back to the chat. */
  readonly echoResult?: boolean;
  readonly extract?: CommandExtractor;
  readonly logger?: Logger;
}

export type MessageOutcome =
  | 'unauthorized'
  | 'no_text'
  | 'gateway_failed'
  | 'no_commands'
  | 'executed';

export class MessageHandler {
  private readonly gateway: ModelGateway;

  private readonly executor: PlanExecutor;

  private readonly policy: ChatAuthorizationPolicy;

  private readonly echoResult: boolean;

  private readonly extract: CommandExtractor;

  private readonly logger: Logger;

  constructor(options: MessageHandlerOptions) {
    this.gateway = options.gateway;
    this.executor = options.executor;
    this.policy = options.policy ?? new ChatAuthorizationPolicy();
    this.echoResult = options.echoResult ?? true;
    this.extract = options.extract ?? extractTaskCommands;
    this.logger = options.logger ?? silentLogger;
  }

  async handle(message: InboundMessage, transport: ChatTransport): Promise<MessageOutcome> {
    const { chatId } = message;

    this.logger.info('Received message', {
      chatId,
      from: message.senderName,
      kind: message.chatKind,
      text: message.text ?? '<non-text message>',
    });

    if (!this.policy.isAllowed(chatId)) {
      this.logger.info('Ignoring unauthorized chat', { chatId });
      return 'unauthorized';
    }

    if (message.text === null) {
      this.logger.info('Ignoring non-text message', { chatId });
      return 'no_text';
    }

    await this.send(transport, chatId, MESSAGES.analyzing);

    let response: string;
    try {
      response = await this.gateway.chat(message.text);
    } catch (error) {
      const detail = describeError(error);
      this.logger.error('Model call failed', { chatId, err: detail });
      await this.send(transport, chatId, MESSAGES.gatewayFailed(detail));
      return 'gateway_failed';
    }

    const commands = this.extract(response, this.logger);
    if (commands.length === 0) {
      await this.send(transport, chatId, MESSAGES.nothingToRun);
      return 'no_commands';
    }

    await this.send(transport, chatId, formatPlan(commands));

    const results = await this.executor.runAll(commands);

    if (this.echoResult) {
      await this.send(transport, chatId, formatReport(commands, results));
    }

    return 'executed';
  }

  private async send(transport: ChatTransport, chatId: number, text: string): Promise<void> {
    try {
      await transport.sendMessage(chatId, text);
    } catch (error) {
      this.logger.warn('Failed to deliver reply', { chatId, err: describeError(error) });
    }
  }
}

export const createMessageHandler = (options: MessageHandlerOptions): MessageHandler =>
  new MessageHandler(options);
