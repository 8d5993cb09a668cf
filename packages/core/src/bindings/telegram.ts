/**
 * Telegram binding for the message pipeline.
 *
 * Long-polls the Bot API, hands every text-bearing update to the message
 * handler as its own task and doubles as the outbound `ChatTransport`.
 */
import { setTimeout as delay } from 'node:timers/promises';

import { TELEGRAM_POLL_TIMEOUT_SEC, TELEGRAM_RETRY_DELAY_MS } from '../constants.js';
import type { ChatTransport, InboundMessage } from '../contracts/chat.js';
import { describeError } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { TelegramBotApi } from './telegram/api.js';
import { HANDLED_UPDATE_KINDS, type TelegramUpdate } from './telegram/types.js';
import { describeUpdateKind, toInboundMessage } from './telegram/updates.js';

export type TelegramApiLike = Pick<TelegramBotApi, 'deleteWebhook' | 'getUpdates' | 'sendMessage'>;

export interface InboundMessageHandler {
  handle(message: InboundMessage, transport: ChatTransport): Promise<unknown>;
}

export interface TelegramPollerOptions {
  api: TelegramApiLike;
  handler: InboundMessageHandler;
  logger?: Logger;
  pollTimeoutSec?: number;
  retryDelayMs?: number;
  sleep?: (durationMs: number) => Promise<void>;
}

export class TelegramPoller implements ChatTransport {
  private readonly api: TelegramApiLike;

  private readonly handler: InboundMessageHandler;

  private readonly logger: Logger;

  private readonly pollTimeoutSec: number;

  private readonly retryDelayMs: number;

  private readonly sleep: (durationMs: number) => Promise<void>;

  private readonly inFlight = new Set<Promise<void>>();

  private offset: number | undefined;

  private running = false;

  constructor(options: TelegramPollerOptions) {
    this.api = options.api;
    this.handler = options.handler;
    this.logger = options.logger ?? silentLogger;
    this.pollTimeoutSec = options.pollTimeoutSec ?? TELEGRAM_POLL_TIMEOUT_SEC;
    this.retryDelayMs = options.retryDelayMs ?? TELEGRAM_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? ((durationMs: number) => delay(durationMs));
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.api.sendMessage(chatId, text);
  }

  /**
   * Clears any webhook (dropping updates queued while the agent was down) and
   * polls until `stop()` is called.
   */
  async start(): Promise<void> {
    this.running = true;

    try {
      await this.api.deleteWebhook(true);
      this.logger.info('Cleared webhook and pending updates');
    } catch (error) {
      this.logger.warn('deleteWebhook failed', { err: describeError(error) });
    }

    this.logger.info('Polling for Telegram updates');
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        this.logger.error('Polling Telegram updates failed', { err: describeError(error) });
        if (this.running) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }
  }

  stop(): void {
    this.running = false;
  }

  /** Resolves once every dispatched message has finished processing. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async pollOnce(): Promise<number> {
    const updates = await this.api.getUpdates({
      offset: this.offset,
      timeoutSec: this.pollTimeoutSec,
      allowedUpdates: HANDLED_UPDATE_KINDS,
    });

    for (const update of updates) {
      this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
      this.dispatch(update);
    }

    return updates.length;
  }

  private dispatch(update: TelegramUpdate): void {
    const mapped = toInboundMessage(update);
    if (!mapped) {
      this.logger.warn('Unhandled update', {
        updateId: update.update_id,
        kind: describeUpdateKind(update),
      });
      return;
    }

    const task = this.handler
      .handle(mapped.message, this)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error('Message handling failed', {
            updateId: update.update_id,
            chatId: mapped.message.chatId,
            err: describeError(error),
          });
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }
}

export const createTelegramPoller = (options: TelegramPollerOptions): TelegramPoller =>
  new TelegramPoller(options);
