/**
 * Minimal Telegram Bot API client covering the calls the poller needs.
 */
import { TELEGRAM_API_ROOT } from '../../constants.js';
import { TelegramApiError, describeError } from '../../errors.js';
import { HttpClient, type HttpClientInterface } from '../../utils/fetch.js';
import {
  TelegramEnvelopeSchema,
  TelegramUpdateListSchema,
  type TelegramUpdate,
  type TelegramUpdateKind,
} from './types.js';

export interface GetUpdatesOptions {
  offset?: number;
  timeoutSec?: number;
  limit?: number;
  allowedUpdates?: readonly TelegramUpdateKind[];
}

export interface TelegramBotApiOptions {
  token: string;
  httpClient?: HttpClientInterface;
  apiRoot?: string;
}

// Long polls hold the request open for `timeout` seconds; leave headroom.
const REQUEST_TIMEOUT_PADDING_SEC = 10;

export class TelegramBotApi {
  private readonly token: string;

  private readonly httpClient: HttpClientInterface;

  private readonly apiRoot: string;

  constructor(options: TelegramBotApiOptions) {
    this.token = options.token;
    this.httpClient = options.httpClient ?? new HttpClient();
    this.apiRoot = (options.apiRoot ?? TELEGRAM_API_ROOT).replace(/\/+$/, '');
  }

  methodUrl(method: string): string {
    return `${this.apiRoot}/bot${this.token}/${method}`;
  }

  async deleteWebhook(dropPendingUpdates: boolean): Promise<void> {
    await this.call('deleteWebhook', { drop_pending_updates: dropPendingUpdates });
  }

  async getUpdates(options: GetUpdatesOptions = {}): Promise<TelegramUpdate[]> {
    const timeoutSec = options.timeoutSec ?? 0;
    const payload: Record<string, unknown> = {
      timeout: timeoutSec,
      limit: options.limit ?? 100,
    };
    if (typeof options.offset === 'number') {
      payload.offset = options.offset;
    }
    if (options.allowedUpdates) {
      payload.allowed_updates = options.allowedUpdates;
    }

    const result = await this.call('getUpdates', payload, {
      timeoutSec: timeoutSec + REQUEST_TIMEOUT_PADDING_SEC,
    });

    const updates = TelegramUpdateListSchema.safeParse(result);
    if (!updates.success) {
      throw new TelegramApiError('getUpdates', 'result did not match the expected shape');
    }
    return updates.data;
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.call('sendMessage', {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
    });
  }

  private async call(
    method: string,
    payload: Record<string, unknown>,
    requestOptions: { timeoutSec?: number } = {},
  ): Promise<unknown> {
    const response = await this.httpClient.postJson(this.methodUrl(method), payload, requestOptions);

    let decoded: unknown;
    try {
      decoded = JSON.parse(response.body);
    } catch (error) {
      const detail = response.ok ? describeError(error) : response.body || response.statusText;
      throw new TelegramApiError(method, `${response.status} ${detail}`.trim());
    }

    const envelope = TelegramEnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      throw new TelegramApiError(method, `${response.status} unexpected response body`);
    }

    if (!envelope.data.ok || !response.ok) {
      const code = envelope.data.error_code ?? response.status;
      const detail = envelope.data.description ?? response.statusText;
      throw new TelegramApiError(method, `${code} ${detail}`.trim());
    }

    return envelope.data.result;
  }
}
