import type { InboundMessage } from '../../contracts/chat.js';
import type { TelegramMessage, TelegramUpdate, TelegramUpdateKind } from './types.js';

export interface MappedUpdate {
  readonly kind: TelegramUpdateKind;
  readonly message: InboundMessage;
}

const UNKNOWN_SENDER = 'unknown';

const senderName = (message: TelegramMessage): string =>
  message.from?.first_name ?? message.author_signature ?? UNKNOWN_SENDER;

const toMessage = (message: TelegramMessage): InboundMessage => ({
  chatId: message.chat.id,
  senderName: senderName(message),
  chatKind: message.chat.type,
  text: message.text ?? null,
});

/**
 * Maps a raw update to the transport-neutral message view. Channel posts are
 * treated like ordinary messages; other update kinds yield null.
 */
export function toInboundMessage(update: TelegramUpdate): MappedUpdate | null {
  if (update.message) {
    return { kind: 'message', message: toMessage(update.message) };
  }
  if (update.channel_post) {
    return { kind: 'channel_post', message: toMessage(update.channel_post) };
  }
  return null;
}

export function describeUpdateKind(update: TelegramUpdate): string {
  const keys = Object.keys(update).filter((key) => key !== 'update_id');
  return keys.length > 0 ? keys.join(',') : 'empty';
}
