/**
 * Transport-neutral view of one inbound chat message.
 */
export interface InboundMessage {
  /** Chat the message was posted to; replies go back here. */
  readonly chatId: number;
  /** Display name of the sender, `unknown` when the platform omits it. */
  readonly senderName: string;
  /** Platform chat kind (private, group, channel, ...), used for logging only. */
  readonly chatKind: string;
  /** Text body, or null for stickers, photos and other non-text messages. */
  readonly text: string | null;
}

/**
 * Outbound half of a chat platform. Implementations reject on delivery
 * failure; the message handler treats every send as best-effort.
 */
export interface ChatTransport {
  sendMessage(chatId: number, text: string): Promise<void>;
}
