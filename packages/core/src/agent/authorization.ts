/**
 * Allow-list of chats permitted to trigger execution. An empty list admits
 * every chat.
 */
export class ChatAuthorizationPolicy {
  private readonly allowed: ReadonlySet<number>;

  constructor(allowedChatIds: Iterable<number> = []) {
    this.allowed = new Set(allowedChatIds);
    Object.freeze(this);
  }

  get allowsAll(): boolean {
    return this.allowed.size === 0;
  }

  isAllowed(chatId: number): boolean {
    return this.allowsAll || this.allowed.has(chatId);
  }
}
