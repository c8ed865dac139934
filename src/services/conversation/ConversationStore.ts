import { ConversationState } from '../../types/conversation';

interface StoredConversation {
  state: ConversationState;
  touchedAt: number;
}

/**
 * Open conversations keyed by sender. An entry idle for longer than the TTL
 * is dropped the next time it is read.
 */
export class ConversationStore {
  private readonly entries = new Map<string, StoredConversation>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(senderId: string): ConversationState | undefined {
    const entry = this.entries.get(senderId);
    if (!entry) return undefined;
    if (this.now() - entry.touchedAt > this.ttlMs) {
      this.entries.delete(senderId);
      return undefined;
    }
    return entry.state;
  }

  set(senderId: string, state: ConversationState): void {
    this.entries.set(senderId, { state, touchedAt: this.now() });
  }

  delete(senderId: string): void {
    this.entries.delete(senderId);
  }

  has(senderId: string): boolean {
    return this.get(senderId) !== undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}
