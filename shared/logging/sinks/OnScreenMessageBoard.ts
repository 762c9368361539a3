import type { Color } from '../colors.ts';
import type { TransientDisplaySink } from '../types.ts';

export interface OnScreenMessage {
  id: number;
  /** -1 for independent entries */
  key: number;
  line: string;
  color: Color;
  createdAt: number;
  expiresAt: number;
}

export type MessageListener = (message: OnScreenMessage) => void;
export type ExpiryListener = (messages: OnScreenMessage[]) => void;

export interface OnScreenMessageBoardOptions {
  /** Entries kept at once; the oldest is evicted first (default: 50) */
  maxMessages?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

const DEFAULT_MAX_MESSAGES = 50;

/**
 * In-memory on-screen debug message list
 *
 * Keyed entries (key >= 0) replace the entry holding the same key; key -1
 * always adds. While disabled the board behaves like a missing display surface
 * and ignores `show`.
 */
export class OnScreenMessageBoard implements TransientDisplaySink {
  private messages: OnScreenMessage[] = [];
  private nextId = 1;
  private enabled = true;
  private readonly maxMessages: number;
  private readonly now: () => number;
  private messageListeners = new Set<MessageListener>();
  private expiryListeners = new Set<ExpiryListener>();

  constructor(options: OnScreenMessageBoardOptions = {}) {
    this.maxMessages = Math.max(1, options.maxMessages ?? DEFAULT_MAX_MESSAGES);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.messages.length;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  show(line: string, color: Color, durationSeconds: number, key = -1): void {
    if (!this.enabled) return;

    const createdAt = this.now();
    const message: OnScreenMessage = {
      id: this.nextId++,
      key,
      line,
      color,
      createdAt,
      expiresAt: createdAt + durationSeconds * 1000,
    };

    if (key >= 0) {
      this.messages = this.messages.filter(existing => existing.key !== key);
    }
    this.messages.push(message);

    if (this.messages.length > this.maxMessages) {
      this.messages.splice(0, this.messages.length - this.maxMessages);
    }

    for (const listener of this.messageListeners) {
      try {
        listener(message);
      } catch (error) {
        console.error('[OnScreenMessageBoard] Message listener failed:', error);
      }
    }
  }

  /**
   * Messages still on screen, newest first
   */
  getVisibleMessages(now: number = this.now()): OnScreenMessage[] {
    return this.messages
      .filter(message => message.expiresAt > now)
      .reverse();
  }

  /**
   * Drop expired messages and return them
   */
  tick(now: number = this.now()): OnScreenMessage[] {
    const expired = this.messages.filter(message => message.expiresAt <= now);
    if (expired.length === 0) return expired;

    this.messages = this.messages.filter(message => message.expiresAt > now);

    for (const listener of this.expiryListeners) {
      try {
        listener(expired);
      } catch (error) {
        console.error('[OnScreenMessageBoard] Expiry listener failed:', error);
      }
    }
    return expired;
  }

  clear(): void {
    this.messages = [];
  }

  onMessage(listener: MessageListener): () => void {
    this.messageListeners.add(listener);
    return () => {
      this.messageListeners.delete(listener);
    };
  }

  onExpired(listener: ExpiryListener): () => void {
    this.expiryListeners.add(listener);
    return () => {
      this.expiryListeners.delete(listener);
    };
  }
}
