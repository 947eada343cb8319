/**
 * Read tracker - remembers which files were read recently, measured in
 * tool calls, for read-before-edit enforcement.
 */

import * as path from 'node:path';

interface ReadEntry {
  path: string;
  messageId: number;
}

/** Read entries kept per unit of `maxEntries` */
const RETENTION_FACTOR = 5;

export class ReadTracker {
  private entries: ReadEntry[] = [];
  private messageId = 0;

  /**
   * @param maxEntries - Retention unit; the newest `maxEntries * 5` reads are kept
   */
  constructor(private readonly maxEntries: number = 10) {}

  /**
   * Record a read of `filePath` at `messageId` (default: the current message).
   */
  recordRead(filePath: string, messageId: number = this.messageId): void {
    this.entries.push({ path: path.resolve(filePath), messageId });

    const limit = this.maxEntries * RETENTION_FACTOR;
    if (this.entries.length > limit) {
      this.entries = this.entries.slice(this.entries.length - limit);
    }
  }

  /**
   * Whether `filePath` was read at or after `currentMessageId - withinMessages`.
   */
  wasReadRecently(filePath: string, currentMessageId: number, withinMessages: number): boolean {
    const resolved = path.resolve(filePath);
    const minMessageId = currentMessageId - withinMessages;
    return this.entries.some((entry) => entry.path === resolved && entry.messageId >= minMessageId);
  }

  currentMessageId(): number {
    return this.messageId;
  }

  /** Advance to the next message and return its id */
  nextMessage(): number {
    this.messageId++;
    return this.messageId;
  }

  /** Number of retained read entries */
  size(): number {
    return this.entries.length;
  }
}
