/**
 * Transcript
 * Append-only message history of a single team run
 */

import type { AgentId, Message } from '../types/index.js';
import { InvalidReplyError } from '../types/index.js';

/** Author of the task message that opens every run. */
export const USER_SOURCE: AgentId = 'user';

export function createMessage(source: AgentId, content: string, sequenceNumber: number): Message {
  return Object.freeze({ source, content, sequenceNumber });
}

export class Transcript {
  private entries: Message[] = [];

  /**
   * Append the next message. Its sequence number must equal the current
   * length, which keeps numbering gap-free and strictly increasing.
   */
  append(message: Message): void {
    if (message.sequenceNumber !== this.entries.length) {
      throw new InvalidReplyError(
        `Message from ${message.source} has sequence number ${message.sequenceNumber}, ` +
        `expected ${this.entries.length}`
      );
    }
    this.entries.push(Object.isFrozen(message) ? message : Object.freeze({ ...message }));
  }

  get length(): number {
    return this.entries.length;
  }

  /** Next sequence number to be assigned. */
  get nextSequenceNumber(): number {
    return this.entries.length;
  }

  /** Live read-only view; valid until the next append. */
  get messages(): readonly Message[] {
    return this.entries;
  }

  last(): Message | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Read-only copy of the current prefix. */
  snapshot(): readonly Message[] {
    return Object.freeze([...this.entries]);
  }
}
