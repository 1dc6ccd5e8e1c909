/**
 * MessageHistory - Ordered turn history for one ask call
 *
 * The sequence is the protocol's turn history: append-only, never reordered
 * or deduplicated. A tool round's results go in through a single
 * addMessages() call after the round has joined, so concurrent handlers
 * never write to the history themselves.
 */

import type { Message } from '@shared/index.js';

export class MessageHistory {
  private readonly messages: Message[] = [];
  private appendEvents = 0;

  /**
   * @param initial - Messages the conversation starts with, in order
   */
  constructor(initial: readonly Message[] = []) {
    this.messages.push(...initial);
  }

  /**
   * Add a message to the history
   */
  addMessage(message: Message): void {
    this.messages.push(message);
    this.appendEvents++;
  }

  /**
   * Add multiple messages as one append event
   *
   * @param messages - Messages to add, in order
   */
  addMessages(messages: readonly Message[]): void {
    if (messages.length === 0) {
      return;
    }
    this.messages.push(...messages);
    this.appendEvents++;
  }

  /**
   * Snapshot of the messages; later appends do not affect it
   */
  getMessages(): Message[] {
    return [...this.messages];
  }

  getLastMessage(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  get length(): number {
    return this.messages.length;
  }

  /**
   * Number of append operations since construction
   */
  get appendCount(): number {
    return this.appendEvents;
  }
}
