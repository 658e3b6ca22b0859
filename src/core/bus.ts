/**
 * Message Bus: bounded in-process queue between listeners and consumers
 *
 * Listeners push with send(); when the buffer is full, send() waits until a
 * consumer takes something (backpressure). close() marks the receiving side
 * as gone: pending and future sends resolve false, and receive() drains what
 * is buffered before returning null.
 */

import type { ChannelMessage, MessageSink } from './types';

export class MessageBus<T = ChannelMessage> implements MessageSink<T> {
  private buffer: T[] = [];
  private receivers: Array<(item: T | null) => void> = [];
  private blockedSenders: Array<() => void> = [];
  private closed = false;

  constructor(private readonly capacity = 100) {
    if (capacity < 1) throw new Error('MessageBus capacity must be at least 1');
  }

  async send(item: T): Promise<boolean> {
    while (!this.closed && this.receivers.length === 0 && this.buffer.length >= this.capacity) {
      await new Promise<void>(resolve => this.blockedSenders.push(resolve));
    }
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  async receive(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      this.blockedSenders.shift()?.();
      return item;
    }
    if (this.closed) return null;
    return new Promise<T | null>(resolve => this.receivers.push(resolve));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) receiver(null);
    for (const wake of this.blockedSenders.splice(0)) wake();
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      const item = await this.receive();
      if (item === null) return;
      yield item;
    }
  }
}
