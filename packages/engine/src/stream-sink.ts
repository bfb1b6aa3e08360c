import { logger } from '@tessera/shared';
import type { StreamEvent, StreamSink } from './types.js';

const log = logger.child({ module: 'stream-sink' });

/** Discards every event. */
export const nullSink: StreamSink = {
  emit() {},
};

/** Forwards each event to a callback, e.g. a WebSocket send. */
export function callbackSink(fn: (event: StreamEvent) => void | Promise<void>): StreamSink {
  return { emit: fn };
}

interface PendingWrite {
  event: StreamEvent;
  accepted: () => void;
}

/**
 * Bounded FIFO between the engine and a presentation layer. `emit` waits
 * while `capacity` events are buffered; consumers read with `for await`.
 * Events emitted after `close()` are dropped.
 */
export class EventChannel implements StreamSink, AsyncIterable<StreamEvent> {
  private buffer: StreamEvent[] = [];
  private writers: PendingWrite[] = [];
  private readers: Array<(result: IteratorResult<StreamEvent>) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`event channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Buffered plus blocked events */
  get size(): number {
    return this.buffer.length + this.writers.length;
  }

  emit(event: StreamEvent): Promise<void> {
    if (this.closed) {
      log.debug({ type: event.type }, 'event dropped after close');
      return Promise.resolve();
    }
    const reader = this.readers.shift();
    if (reader) {
      reader({ value: event, done: false });
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity && this.writers.length === 0) {
      this.buffer.push(event);
      return Promise.resolve();
    }
    return new Promise<void>((accepted) => {
      this.writers.push({ event, accepted });
    });
  }

  /** Ends iteration once buffered events are consumed and releases blocked producers. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const writer of this.writers.splice(0)) {
      this.buffer.push(writer.event);
      writer.accepted();
    }
    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }

  private take(): StreamEvent | undefined {
    const event = this.buffer.shift();
    const writer = this.writers.shift();
    if (writer) {
      this.buffer.push(writer.event);
      writer.accepted();
    }
    return event;
  }

  private next(): Promise<IteratorResult<StreamEvent>> {
    const event = this.take();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.readers.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

export function createEventChannel(capacity = 64): EventChannel {
  return new EventChannel(capacity);
}
