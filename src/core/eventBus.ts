/**
 * EventBus: bounded multi-producer / single-consumer queue between the
 * monitors and the event processor.
 *
 * - publish() resolves as soon as the event is buffered. When the buffer is
 *   full the returned promise stays pending until the consumer frees a slot,
 *   so producers feel backpressure and nothing is dropped.
 * - Waiting producers are admitted FIFO and stamped with `seq` on admission,
 *   so the consumer always observes strictly increasing sequence numbers.
 * - close() is terminal. Blocked and later publishers get BusClosedError;
 *   consume() drains what is buffered, then resolves null.
 */

import { BusClosedError } from './errors.js';
import type { EventPayload, PipelineEvent } from './events.js';
import type { Metrics } from './metrics.js';
import type { TimeSource } from './time.js';

interface PendingPublish {
  producer: string;
  payload: EventPayload;
  resolve: (event: PipelineEvent) => void;
  reject: (err: BusClosedError) => void;
}

export class EventBus {
  private readonly buffer: PipelineEvent[] = [];
  private readonly blocked: PendingPublish[] = [];
  private readonly producerSeqs = new Map<string, number>();
  private waitingConsumer: ((event: PipelineEvent | null) => void) | null = null;
  private nextSeq = 1;
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly time: TimeSource,
    private readonly metrics: Metrics
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('bus capacity must be a positive integer');
    }
  }

  publish(producer: string, payload: EventPayload): Promise<PipelineEvent> {
    if (this.closed) {
      return Promise.reject(new BusClosedError({ producer, kind: payload.kind }));
    }

    if (this.waitingConsumer) {
      // Consumer idle means the buffer is empty; hand over directly.
      const deliver = this.waitingConsumer;
      this.waitingConsumer = null;
      const event = this.stamp(producer, payload);
      deliver(event);
      return Promise.resolve(event);
    }

    if (this.buffer.length < this.capacity && this.blocked.length === 0) {
      const event = this.stamp(producer, payload);
      this.buffer.push(event);
      this.metrics.gauge('bus.depth', this.buffer.length);
      return Promise.resolve(event);
    }

    this.metrics.increment('bus.backpressure');
    return new Promise<PipelineEvent>((resolve, reject) => {
      this.blocked.push({ producer, payload, resolve, reject });
    });
  }

  consume(): Promise<PipelineEvent | null> {
    const next = this.buffer.shift();
    if (next) {
      this.admitBlocked();
      this.metrics.gauge('bus.depth', this.buffer.length);
      return Promise.resolve(next);
    }
    if (this.closed) return Promise.resolve(null);
    if (this.waitingConsumer) {
      return Promise.reject(new Error('event bus supports a single consumer'));
    }
    return new Promise<PipelineEvent | null>((resolve) => {
      this.waitingConsumer = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const pending of this.blocked.splice(0)) {
      pending.reject(new BusClosedError({ producer: pending.producer, kind: pending.payload.kind }));
    }
    if (this.waitingConsumer) {
      const wake = this.waitingConsumer;
      this.waitingConsumer = null;
      wake(null);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  depth(): number {
    return this.buffer.length;
  }

  blockedPublishers(): number {
    return this.blocked.length;
  }

  private admitBlocked(): void {
    while (this.buffer.length < this.capacity) {
      const pending = this.blocked.shift();
      if (!pending) return;
      const event = this.stamp(pending.producer, pending.payload);
      this.buffer.push(event);
      pending.resolve(event);
    }
  }

  private stamp(producer: string, payload: EventPayload): PipelineEvent {
    const producerSeq = (this.producerSeqs.get(producer) ?? 0) + 1;
    this.producerSeqs.set(producer, producerSeq);
    this.metrics.increment('bus.published');
    return { ...payload, seq: this.nextSeq++, producer, producerSeq, publishedAt: this.time.now() };
  }
}
