/**
 * EventBus: typed runtime lifecycle notifications over Node.js EventEmitter.
 *
 * Handlers run synchronously inside emit(), each behind its own try/catch.
 * Async handler rejections are logged. A ring buffer keeps the most recent
 * events for inspection.
 */
import { EventEmitter } from 'node:events';
import { logger } from '@plugin-runtime/core';
import type { RuntimeEventMap } from './types.js';

export type RuntimeEventName = keyof RuntimeEventMap;

export type RuntimeEventHandler<K extends RuntimeEventName> = (
  payload: RuntimeEventMap[K],
) => void | Promise<void>;

export interface EventRecord<K extends RuntimeEventName = RuntimeEventName> {
  event: K;
  payload: RuntimeEventMap[K];
  timestamp: number;
}

export interface EventBusOptions {
  /** Number of events to retain in the ring buffer (default: 100) */
  bufferSize?: number;
  /** Max listeners per event before warning (default: 50) */
  maxListeners?: number;
}

export class EventBus {
  private readonly emitter = new EventEmitter();
  private buffer: EventRecord[] = [];
  private readonly bufferSize: number;

  constructor(options?: EventBusOptions) {
    this.bufferSize = options?.bufferSize ?? 100;
    this.emitter.setMaxListeners(options?.maxListeners ?? 50);
  }

  emit<K extends RuntimeEventName>(event: K, payload: RuntimeEventMap[K]): void {
    if (this.buffer.length >= this.bufferSize) {
      this.buffer.shift();
    }
    const record: EventRecord<K> = { event, payload, timestamp: Date.now() };
    this.buffer.push(record);

    for (const listener of this.emitter.listeners(event)) {
      try {
        const result: unknown = Reflect.apply(listener, undefined, [payload]);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            logger.error({ event, err }, 'Async event handler rejected');
          });
        }
      } catch (err) {
        logger.error({ event, err }, 'Event handler threw');
      }
    }
  }

  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends RuntimeEventName>(
    event: K,
    handler: RuntimeEventHandler<K>,
  ): () => void {
    this.emitter.on(event, handler);
    return () => {
      this.emitter.removeListener(event, handler);
    };
  }

  /** Recent events, oldest first, optionally filtered by name. */
  getBuffer(event?: RuntimeEventName): ReadonlyArray<EventRecord> {
    return event
      ? this.buffer.filter((record) => record.event === event)
      : [...this.buffer];
  }

  listenerCount(event: RuntimeEventName): number {
    return this.emitter.listenerCount(event);
  }

  /** Remove all listeners and clear the buffer. */
  destroy(): void {
    this.emitter.removeAllListeners();
    this.buffer = [];
  }
}
