/**
 * Readiness Polling
 *
 * Node.js has no select()/poll() over arbitrary descriptors, so readiness is
 * reported by the transports themselves into a ReadinessHub. The hub keeps
 * level-triggered state per descriptor and acts as the polling primitive of
 * the reactor, and as the I/O source of the Node host scheduler.
 *
 * Events (eventemitter2, '.' delimiter):
 * - fd.<n>          newly raised flags for descriptor n
 * - poll.wakeup     resolve in-flight polls with nothing ready
 * - poll.interrupt  reject in-flight polls with PollInterruptedError
 */

import { EventEmitter2 } from 'eventemitter2';
import { PollInterruptedError } from '../errors/errors';
import { WatchFlags } from '../protocol/types';

export interface PollRequest {
  readable: readonly number[];
  writable: readonly number[];
  /** Longest time to wait, in milliseconds */
  timeoutMs: number;
}

export interface PollResult {
  readable: Set<number>;
  writable: Set<number>;
}

/**
 * Platform readiness-poll primitive
 */
export interface Poller {
  /**
   * Resolve as soon as any requested descriptor is ready, or with empty sets
   * after timeoutMs. May reject with PollInterruptedError, which callers retry.
   */
  poll(request: PollRequest): Promise<PollResult>;
  /** Resolve any in-flight poll early with nothing ready */
  wakeup(): void;
}

export type ReadinessListener = (flags: number, fd: number) => void;

export class ReadinessHub implements Poller {
  private readonly emitter: EventEmitter2;
  private readonly state = new Map<number, number>();

  constructor() {
    this.emitter = new EventEmitter2({
      wildcard: true,
      delimiter: '.',
      maxListeners: 0
    });
  }

  // ==========================================================================
  // Readiness State
  // ==========================================================================

  /**
   * Raise readiness flags on a descriptor. Listeners are told only about
   * flags that were not already raised.
   */
  setReady(fd: number, flags: number): void {
    const previous = this.readiness(fd);
    const next = previous | flags;
    if (next === previous) {
      return;
    }
    this.state.set(fd, next);
    this.emitter.emit(`fd.${fd}`, next & ~previous, fd);
  }

  clearReady(fd: number, flags: number): void {
    const next = this.readiness(fd) & ~flags;
    if (next === WatchFlags.NONE) {
      this.state.delete(fd);
    } else {
      this.state.set(fd, next);
    }
  }

  readiness(fd: number): number {
    return this.state.get(fd) ?? WatchFlags.NONE;
  }

  /**
   * Forget a descriptor (its transport closed)
   */
  release(fd: number): void {
    this.state.delete(fd);
  }

  /**
   * Listen for newly raised flags on one descriptor
   *
   * @returns Unsubscribe function
   */
  subscribe(fd: number, listener: ReadinessListener): () => void {
    const event = `fd.${fd}`;
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  // ==========================================================================
  // Poller
  // ==========================================================================

  poll(request: PollRequest): Promise<PollResult> {
    const immediate = this.collect(request);
    if (immediate.readable.size > 0 || immediate.writable.size > 0 || request.timeoutMs <= 0) {
      return Promise.resolve(immediate);
    }

    return new Promise<PollResult>((resolve, reject) => {
      const onReady: ReadinessListener = () => {
        const ready = this.collect(request);
        if (ready.readable.size > 0 || ready.writable.size > 0) {
          cleanup();
          resolve(ready);
        }
      };
      const onWakeup = () => {
        cleanup();
        resolve(emptyResult());
      };
      const onInterrupt = () => {
        cleanup();
        reject(new PollInterruptedError());
      };
      const timer = setTimeout(onWakeup, request.timeoutMs);
      const cleanup = () => {
        clearTimeout(timer);
        this.emitter.off('fd.*', onReady);
        this.emitter.off('poll.wakeup', onWakeup);
        this.emitter.off('poll.interrupt', onInterrupt);
      };

      this.emitter.on('fd.*', onReady);
      this.emitter.on('poll.wakeup', onWakeup);
      this.emitter.on('poll.interrupt', onInterrupt);
    });
  }

  wakeup(): void {
    this.emitter.emit('poll.wakeup');
  }

  /**
   * Interrupt in-flight polls, as a signal would interrupt select()
   */
  interrupt(): void {
    this.emitter.emit('poll.interrupt');
  }

  private collect(request: PollRequest): PollResult {
    const result = emptyResult();
    for (const fd of request.readable) {
      if (this.readiness(fd) & WatchFlags.READABLE) {
        result.readable.add(fd);
      }
    }
    for (const fd of request.writable) {
      if (this.readiness(fd) & WatchFlags.WRITABLE) {
        result.writable.add(fd);
      }
    }
    return result;
  }
}

export function emptyResult(): PollResult {
  return { readable: new Set(), writable: new Set() };
}
