/**
 * Host Scheduler
 *
 * The primitives a cooperative single-threaded runtime offers an adapter:
 * descriptor watches, periodic timers whose period is fixed at creation,
 * and deferral to the next scheduling quantum. NodeHostScheduler maps them
 * onto Node's own event loop, with descriptor readiness coming from a
 * ReadinessHub.
 */

import type { ReadinessHub } from './readiness';

export interface IoHandle {
  readonly active: boolean;
  start(): void;
  stop(): void;
}

export interface TimerHandle {
  readonly active: boolean;
  /** Fixed at creation */
  readonly intervalMs: number;
  start(): void;
  stop(): void;
}

export interface HostScheduler {
  /** Watch a descriptor for the given WatchFlags; the handle starts stopped */
  watchIo(fd: number, flags: number, callback: (flags: number) => void): IoHandle;
  /** Periodic timer; the handle starts stopped */
  createTimer(intervalMs: number, callback: () => void): TimerHandle;
  /** Run the callback on the next scheduling quantum */
  defer(callback: () => void): void;
}

// ============================================================================
// Node.js implementation
// ============================================================================

class HubIoHandle implements IoHandle {
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly hub: ReadinessHub,
    private readonly fd: number,
    private readonly interest: number,
    private readonly callback: (flags: number) => void
  ) {}

  get active(): boolean {
    return this.unsubscribe !== null;
  }

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.hub.subscribe(this.fd, (raised) => {
      const flags = raised & this.interest;
      if (flags) {
        this.callback(flags);
      }
    });

    // Readiness is level-triggered: report a descriptor that was already
    // ready before the watch started
    if (this.hub.readiness(this.fd) & this.interest) {
      setImmediate(() => {
        const flags = this.hub.readiness(this.fd) & this.interest;
        if (this.active && flags) {
          this.callback(flags);
        }
      });
    }
  }

  stop(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }
}

class IntervalTimerHandle implements TimerHandle {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    readonly intervalMs: number,
    private readonly callback: () => void
  ) {}

  get active(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(this.callback, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

export class NodeHostScheduler implements HostScheduler {
  constructor(private readonly hub: ReadinessHub) {}

  watchIo(fd: number, flags: number, callback: (flags: number) => void): IoHandle {
    return new HubIoHandle(this.hub, fd, flags, callback);
  }

  createTimer(intervalMs: number, callback: () => void): TimerHandle {
    return new IntervalTimerHandle(intervalMs, callback);
  }

  defer(callback: () => void): void {
    setImmediate(callback);
  }
}
