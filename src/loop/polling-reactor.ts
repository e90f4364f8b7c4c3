/**
 * Polling Reactor
 *
 * Portable adapter for applications without a host scheduler, or that make
 * the bus their main loop. Each iteration:
 * 1. builds read/write interest sets from the enabled watches
 * 2. polls until the nearest timer expiry, or a bounded default when no
 *    timer is armed so stop requests are noticed
 * 3. hands observed readiness to each watch
 * 4. fires expired timers and re-arms them at expiry + interval
 * 5. drains the connection's dispatch queue
 *
 * Timers are fixed-interval: a timer that fired late is re-armed from its
 * scheduled expiry, not from the time it actually fired, so lateness under
 * load does not accumulate.
 */

import type { RawConnection, Timeout, Watch } from '../connection/types';
import { PollInterruptedError, ReactorError, describeError } from '../errors/errors';
import { scopedLogger } from '../logging/logger';
import { WatchFlags } from '../protocol/types';
import type { EventLoopAdapter } from './adapter';
import { drainDispatch } from './dispatch';
import { emptyResult, type Poller, type PollResult } from './readiness';
import { TimerHeap } from './timer-heap';

/** Poll timeout used when no timer is armed */
export const DEFAULT_POLL_TIMEOUT_MS = 4000;

export interface PollingReactorOptions {
  poller: Poller;
  /** Poll timeout when no timer is armed (default: 4000) */
  defaultPollTimeoutMs?: number;
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
}

/**
 * Heap entry kept in a timeout's data slot while it is armed
 */
class ScheduledTimeout {
  constructor(
    readonly timeout: Timeout,
    public expiresAt: number
  ) {}
}

export class PollingReactor implements EventLoopAdapter {
  private readonly watches: Watch[] = [];
  private readonly timers = new TimerHeap<ScheduledTimeout>();
  private readonly poller: Poller;
  private readonly defaultPollTimeoutMs: number;
  private readonly now: () => number;
  private running = false;
  private stopRequested = false;
  /** Unsettled drive() targets */
  private driveTargets = 0;
  /** Run started by drive(), while it lasts */
  private drivenRun: Promise<void> | null = null;
  /** Settles when the current run leaves its loop */
  private runExit: Promise<void> = Promise.resolve();

  constructor(
    private readonly connection: RawConnection,
    options: PollingReactorOptions
  ) {
    this.poller = options.poller;
    this.defaultPollTimeoutMs = options.defaultPollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    this.now = options.now ?? (() => performance.now());
  }

  // ==========================================================================
  // Adapter Hooks
  // ==========================================================================

  addWatch(watch: Watch): void {
    if (!this.watches.includes(watch)) {
      this.watches.push(watch);
    }
    this.refreshPoll();
  }

  removeWatch(watch: Watch): void {
    const index = this.watches.indexOf(watch);
    if (index !== -1) {
      this.watches.splice(index, 1);
    }
    this.refreshPoll();
  }

  watchToggled(_watch: Watch): void {
    // Interest sets are rebuilt from watch state every iteration
    this.refreshPoll();
  }

  addTimeout(timeout: Timeout): void {
    this.unschedule(timeout);
    if (timeout.enabled) {
      this.schedule(timeout, this.now() + timeout.interval);
    }
    this.refreshPoll();
  }

  removeTimeout(timeout: Timeout): void {
    this.unschedule(timeout);
    this.refreshPoll();
  }

  timeoutToggled(timeout: Timeout): void {
    // Re-arm from now so an interval change takes effect on the next firing
    this.addTimeout(timeout);
  }

  close(): void {
    this.watches.length = 0;
    this.timers.clear();
  }

  // ==========================================================================
  // Loop Control
  // ==========================================================================

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run until stop() is called. Outbound buffers are flushed on the way out.
   *
   * @throws {ReactorError} If the poll primitive fails with anything other
   *   than an interruption
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new ReactorError('Reactor is already running');
    }
    this.running = true;
    this.stopRequested = false;
    let exited: () => void = () => undefined;
    this.runExit = new Promise<void>((resolve) => {
      exited = resolve;
    });
    this.logger.debug('reactor started');

    try {
      while (!this.stopRequested) {
        await this.runOnce();
      }
    } finally {
      this.running = false;
      exited();
      if (this.connection.isOpen()) {
        this.connection.flush();
      }
      this.logger.debug('reactor stopped');
    }
  }

  /**
   * Ask the loop to exit after the current iteration
   */
  stop(): void {
    this.stopRequested = true;
    this.poller.wakeup();
  }

  /**
   * Run the loop until `until` settles.
   *
   * Concurrent drives share one run, which stops only when the last
   * outstanding target settles; a target settling early returns without
   * waiting for the others. A loop started with run() is never stopped here.
   * A drive that finds the loop stopped while its target is pending starts
   * it again.
   *
   * @throws {ReactorError} If the shared run fails
   */
  async drive(until: Promise<unknown>): Promise<void> {
    let settled = false;
    const release = () => {
      settled = true;
      this.driveTargets--;
      if (this.driveTargets === 0 && this.drivenRun) {
        this.stop();
      }
    };
    this.driveTargets++;
    const done = until.then(release, release);

    while (!settled) {
      if (!this.running) {
        this.drivenRun = this.startDrivenRun();
      }
      await Promise.race([done, this.drivenRun ?? this.runExit]);
    }

    if (this.driveTargets === 0 && this.drivenRun) {
      await this.drivenRun;
    }
  }

  /**
   * One poll/handle/fire/dispatch iteration
   */
  async runOnce(): Promise<void> {
    const readable: number[] = [];
    const writable: number[] = [];
    for (const watch of this.watches) {
      if (!watch.enabled) {
        continue;
      }
      if (watch.flags & WatchFlags.READABLE) {
        readable.push(watch.fd);
      }
      if (watch.flags & WatchFlags.WRITABLE) {
        writable.push(watch.fd);
      }
    }

    const ready = await this.pollWithRetry(readable, writable, this.pollTimeout());

    // Copy: handlers may add or remove watches
    for (const watch of [...this.watches]) {
      if (!watch.enabled) {
        continue;
      }
      let flags: number = WatchFlags.NONE;
      if ((watch.flags & WatchFlags.READABLE) && ready.readable.has(watch.fd)) {
        flags |= WatchFlags.READABLE;
      }
      if ((watch.flags & WatchFlags.WRITABLE) && ready.writable.has(watch.fd)) {
        flags |= WatchFlags.WRITABLE;
      }
      if (flags !== WatchFlags.NONE) {
        watch.handle(flags);
      }
    }

    this.fireExpiredTimers();
    drainDispatch(this.connection);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Milliseconds until the nearest timer expiry, or the default bound
   */
  pollTimeout(): number {
    const next = this.timers.peek();
    if (!next) {
      return this.defaultPollTimeoutMs;
    }
    return Math.max(0, next.expiresAt - this.now());
  }

  private async pollWithRetry(
    readable: number[],
    writable: number[],
    timeoutMs: number
  ): Promise<PollResult> {
    for (;;) {
      try {
        return await this.poller.poll({ readable, writable, timeoutMs });
      } catch (error) {
        if (error instanceof PollInterruptedError) {
          this.logger.debug('poll interrupted, retrying');
          if (this.stopRequested) {
            return emptyResult();
          }
          continue;
        }
        this.logger.error(`poll failed: ${describeError(error)}`);
        throw new ReactorError('Readiness poll failed', error);
      }
    }
  }

  private fireExpiredTimers(): void {
    const now = this.now();
    for (;;) {
      const next = this.timers.peek();
      if (!next || next.expiresAt > now) {
        break;
      }
      this.timers.pop();
      // Re-arm before handling so toggles made by the handler see it armed
      next.expiresAt += Math.max(1, next.timeout.interval);
      this.timers.push(next);
      next.timeout.handle();
    }
  }

  private startDrivenRun(): Promise<void> {
    const run: Promise<void> = this.run().finally(() => {
      if (this.drivenRun === run) {
        this.drivenRun = null;
      }
    });
    // Every drive that shared this run may already have returned
    void run.catch((error: unknown) => {
      this.logger.error(`driven run failed: ${describeError(error)}`);
    });
    return run;
  }

  /**
   * Cut an in-flight poll short so changed interest sets and timer
   * deadlines take effect on the next iteration
   */
  private refreshPoll(): void {
    if (this.running) {
      this.poller.wakeup();
    }
  }

  private schedule(timeout: Timeout, expiresAt: number): void {
    const entry = new ScheduledTimeout(timeout, expiresAt);
    timeout.data = entry;
    this.timers.push(entry);
  }

  private unschedule(timeout: Timeout): void {
    if (timeout.data instanceof ScheduledTimeout) {
      this.timers.remove(timeout.data);
    }
    timeout.data = undefined;
  }

  private get logger() {
    return scopedLogger('reactor');
  }
}
