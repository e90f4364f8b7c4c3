/**
 * Host Loop Adapter
 *
 * Embeds a connection into an existing cooperative scheduler. The adapter
 * only registers interest with the host and hands control back; watch and
 * timer callbacks update connection state and defer one dispatch pass,
 * they never run message handlers themselves.
 */

import type { RawConnection, Timeout, Watch } from '../connection/types';
import type { EventLoopAdapter } from './adapter';
import { drainDispatch } from './dispatch';
import type { HostScheduler, IoHandle, TimerHandle } from './host-scheduler';

/**
 * Watch slot: the host handle plus the interest it was created with
 */
class WatchRegistration {
  constructor(
    readonly io: IoHandle,
    readonly flags: number
  ) {}
}

/**
 * Timeout slot. Host timers cannot change period, so the interval the timer
 * was created with is kept here to detect changes.
 */
class TimeoutRegistration {
  constructor(
    readonly timer: TimerHandle,
    readonly interval: number
  ) {}
}

export class HostLoopAdapter implements EventLoopAdapter {
  private readonly registrations = new Set<WatchRegistration | TimeoutRegistration>();
  private dispatchScheduled = false;

  constructor(
    private readonly connection: RawConnection,
    private readonly host: HostScheduler
  ) {}

  // ==========================================================================
  // Watches
  // ==========================================================================

  addWatch(watch: Watch): void {
    this.removeWatch(watch);
    const io = this.host.watchIo(watch.fd, watch.flags, (flags) => this.handleWatch(watch, flags));
    const registration = new WatchRegistration(io, watch.flags);
    watch.data = registration;
    this.registrations.add(registration);
    if (watch.enabled) {
      io.start();
    }
  }

  removeWatch(watch: Watch): void {
    const registration = watch.data;
    if (registration instanceof WatchRegistration) {
      registration.io.stop();
      this.registrations.delete(registration);
    }
    watch.data = undefined;
  }

  watchToggled(watch: Watch): void {
    const registration = watch.data;
    if (!(registration instanceof WatchRegistration) || registration.flags !== watch.flags) {
      // Unknown watch or changed interest: replace the host registration
      this.addWatch(watch);
      return;
    }
    if (watch.enabled) {
      registration.io.start();
    } else {
      registration.io.stop();
    }
  }

  private handleWatch(watch: Watch, flags: number): void {
    watch.handle(flags);
    this.scheduleDispatch();
  }

  // ==========================================================================
  // Timeouts
  // ==========================================================================

  addTimeout(timeout: Timeout): void {
    this.removeTimeout(timeout);
    const registration = this.createTimer(timeout);
    if (timeout.enabled) {
      registration.timer.start();
    }
  }

  removeTimeout(timeout: Timeout): void {
    const registration = timeout.data;
    if (registration instanceof TimeoutRegistration) {
      registration.timer.stop();
      this.registrations.delete(registration);
    }
    timeout.data = undefined;
  }

  timeoutToggled(timeout: Timeout): void {
    const registration = timeout.data;
    if (!(registration instanceof TimeoutRegistration)) {
      this.addTimeout(timeout);
      return;
    }
    if (!timeout.enabled) {
      registration.timer.stop();
      return;
    }
    if (registration.interval !== timeout.interval) {
      // The host cannot change a running timer's period: recreate it
      this.removeTimeout(timeout);
      this.createTimer(timeout).timer.start();
      return;
    }
    registration.timer.start();
  }

  private createTimer(timeout: Timeout): TimeoutRegistration {
    const timer = this.host.createTimer(timeout.interval, () => this.handleTimeout(timeout));
    const registration = new TimeoutRegistration(timer, timeout.interval);
    timeout.data = registration;
    this.registrations.add(registration);
    return registration;
  }

  private handleTimeout(timeout: Timeout): void {
    timeout.handle();
    this.scheduleDispatch();
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Defer one drain of the dispatch queue; repeated events before it runs
   * share the same pass
   */
  private scheduleDispatch(): void {
    if (this.dispatchScheduled) {
      return;
    }
    this.dispatchScheduled = true;
    this.host.defer(() => {
      this.dispatchScheduled = false;
      drainDispatch(this.connection);
    });
  }

  close(): void {
    for (const registration of this.registrations) {
      if (registration instanceof WatchRegistration) {
        registration.io.stop();
      } else {
        registration.timer.stop();
      }
    }
    this.registrations.clear();
  }

  /** Number of live host registrations */
  get size(): number {
    return this.registrations.size;
  }
}
