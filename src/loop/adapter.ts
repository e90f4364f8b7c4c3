/**
 * Event Loop Adapter Contract
 *
 * Implemented once per host scheduler. The connection calls these hooks
 * whenever it creates, removes or toggles a watch or timeout; none of them
 * return anything the protocol depends on.
 *
 * On every I/O or timer firing an adapter must first report the event to
 * the connection (watch.handle / timeout.handle) and then schedule a
 * dispatch pass. Message processing never runs inside the event delivery
 * callback itself.
 */

import type { RawConnection, Timeout, Watch } from '../connection/types';

export interface EventLoopAdapter {
  /** Start observing the watch's descriptor if it is enabled */
  addWatch(watch: Watch): void;
  /** Stop observing; safe for a watch that was never enabled or added */
  removeWatch(watch: Watch): void;
  /** Interest or enabled state changed */
  watchToggled(watch: Watch): void;

  addTimeout(timeout: Timeout): void;
  removeTimeout(timeout: Timeout): void;
  /** Enabled state or interval changed; an interval change re-arms the timer */
  timeoutToggled(timeout: Timeout): void;

  /**
   * Run the loop until `until` settles. Only adapters that own the loop
   * (the polling reactor) implement this; under a host scheduler the
   * caller simply awaits.
   */
  drive?(until: Promise<unknown>): Promise<void>;

  /** Release every registration; called when the connection closes */
  close?(): void;
}

/**
 * Builds the adapter for a connection
 */
export type LoopFactory<L extends EventLoopAdapter = EventLoopAdapter> = (connection: RawConnection) => L;
