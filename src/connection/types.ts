/**
 * Connection Boundary
 *
 * Interfaces consumed from the lower-level messaging library: the raw
 * connection with its dispatch queue, and the watch and timeout objects it
 * hands to an event loop adapter. The library owns these objects; adapters
 * only observe them and keep bookkeeping in the `data` slot.
 */

import type { BusMessage } from '../protocol/message';
import type { DispatchStatus } from '../protocol/types';
import type { EventLoopAdapter } from '../loop/adapter';

/**
 * Interest in readiness of one file descriptor
 */
export interface Watch {
  /** Descriptor to observe (opaque handle) */
  readonly fd: number;
  /** Interest mask of WatchFlags */
  readonly flags: number;
  readonly enabled: boolean;
  /** Adapter-owned slot for scheduler bookkeeping */
  data: unknown;
  /** Report observed readiness (WatchFlags mask) back to the connection */
  handle(flags: number): void;
}

/**
 * Recurring interval timer owned by the connection
 */
export interface Timeout {
  /** Interval in milliseconds; may change while the timeout is enabled */
  readonly interval: number;
  readonly enabled: boolean;
  /** Adapter-owned slot for scheduler bookkeeping */
  data: unknown;
  /** Report that the interval elapsed */
  handle(): void;
}

/**
 * Receives every inbound message during dispatch.
 * Returns true when the message was consumed.
 */
export type MessageFilter = (message: BusMessage) => boolean;

/**
 * The part of a connection the dispatch driver needs
 */
export interface Dispatchable {
  getDispatchStatus(): DispatchStatus;
  /** Deliver one buffered message to the filters */
  dispatch(): DispatchStatus;
}

/**
 * Raw bus connection provided by the transport/marshaling layer
 */
export interface RawConnection extends Dispatchable {
  open(address: string): Promise<void>;
  close(): void;
  isOpen(): boolean;
  /** Unique name assigned by the bus (e.g. ":1.42"), once open */
  getUniqueName(): string | undefined;
  /** Queue a message for sending; returns the serial assigned to it */
  send(message: BusMessage): number;
  /** Write out everything queued by send() */
  flush(): void;
  addFilter(filter: MessageFilter): void;
  removeFilter(filter: MessageFilter): void;
  /**
   * Install the adapter. The connection calls back into it whenever it
   * creates, removes or toggles a watch or timeout, including for those
   * that exist at installation time.
   */
  setLoop(loop: EventLoopAdapter): void;
}
