/**
 * Dispatch Driver
 *
 * Drains a connection's inbound buffer. Called after every I/O or timer
 * event by the adapters, and from the synchronous call path so that a
 * blocking call on a single-threaded reactor keeps making progress.
 */

import type { Dispatchable } from '../connection/types';
import { DispatchStatus } from '../protocol/types';

/**
 * Dispatch messages one at a time while the connection reports data remains.
 *
 * Stops on COMPLETE, and on NEED_MEMORY so the next event retries.
 *
 * @returns Number of messages dispatched
 */
export function drainDispatch(connection: Dispatchable): number {
  let dispatched = 0;
  while (connection.getDispatchStatus() === DispatchStatus.DATA_REMAINS) {
    connection.dispatch();
    dispatched++;
  }
  return dispatched;
}
