/**
 * Loop factories for BusConnection.
 *
 * @example
 * ```typescript
 * const hub = new ReadinessHub();
 * const connection = new BusConnection(raw, { loop: pollingLoop(hub) });
 * await connection.open();
 * const reply = await connection.call({ destination, path: '/', member: 'org.example.Echo.Echo' });
 * ```
 */

import { getConfig } from '../config';
import type { LoopFactory } from './adapter';
import { HostLoopAdapter } from './host-loop';
import { NodeHostScheduler, type HostScheduler } from './host-scheduler';
import { PollingReactor, type PollingReactorOptions } from './polling-reactor';
import { ReadinessHub, type Poller } from './readiness';

/**
 * Polling reactor over `poller`. The default poll timeout comes from
 * reactor.defaultPollTimeoutMs unless given.
 */
export function pollingLoop(
  poller: Poller,
  options: Omit<PollingReactorOptions, 'poller'> = {}
): LoopFactory<PollingReactor> {
  return (connection) =>
    new PollingReactor(connection, {
      ...options,
      poller,
      defaultPollTimeoutMs: options.defaultPollTimeoutMs ?? getConfig().reactor.defaultPollTimeoutMs,
    });
}

/**
 * Cooperative adapter over a host scheduler, or over Node's own event loop
 * when given a ReadinessHub
 */
export function hostLoop(host: HostScheduler | ReadinessHub): LoopFactory<HostLoopAdapter> {
  const scheduler = host instanceof ReadinessHub ? new NodeHostScheduler(host) : host;
  return (connection) => new HostLoopAdapter(connection, scheduler);
}
