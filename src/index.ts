/**
 * buslink
 *
 * Message bus client dispatch engine: event loop adapters, handler chains
 * and the call façade over a raw bus connection.
 */

export * from './protocol';
export * from './errors';

// ============================================================================
// Connection
// ============================================================================

export {
  BusConnection,
  splitMember,
  type CallOptions,
  type SignalOptions,
  type SpawnStrategy,
  type ConnectionSettings,
  type BusConnectionOptions,
  type BusConnectionEvents,
  type HandlerErrorEvent,
} from './connection/bus-connection';
export { PendingCallRegistry, type ReplyCallback } from './connection/pending-calls';
export type { Watch, Timeout, MessageFilter, Dispatchable, RawConnection } from './connection/types';

// ============================================================================
// Event Loops
// ============================================================================

export type { EventLoopAdapter, LoopFactory } from './loop/adapter';
export { drainDispatch } from './loop/dispatch';
export { pollingLoop, hostLoop } from './loop/factories';
export { HostLoopAdapter } from './loop/host-loop';
export { NodeHostScheduler, type HostScheduler, type IoHandle, type TimerHandle } from './loop/host-scheduler';
export { PollingReactor, DEFAULT_POLL_TIMEOUT_MS, type PollingReactorOptions } from './loop/polling-reactor';
export {
  ReadinessHub,
  emptyResult,
  type Poller,
  type PollRequest,
  type PollResult,
  type ReadinessListener,
} from './loop/readiness';
export { TimerHeap, type HeapEntry } from './loop/timer-heap';

// ============================================================================
// Handlers
// ============================================================================

export {
  HandlerRegistry,
  type HandlerContext,
  type HandlerEntry,
  type HandlerRegistration,
  type HandlerRegistryOptions,
  type MethodEntry,
  type MethodHandler,
  type SignalEntry,
  type SignalHandler,
} from './handlers/registry';
export { defineHandlers, method, signalHandler, type MethodOptions, type SignalHandlerOptions } from './handlers/handler-set';
export { compilePathPattern, isPathPattern, matchesPath, type PathMatcher } from './handlers/path-pattern';

// ============================================================================
// Configuration and Logging
// ============================================================================

export * from './config';
export { createLogger, initLogger, getLogger, resetLogger, scopedLogger, log, type LogLevel, type LoggerOptions } from './logging/logger';
