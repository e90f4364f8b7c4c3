/**
 * Handler set declaration helpers.
 *
 * @example
 * ```typescript
 * const echo = defineHandlers([
 *   method('Echo', ({ message }) => message.args, { replySignature: 'i' }),
 *   signalHandler('NameOwnerChanged', ({ message }) => seen.push(message.args[0]), {
 *     interface: 'org.freedesktop.DBus',
 *   }),
 * ], { name: 'echo' });
 * connection.addHandler(echo);
 * ```
 */

import {
  HandlerRegistry,
  type HandlerEntry,
  type HandlerRegistryOptions,
  type MethodEntry,
  type MethodHandler,
  type SignalEntry,
  type SignalHandler,
} from './registry';

export interface MethodOptions {
  interface?: string;
  path?: string;
  replySignature?: string;
}

export interface SignalHandlerOptions {
  interface?: string;
  path?: string;
}

export function method(member: string, handler: MethodHandler, options: MethodOptions = {}): MethodEntry {
  return { kind: 'method', member, handler, ...options };
}

export function signalHandler(member: string, handler: SignalHandler, options: SignalHandlerOptions = {}): SignalEntry {
  return { kind: 'signal', member, handler, ...options };
}

/**
 * Build a handler chain from a table of entries, in dispatch order
 */
export function defineHandlers(entries: readonly HandlerEntry[], options: HandlerRegistryOptions = {}): HandlerRegistry {
  return new HandlerRegistry(entries, options);
}
