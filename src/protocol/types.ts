/**
 * Bus Protocol - Type Definitions
 *
 * Message kinds, header fields and the readiness constants shared between
 * the connection boundary and the event loop adapters.
 */

// ============================================================================
// Enums and Constants
// ============================================================================

/**
 * Message kinds carried on the bus
 */
export enum MessageType {
  METHOD_CALL = 'method_call',
  METHOD_RETURN = 'method_return',
  ERROR = 'error',
  SIGNAL = 'signal'
}

/**
 * Readiness interest flags for a watch (bitmask)
 */
export enum WatchFlags {
  NONE = 0,
  READABLE = 1,
  WRITABLE = 2
}

/**
 * Connection-reported state of the inbound message buffer
 */
export enum DispatchStatus {
  /** Decoded messages are buffered and awaiting delivery */
  DATA_REMAINS = 'data_remains',
  /** Nothing left to dispatch */
  COMPLETE = 'complete',
  /** The connection could not allocate while decoding; retry later */
  NEED_MEMORY = 'need_memory'
}

/**
 * Well-known bus error names
 */
export const ErrorNames = {
  NO_REPLY: 'org.freedesktop.DBus.Error.NoReply',
  UNKNOWN_METHOD: 'org.freedesktop.DBus.Error.UnknownMethod',
  SERVICE_UNKNOWN: 'org.freedesktop.DBus.Error.ServiceUnknown',
  INVALID_ARGS: 'org.freedesktop.DBus.Error.InvalidArgs',
  FAILED: 'org.freedesktop.DBus.Error.Failed',
  DISCONNECTED: 'org.freedesktop.DBus.Error.Disconnected',
  UNCAUGHT_EXCEPTION: 'org.buslink.Error.UncaughtException'
} as const;

export type WellKnownErrorName = (typeof ErrorNames)[keyof typeof ErrorNames];

// ============================================================================
// Message Header
// ============================================================================

/**
 * Header fields of a bus message. Which fields are required depends on the
 * message type (see message.ts).
 */
export interface MessageHeader {
  type: MessageType;
  path?: string;
  interface?: string;
  member?: string;
  errorName?: string;
  destination?: string;
  sender?: string;
  /** Assigned by the connection when the message is sent */
  serial?: number;
  /** Serial of the call a return or error answers */
  replySerial?: number;
  /** Set on method calls sent without a reply expectation */
  noReplyExpected?: boolean;
}

/**
 * Fields accepted when constructing a message
 */
export interface MessageInit extends MessageHeader {
  signature?: string;
  args?: readonly unknown[];
}
