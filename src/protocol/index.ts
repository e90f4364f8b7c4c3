/**
 * Bus Message Protocol
 *
 * Message kinds, header validation, signatures and the immutable
 * BusMessage used by the router and the call façade.
 */

// ============================================================================
// Type Definitions
// ============================================================================

export * from './types';

// ============================================================================
// Validation Schemas
// ============================================================================

export * from './schemas';

// ============================================================================
// Signatures
// ============================================================================

export { MAX_SIGNATURE_LENGTH, splitSignature, isValidSignature } from './signature';

// ============================================================================
// Messages
// ============================================================================

export { BusMessage, type MethodCallInit, type SignalInit } from './message';
