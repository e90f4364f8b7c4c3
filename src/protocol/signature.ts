/**
 * Type signature splitting
 *
 * Splits a signature string into its complete types so that argument arity
 * can be checked at message construction. Encoding each value against its
 * type is left to the marshaling layer.
 */

import { SignatureError } from '../errors/errors';

const BASIC_TYPES = new Set(['y', 'b', 'n', 'q', 'i', 'u', 'x', 't', 'd', 'h', 's', 'o', 'g']);

/** Maximum signature length accepted by the bus */
export const MAX_SIGNATURE_LENGTH = 255;

/**
 * Split a signature into complete types.
 *
 * @example splitSignature('sa{sv}(ii)') // ['s', 'a{sv}', '(ii)']
 */
export function splitSignature(signature: string): string[] {
  if (signature.length > MAX_SIGNATURE_LENGTH) {
    throw new SignatureError(signature, `longer than ${MAX_SIGNATURE_LENGTH} characters`);
  }

  const types: string[] = [];
  let pos = 0;
  while (pos < signature.length) {
    const end = readCompleteType(signature, pos, false);
    types.push(signature.slice(pos, end));
    pos = end;
  }
  return types;
}

/**
 * Check a signature without throwing
 */
export function isValidSignature(signature: string): boolean {
  try {
    splitSignature(signature);
    return true;
  } catch (error) {
    if (error instanceof SignatureError) {
      return false;
    }
    throw error;
  }
}

/**
 * Return the index just past the complete type starting at `pos`.
 */
function readCompleteType(signature: string, pos: number, inArray: boolean): number {
  const code = signature[pos];
  if (code === undefined) {
    throw new SignatureError(signature, 'unexpected end of signature');
  }

  if (BASIC_TYPES.has(code) || code === 'v') {
    return pos + 1;
  }

  if (code === 'a') {
    return readCompleteType(signature, pos + 1, true);
  }

  if (code === '(') {
    let cursor = pos + 1;
    if (signature[cursor] === ')') {
      throw new SignatureError(signature, `empty struct at offset ${pos}`);
    }
    while (signature[cursor] !== ')') {
      cursor = readCompleteType(signature, cursor, false);
      if (cursor >= signature.length) {
        throw new SignatureError(signature, `unterminated struct at offset ${pos}`);
      }
    }
    return cursor + 1;
  }

  if (code === '{') {
    if (!inArray) {
      throw new SignatureError(signature, `dict entry outside array at offset ${pos}`);
    }
    const key = signature[pos + 1];
    if (key === undefined || !BASIC_TYPES.has(key)) {
      throw new SignatureError(signature, `dict entry key must be a basic type at offset ${pos + 1}`);
    }
    const valueEnd = readCompleteType(signature, pos + 2, false);
    if (signature[valueEnd] !== '}') {
      throw new SignatureError(signature, `dict entry must hold exactly two types at offset ${pos}`);
    }
    return valueEnd + 1;
  }

  throw new SignatureError(signature, `unknown type code '${code}' at offset ${pos}`);
}
