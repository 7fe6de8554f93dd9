/**
 * Codec - URL-safe base64 for token segments
 *
 * Encoding never pads, so both segments of a signed token compare
 * byte-for-byte across calls. Decoding also accepts padded input.
 */

import { base64url } from 'jose';
import { SessionErrors } from '../utils/errors.js';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export type TextEncoding = 'utf-8';

export function toBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === 'string' ? utf8Encoder.encode(input) : input;
}

/**
 * Decode UTF-8 bytes to text.
 *
 * @throws DecodeError (INVALID_UTF8)
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw SessionErrors.INVALID_UTF8();
  }
}

/**
 * Encode bytes (or UTF-8 text) as unpadded URL-safe base64.
 */
export function base64Encode(input: string | Uint8Array): string {
  return base64url.encode(toBytes(input));
}

/**
 * Decode URL-safe base64, padded or not. Input whose unused trailing
 * bits are set is rejected.
 *
 * @throws DecodeError (INVALID_BASE64, INVALID_UTF8)
 */
export function base64Decode(text: string): Uint8Array;
export function base64Decode(text: string, encoding: TextEncoding): string;
export function base64Decode(text: string, encoding?: TextEncoding): Uint8Array | string {
  if (!BASE64URL_PATTERN.test(text)) {
    throw SessionErrors.INVALID_BASE64({ reason: 'alphabet' });
  }

  const unpadded = text.replace(/=+$/, '');
  if (unpadded.length !== text.length && text.length % 4 !== 0) {
    throw SessionErrors.INVALID_BASE64({ reason: 'padding' });
  }
  if (unpadded.length % 4 === 1) {
    throw SessionErrors.INVALID_BASE64({ reason: 'length' });
  }

  // Spare trailing bits must be zero: one byte string, one encoding
  const bytes = base64url.decode(unpadded);
  if (base64url.encode(bytes) !== unpadded) {
    throw SessionErrors.INVALID_BASE64({ reason: 'non-canonical' });
  }
  return encoding === undefined ? bytes : decodeUtf8(bytes);
}
