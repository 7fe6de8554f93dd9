/**
 * Testing Utilities Tests
 *
 * @see src/testing/index.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createRandomnessState,
  createUnavailableSecureFactory,
  decodeTokenSegments,
} from '../../../src/testing/index.js';
import { SessionTokenManager } from '../../../src/core/token-manager.js';
import { base64Encode } from '../../../src/core/codec.js';
import { SecureRandomUnavailableError } from '../../../src/utils/errors.js';

describe('Testing utilities', () => {
  it('should simulate a missing secure source', () => {
    const factory = createUnavailableSecureFactory();
    expect(() => factory()).toThrow(SecureRandomUnavailableError);
  });

  it('should not read process.env for the secret key', () => {
    const originalKey = process.env.SESSION_SECRET_KEY;
    process.env.SESSION_SECRET_KEY = 'test-secret';
    try {
      const warn = vi.fn();
      createRandomnessState({ secureAvailable: false, warn }).obtain();

      expect(warn).toHaveBeenCalledTimes(2);
    } finally {
      if (originalKey === undefined) {
        delete process.env.SESSION_SECRET_KEY;
      } else {
        process.env.SESSION_SECRET_KEY = originalKey;
      }
    }
  });

  it('should decode an unsigned token', () => {
    const token = base64Encode('{"session_id": "abc", "foo": 10}');

    expect(decodeTokenSegments(token)).toEqual({
      payload: { session_id: 'abc', foo: 10 },
      payloadSegment: token,
      signatureSegment: undefined,
    });
  });

  it('should split a signed token', () => {
    const manager = new SessionTokenManager({ randomness: createRandomnessState() });
    const token = manager.generateSessionId({ signed: true, secretKey: 'test-secret' });
    const [payloadSegment, signatureSegment] = token.split('.');

    const decoded = decodeTokenSegments(token);

    expect(decoded.payloadSegment).toBe(payloadSegment);
    expect(decoded.signatureSegment).toBe(signatureSegment);
    expect(decoded.payload.session_id).toBe(manager.getSessionId(token));
  });
});
