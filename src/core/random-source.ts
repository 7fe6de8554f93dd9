/**
 * Random Source - Secure Generator Selection with Degraded Fallback
 *
 * Prefers the operating system's CSPRNG (node:crypto). When that is not
 * available the process falls back to a seeded xoshiro128** generator and
 * warns the operator once. A configured secret key is mixed into the
 * fallback's seed before ids are drawn from it.
 *
 * Usage:
 * ```typescript
 * const source = obtainRandomSource();
 * reseedIfNeeded(source, secretKey);
 * const id = randomString(source);
 * ```
 */

import { createHash, randomBytes } from 'node:crypto';
import { isSecretKeyConfigured } from '../config/environment.js';
import { SecureRandomUnavailableError } from '../utils/errors.js';
import { toBytes } from './codec.js';
import { ALPHANUMERIC, RANDOM_STRING_LENGTH, SECRET_KEY_ENV } from './types.js';
import type { SecretKey } from './types.js';

// ============================================================================
// Generators
// ============================================================================

export interface RandomGenerator {
  /** True only for generators suitable for cryptographic use */
  readonly secure: boolean;

  randomBytes(length: number): Uint8Array;
}

export interface SeedableRandomGenerator extends RandomGenerator {
  readonly secure: false;

  /** Mix new material into the current state */
  reseed(material: Uint8Array): void;

  getState(): readonly number[];
}

export class SecureRandomGenerator implements RandomGenerator {
  readonly secure = true;

  randomBytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
  }
}

/**
 * Probe the OS entropy source and wrap it.
 *
 * @throws SecureRandomUnavailableError
 */
export function createSecureRandomGenerator(): RandomGenerator {
  try {
    randomBytes(1);
  } catch (error) {
    throw new SecureRandomUnavailableError(error);
  }
  return new SecureRandomGenerator();
}

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

/**
 * xoshiro128** - statistically random, NOT cryptographically secure.
 */
export class FallbackRandomGenerator implements SeedableRandomGenerator {
  readonly secure = false;
  private state = new Uint32Array(4);

  constructor(seed?: string | Uint8Array) {
    this.setSeed(
      seed === undefined
        ? toBytes(`${Date.now()}:${process.pid}:${process.hrtime.bigint()}`)
        : toBytes(seed)
    );
  }

  reseed(material: Uint8Array): void {
    const previous = new Uint8Array(this.state.buffer.slice(0));
    const hash = createHash('sha256')
      .update(previous)
      .update(String(Date.now()))
      .update(material)
      .digest();
    this.setSeed(hash);
  }

  getState(): readonly number[] {
    return Array.from(this.state);
  }

  randomBytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i += 4) {
      let word = this.next();
      for (let j = i; j < Math.min(i + 4, length); j++) {
        out[j] = word & 0xff;
        word >>>= 8;
      }
    }
    return out;
  }

  private setSeed(material: Uint8Array): void {
    const digest = createHash('sha256').update(material).digest();
    for (let i = 0; i < 4; i++) {
      this.state[i] = digest.readUInt32LE(i * 4);
    }
    // all-zero state is a fixed point
    if (this.state.every((word) => word === 0)) {
      this.state[0] = 1;
    }
  }

  private next(): number {
    const s = this.state;
    const result = Math.imul(rotl(Math.imul(s[1], 5), 7), 9) >>> 0;
    const t = s[1] << 9;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];
    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }
}

// ============================================================================
// Randomness State
// ============================================================================

export type RandomSource =
  | { usingSecureSource: true; generator: RandomGenerator }
  | { usingSecureSource: false; generator: SeedableRandomGenerator };

export const INSECURE_FALLBACK_WARNING =
  'A secure pseudo-random number generator is not available on your system. ' +
  'Falling back to a non-cryptographic generator.';

export const MISSING_SECRET_KEY_WARNING =
  'A secure pseudo-random number generator is not available ' +
  `and no ${SECRET_KEY_ENV} has been set. ` +
  'Setting a secret key will mitigate the lack of a secure generator.';

export interface RandomnessStateOptions {
  /** Must throw SecureRandomUnavailableError when no secure source exists */
  createSecureGenerator?: () => RandomGenerator;

  createFallbackGenerator?: () => SeedableRandomGenerator;

  /** Boundary call into configuration (default: SESSION_SECRET_KEY in process.env) */
  isSecretKeyConfigured?: () => boolean;

  /** Warning sink (default: console.warn with a [RandomSource] prefix) */
  warn?: (message: string) => void;
}

/**
 * Process-wide generator choice and one-time warning flags.
 *
 * Selection happens on the first `obtain()`; later calls return the same
 * source and never warn again.
 */
export class RandomnessState {
  private source: RandomSource | null = null;
  private warnedInsecure = false;
  private warnedNoSecretKey = false;
  private readonly options: Required<RandomnessStateOptions>;

  constructor(options: RandomnessStateOptions = {}) {
    this.options = {
      createSecureGenerator: options.createSecureGenerator ?? createSecureRandomGenerator,
      createFallbackGenerator: options.createFallbackGenerator ?? (() => new FallbackRandomGenerator()),
      isSecretKeyConfigured: options.isSecretKeyConfigured ?? (() => isSecretKeyConfigured()),
      warn: options.warn ?? ((message) => console.warn(`[RandomSource] ${message}`)),
    };
  }

  obtain(): RandomSource {
    if (this.source === null) {
      this.source = this.select();
    }
    return this.source;
  }

  isSelected(): boolean {
    return this.source !== null;
  }

  /**
   * Forget the selection and warning flags (for testing)
   */
  reset(): void {
    this.source = null;
    this.warnedInsecure = false;
    this.warnedNoSecretKey = false;
  }

  private select(): RandomSource {
    try {
      return { usingSecureSource: true, generator: this.options.createSecureGenerator() };
    } catch (error) {
      if (!(error instanceof SecureRandomUnavailableError)) {
        throw error;
      }
    }

    if (!this.warnedInsecure) {
      this.warnedInsecure = true;
      this.options.warn(INSECURE_FALLBACK_WARNING);
    }
    if (!this.warnedNoSecretKey && !this.options.isSecretKeyConfigured()) {
      this.warnedNoSecretKey = true;
      this.options.warn(MISSING_SECRET_KEY_WARNING);
    }

    return { usingSecureSource: false, generator: this.options.createFallbackGenerator() };
  }
}

let processState: RandomnessState | null = null;

export function getRandomnessState(): RandomnessState {
  if (processState === null) {
    processState = new RandomnessState();
  }
  return processState;
}

/**
 * Replace the process-wide state (tests, or hosts with custom generators).
 * Passing null restores a fresh default on next use.
 */
export function setRandomnessState(state: RandomnessState | null): void {
  processState = state;
}

export function obtainRandomSource(): RandomSource {
  return getRandomnessState().obtain();
}

/**
 * Mix the secret key into the fallback generator's seed.
 *
 * @returns true if a reseed happened
 */
export function reseedIfNeeded(source: RandomSource, secretKey?: SecretKey): boolean {
  if (source.usingSecureSource || secretKey === undefined) {
    return false;
  }
  source.generator.reseed(toBytes(secretKey));
  return true;
}

/**
 * Unbiased random string over `alphabet`, by rejection sampling on bytes.
 */
export function randomString(
  source: RandomSource,
  length: number = RANDOM_STRING_LENGTH,
  alphabet: string = ALPHANUMERIC
): string {
  if (alphabet.length === 0 || alphabet.length > 256) {
    throw new RangeError(`alphabet must have 1 to 256 symbols, got ${alphabet.length}`);
  }

  const limit = 256 - (256 % alphabet.length);
  let result = '';
  while (result.length < length) {
    for (const byte of source.generator.randomBytes(length - result.length + 8)) {
      if (byte < limit) {
        result += alphabet[byte % alphabet.length];
        if (result.length === length) {
          break;
        }
      }
    }
  }
  return result;
}
