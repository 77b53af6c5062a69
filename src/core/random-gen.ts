import { InvalidArgumentError } from './errors.js';

const MODULUS = 2 ** 32;
const MULTIPLIER = 134775813;
const INCREMENT = 1;
const DRAWS_PER_VALUE = 5;       // Values combined by majority vote
const BITS_PER_VALUE = 16;       // Only the high half of each draw is used

/**
 * Linear congruential generator: seed = (a * seed + c) mod modulus
 * Arbitrary parameters go through BigInt so that products never lose precision
 */
export function* lcg(modulus: number, a: number, c: number, seed: number): Generator<number, never, void> {
  const m = BigInt(modulus);
  const multiplier = BigInt(a);
  const increment = BigInt(c);
  let state = BigInt(seed) % m;
  while (true) {
    state = (multiplier * state + increment) % m;
    yield Number(state);
  }
}

/**
 * 32-bit fast path of `lcg` with the game's fixed parameters
 * Math.imul keeps the low 32 bits of the product, which is exactly mod 2^32
 */
function* lcg32(seed: number): Generator<number, never, void> {
  let state = seed >>> 0;
  while (true) {
    state = (Math.imul(MULTIPLIER, state) + INCREMENT) >>> 0;
    yield state;
  }
}

/**
 * Deterministic pseudo-random integer generator
 * One instance should live as long as its owner: recreating it resets the sequence
 */
export class RandomGen {
  private readonly source: Generator<number, never, void>;

  constructor(seed: number = 0) {
    if (!Number.isSafeInteger(seed) || seed < 0) {
      throw new InvalidArgumentError(`Seed must be a non-negative integer, got ${seed}`);
    }
    this.source = lcg32(seed % MODULUS);
  }

  /**
   * Returns an integer in [1, k]
   * Each bit of the result is the majority vote of that bit across five draws
   * Time complexity: O(1)
   */
  randint(k: number): number {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidArgumentError(`Upper bound must be a positive integer, got ${k}`);
    }

    const draws: number[] = [];
    for (let i = 0; i < DRAWS_PER_VALUE; i++) {
      draws.push(this.source.next().value >>> BITS_PER_VALUE);
    }

    let result = 0;
    for (let bit = 0; bit < BITS_PER_VALUE; bit++) {
      let votes = 0;
      for (const draw of draws) {
        if ((draw >>> bit) & 1) votes++;
      }
      if (votes * 2 > DRAWS_PER_VALUE) {
        result |= 1 << bit;
      }
    }

    return (result % k) + 1;
  }
}
