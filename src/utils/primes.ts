import { InvalidArgumentError } from '../core/errors.js';

/**
 * Largest prime strictly below `limit` (sieve of Eratosthenes)
 * Time complexity: O(n log log n)
 */
export function largestPrime(limit: number): number {
  if (!Number.isInteger(limit) || limit <= 2) {
    throw new InvalidArgumentError(`Limit must be an integer greater than 2, got ${limit}`);
  }

  const isPrime = new Array<boolean>(limit).fill(true);
  isPrime[0] = false;
  isPrime[1] = false;

  for (let i = 2; i * i < limit; i++) {
    if (!isPrime[i]) continue;
    for (let j = i * i; j < limit; j += i) {
      isPrime[j] = false;
    }
  }

  for (let i = limit - 1; i >= 2; i--) {
    if (isPrime[i]) return i;
  }
  return 2;
}
