import { InvalidArgumentError, KeyNotFoundError, TableFullError } from './errors.js';
import { largestPrime } from '../utils/primes.js';
import type { HashStrategy, ProbeStatistics } from '../types/potion.js';

const NOISE_SEED = largestPrime(1000);
const HASH_BASE = largestPrime(5000);

/**
 * Polynomial string hash whose multiplier changes pseudo-randomly per position
 * Time complexity: O(n) in the key length
 */
export function goodHash(key: string, tableSize: number): number {
  let value = 0;
  let noise = NOISE_SEED;
  for (let i = 0; i < key.length; i++) {
    value = (key.charCodeAt(i) + value * noise) % tableSize;
    noise = (noise * HASH_BASE) % (tableSize - 1);
  }
  return value;
}

/**
 * First-character hash; collides heavily and exists for comparison
 */
export function badHash(key: string, tableSize: number): number {
  if (key.length === 0) return 0;
  return key.charCodeAt(0) % tableSize;
}

/**
 * String-keyed hash table with linear probing for collision resolution
 * Does not support deletion. Probe statistics are accumulated over every
 * probe, lookups included.
 */
export class LinearProbeTable<T> {
  private readonly slots: Array<[string, T] | undefined>;
  private count = 0;
  private readonly hashStrategy: HashStrategy;

  private conflictCount = 0;
  private probeTotal = 0;
  private probeMax = 0;

  /**
   * @param maxEntries - Expected number of entries; the table gets the largest prime below twice that
   * @param hashStrategy - 'good' spreads keys, 'bad' hashes on the first character only
   * @param tableSizeOverride - Exact table size, bypassing the prime sizing
   */
  constructor(maxEntries: number, hashStrategy: HashStrategy = 'good', tableSizeOverride?: number) {
    this.hashStrategy = hashStrategy;

    let tableSize: number;
    if (tableSizeOverride !== undefined) {
      if (!Number.isInteger(tableSizeOverride) || tableSizeOverride < 2) {
        throw new InvalidArgumentError(`Table size must be an integer of at least 2, got ${tableSizeOverride}`);
      }
      tableSize = tableSizeOverride;
    } else {
      if (!Number.isInteger(maxEntries) || maxEntries < 2) {
        throw new InvalidArgumentError(`Expected entry count must be an integer of at least 2, got ${maxEntries}`);
      }
      tableSize = largestPrime(maxEntries * 2);
    }

    this.slots = new Array<[string, T] | undefined>(tableSize).fill(undefined);
  }

  hash(key: string): number {
    const tableSize = this.slots.length;
    return this.hashStrategy === 'good' ? goodHash(key, tableSize) : badHash(key, tableSize);
  }

  /**
   * Inserts or updates a key
   * @throws TableFullError when a new key does not fit
   */
  set(key: string, data: T): void {
    if (this.isFull() && !this.has(key)) {
      throw new TableFullError(key);
    }
    const position = this.probe(key, true);

    if (this.slots[position] === undefined) {
      this.count++;
    }
    this.slots[position] = [key, data];
  }

  insert(key: string, data: T): void {
    this.set(key, data);
  }

  /**
   * @throws KeyNotFoundError if the key is absent
   */
  get(key: string): T {
    const position = this.probe(key, false);
    const slot = this.slots[position];
    if (slot === undefined) {
      throw new KeyNotFoundError(key);
    }
    return slot[1];
  }

  has(key: string): boolean {
    try {
      this.get(key);
      return true;
    } catch (error) {
      if (error instanceof KeyNotFoundError) return false;
      throw error;
    }
  }

  getSize(): number {
    return this.count;
  }

  getTableSize(): number {
    return this.slots.length;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.slots.length;
  }

  /**
   * @returns Conflicts (probes that met a foreign key), slots stepped over in total,
   *          and the longest single probe chain
   */
  statistics(): ProbeStatistics {
    return {
      conflictCount: this.conflictCount,
      probeTotal: this.probeTotal,
      probeMax: this.probeMax
    };
  }

  /**
   * All stored pairs in slot order (not insertion order)
   */
  *entries(): IterableIterator<[string, T]> {
    for (const slot of this.slots) {
      if (slot !== undefined) {
        yield [slot[0], slot[1]];
      }
    }
  }

  /**
   * Finds the slot for a key by stepping forward from its hash
   * Time complexity: O(K) best case, O(K + N) when the whole table is scanned
   * @param forInsert - Whether an empty slot is an acceptable answer
   * @throws KeyNotFoundError if a lookup finds no such key
   */
  private probe(key: string, forInsert: boolean): number {
    const tableSize = this.slots.length;
    let position = this.hash(key);

    let chainLength = 0;
    for (let step = 0; step < tableSize; step++) {
      this.probeMax = Math.max(this.probeMax, chainLength);

      const slot = this.slots[position];
      if (slot === undefined) {
        if (forInsert) return position;
        throw new KeyNotFoundError(key);
      }
      if (slot[0] === key) {
        return position;
      }

      if (chainLength === 0) {
        this.conflictCount++;
      }
      chainLength++;
      this.probeTotal++;
      position = (position + 1) % tableSize;
    }

    throw new KeyNotFoundError(key);
  }
}
