/**
 * Error taxonomy shared by the tree, the probe table and the game.
 * Every error is recoverable: a failed operation leaves its collection unchanged.
 */
export class CollectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateKeyError extends CollectionError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`Key ${String(key)} already exists`);
    this.key = key;
  }
}

export class KeyNotFoundError extends CollectionError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`Key ${String(key)} not found`);
    this.key = key;
  }
}

export class OutOfRangeError extends CollectionError {
  readonly k: number;
  readonly size: number;

  constructor(k: number, size: number, min: number = 1) {
    super(`${k} is outside the range [${min}, ${size}]`);
    this.k = k;
    this.size = size;
  }
}

// Thrown from a traversal whose tree was mutated after the traversal started
export class ConcurrentModificationError extends CollectionError {
  constructor() {
    super('Tree was modified during traversal');
  }
}

export class TableFullError extends CollectionError {
  readonly key: string;

  constructor(key: string) {
    super(`Cannot insert ${key} into a full table`);
    this.key = key;
  }
}

export class InvalidArgumentError extends CollectionError {}
