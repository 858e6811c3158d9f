// src/objects/shared/rwLock.ts
import { LockRecursionError } from "../errors.js";

/**
 * Synchronous reader/writer lock guarding a value. Reads may nest; a write is
 * exclusive. Everything here runs to completion on one thread, so the only way
 * to contend is re-entrancy from inside a held section, which would deadlock a
 * blocking lock and is reported as LockRecursionError instead.
 */
export class RwLock<T> {
  private readers = 0;
  private writing = false;

  constructor(private readonly value: T) {}

  get isReadLocked() { return this.readers > 0; }
  get isWriteLocked() { return this.writing; }

  read<R>(fn: (value: T) => R): R {
    if (this.writing) throw new LockRecursionError("read lock requested while the write lock is held");
    this.readers++;
    try {
      return fn(this.value);
    } finally {
      this.readers--;
    }
  }

  write<R>(fn: (value: T) => R): R {
    if (this.writing) throw new LockRecursionError("write lock requested while the write lock is held");
    if (this.readers > 0) throw new LockRecursionError("write lock requested while a read lock is held");
    this.writing = true;
    try {
      return fn(this.value);
    } finally {
      this.writing = false;
    }
  }
}
