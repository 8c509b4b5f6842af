/**
 * Growable byte buffer
 *
 * Backs record fields and the in-memory sink. Truncation keeps the allocated
 * capacity so a buffer can be refilled without reallocating.
 */

import type { Octet } from "../types";

const MIN_CAPACITY = 16;

export class ByteBuffer {
  private storage: Uint8Array;
  private used = 0;

  constructor(initialCapacity = 0) {
    this.storage = new Uint8Array(initialCapacity);
  }

  get length(): number {
    return this.used;
  }

  push(octet: Octet): void {
    if (this.used === this.storage.length) {
      this.reserve(this.used + 1);
    }
    this.storage[this.used++] = octet;
  }

  pushAll(bytes: Uint8Array): void {
    const needed = this.used + bytes.length;
    if (needed > this.storage.length) {
      this.reserve(needed);
    }
    this.storage.set(bytes, this.used);
    this.used = needed;
  }

  /**
   * Reset the length to zero, retaining capacity
   */
  truncate(): void {
    this.used = 0;
  }

  /**
   * A view of the written bytes; it aliases internal storage and is
   * invalidated by the next mutation
   */
  view(): Uint8Array {
    return this.storage.subarray(0, this.used);
  }

  private reserve(minimum: number): void {
    let next = Math.max(this.storage.length * 2, MIN_CAPACITY);
    while (next < minimum) {
      next *= 2;
    }
    const grown = new Uint8Array(next);
    grown.set(this.storage.subarray(0, this.used));
    this.storage = grown;
  }
}
