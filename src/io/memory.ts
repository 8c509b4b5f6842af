/**
 * In-memory byte transports
 */

import type { ByteSink, ByteSource, Octet } from "../types";
import { ByteBuffer } from "./byte-buffer";

const encoder = new TextEncoder();

/**
 * Reads octets from a fixed `Uint8Array`
 */
export class MemorySource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  /**
   * Source over the UTF-8 encoding of `text`
   */
  static fromString(text: string): MemorySource {
    return new MemorySource(encoder.encode(text));
  }

  /** Octets not yet read */
  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readByte(): Octet | undefined {
    if (this.offset >= this.bytes.length) {
      return undefined;
    }
    return this.bytes[this.offset++];
  }
}

/**
 * Collects written octets in a growable buffer
 */
export class MemorySink implements ByteSink {
  private readonly buffer = new ByteBuffer();

  get size(): number {
    return this.buffer.length;
  }

  writeAll(bytes: Uint8Array): void {
    this.buffer.pushAll(bytes);
  }

  writeByte(octet: Octet): void {
    this.buffer.push(octet);
  }

  /**
   * Copy of everything written so far
   */
  toBytes(): Uint8Array {
    return this.buffer.view().slice();
  }

  clear(): void {
    this.buffer.truncate();
  }
}
