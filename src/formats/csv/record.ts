/**
 * @module formats/csv/record
 * @description Reusable container for the fields of one CSV record
 */

import { ContractError } from "../../errors";
import { ByteBuffer } from "../../io/byte-buffer";
import type { Octet } from "../../types";

/**
 * A single record: an ordered list of byte fields plus the line it starts on.
 *
 * Internally a record is a list of growable buffers of which only the first
 * `fieldCount()` hold complete fields. The remaining buffers keep their
 * capacity for later records, so decoding many records settles into zero
 * allocations once the buffers have grown.
 *
 * Field views returned by `field`, `fieldOrNone` and `fields` alias that
 * storage and change on the next `CsvReader.next` call; copy them with
 * `slice()` to keep them.
 *
 * @example
 * ```typescript
 * const record = new CsvRecord();
 * while (reader.next(record)) {
 *   for (let i = 0; i < record.fieldCount(); i++) {
 *     handle(record.field(i));
 *   }
 * }
 * record.release();
 * ```
 */
export class CsvRecord {
  /**
   * Line number on which the record begins. Counted from physical line
   * breaks (CR LF, sole CR or sole LF) in the input, not from terminators.
   */
  lineNo = 0;

  private buffers: ByteBuffer[] = [];
  private completeFields = 0;

  fieldCount(): number {
    return this.completeFields;
  }

  /**
   * Number of allocated field buffers, including those kept for reuse
   */
  capacity(): number {
    return this.buffers.length;
  }

  /**
   * @throws {ContractError} when `i` is not below `fieldCount()`
   */
  field(i: number): Uint8Array {
    const buffer = i < this.completeFields ? this.buffers[i] : undefined;
    if (buffer === undefined) {
      throw new ContractError(
        `Field index ${i} out of range for record with ${this.completeFields} fields`,
        "field"
      );
    }
    return buffer.view();
  }

  fieldOrNone(i: number): Uint8Array | undefined {
    return i >= 0 && i < this.completeFields ? this.buffers[i]?.view() : undefined;
  }

  fields(): Uint8Array[] {
    return this.buffers.slice(0, this.completeFields).map((buffer) => buffer.view());
  }

  *[Symbol.iterator](): IterableIterator<Uint8Array> {
    for (let i = 0; i < this.completeFields; i++) {
      yield this.field(i);
    }
  }

  /**
   * Drop all fields, keeping every buffer's capacity
   */
  clear(): void {
    this.completeFields = 0;
    for (const buffer of this.buffers) {
      buffer.truncate();
    }
  }

  /**
   * Mark the field being built as complete. Without one, an empty field is
   * added, so a record always has at least one field.
   */
  pushField(): void {
    this.incompleteField();
    this.completeFields++;
  }

  appendByte(octet: Octet): void {
    this.incompleteField().push(octet);
  }

  appendBytes(bytes: Uint8Array): void {
    this.incompleteField().pushAll(bytes);
  }

  /**
   * Free every buffer. The record stays usable and starts from scratch.
   */
  release(): void {
    this.buffers = [];
    this.completeFields = 0;
  }

  private incompleteField(): ByteBuffer {
    let buffer = this.buffers[this.completeFields];
    if (buffer === undefined) {
      buffer = new ByteBuffer();
      this.buffers.push(buffer);
    }
    return buffer;
  }
}
