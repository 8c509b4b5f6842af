/**
 * @module formats/csv/reader
 * @description Pull-based CSV reader over a `ByteSource`
 */

import type { ByteSource, Octet } from "../../types";
import { CR, LF } from "./constants";
import { createDialect, DEFAULT_DIALECT } from "./dialect";
import { CsvRecord } from "./record";
import { feed, finish, initialState, type Machine } from "./state-machine";
import type { Dialect, DialectOptions } from "./types";

/**
 * CsvReader - decodes one record per `next` call.
 *
 * Octets are pulled one at a time from the source, so the source should do
 * its own buffering (`FileSource` and `MemorySource` both do). A reader is
 * bound to one source for its lifetime and keeps no locks; do not share it
 * between concurrent consumers.
 *
 * @example
 * ```typescript
 * const reader = new CsvReader(MemorySource.fromString("pi,3.1416\r\ne,2.7183\r\n"));
 * const record = new CsvRecord();
 * while (reader.next(record)) {
 *   console.log(record.lineNo, record.fieldCount());
 * }
 * ```
 */
export class CsvReader {
  private readonly machine: Machine;
  private line = 1;
  private seenCR = false;

  constructor(
    private readonly source: ByteSource,
    readonly dialect: Dialect = DEFAULT_DIALECT
  ) {
    this.machine = { state: initialState(dialect) };
  }

  /**
   * Physical line the reader is currently on
   */
  get lineNo(): number {
    return this.line;
  }

  /**
   * Decode the next record into `record`, replacing its previous contents.
   *
   * Errors thrown by the source propagate unchanged; after one, the reader
   * and the record are in an unspecified state and must be discarded.
   *
   * @returns `true` when a record was read, `false` once the stream is exhausted
   */
  next(record: CsvRecord): boolean {
    record.lineNo = this.line;
    record.clear();

    for (;;) {
      const octet = this.readByte();
      if (octet === undefined) {
        return finish(this.machine, record);
      }
      if (feed(this.machine, octet, this.dialect, record)) {
        return true;
      }
    }
  }

  private readByte(): Octet | undefined {
    const octet = this.source.readByte();
    if (octet === CR) {
      this.line++;
      this.seenCR = true;
    } else if (octet === LF && !this.seenCR) {
      this.line++;
    } else {
      this.seenCR = false;
    }
    return octet;
  }
}

/**
 * Create a reader over `source` with a dialect built from `options`
 */
export function csvReader(source: ByteSource, options: DialectOptions = {}): CsvReader {
  return new CsvReader(source, createDialect(options));
}

/**
 * Iterate the records of `reader`, yielding `record` after each successful
 * decode. The same instance is yielded every time.
 */
export function* records(
  reader: CsvReader,
  record: CsvRecord = new CsvRecord()
): Generator<CsvRecord, void, undefined> {
  while (reader.next(record)) {
    yield record;
  }
}
