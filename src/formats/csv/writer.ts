/**
 * @module formats/csv/writer
 * @description Push-based CSV writer over a `ByteSink`
 *
 * A field is quoted only when it contains the delimiter, the quote, or a
 * terminator octet; everything else is written byte for byte.
 */

import { ContractError } from "../../errors";
import type { ByteSink, Octet } from "../../types";
import { CR, DEFAULT_QUOTE, LF, UTF8_BOM } from "./constants";
import { createDialect, DEFAULT_DIALECT, escapeOctets } from "./dialect";
import type { Dialect, DialectOptions, FieldInput } from "./types";

const encoder = new TextEncoder();

/**
 * CsvWriter - encodes fields and records into a sink.
 *
 * A record is written either with `writeRecord`, or with a run of
 * `writeField` calls closed by `terminateRecord`. The two styles must not be
 * mixed within one record.
 *
 * @example
 * ```typescript
 * const sink = new MemorySink();
 * const writer = new CsvWriter(sink);
 * writer.writeRecord(["name", "value"]);
 * writer.writeField("pi");
 * writer.writeField("3.1416");
 * writer.terminateRecord();
 * ```
 */
export class CsvWriter {
  private needsBom: boolean;
  private needsDelimiter = false;
  private readonly quote: Octet;
  private readonly terminator: Uint8Array;
  private readonly bom: Uint8Array;
  private readonly escapeTable: Uint8Array;

  constructor(
    private readonly sink: ByteSink,
    readonly dialect: Dialect = DEFAULT_DIALECT
  ) {
    this.needsBom = dialect.bom === true;
    this.quote = dialect.quote ?? DEFAULT_QUOTE;
    this.terminator =
      dialect.terminator.type === "crlf"
        ? Uint8Array.of(CR, LF)
        : Uint8Array.of(dialect.terminator.octet);
    this.bom = Uint8Array.from(UTF8_BOM);
    this.escapeTable = new Uint8Array(256);
    for (const octet of escapeOctets(dialect)) {
      this.escapeTable[octet] = 1;
    }
  }

  /**
   * Whether fields have been written since the last terminator
   */
  get pendingRecord(): boolean {
    return this.needsDelimiter;
  }

  /**
   * Write one field of the current record. Call `terminateRecord` once the
   * record's fields are written.
   */
  writeField(field: FieldInput): void {
    const bytes = typeof field === "string" ? encoder.encode(field) : field;

    if (this.needsBom) {
      this.sink.writeAll(this.bom);
      this.needsBom = false;
    }

    if (this.needsDelimiter) {
      this.sink.writeByte(this.dialect.delimiter);
    }
    this.needsDelimiter = true;

    if (this.needsEscaping(bytes)) {
      this.writeQuoted(bytes);
    } else {
      this.sink.writeAll(bytes);
    }
  }

  /**
   * Write the record terminator
   */
  terminateRecord(): void {
    this.needsDelimiter = false;
    this.sink.writeAll(this.terminator);
  }

  /**
   * Write every field of `fields` followed by the terminator.
   *
   * @param fields - The record's fields, as an array or tuple
   * @throws {ContractError} when `fields` is not an array, or when a record
   * started with `writeField` has not been terminated
   */
  writeRecord(fields: readonly FieldInput[]): void {
    if (!Array.isArray(fields)) {
      throw new ContractError("writeRecord expects an array of fields", "writeRecord");
    }
    if (this.needsDelimiter) {
      throw new ContractError(
        "writeRecord called while a record is pending; call terminateRecord first",
        "writeRecord"
      );
    }
    for (const field of fields) {
      this.writeField(field);
    }
    this.terminateRecord();
  }

  private needsEscaping(bytes: Uint8Array): boolean {
    for (let i = 0; i < bytes.length; i++) {
      if (this.escapeTable[bytes[i] ?? 0] === 1) {
        return true;
      }
    }
    return false;
  }

  // Quote occurrences are written twice; runs between them go out in one call.
  private writeQuoted(bytes: Uint8Array): void {
    this.sink.writeByte(this.quote);
    let start = 0;
    for (let i = 0; i < bytes.length; i++) {
      if (bytes[i] === this.quote) {
        this.sink.writeAll(bytes.subarray(start, i + 1));
        start = i;
      }
    }
    this.sink.writeAll(bytes.subarray(start));
    this.sink.writeByte(this.quote);
  }
}

/**
 * Create a writer into `sink` with a dialect built from `options`
 */
export function csvWriter(sink: ByteSink, options: DialectOptions = {}): CsvWriter {
  return new CsvWriter(sink, createDialect(options));
}
