/**
 * @module formats/csv
 * @description Streaming, byte-oriented CSV reading and writing
 *
 * Features:
 * - RFC 4180 parsing with permissive extensions (mixed quoted/unquoted runs,
 *   stray quotes kept as data)
 * - Custom delimiter, quote and terminator octets
 * - CRLF-mode accepting CR, LF or CR LF
 * - Optional UTF-8 byte order mark handling
 * - Line numbers for diagnostics
 * - Field buffers reused across records
 *
 * @example Reading
 * ```typescript
 * import { CsvReader, CsvRecord, MemorySource } from "octet-csv";
 *
 * const reader = new CsvReader(MemorySource.fromString("a,b\r\nc,d\r\n"));
 * const record = new CsvRecord();
 * while (reader.next(record)) {
 *   console.log(record.fieldCount());
 * }
 * ```
 *
 * @example Writing with a custom dialect
 * ```typescript
 * import { csvWriter, MemorySink } from "octet-csv";
 *
 * const sink = new MemorySink();
 * csvWriter(sink, { delimiter: "|", terminator: "#" }).writeRecord(["foo", "bar"]);
 * ```
 */

export type {
  Dialect,
  DialectOptions,
  FieldInput,
  OctetInput,
  Terminator,
} from "./types";

export { ReaderState } from "./types";

export { createDialect, DEFAULT_DIALECT, escapeOctets, isTerminator } from "./dialect";

export { CsvRecord } from "./record";

export { CsvReader, csvReader, records } from "./reader";

export { CsvWriter, csvWriter } from "./writer";

export {
  type CsvFileReadOptions,
  type CsvFileWriteOptions,
  withCsvFileReader,
  withCsvFileWriter,
} from "./file";

export { feed, finish, initialState, type Machine } from "./state-machine";

export { DialectOptionsSchema, parseOctet } from "./validation";

export {
  CR,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_DELIMITER,
  DEFAULT_QUOTE,
  LF,
} from "./constants";
