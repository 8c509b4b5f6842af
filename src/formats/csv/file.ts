/**
 * @module formats/csv/file
 * @description Scoped CSV reading and writing of files
 *
 * Both helpers open the file, hand a bound reader or writer to a callback,
 * and close the descriptor on every exit path. The callback's own error is
 * rethrown unchanged.
 */

import { Effect } from "effect";
import { openFileSource } from "../../io/file-reader";
import { openFileSink } from "../../io/file-writer";
import { runSyncOrThrow } from "../../io/runtime";
import type { FileSinkOptions, FileSourceOptions } from "../../types";
import { createDialect } from "./dialect";
import { CsvReader } from "./reader";
import { CsvRecord } from "./record";
import type { DialectOptions } from "./types";
import { CsvWriter } from "./writer";

export interface CsvFileReadOptions extends FileSourceOptions {
  dialect?: DialectOptions;
}

export interface CsvFileWriteOptions extends FileSinkOptions {
  dialect?: DialectOptions;
}

/**
 * Read `path` as CSV. `use` receives a reader and a fresh record whose
 * buffers are released afterwards.
 *
 * @throws {FileError} when the file cannot be opened or read
 * @throws {ValidationError} when the options are invalid
 *
 * @example
 * ```typescript
 * const count = withCsvFileReader("data.csv", {}, (reader, record) => {
 *   let n = 0;
 *   while (reader.next(record)) n++;
 *   return n;
 * });
 * ```
 */
export function withCsvFileReader<A>(
  path: string,
  options: CsvFileReadOptions,
  use: (reader: CsvReader, record: CsvRecord) => A
): A {
  const { dialect: dialectOptions, ...sourceOptions } = options;

  const program = Effect.gen(function* () {
    const dialect = yield* Effect.try({
      try: () => createDialect(dialectOptions),
      catch: (error) => error,
    });
    const source = yield* openFileSource(path, sourceOptions);
    const record = yield* Effect.acquireRelease(
      Effect.sync(() => new CsvRecord()),
      (record) => Effect.sync(() => record.release())
    );
    const reader = new CsvReader(source, dialect);

    return yield* Effect.try({
      try: () => use(reader, record),
      catch: (error) => error,
    });
  });

  return runSyncOrThrow(Effect.scoped(program));
}

/**
 * Write `path` as CSV. The writer's output is flushed once `use` returns;
 * when `use` throws, buffered output is discarded and the file is closed.
 *
 * @throws {FileError} when the file cannot be opened or written
 * @throws {ValidationError} when the options are invalid
 */
export function withCsvFileWriter<A>(
  path: string,
  options: CsvFileWriteOptions,
  use: (writer: CsvWriter) => A
): A {
  const { dialect: dialectOptions, ...sinkOptions } = options;

  const program = Effect.gen(function* () {
    const dialect = yield* Effect.try({
      try: () => createDialect(dialectOptions),
      catch: (error) => error,
    });
    const sink = yield* openFileSink(path, sinkOptions);
    const writer = new CsvWriter(sink, dialect);

    return yield* Effect.try({
      try: () => {
        const result = use(writer);
        sink.close();
        return result;
      },
      catch: (error) => error,
    });
  });

  return runSyncOrThrow(Effect.scoped(program));
}
