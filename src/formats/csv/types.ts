/**
 * CSV Format Type Definitions
 */

import type { Octet } from "../../types";

/**
 * Record terminator: a specific octet, or CRLF-mode.
 *
 * In CRLF-mode the writer always emits `CR LF`, while the reader accepts a
 * sole `CR`, a sole `LF` or the `CR LF` pair.
 */
export type Terminator =
  | { readonly type: "octet"; readonly octet: Octet }
  | { readonly type: "crlf" };

/**
 * Special octets used by `CsvReader` and `CsvWriter`.
 *
 * Build one with `createDialect`; the result is frozen.
 */
export interface Dialect {
  /** Separates fields within a record */
  readonly delimiter: Octet;
  /**
   * Encloses fields containing special octets. `null` turns off quote handling
   * in the reader; the writer then quotes with `"` when it has to.
   */
  readonly quote: Octet | null;
  readonly terminator: Terminator;
  /**
   * Byte order mark policy.
   * - `null`: reader drops a leading BOM, writer emits none
   * - `true`: reader drops a leading BOM, writer emits one
   * - `false`: a leading BOM is data of the first field, writer emits none
   */
  readonly bom: boolean | null;
}

/**
 * An octet given as a number or as a single character with code unit <= 0xFF
 */
export type OctetInput = Octet | string;

/**
 * Caller-facing dialect configuration; every property is optional and
 * defaults to RFC 4180 behaviour.
 */
export interface DialectOptions {
  delimiter?: OctetInput;
  quote?: OctetInput | null;
  /** An octet, or `"crlf"` for CRLF-mode (the default) */
  terminator?: OctetInput | "crlf";
  bom?: boolean | null;
}

/**
 * Reader state machine states
 */
export enum ReaderState {
  BEFORE_RECORD,
  BEFORE_FIELD,
  IN_FIELD,
  IN_QUOTED_FIELD,
  QUOTE_IN_QUOTED,
  EAT_LF,
  EAT_BOM_1,
  EAT_BOM_2,
  EAT_BOM_3,
}

/**
 * A field handed to the writer; strings are encoded as UTF-8
 */
export type FieldInput = Uint8Array | string;
