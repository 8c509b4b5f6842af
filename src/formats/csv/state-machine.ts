/**
 * CSV State Machine Module
 *
 * Per-octet transition function of the reader. The machine deviates from
 * RFC 4180 in a few permissive ways:
 *
 * 1. Unquoted fields may contain any octet except the delimiter and the
 *    terminator; a quote after the start of a field is ordinary data, so
 *    `Foo "Bar" Baz` and `"Foo ""Bar"" Baz"` decode identically.
 * 2. A field may mix quoted and unquoted runs: `"foo"bar` decodes as `foobar`.
 * 3. An unterminated quoted field at end of stream is closed, not rejected.
 * 4. A leading UTF-8 BOM may be dropped, depending on `Dialect.bom`. A
 *    partial BOM is kept as field data.
 */

import type { Octet } from "../../types";
import { CR, LF } from "./constants";
import { isTerminator } from "./dialect";
import type { CsvRecord } from "./record";
import { type Dialect, ReaderState } from "./types";

const BOM_1 = 0xef;
const BOM_2 = 0xbb;
const BOM_3 = 0xbf;

/**
 * Mutable holder of the current state
 */
export interface Machine {
  state: ReaderState;
}

/**
 * State a fresh reader starts in
 *
 * @param dialect - Reader dialect; `bom: false` skips BOM detection
 */
export function initialState(dialect: Dialect): ReaderState {
  return dialect.bom === false ? ReaderState.BEFORE_RECORD : ReaderState.EAT_BOM_1;
}

/**
 * Feed one octet to the machine, updating `record` as it goes.
 *
 * @param machine - Holder of the current state, updated in place
 * @param octet - Next octet from the source
 * @param dialect - Special octets to recognise
 * @param record - Record being filled
 * @returns `true` when the octet terminated a record
 */
export function feed(machine: Machine, octet: Octet, dialect: Dialect, record: CsvRecord): boolean {
  let state = machine.state;

  switch (state) {
    case ReaderState.EAT_BOM_1:
      if (octet === BOM_1) {
        machine.state = ReaderState.EAT_BOM_2;
        return false;
      }
      state = ReaderState.BEFORE_RECORD;
      break;

    case ReaderState.EAT_BOM_2:
      if (octet === BOM_2) {
        machine.state = ReaderState.EAT_BOM_3;
        return false;
      }
      record.appendByte(BOM_1);
      state = ReaderState.IN_FIELD;
      break;

    case ReaderState.EAT_BOM_3:
      if (octet === BOM_3) {
        machine.state = ReaderState.BEFORE_RECORD;
        return false;
      }
      record.appendByte(BOM_1);
      record.appendByte(BOM_2);
      state = ReaderState.IN_FIELD;
      break;

    case ReaderState.EAT_LF:
      if (octet === LF) {
        machine.state = ReaderState.BEFORE_RECORD;
        return false;
      }
      state = ReaderState.BEFORE_RECORD;
      break;

    default:
      break;
  }

  if (state === ReaderState.BEFORE_RECORD || state === ReaderState.BEFORE_FIELD) {
    if (octet === dialect.quote) {
      machine.state = ReaderState.IN_QUOTED_FIELD;
      return false;
    }
    state = ReaderState.IN_FIELD;
  } else if (state === ReaderState.QUOTE_IN_QUOTED) {
    if (octet === dialect.quote) {
      record.appendByte(octet);
      machine.state = ReaderState.IN_QUOTED_FIELD;
      return false;
    }
    state = ReaderState.IN_FIELD;
  }

  if (state === ReaderState.IN_FIELD) {
    if (octet === dialect.delimiter) {
      record.pushField();
      machine.state = ReaderState.BEFORE_FIELD;
      return false;
    }
    if (isTerminator(octet, dialect.terminator)) {
      record.pushField();
      machine.state =
        dialect.terminator.type === "crlf" && octet === CR
          ? ReaderState.EAT_LF
          : ReaderState.BEFORE_RECORD;
      return true;
    }
    record.appendByte(octet);
    machine.state = ReaderState.IN_FIELD;
    return false;
  }

  // IN_QUOTED_FIELD
  if (octet === dialect.quote) {
    machine.state = ReaderState.QUOTE_IN_QUOTED;
  } else {
    record.appendByte(octet);
  }
  return false;
}

/**
 * Handle end of stream.
 *
 * @param machine - Holder of the current state, reset to `BEFORE_RECORD`
 * @param record - Record being filled
 * @returns `true` when a pending record was completed, `false` when there
 * was nothing left to emit
 */
export function finish(machine: Machine, record: CsvRecord): boolean {
  switch (machine.state) {
    case ReaderState.BEFORE_RECORD:
    case ReaderState.EAT_LF:
    case ReaderState.EAT_BOM_1:
      return false;
    case ReaderState.EAT_BOM_2:
      record.appendByte(BOM_1);
      break;
    case ReaderState.EAT_BOM_3:
      record.appendByte(BOM_1);
      record.appendByte(BOM_2);
      break;
    default:
      break;
  }

  record.pushField();
  machine.state = ReaderState.BEFORE_RECORD;
  return true;
}
