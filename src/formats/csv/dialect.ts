/**
 * @module formats/csv/dialect
 * @description Construction of immutable `Dialect` values
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { Octet } from "../../types";
import { CR, DEFAULT_DELIMITER, DEFAULT_QUOTE, LF } from "./constants";
import type { Dialect, DialectOptions, OctetInput, Terminator } from "./types";
import { DialectOptionsSchema, parseOctet } from "./validation";

const CRLF_TERMINATOR: Terminator = Object.freeze({ type: "crlf" });

function toOctet(value: OctetInput, name: string): Octet {
  const octet = parseOctet(value);
  if (octet === undefined) {
    throw new ValidationError(`Invalid CSV dialect options: ${name} must be a single octet`);
  }
  return octet;
}

/**
 * Build a frozen dialect. With no options the result follows RFC 4180:
 * `,` delimiter, `"` quote, CRLF-mode terminator, BOM dropped when read.
 *
 * @throws {ValidationError} when a value is not an octet
 *
 * @example
 * ```typescript
 * const pipes = createDialect({ delimiter: "|", quote: null, terminator: "#" });
 * ```
 */
export function createDialect(options: DialectOptions = {}): Dialect {
  const validation = DialectOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid CSV dialect options: ${validation.summary}`);
  }

  const terminator: Terminator =
    options.terminator === undefined || options.terminator === "crlf"
      ? CRLF_TERMINATOR
      : Object.freeze({ type: "octet", octet: toOctet(options.terminator, "terminator") });

  return Object.freeze({
    delimiter:
      options.delimiter === undefined ? DEFAULT_DELIMITER : toOctet(options.delimiter, "delimiter"),
    quote:
      options.quote === undefined
        ? DEFAULT_QUOTE
        : options.quote === null
          ? null
          : toOctet(options.quote, "quote"),
    terminator,
    bom: options.bom ?? null,
  });
}

/**
 * The RFC 4180 dialect
 */
export const DEFAULT_DIALECT: Dialect = createDialect();

/**
 * Octets whose presence in a field forces the writer to quote it: the
 * delimiter, the effective quote, and the terminator octet (both `CR` and
 * `LF` in CRLF-mode).
 */
export function escapeOctets(dialect: Dialect): readonly Octet[] {
  const quote = dialect.quote ?? DEFAULT_QUOTE;
  return dialect.terminator.type === "crlf"
    ? [dialect.delimiter, quote, CR, LF]
    : [dialect.delimiter, quote, dialect.terminator.octet];
}

/**
 * Whether `octet` ends a record under `terminator`
 */
export function isTerminator(octet: Octet, terminator: Terminator): boolean {
  return terminator.type === "crlf" ? octet === CR || octet === LF : octet === terminator.octet;
}
