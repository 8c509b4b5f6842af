/**
 * @module formats/csv/validation
 * @description ArkType schema for dialect options and octet normalization
 */

import { type } from "arktype";
import type { Octet } from "../../types";

/**
 * Convert a number or one-character string to an octet.
 *
 * @returns the octet, or `undefined` when the value is not one
 */
export function parseOctet(value: number | string): Octet | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 && value <= 0xff ? value : undefined;
  }
  if (value.length !== 1) {
    return undefined;
  }
  const code = value.charCodeAt(0);
  return code <= 0xff ? code : undefined;
}

const describe = (value: number | string): string =>
  typeof value === "string" ? JSON.stringify(value) : String(value);

/**
 * ArkType validation schema for dialect options.
 *
 * Only the shape of each value is checked: colliding octets (for example a
 * delimiter equal to the quote) are accepted.
 */
export const DialectOptionsSchema = type({
  "delimiter?": "string | number | undefined",
  "quote?": "string | number | null | undefined",
  "terminator?": "string | number | undefined",
  "bom?": "boolean | null | undefined",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && parseOctet(options.delimiter) === undefined) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "a single octet",
      actual: describe(options.delimiter),
    });
  }

  if (
    options.quote !== undefined &&
    options.quote !== null &&
    parseOctet(options.quote) === undefined
  ) {
    return ctx.reject({
      path: ["quote"],
      expected: "a single octet or null",
      actual: describe(options.quote),
    });
  }

  if (
    options.terminator !== undefined &&
    options.terminator !== "crlf" &&
    parseOctet(options.terminator) === undefined
  ) {
    return ctx.reject({
      path: ["terminator"],
      expected: 'a single octet or "crlf"',
      actual: describe(options.terminator),
    });
  }

  return true;
});
