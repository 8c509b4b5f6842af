/**
 * CSV Format Constants
 *
 * Octet values and defaults used by the reader, writer and dialect.
 */

/** `,` - RFC 4180 COMMA */
export const DEFAULT_DELIMITER = 0x2c;

/** `"` - RFC 4180 DQUOTE, also the writer's fallback quote */
export const DEFAULT_QUOTE = 0x22;

export const CR = 0x0d;
export const LF = 0x0a;

/** UTF-8 encoding of U+FEFF */
export const UTF8_BOM: Uint8Array = Uint8Array.of(0xef, 0xbb, 0xbf);

/**
 * Default buffer size for the file transports
 */
export const DEFAULT_BUFFER_SIZE = 4096;
