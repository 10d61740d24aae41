/**
 * Wire layouts.
 *
 * Field widths and offsets for both headers and the structured-entries
 * prefix. Every multi-byte field is little-endian; enum tags take 4 bytes.
 *
 * ```
 * RequestHeader     version u8 | identifier u64 | data_len u32 | algorithm u32 | operation u32
 * ResponseHeader    version u8 | identifier u64 | success i8   | data_len u32
 * StructuredEntries len1 u64   | len2 u64       | entry1       | entry2
 * ```
 */

import { ENTRY_LENGTH_FIELD_WIDTH } from '@/constants.js';

/**
 * Byte width of each wire primitive.
 */
export const FIELD_WIDTH = {
  u8: 1,
  i8: 1,
  u32: 4,
  u64: 8,
  tag: 4,
} as const;

export type FieldType = keyof typeof FIELD_WIDTH;

/**
 * Ordered field list of a fixed-size layout.
 */
export type LayoutFields = ReadonlyArray<readonly [name: string, type: FieldType]>;

export const REQUEST_HEADER_FIELDS = [
  ['version', 'u8'],
  ['identifier', 'u64'],
  ['dataLen', 'u32'],
  ['algorithm', 'tag'],
  ['operation', 'tag'],
] as const satisfies LayoutFields;

export const RESPONSE_HEADER_FIELDS = [
  ['version', 'u8'],
  ['identifier', 'u64'],
  ['success', 'i8'],
  ['dataLen', 'u32'],
] as const satisfies LayoutFields;

/**
 * Request header field offsets (bytes).
 */
export const REQUEST_OFFSET = {
  VERSION: 0,
  IDENTIFIER: 1,
  DATA_LEN: 9,
  ALGORITHM: 13,
  OPERATION: 17,
} as const;

/**
 * Response header field offsets (bytes).
 */
export const RESPONSE_OFFSET = {
  VERSION: 0,
  IDENTIFIER: 1,
  SUCCESS: 9,
  DATA_LEN: 10,
} as const;

/**
 * Structured-entries prefix: both lengths come first, then both entries.
 */
export const ENTRIES_OFFSET = {
  LEN1: 0,
  LEN2: ENTRY_LENGTH_FIELD_WIDTH,
  ENTRY1: 2 * ENTRY_LENGTH_FIELD_WIDTH,
} as const;

/**
 * Bytes taken by the two length prefixes.
 */
export const ENTRIES_PREFIX_SIZE = ENTRIES_OFFSET.ENTRY1;

/**
 * Total byte size of a fixed layout.
 */
export function layoutSize(fields: LayoutFields): number {
  return fields.reduce((total, [, type]) => total + FIELD_WIDTH[type], 0);
}

/**
 * DataView over exactly the given bytes of a buffer.
 */
export function viewOf(buffer: Uint8Array, length: number = buffer.length): DataView {
  return new DataView(buffer.buffer, buffer.byteOffset, length);
}
