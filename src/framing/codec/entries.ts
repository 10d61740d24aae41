/**
 * Structured entries codec.
 *
 * Packs two byte strings behind their lengths:
 * `len1 u64 | len2 u64 | entry1 | entry2`, little-endian. Typical payloads are
 * a public key plus ciphertext, or a private key plus ciphertext.
 *
 * The write path trusts its caller; the read path trusts nothing. A buffer
 * handed to {@link destructure} may come from another process, so every
 * offset is checked against the real buffer length before a view is exposed.
 */

import { LITTLE_ENDIAN } from '@/constants.js';
import {
  STATUS,
  type Failure,
  type MaybeBuffer,
  type StatusCode,
} from '@/framing/protocol/index.js';

import { reject, validLength } from './fields.js';
import { ENTRIES_OFFSET, ENTRIES_PREFIX_SIZE, viewOf } from './layout.js';

export type StructuredLengthResult = { status: typeof STATUS.OK; length: number } | Failure;

/**
 * Both entries as views into the source buffer.
 *
 * The views share memory with the source: they stay valid only while the
 * source is neither modified nor reused. Copy with `slice()` to keep them longer.
 */
export type DestructureResult =
  | { status: typeof STATUS.OK; entry1: Uint8Array; entry2: Uint8Array }
  | Failure;

export type StructureEntriesResult = { status: typeof STATUS.OK; buffer: Uint8Array } | Failure;

function isLength(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Exact byte length of a structured buffer holding entries of the given lengths.
 *
 * Fails with LENGTH_OVERFLOW instead of losing precision when the total would
 * pass `Number.MAX_SAFE_INTEGER`, or when a length is negative or fractional.
 *
 * @example
 * ```typescript
 * computeStructuredLength(2, 7) // { status: 0, length: 25 }
 * ```
 */
export function computeStructuredLength(len1: number, len2: number): StructuredLengthResult {
  if (!isLength(len1) || !isLength(len2)) {
    return reject('computeStructuredLength', STATUS.LENGTH_OVERFLOW, `${len1}, ${len2}`);
  }
  if (len1 > Number.MAX_SAFE_INTEGER - ENTRIES_PREFIX_SIZE - len2) {
    return reject('computeStructuredLength', STATUS.LENGTH_OVERFLOW, `${len1} + ${len2}`);
  }
  return { status: STATUS.OK, length: ENTRIES_PREFIX_SIZE + len1 + len2 };
}

/**
 * Write `len1`, `len2`, then the first `len1` bytes of `entry1` and the first
 * `len2` bytes of `entry2` into `target`.
 *
 * Size `target` with {@link computeStructuredLength}. A target or entry that
 * is shorter than the declared lengths is reported as SIZE_ERROR and nothing
 * is written.
 *
 * @returns STATUS.OK, NULL_BUFFER, NULL_ENTRY1, NULL_ENTRY2, LENGTH_OVERFLOW or SIZE_ERROR
 */
export function structure(
  target: MaybeBuffer,
  len1: number,
  len2: number,
  entry1: MaybeBuffer,
  entry2: MaybeBuffer
): StatusCode {
  const name = 'structure';

  if (!target) {
    return reject(name, STATUS.NULL_BUFFER).status;
  }
  if (!entry1) {
    return reject(name, STATUS.NULL_ENTRY1).status;
  }
  if (!entry2) {
    return reject(name, STATUS.NULL_ENTRY2).status;
  }

  const required = computeStructuredLength(len1, len2);
  if (required.status !== STATUS.OK) {
    return required.status;
  }
  if (target.length < required.length) {
    return reject(name, STATUS.SIZE_ERROR, `target ${target.length} < ${required.length}`).status;
  }
  if (entry1.length < len1 || entry2.length < len2) {
    return reject(name, STATUS.SIZE_ERROR, 'entry shorter than its declared length').status;
  }

  const view = viewOf(target, ENTRIES_PREFIX_SIZE);
  view.setBigUint64(ENTRIES_OFFSET.LEN1, BigInt(len1), LITTLE_ENDIAN);
  view.setBigUint64(ENTRIES_OFFSET.LEN2, BigInt(len2), LITTLE_ENDIAN);
  target.set(entry1.subarray(0, len1), ENTRIES_OFFSET.ENTRY1);
  target.set(entry2.subarray(0, len2), ENTRIES_OFFSET.ENTRY1 + len1);

  return STATUS.OK;
}

/**
 * Allocate a structured buffer holding both entries in full.
 */
export function structureEntries(entry1: MaybeBuffer, entry2: MaybeBuffer): StructureEntriesResult {
  if (!entry1) {
    return reject('structureEntries', STATUS.NULL_ENTRY1);
  }
  if (!entry2) {
    return reject('structureEntries', STATUS.NULL_ENTRY2);
  }

  const required = computeStructuredLength(entry1.length, entry2.length);
  if (required.status !== STATUS.OK) {
    return required;
  }

  const buffer = new Uint8Array(required.length);
  const status = structure(buffer, entry1.length, entry2.length, entry1, entry2);
  return status === STATUS.OK ? { status, buffer } : { status };
}

/**
 * Split a structured buffer back into its two entries.
 *
 * @param source - Bytes received from another process
 * @param sourceLength - Number of valid bytes in `source`; defaults to, and is
 *   capped at, `source.length`
 * @returns Both entries with STATUS.OK, or NULL_BUFFER, SIZE_ERROR or
 * OUT_OF_BOUNDS without any view
 *
 * @example
 * ```typescript
 * const result = destructure(body);
 * if (result.status === STATUS.OK) {
 *   const publicKey = result.entry1.slice();
 * }
 * ```
 */
export function destructure(source: MaybeBuffer, sourceLength?: number): DestructureResult {
  const name = 'destructure';

  if (!source) {
    return reject(name, STATUS.NULL_BUFFER);
  }
  const limit = validLength(source, sourceLength);
  if (limit === null) {
    return reject(name, STATUS.SIZE_ERROR, `invalid source length ${sourceLength}`);
  }
  if (limit < ENTRIES_PREFIX_SIZE) {
    return reject(name, STATUS.OUT_OF_BOUNDS, `${limit} bytes cannot hold both lengths`);
  }

  // Lengths stay bigint until both are bounded by the buffer
  const view = viewOf(source, ENTRIES_PREFIX_SIZE);
  const raw1 = view.getBigUint64(ENTRIES_OFFSET.LEN1, LITTLE_ENDIAN);
  const raw2 = view.getBigUint64(ENTRIES_OFFSET.LEN2, LITTLE_ENDIAN);
  const available = BigInt(limit - ENTRIES_PREFIX_SIZE);
  if (raw1 > available || raw2 > available - raw1) {
    return reject(name, STATUS.OUT_OF_BOUNDS, `${raw1} + ${raw2} > ${available}`);
  }

  const len1 = Number(raw1);
  const len2 = Number(raw2);
  const start1 = ENTRIES_OFFSET.ENTRY1;
  const start2 = start1 + len1;
  return {
    status: STATUS.OK,
    entry1: source.subarray(start1, start2),
    entry2: source.subarray(start2, start2 + len2),
  };
}
