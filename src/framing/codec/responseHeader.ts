/**
 * Response header codec.
 *
 * The responder serializes; the requester deserializes. A response with a
 * non-zero `success` never announces a body.
 */

import { FORMAT_VERSION, LITTLE_ENDIAN } from '@/constants.js';
import {
  STATUS,
  type Failure,
  type MaybeBuffer,
  type ResponseHeader,
  type StatusCode,
} from '@/framing/protocol/index.js';

import { isI8, isU32, isU64, reject, validLength } from './fields.js';
import { RESPONSE_OFFSET, viewOf } from './layout.js';
import { getSerializedResponseHeaderSize } from './sizes.js';
import { checkVersion } from './versionGate.js';

export type ResponseHeaderResult = { status: typeof STATUS.OK; header: ResponseHeader } | Failure;

/**
 * Write a response header into `target`.
 *
 * @param success - 0 for success, any other i8 for failure
 * @param dataLen - Body length; must be 0 when `success` is non-zero
 * @returns STATUS.OK, NULL_BUFFER, SIZE_ERROR or ENCODING_ERROR
 */
export function serializeResponseHeader(
  identifier: bigint,
  success: number,
  dataLen: number,
  target: MaybeBuffer
): StatusCode {
  const name = 'serializeResponseHeader';
  const size = getSerializedResponseHeaderSize();

  if (!target) {
    return reject(name, STATUS.NULL_BUFFER).status;
  }
  if (target.length < size) {
    return reject(name, STATUS.SIZE_ERROR, `${target.length} < ${size}`).status;
  }
  if (!isU64(identifier) || !isI8(success) || !isU32(dataLen)) {
    return reject(name, STATUS.ENCODING_ERROR, 'field out of range').status;
  }
  if (success !== 0 && dataLen !== 0) {
    return reject(name, STATUS.ENCODING_ERROR, 'failed response with a body').status;
  }

  const view = viewOf(target, size);
  view.setUint8(RESPONSE_OFFSET.VERSION, FORMAT_VERSION);
  view.setBigUint64(RESPONSE_OFFSET.IDENTIFIER, identifier, LITTLE_ENDIAN);
  view.setInt8(RESPONSE_OFFSET.SUCCESS, success);
  view.setUint32(RESPONSE_OFFSET.DATA_LEN, dataLen, LITTLE_ENDIAN);

  return STATUS.OK;
}

/**
 * Read a response header from the start of `source`.
 *
 * Bytes past the header (the body) are ignored. On failure no header is
 * returned; treat the whole message as unusable.
 *
 * @param sourceLength - Valid leading bytes of `source`; defaults to, and is
 *   capped at, `source.length`
 * @returns The header with STATUS.OK, or NULL_BUFFER, SIZE_ERROR,
 * VERSION_MISMATCH or DECODING_ERROR without one
 *
 * @example
 * ```typescript
 * const result = deserializeResponseHeader(bytes);
 * if (result.status !== STATUS.OK) {
 *   return result.status;
 * }
 * const body = bytes.subarray(getSerializedResponseHeaderSize(), ...);
 * ```
 */
export function deserializeResponseHeader(
  source: MaybeBuffer,
  sourceLength?: number
): ResponseHeaderResult {
  const name = 'deserializeResponseHeader';
  const size = getSerializedResponseHeaderSize();

  if (!source) {
    return reject(name, STATUS.NULL_BUFFER);
  }
  const limit = validLength(source, sourceLength);
  if (limit === null) {
    return reject(name, STATUS.SIZE_ERROR, `invalid source length ${sourceLength}`);
  }
  if (limit < size) {
    return reject(name, STATUS.SIZE_ERROR, `${limit} < ${size}`);
  }

  const view = viewOf(source, size);
  const version = view.getUint8(RESPONSE_OFFSET.VERSION);
  if (checkVersion(version) !== STATUS.OK) {
    return reject(name, STATUS.VERSION_MISMATCH, `got ${version}, expected ${FORMAT_VERSION}`);
  }

  const success = view.getInt8(RESPONSE_OFFSET.SUCCESS);
  const dataLen = view.getUint32(RESPONSE_OFFSET.DATA_LEN, LITTLE_ENDIAN);
  if (success !== 0 && dataLen !== 0) {
    return reject(name, STATUS.DECODING_ERROR, `failure ${success} announces ${dataLen} bytes`);
  }

  return {
    status: STATUS.OK,
    header: {
      version,
      identifier: view.getBigUint64(RESPONSE_OFFSET.IDENTIFIER, LITTLE_ENDIAN),
      success,
      dataLen,
    },
  };
}
