/**
 * Request header codec.
 *
 * The requester serializes; the responder deserializes.
 */

import { FORMAT_VERSION, LITTLE_ENDIAN } from '@/constants.js';
import {
  isAlgorithm,
  isOperation,
  STATUS,
  type Algorithm,
  type Failure,
  type MaybeBuffer,
  type Operation,
  type RequestHeader,
  type StatusCode,
} from '@/framing/protocol/index.js';

import { isU32, isU64, reject, validLength } from './fields.js';
import { REQUEST_OFFSET, viewOf } from './layout.js';
import { getSerializedRequestHeaderSize } from './sizes.js';
import { checkVersion } from './versionGate.js';

export type RequestHeaderResult = { status: typeof STATUS.OK; header: RequestHeader } | Failure;

/**
 * Write a request header into `target`.
 *
 * Only the first {@link getSerializedRequestHeaderSize} bytes are touched;
 * append the body after them before handing the bytes to a channel. On
 * failure the contents of `target` are unspecified.
 *
 * @returns STATUS.OK, NULL_BUFFER, SIZE_ERROR or ENCODING_ERROR
 *
 * @example
 * ```typescript
 * const header = new Uint8Array(getSerializedRequestHeaderSize());
 * const status = serializeRequestHeader(42n, 64, Algorithm.KYBER_768, Operation.Encapsulation, header);
 * ```
 */
export function serializeRequestHeader(
  identifier: bigint,
  dataLen: number,
  algorithm: Algorithm,
  operation: Operation,
  target: MaybeBuffer
): StatusCode {
  const name = 'serializeRequestHeader';
  const size = getSerializedRequestHeaderSize();

  if (!target) {
    return reject(name, STATUS.NULL_BUFFER).status;
  }
  if (target.length < size) {
    return reject(name, STATUS.SIZE_ERROR, `${target.length} < ${size}`).status;
  }
  if (!isU64(identifier) || !isU32(dataLen)) {
    return reject(name, STATUS.ENCODING_ERROR, 'identifier or data length out of range').status;
  }
  if (!isAlgorithm(algorithm) || !isOperation(operation)) {
    return reject(name, STATUS.ENCODING_ERROR, `tags ${algorithm}/${operation}`).status;
  }

  const view = viewOf(target, size);
  view.setUint8(REQUEST_OFFSET.VERSION, FORMAT_VERSION);
  view.setBigUint64(REQUEST_OFFSET.IDENTIFIER, identifier, LITTLE_ENDIAN);
  view.setUint32(REQUEST_OFFSET.DATA_LEN, dataLen, LITTLE_ENDIAN);
  view.setUint32(REQUEST_OFFSET.ALGORITHM, algorithm, LITTLE_ENDIAN);
  view.setUint32(REQUEST_OFFSET.OPERATION, operation, LITTLE_ENDIAN);

  return STATUS.OK;
}

/**
 * Read a request header from the start of `source`.
 *
 * `source` may come from another process: unknown tags are rejected rather
 * than passed through.
 *
 * @returns The header with STATUS.OK, or NULL_BUFFER, SIZE_ERROR,
 * VERSION_MISMATCH or DECODING_ERROR without one
 */
export function deserializeRequestHeader(
  source: MaybeBuffer,
  sourceLength?: number
): RequestHeaderResult {
  const name = 'deserializeRequestHeader';
  const size = getSerializedRequestHeaderSize();

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
  const version = view.getUint8(REQUEST_OFFSET.VERSION);
  if (checkVersion(version) !== STATUS.OK) {
    return reject(name, STATUS.VERSION_MISMATCH, `got ${version}, expected ${FORMAT_VERSION}`);
  }

  const algorithm = view.getUint32(REQUEST_OFFSET.ALGORITHM, LITTLE_ENDIAN);
  const operation = view.getUint32(REQUEST_OFFSET.OPERATION, LITTLE_ENDIAN);
  if (!isAlgorithm(algorithm) || !isOperation(operation)) {
    return reject(name, STATUS.DECODING_ERROR, `tags ${algorithm}/${operation}`);
  }

  return {
    status: STATUS.OK,
    header: {
      version,
      identifier: view.getBigUint64(REQUEST_OFFSET.IDENTIFIER, LITTLE_ENDIAN),
      dataLen: view.getUint32(REQUEST_OFFSET.DATA_LEN, LITTLE_ENDIAN),
      algorithm,
      operation,
    },
  };
}
