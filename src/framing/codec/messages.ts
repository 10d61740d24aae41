/**
 * Whole-message helpers: a header followed by its body in one buffer.
 */

import { MAX_DATA_LEN, RESPONSE_FAILURE } from '@/constants.js';
import {
  STATUS,
  type Algorithm,
  type Failure,
  type MaybeBuffer,
  type Operation,
  type Request,
  type RequestHeader,
  type Response,
} from '@/framing/protocol/index.js';

import { reject, validLength } from './fields.js';
import { serializeRequestHeader } from './requestHeader.js';
import { deserializeResponseHeader, serializeResponseHeader } from './responseHeader.js';
import { getSerializedRequestHeaderSize, getSerializedResponseHeaderSize } from './sizes.js';

export type SerializeMessageResult = { status: typeof STATUS.OK; bytes: Uint8Array } | Failure;

export type DeserializeResponseResult = { status: typeof STATUS.OK; response: Response } | Failure;

/**
 * Serialize a request header and append `body` behind it.
 */
export function serializeRequest(
  identifier: bigint,
  algorithm: Algorithm,
  operation: Operation,
  body: Uint8Array
): SerializeMessageResult {
  const headerSize = getSerializedRequestHeaderSize();
  if (body.length > MAX_DATA_LEN) {
    return reject('serializeRequest', STATUS.ENCODING_ERROR, `body of ${body.length} bytes`);
  }

  const bytes = new Uint8Array(headerSize + body.length);
  const status = serializeRequestHeader(identifier, body.length, algorithm, operation, bytes);
  if (status !== STATUS.OK) {
    return { status };
  }
  bytes.set(body, headerSize);
  return { status, bytes };
}

/**
 * Serialize a response for `identifier`.
 *
 * With a body, the header reports success and the body follows it. Without
 * one, or with a body too long for the u32 length field, only a failure
 * header (success -1, data length 0) is produced.
 *
 * @example
 * ```typescript
 * const result = serializeResponse(request.header.identifier, ciphertext);
 * const failed = serializeResponse(request.header.identifier, null);
 * ```
 */
export function serializeResponse(identifier: bigint, body: MaybeBuffer): SerializeMessageResult {
  const headerSize = getSerializedResponseHeaderSize();
  const succeeded = body !== null && body !== undefined && body.length <= MAX_DATA_LEN;
  const payload = succeeded ? body : new Uint8Array(0);

  const bytes = new Uint8Array(headerSize + payload.length);
  const status = serializeResponseHeader(
    identifier,
    succeeded ? 0 : RESPONSE_FAILURE,
    payload.length,
    bytes
  );
  if (status !== STATUS.OK) {
    return { status };
  }
  bytes.set(payload, headerSize);
  return { status, bytes };
}

/**
 * Pair a decoded request header with the body read after it.
 */
export function deserializeRequest(header: RequestHeader, body: Uint8Array): Request {
  return { header, body };
}

/**
 * Decode a response header and take the body that follows it.
 *
 * The body is a view into `source`, exactly `dataLen` bytes long. Fewer
 * than header plus `dataLen` valid bytes fails with OUT_OF_BOUNDS.
 */
export function deserializeResponse(
  source: MaybeBuffer,
  sourceLength?: number
): DeserializeResponseResult {
  if (!source) {
    return reject('deserializeResponse', STATUS.NULL_BUFFER);
  }
  const limit = validLength(source, sourceLength);
  if (limit === null) {
    return reject('deserializeResponse', STATUS.SIZE_ERROR, `invalid source length ${sourceLength}`);
  }
  const decoded = deserializeResponseHeader(source, limit);
  if (decoded.status !== STATUS.OK) {
    return decoded;
  }

  const start = getSerializedResponseHeaderSize();
  const end = start + decoded.header.dataLen;
  if (end > limit) {
    return reject('deserializeResponse', STATUS.OUT_OF_BOUNDS, `${end} > ${limit}`);
  }

  return {
    status: STATUS.OK,
    response: { header: decoded.header, body: source.subarray(start, end) },
  };
}
