/**
 * Header and message types.
 *
 * Headers are transient: built right before a send, parsed right after a
 * receive, never persisted.
 */

import type { Algorithm } from './algorithms.js';
import type { Operation } from './operations.js';

/**
 * Header that describes a request.
 *
 * - `version` is written by the codec; callers never set it.
 * - `identifier` is an opaque u64 chosen by the requester and echoed back unchanged.
 * - `dataLen` is the length of the body bytes that follow this header.
 */
export interface RequestHeader {
  version: number;
  identifier: bigint;
  dataLen: number;
  algorithm: Algorithm;
  operation: Operation;
}

/**
 * Header that describes a response.
 *
 * `success` is 0 on success and anything else on failure; a failed response
 * always has `dataLen === 0`.
 */
export interface ResponseHeader {
  version: number;
  identifier: bigint;
  success: number;
  dataLen: number;
}

/**
 * Request header paired with its body.
 */
export interface Request {
  header: RequestHeader;
  body: Uint8Array;
}

/**
 * Response header paired with its body.
 */
export interface Response {
  header: ResponseHeader;
  body: Uint8Array;
}

/**
 * Buffer handed in across a process boundary; may be missing.
 */
export type MaybeBuffer = Uint8Array | null | undefined;
