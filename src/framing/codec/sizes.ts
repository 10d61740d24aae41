/**
 * Header size oracle.
 *
 * Sizes are derived from the layout on first use and cached for the life of
 * the module. JavaScript runs a module's code on one thread, so the first
 * caller computes the value before any other caller can observe the cache;
 * each worker thread loads its own copy and derives the same numbers.
 */

import { once } from '@/utils/once.js';

import { layoutSize, REQUEST_HEADER_FIELDS, RESPONSE_HEADER_FIELDS } from './layout.js';

const requestHeaderSize = once(() => layoutSize(REQUEST_HEADER_FIELDS));
const responseHeaderSize = once(() => layoutSize(RESPONSE_HEADER_FIELDS));

/**
 * Bytes needed to hold a serialized request header.
 * Call this before allocating a serialize target.
 */
export function getSerializedRequestHeaderSize(): number {
  return requestHeaderSize();
}

/**
 * Bytes needed to hold a serialized response header.
 * Call this before checking that a received buffer is large enough.
 */
export function getSerializedResponseHeaderSize(): number {
  return responseHeaderSize();
}
