/**
 * Codec Layer
 *
 * Header codecs, size oracle, version gate, and structured entries.
 */

export * from './sizes.js';
export * from './versionGate.js';
export * from './requestHeader.js';
export * from './responseHeader.js';
export * from './entries.js';
export * from './messages.js';
export {
  ENTRIES_PREFIX_SIZE,
  REQUEST_HEADER_FIELDS,
  REQUEST_OFFSET,
  RESPONSE_HEADER_FIELDS,
  RESPONSE_OFFSET,
} from './layout.js';
