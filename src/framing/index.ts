/**
 * pqframe
 *
 * Binary framing for post-quantum key-exchange requests and responses
 * exchanged between two processes. Transport and cryptography live elsewhere.
 */

export { FORMAT_VERSION } from '@/constants.js';
export * from './protocol/index.js';
export * from './codec/index.js';
