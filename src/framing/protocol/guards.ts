/**
 * Type Guards for Protocol Tags
 *
 * Runtime checks for tag values read off the wire or typed on a command line.
 */

import { Algorithm, type AlgorithmName } from './algorithms.js';
import { Operation, type OperationName } from './operations.js';

/**
 * Check if a number is a known algorithm tag.
 *
 * @example
 * ```typescript
 * isAlgorithm(19)  // true (KYBER_768)
 * isAlgorithm(29)  // false
 * ```
 */
export function isAlgorithm(value: number): value is Algorithm {
  return Number.isInteger(value) && typeof Algorithm[value] === 'string';
}

/**
 * Check if a number is a known operation tag.
 */
export function isOperation(value: number): value is Operation {
  return Number.isInteger(value) && typeof Operation[value] === 'string';
}

function isAlgorithmName(name: string): name is AlgorithmName {
  return Object.prototype.hasOwnProperty.call(Algorithm, name) && isNaN(Number(name));
}

function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(Operation, name) && isNaN(Number(name));
}

/**
 * Resolve an algorithm from its name (case-insensitive) or numeric tag.
 *
 * @returns Algorithm if recognized, null otherwise
 *
 * @example
 * ```typescript
 * parseAlgorithm('KYBER_768')  // Algorithm.KYBER_768
 * parseAlgorithm('kyber_768')  // Algorithm.KYBER_768
 * parseAlgorithm('19')         // Algorithm.KYBER_768
 * parseAlgorithm('RSA')        // null
 * ```
 */
export function parseAlgorithm(input: string): Algorithm | null {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    const value = Number(trimmed);
    return isAlgorithm(value) ? value : null;
  }
  const name = Object.keys(Algorithm).find((key) => key.toUpperCase() === trimmed.toUpperCase());
  return name !== undefined && isAlgorithmName(name) ? Algorithm[name] : null;
}

/**
 * Resolve an operation from its name (case-insensitive) or numeric tag.
 *
 * @returns Operation if recognized, null otherwise
 */
export function parseOperation(input: string): Operation | null {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    const value = Number(trimmed);
    return isOperation(value) ? value : null;
  }
  const name = Object.keys(Operation).find((key) => key.toUpperCase() === trimmed.toUpperCase());
  return name !== undefined && isOperationName(name) ? Operation[name] : null;
}
