/**
 * Common error messages.
 */

/**
 * Generate a generic error message.
 *
 * @example
 * ```typescript
 * console.error(genericError('destructure failed', 'OUT_OF_BOUNDS'));
 * ```
 */
export function genericError(message: string, context?: string): string {
  if (context) {
    return `Error: ${message}\n${context}`;
  }
  return `Error: ${message}`;
}

/**
 * Error for a name that matches no algorithm or operation.
 */
export function unknownTagError(kind: 'algorithm' | 'operation', value: string): string {
  return `Unknown ${kind}: "${value}"`;
}

export function listTagsSuggestion(kind: 'algorithm' | 'operation'): string {
  return kind === 'algorithm'
    ? 'List algorithms with: pqframe algorithms'
    : 'Valid operations: NoOperation, KeypairGeneration, Encapsulation, Decapsulation';
}
