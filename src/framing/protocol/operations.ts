/**
 * Operation tags.
 *
 * **STABILITY: numeric values are part of the wire format.**
 */
export enum Operation {
  NoOperation = 0,
  KeypairGeneration = 1,
  Encapsulation = 2,
  Decapsulation = 3,
}

export type OperationName = keyof typeof Operation;

/**
 * Every operation tag in wire order, sentinel included.
 */
export const OPERATIONS: readonly Operation[] = Object.values(Operation).filter(
  (value): value is Operation => typeof value === 'number'
);

/**
 * Source name of an operation tag, or its number when the tag is unknown.
 */
export function operationName(operation: Operation): string {
  return Operation[operation] ?? String(operation);
}
