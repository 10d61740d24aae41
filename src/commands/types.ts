/**
 * Shared result shapes for frame commands.
 */

/**
 * Bytes produced by an encode command.
 */
export interface EncodedFrame {
  /** Encoded bytes as lowercase hex */
  hex: string;
  /** Total byte count */
  size: number;
  /** Bytes taken by the header (0 for structured entries) */
  headerSize: number;
}
