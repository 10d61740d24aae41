/**
 * Shared formatting utilities for CLI output.
 */

// ============================================================================
// Output Formatter Class
// ============================================================================

/**
 * Fluent builder for multi-line console output.
 */
export class OutputFormatter {
  private lines: string[] = [];

  blank(): this {
    this.lines.push('');
    return this;
  }

  list(items: string[], indent: number = 2): this {
    const prefix = ' '.repeat(indent);
    items.forEach((item) => this.lines.push(prefix + item));
    return this;
  }

  section(title: string, items: string[], indent: number = 2): this {
    this.lines.push(title);
    return this.list(items, indent);
  }

  keyValue(key: string, value: string, keyWidth?: number): this {
    const formatted = keyWidth ? `${key}:`.padEnd(keyWidth) + value : `${key}: ${value}`;
    this.lines.push(formatted);
    return this;
  }

  keyValueList(pairs: Array<[string, string]>, keyWidth?: number): this {
    const width = keyWidth ?? Math.max(...pairs.map(([k]) => k.length)) + 2;
    pairs.forEach(([key, value]) => this.keyValue(key, value, width));
    return this;
  }

  build(): string {
    return this.lines.join('\n');
  }
}

// ============================================================================
// Text Utilities
// ============================================================================

export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

// ============================================================================
// Byte Formatting
// ============================================================================

/**
 * Lowercase hex of a byte sequence, in the form parseHexBytes reads back.
 *
 * @example
 * ```typescript
 * formatHex(new Uint8Array([1, 210, 4])) // '01d204'
 * ```
 */
export function formatHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('');
}
