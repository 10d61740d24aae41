/**
 * Structured JSON output for CLI commands.
 */

import { FORMAT_VERSION } from '@/constants.js';
import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error payload.
   *
   * @param error - Error message or Error instance
   * @param options - Extra fields merged into the payload
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      formatVersion: FORMAT_VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  /**
   * Build a JSON success payload.
   */
  static buildJsonSuccess(data: Record<string, unknown>): Record<string, unknown> {
    return {
      version: VERSION,
      formatVersion: FORMAT_VERSION,
      success: true,
      ...data,
    };
  }
}
