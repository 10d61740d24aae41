/**
 * Version gate.
 *
 * Both processes are built from the same library revision; the version byte
 * only detects deployment skew. There is no negotiation.
 */

import { FORMAT_VERSION } from '@/constants.js';
import { STATUS } from '@/framing/protocol/index.js';

export type VersionCheck = typeof STATUS.OK | typeof STATUS.VERSION_MISMATCH;

export function checkVersion(version: number): VersionCheck {
  return version === FORMAT_VERSION ? STATUS.OK : STATUS.VERSION_MISMATCH;
}
