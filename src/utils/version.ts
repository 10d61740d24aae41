import { readFileSync } from 'fs';

import { once } from '@/utils/once.js';

const FALLBACK_VERSION = '0.0.0';

// src/utils/ and dist/utils/ both sit two levels below the package root
const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

function readPackageVersion(): string {
  try {
    const pkg = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf-8')) as { version?: unknown };
    return typeof pkg.version === 'string' ? pkg.version : FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}

/**
 * Package version from package.json, read on first call.
 * Falls back to 0.0.0 when the file is missing or has no version.
 */
export const getVersion = once(readPackageVersion);

export const VERSION: string = getVersion();
