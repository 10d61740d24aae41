/**
 * Status codes returned by every codec entry point.
 *
 * **STABILITY: these values are part of the public API.**
 *
 * - **0**: success
 * - **negative**: one distinct cause per value
 *
 * A non-zero status means the whole message is unusable. Decode paths never
 * hand back a header or an entry view together with a failure status.
 */
export const STATUS = {
  /** Operation completed */
  OK: 0,

  /** Target or source buffer was absent */
  NULL_BUFFER: -1,

  /** First entry of a structured pair was absent */
  NULL_ENTRY1: -2,

  /** Second entry of a structured pair was absent */
  NULL_ENTRY2: -3,

  /** Buffer smaller than the layout requires, or a size that cannot be represented */
  SIZE_ERROR: -4,

  /** A field value cannot be encoded into its wire width */
  ENCODING_ERROR: -5,

  /** Bytes do not form a valid header */
  DECODING_ERROR: -6,

  /** Header version differs from FORMAT_VERSION */
  VERSION_MISMATCH: -7,

  /** An embedded length prefix cannot be decoded into a usable length */
  LENGTH_PARSE_ERROR: -8,

  /** Embedded lengths would read past the end of the buffer */
  OUT_OF_BOUNDS: -9,

  /** Structured length cannot be represented without wrapping */
  LENGTH_OVERFLOW: -10,
} as const;

export type StatusName = keyof typeof STATUS;

export type StatusCode = (typeof STATUS)[StatusName];

export type FailureStatus = Exclude<StatusCode, typeof STATUS.OK>;

interface StatusInfo {
  name: StatusName;
  description: string;
}

const STATUS_INFO: Record<StatusCode, StatusInfo> = {
  [STATUS.OK]: { name: 'OK', description: 'ok' },
  [STATUS.NULL_BUFFER]: { name: 'NULL_BUFFER', description: 'buffer argument is missing' },
  [STATUS.NULL_ENTRY1]: { name: 'NULL_ENTRY1', description: 'first entry is missing' },
  [STATUS.NULL_ENTRY2]: { name: 'NULL_ENTRY2', description: 'second entry is missing' },
  [STATUS.SIZE_ERROR]: {
    name: 'SIZE_ERROR',
    description: 'buffer is too small for the requested layout',
  },
  [STATUS.ENCODING_ERROR]: {
    name: 'ENCODING_ERROR',
    description: 'a field value does not fit its wire width',
  },
  [STATUS.DECODING_ERROR]: {
    name: 'DECODING_ERROR',
    description: 'bytes do not form a valid header',
  },
  [STATUS.VERSION_MISMATCH]: {
    name: 'VERSION_MISMATCH',
    description: 'header version does not match this build',
  },
  [STATUS.LENGTH_PARSE_ERROR]: {
    name: 'LENGTH_PARSE_ERROR',
    description: 'embedded entry length cannot be decoded',
  },
  [STATUS.OUT_OF_BOUNDS]: {
    name: 'OUT_OF_BOUNDS',
    description: 'embedded entry lengths exceed the buffer',
  },
  [STATUS.LENGTH_OVERFLOW]: { name: 'LENGTH_OVERFLOW', description: 'structured length overflows' },
};

/**
 * Human-readable description of a status code.
 *
 * @example
 * ```typescript
 * describeStatus(STATUS.VERSION_MISMATCH) // 'header version does not match this build'
 * ```
 */
export function describeStatus(status: StatusCode): string {
  return STATUS_INFO[status].description;
}

/**
 * Name of a status code, e.g. `OUT_OF_BOUNDS`.
 */
export function getStatusName(status: StatusCode): StatusName {
  return STATUS_INFO[status].name;
}

/**
 * Failure branch shared by every codec result type.
 */
export interface Failure {
  status: FailureStatus;
}

export function failure(status: FailureStatus): Failure {
  return { status };
}
