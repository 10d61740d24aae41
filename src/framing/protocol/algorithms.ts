/**
 * Algorithm tags.
 *
 * **STABILITY: numeric values are part of the wire format.**
 * Never renumber or reorder; append new schemes at the end and bump FORMAT_VERSION.
 *
 * Names ending in `__ECDHpNNN` are hybrids: the post-quantum KEM combined with
 * classical ECDH over the NIST curve of that size.
 */
export enum Algorithm {
  NoAlgorithm = 0,
  FRODO640__ECDHp256 = 1,
  FRODO640 = 2,
  FRODO976__ECDHp384 = 3,
  FRODO976 = 4,
  FRODO1344__ECDHp521 = 5,
  FRODO1344 = 6,
  NTRU_HRSS_701 = 7,
  NTRU_HRSS_701__ECDHp256 = 8,
  NTRU_HPS_2048509 = 9,
  NTRU_HPS_2048509__ECDHp256 = 10,
  RND5_1CCA_5D = 11,
  RND5_1CCA_5D__ECDHp256 = 12,
  RND5_3CCA_5D = 13,
  RND5_3CCA_5D__ECDHp384 = 14,
  RND5_5CCA_5D = 15,
  RND5_5CCA_5D__ECDHp521 = 16,
  KYBER_512 = 17,
  KYBER_512__ECDHp256 = 18,
  KYBER_768 = 19,
  KYBER_768__ECDHp384 = 20,
  KYBER_1024 = 21,
  KYBER_1024__ECDHp521 = 22,
  SABER_LIGHT = 23,
  SABER_LIGHT__ECDHp256 = 24,
  SABER = 25,
  SABER__ECDHp384 = 26,
  SABER_FIRE = 27,
  SABER_FIRE__ECDHp521 = 28,
}

/**
 * Algorithm name as it appears in source and on the command line.
 */
export type AlgorithmName = keyof typeof Algorithm;

/**
 * Every algorithm tag in wire order, sentinel included.
 */
export const ALGORITHMS: readonly Algorithm[] = Object.values(Algorithm).filter(
  (value): value is Algorithm => typeof value === 'number'
);

/**
 * Source name of an algorithm tag, or its number when the tag is unknown.
 */
export function algorithmName(algorithm: Algorithm): string {
  return Algorithm[algorithm] ?? String(algorithm);
}

/**
 * Whether the tag names a hybrid (post-quantum + ECDH) scheme.
 */
export function isHybrid(algorithm: Algorithm): boolean {
  return algorithmName(algorithm).includes('__ECDH');
}
