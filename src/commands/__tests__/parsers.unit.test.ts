/**
 * Command Argument Parser Unit Tests
 */

import assert from 'node:assert/strict';
import { afterEach, describe, it } from 'node:test';

import {
  parseAlgorithmArg,
  parseDataLen,
  parseHexBytes,
  parseIdentifier,
  parseOperationArg,
  parseSuccess,
} from '@/commands/shared/parsers.js';
import { Algorithm, Operation } from '@/framing/protocol/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('parsers - parseIdentifier', () => {
  void it('should parse decimal and hex identifiers', () => {
    assert.equal(parseIdentifier('42'), 42n);
    assert.equal(parseIdentifier('0x04d2'), 1234n);
    assert.equal(parseIdentifier(' 7 '), 7n);
    assert.equal(parseIdentifier('18446744073709551615'), 0xffff_ffff_ffff_ffffn);
  });

  void it('should reject negative and oversized identifiers', () => {
    assert.throws(() => parseIdentifier('-1'), {
      name: 'CommandError',
      exitCode: EXIT_CODES.INVALID_ARGUMENTS,
      message: 'Invalid identifier: "-1" is not a valid integer\nValid range: 0 to 18446744073709551615',
    });
    assert.throws(() => parseIdentifier('18446744073709551616'), {
      exitCode: EXIT_CODES.INVALID_ARGUMENTS,
    });
    assert.throws(() => parseIdentifier('abc'), { exitCode: EXIT_CODES.INVALID_ARGUMENTS });
  });
});

void describe('parsers - parseDataLen', () => {
  void it('should parse u32 values', () => {
    assert.equal(parseDataLen('0'), 0);
    assert.equal(parseDataLen('4294967295'), 4294967295);
  });

  void it('should reject values outside u32', () => {
    assert.throws(() => parseDataLen('4294967296'), {
      message: 'Invalid data-len: "4294967296" is not a valid integer\nValid range: 0 to 4294967295',
    });
    assert.throws(() => parseDataLen('1.5'), { exitCode: EXIT_CODES.INVALID_ARGUMENTS });
  });
});

void describe('parsers - parseSuccess', () => {
  void it('should parse i8 values', () => {
    assert.equal(parseSuccess('-1'), -1);
    assert.equal(parseSuccess('127'), 127);
    assert.equal(parseSuccess('-128'), -128);
  });

  void it('should reject values outside i8', () => {
    assert.throws(() => parseSuccess('128'), { exitCode: EXIT_CODES.INVALID_ARGUMENTS });
    assert.throws(() => parseSuccess('-129'), { exitCode: EXIT_CODES.INVALID_ARGUMENTS });
  });
});

void describe('parsers - tag arguments', () => {
  void it('should resolve names case-insensitively and numeric tags', () => {
    assert.equal(parseAlgorithmArg('kyber_768'), Algorithm.KYBER_768);
    assert.equal(parseAlgorithmArg('19'), Algorithm.KYBER_768);
    assert.equal(parseOperationArg('decapsulation'), Operation.Decapsulation);
    assert.equal(parseOperationArg('1'), Operation.KeypairGeneration);
  });

  void it('should reject unknown algorithms with a suggestion', () => {
    assert.throws(() => parseAlgorithmArg('RSA'), {
      message: 'Unknown algorithm: "RSA"',
      exitCode: EXIT_CODES.INVALID_ARGUMENTS,
      metadata: { suggestion: 'List algorithms with: pqframe algorithms' },
    });
    assert.throws(() => parseAlgorithmArg('29'), { message: 'Unknown algorithm: "29"' });
  });

  void it('should reject unknown operations', () => {
    assert.throws(() => parseOperationArg('sign'), { message: 'Unknown operation: "sign"' });
  });
});

void describe('parsers - parseHexBytes', () => {
  afterEach(() => {
    delete process.env['PQFRAME_MAX_INPUT_BYTES'];
  });

  void it('should decode hex ignoring prefix, whitespace and colons', () => {
    assert.deepEqual(Array.from(parseHexBytes('0x01:d2 04')), [1, 210, 4]);
    assert.deepEqual(Array.from(parseHexBytes('0A0b')), [10, 11]);
    assert.deepEqual(Array.from(parseHexBytes('')), []);
  });

  void it('should reject odd or non-hex input', () => {
    assert.throws(() => parseHexBytes('abc'), {
      message: 'Invalid hex: expected an even number of hex digits',
      exitCode: EXIT_CODES.INVALID_INPUT,
    });
    assert.throws(() => parseHexBytes('zz', 'entry1'), {
      message: 'Invalid entry1: expected an even number of hex digits',
    });
  });

  void it('should enforce the configured input limit', () => {
    process.env['PQFRAME_MAX_INPUT_BYTES'] = '2';

    assert.deepEqual(Array.from(parseHexBytes('0102')), [1, 2]);
    assert.throws(() => parseHexBytes('010203'), {
      message: 'Invalid hex: 3 bytes exceeds the 2-byte limit (PQFRAME_MAX_INPUT_BYTES)',
      exitCode: EXIT_CODES.INVALID_INPUT,
    });
  });
});
