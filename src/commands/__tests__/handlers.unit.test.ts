/**
 * Command Handler Unit Tests
 *
 * Handlers are called directly; runCommand and process exit are not involved.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { formatTags, listTags } from '@/commands/algorithms.js';
import { destructureCommand, formatDestructured, structureCommand } from '@/commands/entries.js';
import { decodeRequest, encodeRequest, formatDecodedRequest } from '@/commands/request.js';
import { decodeResponse, encodeResponse, formatDecodedResponse } from '@/commands/response.js';
import { toJson } from '@/commands/shared/CommandRunner.js';
import { formatSizes, reportSizes } from '@/commands/sizes.js';
import { Algorithm, Operation } from '@/framing/protocol/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const REQUEST_HEX = '01d204000000000000330500000300000002000000';
const RESPONSE_HEX = '01d2040000000000000006000000010203040506';
const STRUCTURED_HEX = '060000000000000003000000000000000001020405060c0d0e';

function fromHex(hex: string): Uint8Array {
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

void describe('request commands', () => {
  void it('should encode a header without a body', () => {
    const result = encodeRequest({
      id: 1234n,
      algorithm: Algorithm.FRODO976__ECDHp384,
      operation: Operation.Encapsulation,
      dataLen: 1331,
    });

    assert.deepEqual(result, {
      success: true,
      data: { hex: REQUEST_HEX, size: 21, headerSize: 21 },
    });
  });

  void it('should encode a header followed by its body', () => {
    const result = encodeRequest({
      id: 7n,
      algorithm: Algorithm.KYBER_512,
      operation: Operation.Decapsulation,
      body: new Uint8Array([0xaa, 0xbb]),
    });

    assert.deepEqual(result.data, {
      hex: '01' + '0700000000000000' + '02000000' + '11000000' + '03000000' + 'aabb',
      size: 23,
      headerSize: 21,
    });
  });

  void it('should reject a data length that contradicts the body', () => {
    assert.throws(
      () =>
        encodeRequest({
          id: 7n,
          algorithm: Algorithm.KYBER_512,
          operation: Operation.Decapsulation,
          dataLen: 3,
          body: new Uint8Array([0xaa, 0xbb]),
        }),
      { exitCode: EXIT_CODES.INVALID_ARGUMENTS }
    );
  });

  void it('should decode a header and report a missing body', () => {
    const result = decodeRequest({ bytes: fromHex(REQUEST_HEX) });

    assert.deepEqual(result.data, {
      version: 1,
      identifier: 1234n,
      dataLen: 1331,
      algorithm: 'FRODO976__ECDHp384',
      operation: 'Encapsulation',
      body: '',
      complete: false,
    });
  });

  void it('should format a decoded header', () => {
    const result = decodeRequest({ bytes: fromHex(REQUEST_HEX) });

    assert.equal(
      formatDecodedRequest(result.data),
      [
        'Version:     1',
        'Identifier:  1234',
        'Algorithm:   FRODO976__ECDHp384',
        'Operation:   Encapsulation',
        'Data length: 1331',
        'Body:        (none)',
        'Warning: body is shorter than the announced data length',
      ].join('\n')
    );
  });

  void it('should turn a version mismatch into a CommandError', () => {
    const bytes = fromHex(REQUEST_HEX);
    bytes[0] = 2;

    assert.throws(() => decodeRequest({ bytes }), {
      message:
        'deserializeRequestHeader failed with VERSION_MISMATCH (-7): header version does not match this build',
      exitCode: EXIT_CODES.VERSION_MISMATCH,
      metadata: { note: 'This build speaks format version 1', context: { status: '-7' } },
    });
  });
});

void describe('response commands', () => {
  void it('should encode a successful response with its body', () => {
    const result = encodeResponse({ id: 1234n, body: new Uint8Array([1, 2, 3, 4, 5, 6]) });

    assert.deepEqual(result.data, { hex: RESPONSE_HEX, size: 20, headerSize: 14 });
  });

  void it('should encode a failure header when there is no body', () => {
    assert.equal(encodeResponse({ id: 1234n }).data.hex, '01d204000000000000ff00000000');
    assert.equal(
      encodeResponse({ id: 1234n, failCode: -2 }).data.hex,
      '01d204000000000000fe00000000'
    );
  });

  void it('should reject a zero failure code', () => {
    assert.throws(() => encodeResponse({ id: 1n, failCode: 0 }), {
      exitCode: EXIT_CODES.INVALID_ARGUMENTS,
    });
  });

  void it('should decode a response and its body', () => {
    const result = decodeResponse({ bytes: fromHex(RESPONSE_HEX) });

    assert.deepEqual(result.data, {
      version: 1,
      identifier: 1234n,
      success: 0,
      dataLen: 6,
      body: '010203040506',
    });
    assert.equal(
      formatDecodedResponse(result.data),
      [
        'Version:     1',
        'Identifier:  1234',
        'Outcome:     success',
        'Data length: 6',
        'Body:        010203040506',
      ].join('\n')
    );
  });

  void it('should reject a truncated body', () => {
    assert.throws(() => decodeResponse({ bytes: fromHex(RESPONSE_HEX.slice(0, -2)) }), {
      exitCode: EXIT_CODES.FRAME_REJECTED,
      message:
        'deserializeResponse failed with OUT_OF_BOUNDS (-9): embedded entry lengths exceed the buffer',
    });
  });
});

void describe('entries commands', () => {
  void it('should structure two entries', () => {
    const result = structureCommand({
      entry1: new Uint8Array([0, 1, 2, 4, 5, 6]),
      entry2: new Uint8Array([12, 13, 14]),
    });

    assert.deepEqual(result.data, { hex: STRUCTURED_HEX, size: 25, headerSize: 0 });
  });

  void it('should destructure and format both entries', () => {
    const result = destructureCommand({ bytes: fromHex(STRUCTURED_HEX) });

    assert.deepEqual(result.data, { entry1: '000102040506', len1: 6, entry2: '0c0d0e', len2: 3 });
    assert.equal(
      formatDestructured(result.data),
      'Entry 1 (6): 000102040506\nEntry 2 (3): 0c0d0e'
    );
  });

  void it('should reject a length that cuts the entries short', () => {
    assert.throws(() => destructureCommand({ bytes: fromHex(STRUCTURED_HEX), length: 20 }), {
      message: 'destructure failed with OUT_OF_BOUNDS (-9): embedded entry lengths exceed the buffer',
      exitCode: EXIT_CODES.FRAME_REJECTED,
    });
  });
});

void describe('reference commands', () => {
  void it('should report wire sizes', () => {
    const result = reportSizes({});

    assert.deepEqual(result.data, {
      formatVersion: 1,
      requestHeaderSize: 21,
      responseHeaderSize: 14,
      entryLengthFieldWidth: 8,
      entriesPrefixSize: 16,
    });
    assert.equal(
      formatSizes(result.data),
      [
        'Format version:     1',
        'Request header:     21 bytes',
        'Response header:    14 bytes',
        'Entry length field: 8 bytes (u64 LE)',
        'Entries prefix:     16 bytes',
      ].join('\n')
    );
  });

  void it('should list every tag', () => {
    const result = listTags({});

    assert.equal(result.data.algorithms.length, 29);
    assert.deepEqual(result.data.algorithms[0], { name: 'NoAlgorithm', value: 0, hybrid: false });
    assert.deepEqual(result.data.algorithms[20], {
      name: 'KYBER_768__ECDHp384',
      value: 20,
      hybrid: true,
    });
    assert.deepEqual(
      result.data.operations.map((entry) => entry.name),
      ['NoOperation', 'KeypairGeneration', 'Encapsulation', 'Decapsulation']
    );

    const lines = formatTags(result.data).split('\n');
    assert.equal(lines[0], 'Algorithms:');
    assert.equal(lines[1], '    0  NoAlgorithm');
  });

  void it('should serialize bigint values as strings in JSON', () => {
    assert.equal(toJson({ identifier: 1234n }), '{\n  "identifier": "1234"\n}');
  });
});
