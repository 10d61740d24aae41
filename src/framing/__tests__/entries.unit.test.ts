/**
 * Structured Entries Codec Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  computeStructuredLength,
  destructure,
  structure,
  structureEntries,
} from '@/framing/codec/index.js';
import { STATUS } from '@/framing/protocol/index.js';

const ENTRY1 = new Uint8Array([0, 1, 2, 4, 5, 6]);
const ENTRY2 = new Uint8Array([12, 13, 14]);
const STRUCTURED = [
  6, 0, 0, 0, 0, 0, 0, 0, 3, 0, 0, 0, 0, 0, 0, 0, 0, 1, 2, 4, 5, 6, 12, 13, 14,
];

void describe('computeStructuredLength', () => {
  void it('adds both length fields to the entry lengths', () => {
    assert.deepEqual(computeStructuredLength(2, 7), { status: STATUS.OK, length: 25 });
    assert.deepEqual(computeStructuredLength(0, 0), { status: STATUS.OK, length: 16 });
  });

  void it('returns LENGTH_OVERFLOW when the total is not representable', () => {
    assert.deepEqual(computeStructuredLength(Number.MAX_SAFE_INTEGER, 1), {
      status: STATUS.LENGTH_OVERFLOW,
    });
    assert.deepEqual(computeStructuredLength(Number.MAX_SAFE_INTEGER - 16, 1), {
      status: STATUS.LENGTH_OVERFLOW,
    });
  });

  void it('returns LENGTH_OVERFLOW for negative or fractional lengths', () => {
    assert.equal(computeStructuredLength(-1, 0).status, STATUS.LENGTH_OVERFLOW);
    assert.equal(computeStructuredLength(0, 2.5).status, STATUS.LENGTH_OVERFLOW);
  });
});

void describe('structure', () => {
  void it('writes both lengths then both entries', () => {
    const target = new Uint8Array(25);

    assert.equal(structure(target, 6, 3, ENTRY1, ENTRY2), STATUS.OK);
    assert.deepEqual(Array.from(target), STRUCTURED);
  });

  void it('writes only the declared prefix of each entry', () => {
    const target = new Uint8Array(19);

    assert.equal(structure(target, 2, 1, ENTRY1, ENTRY2), STATUS.OK);
    assert.deepEqual(
      Array.from(target),
      [2, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 1, 12]
    );
  });

  void it('reports absent arguments in order', () => {
    const target = new Uint8Array(25);

    assert.equal(structure(null, 6, 3, ENTRY1, ENTRY2), STATUS.NULL_BUFFER);
    assert.equal(structure(target, 6, 3, null, ENTRY2), STATUS.NULL_ENTRY1);
    assert.equal(structure(target, 6, 3, ENTRY1, undefined), STATUS.NULL_ENTRY2);
    assert.equal(structure(null, 6, 3, null, null), STATUS.NULL_BUFFER);
  });

  void it('returns SIZE_ERROR for a short target and leaves it untouched', () => {
    const target = new Uint8Array(24);

    assert.equal(structure(target, 6, 3, ENTRY1, ENTRY2), STATUS.SIZE_ERROR);
    assert.deepEqual(Array.from(target), new Array<number>(24).fill(0));
  });

  void it('returns SIZE_ERROR when an entry is shorter than declared', () => {
    assert.equal(structure(new Uint8Array(32), 7, 3, ENTRY1, ENTRY2), STATUS.SIZE_ERROR);
    assert.equal(structure(new Uint8Array(32), 6, 4, ENTRY1, ENTRY2), STATUS.SIZE_ERROR);
  });

  void it('returns LENGTH_OVERFLOW for unrepresentable lengths', () => {
    assert.equal(
      structure(new Uint8Array(16), Number.MAX_SAFE_INTEGER, 0, ENTRY1, ENTRY2),
      STATUS.LENGTH_OVERFLOW
    );
  });
});

void describe('structureEntries', () => {
  void it('allocates exactly the structured length', () => {
    const result = structureEntries(ENTRY1, ENTRY2);

    assert.equal(result.status, STATUS.OK);
    if (result.status !== STATUS.OK) return;
    assert.deepEqual(Array.from(result.buffer), STRUCTURED);
  });

  void it('accepts empty entries', () => {
    const result = structureEntries(new Uint8Array(0), new Uint8Array(0));

    assert.equal(result.status, STATUS.OK);
    if (result.status !== STATUS.OK) return;
    assert.deepEqual(Array.from(result.buffer), new Array<number>(16).fill(0));
  });

  void it('reports absent entries', () => {
    assert.deepEqual(structureEntries(null, ENTRY2), { status: STATUS.NULL_ENTRY1 });
    assert.deepEqual(structureEntries(ENTRY1, null), { status: STATUS.NULL_ENTRY2 });
  });
});

void describe('destructure', () => {
  void it('recovers both entries', () => {
    const result = destructure(new Uint8Array(STRUCTURED));

    assert.equal(result.status, STATUS.OK);
    if (result.status !== STATUS.OK) return;
    assert.deepEqual(Array.from(result.entry1), Array.from(ENTRY1));
    assert.deepEqual(Array.from(result.entry2), Array.from(ENTRY2));
  });

  void it('returns views that share memory with the source', () => {
    const source = new Uint8Array(STRUCTURED);
    const result = destructure(source);

    assert.equal(result.status, STATUS.OK);
    if (result.status !== STATUS.OK) return;
    assert.equal(result.entry1.buffer, source.buffer);
    assert.equal(result.entry1.byteOffset, 16);
    assert.equal(result.entry2.byteOffset, 22);

    source[16] = 99;
    assert.equal(result.entry1[0], 99);
  });

  void it('allows trailing bytes after the second entry', () => {
    const result = destructure(new Uint8Array([...STRUCTURED, 0xee, 0xee]));

    assert.equal(result.status, STATUS.OK);
    if (result.status !== STATUS.OK) return;
    assert.deepEqual(Array.from(result.entry2), [12, 13, 14]);
  });

  void it('accepts two empty entries', () => {
    const result = destructure(new Uint8Array(16));

    assert.equal(result.status, STATUS.OK);
    if (result.status !== STATUS.OK) return;
    assert.equal(result.entry1.length, 0);
    assert.equal(result.entry2.length, 0);
  });

  void it('returns NULL_BUFFER without a source', () => {
    assert.deepEqual(destructure(null), { status: STATUS.NULL_BUFFER });
  });

  void it('returns OUT_OF_BOUNDS for an empty source', () => {
    assert.deepEqual(destructure(new Uint8Array(0)), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns OUT_OF_BOUNDS when the prefix does not fit', () => {
    assert.deepEqual(destructure(new Uint8Array(15)), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns OUT_OF_BOUNDS when a shorter source length cuts an entry', () => {
    assert.deepEqual(destructure(new Uint8Array(STRUCTURED), 20), {
      status: STATUS.OUT_OF_BOUNDS,
    });
    assert.deepEqual(destructure(new Uint8Array(STRUCTURED), 24), {
      status: STATUS.OUT_OF_BOUNDS,
    });
  });

  void it('caps the source length at the real buffer length', () => {
    const result = destructure(new Uint8Array(STRUCTURED), 1000);

    assert.equal(result.status, STATUS.OK);
  });

  void it('returns OUT_OF_BOUNDS for a truncated buffer', () => {
    assert.deepEqual(destructure(new Uint8Array(STRUCTURED.slice(0, 24))), {
      status: STATUS.OUT_OF_BOUNDS,
    });
  });

  void it('returns OUT_OF_BOUNDS when the first length alone exceeds the buffer', () => {
    const bytes = new Uint8Array(STRUCTURED);
    bytes[0] = 200;

    assert.deepEqual(destructure(bytes), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns OUT_OF_BOUNDS when large lengths would wrap', () => {
    const bytes = new Uint8Array(32);
    const view = new DataView(bytes.buffer);
    view.setBigUint64(0, BigInt(Number.MAX_SAFE_INTEGER), true);
    view.setBigUint64(8, BigInt(Number.MAX_SAFE_INTEGER), true);

    assert.deepEqual(destructure(bytes), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns OUT_OF_BOUNDS for a first length at the u64 maximum', () => {
    const bytes = new Uint8Array(STRUCTURED);
    bytes.fill(0xff, 0, 8);

    assert.deepEqual(destructure(bytes), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns OUT_OF_BOUNDS for a second length past the safe integer range', () => {
    const bytes = new Uint8Array(STRUCTURED);
    new DataView(bytes.buffer).setBigUint64(8, 2n ** 53n, true);

    assert.deepEqual(destructure(bytes), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns OUT_OF_BOUNDS when both lengths are at the u64 maximum', () => {
    const bytes = new Uint8Array(64).fill(0xff, 0, 16);

    assert.deepEqual(destructure(bytes), { status: STATUS.OUT_OF_BOUNDS });
  });

  void it('returns SIZE_ERROR for an invalid source length', () => {
    assert.deepEqual(destructure(new Uint8Array(STRUCTURED), -1), { status: STATUS.SIZE_ERROR });
    assert.deepEqual(destructure(new Uint8Array(STRUCTURED), 1.5), { status: STATUS.SIZE_ERROR });
  });
});
