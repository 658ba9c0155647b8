import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import {
  ByteBuffer,
  combiningClass,
  composePair,
  normalizeC,
  normalizeD,
  runtimeDecomposition,
  type DecompositionService
} from '../src/index.js';

const PROPERTY_CONFIG = {
  numRuns: 150,
  seed: 0x5eedc0de
} as const;

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const utf8 = (text: string) => encoder.encode(text);

function composeUtf8(input: Uint8Array, limits?: { maxCombiningRun: number }) {
  const dest = new ByteBuffer();
  const counts = normalizeC(dest, input, input.length, 'utf-8', 'utf-8', limits ? { limits } : {});
  return { dest, counts };
}

test('combining classes and composition pairs come from the runtime Unicode data', () => {
  assert.equal(combiningClass(0x0301), 230);
  assert.equal(combiningClass(0x0316), 220);
  assert.equal(combiningClass(0x0327), 202);
  assert.equal(combiningClass(0x0341), 230);
  assert.equal(combiningClass(0x0061), 0);
  assert.equal(composePair(0x0065, 0x0301), 0x00e9);
  assert.equal(composePair(0x0041, 0x030a), 0x00c5);
  assert.equal(composePair(0x00fc, 0x0301), 0x01d8);
  assert.equal(composePair(0x0071, 0x0301), 0);
});

test('nfc composes a base with its combining mark', () => {
  const { dest, counts } = composeUtf8(utf8('e\u0301'));
  assert.deepEqual([...dest.view()], [0xc3, 0xa9]);
  assert.deepEqual(counts, { malformed: 0, unrepresentable: 0, bestEffort: false });
});

test('nfc composes conjoining jamo into a Hangul syllable', () => {
  const { dest } = composeUtf8(utf8('\u1100\u1161\u11a8'));
  assert.deepEqual([...dest.view()], [0xea, 0xb0, 0x81]);
  assert.equal(dest.text(), '\uac01');
});

test('nfc composes past an intervening mark of lower class', () => {
  const { dest } = composeUtf8(utf8('a\u0316\u0301'));
  assert.equal(dest.text(), '\u00e1\u0316');
});

test('nfc transcodes between forms while composing', () => {
  const fromUtf16 = new ByteBuffer();
  const input16 = Uint8Array.of(0x00, 0x41, 0x03, 0x0a);
  normalizeC(fromUtf16, input16, input16.length, 'utf-16be', 'utf-8');
  assert.deepEqual([...fromUtf16.view()], [0xc3, 0x85]);

  const toUtf16 = new ByteBuffer();
  const input8 = utf8('e\u0301!');
  normalizeC(toUtf16, input8, input8.length, 'utf-8', 'utf-16le');
  assert.deepEqual([...toUtf16.view()], [0xe9, 0x00, 0x21, 0x00]);
  assert.deepEqual([...toUtf16.raw().subarray(4, 6)], [0x00, 0x00]);
});

test('nfc copies unchanged text and rewrites cesu-8 pairs as utf-8', () => {
  assert.equal(composeUtf8(utf8('plain text')).dest.text(), 'plain text');
  const { dest } = composeUtf8(Uint8Array.of(0xed, 0xa0, 0xbd, 0xed, 0xb8, 0x80));
  assert.deepEqual([...dest.view()], [0xf0, 0x9f, 0x98, 0x80]);
});

test('nfc replaces malformed input with U+FFFD and counts it', () => {
  const { dest, counts } = composeUtf8(Uint8Array.of(0x61, 0xff, 0x62));
  assert.deepEqual([...dest.view()], [0x61, 0xef, 0xbf, 0xbd, 0x62]);
  assert.equal(counts.malformed, 1);
});

test('nfc stops at the length bound and at NUL', () => {
  const input = utf8('ab\u0000cd');
  const dest = new ByteBuffer();
  normalizeC(dest, input, 1, 'utf-8', 'utf-8');
  assert.equal(dest.text(), 'a');
  dest.clear();
  normalizeC(dest, input, input.length, 'utf-8', 'utf-8');
  assert.equal(dest.text(), 'ab');
});

test('a combining run longer than the cap is written without composition', () => {
  const input = utf8('q\u0316\u0301\u0302');
  const capped = composeUtf8(input, { maxCombiningRun: 2 });
  assert.equal(capped.dest.text(), 'q\u0316\u0301\u0302');
  assert.equal(capped.counts.bestEffort, true);

  const uncapped = composeUtf8(input);
  assert.equal(uncapped.dest.text(), 'q\u0316\u0301\u0302');
  assert.equal(uncapped.counts.bestEffort, false);
});

test('property: nfc of canonically ordered text matches String.prototype.normalize', () => {
  const alphabet = ['a', 'e', 'o', 'u', 'A', 'c', 'n', 's', '\u1100', '\u1161', '\u11a8', '\u0300', '\u0301', '\u0302', '\u0307', '\u0308', '\u0316', '\u0323', '\u0327'];
  fc.assert(
    fc.property(fc.array(fc.constantFrom(...alphabet), { maxLength: 8 }), (chars) => {
      const text = chars.join('');
      const { dest, counts } = composeUtf8(utf8(text.normalize('NFD')));
      assert.equal(dest.text(), text.normalize('NFC'));
      assert.equal(counts.malformed, 0);
    }),
    PROPERTY_CONFIG
  );
});

test('nfd decomposes through the runtime service', () => {
  const dest = new ByteBuffer();
  const input = utf8('\u00e9\u00c5');
  const counts = normalizeD(dest, input, input.length, 'utf-8', 'utf-8', runtimeDecomposition);
  assert.equal(dest.text(), 'e\u0301A\u030a');
  assert.equal(counts.bestEffort, false);
});

test('nfd hands code points to the service and writes its result in the target form', () => {
  const calls: number[][] = [];
  const service: DecompositionService = {
    decompose(codePoints) {
      calls.push([...codePoints]);
      return codePoints.flatMap((codePoint) => (codePoint === 0x61 ? [0x61, 0x61] : [codePoint]));
    }
  };
  const dest = new ByteBuffer();
  const input = Uint8Array.of(0x00, 0x61, 0x00, 0x62);
  normalizeD(dest, input, input.length, 'utf-16be', 'utf-16le', service);
  assert.deepEqual(calls, [[0x61, 0x62]]);
  assert.deepEqual([...dest.view()], [0x61, 0x00, 0x61, 0x00, 0x62, 0x00]);
});

test('nfd writes the run undecomposed when the service fails', () => {
  const dest = new ByteBuffer();
  const input = utf8('\u00e9');
  const counts = normalizeD(dest, input, input.length, 'utf-8', 'utf-8', { decompose: () => null });
  assert.equal(dest.text(), '\u00e9');
  assert.equal(counts.bestEffort, true);
});

test('nfd replaces malformed input between runs', () => {
  const dest = new ByteBuffer();
  const input = Uint8Array.of(0xc3, 0xa9, 0xff, 0x61);
  const counts = normalizeD(dest, input, input.length, 'utf-8', 'utf-8', runtimeDecomposition);
  assert.equal(decoder.decode(dest.view()), 'e\u0301\ufffda');
  assert.equal(counts.malformed, 1);
});

test('property: nfd through the runtime service matches String.prototype.normalize', () => {
  fc.assert(
    fc.property(fc.fullUnicodeString({ maxLength: 30 }), (text) => {
      const clean = text.replaceAll('\u0000', '');
      const dest = new ByteBuffer();
      const input = utf8(clean);
      normalizeD(dest, input, input.length, 'utf-8', 'utf-8', runtimeDecomposition);
      assert.equal(dest.text(), clean.normalize('NFD'));
    }),
    PROPERTY_CONFIG
  );
});
