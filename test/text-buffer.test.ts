import test from 'node:test';
import assert from 'node:assert/strict';
import { spawnSync } from 'node:child_process';
import { fileURLToPath } from 'node:url';
import fc from 'fast-check';
import { ByteBuffer, WideBuffer } from '../src/index.js';

const PROPERTY_CONFIG = {
  numRuns: 100,
  seed: 0x5eedc0de
} as const;

test('buffers grow from 32 units, doubling below 8 KiB and by a quarter above', () => {
  const buffer = new ByteBuffer();
  assert.equal(buffer.capacity, 0);
  assert.ok(buffer.append([1, 2, 3]));
  assert.equal(buffer.capacity, 32);
  assert.ok(buffer.append(new Uint8Array(40).fill(7)));
  assert.equal(buffer.length, 43);
  assert.equal(buffer.capacity, 64);
  assert.ok(buffer.ensure(100));
  assert.equal(buffer.capacity, 128);

  const large = new ByteBuffer();
  assert.ok(large.ensure(8192));
  assert.equal(large.capacity, 8192);
  assert.ok(large.ensure(8193));
  assert.equal(large.capacity, 10240);
});

test('clear keeps storage and free releases it', () => {
  const buffer = ByteBuffer.from([0x61, 0x62, 0x63]);
  buffer.clear();
  assert.equal(buffer.length, 0);
  assert.equal(buffer.capacity, 32);
  assert.equal(buffer.raw()[0], 0);
  buffer.free();
  assert.equal(buffer.capacity, 0);
});

test('text is always followed by a zero terminator', () => {
  const buffer = new ByteBuffer();
  buffer.append([0x61, 0x62]);
  assert.equal(buffer.raw()[2], 0);
  buffer.appendUnit(0x63);
  assert.equal(buffer.text(), 'abc');
  assert.equal(buffer.raw()[3], 0);
});

test('bounded appends stop at the first zero unit or the bound', () => {
  const buffer = new ByteBuffer();
  buffer.appendBounded(Uint8Array.of(0x61, 0x62, 0x00, 0x63), 4);
  assert.equal(buffer.text(), 'ab');
  buffer.appendBounded(Uint8Array.of(0x64, 0x65, 0x66), 2);
  assert.equal(buffer.text(), 'abde');
  buffer.strcat([0x78, 0x00, 0x79]);
  assert.equal(buffer.text(), 'abdex');
});

test('concat and copyFrom operate on buffer contents', () => {
  const a = ByteBuffer.from([0x61]);
  const b = ByteBuffer.from([0x62, 0x63]);
  assert.ok(a.concat(b));
  assert.equal(a.text(), 'abc');
  assert.ok(b.copyFrom(a));
  assert.deepEqual([...b.bytes()], [0x61, 0x62, 0x63]);
});

test('growth beyond maxBufferUnits fails and resets the buffer', () => {
  const buffer = new ByteBuffer({ limits: { maxBufferUnits: 16 } });
  assert.ok(buffer.append([1, 2]));
  assert.equal(buffer.capacity, 16);
  assert.equal(buffer.append(new Uint8Array(20).fill(1)), false);
  assert.equal(buffer.length, 0);
  assert.equal(buffer.capacity, 0);
});

test('setLength rejects lengths past the capacity', () => {
  const buffer = new ByteBuffer();
  buffer.ensure(4);
  assert.throws(() => buffer.setLength(32), RangeError);
  buffer.raw().set([0x6f, 0x6b]);
  buffer.setLength(2);
  assert.equal(buffer.text(), 'ok');
});

test('wide buffers render code points or UTF-16 units', () => {
  const wide = new WideBuffer();
  wide.append([0xd83d, 0xde00, 0x41]);
  assert.equal(wide.text(16), '\u{1f600}A');
  assert.equal(wide.text(32), '\ufffd\ufffdA');

  const points = new WideBuffer();
  points.append([0x1f600, 0x110000]);
  assert.equal(points.text(), '\u{1f600}\ufffd');
});

test('property: appending chunks equals appending their concatenation', () => {
  fc.assert(
    fc.property(fc.array(fc.uint8Array({ minLength: 0, maxLength: 200 }), { minLength: 1, maxLength: 12 }), (chunks) => {
      const buffer = new ByteBuffer();
      const expected: number[] = [];
      for (const chunk of chunks) {
        assert.ok(buffer.append(chunk));
        expected.push(...chunk);
      }
      assert.deepEqual([...buffer.view()], expected);
      assert.equal(buffer.raw()[buffer.length], 0);
      assert.ok(buffer.capacity > buffer.length);
    }),
    PROPERTY_CONFIG
  );
});

test('abort mode ends the process when a buffer cannot grow', () => {
  const script = fileURLToPath(new URL('./fixtures/abort-on-overflow.ts', import.meta.url));
  const result = spawnSync(process.execPath, ['--import', 'tsx', script], {
    cwd: fileURLToPath(new URL('../', import.meta.url)),
    encoding: 'utf8'
  });
  assert.equal(result.status, 70, `expected exit 70, got status=${result.status}\n${result.stderr}`);
  assert.equal(result.stderr, 'polytext: Out of memory: 41 units exceeds the 16 unit limit\n');
  assert.equal(result.stdout, '');
});
