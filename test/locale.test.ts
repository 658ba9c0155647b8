import test from 'node:test';
import assert from 'node:assert/strict';
import { ByteBuffer, SystemLocale, WideBuffer, detectSystemCharset, localeName } from '../src/index.js';

test('the charset comes from LC_ALL, then LC_CTYPE, then LANG', () => {
  assert.equal(localeName({ LC_ALL: 'de_DE.ISO-8859-15', LANG: 'en_US.UTF-8' }), 'de_DE.ISO-8859-15');
  assert.equal(localeName({ LC_ALL: '', LC_CTYPE: 'ja_JP.eucJP' }), 'ja_JP.eucJP');
  assert.equal(localeName({}), undefined);
  assert.equal(detectSystemCharset({ LC_ALL: 'de_DE.ISO-8859-15', LANG: 'en_US.UTF-8' }), 'ISO-8859-15');
  assert.equal(detectSystemCharset({ LC_CTYPE: 'ja_JP.eucJP' }), 'EUCJP');
});

test('locale names without a codeset fall back per convention', () => {
  assert.equal(detectSystemCharset({}), 'UTF-8');
  assert.equal(detectSystemCharset({ LANG: 'C' }), 'US-ASCII');
  assert.equal(detectSystemCharset({ LANG: 'POSIX' }), 'US-ASCII');
  assert.equal(detectSystemCharset({ LANG: 'fr_FR' }), 'ISO-8859-1');
  assert.equal(detectSystemCharset({ LANG: 'en_US.utf8@euro' }), 'UTF-8');
});

test('an explicit charset overrides the environment and is canonicalized', () => {
  const locale = new SystemLocale({ charset: 'utf8', env: { LANG: 'C' } });
  assert.equal(locale.charset, 'UTF-8');
  assert.equal(new SystemLocale({ env: { LANG: 'C' } }).charset, 'US-ASCII');
});

test('utf-8 system strings decode to code points or UTF-16 units', () => {
  const input = Uint8Array.of(0x41, 0xf0, 0x9f, 0x98, 0x80);
  const points = new WideBuffer();
  assert.equal(new SystemLocale({ charset: 'UTF-8' }).decode(points, input), true);
  assert.deepEqual([...points.view()], [0x41, 0x1f600]);

  const units = new WideBuffer();
  assert.equal(new SystemLocale({ charset: 'UTF-8', wideUnitBits: 16 }).decode(units, input), true);
  assert.deepEqual([...units.view()], [0x41, 0xd83d, 0xde00]);
});

test('undecodable system bytes become U+FFFD', () => {
  const dest = new WideBuffer();
  assert.equal(new SystemLocale({ charset: 'UTF-8' }).decode(dest, Uint8Array.of(0x61, 0xff)), false);
  assert.deepEqual([...dest.view()], [0x61, 0xfffd]);
});

test('wide strings encode with ? for characters the charset lacks', () => {
  const ascii = new SystemLocale({ charset: 'US-ASCII' });
  const dest = new ByteBuffer();
  assert.equal(ascii.encode(dest, [0x41, 0xe9, 0x00, 0x42]), false);
  assert.deepEqual([...dest.view()], [0x41, 0x3f]);

  const utf16Units = new SystemLocale({ charset: 'UTF-8', wideUnitBits: 16 });
  const joined = new ByteBuffer();
  assert.equal(utf16Units.encode(joined, [0xd83d, 0xde00]), true);
  assert.deepEqual([...joined.view()], [0xf0, 0x9f, 0x98, 0x80]);
});

test('other charsets go through iconv-lite', () => {
  const koi8 = new SystemLocale({ charset: 'KOI8-R' });
  assert.deepEqual([...(koi8.encodeCodePoint(0x0416) ?? [])], [0xf6]);
  assert.equal(koi8.encodeCodePoint(0x00e9), null);
  const dest = new WideBuffer();
  assert.equal(koi8.decode(dest, Uint8Array.of(0xf6)), true);
  assert.deepEqual([...dest.view()], [0x0416]);
});

test('charsets iconv-lite does not know are handled as ASCII', () => {
  const unknown = new SystemLocale({ charset: 'X-UNKNOWN' });
  assert.deepEqual([...(unknown.encodeCodePoint(0x41) ?? [])], [0x41]);
  assert.equal(unknown.encodeCodePoint(0xe9), null);
  assert.equal(unknown.isValid(Uint8Array.of(0x41, 0x80)), false);
});

test('forget drops the detected charset', () => {
  const env: Record<string, string | undefined> = { LANG: 'C' };
  const locale = new SystemLocale({ env });
  assert.equal(locale.charset, 'US-ASCII');
  env['LANG'] = 'de_DE.UTF-8';
  assert.equal(locale.charset, 'US-ASCII');
  locale.forget();
  assert.equal(locale.charset, 'UTF-8');
});

test('an encoded U+FFFD in the system charset decodes as valid text', () => {
  const gb = new SystemLocale({ charset: 'GB18030' });
  const dest = new WideBuffer();
  assert.equal(gb.decode(dest, Uint8Array.of(0x61, 0x84, 0x31, 0xa4, 0x37)), true);
  assert.deepEqual([...dest.view()], [0x61, 0xfffd]);

  const truncated = new WideBuffer();
  assert.equal(gb.decode(truncated, Uint8Array.of(0x61, 0x84)), false);
  assert.deepEqual([...truncated.view()], [0x61, 0xfffd]);
});
