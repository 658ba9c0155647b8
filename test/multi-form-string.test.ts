import test from 'node:test';
import assert from 'node:assert/strict';
import { ConversionProfile, MultiFormString, ProfileRegistry, SystemLocale } from '../src/index.js';

const encoder = new TextEncoder();
const utf8Locale = new SystemLocale({ charset: 'UTF-8' });

test('a utf-8 value derives system and wide forms on demand', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  value.copyInto('utf8', encoder.encode('h\u00e9llo'));
  assert.deepEqual(value.forms(), ['utf8']);

  const wide = value.get('wide');
  assert.equal(wide.ok, true);
  assert.deepEqual([...(wide.value ?? [])], [0x68, 0xe9, 0x6c, 0x6c, 0x6f]);
  assert.deepEqual(value.forms(), ['utf8', 'system', 'wide']);
});

test('a wide value derives utf-8 through the system form', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  value.copyInto('wide', [0x48, 0x49, 0x00, 0x4a]);
  const utf8 = value.get('utf8');
  assert.equal(utf8.ok, true);
  assert.deepEqual([...(utf8.value ?? [])], [0x48, 0x49]);
  assert.equal(value.has('system'), true);
  assert.equal(value.text('utf8'), 'HI');
});

test('derived system strings are composed while utf-8 keeps its bytes', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  assert.equal(value.update(encoder.encode('e\u0301')), true);
  assert.equal(value.text('system'), '\u00e9');
  assert.equal(value.text('utf8'), 'e\u0301');
  assert.equal(value.text('wide'), '\u00e9');
});

test('a lossy derivation keeps its output but leaves the form absent', () => {
  const value = new MultiFormString({ locale: new SystemLocale({ charset: 'US-ASCII' }) });
  assert.equal(value.update(encoder.encode('caf\u00e9')), false);
  assert.deepEqual(value.forms(), ['utf8']);

  const system = value.get('system');
  assert.equal(system.ok, false);
  assert.deepEqual([...(system.value ?? [])], [...encoder.encode('caf?')]);
  assert.equal(value.has('system'), false);
});

test('a single-byte system charset holds what it can represent', () => {
  const value = new MultiFormString({ locale: new SystemLocale({ charset: 'ISO-8859-1' }) });
  value.copyInto('utf8', encoder.encode('caf\u00e9'));
  assert.deepEqual(value.get('system'), { ok: true, value: Uint8Array.of(0x63, 0x61, 0x66, 0xe9) });
  assert.deepEqual([...(value.get('wide').value ?? [])], [0x63, 0x61, 0x66, 0xe9]);
  assert.deepEqual(value.forms(), ['utf8', 'system', 'wide']);

  const updated = new MultiFormString({ locale: new SystemLocale({ charset: 'ISO-8859-1' }) });
  assert.equal(updated.update(encoder.encode('caf\u00e9')), true);
  assert.equal(updated.text('wide'), 'caf\u00e9');
});

test('wide characters are UTF-16 units when the locale says so', () => {
  const value = new MultiFormString({ locale: new SystemLocale({ charset: 'UTF-8', wideUnitBits: 16 }) });
  value.copyInto('utf8', Uint8Array.of(0xf0, 0x9f, 0x98, 0x80));
  assert.deepEqual([...(value.get('wide').value ?? [])], [0xd83d, 0xde00]);
  assert.equal(value.text('wide'), '\u{1f600}');
});

test('a registry supplies cached profiles and the locale', () => {
  const registry = new ProfileRegistry({ locale: { charset: 'UTF-8' } });
  const value = new MultiFormString({ registry });
  value.copyInto('system', encoder.encode('abc'));
  assert.equal(value.text('utf8'), 'abc');
  assert.equal(registry.size, 1);
  value.copyInto('system', encoder.encode('xyz'));
  assert.equal(value.text('utf8'), 'xyz');
  assert.equal(registry.size, 1);
});

test('getLocalized renders the system form through a caller profile', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  value.copyInto('system', Uint8Array.of(0xc3, 0xa9));
  const profile = new ConversionProfile('UTF-8', 'UTF-16BE', { direction: 'toCharset', locale: utf8Locale });
  const localized = value.getLocalized(profile);
  assert.equal(localized.ok, true);
  assert.deepEqual([...(localized.value ?? [])], [0x00, 0xe9]);
  assert.deepEqual([...(value.getLocalized(null).value ?? [])], [0xc3, 0xa9]);
  profile.dispose();

  const empty = new MultiFormString({ locale: utf8Locale });
  assert.deepEqual(empty.getLocalized(null), { ok: false, value: null });
});

test('storing a new value drops the previous localized rendering', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  value.copyInto('system', Uint8Array.of(0xc3, 0xa9));
  const profile = new ConversionProfile('UTF-8', 'UTF-16LE', { direction: 'toCharset', locale: utf8Locale });
  const rendered = value.getLocalized(profile).value ?? new Uint8Array(0);
  assert.deepEqual([...rendered], [0xe9, 0x00]);
  value.copyInto('utf8', encoder.encode('x'));
  assert.equal(rendered[0], 0);
  profile.dispose();
});

test('copyConverted stores the converted bytes as the system form', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  const profile = new ConversionProfile('UTF-16LE', 'UTF-8', { direction: 'fromCharset', locale: utf8Locale });
  assert.equal(value.copyConverted(Uint8Array.of(0x41, 0x00, 0x42, 0x00), profile), true);
  assert.deepEqual(value.forms(), ['system']);
  assert.equal(value.text('system'), 'AB');

  const lossy = new ConversionProfile('ISO-8859-1', 'UTF-8', {
    direction: 'fromCharset',
    bestEffort: true,
    locale: utf8Locale
  });
  assert.equal(value.copyConverted(Uint8Array.of(0x41, 0xe9), lossy), false);
  assert.deepEqual(value.forms(), []);
  profile.dispose();
  lossy.dispose();
});

test('copyFrom takes every form and clear drops them', () => {
  const source = new MultiFormString({ locale: utf8Locale });
  source.update(encoder.encode('name'));
  const copy = new MultiFormString({ locale: utf8Locale });
  copy.copyFrom(source);
  assert.deepEqual(copy.forms(), ['utf8', 'system', 'wide']);
  assert.equal(copy.text('wide'), 'name');

  copy.clear();
  assert.deepEqual(copy.forms(), []);
  assert.deepEqual(copy.get('utf8'), { ok: true, value: null });
  assert.equal(copy.text('system'), null);
});

test('null input empties the string', () => {
  const value = new MultiFormString({ locale: utf8Locale });
  value.copyInto('utf8', encoder.encode('x'));
  value.copyInto('utf8', null);
  assert.deepEqual(value.forms(), []);
  value.copyInto('wide', [0x78]);
  assert.equal(value.update(null), true);
  assert.deepEqual(value.forms(), []);
});
