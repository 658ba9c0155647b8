import { readFileSync } from 'node:fs';
import type { UnicodeForm } from '../text/forms.js';

export const UTF8 = 'UTF-8';
export const UTF16BE = 'UTF-16BE';
export const UTF16LE = 'UTF-16LE';

/** Codepage number of UTF-8. */
export const CP_UTF8 = 65001;

const UNICODE_ALIASES: ReadonlyMap<string, string> = new Map([
  ['UTF-8', UTF8],
  ['UTF8', UTF8],
  ['CP65001', UTF8],
  ['UTF-16BE', UTF16BE],
  ['UTF16BE', UTF16BE],
  ['UTF-16LE', UTF16LE],
  ['UTF16LE', UTF16LE]
]);

/**
 * Canonical spelling of a charset name: upper-cased, with the Unicode forms
 * folded onto `UTF-8`, `UTF-16BE` and `UTF-16LE`.
 */
export function canonicalCharset(name: string): string {
  const upper = name.trim().toUpperCase();
  return UNICODE_ALIASES.get(upper) ?? upper;
}

/** Unicode form a charset name denotes, or null for any other charset. */
export function unicodeFormOf(name: string): UnicodeForm | null {
  switch (canonicalCharset(name)) {
    case UTF8:
      return 'utf-8';
    case UTF16BE:
      return 'utf-16be';
    case UTF16LE:
      return 'utf-16le';
    default:
      return null;
  }
}

let codepageTable: ReadonlyMap<string, number> | null = null;

function isCodepageRecord(value: unknown): value is Record<string, number> {
  if (typeof value !== 'object' || value === null) return false;
  return Object.values(value).every((entry) => typeof entry === 'number' && Number.isInteger(entry));
}

function loadCodepages(): ReadonlyMap<string, number> {
  if (codepageTable) return codepageTable;
  const parsed: unknown = JSON.parse(readFileSync(new URL('../../data/codepages.json', import.meta.url), 'utf8'));
  const codepages = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'codepages') : undefined;
  if (!isCodepageRecord(codepages)) {
    throw new TypeError('data/codepages.json must map charset names to integer codepages');
  }
  codepageTable = new Map(Object.entries(codepages));
  return codepageTable;
}

function parseDigits(text: string): number | null {
  return /^[0-9]+$/.test(text) ? Number.parseInt(text, 10) : null;
}

/**
 * Codepage number for a charset name, or null when it has none.
 * Names in the table win; otherwise `CPnnn`, `IBMnnn` and `WINDOWS-nnn`
 * (874 and 1250–1258 only) are parsed. `CP_ACP` and `CP_OEMCP` resolve to
 * `systemCodepage`.
 */
export function codepageOf(name: string, systemCodepage: number | null = null): number | null {
  const upper = name.trim().toUpperCase();
  if (upper.length === 0 || upper.length > 15) return null;
  const known = loadCodepages().get(upper);
  if (known !== undefined) return known;

  if (upper === 'CP_ACP' || upper === 'CP_OEMCP') return systemCodepage;
  if (upper.startsWith('CP')) return parseDigits(upper.slice(2));
  if (upper.startsWith('IBM')) return parseDigits(upper.slice(3));
  if (upper.startsWith('WINDOWS-')) {
    const codepage = parseDigits(upper.slice(8));
    if (codepage === null) return null;
    return codepage === 874 || (codepage >= 1250 && codepage <= 1258) ? codepage : null;
  }
  return null;
}

/** Charset name a backend is most likely to know for a codepage number. */
export function charsetForCodepage(codepage: number): string {
  if (codepage === CP_UTF8) return UTF8;
  if (codepage === 1200) return UTF16LE;
  if (codepage === 1201) return UTF16BE;
  if (codepage >= 28591 && codepage <= 28605) return `ISO-8859-${codepage - 28590}`;
  if (codepage === 20866) return 'KOI8-R';
  if (codepage === 21866) return 'KOI8-U';
  if (codepage === 10000) return 'MACINTOSH';
  if (codepage === 51932) return 'EUC-JP';
  if (codepage === 51936) return 'GB2312';
  if (codepage === 54936) return 'GB18030';
  if (codepage === 874 || (codepage >= 1250 && codepage <= 1258)) return `WINDOWS-${codepage}`;
  return `CP${codepage}`;
}
