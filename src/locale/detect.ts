/** Environment variables consulted for the character type category, in priority order. */
const LOCALE_VARIABLES = ['LC_ALL', 'LC_CTYPE', 'LANG'] as const;

export type LocaleEnvironment = Readonly<Record<string, string | undefined>>;

/** Locale name that decides the character set, or undefined when none is set. */
export function localeName(env: LocaleEnvironment): string | undefined {
  for (const name of LOCALE_VARIABLES) {
    const value = env[name];
    if (value !== undefined && value.length > 0) return value;
  }
  return undefined;
}

/**
 * Character set named by the environment's locale
 * (`language[_territory][.codeset][@modifier]`).
 *
 * `C` and `POSIX` select US-ASCII. A locale without a codeset selects
 * ISO-8859-1. No locale at all selects UTF-8.
 */
export function detectSystemCharset(env: LocaleEnvironment = process.env): string {
  const name = localeName(env);
  if (name === undefined) return 'UTF-8';
  if (name === 'C' || name === 'POSIX') return 'US-ASCII';
  const codeset = /\.([^@]+)/.exec(name)?.[1];
  if (codeset === undefined) return 'ISO-8859-1';
  const upper = codeset.toUpperCase();
  if (upper === 'UTF8' || upper === 'UTF-8') return 'UTF-8';
  return upper;
}
