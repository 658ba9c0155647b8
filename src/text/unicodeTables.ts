/**
 * Canonical composition pairs and combining classes, derived once per process
 * from the runtime's Unicode data through `String.prototype.normalize`.
 */

/** Hangul syllable algorithm constants. */
export const HANGUL = {
  S_BASE: 0xac00,
  L_BASE: 0x1100,
  V_BASE: 0x1161,
  T_BASE: 0x11a7,
  L_COUNT: 19,
  V_COUNT: 21,
  T_COUNT: 28,
  N_COUNT: 21 * 28,
  S_COUNT: 19 * 21 * 28
} as const;

/**
 * Marks whose combining class is fixed by the standard, one per class value.
 * Classes of other marks are found by comparing canonical ordering against these.
 */
const REFERENCE_MARKS: ReadonlyArray<readonly [number, number]> = [
  [0x0334, 1],
  [0x16ff0, 6],
  [0x093c, 7],
  [0x3099, 8],
  [0x094d, 9],
  [0x05b0, 10],
  [0x05b1, 11],
  [0x05b2, 12],
  [0x05b3, 13],
  [0x05b4, 14],
  [0x05b5, 15],
  [0x05b6, 16],
  [0x05b7, 17],
  [0x05b8, 18],
  [0x05b9, 19],
  [0x05bb, 20],
  [0x05bc, 21],
  [0x05bd, 22],
  [0x05bf, 23],
  [0x05c1, 24],
  [0x05c2, 25],
  [0xfb1e, 26],
  [0x064b, 27],
  [0x064c, 28],
  [0x064d, 29],
  [0x064e, 30],
  [0x064f, 31],
  [0x0650, 32],
  [0x0651, 33],
  [0x0652, 34],
  [0x0670, 35],
  [0x0711, 36],
  [0x0c55, 84],
  [0x0c56, 91],
  [0x0e38, 103],
  [0x0e48, 107],
  [0x0eb8, 118],
  [0x0ec8, 122],
  [0x0f71, 129],
  [0x0f72, 130],
  [0x0f74, 132],
  [0x0327, 202],
  [0x1dce, 214],
  [0x031b, 216],
  [0x302a, 218],
  [0x0316, 220],
  [0x059a, 222],
  [0x302e, 224],
  [0x1d16d, 226],
  [0x05ae, 228],
  [0x0301, 230],
  [0x0315, 232],
  [0x035c, 233],
  [0x035d, 234],
  [0x0345, 240]
];

/** Last code point scanned; nothing above the SMP composes or combines canonically. */
const SCAN_END = 0x1ffff;
const MARK = /^\p{M}$/u;

type UnicodeTables = {
  /** Flattened (first, second, composite) triples sorted by first, then second. */
  compositions: Uint32Array;
  combiningClasses: Map<number, number>;
};

let tables: UnicodeTables | null = null;

function isHangulSyllable(codePoint: number): boolean {
  return codePoint >= HANGUL.S_BASE && codePoint < HANGUL.S_BASE + HANGUL.S_COUNT;
}

function isSurrogateCode(codePoint: number): boolean {
  return codePoint >= 0xd800 && codePoint <= 0xdfff;
}

function codePointsOf(text: string): number[] {
  const out: number[] = [];
  for (const ch of text) {
    const codePoint = ch.codePointAt(0);
    if (codePoint !== undefined) out.push(codePoint);
  }
  return out;
}

/** True when canonical ordering moves `second` in front of `first` (ccc(first) > ccc(second) > 0). */
function reorders(first: number, second: number): boolean {
  const decomposed = codePointsOf(`a${String.fromCodePoint(first, second)}`.normalize('NFD'));
  return decomposed[1] === second && decomposed[2] === first;
}

function compareByOrdering(a: number, b: number): number {
  if (reorders(a, b)) return 1;
  if (reorders(b, a)) return -1;
  return 0;
}

/**
 * Non-starter marks grouped by canonical ordering, each group assigned the
 * class of the reference mark it contains. A group with no reference mark gets
 * a value between its neighbours so that comparisons stay correct.
 */
function deriveCombiningClasses(): Map<number, number> {
  const marks: number[] = [];
  const singletons: Array<readonly [number, number]> = [];
  for (let codePoint = 0x0300; codePoint <= SCAN_END; codePoint += 1) {
    if (isSurrogateCode(codePoint)) continue;
    const ch = String.fromCodePoint(codePoint);
    if (!MARK.test(ch)) continue;
    const decomposed = codePointsOf(ch.normalize('NFD'));
    if (decomposed.length === 1 && decomposed[0] !== codePoint) {
      singletons.push([codePoint, decomposed[0]!]);
      continue;
    }
    if (decomposed.length !== 1) continue;
    // U+0345 holds the highest class (240); every other non-starter reorders in front of it.
    if (codePoint === 0x0345 || reorders(0x0345, codePoint)) {
      marks.push(codePoint);
    }
  }

  marks.sort(compareByOrdering);

  const groups: number[][] = [];
  for (const codePoint of marks) {
    const last = groups[groups.length - 1];
    if (last && compareByOrdering(last[0]!, codePoint) === 0) last.push(codePoint);
    else groups.push([codePoint]);
  }

  const references = new Map(REFERENCE_MARKS);
  const values = groups.map((group) => {
    for (const codePoint of group) {
      const value = references.get(codePoint);
      if (value !== undefined) return value;
    }
    return undefined;
  });

  const classes = new Map<number, number>();
  let previous = 0;
  groups.forEach((group, index) => {
    let value = values[index];
    if (value === undefined) {
      let next = 255;
      for (let j = index + 1; j < values.length; j += 1) {
        const candidate = values[j];
        if (candidate !== undefined) {
          next = candidate;
          break;
        }
      }
      value = (previous + next) / 2;
    }
    previous = value;
    for (const codePoint of group) classes.set(codePoint, value);
  });

  for (const [codePoint, target] of singletons) {
    const value = classes.get(target);
    if (value !== undefined) classes.set(codePoint, value);
  }
  return classes;
}

/** Primary composites: characters that are their own NFC and decompose canonically. */
function deriveCompositions(): Uint32Array {
  const triples: Array<[number, number, number]> = [];
  for (let codePoint = 0x00c0; codePoint <= SCAN_END; codePoint += 1) {
    if (isSurrogateCode(codePoint) || isHangulSyllable(codePoint)) continue;
    const ch = String.fromCodePoint(codePoint);
    const decomposed = ch.normalize('NFD');
    if (decomposed === ch || ch.normalize('NFC') !== ch) continue;

    const parts = codePointsOf(decomposed);
    const second = parts.pop();
    if (second === undefined || parts.length === 0) continue;
    const base = codePointsOf(String.fromCodePoint(...parts).normalize('NFC'));
    if (base.length !== 1) continue;
    const first = base[0]!;
    if (String.fromCodePoint(first, second).normalize('NFC') !== ch) continue;
    triples.push([first, second, codePoint]);
  }

  triples.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  const flat = new Uint32Array(triples.length * 3);
  triples.forEach((triple, index) => flat.set(triple, index * 3));
  return flat;
}

function loadTables(): UnicodeTables {
  if (!tables) {
    tables = {
      compositions: deriveCompositions(),
      combiningClasses: deriveCombiningClasses()
    };
  }
  return tables;
}

/** Canonical combining class of a code point; 0 for starters. */
export function combiningClass(codePoint: number): number {
  return loadTables().combiningClasses.get(codePoint) ?? 0;
}

/**
 * Primary composite of `first` followed by `second`, or 0 when the pair does not
 * compose. Hangul syllables are composed algorithmically by the caller.
 */
export function composePair(first: number, second: number): number {
  const { compositions } = loadTables();
  let low = 0;
  let high = compositions.length / 3 - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const at = mid * 3;
    const midFirst = compositions[at]!;
    const midSecond = compositions[at + 1]!;
    if (midFirst === first && midSecond === second) return compositions[at + 2]!;
    if (midFirst < first || (midFirst === first && midSecond < second)) low = mid + 1;
    else high = mid - 1;
  }
  return 0;
}
