import { resolveTextLimits, type TextLimits } from '../limits.js';
import { ByteWriter, emptyCounts, formCodec, type SubstitutionCounts, type UnicodeForm } from './forms.js';
import type { ByteBuffer } from './TextBuffer.js';
import { HANGUL, combiningClass, composePair } from './unicodeTables.js';

/** Class that neither blocks nor is blocked while collecting a combining run. */
const CLASS_ATTACHED_ABOVE_RIGHT = 228;

export type NormalizeOptions = {
  limits?: TextLimits;
};

/** A code point plus where its source bytes sit, for unchanged copies. */
type Pending = {
  codePoint: number;
  start: number;
  length: number;
  /** True when the source bytes can be copied instead of re-encoding. */
  verbatim: boolean;
};

/**
 * Compose `input` (bounded by `length`) to Normalization Form C, appending the
 * result in `to` form to `dest`.
 *
 * Malformed input is replaced by U+FFFD and counted. A combining run longer than
 * `limits.maxCombiningRun` is written without composition and flagged best-effort.
 */
export function normalizeC(
  dest: ByteBuffer,
  input: Uint8Array,
  length: number,
  from: UnicodeForm,
  to: UnicodeForm,
  options: NormalizeOptions = {}
): SubstitutionCounts {
  const maxRun = resolveTextLimits(options.limits).maxCombiningRun;
  const source = formCodec(from);
  const target = formCodec(to);
  const end = Math.min(length, input.length);
  const copyUnchanged = from === to;
  const scale = source.unitSize === 2 ? 1 : target.unitSize;
  const writer = new ByteWriter(dest, target.unitSize, end * scale);
  const counts = emptyCounts();

  let offset = 0;
  const read = () => source.decode(input, offset, end - offset);
  const take = (codePoint: number, consumed: number): Pending => {
    const pending: Pending = {
      codePoint,
      start: offset,
      length: consumed,
      verbatim: copyUnchanged && consumed !== source.pairSize
    };
    offset += consumed;
    return pending;
  };
  const emit = (pending: Pending) => {
    if (pending.verbatim) writer.writeBytes(input.subarray(pending.start, pending.start + pending.length));
    else writer.writeCodePoint(target, pending.codePoint);
  };
  const replaceBase = (base: Pending, codePoint: number) => {
    base.codePoint = codePoint;
    base.verbatim = false;
  };

  for (;;) {
    const first = read();
    if (first.consumed === 0) break;
    if (first.consumed < 0) {
      writer.writeCodePoint(target, first.codePoint);
      offset -= first.consumed;
      counts.malformed += 1;
      continue;
    }
    let base = take(first.codePoint, first.consumed);

    let next = read();
    while (next.consumed > 0) {
      const second = take(next.codePoint, next.consumed);

      const lIndex = base.codePoint - HANGUL.L_BASE;
      const sIndex = base.codePoint - HANGUL.S_BASE;
      if (lIndex >= 0 && lIndex < HANGUL.L_COUNT) {
        const vIndex = second.codePoint - HANGUL.V_BASE;
        if (vIndex >= 0 && vIndex < HANGUL.V_COUNT) {
          replaceBase(base, HANGUL.S_BASE + (lIndex * HANGUL.V_COUNT + vIndex) * HANGUL.T_COUNT);
        } else {
          emit(base);
          base = second;
        }
        next = read();
        continue;
      }
      if (sIndex >= 0 && sIndex < HANGUL.S_COUNT && sIndex % HANGUL.T_COUNT === 0) {
        const tIndex = second.codePoint - HANGUL.T_BASE;
        if (tIndex > 0 && tIndex < HANGUL.T_COUNT) {
          replaceBase(base, base.codePoint + tIndex);
        } else {
          emit(base);
          base = second;
        }
        next = read();
        continue;
      }
      const composite = composePair(base.codePoint, second.codePoint);
      if (composite !== 0) {
        replaceBase(base, composite);
        next = read();
        continue;
      }
      const secondClass = combiningClass(second.codePoint);
      if (secondClass === 0) {
        emit(base);
        base = second;
        next = read();
        continue;
      }

      // Collect the marks that follow, stopping at the first blocked one.
      const run: number[] = [second.codePoint];
      const runClasses: number[] = [secondClass];
      let lastClass = secondClass;
      let blockedClass = 0;
      let blockedByPeer = false;
      let capped = false;
      const collect = () => {
        blockedByPeer = false;
        while (run.length < maxRun) {
          const mark = read();
          if (mark.consumed <= 0) return;
          const markClass = combiningClass(mark.codePoint);
          const blocked =
            markClass === 0 ||
            (lastClass >= markClass &&
              lastClass !== CLASS_ATTACHED_ABOVE_RIGHT &&
              markClass !== CLASS_ATTACHED_ABOVE_RIGHT);
          if (blocked) {
            blockedClass = markClass;
            blockedByPeer = markClass === lastClass;
            return;
          }
          offset += mark.consumed;
          lastClass = markClass;
          run.push(mark.codePoint);
          runClasses.push(markClass);
        }
        capped = true;
        counts.bestEffort = true;
      };
      collect();

      if (!capped) {
        let index = 1;
        while (index < run.length) {
          const composed = composePair(base.codePoint, run[index]!);
          if (composed === 0) {
            index += 1;
            continue;
          }
          replaceBase(base, composed);
          run.splice(index, 1);
          runClasses.splice(index, 1);
          // The removed mark may have been what blocked the next one.
          if (run.length > 0 && index === run.length && blockedByPeer) {
            lastClass = runClasses[run.length - 1]!;
            collect();
            if (capped) break;
          }
          index = 0;
        }
      }

      emit(base);
      for (const codePoint of run) writer.writeCodePoint(target, codePoint);

      // Flush marks that follow in non-decreasing class order.
      if (capped || blockedByPeer) {
        let flushClass = capped ? lastClass : blockedClass;
        for (;;) {
          const mark = read();
          if (mark.consumed <= 0) break;
          const markClass = combiningClass(mark.codePoint);
          if (flushClass > markClass) break;
          offset += mark.consumed;
          flushClass = markClass;
          writer.writeCodePoint(target, mark.codePoint);
        }
      }
      break;
    }

    if (next.consumed > 0) continue;
    emit(base);
    if (next.consumed === 0) break;
    writer.writeCodePoint(target, next.codePoint);
    offset -= next.consumed;
    counts.malformed += 1;
  }

  writer.finish();
  return counts;
}
