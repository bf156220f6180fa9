/**
 * Boundary-aware, overlapping chunking for email bodies.
 * Lengths are counted in code points so a window never ends inside a surrogate pair.
 */

export interface ChunkOptions {
  /** Max code points per chunk. */
  size: number;
  /** Max code points repeated from the end of the previous chunk (whole segments only). */
  overlap: number;
}

interface Unit {
  text: string;
  length: number;
}

const SEGMENT_BOUNDARY = /\n[ \t]*\n\s*|(?<=[.!?]["')\]]*)\s+/g;

function codePointLength(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

/** Split into paragraph/sentence segments; each keeps its trailing whitespace so joins are lossless. */
export function segmentText(text: string): string[] {
  const out: string[] = [];
  let last = 0;
  for (const m of text.matchAll(SEGMENT_BOUNDARY)) {
    const end = (m.index ?? 0) + m[0].length;
    if (end > last) {
      out.push(text.slice(last, end));
      last = end;
    }
  }
  if (last < text.length) out.push(text.slice(last));
  return out;
}

/** Break one over-long segment into pieces of at most `size` code points, preferring whitespace. */
function splitLong(segment: string, size: number): Unit[] {
  const chars = Array.from(segment);
  const units: Unit[] = [];
  let start = 0;
  while (start < chars.length) {
    let end = Math.min(start + size, chars.length);
    if (end < chars.length) {
      for (let i = end; i > start + Math.floor(size / 2); i--) {
        if (/\s/.test(chars[i - 1])) {
          end = i;
          break;
        }
      }
    }
    units.push({ text: chars.slice(start, end).join(''), length: end - start });
    start = end;
  }
  return units;
}

function toUnits(text: string, size: number): Unit[] {
  const units: Unit[] = [];
  for (const segment of segmentText(text)) {
    const length = codePointLength(segment);
    if (length <= size) units.push({ text: segment, length });
    else units.push(...splitLong(segment, size));
  }
  return units;
}

/**
 * Split text into windows. Text within `size` returns exactly one chunk (possibly empty).
 * Output is a pure function of (text, size, overlap).
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  const { size } = options;
  const overlap = Math.max(0, Math.min(options.overlap, size - 1));
  const trimmed = text.trim();
  if (codePointLength(trimmed) <= size) return [trimmed];

  const units = toUnits(trimmed, size);
  const chunks: string[] = [];
  let i = 0;
  while (i < units.length) {
    let j = i;
    let length = 0;
    while (j < units.length && length + units[j].length <= size) {
      length += units[j].length;
      j++;
    }
    const chunk = units
      .slice(i, j)
      .map((u) => u.text)
      .join('')
      .trim();
    if (chunk) chunks.push(chunk);
    if (j >= units.length) break;

    // Step back over trailing units that fit in the overlap; always advance past `i`.
    let back = j;
    let carried = 0;
    while (back - 1 > i && carried + units[back - 1].length <= overlap) {
      carried += units[back - 1].length;
      back--;
    }
    i = back;
  }
  return chunks;
}
