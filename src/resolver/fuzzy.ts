/**
 * Fuzzy name matching
 * Ratcliff/Obershelp similarity: 2 * matched characters / total characters,
 * where matches are found by recursively taking the longest common block.
 */

import { entityNameKey } from "../schemas/entity.js";

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]; earliest in a, then in b, on ties
 */
function longestMatch(
  a: string,
  b: string,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { i: i - size + 1, j: j - size + 1, size };
      }
    }
    lengths = next;
  }

  return best;
}

function matchedCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const { i, j, size } = longestMatch(a, b, alo, ahi, blo, bhi);
    if (size === 0) continue;

    total += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }

  return total;
}

/**
 * Similarity in [0, 1] of two raw strings
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchedCharacters(a, b)) / total;
}

/**
 * Similarity of two names after lower-casing and whitespace normalization
 */
export function nameSimilarity(a: string, b: string): number {
  return similarity(entityNameKey(a), entityNameKey(b));
}

export interface NameMatch {
  name: string;
  score: number;
}

/**
 * Best-scoring name at or above the threshold. Ties go to the lexicographically first name.
 */
export function bestNameMatch(candidate: string, names: string[], threshold: number): NameMatch | null {
  let best: NameMatch | null = null;

  for (const name of names) {
    const score = nameSimilarity(candidate, name);
    if (score < threshold) continue;
    if (!best || score > best.score || (score === best.score && name < best.name)) {
      best = { name, score };
    }
  }

  return best;
}
