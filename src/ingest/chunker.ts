/**
 * Word chunker
 * Fixed-size word windows; consecutive windows of one source overlap
 */

import { ValidationError } from "../core/errors.js";

export interface TextChunk {
  text: string;
  /** Words shared with the previous chunk of the same source */
  overlapWithPrevious: number;
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

export function chunkWords(text: string, size: number, overlap: number): TextChunk[] {
  if (size <= 0 || overlap < 0 || overlap >= size) {
    throw new ValidationError(`invalid chunking: size ${size}, overlap ${overlap}`, { field: "chunking" });
  }

  const words = splitWords(text);
  if (words.length === 0) return [];

  const step = size - overlap;
  const chunks: TextChunk[] = [];
  let previousLength = 0;

  for (let start = 0; ; start += step) {
    const window = words.slice(start, start + size);
    chunks.push({
      text: window.join(" "),
      overlapWithPrevious: start === 0 ? 0 : Math.min(overlap, previousLength),
    });
    previousLength = window.length;
    if (start + size >= words.length) break;
  }

  return chunks;
}
