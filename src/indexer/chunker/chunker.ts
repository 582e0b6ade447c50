/**
 * Chunker
 *
 * Recursive character splitting for extracted document text:
 *
 * 1. Normalize line endings to \n
 * 2. Split on the coarsest boundary present (see SEPARATORS), recursing
 *    into pieces that are still too long with the finer ones
 * 3. Cut pieces with no boundary left into fixed windows
 * 4. Pack pieces greedily into chunks of at most `chunkSize`, starting each
 *    new chunk with up to `overlap` trailing characters of the previous one
 *
 * The output depends only on the input and the two sizes.
 */

import { ConfigurationError } from '../../errors/index.js';
import { SEPARATORS } from './config.js';

export function validateChunkSizes(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`chunk_size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`chunk_overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `chunk_overlap (${overlap}) must be smaller than chunk_size (${chunkSize})`
    );
  }
}

/**
 * Split on `separator`, keeping it at the end of each piece so the pieces
 * concatenate back to the input.
 */
function splitKeeping(text: string, separator: string): string[] {
  const parts = text.split(separator);
  return parts
    .map((part, i) => (i < parts.length - 1 ? part + separator : part))
    .filter((part) => part !== '');
}

/**
 * First window is `chunkSize`; later ones leave room for the overlap the
 * packer prepends.
 */
function fixedWindows(text: string, chunkSize: number, overlap: number): string[] {
  const windows = [text.slice(0, chunkSize)];
  const step = chunkSize - overlap;
  for (let start = chunkSize; start < text.length; start += step) {
    windows.push(text.slice(start, start + step));
  }
  return windows;
}

function splitRecursive(
  text: string,
  separators: readonly string[],
  chunkSize: number,
  overlap: number
): string[] {
  if (text.length <= chunkSize) {
    return [text];
  }

  const index = separators.findIndex((sep) => text.includes(sep));
  if (index === -1) {
    return fixedWindows(text, chunkSize, overlap);
  }

  const separator = separators[index] ?? ' ';
  const finer = separators.slice(index + 1);
  return splitKeeping(text, separator).flatMap((piece) =>
    splitRecursive(piece, finer, chunkSize, overlap)
  );
}

/**
 * Up to `overlap` trailing characters of `text`, no more than `room`,
 * moved forward to the next word start when the cut lands mid-word.
 * A tail with no whitespace in it is kept as is.
 */
export function overlapTail(text: string, overlap: number, room: number): string {
  const n = Math.min(overlap, room, text.length);
  if (n <= 0) {
    return '';
  }

  let tail = text.slice(text.length - n);
  const before = text.charAt(text.length - n - 1);
  if (before !== '' && !/\s/.test(before)) {
    const ws = tail.search(/\s/);
    if (ws !== -1) {
      tail = tail.slice(ws + 1);
    }
  }
  return tail.replace(/^\s+/, '');
}

function pack(pieces: string[], chunkSize: number, overlap: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const piece of pieces) {
    if (current.length + piece.length <= chunkSize) {
      current += piece;
      continue;
    }
    // Whitespace that doesn't fit would only start a chunk of pure overlap
    if (piece.trim() === '') {
      continue;
    }
    if (current.trim() !== '') {
      chunks.push(current);
    }
    current = overlapTail(current, overlap, chunkSize - piece.length) + piece;
  }

  if (current.trim() !== '') {
    chunks.push(current);
  }

  return chunks.map((chunk) => chunk.trim());
}

/**
 * Split text into chunks of at most `chunkSize` characters.
 *
 * @throws ConfigurationError for non-integer sizes, `chunkSize < 1`,
 *   `overlap < 0` or `overlap >= chunkSize`
 *
 * @example
 * ```ts
 * splitText('abcdefghij', 4, 1); // ['abcd', 'defg', 'ghij']
 * ```
 */
export function splitText(text: string, chunkSize: number, overlap: number): string[] {
  validateChunkSizes(chunkSize, overlap);

  const normalized = text.replace(/\r\n?/g, '\n');
  if (normalized.trim() === '') {
    return [];
  }
  if (normalized.length <= chunkSize) {
    return [normalized.trim()];
  }

  return pack(splitRecursive(normalized, SEPARATORS, chunkSize, overlap), chunkSize, overlap);
}
