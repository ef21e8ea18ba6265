import { ENCODINGS, getFileExt, getMagic, type Encoding } from './encoding.js';

export const WORD_SIZE = 4;

export function identifyHeader(bytes: Uint8Array): Encoding | undefined {
  if (bytes.length < WORD_SIZE) return undefined;
  const b0 = bytes[0]!, b1 = bytes[1]!, b2 = bytes[2]!, b3 = bytes[3]!;
  const magic = ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0;
  return ENCODINGS.find((e) => getMagic(e) === magic);
}

// Everything from the last '.' on, so ".z64" on its own is its own extension.
export function detectExt(filename: string): string | undefined {
  const idx = filename.lastIndexOf('.');
  return idx < 0 ? undefined : filename.slice(idx);
}

export function guessType(ext: string): Encoding | undefined {
  const lower = ext.toLowerCase();
  return ENCODINGS.find((e) => getFileExt(e) === lower);
}

const NAMES: Record<string, Encoding> = {
  'big-endian': 'big-endian',
  'bigendian': 'big-endian',
  'z64': 'big-endian',
  'byte-swap': 'byte-swapped',
  'byte-swapped': 'byte-swapped',
  'byteswap': 'byte-swapped',
  'v64': 'byte-swapped',
  'little-endian': 'little-endian',
  'littleendian': 'little-endian',
  'n64': 'little-endian',
};

export function parseEncodingName(name: string): Encoding | undefined {
  const key = name.trim().toLowerCase().replace(/^\./, '');
  return Object.prototype.hasOwnProperty.call(NAMES, key) ? NAMES[key] : undefined;
}

// out[i] = in[perm[i]]. Each one is two disjoint transpositions, so it is its own inverse.
export type WordPermutation = readonly [number, number, number, number];

const HALF_WORD_BYTESWAP: WordPermutation = [1, 0, 3, 2];
const FULL_REVERSAL: WordPermutation = [3, 2, 1, 0];
const HALF_WORD_EXCHANGE: WordPermutation = [2, 3, 0, 1];

const PERMUTATIONS: Record<Encoding, Record<Encoding, WordPermutation | undefined>> = {
  'big-endian': { 'big-endian': undefined, 'byte-swapped': HALF_WORD_BYTESWAP, 'little-endian': FULL_REVERSAL },
  'byte-swapped': { 'big-endian': HALF_WORD_BYTESWAP, 'byte-swapped': undefined, 'little-endian': HALF_WORD_EXCHANGE },
  'little-endian': { 'big-endian': FULL_REVERSAL, 'byte-swapped': HALF_WORD_EXCHANGE, 'little-endian': undefined },
};

/** The byte permutation taking a word from `src` to `dst`; undefined when nothing moves. */
export function swapIndices(src: Encoding, dst: Encoding): WordPermutation | undefined {
  return PERMUTATIONS[src][dst];
}

/** Applies `perm` in place to every complete word of `bytes[0..end)`. */
export function permuteWords(bytes: Uint8Array, perm: WordPermutation, end: number = bytes.length): void {
  const [p0, p1, p2, p3] = perm;
  const last = Math.min(end, bytes.length) - WORD_SIZE;
  for (let i = 0; i <= last; i += WORD_SIZE) {
    const b0 = bytes[i + p0]!, b1 = bytes[i + p1]!, b2 = bytes[i + p2]!, b3 = bytes[i + p3]!;
    bytes[i] = b0;
    bytes[i + 1] = b1;
    bytes[i + 2] = b2;
    bytes[i + 3] = b3;
  }
}

export function swapWord(word: Uint8Array, src: Encoding, dst: Encoding): void {
  const perm = swapIndices(src, dst);
  if (perm !== undefined) permuteWords(word, perm, WORD_SIZE);
}

// In place over every complete word; a trailing partial word is left as is.
export function swapBuffer(bytes: Uint8Array, src: Encoding, dst: Encoding): void {
  const perm = swapIndices(src, dst);
  if (perm !== undefined) permuteWords(bytes, perm);
}
