export type Encoding = 'big-endian' | 'byte-swapped' | 'little-endian';

export const ENCODINGS: readonly Encoding[] = ['big-endian', 'byte-swapped', 'little-endian'];

interface EncodingInfo {
  magic: number; // header signature as a big-endian u32
  ext: string;
  label: string;
}

const INFO: Record<Encoding, EncodingInfo> = {
  'big-endian': { magic: 0x80371240, ext: '.z64', label: 'BigEndian (.z64)' },
  'byte-swapped': { magic: 0x37804012, ext: '.v64', label: 'ByteSwap (.v64)' },
  'little-endian': { magic: 0x40123780, ext: '.n64', label: 'LittleEndian (.n64)' },
};

export function getMagic(encoding: Encoding): number {
  return INFO[encoding].magic;
}

// Returns a fresh copy; callers may write it straight to a sink.
export function getHeaderBytes(encoding: Encoding): Uint8Array {
  const m = INFO[encoding].magic;
  return Uint8Array.of((m >>> 24) & 0xff, (m >>> 16) & 0xff, (m >>> 8) & 0xff, m & 0xff);
}

export function getFileExt(encoding: Encoding): string {
  return INFO[encoding].ext;
}

export function describeEncoding(encoding: Encoding): string {
  return INFO[encoding].label;
}
