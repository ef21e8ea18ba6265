import { WORD_SIZE, detectExt, guessType, identifyHeader, permuteWords, swapIndices } from './byteorder.js';
import { describeEncoding, getHeaderBytes, type Encoding } from './encoding.js';
import { MemoryByteSink, MemoryByteSource, readExact, type ByteSink, type ByteSource } from './stream.js';

export const DEFAULT_TARGET: Encoding = 'big-endian';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface Logger {
  debug(message: string): void;
}

export interface ConvertOptions {
  target?: Encoding; // explicit destination, wins over everything else
  destinationName?: string; // output filename whose extension hints the destination
  strict?: boolean; // report a trailing partial word instead of dropping it
  chunkSize?: number; // bytes read per pass, rounded down to whole words
  logger?: Logger;
}

export type IoStage = 'read-header' | 'open-output' | 'write-header' | 'read-body' | 'write-body' | 'close';

export type ConversionOutcome =
  | { kind: 'converted'; from: Encoding; to: Encoding; words: number; bytesWritten: number; droppedBytes: number }
  | { kind: 'already-target'; encoding: Encoding }
  | { kind: 'unrecognized'; header: Uint8Array }
  | { kind: 'truncated-input'; stage: 'header' | 'body'; bytesRead: number }
  | { kind: 'io-failure'; stage: IoStage; detail: string; cause: unknown };

export type IdentifyOutcome =
  | { kind: 'identified'; encoding: Encoding }
  | Extract<ConversionOutcome, { kind: 'unrecognized' | 'truncated-input' | 'io-failure' }>;

// Opens the output once the destination is known; not called for a no-op conversion.
export type SinkFactory = (to: Encoding) => ByteSink;

type TargetResolver = (opts: ConvertOptions) => Encoding | undefined;

const TARGET_RESOLVERS: readonly TargetResolver[] = [
  (opts) => opts.target,
  (opts) => {
    if (opts.destinationName === undefined) return undefined;
    const ext = detectExt(opts.destinationName);
    return ext === undefined ? undefined : guessType(ext);
  },
];

export function resolveTarget(opts: ConvertOptions): Encoding {
  for (const resolve of TARGET_RESOLVERS) {
    const found = resolve(opts);
    if (found !== undefined) return found;
  }
  return DEFAULT_TARGET;
}

function ioFailure(stage: IoStage, err: unknown): Extract<ConversionOutcome, { kind: 'io-failure' }> {
  return { kind: 'io-failure', stage, detail: err instanceof Error ? err.message : String(err), cause: err };
}

type HeaderResult =
  | { kind: 'header'; encoding: Encoding }
  | Extract<ConversionOutcome, { kind: 'unrecognized' | 'truncated-input' | 'io-failure' }>;

function readHeader(source: ByteSource): HeaderResult {
  const header = new Uint8Array(WORD_SIZE);
  let n: number;
  try {
    n = readExact(source, header);
  } catch (e) {
    return ioFailure('read-header', e);
  }
  if (n < WORD_SIZE) return { kind: 'truncated-input', stage: 'header', bytesRead: n };
  const encoding = identifyHeader(header);
  if (encoding === undefined) return { kind: 'unrecognized', header };
  return { kind: 'header', encoding };
}

export function identifyStream(source: ByteSource): IdentifyOutcome {
  const res = readHeader(source);
  return res.kind === 'header' ? { kind: 'identified', encoding: res.encoding } : res;
}

interface SinkSlot {
  sink?: ByteSink;
  readonly open: SinkFactory;
}

function runConversion(source: ByteSource, slot: SinkSlot, opts: ConvertOptions): ConversionOutcome {
  const log = opts.logger;
  const head = readHeader(source);
  if (head.kind !== 'header') return head;
  const from = head.encoding;
  const to = resolveTarget(opts);
  if (from === to) return { kind: 'already-target', encoding: to };
  log?.debug(`[convert] ${describeEncoding(from)} -> ${describeEncoding(to)}`);

  let sink = slot.sink;
  if (sink === undefined) {
    try {
      sink = slot.open(to);
    } catch (e) {
      return ioFailure('open-output', e);
    }
    slot.sink = sink;
  }

  // The original header is replaced, not permuted.
  try {
    sink.write(getHeaderBytes(to));
  } catch (e) {
    return ioFailure('write-header', e);
  }

  // Resolved once for the whole stream.
  const perm = swapIndices(from, to);
  const chunkWords = Math.max(1, Math.floor((opts.chunkSize ?? DEFAULT_CHUNK_SIZE) / WORD_SIZE));
  const chunk = new Uint8Array(chunkWords * WORD_SIZE);
  let words = 0;
  let bytesWritten = WORD_SIZE;
  let droppedBytes = 0;
  for (;;) {
    let n: number;
    try {
      n = readExact(source, chunk);
    } catch (e) {
      return ioFailure('read-body', e);
    }
    const whole = n - (n % WORD_SIZE);
    if (perm !== undefined) permuteWords(chunk, perm, whole);
    if (whole > 0) {
      try {
        sink.write(chunk.subarray(0, whole));
      } catch (e) {
        return ioFailure('write-body', e);
      }
      words += whole / WORD_SIZE;
      bytesWritten += whole;
    }
    if (n < chunk.length) {
      droppedBytes = n - whole;
      break;
    }
  }

  if (droppedBytes > 0) {
    log?.debug(`[convert] ${droppedBytes} trailing byte(s) do not form a word`);
    if (opts.strict) return { kind: 'truncated-input', stage: 'body', bytesRead: droppedBytes };
  }
  log?.debug(`[convert] wrote ${words} words (${bytesWritten} bytes)`);
  return { kind: 'converted', from, to, words, bytesWritten, droppedBytes };
}

/**
 * Converts `source` into `destination`, rewriting the header and permuting every body word.
 *
 * `destination` is either an open sink or a factory called with the resolved target
 * after the header checks pass. Format and I/O problems come back as outcomes rather
 * than exceptions. Whatever sink was opened is closed on every path; the source stays
 * with the caller. After a failure whatever reached the sink is not a valid image.
 */
export function convertStream(
  source: ByteSource,
  destination: ByteSink | SinkFactory,
  opts: ConvertOptions = {},
): ConversionOutcome {
  let slot: SinkSlot;
  if (typeof destination === 'function') {
    slot = { open: destination };
  } else {
    const sink = destination;
    slot = { sink, open: () => sink };
  }
  const outcome = runConversion(source, slot, opts);
  if (slot.sink === undefined) return outcome;
  try {
    slot.sink.close();
  } catch (e) {
    if (outcome.kind === 'converted' || outcome.kind === 'already-target') return ioFailure('close', e);
    // The earlier failure is the one worth reporting.
    opts.logger?.debug(`[convert] close after ${outcome.kind} failed: ${String(e)}`);
  }
  return outcome;
}

export class RomFormatError extends Error {
  constructor(
    readonly kind: 'unrecognized' | 'truncated-input',
    message: string,
  ) {
    super(message);
    this.name = 'RomFormatError';
  }
}

// Whole-image variant. Throws RomFormatError when the header is short or unknown.
export function convertRom(src: Uint8Array, target: Encoding): { data: Uint8Array; from: Encoding } {
  const sink = new MemoryByteSink();
  const outcome = convertStream(new MemoryByteSource(src), sink, { target });
  switch (outcome.kind) {
    case 'converted':
      return { data: sink.toBytes(), from: outcome.from };
    case 'already-target':
      return { data: src.slice(), from: outcome.encoding };
    case 'unrecognized':
      throw new RomFormatError('unrecognized', 'ROM header not recognized');
    case 'truncated-input':
      throw new RomFormatError('truncated-input', `ROM too short for a header (${outcome.bytesRead} bytes)`);
    case 'io-failure':
      throw new Error(`ROM conversion failed at ${outcome.stage}: ${outcome.detail}`, { cause: outcome.cause });
  }
}
