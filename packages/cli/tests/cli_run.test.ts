import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MemoryByteSource, type ByteSource } from '@romswap/core';
import { USAGE, consoleIo, outputFilename, parseArgs, run, type CliIo } from '../src/lib.js';

const BE = [0x80, 0x37, 0x12, 0x40];
const BS = [0x37, 0x80, 0x40, 0x12];
const LE = [0x40, 0x12, 0x37, 0x80];

interface CapturedIo extends CliIo {
  out: string[];
  err: string[];
  debug: string[];
}

function captureIo(): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  const debug: string[] = [];
  return {
    out, err, debug,
    log: (m) => out.push(m),
    error: (m) => err.push(m),
    logger: { debug: (m) => debug.push(m) },
  };
}

describe('cli argument parsing', () => {
  it('reads positionals and flags', () => {
    const res = parseArgs(['in.v64', 'out.n64', '-f', '--romtype', 'byte-swap', '--strict']);
    expect(res).toEqual({
      ok: true,
      args: { input: 'in.v64', output: 'out.n64', romtype: 'byte-swapped', identify: false, force: true, strict: true, help: false },
    });
  });

  it('accepts --romtype=VALUE and short -r/-i', () => {
    const a = parseArgs(['--romtype=n64', 'in']);
    expect(a.ok && a.args.romtype).toBe('little-endian');
    const b = parseArgs(['-r', 'big-endian', '-i', 'in']);
    expect(b.ok && [b.args.romtype, b.args.identify]).toEqual(['big-endian', true]);
  });

  it('rejects bad input', () => {
    expect(parseArgs(['in', '-r', 'sideways'])).toEqual({ ok: false, error: 'Unknown rom type: sideways' });
    expect(parseArgs(['in', '--romtype'])).toEqual({ ok: false, error: '--romtype requires a value' });
    expect(parseArgs(['in', '-x'])).toEqual({ ok: false, error: 'Unknown option: -x' });
    expect(parseArgs(['in', '--verbose'])).toEqual({ ok: false, error: 'Unknown option: --verbose' });
    expect(parseArgs(['in', '--force=yes'])).toEqual({ ok: false, error: '--force takes no value' });
    expect(parseArgs(['a', 'b', 'c'])).toEqual({ ok: false, error: 'Unexpected argument: c' });
  });
});

describe('cli output filename', () => {
  it('swaps a three-letter extension for the destination one', () => {
    expect(outputFilename('rom.v64', 'big-endian')).toBe('rom.z64');
    expect(outputFilename('a.rom', 'little-endian')).toBe('a.n64');
  });

  it('appends the extension otherwise', () => {
    expect(outputFilename('rom', 'byte-swapped')).toBe('rom.v64');
    expect(outputFilename('rom.bi', 'big-endian')).toBe('rom.bi.z64');
    expect(outputFilename('ab', 'big-endian')).toBe('ab.z64');
  });
});

describe('cli run', () => {
  let dir = '';
  const p = (name: string) => path.join(dir, name);
  const write = (name: string, bytes: number[]) => fs.writeFileSync(p(name), Uint8Array.from(bytes));
  const read = (name: string) => Array.from(fs.readFileSync(p(name)));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'romswap-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('converts to big-endian next to the input by default', () => {
    write('game.v64', [...BS, 0x02, 0x01, 0x04, 0x03]);
    const io = captureIo();
    expect(run([p('game.v64')], io)).toBe(0);
    expect(read('game.z64')).toEqual([...BE, 0x01, 0x02, 0x03, 0x04]);
    expect(io.out).toEqual([`Converted ${p('game.v64')} (ByteSwap (.v64)) to ${p('game.z64')} (BigEndian (.z64))`]);
    expect(io.err).toEqual([]);
    expect(io.debug).toEqual([
      '[convert] ByteSwap (.v64) -> BigEndian (.z64)',
      '[convert] wrote 1 words (8 bytes)',
    ]);
  });

  it('takes the destination type from the output name', () => {
    write('game.z64', [...BE, 0x01, 0x02, 0x03, 0x04]);
    const io = captureIo();
    expect(run([p('game.z64'), p('copy.N64')], io)).toBe(0);
    expect(read('copy.N64')).toEqual([...LE, 0x04, 0x03, 0x02, 0x01]);
  });

  it('lets --romtype override the output name', () => {
    write('game.z64', [...BE, 0x01, 0x02, 0x03, 0x04]);
    const io = captureIo();
    expect(run([p('game.z64'), p('odd.v64'), '-r', 'little-endian'], io)).toBe(0);
    expect(read('odd.v64')).toEqual([...LE, 0x04, 0x03, 0x02, 0x01]);
  });

  it('leaves an already converted file alone', () => {
    write('game.bin', [...BE, 0x01, 0x02, 0x03, 0x04]);
    const io = captureIo();
    expect(run([p('game.bin')], io)).toBe(0);
    expect(io.out).toEqual(['File is already BigEndian (.z64)!']);
    expect(fs.existsSync(p('game.z64'))).toBe(false);
  });

  it('identifies without converting', () => {
    write('game.n64', [...LE, 0x04, 0x03, 0x02, 0x01]);
    const io = captureIo();
    expect(run(['--identify', p('game.n64')], io)).toBe(0);
    expect(io.out).toEqual([`File ${p('game.n64')} is LittleEndian (.n64)`]);
    expect(fs.readdirSync(dir)).toEqual(['game.n64']);
  });

  it('fails on an unrecognized header without creating output', () => {
    write('junk.v64', [0xff, 0xff, 0xff, 0xff, 0x01, 0x02, 0x03, 0x04]);
    const io = captureIo();
    expect(run([p('junk.v64')], io)).toBe(1);
    expect(io.err).toEqual([`File ${p('junk.v64')} not recognized!`]);
    expect(fs.existsSync(p('junk.z64'))).toBe(false);
  });

  it('fails on a missing input', () => {
    const io = captureIo();
    expect(run([p('nope.z64')], io)).toBe(1);
    expect(io.err).toEqual([`Unable to open file: ${p('nope.z64')}`]);
  });

  it('fails on an input shorter than a header', () => {
    write('tiny.v64', [0x37, 0x80]);
    const io = captureIo();
    expect(run([p('tiny.v64')], io)).toBe(1);
    expect(io.err).toEqual([`Error reading file: ${p('tiny.v64')}`]);
  });

  it('refuses to write over the input', () => {
    write('game.n64', [...LE, 0x04, 0x03, 0x02, 0x01]);
    const io = captureIo();
    expect(run([p('game.n64'), p('game.n64'), '-r', 'big-endian', '-f'], io)).toBe(1);
    expect(io.err).toEqual([`Input and Output filenames are identical ${p('game.n64')}, consider renaming input file`]);
    expect(read('game.n64')).toEqual([...LE, 0x04, 0x03, 0x02, 0x01]);
  });

  it('keeps an existing output unless forced', () => {
    write('game.v64', [...BS, 0x02, 0x01, 0x04, 0x03]);
    write('game.z64', [0x00]);
    const io = captureIo();
    expect(run([p('game.v64')], io)).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/^Unable to open file .*game\.z64 for output\. Error EEXIST/);
    expect(read('game.z64')).toEqual([0x00]);

    const forced = captureIo();
    expect(run([p('game.v64'), '--force'], forced)).toBe(0);
    expect(read('game.z64')).toEqual([...BE, 0x01, 0x02, 0x03, 0x04]);
  });

  it('drops a trailing partial word, or fails with --strict', () => {
    write('game.z64', [...BE, 0x01, 0x02, 0x03, 0x04, 0x05, 0x06]);
    expect(run([p('game.z64'), p('loose.v64')], captureIo())).toBe(0);
    expect(read('loose.v64')).toEqual([...BS, 0x02, 0x01, 0x04, 0x03]);

    const io = captureIo();
    expect(run([p('game.z64'), p('strict.v64'), '--strict'], io)).toBe(1);
    expect(io.err).toEqual([`File ${p('game.z64')} ends with 2 byte(s) that do not form a word`]);
  });

  it('reports a header read failure', () => {
    const broken: ByteSource = {
      read: () => { throw new Error('EIO: i/o error, read'); },
      close: () => {},
    };
    const io = captureIo();
    expect(run(['rom.v64'], io, () => broken)).toBe(1);
    expect(io.err).toEqual(['Error reading file: rom.v64']);
    expect(io.debug).toEqual(['[cli] read-header: EIO: i/o error, read']);
  });

  it('keeps the exit code when the input fails to close', () => {
    class StickySource extends MemoryByteSource {
      override close(): void {
        throw new Error('EBADF: bad file descriptor, close');
      }
    }
    const io = captureIo();
    const code = run(['--identify', 'rom.z64'], io, () => new StickySource(Uint8Array.from(BE)));
    expect(code).toBe(0);
    expect(io.out).toEqual(['File rom.z64 is BigEndian (.z64)']);
    expect(io.debug).toEqual(['[cli] close rom.z64: Error: EBADF: bad file descriptor, close']);
  });

  it('prints usage for --help and on bad arguments', () => {
    const help = captureIo();
    expect(run(['--help'], help)).toBe(0);
    expect(help.out).toEqual([USAGE]);

    const bad = captureIo();
    expect(run([], bad)).toBe(2);
    expect(bad.err).toEqual(['Missing input filename', USAGE]);
  });
});

describe('cli console io', () => {
  it('enables debug logging from ROMSWAP_DEBUG', () => {
    expect(consoleIo({ ROMSWAP_DEBUG: 'yes' }).logger).toBeDefined();
    expect(consoleIo({ ROMSWAP_DEBUG: '0' }).logger).toBeUndefined();
    expect(consoleIo({}).logger).toBeUndefined();
  });
});
