import path from 'node:path';
import {
  FileByteSink,
  FileByteSource,
  convertStream,
  describeEncoding,
  getFileExt,
  identifyStream,
  parseEncodingName,
  resolveTarget,
  type ByteSource,
  type ConversionOutcome,
  type Encoding,
  type Logger,
} from '@romswap/core';

export interface CliArgs {
  input?: string;
  output?: string;
  romtype?: Encoding;
  identify: boolean;
  force: boolean;
  strict: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

export interface CliIo {
  log(message: string): void;
  error(message: string): void;
  logger?: Logger;
}

export const USAGE = `Usage:
  romswap <input> [output] [--romtype TYPE] [--identify] [--force] [--strict]

Options:
  -r, --romtype TYPE   output type: big-endian (.z64), byte-swap (.v64), little-endian (.n64)
  -i, --identify       print the input's type and exit
  -f, --force          overwrite the output file if it exists
      --strict         fail when the input ends with a partial word
  -h, --help           show this help

Without --romtype the output type follows the output filename's extension, else big-endian.

Examples:
  romswap game.v64
  romswap game.n64 game.v64
  romswap game.z64 -r little-endian --force
`;

const SHORT_FLAGS: Record<string, string> = { r: 'romtype', i: 'identify', f: 'force', h: 'help' };

export function parseArgs(argv: string[]): ParseResult {
  const args: CliArgs = { identify: false, force: false, strict: false, help: false };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]!;
    let key: string | undefined;
    let inline: string | undefined;
    if (a.startsWith('--') && a.length > 2) {
      const eq = a.indexOf('=');
      key = eq < 0 ? a.slice(2) : a.slice(2, eq);
      inline = eq < 0 ? undefined : a.slice(eq + 1);
    } else if (a.startsWith('-') && a.length === 2) {
      key = SHORT_FLAGS[a.slice(1)];
      if (key === undefined) return { ok: false, error: `Unknown option: ${a}` };
    } else {
      positional.push(a);
      continue;
    }
    switch (key) {
      case 'romtype': {
        const val = inline ?? argv[++i];
        if (val === undefined) return { ok: false, error: '--romtype requires a value' };
        const enc = parseEncodingName(val);
        if (enc === undefined) return { ok: false, error: `Unknown rom type: ${val}` };
        args.romtype = enc;
        break;
      }
      case 'identify':
      case 'force':
      case 'strict':
      case 'help':
        if (inline !== undefined) return { ok: false, error: `--${key} takes no value` };
        args[key] = true;
        break;
      default:
        return { ok: false, error: `Unknown option: ${a}` };
    }
  }
  if (positional.length > 2) return { ok: false, error: `Unexpected argument: ${positional[2]}` };
  args.input = positional[0];
  args.output = positional[1];
  return { ok: true, args };
}

// Replaces a three-letter extension ("rom.v64" -> "rom.z64"), otherwise appends one.
export function outputFilename(input: string, to: Encoding): string {
  const len = input.length;
  const stem = len >= 4 && input[len - 4] === '.' ? input.slice(0, len - 4) : input;
  return stem + getFileExt(to);
}

export class SameFileError extends Error {
  constructor(readonly filename: string) {
    super(`Input and Output filenames are identical ${filename}, consider renaming input file`);
    this.name = 'SameFileError';
  }
}

function isTruthy(v: string | undefined): boolean {
  if (!v) return false;
  const s = v.toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'on';
}

export function consoleIo(env: NodeJS.ProcessEnv = process.env): CliIo {
  return {
    log: (m) => console.log(m),
    error: (m) => console.error(m),
    logger: isTruthy(env.ROMSWAP_DEBUG) ? { debug: (m) => console.warn(m) } : undefined,
  };
}

function report(outcome: ConversionOutcome, input: string, output: string, io: CliIo): number {
  switch (outcome.kind) {
    case 'converted':
      io.log(`Converted ${input} (${describeEncoding(outcome.from)}) to ${output} (${describeEncoding(outcome.to)})`);
      return 0;
    case 'already-target':
      io.log(`File is already ${describeEncoding(outcome.encoding)}!`);
      return 0;
    case 'unrecognized':
      io.error(`File ${input} not recognized!`);
      return 1;
    case 'truncated-input':
      if (outcome.stage === 'header') {
        io.error(`Error reading file: ${input}`);
      } else {
        io.error(`File ${input} ends with ${outcome.bytesRead} byte(s) that do not form a word`);
      }
      return 1;
    case 'io-failure':
      switch (outcome.stage) {
        case 'read-header':
        case 'read-body':
          io.error(`Error reading file: ${input}`);
          break;
        case 'open-output':
          io.error(outcome.cause instanceof SameFileError
            ? outcome.cause.message
            : `Unable to open file ${output} for output. Error ${outcome.detail}`);
          break;
        case 'write-header':
          io.error('Unable to write to output file!');
          break;
        case 'write-body':
        case 'close':
          io.error('Error during output!');
          break;
      }
      io.logger?.debug(`[cli] ${outcome.stage}: ${outcome.detail}`);
      return 1;
  }
}

/** Runs one invocation and returns the process exit code. */
export function run(
  argv: string[],
  io: CliIo = consoleIo(),
  openSource: (file: string) => ByteSource = FileByteSource.open,
): number {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    io.error(parsed.error);
    io.error(USAGE);
    return 2;
  }
  const args = parsed.args;
  if (args.help) {
    io.log(USAGE);
    return 0;
  }
  const input = args.input;
  if (input === undefined) {
    io.error('Missing input filename');
    io.error(USAGE);
    return 2;
  }

  let source: ByteSource;
  try {
    source = openSource(input);
  } catch (e) {
    io.logger?.debug(`[cli] open ${input}: ${String(e)}`);
    io.error(`Unable to open file: ${input}`);
    return 1;
  }

  try {
    if (args.identify) {
      const res = identifyStream(source);
      if (res.kind === 'identified') {
        io.log(`File ${input} is ${describeEncoding(res.encoding)}`);
        return 0;
      }
      return report(res, input, '', io);
    }

    const to = resolveTarget({ target: args.romtype, destinationName: args.output });
    const output = args.output ?? outputFilename(input, to);
    const outcome = convertStream(source, () => {
      if (path.resolve(output) === path.resolve(input)) throw new SameFileError(output);
      return FileByteSink.open(output, { overwrite: args.force });
    }, { target: to, strict: args.strict, logger: io.logger });
    return report(outcome, input, output, io);
  } finally {
    try {
      source.close();
    } catch (e) {
      // The input was only read; its close failing does not change the result.
      io.logger?.debug(`[cli] close ${input}: ${String(e)}`);
    }
  }
}
