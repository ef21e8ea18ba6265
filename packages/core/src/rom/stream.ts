import fs from 'node:fs';

export interface ByteSource {
  // Fills up to into.length bytes and returns how many were read; 0 means end of input.
  read(into: Uint8Array): number;
  close(): void;
}

// Sinks copy what they are given; callers may reuse the buffer after write returns.
export interface ByteSink {
  write(bytes: Uint8Array): void;
  close(): void;
}

/**
 * Reads until `into` is full. Returns the number of bytes actually read, which is
 * less than `into.length` only when the source ran out.
 */
export function readExact(source: ByteSource, into: Uint8Array): number {
  let got = 0;
  while (got < into.length) {
    const n = source.read(into.subarray(got));
    if (n <= 0) break;
    got += n;
  }
  return got;
}

export class MemoryByteSource implements ByteSource {
  private pos = 0;

  constructor(private readonly data: Uint8Array) {}

  read(into: Uint8Array): number {
    const n = Math.min(into.length, this.data.length - this.pos);
    if (n <= 0) return 0;
    into.set(this.data.subarray(this.pos, this.pos + n));
    this.pos += n;
    return n;
  }

  close(): void {}
}

export class MemoryByteSink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private length = 0;
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  write(bytes: Uint8Array): void {
    if (this._closed) throw new Error('write after close');
    this.chunks.push(bytes.slice());
    this.length += bytes.length;
  }

  close(): void {
    this._closed = true;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let off = 0;
    for (const c of this.chunks) {
      out.set(c, off);
      off += c.length;
    }
    return out;
  }
}

export class FileByteSource implements ByteSource {
  private fd: number | null;

  private constructor(fd: number) {
    this.fd = fd;
  }

  static open(filePath: string): FileByteSource {
    return new FileByteSource(fs.openSync(filePath, 'r'));
  }

  read(into: Uint8Array): number {
    if (this.fd === null) throw new Error('read after close');
    return fs.readSync(this.fd, into, 0, into.length, null);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

export interface FileSinkOptions {
  overwrite?: boolean;
  bufferSize?: number;
}

const DEFAULT_BUFFER_SIZE = 64 * 1024;

export class FileByteSink implements ByteSink {
  private fd: number | null;
  private readonly buf: Uint8Array;
  private used = 0;

  private constructor(fd: number, bufferSize: number) {
    this.fd = fd;
    this.buf = new Uint8Array(bufferSize);
  }

  // Exclusive create ('wx') unless overwrite is set; throws EEXIST otherwise.
  static open(filePath: string, opts: FileSinkOptions = {}): FileByteSink {
    const fd = fs.openSync(filePath, opts.overwrite ? 'w' : 'wx');
    return new FileByteSink(fd, Math.max(1, opts.bufferSize ?? DEFAULT_BUFFER_SIZE));
  }

  write(bytes: Uint8Array): void {
    if (this.fd === null) throw new Error('write after close');
    let off = 0;
    while (off < bytes.length) {
      const n = Math.min(this.buf.length - this.used, bytes.length - off);
      this.buf.set(bytes.subarray(off, off + n), this.used);
      this.used += n;
      off += n;
      if (this.used === this.buf.length) this.flush();
    }
  }

  flush(): void {
    if (this.fd === null || this.used === 0) return;
    let off = 0;
    while (off < this.used) {
      off += fs.writeSync(this.fd, this.buf, off, this.used - off);
    }
    this.used = 0;
  }

  // Always releases the descriptor, even when the final flush fails.
  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    try {
      this.flush();
    } finally {
      this.fd = null;
      this.used = 0;
      fs.closeSync(fd);
    }
  }
}
