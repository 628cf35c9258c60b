// src/io.ts
import fs from 'fs';

/** Supplies one byte per `,`. `null` means the stream has ended. */
export interface ByteInput {
  read(): number | null;
}

/** Accepts one byte per `.`. Throws when the byte cannot be written. */
export interface ByteOutput {
  write(byte: number): void;
}

export const emptyInput = (): ByteInput => ({ read: () => null });

export const sinkOutput = (): ByteOutput => ({ write: () => undefined });

export class BufferInput implements ByteInput {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array | readonly number[]) { }

  read(): number | null {
    if (this.pos >= this.bytes.length) return null;
    return this.bytes[this.pos++] & 0xFF;
  }
}

export class BufferOutput implements ByteOutput {
  private readonly chunks: number[] = [];

  write(byte: number): void {
    this.chunks.push(byte & 0xFF);
  }

  bytes(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }

  toString(): string {
    return new TextDecoder().decode(this.bytes());
  }
}

/** Blocking single-byte reads from a file descriptor (0 for stdin). */
export class FdInput implements ByteInput {
  private readonly buf = Buffer.alloc(1);

  constructor(private readonly fd: number) { }

  read(): number | null {
    const n = fs.readSync(this.fd, this.buf, 0, 1, null);
    return n === 0 ? null : this.buf[0];
  }
}

/** Blocking single-byte writes to a file descriptor (1 for stdout). */
export class FdOutput implements ByteOutput {
  private readonly buf = Buffer.alloc(1);

  constructor(private readonly fd: number) { }

  write(byte: number): void {
    this.buf[0] = byte;
    fs.writeSync(this.fd, this.buf, 0, 1);
  }
}
