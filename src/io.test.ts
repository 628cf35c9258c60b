import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { BufferInput, BufferOutput, FdInput, FdOutput, emptyInput, sinkOutput } from './io.js';

describe('in-memory streams', () => {
  it('reads bytes then reports the end', () => {
    const input = new BufferInput([1, 2]);
    expect(input.read()).toBe(1);
    expect(input.read()).toBe(2);
    expect(input.read()).toBeNull();
    expect(input.read()).toBeNull();
  });

  it('collects written bytes', () => {
    const output = new BufferOutput();
    for (const byte of [72, 105, 10]) output.write(byte);
    expect(Array.from(output.bytes())).toEqual([72, 105, 10]);
    expect(output.toString()).toBe('Hi\n');
  });

  it('empty input ends immediately and the sink accepts anything', () => {
    expect(emptyInput().read()).toBeNull();
    expect(() => sinkOutput().write(0)).not.toThrow();
  });
});

describe('file descriptor streams', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bf-tape-io-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads one byte at a time until the end of the file', () => {
    const file = path.join(dir, 'in.bin');
    fs.writeFileSync(file, Uint8Array.from([7, 0, 255]));
    const fd = fs.openSync(file, 'r');
    try {
      const input = new FdInput(fd);
      expect([input.read(), input.read(), input.read(), input.read()]).toEqual([7, 0, 255, null]);
    } finally {
      fs.closeSync(fd);
    }
  });

  it('writes one byte at a time', () => {
    const file = path.join(dir, 'out.bin');
    const fd = fs.openSync(file, 'w');
    try {
      const output = new FdOutput(fd);
      output.write(65);
      output.write(66);
    } finally {
      fs.closeSync(fd);
    }
    expect(fs.readFileSync(file, 'utf-8')).toBe('AB');
  });

  it('throws when the descriptor is unusable', () => {
    const file = path.join(dir, 'ro.bin');
    fs.writeFileSync(file, 'x');
    const fd = fs.openSync(file, 'r');
    try {
      expect(() => new FdOutput(fd).write(1)).toThrow();
    } finally {
      fs.closeSync(fd);
    }
  });
});
