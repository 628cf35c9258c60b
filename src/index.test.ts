import { describe, it, expect } from 'vitest';
import * as bf from './index.js';

describe('package entry', () => {
  it('exposes the pipeline', () => {
    const output = new bf.BufferOutput();
    const interpreter = bf.run(',+.', new bf.BufferInput([64]), output);
    expect(output.toString()).toBe('A');
    expect(interpreter.dataPointer).toBe(0);
    expect(bf.optimize(bf.parse('++--'))).toEqual([]);
    expect(bf.TAPE_SIZE).toBe(30000);
  });
});
