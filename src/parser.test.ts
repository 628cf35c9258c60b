import { describe, it, expect } from 'vitest';
import { parse } from './parser.js';
import { OpType } from './types.js';

describe('parse', () => {
  it('maps each instruction character to one op', () => {
    expect(parse('+-><.,[]')).toEqual([
      { type: OpType.ADD, operand: 1 },
      { type: OpType.SUB, operand: 1 },
      { type: OpType.RIGHT, operand: 1 },
      { type: OpType.LEFT, operand: 1 },
      { type: OpType.OUTPUT },
      { type: OpType.INPUT },
      { type: OpType.OPEN },
      { type: OpType.CLOSE },
    ]);
  });

  it('does not merge repeated characters', () => {
    expect(parse('+++')).toEqual([
      { type: OpType.ADD, operand: 1 },
      { type: OpType.ADD, operand: 1 },
      { type: OpType.ADD, operand: 1 },
    ]);
  });

  it('skips comments and whitespace', () => {
    expect(parse('add one + then\n\tsub one -')).toEqual([
      { type: OpType.ADD, operand: 1 },
      { type: OpType.SUB, operand: 1 },
    ]);
  });

  it('returns nothing for a program without instructions', () => {
    expect(parse('')).toEqual([]);
    expect(parse('hello world')).toEqual([]);
  });

  it('ignores multi-byte characters', () => {
    expect(parse('é→+')).toEqual([{ type: OpType.ADD, operand: 1 }]);
  });

  it('accepts raw bytes', () => {
    const bytes = Uint8Array.from([0x2E, 0x00, 0xFF, 0x2C]); // '.', junk, ','
    expect(parse(bytes)).toEqual([{ type: OpType.OUTPUT }, { type: OpType.INPUT }]);
  });

  it('does not check bracket balance', () => {
    expect(parse(']][')).toEqual([
      { type: OpType.CLOSE },
      { type: OpType.CLOSE },
      { type: OpType.OPEN },
    ]);
  });
});
