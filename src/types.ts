// src/types.ts
export enum OpType {
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
  ADD = 'ADD',
  SUB = 'SUB',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
}

/** Ops that carry a run length. */
export type CountedOpType = OpType.LEFT | OpType.RIGHT | OpType.ADD | OpType.SUB;

export type PlainOpType = OpType.OPEN | OpType.CLOSE | OpType.OUTPUT | OpType.INPUT;

export interface CountedOp {
  readonly type: CountedOpType;
  readonly operand: number;
}

export interface PlainOp {
  readonly type: PlainOpType;
}

export type Op = CountedOp | PlainOp;

export const isCounted = (op: Op): op is CountedOp =>
  op.type === OpType.LEFT ||
  op.type === OpType.RIGHT ||
  op.type === OpType.ADD ||
  op.type === OpType.SUB;

export const counted = (type: CountedOpType, operand: number = 1): CountedOp => ({ type, operand });

export const plain = (type: PlainOpType): PlainOp => ({ type });

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}
