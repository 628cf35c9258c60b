// src/parser.ts
import { CharCode, type Op, OpType, counted, plain } from './types.js';

const opMap: Record<number, () => Op> = {
    [CharCode.LT]: () => counted(OpType.LEFT),
    [CharCode.GT]: () => counted(OpType.RIGHT),
    [CharCode.ADD]: () => counted(OpType.ADD),
    [CharCode.SUB]: () => counted(OpType.SUB),
    [CharCode.LB]: () => plain(OpType.OPEN),
    [CharCode.RB]: () => plain(OpType.CLOSE),
    [CharCode.DOT]: () => plain(OpType.OUTPUT),
    [CharCode.COMMA]: () => plain(OpType.INPUT),
};

/**
 * One op per instruction character, each with a count of 1.
 * Everything else is a comment. Brackets are not checked here.
 */
export const parse = (source: string | Uint8Array): Op[] => {
    const bytes = typeof source === 'string' ? new TextEncoder().encode(source) : source;
    const prog: Op[] = [];

    for (let i = 0; i < bytes.length; i++) {
        const make = opMap[bytes[i] & 0xFF];
        if (make) {
            prog.push(make());
        }
    }

    return prog;
};
