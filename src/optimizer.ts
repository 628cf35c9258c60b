// src/optimizer.ts
import { type CountedOpType, type Op, OpType, counted, isCounted } from './types.js';

// 互相抵消的操作
const inverseOf: Record<CountedOpType, CountedOpType> = {
    [OpType.ADD]: OpType.SUB,
    [OpType.SUB]: OpType.ADD,
    [OpType.RIGHT]: OpType.LEFT,
    [OpType.LEFT]: OpType.RIGHT,
};

/**
 * Result of applying the first matching rule to an adjacent pair:
 * a single fused op, `null` when the pair cancels out, or `undefined`
 * when no rule applies.
 */
const combine = (a: Op, b: Op): Op | null | undefined => {
    if (!isCounted(a) || !isCounted(b)) return undefined;

    if (a.type === b.type) {
        return counted(a.type, a.operand + b.operand);
    }
    if (inverseOf[a.type] === b.type && a.operand === b.operand) {
        return null;
    }
    return undefined;
};

/**
 * Peephole pass over adjacent pairs.
 *
 * Same-direction runs are summed (`++` becomes ADD(2), `>>>` RIGHT(3)) and
 * equal opposite neighbours (ADD(n),SUB(n) or RIGHT(n),LEFT(n)) are dropped.
 * I/O and brackets are never merged and nothing merges across them.
 * Counts are plain sums; wrapping happens at run time.
 *
 * The output is built as a stack so that every new neighbourhood created by a
 * rewrite is examined again. No rule applies anywhere in the result, hence
 * `optimize(optimize(p))` equals `optimize(p)`.
 */
export const optimize = (prog: readonly Op[]): Op[] => {
    const out: Op[] = [];

    for (const op of prog) {
        let cur: Op | null = op;

        while (cur !== null && out.length > 0) {
            const merged = combine(out[out.length - 1], cur);
            if (merged === undefined) break;
            out.pop();
            // a fused op may now cancel or fuse with the one below it
            cur = merged;
        }

        if (cur !== null) {
            out.push(cur);
        }
    }

    return out;
};
