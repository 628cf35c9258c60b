// src/interpreter.ts
import { TAPE_SIZE } from './config.js';
import { ReadError, UnbalancedParensError, WriteError } from './errors.js';
import { type ByteInput, type ByteOutput, emptyInput, sinkOutput } from './io.js';
import { optimize } from './optimizer.js';
import { parse } from './parser.js';
import { type Op, OpType } from './types.js';

export interface InterpreterOptions {
    /** Run the peephole pass before executing. Defaults to true. */
    optimize?: boolean;
}

export class Interpreter {
    private readonly cells: Uint8Array;
    private cc: number;
    private pc: number;
    // pc of each OPEN whose body is running
    private readonly loops: number[] = [];

    constructor(private readonly prog: readonly Op[]) {
        this.cells = new Uint8Array(TAPE_SIZE);
        this.cc = 0;
        this.pc = 0;
    }

    get dataPointer(): number {
        return this.cc;
    }

    get program(): readonly Op[] {
        return this.prog;
    }

    /** Copy of the cells in `[start, end)`. */
    tape(start: number, end: number): Uint8Array {
        return this.cells.slice(start, end);
    }

    runPure(): void {
        this.run(emptyInput(), sinkOutput());
    }

    /**
     * Executes until the program falls off its end.
     * Throws ReadError, WriteError or UnbalancedParensError; bytes already
     * written stay written.
     */
    run(input: ByteInput, output: ByteOutput): void {
        const maxCc = this.cells.length - 1;

        while (this.pc < this.prog.length) {
            const op = this.prog[this.pc];

            switch (op.type) {
                case OpType.RIGHT:
                    this.cc = Math.min(this.cc + op.operand, maxCc);
                    break;
                case OpType.LEFT:
                    this.cc = Math.max(this.cc - op.operand, 0);
                    break;
                case OpType.ADD:
                    this.cells[this.cc] = (this.cells[this.cc] + op.operand) & 0xFF;
                    break;
                case OpType.SUB:
                    this.cells[this.cc] = (this.cells[this.cc] - op.operand) & 0xFF;
                    break;
                case OpType.OUTPUT:
                    this.writeByte(output);
                    break;
                case OpType.INPUT:
                    this.cells[this.cc] = this.readByte(input);
                    break;
                case OpType.OPEN:
                    if (this.cells[this.cc] === 0) {
                        this.pc = this.findMatchingClose(this.pc);
                    } else {
                        this.loops.push(this.pc);
                    }
                    break;
                case OpType.CLOSE: {
                    if (this.loops.length === 0) {
                        throw new UnbalancedParensError(this.pc);
                    }
                    if (this.cells[this.cc] !== 0) {
                        // back to the first op of the body
                        this.pc = this.loops[this.loops.length - 1];
                    } else {
                        this.loops.pop();
                    }
                    break;
                }
            }
            this.pc++;
        }
    }

    private writeByte(output: ByteOutput): void {
        try {
            output.write(this.cells[this.cc]);
        } catch (e) {
            throw new WriteError(e);
        }
    }

    // end of input reads as 0
    private readByte(input: ByteInput): number {
        try {
            const byte = input.read();
            return byte === null ? 0 : byte & 0xFF;
        } catch (e) {
            throw new ReadError(e);
        }
    }

    /**
     * Index of the CLOSE matching the OPEN at `start`, or the last index when
     * there is none, so the run just ends.
     */
    private findMatchingClose(start: number): number {
        let depth = 0;
        for (let pc = start + 1; pc < this.prog.length; pc++) {
            const type = this.prog[pc].type;
            if (type === OpType.OPEN) {
                depth++;
            } else if (type === OpType.CLOSE) {
                if (depth === 0) return pc;
                depth--;
            }
        }
        return this.prog.length - 1;
    }
}

export const createInterpreter = (
    source: string | Uint8Array,
    options: InterpreterOptions = {},
): Interpreter => {
    const prog = parse(source);
    return new Interpreter(options.optimize === false ? prog : optimize(prog));
};

export const run = (
    source: string | Uint8Array,
    input: ByteInput = emptyInput(),
    output: ByteOutput = sinkOutput(),
): Interpreter => {
    const interpreter = createInterpreter(source);
    interpreter.run(input, output);
    return interpreter;
};
