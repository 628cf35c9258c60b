#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { pathToFileURL } from 'url';
import { InterpreterError, causeCode, describeCause } from './errors.js';
import { createInterpreter } from './interpreter.js';
import { type ByteInput, type ByteOutput, FdInput, FdOutput } from './io.js';

export type Mode = 'optimized' | 'raw';

export interface CliOptions {
    mode: Mode;
    file: string | null;
    showTime: boolean;
    help: boolean;
}

export interface CliStreams {
    input: ByteInput;
    output: ByteOutput;
    log: (line: string) => void;
    error: (line: string) => void;
}

const USAGE = `
Tape Interpreter

Usage: bfi [options] <file>

Options:
  --mode, -m     Mode: 'optimized' or 'raw' [default: optimized]
  --time, -t     Show execution time
  --help, -h     Show this help
`;

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export function parseArgs(args: readonly string[]): CliOptions {
    const options: CliOptions = { mode: 'optimized', file: null, showTime: false, help: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--mode' || arg === '-m') {
            i++;
            const mode = args[i];
            if (mode === 'optimized' || mode === 'raw') {
                options.mode = mode;
            } else {
                throw new UsageError('Invalid mode. Use "optimized" or "raw"');
            }
        } else if (arg === '--time' || arg === '-t') {
            options.showTime = true;
        } else if (!arg.startsWith('-')) {
            options.file = arg;
        }
    }

    return options;
}

/**
 * One-line diagnostic for a failed run, or null when the failure is benign
 * (the reader of our output went away).
 */
export function describeError(err: InterpreterError): string | null {
    switch (err.kind) {
        case 'read':
            return `Read error: ${describeCause(err.cause)}.`;
        case 'write':
            return causeCode(err) === 'EPIPE' ? null : `Write error: ${describeCause(err.cause)}.`;
        case 'unbalanced-parens':
            return 'Unbalanced parens found.';
    }
}

const stdioStreams = (): CliStreams => ({
    input: new FdInput(0),
    output: new FdOutput(1),
    log: (line) => console.log(line),
    error: (line) => console.error(line),
});

/** Runs the CLI and returns the process exit code. */
export function main(args: readonly string[], streams: CliStreams = stdioStreams()): number {
    let options: CliOptions;
    try {
        options = parseArgs(args);
    } catch (err) {
        if (err instanceof UsageError) {
            streams.error(err.message);
            return 1;
        }
        throw err;
    }

    if (options.help) {
        streams.log(USAGE);
        return 0;
    }

    if (!options.file) {
        streams.error('No input file specified');
        streams.log(USAGE);
        return 1;
    }

    let content: Buffer;
    try {
        content = fs.readFileSync(options.file);
    } catch (err) {
        streams.error(`Error: cannot read file '${options.file}': ${err instanceof Error ? err.message : 'Unknown error'}`);
        return 1;
    }

    const start = process.hrtime.bigint();
    const interpreter = createInterpreter(content, { optimize: options.mode === 'optimized' });

    try {
        interpreter.run(streams.input, streams.output);
    } catch (err) {
        if (!(err instanceof InterpreterError)) throw err;
        const message = describeError(err);
        if (message === null) return 0;
        streams.error(message);
        return 1;
    }

    if (options.showTime) {
        const end = process.hrtime.bigint();
        const timeMs = Number(end - start) / 1e6;
        streams.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
    }

    return 0;
}

// npm links the bin, so compare against the resolved path
if (process.argv[1] && fs.existsSync(process.argv[1]) &&
    import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href) {
    process.exitCode = main(process.argv.slice(2));
}
