export { OpType, CharCode, isCounted, counted, plain } from './types.js';
export type { Op, CountedOp, PlainOp, CountedOpType, PlainOpType } from './types.js';
export { TAPE_SIZE } from './config.js';
export {
  InterpreterError,
  ReadError,
  WriteError,
  UnbalancedParensError,
  causeCode,
  describeCause,
} from './errors.js';
export type { InterpreterErrorKind } from './errors.js';
export { emptyInput, sinkOutput, BufferInput, BufferOutput, FdInput, FdOutput } from './io.js';
export type { ByteInput, ByteOutput } from './io.js';
export { parse } from './parser.js';
export { optimize } from './optimizer.js';
export { Interpreter, createInterpreter, run } from './interpreter.js';
export type { InterpreterOptions } from './interpreter.js';
