// src/index.ts
export { Op, OpType, CharCode } from './types.js';
export type { ExecutionState, Program } from './types.js';
export { ok, err } from './result.js';
export type { Result } from './result.js';
export {
    BfError,
    UnmatchedCloseError,
    UnmatchedOpenError,
    OutOfBoundsError,
    InputError,
    OutputError,
} from './errors.js';
export type { ErrorKind, RuntimeError, TranslateError } from './errors.js';
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from './config.js';
export type { EngineConfig } from './config.js';
export { filterSymbols, translate, toSource, disassemble } from './translate.js';
export { Interpreter, run } from './interp.js';
export type { ByteSink, ByteSource } from './interp.js';
export { StepLimitError, runBounded } from './watchdog.js';
export { bufferSource, lineSource, stdinSource, stdinLineSource, stdoutSink, collectSink } from './io.js';
export type { CollectSink } from './io.js';
