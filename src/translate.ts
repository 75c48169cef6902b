// src/translate.ts
import { Op, OpType, CharCode } from './types.js';
import type { Program } from './types.js';
import { UnmatchedCloseError, UnmatchedOpenError } from './errors.js';
import type { TranslateError } from './errors.js';
import { ok, err } from './result.js';
import type { Result } from './result.js';

const opMap: Record<number, OpType> = {
    [CharCode.LT]: OpType.LEFT,
    [CharCode.GT]: OpType.RIGHT,
    [CharCode.ADD]: OpType.ADD,
    [CharCode.SUB]: OpType.SUB,
    [CharCode.LB]: OpType.OPEN,
    [CharCode.RB]: OpType.CLOSE,
    [CharCode.DOT]: OpType.OUTPUT,
    [CharCode.COMMA]: OpType.INPUT,
};

const symbolOf: Record<OpType, string> = {
    [OpType.LEFT]: '<',
    [OpType.RIGHT]: '>',
    [OpType.ADD]: '+',
    [OpType.SUB]: '-',
    [OpType.OPEN]: '[',
    [OpType.CLOSE]: ']',
    [OpType.OUTPUT]: '.',
    [OpType.INPUT]: ',',
};

const toBytes = (source: string | Uint8Array): Uint8Array =>
    typeof source === 'string' ? Buffer.from(source, 'utf8') : source;

// Symbols are ASCII and UTF-8 continuation bytes are >= 0x80, so filtering
// the encoded bytes never picks a symbol out of a multi-byte character.
export const filterSymbols = (source: string | Uint8Array): Uint8Array =>
    toBytes(source).filter((c) => opMap[c] !== undefined);

export const translate = (source: string | Uint8Array): Result<Program, TranslateError> => {
    const prog: Op[] = [];
    const bracketStack: number[] = [];

    for (const c of filterSymbols(source)) {
        const opType = opMap[c];
        if (opType === OpType.OPEN) {
            bracketStack.push(prog.length);
            prog.push(new Op(OpType.OPEN));
        } else if (opType === OpType.CLOSE) {
            const openPos = bracketStack.pop();
            if (openPos === undefined) {
                return err(new UnmatchedCloseError(prog.length));
            }
            prog[openPos] = new Op(OpType.OPEN, prog.length);
            prog.push(new Op(OpType.CLOSE, openPos));
        } else {
            prog.push(new Op(opType));
        }
    }

    if (bracketStack.length > 0) {
        return err(new UnmatchedOpenError(bracketStack[bracketStack.length - 1], bracketStack.length));
    }
    return ok(Object.freeze(prog));
};

export const toSource = (prog: Program): string => prog.map((op) => symbolOf[op.type]).join('');

/** One line per instruction: index, type and, for brackets, the partner index. */
export const disassemble = (prog: Program): string => {
    const width = String(Math.max(prog.length - 1, 0)).length;
    return prog
        .map((op, pc) => {
            const line = `${String(pc).padStart(width, ' ')} ${op.type}`;
            return op.type === OpType.OPEN || op.type === OpType.CLOSE ? `${line} -> ${op.operand}` : line;
        })
        .join('\n');
};
