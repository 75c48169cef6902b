// src/args.ts
import type { EngineConfig } from './config.js';

export interface CliOptions {
    /** Source given on the command line; ignored when `file` is set. */
    code: string;
    file: string | null;
    lineInput: boolean;
    dump: boolean;
    showTime: boolean;
    maxSteps: number | null;
    engine: Partial<EngineConfig>;
}

export type ParsedArgs =
    | { kind: 'help' }
    | { kind: 'run'; options: CliOptions }
    | { kind: 'error'; message: string };

export const USAGE = `
Tape language interpreter

Usage: bftape [options] <code...>
       bftape [options] -f <file>

Options:
  --file, -f <path>     Read the program from a file
  --line-input, -l      Read input a line at a time, using each line's first character
  --dump, -d            Print the translated program and exit
  --time, -t            Show execution time
  --max-steps <n>       Abort after n instructions
  --tape-size <n>       Initial number of tape cells [default: 1024]
  --tape-growth <n>     Cells added when the tape runs out [default: 128]
  --help, -h            Show this help
  --                    Treat every remaining argument as code
`;

// "-x" or "--word"; "-", "--." and "->+<" are code.
const looksLikeFlag = (arg: string): boolean => /^--?[a-z]/i.test(arg);

const positiveInt = (flag: string, value: string | undefined): number | string => {
    if (value === undefined) return `Missing value for ${flag}`;
    const n = Number(value);
    if (!Number.isSafeInteger(n) || n < 1) return `${flag} expects a positive integer, got '${value}'`;
    return n;
};

export function parseArgs(args: readonly string[]): ParsedArgs {
    const options: CliOptions = {
        code: '',
        file: null,
        lineInput: false,
        dump: false,
        showTime: false,
        maxSteps: null,
        engine: {},
    };
    const words: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--') {
            words.push(...args.slice(i + 1));
            break;
        } else if (arg === '--help' || arg === '-h') {
            return { kind: 'help' };
        } else if (arg === '--file' || arg === '-f') {
            i++;
            if (args[i] === undefined) {
                return { kind: 'error', message: 'No file specified' };
            }
            options.file = args[i];
        } else if (arg === '--line-input' || arg === '-l') {
            options.lineInput = true;
        } else if (arg === '--dump' || arg === '-d') {
            options.dump = true;
        } else if (arg === '--time' || arg === '-t') {
            options.showTime = true;
        } else if (arg === '--max-steps' || arg === '--tape-size' || arg === '--tape-growth') {
            i++;
            const n = positiveInt(arg, args[i]);
            if (typeof n === 'string') {
                return { kind: 'error', message: n };
            }
            if (arg === '--max-steps') options.maxSteps = n;
            else if (arg === '--tape-size') options.engine.initialTapeSize = n;
            else options.engine.growthIncrement = n;
        } else if (looksLikeFlag(arg)) {
            return { kind: 'error', message: `Unknown option '${arg}'` };
        } else {
            words.push(arg);
        }
    }

    if (options.file === null && words.length === 0) {
        return { kind: 'error', message: 'No program specified' };
    }
    options.code = words.join(' ');
    return { kind: 'run', options };
}
