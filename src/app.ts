// src/app.ts
import fs from 'fs';
import { parseArgs, USAGE } from './args.js';
import { Interpreter } from './interp.js';
import type { ByteSink, ByteSource } from './interp.js';
import { stdinLineSource, stdinSource, stdoutSink } from './io.js';
import { disassemble, translate } from './translate.js';
import { runBounded } from './watchdog.js';

/** Everything the command line touches outside the interpreter. */
export interface CliHost {
    readFile(path: string): Uint8Array;
    input(lineMode: boolean): ByteSource;
    output: ByteSink;
    log(message: string): void;
    error(message: string): void;
    now(): bigint;
}

export const nodeHost = (): CliHost => ({
    readFile: (path) => fs.readFileSync(path),
    input: (lineMode) => (lineMode ? stdinLineSource() : stdinSource()),
    output: stdoutSink(),
    log: (message) => console.log(message),
    error: (message) => console.error(message),
    now: () => process.hrtime.bigint(),
});

const messageOf = (e: unknown): string => (e instanceof Error ? e.message : 'Unknown error');

/** Runs one invocation and returns the process exit code. */
export function runCli(args: readonly string[], host: CliHost = nodeHost()): number {
    const parsed = parseArgs(args);
    if (parsed.kind === 'help') {
        host.log(USAGE);
        return 0;
    }
    if (parsed.kind === 'error') {
        host.error(`Error: ${parsed.message}`);
        host.log(USAGE);
        return 1;
    }
    const { options } = parsed;

    let source: string | Uint8Array = options.code;
    if (options.file !== null) {
        try {
            source = host.readFile(options.file);
        } catch (e) {
            host.error(`Error: cannot read ${options.file}: ${messageOf(e)}`);
            return 1;
        }
    }

    const translated = translate(source);
    if (!translated.ok) {
        host.error(`Error: ${translated.error.message}`);
        return 1;
    }
    if (options.dump) {
        host.log(disassemble(translated.value));
        return 0;
    }

    let interp: Interpreter;
    try {
        interp = new Interpreter(translated.value, host.input(options.lineInput), host.output, options.engine);
    } catch (e) {
        host.error(`Error: ${messageOf(e)}`);
        return 1;
    }

    const start = host.now();
    const result = options.maxSteps === null ? interp.run() : runBounded(interp, options.maxSteps);

    if (options.showTime) {
        const timeMs = Number(host.now() - start) / 1e6;
        host.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
    }
    if (!result.ok) {
        host.error(`\nError: ${result.error.message}`);
        return 1;
    }
    return 0;
}
