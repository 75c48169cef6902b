// src/io.ts
import fs from 'fs';
import type { ByteSink, ByteSource } from './interp.js';

const STDIN_FD = 0;

export const bufferSource = (data: Uint8Array | string): ByteSource => {
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    let i = 0;
    return {
        read: () => (i < bytes.length ? bytes[i++] : null),
    };
};

/**
 * Interactive mode: every read consumes a whole line and yields the low byte
 * of its first non-blank character. A blank line counts as no input.
 */
export const lineSource = (readLine: () => string | null): ByteSource => ({
    read: () => {
        const line = readLine();
        const first = line?.trim().codePointAt(0);
        return first === undefined ? null : first & 0xFF;
    },
});

// Blocks until a byte arrives; 0 bytes read means end of input.
const readStdinByte = (): number | null => {
    const buf = Buffer.alloc(1);
    const n = fs.readSync(STDIN_FD, buf, 0, 1, null);
    return n === 0 ? null : buf[0];
};

const readStdinLine = (): string | null => {
    const bytes: number[] = [];
    for (;;) {
        const byte = readStdinByte();
        if (byte === null) {
            return bytes.length === 0 ? null : Buffer.from(bytes).toString('utf8');
        }
        if (byte === 0x0A) return Buffer.from(bytes).toString('utf8');
        bytes.push(byte);
    }
};

export const stdinSource = (): ByteSource => ({ read: readStdinByte });

export const stdinLineSource = (): ByteSource => lineSource(readStdinLine);

export const stdoutSink = (): ByteSink => ({
    write: (byte) => {
        process.stdout.write(Uint8Array.of(byte));
    },
});

export interface CollectSink extends ByteSink {
    bytes(): Uint8Array;
    text(): string;
}

export const collectSink = (): CollectSink => {
    const out: number[] = [];
    return {
        write: (byte) => {
            out.push(byte);
        },
        bytes: () => Uint8Array.from(out),
        text: () => Buffer.from(out).toString('latin1'),
    };
};
