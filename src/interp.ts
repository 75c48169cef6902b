// src/interp.ts
import { OpType } from './types.js';
import type { ExecutionState, Program } from './types.js';
import { resolveEngineConfig } from './config.js';
import type { EngineConfig } from './config.js';
import { InputError, OutOfBoundsError, OutputError } from './errors.js';
import type { BfError, RuntimeError } from './errors.js';
import { ok, err } from './result.js';
import type { Result } from './result.js';
import { Tape } from './tape.js';
import { translate } from './translate.js';

export interface ByteSource {
    /**
     * Next input byte, or null once the source is exhausted. Anything but an
     * integer in 0..255 fails the run with an InputError.
     */
    read(): number | null;
}

export interface ByteSink {
    /** A throw fails the run with an OutputError. */
    write(byte: number): void;
}

export class Interpreter {
    private readonly prog: Program;
    private readonly tape: Tape;
    private pc = 0;
    private cc = 0;
    private fault: RuntimeError | null = null;

    constructor(
        prog: Program,
        private readonly input: ByteSource,
        private readonly output: ByteSink,
        config: Partial<EngineConfig> = {},
    ) {
        this.prog = Object.isFrozen(prog) ? prog : Object.freeze(prog.slice());
        this.tape = new Tape(resolveEngineConfig(config));
    }

    get instructionPointer(): number {
        return this.pc;
    }

    get dataPointer(): number {
        return this.cc;
    }

    get done(): boolean {
        return this.pc >= this.prog.length;
    }

    state(): ExecutionState {
        return {
            tape: this.tape.snapshot(),
            dataPointer: this.cc,
            instructionPointer: this.pc,
        };
    }

    /**
     * Executes one instruction. The value is whether instructions remain.
     * Once a step has failed every later call returns the same error.
     */
    step(): Result<boolean, RuntimeError> {
        if (this.fault) return err(this.fault);
        if (this.done) return ok(false);

        const fault = this.exec();
        if (fault) {
            this.fault = fault;
            return err(fault);
        }
        return ok(!this.done);
    }

    run(): Result<ExecutionState, RuntimeError> {
        if (this.fault) return err(this.fault);
        while (this.pc < this.prog.length) {
            const fault = this.exec();
            if (fault) {
                this.fault = fault;
                return err(fault);
            }
        }
        return ok(this.state());
    }

    private exec(): RuntimeError | null {
        const op = this.prog[this.pc];
        switch (op.type) {
            case OpType.RIGHT:
                this.cc++;
                this.tape.reach(this.cc);
                break;
            case OpType.LEFT:
                if (this.cc === 0) return new OutOfBoundsError(this.pc);
                this.cc--;
                break;
            case OpType.ADD:
                this.tape.set(this.cc, this.tape.get(this.cc) + 1);
                break;
            case OpType.SUB:
                this.tape.set(this.cc, this.tape.get(this.cc) - 1);
                break;
            case OpType.OUTPUT:
                try {
                    this.output.write(this.tape.get(this.cc));
                } catch (e) {
                    return new OutputError(this.pc, { cause: e });
                }
                break;
            case OpType.INPUT: {
                let byte: number | null;
                try {
                    byte = this.input.read();
                } catch (e) {
                    return new InputError(this.pc, { cause: e });
                }
                if (byte === null) return new InputError(this.pc);
                if (!Number.isInteger(byte) || byte < 0 || byte > 0xFF) {
                    return new InputError(this.pc, { value: byte });
                }
                this.tape.set(this.cc, byte);
                break;
            }
            case OpType.OPEN:
                if (this.tape.get(this.cc) === 0) {
                    this.pc = op.operand;
                }
                break;
            case OpType.CLOSE:
                // land on the OPEN itself once the increment below runs
                if (this.tape.get(this.cc) !== 0) {
                    this.pc = op.operand - 1;
                }
                break;
        }
        this.pc++;
        return null;
    }
}

export const run = (
    source: string | Uint8Array,
    input: ByteSource,
    output: ByteSink,
    config: Partial<EngineConfig> = {},
): Result<ExecutionState, BfError> => {
    const translated = translate(source);
    if (!translated.ok) return translated;
    return new Interpreter(translated.value, input, output, config).run();
};
