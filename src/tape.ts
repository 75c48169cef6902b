// src/tape.ts
import type { EngineConfig } from './config.js';

export class Tape {
  private cells: Uint8Array;

  constructor(private readonly config: EngineConfig) {
    this.cells = new Uint8Array(config.initialTapeSize);
  }

  get length(): number {
    return this.cells.length;
  }

  get(index: number): number {
    this.check(index);
    return this.cells[index];
  }

  // Uint8Array stores modulo 256, so 255 + 1 lands on 0 and 0 - 1 on 255.
  set(index: number, value: number): void {
    this.check(index);
    this.cells[index] = value;
  }

  /** Grow in fixed increments until `index` is addressable. */
  reach(index: number): void {
    if (index < this.cells.length) return;
    let size = this.cells.length;
    while (size <= index) {
      size += this.config.growthIncrement;
    }
    const grown = new Uint8Array(size);
    grown.set(this.cells);
    this.cells = grown;
  }

  private check(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.cells.length) {
      throw new RangeError(`Cell ${index} is outside the tape (length ${this.cells.length})`);
    }
  }

  snapshot(): Uint8Array {
    return this.cells.slice();
  }
}
