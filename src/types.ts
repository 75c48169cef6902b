// src/types.ts
export enum OpType {
  RIGHT = 'RIGHT',
  LEFT = 'LEFT',
  ADD = 'ADD',
  SUB = 'SUB',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
}

/** Ops are frozen on construction. */
export class Op {
  /**
   * @param operand for OPEN the index of the matching CLOSE, for CLOSE the
   * index of the matching OPEN; unused otherwise
   */
  constructor(
    public readonly type: OpType,
    public readonly operand: number = 0,
  ) {
    Object.freeze(this);
  }
}

export type Program = readonly Op[];

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

export interface ExecutionState {
  tape: Uint8Array;
  dataPointer: number;
  instructionPointer: number;
}
