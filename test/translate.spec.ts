// test/translate.spec.ts
import { describe, it, expect } from "vitest";
import { disassemble, filterSymbols, toSource, translate } from "../src/translate.js";
import { Op, OpType } from "../src/types.js";
import type { Program } from "../src/types.js";
import { UnmatchedCloseError, UnmatchedOpenError } from "../src/errors.js";

const mustTranslate = (source: string): Program => {
  const result = translate(source);
  if (!result.ok) throw result.error;
  return result.value;
};

describe("filterSymbols", () => {
  it("keeps only the eight symbols, in order", () => {
    expect(Array.from(filterSymbols("x+ é[\n<>-.,]"))).toEqual([43, 91, 60, 62, 45, 46, 44, 93]);
  });

  it("accepts raw bytes", () => {
    expect(Array.from(filterSymbols(Uint8Array.of(0, 43, 200, 93)))).toEqual([43, 93]);
  });
});

describe("translate", () => {
  it("maps each symbol to one instruction", () => {
    const prog = mustTranslate("><+-.,");
    expect(prog.map((op) => op.type)).toEqual([
      OpType.RIGHT,
      OpType.LEFT,
      OpType.ADD,
      OpType.SUB,
      OpType.OUTPUT,
      OpType.INPUT,
    ]);
  });

  it("produces an empty program when there are no symbols", () => {
    expect(translate("just a comment")).toEqual({ ok: true, value: [] });
    expect(translate("")).toEqual({ ok: true, value: [] });
  });

  it("ignores non-symbol characters", () => {
    expect(mustTranslate("a+b-c")).toEqual(mustTranslate("+-"));
  });

  it("points each bracket at its partner", () => {
    const prog = mustTranslate("[->+<]");
    expect(prog[0]).toEqual(new Op(OpType.OPEN, 5));
    expect(prog[5]).toEqual(new Op(OpType.CLOSE, 0));
  });

  it("matches nested loops innermost first", () => {
    const prog = mustTranslate("+[>[-]<-]");
    expect(prog[1].operand).toBe(8);
    expect(prog[3].operand).toBe(5);
    expect(prog[5].operand).toBe(3);
    expect(prog[8].operand).toBe(1);
  });

  it("counts positions over the filtered stream", () => {
    const prog = mustTranslate("loop: [ body: - ] end");
    expect(prog).toEqual([new Op(OpType.OPEN, 2), new Op(OpType.SUB), new Op(OpType.CLOSE, 0)]);
  });

  it.each(["[]", "[[]]", "+[>[-]<-]", "[][[]][]", ",[.,]", "++[>++[>+<-]<-]>>[-[-]]"])(
    "bracket targets are mutual inverses in %s",
    (source) => {
      const prog = mustTranslate(source);
      prog.forEach((op, i) => {
        if (op.type === OpType.OPEN || op.type === OpType.CLOSE) {
          expect(prog[prog[i].operand].operand).toBe(i);
          expect(prog[op.operand].type).toBe(op.type === OpType.OPEN ? OpType.CLOSE : OpType.OPEN);
        }
      });
    },
  );

  it("fails on a lone ']'", () => {
    const result = translate("]");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnmatchedCloseError);
    expect(result.error.kind).toBe("unmatched-close");
    expect(result.error.position).toBe(0);
    expect(result.error.message).toBe("Unmatched ']' at instruction 0");
  });

  it("reports where the unmatched ']' would have been", () => {
    const result = translate("+[-]]");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.position).toBe(4);
  });

  it("fails on a lone '['", () => {
    const result = translate("[");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnmatchedOpenError);
    expect(result.error.kind).toBe("unmatched-open");
    expect(result.error.position).toBe(0);
    expect(result.error.message).toBe("Unmatched '[' at instruction 0");
  });

  it("reports the innermost dangling '[' and how many are open", () => {
    const result = translate("[[");
    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof UnmatchedOpenError)) return;
    expect(result.error.position).toBe(1);
    expect(result.error.count).toBe(2);
    expect(result.error.message).toBe("2 unmatched '[', innermost at instruction 1");
  });

  it("returns a program that cannot be changed", () => {
    const prog = mustTranslate("++[-]");
    expect(Object.isFrozen(prog)).toBe(true);
    expect(prog.every((op) => Object.isFrozen(op))).toBe(true);
    expect(Reflect.set(prog[4], "operand", -5)).toBe(false);
    expect(prog[4].operand).toBe(2);
  });

  it("is deterministic", () => {
    const source = "++[>+++[>+<-]<-]>>.";
    expect(mustTranslate(source)).toEqual(mustTranslate(source));
  });
});

describe("toSource", () => {
  it("reproduces the symbols of a program", () => {
    expect(toSource(mustTranslate("copy: [->+<] done."))).toBe("[->+<].");
  });

  it("translates back to the same program", () => {
    const prog = mustTranslate("+[>,.<-]");
    expect(mustTranslate(toSource(prog))).toEqual(prog);
  });
});

describe("disassemble", () => {
  it("lists instructions with bracket targets", () => {
    expect(disassemble(mustTranslate("+[-]"))).toBe("0 ADD\n1 OPEN -> 3\n2 SUB\n3 CLOSE -> 1");
  });

  it("pads indices to the widest one", () => {
    const lines = disassemble(mustTranslate("++++++++++.")).split("\n");
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe(" 0 ADD");
    expect(lines[10]).toBe("10 OUTPUT");
  });

  it("is empty for an empty program", () => {
    expect(disassemble([])).toBe("");
  });
});
