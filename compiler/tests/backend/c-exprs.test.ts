import { describe, expect, test } from "vitest";
import { Op } from "../../src/ast/nodes.ts";
import { emitExpr, emitStmt, emitTerminator } from "../../src/backend/c-emitter-exprs.ts";
import { emitCReturnType, emitCType, sanitizeName } from "../../src/backend/c-emitter-types.ts";
import { IrContext } from "../../src/ir/context.ts";
import type { IrExpr, IrVar, TypeId } from "../../src/ir/ir-types.ts";
import { indexFromRaw } from "../../src/utils/arena.ts";
import { span } from "../../src/utils/source.ts";

const at = span(0, 0);

function v(id: number, ty: TypeId): IrExpr {
  return { kind: "var", var: indexFromRaw<IrVar>(id), span: at, ty };
}

function lit(value: bigint, ty: TypeId = IrContext.I32): IrExpr {
  return { kind: "integer", value, span: at, ty };
}

describe("emitCType", () => {
  const ctx = new IrContext();

  test("primitives", () => {
    expect(emitCType(ctx, IrContext.I8)).toBe("int8_t");
    expect(emitCType(ctx, IrContext.U64)).toBe("uint64_t");
    expect(emitCType(ctx, IrContext.F32)).toBe("float");
    expect(emitCType(ctx, IrContext.F64)).toBe("double");
    expect(emitCType(ctx, IrContext.BOOL)).toBe("bool");
    expect(emitCType(ctx, IrContext.UNIT)).toBe("ember_unit");
  });

  test("pointers and aliases", () => {
    const alias = ctx.types.insert({ kind: "alias", name: "Byte", underlying: IrContext.U8 });
    expect(emitCType(ctx, ctx.ptrTo(ctx.ptrTo(alias)))).toBe("uint8_t**");
  });

  test("unit results are void", () => {
    expect(emitCReturnType(ctx, IrContext.UNIT)).toBe("void");
    expect(emitCReturnType(ctx, IrContext.BOOL)).toBe("bool");
  });

  test("the invalid type has no C spelling", () => {
    expect(() => emitCType(ctx, IrContext.INVALID)).toThrow("invalid type reached the C emitter");
  });

  test("sanitizeName", () => {
    expect(sanitizeName("match.subject")).toBe("match_subject");
    expect(sanitizeName("ok_1")).toBe("ok_1");
  });
});

describe("emitExpr", () => {
  const ctx = new IrContext();

  test("integer literals carry their width", () => {
    expect(emitExpr(ctx, lit(42n))).toBe("42");
    expect(emitExpr(ctx, lit(-3n))).toBe("(-3)");
    expect(emitExpr(ctx, lit(5n, IrContext.I64))).toBe("((int64_t)5LL)");
    expect(emitExpr(ctx, lit(255n, IrContext.U8))).toBe("((uint8_t)255ULL)");
  });

  test("float literals", () => {
    const f = (value: number, ty: TypeId): IrExpr => ({ kind: "float", value, span: at, ty });
    expect(emitExpr(ctx, f(1, IrContext.F64))).toBe("1.0");
    expect(emitExpr(ctx, f(2.5, IrContext.F32))).toBe("2.5f");
    expect(emitExpr(ctx, f(1e21, IrContext.F64))).toBe("1e+21");
  });

  test("unit and bool", () => {
    expect(emitExpr(ctx, { kind: "unit", span: at, ty: IrContext.UNIT })).toBe("((ember_unit)0)");
    expect(emitExpr(ctx, { kind: "bool", value: true, span: at, ty: IrContext.BOOL })).toBe("true");
  });

  test("comparisons produce the operand type", () => {
    const expr: IrExpr = {
      kind: "binary",
      op: Op.GreaterEq,
      lhs: v(0, IrContext.U16),
      rhs: v(1, IrContext.U16),
      span: at,
      ty: IrContext.U16,
    };
    expect(emitExpr(ctx, expr)).toBe("((uint16_t)(v0 >= v1))");
  });

  test("bool operators", () => {
    const both = (op: Op): IrExpr => ({
      kind: "binary",
      op,
      lhs: v(0, IrContext.BOOL),
      rhs: v(1, IrContext.BOOL),
      span: at,
      ty: IrContext.BOOL,
    });
    expect(emitExpr(ctx, both(Op.LogicalAnd))).toBe("(v0 && v1)");
    expect(emitExpr(ctx, both(Op.LogicalNot))).toBe("(v0 != v1)");
    expect(emitExpr(ctx, both(Op.Eq))).toBe("(v0 == v1)");
  });

  test("pointer arithmetic", () => {
    const p = ctx.ptrTo(IrContext.I32);
    const offset: IrExpr = { kind: "binary", op: Op.Add, lhs: v(0, p), rhs: lit(2n), span: at, ty: p };
    expect(emitExpr(ctx, offset)).toBe("(v0 + 2)");
    const shifted: IrExpr = { kind: "binary", op: Op.ShLeft, lhs: v(0, p), rhs: lit(1n), span: at, ty: p };
    expect(emitExpr(ctx, shifted)).toBe("((int32_t*)((uintptr_t)v0 << 1))");
    const diff: IrExpr = { kind: "binary", op: Op.Sub, lhs: v(0, p), rhs: v(1, p), span: at, ty: p };
    expect(emitExpr(ctx, diff)).toBe("((int32_t*)((uintptr_t)v0 - (uintptr_t)v1))");
  });

  test("unary operators", () => {
    const p = ctx.ptrTo(IrContext.I32);
    expect(emitExpr(ctx, { kind: "unary", op: Op.Star, operand: v(0, p), span: at, ty: IrContext.I32 })).toBe(
      "(*v0)"
    );
    expect(emitExpr(ctx, { kind: "unary", op: Op.AND, operand: v(1, IrContext.I32), span: at, ty: p })).toBe(
      "(&v1)"
    );
    expect(emitExpr(ctx, { kind: "unary", op: Op.AND, operand: lit(7n), span: at, ty: p })).toBe(
      "(&(int32_t){7})"
    );
    expect(emitExpr(ctx, { kind: "unary", op: Op.NOT, operand: v(0, p), span: at, ty: p })).toBe(
      "((int32_t*)~(uintptr_t)v0)"
    );
    expect(
      emitExpr(ctx, { kind: "unary", op: Op.Sub, operand: lit(4n), span: at, ty: IrContext.I32 })
    ).toBe("(-4)");
  });

  test("indexing arrays and pointers", () => {
    const arr = ctx.types.insert({ kind: "array", element: IrContext.U8, len: 4 });
    const p = ctx.ptrTo(IrContext.U8);
    expect(
      emitExpr(ctx, { kind: "index", object: v(0, arr), index: lit(1n), span: at, ty: IrContext.U8 })
    ).toBe(`v0.items[1]`);
    expect(
      emitExpr(ctx, { kind: "index", object: v(1, p), index: lit(1n), span: at, ty: IrContext.U8 })
    ).toBe("v1[1]");
  });

  test("numeric casts", () => {
    expect(emitExpr(ctx, { kind: "cast", operand: v(0, IrContext.I32), span: at, ty: IrContext.F64 })).toBe(
      "((double)v0)"
    );
    const alias = ctx.types.insert({ kind: "alias", name: "Meters", underlying: IrContext.F64 });
    expect(emitExpr(ctx, { kind: "cast", operand: v(0, IrContext.F64), span: at, ty: alias })).toBe("v0");
  });

  test("invalid expressions are rejected", () => {
    expect(() => emitExpr(ctx, { kind: "invalid", span: at, ty: IrContext.INVALID })).toThrow(
      "invalid expression reached the C emitter"
    );
  });
});

describe("emitStmt and emitTerminator", () => {
  const ctx = new IrContext();

  test("statements", () => {
    expect(emitStmt(ctx, { kind: "var_live", var: indexFromRaw<IrVar>(0) })).toBeNull();
    expect(emitStmt(ctx, { kind: "store", var: indexFromRaw<IrVar>(2), val: lit(1n) })).toBe("v2 = 1;");
    expect(emitStmt(ctx, { kind: "eval", expr: v(3, IrContext.I32) })).toBe("(void)v3;");
  });

  test("returns from unit functions drop their value", () => {
    expect(emitTerminator(ctx, { kind: "return", value: v(0, IrContext.UNIT) }, true)).toEqual([
      "(void)v0;",
      "return;",
    ]);
    expect(emitTerminator(ctx, { kind: "return", value: lit(0n) }, false)).toEqual(["return 0;"]);
  });
});
