import { describe, expect, test } from "vitest";
import {
  emitC,
  formatDiagnostics,
  IrContext,
  isError,
  lowerProgram,
  printIr,
  SourceFiles,
} from "../src/index.ts";
import {
  bin,
  bool,
  fn,
  ident,
  int,
  member,
  named,
  program,
  ret,
  structT,
  typeDecl,
} from "./ir/helpers.ts";
import { Op } from "../src/ast/nodes.ts";

describe("public API", () => {
  test("lower then emit", () => {
    const files = new SourceFiles();
    const file = files.add("main.em", "");
    const ctx = new IrContext();
    const { funs, diagnostics } = lowerProgram(
      ctx,
      program(file, fn("twice", [["x", named("i64")]], named("i64"), [ret(bin(ident("x"), Op.Add, ident("x")))]))
    );
    expect(diagnostics).toEqual([]);
    expect(printIr(ctx, funs)).toBe(
      ["fun twice(i64 x) -> i64 {", "bb0:", "  live %0 x: i64", "  %0 = arg0", "  return (%0 + %0)", "}", ""].join(
        "\n"
      )
    );
    expect(emitC(ctx, funs, { prelude: false }).split("\n")).toContain("    return (v0 + v0);");
  });

  test("several programs share one context", () => {
    const files = new SourceFiles();
    const ctx = new IrContext();
    const a = lowerProgram(ctx, program(files.add("a.em", ""), fn("a", [], named("i32"), [ret(int(1))])));
    const b = lowerProgram(ctx, program(files.add("b.em", ""), fn("b", [], named("bool"), [ret(bool(true))])));
    expect([...a.funs, ...b.funs]).toEqual([0, 1]);
    expect(ctx.fun(b.funs[0]).file).toBe(1);
  });

  test("programs sharing a context may declare the same type name", () => {
    const files = new SourceFiles();
    const ctx = new IrContext();
    const points = () =>
      [...ctx.types.entries()].filter(([, t]) => t.kind === "alias" && t.name === "Point").map(([id]) => id);

    const a = lowerProgram(
      ctx,
      program(
        files.add("a.em", ""),
        typeDecl("Point", structT([named("i32"), "x"])),
        fn("getX", [["p", named("Point")]], named("i32"), [ret(member(ident("p"), "x"))])
      )
    );
    expect(a.diagnostics).toEqual([]);
    const [first] = points();
    const before = { ...ctx.type(first) };

    const b = lowerProgram(
      ctx,
      program(
        files.add("b.em", ""),
        typeDecl("Point", structT([named("bool"), "y"])),
        fn("getY", [["p", named("Point")]], named("bool"), [ret(member(ident("p"), "y"))])
      )
    );
    expect(b.diagnostics).toEqual([]);

    const all = points();
    expect(all).toHaveLength(2);
    expect(all[1]).not.toBe(first);
    expect(ctx.type(first)).toEqual(before);
    expect(ctx.typename(ctx.resolveAlias(first))).toBe("{i32 x,}");
    expect(ctx.typename(ctx.resolveAlias(all[1]))).toBe("{bool y,}");
  });

  test("diagnostics render against their file", () => {
    const files = new SourceFiles();
    const file = files.add("bad.em", "fun f() -> i32 {}\n");
    const ctx = new IrContext();
    const { diagnostics } = lowerProgram(
      ctx,
      program(file, { ...fn("f", [], named("i32"), []), span: { start: 0, end: 17 } })
    );
    expect(diagnostics.every(isError)).toBe(true);
    expect(formatDiagnostics(diagnostics, files)).toBe(
      [
        "bad.em:1:1: error: Function 'f' must return a value of type i32 on every path",
        "  fun f() -> i32 {}",
        "  ^^^^^^^^^^^^^^^^^",
      ].join("\n")
    );
  });
});
