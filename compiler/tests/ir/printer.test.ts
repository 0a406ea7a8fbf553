import { describe, expect, test } from "vitest";
import { Op } from "../../src/ast/nodes.ts";
import { IrContext } from "../../src/ir/context.ts";
import { printExpr, printIr } from "../../src/ir/printer.ts";
import { span } from "../../src/utils/source.ts";
import {
  arrayLit,
  assign,
  bin,
  bool,
  call,
  cast,
  exprS,
  fn,
  ident,
  index,
  int,
  letS,
  lowerAndPrint,
  lowerOk,
  member,
  named,
  ptrT,
  ret,
  structLit,
  structT,
  typeDecl,
  unary,
} from "./helpers.ts";

describe("printIr", () => {
  test("function headers carry their flags", () => {
    const text = lowerAndPrint(
      fn("puts", [["s", ptrT(named("u8"))]], named("i32"), null, { isExtern: true }),
      fn("id", [["x", named("i64")]], named("i64"), [ret(ident("x"))], { isInline: true })
    );
    expect(text).toBe(
      [
        "extern fun puts(*u8 s) -> i32",
        "",
        "inline fun id(i64 x) -> i64 {",
        "bb0:",
        "  live %0 x: i64",
        "  %0 = arg0",
        "  return %0",
        "}",
        "",
      ].join("\n")
    );
  });

  test("expression forms", () => {
    const text = lowerAndPrint(
      typeDecl("Pair", structT([named("i32"), "a"], [named("bool"), "b"])),
      fn("use", [["v", named("i32")]], null, null, { isExtern: true }),
      fn(
        "f",
        [
          ["p", named("Pair")],
          ["q", ptrT(named("i32"))],
        ],
        named("i64"),
        [
          letS("xs", null, arrayLit(int(1), int(2))),
          exprS(call("use", index(ident("xs"), int(1)))),
          assign(unary(Op.Star, ident("q")), member(ident("p"), "a")),
          letS("n", null, unary(Op.Sub, bin(int(1), Op.Add, int(2)))),
          ret(cast(member(ident("p"), "a"), named("i64"))),
        ]
      ),
      fn("make", [], named("Pair"), [ret(structLit("Pair", [["b", bool(true)], ["a", int(1)]]))])
    );
    expect(text).toBe(
      [
        "extern fun use(i32 v) -> ()",
        "",
        "fun f(Pair p, *i32 q) -> i64 {",
        "bb0:",
        "  live %0 p: Pair",
        "  %0 = arg0",
        "  live %1 q: *i32",
        "  %1 = arg1",
        "  live %2 xs: [2]i32",
        "  %2 = [1, 2]",
        "  eval @use(%2[1])",
        "  write *%1 = %0.a",
        "  live %3 n: i32",
        "  %3 = -(1 + 2)",
        "  return (%0.a as i64)",
        "}",
        "",
        "fun make() -> Pair {",
        "bb1:",
        "  return Pair {1, true}",
        "}",
        "",
      ].join("\n")
    );
  });

  test("prints every function of the context by default", () => {
    const { ctx } = lowerOk(fn("a", [], null, []), fn("b", [], null, null, { isExtern: true }));
    expect(printIr(ctx)).toBe(
      ["fun a() -> () {", "bb0:", "  return ()", "}", "", "extern fun b() -> ()", ""].join("\n")
    );
  });
});

describe("printExpr", () => {
  const ctx = new IrContext();
  const at = span(0, 0);

  test("literals", () => {
    expect(printExpr(ctx, { kind: "integer", value: -7n, span: at, ty: IrContext.I32 })).toBe("-7");
    expect(printExpr(ctx, { kind: "float", value: 2.5, span: at, ty: IrContext.F64 })).toBe("2.5");
    expect(printExpr(ctx, { kind: "bool", value: false, span: at, ty: IrContext.BOOL })).toBe("false");
    expect(printExpr(ctx, { kind: "unit", span: at, ty: IrContext.UNIT })).toBe("()");
    expect(printExpr(ctx, { kind: "invalid", span: at, ty: IrContext.INVALID })).toBe("<invalid>");
  });

  test("a member of a non-struct prints its field index", () => {
    const object = { kind: "arg", index: 0, span: at, ty: IrContext.I32 } as const;
    expect(printExpr(ctx, { kind: "member", object, field: 2, span: at, ty: IrContext.I32 })).toBe(
      "arg0.#2"
    );
  });
});
