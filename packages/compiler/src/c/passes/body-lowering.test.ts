import { expect } from "chai";

import { call, field, ident, intLit, named, param, prim, ptr } from "../../tree.js";
import type { Decl, Expr } from "../../tree.js";
import { SymbolTable } from "../symbols.js";
import { writeCFile } from "../write.js";
import { catchCompileError, enumDecl, fnDecl, monoOf, recordDecl, tagDecl, variant } from "../test-support.js";
import { computeLayouts, validateAdtUses } from "./adt-layout.js";
import { floatLiteralText, lowerBodies } from "./body-lowering.js";
import type { LoweredBodies } from "./body-lowering.js";
import { lowerMethods } from "./method-lowering.js";
import { buildOwnershipModel } from "./ownership.js";

describe("@cinder/compiler body lowering", () => {
  const point = recordDecl("Point", [field("x", prim("int")), field("y", prim("int"))]);
  const shape = tagDecl("Shape", [
    variant("Circle", [field("center", named("Point")), field("radius", prim("double"))]),
    variant("Square", [field("side", prim("int"))]),
    variant("Empty"),
  ]);
  const big = recordDecl("Big", [field("a", prim("i64")), field("b", prim("i64")), field("c", prim("i64"))]);

  function lowerAll(decls: readonly Decl[]): LoweredBodies {
    const mono = monoOf(decls);
    const plan = computeLayouts(mono);
    validateAdtUses(mono, plan);
    const model = buildOwnershipModel(mono, plan);
    return lowerBodies({ module: mono, plan, lowered: lowerMethods(mono, model, new SymbolTable()) });
  }

  function render(bodies: LoweredBodies, name: string): string {
    const item = bodies.functions.find((f) => f.kind === "fn" && f.sig.name === name);
    return item ? writeCFile({ kind: "file", items: [item] }) : "";
  }

  const binary = (op: "+" | "*" | ">" | "&&", left: Expr, right: Expr): Expr => ({ kind: "binary", op, left, right });

  it("lowers a match that leaves its loop to an if chain", () => {
    const count = fnDecl("count", [param("shapes", ptr(named("Shape"))), param("n", prim("int"))], prim("int"), [
      { kind: "let", name: "total", type: prim("int"), mutable: true, init: intLit(0) },
      {
        kind: "for_range",
        name: "i",
        type: "int",
        from: intLit(0),
        to: ident("n"),
        inclusive: false,
        body: [
          {
            kind: "match",
            subject: { kind: "index", target: ident("shapes"), index: ident("i") },
            arms: [
              { pattern: { kind: "variant", variant: "Empty", bindings: [] }, body: [{ kind: "continue" }] },
              {
                pattern: { kind: "variant", variant: "Square", bindings: [{ field: "side", name: "s" }] },
                body: [{ kind: "assign", target: ident("total"), op: "+=", value: ident("s") }],
              },
              { pattern: { kind: "wild" }, body: [{ kind: "break" }] },
            ],
          },
        ],
      },
      { kind: "return", value: ident("total") },
    ]);

    const bodies = lowerAll([point, shape, count]);
    expect(render(bodies, "count")).to.equal(
      [
        "int count(struct Shape *shapes, int n) {",
        "  int total = 0;",
        "  int __end0 = n;",
        "  for (int i = 0; i < __end0; i++) {",
        "    if (shapes[i].tag == SHAPE_EMPTY) {",
        "      continue;",
        "    } else if (shapes[i].tag == SHAPE_SQUARE) {",
        "      int s = shapes[i].as.Square.side;",
        "      total += s;",
        "    } else {",
        "      break;",
        "    }",
        "  }",
        "  return total;",
        "}",
        "",
      ].join("\n")
    );
    expect(bodies.systemHeaders).to.deep.equal([]);
  });

  it("hoists a computed match subject and closes a void main with return 0", () => {
    const make = fnDecl("make", [], named("Shape"), [
      { kind: "return", value: { kind: "variant_lit", type: named("Shape"), variant: "Empty", fields: [] } },
    ]);
    const main = fnDecl("main", [], prim("void"), [
      {
        kind: "match",
        subject: call("make", []),
        arms: [
          { pattern: { kind: "variant", variant: "Empty", bindings: [] }, body: [] },
          { pattern: { kind: "wild" }, body: [] },
        ],
      },
    ]);

    const bodies = lowerAll([point, shape, make, main]);
    expect(render(bodies, "make")).to.equal(
      ["struct Shape make(void) {", "  return (struct Shape){ .tag = SHAPE_EMPTY };", "}", ""].join("\n")
    );
    expect(render(bodies, "main")).to.equal(
      [
        "int main(void) {",
        "  struct Shape __match0 = make();",
        "  switch (__match0.tag) {",
        "    case SHAPE_EMPTY: {",
        "      break;",
        "    }",
        "    default: {",
        "      break;",
        "    }",
        "  }",
        "  return 0;",
        "}",
        "",
      ].join("\n")
    );
  });

  it("evaluates the right side of && only when it decides the result", () => {
    const check = fnDecl("check", [param("b", named("Big"))], prim("bool"));
    const ok = fnDecl("ok", [param("n", prim("int"))], prim("bool"), [
      {
        kind: "return",
        value: binary(
          "&&",
          binary(">", ident("n"), intLit(0)),
          call("check", [
            {
              kind: "record_lit",
              type: named("Big"),
              fields: [
                { name: "a", value: intLit(1) },
                { name: "b", value: intLit(2) },
                { name: "c", value: intLit(3) },
              ],
            },
          ])
        ),
      },
    ]);

    const bodies = lowerAll([big, check, ok]);
    expect(render(bodies, "ok")).to.equal(
      [
        "bool ok(int n) {",
        "  bool __cond1 = n > 0;",
        "  if (__cond1) {",
        "    struct Big __tmp0 = (struct Big){ .a = 1, .b = 2, .c = 3 };",
        "    __cond1 = check(&__tmp0);",
        "  }",
        "  return __cond1;",
        "}",
        "",
      ].join("\n")
    );
    expect(bodies.systemHeaders).to.deep.equal(["stdbool.h"]);
  });

  it("passes mutated arguments by address and renames redeclared locals", () => {
    const bump = fnDecl("bump", [param("v", prim("int"), "mutate")], prim("void"), [
      { kind: "assign", target: ident("v"), op: "+=", value: intLit(1) },
      { kind: "assign", target: ident("count"), op: "+=", value: intLit(1) },
    ]);
    const run = fnDecl("run", [], prim("int"), [
      { kind: "let", name: "x", type: prim("int"), mutable: true, init: ident("limit") },
      { kind: "expr", expr: call("bump", [ident("x")]) },
      { kind: "let", name: "x", type: prim("int"), mutable: false, init: binary("*", ident("x"), intLit(2)) },
      { kind: "return", value: ident("x") },
    ]);

    const bodies = lowerAll([
      { kind: "global", name: "limit", type: prim("int"), mutable: false, init: intLit(8) },
      { kind: "global", name: "count", type: prim("int"), mutable: true, init: intLit(0) },
      bump,
      run,
    ]);
    expect(render(bodies, "bump")).to.equal(["void bump(int *v) {", "  *v += 1;", "  count += 1;", "}", ""].join("\n"));
    expect(render(bodies, "run")).to.equal(
      ["int run(void) {", "  int x = limit;", "  bump(&x);", "  int x_1 = x * 2;", "  return x_1;", "}", ""].join("\n")
    );
    expect(writeCFile({ kind: "file", items: bodies.globals })).to.equal(
      ["const int limit = 8;", "int count = 0;", ""].join("\n")
    );
  });

  it("rejects global initializers that are not constant expressions", () => {
    const seed = fnDecl("seed", [], prim("int"), [{ kind: "return", value: intLit(7) }]);
    const err = catchCompileError(() =>
      lowerAll([seed, { kind: "global", name: "start", type: prim("int"), mutable: true, init: call("seed", []) }])
    );
    expect(err.code).to.equal("CND0001");
    expect(err.symbol).to.equal("start");
    expect(err.message).to.equal("The initializer of global 'start' is not a constant expression ('call').");

    const nested = catchCompileError(() =>
      lowerAll([
        seed,
        { kind: "global", name: "base", type: prim("int"), mutable: false, init: intLit(1) },
        { kind: "global", name: "next", type: prim("int"), mutable: false, init: binary("+", intLit(1), ident("base")) },
      ])
    );
    expect(nested.message).to.equal("The initializer of global 'next' is not a constant expression ('ident').");

    const folded = lowerAll([
      { kind: "global", name: "area", type: prim("int"), mutable: false, init: binary("*", intLit(3), intLit(4)) },
    ]);
    expect(writeCFile({ kind: "file", items: folded.globals })).to.equal("const int area = 3 * 4;\n");
  });

  it("lowers enum members to their constants and matches on enums with a switch", () => {
    const color = enumDecl("Color", ["Red", ["Green", 4], "Blue"]);
    const blue: Expr = { kind: "variant_lit", type: named("Color"), variant: "Blue", fields: [] };
    const code = fnDecl("code", [param("c", named("Color"))], prim("int"), [
      {
        kind: "match",
        subject: ident("c"),
        arms: [
          { pattern: { kind: "variant", variant: "Red", bindings: [] }, body: [{ kind: "return", value: intLit(1) }] },
          { pattern: { kind: "variant", variant: "Green", bindings: [] }, body: [{ kind: "return", value: intLit(2) }] },
          { pattern: { kind: "wild" }, body: [{ kind: "return", value: intLit(0) }] },
        ],
      },
    ]);
    const pick = fnDecl("pick", [], named("Color"), [{ kind: "return", value: blue }]);

    const bodies = lowerAll([
      color,
      code,
      pick,
      { kind: "global", name: "fallback", type: named("Color"), mutable: false, init: blue },
    ]);
    expect(render(bodies, "code")).to.equal(
      [
        "int code(enum Color c) {",
        "  switch (c) {",
        "    case COLOR_RED: {",
        "      return 1;",
        "    }",
        "    case COLOR_GREEN: {",
        "      return 2;",
        "    }",
        "    default: {",
        "      return 0;",
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
    expect(render(bodies, "pick")).to.equal(["enum Color pick(void) {", "  return COLOR_BLUE;", "}", ""].join("\n"));
    expect(writeCFile({ kind: "file", items: bodies.globals })).to.equal("const enum Color fallback = COLOR_BLUE;\n");

    const uncovered = catchCompileError(() =>
      lowerAll([
        color,
        fnDecl("f", [param("c", named("Color"))], prim("void"), [
          {
            kind: "match",
            subject: ident("c"),
            arms: [{ pattern: { kind: "variant", variant: "Red", bindings: [] }, body: [] }],
          },
        ]),
      ])
    );
    expect(uncovered.code).to.equal("CND3001");
    expect(uncovered.message).to.equal("Match on 'Color' does not cover Green, Blue.");
  });

  it("writes float literals with a decimal point and the float suffix where needed", () => {
    expect(floatLiteralText("3", undefined)).to.equal("3.0");
    expect(floatLiteralText("2.5", "float")).to.equal("2.5f");
    expect(floatLiteralText("1e3", "double")).to.equal("1e3");
  });
});
