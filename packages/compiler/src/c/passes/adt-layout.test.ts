import { expect } from "chai";

import { field, ident, indirect, intLit, named, param, prim } from "../../tree.js";
import type { Decl, MatchArm, Stmt } from "../../tree.js";
import { writeCFile } from "../write.js";
import { catchCompileError, enumDecl, fnDecl, monoOf, recordDecl, tagDecl, variant } from "../test-support.js";
import { computeLayouts, layoutItems, validateAdtUses } from "./adt-layout.js";
import type { LayoutPlan } from "./contracts.js";

describe("@cinder/compiler record and tag layout", () => {
  const point = recordDecl("Point", [field("x", prim("int")), field("y", prim("int"))]);
  const shape = tagDecl("Shape", [
    variant("Circle", [field("center", named("Point")), field("radius", prim("double"))]),
    variant("Square", [field("side", prim("int"))]),
    variant("Empty"),
  ]);

  function planOf(decls: readonly Decl[]): LayoutPlan {
    return computeLayouts(monoOf(decls));
  }

  function validate(decls: readonly Decl[]): void {
    const mono = monoOf(decls);
    validateAdtUses(mono, computeLayouts(mono));
  }

  function arm(variantName: string | undefined, body: readonly Stmt[] = [{ kind: "return" }]): MatchArm {
    return {
      pattern: variantName === undefined ? { kind: "wild" } : { kind: "variant", variant: variantName, bindings: [] },
      body,
    };
  }

  function matchFn(arms: readonly MatchArm[]): Decl {
    return fnDecl("f", [param("s", named("Shape"))], prim("void"), [{ kind: "match", subject: ident("s"), arms }]);
  }

  it("sizes tags as a discriminant followed by the widest payload", () => {
    const plan = planOf([shape, point]);
    expect(plan.order).to.deep.equal(["Point", "Shape"]);
    expect(plan.byValueDeps.get("Shape")).to.deep.equal(["Point"]);

    const p = plan.layouts.get("Point");
    expect([p?.size, p?.align]).to.deep.equal([8, 4]);
    const s = plan.layouts.get("Shape");
    expect([s?.size, s?.align, s?.heap]).to.deep.equal([24, 8, false]);
    expect(s?.kind === "tag" ? s.variants.map((v) => `${v.constant}=${v.value}`) : []).to.deep.equal([
      "SHAPE_CIRCLE=0",
      "SHAPE_SQUARE=1",
      "SHAPE_EMPTY=2",
    ]);
  });

  it("marks types holding strings as heap-carrying", () => {
    const plan = planOf([recordDecl("Label", [field("text", prim("str")), field("len", prim("u8"))])]);
    const label = plan.layouts.get("Label");
    expect([label?.size, label?.align, label?.heap]).to.deep.equal([16, 8, true]);
  });

  it("continues implicit discriminants after the highest one so far", () => {
    const plan = planOf([tagDecl("Level", [variant("Low", [], 5), variant("Mid"), variant("Off", [], 2)])]);
    const level = plan.layouts.get("Level");
    expect(level?.kind === "tag" ? level.variants.map((v) => v.value) : []).to.deep.equal([5, 6, 2]);
    expect([level?.size, level?.align]).to.deep.equal([4, 4]);
  });

  it("rejects two variants with one discriminant", () => {
    const err = catchCompileError(() => planOf([tagDecl("T", [variant("A"), variant("B", [], 0)])]));
    expect(err.code).to.equal("CND3002");
    expect(err.message).to.equal("Variants 'A' and 'B' of tag 'T' share discriminant 0.");
  });

  it("rejects a tag without variants", () => {
    const err = catchCompileError(() => planOf([tagDecl("Never", [])]));
    expect(err.code).to.equal("CND3003");
    expect(err.symbol).to.equal("Never");
    expect(err.message).to.equal("Tag 'Never' has no variants.");
  });

  it("numbers enum members and renders them as a plain C enum", () => {
    const plan = planOf([enumDecl("Mode", [["Idle", 3], "Busy", ["Off", 0]])]);
    const mode = plan.enums.get("Mode");
    expect(mode?.variants.map((v) => `${v.constant}=${v.value}`)).to.deep.equal(["MODE_IDLE=3", "MODE_BUSY=4", "MODE_OFF=0"]);
    expect([mode?.size, mode?.align]).to.deep.equal([4, 4]);
    expect(plan.layouts.has("Mode")).to.equal(false);
    expect(mode ? writeCFile({ kind: "file", items: layoutItems(mode) }) : "").to.equal(
      ["enum Mode {", "  MODE_IDLE = 3,", "  MODE_BUSY = 4,", "  MODE_OFF = 0,", "};", ""].join("\n")
    );
  });

  it("rejects enums without members or with repeated values", () => {
    const empty = catchCompileError(() => planOf([enumDecl("Nothing", [])]));
    expect([empty.code, empty.symbol, empty.message]).to.deep.equal(["CND3003", "Nothing", "Enum 'Nothing' has no members."]);

    const clash = catchCompileError(() => planOf([enumDecl("Mode", ["A", ["B", 0]])]));
    expect(clash.code).to.equal("CND3002");
    expect(clash.message).to.equal("Members 'A' and 'B' of enum 'Mode' share value 0.");
  });

  it("checks enum member literals against the declaration", () => {
    const mode = enumDecl("Mode", ["Idle", "Busy"]);
    const make = (member: string, fields: readonly { name: string; value: ReturnType<typeof intLit> }[]): Decl =>
      fnDecl("make", [], named("Mode"), [
        { kind: "return", value: { kind: "variant_lit", type: named("Mode"), variant: member, fields } },
      ]);

    const unknown = catchCompileError(() => validate([mode, make("Gone", [])]));
    expect(unknown.code).to.equal("CND0003");
    expect(unknown.message).to.equal("Enum 'Mode' has no member 'Gone'.");

    const payload = catchCompileError(() => validate([mode, make("Busy", [{ name: "n", value: intLit(1) }])]));
    expect(payload.code).to.equal("CND0001");
    expect(payload.message).to.equal("Enum member 'Mode::Busy' takes no fields.");

    validate([mode, make("Idle", [])]);
  });

  it("rejects a type that contains itself by value", () => {
    const err = catchCompileError(() => planOf([recordDecl("Node", [field("next", named("Node"))])]));
    expect(err.code).to.equal("CND3004");
    expect(err.symbol).to.equal("Node");
    expect(err.message).to.equal(
      "'Node' contains itself by value (Node -> Node); reference it through 'indirect' instead."
    );

    const plan = planOf([recordDecl("Node", [field("value", prim("int")), field("next", indirect(named("Node")))])]);
    expect(plan.layouts.get("Node")?.size).to.equal(16);
  });

  it("renders tag and record declarations", () => {
    const plan = planOf([
      point,
      shape,
      recordDecl("Unit", []),
      recordDecl("Account", [field("id", prim("int")), field("pin", prim("int"), "private")]),
    ]);
    const render = (name: string): string => {
      const layout = plan.layouts.get(name);
      return layout ? writeCFile({ kind: "file", items: layoutItems(layout) }) : "";
    };

    expect(render("Shape")).to.equal(
      [
        "enum ShapeKind {",
        "  SHAPE_CIRCLE = 0,",
        "  SHAPE_SQUARE = 1,",
        "  SHAPE_EMPTY = 2,",
        "};",
        "",
        "struct Shape {",
        "  enum ShapeKind tag;",
        "  union {",
        "    struct {",
        "      struct Point center;",
        "      double radius;",
        "    } Circle;",
        "    struct {",
        "      int side;",
        "    } Square;",
        "  } as;",
        "};",
        "",
      ].join("\n")
    );
    expect(render("Unit")).to.equal(["struct Unit {", "  char __empty;", "};", ""].join("\n"));
    expect(render("Account")).to.equal(["struct Account {", "  int id;", "  int pin; /* private */", "};", ""].join("\n"));
  });

  it("requires matches to cover every variant or have a catch-all arm", () => {
    const err = catchCompileError(() => validate([point, shape, matchFn([arm("Circle")])]));
    expect(err.code).to.equal("CND3001");
    expect(err.symbol).to.equal("f");
    expect(err.message).to.equal("Match on 'Shape' does not cover Square, Empty.");

    validate([point, shape, matchFn([arm("Circle"), arm(undefined)])]);
    validate([point, shape, matchFn([arm("Empty"), arm("Square"), arm("Circle")])]);
  });

  it("rejects repeated and unreachable arms", () => {
    const repeated = catchCompileError(() => validate([point, shape, matchFn([arm("Square"), arm("Square"), arm(undefined)])]));
    expect(repeated.code).to.equal("CND3003");
    expect(repeated.message).to.equal("Variant 'Shape::Square' is matched more than once.");

    const unreachable = catchCompileError(() => validate([point, shape, matchFn([arm(undefined), arm("Circle")])]));
    expect(unreachable.code).to.equal("CND3003");
    expect(unreachable.message).to.equal("Arm after the catch-all arm of the match on 'Shape' is unreachable.");
  });

  it("rejects matches on values that are not tags", () => {
    const err = catchCompileError(() =>
      validate([fnDecl("f", [param("n", prim("int"))], prim("void"), [{ kind: "match", subject: ident("n"), arms: [arm(undefined)] }])])
    );
    expect(err.code).to.equal("CND0001");
    expect(err.message).to.equal("Match subject of type 'int' is not a tag or enum.");
  });

  it("checks literal field names against the declaration", () => {
    const lit = (fields: readonly { name: string; value: ReturnType<typeof intLit> }[]): Decl =>
      fnDecl("make", [], named("Point"), [{ kind: "return", value: { kind: "record_lit", type: named("Point"), fields } }]);

    const unknown = catchCompileError(() => validate([point, lit([{ name: "z", value: intLit(1) }])]));
    expect(unknown.code).to.equal("CND0003");
    expect(unknown.message).to.equal("'Point' has no field 'z'.");

    const twice = catchCompileError(() =>
      validate([point, lit([{ name: "x", value: intLit(1) }, { name: "x", value: intLit(2) }])])
    );
    expect(twice.code).to.equal("CND0001");
    expect(twice.message).to.equal("Field 'x' of 'Point' is initialized twice.");

    const badVariant = catchCompileError(() =>
      validate([
        point,
        shape,
        fnDecl("make", [], named("Shape"), [
          { kind: "return", value: { kind: "variant_lit", type: named("Shape"), variant: "Oval", fields: [] } },
        ]),
      ])
    );
    expect(badVariant.code).to.equal("CND0003");
    expect(badVariant.message).to.equal("Tag 'Shape' has no variant 'Oval'.");
  });
});
