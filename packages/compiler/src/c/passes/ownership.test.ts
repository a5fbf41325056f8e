import { expect } from "chai";

import { call, field, ident, intLit, named, param, prim, ptr } from "../../tree.js";
import type { Decl } from "../../tree.js";
import { emitType } from "../write.js";
import { catchCompileError, fnDecl, methodDecl, monoOf, recordDecl } from "../test-support.js";
import { computeLayouts } from "./adt-layout.js";
import type { OwnershipModel } from "./contracts.js";
import { buildOwnershipModel, paramCType } from "./ownership.js";
import type { OwnershipOptions } from "./ownership.js";

describe("@cinder/compiler ownership classification", () => {
  const small = recordDecl("Small", [field("x", prim("int")), field("y", prim("int"))]);
  const big = recordDecl("Big", [field("a", prim("i64")), field("b", prim("i64")), field("c", prim("i64"))]);
  const counter = recordDecl("Counter", [field("n", prim("int"))], {
    methods: [
      methodDecl("bump", { mutatesReceiver: true }),
      methodDecl("get", { ret: prim("int") }),
      methodDecl("make", { kind: "static", ret: named("Counter") }),
    ],
  });

  function modelOf(decls: readonly Decl[], options: OwnershipOptions = {}): OwnershipModel {
    const mono = monoOf(decls);
    return buildOwnershipModel(mono, computeLayouts(mono), options);
  }

  function describeParams(model: OwnershipModel, key: string): readonly string[] {
    return (model.signatures.get(key)?.params ?? []).map(
      (p) => `${p.name}:${p.strategy}:${p.storage}:${emitType(paramCType(p))}`
    );
  }

  const mixed = fnDecl(
    "mix",
    [
      param("a", named("Small")),
      param("b", named("Big")),
      param("c", named("Big"), "mutate"),
      param("d", named("Big"), "move"),
      param("e", prim("str")),
      param("g", ptr(prim("int"))),
    ],
    prim("void")
  );

  it("copies small values and borrows large ones", () => {
    expect(describeParams(modelOf([small, big, mixed]), "mix")).to.deep.equal([
      "a:Copy:direct:struct Small",
      "b:RefImmutable:indirect:const struct Big *",
      "c:RefMutable:indirect:struct Big *",
      "d:Copy:direct:struct Big",
      "e:RefImmutable:direct:const char *",
      "g:Pointer:direct:int *",
    ]);
  });

  it("moves the copy threshold with the configured limit", () => {
    expect(describeParams(modelOf([small, big, mixed], { smallSizeLimit: 32 }), "mix")[1]).to.equal(
      "b:Copy:direct:struct Big"
    );
    expect(describeParams(modelOf([small, big, mixed], { smallSizeLimit: 4 }), "mix")[0]).to.equal(
      "a:RefImmutable:indirect:const struct Small *"
    );
  });

  it("classifies receivers by whether the method mutates them", () => {
    const model = modelOf([counter]);
    expect(model.signatures.get("Counter::bump")?.receiver?.strategy).to.equal("RefMutable");
    expect(model.signatures.get("Counter::get")?.receiver?.strategy).to.equal("RefImmutable");
    expect(model.signatures.get("Counter::make")?.receiver).to.equal(undefined);
    expect(model.signatures.get("Counter::make")?.owner).to.equal("Counter");
  });

  it("allows address parameters only in low-level functions", () => {
    const err = catchCompileError(() => modelOf([fnDecl("poke", [param("p", prim("int"), "address")], prim("void"))]));
    expect(err.code).to.equal("CND4004");
    expect(err.message).to.equal("Parameter 'p' takes an address; only low-level functions may.");

    const model = modelOf([fnDecl("poke", [param("p", prim("int"), "address")], prim("void"), undefined, { lowLevel: true })]);
    expect(describeParams(model, "poke")).to.deep.equal(["p:Pointer:indirect:int *"]);
  });

  it("rejects assignment through immutable bindings", () => {
    const onParam = catchCompileError(() =>
      modelOf([
        fnDecl("f", [param("n", prim("int"))], prim("void"), [
          { kind: "assign", target: ident("n"), op: "=", value: intLit(1) },
        ]),
      ])
    );
    expect(onParam.code).to.equal("CND4003");
    expect(onParam.message).to.equal("Cannot assign to 'n': it is not mutable.");

    const self = catchCompileError(() =>
      modelOf([
        recordDecl("Counter", [field("n", prim("int"))], {
          methods: [
            methodDecl("get", {
              ret: prim("int"),
              body: [
                { kind: "assign", target: { kind: "self_field", name: "n" }, op: "=", value: intLit(0) },
                { kind: "return", value: { kind: "self_field", name: "n" } },
              ],
            }),
          ],
        }),
      ])
    );
    expect(self.code).to.equal("CND4003");
    expect(self.symbol).to.equal("Counter::get");
    expect(self.message).to.equal("Cannot assign through 'self': 'Counter::get' does not mutate its receiver.");
  });

  it("rejects mutating calls on immutable receivers and arguments", () => {
    const receiver = catchCompileError(() =>
      modelOf([
        counter,
        fnDecl("run", [], prim("void"), [
          { kind: "let", name: "c", type: named("Counter"), mutable: false, init: { kind: "static_call", owner: named("Counter"), method: "make", args: [] } },
          { kind: "expr", expr: { kind: "method_call", receiver: ident("c"), method: "bump", args: [] } },
        ]),
      ])
    );
    expect(receiver.code).to.equal("CND4001");
    expect(receiver.message).to.equal("'Counter::bump' mutates its receiver, but 'c' is not mutable.");

    const argument = catchCompileError(() =>
      modelOf([
        fnDecl("inc", [param("v", prim("int"), "mutate")], prim("void")),
        fnDecl("run", [], prim("void"), [
          { kind: "let", name: "x", type: prim("int"), mutable: false, init: intLit(1) },
          { kind: "expr", expr: call("inc", [ident("x")]) },
        ]),
      ])
    );
    expect(argument.code).to.equal("CND4002");
    expect(argument.message).to.equal("Argument 'v' of 'inc' may be changed by the callee, but 'x' is not mutable.");
  });

  it("confines address-taking to low-level code", () => {
    const body = (lowLevel: boolean): Decl =>
      fnDecl("run", [], prim("void"), [
        { kind: "let", name: "x", type: prim("int"), mutable: true, init: intLit(1) },
        {
          kind: "block",
          lowLevel,
          body: [{ kind: "let", name: "p", type: ptr(prim("int")), mutable: false, init: { kind: "addr", target: ident("x") } }],
        },
      ]);

    const err = catchCompileError(() => modelOf([body(false)]));
    expect(err.code).to.equal("CND4004");
    expect(err.message).to.equal("Taking an address is only allowed in low-level code.");
    expect(modelOf([body(true)]).signatures.get("run")?.params).to.deep.equal([]);
  });
});
