import { expect } from "chai";

import { field, ident, intLit, named, param, prim } from "../../tree.js";
import type { Decl } from "../../tree.js";
import { SymbolTable } from "../symbols.js";
import { catchCompileError, fnDecl, methodDecl, monoOf, recordDecl } from "../test-support.js";
import { computeLayouts } from "./adt-layout.js";
import type { LoweredModule } from "./contracts.js";
import { lowerMethods } from "./method-lowering.js";
import { buildOwnershipModel } from "./ownership.js";

describe("@cinder/compiler method lowering", () => {
  const counter = recordDecl("Counter", [field("n", prim("int"))], {
    methods: [
      methodDecl("bump", {
        mutatesReceiver: true,
        params: [param("amount", prim("int"))],
        body: [{ kind: "assign", target: { kind: "self_field", name: "n" }, op: "+=", value: ident("amount") }],
      }),
      methodDecl("get", { ret: prim("int"), body: [{ kind: "return", value: { kind: "self_field", name: "n" } }] }),
      methodDecl("make", { kind: "static", ret: named("Counter") }),
    ],
  });
  const run = fnDecl("run", [], prim("int"), [
    {
      kind: "let",
      name: "c",
      type: named("Counter"),
      mutable: true,
      init: { kind: "static_call", owner: named("Counter"), method: "make", args: [] },
    },
    { kind: "expr", expr: { kind: "method_call", receiver: ident("c"), method: "bump", args: [intLit(2)] } },
    { kind: "return", value: { kind: "method_call", receiver: ident("c"), method: "get", args: [] } },
  ]);

  function lower(decls: readonly Decl[], symbols = new SymbolTable()): LoweredModule {
    const mono = monoOf(decls);
    const plan = computeLayouts(mono);
    return lowerMethods(mono, buildOwnershipModel(mono, plan), symbols);
  }

  it("turns methods into free functions with the receiver first", () => {
    const symbols = new SymbolTable();
    const lowered = lower([counter, run], symbols);

    expect(lowered.functions.map((f) => f.symbol)).to.deep.equal(["Counter_bump", "Counter_get", "Counter_make", "run"]);
    expect(lowered.functionsBySymbol.get("Counter_bump")?.params.map((p) => `${p.name}:${p.strategy}`)).to.deep.equal([
      "self:RefMutable",
      "amount:Copy",
    ]);
    expect(lowered.functionsBySymbol.get("Counter_make")?.params).to.deep.equal([]);
    expect(lowered.functionsBySymbol.get("Counter_make")?.body).to.equal(undefined);
    expect(symbols.entries().map((e) => e.decl)).to.deep.equal([
      "void Counter_bump(struct Counter *self, int amount)",
      "int Counter_get(const struct Counter *self)",
      "struct Counter Counter_make(void)",
      "int run(void)",
    ]);
  });

  it("rewrites receiver access and method calls", () => {
    const lowered = lower([counter, run]);
    expect(lowered.functionsBySymbol.get("Counter_bump")?.body).to.deep.equal([
      { kind: "assign", target: { kind: "field", target: ident("self"), name: "n" }, op: "+=", value: ident("amount") },
    ]);
    expect(lowered.functionsBySymbol.get("run")?.body).to.deep.equal([
      {
        kind: "let",
        name: "c",
        type: named("Counter"),
        mutable: true,
        init: { kind: "call", callee: "Counter_make", typeArgs: [], args: [] },
      },
      { kind: "expr", expr: { kind: "call", callee: "Counter_bump", typeArgs: [], args: [ident("c"), intLit(2)] } },
      { kind: "return", value: { kind: "call", callee: "Counter_get", typeArgs: [], args: [ident("c")] } },
    ]);
  });

  it("rejects a function whose name collides with a lowered method", () => {
    const err = catchCompileError(() => lower([counter, fnDecl("Counter_get", [], prim("int"))]));
    expect(err.code).to.equal("CND5001");
    expect(err.symbol).to.equal("Counter_get");
    expect(err.message).to.equal(
      "The function 'Counter_get' collides with the function 'Counter_get' (int Counter_get(const struct Counter *self))."
    );
  });

  it("declares a parameterless main as returning int", () => {
    const symbols = new SymbolTable();
    lower([fnDecl("main", [], prim("void"), [])], symbols);
    expect(symbols.lookup("ordinary", "main")?.decl).to.equal("int main(void)");
  });
});
