import { expect } from "chai";

import { call, field, ident, intLit, named, param, prim, ptr, typeParam } from "../../tree.js";
import type { Decl, Stmt } from "../../tree.js";
import { catchCompileError, fnDecl, monoOf, recordDecl } from "../test-support.js";
import { InstantiationTable, mergeInstantiationTables } from "./instantiations.js";

describe("@cinder/compiler monomorphization", () => {
  const box = recordDecl("Box", [field("value", typeParam("T"))], { typeParams: ["T"] });
  const wrapBody: Stmt[] = [
    {
      kind: "return",
      value: { kind: "record_lit", type: named("Box", [typeParam("T")]), fields: [{ name: "value", value: ident("v") }] },
    },
  ];
  const program: Decl[] = [
    box,
    recordDecl("Pair", [field("a", named("Box", [prim("int")])), field("b", named("Box", [prim("double")]))]),
    fnDecl("wrap", [param("v", typeParam("T"), "move")], named("Box", [typeParam("T")]), wrapBody, { typeParams: ["T"] }),
    fnDecl("main", [], prim("int"), [
      { kind: "let", name: "b", type: named("Box", [prim("int")]), mutable: false, init: call("wrap", [intLit(7)], [prim("int")]) },
      { kind: "return", value: { kind: "field", target: ident("b"), name: "value" } },
    ]),
  ];

  it("generates one declaration per instantiation, after the declaration that requested it", () => {
    const table = new InstantiationTable();
    const mono = monoOf(program, table);

    expect(mono.order).to.deep.equal(["Pair", "Box_int", "Box_double", "main", "wrap_int"]);
    expect(mono.types.map((t) => t.name)).to.deep.equal(["Pair", "Box_int", "Box_double"]);
    expect(mono.functions.map((f) => f.name)).to.deep.equal(["main", "wrap_int"]);
    expect(table.entries().map((e) => `${e.key}=${e.name}`)).to.deep.equal([
      "Box<int>=Box_int",
      "Box<double>=Box_double",
      "wrap<int>=wrap_int",
    ]);

    const boxInt = mono.typesByName.get("Box_int");
    expect(boxInt?.origin?.key).to.equal("Box<int>");
    expect(boxInt?.kind === "record" ? boxInt.fields[0]?.type : undefined).to.deep.equal(prim("int"));

    const wrapInt = mono.functionsByName.get("wrap_int");
    expect(wrapInt?.params[0]?.type).to.deep.equal(prim("int"));
    expect(wrapInt?.ret).to.deep.equal(named("Box_int"));
    expect(wrapInt?.body?.[0]).to.deep.equal({
      kind: "return",
      value: { kind: "record_lit", type: named("Box_int"), fields: [{ name: "value", value: ident("v") }] },
    });

    const main = mono.functionsByName.get("main");
    expect(main?.body?.[0]).to.deep.equal({
      kind: "let",
      name: "b",
      type: named("Box_int"),
      mutable: false,
      init: call("wrap_int", [intLit(7)]),
    });
  });

  it("expands aliases in place", () => {
    const mono = monoOf([
      box,
      { kind: "alias", name: "IntBox", target: named("Box", [prim("int")]) },
      fnDecl("open", [param("b", ptr(named("IntBox")))], prim("int")),
    ]);
    expect(mono.functionsByName.get("open")?.params[0]?.type).to.deep.equal(ptr(named("Box_int")));
    expect(mono.aliases).to.deep.equal([{ kind: "alias", name: "IntBox", target: named("Box_int") }]);
  });

  it("rejects an instantiation whose arguments grow on every expansion", () => {
    const err = catchCompileError(() =>
      monoOf([
        box,
        recordDecl("Nest", [field("inner", ptr(named("Nest", [named("Box", [typeParam("T")])])))], { typeParams: ["T"] }),
        fnDecl("use", [param("n", ptr(named("Nest", [prim("int")])))], prim("void")),
      ])
    );
    expect(err.code).to.equal("CND2003");
    expect(err.symbol).to.equal("Nest_int");
    expect(err.message).to.equal("Instantiating 'Nest<Box_int>' grows its own type arguments on every expansion.");
  });

  it("accepts a generic that refers to itself with the same arguments", () => {
    const mono = monoOf([
      recordDecl("List", [field("head", typeParam("T")), field("next", ptr(named("List", [typeParam("T")])))], {
        typeParams: ["T"],
      }),
      fnDecl("len", [param("l", ptr(named("List", [prim("int")])))], prim("int")),
    ]);
    const list = mono.typesByName.get("List_int");
    expect(list?.kind === "record" ? list.fields[1]?.type : undefined).to.deep.equal(ptr(named("List_int")));
  });

  it("rejects aliases that refer to themselves", () => {
    const err = catchCompileError(() =>
      monoOf([
        { kind: "alias", name: "A", target: named("B") },
        { kind: "alias", name: "B", target: named("A") },
      ])
    );
    expect(err.code).to.equal("CND2003");
    expect(err.message).to.equal("Alias 'A' refers to itself (A -> B -> A).");
  });

  it("rejects unbound parameters and wrong argument counts", () => {
    const unbound = catchCompileError(() => monoOf([fnDecl("f", [param("x", typeParam("T"))], prim("void"))]));
    expect(unbound.code).to.equal("CND2001");
    expect(unbound.message).to.equal("Type parameter 'T' is not bound in this context.");

    const arity = catchCompileError(() => monoOf([box, fnDecl("f", [param("x", named("Box"))], prim("void"))]));
    expect(arity.code).to.equal("CND2002");
    expect(arity.message).to.equal("Type 'Box' expects 1 type argument(s), got 0.");

    const unknown = catchCompileError(() => monoOf([fnDecl("f", [param("x", named("Missing"))], prim("void"))]));
    expect(unknown.code).to.equal("CND0003");
    expect(unknown.message).to.equal("Unknown type 'Missing'.");
  });

  it("rejects an instantiation whose generated name is already declared", () => {
    const err = catchCompileError(() =>
      monoOf([box, recordDecl("Box_int", []), fnDecl("f", [param("x", named("Box", [prim("int")]))], prim("void"))])
    );
    expect(err.code).to.equal("CND5002");
    expect(err.message).to.equal("Instantiation 'Box<int>' is named 'Box_int', which is already declared.");
  });

  it("merges tables from independent runs, keeping the first owner of a shared instantiation", () => {
    const left = new InstantiationTable();
    left.request({ base: "Box", args: [prim("int")], kind: "type", module: "a" }, { module: "a" });
    const right = new InstantiationTable();
    right.request({ base: "Box", args: [prim("double")], kind: "type", module: "b" }, { module: "b" });
    right.request({ base: "Box", args: [prim("int")], kind: "type", module: "b" }, { module: "b" });
    const merged = mergeInstantiationTables([left, right]);
    expect(merged.entries().map((e) => `${e.name}@${e.module}`)).to.deep.equal(["Box_int@a", "Box_double@b"]);

    const clash = new InstantiationTable();
    clash.request({ base: "Box", args: [named("ptr_int")], kind: "type", module: "b" }, { module: "b" });
    const pointer = new InstantiationTable();
    pointer.request({ base: "Box", args: [ptr(prim("int"))], kind: "type", module: "a" }, { module: "a" });
    const err = catchCompileError(() => mergeInstantiationTables([pointer, clash]));
    expect(err.code).to.equal("CND5002");
    expect(err.message).to.equal("Instantiations 'Box<*int>' and 'Box<ptr_int>' both mangle to 'Box_ptr_int'.");
  });
});
