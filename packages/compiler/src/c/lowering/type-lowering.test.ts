import { expect } from "chai";

import { indirect, named, prim, ptr, typeParam } from "../../tree.js";
import { emitType } from "../write.js";
import {
  cIdentFromStem,
  headerGuardMacro,
  isCIdentifier,
  methodSymbolName,
  tagEnumName,
  variantConstantName,
} from "./common.js";
import { lowerTypeToC, mangleGenericName, systemHeadersForType, typeKey } from "./type-lowering.js";

describe("@cinder/compiler type lowering", () => {
  it("keys types injectively", () => {
    expect(typeKey(named("Map", [prim("int"), ptr(named("Node"))]))).to.equal("Map<int,*Node>");
    expect(typeKey(indirect(typeParam("T")))).to.equal("&$T");
    expect(typeKey(named("T"))).to.not.equal(typeKey(typeParam("T")));
  });

  it("mangles generic instantiations into C-safe names", () => {
    expect(mangleGenericName("Box", [prim("int")])).to.equal("Box_int");
    expect(mangleGenericName("Pair", [ptr(prim("char")), named("List", [prim("double")])])).to.equal(
      "Pair_ptr_char_List_double"
    );
    expect(mangleGenericName("Ref", [indirect(named("Node"))])).to.equal("Ref_ref_Node");
  });

  it("lowers resolved types and collects the system headers they need", () => {
    expect(emitType(lowerTypeToC(prim("str")))).to.equal("char *");
    expect(emitType(lowerTypeToC(prim("usize")))).to.equal("size_t");
    expect(emitType(lowerTypeToC(indirect(named("Point"))))).to.equal("struct Point *");
    expect(emitType(lowerTypeToC(ptr({ kind: "enum", name: "Mode" })))).to.equal("enum Mode *");
    expect(mangleGenericName("Box", [{ kind: "enum", name: "Mode" }])).to.equal("Box_Mode");

    const headers = new Set<string>();
    systemHeadersForType(ptr(prim("i64")), headers);
    systemHeadersForType(prim("bool"), headers);
    systemHeadersForType(prim("usize"), headers);
    systemHeadersForType(prim("int"), headers);
    expect([...headers]).to.deep.equal(["stdint.h", "stdbool.h", "stddef.h"]);
  });

  it("derives C names from module and declaration names", () => {
    expect(cIdentFromStem("net/http-client")).to.equal("net_http_client");
    expect(cIdentFromStem("3d")).to.equal("_3d");
    expect(cIdentFromStem("--")).to.equal("mod");
    expect(headerGuardMacro("geo.shapes")).to.equal("GEO_SHAPES_H");
    expect(tagEnumName("Shape")).to.equal("ShapeKind");
    expect(variantConstantName("Shape", "Circle")).to.equal("SHAPE_CIRCLE");
    expect(methodSymbolName("Point", "translate")).to.equal("Point_translate");
    expect(isCIdentifier("register")).to.equal(false);
    expect(isCIdentifier("Box_int")).to.equal(true);
  });
});
