import type { PrimName, TypeRef } from "../../tree.js";
import type { CType } from "../ir.js";
import { enumType, nameType, ptrType, structType } from "../ir.js";

/** Canonical, injective text key of a type; used for instantiation keys. */
export function typeKey(ty: TypeRef): string {
  switch (ty.kind) {
    case "prim":
      return ty.name;
    case "param":
      return `$${ty.name}`;
    case "ptr":
      return `*${typeKey(ty.inner)}`;
    case "indirect":
      return `&${typeKey(ty.inner)}`;
    case "enum":
      return ty.name;
    case "named":
      return ty.args.length === 0 ? ty.name : `${ty.name}<${ty.args.map(typeKey).join(",")}>`;
  }
}

/** Name-safe encoding of one resolved type argument, e.g. `int`, `Point`, `ptr_int`, `ref_Node_int`. */
export function mangleTypeArg(ty: TypeRef): string {
  switch (ty.kind) {
    case "prim":
      return ty.name;
    case "param":
      return ty.name;
    case "ptr":
      return `ptr_${mangleTypeArg(ty.inner)}`;
    case "indirect":
      return `ref_${mangleTypeArg(ty.inner)}`;
    case "enum":
      return ty.name;
    case "named":
      return ty.args.length === 0 ? ty.name : `${ty.name}_${ty.args.map(mangleTypeArg).join("_")}`;
  }
}

export function mangleGenericName(baseName: string, args: readonly TypeRef[]): string {
  return `${baseName}_${args.map(mangleTypeArg).join("_")}`;
}

export function isPointerLike(ty: TypeRef): boolean {
  return ty.kind === "ptr" || ty.kind === "indirect";
}

/** The named type a value of `ty` gives field/method access to, looking through one pointer level. */
export function accessedTypeName(ty: TypeRef): string | undefined {
  const base = ty.kind === "ptr" || ty.kind === "indirect" ? ty.inner : ty;
  return base.kind === "named" ? base.name : undefined;
}

export type PrimLayout = {
  readonly c: string;
  readonly size: number;
  readonly align: number;
  readonly heap: boolean;
  readonly header?: string;
};

const primLayouts: Readonly<Record<PrimName, PrimLayout>> = {
  int: { c: "int", size: 4, align: 4, heap: false },
  uint: { c: "unsigned int", size: 4, align: 4, heap: false },
  i8: { c: "int8_t", size: 1, align: 1, heap: false, header: "stdint.h" },
  i16: { c: "int16_t", size: 2, align: 2, heap: false, header: "stdint.h" },
  i32: { c: "int32_t", size: 4, align: 4, heap: false, header: "stdint.h" },
  i64: { c: "int64_t", size: 8, align: 8, heap: false, header: "stdint.h" },
  u8: { c: "uint8_t", size: 1, align: 1, heap: false, header: "stdint.h" },
  u16: { c: "uint16_t", size: 2, align: 2, heap: false, header: "stdint.h" },
  u32: { c: "uint32_t", size: 4, align: 4, heap: false, header: "stdint.h" },
  u64: { c: "uint64_t", size: 8, align: 8, heap: false, header: "stdint.h" },
  usize: { c: "size_t", size: 8, align: 8, heap: false, header: "stddef.h" },
  float: { c: "float", size: 4, align: 4, heap: false },
  double: { c: "double", size: 8, align: 8, heap: false },
  bool: { c: "bool", size: 1, align: 1, heap: false, header: "stdbool.h" },
  char: { c: "char", size: 1, align: 1, heap: false },
  str: { c: "char *", size: 8, align: 8, heap: true },
  void: { c: "void", size: 0, align: 1, heap: false },
};

export const POINTER_SIZE = 8;

export function primLayout(name: PrimName): PrimLayout {
  return primLayouts[name];
}

export function isIntegerPrim(name: PrimName): boolean {
  return name !== "float" && name !== "double" && name !== "bool" && name !== "str" && name !== "void";
}

/** Lowers a fully resolved type. Named types are concrete struct names at this point; enums keep their own name. */
export function lowerTypeToC(ty: TypeRef): CType {
  switch (ty.kind) {
    case "prim":
      if (ty.name === "str") return ptrType(nameType("char"));
      return nameType(primLayout(ty.name).c);
    case "named":
      return structType(ty.name);
    case "enum":
      return enumType(ty.name);
    case "ptr":
    case "indirect":
      return ptrType(lowerTypeToC(ty.inner));
    case "param":
      return nameType(ty.name);
  }
}

/** System headers needed to spell `ty` in C. */
export function systemHeadersForType(ty: TypeRef, out: Set<string>): void {
  switch (ty.kind) {
    case "prim": {
      const header = primLayout(ty.name).header;
      if (header) out.add(header);
      return;
    }
    case "ptr":
    case "indirect":
      systemHeadersForType(ty.inner, out);
      return;
    case "named":
    case "enum":
    case "param":
      return;
  }
}
