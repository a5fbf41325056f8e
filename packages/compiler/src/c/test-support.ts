import { expect } from "chai";

import type {
  Decl,
  EnumDecl,
  FieldDecl,
  FnDecl,
  IncludeDecl,
  MethodDecl,
  Param,
  ProgramFragment,
  RecordDecl,
  Scenario,
  Stmt,
  TagDecl,
  TypeRef,
  VariantDecl,
} from "../tree.js";
import { prim } from "../tree.js";
import { CompileError } from "./diagnostics.js";
import { assembleModule } from "./passes/assemble.js";
import type { ModuleUnit, MonomorphizedModule } from "./passes/contracts.js";
import { fragmentFileName, InMemoryFragmentSource } from "./passes/fragment-source.js";
import { InstantiationTable } from "./passes/instantiations.js";
import { monomorphizeModule } from "./passes/monomorphize.js";

export type FragmentExtras = {
  readonly scenario?: Scenario;
  readonly includes?: readonly IncludeDecl[];
  readonly imports?: readonly string[];
};

export function fragment(module: string, decls: readonly Decl[], extras: FragmentExtras = {}): ProgramFragment {
  return {
    module,
    ...(extras.scenario ? { scenario: extras.scenario } : {}),
    file: fragmentFileName(module, extras.scenario),
    includes: extras.includes ?? [],
    imports: extras.imports ?? [],
    decls,
  };
}

export function unitOf(decls: readonly Decl[], module = "demo", extras: FragmentExtras = {}): ModuleUnit {
  return assembleModule(module, "compiled", new InMemoryFragmentSource([fragment(module, decls, extras)]));
}

export function monoOf(decls: readonly Decl[], table = new InstantiationTable()): MonomorphizedModule {
  return monomorphizeModule(unitOf(decls), table);
}

export function recordDecl(
  name: string,
  fields: readonly FieldDecl[],
  opts: { readonly typeParams?: readonly string[]; readonly methods?: readonly MethodDecl[] } = {}
): RecordDecl {
  return { kind: "record", name, typeParams: opts.typeParams ?? [], fields, methods: opts.methods ?? [] };
}

export function variant(name: string, fields: readonly FieldDecl[] = [], value?: number): VariantDecl {
  return value === undefined ? { name, fields } : { name, fields, value };
}

export function tagDecl(
  name: string,
  variants: readonly VariantDecl[],
  opts: { readonly typeParams?: readonly string[]; readonly methods?: readonly MethodDecl[] } = {}
): TagDecl {
  return { kind: "tag", name, typeParams: opts.typeParams ?? [], variants, methods: opts.methods ?? [] };
}

export function enumDecl(name: string, members: readonly (string | [string, number])[]): EnumDecl {
  return {
    kind: "enum",
    name,
    members: members.map((m) => (typeof m === "string" ? { name: m } : { name: m[0], value: m[1] })),
  };
}

export function fnDecl(
  name: string,
  params: readonly Param[],
  ret: TypeRef,
  body?: readonly Stmt[],
  opts: { readonly typeParams?: readonly string[]; readonly lowLevel?: boolean; readonly header?: IncludeDecl } = {}
): FnDecl {
  return {
    kind: "fn",
    name,
    typeParams: opts.typeParams ?? [],
    params,
    ret,
    lowLevel: opts.lowLevel ?? false,
    ...(body ? { body } : {}),
    ...(opts.header ? { header: opts.header } : {}),
  };
}

export function methodDecl(
  name: string,
  opts: {
    readonly kind?: "static" | "instance";
    readonly mutatesReceiver?: boolean;
    readonly params?: readonly Param[];
    readonly ret?: TypeRef;
    readonly body?: readonly Stmt[];
    readonly lowLevel?: boolean;
  } = {}
): MethodDecl {
  return {
    name,
    kind: opts.kind ?? "instance",
    mutatesReceiver: opts.mutatesReceiver ?? false,
    params: opts.params ?? [],
    ret: opts.ret ?? prim("void"),
    lowLevel: opts.lowLevel ?? false,
    ...(opts.body ? { body: opts.body } : {}),
  };
}

/** Runs `run` and returns the CompileError it raises; any other outcome fails the test. */
export function catchCompileError(run: () => unknown): CompileError {
  try {
    run();
  } catch (e) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  return expect.fail("expected a CompileError");
}
