import { prim, ptr } from "../../tree.js";
import type { Expr, FieldDecl, MethodDecl, TypeRef } from "../../tree.js";
import { fail, siteAt } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import type { ConcreteGlobal, ConcreteType, MonomorphizedModule } from "../passes/contracts.js";
import { accessedTypeName, typeKey } from "./type-lowering.js";

/** What the typing helper needs to know about the code around an expression. */
export type TypeEnv = {
  readonly module: MonomorphizedModule;
  readonly lookup: (name: string) => TypeRef | undefined;
  /** The owner type inside an instance method. */
  readonly selfType?: TypeRef;
  readonly site: DiagnosticSite;
};

const COMPARISON_OPS: ReadonlySet<string> = new Set(["==", "!=", "<", "<=", ">", ">=", "&&", "||"]);

/** Block-structured name bindings; the innermost frame wins. */
export class LocalScope<T> {
  readonly #frames: Map<string, T>[] = [new Map()];

  push(): void {
    this.#frames.push(new Map());
  }

  pop(): void {
    if (this.#frames.length > 1) this.#frames.pop();
  }

  declare(name: string, value: T): void {
    this.#frames[this.#frames.length - 1]?.set(name, value);
  }

  declaredHere(name: string): boolean {
    return this.#frames[this.#frames.length - 1]?.has(name) ?? false;
  }

  lookup(name: string): T | undefined {
    for (let i = this.#frames.length - 1; i >= 0; i--) {
      const hit = this.#frames[i]?.get(name);
      if (hit !== undefined) return hit;
    }
    return undefined;
  }
}

/** A concrete type declared by the module or reachable through its imports. */
export function lookupType(module: MonomorphizedModule, name: string): ConcreteType | undefined {
  return module.typesByName.get(name) ?? module.imports.type(name);
}

export function lookupGlobal(module: MonomorphizedModule, name: string): ConcreteGlobal | undefined {
  return module.globalsByName.get(name) ?? module.imports.global(name);
}

export function concreteTypeOf(ty: TypeRef, env: TypeEnv): ConcreteType | undefined {
  const name = accessedTypeName(ty);
  return name === undefined ? undefined : lookupType(env.module, name);
}

export function fieldOf(ty: TypeRef, name: string, env: TypeEnv, at: DiagnosticSite): FieldDecl {
  const owner = concreteTypeOf(ty, env);
  if (!owner) fail("CND0003", `Type '${typeKey(ty)}' has no fields.`, at);
  if (owner.kind === "tag") fail("CND0003", `Tag '${owner.name}' has no field '${name}'; match on it instead.`, at);
  const found = owner.fields.find((f) => f.name === name);
  if (!found) fail("CND0003", `Record '${owner.name}' has no field '${name}'.`, at);
  return found;
}

export function methodOf(
  ownerName: string,
  method: string,
  env: TypeEnv,
  at: DiagnosticSite
): { readonly owner: ConcreteType; readonly method: MethodDecl } {
  const owner = lookupType(env.module, ownerName);
  if (!owner) fail("CND0003", `Unknown type '${ownerName}'.`, at);
  const found = owner.methods.find((m) => m.name === method);
  if (!found) fail("CND0003", `Type '${ownerName}' has no method '${method}'.`, at);
  return { owner, method: found };
}

/** The owner type of a method call's receiver, looking through one pointer level. */
export function receiverOwner(receiver: Expr, env: TypeEnv): string {
  const ty = typeOfExpr(receiver, env);
  const name = accessedTypeName(ty);
  if (name === undefined) {
    fail("CND0003", `Values of type '${typeKey(ty)}' have no methods.`, siteAt(env.site, receiver.loc));
  }
  return name;
}

export function typeOfExpr(e: Expr, env: TypeEnv): TypeRef {
  const at = siteAt(env.site, e.loc);
  switch (e.kind) {
    case "int":
      return prim(e.type ?? "int");
    case "float":
      return prim(e.type ?? "double");
    case "bool":
      return prim("bool");
    case "char":
      return prim("char");
    case "str":
      return prim("str");
    case "ident": {
      const ty = env.lookup(e.name);
      if (!ty) fail("CND0003", `Unknown name '${e.name}'.`, at);
      return ty;
    }
    case "self":
      if (!env.selfType) fail("CND0001", "'self' is only available inside an instance method.", at);
      return env.selfType;
    case "self_field":
      if (!env.selfType) fail("CND0001", `Field '${e.name}' of 'self' used outside an instance method.`, at);
      return fieldOf(env.selfType, e.name, env, at).type;
    case "field":
      return fieldOf(typeOfExpr(e.target, env), e.name, env, at).type;
    case "index": {
      const target = typeOfExpr(e.target, env);
      if (target.kind === "ptr" || target.kind === "indirect") return target.inner;
      if (target.kind === "prim" && target.name === "str") return prim("char");
      return fail("CND0001", `Values of type '${typeKey(target)}' cannot be indexed.`, at);
    }
    case "unary":
      return e.op === "!" ? prim("bool") : typeOfExpr(e.operand, env);
    case "binary":
      return COMPARISON_OPS.has(e.op) ? prim("bool") : typeOfExpr(e.left, env);
    case "call": {
      const ret = (env.module.functionsByName.get(e.callee) ?? env.module.imports.fn(e.callee))?.ret;
      if (!ret) fail("CND0003", `Unknown function '${e.callee}'.`, at);
      return ret;
    }
    case "static_call": {
      const owner = accessedTypeName(e.owner);
      if (owner === undefined) fail("CND0003", `Static call target '${typeKey(e.owner)}' is not a record or tag.`, at);
      return methodOf(owner, e.method, env, at).method.ret;
    }
    case "method_call":
      return methodOf(receiverOwner(e.receiver, env), e.method, env, at).method.ret;
    case "record_lit":
    case "variant_lit":
      return e.type;
    case "addr":
      return ptr(typeOfExpr(e.target, env));
    case "deref": {
      const target = typeOfExpr(e.target, env);
      if (target.kind !== "ptr" && target.kind !== "indirect") {
        fail("CND0001", `Cannot dereference a value of type '${typeKey(target)}'.`, at);
      }
      return target.inner;
    }
    case "cast":
      return e.type;
  }
}
