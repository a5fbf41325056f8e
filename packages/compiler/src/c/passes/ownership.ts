import { named } from "../../tree.js";
import type { Expr, Param, TypeRef } from "../../tree.js";
import { fail, siteAt } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { nameType, ptrType } from "../ir.js";
import type { CType } from "../ir.js";
import { functionBodies, walkFunctionBody } from "../lowering/body-walk.js";
import type { WalkEnv } from "../lowering/body-walk.js";
import { methodKey } from "../lowering/common.js";
import { methodOf, receiverOwner, typeOfExpr } from "../lowering/expr-types.js";
import { isPointerLike, lowerTypeToC, POINTER_SIZE, primLayout } from "../lowering/type-lowering.js";
import { asReadonlyMap } from "./contracts.js";
import type {
  ClassifiedSignature,
  LayoutPlan,
  MonomorphizedModule,
  OwnershipModel,
  ParamBinding,
  ReturnBinding,
  TypeLayoutInfo,
} from "./contracts.js";

export const DEFAULT_SMALL_SIZE_LIMIT = 16;

export type OwnershipOptions = {
  /** Largest by-value size in bytes that a `read` parameter is still copied at. */
  readonly smallSizeLimit?: number;
};

type LayoutLookup = (name: string) => TypeLayoutInfo | undefined;

function sizeClass(ty: TypeRef, layoutOf: LayoutLookup): TypeLayoutInfo {
  switch (ty.kind) {
    case "prim":
      return primLayout(ty.name);
    case "named":
      return layoutOf(ty.name) ?? { size: Number.POSITIVE_INFINITY, align: 1, heap: false };
    case "enum":
      return primLayout("int");
    case "ptr":
    case "indirect":
    case "param":
      return { size: POINTER_SIZE, align: POINTER_SIZE, heap: false };
  }
}

function classifyParam(
  p: Param,
  lowLevel: boolean,
  layoutOf: LayoutLookup,
  limit: number,
  site: DiagnosticSite
): ParamBinding {
  const base = { name: p.name, type: p.type, intent: p.intent, ...(p.loc ? { loc: p.loc } : {}) };
  if (p.intent === "address") {
    if (!lowLevel) {
      fail("CND4004", `Parameter '${p.name}' takes an address; only low-level functions may.`, siteAt(site, p.loc));
    }
    return { ...base, strategy: "Pointer", storage: "indirect", mutable: true };
  }
  if (isPointerLike(p.type)) return { ...base, strategy: "Pointer", storage: "direct", mutable: p.intent !== "read" };
  switch (p.intent) {
    case "mutate":
      return { ...base, strategy: "RefMutable", storage: "indirect", mutable: true };
    case "move":
      return { ...base, strategy: "Copy", storage: "direct", mutable: true };
    case "read": {
      const info = sizeClass(p.type, layoutOf);
      if (!info.heap && info.size <= limit) return { ...base, strategy: "Copy", storage: "direct", mutable: false };
      // A borrowed string is passed as `const char *`, which already is the reference.
      const storage = p.type.kind === "prim" && p.type.name === "str" ? "direct" : "indirect";
      return { ...base, strategy: "RefImmutable", storage, mutable: false };
    }
  }
}

function classifyReturn(ty: TypeRef): ReturnBinding {
  return { type: ty, strategy: isPointerLike(ty) ? "Pointer" : "Copy" };
}

/** The C type a classified parameter is declared with. */
export function paramCType(binding: ParamBinding): CType {
  const value = lowerTypeToC(binding.type);
  switch (binding.strategy) {
    case "Copy":
      return value;
    case "Pointer":
      return binding.storage === "indirect" ? ptrType(value) : value;
    case "RefMutable":
      return ptrType(value);
    case "RefImmutable":
      if (binding.type.kind === "prim" && binding.type.name === "str") return ptrType(nameType("char"), true);
      return ptrType(value, true);
  }
}

/** Binding tags for every function and method signature of the module, keyed by `name` or `Type::method`. */
export function classifySignatures(
  module: MonomorphizedModule,
  plan: LayoutPlan,
  options: OwnershipOptions = {}
): ReadonlyMap<string, ClassifiedSignature> {
  const limit = options.smallSizeLimit ?? DEFAULT_SMALL_SIZE_LIMIT;
  const layoutOf: LayoutLookup = (name) => plan.layouts.get(name) ?? module.imports.layout(name);
  const out = new Map<string, ClassifiedSignature>();
  for (const name of module.order) {
    const fn = module.functionsByName.get(name);
    if (fn) {
      const site: DiagnosticSite = { module: module.module, symbol: fn.name };
      out.set(fn.name, {
        key: fn.name,
        params: fn.params.map((p) => classifyParam(p, fn.lowLevel, layoutOf, limit, site)),
        ret: classifyReturn(fn.ret),
      });
    }
    const ty = module.typesByName.get(name);
    for (const m of ty?.methods ?? []) {
      if (!ty) continue;
      const key = methodKey(ty.name, m.name);
      const site: DiagnosticSite = { module: module.module, symbol: key };
      const receiver: ParamBinding | undefined =
        m.kind === "instance"
          ? {
              name: "self",
              type: named(ty.name),
              intent: "receiver",
              strategy: m.mutatesReceiver ? "RefMutable" : "RefImmutable",
              storage: "indirect",
              mutable: m.mutatesReceiver,
            }
          : undefined;
      out.set(key, {
        key,
        owner: ty.name,
        ...(receiver ? { receiver } : {}),
        params: m.params.map((p) => classifyParam(p, m.lowLevel, layoutOf, limit, site)),
        ret: classifyReturn(m.ret),
      });
    }
  }
  return asReadonlyMap(out);
}

type Root =
  | { readonly kind: "binding"; readonly name: string; readonly mutable: boolean }
  | { readonly kind: "self"; readonly mutable: boolean }
  | { readonly kind: "pointer" }
  | { readonly kind: "rvalue" };

function rootOf(e: Expr, env: WalkEnv): Root {
  switch (e.kind) {
    case "ident":
      return { kind: "binding", name: e.name, mutable: env.binding(e.name)?.mutable ?? false };
    case "self":
    case "self_field":
      return { kind: "self", mutable: env.fn.mutatesReceiver };
    case "field":
      return isPointerLike(typeOfExpr(e.target, env)) ? { kind: "pointer" } : rootOf(e.target, env);
    case "index":
    case "deref":
      return { kind: "pointer" };
    default:
      return { kind: "rvalue" };
  }
}

function isImmutable(root: Root): boolean {
  return (root.kind === "binding" || root.kind === "self") && !root.mutable;
}

function rootLabel(root: Root): string {
  return root.kind === "binding" ? `'${root.name}'` : "'self'";
}

function checkArgs(
  callee: string,
  sig: ClassifiedSignature | undefined,
  args: readonly Expr[],
  env: WalkEnv,
  at: DiagnosticSite
): void {
  if (!sig) return;
  sig.params.forEach((p, i) => {
    const arg = args[i];
    if (arg === undefined || (p.intent !== "mutate" && p.intent !== "address")) return;
    if (p.intent === "address" && !env.lowLevel) {
      fail("CND4004", `Calling '${callee}' passes an address; only low-level code may.`, at);
    }
    const root = rootOf(arg, env);
    if (isImmutable(root)) {
      fail(
        "CND4002",
        `Argument '${p.name}' of '${callee}' may be changed by the callee, but ${rootLabel(root)} is not mutable.`,
        siteAt(at, arg.loc)
      );
    }
  });
}

/** Rejects mutation through immutable bindings and address-taking outside low-level code. */
export function checkOwnership(module: MonomorphizedModule, model: OwnershipModel): void {
  const signatureOf = (key: string): ClassifiedSignature | undefined =>
    model.signatures.get(key) ?? module.imports.signature(key);
  for (const fn of functionBodies(module)) {
    walkFunctionBody(module, fn, {
      stmt: (s, env) => {
        if (s.kind !== "assign") return;
        const root = rootOf(s.target, env);
        if (!isImmutable(root)) return;
        const at = siteAt(env.site, s.loc);
        if (root.kind === "self") {
          fail("CND4003", `Cannot assign through 'self': '${env.fn.key}' does not mutate its receiver.`, at);
        }
        fail("CND4003", `Cannot assign to ${rootLabel(root)}: it is not mutable.`, at);
      },
      expr: (e, env) => {
        const at = siteAt(env.site, e.loc);
        switch (e.kind) {
          case "addr":
            if (!env.lowLevel) fail("CND4004", "Taking an address is only allowed in low-level code.", at);
            return;
          case "call":
            checkArgs(e.callee, signatureOf(e.callee), e.args, env, at);
            return;
          case "static_call": {
            if (e.owner.kind !== "named") return;
            const key = methodKey(e.owner.name, e.method);
            checkArgs(key, signatureOf(key), e.args, env, at);
            return;
          }
          case "method_call": {
            const owner = receiverOwner(e.receiver, env);
            const key = methodKey(owner, e.method);
            const { method } = methodOf(owner, e.method, env, at);
            if (method.kind === "static") {
              fail("CND0001", `'${key}' is a static method and takes no receiver.`, at);
            }
            if (method.mutatesReceiver && !isPointerLike(typeOfExpr(e.receiver, env))) {
              const root = rootOf(e.receiver, env);
              if (isImmutable(root)) {
                fail("CND4001", `'${key}' mutates its receiver, but ${rootLabel(root)} is not mutable.`, at);
              }
            }
            checkArgs(key, signatureOf(key), e.args, env, at);
            return;
          }
          default:
            return;
        }
      },
    });
  }
}

/** Classifies every signature, then checks every body against the classification. */
export function buildOwnershipModel(
  module: MonomorphizedModule,
  plan: LayoutPlan,
  options: OwnershipOptions = {}
): OwnershipModel {
  const model: OwnershipModel = { signatures: classifySignatures(module, plan, options) };
  checkOwnership(module, model);
  return Object.freeze(model);
}
