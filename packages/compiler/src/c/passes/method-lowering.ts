import type { Expr, Stmt } from "../../tree.js";
import { fail } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { nameType } from "../ir.js";
import type { CFnSignature } from "../ir.js";
import { functionBodies, mapFunctionBody } from "../lowering/body-walk.js";
import type { FunctionBody } from "../lowering/body-walk.js";
import { methodKey, methodSymbolName } from "../lowering/common.js";
import { receiverOwner } from "../lowering/expr-types.js";
import { lowerTypeToC } from "../lowering/type-lowering.js";
import { emitSignature } from "../write.js";
import type { SymbolTable } from "../symbols.js";
import { asReadonlyMap, deepFreeze, freezeReadonlyArray } from "./contracts.js";
import type {
  ClassifiedSignature,
  LoweredFunction,
  LoweredModule,
  MonomorphizedModule,
  OwnershipModel,
} from "./contracts.js";
import { paramCType } from "./ownership.js";

/** The C signature of a lowered function; a parameterless `main` always returns `int`. */
export function cSignature(fn: LoweredFunction): CFnSignature {
  const isMain = fn.symbol === "main" && fn.params.length === 0;
  return {
    name: fn.symbol,
    ret: isMain ? nameType("int") : lowerTypeToC(fn.ret.type),
    params: fn.params.map((p) => ({ type: paramCType(p), name: p.name })),
  };
}

function signatureOf(model: OwnershipModel, key: string, site: DiagnosticSite): ClassifiedSignature {
  const sig = model.signatures.get(key);
  if (!sig) fail("CND0004", `No binding classification was recorded for '${key}'.`, { ...site, symbol: key });
  return sig;
}

function rewriteCalls(module: MonomorphizedModule, body: FunctionBody): readonly Stmt[] {
  return mapFunctionBody(module, body, {
    rewrite: (original, mapped, env): Expr => {
      const loc = original.loc ? { loc: original.loc } : {};
      switch (mapped.kind) {
        case "self":
          return { kind: "ident", name: "self", ...loc };
        case "self_field":
          return { kind: "field", target: { kind: "ident", name: "self", ...loc }, name: mapped.name, ...loc };
        case "method_call": {
          if (original.kind !== "method_call") return mapped;
          const owner = receiverOwner(original.receiver, env);
          return {
            kind: "call",
            callee: methodSymbolName(owner, mapped.method),
            typeArgs: [],
            args: [mapped.receiver, ...mapped.args],
            ...loc,
          };
        }
        case "static_call":
          if (mapped.owner.kind !== "named") return mapped;
          return {
            kind: "call",
            callee: methodSymbolName(mapped.owner.name, mapped.method),
            typeArgs: [],
            args: mapped.args,
            ...loc,
          };
        default:
          return mapped;
      }
    },
  });
}

/**
 * Turns every method into a free function named `Owner_method`, with the
 * receiver as its first parameter, and rewrites calls and `self` uses in all
 * bodies to match. Each function symbol is registered in `symbols`.
 */
export function lowerMethods(
  module: MonomorphizedModule,
  model: OwnershipModel,
  symbols: SymbolTable
): LoweredModule {
  const site: DiagnosticSite = { module: module.module };
  const bodies = new Map(functionBodies(module).map((b): [string, FunctionBody] => [b.key, b]));
  const out: LoweredFunction[] = [];

  const add = (fn: LoweredFunction): void => {
    const body = bodies.get(fn.key);
    const lowered: LoweredFunction = body ? { ...fn, body: rewriteCalls(module, body) } : fn;
    const at: DiagnosticSite = { ...site, symbol: fn.key, ...(fn.loc ? { loc: fn.loc } : {}) };
    symbols.define("function", lowered.symbol, emitSignature(cSignature(lowered)), at);
    out.push(lowered);
  };

  for (const name of module.order) {
    const fn = module.functionsByName.get(name);
    if (fn) {
      const sig = signatureOf(model, fn.name, site);
      add({
        key: fn.name,
        symbol: fn.name,
        params: sig.params,
        ret: sig.ret,
        lowLevel: fn.lowLevel,
        ...(fn.header ? { header: fn.header } : {}),
        ...(fn.loc ? { loc: fn.loc } : {}),
      });
    }
    const ty = module.typesByName.get(name);
    for (const m of ty?.methods ?? []) {
      if (!ty) continue;
      const key = methodKey(ty.name, m.name);
      const sig = signatureOf(model, key, site);
      if (m.kind === "instance" && !sig.receiver) {
        fail("CND0004", `No receiver classification was recorded for '${key}'.`, { ...site, symbol: key });
      }
      add({
        key,
        symbol: methodSymbolName(ty.name, m.name),
        owner: ty.name,
        params: sig.receiver ? [sig.receiver, ...sig.params] : sig.params,
        ret: sig.ret,
        lowLevel: m.lowLevel,
        ...(m.loc ? { loc: m.loc } : {}),
      });
    }
  }

  return deepFreeze({
    module: module.module,
    functions: freezeReadonlyArray(out),
    functionsBySymbol: asReadonlyMap(new Map(out.map((f): [string, LoweredFunction] => [f.symbol, f]))),
  });
}
