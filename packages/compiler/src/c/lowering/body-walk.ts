import { named, prim } from "../../tree.js";
import type { Expr, FieldInit, Param, Stmt, TypeRef } from "../../tree.js";
import type { DiagnosticSite } from "../diagnostics.js";
import type { ConcreteType, MonomorphizedModule } from "../passes/contracts.js";
import { methodKey } from "./common.js";
import { concreteTypeOf, LocalScope, lookupGlobal, typeOfExpr } from "./expr-types.js";
import type { TypeEnv } from "./expr-types.js";

export type Binding = {
  readonly type: TypeRef;
  readonly mutable: boolean;
};

/** A function or method that has a body, as seen by the body passes. */
export type FunctionBody = {
  readonly key: string;
  readonly owner?: ConcreteType;
  readonly instance: boolean;
  readonly mutatesReceiver: boolean;
  readonly params: readonly Param[];
  readonly ret: TypeRef;
  readonly body: readonly Stmt[];
  readonly lowLevel: boolean;
  readonly site: DiagnosticSite;
};

export type WalkEnv = TypeEnv & {
  readonly fn: FunctionBody;
  readonly binding: (name: string) => Binding | undefined;
  /** Inside a low-level function or a low-level block. */
  readonly lowLevel: boolean;
};

export type BodyHooks = {
  readonly stmt?: (s: Stmt, env: WalkEnv) => void;
  readonly expr?: (e: Expr, env: WalkEnv) => void;
  readonly rewrite?: (original: Expr, mapped: Expr, env: WalkEnv) => Expr;
};

/** Functions and methods with bodies, in declaration order. */
export function functionBodies(module: MonomorphizedModule): readonly FunctionBody[] {
  const out: FunctionBody[] = [];
  for (const name of module.order) {
    const fn = module.functionsByName.get(name);
    if (fn?.body) {
      out.push({
        key: fn.name,
        instance: false,
        mutatesReceiver: false,
        params: fn.params,
        ret: fn.ret,
        body: fn.body,
        lowLevel: fn.lowLevel,
        site: { module: module.module, symbol: fn.name, ...(fn.loc ? { loc: fn.loc } : {}) },
      });
    }
    const ty = module.typesByName.get(name);
    for (const m of ty?.methods ?? []) {
      if (!ty || !m.body) continue;
      const key = methodKey(ty.name, m.name);
      out.push({
        key,
        owner: ty,
        instance: m.kind === "instance",
        mutatesReceiver: m.mutatesReceiver,
        params: m.params,
        ret: m.ret,
        body: m.body,
        lowLevel: m.lowLevel,
        site: { module: module.module, symbol: key, ...(m.loc ? { loc: m.loc } : {}) },
      });
    }
  }
  return out;
}

/** True when a statement list leaves an enclosing loop through `break` or `continue`. */
export function exitsEnclosingLoop(stmts: readonly Stmt[]): boolean {
  return stmts.some((s) => {
    switch (s.kind) {
      case "break":
      case "continue":
        return true;
      case "if":
        return exitsEnclosingLoop(s.then) || exitsEnclosingLoop(s.else ?? []);
      case "match":
        return s.arms.some((a) => exitsEnclosingLoop(a.body));
      case "block":
        return exitsEnclosingLoop(s.body);
      default:
        return false;
    }
  });
}

/**
 * Rebuilds one body bottom-up in evaluation order, keeping local bindings in
 * scope. `stmt` and `expr` see each original node before its children;
 * `rewrite` receives the original node and the node rebuilt from rewritten
 * children, and returns the replacement.
 */
export function mapFunctionBody(module: MonomorphizedModule, fn: FunctionBody, hooks: BodyHooks): readonly Stmt[] {
  const scope = new LocalScope<Binding>();
  for (const p of fn.params) scope.declare(p.name, { type: p.type, mutable: p.intent !== "read" });
  const self = fn.instance && fn.owner ? named(fn.owner.name) : undefined;

  const binding = (name: string): Binding | undefined => {
    const local = scope.lookup(name);
    if (local) return local;
    const global = lookupGlobal(module, name);
    return global ? { type: global.type, mutable: global.mutable } : undefined;
  };
  const root: WalkEnv = {
    module,
    fn,
    site: fn.site,
    lowLevel: fn.lowLevel,
    binding,
    lookup: (name) => binding(name)?.type,
    ...(self ? { selfType: self } : {}),
  };

  const exprs = (items: readonly Expr[], env: WalkEnv): readonly Expr[] => items.map((e) => expr(e, env));

  const inits = (items: readonly FieldInit[], env: WalkEnv): readonly FieldInit[] =>
    items.map((f) => ({ ...f, value: expr(f.value, env) }));

  const children = (e: Expr, env: WalkEnv): Expr => {
    switch (e.kind) {
      case "field":
      case "addr":
      case "deref":
        return { ...e, target: expr(e.target, env) };
      case "index":
        return { ...e, target: expr(e.target, env), index: expr(e.index, env) };
      case "unary":
        return { ...e, operand: expr(e.operand, env) };
      case "binary":
        return { ...e, left: expr(e.left, env), right: expr(e.right, env) };
      case "call":
        return { ...e, args: exprs(e.args, env) };
      case "static_call":
        return { ...e, args: exprs(e.args, env) };
      case "method_call":
        return { ...e, receiver: expr(e.receiver, env), args: exprs(e.args, env) };
      case "record_lit":
        return { ...e, fields: inits(e.fields, env) };
      case "variant_lit":
        return { ...e, fields: inits(e.fields, env) };
      case "cast":
        return { ...e, expr: expr(e.expr, env) };
      default:
        return e;
    }
  };

  const expr = (e: Expr, env: WalkEnv): Expr => {
    hooks.expr?.(e, env);
    const mapped = children(e, env);
    return hooks.rewrite ? hooks.rewrite(e, mapped, env) : mapped;
  };

  const nested = (body: readonly Stmt[], env: WalkEnv): readonly Stmt[] => {
    scope.push();
    const out = stmts(body, env);
    scope.pop();
    return out;
  };

  const stmts = (body: readonly Stmt[], env: WalkEnv): readonly Stmt[] => body.map((s) => stmt(s, env));

  const stmt = (s: Stmt, env: WalkEnv): Stmt => {
    hooks.stmt?.(s, env);
    switch (s.kind) {
      case "let": {
        const init = s.init === undefined ? undefined : expr(s.init, env);
        scope.declare(s.name, { type: s.type, mutable: s.mutable });
        return init === undefined ? s : { ...s, init };
      }
      case "assign":
        return { ...s, target: expr(s.target, env), value: expr(s.value, env) };
      case "expr":
        return { ...s, expr: expr(s.expr, env) };
      case "return":
        return s.value === undefined ? s : { ...s, value: expr(s.value, env) };
      case "if": {
        const cond = expr(s.cond, env);
        const then = nested(s.then, env);
        return s.else === undefined ? { ...s, cond, then } : { ...s, cond, then, else: nested(s.else, env) };
      }
      case "while": {
        const cond = expr(s.cond, env);
        return { ...s, cond, body: nested(s.body, env) };
      }
      case "loop":
        return { ...s, body: nested(s.body, env) };
      case "for_range": {
        const from = expr(s.from, env);
        const to = expr(s.to, env);
        scope.push();
        scope.declare(s.name, { type: prim(s.type), mutable: false });
        const body = stmts(s.body, env);
        scope.pop();
        return { ...s, from, to, body };
      }
      case "break":
      case "continue":
        return s;
      case "match": {
        const tag = concreteTypeOf(typeOfExpr(s.subject, env), env);
        const subject = expr(s.subject, env);
        const arms = s.arms.map((arm) => {
          scope.push();
          if (arm.pattern.kind === "variant" && tag?.kind === "tag") {
            const variantName = arm.pattern.variant;
            const variant = tag.variants.find((v) => v.name === variantName);
            for (const b of arm.pattern.bindings) {
              const field = variant?.fields.find((f) => f.name === b.field);
              if (field) scope.declare(b.name, { type: field.type, mutable: false });
            }
          }
          const body = stmts(arm.body, env);
          scope.pop();
          return { ...arm, body };
        });
        return { ...s, subject, arms };
      }
      case "block":
        return { ...s, body: nested(s.body, s.lowLevel && !env.lowLevel ? { ...env, lowLevel: true } : env) };
    }
  };

  return stmts(fn.body, root);
}

/** Visits one body in evaluation order, keeping local bindings in scope for the hooks. */
export function walkFunctionBody(module: MonomorphizedModule, fn: FunctionBody, hooks: BodyHooks): void {
  mapFunctionBody(module, fn, hooks);
}
