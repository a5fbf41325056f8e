import { prim, ptr } from "../../tree.js";
import type { Expr, SourceLoc, Stmt, TypeRef } from "../../tree.js";
import { fail, siteAt } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { binaryExpr, callExpr, fieldExpr, identExpr, numberExpr } from "../ir.js";
import type { CExpr, CItem, CStmt, CSwitchCase, CType } from "../ir.js";
import { fieldOf, LocalScope, lookupGlobal } from "../lowering/expr-types.js";
import type { TypeEnv } from "../lowering/expr-types.js";
import { isPointerLike, lowerTypeToC, systemHeadersForType, typeKey } from "../lowering/type-lowering.js";
import { enumLayoutOf, matchLayoutOf, planMatch, tagLayoutOf } from "./adt-layout.js";
import type { MatchBranch } from "./adt-layout.js";
import type { ConcreteGlobal, LayoutPlan, LoweredFunction, LoweredModule, MonomorphizedModule } from "./contracts.js";
import { cSignature } from "./method-lowering.js";

export type BodyLoweringContext = {
  readonly module: MonomorphizedModule;
  readonly plan: LayoutPlan;
  readonly lowered: LoweredModule;
};

export type LoweredBodies = {
  readonly functions: readonly CItem[];
  readonly globals: readonly CItem[];
  /** System headers the bodies and global definitions need beyond those of the declarations. */
  readonly systemHeaders: readonly string[];
};

type Local = {
  readonly type: TypeRef;
  readonly cName: string;
  /** The C variable holds the address of the value. */
  readonly indirect: boolean;
};

/** A lowered expression: statements that must run first, then the C expression and what it denotes. */
type Lowered = {
  readonly pre: readonly CStmt[];
  readonly expr: CExpr;
  readonly type: TypeRef;
  readonly place: boolean;
  readonly indirect: boolean;
};

type MatchStmt = Stmt & { readonly kind: "match" };

const BREAK: CStmt = { kind: "break" };

const BOOL_RESULT_OPS: ReadonlySet<string> = new Set(["==", "!=", "<", "<=", ">", ">=", "&&", "||"]);

function valueOf(l: Lowered): CExpr {
  return l.indirect ? { kind: "deref", expr: l.expr } : l.expr;
}

function rvalue(expr: CExpr, type: TypeRef, pre: readonly CStmt[] = []): Lowered {
  return { pre, expr, type, place: false, indirect: false };
}

export function floatLiteralText(text: string, type: "float" | "double" | undefined): string {
  const withPoint = /[.eE]/.test(text) ? text : `${text}.0`;
  return type === "float" ? `${withPoint}f` : withPoint;
}

class BodyLowerer {
  readonly #ctx: BodyLoweringContext;
  readonly #site: DiagnosticSite;
  readonly #scope = new LocalScope<Local>();
  readonly #used = new Set<string>();
  readonly #headers: Set<string>;
  readonly #voidMain: boolean;
  #temps = 0;

  constructor(ctx: BodyLoweringContext, site: DiagnosticSite, headers: Set<string>, fn?: LoweredFunction) {
    this.#ctx = ctx;
    this.#site = site;
    this.#headers = headers;
    this.#voidMain = fn !== undefined && fn.symbol === "main" && fn.params.length === 0 && typeKey(fn.ret.type) === "void";
    for (const p of fn?.params ?? []) {
      this.#used.add(p.name);
      this.#scope.declare(p.name, { type: p.type, cName: p.name, indirect: p.storage === "indirect" });
    }
  }

  lowerBody(body: readonly Stmt[]): readonly CStmt[] {
    const out = this.#stmts(body);
    if (this.#voidMain && out[out.length - 1]?.kind !== "return") out.push({ kind: "return", expr: numberExpr("0") });
    return out;
  }

  lowerConstant(init: Expr, name: string): CExpr {
    const offending = nonConstantPart(init);
    if (offending) {
      fail(
        "CND0001",
        `The initializer of global '${name}' is not a constant expression ('${offending.kind}').`,
        this.#at(offending)
      );
    }
    return valueOf(this.#expr(init));
  }

  #at(node: { readonly loc?: SourceLoc }): DiagnosticSite {
    return siteAt(this.#site, node.loc);
  }

  #env(): TypeEnv {
    const { module } = this.#ctx;
    return {
      module,
      site: this.#site,
      lookup: (name) => this.#scope.lookup(name)?.type ?? lookupGlobal(module, name)?.type,
    };
  }

  #cType(ty: TypeRef): CType {
    systemHeadersForType(ty, this.#headers);
    return lowerTypeToC(ty);
  }

  #temp(purpose: string): string {
    const name = `__${purpose}${this.#temps}`;
    this.#temps += 1;
    return name;
  }

  /** The C name for a new local; redeclaring a name in the same block gets a numbered name. */
  #localName(name: string): string {
    if (!this.#scope.declaredHere(name)) {
      this.#used.add(name);
      return name;
    }
    let n = 1;
    while (this.#used.has(`${name}_${n}`)) n += 1;
    const renamed = `${name}_${n}`;
    this.#used.add(renamed);
    return renamed;
  }

  #nested(body: readonly Stmt[]): CStmt[] {
    this.#scope.push();
    const out = this.#stmts(body);
    this.#scope.pop();
    return out;
  }

  #stmts(body: readonly Stmt[]): CStmt[] {
    const out: CStmt[] = [];
    for (const s of body) out.push(...this.#stmt(s));
    return out;
  }

  #stmt(s: Stmt): readonly CStmt[] {
    switch (s.kind) {
      case "let": {
        const init = s.init === undefined ? undefined : this.#expr(s.init);
        const type = this.#cType(s.type);
        const cName = this.#localName(s.name);
        this.#scope.declare(s.name, { type: s.type, cName, indirect: false });
        if (!init) return [{ kind: "decl", type, name: cName }];
        return [...init.pre, { kind: "decl", type, name: cName, init: valueOf(init) }];
      }
      case "assign": {
        const target = this.#expr(s.target);
        const value = this.#expr(s.value);
        if (!target.place && !target.indirect) fail("CND0001", "The left side of an assignment is not a place.", this.#at(s));
        return [...target.pre, ...value.pre, { kind: "assign", target: valueOf(target), op: s.op, expr: valueOf(value) }];
      }
      case "expr": {
        const l = this.#expr(s.expr);
        return [...l.pre, { kind: "expr", expr: l.expr }];
      }
      case "return": {
        if (s.value === undefined) return [this.#voidMain ? { kind: "return", expr: numberExpr("0") } : { kind: "return" }];
        const l = this.#expr(s.value);
        return [...l.pre, { kind: "return", expr: valueOf(l) }];
      }
      case "if": {
        const cond = this.#expr(s.cond);
        const then = this.#nested(s.then);
        const stmt: CStmt =
          s.else === undefined
            ? { kind: "if", cond: valueOf(cond), then }
            : { kind: "if", cond: valueOf(cond), then, else: this.#nested(s.else) };
        return [...cond.pre, stmt];
      }
      case "while": {
        const cond = this.#expr(s.cond);
        const body = this.#nested(s.body);
        if (cond.pre.length === 0) return [{ kind: "while", cond: valueOf(cond), body }];
        const exit: CStmt = { kind: "if", cond: { kind: "unary", op: "!", expr: valueOf(cond) }, then: [{ kind: "break" }] };
        return [{ kind: "for", body: [...cond.pre, exit, ...body] }];
      }
      case "loop":
        return [{ kind: "for", body: this.#nested(s.body) }];
      case "for_range":
        return this.#forRange(s);
      case "break":
        return [{ kind: "break" }];
      case "continue":
        return [{ kind: "continue" }];
      case "match":
        return this.#match(s);
      case "block":
        return [{ kind: "block", body: this.#nested(s.body) }];
    }
  }

  #forRange(s: Stmt & { readonly kind: "for_range" }): readonly CStmt[] {
    const counter = prim(s.type);
    const type = this.#cType(counter);
    const from = this.#expr(s.from);
    const to = this.#expr(s.to);
    const pre: CStmt[] = [...from.pre, ...to.pre];
    let bound = valueOf(to);
    if (s.to.kind !== "int") {
      const end = this.#temp("end");
      pre.push({ kind: "decl", type, name: end, init: bound });
      bound = identExpr(end);
    }
    this.#scope.push();
    const cName = this.#localName(s.name);
    this.#scope.declare(s.name, { type: counter, cName, indirect: false });
    const body = this.#stmts(s.body);
    this.#scope.pop();
    return [
      ...pre,
      {
        kind: "for",
        init: { kind: "decl", type, name: cName, init: valueOf(from) },
        cond: binaryExpr(s.inclusive ? "<=" : "<", identExpr(cName), bound),
        step: { kind: "postfix", op: "++", expr: identExpr(cName) },
        body,
      },
    ];
  }

  /** `l.name`, `l->name` or `(*l)->name`, depending on how `l` reaches the value. */
  #member(l: Lowered, name: string): CExpr {
    const pointer = isPointerLike(l.type);
    if (l.indirect) return fieldExpr(pointer ? { kind: "deref", expr: l.expr } : l.expr, name, true);
    return fieldExpr(l.expr, name, pointer);
  }

  #match(s: MatchStmt): readonly CStmt[] {
    const subject = this.#expr(s.subject);
    const tag = matchLayoutOf(this.#ctx.module, this.#ctx.plan, subject.type);
    if (!tag) fail("CND0001", `Match subject of type '${typeKey(subject.type)}' is not a tag or enum.`, this.#at(s));
    const plan = planMatch(tag, s, this.#site);

    const pre: CStmt[] = [...subject.pre];
    const hoist = !subject.place && !subject.indirect ? this.#temp("match") : undefined;
    if (hoist) pre.push({ kind: "decl", type: this.#cType(subject.type), name: hoist, init: valueOf(subject) });
    const subj: Lowered = hoist
      ? { pre: [], expr: identExpr(hoist), type: subject.type, place: true, indirect: false }
      : subject;
    const tagExpr = tag.kind === "enum" ? valueOf(subj) : this.#member(subj, "tag");

    const arm = (branch: MatchBranch): CStmt[] => {
      this.#scope.push();
      const out: CStmt[] = [];
      const variant = branch.variant;
      if (variant) {
        for (const b of branch.bindings) {
          const cName = this.#localName(b.name);
          this.#scope.declare(b.name, { type: b.field.type, cName, indirect: false });
          const payload = fieldExpr(fieldExpr(this.#member(subj, "as"), variant.name), b.field.name);
          out.push({ kind: "decl", type: this.#cType(b.field.type), name: cName, init: payload });
        }
      }
      out.push(...this.#stmts(branch.body));
      this.#scope.pop();
      return out;
    };
    const arms = plan.branches.map((branch) => ({ branch, body: arm(branch) }));

    if (!plan.exitsLoop) {
      const cases = arms.map(({ branch, body }): CSwitchCase => {
        const last = body[body.length - 1];
        const closed = last?.kind === "return" ? body : [...body, BREAK];
        return branch.variant ? { label: branch.variant.constant, body: closed } : { body: closed };
      });
      return [...pre, { kind: "switch", expr: tagExpr, cases }];
    }

    const only = arms.length === 1 ? arms[0] : undefined;
    if (only && !only.branch.variant) return [...pre, { kind: "block", body: only.body }];
    let tail: readonly CStmt[] | undefined;
    for (const { branch, body } of [...arms].reverse()) {
      if (!branch.variant) {
        tail = body;
        continue;
      }
      const cond = binaryExpr("==", tagExpr, identExpr(branch.variant.constant));
      tail = [tail ? { kind: "if", cond, then: body, else: tail } : { kind: "if", cond, then: body }];
    }
    return [...pre, ...(tail ?? [])];
  }

  #address(l: Lowered): { readonly pre: readonly CStmt[]; readonly expr: CExpr } {
    if (l.indirect) return { pre: l.pre, expr: l.expr };
    if (l.place) return { pre: l.pre, expr: { kind: "addr", expr: l.expr } };
    const name = this.#temp("tmp");
    return {
      pre: [...l.pre, { kind: "decl", type: this.#cType(l.type), name, init: l.expr }],
      expr: { kind: "addr", expr: identExpr(name) },
    };
  }

  #expr(e: Expr): Lowered {
    switch (e.kind) {
      case "int":
        return rvalue(numberExpr(e.text), prim(e.type ?? "int"));
      case "float":
        return rvalue(numberExpr(floatLiteralText(e.text, e.type)), prim(e.type ?? "double"));
      case "bool":
        this.#headers.add("stdbool.h");
        return rvalue({ kind: "bool", value: e.value }, prim("bool"));
      case "char":
        return rvalue({ kind: "char", value: e.value }, prim("char"));
      case "str":
        return rvalue({ kind: "string", value: e.value }, prim("str"));
      case "ident": {
        const local = this.#scope.lookup(e.name);
        if (local) return { pre: [], expr: identExpr(local.cName), type: local.type, place: true, indirect: local.indirect };
        const global = lookupGlobal(this.#ctx.module, e.name);
        if (!global) fail("CND0003", `Unknown name '${e.name}'.`, this.#at(e));
        return { pre: [], expr: identExpr(global.name), type: global.type, place: true, indirect: false };
      }
      case "field": {
        const target = this.#expr(e.target);
        const field = fieldOf(target.type, e.name, this.#env(), this.#at(e));
        return {
          pre: target.pre,
          expr: this.#member(target, e.name),
          type: field.type,
          place: target.place || target.indirect || isPointerLike(target.type),
          indirect: false,
        };
      }
      case "index": {
        const target = this.#expr(e.target);
        const index = this.#expr(e.index);
        const elem =
          target.type.kind === "ptr" || target.type.kind === "indirect"
            ? target.type.inner
            : target.type.kind === "prim" && target.type.name === "str"
              ? prim("char")
              : undefined;
        if (!elem) fail("CND0001", `Values of type '${typeKey(target.type)}' cannot be indexed.`, this.#at(e));
        return {
          pre: [...target.pre, ...index.pre],
          expr: { kind: "index", expr: valueOf(target), index: valueOf(index) },
          type: elem,
          place: true,
          indirect: false,
        };
      }
      case "unary": {
        const operand = this.#expr(e.operand);
        const type = e.op === "!" ? prim("bool") : operand.type;
        return rvalue({ kind: "unary", op: e.op, expr: valueOf(operand) }, type, operand.pre);
      }
      case "binary":
        return this.#binary(e);
      case "call":
        return this.#call(e);
      case "record_lit": {
        const fields = e.fields.map((f) => ({ name: f.name, value: this.#expr(f.value) }));
        return rvalue(
          {
            kind: "compound",
            type: this.#cType(e.type),
            inits: fields.map((f) => ({ designator: f.name, expr: valueOf(f.value) })),
          },
          e.type,
          fields.flatMap((f) => f.value.pre)
        );
      }
      case "variant_lit": {
        if (e.type.kind === "enum") {
          const member = enumLayoutOf(this.#ctx.module, this.#ctx.plan, e.type.name)?.variantsByName.get(e.variant);
          if (!member) fail("CND0003", `'${e.type.name}' has no member '${e.variant}'.`, this.#at(e));
          return rvalue(identExpr(member.constant), e.type);
        }
        const tag = tagLayoutOf(this.#ctx.module, this.#ctx.plan, e.type);
        const variant = tag?.variantsByName.get(e.variant);
        if (!variant) fail("CND0003", `'${typeKey(e.type)}' has no variant '${e.variant}'.`, this.#at(e));
        const fields = e.fields.map((f) => ({ name: f.name, value: this.#expr(f.value) }));
        return rvalue(
          {
            kind: "compound",
            type: this.#cType(e.type),
            inits: [
              { designator: "tag", expr: identExpr(variant.constant) },
              ...fields.map((f) => ({ designator: `as.${variant.name}.${f.name}`, expr: valueOf(f.value) })),
            ],
          },
          e.type,
          fields.flatMap((f) => f.value.pre)
        );
      }
      case "addr": {
        const target = this.#expr(e.target);
        const { pre, expr } = this.#address(target);
        return rvalue(expr, ptr(target.type), pre);
      }
      case "deref": {
        const target = this.#expr(e.target);
        if (target.type.kind !== "ptr" && target.type.kind !== "indirect") {
          fail("CND0001", `Cannot dereference a value of type '${typeKey(target.type)}'.`, this.#at(e));
        }
        return { pre: target.pre, expr: { kind: "deref", expr: valueOf(target) }, type: target.type.inner, place: true, indirect: false };
      }
      case "cast": {
        const inner = this.#expr(e.expr);
        return rvalue({ kind: "cast", type: this.#cType(e.type), expr: valueOf(inner) }, e.type, inner.pre);
      }
      case "self":
      case "self_field":
      case "static_call":
      case "method_call":
        return fail("CND0004", `'${e.kind}' reached body lowering; methods must be lowered first.`, this.#at(e));
    }
  }

  #binary(e: Expr & { readonly kind: "binary" }): Lowered {
    const left = this.#expr(e.left);
    const right = this.#expr(e.right);
    const type = BOOL_RESULT_OPS.has(e.op) ? prim("bool") : left.type;
    if ((e.op === "&&" || e.op === "||") && right.pre.length > 0) {
      // The right side has statements of its own, so it may only run when it decides the result.
      const name = this.#temp("cond");
      const flag = identExpr(name);
      const guard: CExpr = e.op === "&&" ? flag : { kind: "unary", op: "!", expr: flag };
      return rvalue(flag, type, [
        ...left.pre,
        { kind: "decl", type: this.#cType(type), name, init: valueOf(left) },
        { kind: "if", cond: guard, then: [...right.pre, { kind: "assign", target: flag, op: "=", expr: valueOf(right) }] },
      ]);
    }
    if (type.kind === "prim" && type.name === "bool") this.#headers.add("stdbool.h");
    return rvalue(binaryExpr(e.op, valueOf(left), valueOf(right)), type, [...left.pre, ...right.pre]);
  }

  #call(e: Expr & { readonly kind: "call" }): Lowered {
    const fn = this.#ctx.lowered.functionsBySymbol.get(e.callee) ?? this.#ctx.module.imports.lowered(e.callee);
    if (!fn) fail("CND0003", `Unknown function '${e.callee}'.`, this.#at(e));
    if (e.args.length !== fn.params.length) {
      fail("CND0001", `'${fn.key}' takes ${fn.params.length} argument(s), got ${e.args.length}.`, this.#at(e));
    }
    const pre: CStmt[] = [];
    const args: CExpr[] = [];
    e.args.forEach((arg, i) => {
      const binding = fn.params[i];
      if (!binding) return;
      const l = this.#expr(arg);
      const byAddress =
        binding.storage === "indirect" && !(binding.intent === "receiver" && isPointerLike(l.type));
      if (!byAddress) {
        pre.push(...l.pre);
        args.push(valueOf(l));
        return;
      }
      const { pre: before, expr } = this.#address(l);
      pre.push(...before);
      args.push(expr);
    });
    return rvalue(callExpr(fn.symbol, args), fn.ret.type, pre);
  }
}

/** The first subexpression that C does not accept in a file-scope initializer. */
function nonConstantPart(e: Expr): Expr | undefined {
  switch (e.kind) {
    case "int":
    case "float":
    case "bool":
    case "char":
    case "str":
      return undefined;
    case "unary":
      return nonConstantPart(e.operand);
    case "binary":
      return nonConstantPart(e.left) ?? nonConstantPart(e.right);
    case "cast":
      return nonConstantPart(e.expr);
    case "record_lit":
    case "variant_lit":
      for (const f of e.fields) {
        const inner = nonConstantPart(f.value);
        if (inner) return inner;
      }
      return undefined;
    default:
      return e;
  }
}

function globalItem(ctx: BodyLoweringContext, g: ConcreteGlobal, headers: Set<string>): CItem {
  const site: DiagnosticSite = { module: ctx.module.module, symbol: g.name, ...(g.loc ? { loc: g.loc } : {}) };
  const init = new BodyLowerer(ctx, site, headers).lowerConstant(g.init, g.name);
  systemHeadersForType(g.type, headers);
  return { kind: "global", type: lowerTypeToC(g.type), name: g.name, extern: false, const: !g.mutable, init };
}

/**
 * Lowers every function body and global initializer of a module into C
 * statements. Functions without a body are provided elsewhere and produce no
 * definition.
 */
export function lowerBodies(ctx: BodyLoweringContext): LoweredBodies {
  const headers = new Set<string>();
  const globals = ctx.module.globals.map((g) => globalItem(ctx, g, headers));
  const functions: CItem[] = [];
  for (const fn of ctx.lowered.functions) {
    if (!fn.body) continue;
    const site: DiagnosticSite = { module: ctx.module.module, symbol: fn.key, ...(fn.loc ? { loc: fn.loc } : {}) };
    const body = new BodyLowerer(ctx, site, headers, fn).lowerBody(fn.body);
    functions.push({ kind: "fn", sig: cSignature(fn), body });
  }
  return {
    functions: Object.freeze(functions),
    globals: Object.freeze(globals),
    systemHeaders: Object.freeze([...headers].sort()),
  };
}
