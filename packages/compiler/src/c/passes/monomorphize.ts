import { locOf } from "../../tree.js";
import type {
  AliasDecl,
  Decl,
  Expr,
  FieldDecl,
  FieldInit,
  FnDecl,
  MethodDecl,
  Param,
  RecordDecl,
  SourceLoc,
  Stmt,
  TagDecl,
  TypeRef,
} from "../../tree.js";
import { fail, siteAt } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { typeKey } from "../lowering/type-lowering.js";
import { asReadonlyMap, deepFreeze, freezeReadonlyArray } from "./contracts.js";
import type {
  ConcreteAlias,
  ConcreteEnum,
  ConcreteFn,
  ConcreteGlobal,
  ConcreteType,
  InstantiationOrigin,
  ModuleUnit,
  MonomorphizedModule,
} from "./contracts.js";
import { ImportScope } from "./imports.js";
import type { ModuleInterface } from "./imports.js";
import { instantiationKey } from "./instantiations.js";
import type { InstantiationEntry, InstantiationTable } from "./instantiations.js";

type GenericDecl = RecordDecl | TagDecl | FnDecl;

/** The module whose names a declaration's body resolves against; `from` is unset for the module being compiled. */
type Home = {
  readonly unit: ModuleUnit;
  readonly imports: ImportScope;
  readonly from?: ModuleInterface;
};

type Resolved = {
  readonly decl: Decl;
  readonly home: Home;
};

/** One generic on the chain of expansions that led to the current declaration. */
type ChainLink = {
  readonly base: string;
  readonly depth: number;
};

type Scope = {
  readonly subst: ReadonlyMap<string, TypeRef>;
  readonly chain: readonly ChainLink[];
  readonly site: DiagnosticSite;
  readonly home: Home;
};

type Pending = {
  readonly entry: InstantiationEntry;
  readonly decl: GenericDecl;
  readonly chain: readonly ChainLink[];
  readonly home: Home;
};

const NO_SUBST: ReadonlyMap<string, TypeRef> = new Map();

class Monomorphizer {
  readonly #unit: ModuleUnit;
  readonly #table: InstantiationTable;
  readonly #imports: ImportScope;
  readonly #home: Home;
  readonly #queue: Pending[] = [];
  readonly #order: string[] = [];
  readonly #types = new Map<string, ConcreteType>();
  readonly #fns = new Map<string, ConcreteFn>();
  readonly #enums: ConcreteEnum[] = [];
  readonly #aliases: ConcreteAlias[] = [];
  readonly #globals: ConcreteGlobal[] = [];
  readonly #aliasStack: string[] = [];

  constructor(unit: ModuleUnit, table: InstantiationTable, imports: ImportScope) {
    this.#unit = unit;
    this.#table = table;
    this.#imports = imports;
    this.#home = { unit, imports };
  }

  run(): MonomorphizedModule {
    const module = this.#unit.module;
    for (const decl of this.#unit.decls) {
      const root: Scope = {
        subst: NO_SUBST,
        chain: [],
        site: { module, symbol: decl.name, ...locOf(decl) },
        home: this.#home,
      };
      switch (decl.kind) {
        case "record":
        case "tag":
        case "fn":
          if (decl.typeParams.length > 0) continue;
          this.#order.push(decl.name);
          this.#build(decl, decl.name, undefined, root);
          break;
        case "enum":
          this.#enums.push({ kind: "enum", name: decl.name, members: decl.members, ...locOf(decl) });
          break;
        case "alias":
          this.#aliases.push({ kind: "alias", name: decl.name, target: this.#alias(decl, root), ...locOf(decl) });
          break;
        case "global":
          this.#globals.push({
            kind: "global",
            name: decl.name,
            type: this.#type(decl.type, root),
            mutable: decl.mutable,
            init: this.#expr(decl.init, root),
            ...locOf(decl),
          });
          break;
      }
    }

    // FIFO: an instantiation is expanded after everything requested before it.
    for (let next = this.#queue.shift(); next !== undefined; next = this.#queue.shift()) {
      const { entry, decl, chain, home } = next;
      const subst = new Map<string, TypeRef>();
      decl.typeParams.forEach((p, i) => {
        const arg = entry.args[i];
        if (arg !== undefined) subst.set(p, arg);
      });
      const origin: InstantiationOrigin = { key: entry.key, base: entry.base, args: entry.args };
      this.#build(decl, entry.name, origin, { subst, chain, site: { module, symbol: entry.name, ...locOf(decl) }, home });
    }

    const types: ConcreteType[] = [];
    const functions: ConcreteFn[] = [];
    for (const name of this.#order) {
      const ty = this.#types.get(name);
      if (ty) types.push(ty);
      const fn = this.#fns.get(name);
      if (fn) functions.push(fn);
    }

    return deepFreeze({
      module,
      unit: this.#unit,
      types: freezeReadonlyArray(types),
      functions: freezeReadonlyArray(functions),
      aliases: freezeReadonlyArray(this.#aliases),
      globals: freezeReadonlyArray(this.#globals),
      order: freezeReadonlyArray(this.#order),
      typesByName: asReadonlyMap(new Map(types.map((t): [string, ConcreteType] => [t.name, t]))),
      enums: freezeReadonlyArray(this.#enums),
      enumsByName: asReadonlyMap(new Map(this.#enums.map((e): [string, ConcreteEnum] => [e.name, e]))),
      functionsByName: asReadonlyMap(new Map(functions.map((f): [string, ConcreteFn] => [f.name, f]))),
      globalsByName: asReadonlyMap(new Map(this.#globals.map((g): [string, ConcreteGlobal] => [g.name, g]))),
      imports: this.#imports,
    });
  }

  #build(decl: GenericDecl, name: string, origin: InstantiationOrigin | undefined, scope: Scope): void {
    const from = origin === undefined ? {} : { origin };
    switch (decl.kind) {
      case "record":
        this.#types.set(name, {
          kind: "record",
          name,
          ...from,
          fields: decl.fields.map((f) => this.#field(f, scope)),
          methods: decl.methods.map((m) => this.#method(name, m, scope)),
          ...locOf(decl),
        });
        return;
      case "tag":
        this.#types.set(name, {
          kind: "tag",
          name,
          ...from,
          variants: decl.variants.map((v) => ({ ...v, fields: v.fields.map((f) => this.#field(f, scope)) })),
          methods: decl.methods.map((m) => this.#method(name, m, scope)),
          ...locOf(decl),
        });
        return;
      case "fn":
        this.#fns.set(name, {
          kind: "fn",
          name,
          ...from,
          params: decl.params.map((p) => this.#param(p, scope)),
          ret: this.#type(decl.ret, scope),
          ...(decl.body === undefined ? {} : { body: this.#stmts(decl.body, scope) }),
          lowLevel: decl.lowLevel,
          ...(decl.header === undefined ? {} : { header: decl.header }),
          ...locOf(decl),
        });
        return;
    }
  }

  #field(f: FieldDecl, scope: Scope): FieldDecl {
    return { ...f, type: this.#type(f.type, scope) };
  }

  #param(p: Param, scope: Scope): Param {
    return { ...p, type: this.#type(p.type, scope) };
  }

  #method(owner: string, m: MethodDecl, scope: Scope): MethodDecl {
    const inner: Scope = { ...scope, site: { module: scope.site.module, symbol: `${owner}::${m.name}`, ...locOf(m) } };
    return {
      ...m,
      params: m.params.map((p) => this.#param(p, inner)),
      ret: this.#type(m.ret, inner),
      ...(m.body === undefined ? {} : { body: this.#stmts(m.body, inner) }),
    };
  }

  #alias(decl: AliasDecl, scope: Scope): TypeRef {
    if (this.#aliasStack.includes(decl.name)) {
      const path = [...this.#aliasStack, decl.name].join(" -> ");
      fail("CND2003", `Alias '${decl.name}' refers to itself (${path}).`, siteAt(scope.site, decl.loc));
    }
    this.#aliasStack.push(decl.name);
    try {
      return this.#type(decl.target, { ...scope, subst: NO_SUBST });
    } finally {
      this.#aliasStack.pop();
    }
  }

  #type(t: TypeRef, scope: Scope): TypeRef {
    switch (t.kind) {
      case "prim":
      case "enum":
        return t;
      case "param": {
        const bound = scope.subst.get(t.name);
        if (bound === undefined) {
          fail("CND2001", `Type parameter '${t.name}' is not bound in this context.`, siteAt(scope.site, t.loc));
        }
        return bound;
      }
      case "ptr":
        return { ...t, inner: this.#type(t.inner, scope) };
      case "indirect":
        return { ...t, inner: this.#type(t.inner, scope) };
      case "named":
        return this.#named(t, scope);
    }
  }

  #named(t: TypeRef & { readonly kind: "named" }, scope: Scope): TypeRef {
    const here = siteAt(scope.site, t.loc);
    const found = this.#resolve(t.name, scope.home, here);
    if (found === undefined) fail("CND0003", `Unknown type '${t.name}'.`, here);
    const { decl, home } = found;
    if (decl.kind === "alias") {
      if (t.args.length > 0) fail("CND2002", `Alias '${t.name}' takes no type arguments.`, here);
      if (home.from === undefined) return this.#alias(decl, scope);
      const target = this.#imports.alias(home.from.module, decl.name);
      if (target === undefined) {
        fail("CND0004", `Alias '${t.name}' of module '${home.from.module}' was not expanded.`, here);
      }
      return target;
    }
    if (decl.kind === "enum") {
      if (t.args.length > 0) fail("CND2002", `Enum '${t.name}' takes no type arguments.`, here);
      return { kind: "enum", name: decl.name, ...locOf(t) };
    }
    if (decl.kind !== "record" && decl.kind !== "tag") fail("CND0003", `'${t.name}' is a ${decl.kind}, not a type.`, here);
    const args = t.args.map((a) => this.#type(a, scope));
    if (args.length !== decl.typeParams.length) {
      fail(
        "CND2002",
        `Type '${t.name}' expects ${decl.typeParams.length} type argument(s), got ${args.length}.`,
        here
      );
    }
    if (args.length === 0) return { kind: "named", name: t.name, args: [], ...locOf(t) };
    const entry = this.#instantiate(decl, args, scope, t.loc, home);
    return { kind: "named", name: entry.name, args: [], ...locOf(t) };
  }

  /** Declarations of `home` first, then those of the modules it imports. */
  #resolve(name: string, home: Home, site: DiagnosticSite): Resolved | undefined {
    const local = home.unit.declsByName.get(name);
    if (local) return { decl: local, home };
    const imported = home.imports.decl(name, site);
    if (imported === undefined) return undefined;
    const { from } = imported;
    return { decl: imported.decl, home: { unit: from.unit, imports: from.imports, from } };
  }

  /** Reuses an instantiation already generated here or by an imported module; otherwise queues a new one. */
  #instantiate(
    decl: GenericDecl,
    args: readonly TypeRef[],
    scope: Scope,
    loc: SourceLoc | undefined,
    home: Home
  ): InstantiationEntry {
    const key = instantiationKey(decl.name, args);
    const known = this.#table.lookup(key);
    if (known) return known;

    const here = siteAt(scope.site, loc);
    const depth = Math.max(0, ...args.map((a) => this.#depth(a)));
    if (scope.chain.some((link) => link.base === decl.name && link.depth < depth)) {
      fail("CND2003", `Instantiating '${key}' grows its own type arguments on every expansion.`, here);
    }
    const { entry } = this.#table.request(
      { base: decl.name, args, kind: decl.kind === "fn" ? "fn" : "type", module: this.#unit.module },
      here
    );
    if (this.#unit.declsByName.has(entry.name)) {
      fail("CND5002", `Instantiation '${key}' is named '${entry.name}', which is already declared.`, here);
    }
    this.#order.push(entry.name);
    this.#queue.push({ entry, decl, chain: [...scope.chain, { base: decl.name, depth }], home });
    return entry;
  }

  /** Structural depth of a concrete type, counting pointer levels and instantiations. */
  #depth(t: TypeRef): number {
    switch (t.kind) {
      case "prim":
      case "param":
      case "enum":
        return 0;
      case "ptr":
      case "indirect":
        return 1 + this.#depth(t.inner);
      case "named": {
        const origin = this.#table.byName(t.name);
        if (!origin) return 0;
        return 1 + Math.max(0, ...origin.args.map((a) => this.#depth(a)));
      }
    }
  }

  #methodsOf(name: string, scope: Scope): readonly MethodDecl[] | undefined {
    const origin = this.#table.byName(name);
    const decl = this.#resolve(origin ? origin.base : name, scope.home, scope.site)?.decl;
    if (decl?.kind === "record" || decl?.kind === "tag") return decl.methods;
    return this.#imports.type(name)?.methods;
  }

  #stmts(body: readonly Stmt[], scope: Scope): readonly Stmt[] {
    return body.map((s) => this.#stmt(s, scope));
  }

  #stmt(s: Stmt, scope: Scope): Stmt {
    switch (s.kind) {
      case "let": {
        const type = this.#type(s.type, scope);
        return s.init === undefined ? { ...s, type } : { ...s, type, init: this.#expr(s.init, scope) };
      }
      case "assign":
        return { ...s, target: this.#expr(s.target, scope), value: this.#expr(s.value, scope) };
      case "expr":
        return { ...s, expr: this.#expr(s.expr, scope) };
      case "return":
        return s.value === undefined ? s : { ...s, value: this.#expr(s.value, scope) };
      case "if": {
        const cond = this.#expr(s.cond, scope);
        const then = this.#stmts(s.then, scope);
        return s.else === undefined ? { ...s, cond, then } : { ...s, cond, then, else: this.#stmts(s.else, scope) };
      }
      case "while":
        return { ...s, cond: this.#expr(s.cond, scope), body: this.#stmts(s.body, scope) };
      case "loop":
        return { ...s, body: this.#stmts(s.body, scope) };
      case "for_range":
        return {
          ...s,
          from: this.#expr(s.from, scope),
          to: this.#expr(s.to, scope),
          body: this.#stmts(s.body, scope),
        };
      case "break":
      case "continue":
        return s;
      case "match":
        return {
          ...s,
          subject: this.#expr(s.subject, scope),
          arms: s.arms.map((arm) => ({ ...arm, body: this.#stmts(arm.body, scope) })),
        };
      case "block":
        return { ...s, body: this.#stmts(s.body, scope) };
    }
  }

  #inits(fields: readonly FieldInit[], scope: Scope): readonly FieldInit[] {
    return fields.map((f) => ({ ...f, value: this.#expr(f.value, scope) }));
  }

  #exprs(items: readonly Expr[], scope: Scope): readonly Expr[] {
    return items.map((e) => this.#expr(e, scope));
  }

  #expr(e: Expr, scope: Scope): Expr {
    switch (e.kind) {
      case "int":
      case "float":
      case "bool":
      case "char":
      case "str":
      case "ident":
      case "self":
      case "self_field":
        return e;
      case "field":
        return { ...e, target: this.#expr(e.target, scope) };
      case "index":
        return { ...e, target: this.#expr(e.target, scope), index: this.#expr(e.index, scope) };
      case "unary":
        return { ...e, operand: this.#expr(e.operand, scope) };
      case "binary":
        return { ...e, left: this.#expr(e.left, scope), right: this.#expr(e.right, scope) };
      case "call":
        return this.#call(e, scope);
      case "static_call":
        return this.#staticCall(e, scope);
      case "method_call":
        return { ...e, receiver: this.#expr(e.receiver, scope), args: this.#exprs(e.args, scope) };
      case "record_lit":
        return { ...e, type: this.#type(e.type, scope), fields: this.#inits(e.fields, scope) };
      case "variant_lit":
        return { ...e, type: this.#type(e.type, scope), fields: this.#inits(e.fields, scope) };
      case "addr":
        return { ...e, target: this.#expr(e.target, scope) };
      case "deref":
        return { ...e, target: this.#expr(e.target, scope) };
      case "cast":
        return { ...e, expr: this.#expr(e.expr, scope), type: this.#type(e.type, scope) };
    }
  }

  #call(e: Expr & { readonly kind: "call" }, scope: Scope): Expr {
    const here = siteAt(scope.site, e.loc);
    const found = this.#resolve(e.callee, scope.home, here);
    const decl = found?.decl;
    if (found === undefined || decl === undefined || decl.kind !== "fn") {
      fail("CND0003", `Unknown function '${e.callee}'.`, here);
    }
    const typeArgs = e.typeArgs.map((a) => this.#type(a, scope));
    if (typeArgs.length !== decl.typeParams.length) {
      fail(
        "CND2002",
        `Function '${e.callee}' expects ${decl.typeParams.length} type argument(s), got ${typeArgs.length}.`,
        here
      );
    }
    const args = this.#exprs(e.args, scope);
    if (typeArgs.length === 0) return { ...e, args };
    const entry = this.#instantiate(decl, typeArgs, scope, e.loc, found.home);
    return { ...e, callee: entry.name, typeArgs: [], args };
  }

  #staticCall(e: Expr & { readonly kind: "static_call" }, scope: Scope): Expr {
    const here = siteAt(scope.site, e.loc);
    const owner = this.#type(e.owner, scope);
    const methods = owner.kind === "named" ? this.#methodsOf(owner.name, scope) : undefined;
    if (owner.kind !== "named" || methods === undefined) {
      fail("CND0003", `Static call target '${typeKey(owner)}' is not a record or tag.`, here);
    }
    const method = methods.find((m) => m.name === e.method);
    if (method === undefined) fail("CND0003", `Type '${owner.name}' has no method '${e.method}'.`, here);
    if (method.kind !== "static") {
      fail("CND0001", `'${owner.name}::${e.method}' is an instance method and needs a receiver.`, here);
    }
    return { ...e, owner, args: this.#exprs(e.args, scope) };
  }
}

/**
 * Resolves every type reference of `unit` to a concrete type, generating one
 * declaration per distinct generic instantiation through `instantiations`.
 * Names `unit` does not declare resolve through `imports`. Imported
 * non-generic declarations are referred to by name, and instantiations
 * already in the table are not generated again.
 */
export function monomorphizeModule(
  unit: ModuleUnit,
  instantiations: InstantiationTable,
  imports: ImportScope = ImportScope.empty()
): MonomorphizedModule {
  return new Monomorphizer(unit, instantiations, imports).run();
}
