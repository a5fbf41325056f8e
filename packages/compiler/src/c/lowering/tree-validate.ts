import {
  ASSIGN_OPS,
  BINARY_OPS,
  isPrimName,
  SCENARIOS,
  UNARY_OPS,
} from "../../tree.js";
import type {
  AssignOp,
  BinaryOp,
  BindingIntent,
  Decl,
  EnumMemberDecl,
  Expr,
  FieldDecl,
  FieldInit,
  FieldVisibility,
  IncludeDecl,
  MatchArm,
  MatchPattern,
  MethodDecl,
  Param,
  PatternBinding,
  PrimName,
  ProgramFragment,
  SourceLoc,
  Stmt,
  TypeRef,
  UnaryOp,
  VariantDecl,
} from "../../tree.js";
import { fail } from "../diagnostics.js";
import { isCIdentifier } from "./common.js";
import { isIntegerPrim } from "./type-lowering.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

const INTENTS: readonly BindingIntent[] = ["read", "mutate", "move", "address"];
const FLOAT_TYPES: readonly ("float" | "double")[] = ["float", "double"];
const VISIBILITIES: readonly FieldVisibility[] = ["public", "private"];
const METHOD_KINDS: readonly MethodDecl["kind"][] = ["static", "instance"];
const INT_LITERAL = /^-?(0[xX][0-9a-fA-F]+|[0-9]+)$/;
const FLOAT_LITERAL = /^-?[0-9]+(\.[0-9]+)?([eE][-+]?[0-9]+)?$/;

/**
 * Reads one JSON-encoded program fragment, rejecting anything outside the
 * program-tree shape with an InvalidProgramTree diagnostic.
 */
class TreeReader {
  readonly #file: string;
  readonly #module: string;

  constructor(file: string, module: string) {
    this.#file = file;
    this.#module = module;
  }

  fail(path: string, message: string, loc?: SourceLoc): never {
    fail("CND0001", `${this.#file}: ${path}: ${message}`, { module: this.#module, loc });
  }

  record(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) this.fail(path, "must be a JSON object.");
    return value;
  }

  knownKeys(value: Record<string, unknown>, allowed: readonly string[], path: string): void {
    for (const key of Object.keys(value)) {
      if (!allowed.includes(key)) this.fail(path, `unknown key '${key}'.`);
    }
  }

  string(value: unknown, path: string): string {
    if (typeof value !== "string" || value.length === 0) this.fail(path, "must be a non-empty string.");
    return value;
  }

  text(value: unknown, path: string): string {
    if (typeof value !== "string") this.fail(path, "must be a string.");
    return value;
  }

  boolean(value: unknown, path: string, fallback?: boolean): boolean {
    if (value === undefined && fallback !== undefined) return fallback;
    if (typeof value !== "boolean") this.fail(path, "must be a boolean.");
    return value;
  }

  integer(value: unknown, path: string): number {
    if (typeof value !== "number" || !Number.isInteger(value)) this.fail(path, "must be an integer.");
    return value;
  }

  identifier(value: unknown, path: string): string {
    const name = this.string(value, path);
    if (!isCIdentifier(name) || name.startsWith("__") || name === "self") {
      this.fail(path, `'${name}' is not a usable identifier.`);
    }
    return name;
  }

  array<T>(value: unknown, path: string, read: (item: unknown, path: string) => T, optional = false): readonly T[] {
    if (value === undefined && optional) return [];
    if (!Array.isArray(value)) this.fail(path, "must be an array.");
    return value.map((item, i) => read(item, `${path}[${i}]`));
  }

  loc(value: unknown, path: string): SourceLoc | undefined {
    if (value === undefined) return undefined;
    const raw = this.record(value, path);
    this.knownKeys(raw, ["file", "line", "column"], path);
    return {
      file: this.string(raw.file, `${path}.file`),
      line: this.integer(raw.line, `${path}.line`),
      column: this.integer(raw.column, `${path}.column`),
    };
  }

  at(loc: SourceLoc | undefined): { readonly loc?: SourceLoc } {
    return loc === undefined ? {} : { loc };
  }

  include(value: unknown, path: string): IncludeDecl {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["path", "system"], path);
    return { path: this.string(raw.path, `${path}.path`), system: this.boolean(raw.system, `${path}.system`, false) };
  }

  type(value: unknown, path: string): TypeRef {
    const raw = this.record(value, path);
    const loc = this.loc(raw.loc, `${path}.loc`);
    switch (raw.kind) {
      case "prim": {
        this.knownKeys(raw, ["kind", "name", "loc"], path);
        const name = this.string(raw.name, `${path}.name`);
        if (!isPrimName(name)) this.fail(`${path}.name`, `unknown primitive '${name}'.`, loc);
        return { kind: "prim", name, ...this.at(loc) };
      }
      case "named":
        this.knownKeys(raw, ["kind", "name", "args", "loc"], path);
        return {
          kind: "named",
          name: this.identifier(raw.name, `${path}.name`),
          args: this.array(raw.args, `${path}.args`, (a, p) => this.type(a, p), true),
          ...this.at(loc),
        };
      case "param":
        this.knownKeys(raw, ["kind", "name", "loc"], path);
        return { kind: "param", name: this.identifier(raw.name, `${path}.name`), ...this.at(loc) };
      case "ptr":
      case "indirect": {
        this.knownKeys(raw, ["kind", "inner", "loc"], path);
        const inner = this.type(raw.inner, `${path}.inner`);
        return raw.kind === "ptr" ? { kind: "ptr", inner, ...this.at(loc) } : { kind: "indirect", inner, ...this.at(loc) };
      }
      default:
        this.fail(`${path}.kind`, `unknown type kind '${String(raw.kind)}'.`, loc);
    }
  }

  valueType(value: unknown, path: string): TypeRef {
    const ty = this.type(value, path);
    if (ty.kind === "prim" && ty.name === "void") this.fail(path, "'void' is not a value type.", ty.loc);
    return ty;
  }

  primName(value: unknown, path: string): PrimName {
    const name = this.string(value, path);
    if (!isPrimName(name)) this.fail(path, `unknown primitive '${name}'.`);
    return name;
  }

  fieldInit(value: unknown, path: string): FieldInit {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["name", "value", "loc"], path);
    return {
      name: this.identifier(raw.name, `${path}.name`),
      value: this.expr(raw.value, `${path}.value`),
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  exprs(value: unknown, path: string): readonly Expr[] {
    return this.array(value, path, (e, p) => this.expr(e, p), true);
  }

  expr(value: unknown, path: string): Expr {
    const raw = this.record(value, path);
    const loc = this.loc(raw.loc, `${path}.loc`);
    const keys = (...names: string[]): void => this.knownKeys(raw, ["kind", "loc", ...names], path);
    switch (raw.kind) {
      case "int": {
        keys("text", "type");
        const text = typeof raw.text === "number" ? String(raw.text) : this.string(raw.text, `${path}.text`);
        if (!INT_LITERAL.test(text)) this.fail(`${path}.text`, `'${text}' is not an integer literal.`, loc);
        const type = raw.type === undefined ? undefined : this.primName(raw.type, `${path}.type`);
        return { kind: "int", text, ...(type === undefined ? {} : { type }), ...this.at(loc) };
      }
      case "float": {
        keys("text", "type");
        const text = typeof raw.text === "number" ? String(raw.text) : this.string(raw.text, `${path}.text`);
        if (!FLOAT_LITERAL.test(text)) this.fail(`${path}.text`, `'${text}' is not a float literal.`, loc);
        const type = raw.type;
        if (type !== undefined && !oneOf(FLOAT_TYPES, type)) this.fail(`${path}.type`, "must be 'float' or 'double'.", loc);
        return { kind: "float", text, ...(type === undefined ? {} : { type }), ...this.at(loc) };
      }
      case "bool":
        keys("value");
        return { kind: "bool", value: this.boolean(raw.value, `${path}.value`), ...this.at(loc) };
      case "char": {
        keys("value");
        const ch = this.string(raw.value, `${path}.value`);
        if ([...ch].length !== 1 || (ch.codePointAt(0) ?? 0) > 0x7f) {
          this.fail(`${path}.value`, "must be a single ASCII character.", loc);
        }
        return { kind: "char", value: ch, ...this.at(loc) };
      }
      case "str":
        keys("value");
        return { kind: "str", value: this.text(raw.value, `${path}.value`), ...this.at(loc) };
      case "ident":
        keys("name");
        return { kind: "ident", name: this.identifier(raw.name, `${path}.name`), ...this.at(loc) };
      case "self":
        keys();
        return { kind: "self", ...this.at(loc) };
      case "self_field":
        keys("name");
        return { kind: "self_field", name: this.identifier(raw.name, `${path}.name`), ...this.at(loc) };
      case "field":
        keys("target", "name");
        return {
          kind: "field",
          target: this.expr(raw.target, `${path}.target`),
          name: this.identifier(raw.name, `${path}.name`),
          ...this.at(loc),
        };
      case "index":
        keys("target", "index");
        return {
          kind: "index",
          target: this.expr(raw.target, `${path}.target`),
          index: this.expr(raw.index, `${path}.index`),
          ...this.at(loc),
        };
      case "unary": {
        keys("op", "operand");
        const op = raw.op;
        if (!oneOf<UnaryOp>(UNARY_OPS, op)) this.fail(`${path}.op`, `unknown unary operator '${String(op)}'.`, loc);
        return { kind: "unary", op, operand: this.expr(raw.operand, `${path}.operand`), ...this.at(loc) };
      }
      case "binary": {
        keys("op", "left", "right");
        const op = raw.op;
        if (!oneOf<BinaryOp>(BINARY_OPS, op)) this.fail(`${path}.op`, `unknown binary operator '${String(op)}'.`, loc);
        return {
          kind: "binary",
          op,
          left: this.expr(raw.left, `${path}.left`),
          right: this.expr(raw.right, `${path}.right`),
          ...this.at(loc),
        };
      }
      case "call":
        keys("callee", "typeArgs", "args");
        return {
          kind: "call",
          callee: this.identifier(raw.callee, `${path}.callee`),
          typeArgs: this.array(raw.typeArgs, `${path}.typeArgs`, (t, p) => this.valueType(t, p), true),
          args: this.exprs(raw.args, `${path}.args`),
          ...this.at(loc),
        };
      case "static_call":
        keys("owner", "method", "args");
        return {
          kind: "static_call",
          owner: this.type(raw.owner, `${path}.owner`),
          method: this.identifier(raw.method, `${path}.method`),
          args: this.exprs(raw.args, `${path}.args`),
          ...this.at(loc),
        };
      case "method_call":
        keys("receiver", "method", "args");
        return {
          kind: "method_call",
          receiver: this.expr(raw.receiver, `${path}.receiver`),
          method: this.identifier(raw.method, `${path}.method`),
          args: this.exprs(raw.args, `${path}.args`),
          ...this.at(loc),
        };
      case "record_lit":
        keys("type", "fields");
        return {
          kind: "record_lit",
          type: this.type(raw.type, `${path}.type`),
          fields: this.array(raw.fields, `${path}.fields`, (f, p) => this.fieldInit(f, p), true),
          ...this.at(loc),
        };
      case "variant_lit":
        keys("type", "variant", "fields");
        return {
          kind: "variant_lit",
          type: this.type(raw.type, `${path}.type`),
          variant: this.identifier(raw.variant, `${path}.variant`),
          fields: this.array(raw.fields, `${path}.fields`, (f, p) => this.fieldInit(f, p), true),
          ...this.at(loc),
        };
      case "addr":
      case "deref": {
        keys("target");
        const target = this.expr(raw.target, `${path}.target`);
        return raw.kind === "addr" ? { kind: "addr", target, ...this.at(loc) } : { kind: "deref", target, ...this.at(loc) };
      }
      case "cast":
        keys("expr", "type");
        return {
          kind: "cast",
          expr: this.expr(raw.expr, `${path}.expr`),
          type: this.valueType(raw.type, `${path}.type`),
          ...this.at(loc),
        };
      default:
        this.fail(`${path}.kind`, `unknown expression kind '${String(raw.kind)}'.`, loc);
    }
  }

  stmts(value: unknown, path: string): readonly Stmt[] {
    return this.array(value, path, (s, p) => this.stmt(s, p));
  }

  binding(value: unknown, path: string): PatternBinding {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["field", "name", "loc"], path);
    return {
      field: this.identifier(raw.field, `${path}.field`),
      name: this.identifier(raw.name, `${path}.name`),
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  pattern(value: unknown, path: string): MatchPattern {
    const raw = this.record(value, path);
    const loc = this.loc(raw.loc, `${path}.loc`);
    if (raw.kind === "wild") {
      this.knownKeys(raw, ["kind", "loc"], path);
      return { kind: "wild", ...this.at(loc) };
    }
    if (raw.kind !== "variant") this.fail(`${path}.kind`, `unknown pattern kind '${String(raw.kind)}'.`, loc);
    this.knownKeys(raw, ["kind", "variant", "bindings", "loc"], path);
    return {
      kind: "variant",
      variant: this.identifier(raw.variant, `${path}.variant`),
      bindings: this.array(raw.bindings, `${path}.bindings`, (b, p) => this.binding(b, p), true),
      ...this.at(loc),
    };
  }

  arm(value: unknown, path: string): MatchArm {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["pattern", "body", "loc"], path);
    return {
      pattern: this.pattern(raw.pattern, `${path}.pattern`),
      body: this.stmts(raw.body, `${path}.body`),
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  stmt(value: unknown, path: string): Stmt {
    const raw = this.record(value, path);
    const loc = this.loc(raw.loc, `${path}.loc`);
    const keys = (...names: string[]): void => this.knownKeys(raw, ["kind", "loc", ...names], path);
    switch (raw.kind) {
      case "let":
        keys("name", "type", "mutable", "init");
        return {
          kind: "let",
          name: this.identifier(raw.name, `${path}.name`),
          type: this.valueType(raw.type, `${path}.type`),
          mutable: this.boolean(raw.mutable, `${path}.mutable`, false),
          ...(raw.init === undefined ? {} : { init: this.expr(raw.init, `${path}.init`) }),
          ...this.at(loc),
        };
      case "assign": {
        keys("target", "op", "value");
        const op = raw.op ?? "=";
        if (!oneOf<AssignOp>(ASSIGN_OPS, op)) this.fail(`${path}.op`, `unknown assignment operator '${String(op)}'.`, loc);
        return {
          kind: "assign",
          target: this.expr(raw.target, `${path}.target`),
          op,
          value: this.expr(raw.value, `${path}.value`),
          ...this.at(loc),
        };
      }
      case "expr":
        keys("expr");
        return { kind: "expr", expr: this.expr(raw.expr, `${path}.expr`), ...this.at(loc) };
      case "return":
        keys("value");
        return {
          kind: "return",
          ...(raw.value === undefined ? {} : { value: this.expr(raw.value, `${path}.value`) }),
          ...this.at(loc),
        };
      case "if":
        keys("cond", "then", "else");
        return {
          kind: "if",
          cond: this.expr(raw.cond, `${path}.cond`),
          then: this.stmts(raw.then, `${path}.then`),
          ...(raw.else === undefined ? {} : { else: this.stmts(raw.else, `${path}.else`) }),
          ...this.at(loc),
        };
      case "while":
        keys("cond", "body");
        return {
          kind: "while",
          cond: this.expr(raw.cond, `${path}.cond`),
          body: this.stmts(raw.body, `${path}.body`),
          ...this.at(loc),
        };
      case "loop":
        keys("body");
        return { kind: "loop", body: this.stmts(raw.body, `${path}.body`), ...this.at(loc) };
      case "for_range": {
        keys("name", "type", "from", "to", "inclusive", "body");
        const type = raw.type === undefined ? "int" : this.primName(raw.type, `${path}.type`);
        if (!isIntegerPrim(type)) this.fail(`${path}.type`, "range variables must have an integer type.", loc);
        return {
          kind: "for_range",
          name: this.identifier(raw.name, `${path}.name`),
          type,
          from: this.expr(raw.from, `${path}.from`),
          to: this.expr(raw.to, `${path}.to`),
          inclusive: this.boolean(raw.inclusive, `${path}.inclusive`, false),
          body: this.stmts(raw.body, `${path}.body`),
          ...this.at(loc),
        };
      }
      case "break":
        keys();
        return { kind: "break", ...this.at(loc) };
      case "continue":
        keys();
        return { kind: "continue", ...this.at(loc) };
      case "match":
        keys("subject", "arms");
        return {
          kind: "match",
          subject: this.expr(raw.subject, `${path}.subject`),
          arms: this.array(raw.arms, `${path}.arms`, (a, p) => this.arm(a, p)),
          ...this.at(loc),
        };
      case "block":
        keys("lowLevel", "body");
        return {
          kind: "block",
          lowLevel: this.boolean(raw.lowLevel, `${path}.lowLevel`, false),
          body: this.stmts(raw.body, `${path}.body`),
          ...this.at(loc),
        };
      default:
        this.fail(`${path}.kind`, `unknown statement kind '${String(raw.kind)}'.`, loc);
    }
  }

  param(value: unknown, path: string): Param {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["name", "type", "intent", "loc"], path);
    const intent = raw.intent ?? "read";
    if (!oneOf(INTENTS, intent)) this.fail(`${path}.intent`, `unknown binding intent '${String(intent)}'.`);
    return {
      name: this.identifier(raw.name, `${path}.name`),
      type: this.valueType(raw.type, `${path}.type`),
      intent,
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  params(value: unknown, path: string): readonly Param[] {
    const params = this.array(value, path, (p, pp) => this.param(p, pp), true);
    const seen = new Set<string>();
    for (const [i, p] of params.entries()) {
      if (seen.has(p.name)) this.fail(`${path}[${i}].name`, `duplicate parameter '${p.name}'.`, p.loc);
      seen.add(p.name);
    }
    return params;
  }

  fieldDecl(value: unknown, path: string): FieldDecl {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["name", "type", "vis", "loc"], path);
    const vis = raw.vis ?? "public";
    if (!oneOf(VISIBILITIES, vis)) this.fail(`${path}.vis`, "must be 'public' or 'private'.");
    return {
      name: this.identifier(raw.name, `${path}.name`),
      type: this.valueType(raw.type, `${path}.type`),
      vis,
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  fields(value: unknown, path: string): readonly FieldDecl[] {
    const fields = this.array(value, path, (f, p) => this.fieldDecl(f, p), true);
    const seen = new Set<string>();
    for (const [i, f] of fields.entries()) {
      if (seen.has(f.name)) this.fail(`${path}[${i}].name`, `duplicate field '${f.name}'.`, f.loc);
      seen.add(f.name);
    }
    return fields;
  }

  method(value: unknown, path: string): MethodDecl {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["name", "kind", "mutatesReceiver", "params", "ret", "body", "lowLevel", "typeParams", "loc"], path);
    const loc = this.loc(raw.loc, `${path}.loc`);
    if (raw.typeParams !== undefined && (!Array.isArray(raw.typeParams) || raw.typeParams.length > 0)) {
      this.fail(`${path}.typeParams`, "methods cannot declare their own type parameters.", loc);
    }
    const kind = raw.kind ?? "instance";
    if (!oneOf(METHOD_KINDS, kind)) this.fail(`${path}.kind`, "must be 'static' or 'instance'.", loc);
    const mutatesReceiver = this.boolean(raw.mutatesReceiver, `${path}.mutatesReceiver`, false);
    if (kind === "static" && mutatesReceiver) this.fail(`${path}.mutatesReceiver`, "static methods have no receiver.", loc);
    return {
      name: this.identifier(raw.name, `${path}.name`),
      kind,
      mutatesReceiver,
      params: this.params(raw.params, `${path}.params`),
      ret: this.type(raw.ret, `${path}.ret`),
      lowLevel: this.boolean(raw.lowLevel, `${path}.lowLevel`, false),
      ...(raw.body === undefined ? {} : { body: this.stmts(raw.body, `${path}.body`) }),
      ...this.at(loc),
    };
  }

  variant(value: unknown, path: string): VariantDecl {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["name", "value", "fields", "loc"], path);
    return {
      name: this.identifier(raw.name, `${path}.name`),
      fields: this.fields(raw.fields, `${path}.fields`),
      ...(raw.value === undefined ? {} : { value: this.integer(raw.value, `${path}.value`) }),
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  enumMember(value: unknown, path: string): EnumMemberDecl {
    const raw = this.record(value, path);
    this.knownKeys(raw, ["name", "value", "loc"], path);
    return {
      name: this.identifier(raw.name, `${path}.name`),
      ...(raw.value === undefined ? {} : { value: this.integer(raw.value, `${path}.value`) }),
      ...this.at(this.loc(raw.loc, `${path}.loc`)),
    };
  }

  typeParams(value: unknown, path: string): readonly string[] {
    return this.array(value, path, (t, p) => this.identifier(t, p), true);
  }

  methods(value: unknown, path: string): readonly MethodDecl[] {
    return this.array(value, path, (m, p) => this.method(m, p), true);
  }

  decl(value: unknown, path: string): Decl {
    const raw = this.record(value, path);
    const loc = this.loc(raw.loc, `${path}.loc`);
    const keys = (...names: string[]): void => this.knownKeys(raw, ["kind", "name", "loc", ...names], path);
    const name = this.identifier(raw.name, `${path}.name`);
    switch (raw.kind) {
      case "record":
        keys("typeParams", "fields", "methods");
        return {
          kind: "record",
          name,
          typeParams: this.typeParams(raw.typeParams, `${path}.typeParams`),
          fields: this.fields(raw.fields, `${path}.fields`),
          methods: this.methods(raw.methods, `${path}.methods`),
          ...this.at(loc),
        };
      case "tag": {
        keys("typeParams", "variants", "methods");
        const variants = this.array(raw.variants, `${path}.variants`, (v, p) => this.variant(v, p), true);
        const seen = new Set<string>();
        for (const [i, v] of variants.entries()) {
          if (seen.has(v.name)) this.fail(`${path}.variants[${i}].name`, `duplicate variant '${v.name}'.`, v.loc);
          seen.add(v.name);
        }
        return {
          kind: "tag",
          name,
          typeParams: this.typeParams(raw.typeParams, `${path}.typeParams`),
          variants,
          methods: this.methods(raw.methods, `${path}.methods`),
          ...this.at(loc),
        };
      }
      case "enum": {
        keys("members");
        const members = this.array(raw.members, `${path}.members`, (m, p) => this.enumMember(m, p));
        const seen = new Set<string>();
        for (const [i, m] of members.entries()) {
          if (seen.has(m.name)) this.fail(`${path}.members[${i}].name`, `duplicate member '${m.name}'.`, m.loc);
          seen.add(m.name);
        }
        return { kind: "enum", name, members, ...this.at(loc) };
      }
      case "fn": {
        keys("typeParams", "params", "ret", "body", "lowLevel", "header");
        const params = this.params(raw.params, `${path}.params`);
        const ret = this.type(raw.ret, `${path}.ret`);
        if (name === "main") {
          const retOk = ret.kind === "prim" && (ret.name === "int" || ret.name === "void");
          if (params.length > 0 || !retOk) this.fail(path, "'main' takes no parameters and returns int or void.", loc);
        }
        return {
          kind: "fn",
          name,
          typeParams: this.typeParams(raw.typeParams, `${path}.typeParams`),
          params,
          ret,
          lowLevel: this.boolean(raw.lowLevel, `${path}.lowLevel`, false),
          ...(raw.body === undefined ? {} : { body: this.stmts(raw.body, `${path}.body`) }),
          ...(raw.header === undefined ? {} : { header: this.include(raw.header, `${path}.header`) }),
          ...this.at(loc),
        };
      }
      case "alias":
        keys("target");
        return { kind: "alias", name, target: this.valueType(raw.target, `${path}.target`), ...this.at(loc) };
      case "global":
        keys("type", "mutable", "init");
        return {
          kind: "global",
          name,
          type: this.valueType(raw.type, `${path}.type`),
          mutable: this.boolean(raw.mutable, `${path}.mutable`, false),
          init: this.expr(raw.init, `${path}.init`),
          ...this.at(loc),
        };
      default:
        this.fail(`${path}.kind`, `unknown declaration kind '${String(raw.kind)}'.`, loc);
    }
  }
}

/** Validates and reads one JSON fragment. `module` labels diagnostics raised before the fragment names itself. */
export function readProgramFragment(value: unknown, file: string, module: string): ProgramFragment {
  const reader: TreeReader = new TreeReader(file, module);
  const root = reader.record(value, "fragment");
  reader.knownKeys(root, ["module", "scenario", "includes", "imports", "decls"], "fragment");
  const scenario = root.scenario;
  if (scenario !== undefined && !oneOf(SCENARIOS, scenario)) {
    reader.fail("fragment.scenario", "must be 'compiled' or 'interpreted'.");
  }
  return {
    module: reader.string(root.module, "fragment.module"),
    ...(scenario === undefined ? {} : { scenario }),
    file,
    includes: reader.array(root.includes, "fragment.includes", (i, p) => reader.include(i, p), true),
    imports: reader.array(root.imports, "fragment.imports", (i, p) => reader.string(i, p), true),
    decls: reader.array(root.decls, "fragment.decls", (d, p) => reader.decl(d, p)),
  };
}
