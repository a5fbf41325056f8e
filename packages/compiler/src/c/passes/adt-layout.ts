import type { FieldDecl, FieldInit, SourceLoc, Stmt, TypeRef } from "../../tree.js";
import { fail, siteAt } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { enumType, nameType } from "../ir.js";
import type { CItem, CStructMember } from "../ir.js";
import { exitsEnclosingLoop, functionBodies, walkFunctionBody } from "../lowering/body-walk.js";
import { tagEnumName, variantConstantName } from "../lowering/common.js";
import { concreteTypeOf, typeOfExpr } from "../lowering/expr-types.js";
import { lowerTypeToC, POINTER_SIZE, primLayout, typeKey } from "../lowering/type-lowering.js";
import { asReadonlyMap, freezeReadonlyArray } from "./contracts.js";
import type {
  ConcreteEnum,
  ConcreteRecord,
  ConcreteTag,
  ConcreteType,
  EnumLayout,
  LayoutPlan,
  MonomorphizedModule,
  TagLayout,
  TypeLayout,
  TypeLayoutInfo,
  VariantLayout,
} from "./contracts.js";

type MatchStmt = Stmt & { readonly kind: "match" };

const DISCRIMINANT: TypeLayoutInfo = { size: 4, align: 4, heap: false };

function roundUp(n: number, align: number): number {
  return Math.ceil(n / align) * align;
}

/** C struct layout of the given members in order; an empty struct holds one placeholder byte. */
function structInfo(members: readonly TypeLayoutInfo[]): TypeLayoutInfo {
  if (members.length === 0) return { size: 1, align: 1, heap: false };
  let offset = 0;
  let align = 1;
  let heap = false;
  for (const m of members) {
    offset = roundUp(offset, m.align) + m.size;
    align = Math.max(align, m.align);
    heap ||= m.heap;
  }
  return { size: roundUp(offset, align), align, heap };
}

function unionInfo(members: readonly TypeLayoutInfo[]): TypeLayoutInfo {
  let size = 0;
  let align = 1;
  let heap = false;
  for (const m of members) {
    size = Math.max(size, m.size);
    align = Math.max(align, m.align);
    heap ||= m.heap;
  }
  return { size: roundUp(size, align), align, heap };
}

/** Named types a declaration embeds by value, in field order. */
function byValueNames(ty: ConcreteType): readonly string[] {
  const fields = ty.kind === "record" ? ty.fields : ty.variants.flatMap((v) => v.fields);
  const out: string[] = [];
  for (const f of fields) {
    if (f.type.kind === "named" && !out.includes(f.type.name)) out.push(f.type.name);
  }
  return out;
}

type Numbered = {
  readonly name: string;
  readonly value?: number;
  readonly loc?: SourceLoc;
};

/** Explicit values are kept; an implicit one continues after the highest value so far. */
function assignValues<T extends Numbered>(
  members: readonly T[],
  clash: (holder: string, member: T, value: number) => string,
  site: DiagnosticSite
): readonly (T & { readonly value: number })[] {
  const taken = new Map<number, string>();
  let highest = -1;
  return members.map((m) => {
    const value = m.value ?? highest + 1;
    const holder = taken.get(value);
    if (holder !== undefined) fail("CND3002", clash(holder, m, value), siteAt(site, m.loc));
    taken.set(value, m.name);
    highest = Math.max(highest, value);
    return { ...m, value };
  });
}

function assignDiscriminants(tag: ConcreteTag, site: DiagnosticSite): readonly VariantLayout[] {
  const numbered = assignValues(
    tag.variants,
    (holder, v, value) => `Variants '${holder}' and '${v.name}' of tag '${tag.name}' share discriminant ${value}.`,
    site
  );
  return numbered.map((v) => ({
    name: v.name,
    constant: variantConstantName(tag.name, v.name),
    value: v.value,
    fields: v.fields,
    ...(v.loc ? { loc: v.loc } : {}),
  }));
}

function enumLayout(en: ConcreteEnum, site: DiagnosticSite): EnumLayout {
  if (en.members.length === 0) fail("CND3003", `Enum '${en.name}' has no members.`, site);
  const numbered = assignValues(
    en.members,
    (holder, m, value) => `Members '${holder}' and '${m.name}' of enum '${en.name}' share value ${value}.`,
    site
  );
  const variants = numbered.map(
    (m): VariantLayout => ({
      name: m.name,
      constant: variantConstantName(en.name, m.name),
      value: m.value,
      fields: [],
      ...(m.loc ? { loc: m.loc } : {}),
    })
  );
  return {
    kind: "enum",
    name: en.name,
    variants: freezeReadonlyArray(variants),
    variantsByName: asReadonlyMap(new Map(variants.map((v): [string, VariantLayout] => [v.name, v]))),
    ...DISCRIMINANT,
  };
}

class LayoutBuilder {
  readonly #module: MonomorphizedModule;
  readonly #done = new Map<string, TypeLayout>();
  readonly #visiting: string[] = [];

  constructor(module: MonomorphizedModule) {
    this.#module = module;
  }

  layoutOf(name: string, site: DiagnosticSite): TypeLayout {
    const done = this.#done.get(name);
    if (done) return done;
    const ty = this.#module.typesByName.get(name);
    if (!ty) {
      const imported = this.#module.imports.layout(name);
      if (imported) return imported;
      fail("CND0003", `Unknown type '${name}'.`, site);
    }
    const at = siteAt({ ...site, symbol: name }, ty.loc);
    if (this.#visiting.includes(name)) {
      const path = [...this.#visiting.slice(this.#visiting.indexOf(name)), name].join(" -> ");
      fail("CND3004", `'${name}' contains itself by value (${path}); reference it through 'indirect' instead.`, at);
    }
    this.#visiting.push(name);
    const layout = ty.kind === "record" ? this.#record(ty, at) : this.#tag(ty, at);
    this.#visiting.pop();
    this.#done.set(name, layout);
    return layout;
  }

  #valueInfo(ty: TypeRef, site: DiagnosticSite): TypeLayoutInfo {
    switch (ty.kind) {
      case "prim":
        return primLayout(ty.name);
      case "enum":
        return DISCRIMINANT;
      case "ptr":
      case "indirect":
        return { size: POINTER_SIZE, align: POINTER_SIZE, heap: false };
      case "named": {
        const { size, align, heap } = this.layoutOf(ty.name, site);
        return { size, align, heap };
      }
      case "param":
        return fail("CND2001", `Type parameter '${ty.name}' reached layout unresolved.`, site);
    }
  }

  #fieldsInfo(fields: readonly FieldDecl[], site: DiagnosticSite): TypeLayoutInfo {
    return structInfo(fields.map((f) => this.#valueInfo(f.type, siteAt(site, f.loc))));
  }

  #record(ty: ConcreteRecord, site: DiagnosticSite): TypeLayout {
    return { kind: "record", name: ty.name, fields: ty.fields, ...this.#fieldsInfo(ty.fields, site) };
  }

  #tag(ty: ConcreteTag, site: DiagnosticSite): TypeLayout {
    if (ty.variants.length === 0) fail("CND3003", `Tag '${ty.name}' has no variants.`, site);
    const variants = assignDiscriminants(ty, site);
    const payloads = variants.filter((v) => v.fields.length > 0).map((v) => this.#fieldsInfo(v.fields, site));
    const info = payloads.length === 0 ? DISCRIMINANT : structInfo([DISCRIMINANT, unionInfo(payloads)]);
    return {
      kind: "tag",
      name: ty.name,
      enumName: tagEnumName(ty.name),
      variants: freezeReadonlyArray(variants),
      variantsByName: asReadonlyMap(new Map(variants.map((v): [string, VariantLayout] => [v.name, v]))),
      ...info,
    };
  }
}

/**
 * Computes size, alignment and heap class of every concrete record and tag,
 * assigns tag discriminants and enum values, and orders the declarations so
 * each follows the types it embeds by value.
 */
export function computeLayouts(module: MonomorphizedModule): LayoutPlan {
  const enums = new Map<string, EnumLayout>();
  for (const en of module.enums) {
    enums.set(en.name, enumLayout(en, { module: module.module, symbol: en.name, ...(en.loc ? { loc: en.loc } : {}) }));
  }
  const builder = new LayoutBuilder(module);
  const layouts = new Map<string, TypeLayout>();
  const deps = new Map<string, readonly string[]>();
  for (const ty of module.types) {
    const site: DiagnosticSite = { module: module.module, symbol: ty.name, ...(ty.loc ? { loc: ty.loc } : {}) };
    layouts.set(ty.name, builder.layoutOf(ty.name, site));
    deps.set(ty.name, freezeReadonlyArray(byValueNames(ty)));
  }

  const order: string[] = [];
  const placed = new Set<string>();
  const place = (name: string): void => {
    if (placed.has(name)) return;
    placed.add(name);
    for (const dep of deps.get(name) ?? []) if (layouts.has(dep)) place(dep);
    order.push(name);
  };
  for (const ty of module.types) place(ty.name);

  return {
    enums: asReadonlyMap(enums),
    layouts: asReadonlyMap(layouts),
    order: freezeReadonlyArray(order),
    byValueDeps: asReadonlyMap(deps),
  };
}

export type MatchBinding = {
  readonly name: string;
  readonly field: FieldDecl;
};

export type MatchBranch = {
  /** Absent for the catch-all arm. */
  readonly variant?: VariantLayout;
  readonly bindings: readonly MatchBinding[];
  readonly body: readonly Stmt[];
  readonly loc?: SourceLoc;
};

/** What a match can switch over. */
export type MatchableLayout = TagLayout | EnumLayout;

export type MatchPlan = {
  readonly tag: MatchableLayout;
  readonly branches: readonly MatchBranch[];
  /** Some arm leaves the enclosing loop, so the match cannot become a `switch`. */
  readonly exitsLoop: boolean;
};

function missingVariant(layout: MatchableLayout, name: string): string {
  return layout.kind === "tag" ? `Tag '${layout.name}' has no variant '${name}'.` : `Enum '${layout.name}' has no member '${name}'.`;
}

/** Validates one match against its tag or enum and returns the branches in arm order. */
export function planMatch(tag: MatchableLayout, stmt: MatchStmt, site: DiagnosticSite): MatchPlan {
  const covered = new Set<string>();
  const branches: MatchBranch[] = [];
  let catchAll = false;
  for (const arm of stmt.arms) {
    const at = siteAt(site, arm.loc ?? stmt.loc);
    if (catchAll) fail("CND3003", `Arm after the catch-all arm of the match on '${tag.name}' is unreachable.`, at);
    const pattern = arm.pattern;
    if (pattern.kind === "wild") {
      catchAll = true;
      branches.push({ bindings: [], body: arm.body, ...(arm.loc ? { loc: arm.loc } : {}) });
      continue;
    }
    const variant = tag.variantsByName.get(pattern.variant);
    if (!variant) fail("CND0003", missingVariant(tag, pattern.variant), at);
    if (covered.has(variant.name)) {
      fail("CND3003", `Variant '${tag.name}::${variant.name}' is matched more than once.`, at);
    }
    covered.add(variant.name);
    const bindings = pattern.bindings.map((b): MatchBinding => {
      const field = variant.fields.find((f) => f.name === b.field);
      if (!field) {
        fail("CND0003", `Variant '${tag.name}::${variant.name}' has no field '${b.field}'.`, siteAt(at, b.loc));
      }
      return { name: b.name, field };
    });
    branches.push({ variant, bindings, body: arm.body, ...(arm.loc ? { loc: arm.loc } : {}) });
  }
  if (!catchAll) {
    const missing = tag.variants.filter((v) => !covered.has(v.name)).map((v) => v.name);
    if (missing.length > 0) {
      fail("CND3001", `Match on '${tag.name}' does not cover ${missing.join(", ")}.`, siteAt(site, stmt.loc));
    }
  }
  return { tag, branches, exitsLoop: stmt.arms.some((a) => exitsEnclosingLoop(a.body)) };
}

export function tagLayoutOf(module: MonomorphizedModule, plan: LayoutPlan, ty: TypeRef): TagLayout | undefined {
  const base = ty.kind === "ptr" || ty.kind === "indirect" ? ty.inner : ty;
  if (base.kind !== "named") return undefined;
  const layout = plan.layouts.get(base.name) ?? module.imports.layout(base.name);
  return layout?.kind === "tag" ? layout : undefined;
}

export function enumLayoutOf(module: MonomorphizedModule, plan: LayoutPlan, name: string): EnumLayout | undefined {
  return plan.enums.get(name) ?? module.imports.enumLayout(name);
}

/** The tag or enum a match on a value of type `ty` switches over. */
export function matchLayoutOf(module: MonomorphizedModule, plan: LayoutPlan, ty: TypeRef): MatchableLayout | undefined {
  return ty.kind === "enum" ? enumLayoutOf(module, plan, ty.name) : tagLayoutOf(module, plan, ty);
}

function checkInits(owner: string, fields: readonly FieldDecl[], inits: readonly FieldInit[], at: DiagnosticSite): void {
  const seen = new Set<string>();
  for (const init of inits) {
    const here = siteAt(at, init.loc);
    if (!fields.some((f) => f.name === init.name)) fail("CND0003", `'${owner}' has no field '${init.name}'.`, here);
    if (seen.has(init.name)) fail("CND0001", `Field '${init.name}' of '${owner}' is initialized twice.`, here);
    seen.add(init.name);
  }
}

/**
 * Checks every match and literal in the module against the computed layouts:
 * match subjects must be tags or enums and matches must be exhaustive; record
 * and variant literals may only name existing fields.
 */
export function validateAdtUses(module: MonomorphizedModule, plan: LayoutPlan): void {
  for (const fn of functionBodies(module)) {
    walkFunctionBody(module, fn, {
      stmt: (s, env) => {
        if (s.kind !== "match") return;
        const at = siteAt(env.site, s.loc);
        const subject = typeOfExpr(s.subject, env);
        const tag = matchLayoutOf(module, plan, subject);
        if (!tag) fail("CND0001", `Match subject of type '${typeKey(subject)}' is not a tag or enum.`, at);
        planMatch(tag, s, env.site);
      },
      expr: (e, env) => {
        const at = siteAt(env.site, e.loc);
        if (e.kind === "record_lit") {
          const ty = concreteTypeOf(e.type, env);
          if (ty?.kind !== "record") fail("CND0001", `'${typeKey(e.type)}' is not a record.`, at);
          checkInits(ty.name, ty.fields, e.fields, at);
        } else if (e.kind === "variant_lit" && e.type.kind === "enum") {
          const en = enumLayoutOf(module, plan, e.type.name);
          if (!en) fail("CND0003", `Unknown enum '${e.type.name}'.`, at);
          if (!en.variantsByName.has(e.variant)) fail("CND0003", missingVariant(en, e.variant), at);
          if (e.fields.length > 0) fail("CND0001", `Enum member '${en.name}::${e.variant}' takes no fields.`, at);
        } else if (e.kind === "variant_lit") {
          const tag = tagLayoutOf(module, plan, e.type);
          if (!tag) fail("CND0001", `'${typeKey(e.type)}' is not a tag.`, at);
          const variant = tag.variantsByName.get(e.variant);
          if (!variant) fail("CND0003", `Tag '${tag.name}' has no variant '${e.variant}'.`, at);
          checkInits(`${tag.name}::${variant.name}`, variant.fields, e.fields, at);
        }
      },
    });
  }
}

/** The `enum` and `struct` declarations of one laid-out type. */
export function layoutItems(layout: TypeLayout | EnumLayout): readonly CItem[] {
  if (layout.kind === "enum") {
    return [{ kind: "enum", name: layout.name, members: layout.variants.map((v) => ({ name: v.constant, value: v.value })) }];
  }
  const member = (f: FieldDecl): CStructMember & { readonly kind: "field" } => ({
    kind: "field",
    type: lowerTypeToC(f.type),
    name: f.name,
    ...(f.vis === "private" ? { note: "private" } : {}),
  });
  if (layout.kind === "record") {
    const members: CStructMember[] =
      layout.fields.length === 0
        ? [{ kind: "field", type: nameType("char"), name: "__empty" }]
        : layout.fields.map(member);
    return [{ kind: "struct", name: layout.name, members }];
  }
  const members: CStructMember[] = [{ kind: "field", type: enumType(layout.enumName), name: "tag" }];
  const payloads = layout.variants.filter((v) => v.fields.length > 0);
  if (payloads.length > 0) {
    members.push({
      kind: "union",
      name: "as",
      members: payloads.map((v) => ({ name: v.name, fields: v.fields.map(member) })),
    });
  }
  return [
    { kind: "enum", name: layout.enumName, members: layout.variants.map((v) => ({ name: v.constant, value: v.value })) },
    { kind: "struct", name: layout.name, members },
  ];
}
