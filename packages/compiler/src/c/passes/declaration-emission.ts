import type { IncludeDecl, Scenario, TypeRef } from "../../tree.js";
import type { DiagnosticSite } from "../diagnostics.js";
import type { CItem } from "../ir.js";
import { headerGuardMacro, moduleFileStem } from "../lowering/common.js";
import { lowerTypeToC, systemHeadersForType } from "../lowering/type-lowering.js";
import type { SymbolTable } from "../symbols.js";
import { emitItem, writeCFile } from "../write.js";
import { layoutItems } from "./adt-layout.js";
import type { LoweredBodies } from "./body-lowering.js";
import type { LayoutPlan, LoweredModule, MonomorphizedModule } from "./contracts.js";
import { cSignature } from "./method-lowering.js";

export type HeaderGuardStyle = "pragma" | "ifndef";

export type EmissionContext = {
  readonly module: MonomorphizedModule;
  readonly plan: LayoutPlan;
  readonly lowered: LoweredModule;
  readonly bodies: LoweredBodies;
  readonly symbols: SymbolTable;
  readonly scenario: Scenario;
  readonly headerGuard: HeaderGuardStyle;
};

export type ModuleArtifacts = {
  readonly module: string;
  readonly headerName: string;
  readonly sourceName: string;
  readonly header: string;
  readonly source: string;
};

function includeKey(inc: IncludeDecl): string {
  return `${inc.system ? "<" : '"'}${inc.path}`;
}

/** Named types reached through a pointer, which need a forward `struct` declaration. */
function collectPointees(ty: TypeRef, behindPointer: boolean, out: string[]): void {
  switch (ty.kind) {
    case "named":
      if (behindPointer && !out.includes(ty.name)) out.push(ty.name);
      return;
    case "ptr":
    case "indirect":
      collectPointees(ty.inner, true, out);
      return;
    default:
      return;
  }
}

function banner(ctx: EmissionContext): CItem {
  return { kind: "comment", text: `Generated by cinder from module '${ctx.module.module}' (${ctx.scenario}). Do not edit.` };
}

function usedTypes(ctx: EmissionContext): readonly TypeRef[] {
  const out: TypeRef[] = [];
  for (const name of ctx.plan.order) {
    const layout = ctx.plan.layouts.get(name);
    if (!layout) continue;
    const fields = layout.kind === "record" ? layout.fields : layout.variants.flatMap((v) => v.fields);
    for (const f of fields) out.push(f.type);
  }
  for (const fn of ctx.lowered.functions) {
    out.push(fn.ret.type);
    for (const p of fn.params) out.push(p.type);
  }
  for (const g of ctx.module.globals) out.push(g.type);
  for (const a of ctx.module.aliases) out.push(a.target);
  return out;
}

function headerItems(ctx: EmissionContext, site: DiagnosticSite): readonly CItem[] {
  const { module, plan, lowered, symbols } = ctx;
  const unit = module.unit;
  const items: CItem[] = [banner(ctx)];
  const guard = headerGuardMacro(module.module);
  if (ctx.headerGuard === "pragma") {
    items.push({ kind: "directive", text: "#pragma once" });
  } else {
    items.push({ kind: "directive", text: `#ifndef ${guard}` }, { kind: "directive", text: `#define ${guard}` });
  }

  const types = usedTypes(ctx);
  const system = new Set<string>(ctx.bodies.systemHeaders);
  for (const ty of types) systemHeadersForType(ty, system);
  const includes = new Map<string, IncludeDecl>();
  for (const path of [...system].sort()) includes.set(includeKey({ path, system: true }), { path, system: true });
  for (const inc of unit.includes) if (!includes.has(includeKey(inc))) includes.set(includeKey(inc), inc);
  for (const fn of lowered.functions) {
    if (fn.header && !includes.has(includeKey(fn.header))) includes.set(includeKey(fn.header), fn.header);
  }
  for (const dep of unit.imports) {
    const inc: IncludeDecl = { path: `${moduleFileStem(dep)}.h`, system: false };
    if (!includes.has(includeKey(inc))) includes.set(includeKey(inc), inc);
  }
  for (const inc of includes.values()) items.push({ kind: "include", path: inc.path, system: inc.system });

  const pointees: string[] = [];
  for (const ty of types) collectPointees(ty, false, pointees);
  for (const name of pointees) items.push({ kind: "forward", name });

  for (const en of plan.enums.values()) {
    const at: DiagnosticSite = { ...site, symbol: en.name };
    symbols.define("enum", en.name, `enum ${en.name}`, at);
    for (const v of en.variants) symbols.define("enumerator", v.constant, `${v.constant} = ${v.value}`, at);
    items.push(...layoutItems(en));
  }

  for (const alias of module.aliases) {
    const item: CItem = { kind: "typedef", type: lowerTypeToC(alias.target), name: alias.name };
    symbols.define("typedef", alias.name, emitItem(item).join(" "), { ...site, symbol: alias.name });
    items.push(item);
  }

  for (const name of plan.order) {
    const layout = plan.layouts.get(name);
    if (!layout) continue;
    const at: DiagnosticSite = { ...site, symbol: name };
    if (layout.kind === "tag") {
      symbols.define("enum", layout.enumName, `enum ${layout.enumName}`, at);
      for (const v of layout.variants) symbols.define("enumerator", v.constant, `${v.constant} = ${v.value}`, at);
    }
    symbols.define("struct", layout.name, `struct ${layout.name}`, at);
    items.push(...layoutItems(layout));
  }

  for (const g of module.globals) {
    const item: CItem = { kind: "global", type: lowerTypeToC(g.type), name: g.name, extern: true, const: !g.mutable };
    symbols.define("global", g.name, emitItem(item).join(" "), { ...site, symbol: g.name });
    items.push(item);
  }

  for (const fn of lowered.functions) {
    if (fn.header) continue;
    items.push({ kind: "proto", sig: cSignature(fn) });
  }

  if (ctx.headerGuard === "ifndef") items.push({ kind: "directive", text: `#endif /* ${guard} */` });
  return items;
}

/**
 * Renders the declarations artifact (`<module>.h`) and the definitions
 * artifact (`<module>.c`) of one module, registering every type, enumerator,
 * typedef and global in the symbol table on the way.
 */
export function emitModuleFiles(ctx: EmissionContext): ModuleArtifacts {
  const stem = moduleFileStem(ctx.module.module);
  const site: DiagnosticSite = { module: ctx.module.module };
  const headerName = `${stem}.h`;
  const sourceName = `${stem}.c`;
  const header = writeCFile({ kind: "file", items: headerItems(ctx, site) });
  const source = writeCFile({
    kind: "file",
    items: [
      banner(ctx),
      { kind: "include", path: headerName, system: false },
      ...ctx.bodies.globals,
      ...ctx.bodies.functions,
    ],
  });
  return Object.freeze({ module: ctx.module.module, headerName, sourceName, header, source });
}

