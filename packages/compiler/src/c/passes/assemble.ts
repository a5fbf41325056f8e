import type {
  Decl,
  FnDecl,
  IncludeDecl,
  MethodDecl,
  Param,
  ProgramFragment,
  RecordDecl,
  Scenario,
  TagDecl,
  TypeRef,
} from "../../tree.js";
import { fail } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { typeKey } from "../lowering/type-lowering.js";
import { asReadonlyMap, deepFreeze, freezeReadonlyArray } from "./contracts.js";
import type { ModuleUnit } from "./contracts.js";
import type { FragmentSource } from "./fragment-source.js";

type Slot = {
  readonly decl: Decl;
  readonly file: string;
};

type Contribution<T> = {
  readonly item: T;
  readonly file: string;
};

function sameType(a: TypeRef, b: TypeRef): boolean {
  return typeKey(a) === typeKey(b);
}

function sameParams(a: readonly Param[], b: readonly Param[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((p, i) => {
    const q = b[i];
    return q !== undefined && p.name === q.name && p.intent === q.intent && sameType(p.type, q.type);
  });
}

function sameTypeParams(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((t, i) => t === b[i]);
}

function checkFragment(fragment: ProgramFragment, module: string, scenario: Scenario | undefined): void {
  if (fragment.module !== module) {
    fail("CND0001", `${fragment.file}: declares module '${fragment.module}', expected '${module}'.`, { module });
  }
  if (fragment.scenario !== scenario) {
    const want = scenario ?? "shared";
    fail("CND0001", `${fragment.file}: is a '${fragment.scenario ?? "shared"}' fragment, expected '${want}'.`, {
      module,
    });
  }
}

function mergeFn(a: Contribution<FnDecl>, b: Contribution<FnDecl>, site: DiagnosticSite): FnDecl {
  const x = a.item;
  const y = b.item;
  if (!sameTypeParams(x.typeParams, y.typeParams) || !sameParams(x.params, y.params) || !sameType(x.ret, y.ret)) {
    fail("CND1003", `Function '${x.name}' has different signatures in ${a.file} and ${b.file}.`, site);
  }
  if (x.body && y.body) {
    fail("CND1001", `Function '${x.name}' is defined in both ${a.file} and ${b.file}.`, site);
  }
  const defining = y.body ? y : x;
  const header = x.header ?? y.header;
  return header === undefined ? defining : { ...defining, header };
}

function mergeMethod(
  owner: string,
  a: Contribution<MethodDecl>,
  b: Contribution<MethodDecl>,
  site: DiagnosticSite
): MethodDecl {
  const x = a.item;
  const y = b.item;
  const here = { ...site, symbol: `${owner}::${x.name}`, loc: y.loc ?? x.loc };
  const sameShape =
    x.kind === y.kind &&
    x.mutatesReceiver === y.mutatesReceiver &&
    sameParams(x.params, y.params) &&
    sameType(x.ret, y.ret);
  if (!sameShape) {
    fail("CND1003", `Method '${owner}::${x.name}' has different signatures in ${a.file} and ${b.file}.`, here);
  }
  if (x.body && y.body) {
    fail("CND1001", `Method '${owner}::${x.name}' is defined in both ${a.file} and ${b.file}.`, here);
  }
  return y.body ? y : x;
}

function mergeMethods(
  owner: string,
  a: Contribution<readonly MethodDecl[]>,
  b: Contribution<readonly MethodDecl[]>,
  site: DiagnosticSite
): readonly MethodDecl[] {
  const out: MethodDecl[] = [...a.item];
  for (const m of b.item) {
    const at = out.findIndex((e) => e.name === m.name);
    const existing = out[at];
    if (existing === undefined) {
      out.push(m);
      continue;
    }
    out[at] = mergeMethod(owner, { item: existing, file: a.file }, { item: m, file: b.file }, site);
  }
  return out;
}

function mergeRecord(a: Contribution<RecordDecl>, b: Contribution<RecordDecl>, site: DiagnosticSite): RecordDecl {
  const x = a.item;
  const y = b.item;
  if (!sameTypeParams(x.typeParams, y.typeParams)) {
    fail("CND1003", `Record '${x.name}' has different type parameters in ${a.file} and ${b.file}.`, site);
  }
  if (x.fields.length > 0 && y.fields.length > 0) {
    fail("CND1003", `Fields of record '${x.name}' are declared in both ${a.file} and ${b.file}.`, site);
  }
  const shape = y.fields.length > 0 ? y : x;
  return {
    ...shape,
    methods: mergeMethods(x.name, { item: x.methods, file: a.file }, { item: y.methods, file: b.file }, site),
  };
}

function mergeTag(a: Contribution<TagDecl>, b: Contribution<TagDecl>, site: DiagnosticSite): TagDecl {
  const x = a.item;
  const y = b.item;
  if (!sameTypeParams(x.typeParams, y.typeParams)) {
    fail("CND1003", `Tag '${x.name}' has different type parameters in ${a.file} and ${b.file}.`, site);
  }
  if (x.variants.length > 0 && y.variants.length > 0) {
    fail("CND1003", `Variants of tag '${x.name}' are declared in both ${a.file} and ${b.file}.`, site);
  }
  const shape = y.variants.length > 0 ? y : x;
  return {
    ...shape,
    methods: mergeMethods(x.name, { item: x.methods, file: a.file }, { item: y.methods, file: b.file }, site),
  };
}

function mergeDecl(a: Slot, b: Slot, module: string): Decl {
  const x = a.decl;
  const y = b.decl;
  const site: DiagnosticSite = { module, symbol: x.name, loc: y.loc ?? x.loc };
  if (x.kind === "fn" && y.kind === "fn") return mergeFn({ item: x, file: a.file }, { item: y, file: b.file }, site);
  if (x.kind === "record" && y.kind === "record") {
    return mergeRecord({ item: x, file: a.file }, { item: y, file: b.file }, site);
  }
  if (x.kind === "tag" && y.kind === "tag") return mergeTag({ item: x, file: a.file }, { item: y, file: b.file }, site);
  if (x.kind !== y.kind) {
    fail("CND1003", `'${x.name}' is a ${x.kind} in ${a.file} but a ${y.kind} in ${b.file}.`, site);
  }
  fail("CND1001", `${x.kind} '${x.name}' is defined in both ${a.file} and ${b.file}.`, site);
}

function checkMethodScope(decl: RecordDecl | TagDecl, file: string, module: string): void {
  const seen = new Set<string>();
  for (const m of decl.methods) {
    if (seen.has(m.name)) {
      fail("CND1002", `Method '${decl.name}::${m.name}' is declared more than once in ${file}.`, {
        module,
        symbol: `${decl.name}::${m.name}`,
        loc: m.loc,
      });
    }
    seen.add(m.name);
  }
}

function includeKey(inc: IncludeDecl): string {
  return `${inc.system ? "<" : '"'}${inc.path}`;
}

/**
 * Builds the single module unit for one scenario: the scenario fragment is read
 * first, then the shared interface fragment, so scenario code may complete the
 * shared stubs. A missing scenario fragment falls back to the shared content.
 */
export function assembleModule(module: string, scenario: Scenario, source: FragmentSource): ModuleUnit {
  const scenarioFragment = source.load(module, scenario);
  const sharedFragment = source.load(module, undefined);
  if (!scenarioFragment && !sharedFragment) {
    fail("CND1004", `Module '${module}' has neither a shared nor a '${scenario}' fragment.`, { module });
  }
  if (scenarioFragment) checkFragment(scenarioFragment, module, scenario);
  if (sharedFragment) checkFragment(sharedFragment, module, undefined);
  const fragments = [scenarioFragment, sharedFragment].filter((f): f is ProgramFragment => f !== undefined);

  const order: string[] = [];
  const slots = new Map<string, Slot>();
  const includes = new Map<string, IncludeDecl>();
  const imports: string[] = [];

  for (const fragment of fragments) {
    for (const inc of fragment.includes) {
      if (!includes.has(includeKey(inc))) includes.set(includeKey(inc), inc);
    }
    for (const imp of fragment.imports) {
      if (!imports.includes(imp)) imports.push(imp);
    }

    const seenHere = new Set<string>();
    for (const decl of fragment.decls) {
      if (seenHere.has(decl.name)) {
        fail("CND1002", `'${decl.name}' is declared more than once in ${fragment.file}.`, {
          module,
          symbol: decl.name,
          loc: decl.loc,
        });
      }
      seenHere.add(decl.name);
      if (decl.kind === "record" || decl.kind === "tag") checkMethodScope(decl, fragment.file, module);

      const existing = slots.get(decl.name);
      if (!existing) {
        slots.set(decl.name, { decl, file: fragment.file });
        order.push(decl.name);
        continue;
      }
      slots.set(decl.name, { decl: mergeDecl(existing, { decl, file: fragment.file }, module), file: existing.file });
    }
  }

  const decls: Decl[] = [];
  const declsByName = new Map<string, Decl>();
  for (const name of order) {
    const slot = slots.get(name);
    if (!slot) continue;
    decls.push(slot.decl);
    declsByName.set(name, slot.decl);
  }

  return deepFreeze({
    module,
    scenario,
    fragments: freezeReadonlyArray(fragments.map((f) => f.file)),
    includes: freezeReadonlyArray([...includes.values()]),
    imports: freezeReadonlyArray(imports),
    decls: freezeReadonlyArray(decls),
    declsByName: asReadonlyMap(declsByName),
  });
}
