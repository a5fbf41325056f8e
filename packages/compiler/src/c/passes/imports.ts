import type { Decl, TypeRef } from "../../tree.js";
import { fail } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import type {
  ClassifiedSignature,
  ConcreteFn,
  ConcreteGlobal,
  ConcreteType,
  EnumLayout,
  LayoutPlan,
  LoweredFunction,
  LoweredModule,
  ModuleUnit,
  MonomorphizedModule,
  OwnershipModel,
  TypeLayout,
} from "./contracts.js";
import { InstantiationTable } from "./instantiations.js";

/** What a compiled module offers the modules that import it. */
export type ModuleInterface = {
  readonly module: string;
  readonly unit: ModuleUnit;
  readonly imports: ImportScope;
  readonly mono: MonomorphizedModule;
  readonly plan: LayoutPlan;
  readonly model: OwnershipModel;
  readonly lowered: LoweredModule;
  readonly instantiations: InstantiationTable;
};

export type ImportedDecl = {
  readonly decl: Decl;
  readonly from: ModuleInterface;
};

/**
 * The compiled modules one module imports. Source names resolve against the
 * direct imports only; concrete names (types, layouts, C symbols) resolve
 * against every module reachable through them, since an imported signature may
 * mention a type its own module imported.
 */
export class ImportScope {
  readonly #importer: string;
  readonly #direct: readonly ModuleInterface[];
  readonly #all: readonly ModuleInterface[];
  readonly #seed: InstantiationTable;

  constructor(importer: string, direct: readonly ModuleInterface[]) {
    this.#importer = importer;
    this.#direct = Object.freeze([...direct]);
    const all: ModuleInterface[] = [];
    const visit = (m: ModuleInterface): void => {
      if (all.some((seen) => seen.module === m.module)) return;
      all.push(m);
      for (const dep of m.imports.direct) visit(dep);
    };
    for (const m of direct) visit(m);
    this.#all = Object.freeze(all);
    this.#seed = this.#visibleInstantiations();
  }

  static empty(): ImportScope {
    return new ImportScope("", []);
  }

  get direct(): readonly ModuleInterface[] {
    return this.#direct;
  }

  /**
   * A fresh table holding every instantiation the imported headers already
   * define, so the importer refers to them instead of generating them again.
   */
  seedInstantiations(): InstantiationTable {
    const table = new InstantiationTable();
    for (const entry of this.#seed.entries()) table.adopt(entry, { module: this.#importer });
    return table;
  }

  /** A top-level declaration of a directly imported module. */
  decl(name: string, site: DiagnosticSite): ImportedDecl | undefined {
    const hits = this.#direct.filter((m) => m.unit.declsByName.has(name));
    const [first, second] = hits;
    if (first && second) {
      fail("CND5001", `'${name}' is declared by both module '${first.module}' and module '${second.module}'.`, site);
    }
    const decl = first?.unit.declsByName.get(name);
    return first && decl ? { decl, from: first } : undefined;
  }

  type(name: string): ConcreteType | undefined {
    return this.#find((m) => m.mono.typesByName.get(name));
  }

  layout(name: string): TypeLayout | undefined {
    return this.#find((m) => m.plan.layouts.get(name));
  }

  enumLayout(name: string): EnumLayout | undefined {
    return this.#find((m) => m.plan.enums.get(name));
  }

  fn(name: string): ConcreteFn | undefined {
    return this.#find((m) => m.mono.functionsByName.get(name));
  }

  global(name: string): ConcreteGlobal | undefined {
    return this.#find((m) => m.mono.globalsByName.get(name));
  }

  /** The expanded target of an alias declared by `module`. */
  alias(module: string, name: string): TypeRef | undefined {
    return this.#all.find((m) => m.module === module)?.mono.aliases.find((a) => a.name === name)?.target;
  }

  signature(key: string): ClassifiedSignature | undefined {
    return this.#find((m) => m.model.signatures.get(key));
  }

  lowered(symbol: string): LoweredFunction | undefined {
    return this.#find((m) => m.lowered.functionsBySymbol.get(symbol));
  }

  #find<T>(pick: (m: ModuleInterface) => T | undefined): T | undefined {
    for (const m of this.#all) {
      const hit = pick(m);
      if (hit !== undefined) return hit;
    }
    return undefined;
  }

  /** Two reachable headers defining one instantiation would define the same struct twice. */
  #visibleInstantiations(): InstantiationTable {
    const table = new InstantiationTable();
    const site: DiagnosticSite = { module: this.#importer };
    for (const m of this.#all) {
      for (const entry of m.instantiations.entries()) {
        const seen = table.lookup(entry.key);
        if (seen && seen.module !== entry.module) {
          fail(
            "CND5002",
            `Module '${this.#importer}' sees instantiation '${entry.key}' generated by both module '${seen.module}' and module '${entry.module}'.`,
            { ...site, symbol: entry.name }
          );
        }
        table.adopt(entry, site);
      }
    }
    return table;
  }
}
