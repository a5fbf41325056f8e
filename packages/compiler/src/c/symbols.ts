import { fail } from "./diagnostics.js";
import type { DiagnosticSite } from "./diagnostics.js";
import { C_RESERVED_WORDS } from "./lowering/common.js";

/** C keeps struct/enum tags apart from every other identifier. */
export type CNamespace = "tag" | "ordinary";

export type SymbolKind = "struct" | "enum" | "enumerator" | "typedef" | "global" | "function";

export type SymbolEntry = {
  readonly namespace: CNamespace;
  readonly name: string;
  readonly kind: SymbolKind;
  readonly module: string;
  /** The C declaration text the name was introduced with. */
  readonly decl: string;
};

export function namespaceOf(kind: SymbolKind): CNamespace {
  return kind === "struct" || kind === "enum" ? "tag" : "ordinary";
}

function slot(namespace: CNamespace, name: string): string {
  return `${namespace}:${name}`;
}

/** Every C-level name one compilation run introduces. */
export class SymbolTable {
  readonly #entries = new Map<string, SymbolEntry>();

  get size(): number {
    return this.#entries.size;
  }

  define(kind: SymbolKind, name: string, decl: string, site: DiagnosticSite): SymbolEntry {
    const namespace = namespaceOf(kind);
    if (C_RESERVED_WORDS.has(name)) {
      fail("CND5001", `The ${kind} name '${name}' is reserved in C.`, { ...site, symbol: name });
    }
    const existing = this.#entries.get(slot(namespace, name));
    if (existing) {
      fail(
        "CND5001",
        `The ${kind} '${name}' collides with the ${existing.kind} '${name}' (${existing.decl}).`,
        { ...site, symbol: name }
      );
    }
    const entry: SymbolEntry = Object.freeze({ namespace, name, kind, module: site.module, decl });
    this.#entries.set(slot(namespace, name), entry);
    return entry;
  }

  lookup(namespace: CNamespace, name: string): SymbolEntry | undefined {
    return this.#entries.get(slot(namespace, name));
  }

  has(namespace: CNamespace, name: string): boolean {
    return this.#entries.has(slot(namespace, name));
  }

  entries(): readonly SymbolEntry[] {
    return Object.freeze([...this.#entries.values()]);
  }
}

/** Folds the tables of independently compiled modules; a name defined by two modules is a collision. */
export function mergeSymbolTables(tables: readonly SymbolTable[]): SymbolTable {
  const merged = new SymbolTable();
  for (const table of tables) {
    for (const entry of table.entries()) {
      const other = merged.lookup(entry.namespace, entry.name);
      if (other) {
        fail(
          "CND5002",
          `'${entry.name}' is defined by both module '${other.module}' and module '${entry.module}'.`,
          { module: entry.module, symbol: entry.name }
        );
      }
      merged.define(entry.kind, entry.name, entry.decl, { module: entry.module });
    }
  }
  return merged;
}
