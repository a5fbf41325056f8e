import type { TypeRef } from "../../tree.js";
import { fail } from "../diagnostics.js";
import type { DiagnosticSite } from "../diagnostics.js";
import { mangleGenericName, typeKey } from "../lowering/type-lowering.js";

export type InstantiationEntry = {
  readonly key: string;
  readonly base: string;
  readonly args: readonly TypeRef[];
  readonly name: string;
  readonly kind: "type" | "fn";
  readonly module: string;
};

export type InstantiationRequest = {
  readonly base: string;
  readonly args: readonly TypeRef[];
  readonly kind: "type" | "fn";
  readonly module: string;
};

export function instantiationKey(base: string, args: readonly TypeRef[]): string {
  return `${base}<${args.map(typeKey).join(",")}>`;
}

/**
 * Append-only map from `(generic, concrete arguments)` to the one generated
 * declaration name. Owned by the monomorphizer of a single compilation run.
 */
export class InstantiationTable {
  readonly #byKey = new Map<string, InstantiationEntry>();
  readonly #byName = new Map<string, InstantiationEntry>();

  get size(): number {
    return this.#byKey.size;
  }

  lookup(key: string): InstantiationEntry | undefined {
    return this.#byKey.get(key);
  }

  byName(name: string): InstantiationEntry | undefined {
    return this.#byName.get(name);
  }

  entries(): readonly InstantiationEntry[] {
    return Object.freeze([...this.#byKey.values()]);
  }

  request(req: InstantiationRequest, site: DiagnosticSite): { readonly entry: InstantiationEntry; readonly fresh: boolean } {
    const key = instantiationKey(req.base, req.args);
    const existing = this.#byKey.get(key);
    if (existing) return { entry: existing, fresh: false };
    const entry: InstantiationEntry = Object.freeze({
      key,
      base: req.base,
      args: Object.freeze([...req.args]),
      name: mangleGenericName(req.base, req.args),
      kind: req.kind,
      module: req.module,
    });
    this.#insert(entry, site);
    return { entry, fresh: true };
  }

  /**
   * Adds an entry produced by another run. Sibling modules may each generate
   * the same instantiation; the first one adopted is kept.
   */
  adopt(entry: InstantiationEntry, site: DiagnosticSite): void {
    const existing = this.#byKey.get(entry.key);
    if (existing) {
      if (existing.name !== entry.name || existing.base !== entry.base) {
        fail(
          "CND5002",
          `Instantiation '${entry.key}' is named '${existing.name}' by module '${existing.module}' and '${entry.name}' by module '${entry.module}'.`,
          { ...site, symbol: entry.name }
        );
      }
      return;
    }
    this.#insert(entry, site);
  }

  #insert(entry: InstantiationEntry, site: DiagnosticSite): void {
    const clash = this.#byName.get(entry.name);
    if (clash) {
      fail(
        "CND5002",
        `Instantiations '${clash.key}' and '${entry.key}' both mangle to '${entry.name}'.`,
        { ...site, symbol: entry.name }
      );
    }
    this.#byKey.set(entry.key, entry);
    this.#byName.set(entry.name, entry);
  }
}

/**
 * The single serialization point for tables built by independent module runs.
 * Tables are folded in the order given, so the result is deterministic.
 */
export function mergeInstantiationTables(tables: readonly InstantiationTable[]): InstantiationTable {
  const merged = new InstantiationTable();
  for (const table of tables) {
    for (const entry of table.entries()) merged.adopt(entry, { module: entry.module });
  }
  return merged;
}
