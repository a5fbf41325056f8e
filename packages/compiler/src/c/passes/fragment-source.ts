import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import type { ProgramFragment, Scenario } from "../../tree.js";
import { fail } from "../diagnostics.js";
import { readProgramFragment } from "../lowering/tree-validate.js";

/** Supplies the shared fragment (`scenario` undefined) or one scenario fragment of a module. */
export type FragmentSource = {
  readonly load: (module: string, scenario: Scenario | undefined) => ProgramFragment | undefined;
};

export function scenarioSuffix(scenario: Scenario): "c" | "vm" {
  return scenario === "compiled" ? "c" : "vm";
}

export function fragmentFileName(module: string, scenario: Scenario | undefined): string {
  return scenario === undefined ? `${module}.tree.json` : `${module}.${scenarioSuffix(scenario)}.tree.json`;
}

function slotKey(module: string, scenario: Scenario | undefined): string {
  return `${module}|${scenario ?? "shared"}`;
}

export class InMemoryFragmentSource implements FragmentSource {
  readonly #fragments = new Map<string, ProgramFragment>();

  constructor(fragments: readonly ProgramFragment[]) {
    for (const f of fragments) {
      const key = slotKey(f.module, f.scenario);
      const existing = this.#fragments.get(key);
      if (existing) {
        fail("CND1002", `Fragments '${existing.file}' and '${f.file}' fill the same slot of module '${f.module}'.`, {
          module: f.module,
        });
      }
      this.#fragments.set(key, f);
    }
  }

  readonly load = (module: string, scenario: Scenario | undefined): ProgramFragment | undefined =>
    this.#fragments.get(slotKey(module, scenario));
}

/** Reads `<module>.tree.json` and `<module>.<c|vm>.tree.json` from one directory. */
export class FileFragmentSource implements FragmentSource {
  readonly #dir: string;

  constructor(dir: string) {
    this.#dir = dir;
  }

  readonly load = (module: string, scenario: Scenario | undefined): ProgramFragment | undefined => {
    const file = fragmentFileName(module, scenario);
    const path = join(this.#dir, file);
    if (!existsSync(path)) return undefined;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      fail("CND0001", `${file}: not valid JSON (${detail}).`, { module });
    }
    return readProgramFragment(raw, file, module);
  };
}
