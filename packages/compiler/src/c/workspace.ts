import type { CompilerConfig } from "../config.js";
import { CompileError, fail } from "./diagnostics.js";
import type { Diagnostic } from "./diagnostics.js";
import { compileUnitWithRun, createCompileRun } from "./host.js";
import type { CompileOutput } from "./host.js";
import { assembleModule } from "./passes/assemble.js";
import type { ModuleUnit } from "./passes/contracts.js";
import { FileFragmentSource } from "./passes/fragment-source.js";
import type { FragmentSource } from "./passes/fragment-source.js";
import { ImportScope } from "./passes/imports.js";
import type { ModuleInterface } from "./passes/imports.js";
import { InstantiationTable, mergeInstantiationTables } from "./passes/instantiations.js";
import { mergeSymbolTables, SymbolTable } from "./symbols.js";

export type WorkspaceOptions = {
  /** Defaults to the fragment files under `config.sourceDir`. */
  readonly source?: FragmentSource;
  readonly trace?: (line: string) => void;
};

export type ModuleResult =
  | { readonly module: string; readonly status: "compiled"; readonly output: CompileOutput }
  | { readonly module: string; readonly status: "failed"; readonly diagnostic: Diagnostic };

export type WorkspaceOutput = {
  /** Every configured module, each after the modules it imports. */
  readonly order: readonly string[];
  readonly results: readonly ModuleResult[];
  readonly resultsByModule: ReadonlyMap<string, ModuleResult>;
  /** Instantiations of every compiled module, merged in `order`. */
  readonly instantiations: InstantiationTable;
  readonly symbols: SymbolTable;
  readonly ok: boolean;
};

type ImportOrder = {
  readonly order: readonly string[];
  readonly cycles: ReadonlyMap<string, readonly string[]>;
};

/** Depth-first over imports in configuration order; modules on a cycle are reported with it. */
function importOrder(modules: readonly string[], importsOf: (module: string) => readonly string[]): ImportOrder {
  const order: string[] = [];
  const cycles = new Map<string, readonly string[]>();
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];

  const visit = (module: string): void => {
    const s = state.get(module);
    if (s === "done") return;
    if (s === "visiting") {
      const cycle = [...stack.slice(stack.indexOf(module)), module];
      for (const member of cycle) if (!cycles.has(member)) cycles.set(member, cycle);
      return;
    }
    state.set(module, "visiting");
    stack.push(module);
    for (const dep of importsOf(module)) if (modules.includes(dep)) visit(dep);
    stack.pop();
    state.set(module, "done");
    order.push(module);
  };

  for (const module of modules) visit(module);
  return { order, cycles };
}

type Attempt<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly diagnostic: Diagnostic };

function attempt<T>(run: () => T): Attempt<T> {
  try {
    return { ok: true, value: run() };
  } catch (e) {
    if (e instanceof CompileError) return { ok: false, diagnostic: e.toDiagnostic() };
    throw e;
  }
}

/**
 * Compiles every module named by `config`, each with its own run context, in
 * import order. A module sees the compiled declarations of the modules it
 * imports and starts from the instantiations they already generated. A
 * failure aborts only its own module and the modules that import it, directly
 * or not.
 */
export function compileWorkspaceToC(config: CompilerConfig, opts: WorkspaceOptions = {}): WorkspaceOutput {
  const source = opts.source ?? new FileFragmentSource(config.sourceDir);
  const units = new Map<string, ModuleUnit>();
  const failures = new Map<string, Diagnostic>();

  for (const module of config.modules) {
    const assembled = attempt(() => {
      const unit = assembleModule(module, config.scenario, source);
      opts.trace?.(`cinder: ${module}: assemble fragments=${unit.fragments.length}`);
      for (const dep of unit.imports) {
        if (!config.modules.includes(dep)) {
          fail("CND1004", `Module '${module}' imports '${dep}', which is not part of the workspace.`, { module });
        }
      }
      return unit;
    });
    if (assembled.ok) units.set(module, assembled.value);
    else failures.set(module, assembled.diagnostic);
  }

  const { order, cycles } = importOrder(config.modules, (m) => units.get(m)?.imports ?? []);
  let instantiations = new InstantiationTable();
  let symbols = new SymbolTable();
  const results: ModuleResult[] = [];
  const resultsByModule = new Map<string, ModuleResult>();

  const record = (result: ModuleResult): void => {
    if (result.status === "failed") opts.trace?.(`cinder: ${result.module}: failed ${result.diagnostic.code}`);
    results.push(result);
    resultsByModule.set(result.module, result);
  };

  for (const module of order) {
    const early = failures.get(module);
    if (early) {
      record({ module, status: "failed", diagnostic: early });
      continue;
    }
    const unit = units.get(module);
    if (!unit) continue;

    const compiled = attempt((): CompileOutput => {
      const cycle = cycles.get(module);
      if (cycle) fail("CND5003", `Module '${module}' is part of an import cycle: ${cycle.join(" -> ")}.`, { module });
      const direct: ModuleInterface[] = [];
      for (const dep of unit.imports) {
        const result = resultsByModule.get(dep);
        if (result?.status !== "compiled") {
          fail("CND5003", `Module '${module}' depends on '${dep}', which failed to compile.`, { module });
        }
        direct.push(result.output.exports);
      }
      const run = createCompileRun(
        {
          smallSizeLimit: config.smallSizeLimit,
          headerGuard: config.headerGuard,
          ...(opts.trace ? { trace: opts.trace } : {}),
        },
        new ImportScope(module, direct)
      );
      const output = compileUnitWithRun(unit, run);
      // Merge before anything that imports this module compiles.
      const mergedInstantiations = mergeInstantiationTables([instantiations, output.instantiations]);
      const mergedSymbols = mergeSymbolTables([symbols, output.symbols]);
      instantiations = mergedInstantiations;
      symbols = mergedSymbols;
      return output;
    });
    record(
      compiled.ok
        ? { module, status: "compiled", output: compiled.value }
        : { module, status: "failed", diagnostic: compiled.diagnostic }
    );
  }

  return Object.freeze({
    order: Object.freeze([...order]),
    results: Object.freeze(results),
    resultsByModule,
    instantiations,
    symbols,
    ok: results.every((r) => r.status === "compiled"),
  });
}
