import type { Scenario } from "../tree.js";
import { assembleModule } from "./passes/assemble.js";
import type { FragmentSource } from "./passes/fragment-source.js";
import { computeLayouts, validateAdtUses } from "./passes/adt-layout.js";
import { lowerBodies } from "./passes/body-lowering.js";
import type { ModuleUnit } from "./passes/contracts.js";
import { emitModuleFiles } from "./passes/declaration-emission.js";
import type { HeaderGuardStyle, ModuleArtifacts } from "./passes/declaration-emission.js";
import { ImportScope } from "./passes/imports.js";
import type { ModuleInterface } from "./passes/imports.js";
import type { InstantiationTable } from "./passes/instantiations.js";
import { lowerMethods } from "./passes/method-lowering.js";
import { monomorphizeModule } from "./passes/monomorphize.js";
import { buildOwnershipModel, DEFAULT_SMALL_SIZE_LIMIT } from "./passes/ownership.js";
import { SymbolTable } from "./symbols.js";

export { CompileError } from "./diagnostics.js";
export type { Diagnostic, DiagnosticKind, DiagnosticSite } from "./diagnostics.js";

export type CompileOptions = {
  /** Largest by-value size, in bytes, passed as a copy. */
  readonly smallSizeLimit?: number;
  readonly headerGuard?: HeaderGuardStyle;
  /** Receives one line per pass. */
  readonly trace?: (line: string) => void;
};

/**
 * The state one compilation run owns. Each table is written by exactly one
 * pass and read by the rest; a run is created per module and discarded after.
 */
export type CompileRun = {
  readonly instantiations: InstantiationTable;
  readonly symbols: SymbolTable;
  readonly imports: ImportScope;
  readonly options: CompileOptions;
};

export type CompileOutput = {
  readonly module: string;
  readonly scenario: Scenario;
  readonly artifacts: ModuleArtifacts;
  readonly instantiations: InstantiationTable;
  readonly symbols: SymbolTable;
  /** Handed to the modules that import this one. */
  readonly exports: ModuleInterface;
};

export type CompileProgramOptions = CompileOptions & {
  readonly module: string;
  readonly scenario: Scenario;
  readonly source: FragmentSource;
};

/** A fresh run; its instantiation table starts with those the imported modules already generated. */
export function createCompileRun(options: CompileOptions = {}, imports: ImportScope = ImportScope.empty()): CompileRun {
  return Object.freeze({
    instantiations: imports.seedInstantiations(),
    symbols: new SymbolTable(),
    imports,
    options,
  });
}

function traceLine(run: CompileRun, module: string, pass: string, detail: string): void {
  run.options.trace?.(`cinder: ${module}: ${pass} ${detail}`);
}

/** Runs every pass after assembly against an explicit run context. */
export function compileUnitWithRun(unit: ModuleUnit, run: CompileRun): CompileOutput {
  const name = unit.module;

  // Phase 1: resolve types and generate one declaration per generic instantiation.
  const module = monomorphizeModule(unit, run.instantiations, run.imports);
  traceLine(
    run,
    name,
    "monomorphize",
    `types=${module.types.length} functions=${module.functions.length} instantiations=${run.instantiations.size}`
  );

  // Phase 2: compute record/tag layouts and check matches and literals against them.
  const plan = computeLayouts(module);
  validateAdtUses(module, plan);
  traceLine(run, name, "layout", `types=${plan.order.length}`);

  // Phase 3: classify every binding and check bodies against the classification.
  const model = buildOwnershipModel(module, plan, {
    smallSizeLimit: run.options.smallSizeLimit ?? DEFAULT_SMALL_SIZE_LIMIT,
  });
  traceLine(run, name, "ownership", `signatures=${model.signatures.size}`);

  // Phase 4: turn methods into free functions and desugar receiver access.
  const lowered = lowerMethods(module, model, run.symbols);
  traceLine(run, name, "methods", `functions=${lowered.functions.length}`);

  // Phase 5: lower bodies and global initializers to C statements.
  const bodies = lowerBodies({ module, plan, lowered });
  traceLine(run, name, "bodies", `functions=${bodies.functions.length} globals=${bodies.globals.length}`);

  // Phase 6: render the declarations and definitions artifacts.
  const artifacts = emitModuleFiles({
    module,
    plan,
    lowered,
    bodies,
    symbols: run.symbols,
    scenario: unit.scenario,
    headerGuard: run.options.headerGuard ?? "pragma",
  });
  traceLine(run, name, "emit", `${artifacts.headerName} ${artifacts.sourceName}`);

  return Object.freeze({
    module: name,
    scenario: unit.scenario,
    artifacts,
    instantiations: run.instantiations,
    symbols: run.symbols,
    exports: Object.freeze({
      module: name,
      unit,
      imports: run.imports,
      mono: module,
      plan,
      model,
      lowered,
      instantiations: run.instantiations,
    }),
  });
}

export function compileModuleToC(unit: ModuleUnit, options: CompileOptions = {}): CompileOutput {
  return compileUnitWithRun(unit, createCompileRun(options));
}

/** Assembles the module's fragments for one scenario, then compiles the result. */
export function compileProgramToC(opts: CompileProgramOptions): CompileOutput {
  const { module, scenario, source, ...options } = opts;
  const unit = assembleModule(module, scenario, source);
  options.trace?.(`cinder: ${module}: assemble fragments=${unit.fragments.length}`);
  return compileModuleToC(unit, options);
}
