export type * from "./tree.js";
export { BINARY_OPS, ASSIGN_OPS, PRIM_NAMES, SCENARIOS, UNARY_OPS, isPrimName } from "./tree.js";
export { call, field, ident, indirect, intLit, named, param, prim, ptr, typeParam } from "./tree.js";

export type { CompilerConfig } from "./config.js";
export { CONFIG_FILE_NAME, loadCompilerConfig, parseCompilerConfig } from "./config.js";

export type { Diagnostic, DiagnosticDomain, DiagnosticKind, DiagnosticSite } from "./c/diagnostics.js";
export {
  COMPILER_DIAGNOSTIC_CODES,
  CompileError,
  assertCompilerDiagnosticCode,
  compilerDiagnosticDomain,
  compilerDiagnosticKind,
} from "./c/diagnostics.js";

export type { CompileOptions, CompileOutput, CompileProgramOptions, CompileRun } from "./c/host.js";
export { compileModuleToC, compileProgramToC, compileUnitWithRun, createCompileRun } from "./c/host.js";
export type { ModuleResult, WorkspaceOptions, WorkspaceOutput } from "./c/workspace.js";
export { compileWorkspaceToC } from "./c/workspace.js";
export type { WrittenArtifacts } from "./c/artifacts.js";
export { writeModuleArtifacts } from "./c/artifacts.js";

export type { FragmentSource } from "./c/passes/fragment-source.js";
export { FileFragmentSource, InMemoryFragmentSource, fragmentFileName } from "./c/passes/fragment-source.js";
export { assembleModule } from "./c/passes/assemble.js";
export type { InstantiationEntry } from "./c/passes/instantiations.js";
export { InstantiationTable, instantiationKey, mergeInstantiationTables } from "./c/passes/instantiations.js";
export type { ImportedDecl, ModuleInterface } from "./c/passes/imports.js";
export { ImportScope } from "./c/passes/imports.js";
export { monomorphizeModule } from "./c/passes/monomorphize.js";
export { computeLayouts, validateAdtUses } from "./c/passes/adt-layout.js";
export type { OwnershipOptions } from "./c/passes/ownership.js";
export { DEFAULT_SMALL_SIZE_LIMIT, buildOwnershipModel } from "./c/passes/ownership.js";
export { lowerMethods } from "./c/passes/method-lowering.js";
export { lowerBodies } from "./c/passes/body-lowering.js";
export type { HeaderGuardStyle, ModuleArtifacts } from "./c/passes/declaration-emission.js";
export { emitModuleFiles } from "./c/passes/declaration-emission.js";
export type {
  BindingStrategy,
  ClassifiedSignature,
  EnumLayout,
  LayoutPlan,
  LoweredModule,
  ModuleUnit,
  MonomorphizedModule,
  OwnershipModel,
  ParamBinding,
  TypeLayout,
} from "./c/passes/contracts.js";
export type { SymbolEntry, SymbolKind } from "./c/symbols.js";
export { SymbolTable, mergeSymbolTables } from "./c/symbols.js";
export { readProgramFragment } from "./c/lowering/tree-validate.js";
