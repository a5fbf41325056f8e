import type { SourceLoc } from "../tree.js";

export type DiagnosticKind =
  | "InvalidProgramTree"
  | "InvalidConfig"
  | "UnknownSymbol"
  | "Internal"
  | "AssemblyConflict"
  | "MissingModule"
  | "UnresolvedGeneric"
  | "CyclicInstantiation"
  | "CyclicLayout"
  | "NonExhaustiveMatch"
  | "DiscriminantConflict"
  | "OwnershipViolation"
  | "SymbolCollision"
  | "DependencyFailed";

export type DiagnosticDomain = "input" | "assembly" | "generics" | "layout" | "ownership" | "emission" | "other";

const KIND_BY_CODE: ReadonlyMap<string, DiagnosticKind> = new Map<string, DiagnosticKind>([
  ["CND0001", "InvalidProgramTree"],
  ["CND0002", "InvalidConfig"],
  ["CND0003", "UnknownSymbol"],
  ["CND0004", "Internal"],
  ["CND1001", "AssemblyConflict"],
  ["CND1002", "AssemblyConflict"],
  ["CND1003", "AssemblyConflict"],
  ["CND1004", "MissingModule"],
  ["CND2001", "UnresolvedGeneric"],
  ["CND2002", "UnresolvedGeneric"],
  ["CND2003", "CyclicInstantiation"],
  ["CND3001", "NonExhaustiveMatch"],
  ["CND3002", "DiscriminantConflict"],
  ["CND3003", "InvalidProgramTree"],
  ["CND3004", "CyclicLayout"],
  ["CND4001", "OwnershipViolation"],
  ["CND4002", "OwnershipViolation"],
  ["CND4003", "OwnershipViolation"],
  ["CND4004", "OwnershipViolation"],
  ["CND5001", "SymbolCollision"],
  ["CND5002", "SymbolCollision"],
  ["CND5003", "DependencyFailed"],
]);

export const COMPILER_DIAGNOSTIC_CODES: readonly string[] = Object.freeze([...KIND_BY_CODE.keys()]);

export function assertCompilerDiagnosticCode(code: string): void {
  if (!KIND_BY_CODE.has(code)) {
    throw new Error(`Unknown compiler diagnostic code '${code}'.`);
  }
}

export function compilerDiagnosticKind(code: string): DiagnosticKind {
  const kind = KIND_BY_CODE.get(code);
  if (kind === undefined) {
    throw new Error(`Unknown compiler diagnostic code '${code}'.`);
  }
  return kind;
}

export function compilerDiagnosticDomain(code: string): DiagnosticDomain {
  if (!KIND_BY_CODE.has(code)) return "other";
  switch (code[3]) {
    case "0":
      return "input";
    case "1":
      return "assembly";
    case "2":
      return "generics";
    case "3":
      return "layout";
    case "4":
      return "ownership";
    case "5":
      return "emission";
    default:
      return "other";
  }
}

/**
 * Where a diagnostic originates: the module being compiled, the top-level
 * symbol (or `Type::method`) involved, and the program-tree location when the
 * input carried one.
 */
export type DiagnosticSite = {
  readonly module: string;
  readonly symbol?: string;
  readonly loc?: SourceLoc;
};

export type Diagnostic = {
  readonly kind: DiagnosticKind;
  readonly code: string;
  readonly module: string;
  readonly symbol?: string;
  readonly loc?: SourceLoc;
  readonly message: string;
};

export class CompileError extends Error {
  readonly code: string;
  readonly kind: DiagnosticKind;
  readonly module: string;
  readonly symbol?: string;
  readonly loc?: SourceLoc;

  constructor(code: string, message: string, site: DiagnosticSite) {
    const kind = compilerDiagnosticKind(code);
    super(message);
    this.code = code;
    this.kind = kind;
    this.module = site.module;
    this.symbol = site.symbol;
    this.loc = site.loc;
    this.name = "CompileError";
  }

  toDiagnostic(): Diagnostic {
    const out: Diagnostic = {
      kind: this.kind,
      code: this.code,
      module: this.module,
      message: this.message,
      ...(this.symbol === undefined ? {} : { symbol: this.symbol }),
      ...(this.loc === undefined ? {} : { loc: this.loc }),
    };
    return Object.freeze(out);
  }
}

export function fail(code: string, message: string, site: DiagnosticSite): never {
  assertCompilerDiagnosticCode(code);
  throw new CompileError(code, message, site);
}

export function siteAt(site: DiagnosticSite, loc: SourceLoc | undefined): DiagnosticSite {
  return loc === undefined ? site : { ...site, loc };
}
