import { readFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";

import { SCENARIOS } from "./tree.js";
import type { Scenario } from "./tree.js";
import { fail } from "./c/diagnostics.js";
import type { HeaderGuardStyle } from "./c/passes/declaration-emission.js";
import { DEFAULT_SMALL_SIZE_LIMIT } from "./c/passes/ownership.js";

export const CONFIG_FILE_NAME = "cinder.json";

export type CompilerConfig = {
  readonly schema: 1;
  readonly scenario: Scenario;
  readonly sourceDir: string;
  readonly outDir: string;
  readonly smallSizeLimit: number;
  readonly headerGuard: HeaderGuardStyle;
  readonly modules: readonly string[];
};

const CONFIG_KEYS: readonly string[] = [
  "schema",
  "scenario",
  "sourceDir",
  "outDir",
  "smallSizeLimit",
  "headerGuard",
  "modules",
];

function invalid(label: string, message: string): never {
  return fail("CND0002", `${label}: ${message}`, { module: label });
}

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    invalid(label, "must be a JSON object.");
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) invalid(label, `unknown key '${key}'.`);
  }
}

function asString(value: unknown, label: string, key: string): string {
  if (typeof value !== "string" || value.length === 0) invalid(label, `'${key}' must be a non-empty string.`);
  return value;
}

function asPositiveInteger(value: unknown, label: string, key: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    invalid(label, `'${key}' must be a positive integer.`);
  }
  return value;
}

function asModuleList(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || value.length === 0) invalid(label, "'modules' must be a non-empty array.");
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || entry.length === 0) {
      invalid(label, "'modules' must be an array of non-empty strings.");
    }
    if (out.includes(entry)) invalid(label, `'modules' lists '${entry}' twice.`);
    out.push(entry);
  }
  return Object.freeze(out);
}

function asScenario(value: unknown, label: string): Scenario {
  const found = SCENARIOS.find((s) => s === value);
  if (found === undefined) invalid(label, `'scenario' must be one of ${SCENARIOS.map((s) => `'${s}'`).join(", ")}.`);
  return found;
}

function asHeaderGuard(value: unknown, label: string): HeaderGuardStyle {
  if (value === undefined) return "pragma";
  if (value !== "pragma" && value !== "ifndef") invalid(label, "'headerGuard' must be 'pragma' or 'ifndef'.");
  return value;
}

/** Validates a parsed config object; paths are returned exactly as written. */
export function parseCompilerConfig(value: unknown, label: string = CONFIG_FILE_NAME): CompilerConfig {
  const root = asRecord(value, label);
  assertKnownKeys(root, CONFIG_KEYS, label);
  if (root.schema !== 1) invalid(label, "unsupported schema (expected 1).");

  return Object.freeze({
    schema: 1,
    scenario: asScenario(root.scenario, label),
    sourceDir: asString(root.sourceDir, label, "sourceDir"),
    outDir: asString(root.outDir, label, "outDir"),
    smallSizeLimit:
      root.smallSizeLimit === undefined
        ? DEFAULT_SMALL_SIZE_LIMIT
        : asPositiveInteger(root.smallSizeLimit, label, "smallSizeLimit"),
    headerGuard: asHeaderGuard(root.headerGuard, label),
    modules: asModuleList(root.modules, label),
  });
}

/** Reads and validates a config file, resolving `sourceDir` and `outDir` against its directory. */
export function loadCompilerConfig(path: string): CompilerConfig {
  const label = basename(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    invalid(label, `could not be read as JSON (${detail}).`);
  }
  const config = parseCompilerConfig(raw, label);
  const base = dirname(resolve(path));
  return Object.freeze({
    ...config,
    sourceDir: resolve(base, config.sourceDir),
    outDir: resolve(base, config.outDir),
  });
}
