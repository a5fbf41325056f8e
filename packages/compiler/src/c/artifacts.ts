import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import type { CompileOutput } from "./host.js";

export type WrittenArtifacts = {
  readonly header: string;
  readonly source: string;
};

/** Writes `<module>.h` and `<module>.c` into `outDir`, creating it when missing. */
export function writeModuleArtifacts(outDir: string, output: CompileOutput): WrittenArtifacts {
  mkdirSync(outDir, { recursive: true });
  const header = join(outDir, output.artifacts.headerName);
  const source = join(outDir, output.artifacts.sourceName);
  writeFileSync(header, output.artifacts.header, "utf-8");
  writeFileSync(source, output.artifacts.source, "utf-8");
  return Object.freeze({ header, source });
}
