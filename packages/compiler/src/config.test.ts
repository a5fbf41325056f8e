import { expect } from "chai";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { catchCompileError } from "./c/test-support.js";
import { loadCompilerConfig, parseCompilerConfig } from "./config.js";

describe("@cinder/compiler config", () => {
  const minimal = { schema: 1, scenario: "compiled", sourceDir: "tree", outDir: "out", modules: ["app"] };

  it("fills defaults and keeps paths as written", () => {
    const config = parseCompilerConfig(minimal);
    expect(config).to.deep.equal({
      schema: 1,
      scenario: "compiled",
      sourceDir: "tree",
      outDir: "out",
      smallSizeLimit: 16,
      headerGuard: "pragma",
      modules: ["app"],
    });
    expect(Object.isFrozen(config)).to.equal(true);
  });

  it("rejects malformed configs with the file name in the message", () => {
    const cases: ReadonlyArray<readonly [unknown, string]> = [
      [[], "cinder.json: must be a JSON object."],
      [{ ...minimal, extra: true }, "cinder.json: unknown key 'extra'."],
      [{ ...minimal, schema: 2 }, "cinder.json: unsupported schema (expected 1)."],
      [{ ...minimal, scenario: "native" }, "cinder.json: 'scenario' must be one of 'compiled', 'interpreted'."],
      [{ ...minimal, outDir: "" }, "cinder.json: 'outDir' must be a non-empty string."],
      [{ ...minimal, smallSizeLimit: 0 }, "cinder.json: 'smallSizeLimit' must be a positive integer."],
      [{ ...minimal, headerGuard: "once" }, "cinder.json: 'headerGuard' must be 'pragma' or 'ifndef'."],
      [{ ...minimal, modules: [] }, "cinder.json: 'modules' must be a non-empty array."],
      [{ ...minimal, modules: ["app", "app"] }, "cinder.json: 'modules' lists 'app' twice."],
    ];
    for (const [value, message] of cases) {
      const err = catchCompileError(() => parseCompilerConfig(value));
      expect(err.code).to.equal("CND0002");
      expect(err.message).to.equal(message);
    }
  });

  it("resolves directories against the config file", () => {
    const dir = mkdtempSync(join(tmpdir(), "cinder-config-"));
    const path = join(dir, "cinder.json");
    writeFileSync(path, JSON.stringify({ ...minimal, headerGuard: "ifndef", smallSizeLimit: 8 }), "utf-8");
    const config = loadCompilerConfig(path);
    expect(config.sourceDir).to.equal(join(dir, "tree"));
    expect(config.outDir).to.equal(join(dir, "out"));
    expect(config.headerGuard).to.equal("ifndef");
    expect(config.smallSizeLimit).to.equal(8);
  });

  it("reports unreadable JSON as an invalid config", () => {
    const dir = mkdtempSync(join(tmpdir(), "cinder-config-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json", "utf-8");
    const err = catchCompileError(() => loadCompilerConfig(path));
    expect(err.code).to.equal("CND0002");
    expect(err.message.startsWith("broken.json: could not be read as JSON (")).to.equal(true);
  });
});
