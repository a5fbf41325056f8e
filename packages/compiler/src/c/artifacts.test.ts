import { expect } from "chai";
import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { prim } from "../tree.js";
import { writeModuleArtifacts } from "./artifacts.js";
import { compileModuleToC } from "./host.js";
import { fnDecl, unitOf } from "./test-support.js";

describe("@cinder/compiler artifacts", () => {
  it("writes the header and source into a fresh output directory", () => {
    const out = compileModuleToC(unitOf([fnDecl("tick", [], prim("void"), [])], "clock"));
    const dir = join(mkdtempSync(join(tmpdir(), "cinder-artifacts-")), "nested", "out");

    const written = writeModuleArtifacts(dir, out);
    expect(written).to.deep.equal({ header: join(dir, "clock.h"), source: join(dir, "clock.c") });
    expect(readFileSync(written.header, "utf-8")).to.equal(out.artifacts.header);
    expect(readFileSync(written.source, "utf-8")).to.equal(out.artifacts.source);
    expect(readFileSync(written.header, "utf-8").split("\n")[2]).to.equal("#pragma once");
  });
});
