import { expect } from "chai";
import { readdirSync, readFileSync } from "node:fs";
import { dirname, join, resolve, sep } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

import { prim } from "../tree.js";
import { assembleModule } from "./passes/assemble.js";
import { InMemoryFragmentSource } from "./passes/fragment-source.js";
import { fnDecl, fragment } from "./test-support.js";

describe("@cinder/compiler pass contracts", () => {
  function compilerRoot(): string {
    const here = fileURLToPath(import.meta.url);
    return resolve(dirname(here), "..", "..");
  }

  function getFunctionBodyText(path: string, name: string): string {
    const text = readFileSync(path, "utf-8");
    const sf = ts.createSourceFile(path, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
    for (const st of sf.statements) {
      if (ts.isFunctionDeclaration(st) && st.name?.text === name && st.body) {
        return text.slice(st.body.pos, st.body.end);
      }
    }
    return expect.fail(`Function '${name}' with a body must exist in ${path}`);
  }

  function importsOf(path: string): readonly string[] {
    const text = readFileSync(path, "utf-8");
    const sf = ts.createSourceFile(path, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
    const out: string[] = [];
    for (const st of sf.statements) {
      if (ts.isImportDeclaration(st) && ts.isStringLiteral(st.moduleSpecifier)) out.push(st.moduleSpecifier.text);
    }
    return out;
  }

  function sourceFiles(dir: string): readonly string[] {
    return readdirSync(dir, { recursive: true, encoding: "utf-8" })
      .filter((f) => f.endsWith(".ts") && !f.endsWith(".test.ts"))
      .map((f) => join(dir, f));
  }

  function exportedValues(path: string): readonly string[] {
    const text = readFileSync(path, "utf-8");
    const sf = ts.createSourceFile(path, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
    const out: string[] = [];
    for (const st of sf.statements) {
      const exported = ts.canHaveModifiers(st) && ts.getModifiers(st)?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword);
      if (!exported) continue;
      if ((ts.isFunctionDeclaration(st) || ts.isClassDeclaration(st)) && st.name) out.push(st.name.text);
      if (ts.isVariableStatement(st)) {
        for (const d of st.declarationList.declarations) if (ts.isIdentifier(d.name)) out.push(d.name.text);
      }
    }
    return out;
  }

  it("keeps compileUnitWithRun pass boundaries explicit and ordered", () => {
    const body = getFunctionBodyText(join(compilerRoot(), "src", "c", "host.ts"), "compileUnitWithRun");
    const calls = [
      "const module = monomorphizeModule(unit, run.instantiations, run.imports);",
      "const plan = computeLayouts(module);",
      "validateAdtUses(module, plan);",
      "const model = buildOwnershipModel(module, plan, {",
      "const lowered = lowerMethods(module, model, run.symbols);",
      "const bodies = lowerBodies({ module, plan, lowered });",
      "const artifacts = emitModuleFiles({",
    ];
    let last = -1;
    for (const call of calls) {
      const at = body.indexOf(call);
      expect(at, call).to.be.greaterThan(last);
      last = at;
    }
    expect(body).to.not.contain("JSON.parse(");
    expect(body).to.not.contain("new InstantiationTable(");
    expect(body).to.not.contain("new SymbolTable(");
  });

  it("keeps file access out of the passes", () => {
    const passes = ["assemble", "monomorphize", "adt-layout", "ownership", "method-lowering", "body-lowering"];
    for (const pass of passes) {
      const imports = importsOf(join(compilerRoot(), "src", "c", "passes", `${pass}.ts`));
      expect(imports.filter((m) => m.startsWith("node:")), pass).to.deep.equal([]);
    }
  });

  it("uses every helper the lowering modules export", () => {
    const files = sourceFiles(join(compilerRoot(), "src")).filter(
      (f) => !f.endsWith("public-api.ts") && !f.endsWith("test-support.ts")
    );
    const texts = files.map((f) => readFileSync(f, "utf-8"));
    for (const file of files.filter((f) => f.includes(`${sep}lowering${sep}`))) {
      for (const name of exportedValues(file)) {
        const word = new RegExp(`\\b${name}\\b`, "g");
        const uses = texts.reduce((n, text) => n + (text.match(word)?.length ?? 0), 0);
        expect(uses, name).to.be.greaterThan(1);
      }
    }
  });

  it("hands later passes a frozen module unit", () => {
    const unit = assembleModule(
      "demo",
      "compiled",
      new InMemoryFragmentSource([fragment("demo", [fnDecl("main", [], prim("int"), [])])])
    );
    expect(Object.isFrozen(unit)).to.equal(true);
    expect(Object.isFrozen(unit.decls)).to.equal(true);
    expect(Object.isFrozen(unit.decls[0])).to.equal(true);
  });
});
