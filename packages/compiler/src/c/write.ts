import type { CExpr, CFile, CFnSignature, CItem, CStmt, CStructMember, CType } from "./ir.js";
import { cCharLiteral, cStringLiteral } from "./lowering/common.js";

export function emitType(ty: CType): string {
  switch (ty.kind) {
    case "name":
      return ty.name;
    case "struct":
      return `struct ${ty.name}`;
    case "enum":
      return `enum ${ty.name}`;
    case "ptr": {
      const inner = emitType(ty.inner);
      const base = ty.const ? (ty.inner.kind === "ptr" ? `${inner} const` : `const ${inner}`) : inner;
      return base.endsWith("*") ? `${base}*` : `${base} *`;
    }
  }
}

export function emitDeclarator(ty: CType, name: string): string {
  const text = emitType(ty);
  return text.endsWith("*") ? `${text}${name}` : `${text} ${name}`;
}

export function emitExpr(expr: CExpr): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "number":
      return expr.text;
    case "string":
      return cStringLiteral(expr.value);
    case "char":
      return cCharLiteral(expr.value);
    case "bool":
      return expr.value ? "true" : "false";
    case "field":
      return `${emitExpr(expr.expr)}${expr.arrow ? "->" : "."}${expr.name}`;
    case "index":
      return `${emitExpr(expr.expr)}[${emitBare(expr.index)}]`;
    case "unary":
      return `(${emitUnary(expr.op, expr.expr)})`;
    case "postfix":
      return `${emitExpr(expr.expr)}${expr.op}`;
    case "binary":
      return `(${emitExpr(expr.left)} ${expr.op} ${emitExpr(expr.right)})`;
    case "call":
      return `${expr.callee}(${expr.args.map(emitBare).join(", ")})`;
    case "addr":
      return `(&${emitExpr(expr.expr)})`;
    case "deref":
      return `(*${emitExpr(expr.expr)})`;
    case "cast":
      return `((${emitType(expr.type)})${emitExpr(expr.expr)})`;
    case "compound": {
      if (expr.inits.length === 0) return `(${emitType(expr.type)}){0}`;
      const inits = expr.inits.map((i) => `.${i.designator} = ${emitBare(i.expr)}`).join(", ");
      return `(${emitType(expr.type)}){ ${inits} }`;
    }
  }
}

function emitUnary(op: string, operand: CExpr): string {
  const inner = emitExpr(operand);
  // `- -1` must not collapse into the decrement operator.
  return inner.startsWith(op) && (op === "-" || op === "+") ? `${op} ${inner}` : `${op}${inner}`;
}

/** Renders an expression that stands alone (condition, argument, initializer) without its outer parentheses. */
export function emitBare(expr: CExpr): string {
  switch (expr.kind) {
    case "binary":
      return `${emitExpr(expr.left)} ${expr.op} ${emitExpr(expr.right)}`;
    case "unary":
      return emitUnary(expr.op, expr.expr);
    case "addr":
      return `&${emitExpr(expr.expr)}`;
    case "deref":
      return `*${emitExpr(expr.expr)}`;
    case "cast":
      return `(${emitType(expr.type)})${emitExpr(expr.expr)}`;
    default:
      return emitExpr(expr);
  }
}

function emitDeclStmt(st: Extract<CStmt, { kind: "decl" }>): string {
  const init = st.init ? ` = ${emitBare(st.init)}` : "";
  return `${emitDeclarator(st.type, st.name)}${init}`;
}

function emitBlockBody(body: readonly CStmt[], indent: string): string[] {
  const out: string[] = [];
  for (const s of body) out.push(...emitStmtLines(s, `${indent}  `));
  return out;
}

export function emitStmtLines(st: CStmt, indent: string): string[] {
  switch (st.kind) {
    case "decl":
      return [`${indent}${emitDeclStmt(st)};`];
    case "assign":
      return [`${indent}${emitBare(st.target)} ${st.op} ${emitBare(st.expr)};`];
    case "expr":
      return [`${indent}${emitBare(st.expr)};`];
    case "return":
      return [st.expr ? `${indent}return ${emitBare(st.expr)};` : `${indent}return;`];
    case "break":
      return [`${indent}break;`];
    case "continue":
      return [`${indent}continue;`];
    case "block":
      return [`${indent}{`, ...emitBlockBody(st.body, indent), `${indent}}`];
    case "while":
      return [`${indent}while (${emitBare(st.cond)}) {`, ...emitBlockBody(st.body, indent), `${indent}}`];
    case "for": {
      const init = st.init ? emitForInit(st.init) : "";
      const cond = st.cond ? emitBare(st.cond) : "";
      const step = st.step ? emitBare(st.step) : "";
      const head = init === "" && cond === "" && step === "" ? "for (;;)" : `for (${init}; ${cond}; ${step})`;
      return [`${indent}${head} {`, ...emitBlockBody(st.body, indent), `${indent}}`];
    }
    case "if": {
      const out: string[] = [];
      out.push(`${indent}if (${emitBare(st.cond)}) {`);
      out.push(...emitBlockBody(st.then, indent));
      let rest = st.else;
      while (rest) {
        const only = rest.length === 1 ? rest[0] : undefined;
        if (only && only.kind === "if") {
          out.push(`${indent}} else if (${emitBare(only.cond)}) {`);
          out.push(...emitBlockBody(only.then, indent));
          rest = only.else;
          continue;
        }
        out.push(`${indent}} else {`);
        out.push(...emitBlockBody(rest, indent));
        rest = undefined;
      }
      out.push(`${indent}}`);
      return out;
    }
    case "switch": {
      const out: string[] = [];
      out.push(`${indent}switch (${emitBare(st.expr)}) {`);
      const caseIndent = `${indent}  `;
      for (const c of st.cases) {
        out.push(c.label === undefined ? `${caseIndent}default: {` : `${caseIndent}case ${c.label}: {`);
        out.push(...emitBlockBody(c.body, caseIndent));
        out.push(`${caseIndent}}`);
      }
      out.push(`${indent}}`);
      return out;
    }
  }
}

function emitForInit(st: CStmt): string {
  switch (st.kind) {
    case "decl":
      return emitDeclStmt(st);
    case "assign":
      return `${emitBare(st.target)} ${st.op} ${emitBare(st.expr)}`;
    case "expr":
      return emitBare(st.expr);
    default:
      return "";
  }
}

export function emitSignature(sig: CFnSignature): string {
  const params = sig.params.length === 0 ? "void" : sig.params.map((p) => emitDeclarator(p.type, p.name)).join(", ");
  return `${emitDeclarator(sig.ret, sig.name)}(${params})`;
}

function emitStructMember(member: CStructMember, indent: string): string[] {
  if (member.kind === "field") {
    const note = member.note ? ` /* ${member.note} */` : "";
    return [`${indent}${emitDeclarator(member.type, member.name)};${note}`];
  }
  const out: string[] = [];
  out.push(`${indent}union {`);
  for (const m of member.members) {
    out.push(`${indent}  struct {`);
    for (const f of m.fields) {
      const note = f.note ? ` /* ${f.note} */` : "";
      out.push(`${indent}    ${emitDeclarator(f.type, f.name)};${note}`);
    }
    out.push(`${indent}  } ${m.name};`);
  }
  out.push(`${indent}} ${member.name};`);
  return out;
}

export function emitItem(item: CItem): string[] {
  switch (item.kind) {
    case "directive":
      return [item.text];
    case "comment":
      return [`/* ${item.text} */`];
    case "include":
      return [item.system ? `#include <${item.path}>` : `#include "${item.path}"`];
    case "forward":
      return [`struct ${item.name};`];
    case "typedef":
      return [`typedef ${emitDeclarator(item.type, item.name)};`];
    case "enum": {
      const out: string[] = [];
      out.push(`enum ${item.name} {`);
      for (const m of item.members) out.push(`  ${m.name} = ${m.value},`);
      out.push("};");
      return out;
    }
    case "struct": {
      const out: string[] = [];
      out.push(`struct ${item.name} {`);
      for (const m of item.members) out.push(...emitStructMember(m, "  "));
      out.push("};");
      return out;
    }
    case "global": {
      const ext = item.extern ? "extern " : "";
      const qual = item.const ? "const " : "";
      const init = item.init ? ` = ${emitBare(item.init)}` : "";
      return [`${ext}${qual}${emitDeclarator(item.type, item.name)}${init};`];
    }
    case "proto":
      return [`${emitSignature(item.sig)};`];
    case "fn": {
      const out: string[] = [];
      out.push(`${emitSignature(item.sig)} {`);
      for (const st of item.body) out.push(...emitStmtLines(st, "  "));
      out.push("}");
      return out;
    }
  }
}

const GROUPED_ITEM_KINDS: ReadonlySet<CItem["kind"]> = new Set<CItem["kind"]>([
  "directive",
  "include",
  "forward",
  "typedef",
  "global",
  "proto",
]);

export function writeCFile(file: CFile, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  let prev: CItem["kind"] | undefined;
  for (const item of file.items) {
    const grouped = prev === item.kind && GROUPED_ITEM_KINDS.has(item.kind);
    if (parts.length > 0 && !grouped) parts.push("");
    parts.push(...emitItem(item));
    prev = item.kind;
  }
  parts.push("");
  return parts.join("\n");
}
