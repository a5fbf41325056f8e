export function cIdentFromStem(stem: string): string {
  const raw = stem
    .replaceAll(/[^A-Za-z0-9_]/g, "_")
    .replaceAll(/_+/g, "_")
    .replaceAll(/^_+|_+$/g, "");
  const lower = raw.length === 0 ? "mod" : raw.toLowerCase();
  return /^[0-9]/.test(lower) ? `_${lower}` : lower;
}

export function moduleFileStem(moduleName: string): string {
  return cIdentFromStem(moduleName);
}

export function headerGuardMacro(moduleName: string): string {
  return `${moduleFileStem(moduleName).toUpperCase()}_H`;
}

/** Enumerator constant for one variant of a tag, e.g. `Shape` + `Circle` -> `SHAPE_CIRCLE`. */
export function variantConstantName(tagName: string, variantName: string): string {
  return `${tagName.toUpperCase()}_${variantName.toUpperCase()}`;
}

export function tagEnumName(tagName: string): string {
  return `${tagName}Kind`;
}

export function methodSymbolName(ownerName: string, methodName: string): string {
  return `${ownerName}_${methodName}`;
}

export function methodKey(ownerName: string, methodName: string): string {
  return `${ownerName}::${methodName}`;
}

export const C_RESERVED_WORDS: ReadonlySet<string> = new Set([
  "auto",
  "break",
  "case",
  "char",
  "const",
  "continue",
  "default",
  "do",
  "double",
  "else",
  "enum",
  "extern",
  "float",
  "for",
  "goto",
  "if",
  "inline",
  "int",
  "long",
  "register",
  "restrict",
  "return",
  "short",
  "signed",
  "sizeof",
  "static",
  "struct",
  "switch",
  "typedef",
  "union",
  "unsigned",
  "void",
  "volatile",
  "while",
  "_Bool",
  "_Complex",
  "_Imaginary",
  "bool",
  "true",
  "false",
  "NULL",
]);

export function isCIdentifier(name: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && !C_RESERVED_WORDS.has(name);
}

const utf8 = new TextEncoder();

function escapeCodeUnit(ch: string, quote: '"' | "'"): string {
  switch (ch) {
    case quote:
      return `\\${quote}`;
    case "\\":
      return "\\\\";
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    case "\0":
      return "\\000";
    default: {
      const code = ch.codePointAt(0) ?? 0;
      if (code >= 0x20 && code <= 0x7e) return ch;
      let out = "";
      for (const byte of utf8.encode(ch)) out += `\\${byte.toString(8).padStart(3, "0")}`;
      return out;
    }
  }
}

export function cStringLiteral(s: string): string {
  let out = '"';
  for (const ch of s) out += escapeCodeUnit(ch, '"');
  out += '"';
  return out;
}

export function cCharLiteral(ch: string): string {
  return `'${escapeCodeUnit(ch, "'")}'`;
}
