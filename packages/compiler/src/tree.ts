export type SourceLoc = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type NodeBase = {
  readonly loc?: SourceLoc;
};

export type Scenario = "compiled" | "interpreted";

export const SCENARIOS: readonly Scenario[] = Object.freeze(["compiled", "interpreted"]);

export const PRIM_NAMES = [
  "int",
  "uint",
  "i8",
  "i16",
  "i32",
  "i64",
  "u8",
  "u16",
  "u32",
  "u64",
  "usize",
  "float",
  "double",
  "bool",
  "char",
  "str",
  "void",
] as const;

export type PrimName = (typeof PRIM_NAMES)[number];

export function isPrimName(name: string): name is PrimName {
  return PRIM_NAMES.some((p) => p === name);
}

export type TypeRef =
  | (NodeBase & { readonly kind: "prim"; readonly name: PrimName })
  | (NodeBase & { readonly kind: "named"; readonly name: string; readonly args: readonly TypeRef[] })
  | (NodeBase & { readonly kind: "param"; readonly name: string })
  | (NodeBase & { readonly kind: "ptr"; readonly inner: TypeRef })
  | (NodeBase & { readonly kind: "indirect"; readonly inner: TypeRef })
  /** A plain enum; produced by name resolution, never read from a fragment. */
  | (NodeBase & { readonly kind: "enum"; readonly name: string });

export type BindingIntent = "read" | "mutate" | "move" | "address";

export type FieldVisibility = "public" | "private";

export const UNARY_OPS = ["-", "!", "~"] as const;
export type UnaryOp = (typeof UNARY_OPS)[number];

export const BINARY_OPS = [
  "+",
  "-",
  "*",
  "/",
  "%",
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "&&",
  "||",
  "&",
  "|",
  "^",
  "<<",
  ">>",
] as const;
export type BinaryOp = (typeof BINARY_OPS)[number];

export const ASSIGN_OPS = ["=", "+=", "-=", "*=", "/=", "%="] as const;
export type AssignOp = (typeof ASSIGN_OPS)[number];

export type FieldInit = NodeBase & { readonly name: string; readonly value: Expr };

export type Expr =
  | (NodeBase & { readonly kind: "int"; readonly text: string; readonly type?: PrimName })
  | (NodeBase & { readonly kind: "float"; readonly text: string; readonly type?: "float" | "double" })
  | (NodeBase & { readonly kind: "bool"; readonly value: boolean })
  | (NodeBase & { readonly kind: "char"; readonly value: string })
  | (NodeBase & { readonly kind: "str"; readonly value: string })
  | (NodeBase & { readonly kind: "ident"; readonly name: string })
  | (NodeBase & { readonly kind: "self" })
  | (NodeBase & { readonly kind: "self_field"; readonly name: string })
  | (NodeBase & { readonly kind: "field"; readonly target: Expr; readonly name: string })
  | (NodeBase & { readonly kind: "index"; readonly target: Expr; readonly index: Expr })
  | (NodeBase & { readonly kind: "unary"; readonly op: UnaryOp; readonly operand: Expr })
  | (NodeBase & { readonly kind: "binary"; readonly op: BinaryOp; readonly left: Expr; readonly right: Expr })
  | (NodeBase & {
      readonly kind: "call";
      readonly callee: string;
      readonly typeArgs: readonly TypeRef[];
      readonly args: readonly Expr[];
    })
  | (NodeBase & {
      readonly kind: "static_call";
      readonly owner: TypeRef;
      readonly method: string;
      readonly args: readonly Expr[];
    })
  | (NodeBase & {
      readonly kind: "method_call";
      readonly receiver: Expr;
      readonly method: string;
      readonly args: readonly Expr[];
    })
  | (NodeBase & { readonly kind: "record_lit"; readonly type: TypeRef; readonly fields: readonly FieldInit[] })
  | (NodeBase & {
      readonly kind: "variant_lit";
      readonly type: TypeRef;
      readonly variant: string;
      readonly fields: readonly FieldInit[];
    })
  | (NodeBase & { readonly kind: "addr"; readonly target: Expr })
  | (NodeBase & { readonly kind: "deref"; readonly target: Expr })
  | (NodeBase & { readonly kind: "cast"; readonly expr: Expr; readonly type: TypeRef });

export type PatternBinding = NodeBase & { readonly field: string; readonly name: string };

export type MatchPattern =
  | (NodeBase & { readonly kind: "variant"; readonly variant: string; readonly bindings: readonly PatternBinding[] })
  | (NodeBase & { readonly kind: "wild" });

export type MatchArm = NodeBase & {
  readonly pattern: MatchPattern;
  readonly body: readonly Stmt[];
};

export type Stmt =
  | (NodeBase & {
      readonly kind: "let";
      readonly name: string;
      readonly type: TypeRef;
      readonly mutable: boolean;
      readonly init?: Expr;
    })
  | (NodeBase & { readonly kind: "assign"; readonly target: Expr; readonly op: AssignOp; readonly value: Expr })
  | (NodeBase & { readonly kind: "expr"; readonly expr: Expr })
  | (NodeBase & { readonly kind: "return"; readonly value?: Expr })
  | (NodeBase & {
      readonly kind: "if";
      readonly cond: Expr;
      readonly then: readonly Stmt[];
      readonly else?: readonly Stmt[];
    })
  | (NodeBase & { readonly kind: "while"; readonly cond: Expr; readonly body: readonly Stmt[] })
  | (NodeBase & { readonly kind: "loop"; readonly body: readonly Stmt[] })
  | (NodeBase & {
      readonly kind: "for_range";
      readonly name: string;
      readonly type: PrimName;
      readonly from: Expr;
      readonly to: Expr;
      readonly inclusive: boolean;
      readonly body: readonly Stmt[];
    })
  | (NodeBase & { readonly kind: "break" })
  | (NodeBase & { readonly kind: "continue" })
  | (NodeBase & { readonly kind: "match"; readonly subject: Expr; readonly arms: readonly MatchArm[] })
  | (NodeBase & { readonly kind: "block"; readonly lowLevel: boolean; readonly body: readonly Stmt[] });

export type Param = NodeBase & {
  readonly name: string;
  readonly type: TypeRef;
  readonly intent: BindingIntent;
};

export type FieldDecl = NodeBase & {
  readonly name: string;
  readonly type: TypeRef;
  readonly vis: FieldVisibility;
};

/**
 * A method owned by exactly one record or tag declaration.
 *
 * A missing `body` means the method is provided externally (or by another
 * fragment of the same module).
 */
export type MethodDecl = NodeBase & {
  readonly name: string;
  readonly kind: "static" | "instance";
  readonly mutatesReceiver: boolean;
  readonly params: readonly Param[];
  readonly ret: TypeRef;
  readonly body?: readonly Stmt[];
  readonly lowLevel: boolean;
};

export type VariantDecl = NodeBase & {
  readonly name: string;
  readonly value?: number;
  readonly fields: readonly FieldDecl[];
};

export type IncludeDecl = {
  readonly path: string;
  readonly system: boolean;
};

export type RecordDecl = NodeBase & {
  readonly kind: "record";
  readonly name: string;
  readonly typeParams: readonly string[];
  readonly fields: readonly FieldDecl[];
  readonly methods: readonly MethodDecl[];
};

export type TagDecl = NodeBase & {
  readonly kind: "tag";
  readonly name: string;
  readonly typeParams: readonly string[];
  readonly variants: readonly VariantDecl[];
  readonly methods: readonly MethodDecl[];
};

export type FnDecl = NodeBase & {
  readonly kind: "fn";
  readonly name: string;
  readonly typeParams: readonly string[];
  readonly params: readonly Param[];
  readonly ret: TypeRef;
  readonly body?: readonly Stmt[];
  readonly lowLevel: boolean;
  readonly header?: IncludeDecl;
};

export type EnumMemberDecl = NodeBase & {
  readonly name: string;
  readonly value?: number;
};

/** A C enum without payloads; its members are plain integer constants. */
export type EnumDecl = NodeBase & {
  readonly kind: "enum";
  readonly name: string;
  readonly members: readonly EnumMemberDecl[];
};

export type AliasDecl = NodeBase & {
  readonly kind: "alias";
  readonly name: string;
  readonly target: TypeRef;
};

export type GlobalDecl = NodeBase & {
  readonly kind: "global";
  readonly name: string;
  readonly type: TypeRef;
  readonly mutable: boolean;
  readonly init: Expr;
};

export type TypeDecl = RecordDecl | TagDecl;

export type Decl = RecordDecl | TagDecl | EnumDecl | FnDecl | AliasDecl | GlobalDecl;

export type ProgramFragment = {
  readonly module: string;
  readonly scenario?: Scenario;
  readonly file: string;
  readonly includes: readonly IncludeDecl[];
  readonly imports: readonly string[];
  readonly decls: readonly Decl[];
};

export function prim(name: PrimName): TypeRef {
  return { kind: "prim", name };
}

export function named(name: string, args: readonly TypeRef[] = []): TypeRef {
  return { kind: "named", name, args };
}

export function typeParam(name: string): TypeRef {
  return { kind: "param", name };
}

export function ptr(inner: TypeRef): TypeRef {
  return { kind: "ptr", inner };
}

export function indirect(inner: TypeRef): TypeRef {
  return { kind: "indirect", inner };
}

export function ident(name: string): Expr {
  return { kind: "ident", name };
}

export function intLit(value: number | string, type?: PrimName): Expr {
  return type ? { kind: "int", text: String(value), type } : { kind: "int", text: String(value) };
}

export function call(callee: string, args: readonly Expr[], typeArgs: readonly TypeRef[] = []): Expr {
  return { kind: "call", callee, typeArgs, args };
}

export function param(name: string, type: TypeRef, intent: BindingIntent = "read"): Param {
  return { name, type, intent };
}

export function field(name: string, type: TypeRef, vis: FieldVisibility = "public"): FieldDecl {
  return { name, type, vis };
}

/** The `loc` of `node` as a spreadable object, empty when the node has none. */
export function locOf(node: NodeBase): NodeBase {
  return node.loc === undefined ? {} : { loc: node.loc };
}
