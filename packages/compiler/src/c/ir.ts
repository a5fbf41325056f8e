export type CType =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "struct"; readonly name: string }
  | { readonly kind: "enum"; readonly name: string }
  | { readonly kind: "ptr"; readonly inner: CType; readonly const: boolean };

export type CDesignatedInit = {
  readonly designator: string;
  readonly expr: CExpr;
};

export type CExpr =
  | { readonly kind: "ident"; readonly name: string }
  | { readonly kind: "number"; readonly text: string }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "char"; readonly value: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "field"; readonly expr: CExpr; readonly name: string; readonly arrow: boolean }
  | { readonly kind: "index"; readonly expr: CExpr; readonly index: CExpr }
  | { readonly kind: "unary"; readonly op: string; readonly expr: CExpr }
  | { readonly kind: "postfix"; readonly op: "++" | "--"; readonly expr: CExpr }
  | { readonly kind: "binary"; readonly op: string; readonly left: CExpr; readonly right: CExpr }
  | { readonly kind: "call"; readonly callee: string; readonly args: readonly CExpr[] }
  | { readonly kind: "addr"; readonly expr: CExpr }
  | { readonly kind: "deref"; readonly expr: CExpr }
  | { readonly kind: "cast"; readonly type: CType; readonly expr: CExpr }
  | { readonly kind: "compound"; readonly type: CType; readonly inits: readonly CDesignatedInit[] };

export type CSwitchCase = {
  /** `undefined` renders the `default` label. */
  readonly label?: string;
  readonly body: readonly CStmt[];
};

export type CStmt =
  | { readonly kind: "decl"; readonly type: CType; readonly name: string; readonly init?: CExpr }
  | { readonly kind: "assign"; readonly target: CExpr; readonly op: string; readonly expr: CExpr }
  | { readonly kind: "expr"; readonly expr: CExpr }
  | { readonly kind: "return"; readonly expr?: CExpr }
  | {
      readonly kind: "if";
      readonly cond: CExpr;
      readonly then: readonly CStmt[];
      readonly else?: readonly CStmt[];
    }
  | { readonly kind: "while"; readonly cond: CExpr; readonly body: readonly CStmt[] }
  | {
      readonly kind: "for";
      readonly init?: CStmt;
      readonly cond?: CExpr;
      readonly step?: CExpr;
      readonly body: readonly CStmt[];
    }
  | { readonly kind: "break" }
  | { readonly kind: "continue" }
  | { readonly kind: "block"; readonly body: readonly CStmt[] }
  | { readonly kind: "switch"; readonly expr: CExpr; readonly cases: readonly CSwitchCase[] };

export type CParam = { readonly type: CType; readonly name: string };

export type CFnSignature = {
  readonly name: string;
  readonly ret: CType;
  readonly params: readonly CParam[];
};

export type CStructMember =
  | { readonly kind: "field"; readonly type: CType; readonly name: string; readonly note?: string }
  | {
      readonly kind: "union";
      readonly name: string;
      readonly members: readonly {
        readonly name: string;
        readonly fields: readonly { readonly type: CType; readonly name: string; readonly note?: string }[];
      }[];
    };

export type CItem =
  | { readonly kind: "directive"; readonly text: string }
  | { readonly kind: "comment"; readonly text: string }
  | { readonly kind: "include"; readonly path: string; readonly system: boolean }
  | { readonly kind: "forward"; readonly name: string }
  | { readonly kind: "typedef"; readonly type: CType; readonly name: string }
  | {
      readonly kind: "enum";
      readonly name: string;
      readonly members: readonly { readonly name: string; readonly value: number }[];
    }
  | { readonly kind: "struct"; readonly name: string; readonly members: readonly CStructMember[] }
  | {
      readonly kind: "global";
      readonly type: CType;
      readonly name: string;
      readonly extern: boolean;
      readonly const?: boolean;
      readonly init?: CExpr;
    }
  | { readonly kind: "proto"; readonly sig: CFnSignature }
  | { readonly kind: "fn"; readonly sig: CFnSignature; readonly body: readonly CStmt[] };

export type CFile = {
  readonly kind: "file";
  readonly items: readonly CItem[];
};

export function nameType(name: string): CType {
  return { kind: "name", name };
}

export function structType(name: string): CType {
  return { kind: "struct", name };
}

export function enumType(name: string): CType {
  return { kind: "enum", name };
}

export function ptrType(inner: CType, isConst = false): CType {
  return { kind: "ptr", inner, const: isConst };
}

export function identExpr(name: string): CExpr {
  return { kind: "ident", name };
}

export function numberExpr(text: string): CExpr {
  return { kind: "number", text };
}

export function callExpr(callee: string, args: readonly CExpr[]): CExpr {
  return { kind: "call", callee, args };
}

export function fieldExpr(expr: CExpr, name: string, arrow = false): CExpr {
  return { kind: "field", expr, name, arrow };
}

export function binaryExpr(op: string, left: CExpr, right: CExpr): CExpr {
  return { kind: "binary", op, left, right };
}
