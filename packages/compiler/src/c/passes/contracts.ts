import type {
  BindingIntent,
  Decl,
  EnumMemberDecl,
  Expr,
  FieldDecl,
  IncludeDecl,
  MethodDecl,
  Param,
  Scenario,
  SourceLoc,
  Stmt,
  TypeRef,
  VariantDecl,
} from "../../tree.js";
import type { ImportScope } from "./imports.js";

class ReadonlyMapView<K, V> implements ReadonlyMap<K, V> {
  readonly #inner: ReadonlyMap<K, V>;

  constructor(inner: ReadonlyMap<K, V>) {
    this.#inner = inner;
  }

  get size(): number {
    return this.#inner.size;
  }

  get(key: K): V | undefined {
    return this.#inner.get(key);
  }

  has(key: K): boolean {
    return this.#inner.has(key);
  }

  forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.#inner.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  entries(): MapIterator<[K, V]> {
    return this.#inner.entries();
  }

  keys(): MapIterator<K> {
    return this.#inner.keys();
  }

  values(): MapIterator<V> {
    return this.#inner.values();
  }

  [Symbol.iterator](): MapIterator<[K, V]> {
    return this.#inner[Symbol.iterator]();
  }
}

export function asReadonlyMap<K, V>(map: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
  if (map instanceof ReadonlyMapView) return map;
  const snapshot = new Map<K, V>();
  for (const [k, v] of map.entries()) snapshot.set(k, v);
  return Object.freeze(new ReadonlyMapView(snapshot));
}

export function freezeReadonlyArray<T>(items: readonly T[]): readonly T[] {
  return Object.freeze([...items]);
}

/** Freezes plain objects and arrays reachable from `value`; map views are already read-only. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object") return value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) return value;
  if (!Object.isFrozen(value)) Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
  return value;
}

/** The merged, single-module program tree. Built once by the assembler and read-only afterwards. */
export type ModuleUnit = {
  readonly module: string;
  readonly scenario: Scenario;
  readonly fragments: readonly string[];
  readonly includes: readonly IncludeDecl[];
  readonly imports: readonly string[];
  readonly decls: readonly Decl[];
  readonly declsByName: ReadonlyMap<string, Decl>;
};

export type InstantiationOrigin = {
  readonly key: string;
  readonly base: string;
  readonly args: readonly TypeRef[];
};

export type ConcreteRecord = {
  readonly kind: "record";
  readonly name: string;
  readonly origin?: InstantiationOrigin;
  readonly fields: readonly FieldDecl[];
  readonly methods: readonly MethodDecl[];
  readonly loc?: SourceLoc;
};

export type ConcreteTag = {
  readonly kind: "tag";
  readonly name: string;
  readonly origin?: InstantiationOrigin;
  readonly variants: readonly VariantDecl[];
  readonly methods: readonly MethodDecl[];
  readonly loc?: SourceLoc;
};

export type ConcreteType = ConcreteRecord | ConcreteTag;

export type ConcreteEnum = {
  readonly kind: "enum";
  readonly name: string;
  readonly members: readonly EnumMemberDecl[];
  readonly loc?: SourceLoc;
};

export type ConcreteFn = {
  readonly kind: "fn";
  readonly name: string;
  readonly origin?: InstantiationOrigin;
  readonly params: readonly Param[];
  readonly ret: TypeRef;
  readonly body?: readonly Stmt[];
  readonly lowLevel: boolean;
  readonly header?: IncludeDecl;
  readonly loc?: SourceLoc;
};

export type ConcreteAlias = {
  readonly kind: "alias";
  readonly name: string;
  readonly target: TypeRef;
  readonly loc?: SourceLoc;
};

export type ConcreteGlobal = {
  readonly kind: "global";
  readonly name: string;
  readonly type: TypeRef;
  readonly mutable: boolean;
  readonly init: Expr;
  readonly loc?: SourceLoc;
};

/**
 * A module with every generic reference replaced by its concrete instantiation.
 * Named types only ever carry concrete names with no arguments, and aliases are expanded.
 */
export type MonomorphizedModule = {
  readonly module: string;
  readonly unit: ModuleUnit;
  readonly types: readonly ConcreteType[];
  readonly functions: readonly ConcreteFn[];
  readonly aliases: readonly ConcreteAlias[];
  readonly globals: readonly ConcreteGlobal[];
  /** Type and function names in declaration order; an instantiation follows the declaration that first requested it. */
  readonly order: readonly string[];
  readonly typesByName: ReadonlyMap<string, ConcreteType>;
  readonly enums: readonly ConcreteEnum[];
  readonly enumsByName: ReadonlyMap<string, ConcreteEnum>;
  readonly functionsByName: ReadonlyMap<string, ConcreteFn>;
  readonly globalsByName: ReadonlyMap<string, ConcreteGlobal>;
  /** Compiled imports; names not declared here resolve through them. */
  readonly imports: ImportScope;
};

export type TypeLayoutInfo = {
  readonly size: number;
  readonly align: number;
  readonly heap: boolean;
};

export type VariantLayout = {
  readonly name: string;
  readonly constant: string;
  readonly value: number;
  readonly fields: readonly FieldDecl[];
  readonly loc?: SourceLoc;
};

export type TagLayout = TypeLayoutInfo & {
  readonly kind: "tag";
  readonly name: string;
  readonly enumName: string;
  readonly variants: readonly VariantLayout[];
  readonly variantsByName: ReadonlyMap<string, VariantLayout>;
};

export type RecordLayout = TypeLayoutInfo & {
  readonly kind: "record";
  readonly name: string;
  readonly fields: readonly FieldDecl[];
};

export type TypeLayout = RecordLayout | TagLayout;

/** A plain enum; its members are variants without fields. */
export type EnumLayout = TypeLayoutInfo & {
  readonly kind: "enum";
  readonly name: string;
  readonly variants: readonly VariantLayout[];
  readonly variantsByName: ReadonlyMap<string, VariantLayout>;
};

export type LayoutPlan = {
  /** Plain enums in declaration order. */
  readonly enums: ReadonlyMap<string, EnumLayout>;
  readonly layouts: ReadonlyMap<string, TypeLayout>;
  /** Concrete type names, each after every type it embeds by value; declaration order on ties. */
  readonly order: readonly string[];
  readonly byValueDeps: ReadonlyMap<string, readonly string[]>;
};

export type BindingStrategy = "Copy" | "RefImmutable" | "RefMutable" | "Pointer";

/**
 * A classified parameter. `storage: "indirect"` means the C variable holds the
 * address of the value rather than the value itself.
 */
export type ParamBinding = {
  readonly name: string;
  readonly type: TypeRef;
  readonly intent: BindingIntent | "receiver";
  readonly strategy: BindingStrategy;
  readonly storage: "direct" | "indirect";
  readonly mutable: boolean;
  readonly loc?: SourceLoc;
};

export type ReturnBinding = {
  readonly type: TypeRef;
  readonly strategy: "Copy" | "Pointer";
};

export type ClassifiedSignature = {
  readonly key: string;
  readonly owner?: string;
  readonly receiver?: ParamBinding;
  readonly params: readonly ParamBinding[];
  readonly ret: ReturnBinding;
};

export type OwnershipModel = {
  readonly signatures: ReadonlyMap<string, ClassifiedSignature>;
};

export type LoweredFunction = {
  readonly key: string;
  readonly symbol: string;
  readonly owner?: string;
  /** Receiver first for instance methods. */
  readonly params: readonly ParamBinding[];
  readonly ret: ReturnBinding;
  readonly body?: readonly Stmt[];
  readonly lowLevel: boolean;
  readonly header?: IncludeDecl;
  readonly loc?: SourceLoc;
};

export type LoweredModule = {
  readonly module: string;
  readonly functions: readonly LoweredFunction[];
  readonly functionsBySymbol: ReadonlyMap<string, LoweredFunction>;
};
