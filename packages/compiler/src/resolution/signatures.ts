import type { QueryContext } from "../framework/context.js";
import { defineShared } from "../framework/context.js";
import type { Keyed } from "../framework/keys.js";
import type { ID } from "../syntax/id.js";
import type { AstKind } from "../syntax/nodes.js";
import { qualifiedTypeToString } from "../types/format.js";
import { QualifiedType } from "../types/qualified-type.js";
import type { TypeArena } from "../types/type-arena.js";

/** A formal as declared: a formal node, or a field for generated functions. */
export type FormalDetail = {
  readonly name: string;
  readonly decl: ID;
  readonly hasDefault: boolean;
  readonly isVarArgs: boolean;
};

export type UntypedSignatureInit = {
  id: ID;
  name: string;
  idTag: AstKind;
  isMethod: boolean;
  isTypeConstructor: boolean;
  isCompilerGenerated: boolean;
  isParenless: boolean;
  throws: boolean;
  hasWhereClause: boolean;
  formals: readonly FormalDetail[];
};

export class UntypedFnSignature implements Keyed {
  readonly id: ID;
  readonly name: string;
  readonly idTag: AstKind;
  readonly isMethod: boolean;
  readonly isTypeConstructor: boolean;
  readonly isCompilerGenerated: boolean;
  readonly isParenless: boolean;
  readonly throws: boolean;
  readonly hasWhereClause: boolean;
  readonly formals: readonly FormalDetail[];

  constructor(
    readonly uid: number,
    init: UntypedSignatureInit,
  ) {
    this.id = init.id;
    this.name = init.name;
    this.idTag = init.idTag;
    this.isMethod = init.isMethod;
    this.isTypeConstructor = init.isTypeConstructor;
    this.isCompilerGenerated = init.isCompilerGenerated;
    this.isParenless = init.isParenless;
    this.throws = init.throws;
    this.hasWhereClause = init.hasWhereClause;
    this.formals = init.formals;
  }

  isInitializer(): boolean {
    return this.isMethod && this.name === "init";
  }

  queryKey(): string {
    return `usig#${this.uid}`;
  }
}

export type WhereClauseResult = "none" | "true" | "false" | "tbd";

export type TypedSignatureInit = {
  untyped: UntypedFnSignature;
  formalTypes: readonly QualifiedType[];
  whereClause: WhereClauseResult;
  needsInstantiation: boolean;
  instantiatedFrom?: TypedFnSignature;
  parentFn?: TypedFnSignature;
  /** Parallel to `formalTypes`; true where a substitution replaced the formal. */
  formalsInstantiated?: readonly boolean[];
};

/**
 * A function signature with formal types. Signatures are interned per
 * context, so two equal signatures are the same object.
 */
export class TypedFnSignature implements Keyed {
  readonly untyped: UntypedFnSignature;
  readonly formalTypes: readonly QualifiedType[];
  readonly whereClause: WhereClauseResult;
  readonly needsInstantiation: boolean;
  readonly instantiatedFrom?: TypedFnSignature;
  readonly parentFn?: TypedFnSignature;
  readonly formalsInstantiated: readonly boolean[];

  constructor(
    readonly uid: number,
    init: TypedSignatureInit,
  ) {
    this.untyped = init.untyped;
    this.formalTypes = init.formalTypes;
    this.whereClause = init.whereClause;
    this.needsInstantiation = init.needsInstantiation;
    this.instantiatedFrom = init.instantiatedFrom;
    this.parentFn = init.parentFn;
    this.formalsInstantiated =
      init.formalsInstantiated ?? init.formalTypes.map(() => false);
  }

  get id(): ID {
    return this.untyped.id;
  }

  get name(): string {
    return this.untyped.name;
  }

  numFormals(): number {
    return this.formalTypes.length;
  }

  formalType(index: number): QualifiedType {
    return this.formalTypes[index] ?? QualifiedType.unknown;
  }

  formalName(index: number): string {
    return this.untyped.formals[index]?.name ?? "";
  }

  formalIsInstantiated(index: number): boolean {
    return this.formalsInstantiated[index] ?? false;
  }

  isInstantiated(): boolean {
    return this.instantiatedFrom !== undefined;
  }

  /** The signature this one was ultimately instantiated from. */
  initialSignature(): TypedFnSignature {
    let current: TypedFnSignature = this;
    while (current.instantiatedFrom) current = current.instantiatedFrom;
    return current;
  }

  queryKey(): string {
    return `sig#${this.uid}`;
  }
}

type SignatureTables = {
  untyped: Map<string, UntypedFnSignature>;
  typed: Map<string, TypedFnSignature>;
  nextUid: number;
};

const signatureTables = defineShared(
  (): SignatureTables => ({
    untyped: new Map(),
    typed: new Map(),
    nextUid: 1,
  }),
);

const untypedKey = (init: UntypedSignatureInit): string =>
  JSON.stringify({
    ...init,
    id: init.id.toString(),
    formals: init.formals.map((formal) => ({
      ...formal,
      decl: formal.decl.toString(),
    })),
  });

export const internUntypedSignature = (
  ctx: QueryContext,
  init: UntypedSignatureInit,
): UntypedFnSignature => {
  const tables = signatureTables.get(ctx);
  const key = untypedKey(init);
  const existing = tables.untyped.get(key);
  if (existing) return existing;
  const created = new UntypedFnSignature(tables.nextUid++, init);
  tables.untyped.set(key, created);
  return created;
};

const typedKey = (init: TypedSignatureInit): string =>
  [
    init.untyped.uid,
    init.formalTypes.map((type) => type.queryKey()).join(";"),
    init.whereClause,
    init.needsInstantiation,
    init.instantiatedFrom?.uid ?? "",
    init.parentFn?.uid ?? "",
    (init.formalsInstantiated ?? []).map((bit) => (bit ? 1 : 0)).join(""),
  ].join("|");

export const internTypedSignature = (
  ctx: QueryContext,
  init: TypedSignatureInit,
): TypedFnSignature => {
  const tables = signatureTables.get(ctx);
  const normalized: TypedSignatureInit = {
    ...init,
    formalsInstantiated:
      init.formalsInstantiated ?? init.formalTypes.map(() => false),
  };
  const key = typedKey(normalized);
  const existing = tables.typed.get(key);
  if (existing) return existing;
  const created = new TypedFnSignature(tables.nextUid++, normalized);
  tables.typed.set(key, created);
  return created;
};

export const signatureToString = (
  arena: TypeArena,
  sig: TypedFnSignature,
): string => {
  const formals = sig.formalTypes.map(
    (type, index) =>
      `${sig.formalName(index)}: ${qualifiedTypeToString(arena, type)}`,
  );
  return sig.untyped.isParenless
    ? sig.name
    : `${sig.name}(${formals.join(", ")})`;
};
