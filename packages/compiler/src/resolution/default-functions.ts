import type { QueryContext } from "../framework/context.js";
import { defineQuery } from "../framework/query.js";
import type { Scope } from "../scopes/scope.js";
import { moduleScope, scopeForScopeNode } from "../scopes/scope-queries.js";
import { functionNodeFor } from "../syntax/parsing-queries.js";
import { typeArena } from "../types/arena-slot.js";
import { QualifiedType, typeOf } from "../types/qualified-type.js";
import { Types, type CompositeType, type TypeId } from "../types/type-arena.js";
import {
  compositeTypeOf,
  fieldsForTypeDecl,
  receiverTypeFor,
} from "./genericity.js";
import { anyFormalNeedsInstantiation } from "./signature-queries.js";
import {
  internTypedSignature,
  internUntypedSignature,
  type TypedFnSignature,
} from "./signatures.js";

const declaringScopes = (ctx: QueryContext, desc: CompositeType): Scope[] =>
  [
    scopeForScopeNode(ctx, desc.decl),
    moduleScope(ctx, desc.decl.moduleName()),
  ].filter((scope): scope is Scope => scope !== undefined);

/** Whether the user wrote a method `name` for the type `desc`. */
const hasUserMethod = (
  ctx: QueryContext,
  desc: CompositeType,
  name: string,
): boolean =>
  declaringScopes(ctx, desc).some((scope) =>
    scope.namesDeclared(name).some((decl) => {
      if (decl.kind !== "method") return false;
      if (scope.id.equals(desc.decl)) return true;
      const receiver = functionNodeFor(ctx, decl.id)?.formals[0]?.typeExpr;
      return receiver?.kind === "identifier" && receiver.name === desc.name;
    }),
  );

const hasUserOperator = (
  ctx: QueryContext,
  desc: CompositeType,
  name: string,
): boolean =>
  declaringScopes(ctx, desc).some((scope) =>
    scope.namesDeclared(name).some((decl) => decl.kind === "function"),
  );

/**
 * Whether calling `name` on a receiver of `type` should consider a
 * compiler-generated candidate: the default initializer, or `==` and `!=`
 * on records.
 */
export const needCompilerGeneratedMethod = (
  ctx: QueryContext,
  type: TypeId,
  name: string,
  parenless: boolean,
): boolean => {
  if (parenless) return false;
  const arena = typeArena(ctx);
  const composite = compositeTypeOf(arena, type);
  const desc = composite === undefined ? undefined : arena.getComposite(composite);
  if (!desc || desc.decl.isEmpty()) return false;
  if (name === "init") return !hasUserMethod(ctx, desc, "init");
  if (name === "==" || name === "!=") {
    return desc.kind === "record" && !hasUserOperator(ctx, desc, name);
  }
  return false;
};

/** The formal of a generated initializer taking a field of type `field`. */
export const initFormalType = (field: QualifiedType): QualifiedType => {
  if (field.isType()) return typeOf(field.type ?? Types.any);
  if (field.isParam()) return field;
  return new QualifiedType("in", field.type ?? Types.any);
};

/** `init(this, field1, field2, ...)` with one formal per field. */
const generatedInit = (
  ctx: QueryContext,
  composite: TypeId,
  desc: CompositeType,
): TypedFnSignature => {
  const arena = typeArena(ctx);
  const fields = fieldsForTypeDecl(ctx, composite, "ignore-defaults").fields;
  const untyped = internUntypedSignature(ctx, {
    id: desc.decl,
    name: "init",
    idTag: desc.kind === "record" ? "record" : "class",
    isMethod: true,
    isTypeConstructor: false,
    isCompilerGenerated: true,
    isParenless: false,
    throws: false,
    hasWhereClause: false,
    formals: [
      { name: "this", decl: desc.decl, hasDefault: false, isVarArgs: false },
      ...fields.map((field) => ({
        name: field.name,
        decl: field.declId,
        hasDefault: field.hasDefault,
        isVarArgs: false,
      })),
    ],
  });
  const formalTypes = [
    new QualifiedType("ref", receiverTypeFor(arena, composite)),
    ...fields.map((field) => initFormalType(field.type)),
  ];
  return internTypedSignature(ctx, {
    untyped,
    formalTypes,
    whereClause: "none",
    needsInstantiation: anyFormalNeedsInstantiation(ctx, untyped, formalTypes),
  });
};

/** Field-wise `==` or `!=` on a record. */
const generatedComparison = (
  ctx: QueryContext,
  composite: TypeId,
  desc: CompositeType,
  name: string,
): TypedFnSignature => {
  const untyped = internUntypedSignature(ctx, {
    id: desc.decl,
    name,
    idTag: "record",
    isMethod: false,
    isTypeConstructor: false,
    isCompilerGenerated: true,
    isParenless: false,
    throws: false,
    hasWhereClause: false,
    formals: ["lhs", "rhs"].map((formal) => ({
      name: formal,
      decl: desc.decl,
      hasDefault: false,
      isVarArgs: false,
    })),
  });
  const operand = new QualifiedType("const-ref", composite);
  const formalTypes = [operand, operand];
  return internTypedSignature(ctx, {
    untyped,
    formalTypes,
    whereClause: "none",
    needsInstantiation: anyFormalNeedsInstantiation(ctx, untyped, formalTypes),
  });
};

export const getCompilerGeneratedMethod = defineQuery<
  [TypeId, string],
  TypedFnSignature | undefined
>({
  name: "getCompilerGeneratedMethod",
  compute: (ctx, type, name) => {
    const arena = typeArena(ctx);
    const composite = compositeTypeOf(arena, type);
    const desc = composite === undefined ? undefined : arena.getComposite(composite);
    if (composite === undefined || !desc) return undefined;
    if (name === "init") return generatedInit(ctx, composite, desc);
    if (name === "==" || name === "!=") {
      return generatedComparison(ctx, composite, desc, name);
    }
    return undefined;
  },
});

/** Return types of generated functions that do not depend on a body. */
export const generatedReturnType = (
  sig: TypedFnSignature,
): QualifiedType | undefined => {
  if (!sig.untyped.isCompilerGenerated) return undefined;
  if (sig.untyped.isInitializer()) return new QualifiedType("const-var", Types.void);
  if (sig.name === "==" || sig.name === "!=") {
    return new QualifiedType("const-var", Types.bool);
  }
  return undefined;
};
