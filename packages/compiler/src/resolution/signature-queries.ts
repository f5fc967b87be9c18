import { normalizeSpan, reportDiagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { defineQuery } from "../framework/query.js";
import { ID } from "../syntax/id.js";
import type { FunctionNode } from "../syntax/nodes.js";
import {
  functionNodeFor,
  idContainsFieldWithName,
  idToAst,
  idToTag,
} from "../syntax/parsing-queries.js";
import { walk } from "../syntax/traverse.js";
import { typeArena } from "../types/arena-slot.js";
import { QualifiedType, typeOf } from "../types/qualified-type.js";
import { Types, type TypeId } from "../types/type-arena.js";
import { genericRootOf } from "./can-pass.js";
import {
  compositeTypeOf,
  fieldsForTypeDecl,
  getTypeGenericity,
  qualifiedTypeGenericity,
  receiverTypeFor,
  type ResolvedField,
} from "./genericity.js";
import { Resolver } from "./resolver.js";
import {
  internTypedSignature,
  internUntypedSignature,
  type TypedFnSignature,
  type UntypedFnSignature,
} from "./signatures.js";

/**
 * Generic formals need instantiation. Generic-with-defaults formals are
 * used with their defaults, except the receiver of a method, which takes
 * the receiver's own instantiation.
 */
export const formalNeedsInstantiation = (
  ctx: QueryContext,
  type: QualifiedType,
  isReceiver: boolean,
): boolean => {
  const genericity = qualifiedTypeGenericity(ctx, type);
  if (genericity === "generic" || genericity === "maybe-generic") return true;
  return genericity === "generic-with-defaults" && isReceiver;
};

export const anyFormalNeedsInstantiation = (
  ctx: QueryContext,
  untyped: UntypedFnSignature,
  formalTypes: readonly QualifiedType[],
  substituted: readonly boolean[] = [],
): boolean =>
  formalTypes.some(
    (type, index) =>
      !substituted[index] &&
      formalNeedsInstantiation(ctx, type, untyped.isMethod && index === 0),
  );

export const untypedSignature = defineQuery<[ID], UntypedFnSignature | undefined>({
  name: "untypedSignature",
  compute: (ctx, id) => {
    const fn = functionNodeFor(ctx, id);
    if (!fn) return undefined;
    return internUntypedSignature(ctx, {
      id,
      name: fn.name,
      idTag: "function",
      isMethod: fn.isMethod,
      isTypeConstructor: false,
      isCompilerGenerated: false,
      isParenless: fn.isParenless,
      throws: fn.throws,
      hasWhereClause: fn.whereClause !== undefined,
      formals: fn.formals.map((formal) => ({
        name: formal.name,
        decl: formal.id,
        hasDefault: formal.kind === "formal" && formal.initExpr !== undefined,
        isVarArgs: formal.kind === "vararg-formal",
      })),
    });
  },
});

const parentFunctionSignature = (
  ctx: QueryContext,
  id: ID,
): TypedFnSignature | undefined => {
  let symbol = id.parentSymbolId();
  while (!symbol.isEmpty()) {
    const tag = idToTag(ctx, symbol);
    if (tag === "module") return undefined;
    if (tag === "function") {
      const untyped = untypedSignature(ctx, symbol);
      return untyped && typedSignatureInitial(ctx, untyped);
    }
    symbol = symbol.parentSymbolId();
  }
  return undefined;
};

const checkParenlessMethod = (
  ctx: QueryContext,
  fn: FunctionNode,
  formalTypes: readonly QualifiedType[],
): void => {
  if (!fn.isParenless || !fn.isMethod) return;
  const receiver = formalTypes[0]?.type;
  const arena = typeArena(ctx);
  const composite = receiver === undefined ? undefined : compositeTypeOf(arena, receiver);
  const desc = composite === undefined ? undefined : arena.getComposite(composite);
  if (!desc || !idContainsFieldWithName(ctx, desc.decl, fn.name)) return;
  reportDiagnostic({
    ctx,
    code: "SG0001",
    params: {
      kind: "parenless-redeclares-field",
      name: fn.name,
      typeName: desc.name,
    },
    span: normalizeSpan(fn.span),
    nodeId: fn.id.toString(),
  });
};

const typedSignatureInitialQuery = defineQuery<
  [UntypedFnSignature],
  TypedFnSignature | undefined
>({
  name: "typedSignatureInitial",
  compute: (ctx, untyped) => {
    const fn = functionNodeFor(ctx, untyped.id);
    if (!fn) return undefined;
    const resolver = Resolver.forInitialSignature(ctx, fn);
    const formalTypes = resolver.resolveFormals();
    const needsInstantiation = anyFormalNeedsInstantiation(
      ctx,
      untyped,
      formalTypes,
    );
    const whereClause = needsInstantiation
      ? fn.whereClause
        ? "tbd"
        : "none"
      : resolver.resolveWhereClause();
    checkParenlessMethod(ctx, fn, formalTypes);
    return internTypedSignature(ctx, {
      untyped,
      formalTypes,
      whereClause,
      needsInstantiation,
      parentFn: parentFunctionSignature(ctx, fn.id),
    });
  },
});

/**
 * The signature of a declared function before instantiation: formal types
 * as written, with the where clause evaluated when nothing is generic.
 */
export const typedSignatureInitial = (
  ctx: QueryContext,
  untyped: UntypedFnSignature,
): TypedFnSignature | undefined =>
  untyped.isCompilerGenerated
    ? undefined
    : typedSignatureInitialQuery(ctx, untyped);

/** How a field reads as a formal of the type constructor. */
export const typeConstructorFormalType = (field: QualifiedType): QualifiedType =>
  field.isType() || field.isParam() ? field : typeOf(field.type ?? Types.any);

const typeConstructorFormal = (
  ctx: QueryContext,
  field: ResolvedField,
  otherFields: ReadonlySet<string>,
): QualifiedType | undefined => {
  const genericity = qualifiedTypeGenericity(ctx, field.type);
  if (genericity === "concrete") return undefined;
  if (field.type.isType()) return field.type;
  if (field.type.isParam()) return field.type.hasParam() ? undefined : field.type;
  if (field.hasDefault || field.type.type === undefined) return undefined;
  if (typeRefersToField(ctx, field.declId, otherFields)) return undefined;
  return genericity === "generic" ? typeConstructorFormalType(field.type) : undefined;
};

/** Whether the declared type of `declId` names one of `fields`. */
const typeRefersToField = (
  ctx: QueryContext,
  declId: ID,
  fields: ReadonlySet<string>,
): boolean => {
  const node = idToAst(ctx, declId);
  if (node?.kind !== "variable" || !node.typeExpr) return false;
  let found = false;
  walk(node.typeExpr, (child) => {
    if (child.kind === "identifier" && fields.has(child.name)) found = true;
  });
  return found;
};

/**
 * The signature of `R(...)` for the record or class `R`: one formal per
 * generic field, in declaration order.
 */
export const typeConstructorInitial = defineQuery<[TypeId], TypedFnSignature>({
  name: "typeConstructorInitial",
  compute: (ctx, type) => {
    const arena = typeArena(ctx);
    const composite = genericRootOf(
      arena,
      compositeTypeOf(arena, type) ?? type,
    );
    const desc = arena.getComposite(composite);
    const fields = fieldsForTypeDecl(ctx, composite, "ignore-defaults").fields;
    const names = new Set(fields.map((field) => field.name));
    const included = fields.flatMap((field) => {
      const others = new Set([...names].filter((name) => name !== field.name));
      const formal = typeConstructorFormal(ctx, field, others);
      return formal ? [{ field, formal }] : [];
    });
    const untyped = internUntypedSignature(ctx, {
      id: desc?.decl ?? ID.empty,
      name: desc?.name ?? "",
      idTag: arena.get(composite).kind === "basic-class" ? "class" : "record",
      isMethod: false,
      isTypeConstructor: true,
      isCompilerGenerated: true,
      isParenless: false,
      throws: false,
      hasWhereClause: false,
      formals: included.map(({ field }) => ({
        name: field.name,
        decl: field.declId,
        hasDefault: field.hasDefault,
        isVarArgs: false,
      })),
    });
    const formalTypes = included.map(({ formal }) => formal);
    return internTypedSignature(ctx, {
      untyped,
      formalTypes,
      whereClause: "none",
      needsInstantiation: anyFormalNeedsInstantiation(ctx, untyped, formalTypes),
    });
  },
});

/**
 * The parenless method `this.name` reading a field of the record or class
 * `type` declares.
 */
export const fieldAccessor = defineQuery<
  [TypeId, string],
  TypedFnSignature | undefined
>({
  name: "fieldAccessor",
  compute: (ctx, type, name) => {
    const arena = typeArena(ctx);
    const desc = arena.getComposite(type);
    const field = fieldsForTypeDecl(ctx, type, "use-defaults").byName(name);
    if (!desc || !field) return undefined;
    const isClass = desc.kind === "basic-class";
    const untyped = internUntypedSignature(ctx, {
      id: field.declId,
      name,
      idTag: "variable",
      isMethod: true,
      isTypeConstructor: false,
      isCompilerGenerated: true,
      isParenless: true,
      throws: false,
      hasWhereClause: false,
      formals: [{ name: "this", decl: desc.decl, hasDefault: false, isVarArgs: false }],
    });
    const receiver = new QualifiedType(
      isClass ? "const-in" : "const-ref",
      receiverTypeFor(arena, type),
    );
    return internTypedSignature(ctx, {
      untyped,
      formalTypes: [receiver],
      whereClause: "none",
      needsInstantiation: getTypeGenericity(ctx, type) !== "concrete",
    });
  },
});
