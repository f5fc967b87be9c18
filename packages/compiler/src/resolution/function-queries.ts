import { normalizeSpan, reportDiagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { defineQuery } from "../framework/query.js";
import type { ID } from "../syntax/id.js";
import type { FunctionNode } from "../syntax/nodes.js";
import { functionNodeFor } from "../syntax/parsing-queries.js";
import { typeArena } from "../types/arena-slot.js";
import { qualifiedTypeToString } from "../types/format.js";
import { QualifiedType, typeOf, valueOf } from "../types/qualified-type.js";
import { Types, type Substitution, type TypeId } from "../types/type-arena.js";
import { generatedReturnType } from "./default-functions.js";
import {
  canonicalSubstitution,
  compositeTypeOf,
  fieldsForTypeDecl,
  initialTypeForTypeDecl,
  instantiateCompositeType,
  withManageable,
} from "./genericity.js";
import { InitResolver } from "./init-resolver.js";
import { PoiInfo, type PoiScope } from "./poi.js";
import {
  ResolutionResultByPostorderID,
  ResolvedFunction,
  type ResolvedExpression,
} from "./resolved.js";
import { Resolver } from "./resolver.js";
import { typedSignatureInitial, untypedSignature } from "./signature-queries.js";
import type { TypedFnSignature } from "./signatures.js";

const voidValue = () => valueOf(Types.void, "const-var");

/** What reading a field through its accessor yields. */
const accessorReturnType = (
  ctx: QueryContext,
  sig: TypedFnSignature,
): QualifiedType => {
  const receiver = sig.formalType(0).type;
  const composite =
    receiver === undefined ? undefined : compositeTypeOf(typeArena(ctx), receiver);
  const field =
    composite === undefined
      ? undefined
      : fieldsForTypeDecl(ctx, composite, "use-defaults").byDecl(sig.id);
  if (!field) return QualifiedType.erroneous();
  switch (field.type.kind) {
    case "var":
      return field.type.withKind("ref");
    case "const-var":
      return field.type.withKind("const-ref");
    default:
      return field.type;
  }
};

const generatedFunctionReturnType = (
  ctx: QueryContext,
  sig: TypedFnSignature,
): QualifiedType =>
  generatedReturnType(sig) ??
  (sig.untyped.isParenless ? accessorReturnType(ctx, sig) : QualifiedType.erroneous());

/**
 * A generated initializer sets every field from the formal of the same
 * name, so the receiver follows from the formal types alone.
 */
const resolveGeneratedFunction = (
  ctx: QueryContext,
  sig: TypedFnSignature,
): ResolvedFunction => {
  const poiInfo = new PoiInfo(undefined, true);
  const results = new ResolutionResultByPostorderID();
  if (!sig.untyped.isInitializer()) {
    return new ResolvedFunction(sig, results, poiInfo, generatedFunctionReturnType(ctx, sig));
  }
  const site = { id: sig.id };
  const init = new InitResolver(ctx, sig, site);
  sig.untyped.formals.forEach((formal, index) => {
    if (index === 0) return;
    init.handleAssignment(formal.name, sig.formalType(index), { id: formal.decl });
  });
  return new ResolvedFunction(init.finalize(), results, poiInfo, voidValue());
};

/** The return type implied by the `return` statements of a body. */
const inferReturnType = (
  ctx: QueryContext,
  fn: FunctionNode,
  returns: readonly QualifiedType[],
): QualifiedType => {
  const [first, ...rest] = returns;
  if (!first) return voidValue();
  if (returns.some((type) => type.isErroneous())) return QualifiedType.erroneous();
  if (rest.every((type) => type.equals(first))) {
    return first.isType() || first.isParam() ? first : first.withKind("const-var");
  }
  if (!first.isType() && rest.every((type) => !type.isType() && type.type === first.type)) {
    return valueOf(first.type ?? Types.unknown, "const-var");
  }

  const second = rest.find((type) => !type.equals(first)) ?? first;
  const arena = typeArena(ctx);
  reportDiagnostic({
    ctx,
    code: "CR0006",
    params: {
      kind: "return-type-mismatch",
      functionName: fn.name,
      first: qualifiedTypeToString(arena, first),
      second: qualifiedTypeToString(arena, second),
    },
    span: normalizeSpan(fn.returnType?.span, fn.span),
    nodeId: fn.id.toString(),
  });
  return QualifiedType.erroneous();
};

const declaredReturnType = (declared: QualifiedType): QualifiedType => {
  if (declared.isErroneous() || declared.type === undefined) {
    return QualifiedType.erroneous();
  }
  return valueOf(declared.type, "const-var");
};

const computeResolvedFunction = (
  ctx: QueryContext,
  sig: TypedFnSignature,
  poi: PoiScope | undefined,
): ResolvedFunction => {
  if (sig.untyped.isCompilerGenerated) return resolveGeneratedFunction(ctx, sig);
  const fn = functionNodeFor(ctx, sig.id);
  if (!fn) {
    return new ResolvedFunction(
      sig,
      new ResolutionResultByPostorderID(),
      new PoiInfo(undefined, true),
      QualifiedType.erroneous(),
    );
  }

  const resolver = Resolver.forFunction(ctx, fn, sig, poi);
  if (sig.untyped.isInitializer()) {
    resolver.initResolver = new InitResolver(ctx, sig, { id: fn.id, span: fn.span });
  }
  const declared = resolver.resolveReturnTypeExpr();
  resolver.resolveBody();

  const finalSig = resolver.initResolver?.finalize() ?? sig;
  const returns = declared
    ? declaredReturnType(declared)
    : inferReturnType(ctx, fn, resolver.returns);
  return new ResolvedFunction(
    finalSig,
    resolver.byPostorder,
    resolver.poiInfo.markResolved(),
    returns,
  );
};

/**
 * Results keyed by what the body took from its points of instantiation.
 * Only ever stored; the first store in a revision wins.
 */
const resolveFunctionByPoisQuery = defineQuery<
  [TypedFnSignature, string, string],
  ResolvedFunction | undefined
>({
  name: "resolveFunctionByPois",
  compute: () => undefined,
});

/**
 * Resolves the body of `sig` as instantiated at `poi`. Two instantiations
 * that used the same POI functions come back as the same object.
 */
export const resolveFunctionByInfoQuery = defineQuery<
  [TypedFnSignature, PoiScope | undefined],
  ResolvedFunction
>({
  name: "resolveFunctionByInfo",
  compute: (ctx, sig, poi) => {
    const computed = computeResolvedFunction(ctx, sig, poi);
    const key: [TypedFnSignature, string, string] = [
      sig,
      computed.poiInfo.poiFnIdsKey(),
      computed.poiInfo.recursiveFnsKey(),
    ];
    ctx.storeResult(resolveFunctionByPoisQuery.definition, key, computed);
    return resolveFunctionByPoisQuery(ctx, ...key) ?? computed;
  },
});

/** Only instantiated signatures depend on where they were instantiated. */
const poiFor = (sig: TypedFnSignature, poi: PoiScope | undefined) =>
  sig.isInstantiated() ? poi : undefined;

export const resolveFunction = (
  ctx: QueryContext,
  sig: TypedFnSignature,
  poi: PoiScope | undefined,
): ResolvedFunction => resolveFunctionByInfoQuery(ctx, sig, poiFor(sig, poi));

/**
 * Resolves an initializer; the result's signature has the receiver
 * instantiated from the fields the body sets.
 */
export const resolveInitializer = (
  ctx: QueryContext,
  sig: TypedFnSignature,
  poi: PoiScope | undefined,
): ResolvedFunction => resolveFunctionByInfoQuery(ctx, sig, poiFor(sig, poi));

/** The type a type-constructor call `R(...)` with signature `sig` produces. */
export const typeConstructorResultType = (
  ctx: QueryContext,
  sig: TypedFnSignature,
  called: TypeId,
): QualifiedType => {
  const arena = typeArena(ctx);
  const composite = compositeTypeOf(arena, called);
  if (composite === undefined) return QualifiedType.erroneous();
  const substitutions: Substitution[] = sig.untyped.formals.flatMap((formal, index) =>
    sig.formalIsInstantiated(index)
      ? [{ field: formal.decl, type: canonicalSubstitution(sig.formalType(index)) }]
      : [],
  );
  const instantiated =
    substitutions.length === 0
      ? composite
      : instantiateCompositeType(ctx, composite, substitutions);
  return typeOf(withManageable(arena, called, instantiated));
};

export const returnType = defineQuery<
  [TypedFnSignature, PoiScope | undefined],
  QualifiedType
>({
  name: "returnType",
  compute: (ctx, sig, poi) => {
    if (sig.untyped.isTypeConstructor) {
      return typeConstructorResultType(ctx, sig, initialTypeForTypeDecl(ctx, sig.id));
    }
    if (sig.untyped.isCompilerGenerated) return generatedFunctionReturnType(ctx, sig);

    const fn = functionNodeFor(ctx, sig.id);
    if (fn?.returnType) {
      const declared = Resolver.forFunction(ctx, fn, sig, poi).resolveReturnTypeExpr();
      return declared ? declaredReturnType(declared) : QualifiedType.erroneous();
    }
    return resolveFunction(ctx, sig, poi).returnType;
  },
});

/** The body of a non-generic function; undefined for generic ones. */
export const resolveConcreteFunction = defineQuery<[ID], ResolvedFunction | undefined>({
  name: "resolveConcreteFunction",
  compute: (ctx, id) => {
    const untyped = untypedSignature(ctx, id);
    const sig = untyped && typedSignatureInitial(ctx, untyped);
    if (!sig || sig.needsInstantiation) return undefined;
    return resolveFunction(ctx, sig, undefined);
  },
});

/** Name resolution alone over a function's formals, clauses and body. */
export const scopeResolveFunction = defineQuery<[ID], ResolutionResultByPostorderID>({
  name: "scopeResolveFunction",
  compute: (ctx, id) => {
    const fn = functionNodeFor(ctx, id);
    if (!fn) return new ResolutionResultByPostorderID();
    const resolver = Resolver.forScopeResolving(ctx, fn);
    fn.formals.forEach((formal) => resolver.resolve(formal));
    if (fn.returnType) resolver.resolve(fn.returnType);
    if (fn.whereClause) resolver.resolve(fn.whereClause);
    resolver.resolveBody();
    return resolver.byPostorder;
  },
});

/** The body of the single function a call expression resolved to. */
export const resolveOnlyCandidate = (
  ctx: QueryContext,
  expr: ResolvedExpression,
): ResolvedFunction | undefined => {
  const only = expr.mostSpecific.only();
  return only && resolveFunction(ctx, only.fn, expr.poiScope);
};
