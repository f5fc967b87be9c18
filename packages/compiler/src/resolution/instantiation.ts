import type { QueryContext } from "../framework/context.js";
import { defineQuery, isQueryRunning } from "../framework/query.js";
import type { ID } from "../syntax/id.js";
import type { AggregateNode, FunctionNode } from "../syntax/nodes.js";
import { aggregateNodeFor, functionNodeFor, idToTag } from "../syntax/parsing-queries.js";
import { typeArena } from "../types/arena-slot.js";
import { QualifiedType, typeOf, valueOf } from "../types/qualified-type.js";
import { Types, type TypeId } from "../types/type-arena.js";
import {
  CallInfo,
  FormalActualMap,
  applicabilityEquals,
  applicable,
  notApplicable,
  type ApplicabilityResult,
  type FormalActual,
} from "./call-info.js";
import { canPass } from "./can-pass.js";
import { initFormalType } from "./default-functions.js";
import { resolveInitializer, resolveFunctionByInfoQuery } from "./function-queries.js";
import {
  canonicalSubstitution,
  compositeTypeOf,
  getTypeGenericity,
  initialTypeForTypeDecl,
  isNameOfField,
  qualifiedTypeGenericity,
} from "./genericity.js";
import type { PoiScope } from "./poi.js";
import { Resolver } from "./resolver.js";
import {
  anyFormalNeedsInstantiation,
  fieldAccessor,
  formalNeedsInstantiation,
  typeConstructorFormalType,
  typedSignatureInitial,
  untypedSignature,
} from "./signature-queries.js";
import {
  internTypedSignature,
  type TypedFnSignature,
  type UntypedFnSignature,
} from "./signatures.js";

/** Where the formals of a signature come from when re-resolving them. */
type FormalSource =
  | { kind: "function"; fn: FunctionNode }
  | {
      kind: "aggregate";
      aggregate: AggregateNode;
      type: TypeId;
      formalFor: (field: QualifiedType) => QualifiedType;
    }
  | { kind: "fixed" };

const formalSourceFor = (ctx: QueryContext, sig: TypedFnSignature): FormalSource => {
  const untyped = sig.untyped;
  if (!untyped.isCompilerGenerated) {
    const fn = functionNodeFor(ctx, untyped.id);
    return fn ? { kind: "function", fn } : { kind: "fixed" };
  }
  const aggregate = aggregateNodeFor(ctx, untyped.id);
  if (!aggregate) return { kind: "fixed" };
  const arena = typeArena(ctx);
  if (untyped.isTypeConstructor) {
    const declared = initialTypeForTypeDecl(ctx, untyped.id);
    return {
      kind: "aggregate",
      aggregate,
      type: compositeTypeOf(arena, declared) ?? declared,
      formalFor: typeConstructorFormalType,
    };
  }
  const receiver = sig.formalType(0).type;
  const composite = receiver === undefined ? undefined : compositeTypeOf(arena, receiver);
  if (untyped.isInitializer() && composite !== undefined) {
    return {
      kind: "aggregate",
      aggregate,
      type: composite,
      formalFor: initFormalType,
    };
  }
  return { kind: "fixed" };
};

/**
 * The type to substitute for a generic formal: the actual's type, except
 * that a generic class formal keeps whatever it already fixes.
 */
const getInstantiationType = (
  ctx: QueryContext,
  actual: TypeId,
  formal: TypeId,
): TypeId => {
  const arena = typeArena(ctx);
  const actualDesc = arena.get(actual);
  const formalDesc = arena.get(formal);
  if (actualDesc.kind !== "class" || formalDesc.kind !== "class") return actual;
  const keepsManageable =
    formalDesc.manageable !== Types.anyClass &&
    getTypeGenericity(ctx, formalDesc.manageable) === "concrete";
  return arena.internClass({
    manageable: keepsManageable ? formalDesc.manageable : actualDesc.manageable,
    management:
      formalDesc.management === "generic" ? actualDesc.management : formalDesc.management,
    nilability:
      formalDesc.nilability === "generic" ? actualDesc.nilability : formalDesc.nilability,
  });
};

/** Method-ness, parenless-ness and formal/actual arity of a candidate. */
export const isUntypedSignatureApplicable = (
  untyped: UntypedFnSignature,
  ci: CallInfo,
): ApplicabilityResult | undefined => {
  if (untyped.isParenless !== ci.isParenless) {
    return notApplicable(untyped.id, "parenless-mismatch");
  }
  if (!ci.isOpCall && untyped.isMethod !== ci.isMethodCall) {
    return notApplicable(untyped.id, "method-mismatch");
  }
  if (!FormalActualMap.compute(untyped, ci).isValid) {
    return notApplicable(untyped.id, "formal-actual-mismatch");
  }
  return undefined;
};

const varArgMismatch = (
  ctx: QueryContext,
  sig: TypedFnSignature,
  formalIdx: number,
  entries: readonly FormalActual[],
): ApplicabilityResult | undefined => {
  const formal = sig.formalType(formalIdx);
  const desc = formal.type === undefined ? undefined : typeArena(ctx).get(formal.type);
  if (desc?.kind !== "vararg-tuple") return undefined;
  if (desc.count !== undefined && desc.count !== entries.length) {
    return notApplicable(sig.id, "vararg-mismatch", { formalIdx });
  }
  for (const entry of entries) {
    const got = canPass(ctx, entry.actualType, new QualifiedType(formal.kind, desc.element));
    if (!got.passes) {
      return notApplicable(sig.id, "type-mismatch", {
        formalIdx,
        passFailure: got.failReason,
      });
    }
  }
  return undefined;
};

/** Checks every actual against the initial, possibly generic, formal types. */
export const isInitialTypedSignatureApplicable = (
  ctx: QueryContext,
  sig: TypedFnSignature,
  ci: CallInfo,
): ApplicabilityResult => {
  const map = FormalActualMap.compute(sig.untyped, ci, sig.formalTypes);
  if (!map.isValid) return notApplicable(sig.id, "formal-actual-mismatch");

  for (const entry of map.byFormals) {
    if (entry.isVarArgEntry || entry.actualIdx < 0) continue;
    const got = canPass(ctx, entry.actualType, entry.formalType);
    if (!got.passes) {
      return notApplicable(sig.id, "type-mismatch", {
        formalIdx: entry.formalIdx,
        passFailure: got.failReason,
      });
    }
  }
  for (const [formalIdx, formal] of sig.untyped.formals.entries()) {
    if (!formal.isVarArgs) continue;
    const entries = map.byFormals.filter((entry) => entry.formalIdx === formalIdx);
    const failed = varArgMismatch(ctx, sig, formalIdx, entries);
    if (failed) return failed;
  }
  if (sig.whereClause === "false") return notApplicable(sig.id, "where-clause");
  return applicable(sig);
};

/**
 * Whether the declaration `id` applies to `ci` before instantiation. A field
 * named by a parenless method call applies through its accessor.
 */
export const isCandidateApplicableInitial = defineQuery<
  [ID, CallInfo],
  ApplicabilityResult
>({
  name: "isCandidateApplicableInitial",
  compute: (ctx, id, ci) => {
    const tag = idToTag(ctx, id);
    if (tag === "function") {
      const untyped = untypedSignature(ctx, id);
      if (!untyped) return notApplicable(id, "not-a-function");
      const failed = isUntypedSignatureApplicable(untyped, ci);
      if (failed) return failed;
      const sig = typedSignatureInitial(ctx, untyped);
      return sig
        ? isInitialTypedSignatureApplicable(ctx, sig, ci)
        : notApplicable(id, "not-a-function");
    }
    const receiver = ci.receiverType()?.type;
    if (tag === "variable" && ci.isParenless && receiver !== undefined) {
      const declaring = isNameOfField(ctx, ci.name, receiver);
      const accessor =
        declaring === undefined ? undefined : fieldAccessor(ctx, declaring, ci.name);
      if (accessor && accessor.id.equals(id)) {
        return isInitialTypedSignatureApplicable(ctx, accessor, ci);
      }
    }
    return notApplicable(id, "not-a-function");
  },
  equals: applicabilityEquals,
});

export const filterCandidatesInitial = defineQuery<
  [readonly ID[], CallInfo],
  readonly ApplicabilityResult[]
>({
  name: "filterCandidatesInitial",
  compute: (ctx, ids, ci) =>
    ids.map((id) => isCandidateApplicableInitial(ctx, id, ci)),
  equals: (left, right) =>
    left.length === right.length &&
    left.every((result, index) => {
      const other = right[index];
      return other !== undefined && applicabilityEquals(result, other);
    }),
});

type InstantiationState = {
  readonly sig: TypedFnSignature;
  readonly ci: CallInfo;
  readonly source: FormalSource;
  readonly resolver?: Resolver;
  readonly formalTypes: QualifiedType[];
  readonly instantiated: boolean[];
  substituted: boolean;
};

/** Re-resolves formal `index` under the substitutions made so far. */
const reresolveFormal = (state: InstantiationState, index: number): QualifiedType => {
  const { resolver, source, sig } = state;
  const decl = sig.untyped.formals[index]?.decl;
  if (!resolver || !decl || source.kind === "fixed") return sig.formalType(index);
  if (source.kind === "aggregate" && decl.equals(source.aggregate.id)) {
    return sig.formalType(index);
  }
  const type = resolver.resolveFormalDecl(decl);
  return source.kind === "aggregate" ? source.formalFor(type) : type;
};

const substitute = (state: InstantiationState, index: number, sub: QualifiedType): void => {
  const decl = state.sig.untyped.formals[index]?.decl;
  if (decl && state.source.kind !== "fixed") {
    state.resolver?.substitutions.set(decl.toString(), sub);
  }
  state.instantiated[index] = true;
  state.substituted = true;
};

/** The actual as the formal would see it; type constructors take types. */
const normalizedActual = (
  state: InstantiationState,
  actual: QualifiedType,
  formal: QualifiedType,
): QualifiedType =>
  state.sig.untyped.isTypeConstructor &&
  formal.isType() &&
  !actual.isType() &&
  actual.type !== undefined
    ? typeOf(actual.type)
    : actual;

const instantiateVarArgs = (
  ctx: QueryContext,
  state: InstantiationState,
  index: number,
  entries: readonly FormalActual[],
): ApplicabilityResult | undefined => {
  const { sig } = state;
  const failed = varArgMismatch(ctx, sig, index, entries);
  if (failed) return failed;
  const formal = state.formalTypes[index] ?? sig.formalType(index);
  const desc = formal.type === undefined ? undefined : typeArena(ctx).get(formal.type);
  if (desc?.kind !== "vararg-tuple") return undefined;

  const elementIsGeneric = qualifiedTypeGenericity(ctx, valueOf(desc.element)) !== "concrete";
  const elements = entries.map((entry) => {
    const actual = entry.actualType.type ?? Types.unknown;
    return elementIsGeneric ? getInstantiationType(ctx, actual, desc.element) : desc.element;
  });
  substitute(state, index, typeOf(typeArena(ctx).internTuple(elements)));
  state.formalTypes[index] = reresolveFormal(state, index);
  return undefined;
};

const instantiateFormal = (
  ctx: QueryContext,
  state: InstantiationState,
  index: number,
  entry: FormalActual,
): ApplicabilityResult | undefined => {
  const { sig, ci } = state;
  const formal = state.formalTypes[index] ?? sig.formalType(index);
  const isReceiver = sig.untyped.isMethod && index === 0;

  if (entry.actualIdx < 0) {
    if (!ci.hasQuestionArg && formalNeedsInstantiation(ctx, formal, isReceiver)) {
      substitute(state, index, QualifiedType.unknown);
      state.formalTypes[index] = reresolveFormal(state, index);
    }
    return undefined;
  }

  const actual = normalizedActual(state, entry.actualType, formal);
  const got = canPass(ctx, actual, formal);
  if (!got.passes) {
    return notApplicable(sig.id, "type-mismatch", {
      formalIdx: index,
      passFailure: got.failReason,
    });
  }
  if (!formalNeedsInstantiation(ctx, formal, isReceiver) || actual.type === undefined) {
    return undefined;
  }

  const type =
    got.converts() && formal.type !== undefined
      ? getInstantiationType(ctx, actual.type, formal.type)
      : actual.type;
  substitute(
    state,
    index,
    actual.isParam() && formal.isParam()
      ? new QualifiedType("param", type, actual.param)
      : canonicalSubstitution(typeOf(type)),
  );
  state.formalTypes[index] = reresolveFormal(state, index);

  // The declared type, with the queries bound, must still accept the actual.
  const decl = sig.untyped.formals[index]?.decl;
  if (state.resolver && decl && state.source.kind === "function") {
    state.resolver.ignoreSubstitutionFor = decl;
    const declared = reresolveFormal(state, index);
    state.resolver.ignoreSubstitutionFor = undefined;
    if (qualifiedTypeGenericity(ctx, declared) === "concrete") {
      const recheck = canPass(ctx, actual, declared);
      if (!recheck.passes) {
        return notApplicable(sig.id, "type-mismatch", {
          formalIdx: index,
          passFailure: recheck.failReason,
        });
      }
    }
  }
  return undefined;
};

const resolverFor = (
  ctx: QueryContext,
  source: FormalSource,
  poi: PoiScope | undefined,
): Resolver | undefined => {
  switch (source.kind) {
    case "function":
      return Resolver.forInstantiatedSignature(ctx, source.fn, poi);
    case "aggregate":
      return Resolver.forInstantiatedSignature(ctx, source.aggregate, poi, source.type);
    case "fixed":
      return undefined;
  }
};

/**
 * Instantiates a generic candidate for `ci`: each generic formal takes the
 * type of its actual, in order, and later formals are re-resolved with
 * the earlier substitutions in scope.
 */
export const instantiateSignature = defineQuery<
  [TypedFnSignature, CallInfo, PoiScope | undefined],
  ApplicabilityResult
>({
  name: "instantiateSignature",
  compute: (ctx, sig, ci, poi) => {
    const map = FormalActualMap.compute(sig.untyped, ci, sig.formalTypes);
    if (!map.isValid) return notApplicable(sig.id, "formal-actual-mismatch");

    const source = formalSourceFor(ctx, sig);
    const state: InstantiationState = {
      sig,
      ci,
      source,
      resolver: resolverFor(ctx, source, poi),
      formalTypes: [...sig.formalTypes],
      instantiated: [...sig.formalsInstantiated],
      substituted: false,
    };

    for (let index = 0; index < sig.numFormals(); index += 1) {
      const entries = map.byFormals.filter((entry) => entry.formalIdx === index);
      if (sig.formalIsInstantiated(index)) {
        const decl = sig.untyped.formals[index]?.decl;
        if (decl && source.kind === "function") {
          state.resolver?.substitutions.set(
            decl.toString(),
            canonicalSubstitution(sig.formalType(index)),
          );
        }
        continue;
      }
      state.formalTypes[index] = reresolveFormal(state, index);

      const failed = sig.untyped.formals[index]?.isVarArgs
        ? instantiateVarArgs(ctx, state, index, entries)
        : entries[0] && instantiateFormal(ctx, state, index, entries[0]);
      if (failed) return failed;
    }

    if (!state.substituted) return applicable(sig);

    const whereClause =
      sig.untyped.hasWhereClause && state.resolver
        ? state.resolver.resolveWhereClause()
        : sig.whereClause;
    if (whereClause === "false") return notApplicable(sig.id, "where-clause");

    const instantiated = internTypedSignature(ctx, {
      untyped: sig.untyped,
      formalTypes: state.formalTypes,
      whereClause,
      needsInstantiation: anyFormalNeedsInstantiation(
        ctx,
        sig.untyped,
        state.formalTypes,
        state.instantiated,
      ),
      instantiatedFrom: sig,
      parentFn: sig.parentFn,
      formalsInstantiated: state.instantiated,
    });
    if (
      !sig.untyped.isInitializer() ||
      instantiated.needsInstantiation ||
      isQueryRunning(ctx, resolveFunctionByInfoQuery, instantiated, poi)
    ) {
      return applicable(instantiated);
    }
    return applicable(resolveInitializer(ctx, instantiated, poi).signature);
  },
  equals: applicabilityEquals,
});

/** Instantiates the generic ones among initially applicable candidates. */
export const filterCandidatesInstantiating = (
  ctx: QueryContext,
  candidates: readonly TypedFnSignature[],
  ci: CallInfo,
  poi: PoiScope | undefined,
): ApplicabilityResult[] =>
  candidates.map((sig) => {
    if (!sig.needsInstantiation) return applicable(sig);
    const result = instantiateSignature(ctx, sig, ci, poi);
    if (result.success && result.candidate.needsInstantiation) {
      return notApplicable(sig.id, "type-mismatch");
    }
    return result;
  });
