import { normalizeSpan, reportDiagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { isQueryRunning } from "../framework/query.js";
import { LookupConfig, type IdsWithName, type Scope } from "../scopes/scope.js";
import {
  gatherReceiverAndParentScopesForType,
  lookupNameInScopeWithSet,
} from "../scopes/scope-queries.js";
import type { ID } from "../syntax/id.js";
import { functionNodeFor, isIdInsideForwarding } from "../syntax/parsing-queries.js";
import { typeArena } from "../types/arena-slot.js";
import { QualifiedType } from "../types/qualified-type.js";
import {
  primitiveOperatorResult,
  resolveSpecialCall,
  type CallSite,
} from "./builtins.js";
import type { ApplicabilityResult, CallInfo } from "./call-info.js";
import { resolutionConfig } from "./config.js";
import {
  getCompilerGeneratedMethod,
  needCompilerGeneratedMethod,
} from "./default-functions.js";
import { findMostSpecificCandidates, type Candidate } from "./disambiguation.js";
import {
  resolveFunction,
  resolveFunctionByInfoQuery,
  returnType,
  typeConstructorResultType,
} from "./function-queries.js";
import {
  compositeTypeOf,
  forwardingCycleCheck,
  forwardingTargets,
} from "./genericity.js";
import {
  filterCandidatesInitial,
  filterCandidatesInstantiating,
  instantiateSignature,
  isInitialTypedSignatureApplicable,
} from "./instantiation.js";
import { PoiInfo, pointOfInstantiationScope, type PoiScope } from "./poi.js";
import { MostSpecificCandidates, type CallResolutionResult } from "./resolved.js";
import { typeConstructorInitial } from "./signature-queries.js";
import type { TypedFnSignature } from "./signatures.js";

const candidateLookup =
  LookupConfig.DECLS | LookupConfig.IMPORT_AND_USE | LookupConfig.PARENTS;

/** Names a method body never resolves against its implicit receiver. */
const notImplicitMethodNames: ReadonlySet<string> = new Set([
  "?",
  "owned",
  "shared",
  "borrowed",
  "unmanaged",
]);

type Gathered = {
  candidates: Candidate[];
  rejected: ApplicabilityResult[];
};

const uniqueIds = (found: readonly IdsWithName[]): ID[] => {
  const seen = new Set<string>();
  return found
    .flatMap(({ ids }) => ids)
    .filter((id) => {
      const key = id.toString();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
};

const handled = (exprType: QualifiedType, poiInfo: PoiInfo): CallResolutionResult => ({
  mostSpecific: MostSpecificCandidates.empty,
  exprType,
  poiInfo,
  speciallyHandled: true,
  rejected: [],
});

/** Adds the candidates among `sigs` that apply, instantiating generic ones. */
const addApplicable = ({
  ctx,
  results,
  ci,
  poi,
  forwardingTo,
  out,
}: {
  ctx: QueryContext;
  results: readonly ApplicabilityResult[];
  ci: CallInfo;
  poi: PoiScope | undefined;
  forwardingTo?: QualifiedType;
  out: Gathered;
}): number => {
  const sigs: TypedFnSignature[] = [];
  results.forEach((result) =>
    result.success ? sigs.push(result.candidate) : out.rejected.push(result),
  );
  const before = out.candidates.length;
  filterCandidatesInstantiating(ctx, sigs, ci, poi).forEach((result) =>
    result.success
      ? out.candidates.push({ fn: result.candidate, call: ci, forwardingTo })
      : out.rejected.push(result),
  );
  return out.candidates.length - before;
};

/** Lifecycle methods belong to the forwarding type itself. */
const notForwarded = new Set(["init", "init=", "deinit"]);

/** The type whose methods and operators a call may name. */
const receiverOf = (ci: CallInfo): QualifiedType | undefined => {
  if (ci.isMethodCall) return ci.receiverType();
  return ci.isOpCall ? ci.actuals[0]?.type : undefined;
};

/**
 * Candidates in the order they are looked for: compiler-generated ones and
 * those visible from the call, then those visible from each point of
 * instantiation, then those reached through forwarding.
 */
const gatherCandidates = ({
  ctx,
  site,
  ci,
  inScope,
  inPoiScope,
  instantiationPoi,
  poiInfo,
}: {
  ctx: QueryContext;
  site: CallSite;
  ci: CallInfo;
  inScope: Scope | undefined;
  inPoiScope: PoiScope | undefined;
  instantiationPoi: PoiScope | undefined;
  poiInfo: PoiInfo;
}): Gathered => {
  const out: Gathered = { candidates: [], rejected: [] };
  const receiver = receiverOf(ci)?.type;

  if (
    receiver !== undefined &&
    needCompilerGeneratedMethod(ctx, receiver, ci.name, ci.isParenless)
  ) {
    const generated = getCompilerGeneratedMethod(ctx, receiver, ci.name);
    if (generated) {
      addApplicable({
        ctx,
        results: [isInitialTypedSignatureApplicable(ctx, generated, ci)],
        ci,
        poi: instantiationPoi,
        out,
      });
    }
  }

  const config =
    candidateLookup | (ci.isMethodCall || ci.isOpCall ? LookupConfig.METHODS : 0);
  const visited = new Set<string>();
  const receiverScopes =
    receiver === undefined ? [] : gatherReceiverAndParentScopesForType(ctx, receiver);
  const lexical = uniqueIds(
    lookupNameInScopeWithSet(ctx, inScope, receiverScopes, ci.name, config, visited),
  );
  if (lexical.length > 0) {
    addApplicable({
      ctx,
      results: filterCandidatesInitial(ctx, lexical, ci),
      ci,
      poi: instantiationPoi,
      out,
    });
  }

  if (out.candidates.length === 0) {
    for (let poi = inPoiScope; poi; poi = poi.inFnPoi) {
      const ids = uniqueIds(
        lookupNameInScopeWithSet(ctx, poi.inScope(ctx), [], ci.name, config, visited),
      );
      if (ids.length === 0) continue;
      const added = addApplicable({
        ctx,
        results: filterCandidatesInitial(ctx, ids, ci),
        ci,
        poi: instantiationPoi,
        out,
      });
      if (added > 0) {
        out.candidates.forEach(({ fn }) => poiInfo.addIds(site.id, fn.id));
        break;
      }
    }
  }

  if (
    out.candidates.length === 0 &&
    ci.isMethodCall &&
    !notForwarded.has(ci.name) &&
    receiver !== undefined &&
    !isIdInsideForwarding(ctx, site.id) &&
    !forwardingCycleCheck(ctx, receiver)
  ) {
    forwardingTargets(ctx, receiver).forEach((target) => {
      if (target.type.type === undefined || target.type.isErroneous()) return;
      const forwarded = gatherCandidates({
        ctx,
        site,
        ci: ci.withReplacedReceiver(target.type),
        inScope,
        inPoiScope,
        instantiationPoi,
        poiInfo,
      });
      forwarded.candidates.forEach((candidate) =>
        out.candidates.push({ ...candidate, forwardingTo: target.type }),
      );
      out.rejected.push(...forwarded.rejected);
    });
  }
  return out;
};

/** Instantiated callees may use POI functions too; so does their caller. */
const accumulatePoisUsedByResolvingBodies = (
  ctx: QueryContext,
  fns: readonly TypedFnSignature[],
  poi: PoiScope | undefined,
  poiInfo: PoiInfo,
): void => {
  fns.forEach((fn) => {
    if (!fn.isInstantiated() || fn.untyped.isCompilerGenerated) return;
    if (isQueryRunning(ctx, resolveFunctionByInfoQuery, fn, poi)) {
      poiInfo.accumulateRecursive(fn, poi);
      return;
    }
    poiInfo.accumulate(resolveFunction(ctx, fn, poi).poiInfo);
  });
};

const infersReturnType = (ctx: QueryContext, fn: TypedFnSignature): boolean => {
  if (fn.untyped.isCompilerGenerated) return false;
  const node = functionNodeFor(ctx, fn.id);
  return node?.body !== undefined && node.returnType === undefined;
};

const returnTypeForCall = (
  ctx: QueryContext,
  site: CallSite,
  mostSpecific: MostSpecificCandidates,
  poi: PoiScope | undefined,
): QualifiedType => {
  const fn = mostSpecific.only()?.fn;
  if (!fn) return QualifiedType.erroneous();
  const fnPoi = fn.isInstantiated() ? poi : undefined;
  if (
    infersReturnType(ctx, fn) &&
    (isQueryRunning(ctx, returnType, fn, fnPoi) ||
      isQueryRunning(ctx, resolveFunctionByInfoQuery, fn, fnPoi))
  ) {
    reportDiagnostic({
      ctx,
      code: "CR0007",
      params: { kind: "recursive-return-inference", functionName: fn.name },
      span: normalizeSpan(site.span),
      nodeId: site.id.toString(),
    });
    return QualifiedType.erroneous();
  }
  return returnType(ctx, fn, fnPoi);
};

const enforceCandidateLimit = ({
  ctx,
  site,
  name,
  count,
}: {
  ctx: QueryContext;
  site: CallSite;
  name: string;
  count: number;
}): boolean => {
  const limit = resolutionConfig(ctx).maxOverloadCandidates;
  if (count <= limit) return true;
  reportDiagnostic({
    ctx,
    code: "CR0008",
    params: { kind: "too-many-candidates", name, count, limit },
    span: normalizeSpan(site.span),
    nodeId: site.id.toString(),
  });
  return false;
};

/** `R(...)` where `R` names a record or class: the type it instantiates to. */
const resolveTypeConstructorCall = ({
  ctx,
  site,
  ci,
  called,
  instantiationPoi,
  poiInfo,
}: {
  ctx: QueryContext;
  site: CallSite;
  ci: CallInfo;
  called: QualifiedType;
  instantiationPoi: PoiScope | undefined;
  poiInfo: PoiInfo;
}): CallResolutionResult => {
  const arena = typeArena(ctx);
  const composite = called.type === undefined ? undefined : compositeTypeOf(arena, called.type);
  if (called.type === undefined || composite === undefined) {
    reportDiagnostic({
      ctx,
      code: "CR0003",
      params: { kind: "not-callable", name: ci.name },
      span: normalizeSpan(site.span),
      nodeId: site.id.toString(),
    });
    return handled(QualifiedType.erroneous(), poiInfo);
  }

  const ctor = typeConstructorInitial(ctx, composite);
  const initial = isInitialTypedSignatureApplicable(ctx, ctor, ci);
  const result =
    initial.success && ctor.needsInstantiation
      ? instantiateSignature(ctx, ctor, ci, instantiationPoi)
      : initial;
  if (!result.success) {
    return {
      mostSpecific: MostSpecificCandidates.empty,
      exprType: QualifiedType.unknown,
      poiInfo,
      speciallyHandled: false,
      rejected: [result],
    };
  }
  return {
    mostSpecific: MostSpecificCandidates.of(result.candidate),
    exprType: typeConstructorResultType(ctx, result.candidate, called.type),
    poiInfo,
    speciallyHandled: false,
    rejected: [],
  };
};

/**
 * Resolves one call: compiler-answered calls first, then type
 * constructors, then overload resolution over the visible candidates.
 */
export const resolveCall = (
  ctx: QueryContext,
  site: CallSite,
  ci: CallInfo,
  inScope: Scope | undefined,
  inPoiScope: PoiScope | undefined,
): CallResolutionResult => {
  const poiInfo = new PoiInfo(inPoiScope);
  const special =
    resolveSpecialCall(ctx, site, ci) ?? primitiveOperatorResult(typeArena(ctx), ci);
  if (special) return handled(special, poiInfo);

  const instantiationPoi = inScope
    ? pointOfInstantiationScope(ctx, inScope, inPoiScope)
    : inPoiScope;

  if (ci.calledType?.isType() && !ci.isMethodCall) {
    return resolveTypeConstructorCall({
      ctx,
      site,
      ci,
      called: ci.calledType,
      instantiationPoi,
      poiInfo,
    });
  }

  const gathered = gatherCandidates({
    ctx,
    site,
    ci,
    inScope,
    inPoiScope,
    instantiationPoi,
    poiInfo,
  });
  if (
    !enforceCandidateLimit({
      ctx,
      site,
      name: ci.name,
      count: gathered.candidates.length,
    })
  ) {
    return handled(QualifiedType.erroneous(), poiInfo);
  }

  const mostSpecific = findMostSpecificCandidates({
    ctx,
    candidates: gathered.candidates,
  });
  const fns = mostSpecific.fns();
  const poi = fns.some((fn) => fn.isInstantiated()) ? instantiationPoi : undefined;
  accumulatePoisUsedByResolvingBodies(ctx, fns, poi, poiInfo);

  return {
    mostSpecific,
    exprType: mostSpecific.isEmpty()
      ? QualifiedType.unknown
      : returnTypeForCall(ctx, site, mostSpecific, poi),
    poiInfo,
    speciallyHandled: false,
    rejected: gathered.rejected,
    instantiationPoi: poi,
  };
};

/**
 * A call inside a method: tried first as a method call on the implicit
 * receiver, then as written.
 */
export const resolveCallInMethod = (
  ctx: QueryContext,
  site: CallSite,
  ci: CallInfo,
  inScope: Scope | undefined,
  inPoiScope: PoiScope | undefined,
  implicitReceiver: QualifiedType,
): CallResolutionResult => {
  if (!notImplicitMethodNames.has(ci.name) && ci.calledType === undefined) {
    const asMethod = resolveCall(
      ctx,
      site,
      ci.withReceiver(implicitReceiver),
      inScope,
      inPoiScope,
    );
    if (!asMethod.mostSpecific.isEmpty()) return asMethod;
  }
  return resolveCall(ctx, site, ci, inScope, inPoiScope);
};
