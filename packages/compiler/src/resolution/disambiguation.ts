import type { QueryContext } from "../framework/context.js";
import { typeArena } from "../types/arena-slot.js";
import { QualifiedType, typeOf } from "../types/qualified-type.js";
import { FormalActualMap, type CallInfo, type FormalActual } from "./call-info.js";
import { canPass, conversionRank } from "./can-pass.js";
import { MostSpecificCandidates } from "./resolved.js";
import type { TypedFnSignature } from "./signatures.js";

/** An applicable candidate and the call it applies to. */
export type Candidate = {
  readonly fn: TypedFnSignature;
  /** The receiver a forwarding statement substituted, if any. */
  readonly forwardingTo?: QualifiedType;
  readonly call: CallInfo;
};

/** Negative when `left` is the better match, positive when `right` is. */
export type CandidateComparator = (
  ctx: QueryContext,
  left: Candidate,
  right: Candidate,
) => number;

/** The formal each actual binds to; variadic formals yield their element. */
const formalsByActual = (ctx: QueryContext, candidate: Candidate): QualifiedType[] => {
  const { fn, call } = candidate;
  const map = FormalActualMap.compute(fn.untyped, call, fn.formalTypes);
  const arena = typeArena(ctx);
  const formalFor = (entry: FormalActual): QualifiedType => {
    if (!entry.isVarArgEntry || entry.formalType.type === undefined) return entry.formalType;
    const desc = arena.get(entry.formalType.type);
    const position = map.byFormals
      .filter((other) => other.formalIdx === entry.formalIdx)
      .indexOf(entry);
    const element =
      desc.kind === "tuple"
        ? desc.elements[position]
        : desc.kind === "vararg-tuple"
          ? desc.element
          : undefined;
    return new QualifiedType(entry.formalType.kind, element);
  };
  return call.actuals.map((_, index) => {
    const entry = map.byActualIdx(index);
    return entry ? formalFor(entry) : QualifiedType.unknown;
  });
};

const conversionRanks = (ctx: QueryContext, candidate: Candidate): number[] => {
  const formals = formalsByActual(ctx, candidate);
  return candidate.call.actuals.map((actual, index) =>
    conversionRank(canPass(ctx, actual.type, formals[index] ?? QualifiedType.unknown)),
  );
};

/** Whether a value of `from`'s type can be passed where `to` is expected. */
const typePasses = (ctx: QueryContext, from: QualifiedType, to: QualifiedType): boolean => {
  if (from.type === undefined || to.type === undefined) return false;
  if (from.isType() || to.isType()) {
    return canPass(ctx, typeOf(from.type), typeOf(to.type)).passes;
  }
  return canPass(
    ctx,
    new QualifiedType("const-var", from.type),
    new QualifiedType("const-in", to.type),
  ).passes;
};

/** -1, 0 or 1 from which side won strictly more positions. */
const dominance = (leftWins: boolean, rightWins: boolean): number => {
  if (leftWins === rightWins) return 0;
  return leftWins ? -1 : 1;
};

/**
 * Ranks by the conversions each actual needs, then by which formals are
 * more specific, then prefers a non-generic function, then one whose
 * where clause held, then one not reached through forwarding.
 */
export const compareCandidates: CandidateComparator = (ctx, left, right) => {
  const leftRanks = conversionRanks(ctx, left);
  const rightRanks = conversionRanks(ctx, right);
  const byConversion = dominance(
    leftRanks.some((rank, index) => rank < (rightRanks[index] ?? Infinity)),
    rightRanks.some((rank, index) => rank < (leftRanks[index] ?? Infinity)),
  );
  if (byConversion !== 0) return byConversion;

  const leftFormals = formalsByActual(ctx, left);
  const rightFormals = formalsByActual(ctx, right);
  let leftMoreSpecific = false;
  let rightMoreSpecific = false;
  leftFormals.forEach((formal, index) => {
    const other = rightFormals[index];
    if (!other) return;
    const leftToRight = typePasses(ctx, formal, other);
    const rightToLeft = typePasses(ctx, other, formal);
    if (leftToRight && !rightToLeft) leftMoreSpecific = true;
    if (rightToLeft && !leftToRight) rightMoreSpecific = true;
  });
  const bySpecificity = dominance(leftMoreSpecific, rightMoreSpecific);
  if (bySpecificity !== 0) return bySpecificity;

  const byGenericity = dominance(
    !left.fn.isInstantiated() && right.fn.isInstantiated(),
    !right.fn.isInstantiated() && left.fn.isInstantiated(),
  );
  if (byGenericity !== 0) return byGenericity;

  const byWhereClause = dominance(
    left.fn.whereClause === "true" && right.fn.whereClause === "none",
    right.fn.whereClause === "true" && left.fn.whereClause === "none",
  );
  if (byWhereClause !== 0) return byWhereClause;

  return dominance(
    !left.forwardingTo && right.forwardingTo !== undefined,
    !right.forwardingTo && left.forwardingTo !== undefined,
  );
};

/** Candidates no other candidate beats; more than one means ambiguity. */
export const findMostSpecificCandidates = ({
  ctx,
  candidates,
  comparator = compareCandidates,
}: {
  ctx: QueryContext;
  candidates: readonly Candidate[];
  comparator?: CandidateComparator;
}): MostSpecificCandidates => {
  const unique = candidates.filter(
    (candidate, index) =>
      candidates.findIndex(
        (other) =>
          other.fn === candidate.fn &&
          (other.forwardingTo?.equals(candidate.forwardingTo) ??
            candidate.forwardingTo === undefined),
      ) === index,
  );
  const best =
    unique.length <= 1
      ? unique
      : unique.filter(
          (candidate) =>
            !unique.some(
              (other) => other !== candidate && comparator(ctx, other, candidate) < 0,
            ),
        );
  const chosen = best.length > 0 ? best : unique;
  return new MostSpecificCandidates(
    chosen.map(({ fn, forwardingTo }) => ({ fn, forwardingTo })),
  );
};
