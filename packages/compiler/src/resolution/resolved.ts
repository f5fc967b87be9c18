import type { ID } from "../syntax/id.js";
import type { AstNode } from "../syntax/nodes.js";
import { QualifiedType } from "../types/qualified-type.js";
import type { ApplicabilityResult } from "./call-info.js";
import type { PoiInfo, PoiScope } from "./poi.js";
import type { TypedFnSignature } from "./signatures.js";

/** A chosen candidate; `forwardingTo` is set when found through forwarding. */
export type MostSpecificCandidate = {
  readonly fn: TypedFnSignature;
  readonly forwardingTo?: QualifiedType;
};

export class MostSpecificCandidates {
  static readonly empty = new MostSpecificCandidates([]);

  constructor(readonly candidates: readonly MostSpecificCandidate[]) {}

  static of(...fns: TypedFnSignature[]): MostSpecificCandidates {
    return new MostSpecificCandidates(fns.map((fn) => ({ fn })));
  }

  isEmpty(): boolean {
    return this.candidates.length === 0;
  }

  isAmbiguous(): boolean {
    return this.candidates.length > 1;
  }

  /** The candidate when exactly one was chosen. */
  only(): MostSpecificCandidate | undefined {
    return this.candidates.length === 1 ? this.candidates[0] : undefined;
  }

  fns(): TypedFnSignature[] {
    return this.candidates.map(({ fn }) => fn);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof MostSpecificCandidates &&
      other.candidates.length === this.candidates.length &&
      other.candidates.every((candidate, index) => {
        const mine = this.candidates[index];
        return (
          mine !== undefined &&
          candidate.fn === mine.fn &&
          (candidate.forwardingTo?.equals(mine.forwardingTo) ??
            mine.forwardingTo === undefined)
        );
      })
    );
  }
}

/** What one expression resolved to. */
export type ResolvedExpression = {
  readonly id: ID;
  readonly type: QualifiedType;
  readonly toId?: ID;
  readonly mostSpecific: MostSpecificCandidates;
  /** The POI scope used to instantiate the chosen candidates. */
  readonly poiScope?: PoiScope;
};

export const resolvedExpression = (
  id: ID,
  type: QualifiedType,
  extra: Partial<Omit<ResolvedExpression, "id" | "type">> = {},
): ResolvedExpression => ({
  id,
  type,
  mostSpecific: extra.mostSpecific ?? MostSpecificCandidates.empty,
  toId: extra.toId,
  poiScope: extra.poiScope,
});

const expressionsEqual = (
  left: ResolvedExpression,
  right: ResolvedExpression | undefined,
): boolean =>
  right !== undefined &&
  left.id.equals(right.id) &&
  left.type.equals(right.type) &&
  (left.toId?.equals(right.toId) ?? right.toId === undefined) &&
  left.mostSpecific.equals(right.mostSpecific) &&
  left.poiScope === right.poiScope;

/** Resolution results of one symbol, keyed by node ID. */
export class ResolutionResultByPostorderID {
  readonly #byId = new Map<string, ResolvedExpression>();

  set(expr: ResolvedExpression): ResolvedExpression {
    this.#byId.set(expr.id.toString(), expr);
    return expr;
  }

  byId(id: ID): ResolvedExpression | undefined {
    return this.#byId.get(id.toString());
  }

  byAst(node: AstNode): ResolvedExpression | undefined {
    return this.byId(node.id);
  }

  has(id: ID): boolean {
    return this.#byId.has(id.toString());
  }

  typeOf(id: ID): QualifiedType {
    return this.byId(id)?.type ?? QualifiedType.unknown;
  }

  entries(): ResolvedExpression[] {
    return [...this.#byId.values()];
  }

  size(): number {
    return this.#byId.size;
  }

  /** Copies every entry of `other` into this one. */
  merge(other: ResolutionResultByPostorderID): void {
    other.#byId.forEach((expr, key) => this.#byId.set(key, expr));
  }

  equals(other: unknown): boolean {
    if (!(other instanceof ResolutionResultByPostorderID)) return false;
    if (other.#byId.size !== this.#byId.size) return false;
    return [...this.#byId].every(([key, expr]) =>
      expressionsEqual(expr, other.#byId.get(key)),
    );
  }
}

/** A function body resolved for one signature and POI usage. */
export class ResolvedFunction {
  constructor(
    readonly signature: TypedFnSignature,
    readonly resolutionById: ResolutionResultByPostorderID,
    readonly poiInfo: PoiInfo,
    readonly returnType: QualifiedType,
  ) {}

  byId(id: ID): ResolvedExpression | undefined {
    return this.resolutionById.byId(id);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ResolvedFunction &&
      other.signature === this.signature &&
      other.returnType.equals(this.returnType) &&
      other.poiInfo.equals(this.poiInfo) &&
      other.resolutionById.equals(this.resolutionById)
    );
  }
}

/** The outcome of resolving one call. */
export type CallResolutionResult = {
  readonly mostSpecific: MostSpecificCandidates;
  readonly exprType: QualifiedType;
  readonly poiInfo: PoiInfo;
  /** Set for calls answered without overload resolution. */
  readonly speciallyHandled: boolean;
  /** Candidates found by name that did not apply. */
  readonly rejected: readonly ApplicabilityResult[];
  readonly instantiationPoi?: PoiScope;
};
