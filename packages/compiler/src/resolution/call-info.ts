import type { Keyed } from "../framework/keys.js";
import type { ID } from "../syntax/id.js";
import { QualifiedType } from "../types/qualified-type.js";
import type {
  TypedFnSignature,
  UntypedFnSignature,
} from "./signatures.js";

export type CallInfoActual = {
  readonly type: QualifiedType;
  readonly byName?: string;
};

export type CallInfoInit = {
  name: string;
  calledType?: QualifiedType;
  isMethodCall?: boolean;
  isOpCall?: boolean;
  isParenless?: boolean;
  hasQuestionArg?: boolean;
  actuals: readonly CallInfoActual[];
};

/** What a call site looks like to overload resolution. */
export class CallInfo implements Keyed {
  readonly name: string;
  readonly calledType?: QualifiedType;
  readonly isMethodCall: boolean;
  readonly isOpCall: boolean;
  readonly isParenless: boolean;
  readonly hasQuestionArg: boolean;
  readonly actuals: readonly CallInfoActual[];

  constructor(init: CallInfoInit) {
    this.name = init.name;
    this.calledType = init.calledType;
    this.isMethodCall = init.isMethodCall ?? false;
    this.isOpCall = init.isOpCall ?? false;
    this.isParenless = init.isParenless ?? false;
    this.hasQuestionArg = init.hasQuestionArg ?? false;
    this.actuals = init.actuals;
  }

  numActuals(): number {
    return this.actuals.length;
  }

  actual(index: number): CallInfoActual | undefined {
    return this.actuals[index];
  }

  /** The receiver's type for method calls. */
  receiverType(): QualifiedType | undefined {
    return this.isMethodCall ? this.actuals[0]?.type : undefined;
  }

  /** The same call as a method call on `receiver`. */
  withReceiver(receiver: QualifiedType, name = this.name): CallInfo {
    return new CallInfo({
      name,
      calledType: receiver,
      isMethodCall: true,
      isOpCall: false,
      isParenless: this.isParenless,
      hasQuestionArg: this.hasQuestionArg,
      actuals: [{ type: receiver, byName: "this" }, ...this.actuals],
    });
  }

  /** The same method call with the receiver replaced, as forwarding does. */
  withReplacedReceiver(receiver: QualifiedType): CallInfo {
    return new CallInfo({
      name: this.name,
      calledType: receiver,
      isMethodCall: true,
      isOpCall: this.isOpCall,
      isParenless: this.isParenless,
      hasQuestionArg: this.hasQuestionArg,
      actuals: [
        { type: receiver, byName: this.actuals[0]?.byName },
        ...this.actuals.slice(1),
      ],
    });
  }

  queryKey(): string {
    const flags = [
      this.isMethodCall ? "m" : "",
      this.isOpCall ? "o" : "",
      this.isParenless ? "p" : "",
      this.hasQuestionArg ? "q" : "",
    ].join("");
    const actuals = this.actuals
      .map((actual) =>
        actual.byName
          ? `${actual.byName}=${actual.type.queryKey()}`
          : actual.type.queryKey(),
      )
      .join(";");
    return `call:${JSON.stringify(this.name)}/${flags}/${this.calledType?.queryKey() ?? "_"}/${actuals}`;
  }
}

/** One formal paired with the actual that feeds it. */
export type FormalActual = {
  readonly formalIdx: number;
  readonly formalName: string;
  readonly formalDecl: ID;
  readonly formalType: QualifiedType;
  /** -1 when the formal's default (or a `?` actual) stands in. */
  readonly actualIdx: number;
  readonly actualType: QualifiedType;
  readonly hasDefault: boolean;
  readonly isVarArgEntry: boolean;
};

/**
 * Binds the actuals of a call to the formals of a candidate: named actuals
 * first, then positional ones in order. A variadic formal takes every
 * remaining positional actual.
 */
export class FormalActualMap {
  private constructor(
    readonly byFormals: readonly FormalActual[],
    readonly isValid: boolean,
    readonly failingActualIdx: number,
  ) {}

  static compute(
    untyped: UntypedFnSignature,
    call: CallInfo,
    formalTypes?: readonly QualifiedType[],
  ): FormalActualMap {
    const formals = untyped.formals;
    // An operator method's receiver is not among the operands.
    const firstFormal = call.isOpCall && untyped.isMethod ? 1 : 0;
    const actualsFor = formals.map((): number[] => []);
    const invalid = (actualIdx: number) =>
      new FormalActualMap([], false, actualIdx);

    for (const [actualIdx, actual] of call.actuals.entries()) {
      if (actual.byName === undefined) continue;
      const formalIdx = formals.findIndex(
        (formal, index) => index >= firstFormal && formal.name === actual.byName,
      );
      const slot = actualsFor[formalIdx];
      if (!slot || slot.length > 0) return invalid(actualIdx);
      slot.push(actualIdx);
    }

    let formalIdx = firstFormal;
    for (const [actualIdx, actual] of call.actuals.entries()) {
      if (actual.byName !== undefined) continue;
      while (
        formalIdx < formals.length &&
        !formals[formalIdx]?.isVarArgs &&
        (actualsFor[formalIdx]?.length ?? 0) > 0
      ) {
        formalIdx += 1;
      }
      const slot = actualsFor[formalIdx];
      if (!slot) return invalid(actualIdx);
      slot.push(actualIdx);
      if (!formals[formalIdx]?.isVarArgs) formalIdx += 1;
    }

    const entries: FormalActual[] = [];
    for (const [index, formal] of formals.entries()) {
      if (index < firstFormal) continue;
      const bound = actualsFor[index] ?? [];
      const base = {
        formalIdx: index,
        formalName: formal.name,
        formalDecl: formal.decl,
        formalType: formalTypes?.[index] ?? QualifiedType.unknown,
        hasDefault: formal.hasDefault,
      };
      if (formal.isVarArgs) {
        bound.forEach((actualIdx) =>
          entries.push({
            ...base,
            actualIdx,
            actualType: call.actuals[actualIdx]?.type ?? QualifiedType.unknown,
            isVarArgEntry: true,
          }),
        );
        continue;
      }
      const [actualIdx] = bound;
      if (actualIdx === undefined) {
        if (!formal.hasDefault && !call.hasQuestionArg) {
          return invalid(-1);
        }
        entries.push({
          ...base,
          actualIdx: -1,
          actualType: QualifiedType.unknown,
          isVarArgEntry: false,
        });
        continue;
      }
      entries.push({
        ...base,
        actualIdx,
        actualType: call.actuals[actualIdx]?.type ?? QualifiedType.unknown,
        isVarArgEntry: false,
      });
    }
    return new FormalActualMap(entries, true, -1);
  }

  byFormalIdx(index: number): FormalActual | undefined {
    return this.byFormals.find((entry) => entry.formalIdx === index);
  }

  byActualIdx(index: number): FormalActual | undefined {
    return this.byFormals.find((entry) => entry.actualIdx === index);
  }
}

export type CandidateFailureReason =
  | "formal-actual-mismatch"
  | "type-mismatch"
  | "vararg-mismatch"
  | "where-clause"
  | "parenless-mismatch"
  | "method-mismatch"
  | "not-a-function";

export type PassFailureReason =
  | "unknown-actual"
  | "kind-mismatch"
  | "type-mismatch"
  | "needs-param-value"
  | "param-mismatch"
  | "ref-requires-exact-type"
  | "const-actual-to-ref";

/** Whether a candidate applies to a call, and why not when it does not. */
export type ApplicabilityResult =
  | { readonly success: true; readonly candidate: TypedFnSignature }
  | {
      readonly success: false;
      readonly candidateId: ID;
      readonly reason: CandidateFailureReason;
      readonly formalIdx?: number;
      readonly passFailure?: PassFailureReason;
    };

export const applicable = (
  candidate: TypedFnSignature,
): ApplicabilityResult => ({ success: true, candidate });

export const notApplicable = (
  candidateId: ID,
  reason: CandidateFailureReason,
  detail: { formalIdx?: number; passFailure?: PassFailureReason } = {},
): ApplicabilityResult => ({
  success: false,
  candidateId,
  reason,
  ...detail,
});

export const applicabilityEquals = (
  left: ApplicabilityResult,
  right: ApplicabilityResult,
): boolean => {
  if (left.success && right.success) return left.candidate === right.candidate;
  if (left.success || right.success) return false;
  return (
    left.candidateId.equals(right.candidateId) &&
    left.reason === right.reason &&
    left.formalIdx === right.formalIdx &&
    left.passFailure === right.passFailure
  );
};

