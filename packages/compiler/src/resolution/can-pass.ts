import type { QueryContext } from "../framework/context.js";
import { typeArena } from "../types/arena-slot.js";
import { paramsEqual, type ParamValue } from "../types/params.js";
import type { QualifiedType } from "../types/qualified-type.js";
import {
  Types,
  type ClassType,
  type PrimitiveType,
  type TypeArena,
  type TypeId,
} from "../types/type-arena.js";
import type { PassFailureReason } from "./call-info.js";
import { getTypeGenericity } from "./genericity.js";

export type ConversionKind =
  | "none"
  | "subtype"
  | "borrowing"
  | "nilable"
  | "param-narrowing"
  | "numeric";

/** Whether an actual can be passed to a formal, and at what cost. */
export class CanPassResult {
  private constructor(
    readonly passes: boolean,
    readonly instantiates: boolean,
    readonly conversion: ConversionKind,
    readonly failReason?: PassFailureReason,
  ) {}

  static pass(
    conversion: ConversionKind = "none",
    instantiates = false,
  ): CanPassResult {
    return new CanPassResult(true, instantiates, conversion);
  }

  static fail(reason: PassFailureReason): CanPassResult {
    return new CanPassResult(false, false, "none", reason);
  }

  converts(): boolean {
    return this.conversion !== "none";
  }
}

/** Lower is a better match: exact, instantiation, subtype, narrowing, numeric. */
export const conversionRank = (result: CanPassResult): number => {
  if (!result.passes) return Number.POSITIVE_INFINITY;
  switch (result.conversion) {
    case "none":
      return result.instantiates ? 1 : 0;
    case "subtype":
    case "borrowing":
    case "nilable":
      return 2;
    case "param-narrowing":
      return 3;
    case "numeric":
      return 4;
  }
};

type TypePass =
  | { ok: true; instantiates: boolean; conversion: ConversionKind }
  | { ok: false };

type PassOptions = { conversions: boolean; param?: ParamValue };

const exact: TypePass = { ok: true, instantiates: false, conversion: "none" };
const instantiating: TypePass = {
  ok: true,
  instantiates: true,
  conversion: "none",
};
const mismatch: TypePass = { ok: false };

const converting = (conversion: ConversionKind): TypePass => ({
  ok: true,
  instantiates: false,
  conversion,
});

const combine = (parts: readonly TypePass[]): TypePass => {
  let instantiates = false;
  let conversion: ConversionKind = "none";
  for (const part of parts) {
    if (!part.ok) return mismatch;
    instantiates = instantiates || part.instantiates;
    if (conversion === "none") conversion = part.conversion;
  }
  return { ok: true, instantiates, conversion };
};

const isGenericType = (ctx: QueryContext, type: TypeId): boolean =>
  getTypeGenericity(ctx, type) !== "concrete";

/** The generic type an instantiation came from, or the type itself. */
export const genericRootOf = (arena: TypeArena, type: TypeId): TypeId =>
  arena.getComposite(type)?.instantiatedFrom ?? type;

/** Whether `actual` is an instantiation agreeing with every binding of `formal`. */
const instantiationMatches = (
  ctx: QueryContext,
  actual: TypeId,
  formal: TypeId,
): boolean => {
  const arena = typeArena(ctx);
  const actualDesc = arena.getComposite(actual);
  const formalDesc = arena.getComposite(formal);
  if (!actualDesc || !formalDesc) return false;
  if (genericRootOf(arena, actual) !== genericRootOf(arena, formal)) {
    return false;
  }
  if (!isGenericType(ctx, formal)) return false;
  return formalDesc.substitutions.every((bound) =>
    actualDesc.substitutions.some(
      (candidate) =>
        candidate.field.equals(bound.field) && candidate.type.equals(bound.type),
    ),
  );
};

export const isSubclass = (
  arena: TypeArena,
  child: TypeId,
  parent: TypeId,
): boolean => {
  let current: TypeId | undefined = child;
  while (current !== undefined) {
    if (current === parent) return true;
    if (genericRootOf(arena, current) === parent) return true;
    const desc = arena.getComposite(current);
    current = desc?.kind === "basic-class" ? desc.parent : undefined;
  }
  return false;
};

const fitsIn = (value: number, formal: PrimitiveType): boolean => {
  if (!Number.isInteger(value)) return false;
  const width = formal.bitWidth;
  if (formal.name === "uint") return value >= 0 && value < 2 ** width;
  return value >= -(2 ** (width - 1)) && value < 2 ** (width - 1);
};

const isSizedNumeric = (name: string) =>
  name === "int" || name === "uint" || name === "real";

const numericConversion = (
  actual: PrimitiveType,
  formal: PrimitiveType,
  param: ParamValue | undefined,
): ConversionKind | undefined => {
  const widens = (() => {
    if (actual.name === "bool") {
      return formal.name === "int" || formal.name === "uint";
    }
    if (formal.name === "real") {
      return actual.name === "int" || actual.name === "uint"
        ? true
        : actual.name === "real" && formal.bitWidth >= actual.bitWidth;
    }
    if (formal.name === "int") {
      if (actual.name === "int") return formal.bitWidth >= actual.bitWidth;
      if (actual.name === "uint") return formal.bitWidth > actual.bitWidth;
    }
    if (formal.name === "uint" && actual.name === "uint") {
      return formal.bitWidth >= actual.bitWidth;
    }
    return false;
  })();
  if (widens) return "numeric";

  if (
    param &&
    (param.kind === "int" || param.kind === "uint") &&
    (formal.name === "int" || formal.name === "uint") &&
    fitsIn(param.value, formal)
  ) {
    return "param-narrowing";
  }
  return undefined;
};

const passClass = (
  ctx: QueryContext,
  actual: ClassType,
  formal: ClassType,
  options: PassOptions,
): TypePass => {
  const arena = typeArena(ctx);
  let instantiates = false;
  let conversion: ConversionKind = "none";
  const convert = (kind: ConversionKind) => {
    if (conversion === "none") conversion = kind;
  };

  if (formal.manageable === Types.anyClass) {
    instantiates = true;
  } else if (formal.manageable === actual.manageable) {
    instantiates = isGenericType(ctx, formal.manageable);
  } else if (instantiationMatches(ctx, actual.manageable, formal.manageable)) {
    instantiates = true;
  } else if (
    options.conversions &&
    isSubclass(arena, actual.manageable, formal.manageable)
  ) {
    convert("subtype");
  } else {
    return mismatch;
  }

  if (formal.management === "generic") {
    instantiates = true;
  } else if (formal.management !== actual.management) {
    if (
      !options.conversions ||
      formal.management !== "borrowed" ||
      actual.management === "generic"
    ) {
      return mismatch;
    }
    convert("borrowing");
  }

  if (formal.nilability === "generic") {
    instantiates = true;
  } else if (formal.nilability !== actual.nilability) {
    if (
      !options.conversions ||
      formal.nilability !== "nilable" ||
      actual.nilability !== "non-nil"
    ) {
      return mismatch;
    }
    convert("nilable");
  }

  return { ok: true, instantiates, conversion };
};

const passType = (
  ctx: QueryContext,
  actual: TypeId,
  formal: TypeId,
  options: PassOptions,
): TypePass => {
  if (actual === formal) {
    return isGenericType(ctx, formal) ? instantiating : exact;
  }
  const arena = typeArena(ctx);
  const formalDesc = arena.get(formal);
  const actualDesc = arena.get(actual);
  if (formalDesc.kind === "erroneous" || actualDesc.kind === "erroneous") {
    return exact;
  }

  switch (formalDesc.kind) {
    case "any":
      return instantiating;
    case "any-class":
      return actualDesc.kind === "class" || actualDesc.kind === "basic-class"
        ? instantiating
        : mismatch;
    case "primitive": {
      if (actualDesc.kind !== "primitive") return mismatch;
      if (
        formalDesc.bitWidth === 0 &&
        isSizedNumeric(formalDesc.name) &&
        actualDesc.name === formalDesc.name
      ) {
        return instantiating;
      }
      if (!options.conversions) return mismatch;
      const conversion = numericConversion(
        actualDesc,
        formalDesc,
        options.param,
      );
      return conversion ? converting(conversion) : mismatch;
    }
    case "record":
    case "basic-class":
      return actualDesc.kind === formalDesc.kind &&
        instantiationMatches(ctx, actual, formal)
        ? instantiating
        : mismatch;
    case "class":
      return actualDesc.kind === "class"
        ? passClass(ctx, actualDesc, formalDesc, options)
        : mismatch;
    case "tuple":
      if (
        actualDesc.kind !== "tuple" ||
        actualDesc.elements.length !== formalDesc.elements.length
      ) {
        return mismatch;
      }
      return combine(
        formalDesc.elements.map((element, index) =>
          passType(ctx, actualDesc.elements[index] ?? Types.unknown, element, {
            conversions: options.conversions,
          }),
        ),
      );
    case "vararg-tuple": {
      if (actualDesc.kind !== "tuple") return mismatch;
      if (
        formalDesc.count !== undefined &&
        formalDesc.count !== actualDesc.elements.length
      ) {
        return mismatch;
      }
      const elements = combine(
        actualDesc.elements.map((element) =>
          passType(ctx, element, formalDesc.element, options),
        ),
      );
      return elements.ok
        ? { ...elements, instantiates: true }
        : mismatch;
    }
    case "c-ptr":
      if (actualDesc.kind !== "c-ptr") return mismatch;
      if (formalDesc.element === undefined) return instantiating;
      return actualDesc.element === undefined
        ? mismatch
        : passType(ctx, actualDesc.element, formalDesc.element, {
            conversions: false,
          });
    case "domain":
      return actualDesc.kind === "domain" && formalDesc.rank === undefined
        ? instantiating
        : mismatch;
    case "array":
      if (actualDesc.kind !== "array") return mismatch;
      return combine([
        passType(ctx, actualDesc.domain, formalDesc.domain, {
          conversions: false,
        }),
        passType(ctx, actualDesc.element, formalDesc.element, {
          conversions: false,
        }),
      ]);
    default:
      return mismatch;
  }
};

const result = (
  pass: TypePass,
  failure: PassFailureReason = "type-mismatch",
): CanPassResult =>
  pass.ok
    ? CanPassResult.pass(pass.conversion, pass.instantiates)
    : CanPassResult.fail(failure);

/**
 * Checks passing `actual` to `formal`. Type formals take types, param
 * formals take params, ref formals take mutable values of the exact type,
 * const ref formals values of the exact type; other value formals also
 * accept conversions.
 */
export const canPass = (
  ctx: QueryContext,
  actual: QualifiedType,
  formal: QualifiedType,
): CanPassResult => {
  if (actual.isErroneous() || formal.isErroneous()) {
    return CanPassResult.pass();
  }
  if (actual.type === undefined) return CanPassResult.fail("unknown-actual");
  if (formal.isUnknown()) return CanPassResult.pass("none", true);
  const actualType = actual.type;
  const formalType = formal.type ?? Types.unknown;

  switch (formal.kind) {
    case "type":
      if (!actual.isType()) return CanPassResult.fail("kind-mismatch");
      return result(passType(ctx, actualType, formalType, { conversions: false }));
    case "param":
      if (!actual.isParam() || !actual.param) {
        return CanPassResult.fail("needs-param-value");
      }
      if (formal.param && !paramsEqual(formal.param, actual.param)) {
        return CanPassResult.fail("param-mismatch");
      }
      return result(
        passType(ctx, actualType, formalType, {
          conversions: true,
          param: actual.param,
        }),
      );
    case "ref":
    case "out":
    case "inout": {
      if (!actual.isValue()) return CanPassResult.fail("kind-mismatch");
      if (actual.isConst()) return CanPassResult.fail("const-actual-to-ref");
      return result(
        passType(ctx, actualType, formalType, { conversions: false }),
        "ref-requires-exact-type",
      );
    }
    case "const-ref":
      if (!actual.isValue() && !actual.isParam()) {
        return CanPassResult.fail("kind-mismatch");
      }
      return result(
        passType(ctx, actualType, formalType, { conversions: false }),
        "ref-requires-exact-type",
      );
    default:
      if (!actual.isValue() && !actual.isParam()) {
        return CanPassResult.fail("kind-mismatch");
      }
      return result(
        passType(ctx, actualType, formalType, {
          conversions: true,
          param: actual.param,
        }),
      );
  }
};
