/** Compile-time values carried by `param` qualified types. */
export type ParamValue =
  | { kind: "int"; value: number }
  | { kind: "uint"; value: number }
  | { kind: "real"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "string"; value: string };

export type FoldResult =
  | { ok: true; value: ParamValue }
  | { ok: false; reason: string };

export const intParam = (value: number): ParamValue => ({ kind: "int", value });
export const boolParam = (value: boolean): ParamValue => ({
  kind: "bool",
  value,
});

export const paramKey = (param: ParamValue): string =>
  `${param.kind}:${JSON.stringify(param.value)}`;

export const paramsEqual = (
  left: ParamValue | undefined,
  right: ParamValue | undefined,
): boolean => {
  if (left === right) return true;
  if (!left || !right) return false;
  return left.kind === right.kind && left.value === right.value;
};

export const paramToString = (param: ParamValue): string =>
  param.kind === "string" ? JSON.stringify(param.value) : String(param.value);

type Numeric = { kind: "int" | "uint" | "real"; value: number };

const isNumeric = (param: ParamValue): param is Numeric =>
  param.kind === "int" || param.kind === "uint" || param.kind === "real";

const numericKind = (left: Numeric, right: Numeric): Numeric["kind"] => {
  if (left.kind === "real" || right.kind === "real") return "real";
  if (left.kind === "uint" && right.kind === "uint") return "uint";
  return "int";
};

const ok = (value: ParamValue): FoldResult => ({ ok: true, value });

const compare = (op: string, order: number): boolean | undefined => {
  switch (op) {
    case "==":
      return order === 0;
    case "!=":
      return order !== 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
    default:
      return undefined;
  }
};

const orderNumbers = (left: number, right: number): number =>
  left === right ? 0 : left < right ? -1 : 1;

const orderStrings = (left: string, right: string): number =>
  left === right ? 0 : left < right ? -1 : 1;

/** Integers fold as 64-bit values and wrap on overflow. */
const wrapInteger = (kind: "int" | "uint", value: bigint): ParamValue => ({
  kind,
  value: Number(kind === "uint" ? BigInt.asUintN(64, value) : BigInt.asIntN(64, value)),
});

const foldInteger = (
  op: string,
  kind: "int" | "uint",
  left: bigint,
  right: bigint,
): FoldResult | undefined => {
  switch (op) {
    case "+":
      return ok(wrapInteger(kind, left + right));
    case "-":
      return ok(wrapInteger(kind, left - right));
    case "*":
      return ok(wrapInteger(kind, left * right));
    case "/":
      if (right === 0n) return { ok: false, reason: "division by zero" };
      return ok(wrapInteger(kind, left / right));
    case "%":
      if (right === 0n) return { ok: false, reason: "division by zero" };
      return ok(wrapInteger(kind, left % right));
    default:
      return undefined;
  }
};

const foldNumeric = (
  op: string,
  left: Numeric,
  right: Numeric,
): FoldResult | undefined => {
  const compared = compare(op, orderNumbers(left.value, right.value));
  if (compared !== undefined) return ok(boolParam(compared));

  const kind = numericKind(left, right);
  if (kind !== "real") {
    if (!Number.isFinite(left.value) || !Number.isFinite(right.value)) return undefined;
    return foldInteger(
      op,
      kind,
      BigInt(Math.trunc(left.value)),
      BigInt(Math.trunc(right.value)),
    );
  }

  const real = (value: number): FoldResult => ok({ kind, value });
  switch (op) {
    case "+":
      return real(left.value + right.value);
    case "-":
      return real(left.value - right.value);
    case "*":
      return real(left.value * right.value);
    case "/":
      return real(left.value / right.value);
    default:
      return undefined;
  }
};

/** Folds a binary operator over two params; undefined when not foldable. */
export const foldBinaryParam = (
  op: string,
  left: ParamValue,
  right: ParamValue,
): FoldResult | undefined => {
  if (isNumeric(left) && isNumeric(right)) {
    return foldNumeric(op, left, right);
  }
  if (left.kind === "bool" && right.kind === "bool") {
    switch (op) {
      case "&&":
        return ok(boolParam(left.value && right.value));
      case "||":
        return ok(boolParam(left.value || right.value));
      case "==":
        return ok(boolParam(left.value === right.value));
      case "!=":
        return ok(boolParam(left.value !== right.value));
      default:
        return undefined;
    }
  }
  if (left.kind === "string" && right.kind === "string") {
    if (op === "+") return ok({ kind: "string", value: left.value + right.value });
    const compared = compare(op, orderStrings(left.value, right.value));
    return compared === undefined ? undefined : ok(boolParam(compared));
  }
  return undefined;
};

export const foldUnaryParam = (
  op: string,
  operand: ParamValue,
): FoldResult | undefined => {
  if (op === "!" && operand.kind === "bool") {
    return ok(boolParam(!operand.value));
  }
  if (op === "-" && operand.kind === "real") {
    return ok({ kind: "real", value: -operand.value });
  }
  if (op === "-" && operand.kind === "int" && Number.isFinite(operand.value)) {
    return ok(wrapInteger("int", -BigInt(Math.trunc(operand.value))));
  }
  return undefined;
};
