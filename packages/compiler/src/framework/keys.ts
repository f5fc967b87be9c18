/** Values that know how to describe themselves as part of a query key. */
export interface Keyed {
  queryKey(): string;
}

export type QueryArg =
  | string
  | number
  | boolean
  | undefined
  | null
  | Keyed
  | readonly QueryArg[];

const isArgList = (value: QueryArg): value is readonly QueryArg[] =>
  Array.isArray(value);

export const keyOf = (value: QueryArg): string => {
  if (value === undefined) return "_";
  if (value === null) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (isArgList(value)) return `[${value.map(keyOf).join(",")}]`;
  return value.queryKey();
};

type Equatable = { equals(other: unknown): boolean };

const isEquatable = (value: unknown): value is Equatable =>
  typeof value === "object" &&
  value !== null &&
  "equals" in value &&
  typeof value.equals === "function";

/**
 * Structural equality used for early cutoff: identity, element-wise arrays,
 * and objects that define `equals`.
 */
export const valuesEqual = (left: unknown, right: unknown): boolean => {
  if (Object.is(left, right)) return true;
  if (Array.isArray(left) && Array.isArray(right)) {
    return (
      left.length === right.length &&
      left.every((value, index) => valuesEqual(value, right[index]))
    );
  }
  if (isEquatable(left)) return left.equals(right);
  return false;
};
