import type { Keyed } from "../framework/keys.js";
import type { ID } from "../syntax/id.js";
import type { AstKind } from "../syntax/nodes.js";

export type DeclaredKind =
  | "variable"
  | "field"
  | "formal"
  | "function"
  | "method"
  | "type"
  | "type-query";

export type DeclaredName = {
  readonly id: ID;
  readonly kind: DeclaredKind;
};

export type UseClause = {
  readonly moduleName: string;
  readonly isPublic: boolean;
};

const declaredEqual = (
  left: readonly DeclaredName[],
  right: readonly DeclaredName[] | undefined,
): boolean =>
  right !== undefined &&
  left.length === right.length &&
  left.every(
    (decl, index) =>
      decl.kind === right[index]?.kind && decl.id.equals(right[index]?.id),
  );

/** The names one scope-creating node declares, plus how to reach its parent. */
export class Scope implements Keyed {
  constructor(
    readonly id: ID,
    readonly tag: AstKind,
    readonly parentId: ID | undefined,
    readonly declared: ReadonlyMap<string, readonly DeclaredName[]>,
    readonly uses: readonly UseClause[],
    readonly containsFunctionDecls: boolean,
  ) {}

  namesDeclared(name: string): readonly DeclaredName[] {
    return this.declared.get(name) ?? [];
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Scope)) return false;
    if (
      !this.id.equals(other.id) ||
      this.tag !== other.tag ||
      this.containsFunctionDecls !== other.containsFunctionDecls ||
      !(this.parentId?.equals(other.parentId) ?? other.parentId === undefined)
    ) {
      return false;
    }
    if (
      this.uses.length !== other.uses.length ||
      this.uses.some(
        (use, index) =>
          use.moduleName !== other.uses[index]?.moduleName ||
          use.isPublic !== other.uses[index]?.isPublic,
      )
    ) {
      return false;
    }
    if (this.declared.size !== other.declared.size) return false;
    return [...this.declared].every(([name, decls]) =>
      declaredEqual(decls, other.declared.get(name)),
    );
  }

  queryKey(): string {
    return `scope:${this.id.toString()}`;
  }
}

/** Bit flags selecting where a name lookup searches. */
export const LookupConfig = {
  /** Declarations of the scope itself. */
  DECLS: 1,
  /** Modules brought in by `use`. */
  IMPORT_AND_USE: 2,
  /** Continue through enclosing scopes. */
  PARENTS: 4,
  /** Stop at the first scope that yields a match. */
  INNERMOST: 8,
  /** Only methods and fields. */
  ONLY_METHODS_FIELDS: 16,
  /** Include methods in an otherwise plain lookup. */
  METHODS: 32,
} as const;

export type LookupFlags = number;

export const hasFlag = (config: LookupFlags, flag: number): boolean =>
  (config & flag) !== 0;

/** The IDs a lookup found in one scope. */
export type IdsWithName = {
  readonly scope: ID;
  readonly ids: readonly ID[];
};
