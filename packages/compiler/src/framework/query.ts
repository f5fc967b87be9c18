import type { Diagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "./context.js";
import { keyOf, valuesEqual, type QueryArg } from "./keys.js";

/** A diagnostic reported directly by a query, positioned among its dependencies. */
export type OwnDiagnostic = {
  position: number;
  diagnostic: Diagnostic;
};

type Comparator<R> = { same(left: R, right: R): boolean };

export class QueryEntry<R> {
  result: { value: R } | undefined = undefined;
  changedAt = 0;
  verifiedAt = 0;
  storedAt = 0;
  running = false;
  dependencies: QueryEntry<unknown>[] = [];
  diagnostics: OwnDiagnostic[] = [];

  constructor(
    readonly name: string,
    readonly key: string,
    readonly isInput: boolean,
    readonly compute: () => R,
    private readonly comparator: Comparator<R>,
  ) {}

  sameValue(value: R): boolean {
    return (
      this.result !== undefined && this.comparator.same(this.result.value, value)
    );
  }
}

type QueryDefinitionInit<Args extends readonly QueryArg[], R> = {
  name: string;
  compute: (ctx: QueryContext, ...args: Args) => R;
  equals?: (left: R, right: R) => boolean;
  isInput?: boolean;
};

export class QueryDefinition<Args extends readonly QueryArg[], R> {
  readonly name: string;
  readonly isInput: boolean;
  readonly #compute: (ctx: QueryContext, ...args: Args) => R;
  readonly #equals: (left: R, right: R) => boolean;
  readonly #tables = new WeakMap<QueryContext, Map<string, QueryEntry<R>>>();

  constructor({ name, compute, equals, isInput }: QueryDefinitionInit<Args, R>) {
    this.name = name;
    this.#compute = compute;
    this.#equals = equals ?? valuesEqual;
    this.isInput = isInput ?? false;
  }

  keyFor(args: Args): string {
    return args.map(keyOf).join(",");
  }

  peek(ctx: QueryContext, args: Args): QueryEntry<R> | undefined {
    return this.#tables.get(ctx)?.get(this.keyFor(args));
  }

  entry(ctx: QueryContext, args: Args): QueryEntry<R> {
    let table = this.#tables.get(ctx);
    if (!table) {
      table = new Map();
      this.#tables.set(ctx, table);
    }
    const key = this.keyFor(args);
    const existing = table.get(key);
    if (existing) return existing;
    const created = new QueryEntry<R>(
      this.name,
      key,
      this.isInput,
      () => this.#compute(ctx, ...args),
      { same: this.#equals },
    );
    table.set(key, created);
    return created;
  }

  entryCount(ctx: QueryContext): number {
    return this.#tables.get(ctx)?.size ?? 0;
  }
}

export type QueryFunction<Args extends readonly QueryArg[], R> = ((
  ctx: QueryContext,
  ...args: Args
) => R) & { readonly definition: QueryDefinition<Args, R> };

/**
 * Declares a memoized derived query. Results are cached per argument key and
 * revalidated against the revisions of the queries they read.
 */
export const defineQuery = <Args extends readonly QueryArg[], R>({
  name,
  compute,
  equals,
}: {
  name: string;
  compute: (ctx: QueryContext, ...args: Args) => R;
  equals?: (left: R, right: R) => boolean;
}): QueryFunction<Args, R> => {
  const definition = new QueryDefinition<Args, R>({ name, compute, equals });
  const run = (ctx: QueryContext, ...args: Args): R =>
    ctx.fetch(definition, args);
  return Object.assign(run, { definition });
};

export type InputQuery<Args extends readonly QueryArg[], R> = {
  readonly definition: QueryDefinition<Args, R>;
  get(ctx: QueryContext, ...args: Args): R;
  set(ctx: QueryContext, args: Args, value: R): void;
};

/** Declares an input: a value set from outside, read like any other query. */
export const defineInput = <Args extends readonly QueryArg[], R>({
  name,
  defaultValue,
  equals,
}: {
  name: string;
  defaultValue: (...args: Args) => R;
  equals?: (left: R, right: R) => boolean;
}): InputQuery<Args, R> => {
  const definition = new QueryDefinition<Args, R>({
    name,
    compute: (_ctx, ...args) => defaultValue(...args),
    equals,
    isInput: true,
  });
  return {
    definition,
    get: (ctx, ...args) => ctx.fetch(definition, args),
    set: (ctx, args, value) => ctx.setInput(definition, args, value),
  };
};

export const isQueryRunning = <Args extends readonly QueryArg[], R>(
  ctx: QueryContext,
  query: { readonly definition: QueryDefinition<Args, R> },
  ...args: Args
): boolean => query.definition.peek(ctx, args)?.running ?? false;
