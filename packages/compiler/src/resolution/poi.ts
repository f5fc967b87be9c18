import type { QueryContext } from "../framework/context.js";
import { defineShared } from "../framework/context.js";
import type { Keyed } from "../framework/keys.js";
import type { Scope } from "../scopes/scope.js";
import { parentScope, scopeForScopeNode } from "../scopes/scope-queries.js";
import type { ID } from "../syntax/id.js";
import type { TypedFnSignature } from "./signatures.js";

/**
 * Where a generic function was instantiated: a scope plus the point of
 * instantiation of the function containing it. Interned per context.
 */
export class PoiScope implements Keyed {
  constructor(
    readonly uid: number,
    readonly scopeId: ID,
    readonly inFnPoi: PoiScope | undefined,
  ) {}

  inScope(ctx: QueryContext): Scope | undefined {
    return scopeForScopeNode(ctx, this.scopeId);
  }

  queryKey(): string {
    return `poi#${this.uid}`;
  }
}

type PoiTable = { scopes: Map<string, PoiScope>; nextUid: number };

const poiTable = defineShared(
  (): PoiTable => ({ scopes: new Map(), nextUid: 1 }),
);

const internPoiScope = (
  ctx: QueryContext,
  scopeId: ID,
  inFnPoi: PoiScope | undefined,
): PoiScope => {
  const table = poiTable.get(ctx);
  const key = `${scopeId.toString()}|${inFnPoi?.uid ?? ""}`;
  const existing = table.scopes.get(key);
  if (existing) return existing;
  const created = new PoiScope(table.nextUid++, scopeId, inFnPoi);
  table.scopes.set(key, created);
  return created;
};

/**
 * The POI scope for instantiating from `scope`. Scopes that declare no
 * functions collapse to the nearest one that does, and a scope already on
 * the POI chain reuses that entry so recursion stays finite.
 */
export const pointOfInstantiationScope = (
  ctx: QueryContext,
  scope: Scope,
  parentPoi: PoiScope | undefined,
): PoiScope => {
  let current: Scope | undefined = scope;
  let collapsed = scope;
  while (current) {
    collapsed = current;
    if (current.containsFunctionDecls || current.tag === "module") break;
    current = parentScope(ctx, current);
  }

  for (let poi = parentPoi; poi; poi = poi.inFnPoi) {
    if (poi.scopeId.equals(collapsed.id)) return poi;
  }
  return internPoiScope(ctx, collapsed.id, parentPoi);
};

const idPairKey = (call: ID, fn: ID) => `${call.toString()}>${fn.toString()}`;

/**
 * What resolving one generic body took from its points of instantiation.
 * Results with equal POI usage are interchangeable.
 */
export class PoiInfo implements Keyed {
  #poiFnIdsUsed = new Map<string, readonly [ID, ID]>();
  #recursiveFnsUsed = new Map<
    string,
    readonly [TypedFnSignature, PoiScope | undefined]
  >();

  constructor(
    readonly poiScope: PoiScope | undefined = undefined,
    readonly resolved = false,
  ) {}

  addIds(call: ID, fn: ID): void {
    this.#poiFnIdsUsed.set(idPairKey(call, fn), [call, fn]);
  }

  accumulate(other: PoiInfo): void {
    other.#poiFnIdsUsed.forEach((pair, key) =>
      this.#poiFnIdsUsed.set(key, pair),
    );
    other.#recursiveFnsUsed.forEach((pair, key) =>
      this.#recursiveFnsUsed.set(key, pair),
    );
  }

  accumulateRecursive(sig: TypedFnSignature, poi: PoiScope | undefined): void {
    this.#recursiveFnsUsed.set(`${sig.uid}|${poi?.uid ?? ""}`, [sig, poi]);
  }

  poiFnIdsUsed(): readonly (readonly [ID, ID])[] {
    return [...this.#poiFnIdsUsed.entries()]
      .sort(([left], [right]) => (left < right ? -1 : 1))
      .map(([, pair]) => pair);
  }

  recursiveFnsUsed(): readonly (readonly [TypedFnSignature, PoiScope | undefined])[] {
    return [...this.#recursiveFnsUsed.entries()]
      .sort(([left], [right]) => (left < right ? -1 : 1))
      .map(([, pair]) => pair);
  }

  /** Canonical key of the POI functions used. */
  poiFnIdsKey(): string {
    return [...this.#poiFnIdsUsed.keys()].sort().join(";");
  }

  recursiveFnsKey(): string {
    return [...this.#recursiveFnsUsed.keys()].sort().join(";");
  }

  /** A resolved copy that no longer refers to the POI it came from. */
  markResolved(): PoiInfo {
    const copy = new PoiInfo(undefined, true);
    copy.accumulate(this);
    return copy;
  }

  equals(other: unknown): boolean {
    return (
      other instanceof PoiInfo &&
      other.poiScope === this.poiScope &&
      other.resolved === this.resolved &&
      other.poiFnIdsKey() === this.poiFnIdsKey() &&
      other.recursiveFnsKey() === this.recursiveFnsKey()
    );
  }

  queryKey(): string {
    return `poiinfo:${this.poiScope?.uid ?? "_"}:${this.poiFnIdsKey()}:${this.recursiveFnsKey()}`;
  }
}
