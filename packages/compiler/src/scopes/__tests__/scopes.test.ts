import { describe, expect, it } from "vitest";
import { createQueryContext, type QueryContext } from "../../framework/context.js";
import {
  fn,
  formal,
  module,
  record,
  ret,
  use,
  variable,
} from "../../syntax/builder.js";
import { ID } from "../../syntax/id.js";
import { setModule } from "../../syntax/parsing-queries.js";
import { typeArena } from "../../types/arena-slot.js";
import { LookupConfig, type IdsWithName } from "../scope.js";
import {
  gatherReceiverAndParentScopesForType,
  lookupNameInScope,
  lookupNameInScopeWithSet,
  scopeForId,
  scopeForScopeNode,
} from "../scope-queries.js";

const { DECLS, IMPORT_AND_USE, PARENTS, INNERMOST, METHODS, ONLY_METHODS_FIELDS } =
  LookupConfig;

const setup = (): QueryContext => {
  const ctx = createQueryContext();
  setModule(
    ctx,
    module(
      "M",
      use("N"),
      variable("x", { init: 1 }),
      fn({
        name: "f",
        formals: [formal("a", "int")],
        body: [variable("y", { init: "a" }), variable("x"), ret("y")],
      }),
      record(
        "R",
        variable("v", { type: "int" }),
        fn({ name: "get", body: [ret("v")] }),
      ),
    ),
  );
  setModule(ctx, module("N", use("P", { isPublic: true }), fn({ name: "helper" })));
  setModule(ctx, module("P", fn({ name: "deep" })));
  return ctx;
};

const flatten = (groups: IdsWithName[]) =>
  groups.map(({ scope, ids }) => [scope.toString(), ids.map(String)]);

const scopeOf = (ctx: QueryContext, path: string) => {
  const scope = scopeForScopeNode(ctx, new ID(path));
  if (!scope) throw new Error(`no scope for ${path}`);
  return scope;
};

describe("scopes", () => {
  it("collects formals and body declarations into the function scope", () => {
    const ctx = setup();
    const scope = scopeOf(ctx, "M.f");
    expect(scope.parentId?.toString()).toBe("M");
    const [a] = scope.namesDeclared("a");
    expect(a?.id.toString()).toBe("M.f@1");
    expect(a?.kind).toBe("formal");
    expect(scope.namesDeclared("y")[0]?.kind).toBe("variable");
    expect(scopeForId(ctx, new ID("M.f", 1))).toBe(scope);
  });

  it("marks fields and methods of aggregates", () => {
    const ctx = setup();
    const scope = scopeOf(ctx, "M.R");
    expect(scope.namesDeclared("v")[0]?.kind).toBe("field");
    expect(scope.namesDeclared("get")[0]?.kind).toBe("method");
    expect(scope.containsFunctionDecls).toBe(true);
    expect(scopeOf(ctx, "M.R.get").parentId?.toString()).toBe("M.R");
  });
});

describe("lookupNameInScope", () => {
  it("walks parents and stops early under INNERMOST", () => {
    const ctx = setup();
    const scope = scopeOf(ctx, "M.f");
    expect(flatten(lookupNameInScope(ctx, scope, [], "x", DECLS | PARENTS))).toEqual([
      ["M.f", ["M.f@4"]],
      ["M", ["M@2"]],
    ]);
    expect(
      flatten(lookupNameInScope(ctx, scope, [], "x", DECLS | PARENTS | INNERMOST)),
    ).toEqual([["M.f", ["M.f@4"]]]);
    expect(flatten(lookupNameInScope(ctx, scope, [], "x", DECLS))).toEqual([
      ["M.f", ["M.f@4"]],
    ]);
  });

  it("skips methods unless asked for them", () => {
    const ctx = setup();
    const scope = scopeOf(ctx, "M.R");
    expect(lookupNameInScope(ctx, scope, [], "get", DECLS)).toEqual([]);
    expect(flatten(lookupNameInScope(ctx, scope, [], "get", DECLS | METHODS))).toEqual([
      ["M.R", ["M.R.get"]],
    ]);
    expect(
      flatten(lookupNameInScope(ctx, scope, [], "v", DECLS | ONLY_METHODS_FIELDS)),
    ).toEqual([["M.R", ["M.R@1"]]]);
  });

  it("finds fields from inside a primary method", () => {
    const ctx = setup();
    const scope = scopeOf(ctx, "M.R.get");
    expect(flatten(lookupNameInScope(ctx, scope, [], "v", DECLS | PARENTS))).toEqual([
      ["M.R", ["M.R@1"]],
    ]);
  });

  it("follows use clauses and public re-exports", () => {
    const ctx = setup();
    const scope = scopeOf(ctx, "M");
    expect(lookupNameInScope(ctx, scope, [], "helper", DECLS)).toEqual([]);
    expect(
      flatten(lookupNameInScope(ctx, scope, [], "helper", DECLS | IMPORT_AND_USE)),
    ).toEqual([["N", ["N.helper"]]]);
    expect(
      flatten(lookupNameInScope(ctx, scope, [], "deep", DECLS | IMPORT_AND_USE)),
    ).toEqual([["P", ["P.deep"]]]);
  });

  it("records and skips visited scopes", () => {
    const ctx = setup();
    const visited = new Set<string>();
    const scope = scopeOf(ctx, "M.f");
    lookupNameInScopeWithSet(ctx, scope, [], "x", DECLS | PARENTS, visited);
    expect([...visited]).toEqual(["M.f", "M"]);
    expect(
      lookupNameInScopeWithSet(ctx, scope, [], "x", DECLS | PARENTS, visited),
    ).toEqual([]);
  });

  it("searches receiver scopes first", () => {
    const ctx = setup();
    const receiver = scopeOf(ctx, "M.R");
    const groups = lookupNameInScope(
      ctx,
      scopeOf(ctx, "M"),
      [receiver],
      "get",
      DECLS | PARENTS | METHODS,
    );
    expect(flatten(groups)).toEqual([["M.R", ["M.R.get"]]]);
  });
});

describe("gatherReceiverAndParentScopesForType", () => {
  it("returns the aggregate scope then its module", () => {
    const ctx = setup();
    const type = typeArena(ctx).internRecord({
      decl: new ID("M.R"),
      name: "R",
      substitutions: [],
    });
    const scopes = gatherReceiverAndParentScopesForType(ctx, type);
    expect(scopes.map((scope) => scope.id.toString())).toEqual(["M.R", "M"]);
  });
});
