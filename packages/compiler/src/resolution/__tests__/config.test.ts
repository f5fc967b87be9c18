import { describe, expect, it } from "vitest";
import { createQueryContext } from "../../framework/context.js";
import { call, fn, formal, module, ret, typeQuery, variable } from "../../syntax/builder.js";
import { setModule } from "../../syntax/parsing-queries.js";
import { Types } from "../../types/type-arena.js";
import {
  DEFAULT_MAX_OVERLOAD_CANDIDATES,
  createResolutionConfig,
  setResolutionConfig,
} from "../config.js";
import { resolveModuleStmt } from "../module-queries.js";
import { initOf, messagesFor, variableNamed } from "./support.js";

describe("createResolutionConfig", () => {
  it("falls back to defaults for missing or non-finite limits", () => {
    expect(createResolutionConfig().maxOverloadCandidates).toBe(
      DEFAULT_MAX_OVERLOAD_CANDIDATES,
    );
    expect(
      createResolutionConfig({ maxOverloadCandidates: Number.NaN }).maxOverloadCandidates,
    ).toBe(DEFAULT_MAX_OVERLOAD_CANDIDATES);
  });

  it("truncates and clamps limits to at least one", () => {
    expect(createResolutionConfig({ maxOverloadCandidates: 0 }).maxOverloadCandidates).toBe(1);
    expect(createResolutionConfig({ maxOverloadCandidates: 7.9 }).maxOverloadCandidates).toBe(7);
  });
});

describe("resolution config", () => {
  it("rejects calls with more applicable candidates than the limit", () => {
    const ctx = createQueryContext();
    setResolutionConfig(ctx, { maxOverloadCandidates: 1 });
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "f", formals: [formal("a", "int"), formal("b", "real")] }),
        fn({ name: "f", formals: [formal("a", "real"), formal("b", "int")] }),
        variable("r", { init: call("f", 1, 2) }),
      ),
    );
    const r = variableNamed(built, "r");

    expect(resolveModuleStmt(ctx, r.id).typeOf(r.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0008")).toEqual([
      "call to f has 2 applicable candidates (limit 1)",
    ]);
  });

  it("resolves compiler globals as params and tracks changes to them", () => {
    const ctx = createQueryContext();
    setResolutionConfig(ctx, {
      compilerGlobals: [{ name: "debugLevel", value: { kind: "int", value: 2 } }],
    });
    const built = setModule(ctx, module("M", variable("r", { init: "debugLevel" })));
    const r = variableNamed(built, "r");

    const before = resolveModuleStmt(ctx, r.id).typeOf(initOf(r).id);
    expect(before.kind).toBe("param");
    expect(before.param).toEqual({ kind: "int", value: 2 });

    setResolutionConfig(ctx, {
      compilerGlobals: [{ name: "debugLevel", value: { kind: "int", value: 3 } }],
    });
    expect(resolveModuleStmt(ctx, r.id).typeOf(initOf(r).id).param).toEqual({
      kind: "int",
      value: 3,
    });
  });
});

describe("type queries", () => {
  it("binds a queried formal type for the declared return type", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({
          name: "same",
          formals: [formal("a", typeQuery("t"))],
          returnType: "t",
          body: [ret("a")],
        }),
        variable("i", { init: call("same", 1) }),
        variable("b", { init: call("same", true) }),
      ),
    );
    const i = variableNamed(built, "i");
    const b = variableNamed(built, "b");

    expect(resolveModuleStmt(ctx, i.id).typeOf(i.id).type).toBe(Types.int);
    expect(resolveModuleStmt(ctx, b.id).typeOf(b.id).type).toBe(Types.bool);
  });
});
