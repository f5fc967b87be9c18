import { describe, expect, it } from "vitest";
import { createQueryContext } from "../../framework/context.js";
import {
  call,
  fn,
  formal,
  module,
  named,
  newExpr,
  record,
  ret,
  variable,
} from "../../syntax/builder.js";
import { setModule } from "../../syntax/parsing-queries.js";
import { typeArena } from "../../types/arena-slot.js";
import { typeToString } from "../../types/format.js";
import { Types } from "../../types/type-arena.js";
import { resolveConcreteFunction, resolveOnlyCandidate } from "../function-queries.js";
import { resolveModuleStmt } from "../module-queries.js";
import {
  functionNamed,
  initOf,
  messagesFor,
  returnedExpr,
  variableNamed,
} from "./support.js";

describe("generated initializers", () => {
  it("instantiates the receiver from the field values", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module("M", record("Box", variable("x")), variable("b", { init: newExpr("Box", 5) })),
    );
    const b = variableNamed(built, "b");
    const results = resolveModuleStmt(ctx, b.id);
    const bType = results.typeOf(b.id);

    expect(bType.kind).toBe("var");
    expect(bType.type === undefined ? "" : typeToString(typeArena(ctx), bType.type)).toBe(
      "Box(int)",
    );

    const init = results.byId(initOf(b).id)?.mostSpecific.only()?.fn;
    expect(init?.untyped.isInitializer()).toBe(true);
    expect(init?.formalType(1).kind).toBe("in");
    expect(init?.formalType(1).type).toBe(Types.int);
    expect(init?.formalIsInstantiated(0)).toBe(true);
    expect(init?.formalIsInstantiated(1)).toBe(true);
  });

  it("binds a named field value to its formal", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        record("Box", variable("x")),
        variable("b", { init: newExpr("Box", named("x", 5)) }),
      ),
    );
    const b = variableNamed(built, "b");
    const results = resolveModuleStmt(ctx, b.id);
    const bType = results.typeOf(b.id);
    const init = results.byId(initOf(b).id)?.mostSpecific.only()?.fn;

    expect(bType.type === undefined ? "" : typeToString(typeArena(ctx), bType.type)).toBe(
      "Box(int)",
    );
    expect(init?.untyped.formals.map((formal) => formal.name)).toEqual(["this", "x"]);
    expect(init?.formalIsInstantiated(1)).toBe(true);
    expect(init?.formalType(1).type).toBe(Types.int);
  });
});

describe("points of instantiation", () => {
  const program = () =>
    module(
      "M",
      fn({ name: "id", formals: [formal("a")], body: [ret("a")] }),
      variable("r", { init: call("id", 1) }),
      fn({ name: "g", body: [fn({ name: "helper" }), ret(call("id", 2))] }),
    );

  it("shares a body between instantiations that used nothing from their POI", () => {
    const ctx = createQueryContext();
    const built = setModule(ctx, program());
    const r = variableNamed(built, "r");
    const g = functionNamed(built, "g");

    const atModule = resolveModuleStmt(ctx, r.id).byId(initOf(r).id);
    const inG = resolveConcreteFunction(ctx, g.id)?.byId(returnedExpr(g.body?.body[1]).id);
    if (!atModule || !inG) throw new Error("calls to id were not resolved");

    expect(inG.poiScope).not.toBe(atModule.poiScope);
    expect(inG.mostSpecific.only()?.fn).toBe(atModule.mostSpecific.only()?.fn);

    const fromModule = resolveOnlyCandidate(ctx, atModule);
    expect(fromModule).toBeDefined();
    expect(resolveOnlyCandidate(ctx, inG)).toBe(fromModule);
    expect(fromModule?.returnType.type).toBe(Types.int);
  });

  it("resolves a body again for each POI whose functions it uses", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "gen", formals: [formal("a")], body: [ret(call("helper", "a"))] }),
        fn({
          name: "g1",
          body: [
            fn({ name: "helper", formals: [formal("x", "int")], body: [ret(1)] }),
            ret(call("gen", 1)),
          ],
        }),
        fn({
          name: "g2",
          body: [
            fn({ name: "helper", formals: [formal("x", "int")], body: [ret(true)] }),
            ret(call("gen", 2)),
          ],
        }),
      ),
    );
    const inG1 = resolveConcreteFunction(ctx, functionNamed(built, "g1").id)?.byId(
      returnedExpr(functionNamed(built, "g1").body?.body[1]).id,
    );
    const inG2 = resolveConcreteFunction(ctx, functionNamed(built, "g2").id)?.byId(
      returnedExpr(functionNamed(built, "g2").body?.body[1]).id,
    );
    if (!inG1 || !inG2) throw new Error("calls to gen were not resolved");

    expect(inG1.mostSpecific.only()?.fn).toBe(inG2.mostSpecific.only()?.fn);
    const fromG1 = resolveOnlyCandidate(ctx, inG1);
    const fromG2 = resolveOnlyCandidate(ctx, inG2);
    expect(fromG1).toBeDefined();
    expect(fromG2).toBeDefined();
    expect(fromG1).not.toBe(fromG2);
    expect(fromG1?.returnType.type).toBe(Types.int);
    expect(fromG2?.returnType.type).toBe(Types.bool);
    expect(inG1.type.type).toBe(Types.int);
    expect(inG2.type.type).toBe(Types.bool);
  });

  it("keeps results when an unrelated module changes", () => {
    const ctx = createQueryContext();
    const built = setModule(ctx, program());
    const r = variableNamed(built, "r");
    const first = resolveModuleStmt(ctx, r.id);
    const revision = ctx.revision;

    setModule(ctx, module("N", variable("z", { init: 3 })));

    expect(ctx.revision).toBeGreaterThan(revision);
    expect(resolveModuleStmt(ctx, r.id)).toBe(first);
  });

  it("recomputes results when the module itself changes", () => {
    const ctx = createQueryContext();
    setModule(ctx, program());
    const edited = setModule(
      ctx,
      module(
        "M",
        fn({ name: "id", formals: [formal("a")], body: [ret("a")] }),
        variable("r", { init: call("id", true) }),
      ),
    );
    const r = variableNamed(edited, "r");

    expect(resolveModuleStmt(ctx, r.id).typeOf(r.id).type).toBe(Types.bool);
  });
});

describe("diagnostics across revisions", () => {
  const program = () =>
    module(
      "M",
      fn({
        name: "g",
        body: [variable("a", { init: call("p") }), ret(call("q"))],
      }),
    );

  it("reports body diagnostics in the same order after an unrelated edit", () => {
    const ctx = createQueryContext();
    const built = setModule(ctx, program());
    const g = functionNamed(built, "g");
    resolveConcreteFunction(ctx, g.id);
    expect(messagesFor(ctx, "CR0001")).toEqual([
      "unable to resolve call to p()",
      "unable to resolve call to q()",
    ]);

    setModule(ctx, module("N", variable("z", { init: 3 })));
    resolveConcreteFunction(ctx, g.id);

    const fresh = createQueryContext();
    const freshBuilt = setModule(fresh, program());
    resolveConcreteFunction(fresh, functionNamed(freshBuilt, "g").id);

    expect(messagesFor(ctx, "CR0001")).toEqual(messagesFor(fresh, "CR0001"));
    expect(messagesFor(ctx, "CR0001")).toEqual([
      "unable to resolve call to p()",
      "unable to resolve call to q()",
    ]);
  });
});
