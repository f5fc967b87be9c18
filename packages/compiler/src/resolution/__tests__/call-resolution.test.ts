import { describe, expect, it } from "vitest";
import { createQueryContext } from "../../framework/context.js";
import {
  call,
  fn,
  formal,
  method,
  module,
  op,
  paramFormal,
  real,
  record,
  ret,
  str,
  variable,
  varArgs,
  type ExprLike,
} from "../../syntax/builder.js";
import { setModule } from "../../syntax/parsing-queries.js";
import { QualifiedType } from "../../types/qualified-type.js";
import { Types } from "../../types/type-arena.js";
import { canPass } from "../can-pass.js";
import { resolveConcreteFunction } from "../function-queries.js";
import { initialTypeForTypeDecl } from "../genericity.js";
import { resolveModuleStmt } from "../module-queries.js";
import {
  aggregateNamed,
  codesOf,
  functionNamed,
  initOf,
  messagesFor,
  variableNamed,
} from "./support.js";

describe("overload resolution", () => {
  const overloads = (actual: ExprLike) =>
    module(
      "M",
      fn({ name: "f", formals: [formal("a", "int")], body: [ret("a")] }),
      fn({ name: "f", formals: [formal("a", "real")], body: [ret("a")] }),
      variable("r", { init: call("f", actual) }),
    );

  it("prefers the candidate needing no conversion", () => {
    const ctx = createQueryContext();
    const built = setModule(ctx, overloads(1));
    const r = variableNamed(built, "r");
    const results = resolveModuleStmt(ctx, r.id);

    const resolved = results.byId(initOf(r).id);
    expect(resolved?.mostSpecific.only()?.fn.id.toString()).toBe("M.f");
    expect(results.typeOf(r.id).kind).toBe("var");
    expect(results.typeOf(r.id).type).toBe(Types.int);
    expect(codesOf(ctx)).toEqual([]);
  });

  it("switches candidates when the actual changes", () => {
    const ctx = createQueryContext();
    const built = setModule(ctx, overloads(real(2.5)));
    const r = variableNamed(built, "r");
    const results = resolveModuleStmt(ctx, r.id);

    expect(results.byId(initOf(r).id)?.mostSpecific.only()?.fn.id.toString()).toBe(
      "M.f#1",
    );
    expect(results.typeOf(r.id).type).toBe(Types.real);
  });

  it("reports ambiguity when neither candidate is better", () => {
    const ctx = createQueryContext();
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
    const results = resolveModuleStmt(ctx, r.id);

    expect(results.byId(initOf(r).id)?.mostSpecific.fns().map((sig) => sig.id.toString())).toEqual(
      ["M.f", "M.f#1"],
    );
    expect(results.typeOf(r.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0002")).toEqual([
      "ambiguous call to f; candidates: M.f, M.f#1",
    ]);
  });

  it("reports a call with no visible candidate", () => {
    const ctx = createQueryContext();
    const built = setModule(ctx, module("M", variable("r", { init: call("g") })));
    const r = variableNamed(built, "r");
    const results = resolveModuleStmt(ctx, r.id);

    expect(results.typeOf(r.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0001")).toEqual(["unable to resolve call to g()"]);
  });
});

describe("operator methods", () => {
  it("resolves an operator declared outside its record", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        record("R", variable("x", { type: "int" })),
        method("R", {
          name: "+",
          operator: true,
          formals: [formal("a", "R"), formal("b", "R")],
          body: [ret("a")],
        }),
        variable("r1", { type: "R" }),
        variable("r2", { type: "R" }),
        variable("s", { init: op("+", "r1", "r2") }),
      ),
    );
    const s = variableNamed(built, "s");
    const results = resolveModuleStmt(ctx, s.id);

    expect(results.byId(initOf(s).id)?.mostSpecific.only()?.fn.id.toString()).toBe("M.+");
    expect(results.typeOf(s.id).type).toBe(
      initialTypeForTypeDecl(ctx, aggregateNamed(built, "R").id),
    );
    expect(codesOf(ctx)).toEqual([]);
  });
});

describe("generic candidates", () => {
  it("instantiates a typeless formal from its actual", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "id", formals: [formal("a")], body: [ret("a")] }),
        variable("r", { init: call("id", 1) }),
      ),
    );
    const r = variableNamed(built, "r");
    const results = resolveModuleStmt(ctx, r.id);
    const resolved = results.byId(initOf(r).id);
    const chosen = resolved?.mostSpecific.only()?.fn;

    expect(chosen?.isInstantiated()).toBe(true);
    expect(chosen?.formalType(0).kind).toBe("const-in");
    expect(chosen?.formalType(0).type).toBe(Types.int);
    expect(chosen?.initialSignature().formalType(0).kind).toBe("default-intent");
    expect(resolved?.poiScope).toBeDefined();
    expect(results.typeOf(r.id).type).toBe(Types.int);
  });

  it("marks only the generic formals as instantiated", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({
          name: "m",
          formals: [formal("a"), formal("b", "int"), formal("c")],
          body: [ret(1)],
        }),
        variable("r", { init: call("m", 1, 2, real(3.5)) }),
      ),
    );
    const r = variableNamed(built, "r");
    const chosen = resolveModuleStmt(ctx, r.id).byId(initOf(r).id)?.mostSpecific.only()?.fn;

    expect([0, 1, 2].map((index) => chosen?.formalIsInstantiated(index))).toEqual([
      true,
      false,
      true,
    ]);
    expect(chosen?.formalType(2).type).toBe(Types.real);
    expect(chosen?.needsInstantiation).toBe(false);
  });

  it("drops an instantiation whose where clause folds to false", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({
          name: "h",
          formals: [paramFormal("n", "int")],
          where: op(">", "n", 0),
          body: [ret("n")],
        }),
        variable("ok", { init: call("h", 1) }),
        variable("bad", { init: call("h", 0) }),
      ),
    );
    const ok = variableNamed(built, "ok");
    const bad = variableNamed(built, "bad");

    const okResults = resolveModuleStmt(ctx, ok.id);
    const chosen = okResults.byId(initOf(ok).id)?.mostSpecific.only()?.fn;
    expect(chosen?.whereClause).toBe("true");
    expect(chosen?.formalType(0).param).toEqual({ kind: "int", value: 1 });
    expect(okResults.typeOf(ok.id).type).toBe(Types.int);

    expect(resolveModuleStmt(ctx, bad.id).typeOf(bad.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0001")).toEqual([
      "unable to resolve call to h(0) (1 candidate(s) rejected)",
    ]);
  });

  it("passes only the exact type to a ref formal", () => {
    const ctx = createQueryContext();
    const refReal = new QualifiedType("ref", Types.real);

    expect(canPass(ctx, new QualifiedType("var", Types.real), refReal).passes).toBe(true);
    const converted = canPass(ctx, new QualifiedType("var", Types.int), refReal);
    expect(converted.passes).toBe(false);
    expect(converted.failReason).toBe("ref-requires-exact-type");
  });

  it("instantiates a generic ref formal from a variable", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "touch", formals: [formal("a", undefined, { intent: "ref" })], body: [ret(1)] }),
        variable("i", { type: "int" }),
        variable("r", { init: call("touch", "i") }),
      ),
    );
    const r = variableNamed(built, "r");
    const results = resolveModuleStmt(ctx, r.id);
    const chosen = results.byId(initOf(r).id)?.mostSpecific.only()?.fn;

    expect(chosen?.formalType(0).type).toBe(Types.int);
    expect(results.typeOf(r.id).type).toBe(Types.int);
    expect(codesOf(ctx)).toEqual([]);
  });

  it("checks the count of a counted variadic formal", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({
          name: "v",
          formals: [varArgs("xs", "int", { count: 2 })],
          body: [ret(1)],
        }),
        variable("two", { init: call("v", 1, 2) }),
        variable("one", { init: call("v", 1) }),
      ),
    );
    const two = variableNamed(built, "two");
    const one = variableNamed(built, "one");

    expect(resolveModuleStmt(ctx, two.id).typeOf(two.id).type).toBe(Types.int);
    expect(resolveModuleStmt(ctx, one.id).typeOf(one.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0001")).toEqual([
      "unable to resolve call to v(1) (1 candidate(s) rejected)",
    ]);
  });
});

describe("return type inference", () => {
  it("reports returns that disagree", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "k", formals: [formal("b", "bool")], body: [ret(1), ret(str("s"))] }),
      ),
    );
    const k = functionNamed(built, "k");

    expect(resolveConcreteFunction(ctx, k.id)?.returnType.isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0006")).toEqual(['returns of k disagree: 1 vs "s"']);
  });

  it("reports a function whose return type depends on itself", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "rec", formals: [formal("n", "int")], body: [ret(call("rec", "n"))] }),
      ),
    );
    const rec = functionNamed(built, "rec");

    expect(resolveConcreteFunction(ctx, rec.id)?.returnType.isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0007")).toEqual([
      "unable to infer the return type of recursive function rec",
    ]);
  });

  it("keeps the declared return type over the body", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        fn({ name: "half", returnType: "real", body: [ret(1)] }),
        variable("r", { init: call("half") }),
      ),
    );
    const r = variableNamed(built, "r");

    expect(resolveModuleStmt(ctx, r.id).typeOf(r.id).type).toBe(Types.real);
  });
});
