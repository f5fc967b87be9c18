import { describe, expect, it } from "vitest";
import { createQueryContext, type QueryContext } from "../../framework/context.js";
import {
  call,
  dot,
  fn,
  forwarding,
  module,
  paramField,
  record,
  ret,
  typeField,
  variable,
} from "../../syntax/builder.js";
import type { ModuleNode } from "../../syntax/nodes.js";
import { setModule } from "../../syntax/parsing-queries.js";
import { typeArena } from "../../types/arena-slot.js";
import { qualifiedTypeToString, typeToString } from "../../types/format.js";
import { Types, type TypeId } from "../../types/type-arena.js";
import {
  fieldsForTypeDecl,
  forwardingCycleCheck,
  getTypeGenericity,
  initialTypeForTypeDecl,
  typeWithDefaults,
} from "../genericity.js";
import { resolveModuleStmt } from "../module-queries.js";
import { typeConstructorInitial } from "../signature-queries.js";
import { aggregateNamed, initOf, messagesFor, variableNamed } from "./support.js";

const typeNamed = (ctx: QueryContext, built: ModuleNode, name: string): TypeId =>
  initialTypeForTypeDecl(ctx, aggregateNamed(built, name).id);

const setup = () => {
  const ctx = createQueryContext();
  const built = setModule(
    ctx,
    module(
      "M",
      record(
        "Pair",
        typeField("T"),
        variable("a"),
        variable("b", { type: "int" }),
        paramField("n", "int", 3),
      ),
      record("R", typeField("T", "int"), variable("v", { type: "T" })),
      record("P", variable("x", { type: "int" })),
      record("Box", variable("x")),
      variable("BI", { storage: "type", init: call("Box", "int") }),
    ),
  );
  return { ctx, built };
};

describe("field resolution", () => {
  it("resolves fields without defaults as written", () => {
    const { ctx, built } = setup();
    const fields = fieldsForTypeDecl(ctx, typeNamed(ctx, built, "Pair"), "ignore-defaults");

    expect(fields.fields.map((field) => field.name)).toEqual(["T", "a", "b", "n"]);
    expect(fields.byName("T")?.type.isType()).toBe(true);
    expect(fields.byName("T")?.type.type).toBe(Types.any);
    expect(fields.byName("b")?.type.type).toBe(Types.int);
    expect(fields.byName("n")?.type.hasParam()).toBe(false);
    expect(fields.byName("n")?.hasDefault).toBe(true);
    expect(fields.isGeneric).toBe(true);
    expect(fields.isGenericWithDefaults).toBe(true);
  });

  it("applies defaults only under the defaults policy", () => {
    const { ctx, built } = setup();
    const pair = typeNamed(ctx, built, "Pair");

    const withDefaults = fieldsForTypeDecl(ctx, pair, "use-defaults");
    expect(withDefaults.byName("n")?.type.param).toEqual({ kind: "int", value: 3 });

    const r = typeNamed(ctx, built, "R");
    expect(fieldsForTypeDecl(ctx, r, "ignore-defaults").byName("v")?.type.type).toBe(
      Types.any,
    );
    expect(fieldsForTypeDecl(ctx, r, "use-defaults-other-fields").byName("v")?.type.type).toBe(
      Types.int,
    );
    expect(fieldsForTypeDecl(ctx, r, "use-defaults").byName("T")?.type.type).toBe(Types.int);
  });

  it("reads a type without defaulted generic fields the same under every policy", () => {
    const { ctx, built } = setup();
    const p = typeNamed(ctx, built, "P");

    expect(fieldsForTypeDecl(ctx, p, "use-defaults")).toBe(
      fieldsForTypeDecl(ctx, p, "use-defaults-other-fields"),
    );
    expect(getTypeGenericity(ctx, p)).toBe("concrete");
  });

  it("returns the same fields object across revisions that do not touch the type", () => {
    const { ctx, built } = setup();
    const pair = typeNamed(ctx, built, "Pair");
    const first = fieldsForTypeDecl(ctx, pair, "ignore-defaults");

    expect(fieldsForTypeDecl(ctx, pair, "ignore-defaults")).toBe(first);
    setModule(ctx, module("N", fn({ name: "unrelated" })));
    expect(fieldsForTypeDecl(ctx, pair, "ignore-defaults")).toBe(first);
  });
});

describe("genericity", () => {
  it("classifies types by their fields", () => {
    const { ctx, built } = setup();

    expect(getTypeGenericity(ctx, typeNamed(ctx, built, "Pair"))).toBe("generic");
    expect(getTypeGenericity(ctx, typeNamed(ctx, built, "R"))).toBe("generic-with-defaults");
    expect(getTypeGenericity(ctx, typeNamed(ctx, built, "Box"))).toBe("generic");
  });

  it("binds defaulted fields to their defaults", () => {
    const { ctx, built } = setup();
    const arena = typeArena(ctx);
    const pair = typeNamed(ctx, built, "Pair");

    expect(typeToString(arena, typeWithDefaults(ctx, typeNamed(ctx, built, "R")))).toBe(
      "R(int)",
    );
    expect(typeWithDefaults(ctx, pair)).toBe(pair);
  });
});

describe("type constructors", () => {
  it("takes one formal per generic field", () => {
    const { ctx, built } = setup();
    const ctor = typeConstructorInitial(ctx, typeNamed(ctx, built, "Pair"));

    expect(ctor.untyped.formals.map((formal) => formal.name)).toEqual(["T", "a", "n"]);
    expect(ctor.formalType(0).isType()).toBe(true);
    expect(ctor.formalType(1).isType()).toBe(true);
    expect(ctor.formalType(1).type).toBe(Types.any);
    expect(ctor.formalType(2).kind).toBe("param");
    expect(ctor.untyped.formals[2]?.hasDefault).toBe(true);
    expect(ctor.needsInstantiation).toBe(true);
  });

  it("takes no formals for a concrete record", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        record("Pair", variable("a", { type: "int" }), variable("b", { type: "int" })),
        variable("p", { init: call("Pair", 1, 2) }),
      ),
    );
    const ctor = typeConstructorInitial(ctx, typeNamed(ctx, built, "Pair"));

    expect(ctor.untyped.formals).toEqual([]);
    expect(ctor.needsInstantiation).toBe(false);

    const p = variableNamed(built, "p");
    expect(resolveModuleStmt(ctx, p.id).typeOf(p.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0001")).toEqual([
      "unable to resolve call to Pair(1, 2) (1 candidate(s) rejected)",
    ]);
  });

  it("leaves out fields whose type names another field", () => {
    const { ctx, built } = setup();
    const ctor = typeConstructorInitial(ctx, typeNamed(ctx, built, "R"));

    expect(ctor.untyped.formals.map((formal) => formal.name)).toEqual(["T"]);
  });

  it("instantiates the type a constructor call names", () => {
    const { ctx, built } = setup();
    const bi = variableNamed(built, "BI");
    const results = resolveModuleStmt(ctx, bi.id);

    expect(qualifiedTypeToString(typeArena(ctx), results.typeOf(bi.id))).toBe("type Box(int)");
    expect(results.byId(initOf(bi).id)?.mostSpecific.only()?.fn.untyped.isTypeConstructor).toBe(
      true,
    );
  });
});

describe("forwarding", () => {
  it("reports a forwarding cycle once", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        record("A", forwarding(variable("b", { type: "B" }))),
        record("B", forwarding(variable("a", { type: "A" }))),
      ),
    );
    const a = typeNamed(ctx, built, "A");

    expect(forwardingCycleCheck(ctx, a)).toBe(true);
    expect(forwardingCycleCheck(ctx, a)).toBe(true);
    expect(messagesFor(ctx, "FD0001")).toEqual(["forwarding cycle detected in A"]);
  });

  it("resolves a method call through a forwarded field", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        record("Inner", fn({ name: "size", body: [ret(1)] })),
        record("Outer", forwarding(variable("inner", { type: "Inner" }))),
        variable("o", { type: "Outer" }),
        variable("s", { init: call(dot("o", "size")) }),
      ),
    );
    const s = variableNamed(built, "s");
    const results = resolveModuleStmt(ctx, s.id);
    const chosen = results.byId(initOf(s).id)?.mostSpecific.only();

    expect(chosen?.fn.id.toString()).toBe("M.Inner.size");
    expect(chosen?.forwardingTo?.type).toBe(typeNamed(ctx, built, "Inner"));
    expect(results.typeOf(s.id).type).toBe(Types.int);
    expect(forwardingCycleCheck(ctx, typeNamed(ctx, built, "Outer"))).toBe(false);
  });

  it("does not forward lifecycle methods", () => {
    const ctx = createQueryContext();
    const built = setModule(
      ctx,
      module(
        "M",
        record("Inner", fn({ name: "deinit", body: [ret(1)] })),
        record("Outer", forwarding(variable("inner", { type: "Inner" }))),
        variable("o", { type: "Outer" }),
        variable("d", { init: call(dot("o", "deinit")) }),
      ),
    );
    const d = variableNamed(built, "d");
    const results = resolveModuleStmt(ctx, d.id);

    expect(results.byId(initOf(d).id)?.mostSpecific.only()).toBeUndefined();
    expect(results.typeOf(d.id).isErroneous()).toBe(true);
    expect(messagesFor(ctx, "CR0001")).toHaveLength(1);
  });
});
