import { describe, expect, it } from "vitest";
import { ID } from "../../syntax/id.js";
import { qualifiedTypeToString, typeToString } from "../format.js";
import {
  boolParam,
  foldBinaryParam,
  foldUnaryParam,
  intParam,
} from "../params.js";
import { QualifiedType, paramOf, typeOf } from "../qualified-type.js";
import { Types, createTypeArena } from "../type-arena.js";

describe("type arena", () => {
  it("assigns the documented IDs to built-in types", () => {
    const arena = createTypeArena();
    expect(arena.internPrimitive("int")).toBe(Types.int);
    expect(arena.internPrimitive("int", 8)).toBe(Types.int8);
    expect(arena.internPrimitive("real", 32)).toBe(Types.real32);
    expect(arena.internPrimitive("bool")).toBe(Types.bool);
    expect(arena.get(Types.object)).toMatchObject({
      kind: "basic-class",
      name: "object",
    });
    expect(arena.size()).toBe(20);
  });

  it("interns composites by content", () => {
    const arena = createTypeArena();
    const decl = new ID("M.Box");
    const field = new ID("M.Box", 1);
    const make = () =>
      arena.internRecord({
        decl,
        name: "Box",
        substitutions: [{ field, type: typeOf(Types.int) }],
      });
    const first = make();
    expect(make()).toBe(first);
    expect(
      arena.internRecord({ decl, name: "Box", substitutions: [] }),
    ).not.toBe(first);
  });

  it("formats types for diagnostics", () => {
    const arena = createTypeArena();
    const decl = new ID("M.Vec");
    const vec = arena.internRecord({
      decl,
      name: "Vec",
      substitutions: [
        { field: new ID("M.Vec", 0), type: typeOf(Types.real) },
        { field: new ID("M.Vec", 2), type: paramOf(Types.int, intParam(3)) },
      ],
    });
    expect(typeToString(arena, vec)).toBe("Vec(real, 3)");
    expect(typeToString(arena, Types.int8)).toBe("int(8)");
    expect(typeToString(arena, arena.internTuple([Types.int]))).toBe("(int,)");
    expect(typeToString(arena, arena.internDomain())).toBe("domain(?)");
    const borrowed = arena.internClass({
      manageable: Types.object,
      management: "borrowed",
      nilability: "nilable",
    });
    expect(typeToString(arena, borrowed)).toBe("borrowed object?");
    expect(qualifiedTypeToString(arena, typeOf(Types.string))).toBe(
      "type string",
    );
  });
});

describe("qualified types", () => {
  it("compares by kind, type and param", () => {
    const one = paramOf(Types.int, intParam(1));
    expect(one.equals(paramOf(Types.int, intParam(1)))).toBe(true);
    expect(one.equals(paramOf(Types.int, intParam(2)))).toBe(false);
    expect(one.queryKey()).toBe("param:13=int:1");
    expect(QualifiedType.unknown.isUnknown()).toBe(true);
  });

  it("drops the param when changing to a value kind", () => {
    const flag = paramOf(Types.bool, boolParam(true));
    expect(flag.isParamTrue()).toBe(true);
    expect(flag.withKind("const-in").param).toBeUndefined();
    expect(flag.withKind("const-in").isConst()).toBe(true);
  });
});

describe("param folding", () => {
  it("folds integer arithmetic", () => {
    expect(foldBinaryParam("+", intParam(2), intParam(3))).toEqual({
      ok: true,
      value: { kind: "int", value: 5 },
    });
    expect(foldBinaryParam("/", intParam(7), intParam(2))).toEqual({
      ok: true,
      value: { kind: "int", value: 3 },
    });
  });

  it("wraps integer results to 64 bits", () => {
    expect(foldBinaryParam("*", intParam(2 ** 62), intParam(2))).toEqual({
      ok: true,
      value: { kind: "int", value: -(2 ** 63) },
    });
    expect(
      foldBinaryParam("+", { kind: "uint", value: 2 ** 63 }, { kind: "uint", value: 2 ** 63 }),
    ).toEqual({
      ok: true,
      value: { kind: "uint", value: 0 },
    });
    expect(foldUnaryParam("-", intParam(-(2 ** 63)))).toEqual({
      ok: true,
      value: { kind: "int", value: -(2 ** 63) },
    });
  });

  it("reports integer division by zero", () => {
    expect(foldBinaryParam("%", intParam(1), intParam(0))).toEqual({
      ok: false,
      reason: "division by zero",
    });
  });

  it("folds comparisons and booleans", () => {
    expect(foldBinaryParam("<", intParam(1), intParam(2))).toEqual({
      ok: true,
      value: boolParam(true),
    });
    expect(foldBinaryParam("&&", boolParam(true), boolParam(false))).toEqual({
      ok: true,
      value: boolParam(false),
    });
    expect(foldUnaryParam("!", boolParam(false))).toEqual({
      ok: true,
      value: boolParam(true),
    });
  });

  it("leaves mismatched operands alone", () => {
    expect(foldBinaryParam("+", intParam(1), boolParam(true))).toBeUndefined();
  });
});
