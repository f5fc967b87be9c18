import { describe, expect, it } from "vitest";
import { createQueryContext } from "../../framework/context.js";
import { defineQuery } from "../../framework/query.js";
import {
  fn,
  formal,
  module,
  record,
  ret,
  variable,
} from "../builder.js";
import { canonicalText, nodesEqual } from "../fingerprint.js";
import { ID } from "../id.js";
import { buildModule } from "../numbering.js";
import {
  idContainsFieldWithName,
  idIsField,
  idToAst,
  idToParentId,
  setModule,
} from "../parsing-queries.js";

const sample = (secondFormal = "real") =>
  module(
    "M",
    variable("x", { init: 1 }),
    fn({ name: "f", formals: [formal("a", "int")], body: [ret("a")] }),
    fn({ name: "f", formals: [formal("b", secondFormal)] }),
    record(
      "R",
      variable("v", { type: "int" }),
      fn({ name: "get", body: [ret("v")] }),
    ),
  );

describe("ID numbering", () => {
  const built = buildModule(sample());
  const [x, f, f1, r] = built.body;

  it("numbers nodes in post-order per symbol", () => {
    expect(built.id.toString()).toBe("M");
    expect(built.id.numChildIds).toBe(2);
    expect(x?.id.toString()).toBe("M@1");
    expect(f?.id.toString()).toBe("M.f");
    expect(f?.id.numChildIds).toBe(5);
  });

  it("suffixes overloaded symbol names", () => {
    expect(f1?.id.toString()).toBe("M.f#1");
    expect(f1?.id.symbolName()).toBe("f");
  });

  it("turns functions in a record into primary methods", () => {
    expect(r?.kind).toBe("record");
    if (r?.kind !== "record") return;
    const get = r.body[1];
    expect(get?.kind).toBe("function");
    if (get?.kind !== "function") return;
    expect(get.id.toString()).toBe("M.R.get");
    expect(get.isPrimaryMethod).toBe(true);
    expect(get.formals[0]?.name).toBe("this");
    expect(get.formals[0]?.id.toString()).toBe("M.R.get@1");
    expect(get.id.parentSymbolId().toString()).toBe("M.R");
  });

  it("answers containment by post-order range", () => {
    const body = new ID("M.f", 4, 2);
    expect(body.contains(new ID("M.f", 2))).toBe(true);
    expect(body.contains(new ID("M.f", 1))).toBe(false);
    expect(new ID("M.R").contains(new ID("M.R.get", 3))).toBe(true);
  });

  it("ignores spans in canonical text", () => {
    const plain = fn({ name: "g" });
    const located = { ...plain, span: { file: "a", start: 1, end: 2 } };
    expect(canonicalText(located)).toBe(canonicalText(plain));
    expect(nodesEqual(located, plain)).toBe(true);
  });
});

describe("parsing queries", () => {
  it("maps IDs to nodes and parents", () => {
    const ctx = createQueryContext();
    setModule(ctx, sample());
    const a = idToAst(ctx, new ID("M.f", 1));
    expect(a?.kind).toBe("formal");
    expect(idToParentId(ctx, new ID("M.f", 1))?.toString()).toBe("M.f");
    expect(idToParentId(ctx, new ID("M.f"))?.toString()).toBe("M");
  });

  it("recognizes fields", () => {
    const ctx = createQueryContext();
    setModule(ctx, sample());
    expect(idIsField(ctx, new ID("M.R", 1))).toBe(true);
    expect(idIsField(ctx, new ID("M", 1))).toBe(false);
    expect(idContainsFieldWithName(ctx, new ID("M.R"), "v")).toBe(true);
    expect(idContainsFieldWithName(ctx, new ID("M.R"), "w")).toBe(false);
  });

  it("keeps dependents of untouched declarations", () => {
    const ctx = createQueryContext();
    let runs = 0;
    const describeFirst = defineQuery<[ID], string>({
      name: "describeFirst",
      compute: (ctx, id) => {
        runs += 1;
        const node = idToAst(ctx, id);
        return node?.kind === "function" ? node.formals.map((f) => f.name).join() : "";
      },
    });

    setModule(ctx, sample());
    expect(describeFirst(ctx, new ID("M.f"))).toBe("a");
    setModule(ctx, sample("string"));
    expect(describeFirst(ctx, new ID("M.f"))).toBe("a");
    expect(runs).toBe(1);
  });
});
