import { describe, expect, it } from "vitest";
import { DiagnosticError, reportDiagnostic } from "../../diagnostics/index.js";
import { createQueryContext } from "../context.js";
import { keyOf, valuesEqual } from "../keys.js";
import {
  defineInput,
  defineQuery,
  isQueryRunning,
  type QueryFunction,
} from "../query.js";

const span = { file: "test", start: 0, end: 0 };

describe("query memoization", () => {
  it("computes once per key within a revision", () => {
    const ctx = createQueryContext();
    let runs = 0;
    const double = defineQuery<[number], number>({
      name: "double",
      compute: (_ctx, value) => {
        runs += 1;
        return value * 2;
      },
    });

    expect(double(ctx, 2)).toBe(4);
    expect(double(ctx, 2)).toBe(4);
    expect(double(ctx, 3)).toBe(6);
    expect(runs).toBe(2);
    expect(ctx.stats.hits).toBe(1);
    expect(ctx.stats.misses).toBe(2);
  });

  it("only advances the revision when an input value changes", () => {
    const ctx = createQueryContext();
    const name = defineInput<[], string>({
      name: "name",
      defaultValue: () => "",
    });

    name.set(ctx, [], "a");
    const revision = ctx.revision;
    name.set(ctx, [], "a");
    expect(ctx.revision).toBe(revision);
    name.set(ctx, [], "b");
    expect(ctx.revision).toBe(revision + 1);
    expect(name.get(ctx)).toBe("b");
  });

  it("recomputes dependents of a changed input", () => {
    const ctx = createQueryContext();
    const width = defineInput<[string], number>({
      name: "width",
      defaultValue: () => 1,
    });
    let runs = 0;
    const area = defineQuery<[string], number>({
      name: "area",
      compute: (ctx, shape) => {
        runs += 1;
        return width.get(ctx, shape) * 10;
      },
    });

    expect(area(ctx, "sq")).toBe(10);
    width.set(ctx, ["other"], 4);
    expect(area(ctx, "sq")).toBe(10);
    expect(runs).toBe(1);
    width.set(ctx, ["sq"], 3);
    expect(area(ctx, "sq")).toBe(30);
    expect(runs).toBe(2);
  });

  it("stops invalidation when a recomputed value is equal", () => {
    const ctx = createQueryContext();
    const text = defineInput<[], string>({
      name: "text",
      defaultValue: () => "",
    });
    let parityRuns = 0;
    let consumerRuns = 0;
    const parity = defineQuery<[], readonly number[]>({
      name: "parity",
      compute: (ctx) => {
        parityRuns += 1;
        return [text.get(ctx).length % 2];
      },
    });
    const consumer = defineQuery<[], string>({
      name: "consumer",
      compute: (ctx) => {
        consumerRuns += 1;
        return `p${parity(ctx)[0]}`;
      },
    });

    text.set(ctx, [], "ab");
    const first = parity(ctx);
    expect(consumer(ctx)).toBe("p0");

    text.set(ctx, [], "abcd");
    expect(consumer(ctx)).toBe("p0");
    expect(parityRuns).toBe(2);
    expect(consumerRuns).toBe(1);
    expect(parity(ctx)).toBe(first);

    text.set(ctx, [], "abc");
    expect(consumer(ctx)).toBe("p1");
    expect(consumerRuns).toBe(2);
  });
});

describe("query diagnostics", () => {
  const setup = () => {
    const ctx = createQueryContext();
    const source = defineInput<[string], number>({
      name: "source",
      defaultValue: () => 0,
    });
    const other = defineInput<[], string>({
      name: "other",
      defaultValue: () => "a",
    });
    let checks = 0;
    const checked = defineQuery<[string], number>({
      name: "checked",
      compute: (ctx, name) => {
        checks += 1;
        const value = source.get(ctx, name);
        if (value < 0) {
          reportDiagnostic({
            ctx,
            code: "CR0009",
            params: { kind: "undefined-identifier", name },
            span,
          });
        }
        return value;
      },
    });
    const root = defineQuery<[], string>({
      name: "root",
      compute: (ctx) => `${checked(ctx, "x")}${other.get(ctx)}`,
    });
    return { ctx, source, other, root, checkCount: () => checks };
  };

  it("reports a diagnostic once per revision", () => {
    const { ctx, source, root } = setup();
    source.set(ctx, ["x"], -1);
    root(ctx);
    root(ctx);
    expect(ctx.reportedDiagnostics.map((d) => d.code)).toEqual(["CR0009"]);
  });

  it("replays diagnostics of reused entries in a later revision", () => {
    const { ctx, source, other, root, checkCount } = setup();
    source.set(ctx, ["x"], -1);
    expect(root(ctx)).toBe("-1a");

    other.set(ctx, [], "b");
    expect(ctx.reportedDiagnostics).toHaveLength(0);
    expect(root(ctx)).toBe("-1b");
    expect(checkCount()).toBe(1);
    expect(ctx.reportedDiagnostics.map((d) => d.message)).toEqual([
      "undefined identifier x",
    ]);
  });

  it("keeps traversal order when some dependencies are reused and others recomputed", () => {
    const build = () => {
      const ctx = createQueryContext();
      const level = defineInput<[], number>({ name: "level", defaultValue: () => 0 });
      const other = defineInput<[], number>({ name: "other", defaultValue: () => 0 });
      const undefinedName = (name: string) =>
        reportDiagnostic({
          ctx,
          code: "CR0009",
          params: { kind: "undefined-identifier", name },
          span,
        });
      const first = defineQuery<[], number>({
        name: "first",
        compute: () => {
          undefinedName("a");
          return 1;
        },
      });
      const second = defineQuery<[], number>({
        name: "second",
        compute: (ctx) => {
          level.get(ctx);
          undefinedName("b");
          return 2;
        },
      });
      const root = defineQuery<[], number>({
        name: "root",
        compute: (ctx) => {
          undefinedName("r");
          return first(ctx) + second(ctx) + other.get(ctx);
        },
      });
      return { ctx, level, other, root };
    };
    const messages = (ctx: ReturnType<typeof createQueryContext>) =>
      ctx.reportedDiagnostics.map((d) => d.message);

    const edited = build();
    edited.root(edited.ctx);
    expect(messages(edited.ctx)).toEqual([
      "undefined identifier r",
      "undefined identifier a",
      "undefined identifier b",
    ]);

    edited.level.set(edited.ctx, [], 5);
    edited.other.set(edited.ctx, [], 1);
    expect(edited.root(edited.ctx)).toBe(4);

    const fresh = build();
    fresh.level.set(fresh.ctx, [], 5);
    fresh.other.set(fresh.ctx, [], 1);
    fresh.root(fresh.ctx);

    expect(messages(edited.ctx)).toEqual(messages(fresh.ctx));
    expect(messages(edited.ctx)).toEqual([
      "undefined identifier r",
      "undefined identifier a",
      "undefined identifier b",
    ]);
  });

  it("drops diagnostics that no longer apply", () => {
    const { ctx, source, root } = setup();
    source.set(ctx, ["x"], -1);
    root(ctx);
    source.set(ctx, ["x"], 2);
    expect(root(ctx)).toBe("2a");
    expect(ctx.reportedDiagnostics).toHaveLength(0);
  });
});

describe("query control", () => {
  it("rejects a query that depends on itself", () => {
    const ctx = createQueryContext();
    const loop: QueryFunction<[number], number> = defineQuery<[number], number>({
      name: "loop",
      compute: (ctx, n) => loop(ctx, n) + 1,
    });

    let code: string | undefined;
    try {
      loop(ctx, 1);
    } catch (error) {
      if (error instanceof DiagnosticError) code = error.diagnostic.code;
    }
    expect(code).toBe("QF0001");
    expect(isQueryRunning(ctx, loop, 1)).toBe(false);
  });

  it("exposes the running marker", () => {
    const ctx = createQueryContext();
    const probe: QueryFunction<[], boolean> = defineQuery<[], boolean>({
      name: "probe",
      compute: (ctx) => isQueryRunning(ctx, probe),
    });
    expect(probe(ctx)).toBe(true);
    expect(isQueryRunning(ctx, probe)).toBe(false);
  });

  it("serves stored results without computing them", () => {
    const ctx = createQueryContext();
    const canonical = defineQuery<[string], string>({
      name: "canonical",
      compute: () => {
        throw new Error("canonical results are only stored");
      },
    });
    const producer = defineQuery<[string], string>({
      name: "producer",
      compute: (ctx, key) => {
        ctx.storeResult(canonical.definition, [key.toUpperCase()], `value-${key}`);
        return canonical(ctx, key.toUpperCase());
      },
    });

    expect(producer(ctx, "a")).toBe("value-a");
    ctx.storeResult(canonical.definition, ["K"], "one");
    ctx.storeResult(canonical.definition, ["K"], "two");
    expect(canonical(ctx, "K")).toBe("one");
  });
});

describe("keys", () => {
  it("serializes nested arguments", () => {
    expect(
      keyOf(["a", 1, true, undefined, null, { queryKey: () => "k" }]),
    ).toBe('["a",1,true,_,null,k]');
  });

  it("compares arrays and equatable objects structurally", () => {
    const point = (x: number) => ({
      x,
      equals: (other: unknown) =>
        typeof other === "object" &&
        other !== null &&
        "x" in other &&
        other.x === x,
    });
    expect(valuesEqual([1, [2]], [1, [2]])).toBe(true);
    expect(valuesEqual([point(1)], [point(1)])).toBe(true);
    expect(valuesEqual([point(1)], [point(2)])).toBe(false);
  });
});
