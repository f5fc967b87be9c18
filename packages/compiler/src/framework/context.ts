import {
  DiagnosticEmitter,
  DiagnosticError,
  createDiagnostic,
  emitDiagnostic,
  type Diagnostic,
  type DiagnosticInput,
  type DiagnosticSink,
} from "../diagnostics/index.js";
import type { QueryArg } from "./keys.js";
import type { QueryDefinition, QueryEntry, OwnDiagnostic } from "./query.js";
import {
  createQueryStats,
  traceQuery,
  type QueryStats,
} from "./trace.js";

type Frame = {
  entry: QueryEntry<unknown>;
  dependencies: QueryEntry<unknown>[];
  seen: Set<QueryEntry<unknown>>;
  diagnostics: OwnDiagnostic[];
  /** Everything this computation reports or reaches first, in traversal order. */
  out: Diagnostic[];
};

/** Diagnostics met while verifying one dependency; no owner for the entry's own. */
type Segment = {
  owner: QueryEntry<unknown> | undefined;
  diagnostics: Diagnostic[];
};

/**
 * Owns every memo table of one compilation session. Inputs advance the
 * revision; derived entries are re-verified lazily against it.
 */
export class QueryContext {
  #revision = 1;
  #stack: Frame[] = [];
  #emitter = new DiagnosticEmitter();
  /**
   * Diagnostics of entries verified in this revision whose dependent was
   * then recomputed; emitted when something reaches the entry again.
   */
  #deferred = new Map<QueryEntry<unknown>, Diagnostic[]>();
  readonly stats: QueryStats = createQueryStats();
  readonly diagnostics: DiagnosticSink = {
    report: (input) => this.#report(input),
    error: (input) => {
      throw new DiagnosticError(this.#report(input));
    },
  };

  get revision(): number {
    return this.#revision;
  }

  /** Diagnostics reported or replayed in the current revision, in order. */
  get reportedDiagnostics(): readonly Diagnostic[] {
    return this.#emitter.diagnostics;
  }

  fetch<Args extends readonly QueryArg[], R>(
    definition: QueryDefinition<Args, R>,
    args: Args,
  ): R {
    const entry = definition.entry(this, args);
    if (entry.running) this.#cycle(entry);

    if (entry.isInput) {
      if (!entry.result) {
        entry.result = { value: entry.compute() };
        entry.changedAt = this.#revision;
        entry.verifiedAt = this.#revision;
      }
    } else {
      const frame = this.#stack.at(-1);
      if (frame) {
        this.#ensureFresh(entry, frame.out);
      } else {
        const out: Diagnostic[] = [];
        try {
          this.#ensureFresh(entry, out);
        } finally {
          out.forEach((diagnostic) => this.#emitter.replay(diagnostic));
        }
      }
    }

    this.#recordDependency(entry);
    if (!entry.result) {
      return this.#internalError(`query ${entry.name} produced no value`);
    }
    return entry.result.value;
  }

  setInput<Args extends readonly QueryArg[], R>(
    definition: QueryDefinition<Args, R>,
    args: Args,
    value: R,
  ): void {
    if (this.#stack.length > 0) {
      this.#internalError(`input ${definition.name} set while queries run`);
    }
    const entry = definition.entry(this, args);
    if (entry.sameValue(value)) return;
    this.#advanceRevision();
    entry.result = { value };
    entry.changedAt = this.#revision;
    entry.verifiedAt = this.#revision;
  }

  /**
   * Stores `value` as the result of a query that is never computed directly.
   * A value stored earlier in this revision wins.
   */
  storeResult<Args extends readonly QueryArg[], R>(
    definition: QueryDefinition<Args, R>,
    args: Args,
    value: R,
  ): void {
    const entry = definition.entry(this, args);
    if (entry.result && entry.storedAt === this.#revision) return;
    if (!entry.sameValue(value)) {
      entry.result = { value };
      entry.changedAt = this.#revision;
    }
    const frame = this.#stack.at(-1);
    entry.dependencies = frame ? [...frame.dependencies] : [];
    entry.diagnostics = [];
    entry.verifiedAt = this.#revision;
    entry.storedAt = this.#revision;
    traceQuery({
      event: "store",
      name: entry.name,
      key: entry.key,
      revision: this.#revision,
    });
  }

  isRunning<Args extends readonly QueryArg[], R>(
    definition: QueryDefinition<Args, R>,
    args: Args,
  ): boolean {
    return definition.peek(this, args)?.running ?? false;
  }

  #advanceRevision(): void {
    this.#revision += 1;
    this.#emitter = new DiagnosticEmitter();
    this.#deferred.clear();
  }

  #report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    const frame = this.#stack.at(-1);
    if (!frame) {
      this.#emitter.replay(diagnostic);
      return diagnostic;
    }
    frame.diagnostics.push({
      position: frame.dependencies.length,
      diagnostic,
    });
    frame.out.push(diagnostic);
    return diagnostic;
  }

  #recordDependency(entry: QueryEntry<unknown>): void {
    const frame = this.#stack.at(-1);
    if (!frame || frame.seen.has(entry)) return;
    frame.seen.add(entry);
    frame.dependencies.push(entry);
  }

  #ensureFresh(entry: QueryEntry<unknown>, out: Diagnostic[]): void {
    if (entry.running) this.#cycle(entry);
    if (entry.result && entry.verifiedAt === this.#revision) {
      this.stats.hits += 1;
      const owed = this.#deferred.get(entry);
      if (owed) {
        this.#deferred.delete(entry);
        out.push(...owed);
      }
      return;
    }

    if (entry.result) {
      const segments: Segment[] = [];
      if (!this.#needsRecompute(entry, segments)) {
        entry.verifiedAt = this.#revision;
        this.stats.reused += 1;
        traceQuery({
          event: "reuse",
          name: entry.name,
          key: entry.key,
          revision: this.#revision,
        });
        segments.forEach(({ diagnostics }) => out.push(...diagnostics));
        return;
      }
      // The entry's own diagnostics are superseded by the recomputation.
      segments.forEach(({ owner, diagnostics }) => {
        if (!owner || diagnostics.length === 0) return;
        this.#deferred.set(owner, [
          ...(this.#deferred.get(owner) ?? []),
          ...diagnostics,
        ]);
      });
    } else {
      this.stats.misses += 1;
    }

    this.#recompute(entry, out);
  }

  #needsRecompute(entry: QueryEntry<unknown>, segments: Segment[]): boolean {
    const replayOwn = (position: number) =>
      segments.push({
        owner: undefined,
        diagnostics: entry.diagnostics
          .filter((own) => own.position === position)
          .map(({ diagnostic }) => diagnostic),
      });

    for (const [index, dependency] of entry.dependencies.entries()) {
      replayOwn(index);
      if (!dependency.isInput) {
        const segment: Segment = { owner: dependency, diagnostics: [] };
        segments.push(segment);
        this.#ensureFresh(dependency, segment.diagnostics);
      }
      if (dependency.changedAt > entry.verifiedAt) return true;
    }
    replayOwn(entry.dependencies.length);
    return false;
  }

  #recompute(entry: QueryEntry<unknown>, out: Diagnostic[]): void {
    this.stats.recomputes += 1;
    traceQuery({
      event: "recompute",
      name: entry.name,
      key: entry.key,
      revision: this.#revision,
    });

    const frame: Frame = {
      entry,
      dependencies: [],
      seen: new Set(),
      diagnostics: [],
      out,
    };
    entry.running = true;
    this.#stack.push(frame);
    let value: unknown;
    try {
      value = entry.compute();
    } finally {
      this.#stack.pop();
      entry.running = false;
    }

    if (!entry.sameValue(value)) {
      entry.result = { value };
      entry.changedAt = this.#revision;
    }
    entry.dependencies = frame.dependencies;
    entry.diagnostics = frame.diagnostics;
    entry.verifiedAt = this.#revision;
  }

  #cycle(entry: QueryEntry<unknown>): never {
    return emitDiagnostic({
      ctx: this,
      code: "QF0001",
      params: { kind: "query-cycle", query: entry.name, key: entry.key },
      span: { file: "<query>", start: 0, end: 0 },
    });
  }

  #internalError(message: string): never {
    return emitDiagnostic({
      ctx: this,
      code: "RS9999",
      params: { kind: "internal-error", message },
      span: { file: "<query>", start: 0, end: 0 },
    });
  }
}

export const createQueryContext = (): QueryContext => new QueryContext();

/** A per-context value created on first use and kept for the context's life. */
export class SharedSlot<T> {
  readonly #values = new WeakMap<QueryContext, T>();

  constructor(private readonly create: (ctx: QueryContext) => T) {}

  get(ctx: QueryContext): T {
    const existing = this.#values.get(ctx);
    if (existing !== undefined) return existing;
    const created = this.create(ctx);
    this.#values.set(ctx, created);
    return created;
  }
}

export const defineShared = <T>(
  create: (ctx: QueryContext) => T,
): SharedSlot<T> => new SharedSlot(create);
