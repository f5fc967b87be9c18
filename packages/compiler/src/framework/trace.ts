const QUERY_TRACE_ENV = "REZO_QUERY_TRACE";

const TRACE_ENABLED = (() => {
  const raw = process.env[QUERY_TRACE_ENV];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
})();

export type QueryTraceEvent = "recompute" | "reuse" | "store";

export const isQueryTraceEnabled = (): boolean => TRACE_ENABLED;

export const traceQuery = ({
  event,
  name,
  key,
  revision,
}: {
  event: QueryTraceEvent;
  name: string;
  key: string;
  revision: number;
}): void => {
  if (!TRACE_ENABLED) {
    return;
  }
  console.error(`[rezo:query] r${revision} ${event} ${name}(${key})`);
};

/** Per-context counters; always collected, unlike the trace. */
export type QueryStats = {
  hits: number;
  misses: number;
  recomputes: number;
  reused: number;
};

export const createQueryStats = (): QueryStats => ({
  hits: 0,
  misses: 0,
  recomputes: 0,
  reused: 0,
});
