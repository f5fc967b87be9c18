import type { QueryContext } from "../framework/context.js";
import { defineInput } from "../framework/query.js";
import { paramsEqual, type ParamValue } from "../types/params.js";

export const DEFAULT_MAX_OVERLOAD_CANDIDATES = 64;

/** A param visible everywhere, like a command-line `config param`. */
export type CompilerGlobal = {
  readonly name: string;
  readonly value: ParamValue;
};

export type ResolutionConfigInit = {
  maxOverloadCandidates?: number;
  compilerGlobals?: readonly CompilerGlobal[];
};

export type ResolutionConfig = {
  readonly maxOverloadCandidates: number;
  readonly compilerGlobals: readonly CompilerGlobal[];
};

const normalizeLimit = ({
  value,
  fallback,
}: {
  value: number | undefined;
  fallback: number;
}): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.trunc(value));
};

export const createResolutionConfig = (
  config?: ResolutionConfigInit,
): ResolutionConfig => ({
  maxOverloadCandidates: normalizeLimit({
    value: config?.maxOverloadCandidates,
    fallback: DEFAULT_MAX_OVERLOAD_CANDIDATES,
  }),
  compilerGlobals: [...(config?.compilerGlobals ?? [])],
});

const configsEqual = (left: ResolutionConfig, right: ResolutionConfig) =>
  left.maxOverloadCandidates === right.maxOverloadCandidates &&
  left.compilerGlobals.length === right.compilerGlobals.length &&
  left.compilerGlobals.every(
    (global, index) =>
      global.name === right.compilerGlobals[index]?.name &&
      paramsEqual(global.value, right.compilerGlobals[index]?.value),
  );

const resolutionConfigInput = defineInput<[], ResolutionConfig>({
  name: "resolutionConfig",
  defaultValue: () => createResolutionConfig(),
  equals: configsEqual,
});

export const resolutionConfig = (ctx: QueryContext): ResolutionConfig =>
  resolutionConfigInput.get(ctx);

export const setResolutionConfig = (
  ctx: QueryContext,
  config: ResolutionConfigInit,
): void => resolutionConfigInput.set(ctx, [], createResolutionConfig(config));
