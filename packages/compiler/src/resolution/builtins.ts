import {
  normalizeSpan,
  reportDiagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { defineQuery } from "../framework/query.js";
import type { ID } from "../syntax/id.js";
import type { LiteralNode } from "../syntax/nodes.js";
import { typeArena } from "../types/arena-slot.js";
import { typeToString } from "../types/format.js";
import {
  boolParam,
  foldBinaryParam,
  foldUnaryParam,
  type FoldResult,
  type ParamValue,
} from "../types/params.js";
import {
  QualifiedType,
  paramOf,
  typeOf,
  valueOf,
} from "../types/qualified-type.js";
import {
  INT_WIDTHS,
  REAL_WIDTHS,
  Types,
  type ClassManagement,
  type PrimitiveType,
  type TypeArena,
  type TypeId,
} from "../types/type-arena.js";
import type { CallInfo } from "./call-info.js";
import { canPass } from "./can-pass.js";
import { resolutionConfig } from "./config.js";

/** Where a call sits, for diagnostics. */
export type CallSite = {
  readonly id: ID;
  readonly span?: SourceSpan;
};

export const typeForParamValue = (param: ParamValue): TypeId => {
  switch (param.kind) {
    case "int":
      return Types.int;
    case "uint":
      return Types.uint;
    case "real":
      return Types.real;
    case "bool":
      return Types.bool;
    case "string":
      return Types.string;
  }
};

export const typeForLiteral = (node: LiteralNode): QualifiedType => {
  switch (node.kind) {
    case "int-literal":
      return paramOf(Types.int, { kind: "int", value: node.value });
    case "real-literal":
      return paramOf(Types.real, { kind: "real", value: node.value });
    case "bool-literal":
      return paramOf(Types.bool, boolParam(node.value));
    case "string-literal":
      return paramOf(Types.string, { kind: "string", value: node.value });
  }
};

const managements: readonly ClassManagement[] = [
  "owned",
  "shared",
  "borrowed",
  "unmanaged",
];

const isManagement = (name: string): name is ClassManagement =>
  managements.some((management) => management === name);

const builtinType = (arena: TypeArena, name: string): TypeId | undefined => {
  switch (name) {
    case "int":
      return Types.int;
    case "uint":
      return Types.uint;
    case "real":
      return Types.real;
    case "bool":
      return Types.bool;
    case "string":
      return Types.string;
    case "bytes":
      return Types.bytes;
    case "nothing":
      return Types.nothing;
    case "void":
      return Types.void;
    case "object":
      return arena.internClass({
        manageable: Types.object,
        management: "generic",
        nilability: "non-nil",
      });
    case "c_ptr":
      return arena.internCPtr();
    case "domain":
      return arena.internDomain();
    default:
      return isManagement(name)
        ? arena.internClass({
            manageable: Types.anyClass,
            management: name,
            nilability: "generic",
          })
        : undefined;
  }
};

/** Built-in type names and compiler globals; unknown for anything else. */
export const typeForBuiltin = defineQuery<[string], QualifiedType>({
  name: "typeForBuiltin",
  compute: (ctx, name) => {
    const type = builtinType(typeArena(ctx), name);
    if (type !== undefined) return typeOf(type);
    const global = resolutionConfig(ctx).compilerGlobals.find(
      (candidate) => candidate.name === name,
    );
    return global
      ? paramOf(typeForParamValue(global.value), global.value)
      : QualifiedType.unknown;
  },
});

const reportInvalidType = (
  ctx: QueryContext,
  site: CallSite,
  typeName: string,
  reason: string,
): QualifiedType => {
  reportDiagnostic({
    ctx,
    code: "CR0004",
    params: { kind: "invalid-builtin-type", typeName, reason },
    span: normalizeSpan(site.span),
    nodeId: site.id.toString(),
  });
  return QualifiedType.erroneous("type");
};

/** `int(8)`, `real(?)`, `c_ptr(T)`, `domain(2)`, `owned C` and friends. */
const resolveBuiltinTypeCtor = (
  ctx: QueryContext,
  site: CallSite,
  ci: CallInfo,
): QualifiedType | undefined => {
  const arena = typeArena(ctx);
  const [first, ...rest] = ci.actuals;
  if (rest.length > 0 || (first === undefined && !ci.hasQuestionArg)) {
    return undefined;
  }
  // `?` actuals and unbound type queries leave the argument generic.
  const given = first?.type.type === undefined ? undefined : first.type;

  switch (ci.name) {
    case "int":
    case "uint":
    case "real": {
      const name = ci.name;
      if (!given) return typeOf(arena.internPrimitive(name, 0));
      const width = given.param;
      if (width?.kind !== "int") {
        return reportInvalidType(ctx, site, name, "width must be a param int");
      }
      const widths = name === "real" ? REAL_WIDTHS : INT_WIDTHS;
      if (!widths.includes(width.value)) {
        return reportInvalidType(
          ctx,
          site,
          `${name}(${width.value})`,
          `supported widths are ${widths.join(", ")}`,
        );
      }
      return typeOf(arena.internPrimitive(name, width.value));
    }
    case "c_ptr":
      if (!given) return typeOf(arena.internCPtr());
      return given.isType() && given.type !== undefined
        ? typeOf(arena.internCPtr(given.type))
        : reportInvalidType(ctx, site, "c_ptr", "element must be a type");
    case "domain": {
      if (!given) return typeOf(arena.internDomain());
      const rank = given.param;
      return rank?.kind === "int" && rank.value > 0
        ? typeOf(arena.internDomain(rank.value))
        : reportInvalidType(ctx, site, "domain", "rank must be a positive param int");
    }
    default: {
      if (!isManagement(ci.name)) return undefined;
      if (!given) {
        return typeOf(
          arena.internClass({
            manageable: Types.anyClass,
            management: ci.name,
            nilability: "generic",
          }),
        );
      }
      const decorated = given.type === undefined ? undefined : arena.get(given.type);
      if (!given.isType() || decorated?.kind !== "class") {
        return reportInvalidType(ctx, site, ci.name, "only classes can be managed");
      }
      return typeOf(
        arena.internClass({
          manageable: decorated.manageable,
          management: ci.name,
          nilability: decorated.nilability,
        }),
      );
    }
  }
};

const foldResult = (
  ctx: QueryContext,
  site: CallSite,
  op: string,
  folded: FoldResult,
): QualifiedType => {
  if (folded.ok) {
    return paramOf(typeForParamValue(folded.value), folded.value);
  }
  reportDiagnostic({
    ctx,
    code: "CR0010",
    params: { kind: "invalid-param-operation", op, reason: folded.reason },
    span: normalizeSpan(site.span),
    nodeId: site.id.toString(),
  });
  return QualifiedType.erroneous("param");
};

const resolveSpecialOperator = (
  ctx: QueryContext,
  site: CallSite,
  ci: CallInfo,
): QualifiedType | undefined => {
  const arena = typeArena(ctx);
  const operands = ci.actuals.map((actual) => actual.type);
  const [left, right] = operands;
  if (!left) return undefined;

  if (ci.name === "?" && operands.length === 1 && left.isType()) {
    const desc = left.type === undefined ? undefined : arena.get(left.type);
    if (desc?.kind !== "class") {
      return reportInvalidType(
        ctx,
        site,
        left.type === undefined ? "?" : typeToString(arena, left.type),
        "only classes can be nilable",
      );
    }
    return typeOf(
      arena.internClass({
        manageable: desc.manageable,
        management: desc.management,
        nilability: "nilable",
      }),
    );
  }

  if (
    right &&
    operands.length === 2 &&
    left.isType() &&
    right.isType() &&
    (ci.name === "==" || ci.name === "!=")
  ) {
    const same = left.type === right.type;
    return paramOf(Types.bool, boolParam(ci.name === "==" ? same : !same));
  }

  if (operands.length === 1 && left.param) {
    const folded = foldUnaryParam(ci.name, left.param);
    return folded && foldResult(ctx, site, ci.name, folded);
  }
  if (right && operands.length === 2 && left.param && right.param) {
    const folded = foldBinaryParam(ci.name, left.param, right.param);
    return folded && foldResult(ctx, site, ci.name, folded);
  }
  return undefined;
};

const resolveIsCoercible = (
  ctx: QueryContext,
  site: CallSite,
  ci: CallInfo,
): QualifiedType => {
  const [from, to] = ci.actuals.map((actual) => actual.type);
  if (
    ci.actuals.length !== 2 ||
    !from?.isType() ||
    !to?.isType() ||
    from.type === undefined ||
    to.type === undefined
  ) {
    reportDiagnostic({
      ctx,
      code: "CR0010",
      params: {
        kind: "invalid-param-operation",
        op: "isCoercible",
        reason: "expects two types",
      },
      span: normalizeSpan(site.span),
      nodeId: site.id.toString(),
    });
    return QualifiedType.erroneous("param");
  }
  const passes = canPass(ctx, valueOf(from.type), valueOf(to.type, "in")).passes;
  return paramOf(Types.bool, boolParam(passes));
};

/**
 * Calls the compiler answers without overload resolution: type equality,
 * param folding, `?` on classes, `isCoercible` and built-in type
 * constructors. Undefined for anything else.
 */
export const resolveSpecialCall = (
  ctx: QueryContext,
  site: CallSite,
  ci: CallInfo,
): QualifiedType | undefined => {
  if (ci.isOpCall) return resolveSpecialOperator(ctx, site, ci);
  if (ci.isMethodCall || ci.calledType !== undefined) return undefined;
  if (ci.name === "isCoercible") return resolveIsCoercible(ctx, site, ci);
  return resolveBuiltinTypeCtor(ctx, site, ci);
};

const arithmeticOps = new Set(["+", "-", "*", "/", "%", "**"]);
const comparisonOps = new Set(["==", "!=", "<", "<=", ">", ">="]);
const logicalOps = new Set(["&&", "||"]);

const isNumeric = (desc: PrimitiveType) =>
  desc.name === "int" || desc.name === "uint" || desc.name === "real";

const widerNumeric = (
  arena: TypeArena,
  left: PrimitiveType,
  right: PrimitiveType,
): TypeId => {
  if (left.name === "real" || right.name === "real") {
    const width = Math.max(
      left.name === "real" ? left.bitWidth : 0,
      right.name === "real" ? right.bitWidth : 0,
    );
    return arena.internPrimitive("real", width);
  }
  const name = left.name === "uint" && right.name === "uint" ? "uint" : "int";
  return arena.internPrimitive(name, Math.max(left.bitWidth, right.bitWidth));
};

/** Result types of operators on primitive values. */
export const primitiveOperatorResult = (
  arena: TypeArena,
  ci: CallInfo,
): QualifiedType | undefined => {
  if (!ci.isOpCall) return undefined;
  const descs: PrimitiveType[] = [];
  for (const actual of ci.actuals) {
    if (actual.type.type === undefined || actual.type.isType()) return undefined;
    const desc = arena.get(actual.type.type);
    if (desc.kind !== "primitive") return undefined;
    descs.push(desc);
  }
  const result = (type: TypeId) => valueOf(type, "const-var");
  const [left, right] = descs;
  if (!left) return undefined;

  if (descs.length === 1) {
    if (ci.name === "!" && left.name === "bool") return result(Types.bool);
    if (ci.name === "-" && isNumeric(left)) {
      return result(arena.internPrimitive(left.name, left.bitWidth));
    }
    return undefined;
  }
  if (!right || descs.length !== 2) return undefined;

  if (arithmeticOps.has(ci.name)) {
    if (isNumeric(left) && isNumeric(right)) {
      return result(widerNumeric(arena, left, right));
    }
    if (ci.name === "+" && left.name === "string" && right.name === "string") {
      return result(Types.string);
    }
    return undefined;
  }
  if (comparisonOps.has(ci.name)) {
    const comparable =
      (isNumeric(left) && isNumeric(right)) ||
      (left.name === right.name &&
        (left.name === "string" ||
          (left.name === "bool" && (ci.name === "==" || ci.name === "!="))));
    return comparable ? result(Types.bool) : undefined;
  }
  if (logicalOps.has(ci.name) && left.name === "bool" && right.name === "bool") {
    return result(Types.bool);
  }
  return undefined;
};
