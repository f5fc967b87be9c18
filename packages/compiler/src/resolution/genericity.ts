import { normalizeSpan, reportDiagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { defineQuery, isQueryRunning } from "../framework/query.js";
import { LookupConfig } from "../scopes/scope.js";
import { lookupNameInScope, scopeForId } from "../scopes/scope-queries.js";
import type { ID } from "../syntax/id.js";
import type { AggregateNode, ModuleNode, Stmt, Storage } from "../syntax/nodes.js";
import {
  aggregateNodeFor,
  aggregateUsesForwarding,
  declaredVariables,
  idContainsFieldWithName,
  idToTag,
} from "../syntax/parsing-queries.js";
import { typeArena } from "../types/arena-slot.js";
import {
  QualifiedType,
  typeOf,
  type QualifierKind,
} from "../types/qualified-type.js";
import {
  Types,
  type Substitution,
  type TypeArena,
  type TypeId,
} from "../types/type-arena.js";
import type { ResolutionResultByPostorderID } from "./resolved.js";
import { Resolver } from "./resolver.js";

export type Genericity =
  | "concrete"
  | "generic"
  | "generic-with-defaults"
  | "maybe-generic";

/**
 * How field defaults count when resolving fields: not at all, only for
 * fields referring to other fields, or everywhere.
 */
export type DefaultsPolicy =
  | "ignore-defaults"
  | "use-defaults-other-fields"
  | "use-defaults";

const defaultsPolicies: readonly DefaultsPolicy[] = [
  "ignore-defaults",
  "use-defaults-other-fields",
  "use-defaults",
];

export type ResolvedField = {
  readonly name: string;
  readonly hasDefault: boolean;
  readonly declId: ID;
  readonly type: QualifiedType;
};

export type ForwardingTarget = {
  readonly declId: ID;
  readonly type: QualifiedType;
};

const fieldEqual = (left: ResolvedField, right: ResolvedField | undefined) =>
  right !== undefined &&
  left.name === right.name &&
  left.hasDefault === right.hasDefault &&
  left.declId.equals(right.declId) &&
  left.type.equals(right.type);

const forwardingEqual = (
  left: ForwardingTarget,
  right: ForwardingTarget | undefined,
) =>
  right !== undefined &&
  left.declId.equals(right.declId) &&
  left.type.equals(right.type);

export class ResolvedFields {
  constructor(
    readonly type: TypeId,
    readonly fields: readonly ResolvedField[],
    readonly forwarding: readonly ForwardingTarget[],
    readonly isGeneric: boolean,
    readonly isGenericWithDefaults: boolean,
  ) {}

  numFields(): number {
    return this.fields.length;
  }

  byName(name: string): ResolvedField | undefined {
    return this.fields.find((field) => field.name === name);
  }

  byDecl(id: ID): ResolvedField | undefined {
    return this.fields.find((field) => field.declId.equals(id));
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ResolvedFields &&
      other.type === this.type &&
      other.isGeneric === this.isGeneric &&
      other.isGenericWithDefaults === this.isGenericWithDefaults &&
      other.fields.length === this.fields.length &&
      other.forwarding.length === this.forwarding.length &&
      this.fields.every((field, index) => fieldEqual(field, other.fields[index])) &&
      this.forwarding.every((target, index) =>
        forwardingEqual(target, other.forwarding[index]),
      )
    );
  }
}

/** The record or basic class behind `type`, looking through class decorators. */
export const compositeTypeOf = (
  arena: TypeArena,
  type: TypeId,
): TypeId | undefined => {
  const desc = arena.get(type);
  if (desc.kind === "class") {
    return arena.getComposite(desc.manageable) ? desc.manageable : undefined;
  }
  return arena.getComposite(type) ? type : undefined;
};

/** How methods see a record or basic class: classes are borrowed. */
export const receiverTypeFor = (arena: TypeArena, composite: TypeId): TypeId =>
  arena.get(composite).kind === "basic-class"
    ? arena.internClass({
        manageable: composite,
        management: "borrowed",
        nilability: "non-nil",
      })
    : composite;

export const valueKindFor = (storage: Storage): QualifierKind => {
  switch (storage) {
    case "var":
      return "var";
    case "const":
      return "const-var";
    case "ref":
      return "ref";
    case "const-ref":
      return "const-ref";
    case "type":
      return "type";
    case "param":
      return "param";
  }
};

/** How a field declared with `storage` reads once a substitution binds it. */
export const fieldTypeFromSubstitution = (
  storage: Storage,
  substitution: QualifiedType,
): QualifiedType => {
  if (storage === "param") {
    return new QualifiedType("param", substitution.type, substitution.param);
  }
  return new QualifiedType(valueKindFor(storage), substitution.type);
};

/** Substitutions bind params by value and everything else by type. */
export const canonicalSubstitution = (type: QualifiedType): QualifiedType =>
  type.isParam()
    ? new QualifiedType("param", type.type, type.param)
    : typeOf(type.type ?? Types.unknown);

/**
 * The instantiation of `type` with `substitutions` added to the ones it
 * already has. Instantiations always point at the uninstantiated type.
 */
export const instantiateCompositeType = (
  ctx: QueryContext,
  type: TypeId,
  substitutions: readonly Substitution[],
): TypeId => {
  const arena = typeArena(ctx);
  const desc = arena.getComposite(type);
  if (!desc) return type;
  const root = desc.instantiatedFrom ?? type;
  const rootDesc = arena.getComposite(root) ?? desc;

  const merged = new Map<string, Substitution>();
  desc.substitutions.forEach((sub) => merged.set(sub.field.toString(), sub));
  substitutions.forEach((sub) =>
    merged.set(sub.field.toString(), {
      field: sub.field,
      type: canonicalSubstitution(sub.type),
    }),
  );
  const sorted = [...merged.values()].sort((left, right) =>
    left.field.compare(right.field),
  );
  if (sorted.length === 0) return root;

  if (rootDesc.kind === "record") {
    return arena.internRecord({
      decl: rootDesc.decl,
      name: rootDesc.name,
      substitutions: sorted,
      instantiatedFrom: root,
    });
  }
  return arena.internBasicClass({
    decl: rootDesc.decl,
    name: rootDesc.name,
    substitutions: sorted,
    instantiatedFrom: root,
    parent: rootDesc.parent,
  });
};

/** `classType` with its record or basic class replaced. */
export const withManageable = (
  arena: TypeArena,
  classType: TypeId,
  manageable: TypeId,
): TypeId => {
  const desc = arena.get(classType);
  if (desc.kind !== "class") return manageable;
  return arena.internClass({
    manageable,
    management: desc.management,
    nilability: desc.nilability,
  });
};

const aggregateForType = (
  ctx: QueryContext,
  type: TypeId,
): AggregateNode | undefined => {
  const desc = typeArena(ctx).getComposite(type);
  return desc && !desc.decl.isEmpty()
    ? aggregateNodeFor(ctx, desc.decl)
    : undefined;
};

/** The body statement of `aggregate` declaring the field `declId`. */
export const fieldStatementFor = (
  aggregate: AggregateNode | ModuleNode,
  declId: ID,
): Stmt | undefined =>
  aggregate.body.find(
    (stmt) => stmt.id.equals(declId) || stmt.id.contains(declId),
  );

const declaresFields = (stmt: Stmt): boolean =>
  declaredVariables(stmt).length > 0;

type FieldsBuilder = {
  fields: ResolvedField[];
  forwarding: ForwardingTarget[];
};

const collectFields = (
  stmt: Stmt,
  results: ResolutionResultByPostorderID,
  inheritedInit: boolean,
  out: FieldsBuilder,
): void => {
  switch (stmt.kind) {
    case "variable":
      out.fields.push({
        name: stmt.name,
        hasDefault: inheritedInit || stmt.initExpr !== undefined,
        declId: stmt.id,
        type: results.typeOf(stmt.id),
      });
      return;
    case "multi-decl":
      stmt.decls.forEach((decl) =>
        collectFields(decl, results, inheritedInit, out),
      );
      return;
    case "tuple-decl": {
      // Components share the tuple's initializer.
      const inherited = inheritedInit || stmt.initExpr !== undefined;
      stmt.components.forEach((component) =>
        collectFields(component, results, inherited, out),
      );
      return;
    }
    case "forwarding":
      if (stmt.target.kind === "variable") {
        collectFields(stmt.target, results, inheritedInit, out);
        out.forwarding.push({
          declId: stmt.target.id,
          type: results.typeOf(stmt.target.id),
        });
      }
      return;
    default:
      return;
  }
};

const buildFields = (
  ctx: QueryContext,
  type: TypeId,
  { fields, forwarding }: FieldsBuilder,
): ResolvedFields => {
  let isGeneric = false;
  let isGenericWithDefaults = false;
  fields.forEach((field) => {
    const genericity = qualifiedTypeGenericity(ctx, field.type);
    if (genericity === "concrete") return;
    if (genericity === "generic-with-defaults" || field.hasDefault) {
      isGenericWithDefaults = true;
    } else {
      isGeneric = true;
    }
  });
  return new ResolvedFields(
    type,
    fields,
    forwarding,
    isGeneric,
    isGenericWithDefaults,
  );
};

/** Field types declared by one statement of the aggregate behind `type`. */
export const resolveFieldDecl = defineQuery<
  [TypeId, ID, DefaultsPolicy],
  ResolvedFields
>({
  name: "resolveFieldDecl",
  compute: (ctx, type, stmtId, policy) => {
    const aggregate = aggregateForType(ctx, type);
    const stmt = aggregate?.body.find((candidate) =>
      candidate.id.equals(stmtId),
    );
    if (!aggregate || !stmt) return new ResolvedFields(type, [], [], false, false);
    const resolver = Resolver.forFields(ctx, aggregate, type, policy);
    resolver.resolve(stmt);
    const out: FieldsBuilder = { fields: [], forwarding: [] };
    collectFields(stmt, resolver.byPostorder, false, out);
    return buildFields(ctx, type, out);
  },
});

const fieldsForTypeDeclQuery = defineQuery<
  [TypeId, DefaultsPolicy],
  ResolvedFields
>({
  name: "fieldsForTypeDecl",
  compute: (ctx, type, policy) => {
    const aggregate = aggregateForType(ctx, type);
    if (!aggregate) return new ResolvedFields(type, [], [], false, false);
    const parts = aggregate.body
      .filter(declaresFields)
      .map((stmt) => resolveFieldDecl(ctx, type, stmt.id, policy));
    return new ResolvedFields(
      type,
      parts.flatMap((part) => part.fields),
      parts.flatMap((part) => part.forwarding),
      parts.some((part) => part.isGeneric),
      parts.some((part) => part.isGenericWithDefaults),
    );
  },
});

/**
 * The fields of a record or basic class. Defaults are only applied where
 * they can change the result: a type without generic-with-defaults fields
 * reads the same under every policy.
 */
export const fieldsForTypeDecl = (
  ctx: QueryContext,
  type: TypeId,
  policy: DefaultsPolicy,
): ResolvedFields => {
  if (policy === "ignore-defaults") {
    return fieldsForTypeDeclQuery(ctx, type, policy);
  }
  const otherFields = fieldsForTypeDeclQuery(
    ctx,
    type,
    "use-defaults-other-fields",
  );
  if (policy === "use-defaults-other-fields") return otherFields;
  return otherFields.isGenericWithDefaults
    ? fieldsForTypeDeclQuery(ctx, type, "use-defaults")
    : otherFields;
};

/** Targets of `forwarding expr;` statements, which declare no field. */
export const resolveForwardingExprs = defineQuery<[TypeId], ResolvedFields>({
  name: "resolveForwardingExprs",
  compute: (ctx, type) => {
    const aggregate = aggregateForType(ctx, type);
    if (!aggregate) return new ResolvedFields(type, [], [], false, false);
    const resolver = Resolver.forFields(ctx, aggregate, type, "use-defaults");
    resolver.resolvingForwardingExprs = true;
    const forwarding: ForwardingTarget[] = [];
    aggregate.body.forEach((stmt) => {
      if (stmt.kind !== "forwarding" || stmt.target.kind === "variable") return;
      forwarding.push({ declId: stmt.id, type: resolver.resolve(stmt) });
    });
    return new ResolvedFields(type, [], forwarding, false, false);
  },
});

export const forwardingTargets = (
  ctx: QueryContext,
  type: TypeId,
): ForwardingTarget[] => {
  const composite = compositeTypeOf(typeArena(ctx), type);
  if (composite === undefined) return [];
  const desc = typeArena(ctx).getComposite(composite);
  if (!desc || !aggregateUsesForwarding(ctx, desc.decl)) return [];
  return [
    ...fieldsForTypeDecl(ctx, composite, "use-defaults").forwarding,
    ...resolveForwardingExprs(ctx, composite).forwarding,
  ];
};

const checkForwardingCycles = (
  ctx: QueryContext,
  type: TypeId,
  visited: Set<TypeId>,
): boolean => {
  const arena = typeArena(ctx);
  const composite = compositeTypeOf(arena, type);
  const desc = composite === undefined ? undefined : arena.getComposite(composite);
  if (composite === undefined || !desc) return false;
  if (!aggregateUsesForwarding(ctx, desc.decl)) return false;

  if (visited.has(composite)) {
    reportDiagnostic({
      ctx,
      code: "FD0001",
      params: { kind: "forwarding-cycle", typeName: desc.name },
      span: normalizeSpan(aggregateNodeFor(ctx, desc.decl)?.span),
      nodeId: desc.decl.toString(),
    });
    return true;
  }
  visited.add(composite);
  return forwardingTargets(ctx, composite).some(
    (target) =>
      target.type.type !== undefined &&
      checkForwardingCycles(ctx, target.type.type, visited),
  );
};

/** Whether forwarding from `type` eventually leads back to a visited type. */
export const forwardingCycleCheck = defineQuery<[TypeId], boolean>({
  name: "forwardingCycleCheck",
  compute: (ctx, type) => checkForwardingCycles(ctx, type, new Set()),
});

const anyFieldsQueryRunning = (ctx: QueryContext, type: TypeId): boolean => {
  if (
    defaultsPolicies.some((policy) =>
      isQueryRunning(ctx, fieldsForTypeDeclQuery, type, policy),
    )
  ) {
    return true;
  }
  const aggregate = aggregateForType(ctx, type);
  return (
    aggregate?.body.some((stmt) =>
      defaultsPolicies.some((policy) =>
        isQueryRunning(ctx, resolveFieldDecl, type, stmt.id, policy),
      ),
    ) ?? false
  );
};

const combineGenericity = (parts: readonly Genericity[]): Genericity => {
  if (parts.includes("generic")) return "generic";
  if (parts.includes("maybe-generic")) return "maybe-generic";
  if (parts.includes("generic-with-defaults")) return "generic-with-defaults";
  return "concrete";
};

const getFieldsGenericity = (
  ctx: QueryContext,
  type: TypeId,
  ignore: Set<TypeId>,
): Genericity => {
  if (ignore.has(type)) return "concrete";
  const arena = typeArena(ctx);
  const desc = arena.getComposite(type);
  if (!desc || desc.decl.isEmpty()) return "concrete";

  let combined: Genericity = "concrete";
  if (desc.kind === "basic-class" && desc.parent !== undefined) {
    combined = getTypeGenericityIgnoring(ctx, desc.parent, ignore);
    if (combined === "generic") return combined;
  }

  // Approximation: a type whose fields are being computed counts as concrete.
  if (anyFieldsQueryRunning(ctx, type)) return combined;

  ignore.add(type);
  const fields = fieldsForTypeDecl(ctx, type, "use-defaults-other-fields");
  if (fields.isGeneric) return "generic";
  if (fields.isGenericWithDefaults) return "generic-with-defaults";
  return combined;
};

export const getTypeGenericityIgnoring = (
  ctx: QueryContext,
  type: TypeId,
  ignore: Set<TypeId>,
): Genericity => {
  const arena = typeArena(ctx);
  const desc = arena.get(type);
  switch (desc.kind) {
    case "unknown":
      return "maybe-generic";
    case "erroneous":
      return "concrete";
    case "any":
    case "any-class":
      return "generic";
    case "primitive":
      return desc.bitWidth === 0 &&
        (desc.name === "int" || desc.name === "uint" || desc.name === "real")
        ? "generic"
        : "concrete";
    case "record":
    case "basic-class":
      return getFieldsGenericity(ctx, type, ignore);
    case "class":
      if (desc.management === "generic" || desc.nilability === "generic") {
        return "generic";
      }
      return getTypeGenericityIgnoring(ctx, desc.manageable, ignore);
    case "tuple":
      return combineGenericity(
        desc.elements.map((element) =>
          getTypeGenericityIgnoring(ctx, element, ignore),
        ),
      );
    case "vararg-tuple":
      return desc.count === undefined
        ? "generic"
        : getTypeGenericityIgnoring(ctx, desc.element, ignore);
    case "domain":
      return desc.rank === undefined ? "generic" : "concrete";
    case "array":
      return getTypeGenericityIgnoring(ctx, desc.domain, ignore) !== "concrete" ||
        getTypeGenericityIgnoring(ctx, desc.element, ignore) !== "concrete"
        ? "generic"
        : "concrete";
    case "c-ptr":
      if (desc.element === undefined) return "generic";
      return getTypeGenericityIgnoring(ctx, desc.element, ignore) === "concrete"
        ? "concrete"
        : "generic";
  }
};

export const getTypeGenericity = (ctx: QueryContext, type: TypeId): Genericity =>
  getTypeGenericityIgnoring(ctx, type, new Set());

/** Params need a value; everything else follows its type. */
export const qualifiedTypeGenericity = (
  ctx: QueryContext,
  type: QualifiedType,
): Genericity => {
  if (type.isParam() && !type.hasParam()) return "generic";
  if (type.type === undefined) return "maybe-generic";
  return getTypeGenericity(ctx, type.type);
};

const typeWithDefaultsQuery = defineQuery<[TypeId], TypeId>({
  name: "typeWithDefaults",
  compute: (ctx, type) => {
    const otherFields = fieldsForTypeDecl(ctx, type, "use-defaults-other-fields");
    if (!otherFields.isGenericWithDefaults || otherFields.isGeneric) return type;
    const withDefaults = fieldsForTypeDecl(ctx, type, "use-defaults");
    const substitutions = otherFields.fields.flatMap((field) => {
      const defaulted = withDefaults.byDecl(field.declId);
      return defaulted && !defaulted.type.equals(field.type)
        ? [{ field: field.declId, type: defaulted.type }]
        : [];
    });
    return instantiateCompositeType(ctx, type, substitutions);
  },
});

/** `type` with generic-with-defaults fields bound to their defaults. */
export const typeWithDefaults = (ctx: QueryContext, type: TypeId): TypeId => {
  const arena = typeArena(ctx);
  const desc = arena.get(type);
  if (desc.kind === "class") {
    const manageable = typeWithDefaults(ctx, desc.manageable);
    return manageable === desc.manageable
      ? type
      : withManageable(arena, type, manageable);
  }
  if (!arena.getComposite(type)) return type;
  if (anyFieldsQueryRunning(ctx, type)) return type;
  return typeWithDefaultsQuery(ctx, type);
};

/** The record or class (`type` or a parent class) declaring the field `name`. */
export const isNameOfField = defineQuery<[string, TypeId], TypeId | undefined>({
  name: "isNameOfField",
  compute: (ctx, name, type) => {
    const arena = typeArena(ctx);
    let current = compositeTypeOf(arena, type);
    while (current !== undefined) {
      const desc = arena.getComposite(current);
      if (!desc || desc.decl.isEmpty()) return undefined;
      if (idContainsFieldWithName(ctx, desc.decl, name)) return current;
      current = desc.kind === "basic-class" ? desc.parent : undefined;
    }
    return undefined;
  },
});

export const isTypeDefaultInitializable = defineQuery<[TypeId], boolean>({
  name: "isTypeDefaultInitializable",
  compute: (ctx, type): boolean => {
    const arena = typeArena(ctx);
    const desc = arena.get(type);
    switch (desc.kind) {
      case "primitive":
      case "c-ptr":
        return true;
      case "class":
        return desc.nilability === "nilable";
      case "record":
      case "basic-class": {
        if (getTypeGenericity(ctx, type) === "generic") return false;
        return fieldsForTypeDecl(ctx, type, "use-defaults").fields.every(
          (field) =>
            field.hasDefault ||
            (field.type.type !== undefined &&
              !isQueryRunning(ctx, isTypeDefaultInitializable, field.type.type) &&
              isTypeDefaultInitializable(ctx, field.type.type)),
        );
      }
      case "tuple":
        return desc.elements.every((element) =>
          isTypeDefaultInitializable(ctx, element),
        );
      case "domain":
        return desc.rank !== undefined;
      case "array":
        return isTypeDefaultInitializable(ctx, desc.element);
      default:
        return false;
    }
  },
});

/**
 * The parent class of the class `declId`. Reports multiple or non-class
 * parents once.
 */
const classParentType = defineQuery<[ID], TypeId>({
  name: "reportInvalidMultipleInheritance",
  compute: (ctx, declId) => {
    const node = aggregateNodeFor(ctx, declId);
    if (!node || node.kind !== "class") return Types.object;
    const arena = typeArena(ctx);
    let parent: { name: string; type: TypeId } | undefined;

    node.parents.forEach((expr) => {
      if (expr.kind !== "identifier") return;
      const [found] =
        lookupNameInScope(
          ctx,
          scopeForId(ctx, expr.id),
          [],
          expr.name,
          LookupConfig.DECLS | LookupConfig.IMPORT_AND_USE | LookupConfig.PARENTS |
            LookupConfig.INNERMOST,
        )[0]?.ids ?? [];
      if (!found) return;
      if (idToTag(ctx, found) !== "class") {
        reportDiagnostic({
          ctx,
          code: "FD0002",
          params: { kind: "non-class-parent", typeName: node.name, parent: expr.name },
          span: normalizeSpan(expr.span, node.span),
          nodeId: expr.id.toString(),
        });
        return;
      }
      if (parent) {
        reportDiagnostic({
          ctx,
          code: "FD0002",
          params: {
            kind: "multiple-class-parents",
            typeName: node.name,
            first: parent.name,
            second: expr.name,
          },
          span: normalizeSpan(expr.span, node.span),
          nodeId: expr.id.toString(),
        });
        return;
      }
      if (isQueryRunning(ctx, initialTypeForTypeDecl, found)) return;
      const parentType = arena.get(initialTypeForTypeDecl(ctx, found));
      if (parentType.kind === "class") {
        parent = { name: expr.name, type: parentType.manageable };
      }
    });
    return parent?.type ?? Types.object;
  },
});

/**
 * The type a record or class declaration introduces, before any
 * instantiation. Classes come back with generic management.
 */
export const initialTypeForTypeDecl = defineQuery<[ID], TypeId>({
  name: "initialTypeForTypeDecl",
  compute: (ctx, declId) => {
    const node = aggregateNodeFor(ctx, declId);
    if (!node) return Types.unknown;
    const arena = typeArena(ctx);
    if (node.kind === "record") {
      return arena.internRecord({ decl: declId, name: node.name, substitutions: [] });
    }
    const manageable = arena.internBasicClass({
      decl: declId,
      name: node.name,
      substitutions: [],
      parent: classParentType(ctx, declId),
    });
    return arena.internClass({
      manageable,
      management: "generic",
      nilability: "non-nil",
    });
  },
});
