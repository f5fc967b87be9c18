import type { QueryContext } from "../framework/context.js";
import { defineQuery, isQueryRunning } from "../framework/query.js";
import { ID } from "../syntax/id.js";
import type { ModuleNode, Stmt } from "../syntax/nodes.js";
import { idToAst, idToParentId, idToTag, moduleSourceInput } from "../syntax/parsing-queries.js";
import { QualifiedType, typeOf } from "../types/qualified-type.js";
import { initialTypeForTypeDecl } from "./genericity.js";
import { ResolutionResultByPostorderID } from "./resolved.js";
import { Resolver } from "./resolver.js";

const moduleNode = (ctx: QueryContext, name: string): ModuleNode | undefined => {
  const source = moduleSourceInput.get(ctx, name);
  if (source) return source;
  const node = idToAst(ctx, new ID(name));
  return node?.kind === "module" ? node : undefined;
};

const moduleStmt = (
  ctx: QueryContext,
  stmtId: ID,
): { module: ModuleNode; stmt: Stmt } | undefined => {
  const module = moduleNode(ctx, stmtId.moduleName());
  const stmt = module?.body.find((candidate) => candidate.id.equals(stmtId));
  return module && stmt ? { module, stmt } : undefined;
};

/** Types of everything in one top-level statement of a module. */
export const resolveModuleStmt = defineQuery<[ID], ResolutionResultByPostorderID>({
  name: "resolveModuleStmt",
  compute: (ctx, stmtId) => {
    const found = moduleStmt(ctx, stmtId);
    if (!found) return new ResolutionResultByPostorderID();
    const resolver = Resolver.forModuleStmt(ctx, found.module);
    resolver.resolve(found.stmt);
    return resolver.byPostorder;
  },
});

export const scopeResolveModuleStmt = defineQuery<[ID], ResolutionResultByPostorderID>({
  name: "scopeResolveModuleStmt",
  compute: (ctx, stmtId) => {
    const found = moduleStmt(ctx, stmtId);
    if (!found) return new ResolutionResultByPostorderID();
    const resolver = Resolver.forScopeResolving(ctx, found.module);
    resolver.resolve(found.stmt);
    return resolver.byPostorder;
  },
});

const mergeStatements = (
  ctx: QueryContext,
  name: string,
  perStmt: (stmtId: ID) => ResolutionResultByPostorderID,
): ResolutionResultByPostorderID => {
  const merged = new ResolutionResultByPostorderID();
  moduleNode(ctx, name)?.body.forEach((stmt) => merged.merge(perStmt(stmt.id)));
  return merged;
};

/** Every top-level statement of module `name`, resolved. */
export const resolveModule = defineQuery<[string], ResolutionResultByPostorderID>({
  name: "resolveModule",
  compute: (ctx, name) =>
    mergeStatements(ctx, name, (stmtId) => resolveModuleStmt(ctx, stmtId)),
});

export const scopeResolveModule = defineQuery<[string], ResolutionResultByPostorderID>({
  name: "scopeResolveModule",
  compute: (ctx, name) =>
    mergeStatements(ctx, name, (stmtId) => scopeResolveModuleStmt(ctx, stmtId)),
});

/** The top-level statement of its module that contains `id`. */
const containingModuleStmt = (ctx: QueryContext, id: ID): ID | undefined => {
  let current: ID | undefined = id;
  while (current) {
    const parent: ID | undefined = idToParentId(ctx, current);
    if (parent && idToTag(ctx, parent) === "module") return current;
    current = parent;
  }
  return undefined;
};

/**
 * The type of a declaration at module level as other symbols see it.
 * A variable still being resolved reads as unknown.
 */
export const typeForModuleLevelSymbol = defineQuery<[ID], QualifiedType>({
  name: "typeForModuleLevelSymbol",
  compute: (ctx, id) => {
    switch (idToTag(ctx, id)) {
      case "record":
      case "class":
        return typeOf(initialTypeForTypeDecl(ctx, id));
      case "function":
        return new QualifiedType("function");
      case "module":
        return new QualifiedType("module");
      default:
        break;
    }
    const stmtId = containingModuleStmt(ctx, id);
    if (!stmtId || isQueryRunning(ctx, resolveModuleStmt, stmtId)) {
      return QualifiedType.unknown;
    }
    return resolveModuleStmt(ctx, stmtId).typeOf(id);
  },
});
