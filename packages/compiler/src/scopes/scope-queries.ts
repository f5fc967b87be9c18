import type { QueryContext } from "../framework/context.js";
import { defineQuery } from "../framework/query.js";
import { ID } from "../syntax/id.js";
import type { AstNode, Stmt } from "../syntax/nodes.js";
import { isAggregate } from "../syntax/nodes.js";
import {
  declaredVariables,
  idToAst,
  parentAst,
} from "../syntax/parsing-queries.js";
import { walk } from "../syntax/traverse.js";
import { typeArena } from "../types/arena-slot.js";
import type { TypeId } from "../types/type-arena.js";
import {
  LookupConfig,
  Scope,
  hasFlag,
  type DeclaredKind,
  type DeclaredName,
  type IdsWithName,
  type LookupFlags,
  type UseClause,
} from "./scope.js";

const createsScope = (node: AstNode, parent: AstNode | undefined): boolean => {
  switch (node.kind) {
    case "module":
    case "function":
    case "record":
    case "class":
      return true;
    case "block":
      return parent?.kind !== "function";
    default:
      return false;
  }
};

const scopeStatements = (node: AstNode): readonly Stmt[] => {
  switch (node.kind) {
    case "module":
    case "block":
    case "record":
    case "class":
      return node.body;
    case "function":
      return node.body?.body ?? [];
    default:
      return [];
  }
};

const collectScope = (node: AstNode) => {
  const declared = new Map<string, DeclaredName[]>();
  const uses: UseClause[] = [];
  let containsFunctionDecls = false;
  const declare = (name: string, id: ID, kind: DeclaredKind) => {
    const existing = declared.get(name) ?? [];
    declared.set(name, [...existing, { id, kind }]);
  };

  if (node.kind === "function") {
    node.formals.forEach((formal) => {
      declare(formal.name, formal.id, "formal");
      // `?t` in a formal's type binds `t` for the rest of the function.
      walk(formal, (child) => {
        if (child.kind === "type-query") declare(child.name, child.id, "type-query");
      });
    });
  }

  const variableKind: DeclaredKind = isAggregate(node) ? "field" : "variable";
  scopeStatements(node).forEach((stmt) => {
    switch (stmt.kind) {
      case "function":
        containsFunctionDecls = true;
        declare(stmt.name, stmt.id, stmt.isMethod ? "method" : "function");
        return;
      case "record":
      case "class":
        declare(stmt.name, stmt.id, "type");
        return;
      case "use":
        uses.push({ moduleName: stmt.moduleName, isPublic: stmt.isPublic });
        return;
      default:
        declaredVariables(stmt).forEach((variable) =>
          declare(variable.name, variable.id, variableKind),
        );
    }
  });

  return { declared, uses, containsFunctionDecls };
};

/** ID of the nearest scope-creating node enclosing `id` (or `id` itself). */
const enclosingScopeNode = (
  ctx: QueryContext,
  id: ID,
  includeSelf: boolean,
): ID | undefined => {
  let node = includeSelf ? idToAst(ctx, id) : parentAst(ctx, id);
  while (node) {
    const parent = parentAst(ctx, node.id);
    if (createsScope(node, parent)) return node.id;
    node = parent;
  }
  return undefined;
};

/** The scope created by the node `id`; undefined if it creates none. */
export const scopeForScopeNode = defineQuery<[ID], Scope | undefined>({
  name: "scopeForScopeNode",
  compute: (ctx, id) => {
    const node = idToAst(ctx, id);
    if (!node || !createsScope(node, parentAst(ctx, id))) return undefined;
    const { declared, uses, containsFunctionDecls } = collectScope(node);
    return new Scope(
      id,
      node.kind,
      enclosingScopeNode(ctx, id, false),
      declared,
      uses,
      containsFunctionDecls,
    );
  },
});

/** The innermost scope containing `id`. */
export const scopeForId = defineQuery<[ID], Scope | undefined>({
  name: "scopeForId",
  compute: (ctx, id) => {
    const scopeNode = enclosingScopeNode(ctx, id, true);
    return scopeNode && scopeForScopeNode(ctx, scopeNode);
  },
});

export const parentScope = (
  ctx: QueryContext,
  scope: Scope,
): Scope | undefined =>
  scope.parentId && scopeForScopeNode(ctx, scope.parentId);

export const moduleScope = (
  ctx: QueryContext,
  moduleName: string,
): Scope | undefined => scopeForScopeNode(ctx, new ID(moduleName));

const acceptDecl = (decl: DeclaredName, config: LookupFlags): boolean => {
  if (hasFlag(config, LookupConfig.ONLY_METHODS_FIELDS)) {
    return decl.kind === "method" || decl.kind === "field";
  }
  return decl.kind !== "method" || hasFlag(config, LookupConfig.METHODS);
};

const searchScope = ({
  ctx,
  scope,
  name,
  config,
  visited,
  result,
  publicUsesOnly,
}: {
  ctx: QueryContext;
  scope: Scope;
  name: string;
  config: LookupFlags;
  visited: Set<string>;
  result: IdsWithName[];
  publicUsesOnly: boolean;
}): boolean => {
  const key = scope.id.toString();
  if (visited.has(key)) return false;
  visited.add(key);

  let found = false;
  if (hasFlag(config, LookupConfig.DECLS)) {
    const ids = scope
      .namesDeclared(name)
      .filter((decl) => acceptDecl(decl, config))
      .map((decl) => decl.id);
    if (ids.length > 0) {
      result.push({ scope: scope.id, ids });
      found = true;
    }
  }

  if (hasFlag(config, LookupConfig.IMPORT_AND_USE)) {
    scope.uses
      .filter((use) => !publicUsesOnly || use.isPublic)
      .forEach((use) => {
        const used = moduleScope(ctx, use.moduleName);
        if (!used) return;
        const foundInUse = searchScope({
          ctx,
          scope: used,
          name,
          config: config | LookupConfig.DECLS,
          visited,
          result,
          publicUsesOnly: true,
        });
        found = found || foundInUse;
      });
  }

  return found;
};

/**
 * Looks `name` up from `scope`, first in `receiverScopes`. Scopes already in
 * `visited` are skipped and every scope searched is added to it.
 */
export const lookupNameInScopeWithSet = (
  ctx: QueryContext,
  scope: Scope | undefined,
  receiverScopes: readonly Scope[],
  name: string,
  config: LookupFlags,
  visited: Set<string>,
): IdsWithName[] => {
  const result: IdsWithName[] = [];
  const innermost = hasFlag(config, LookupConfig.INNERMOST);
  const search = (current: Scope) =>
    searchScope({
      ctx,
      scope: current,
      name,
      config,
      visited,
      result,
      publicUsesOnly: false,
    });

  for (const receiverScope of receiverScopes) {
    if (search(receiverScope) && innermost) return result;
  }

  let current = scope;
  while (current) {
    if (search(current) && innermost) break;
    if (!hasFlag(config, LookupConfig.PARENTS)) break;
    current = parentScope(ctx, current);
  }
  return result;
};

export const lookupNameInScope = (
  ctx: QueryContext,
  scope: Scope | undefined,
  receiverScopes: readonly Scope[],
  name: string,
  config: LookupFlags,
): IdsWithName[] =>
  lookupNameInScopeWithSet(ctx, scope, receiverScopes, name, config, new Set());

/**
 * Scopes to search for methods of `type`: its declaration, the declarations
 * of its parent classes, then the modules declaring them (for methods
 * written outside the type).
 */
export const gatherReceiverAndParentScopesForType = (
  ctx: QueryContext,
  type: TypeId,
): Scope[] => {
  const arena = typeArena(ctx);
  const aggregateScopes: Scope[] = [];
  const moduleScopes: Scope[] = [];
  const desc = arena.get(type);
  let current: TypeId | undefined =
    desc.kind === "class" ? desc.manageable : type;

  while (current !== undefined) {
    const composite = arena.getComposite(current);
    if (!composite || composite.decl.isEmpty()) break;
    const scope = scopeForScopeNode(ctx, composite.decl);
    if (scope) aggregateScopes.push(scope);
    const declaringModule = moduleScope(ctx, composite.decl.moduleName());
    if (declaringModule && !moduleScopes.includes(declaringModule)) {
      moduleScopes.push(declaringModule);
    }
    current = composite.kind === "basic-class" ? composite.parent : undefined;
  }
  return [...aggregateScopes, ...moduleScopes];
};
