import type { QueryContext } from "../framework/context.js";
import { defineInput, defineQuery } from "../framework/query.js";
import { nodesEqual } from "./fingerprint.js";
import type { ID } from "./id.js";
import type {
  AggregateNode,
  AstKind,
  AstNode,
  FunctionNode,
  ModuleNode,
  Stmt,
  TupleDeclNode,
  VariableNode,
} from "./nodes.js";
import { isAggregate } from "./nodes.js";
import { buildModule } from "./numbering.js";
import { walk } from "./traverse.js";

type AstIndex = {
  module: ModuleNode;
  nodes: ReadonlyMap<string, AstNode>;
  parents: ReadonlyMap<string, ID>;
};

export const moduleSourceInput = defineInput<[string], ModuleNode | undefined>({
  name: "moduleSource",
  defaultValue: () => undefined,
  equals: nodesEqual,
});

export const moduleNamesInput = defineInput<[], readonly string[]>({
  name: "moduleNames",
  defaultValue: () => [],
});

/** Numbers `draft` and installs it as the current text of its module. */
export const setModule = (ctx: QueryContext, draft: ModuleNode): ModuleNode => {
  const built = buildModule(draft);
  moduleSourceInput.set(ctx, [built.name], built);
  const names = moduleNamesInput.get(ctx);
  if (!names.includes(built.name)) {
    moduleNamesInput.set(ctx, [], [...names, built.name].sort());
  }
  return moduleSourceInput.get(ctx, built.name) ?? built;
};

const astIndex = defineQuery<[string], AstIndex | undefined>({
  name: "astIndex",
  compute: (ctx, moduleName) => {
    const module = moduleSourceInput.get(ctx, moduleName);
    if (!module) return undefined;
    const nodes = new Map<string, AstNode>();
    const parents = new Map<string, ID>();
    walk(module, (node, parent) => {
      nodes.set(node.id.toString(), node);
      if (parent) parents.set(node.id.toString(), parent.id);
    });
    return { module, nodes, parents };
  },
  equals: (left, right) => nodesEqual(left?.module, right?.module),
});

export const idToAst = defineQuery<[ID], AstNode | undefined>({
  name: "idToAst",
  compute: (ctx, id) =>
    astIndex(ctx, id.moduleName())?.nodes.get(id.toString()),
  equals: nodesEqual,
});

export const idToParentId = defineQuery<[ID], ID | undefined>({
  name: "idToParentId",
  compute: (ctx, id) =>
    astIndex(ctx, id.moduleName())?.parents.get(id.toString()),
});

export const parentAst = (ctx: QueryContext, id: ID): AstNode | undefined => {
  const parentId = idToParentId(ctx, id);
  return parentId && idToAst(ctx, parentId);
};

export const idToTag = (ctx: QueryContext, id: ID): AstKind | undefined =>
  idToAst(ctx, id)?.kind;

export const functionNodeFor = (
  ctx: QueryContext,
  id: ID,
): FunctionNode | undefined => {
  const node = idToAst(ctx, id);
  return node?.kind === "function" ? node : undefined;
};

export const aggregateNodeFor = (
  ctx: QueryContext,
  id: ID,
): AggregateNode | undefined => {
  const node = idToAst(ctx, id);
  return node && isAggregate(node) ? node : undefined;
};

export const idIsParenlessFunction = (ctx: QueryContext, id: ID): boolean =>
  functionNodeFor(ctx, id)?.isParenless ?? false;

/** Whether `id` names a variable declared directly in a record or class body. */
export const idIsField = defineQuery<[ID], boolean>({
  name: "idIsField",
  compute: (ctx, id) => {
    if (idToAst(ctx, id)?.kind !== "variable") return false;
    let parent = parentAst(ctx, id);
    while (
      parent &&
      (parent.kind === "multi-decl" ||
        parent.kind === "tuple-decl" ||
        parent.kind === "forwarding")
    ) {
      parent = parentAst(ctx, parent.id);
    }
    return parent !== undefined && isAggregate(parent);
  },
});

const tupleComponents = (node: TupleDeclNode): VariableNode[] =>
  node.components.flatMap((component) =>
    component.kind === "variable" ? [component] : tupleComponents(component),
  );

/** Variables a statement declares, flattening grouped declarations. */
export const declaredVariables = (stmt: Stmt): VariableNode[] => {
  switch (stmt.kind) {
    case "variable":
      return [stmt];
    case "multi-decl":
      return [...stmt.decls];
    case "tuple-decl":
      return tupleComponents(stmt);
    case "forwarding":
      return stmt.target.kind === "variable" ? [stmt.target] : [];
    default:
      return [];
  }
};

export const fieldDeclsOf = (node: AggregateNode): VariableNode[] =>
  node.body.flatMap(declaredVariables);

export const aggregateUsesForwarding = defineQuery<[ID], boolean>({
  name: "aggregateUsesForwarding",
  compute: (ctx, id) =>
    aggregateNodeFor(ctx, id)?.body.some(
      (stmt) => stmt.kind === "forwarding",
    ) ?? false,
});

export const idContainsFieldWithName = defineQuery<[ID, string], boolean>({
  name: "idContainsFieldWithName",
  compute: (ctx, id, name) => {
    const node = aggregateNodeFor(ctx, id);
    return node
      ? fieldDeclsOf(node).some((field) => field.name === name)
      : false;
  },
});

/** Whether `id` sits inside a forwarding statement of its aggregate. */
export const isIdInsideForwarding = (ctx: QueryContext, id: ID): boolean => {
  let current: AstNode | undefined = idToAst(ctx, id);
  while (current) {
    if (current.kind === "forwarding") return true;
    if (isAggregate(current) || current.kind === "module") return false;
    current = parentAst(ctx, current.id);
  }
  return false;
};
