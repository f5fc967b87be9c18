import type { AstNode } from "./nodes.js";

const present = <T extends AstNode>(node: T | undefined): node is T =>
  node !== undefined;

/** Direct children in source order, which is also numbering order. */
export const childrenOf = (node: AstNode): AstNode[] => {
  switch (node.kind) {
    case "module":
    case "block":
      return [...node.body];
    case "record":
    case "class":
      return [...node.parents, ...node.body];
    case "formal":
    case "variable":
      return [node.typeExpr, node.initExpr].filter(present);
    case "vararg-formal":
      return [node.typeExpr, node.count].filter(present);
    case "function":
      return [
        ...node.formals,
        node.returnType,
        node.whereClause,
        node.body,
      ].filter(present);
    case "multi-decl":
      return [...node.decls];
    case "tuple-decl":
      return [...node.components, node.typeExpr, node.initExpr].filter(present);
    case "forwarding":
      return [node.target];
    case "return":
      return [node.value].filter(present);
    case "dot":
      return [node.receiver];
    case "call":
      return [node.callee, ...node.actuals];
    case "op-call":
      return [...node.operands];
    case "new":
      return [node.typeExpr];
    case "tuple":
      return [...node.elements];
    case "use":
    case "identifier":
    case "int-literal":
    case "real-literal":
    case "bool-literal":
    case "string-literal":
    case "type-query":
      return [];
  }
};

/** Pre-order walk; return false from `visit` to skip a subtree. */
export const walk = (
  node: AstNode,
  visit: (node: AstNode, parent: AstNode | undefined) => boolean | void,
  parent?: AstNode,
): void => {
  if (visit(node, parent) === false) return;
  childrenOf(node).forEach((child) => walk(child, visit, node));
};
