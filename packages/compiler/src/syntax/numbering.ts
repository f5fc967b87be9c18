import { ID } from "./id.js";
import type {
  AggregateNode,
  AnyFormal,
  BlockNode,
  Expr,
  FunctionNode,
  ModuleNode,
  Stmt,
  TupleDeclNode,
  VariableNode,
} from "./nodes.js";

/**
 * Assigns IDs to a freshly built module. Every symbol (module, function,
 * record, class) numbers its own nodes in post-order starting at 0; repeated
 * symbol names within one parent get `#1`, `#2`, ... suffixes.
 */
class IdAssigner {
  readonly #counters = new Map<string, number>();
  readonly #names = new Map<string, Map<string, number>>();

  module(node: ModuleNode): ModuleNode {
    const path = node.name;
    const body = node.body.map((stmt) => this.stmt(stmt, path));
    return { ...node, body, id: this.#symbolId(path) };
  }

  #childPath(parent: string, name: string): string {
    const seen = this.#names.get(parent) ?? new Map<string, number>();
    this.#names.set(parent, seen);
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return `${parent}.${count === 0 ? name : `${name}#${count}`}`;
  }

  #mark(path: string): number {
    return this.#counters.get(path) ?? 0;
  }

  #take(path: string, start: number): ID {
    const next = this.#mark(path);
    this.#counters.set(path, next + 1);
    return new ID(path, next, next - start);
  }

  #symbolId(path: string): ID {
    return new ID(path, -1, this.#mark(path));
  }

  stmt(node: Stmt, path: string): Stmt {
    switch (node.kind) {
      case "function":
        return this.function(node, path);
      case "record":
      case "class":
        return this.aggregate(node, path);
      case "variable":
        return this.variable(node, path);
      case "multi-decl": {
        const start = this.#mark(path);
        const decls = node.decls.map((decl) => this.variable(decl, path));
        return { ...node, decls, id: this.#take(path, start) };
      }
      case "tuple-decl":
        return this.tupleDecl(node, path);
      case "forwarding": {
        const start = this.#mark(path);
        const target =
          node.target.kind === "variable"
            ? this.variable(node.target, path)
            : this.expr(node.target, path);
        return { ...node, target, id: this.#take(path, start) };
      }
      case "block":
        return this.block(node, path);
      case "return": {
        const start = this.#mark(path);
        const value = node.value && this.expr(node.value, path);
        return { ...node, value, id: this.#take(path, start) };
      }
      case "use":
        return { ...node, id: this.#take(path, this.#mark(path)) };
      default:
        return this.expr(node, path);
    }
  }

  function(node: FunctionNode, parent: string): FunctionNode {
    const path = this.#childPath(parent, node.name);
    const formals = node.formals.map((formal) => this.formal(formal, path));
    const returnType = node.returnType && this.expr(node.returnType, path);
    const whereClause = node.whereClause && this.expr(node.whereClause, path);
    const body = node.body && this.block(node.body, path);
    return {
      ...node,
      formals,
      returnType,
      whereClause,
      body,
      id: this.#symbolId(path),
    };
  }

  aggregate(node: AggregateNode, parent: string): AggregateNode {
    const path = this.#childPath(parent, node.name);
    const parents = node.parents.map((expr) => this.expr(expr, path));
    const body = node.body.map((stmt) => this.stmt(stmt, path));
    return { ...node, parents, body, id: this.#symbolId(path) };
  }

  formal(node: AnyFormal, path: string): AnyFormal {
    const start = this.#mark(path);
    const typeExpr = node.typeExpr && this.expr(node.typeExpr, path);
    if (node.kind === "vararg-formal") {
      const count = node.count && this.expr(node.count, path);
      return { ...node, typeExpr, count, id: this.#take(path, start) };
    }
    const initExpr = node.initExpr && this.expr(node.initExpr, path);
    return { ...node, typeExpr, initExpr, id: this.#take(path, start) };
  }

  variable(node: VariableNode, path: string): VariableNode {
    const start = this.#mark(path);
    const typeExpr = node.typeExpr && this.expr(node.typeExpr, path);
    const initExpr = node.initExpr && this.expr(node.initExpr, path);
    return { ...node, typeExpr, initExpr, id: this.#take(path, start) };
  }

  tupleDecl(node: TupleDeclNode, path: string): TupleDeclNode {
    const start = this.#mark(path);
    const components = node.components.map((component) =>
      component.kind === "variable"
        ? this.variable(component, path)
        : this.tupleDecl(component, path),
    );
    const typeExpr = node.typeExpr && this.expr(node.typeExpr, path);
    const initExpr = node.initExpr && this.expr(node.initExpr, path);
    return {
      ...node,
      components,
      typeExpr,
      initExpr,
      id: this.#take(path, start),
    };
  }

  block(node: BlockNode, path: string): BlockNode {
    const start = this.#mark(path);
    const body = node.body.map((stmt) => this.stmt(stmt, path));
    return { ...node, body, id: this.#take(path, start) };
  }

  expr(node: Expr, path: string): Expr {
    const start = this.#mark(path);
    switch (node.kind) {
      case "dot": {
        const receiver = this.expr(node.receiver, path);
        return { ...node, receiver, id: this.#take(path, start) };
      }
      case "call": {
        const callee = this.expr(node.callee, path);
        const actuals = node.actuals.map((actual) => this.expr(actual, path));
        return { ...node, callee, actuals, id: this.#take(path, start) };
      }
      case "op-call": {
        const operands = node.operands.map((operand) =>
          this.expr(operand, path),
        );
        return { ...node, operands, id: this.#take(path, start) };
      }
      case "new": {
        const typeExpr = this.expr(node.typeExpr, path);
        return { ...node, typeExpr, id: this.#take(path, start) };
      }
      case "tuple": {
        const elements = node.elements.map((element) =>
          this.expr(element, path),
        );
        return { ...node, elements, id: this.#take(path, start) };
      }
      case "identifier":
      case "int-literal":
      case "real-literal":
      case "bool-literal":
      case "string-literal":
      case "type-query":
        return { ...node, id: this.#take(path, start) };
    }
  }
}

export const buildModule = (draft: ModuleNode): ModuleNode =>
  new IdAssigner().module(draft);
