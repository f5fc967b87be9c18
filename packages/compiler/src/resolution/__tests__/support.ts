import type { QueryContext } from "../../framework/context.js";
import type {
  AggregateNode,
  Expr,
  FunctionNode,
  ModuleNode,
  Stmt,
  VariableNode,
} from "../../syntax/nodes.js";

export const variableNamed = (module: ModuleNode, name: string): VariableNode => {
  const found = module.body.find(
    (stmt): stmt is VariableNode => stmt.kind === "variable" && stmt.name === name,
  );
  if (!found) throw new Error(`no variable ${name} in ${module.name}`);
  return found;
};

export const functionNamed = (module: ModuleNode, name: string): FunctionNode => {
  const found = module.body.find(
    (stmt): stmt is FunctionNode => stmt.kind === "function" && stmt.name === name,
  );
  if (!found) throw new Error(`no function ${name} in ${module.name}`);
  return found;
};

export const aggregateNamed = (module: ModuleNode, name: string): AggregateNode => {
  const found = module.body.find(
    (stmt): stmt is AggregateNode =>
      (stmt.kind === "record" || stmt.kind === "class") && stmt.name === name,
  );
  if (!found) throw new Error(`no record or class ${name} in ${module.name}`);
  return found;
};

export const initOf = (variable: VariableNode): Expr => {
  if (!variable.initExpr) throw new Error(`${variable.name} has no initializer`);
  return variable.initExpr;
};

export const returnedExpr = (stmt: Stmt | undefined): Expr => {
  if (stmt?.kind !== "return" || !stmt.value) throw new Error("expected a return");
  return stmt.value;
};

export const codesOf = (ctx: QueryContext): string[] =>
  ctx.reportedDiagnostics.map((diagnostic) => diagnostic.code);

export const messagesFor = (ctx: QueryContext, code: string): string[] =>
  ctx.reportedDiagnostics
    .filter((diagnostic) => diagnostic.code === code)
    .map((diagnostic) => diagnostic.message);
