import { ID } from "./id.js";
import type {
  AggregateNode,
  AnyFormal,
  BlockNode,
  CallNode,
  Expr,
  FormalNode,
  FunctionNode,
  Intent,
  Management,
  ModuleNode,
  OpCallNode,
  Stmt,
  Storage,
  TupleDeclNode,
  VarArgFormalNode,
  VariableNode,
} from "./nodes.js";

/**
 * Factory functions for syntax trees. Nodes are created with empty IDs;
 * `buildModule` numbers a whole module.
 */

export type ExprLike = Expr | string | number | boolean;

export type NamedActual = { name: string; value: ExprLike };

export type ActualLike = ExprLike | NamedActual;

const noId = ID.empty;

const isNamedActual = (value: ActualLike): value is NamedActual =>
  typeof value === "object" && "value" in value && !("kind" in value);

export const ident = (name: string): Expr => ({
  kind: "identifier",
  id: noId,
  name,
});

export const int = (value: number): Expr => ({
  kind: "int-literal",
  id: noId,
  value,
});

export const real = (value: number): Expr => ({
  kind: "real-literal",
  id: noId,
  value,
});

export const bool = (value: boolean): Expr => ({
  kind: "bool-literal",
  id: noId,
  value,
});

export const str = (value: string): Expr => ({
  kind: "string-literal",
  id: noId,
  value,
});

/** Strings are identifiers, integral numbers int literals. */
export const toExpr = (value: ExprLike): Expr => {
  if (typeof value === "string") return ident(value);
  if (typeof value === "boolean") return bool(value);
  if (typeof value === "number") {
    return Number.isInteger(value) ? int(value) : real(value);
  }
  return value;
};

const optionalExpr = (value: ExprLike | undefined): Expr | undefined =>
  value === undefined ? undefined : toExpr(value);

export const typeQuery = (name: string): Expr => ({
  kind: "type-query",
  id: noId,
  name,
});

/** The `?` actual of a partial type construction such as `R(?)`. */
export const question = (): Expr => ident("?");

export const dot = (receiver: ExprLike, field: string): Expr => ({
  kind: "dot",
  id: noId,
  receiver: toExpr(receiver),
  field,
});

export const named = (name: string, value: ExprLike): NamedActual => ({
  name,
  value,
});

export const call = (callee: ExprLike, ...actuals: ActualLike[]): CallNode => ({
  kind: "call",
  id: noId,
  callee: toExpr(callee),
  actuals: actuals.map((actual) =>
    isNamedActual(actual) ? toExpr(actual.value) : toExpr(actual),
  ),
  actualNames: actuals.map((actual) =>
    isNamedActual(actual) ? actual.name : undefined,
  ),
});

export const op = (operator: string, ...operands: ExprLike[]): OpCallNode => ({
  kind: "op-call",
  id: noId,
  op: operator,
  operands: operands.map(toExpr),
});

export const assign = (target: ExprLike, value: ExprLike): OpCallNode =>
  op("=", target, value);

export const newExpr = (
  typeExpr: ExprLike,
  ...actuals: ActualLike[]
): CallNode =>
  call({ kind: "new", id: noId, typeExpr: toExpr(typeExpr) }, ...actuals);

export const newManaged = (
  management: Management,
  typeExpr: ExprLike,
  ...actuals: ActualLike[]
): CallNode =>
  call(
    { kind: "new", id: noId, typeExpr: toExpr(typeExpr), management },
    ...actuals,
  );

export const tuple = (...elements: ExprLike[]): Expr => ({
  kind: "tuple",
  id: noId,
  elements: elements.map(toExpr),
});

export const ret = (value?: ExprLike): Stmt => ({
  kind: "return",
  id: noId,
  value: optionalExpr(value),
});

export const block = (...body: Stmt[]): BlockNode => ({
  kind: "block",
  id: noId,
  body,
});

type DeclOptions = {
  storage?: Storage;
  type?: ExprLike;
  init?: ExprLike;
};

export const variable = (
  name: string,
  { storage = "var", type, init }: DeclOptions = {},
): VariableNode => ({
  kind: "variable",
  id: noId,
  name,
  storage,
  typeExpr: optionalExpr(type),
  initExpr: optionalExpr(init),
});

export const typeField = (name: string, init?: ExprLike): VariableNode =>
  variable(name, { storage: "type", init });

export const paramField = (
  name: string,
  type?: ExprLike,
  init?: ExprLike,
): VariableNode => variable(name, { storage: "param", type, init });

export const multiDecl = (...decls: VariableNode[]): Stmt => ({
  kind: "multi-decl",
  id: noId,
  decls,
});

export const tupleDecl = (
  components: (VariableNode | TupleDeclNode)[],
  { storage = "var", type, init }: DeclOptions = {},
): TupleDeclNode => ({
  kind: "tuple-decl",
  id: noId,
  storage,
  components,
  typeExpr: optionalExpr(type),
  initExpr: optionalExpr(init),
});

export const forwarding = (target: ExprLike | VariableNode): Stmt => ({
  kind: "forwarding",
  id: noId,
  target:
    typeof target === "object" && target.kind === "variable"
      ? target
      : toExpr(target),
});

type FormalOptions = {
  intent?: Intent;
  init?: ExprLike;
};

export const formal = (
  name: string,
  type?: ExprLike,
  { intent = "default", init }: FormalOptions = {},
): FormalNode => ({
  kind: "formal",
  id: noId,
  name,
  intent,
  typeExpr: optionalExpr(type),
  initExpr: optionalExpr(init),
});

export const typeFormal = (name: string, type?: ExprLike): FormalNode =>
  formal(name, type, { intent: "type" });

export const paramFormal = (name: string, type?: ExprLike): FormalNode =>
  formal(name, type, { intent: "param" });

export const varArgs = (
  name: string,
  type?: ExprLike,
  { intent = "default", count }: { intent?: Intent; count?: ExprLike } = {},
): VarArgFormalNode => ({
  kind: "vararg-formal",
  id: noId,
  name,
  intent,
  typeExpr: optionalExpr(type),
  count: optionalExpr(count),
});

export type FunctionInit = {
  name: string;
  formals?: AnyFormal[];
  returnType?: ExprLike;
  where?: ExprLike;
  body?: Stmt[];
  parenless?: boolean;
  operator?: boolean;
  throws?: boolean;
};

export const fn = ({
  name,
  formals = [],
  returnType,
  where,
  body,
  parenless = false,
  operator = false,
  throws = false,
}: FunctionInit): FunctionNode => ({
  kind: "function",
  id: noId,
  name,
  isMethod: false,
  isPrimaryMethod: false,
  isOperator: operator,
  isParenless: parenless,
  throws,
  formals,
  returnType: optionalExpr(returnType),
  whereClause: optionalExpr(where),
  body: body ? block(...body) : undefined,
});

const receiverFormal = (receiver: ExprLike): FormalNode =>
  formal("this", receiver);

/** A method declared outside its type: `proc R.name(...)`. */
export const method = (receiver: ExprLike, init: FunctionInit): FunctionNode => {
  const base = fn(init);
  return {
    ...base,
    isMethod: true,
    formals: [receiverFormal(receiver), ...base.formals],
  };
};

const asPrimaryMethods = (typeName: string, body: Stmt[]): Stmt[] =>
  body.map((stmt) =>
    stmt.kind === "function" && !stmt.isMethod && !stmt.isOperator
      ? {
          ...stmt,
          isMethod: true,
          isPrimaryMethod: true,
          formals: [receiverFormal(typeName), ...stmt.formals],
        }
      : stmt,
  );

export const record = (name: string, ...body: Stmt[]): AggregateNode => ({
  kind: "record",
  id: noId,
  name,
  parents: [],
  body: asPrimaryMethods(name, body),
});

export const classDecl = (
  name: string,
  body: Stmt[],
  parents: ExprLike[] = [],
): AggregateNode => ({
  kind: "class",
  id: noId,
  name,
  parents: parents.map(toExpr),
  body: asPrimaryMethods(name, body),
});

export const use = (
  moduleName: string,
  { isPublic = false }: { isPublic?: boolean } = {},
): Stmt => ({
  kind: "use",
  id: noId,
  moduleName,
  isPublic,
});

export const module = (name: string, ...body: Stmt[]): ModuleNode => ({
  kind: "module",
  id: noId,
  name,
  body,
});
