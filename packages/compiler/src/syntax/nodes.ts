import type { SourceSpan } from "../diagnostics/index.js";
import type { ID } from "./id.js";

type NodeBase = {
  readonly id: ID;
  readonly span?: SourceSpan;
};

export type Intent =
  | "default"
  | "const"
  | "const-in"
  | "const-ref"
  | "ref"
  | "in"
  | "out"
  | "inout"
  | "type"
  | "param";

export type Storage = "var" | "const" | "param" | "type" | "ref" | "const-ref";

export type ModuleNode = NodeBase & {
  readonly kind: "module";
  readonly name: string;
  readonly body: readonly Stmt[];
};

export type UseNode = NodeBase & {
  readonly kind: "use";
  readonly moduleName: string;
  readonly isPublic: boolean;
};

export type FormalNode = NodeBase & {
  readonly kind: "formal";
  readonly name: string;
  readonly intent: Intent;
  readonly typeExpr?: Expr;
  readonly initExpr?: Expr;
};

export type VarArgFormalNode = NodeBase & {
  readonly kind: "vararg-formal";
  readonly name: string;
  readonly intent: Intent;
  readonly typeExpr?: Expr;
  /** Fixed count (`...3`) or a type query capturing it (`...?n`). */
  readonly count?: Expr;
};

export type AnyFormal = FormalNode | VarArgFormalNode;

export type FunctionNode = NodeBase & {
  readonly kind: "function";
  readonly name: string;
  readonly isMethod: boolean;
  readonly isPrimaryMethod: boolean;
  readonly isOperator: boolean;
  readonly isParenless: boolean;
  readonly throws: boolean;
  /** Includes the receiver formal `this` first for methods. */
  readonly formals: readonly AnyFormal[];
  readonly returnType?: Expr;
  readonly whereClause?: Expr;
  readonly body?: BlockNode;
};

export type AggregateNode = NodeBase & {
  readonly kind: "record" | "class";
  readonly name: string;
  readonly parents: readonly Expr[];
  readonly body: readonly Stmt[];
};

export type VariableNode = NodeBase & {
  readonly kind: "variable";
  readonly name: string;
  readonly storage: Storage;
  readonly typeExpr?: Expr;
  readonly initExpr?: Expr;
};

export type MultiDeclNode = NodeBase & {
  readonly kind: "multi-decl";
  readonly decls: readonly VariableNode[];
};

export type TupleDeclNode = NodeBase & {
  readonly kind: "tuple-decl";
  readonly storage: Storage;
  readonly components: readonly (VariableNode | TupleDeclNode)[];
  readonly typeExpr?: Expr;
  readonly initExpr?: Expr;
};

export type ForwardingNode = NodeBase & {
  readonly kind: "forwarding";
  readonly target: Expr | VariableNode;
};

export type BlockNode = NodeBase & {
  readonly kind: "block";
  readonly body: readonly Stmt[];
};

export type ReturnNode = NodeBase & {
  readonly kind: "return";
  readonly value?: Expr;
};

export type IdentifierNode = NodeBase & {
  readonly kind: "identifier";
  readonly name: string;
};

export type DotNode = NodeBase & {
  readonly kind: "dot";
  readonly receiver: Expr;
  readonly field: string;
};

export type CallNode = NodeBase & {
  readonly kind: "call";
  readonly callee: Expr;
  readonly actuals: readonly Expr[];
  /** Parallel to `actuals`; undefined for positional actuals. */
  readonly actualNames: readonly (string | undefined)[];
};

export type OpCallNode = NodeBase & {
  readonly kind: "op-call";
  readonly op: string;
  readonly operands: readonly Expr[];
};

export type Management = "owned" | "shared" | "unmanaged" | "borrowed";

export type NewNode = NodeBase & {
  readonly kind: "new";
  readonly typeExpr: Expr;
  readonly management?: Management;
};

export type IntLiteralNode = NodeBase & {
  readonly kind: "int-literal";
  readonly value: number;
};

export type RealLiteralNode = NodeBase & {
  readonly kind: "real-literal";
  readonly value: number;
};

export type BoolLiteralNode = NodeBase & {
  readonly kind: "bool-literal";
  readonly value: boolean;
};

export type StringLiteralNode = NodeBase & {
  readonly kind: "string-literal";
  readonly value: string;
};

export type TypeQueryNode = NodeBase & {
  readonly kind: "type-query";
  readonly name: string;
};

export type TupleNode = NodeBase & {
  readonly kind: "tuple";
  readonly elements: readonly Expr[];
};

export type LiteralNode =
  | IntLiteralNode
  | RealLiteralNode
  | BoolLiteralNode
  | StringLiteralNode;

export type Expr =
  | IdentifierNode
  | DotNode
  | CallNode
  | OpCallNode
  | NewNode
  | LiteralNode
  | TypeQueryNode
  | TupleNode;

export type Decl =
  | VariableNode
  | MultiDeclNode
  | TupleDeclNode
  | FunctionNode
  | AggregateNode
  | ForwardingNode;

export type Stmt = Decl | Expr | ReturnNode | BlockNode | UseNode;

export type AstNode = ModuleNode | Stmt | AnyFormal;

export type AstKind = AstNode["kind"];

export const isSymbolNode = (
  node: AstNode,
): node is ModuleNode | FunctionNode | AggregateNode =>
  node.kind === "module" ||
  node.kind === "function" ||
  node.kind === "record" ||
  node.kind === "class";

export const isAggregate = (node: AstNode): node is AggregateNode =>
  node.kind === "record" || node.kind === "class";

export const isFormal = (node: AstNode): node is AnyFormal =>
  node.kind === "formal" || node.kind === "vararg-formal";
