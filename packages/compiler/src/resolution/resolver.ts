import { normalizeSpan, reportDiagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { isQueryRunning } from "../framework/query.js";
import { LookupConfig, type Scope } from "../scopes/scope.js";
import {
  gatherReceiverAndParentScopesForType,
  lookupNameInScope,
  moduleScope,
  scopeForId,
} from "../scopes/scope-queries.js";
import { ID } from "../syntax/id.js";
import type {
  AggregateNode,
  AnyFormal,
  AstNode,
  CallNode,
  DotNode,
  Expr,
  ForwardingNode,
  FunctionNode,
  IdentifierNode,
  ModuleNode,
  NewNode,
  OpCallNode,
  Stmt,
  TupleDeclNode,
  TupleNode,
  VariableNode,
} from "../syntax/nodes.js";
import { isFormal, isSymbolNode } from "../syntax/nodes.js";
import {
  functionNodeFor,
  idIsField,
  idIsParenlessFunction,
  idToAst,
  idToTag,
} from "../syntax/parsing-queries.js";
import { childrenOf } from "../syntax/traverse.js";
import { typeArena } from "../types/arena-slot.js";
import { qualifiedTypeToString } from "../types/format.js";
import { intParam } from "../types/params.js";
import {
  QualifiedType,
  paramOf,
  typeOf,
  valueOf,
  type QualifierKind,
} from "../types/qualified-type.js";
import { Types, type TypeId } from "../types/type-arena.js";
import { typeForBuiltin, typeForLiteral, type CallSite } from "./builtins.js";
import { CallInfo, type CallInfoActual } from "./call-info.js";
import { resolveCall, resolveCallInMethod } from "./call-resolution.js";
import { resolveConcreteFunction } from "./function-queries.js";
import {
  compositeTypeOf,
  fieldStatementFor,
  fieldTypeFromSubstitution,
  fieldsForTypeDecl,
  initialTypeForTypeDecl,
  isNameOfField,
  qualifiedTypeGenericity,
  receiverTypeFor,
  resolveFieldDecl,
  typeWithDefaults,
  valueKindFor,
  type DefaultsPolicy,
} from "./genericity.js";
import type { InitResolver } from "./init-resolver.js";
import { typeForModuleLevelSymbol } from "./module-queries.js";
import { PoiInfo, type PoiScope } from "./poi.js";
import {
  ResolutionResultByPostorderID,
  resolvedExpression,
  type MostSpecificCandidates,
} from "./resolved.js";
import {
  typeConstructorInitial,
  typedSignatureInitial,
  untypedSignature,
} from "./signature-queries.js";
import type { TypedFnSignature, WhereClauseResult } from "./signatures.js";

type ResolverSymbol = ModuleNode | FunctionNode | AggregateNode;

type ResolverInit = {
  symbol: ResolverSymbol;
  poiScope?: PoiScope;
  signature?: TypedFnSignature;
  scopeResolveOnly?: boolean;
  fieldsOf?: TypeId;
  defaultsPolicy?: DefaultsPolicy;
};

const lexicalLookup =
  LookupConfig.DECLS |
  LookupConfig.IMPORT_AND_USE |
  LookupConfig.PARENTS |
  LookupConfig.INNERMOST;

const receiverLookup = LookupConfig.DECLS | LookupConfig.ONLY_METHODS_FIELDS;

/** Types passed by `const ref` under the default intent. */
const passedByConstRef = (ctx: QueryContext, type: TypeId): boolean => {
  const desc = typeArena(ctx).get(type);
  switch (desc.kind) {
    case "record":
    case "tuple":
    case "domain":
    case "array":
      return true;
    case "primitive":
      return desc.name === "string" || desc.name === "bytes";
    default:
      return false;
  }
};

const site = (node: AstNode): CallSite => ({ id: node.id, span: node.span });

/**
 * One traversal over a symbol: a module statement, the formals or body of a
 * function, or the fields of a record or class. Results land in
 * `byPostorder`, keyed by node ID.
 */
export class Resolver {
  readonly byPostorder = new ResolutionResultByPostorderID();
  readonly poiInfo: PoiInfo;
  /** Types of `return` statements seen so far, in order. */
  readonly returns: QualifiedType[] = [];
  /** Formal or field declaration ID to the type or param it is bound to. */
  readonly substitutions = new Map<string, QualifiedType>();
  /** A declaration resolved from its declared type even when substituted. */
  ignoreSubstitutionFor?: ID;
  initResolver?: InitResolver;
  resolvingForwardingExprs = false;

  readonly #ctx: QueryContext;
  readonly #symbol: ResolverSymbol;
  readonly #poiScope?: PoiScope;
  readonly #signature?: TypedFnSignature;
  readonly #scopeResolveOnly: boolean;
  readonly #fieldsOf?: TypeId;
  readonly #defaultsPolicy: DefaultsPolicy;
  readonly #typeQueryBindings = new Map<string, QualifiedType>();

  private constructor(ctx: QueryContext, init: ResolverInit) {
    this.#ctx = ctx;
    this.#symbol = init.symbol;
    this.#poiScope = init.poiScope;
    this.#signature = init.signature;
    this.#scopeResolveOnly = init.scopeResolveOnly ?? false;
    this.#fieldsOf = init.fieldsOf;
    this.#defaultsPolicy = init.defaultsPolicy ?? "use-defaults";
    this.poiInfo = new PoiInfo(init.poiScope);
  }

  static forModuleStmt(ctx: QueryContext, module: ModuleNode): Resolver {
    return new Resolver(ctx, { symbol: module });
  }

  static forScopeResolving(ctx: QueryContext, symbol: ResolverSymbol): Resolver {
    return new Resolver(ctx, { symbol, scopeResolveOnly: true });
  }

  static forInitialSignature(ctx: QueryContext, fn: FunctionNode): Resolver {
    return new Resolver(ctx, { symbol: fn });
  }

  /**
   * For re-resolving formals while instantiating. With `fieldsOf`, the
   * formals are the fields of that record or class.
   */
  static forInstantiatedSignature(
    ctx: QueryContext,
    symbol: FunctionNode | AggregateNode,
    poiScope: PoiScope | undefined,
    fieldsOf?: TypeId,
  ): Resolver {
    const resolver = new Resolver(ctx, {
      symbol,
      poiScope,
      fieldsOf,
      defaultsPolicy: "ignore-defaults",
    });
    if (fieldsOf !== undefined) resolver.#seedFieldSubstitutions(fieldsOf);
    return resolver;
  }

  /** For a function body, with the formals fixed to `signature`. */
  static forFunction(
    ctx: QueryContext,
    fn: FunctionNode,
    signature: TypedFnSignature,
    poiScope: PoiScope | undefined,
  ): Resolver {
    const resolver = new Resolver(ctx, { symbol: fn, signature, poiScope });
    fn.formals.forEach((formal, index) => {
      const type = signature.formalType(index);
      resolver.byPostorder.set(resolvedExpression(formal.id, type));
      resolver.#bindFormalTypeQueries(formal, type);
    });
    return resolver;
  }

  static forFields(
    ctx: QueryContext,
    aggregate: AggregateNode,
    type: TypeId,
    defaultsPolicy: DefaultsPolicy,
  ): Resolver {
    const resolver = new Resolver(ctx, {
      symbol: aggregate,
      fieldsOf: type,
      defaultsPolicy,
    });
    resolver.#seedFieldSubstitutions(type);
    return resolver;
  }

  #seedFieldSubstitutions(type: TypeId): void {
    const desc = typeArena(this.#ctx).getComposite(type);
    desc?.substitutions.forEach((sub) =>
      this.substitutions.set(sub.field.toString(), sub.type),
    );
  }

  get #arena() {
    return typeArena(this.#ctx);
  }

  get #function(): FunctionNode | undefined {
    return this.#symbol.kind === "function" ? this.#symbol : undefined;
  }

  #isInitializer(): boolean {
    const fn = this.#function;
    return fn !== undefined && fn.isMethod && fn.name === "init";
  }

  #store(
    node: AstNode,
    type: QualifiedType,
    extra: { toId?: ID; mostSpecific?: MostSpecificCandidates; poiScope?: PoiScope } = {},
  ): QualifiedType {
    this.byPostorder.set(resolvedExpression(node.id, type, extra));
    return type;
  }

  #substitutionFor(id: ID): QualifiedType | undefined {
    if (this.ignoreSubstitutionFor?.equals(id)) return undefined;
    return this.substitutions.get(id.toString());
  }

  resolve(node: Stmt | AnyFormal): QualifiedType {
    if (this.#scopeResolveOnly) {
      this.#scopeResolve(node);
      return QualifiedType.unknown;
    }
    switch (node.kind) {
      case "formal":
      case "vararg-formal":
        return this.resolveFormal(node);
      case "variable":
        return this.#variable(node);
      case "multi-decl":
        node.decls.forEach((decl) => this.#variable(decl));
        return QualifiedType.unknown;
      case "tuple-decl":
        return this.#tupleDecl(node, undefined);
      case "forwarding":
        return this.#forwarding(node);
      case "block":
        node.body.forEach((stmt) => this.resolve(stmt));
        return QualifiedType.unknown;
      case "return": {
        const type = node.value
          ? this.resolve(node.value)
          : valueOf(Types.void, "const-var");
        this.returns.push(type);
        return type;
      }
      case "use":
      case "function":
      case "record":
      case "class":
        return QualifiedType.unknown;
      default:
        return this.#expr(node);
    }
  }

  #expr(node: Expr): QualifiedType {
    switch (node.kind) {
      case "identifier":
        return this.#identifier(node);
      case "int-literal":
      case "real-literal":
      case "bool-literal":
      case "string-literal":
        return this.#store(node, typeForLiteral(node));
      case "type-query":
        return this.#store(
          node,
          this.#typeQueryBindings.get(node.id.toString()) ?? typeOf(Types.any),
        );
      case "tuple":
        return this.#tuple(node);
      case "dot":
        return this.#dot(node);
      case "call":
        return this.#call(node);
      case "op-call":
        return this.#opCall(node);
      case "new":
        return this.#newCall(node, node);
    }
  }

  #scopeResolve(node: AstNode): void {
    if (node.kind === "identifier") {
      const [found] = this.#lookup(node, node.name);
      this.#store(node, QualifiedType.unknown, { toId: found });
    }
    childrenOf(node).forEach((child) => {
      if (!isSymbolNode(child)) this.#scopeResolve(child);
    });
  }

  /** Resolves the formals of the function, in order. */
  resolveFormals(): QualifiedType[] {
    return (this.#function?.formals ?? []).map((formal) =>
      this.resolveFormal(formal),
    );
  }

  resolveFormalDecl(decl: ID): QualifiedType {
    const node = idToAst(this.#ctx, decl);
    if (!node) return QualifiedType.unknown;
    if (isFormal(node)) return this.resolveFormal(node);
    if (node.kind === "variable") return this.#variable(node);
    return QualifiedType.unknown;
  }

  resolveWhereClause(): WhereClauseResult {
    const fn = this.#function;
    if (!fn?.whereClause) return "none";
    const result = this.resolve(fn.whereClause);
    if (result.isParamTrue()) return "true";
    if (result.isParamFalse()) return "false";
    if (result.isUnknown()) return "tbd";
    reportDiagnostic({
      ctx: this.#ctx,
      code: "SG0002",
      params: { kind: "where-clause-not-param-bool", functionName: fn.name },
      span: normalizeSpan(fn.whereClause.span, fn.span),
      nodeId: fn.whereClause.id.toString(),
    });
    return "false";
  }

  resolveBody(): void {
    this.#function?.body?.body.forEach((stmt) => this.resolve(stmt));
  }

  resolveReturnTypeExpr(): QualifiedType | undefined {
    const returnType = this.#function?.returnType;
    return returnType && this.resolve(returnType);
  }

  resolveFormal(formal: AnyFormal): QualifiedType {
    const sub = this.#substitutionFor(formal.id);
    if (sub) {
      const type =
        sub.type === undefined
          ? this.#formalFromDefault(formal)
          : this.#formalFromSubstitution(formal, sub);
      return this.#store(formal, type);
    }

    const declared = formal.typeExpr ? this.resolve(formal.typeExpr) : undefined;
    if (declared?.isErroneous()) {
      return this.#store(
        formal,
        new QualifiedType(this.#formalKind(formal, Types.erroneous), Types.erroneous),
      );
    }
    if (formal.intent === "param") {
      return this.#store(
        formal,
        new QualifiedType("param", declared?.isUnknown() ? Types.any : (declared?.type ?? Types.any)),
      );
    }
    let type: TypeId =
      declared === undefined || declared.isUnknown()
        ? Types.any
        : (declared.type ?? Types.any);

    if (formal.kind === "vararg-formal") {
      type = this.#arena.internVarArgTuple(type, this.#varArgCount(formal));
    } else if (formal.name === "this") {
      type = this.#receiverType(type);
    } else if (formal.intent !== "type") {
      type = typeWithDefaults(this.#ctx, type);
    }
    return this.#store(formal, new QualifiedType(this.#formalKind(formal, type), type));
  }

  #varArgCount(formal: AnyFormal): number | undefined {
    if (formal.kind !== "vararg-formal" || !formal.count) return undefined;
    const count = this.resolve(formal.count);
    return count.param?.kind === "int" ? count.param.value : undefined;
  }

  /** Methods see a class receiver as borrowed unless they say otherwise. */
  #receiverType(type: TypeId): TypeId {
    const desc = this.#arena.get(type);
    if (desc.kind !== "class" || desc.management !== "generic") return type;
    return this.#arena.internClass({
      manageable: desc.manageable,
      management: "borrowed",
      nilability: desc.nilability,
    });
  }

  #formalKind(formal: AnyFormal, type: TypeId): QualifierKind {
    switch (formal.intent) {
      case "type":
      case "param":
      case "const-in":
      case "const-ref":
      case "ref":
      case "in":
      case "out":
      case "inout":
        return formal.intent;
      case "default":
      case "const":
        if (formal.name === "this" && this.#isInitializer()) return "ref";
        if (qualifiedTypeGenericity(this.#ctx, valueOf(type)) !== "concrete") {
          return formal.intent === "default" ? "default-intent" : "const-intent";
        }
        return passedByConstRef(this.#ctx, type) ? "const-ref" : "const-in";
    }
  }

  #formalFromSubstitution(formal: AnyFormal, sub: QualifiedType): QualifiedType {
    if (formal.typeExpr) this.#bindTypeQueries(formal.typeExpr, sub);
    const type = sub.type ?? Types.unknown;
    if (formal.kind === "vararg-formal") {
      this.#bindVarArgQueries(formal, type);
    }
    if (formal.intent === "param") return new QualifiedType("param", type, sub.param);
    return new QualifiedType(this.#formalKind(formal, type), type);
  }

  /** The formal typed by its default value, for a call that leaves it out. */
  #formalFromDefault(formal: AnyFormal): QualifiedType {
    const init =
      formal.kind === "formal" && formal.initExpr
        ? this.resolve(formal.initExpr)
        : QualifiedType.unknown;
    if (formal.typeExpr) this.#bindTypeQueries(formal.typeExpr, init);
    const type = init.type ?? Types.any;
    if (formal.intent === "param") return new QualifiedType("param", type, init.param);
    if (formal.intent === "type") return typeOf(type);
    return new QualifiedType(this.#formalKind(formal, type), type);
  }

  #bindFormalTypeQueries(formal: AnyFormal, type: QualifiedType): void {
    if (type.type === undefined) return;
    if (formal.typeExpr) {
      const bound =
        formal.kind === "vararg-formal" ? this.#varArgElement(type.type) : type;
      if (bound) this.#bindTypeQueries(formal.typeExpr, bound);
    }
    if (formal.kind === "vararg-formal") this.#bindVarArgQueries(formal, type.type);
  }

  #varArgElement(tuple: TypeId): QualifiedType | undefined {
    const desc = this.#arena.get(tuple);
    if (desc.kind === "vararg-tuple") return typeOf(desc.element);
    if (desc.kind !== "tuple") return undefined;
    const [first] = desc.elements;
    return first !== undefined && desc.elements.every((element) => element === first)
      ? typeOf(first)
      : undefined;
  }

  #bindVarArgQueries(formal: AnyFormal, tuple: TypeId): void {
    if (formal.kind !== "vararg-formal") return;
    const desc = this.#arena.get(tuple);
    if (formal.count && desc.kind === "tuple") {
      this.#bindTypeQueries(
        formal.count,
        paramOf(Types.int, intParam(desc.elements.length)),
      );
    }
  }

  #bind(id: ID, type: QualifiedType): void {
    const key = id.toString();
    if (!this.#typeQueryBindings.has(key)) this.#typeQueryBindings.set(key, type);
  }

  /** Binds the `?x` queries in `typeExpr` against the matching parts of `actual`. */
  #bindTypeQueries(typeExpr: Expr, actual: QualifiedType): void {
    const type = actual.type;
    if (type === undefined || type === Types.unknown || type === Types.any) return;
    const desc = this.#arena.get(type);

    switch (typeExpr.kind) {
      case "type-query":
        this.#bind(typeExpr.id, actual.isParam() ? actual : typeOf(type));
        return;
      case "tuple":
        if (desc.kind !== "tuple") return;
        typeExpr.elements.forEach((element, index) => {
          const bound = desc.elements[index];
          if (bound !== undefined) this.#bindTypeQueries(element, typeOf(bound));
        });
        return;
      case "call":
        this.#bindCallTypeQueries(typeExpr, type);
        return;
      default:
        return;
    }
  }

  #bindCallTypeQueries(typeExpr: CallNode, type: TypeId): void {
    const [first] = typeExpr.actuals;
    const desc = this.#arena.get(type);
    const callee = typeExpr.callee.kind === "identifier" ? typeExpr.callee.name : "";

    if (first && (callee === "int" || callee === "uint" || callee === "real")) {
      if (desc.kind === "primitive" && desc.name === callee && desc.bitWidth > 0) {
        this.#bindTypeQueries(first, paramOf(Types.int, intParam(desc.bitWidth)));
      }
      return;
    }
    if (first && callee === "c_ptr") {
      if (desc.kind === "c-ptr" && desc.element !== undefined) {
        this.#bindTypeQueries(first, typeOf(desc.element));
      }
      return;
    }
    if (first && callee === "domain") {
      if (desc.kind === "domain" && desc.rank !== undefined) {
        this.#bindTypeQueries(first, paramOf(Types.int, intParam(desc.rank)));
      }
      return;
    }

    const composite = compositeTypeOf(this.#arena, type);
    const compositeDesc =
      composite === undefined ? undefined : this.#arena.getComposite(composite);
    if (composite === undefined || !compositeDesc) return;
    const ctor = typeConstructorInitial(this.#ctx, composite);
    let position = 0;
    typeExpr.actuals.forEach((actualExpr, index) => {
      const name = typeExpr.actualNames[index];
      const formalIdx =
        name === undefined
          ? position++
          : ctor.untyped.formals.findIndex((formal) => formal.name === name);
      const formal = ctor.untyped.formals[formalIdx];
      const bound = formal
        ? compositeDesc.substitutions.find((sub) => sub.field.equals(formal.decl))
        : undefined;
      if (bound) this.#bindTypeQueries(actualExpr, bound.type);
    });
  }

  #lookup(node: AstNode, name: string): ID[] {
    const scope = scopeForId(this.#ctx, node.id);
    const [found] = lookupNameInScope(this.#ctx, scope, [], name, lexicalLookup);
    if (found) return [...found.ids];
    const receiver = this.#implicitReceiver();
    if (receiver?.type === undefined) return [];
    const receiverScopes = gatherReceiverAndParentScopesForType(
      this.#ctx,
      receiver.type,
    );
    const [member] = lookupNameInScope(
      this.#ctx,
      undefined,
      receiverScopes,
      name,
      receiverLookup | LookupConfig.INNERMOST,
    );
    return member ? [...member.ids] : [];
  }

  /** The receiver of the method being resolved, or of forwarding expressions. */
  #implicitReceiver(): QualifiedType | undefined {
    const fn = this.#function;
    if (fn?.isMethod) {
      const [receiver] = fn.formals;
      const type = receiver ? this.byPostorder.typeOf(receiver.id) : undefined;
      return type && !type.isUnknown() ? type : undefined;
    }
    if (this.#fieldsOf !== undefined && this.resolvingForwardingExprs) {
      const composite = compositeTypeOf(this.#arena, this.#fieldsOf);
      return composite === undefined
        ? undefined
        : valueOf(receiverTypeFor(this.#arena, composite));
    }
    return undefined;
  }

  #identifier(node: IdentifierNode): QualifiedType {
    if (node.name === "?") return this.#store(node, typeOf(Types.any));

    const [found] = this.#lookup(node, node.name);
    if (!found) {
      if (node.name === "this") {
        const receiver = this.#implicitReceiver();
        if (receiver) return this.#store(node, receiver);
      }
      const builtin = typeForBuiltin(this.#ctx, node.name);
      if (!builtin.isUnknown()) return this.#store(node, builtin);
      if (moduleScope(this.#ctx, node.name)) {
        return this.#store(node, new QualifiedType("module"), {
          toId: new ID(node.name),
        });
      }
      reportDiagnostic({
        ctx: this.#ctx,
        code: "CR0009",
        params: { kind: "undefined-identifier", name: node.name },
        span: normalizeSpan(node.span),
        nodeId: node.id.toString(),
      });
      return this.#store(node, QualifiedType.erroneous());
    }

    if (idIsParenlessFunction(this.#ctx, found)) {
      const ci = new CallInfo({ name: node.name, isParenless: true, actuals: [] });
      return this.#resolveCallInfo(node, ci, { implicitReceiver: true });
    }
    return this.#store(node, this.typeForId(found), { toId: found });
  }

  /** The type of the declaration `id` as seen from this symbol. */
  typeForId(id: ID): QualifiedType {
    const tag = idToTag(this.#ctx, id);
    if (tag === "type-query") {
      return this.#typeQueryBindings.get(id.toString()) ?? typeOf(Types.unknown);
    }
    const own = this.byPostorder.byId(id);
    if (own) return own.type;

    switch (tag) {
      case "record":
      case "class":
        return typeOf(initialTypeForTypeDecl(this.#ctx, id));
      case "module":
        return new QualifiedType("module");
      case "function":
        return new QualifiedType("function");
      case "variable":
        if (idIsField(this.#ctx, id)) return this.#fieldReference(id);
        break;
      default:
        break;
    }
    if (!id.symbolPath.includes(".")) {
      return typeForModuleLevelSymbol(this.#ctx, id);
    }
    return this.#outerVariable(id);
  }

  #fieldReference(id: ID): QualifiedType {
    const node = idToAst(this.#ctx, id);
    const storage = node?.kind === "variable" ? node.storage : "var";
    const sub = this.#substitutionFor(id);
    if (sub && sub.type !== undefined) return fieldTypeFromSubstitution(storage, sub);

    const aggregate = this.#symbol.kind === "function" ? undefined : this.#symbol;
    if (this.#fieldsOf !== undefined && aggregate?.id.contains(id)) {
      const stmt = fieldStatementFor(aggregate, id);
      if (!stmt) return QualifiedType.unknown;
      const policy: DefaultsPolicy =
        this.#defaultsPolicy === "ignore-defaults" ? "ignore-defaults" : "use-defaults";
      if (isQueryRunning(this.#ctx, resolveFieldDecl, this.#fieldsOf, stmt.id, policy)) {
        return QualifiedType.unknown;
      }
      return (
        resolveFieldDecl(this.#ctx, this.#fieldsOf, stmt.id, policy).byDecl(id)
          ?.type ?? QualifiedType.unknown
      );
    }

    const receiver = this.#implicitReceiver();
    const name = node?.kind === "variable" ? node.name : "";
    const declaring =
      receiver?.type === undefined
        ? undefined
        : isNameOfField(this.#ctx, name, receiver.type);
    if (declaring === undefined) return QualifiedType.unknown;
    return (
      fieldsForTypeDecl(this.#ctx, declaring, "use-defaults").byDecl(id)?.type ??
      QualifiedType.unknown
    );
  }

  /** A variable or formal of an enclosing function. */
  #outerVariable(id: ID): QualifiedType {
    const owner = id.parentSymbolId();
    if (idToTag(this.#ctx, owner) !== "function") return QualifiedType.unknown;
    const untyped = untypedSignature(this.#ctx, owner);
    const sig = untyped && typedSignatureInitial(this.#ctx, untyped);
    if (!sig) return QualifiedType.unknown;
    if (!sig.needsInstantiation && !isQueryRunning(this.#ctx, resolveConcreteFunction, owner)) {
      const resolved = resolveConcreteFunction(this.#ctx, owner)?.byId(id);
      if (resolved) return resolved.type;
    }
    const formalIdx = functionNodeFor(this.#ctx, owner)?.formals.findIndex((formal) =>
      formal.id.equals(id),
    );
    return formalIdx === undefined || formalIdx < 0
      ? QualifiedType.unknown
      : sig.formalType(formalIdx);
  }

  #callActuals(node: CallNode): {
    actuals: CallInfoActual[];
    hasQuestionArg: boolean;
    blocked?: QualifiedType;
  } {
    const actuals: CallInfoActual[] = [];
    let hasQuestionArg = false;
    let blocked: QualifiedType | undefined;
    node.actuals.forEach((expr, index) => {
      const byName = node.actualNames[index];
      if (expr.kind === "identifier" && expr.name === "?") {
        this.#store(expr, typeOf(Types.any));
        hasQuestionArg = true;
        return;
      }
      const type = this.resolve(expr);
      if (expr.kind === "type-query" && !this.#typeQueryBindings.has(expr.id.toString())) {
        hasQuestionArg = true;
        actuals.push({ type: QualifiedType.unknown, byName });
        return;
      }
      if (type.isErroneous()) blocked = QualifiedType.erroneous();
      else if (type.isUnknown()) blocked = blocked ?? QualifiedType.unknown;
      actuals.push({ type, byName });
    });
    return { actuals, hasQuestionArg, blocked };
  }

  #call(node: CallNode): QualifiedType {
    const callee = node.callee;
    switch (callee.kind) {
      case "identifier":
        return this.#namedCall(node, callee);
      case "dot":
        return this.#methodCall(node, callee);
      case "new":
        return this.#newCall(node, callee);
      default: {
        this.resolve(callee);
        this.#reportNotCallable(node, "expression");
        return this.#store(node, QualifiedType.erroneous());
      }
    }
  }

  #reportNotCallable(node: AstNode, name: string): void {
    reportDiagnostic({
      ctx: this.#ctx,
      code: "CR0003",
      params: { kind: "not-callable", name },
      span: normalizeSpan(node.span),
      nodeId: node.id.toString(),
    });
  }

  /** What a called name refers to, when it is not a function. */
  #calledType(callee: IdentifierNode): QualifiedType | "not-callable" | undefined {
    const [found] = this.#lookup(callee, callee.name);
    if (!found) return undefined;
    const tag = idToTag(this.#ctx, found);
    if (tag === "function") return undefined;
    const type = this.typeForId(found);
    this.#store(callee, type, { toId: found });
    if (type.isType()) return type;
    return type.isErroneous() ? undefined : "not-callable";
  }

  #namedCall(node: CallNode, callee: IdentifierNode): QualifiedType {
    const calledType = this.#calledType(callee);
    if (calledType === "not-callable") {
      this.#callActuals(node);
      this.#reportNotCallable(node, callee.name);
      return this.#store(node, QualifiedType.erroneous());
    }
    const { actuals, hasQuestionArg, blocked } = this.#callActuals(node);
    if (blocked) return this.#store(node, blocked);
    const ci = new CallInfo({
      name: callee.name,
      calledType,
      hasQuestionArg,
      actuals,
    });
    return this.#resolveCallInfo(node, ci, {
      implicitReceiver: calledType === undefined,
    });
  }

  #methodCall(node: CallNode, callee: DotNode): QualifiedType {
    const receiver = this.resolve(callee.receiver);
    const { actuals, hasQuestionArg, blocked } = this.#callActuals(node);
    if (blocked) return this.#store(node, blocked);
    if (receiver.isErroneous()) return this.#store(node, QualifiedType.erroneous());

    if (receiver.kind === "module") {
      const ci = new CallInfo({ name: callee.field, hasQuestionArg, actuals });
      const scope = moduleScope(this.#ctx, this.#moduleNameOf(callee.receiver));
      return this.#resolveCallInfo(node, ci, { inScope: scope });
    }
    const ci = new CallInfo({ name: callee.field, hasQuestionArg, actuals })
      .withReceiver(receiver);
    return this.#resolveCallInfo(node, ci, {});
  }

  #moduleNameOf(expr: Expr): string {
    return this.byPostorder.byId(expr.id)?.toId?.symbolPath ?? "";
  }

  #newCall(node: CallNode | NewNode, newNode: NewNode): QualifiedType {
    const typeExpr = this.resolve(newNode.typeExpr);
    const { actuals, hasQuestionArg, blocked } =
      node.kind === "call"
        ? this.#callActuals(node)
        : { actuals: [], hasQuestionArg: false, blocked: undefined };
    if (node !== newNode) this.#store(newNode, typeExpr);
    if (blocked) return this.#store(node, blocked);
    if (typeExpr.isErroneous()) return this.#store(node, QualifiedType.erroneous());

    const arena = this.#arena;
    const desc = typeExpr.type === undefined ? undefined : arena.get(typeExpr.type);
    const composite =
      typeExpr.type === undefined ? undefined : compositeTypeOf(arena, typeExpr.type);
    if (!typeExpr.isType() || composite === undefined || !desc) {
      this.#reportNotCallable(node, "new");
      return this.#store(node, QualifiedType.erroneous());
    }

    const receiver = valueOf(receiverTypeFor(arena, composite));
    const ci = new CallInfo({ name: "init", hasQuestionArg, actuals }).withReceiver(receiver);
    const initType = this.#resolveCallInfo(node, ci, {});
    if (initType.isErroneous()) return initType;

    const chosen = this.byPostorder.byId(node.id)?.mostSpecific.only()?.fn;
    const initialized = chosen?.formalType(0).type;
    const result =
      initialized === undefined ? composite : (compositeTypeOf(arena, initialized) ?? composite);
    if (desc.kind !== "class") return this.#store(node, valueOf(result), this.#callExtra(node));
    const managed = arena.internClass({
      manageable: result,
      management: newNode.management ?? "owned",
      nilability: "non-nil",
    });
    return this.#store(node, valueOf(managed), this.#callExtra(node));
  }

  #callExtra(node: AstNode) {
    const existing = this.byPostorder.byId(node.id);
    return { mostSpecific: existing?.mostSpecific, poiScope: existing?.poiScope };
  }

  #resolveCallInfo(
    node: AstNode,
    ci: CallInfo,
    options: { implicitReceiver?: boolean; inScope?: Scope; memberAccess?: boolean },
  ): QualifiedType {
    const inScope = options.inScope ?? scopeForId(this.#ctx, node.id);
    const receiver = options.implicitReceiver ? this.#implicitReceiver() : undefined;
    const result = receiver
      ? resolveCallInMethod(this.#ctx, site(node), ci, inScope, this.#poiScope, receiver)
      : resolveCall(this.#ctx, site(node), ci, inScope, this.#poiScope);
    this.poiInfo.accumulate(result.poiInfo);

    let type = result.exprType;
    if (result.mostSpecific.isEmpty() && !result.speciallyHandled) {
      if (!type.isErroneous()) this.#reportNoMatch(node, ci, result.rejected.length, options);
      type = QualifiedType.erroneous();
    } else if (result.mostSpecific.isAmbiguous()) {
      reportDiagnostic({
        ctx: this.#ctx,
        code: "CR0002",
        params: {
          kind: "ambiguous-call",
          name: ci.name,
          candidates: result.mostSpecific
            .fns()
            .map((fn) => fn.id.toString()),
        },
        span: normalizeSpan(node.span),
        nodeId: node.id.toString(),
      });
      type = QualifiedType.erroneous();
    }
    return this.#store(node, type, {
      mostSpecific: result.mostSpecific,
      poiScope: result.instantiationPoi,
    });
  }

  #reportNoMatch(
    node: AstNode,
    ci: CallInfo,
    rejected: number,
    options: { memberAccess?: boolean },
  ): void {
    const arena = this.#arena;
    const receiver = ci.receiverType();
    if (options.memberAccess && receiver) {
      reportDiagnostic({
        ctx: this.#ctx,
        code: "CR0012",
        params: {
          kind: "unknown-member",
          name: ci.name,
          receiver: qualifiedTypeToString(arena, receiver),
        },
        span: normalizeSpan(node.span),
        nodeId: node.id.toString(),
      });
      return;
    }
    reportDiagnostic({
      ctx: this.#ctx,
      code: "CR0001",
      params: {
        kind: "no-matching-function",
        name: ci.name,
        actuals: ci.actuals.map((actual) => qualifiedTypeToString(arena, actual.type)),
        rejected,
      },
      span: normalizeSpan(node.span),
      nodeId: node.id.toString(),
    });
  }

  #opCall(node: OpCallNode): QualifiedType {
    if (node.op === "=") return this.#assignment(node);
    const actuals = node.operands.map((operand) => ({ type: this.resolve(operand) }));
    if (actuals.some(({ type }) => type.isErroneous())) {
      return this.#store(node, QualifiedType.erroneous());
    }
    const ci = new CallInfo({ name: node.op, isOpCall: true, actuals });
    return this.#resolveCallInfo(node, ci, {});
  }

  #assignment(node: OpCallNode): QualifiedType {
    const [target, value] = node.operands;
    const result = valueOf(Types.void, "const-var");
    if (!target || !value) return this.#store(node, result);
    const assigned = this.resolve(value);
    const field = this.#initFieldTarget(target);
    if (field !== undefined && this.initResolver) {
      this.initResolver.handleAssignment(field, assigned, site(target));
      this.#store(target, valueOf(assigned.type ?? Types.unknown, "ref"));
    } else {
      this.resolve(target);
    }
    return this.#store(node, result);
  }

  /** The field an initializer statement `this.f = e` or `f = e` sets. */
  #initFieldTarget(target: Expr): string | undefined {
    if (!this.initResolver) return undefined;
    if (
      target.kind === "dot" &&
      target.receiver.kind === "identifier" &&
      target.receiver.name === "this"
    ) {
      this.resolve(target.receiver);
      return target.field;
    }
    if (target.kind !== "identifier") return undefined;
    const [found] = this.#lookup(target, target.name);
    return found && idIsField(this.#ctx, found) ? target.name : undefined;
  }

  #dot(node: DotNode): QualifiedType {
    const receiver = this.resolve(node.receiver);
    if (receiver.isErroneous()) return this.#store(node, QualifiedType.erroneous());
    if (receiver.kind === "module") {
      const scope = moduleScope(this.#ctx, this.#moduleNameOf(node.receiver));
      const [found] = lookupNameInScope(this.#ctx, scope, [], node.field, LookupConfig.DECLS);
      const [id] = found?.ids ?? [];
      if (id) return this.#store(node, this.typeForId(id), { toId: id });
      reportDiagnostic({
        ctx: this.#ctx,
        code: "CR0012",
        params: {
          kind: "unknown-member",
          name: node.field,
          receiver: this.#moduleNameOf(node.receiver),
        },
        span: normalizeSpan(node.span),
        nodeId: node.id.toString(),
      });
      return this.#store(node, QualifiedType.erroneous());
    }
    const ci = new CallInfo({ name: node.field, isParenless: true, actuals: [] })
      .withReceiver(receiver);
    return this.#resolveCallInfo(node, ci, { memberAccess: true });
  }

  #tuple(node: TupleNode): QualifiedType {
    const elements = node.elements.map((element) => this.resolve(element));
    if (elements.some((element) => element.isErroneous())) {
      return this.#store(node, QualifiedType.erroneous());
    }
    const types = elements.filter((element) => element.isType());
    if (types.length > 0 && types.length < elements.length) {
      reportDiagnostic({
        ctx: this.#ctx,
        code: "CR0005",
        params: { kind: "mixed-tuple" },
        span: normalizeSpan(node.span),
        nodeId: node.id.toString(),
      });
      return this.#store(node, QualifiedType.erroneous());
    }
    const ids = elements.map((element) => element.type ?? Types.unknown);
    if (types.length > 0) return this.#store(node, typeOf(this.#arena.internTuple(ids)));
    return this.#store(node, valueOf(this.#arena.internTuple(ids), "const-var"));
  }

  #variable(node: VariableNode): QualifiedType {
    if (this.#fieldsOf !== undefined && idIsField(this.#ctx, node.id)) {
      return this.#store(node, this.#field(node));
    }
    const declared = node.typeExpr ? this.resolve(node.typeExpr) : undefined;
    const init = node.initExpr ? this.resolve(node.initExpr) : undefined;
    if (declared?.isErroneous() || init?.isErroneous()) {
      return this.#store(node, QualifiedType.erroneous(valueKindFor(node.storage)));
    }
    switch (node.storage) {
      case "type":
        return this.#store(node, typeOf(init?.type ?? declared?.type ?? Types.any));
      case "param":
        return this.#store(
          node,
          new QualifiedType("param", declared?.type ?? init?.type ?? Types.any, init?.param),
        );
      default: {
        const kind = valueKindFor(node.storage);
        if (declared?.type !== undefined) {
          return this.#store(node, valueOf(typeWithDefaults(this.#ctx, declared.type), kind));
        }
        return this.#store(node, valueOf(init?.type ?? Types.any, kind));
      }
    }
  }

  /** A field, resolved under the defaults policy and substitutions. */
  #field(node: VariableNode): QualifiedType {
    const sub = this.#substitutionFor(node.id);
    if (sub && sub.type !== undefined) {
      return fieldTypeFromSubstitution(node.storage, sub);
    }
    const useDefaults = sub !== undefined || this.#defaultsPolicy === "use-defaults";
    const declared = node.typeExpr ? this.resolve(node.typeExpr) : undefined;
    if (declared?.isErroneous()) return QualifiedType.erroneous(valueKindFor(node.storage));

    switch (node.storage) {
      case "type": {
        const init = useDefaults && node.initExpr ? this.resolve(node.initExpr) : undefined;
        return typeOf(init?.type ?? Types.any);
      }
      case "param": {
        const init = useDefaults && node.initExpr ? this.resolve(node.initExpr) : undefined;
        return new QualifiedType(
          "param",
          declared?.type ?? init?.type ?? Types.any,
          init?.param,
        );
      }
      default: {
        const kind = valueKindFor(node.storage);
        if (declared?.type !== undefined && !declared.isUnknown()) {
          return valueOf(declared.type, kind);
        }
        const init = node.initExpr ? this.resolve(node.initExpr) : undefined;
        return valueOf(init?.type ?? Types.any, kind);
      }
    }
  }

  #tupleDecl(node: TupleDeclNode, given: TypeId | undefined): QualifiedType {
    const declared = node.typeExpr ? this.resolve(node.typeExpr) : undefined;
    const init = node.initExpr ? this.resolve(node.initExpr) : undefined;
    const tupleType = given ?? declared?.type ?? init?.type;
    const desc = tupleType === undefined ? undefined : this.#arena.get(tupleType);
    const kind = valueKindFor(node.storage);

    node.components.forEach((component, index) => {
      const element = desc?.kind === "tuple" ? desc.elements[index] : undefined;
      if (component.kind === "tuple-decl") {
        this.#tupleDecl(component, element);
        return;
      }
      const sub = this.#substitutionFor(component.id);
      const type =
        sub?.type !== undefined
          ? fieldTypeFromSubstitution(component.storage, sub)
          : element === undefined
            ? valueOf(Types.any, kind)
            : node.storage === "type"
              ? typeOf(element)
              : valueOf(element, kind);
      this.#store(component, type);
    });
    return this.#store(node, valueOf(tupleType ?? Types.any, kind));
  }

  #forwarding(node: ForwardingNode): QualifiedType {
    if (node.target.kind === "variable") {
      return this.#store(node, this.#variable(node.target));
    }
    if (!this.resolvingForwardingExprs) return QualifiedType.unknown;
    return this.#store(node, this.resolve(node.target));
  }
}
