import type { Keyed } from "../framework/keys.js";
import { paramKey, paramsEqual, type ParamValue } from "./params.js";
import { Types, type TypeId } from "./type-arena.js";

export type QualifierKind =
  | "unknown"
  | "type"
  | "param"
  | "var"
  | "const-var"
  | "ref"
  | "const-ref"
  | "ref-maybe-const"
  | "in"
  | "const-in"
  | "out"
  | "inout"
  | "default-intent"
  | "const-intent"
  | "function"
  | "module"
  | "parenless-function";

const constKinds: ReadonlySet<QualifierKind> = new Set([
  "const-var",
  "const-ref",
  "const-in",
  "const-intent",
  "param",
]);

const refKinds: ReadonlySet<QualifierKind> = new Set([
  "ref",
  "const-ref",
  "ref-maybe-const",
  "out",
  "inout",
]);

/** A type together with how a value of it is held. */
export class QualifiedType implements Keyed {
  static readonly unknown = new QualifiedType();

  constructor(
    readonly kind: QualifierKind = "unknown",
    readonly type?: TypeId,
    readonly param?: ParamValue,
  ) {}

  static erroneous(kind: QualifierKind = "var"): QualifiedType {
    return new QualifiedType(kind, Types.erroneous);
  }

  hasType(): boolean {
    return this.type !== undefined;
  }

  isUnknown(): boolean {
    return this.type === undefined || this.type === Types.unknown;
  }

  isErroneous(): boolean {
    return this.type === Types.erroneous;
  }

  isUnknownOrErroneous(): boolean {
    return this.isUnknown() || this.isErroneous();
  }

  isType(): boolean {
    return this.kind === "type";
  }

  isParam(): boolean {
    return this.kind === "param";
  }

  hasParam(): boolean {
    return this.param !== undefined;
  }

  isParamTrue(): boolean {
    return this.param?.kind === "bool" && this.param.value;
  }

  isParamFalse(): boolean {
    return this.param?.kind === "bool" && !this.param.value;
  }

  isConst(): boolean {
    return constKinds.has(this.kind);
  }

  isRef(): boolean {
    return refKinds.has(this.kind);
  }

  /** Values as opposed to types, params, functions and modules. */
  isValue(): boolean {
    return (
      this.kind !== "type" &&
      this.kind !== "param" &&
      this.kind !== "function" &&
      this.kind !== "parenless-function" &&
      this.kind !== "module" &&
      this.kind !== "unknown"
    );
  }

  withKind(kind: QualifierKind): QualifiedType {
    return kind === this.kind
      ? this
      : new QualifiedType(kind, this.type, kind === "param" ? this.param : undefined);
  }

  withType(type: TypeId | undefined): QualifiedType {
    return new QualifiedType(this.kind, type, this.param);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof QualifiedType &&
      other.kind === this.kind &&
      other.type === this.type &&
      paramsEqual(other.param, this.param)
    );
  }

  queryKey(): string {
    const param = this.param ? `=${paramKey(this.param)}` : "";
    return `${this.kind}:${this.type ?? "_"}${param}`;
  }
}

export const typeOf = (type: TypeId): QualifiedType =>
  new QualifiedType("type", type);

export const valueOf = (type: TypeId, kind: QualifierKind = "var") =>
  new QualifiedType(kind, type);

export const paramOf = (type: TypeId, param: ParamValue): QualifiedType =>
  new QualifiedType("param", type, param);
