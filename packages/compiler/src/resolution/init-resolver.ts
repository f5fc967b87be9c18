import { normalizeSpan, reportDiagnostic } from "../diagnostics/index.js";
import type { QueryContext } from "../framework/context.js";
import { typeArena } from "../types/arena-slot.js";
import type { QualifiedType } from "../types/qualified-type.js";
import type { Substitution, TypeId } from "../types/type-arena.js";
import type { CallSite } from "./builtins.js";
import {
  canonicalSubstitution,
  compositeTypeOf,
  fieldsForTypeDecl,
  getTypeGenericity,
  instantiateCompositeType,
  qualifiedTypeGenericity,
  receiverTypeFor,
} from "./genericity.js";
import { internTypedSignature, type TypedFnSignature } from "./signatures.js";

/**
 * Tracks which fields an initializer sets, so a generic receiver can be
 * instantiated from the values assigned to its fields.
 */
export class InitResolver {
  readonly #ctx: QueryContext;
  readonly #sig: TypedFnSignature;
  readonly #site: CallSite;
  readonly #assigned = new Map<string, QualifiedType>();

  constructor(ctx: QueryContext, sig: TypedFnSignature, site: CallSite) {
    this.#ctx = ctx;
    this.#sig = sig;
    this.#site = site;
  }

  /** The record or basic class being initialized. */
  receiverComposite(): TypeId | undefined {
    const receiver = this.#sig.formalType(0).type;
    return receiver === undefined
      ? undefined
      : compositeTypeOf(typeArena(this.#ctx), receiver);
  }

  /** Records `fieldName = value`; false when the receiver has no such field. */
  handleAssignment(fieldName: string, value: QualifiedType, site: CallSite): boolean {
    const composite = this.receiverComposite();
    const fields =
      composite === undefined
        ? undefined
        : fieldsForTypeDecl(this.#ctx, composite, "ignore-defaults");
    if (!fields?.byName(fieldName)) {
      reportDiagnostic({
        ctx: this.#ctx,
        code: "CR0011",
        params: {
          kind: "unknown-field-in-init",
          field: fieldName,
          typeName: this.#typeName(composite),
        },
        span: normalizeSpan(site.span, this.#site.span),
        nodeId: site.id.toString(),
      });
      return false;
    }
    if (!this.#assigned.has(fieldName)) this.#assigned.set(fieldName, value);
    return true;
  }

  #typeName(composite: TypeId | undefined): string {
    return composite === undefined
      ? "?"
      : (typeArena(this.#ctx).getComposite(composite)?.name ?? "?");
  }

  /**
   * The initializer's signature with the receiver instantiated. Fields are
   * visited in order; one made concrete by an earlier substitution needs
   * none of its own.
   */
  finalize(): TypedFnSignature {
    const composite = this.receiverComposite();
    if (composite === undefined || getTypeGenericity(this.#ctx, composite) === "concrete") {
      return this.#sig;
    }
    const ctx = this.#ctx;
    const defaults = fieldsForTypeDecl(ctx, composite, "use-defaults");
    const substitutions: Substitution[] = [];
    let current = composite;

    fieldsForTypeDecl(ctx, composite, "ignore-defaults").fields.forEach(({ declId, name }) => {
      const field = fieldsForTypeDecl(ctx, current, "ignore-defaults").byDecl(declId);
      if (!field || qualifiedTypeGenericity(ctx, field.type) === "concrete") return;

      const assigned = this.#assigned.get(name);
      const fallback = defaults.byDecl(declId)?.type;
      const value =
        assigned ??
        (fallback && qualifiedTypeGenericity(ctx, fallback) === "concrete"
          ? fallback
          : undefined);
      if (!value) {
        reportDiagnostic({
          ctx,
          code: "CR0011",
          params: {
            kind: "uninitialized-generic-field",
            field: name,
            typeName: this.#typeName(composite),
          },
          span: normalizeSpan(this.#site.span),
          nodeId: this.#site.id.toString(),
        });
        return;
      }
      substitutions.push({ field: declId, type: canonicalSubstitution(value) });
      current = instantiateCompositeType(ctx, composite, substitutions);
    });

    const receiver = this.#sig.formalType(0);
    const formalTypes = [
      receiver.withType(receiverTypeFor(typeArena(ctx), current)),
      ...this.#sig.formalTypes.slice(1),
    ];
    return internTypedSignature(ctx, {
      untyped: this.#sig.untyped,
      formalTypes,
      whereClause: this.#sig.whereClause,
      needsInstantiation: false,
      instantiatedFrom: this.#sig.instantiatedFrom ?? this.#sig,
      parentFn: this.#sig.parentFn,
      formalsInstantiated: [true, ...this.#sig.formalsInstantiated.slice(1)],
    });
  }
}
