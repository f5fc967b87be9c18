import type { Keyed } from "../framework/keys.js";

/**
 * Stable identity of a syntax node: the path of its enclosing symbol plus a
 * post-order index inside that symbol. Symbols themselves use index -1.
 */
export class ID implements Keyed {
  static readonly empty = new ID("", -1, 0);

  constructor(
    readonly symbolPath: string,
    readonly postOrderId = -1,
    /** Number of nodes numbered before this one that it contains. */
    readonly numChildIds = 0,
  ) {}

  isEmpty(): boolean {
    return this.symbolPath === "";
  }

  isSymbol(): boolean {
    return this.postOrderId < 0;
  }

  /** The declared name of the symbol this ID belongs to, without overload suffix. */
  symbolName(): string {
    const last = this.symbolPath.slice(this.symbolPath.lastIndexOf(".") + 1);
    const hash = last.indexOf("#");
    return hash < 0 ? last : last.slice(0, hash);
  }

  moduleName(): string {
    const dot = this.symbolPath.indexOf(".");
    return dot < 0 ? this.symbolPath : this.symbolPath.slice(0, dot);
  }

  /** ID of the enclosing symbol (the symbol itself for non-symbol nodes). */
  parentSymbolId(): ID {
    if (!this.isSymbol()) return new ID(this.symbolPath);
    const dot = this.symbolPath.lastIndexOf(".");
    return dot < 0 ? ID.empty : new ID(this.symbolPath.slice(0, dot));
  }

  contains(other: ID): boolean {
    if (this.isSymbol()) {
      return (
        other.symbolPath === this.symbolPath ||
        other.symbolPath.startsWith(`${this.symbolPath}.`)
      );
    }
    return (
      other.symbolPath === this.symbolPath &&
      other.postOrderId <= this.postOrderId &&
      other.postOrderId >= this.postOrderId - this.numChildIds
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ID &&
      other.symbolPath === this.symbolPath &&
      other.postOrderId === this.postOrderId
    );
  }

  compare(other: ID): number {
    if (this.symbolPath !== other.symbolPath) {
      return this.symbolPath < other.symbolPath ? -1 : 1;
    }
    return this.postOrderId - other.postOrderId;
  }

  queryKey(): string {
    return this.toString();
  }

  toString(): string {
    return this.isSymbol()
      ? this.symbolPath
      : `${this.symbolPath}@${this.postOrderId}`;
  }
}
