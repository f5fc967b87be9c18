import { murmurHash3 } from "@rezo/lib/murmur-hash.js";
import { ID } from "./id.js";
import type { AstNode } from "./nodes.js";

const canonicalCache = new WeakMap<AstNode, string>();

/** Location-free serialization: equal text means equal declarations. */
export const canonicalText = (node: AstNode): string => {
  const cached = canonicalCache.get(node);
  if (cached !== undefined) return cached;
  const text = JSON.stringify(node, (key, value: unknown) => {
    if (key === "span") return undefined;
    if (value instanceof ID) return value.toString();
    return value;
  });
  canonicalCache.set(node, text);
  return text;
};

export const fingerprint = (node: AstNode): number =>
  murmurHash3(canonicalText(node));

export const nodesEqual = (
  left: AstNode | undefined,
  right: AstNode | undefined,
): boolean => {
  if (left === right) return true;
  if (!left || !right) return false;
  return (
    fingerprint(left) === fingerprint(right) &&
    canonicalText(left) === canonicalText(right)
  );
};
