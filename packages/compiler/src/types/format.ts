import { paramToString } from "./params.js";
import type { QualifiedType } from "./qualified-type.js";
import type { TypeArena, TypeId } from "./type-arena.js";

const defaultWidth = (name: string): number =>
  name === "int" || name === "uint" || name === "real" ? 64 : 0;

export const typeToString = (arena: TypeArena, id: TypeId): string => {
  const desc = arena.get(id);
  switch (desc.kind) {
    case "primitive":
      if (desc.bitWidth === 0 && defaultWidth(desc.name) !== 0) {
        return `${desc.name}(?)`;
      }
      return desc.bitWidth === defaultWidth(desc.name)
        ? desc.name
        : `${desc.name}(${desc.bitWidth})`;
    case "any":
      return "?";
    case "any-class":
      return "class";
    case "unknown":
      return "unknown";
    case "erroneous":
      return "<error>";
    case "record":
    case "basic-class": {
      if (desc.substitutions.length === 0) return desc.name;
      const args = desc.substitutions.map(({ type }) => {
        if (type.param) return paramToString(type.param);
        return type.type === undefined ? "?" : typeToString(arena, type.type);
      });
      return `${desc.name}(${args.join(", ")})`;
    }
    case "class": {
      const management =
        desc.management === "generic" ? "" : `${desc.management} `;
      const nilable = desc.nilability === "nilable" ? "?" : "";
      return `${management}${typeToString(arena, desc.manageable)}${nilable}`;
    }
    case "tuple": {
      const elements = desc.elements.map((element) =>
        typeToString(arena, element),
      );
      return `(${elements.join(", ")}${elements.length === 1 ? "," : ""})`;
    }
    case "vararg-tuple":
      return `...${desc.count ?? ""}${typeToString(arena, desc.element)}`;
    case "domain":
      return `domain(${desc.rank ?? "?"})`;
    case "array":
      return `[${typeToString(arena, desc.domain)}] ${typeToString(arena, desc.element)}`;
    case "c-ptr":
      return desc.element === undefined
        ? "c_ptr"
        : `c_ptr(${typeToString(arena, desc.element)})`;
  }
};

/** Params print as their value, types as `type T`, values as their type. */
export const qualifiedTypeToString = (
  arena: TypeArena,
  qt: QualifiedType,
): string => {
  if (qt.param) return paramToString(qt.param);
  if (qt.type === undefined) return qt.kind;
  const type = typeToString(arena, qt.type);
  return qt.isType() ? `type ${type}` : type;
};
