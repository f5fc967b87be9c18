import { ID } from "../syntax/id.js";
import type { QualifiedType } from "./qualified-type.js";

export type TypeId = number;

export type PrimitiveName =
  | "int"
  | "uint"
  | "real"
  | "bool"
  | "string"
  | "bytes"
  | "nothing"
  | "void";

/** A field declaration bound to a type or param in an instantiation. */
export type Substitution = {
  readonly field: ID;
  readonly type: QualifiedType;
};

export type ClassManagement =
  | "owned"
  | "shared"
  | "unmanaged"
  | "borrowed"
  | "generic";

export type Nilability = "non-nil" | "nilable" | "generic";

export interface PrimitiveType {
  kind: "primitive";
  name: PrimitiveName;
  /** 0 for types without a width. */
  bitWidth: number;
}

export interface CompositeTypeBase {
  decl: ID;
  name: string;
  substitutions: readonly Substitution[];
  instantiatedFrom?: TypeId;
}

export interface RecordType extends CompositeTypeBase {
  kind: "record";
}

export interface BasicClassType extends CompositeTypeBase {
  kind: "basic-class";
  parent?: TypeId;
}

export interface ClassType {
  kind: "class";
  manageable: TypeId;
  management: ClassManagement;
  nilability: Nilability;
}

export interface TupleType {
  kind: "tuple";
  elements: readonly TypeId[];
  referential: boolean;
}

/** The type of a variadic formal before its actuals are known. */
export interface VarArgTupleType {
  kind: "vararg-tuple";
  element: TypeId;
  count?: number;
}

export interface DomainType {
  kind: "domain";
  rank?: number;
}

export interface ArrayType {
  kind: "array";
  domain: TypeId;
  element: TypeId;
}

export interface CPtrType {
  kind: "c-ptr";
  element?: TypeId;
}

export type TypeDescriptor =
  | PrimitiveType
  | { kind: "any" }
  | { kind: "any-class" }
  | { kind: "unknown" }
  | { kind: "erroneous" }
  | RecordType
  | BasicClassType
  | ClassType
  | TupleType
  | VarArgTupleType
  | DomainType
  | ArrayType
  | CPtrType;

export type CompositeType = RecordType | BasicClassType;

/** IDs every arena assigns to built-in types, in creation order. */
export const Types = {
  unknown: 0,
  erroneous: 1,
  any: 2,
  anyClass: 3,
  object: 4,
  nothing: 5,
  void: 6,
  bool: 7,
  string: 8,
  bytes: 9,
  int8: 10,
  int16: 11,
  int32: 12,
  int: 13,
  uint8: 14,
  uint16: 15,
  uint32: 16,
  uint: 17,
  real32: 18,
  real: 19,
} as const satisfies Record<string, TypeId>;

export const INT_WIDTHS: readonly number[] = [8, 16, 32, 64];
export const REAL_WIDTHS: readonly number[] = [32, 64];

const builtinDescriptors = (): TypeDescriptor[] => [
  { kind: "unknown" },
  { kind: "erroneous" },
  { kind: "any" },
  { kind: "any-class" },
  { kind: "basic-class", decl: ID.empty, name: "object", substitutions: [] },
  { kind: "primitive", name: "nothing", bitWidth: 0 },
  { kind: "primitive", name: "void", bitWidth: 0 },
  { kind: "primitive", name: "bool", bitWidth: 0 },
  { kind: "primitive", name: "string", bitWidth: 0 },
  { kind: "primitive", name: "bytes", bitWidth: 0 },
  ...INT_WIDTHS.map(
    (bitWidth): TypeDescriptor => ({ kind: "primitive", name: "int", bitWidth }),
  ),
  ...INT_WIDTHS.map(
    (bitWidth): TypeDescriptor => ({ kind: "primitive", name: "uint", bitWidth }),
  ),
  ...REAL_WIDTHS.map(
    (bitWidth): TypeDescriptor => ({ kind: "primitive", name: "real", bitWidth }),
  ),
];

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  size(): number;
  internPrimitive(name: PrimitiveName, bitWidth?: number): TypeId;
  internRecord(desc: Omit<RecordType, "kind">): TypeId;
  internBasicClass(desc: Omit<BasicClassType, "kind">): TypeId;
  internClass(desc: Omit<ClassType, "kind">): TypeId;
  internTuple(elements: readonly TypeId[], referential?: boolean): TypeId;
  internVarArgTuple(element: TypeId, count?: number): TypeId;
  internDomain(rank?: number): TypeId;
  internArray(domain: TypeId, element: TypeId): TypeId;
  internCPtr(element?: TypeId): TypeId;
  getComposite(id: TypeId): CompositeType | undefined;
}

const defaultBitWidth = (name: PrimitiveName): number => {
  switch (name) {
    case "int":
    case "uint":
    case "real":
      return 64;
    default:
      return 0;
  }
};

export const createTypeArena = (): TypeArena => {
  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();

  const keyFor = (desc: TypeDescriptor): string =>
    JSON.stringify(desc, (key, value: unknown) => {
      if (key === "decl" || key === "field") return String(value);
      return value;
    });

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = descriptors.length;
    descriptors.push(desc);
    descriptorCache.set(key, id);
    return id;
  };

  builtinDescriptors().forEach(storeDescriptor);

  const getDescriptor = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }
    return desc;
  };

  return {
    get: getDescriptor,
    size: () => descriptors.length,
    internPrimitive: (name, bitWidth = defaultBitWidth(name)) =>
      storeDescriptor({ kind: "primitive", name, bitWidth }),
    internRecord: (desc) =>
      storeDescriptor({
        kind: "record",
        decl: desc.decl,
        name: desc.name,
        substitutions: [...desc.substitutions],
        instantiatedFrom: desc.instantiatedFrom,
      }),
    internBasicClass: (desc) =>
      storeDescriptor({
        kind: "basic-class",
        decl: desc.decl,
        name: desc.name,
        substitutions: [...desc.substitutions],
        instantiatedFrom: desc.instantiatedFrom,
        parent: desc.parent,
      }),
    internClass: (desc) =>
      storeDescriptor({
        kind: "class",
        manageable: desc.manageable,
        management: desc.management,
        nilability: desc.nilability,
      }),
    internTuple: (elements, referential = false) =>
      storeDescriptor({ kind: "tuple", elements: [...elements], referential }),
    internVarArgTuple: (element, count) =>
      storeDescriptor({ kind: "vararg-tuple", element, count }),
    internDomain: (rank) => storeDescriptor({ kind: "domain", rank }),
    internArray: (domain, element) =>
      storeDescriptor({ kind: "array", domain, element }),
    internCPtr: (element) => storeDescriptor({ kind: "c-ptr", element }),
    getComposite: (id) => {
      const desc = getDescriptor(id);
      return desc.kind === "record" || desc.kind === "basic-class"
        ? desc
        : undefined;
    },
  };
};
