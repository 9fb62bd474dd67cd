import type { IrField, IrType } from "./ir-types.js";

const fieldKey = (field: IrField): string =>
  `${field.name}:${stableIrTypeKey(field.type)}`;

/**
 * Canonical structural key for a type.
 * Nominal types are keyed by declaration identity, never by spelling.
 */
export const stableIrTypeKey = (type: IrType): string => {
  switch (type.kind) {
    case "primitiveType":
      return `prim:${type.name}`;
    case "nominalType": {
      const args = type.typeArguments ?? [];
      return args.length === 0
        ? `nom:${type.id}`
        : `nom:${type.id}<${args.map(stableIrTypeKey).join(",")}>`;
    }
    case "typeParameterType":
      return `tp:${type.name}`;
    case "arrayType":
      return `arr:${type.length}:${stableIrTypeKey(type.elementType)}`;
    case "sequenceType":
      return `seq:${stableIrTypeKey(type.elementType)}`;
    case "tupleType":
      return `tup(${type.elementTypes.map(stableIrTypeKey).join(",")})`;
    case "objectType":
      return `obj{${type.fields.map(fieldKey).join(";")}}`;
    case "indirectionType":
      return `${type.indirection}:${stableIrTypeKey(type.pointee)}`;
    case "procedureType":
      return `proc(${type.parameters.map(stableIrTypeKey).join(",")}):${stableIrTypeKey(type.returnType)}`;
    case "voidType":
      return "void";
    case "unknownType":
      return "unknown";
  }
};

export const irTypesEqual = (left: IrType, right: IrType): boolean =>
  stableIrTypeKey(left) === stableIrTypeKey(right);

/**
 * Human-readable type, as used in diagnostics and annotations.
 */
export const formatIrType = (type: IrType): string => {
  switch (type.kind) {
    case "primitiveType":
      return type.name;
    case "nominalType": {
      const args = type.typeArguments ?? [];
      return args.length === 0
        ? type.name
        : `${type.name}<${args.map(formatIrType).join(", ")}>`;
    }
    case "typeParameterType":
      return type.name;
    case "arrayType":
      return `Arr<${type.length}, ${formatIrType(type.elementType)}>`;
    case "sequenceType":
      return `Seq<${formatIrType(type.elementType)}>`;
    case "tupleType":
      return `[${type.elementTypes.map(formatIrType).join(", ")}]`;
    case "objectType":
      return `{ ${type.fields
        .map((f) => `${f.name}: ${formatIrType(f.type)}`)
        .join("; ")} }`;
    case "indirectionType":
      return `${type.indirection === "ref" ? "Ref" : "Ptr"}<${formatIrType(type.pointee)}>`;
    case "procedureType":
      return `(${type.parameters.map(formatIrType).join(", ")}) => ${formatIrType(type.returnType)}`;
    case "voidType":
      return "void";
    case "unknownType":
      return "unknown";
  }
};

/**
 * Replace type parameters by their bound arguments.
 * Unbound type parameters are left in place.
 */
export const substituteTypeParameters = (
  type: IrType,
  bindings: ReadonlyMap<string, IrType>
): IrType => {
  if (bindings.size === 0) return type;

  const substitute = (t: IrType): IrType =>
    substituteTypeParameters(t, bindings);

  switch (type.kind) {
    case "typeParameterType":
      return bindings.get(type.name) ?? type;
    case "nominalType":
      return type.typeArguments
        ? { ...type, typeArguments: type.typeArguments.map(substitute) }
        : type;
    case "arrayType":
    case "sequenceType":
      return { ...type, elementType: substitute(type.elementType) };
    case "tupleType":
      return { ...type, elementTypes: type.elementTypes.map(substitute) };
    case "objectType":
      return {
        ...type,
        fields: type.fields.map((f) => ({ ...f, type: substitute(f.type) })),
      };
    case "indirectionType":
      return { ...type, pointee: substitute(type.pointee) };
    case "procedureType":
      return {
        ...type,
        parameters: type.parameters.map(substitute),
        returnType: substitute(type.returnType),
      };
    default:
      return type;
  }
};

/**
 * Build the binding map for a generic declaration instantiated with `args`.
 * Missing arguments leave their parameter unbound.
 */
export const bindTypeArguments = (
  typeParameters: readonly string[],
  args: readonly IrType[] | undefined
): ReadonlyMap<string, IrType> => {
  const bindings = new Map<string, IrType>();
  typeParameters.forEach((name, i) => {
    const arg = args?.[i];
    if (arg) bindings.set(name, arg);
  });
  return bindings;
};
