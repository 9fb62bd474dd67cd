/**
 * Type system types for IR (IrType and its variants)
 */

/**
 * Identity of a nominal declaration (file + declared name).
 */
export type NominalId = string;

export type IrType =
  | IrPrimitiveType
  | IrNominalType
  | IrTypeParameterType
  | IrArrayType
  | IrSequenceType
  | IrTupleType
  | IrObjectType
  | IrIndirectionType
  | IrProcedureType
  | IrVoidType
  | IrUnknownType;

export type PrimitiveTypeName =
  | "int"
  | "float"
  | "number"
  | "byte"
  | "char"
  | "bool"
  | "string";

export type IrPrimitiveType = {
  readonly kind: "primitiveType";
  readonly name: PrimitiveTypeName;
};

/**
 * Reference to a declared object or distinct type.
 * Generic declarations are instantiated through typeArguments.
 */
export type IrNominalType = {
  readonly kind: "nominalType";
  readonly id: NominalId;
  readonly name: string;
  readonly typeArguments?: readonly IrType[];
};

export type IrTypeParameterType = {
  readonly kind: "typeParameterType";
  readonly name: string;
};

/**
 * Fixed-length array, stored inline.
 */
export type IrArrayType = {
  readonly kind: "arrayType";
  readonly length: number;
  readonly elementType: IrType;
};

/**
 * Growable sequence. Elements live behind the sequence's own heap buffer,
 * so a sequence never embeds its element by value.
 */
export type IrSequenceType = {
  readonly kind: "sequenceType";
  readonly elementType: IrType;
};

export type IrTupleType = {
  readonly kind: "tupleType";
  readonly elementTypes: readonly IrType[];
};

export type IrField = {
  readonly name: string;
  readonly type: IrType;
};

/**
 * Anonymous object type with ordered fields (no identity of its own).
 */
export type IrObjectType = {
  readonly kind: "objectType";
  readonly fields: readonly IrField[];
};

export type IndirectionKind = "ref" | "ptr";

/**
 * Reference (`ref`) or pointer (`ptr`) indirection to a pointee.
 */
export type IrIndirectionType = {
  readonly kind: "indirectionType";
  readonly indirection: IndirectionKind;
  readonly pointee: IrType;
};

export type IrProcedureType = {
  readonly kind: "procedureType";
  readonly parameters: readonly IrType[];
  readonly returnType: IrType;
};

export type IrVoidType = {
  readonly kind: "voidType";
};

/**
 * Type the front end could not determine.
 */
export type IrUnknownType = {
  readonly kind: "unknownType";
};
