/**
 * IR types barrel exports
 * Intermediate Representation (IR) consumed by the lifecycle passes
 */

// Unit and declaration types
export type {
  IrUnit,
  IrNominalDeclaration,
  IrObjectDeclaration,
  IrDistinctDeclaration,
  IrOperatorDeclaration,
  IrProcedureDeclaration,
  LifecycleOperator,
} from "./module.js";
export { LIFECYCLE_OPERATORS } from "./module.js";

// Statement types
export type {
  IrStatement,
  IrVariableDeclaration,
  IrExpressionStatement,
  IrAssignmentStatement,
  IrReturnStatement,
  IrBlockStatement,
  IrIfStatement,
  IrWhileStatement,
  IrBreakStatement,
  IrContinueStatement,
  IrSpawnStatement,
} from "./statements.js";

// Expression types
export type {
  IrExpression,
  IrLiteralExpression,
  IrIdentifierExpression,
  IrResultExpression,
  IrCallExpression,
  IrConstructExpression,
  IrConstructorField,
  IrArrayLiteralExpression,
  IrTupleLiteralExpression,
  IrMemberAccessExpression,
  IrElementAccessExpression,
  IrConversionExpression,
  IrBinaryExpression,
} from "./expressions.js";

// Type system types
export type {
  NominalId,
  IrType,
  PrimitiveTypeName,
  IrPrimitiveType,
  IrNominalType,
  IrTypeParameterType,
  IrArrayType,
  IrSequenceType,
  IrTupleType,
  IrObjectType,
  IrField,
  IndirectionKind,
  IrIndirectionType,
  IrProcedureType,
  IrVoidType,
  IrUnknownType,
} from "./ir-types.js";

// Helper types
export type {
  NodeId,
  IrNodeBase,
  IrParameter,
  IrParameterPassing,
  IrBinaryOperator,
} from "./helpers.js";

// Type guards
export {
  isPlaceExpression,
  isValueProducingExpression,
} from "./guards.js";

// Type operations
export {
  stableIrTypeKey,
  irTypesEqual,
  formatIrType,
  substituteTypeParameters,
  bindTypeArguments,
} from "./type-ops.js";
