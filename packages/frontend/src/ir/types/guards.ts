/**
 * Type guard helper functions
 */

import { IrExpression } from "./expressions.js";

/**
 * Expressions that name existing storage rather than produce a new value.
 */
export const isPlaceExpression = (expr: IrExpression): boolean => {
  switch (expr.kind) {
    case "identifier":
    case "result":
    case "memberAccess":
    case "elementAccess":
      return true;
    case "conversion":
      return isPlaceExpression(expr.expression);
    default:
      return false;
  }
};

export const isValueProducingExpression = (expr: IrExpression): boolean =>
  !isPlaceExpression(expr);
