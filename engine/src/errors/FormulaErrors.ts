/**
 * Formula evaluation errors
 *
 * @module errors
 */

import { PlanEngineError } from './PlanEngineError.js';
import { PlanErrorCode } from './ErrorCodes.js';

/**
 * An operand (or compute input placeholder) names a symbol with no value
 */
export class UnboundSymbolError extends PlanEngineError {
  constructor(
    public readonly symbol: string,
    public readonly formula?: string
  ) {
    super({
      code: PlanErrorCode.FORMULA_UNBOUND_SYMBOL,
      message: formula === undefined
        ? `Symbol "${symbol}" is not bound`
        : `Symbol "${symbol}" is not bound (formula: ${formula})`,
      context: { symbol, formula },
    });
  }
}

export class UnknownFunctionError extends PlanEngineError {
  constructor(
    public readonly functionName: string,
    public readonly supported: readonly string[]
  ) {
    super({
      code: PlanErrorCode.FORMULA_UNKNOWN_FUNCTION,
      message: `Unknown formula function "${functionName}"`,
      hint: `Supported functions: ${supported.join(', ')}`,
      context: { functionName, supported: [...supported] },
    });
  }
}

/**
 * A bound value cannot be read as a finite number
 */
export class TypeCoercionError extends PlanEngineError {
  constructor(
    public readonly symbol: string,
    public readonly value: unknown
  ) {
    super({
      code: PlanErrorCode.FORMULA_TYPE_COERCION,
      message: `Value of "${symbol}" is not numeric: ${describeValue(value)}`,
      context: { symbol, value },
    });
  }
}

export class FormulaSyntaxError extends PlanEngineError {
  constructor(
    public readonly formula: string,
    detail: string,
    public readonly position?: number
  ) {
    super({
      code: PlanErrorCode.FORMULA_SYNTAX,
      message: position === undefined
        ? `Invalid formula "${formula}": ${detail}`
        : `Invalid formula "${formula}" at position ${position}: ${detail}`,
      context: { formula, position },
    });
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
