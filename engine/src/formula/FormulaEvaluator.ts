/**
 * Formula Evaluator
 *
 * Evaluates compute-step formulas against a set of bindings. The
 * function set is closed; there is no fallback to a general-purpose
 * interpreter.
 *
 * @example
 * ```ts
 * const evaluator = new FormulaEvaluator();
 * evaluator.evaluate('min(P_send, P_receive)', { P_send: 3200, P_receive: '3000' }); // 3000
 * ```
 *
 * @module formula
 */

import {
  TypeCoercionError,
  UnboundSymbolError,
  UnknownFunctionError,
} from '../errors/FormulaErrors.js';
import { parseFormula, type FormulaNode, type FormulaOperand } from './FormulaParser.js';

export type FormulaBindings = Readonly<Record<string, unknown>>;

type FormulaFunction = (values: readonly number[]) => number;

const FUNCTIONS: Readonly<Record<string, FormulaFunction>> = {
  min: (values) => Math.min(...values),
  max: (values) => Math.max(...values),
  sum: (values) => values.reduce((total, value) => total + value, 0),
  avg: (values) => values.reduce((total, value) => total + value, 0) / values.length,
};

export const SUPPORTED_FUNCTIONS: readonly string[] = Object.keys(FUNCTIONS);

/**
 * Read a bound value as a finite number.
 * Numbers and numeric strings coerce; everything else fails.
 */
export function coerceNumber(symbol: string, value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw new TypeCoercionError(symbol, value);
}

export class FormulaEvaluator {
  private readonly cache = new Map<string, FormulaNode>();

  /**
   * Evaluate `formula` with `bindings`
   *
   * @throws FormulaSyntaxError, UnknownFunctionError, UnboundSymbolError, TypeCoercionError
   */
  evaluate(formula: string, bindings: FormulaBindings): number {
    const node = this.parse(formula);

    if (node.type !== 'call') {
      return this.resolveOperand(node, bindings, formula);
    }

    if (!Object.hasOwn(FUNCTIONS, node.name)) {
      throw new UnknownFunctionError(node.name, SUPPORTED_FUNCTIONS);
    }
    const values = node.args.map((arg) => this.resolveOperand(arg, bindings, formula));
    return FUNCTIONS[node.name](values);
  }

  /**
   * Symbols a formula reads, in order of first appearance
   */
  symbols(formula: string): string[] {
    const node = this.parse(formula);
    const operands = node.type === 'call' ? node.args : [node];
    const names: string[] = [];
    for (const operand of operands) {
      if (operand.type === 'symbol' && !names.includes(operand.name)) {
        names.push(operand.name);
      }
    }
    return names;
  }

  private parse(formula: string): FormulaNode {
    let node = this.cache.get(formula);
    if (!node) {
      node = parseFormula(formula);
      this.cache.set(formula, node);
    }
    return node;
  }

  private resolveOperand(operand: FormulaOperand, bindings: FormulaBindings, formula: string): number {
    if (operand.type === 'number') {
      return operand.value;
    }
    if (!Object.hasOwn(bindings, operand.name)) {
      throw new UnboundSymbolError(operand.name, formula);
    }
    return coerceNumber(operand.name, bindings[operand.name]);
  }
}
