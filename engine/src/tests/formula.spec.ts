import { describe, it, expect } from 'vitest';
import {
  FormulaEvaluator,
  FormulaSyntaxError,
  TypeCoercionError,
  UnboundSymbolError,
  UnknownFunctionError,
  coerceNumber,
  parseFormula,
} from '../index.js';

describe('parseFormula', () => {
  it('parses a call with symbol and number operands', () => {
    expect(parseFormula('max(a, -2.5, 1e3)')).toEqual({
      type: 'call',
      name: 'max',
      args: [
        { type: 'symbol', name: 'a' },
        { type: 'number', value: -2.5 },
        { type: 'number', value: 1000 },
      ],
    });
  });

  it('parses a bare operand', () => {
    expect(parseFormula('  P_lim ')).toEqual({ type: 'symbol', name: 'P_lim' });
    expect(parseFormula('42')).toEqual({ type: 'number', value: 42 });
  });

  it.each([
    ['', 'Invalid formula "": formula is empty'],
    ['a + b', 'Invalid formula "a + b" at position 2: unexpected character "+"'],
    ['min(a, max(b, c))', 'Invalid formula "min(a, max(b, c))" at position 7: nested call "max(...)" is not supported'],
    ['min(a b)', 'Invalid formula "min(a b)" at position 6: expected "," or ")"'],
    ['min(a)(b)', 'Invalid formula "min(a)(b)" at position 6: unexpected input after the formula'],
  ])('rejects %j', (formula, message) => {
    expect(() => parseFormula(formula)).toThrow(FormulaSyntaxError);
    expect(() => parseFormula(formula)).toThrow(message);
  });
});

describe('FormulaEvaluator', () => {
  const evaluator = new FormulaEvaluator();

  it('evaluates each supported function', () => {
    const bindings = { a: 3200, b: '3000', c: 2800 };

    expect(evaluator.evaluate('min(a, b, c)', bindings)).toBe(2800);
    expect(evaluator.evaluate('max(a, b, c)', bindings)).toBe(3200);
    expect(evaluator.evaluate('sum(a, b, c)', bindings)).toBe(9000);
    expect(evaluator.evaluate('avg(a, b, c)', bindings)).toBe(3000);
  });

  it('returns the value of a single operand', () => {
    expect(evaluator.evaluate('a', { a: ' 12.5 ' })).toBe(12.5);
    expect(evaluator.evaluate('7', {})).toBe(7);
  });

  it('rejects functions outside the closed set', () => {
    expect(() => evaluator.evaluate('sqrt(a)', { a: 4 })).toThrow(UnknownFunctionError);
    expect(() => evaluator.evaluate('sqrt(a)', { a: 4 })).toThrow('Unknown formula function "sqrt"');
  });

  it('rejects operands without a binding', () => {
    expect(() => evaluator.evaluate('min(a, b)', { a: 1 })).toThrow(UnboundSymbolError);
    expect(() => evaluator.evaluate('min(a, b)', { a: 1 })).toThrow('Symbol "b" is not bound (formula: min(a, b))');
  });

  it('rejects values that are not numeric', () => {
    expect(() => evaluator.evaluate('min(a, b)', { a: 1, b: 'high' })).toThrow(TypeCoercionError);
    expect(() => evaluator.evaluate('min(a, b)', { a: 1, b: 'high' })).toThrow('Value of "b" is not numeric: "high"');
  });

  it('lists the symbols a formula reads', () => {
    expect(evaluator.symbols('min(a, 3, b, a)')).toEqual(['a', 'b']);
    expect(evaluator.symbols('10')).toEqual([]);
  });
});

describe('coerceNumber', () => {
  it('accepts finite numbers and numeric strings only', () => {
    expect(coerceNumber('x', 5)).toBe(5);
    expect(coerceNumber('x', '-0.5')).toBe(-0.5);
    expect(() => coerceNumber('x', Number.NaN)).toThrow(TypeCoercionError);
    expect(() => coerceNumber('x', '')).toThrow(TypeCoercionError);
    expect(() => coerceNumber('x', null)).toThrow('Value of "x" is not numeric: null');
    expect(() => coerceNumber('x', true)).toThrow(TypeCoercionError);
  });
});
