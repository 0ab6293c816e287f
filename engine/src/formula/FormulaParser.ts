/**
 * Formula parser
 *
 * Grammar (closed):
 *
 *   formula := call | operand
 *   call    := IDENT "(" operand ("," operand)* ")"
 *   operand := IDENT | NUMBER
 *
 * Anything else, including nested calls and arithmetic operators, is a
 * FormulaSyntaxError.
 *
 * @module formula
 */

import { FormulaSyntaxError } from '../errors/FormulaErrors.js';

export type FormulaOperand =
  | { readonly type: 'symbol'; readonly name: string }
  | { readonly type: 'number'; readonly value: number };

export type FormulaNode =
  | FormulaOperand
  | { readonly type: 'call'; readonly name: string; readonly args: readonly FormulaOperand[] };

type Token =
  | { kind: 'ident'; text: string; pos: number }
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'lparen' | 'rparen' | 'comma'; pos: number };

const IDENT = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER = /-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;

function tokenize(formula: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < formula.length) {
    const ch = formula[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }
    if (ch === '(') {
      tokens.push({ kind: 'lparen', pos });
      pos++;
      continue;
    }
    if (ch === ')') {
      tokens.push({ kind: 'rparen', pos });
      pos++;
      continue;
    }
    if (ch === ',') {
      tokens.push({ kind: 'comma', pos });
      pos++;
      continue;
    }

    IDENT.lastIndex = pos;
    const ident = IDENT.exec(formula);
    if (ident) {
      tokens.push({ kind: 'ident', text: ident[0], pos });
      pos += ident[0].length;
      continue;
    }

    NUMBER.lastIndex = pos;
    const number = NUMBER.exec(formula);
    if (number) {
      tokens.push({ kind: 'number', value: Number(number[0]), pos });
      pos += number[0].length;
      continue;
    }

    throw new FormulaSyntaxError(formula, `unexpected character "${ch}"`, pos);
  }

  return tokens;
}

/**
 * Parse formula text into a single node
 */
export function parseFormula(formula: string): FormulaNode {
  const tokens = tokenize(formula);
  let index = 0;

  const peek = (): Token | undefined => tokens[index];
  const fail = (detail: string, token?: Token): never => {
    throw new FormulaSyntaxError(formula, detail, token?.pos);
  };

  const operand = (): FormulaOperand => {
    const token = tokens[index];
    if (token === undefined) {
      return fail('expected a symbol or number, found end of formula');
    }
    if (token.kind === 'number') {
      index++;
      return { type: 'number', value: token.value };
    }
    if (token.kind === 'ident') {
      if (tokens[index + 1]?.kind === 'lparen') {
        return fail(`nested call "${token.text}(...)" is not supported`, token);
      }
      index++;
      return { type: 'symbol', name: token.text };
    }
    return fail('expected a symbol or number', token);
  };

  if (tokens.length === 0) {
    return fail('formula is empty');
  }

  let node: FormulaNode;
  const first = tokens[0];
  if (first.kind === 'ident' && tokens[1]?.kind === 'lparen') {
    index = 2;
    const args: FormulaOperand[] = [operand()];
    while (peek()?.kind === 'comma') {
      index++;
      args.push(operand());
    }
    const close = peek();
    if (close?.kind !== 'rparen') {
      return fail('expected "," or ")"', close);
    }
    index++;
    node = { type: 'call', name: first.text, args };
  } else {
    node = operand();
  }

  const trailing = peek();
  if (trailing !== undefined) {
    return fail('unexpected input after the formula', trailing);
  }
  return node;
}
