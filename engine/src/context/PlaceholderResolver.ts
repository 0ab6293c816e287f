/**
 * Placeholder Resolver
 *
 * Resolves `{symbol}` placeholders in step queries and inputs against a
 * VariableTable.
 *
 * - A string that is exactly one placeholder resolves to the bound value
 *   itself (a number stays a number).
 * - Placeholders inside longer text are replaced by the value's natural
 *   string form.
 * - Unresolved placeholders stay verbatim and are reported to the caller.
 *
 * @module context
 */

import type { VariableTable } from './VariableTable.js';

const PLACEHOLDER = /\{([^{}]+)\}/g;
const SINGLE_PLACEHOLDER = /^\{([^{}]+)\}$/;

export interface ResolvedText {
  text: string;
  /** Symbols that had no value, in order of appearance */
  unresolved: string[];
}

export interface ResolvedValue {
  value: unknown;
  unresolved: string[];
}

/**
 * Natural string form of a bound value
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

export class PlaceholderResolver {
  /**
   * Replace every `{symbol}` in `text`
   */
  static resolveText(text: string, table: VariableTable): ResolvedText {
    const unresolved: string[] = [];
    const resolved = text.replace(PLACEHOLDER, (match, raw: string) => {
      const symbol = raw.trim();
      if (!table.has(symbol)) {
        if (!unresolved.includes(symbol)) unresolved.push(symbol);
        return match;
      }
      return formatValue(table.get(symbol));
    });
    return { text: resolved, unresolved };
  }

  /**
   * Resolve one input value. Non-string values pass through.
   */
  static resolveValue(value: unknown, table: VariableTable): ResolvedValue {
    if (typeof value !== 'string') {
      return { value, unresolved: [] };
    }

    const symbol = this.referenceOf(value);
    if (symbol !== undefined) {
      return table.has(symbol)
        ? { value: table.get(symbol), unresolved: [] }
        : { value, unresolved: [symbol] };
    }

    const { text, unresolved } = this.resolveText(value, table);
    return { value: text, unresolved };
  }

  /**
   * The symbol a value refers to when it is exactly one placeholder
   */
  static referenceOf(value: unknown): string | undefined {
    if (typeof value !== 'string') return undefined;
    const match = SINGLE_PLACEHOLDER.exec(value.trim());
    return match ? match[1].trim() : undefined;
  }

  /**
   * Symbols referenced by placeholders in `text`, in order, without duplicates
   */
  static extractSymbols(text: string): string[] {
    const symbols: string[] = [];
    for (const match of text.matchAll(PLACEHOLDER)) {
      const symbol = match[1].trim();
      if (!symbols.includes(symbol)) symbols.push(symbol);
    }
    return symbols;
  }

  /**
   * Symbols referenced anywhere in a step's string inputs
   */
  static symbolsInInputs(inputs: Readonly<Record<string, unknown>>): string[] {
    const symbols: string[] = [];
    for (const value of Object.values(inputs)) {
      if (typeof value !== 'string') continue;
      for (const symbol of this.extractSymbols(value)) {
        if (!symbols.includes(symbol)) symbols.push(symbol);
      }
    }
    return symbols;
  }
}
