/**
 * Plan input parsing for `gridplan run`
 *
 * @module utils
 */

import { readFile } from 'node:fs/promises';
import { InvalidArgumentError } from 'commander';
import YAML from 'yaml';
import { ConfigError, errorMessage } from '@gridplan/engine';

const NUMBER = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * `"3200"` → 3200, `"true"` → true, anything else stays a string
 */
export function coerceInputValue(raw: string): unknown {
  const value = raw.trim();
  if (NUMBER.test(value)) return Number(value);
  if (value === 'true') return true;
  if (value === 'false') return false;
  return raw;
}

/**
 * Parse one `key=value` pair. The value may itself contain `=`.
 *
 * @throws InvalidArgumentError when there is no `=` or the key is empty
 */
export function parseKeyValue(pair: string): [string, unknown] {
  const index = pair.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${pair}".`);
  }
  const key = pair.slice(0, index).trim();
  if (key === '') {
    throw new InvalidArgumentError(`Expected key=value, got "${pair}".`);
  }
  return [key, coerceInputValue(pair.slice(index + 1))];
}

export function parseKeyValuePairs(pairs: readonly string[]): Record<string, unknown> {
  return Object.fromEntries(pairs.map(parseKeyValue));
}

/**
 * commander collector for repeated `--input key=value`
 */
export function collectInput(pair: string, previous: Record<string, unknown>): Record<string, unknown> {
  const [key, value] = parseKeyValue(pair);
  return { ...previous, [key]: value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read plan inputs from a YAML or JSON file holding one mapping
 */
export async function loadInputsFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: unknown;
  try {
    raw = YAML.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read inputs file ${filePath}: ${errorMessage(error)}`, filePath);
  }
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Inputs file ${filePath} must contain a mapping of input names to values`, filePath);
  }
  return raw;
}
