/**
 * Keyword lists used by the complexity classifier
 *
 * English words match as whole words (case-insensitive, optional plural
 * "s"/"es"); Chinese phrases match as substrings.
 *
 * @module analysis
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../errors/ValidationErrors.js';
import { errorMessage } from '../errors/PlanEngineError.js';

const KeywordSetSchema = z.object({
  words: z.array(z.string().min(1)),
  phrases: z.array(z.string().min(1)),
});

export const KeywordFileSchema = z.object({
  conditional: KeywordSetSchema,
  formulaConditional: z.array(z.string().min(1)),
  aggregateFunctions: z.array(z.string().min(1)),
  domains: z.record(z.string(), KeywordSetSchema),
});

export type KeywordSet = z.infer<typeof KeywordSetSchema>;
export type KeywordFile = z.infer<typeof KeywordFileSchema>;

export const DEFAULT_KEYWORDS_URL = new URL('./keywords.json', import.meta.url);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordPattern(words: readonly string[], plurals: boolean): RegExp | null {
  if (words.length === 0) {
    return null;
  }
  const alternatives = words.map(escapeRegExp).join('|');
  return new RegExp(`\\b(?:${alternatives})${plurals ? '(?:s|es)?' : ''}\\b`, 'i');
}

class KeywordMatcher {
  private readonly pattern: RegExp | null;
  private readonly phrases: readonly string[];

  constructor(set: KeywordSet) {
    this.pattern = wordPattern(set.words, true);
    this.phrases = set.phrases;
  }

  matches(text: string): boolean {
    if (this.pattern?.test(text)) {
      return true;
    }
    return this.phrases.some((phrase) => text.includes(phrase));
  }
}

export class KeywordLexicon {
  private static cached: KeywordLexicon | null = null;

  private readonly conditional: KeywordMatcher;
  private readonly formulaConditional: RegExp | null;
  private readonly aggregates: readonly string[];
  private readonly domainMatchers: ReadonlyArray<{ domain: string; matcher: KeywordMatcher }>;

  constructor(data: KeywordFile) {
    this.conditional = new KeywordMatcher(data.conditional);
    this.formulaConditional = wordPattern(data.formulaConditional, false);
    this.aggregates = [...data.aggregateFunctions];
    this.domainMatchers = Object.entries(data.domains).map(([domain, set]) => ({
      domain,
      matcher: new KeywordMatcher(set),
    }));
  }

  /**
   * Read and validate a keyword file
   *
   * @throws ConfigError when the file is unreadable or malformed
   */
  static load(location: URL | string = DEFAULT_KEYWORDS_URL): KeywordLexicon {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(location, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Cannot read keyword file ${String(location)}: ${errorMessage(error)}`);
    }

    const parsed = KeywordFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(
        `Invalid keyword file ${String(location)}: ${issue.path.join('.')} ${issue.message}`,
        issue.path.join('.')
      );
    }
    return new KeywordLexicon(parsed.data);
  }

  /**
   * The bundled keyword lists, loaded once
   */
  static default(): KeywordLexicon {
    if (!this.cached) {
      this.cached = this.load();
    }
    return this.cached;
  }

  hasConditionalLanguage(text: string): boolean {
    return this.conditional.matches(text);
  }

  hasFormulaConditional(formula: string): boolean {
    return this.formulaConditional?.test(formula) ?? false;
  }

  /**
   * Aggregate/statistical function names contained in a formula, matched as
   * substrings: `P_max_send` counts as `max`
   */
  aggregatesIn(formula: string): string[] {
    return this.aggregates.filter((name) => formula.includes(name));
  }

  /**
   * Domain buckets hit by the text, in declaration order
   */
  domainsIn(text: string): string[] {
    return this.domainMatchers.filter(({ matcher }) => matcher.matches(text)).map(({ domain }) => domain);
  }
}
