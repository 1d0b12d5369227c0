import { casefold, defaultLexicon, normalizeLookup, type Lexicon } from './lexicon.js';
import { KeywordNormalizer } from './normalizer.js';

export const DEFAULT_MAX_TERMS = 16;

export type StrategyLabel = 'primary' | 'basic' | 'static';

export interface Strategy {
  label: StrategyLabel;
  /** Search terms, phrases already quoted. */
  terms: string[];
}

const ASCII_ONLY = /^[\x20-\x7E]+$/;

export function quoteTerm(term: string): string {
  return /\s/.test(term) ? `"${term}"` : term;
}

export function renderQuery(strategy: Strategy): string {
  return strategy.terms.join(' OR ');
}

function toTerms(candidates: string[], maxTerms: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const candidate of candidates) {
    const key = casefold(candidate);
    if (!candidate || seen.has(key)) continue;
    seen.add(key);
    out.push(quoteTerm(candidate));
    if (out.length >= maxTerms) break;
  }
  return out;
}

/**
 * Ordered OR-query term sets: synonym-expanded first, then the folded input
 * tokens, then a static list when nothing else survives.
 */
export class QueryStrategyBuilder {
  private readonly normalizer: KeywordNormalizer;

  constructor(private readonly lexicon: Lexicon = defaultLexicon(), normalizer?: KeywordNormalizer) {
    this.normalizer = normalizer ?? new KeywordNormalizer(lexicon);
  }

  primaryTerms(prompt: string, rawKeywords: string, maxTerms: number): string[] {
    const expanded = this.normalizer.normalize(prompt, rawKeywords).filter(term => ASCII_ONLY.test(term));
    return toTerms(expanded, maxTerms);
  }

  basicTerms(prompt: string, rawKeywords: string, maxTerms: number): string[] {
    const folded = this.normalizer.baseTokens(prompt, rawKeywords).map(token => {
      // prefer a stem the lexicon knows over the inflected form
      const known = this.normalizer.lookupKeys(token.text).find(key => this.lexicon.synonyms.has(key));
      return known ?? normalizeLookup(token.text, this.lexicon);
    });
    return toTerms(folded.filter(term => term.length >= 3 && ASCII_ONLY.test(term)), maxTerms);
  }

  build(prompt: string, rawKeywords = '', maxTerms = DEFAULT_MAX_TERMS): Strategy[] {
    if (!prompt.trim() && !rawKeywords.trim()) return [];

    const candidates: Strategy[] = [
      { label: 'primary', terms: this.primaryTerms(prompt, rawKeywords, maxTerms) },
      { label: 'basic', terms: this.basicTerms(prompt, rawKeywords, maxTerms) },
    ];
    if (candidates.every(strategy => strategy.terms.length === 0)) {
      candidates.push({ label: 'static', terms: toTerms([...this.lexicon.staticFallbackTerms], maxTerms) });
    }

    const seen = new Set<string>();
    const strategies: Strategy[] = [];
    for (const strategy of candidates) {
      if (strategy.terms.length === 0) continue;
      const key = strategy.terms.join('\u0000');
      if (seen.has(key)) continue;
      seen.add(key);
      strategies.push(strategy);
    }
    return strategies;
  }
}
