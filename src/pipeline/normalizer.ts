import {
  casefold,
  defaultLexicon,
  foldAscii,
  normalizeLookup,
  type Lexicon,
} from './lexicon.js';

export const MIN_TOKEN_LENGTH = 3;

export interface Token {
  text: string;
  /** Tokens share a run when they came from the same unquoted stretch of one input. */
  run: number;
  position: number;
  phrase: boolean;
}

export interface NormalizedKeywords {
  tokens: Token[];
  /** Synonym-driven candidates, in input order. */
  expansions: string[];
  /** Tokens with no synonym match, plus their ASCII folds. */
  literals: string[];
  /** expansions followed by literals, deduplicated case-insensitively. */
  terms: string[];
}

/**
 * Splits on whitespace while keeping quoted segments together.
 * Returns null when a quote is left open.
 */
export function shellSplit(text: string): string[] | null {
  const parts: string[] = [];
  let current = '';
  let inPart = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && (text.charAt(i + 1) === '"' || text.charAt(i + 1) === '\\')) {
        current += text.charAt(++i);
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inPart = true;
    } else if (ch === '\\' && i + 1 < text.length) {
      current += text.charAt(++i);
      inPart = true;
    } else if (/\s/.test(ch)) {
      if (inPart) {
        parts.push(current);
        current = '';
        inPart = false;
      }
    } else {
      current += ch;
      inPart = true;
    }
  }

  if (quote) return null;
  if (inPart) parts.push(current);
  return parts;
}

export class KeywordNormalizer {
  constructor(private readonly lexicon: Lexicon = defaultLexicon()) {}

  foldAscii(text: string): string {
    return foldAscii(text, this.lexicon);
  }

  isStopword(text: string): boolean {
    const folded = casefold(text);
    return this.lexicon.stopwords.has(folded) || this.lexicon.stopwords.has(this.foldAscii(folded));
  }

  private isCandidate(text: string): boolean {
    return text.length >= MIN_TOKEN_LENGTH && !this.isStopword(text);
  }

  /** Cleans and casefolds one input; no stopword or length filtering yet. */
  tokenize(text: string, firstRun = 0): Token[] {
    if (!text || !text.trim()) return [];
    const parts = shellSplit(text) ?? text.split(/\s+/).filter(Boolean);

    const out: Token[] = [];
    let run = firstRun;
    let position = 0;
    for (const part of parts) {
      if (!part) continue;
      const chunks = part.replace(this.lexicon.cleanPattern, ' ').split(/\s+/).filter(Boolean);
      if (/\s/.test(part)) {
        // quoted phrase: one token, and it breaks adjacency on both sides
        const phrase = chunks.map(casefold).join(' ');
        run++;
        if (phrase) out.push({ text: phrase, run, position: 0, phrase: true });
        run++;
        position = 0;
        continue;
      }
      for (const chunk of chunks) {
        out.push({ text: casefold(chunk), run, position: position++, phrase: false });
      }
    }
    return out;
  }

  /** Prompt and keyword tokens, stopword- and length-filtered, first-seen order. */
  baseTokens(prompt: string, rawKeywords = ''): Token[] {
    const fromPrompt = this.tokenize(prompt, 0);
    const nextRun = fromPrompt.reduce((max, t) => Math.max(max, t.run), 0) + 1;
    const all = [...fromPrompt, ...this.tokenize(rawKeywords, nextRun)];

    const seen = new Set<string>();
    const out: Token[] = [];
    for (const token of all) {
      if (!this.isCandidate(token.text)) continue;
      if (seen.has(token.text)) continue;
      seen.add(token.text);
      out.push(token);
    }
    return out;
  }

  /**
   * Every tail the suffix table can remove once, leaving at least three characters.
   * Stems are never stripped a second time.
   */
  stripSuffix(key: string): string[] {
    const stems: string[] = [];
    for (const suffix of this.lexicon.suffixes) {
      if (key.length - suffix.length < MIN_TOKEN_LENGTH) continue;
      if (!key.endsWith(suffix)) continue;
      const stem = key.slice(0, key.length - suffix.length);
      if (!stems.includes(stem)) stems.push(stem);
    }
    return stems;
  }

  private soften(stem: string): string | null {
    const last = stem.charAt(stem.length - 1);
    const replacement = this.lexicon.softening.get(last);
    if (!replacement) return null;
    const softened = this.foldAscii(stem.slice(0, -1) + replacement);
    return softened === stem ? null : softened;
  }

  lookupKeys(text: string): string[] {
    const key = normalizeLookup(text, this.lexicon);
    if (!key) return [];
    const keys = [key];

    // phrases only inflect their last word
    const cut = key.lastIndexOf(' ');
    const head = key.slice(0, cut + 1);
    for (const stem of this.stripSuffix(key.slice(cut + 1))) {
      for (const candidate of [stem, this.soften(stem)]) {
        if (candidate && !keys.includes(head + candidate)) keys.push(head + candidate);
      }
    }
    return keys;
  }

  /** First lookup key with a synonym entry. */
  matchSynonym(text: string): { key: string; synonyms: readonly string[] } | null {
    for (const key of this.lookupKeys(text)) {
      const synonyms = this.lexicon.synonyms.get(key);
      if (synonyms) return { key, synonyms };
    }
    return null;
  }

  private matchPair(first: Token, second: Token): readonly string[] | null {
    if (first.phrase || second.phrase) return null;
    if (first.run !== second.run || second.position !== first.position + 1) return null;
    const head = normalizeLookup(first.text, this.lexicon);
    for (const tail of this.lookupKeys(second.text)) {
      const synonyms = this.lexicon.synonyms.get(`${head} ${tail}`);
      if (synonyms) return synonyms;
    }
    return null;
  }

  expand(prompt: string, rawKeywords = ''): NormalizedKeywords {
    const tokens = this.baseTokens(prompt, rawKeywords);
    const expansions: string[] = [];
    const literals: string[] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      const next = tokens[i + 1];

      const pair = next ? this.matchPair(token, next) : null;
      if (pair) {
        expansions.push(...pair);
        i++;
        continue;
      }

      const match = this.matchSynonym(token.text);
      if (match) {
        expansions.push(...match.synonyms);
      } else {
        literals.push(token.text, this.foldAscii(token.text));
      }
    }

    const seen = new Set<string>();
    const terms: string[] = [];
    for (const candidate of [...expansions, ...literals]) {
      const cleaned = candidate.trim();
      if (!this.isCandidate(cleaned)) continue;
      const key = casefold(cleaned);
      if (seen.has(key)) continue;
      seen.add(key);
      terms.push(cleaned);
    }

    return { tokens, expansions, literals, terms };
  }

  normalize(prompt: string, rawKeywords = ''): string[] {
    return this.expand(prompt, rawKeywords).terms;
  }
}
