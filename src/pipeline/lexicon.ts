import fs from 'fs';
import { z } from 'zod';
import { config } from '../config.js';

// Raw shape of data/lexicon.json
export const lexiconSchema = z.object({
  stopwords: z.record(z.array(z.string())),
  asciiFold: z.record(z.string().length(1), z.string()),
  suffixes: z.array(z.string().min(1)),
  softening: z.record(z.string().length(1), z.string().length(1)).default({}),
  synonyms: z.record(z.array(z.string().min(1))),
  staticFallbackTerms: z.array(z.string().min(1)),
  curatedCommunities: z.record(z.array(z.string().min(1))).default({}),
  genericCommunities: z.array(z.string().min(1)).default([]),
});

export type LexiconData = z.input<typeof lexiconSchema>;

export interface Lexicon {
  stopwords: ReadonlySet<string>;
  foldMap: ReadonlyMap<string, string>;
  /** Characters outside the allow-list (alphanumerics, fold-table letters, `+ # - / _ .`). */
  cleanPattern: RegExp;
  /** ASCII-folded, in table order (longest first in the shipped table). */
  suffixes: readonly string[];
  softening: ReadonlyMap<string, string>;
  synonyms: ReadonlyMap<string, readonly string[]>;
  staticFallbackTerms: readonly string[];
  curatedCommunities: ReadonlyArray<readonly [string, readonly string[]]>;
  /** Lower-cased `r/<name>` entries. */
  genericCommunities: ReadonlySet<string>;
}

/**
 * Lower-cases without the Turkish locale so English `I` stays `i`;
 * dotted capital `İ` is mapped first to avoid a combining dot.
 */
export function casefold(text: string): string {
  return text.replace(/İ/g, 'i').toLowerCase();
}

export function foldAscii(text: string, lexicon: Pick<Lexicon, 'foldMap'>): string {
  let out = '';
  for (const ch of text) {
    out += lexicon.foldMap.get(ch) ?? ch;
  }
  return out;
}

/** Canonical key used for synonym and curated-table lookups. */
export function normalizeLookup(term: string, lexicon: Pick<Lexicon, 'foldMap' | 'cleanPattern'>): string {
  const cleaned = term.replace(lexicon.cleanPattern, ' ').split(/\s+/).filter(Boolean).join(' ');
  return foldAscii(casefold(cleaned), lexicon);
}

function escapeClassChar(ch: string): string {
  return /[\\\]^-]/.test(ch) ? `\\${ch}` : ch;
}

export function compileLexicon(data: LexiconData): Lexicon {
  const parsed = lexiconSchema.parse(data);

  const foldMap = new Map(Object.entries(parsed.asciiFold));
  const letters = Array.from(foldMap.keys()).map(escapeClassChar).join('');
  const cleanPattern = new RegExp(`[^0-9A-Za-z${letters}+#\\-/_.]`, 'g');
  const base = { foldMap, cleanPattern };

  const stopwords = new Set<string>();
  for (const list of Object.values(parsed.stopwords)) {
    for (const word of list) {
      const folded = casefold(word.trim());
      if (!folded) continue;
      stopwords.add(folded);
      stopwords.add(foldAscii(folded, base));
    }
  }

  const synonyms = new Map<string, readonly string[]>();
  for (const [phrase, mapped] of Object.entries(parsed.synonyms)) {
    const key = normalizeLookup(phrase, base);
    if (!key) continue;
    const existing = synonyms.get(key) ?? [];
    synonyms.set(key, [...existing, ...mapped.map(m => m.trim()).filter(Boolean)]);
  }

  const curatedCommunities = Object.entries(parsed.curatedCommunities)
    .map(([topic, subs]) => [normalizeLookup(topic, base), subs] as const)
    .filter(([topic]) => topic.length > 0);

  return {
    stopwords,
    foldMap,
    cleanPattern,
    suffixes: Array.from(new Set(parsed.suffixes.map(s => foldAscii(casefold(s), base)))),
    softening: new Map(Object.entries(parsed.softening)),
    synonyms,
    staticFallbackTerms: parsed.staticFallbackTerms,
    curatedCommunities,
    genericCommunities: new Set(parsed.genericCommunities.map(s => `r/${s.split('/').pop() ?? s}`.toLowerCase())),
  };
}

export function loadLexicon(filePath: string): Lexicon {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const result = lexiconSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid lexicon at ${filePath}: ${result.error.message}`);
  }
  return compileLexicon(result.data);
}

let defaultInstance: Lexicon | undefined;

// Loaded once per process from LEXICON_PATH (data/lexicon.json by default)
export function defaultLexicon(): Lexicon {
  if (!defaultInstance) {
    defaultInstance = loadLexicon(config.paths.lexicon);
  }
  return defaultInstance;
}
