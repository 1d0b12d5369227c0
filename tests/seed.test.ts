import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import {
  loadSeedFile,
  mergeSeed,
  normalizeCommunities,
  parseKeywordList,
  seedFromEnv,
  seedFromObject,
} from '../src/core/seed.js';

describe('parseKeywordList', () => {
  it('reads a JSON array, deduping case-insensitively', () => {
    expect(parseKeywordList('["yapay zeka", "Güvenlik", "güvenlik", " "]')).toEqual(['yapay zeka', 'Güvenlik']);
  });

  it('reads a comma-separated list', () => {
    expect(parseKeywordList('privacy, data protection ,privacy')).toEqual(['privacy', 'data protection']);
  });

  it('reads a shell-quoted list', () => {
    expect(parseKeywordList('"yapay zeka" güvenlik')).toEqual(['yapay zeka', 'güvenlik']);
  });

  it('ignores malformed JSON', () => {
    expect(parseKeywordList('["broken')).toEqual([]);
    expect(parseKeywordList(undefined)).toEqual([]);
  });
});

describe('normalizeCommunities', () => {
  it('accepts names, objects and links', () => {
    expect(normalizeCommunities([
      'privacy',
      { name: 'r/netsec' },
      { subreddit: 'Privacy' },
      'https://reddit.com/r/sleep/',
    ])).toEqual(['r/privacy', 'r/netsec', 'r/sleep']);
  });
});

describe('seed sources', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function tempFile(name: string, content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seed-test-'));
    dirs.push(dir);
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  const payload = {
    subreddits: ['wellness', { name: 'r/Meditation' }],
    keywords: ['meditasyon'],
    filters: { must_include: ['meditation'], should_include: ['app', 'Meditation'], exclude: ['crypto'] },
    timeframe_months: 6,
    min_upvotes: 5,
  };

  it('converts a seed object', () => {
    expect(seedFromObject(payload)).toEqual({
      subreddits: ['r/wellness', 'r/Meditation'],
      keywords: ['meditasyon'],
      must: ['meditation'],
      should: ['app', 'Meditation'],
      exclude: ['crypto'],
      months: 6,
      minUpvotes: 5,
    });
  });

  it('rejects a seed with the wrong shape', () => {
    expect(seedFromObject({ subreddits: 'wellness' })).toBeNull();
  });

  it('loads a seed file and ignores a malformed one', () => {
    expect(loadSeedFile(tempFile('seed.json', JSON.stringify(payload)))?.subreddits).toEqual(['r/wellness', 'r/Meditation']);
    expect(loadSeedFile(tempFile('broken.json', '{"subreddits": ['))).toBeNull();
    expect(loadSeedFile(path.join(os.tmpdir(), 'missing-seed-file.json'))).toBeNull();
  });

  it('reads SEED_* values', () => {
    expect(seedFromEnv({ subs: 'r/wellness Meditation', keywordsJson: '["meditasyon","uyku"]', months: 3 })).toEqual({
      subreddits: ['r/wellness', 'r/Meditation'],
      keywords: ['meditasyon', 'uyku'],
      must: [],
      should: [],
      exclude: [],
      months: 3,
    });
    expect(seedFromEnv({})).toBeNull();
  });

  it('merges seed keywords with the user list', () => {
    const seed = seedFromObject(payload);
    expect(seed).not.toBeNull();
    if (!seed) return;
    expect(mergeSeed(seed, ['uyku', 'APP'])).toEqual(['meditasyon', 'meditation', 'app', 'uyku']);
  });
});
