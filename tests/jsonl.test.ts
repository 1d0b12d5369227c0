import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { readCorpus, writeCorpus } from '../src/core/jsonl.js';
import type { Post } from '../src/scrapers/posts.js';

const sample: Post = {
  id: 'abc',
  subreddit: 'r/privacy',
  created_utc: 1700000000,
  title: 'Güvenlik ayarları',
  selftext: '',
  url: 'https://www.reddit.com/r/privacy/comments/abc/',
  upvotes: 42,
  num_comments: 3,
  source: 'pullpush_kw/primary/base',
  fetched_at: '2024-05-01T10:00:00Z',
};

describe('corpus files', () => {
  let dir = '';

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes one post per line and reads them back', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-test-'));
    const file = path.join(dir, 'nested', 'corpus.jsonl');

    writeCorpus(file, [sample, { ...sample, id: 'def' }]);

    const lines = fs.readFileSync(file, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(JSON.stringify(sample));
    expect(lines[2]).toBe('');
    expect(readCorpus(file).map(post => post.id)).toEqual(['abc', 'def']);
  });

  it('skips blank lines', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-test-'));
    const file = path.join(dir, 'corpus.jsonl');
    fs.writeFileSync(file, `\n${JSON.stringify(sample)}\n\n`, 'utf-8');
    expect(readCorpus(file)).toEqual([sample]);
  });
});
