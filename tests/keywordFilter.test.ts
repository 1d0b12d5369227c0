import { describe, it, expect } from 'vitest';
import { emptyFilterSpec, finalize, type FilterSpec } from '../src/core/keywordFilter.js';
import type { Post } from '../src/scrapers/posts.js';

function post(id: string, title: string, selftext = ''): Post {
  return {
    id,
    subreddit: 'r/test',
    created_utc: 1700000000,
    title,
    selftext,
    url: `https://www.reddit.com/r/test/comments/${id}/`,
    upvotes: 10,
    num_comments: 0,
    source: 'pullpush_sub/base',
    fetched_at: '2024-05-01T10:00:00Z',
  };
}

function spec(overrides: Partial<FilterSpec>): FilterSpec {
  return { ...emptyFilterSpec(), ...overrides };
}

const ids = (posts: Post[]) => posts.map(p => p.id);

describe('finalize', () => {
  it('requires every term in all mode', () => {
    const posts = [post('p1', 'I love my haptic glove'), post('p2', 'I love gloves')];

    const result = finalize(posts, spec({ must: ['glove', 'haptic'], mode: 'all' }), { minStrictResults: 1 });

    expect(ids(result.posts)).toEqual(['p1']);
    expect(result.report).toEqual({
      input: 2,
      deduped: 2,
      excluded: 0,
      strictKept: 1,
      lenientKept: null,
      outcome: 'strict',
    });
  });

  it('keeps all mode when too few posts survive the strict pass', () => {
    const posts = [post('p1', 'I love my haptic glove'), post('p2', 'I love gloves')];

    const result = finalize(posts, spec({ must: ['glove', 'haptic'], mode: 'all' }));

    expect(ids(result.posts)).toEqual(['p1']);
    expect(result.report).toEqual({
      input: 2,
      deduped: 2,
      excluded: 0,
      strictKept: 1,
      lenientKept: 1,
      outcome: 'lenient',
    });
  });

  it('requires every word of a phrase in the lenient all-mode pass', () => {
    const posts = [post('p1', 'A glove with haptic motors'), post('p2', 'A haptic vest')];

    const result = finalize(posts, spec({ must: ['haptic glove'], mode: 'all' }));

    expect(ids(result.posts)).toEqual(['p1']);
    expect(result.report).toMatchObject({ strictKept: 0, lenientKept: 1, outcome: 'lenient' });
  });

  it('treats should terms as required when there are no must terms in all mode', () => {
    const posts = [post('p1', 'I love my haptic glove'), post('p2', 'I love gloves')];
    const result = finalize(posts, spec({ should: ['glove', 'haptic'], mode: 'all' }), { minStrictResults: 1 });
    expect(ids(result.posts)).toEqual(['p1']);
  });

  it('needs every must term plus one should term in all mode', () => {
    const posts = [
      post('p1', 'haptic glove review'),
      post('p2', 'haptic glove', 'price drop'),
      post('p3', 'haptic price review'),
    ];
    const result = finalize(
      posts,
      spec({ must: ['haptic', 'glove'], should: ['review', 'price'], mode: 'all' }),
      { minStrictResults: 1 },
    );
    expect(ids(result.posts)).toEqual(['p1', 'p2']);
  });

  it('keeps posts matching any term in any mode', () => {
    const posts = [post('p1', 'Haptic feedback'), post('p2', 'Gloves for winter'), post('p3', 'Keyboards')];
    const result = finalize(posts, spec({ should: ['haptic', 'glove'] }), { minStrictResults: 1 });
    expect(ids(result.posts)).toEqual(['p1', 'p2']);
  });

  it('matches the ASCII fold of a term', () => {
    const posts = [post('p1', 'Guvenlik ayarlari'), post('p2', 'Tarifler')];
    const result = finalize(posts, spec({ should: ['güvenlik'] }), { minStrictResults: 1 });
    expect(ids(result.posts)).toEqual(['p1']);
  });

  it('falls back to single words when the strict pass keeps too little', () => {
    const posts = [post('p1', 'Best haptic glove'), post('p2', 'A haptic vest'), post('p3', 'Cooking')];

    const result = finalize(posts, spec({ should: ['haptic glove'] }), { minStrictResults: 15 });

    expect(ids(result.posts)).toEqual(['p1', 'p2']);
    expect(result.report).toMatchObject({ strictKept: 1, lenientKept: 2, outcome: 'lenient' });
  });

  it('returns the unfiltered set rather than nothing', () => {
    const posts = [post('p1', 'Cooking'), post('p2', 'Gardening')];

    const result = finalize(posts, spec({ must: ['haptic'] }));

    expect(ids(result.posts)).toEqual(['p1', 'p2']);
    expect(result.report).toMatchObject({ strictKept: 0, lenientKept: 0, outcome: 'abandoned' });
  });

  it('drops excluded posts', () => {
    const posts = [post('p1', 'Security tips'), post('p2', 'Crypto scam', 'SECURITY')];

    const result = finalize(posts, spec({ exclude: ['crypto'] }));

    expect(ids(result.posts)).toEqual(['p1']);
    expect(result.report).toEqual({
      input: 2,
      deduped: 2,
      excluded: 1,
      strictKept: 1,
      lenientKept: null,
      outcome: 'unfiltered',
    });
  });

  it('ignores an exclusion that would remove every post', () => {
    const posts = [post('p1', 'crypto wallet'), post('p2', 'crypto app')];
    const result = finalize(posts, spec({ exclude: ['crypto'] }));
    expect(ids(result.posts)).toEqual(['p1', 'p2']);
    expect(result.report.excluded).toBe(0);
  });

  it('dedupes by id keeping the first occurrence', () => {
    const first = post('p1', 'from the community pass');
    const result = finalize([first, post('p2', 'other'), post('p1', 'from the keyword pass')], emptyFilterSpec());
    expect(result.posts).toEqual([first, post('p2', 'other')]);
    expect(result.report).toMatchObject({ input: 3, deduped: 2, outcome: 'unfiltered' });
  });
});
