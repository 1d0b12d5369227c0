import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Post } from '../scrapers/posts.js';

const postSchema = z.object({
  id: z.string(),
  subreddit: z.string(),
  created_utc: z.number(),
  title: z.string(),
  selftext: z.string(),
  url: z.string(),
  upvotes: z.number(),
  num_comments: z.number(),
  source: z.string(),
  fetched_at: z.string(),
});

/** One post per line, UTF-8, parent directories created. */
export function writeCorpus(filePath: string, posts: readonly Post[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const body = posts.map(post => JSON.stringify(post)).join('\n');
  fs.writeFileSync(filePath, posts.length > 0 ? `${body}\n` : '', 'utf-8');
}

export function readCorpus(filePath: string): Post[] {
  const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
  const posts: Post[] = [];
  lines.forEach((line, index) => {
    if (!line.trim()) return;
    const result = postSchema.safeParse(JSON.parse(line));
    if (!result.success) {
      throw new Error(`Invalid corpus line ${index + 1} in ${filePath}: ${result.error.message}`);
    }
    posts.push(result.data);
  });
  return posts;
}
