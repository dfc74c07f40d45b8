import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

export const READING_SOURCE_KINDS = ['file', 'bookmarks', 'remote', 'none'] as const;
export type ReadingSourceKind = (typeof READING_SOURCE_KINDS)[number];

const EnvSchema = z.object({
  POSTS_DIRS: z.string().default('posts,/app/posts'),
  READING_SOURCE: z.enum(READING_SOURCE_KINDS).default('file'),
  READING_LIST_PATH: z.string().min(1).default('static/data/reading_list.json'),
  BOOKMARKS_PATH: z.string().min(1).optional(),
  MINDMAP_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  PUBLIC_DIR: z.string().min(1).default('public'),
});

export interface SiteConfig {
  /** Candidate post directories, searched in order. The first readable one wins. */
  postsDirs: string[];
  readingSource: ReadingSourceKind;
  readingListPath: string;
  bookmarksPath: string;
  mindmapServiceUrl: string;
  publicDir: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env, cwd = process.cwd()): SiteConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  const postsDirs = e.POSTS_DIRS.split(',').map(d => d.trim()).filter(Boolean);
  if (postsDirs.length === 0) throw new ConfigError('POSTS_DIRS must name at least one directory');
  return {
    postsDirs: postsDirs.map(d => path.resolve(cwd, d)),
    readingSource: e.READING_SOURCE,
    readingListPath: path.resolve(cwd, e.READING_LIST_PATH),
    bookmarksPath: path.resolve(cwd, e.BOOKMARKS_PATH ?? path.join(os.homedir(), 'Library', 'Safari', 'Bookmarks.plist')),
    mindmapServiceUrl: e.MINDMAP_SERVICE_URL.replace(/\/+$/, ''),
    publicDir: path.resolve(cwd, e.PUBLIC_DIR),
  };
}

let cached: SiteConfig | undefined;

export function config(): SiteConfig {
  cached ??= loadConfig();
  return cached;
}
