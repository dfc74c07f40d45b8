import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import { z } from 'zod';
import { config } from '@/lib/config';
import { InvalidSlugError, PostNotFoundError } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/log';
import { renderMarkdown } from '@/lib/markdown';
import { isValidSlug, slugFromFileName } from '@/lib/slug';
import type { Post, PostMeta } from '@/types/post';

export interface CatalogOptions {
  /** Candidate directories, first readable one wins. Defaults to `POSTS_DIRS`. */
  dirs?: readonly string[];
  publicDir?: string;
  logger?: Logger;
}

const FrontMatterSchema = z.object({
  date: z
    .union([z.date(), z.string()])
    .optional()
    .transform(d => (d instanceof Date ? d.toISOString().slice(0, 10) : d)),
  excerpt: z.string().optional(),
});

type FrontMatter = z.output<typeof FrontMatterSchema>;

interface ParsedSource {
  title: string;
  body: string;
  meta: FrontMatter;
}

// A `---` line, optional YAML, and a closing `---` line. An unclosed block is ordinary text.
const FRONT_MATTER = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

function splitFrontMatter(raw: string): { data: Record<string, unknown>; content: string } {
  if (!FRONT_MATTER.test(raw)) return { data: {}, content: raw };
  try {
    // Passing options keeps gray-matter from caching by input string.
    const { data, content } = matter(raw, { language: 'yaml' });
    return { data, content };
  } catch {
    return { data: {}, content: raw }; // malformed YAML: the block is read as body text
  }
}

// First line is the title (`# Hello` -> `Hello`), everything after it is the body.
// Optional front matter sits above the title line.
export function parsePostSource(raw: string): ParsedSource {
  const { data, content } = splitFrontMatter(raw);
  const parsed = FrontMatterSchema.safeParse(data);
  const meta: FrontMatter = parsed.success ? parsed.data : {};
  const [first = '', ...rest] = content.split(/\r?\n/);
  return {
    title: first.replace(/^[#\s]+/, '').trim() || 'Untitled',
    body: rest.join('\n'),
    meta,
  };
}

export async function listPosts(opts: CatalogOptions = {}): Promise<PostMeta[]> {
  const dirs = opts.dirs ?? config().postsDirs;
  const log = opts.logger ?? createLogger('posts');
  for (const dir of dirs) {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      continue; // not there, try the next candidate
    }
    const files = await Promise.all(entries.map(async e => ((await isRegularFile(dir, e)) ? e.name : undefined)));
    const slugs = files
      .map(name => (name === undefined ? undefined : slugFromFileName(name)))
      .filter((s): s is string => s !== undefined && isValidSlug(s));
    const posts = await Promise.all(slugs.map(slug => readMeta(dir, slug, log)));
    return posts.sort((a, b) => (a.slug < b.slug ? 1 : -1));
  }
  return [];
}

// Symlinks count when they point at a regular file, matching what getPost can open.
async function isRegularFile(dir: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await fs.stat(path.join(dir, entry.name))).isFile();
  } catch {
    return false; // dangling link
  }
}

async function readMeta(dir: string, slug: string, log: Logger): Promise<PostMeta> {
  try {
    const { title, meta } = parsePostSource(await fs.readFile(path.join(dir, `${slug}.md`), 'utf8'));
    return { slug, title, ...meta };
  } catch (err) {
    log.warn(`could not read post "${slug}" in ${dir}`, err);
    return { slug, title: 'Untitled' };
  }
}

export async function getPost(slug: string, opts: CatalogOptions = {}): Promise<Post> {
  // Checked before the slug is joined into any path.
  if (!isValidSlug(slug)) throw new InvalidSlugError(slug);
  const file = await findPostFile(slug, opts.dirs ?? config().postsDirs);
  if (!file) throw new PostNotFoundError(slug);
  const { title, body, meta } = parsePostSource(await fs.readFile(file, 'utf8'));
  const html = await renderMarkdown(body, { publicDir: opts.publicDir });
  return { slug, title, html, ...meta };
}

async function findPostFile(slug: string, dirs: readonly string[]): Promise<string | undefined> {
  for (const dir of dirs) {
    const candidate = path.join(dir, `${slug}.md`);
    try {
      if ((await fs.stat(candidate)).isFile()) return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}
