import fs from 'node:fs/promises';
import * as plist from 'simple-plist';
import { z } from 'zod';
import { SourceUnavailableError } from '@/lib/errors';
import type { ReadingItem, ReadingSource } from './types';

/** Title of the bookmark folder that holds Safari's Reading List. */
export const READING_LIST_CONTAINER = 'com.apple.ReadingList';

const BookmarksRootSchema = z.object({ Children: z.array(z.unknown()) });

const ContainerSchema = z.object({
  Title: z.string().optional().catch(undefined),
  Children: z.array(z.unknown()).optional().catch(undefined),
});

const EntrySchema = z.object({
  URLString: z.string().optional().catch(undefined),
  URIDictionary: z
    .object({ title: z.string().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  DateAdded: z.date().optional().catch(undefined),
});

export class BookmarksReadingSource implements ReadingSource {
  readonly kind = 'bookmarks' as const;

  constructor(
    private readonly plistPath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async load(): Promise<ReadingItem[]> {
    let buf: Buffer;
    try {
      buf = await fs.readFile(this.plistPath);
    } catch (cause) {
      throw new SourceUnavailableError(`bookmarks file not found: ${this.plistPath}`, { cause });
    }
    let data: unknown;
    try {
      data = plist.parse(buf, this.plistPath);
    } catch (cause) {
      throw new SourceUnavailableError(`bookmarks file is not a property list: ${this.plistPath}`, { cause });
    }
    const root = BookmarksRootSchema.safeParse(data);
    if (!root.success) throw new SourceUnavailableError(`no Children found in ${this.plistPath}`);
    return readingListEntries(root.data.Children).map(entry => this.toItem(entry));
  }

  private toItem(entry: z.output<typeof EntrySchema>): ReadingItem {
    const url = entry.URLString ?? 'No URL';
    return {
      url,
      title: entry.URIDictionary?.title ?? url,
      dateAdded: (entry.DateAdded ?? this.now()).toISOString(),
    };
  }
}

function readingListEntries(children: unknown[]): z.output<typeof EntrySchema>[] {
  for (const child of children) {
    const container = ContainerSchema.safeParse(child);
    if (!container.success || container.data.Title !== READING_LIST_CONTAINER) continue;
    const entries: z.output<typeof EntrySchema>[] = [];
    for (const raw of container.data.Children ?? []) {
      const entry = EntrySchema.safeParse(raw);
      if (entry.success) entries.push(entry.data);
    }
    return entries;
  }
  return [];
}
