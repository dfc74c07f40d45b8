import fs from 'node:fs/promises';
import { z } from 'zod';
import { SourceUnavailableError } from '@/lib/errors';
import type { ReadingItem, ReadingSource } from './types';

export const ReadingEntrySchema = z.object({
  title: z.string(),
  url: z.string(),
  date_added: z.string(),
});

const ReadingFileSchema = z.array(ReadingEntrySchema);

export function toReadingItem(entry: z.output<typeof ReadingEntrySchema>): ReadingItem {
  return { title: entry.title, url: entry.url, dateAdded: entry.date_added };
}

/** Reading list exported to a JSON array of `{ title, url, date_added }`. */
export class FileReadingSource implements ReadingSource {
  readonly kind = 'file' as const;

  constructor(private readonly filePath: string) {}

  async load(): Promise<ReadingItem[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (cause) {
      throw new SourceUnavailableError(`reading list file not readable: ${this.filePath}`, { cause });
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (cause) {
      throw new SourceUnavailableError(`reading list file is not valid JSON: ${this.filePath}`, { cause });
    }
    const parsed = ReadingFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceUnavailableError(`reading list file has an unexpected shape: ${this.filePath}`, { cause: parsed.error });
    }
    return parsed.data.map(toReadingItem);
  }
}
