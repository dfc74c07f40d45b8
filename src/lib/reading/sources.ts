import type { SiteConfig } from '@/lib/config';
import { BookmarksReadingSource } from './bookmarks-source';
import { FileReadingSource } from './file-source';
import { RemoteReadingSource } from './remote-source';
import type { ReadingItem, ReadingSource } from './types';

export class EmptyReadingSource implements ReadingSource {
  readonly kind = 'none' as const;

  async load(): Promise<ReadingItem[]> {
    return [];
  }
}

export function createReadingSource(cfg: SiteConfig): ReadingSource {
  switch (cfg.readingSource) {
    case 'file':
      return new FileReadingSource(cfg.readingListPath);
    case 'bookmarks':
      return new BookmarksReadingSource(cfg.bookmarksPath);
    case 'remote':
      return new RemoteReadingSource(cfg.mindmapServiceUrl);
    case 'none':
      return new EmptyReadingSource();
  }
}
