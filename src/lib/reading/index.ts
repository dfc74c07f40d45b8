import { config } from '@/lib/config';
import { createLogger } from '@/lib/log';
import { loadReadingList } from './loader';
import { createReadingSource } from './sources';
import type { ReadingItem } from './types';

export { buildReadingView, NO_ITEMS_MESSAGE } from './view';
export { loadReadingList } from './loader';
export { createReadingSource, EmptyReadingSource } from './sources';
export type { ReadingItem, ReadingSource, ReadingView, ReadingData, MindMapNode } from './types';

declare global {
  // Shared by the instrumentation hook and the page bundles, which Next.js compiles separately.
  var __readingList: Promise<readonly ReadingItem[]> | undefined;
}

/** The process-wide reading list, loaded on first call (server start, via instrumentation). */
export function readingList(): Promise<readonly ReadingItem[]> {
  globalThis.__readingList ??= loadReadingList(createReadingSource(config()), createLogger('reading'));
  return globalThis.__readingList;
}
