import type { Logger } from '@/lib/log';
import type { ReadingItem, ReadingSource } from './types';

/**
 * Loads the reading list once. A failing source is logged and yields an empty
 * list; the failure is never retried and never reaches a request.
 */
export async function loadReadingList(source: ReadingSource, log: Logger): Promise<readonly ReadingItem[]> {
  let items: ReadingItem[];
  try {
    items = await source.load();
  } catch (err) {
    log.error(`failed to load reading list from ${source.kind} source`, err);
    items = [];
  }
  log.info(`loaded ${items.length} reading list item(s) from ${source.kind} source`);
  return Object.freeze(items.map(item => Object.freeze({ ...item })));
}
