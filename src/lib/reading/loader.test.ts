import os from 'node:os';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { SourceUnavailableError } from '@/lib/errors';
import type { Logger } from '@/lib/log';
import { FileReadingSource } from './file-source';
import { loadReadingList } from './loader';
import { buildReadingView } from './view';
import type { ReadingItem, ReadingSource } from './types';

function fakeLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function sourceOf(load: () => Promise<ReadingItem[]>): ReadingSource {
  return { kind: 'file', load: vi.fn(load) };
}

const ITEMS: ReadingItem[] = [
  { title: 'One', url: 'https://example.com/1', dateAdded: '2024-01-01T00:00:00Z' },
  { title: 'Two', url: 'https://example.com/2', dateAdded: '2024-01-02T00:00:00Z' },
];

describe('loadReadingList', () => {
  it('returns the items, frozen, in source order', async () => {
    const source = sourceOf(async () => ITEMS);
    const log = fakeLogger();

    const items = await loadReadingList(source, log);

    expect(items).toEqual(ITEMS);
    expect(Object.isFrozen(items)).toBe(true);
    expect(Object.isFrozen(items[0])).toBe(true);
    expect(source.load).toHaveBeenCalledTimes(1);
    expect(log.info).toHaveBeenCalledWith('loaded 2 reading list item(s) from file source');
  });

  it('logs a failing source once and degrades to an empty list', async () => {
    const failure = new SourceUnavailableError('reading list file not readable: /nowhere.json');
    const log = fakeLogger();

    const items = await loadReadingList(sourceOf(async () => { throw failure; }), log);

    expect(items).toEqual([]);
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith('failed to load reading list from file source', failure);
  });
});

describe('reading list from a missing file', () => {
  it('renders an empty view with the no-items message', async () => {
    const log = fakeLogger();
    const source = new FileReadingSource(path.join(os.tmpdir(), 'no-such-dir', 'reading_list.json'));

    const view = buildReadingView(await loadReadingList(source, log));

    expect(view).toEqual({ reading: null, error: 'No reading list items found' });
    expect(log.error).toHaveBeenCalledTimes(1);
  });
});
