import { describe, expect, it } from 'vitest';
import { buildReadingView, NO_ITEMS_MESSAGE } from './view';
import type { ReadingItem } from './types';

const NOW = new Date('2024-06-01T12:00:00Z');

describe('buildReadingView', () => {
  it('reports an empty list explicitly', () => {
    expect(buildReadingView([], NOW)).toEqual({ reading: null, error: 'No reading list items found' });
    expect(NO_ITEMS_MESSAGE).toBe('No reading list items found');
  });

  it('numbers nodes by position and leaves layout fields empty', () => {
    const items: readonly ReadingItem[] = Object.freeze([
      Object.freeze({ title: 'Alpha', url: 'https://example.com/a', dateAdded: '2024-01-01T00:00:00Z' }),
      Object.freeze({ title: 'Beta', url: 'https://example.com/b', dateAdded: '2024-01-02T00:00:00Z' }),
      Object.freeze({ title: 'Gamma', url: 'https://example.com/c', dateAdded: '2024-01-03T00:00:00Z' }),
    ]);

    const view = buildReadingView(items, NOW);

    expect(view.error).toBeNull();
    expect(view.reading).toEqual({
      id: 'reading-list',
      nodes: [
        { id: '0', title: 'Alpha', url: 'https://example.com/a', cluster: 0, position: { x: 0, y: 0 }, keywords: [], contentPreview: '' },
        { id: '1', title: 'Beta', url: 'https://example.com/b', cluster: 0, position: { x: 0, y: 0 }, keywords: [], contentPreview: '' },
        { id: '2', title: 'Gamma', url: 'https://example.com/c', cluster: 0, position: { x: 0, y: 0 }, keywords: [], contentPreview: '' },
      ],
      edges: [],
      clusters: [],
      metadata: {},
      createdAt: '2024-06-01T12:00:00.000Z',
    });
  });
});
