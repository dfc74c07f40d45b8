import type { MindMapNode, ReadingItem, ReadingView } from './types';

export const NO_ITEMS_MESSAGE = 'No reading list items found';

export function buildReadingView(items: readonly ReadingItem[], now: Date = new Date()): ReadingView {
  if (items.length === 0) return { reading: null, error: NO_ITEMS_MESSAGE };

  const nodes = items.map((item, i): MindMapNode => ({
    id: String(i),
    title: item.title,
    url: item.url,
    cluster: 0,
    position: { x: 0, y: 0 },
    keywords: [],
    contentPreview: '',
  }));

  return {
    reading: {
      id: 'reading-list',
      nodes,
      edges: [],
      clusters: [],
      metadata: {},
      createdAt: now.toISOString(),
    },
    error: null,
  };
}
