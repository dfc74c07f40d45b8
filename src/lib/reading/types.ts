import type { ReadingSourceKind } from '@/lib/config';

export interface ReadingItem {
  readonly title: string;
  readonly url: string;
  readonly dateAdded: string; // ISO-8601
}

/** One backend for the reading list. `load` throws SourceUnavailableError when the backend is missing or corrupt. */
export interface ReadingSource {
  readonly kind: ReadingSourceKind;
  load(): Promise<ReadingItem[]>;
}

// Mind-map shapes. Only the node list is populated; the layout fields are
// kept so the page can consume the mind-map service's format unchanged.
export interface MindMapNode {
  id: string;
  title: string;
  url: string;
  cluster: number;
  position: { x: number; y: number };
  keywords: string[];
  contentPreview: string;
}

export interface MindMapEdge {
  source: string;
  target: string;
  weight: number;
}

export interface MindMapCluster {
  id: number;
  name: string;
  keywords: string[];
  articles: number[];
}

export interface ReadingData {
  id: string;
  nodes: MindMapNode[];
  edges: MindMapEdge[];
  clusters: MindMapCluster[];
  metadata: Record<string, unknown>;
  createdAt: string;
}

export type ReadingView =
  | { reading: ReadingData; error: null }
  | { reading: null; error: string };
