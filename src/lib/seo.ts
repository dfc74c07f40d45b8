import type { Metadata } from 'next';

export const SITE_NAME = 'Field Notes';
const DEFAULT_DESCRIPTION = 'Notes, writing and reading.';

interface BaseMeta {
  title?: string;
  description?: string;
  canonical?: string;
}

export function buildMeta({ title, description, canonical }: BaseMeta = {}): Metadata {
  const fullTitle = title ? `${title} · ${SITE_NAME}` : SITE_NAME;
  const desc = description || DEFAULT_DESCRIPTION;
  return {
    title: fullTitle,
    description: desc,
    alternates: canonical ? { canonical } : undefined,
    openGraph: {
      title: fullTitle,
      description: desc,
      siteName: SITE_NAME,
      type: 'website',
    },
    twitter: {
      card: 'summary',
      title: fullTitle,
      description: desc,
    },
  };
}
