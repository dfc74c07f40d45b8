import type { Element, Root } from 'hast';
import type { Plugin } from 'unified';
import { visit } from 'unist-util-visit';

/** Prefix rehype-sanitize puts on every `id` (and `name`) it keeps. */
export const CLOBBER_PREFIX = 'user-content-';

// Rehype plugin: rehype-sanitize prefixes ids but not the `#fragment` links that point at them.
// Re-point a link at the prefixed id when that is the only one in the document.
const rehypeFragmentLinks: Plugin<[], Root> = () => (tree) => {
  const ids = new Set<string>();
  visit(tree, 'element', (node: Element) => {
    const id = node.properties.id;
    if (typeof id === 'string') ids.add(id);
  });
  visit(tree, 'element', (node: Element) => {
    const href = node.properties.href;
    if (node.tagName !== 'a' || typeof href !== 'string' || !href.startsWith('#')) return;
    const target = href.slice(1);
    if (ids.has(target) || !ids.has(CLOBBER_PREFIX + target)) return;
    node.properties.href = `#${CLOBBER_PREFIX}${target}`;
  });
};

export default rehypeFragmentLinks;
