import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeRaw from 'rehype-raw';
import rehypeSanitize from 'rehype-sanitize';
import rehypeSlug from 'rehype-slug';
import rehypeAutolinkHeadings from 'rehype-autolink-headings';
import rehypePrettyCode from 'rehype-pretty-code';
import rehypeStringify from 'rehype-stringify';
import remarkImageSize from '@/lib/remark-image-size';
import rehypeFragmentLinks from '@/lib/rehype-fragment-links';
import { config } from '@/lib/config';

export interface RenderOptions {
  publicDir?: string;
}

/**
 * Markdown to HTML with the GFM extensions (tables, strikethrough, footnotes, task lists).
 * Raw HTML in posts is parsed, then sanitized against the GitHub schema. Headings get
 * ids after sanitizing, so they are not prefixed.
 */
export async function renderMarkdown(markdown: string, opts: RenderOptions = {}): Promise<string> {
  const file = await unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkImageSize, { publicDir: opts.publicDir ?? config().publicDir })
    // Footnote ids come out bare; rehype-sanitize adds the one prefix, rehypeFragmentLinks fixes the hrefs.
    .use(remarkRehype, { allowDangerousHtml: true, clobberPrefix: '' })
    .use(rehypeRaw)
    .use(rehypeSanitize)
    .use(rehypeFragmentLinks)
    .use(rehypeSlug)
    .use(rehypePrettyCode, { theme: 'one-dark-pro', keepBackground: false })
    .use(rehypeAutolinkHeadings, { behavior: 'wrap' })
    .use(rehypeStringify)
    .process(markdown);
  return String(file);
}
