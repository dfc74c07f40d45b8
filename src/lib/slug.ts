// Kept free of Node imports: the middleware runs this on the edge runtime.
const SLUG_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

export function slugFromFileName(fileName: string): string | undefined {
  if (!fileName.endsWith('.md')) return undefined;
  return fileName.slice(0, -'.md'.length);
}
