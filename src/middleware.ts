import { NextResponse, type NextRequest } from 'next/server';
import { isValidSlug } from '@/lib/slug';

const PREFIX = '/blog/';

// Reject malformed post slugs with a 400 before the page (and the filesystem) sees them.
export function middleware(request: NextRequest) {
  const segment = request.nextUrl.pathname.slice(PREFIX.length);
  let slug: string;
  try {
    slug = decodeURIComponent(segment);
  } catch {
    return badSlug();
  }
  if (!isValidSlug(slug)) return badSlug();
  return NextResponse.next();
}

function badSlug() {
  return new NextResponse('Invalid post address', {
    status: 400,
    headers: { 'content-type': 'text/plain; charset=utf-8' },
  });
}

export const config = {
  matcher: '/blog/:slug',
};
