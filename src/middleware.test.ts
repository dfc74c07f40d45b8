import { NextRequest } from 'next/server';
import { describe, expect, it } from 'vitest';
import { middleware } from './middleware';

function request(pathname: string) {
  return middleware(new NextRequest(`http://localhost${pathname}`));
}

describe('middleware', () => {
  it('lets valid slugs through', () => {
    const res = request('/blog/2024-03-02-hello');
    expect(res.status).toBe(200);
    expect(res.headers.get('x-middleware-next')).toBe('1');
  });

  it.each([
    '/blog/..%2F..%2Fetc%2Fpasswd',
    '/blog/post.md',
    '/blog/with%20space',
    '/blog/%E0%A4%A',
  ])('answers 400 for %s', async (pathname) => {
    const res = request(pathname);
    expect(res.status).toBe(400);
    expect(await res.text()).toBe('Invalid post address');
  });
});
