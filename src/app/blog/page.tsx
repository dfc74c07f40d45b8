import Link from 'next/link';
import { listPosts } from '@/lib/posts';
import { buildMeta } from '@/lib/seo';

export const dynamic = 'force-dynamic';

export const metadata = buildMeta({ title: 'Blog' });

export default async function BlogIndex() {
  const posts = await listPosts();
  return (
    <section className="space-y-6">
      <div className="card">
        <h1 className="text-2xl md:text-3xl font-semibold">Blog</h1>
      </div>

      {posts.length === 0 ? (
        <p className="card text-sm text-[color:var(--muted)]">Nothing published yet.</p>
      ) : (
        <ul className="grid gap-4 md:grid-cols-2">
          {posts.map((p) => (
            <li key={p.slug} className="card space-y-2">
              <h2 className="text-xl font-semibold">
                <Link href={`/blog/${p.slug}`}>{p.title}</Link>
              </h2>
              {p.date && <p className="text-xs text-[color:var(--muted)]">{p.date}</p>}
              {p.excerpt && <p className="text-sm text-[color:var(--muted)]">{p.excerpt}</p>}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
