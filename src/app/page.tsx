import Link from 'next/link';

export default function Page() {
  return (
    <section className="card space-y-4">
      <h1 className="text-2xl md:text-3xl font-semibold">Hello 👋</h1>
      <p className="text-[color:var(--muted)]">
        I build software and write about it now and then. This is where the writing lives.
      </p>
      <ul className="list-disc pl-6 text-sm space-y-1 text-[color:var(--muted)]">
        <li><Link href="/blog">Blog</Link>: longer notes, newest first.</li>
        <li><Link href="/reading">Reading</Link>: articles I have saved to read.</li>
        <li><Link href="/cv">CV</Link>: work and education.</li>
      </ul>
    </section>
  );
}
