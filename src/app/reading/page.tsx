import { buildReadingView, readingList } from '@/lib/reading';
import { buildMeta } from '@/lib/seo';

export const dynamic = 'force-dynamic';

export const metadata = buildMeta({ title: 'Reading', description: 'Articles saved to read.' });

export default async function ReadingPage() {
  const view = buildReadingView(await readingList());
  return (
    <section className="space-y-6">
      <div className="card space-y-1">
        <h1 className="text-2xl md:text-3xl font-semibold">Reading list</h1>
        {view.reading && (
          <p className="text-xs text-[color:var(--muted)]">
            {view.reading.nodes.length} articles · generated {view.reading.createdAt}
          </p>
        )}
      </div>

      {view.reading ? (
        <ol className="card space-y-2 list-decimal pl-8" data-mindmap-id={view.reading.id}>
          {view.reading.nodes.map((node) => (
            <li key={node.id} data-node-id={node.id} data-cluster={node.cluster}>
              <a href={node.url} target="_blank" rel="noopener noreferrer">{node.title}</a>
            </li>
          ))}
        </ol>
      ) : (
        <p className="card text-sm text-[color:var(--muted)]">{view.error}</p>
      )}
    </section>
  );
}
