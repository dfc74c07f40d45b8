import { buildMeta } from '@/lib/seo';

export const metadata = buildMeta({ title: 'CV', description: 'Work history, education and skills.' });

type Role = { period: string; title: string; org: string; summary: string };

const experience: Role[] = [
  {
    period: '2022 – now',
    title: 'Senior Software Engineer',
    org: 'Example Systems',
    summary: 'Backend services and developer tooling. Owns the build and release pipeline.',
  },
  {
    period: '2018 – 2022',
    title: 'Software Engineer',
    org: 'Sample Labs',
    summary: 'Data ingestion, search, and the internal documentation site.',
  },
];

const skills = ['TypeScript', 'Node.js', 'React', 'PostgreSQL', 'Docker'];

export default function CvPage() {
  return (
    <section className="card space-y-6">
      <h1 className="text-2xl md:text-3xl font-semibold">Curriculum Vitae</h1>

      <div className="space-y-4">
        <h2 className="text-lg font-semibold">Experience</h2>
        <ul className="space-y-3">
          {experience.map((r) => (
            <li key={`${r.org}-${r.period}`}>
              <p className="font-medium">{r.title} · {r.org}</p>
              <p className="text-xs text-[color:var(--muted)]">{r.period}</p>
              <p className="text-sm text-[color:var(--muted)]">{r.summary}</p>
            </li>
          ))}
        </ul>
      </div>

      <div className="space-y-2">
        <h2 className="text-lg font-semibold">Skills</h2>
        <p className="text-sm text-[color:var(--muted)]">{skills.join(' · ')}</p>
      </div>
    </section>
  );
}
