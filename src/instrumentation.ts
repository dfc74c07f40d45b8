// Runs once when the Next.js server starts: load the reading list before the first request.
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;
  const { readingList } = await import('@/lib/reading');
  await readingList();
}
