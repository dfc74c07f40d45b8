import { describe, expect, it } from 'vitest';
import { loadConfig, type ReadingSourceKind } from '@/lib/config';
import { BookmarksReadingSource } from './bookmarks-source';
import { FileReadingSource } from './file-source';
import { RemoteReadingSource } from './remote-source';
import { createReadingSource, EmptyReadingSource } from './sources';

function sourceFor(kind: ReadingSourceKind) {
  return createReadingSource(loadConfig({ READING_SOURCE: kind }, '/srv/site'));
}

describe('createReadingSource', () => {
  it('selects one implementation per backend', () => {
    expect(sourceFor('file')).toBeInstanceOf(FileReadingSource);
    expect(sourceFor('bookmarks')).toBeInstanceOf(BookmarksReadingSource);
    expect(sourceFor('remote')).toBeInstanceOf(RemoteReadingSource);
    expect(sourceFor('none')).toBeInstanceOf(EmptyReadingSource);
  });

  it('reports its kind', () => {
    expect(sourceFor('remote').kind).toBe('remote');
  });

  it('has an empty source that never fails', async () => {
    expect(await new EmptyReadingSource().load()).toEqual([]);
  });
});
