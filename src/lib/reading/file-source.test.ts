import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SourceUnavailableError } from '@/lib/errors';
import { FileReadingSource } from './file-source';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reading-file-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function sourceWith(content: string): Promise<FileReadingSource> {
  const file = path.join(dir, 'reading_list.json');
  await fs.writeFile(file, content);
  return new FileReadingSource(file);
}

describe('FileReadingSource', () => {
  it('reads entries in file order', async () => {
    const source = await sourceWith(JSON.stringify([
      { title: 'Second thoughts', url: 'https://example.com/b', date_added: '2024-02-01T00:00:00Z' },
      { title: 'First steps', url: 'https://example.com/a', date_added: '2024-01-01T00:00:00Z' },
    ]));

    expect(await source.load()).toEqual([
      { title: 'Second thoughts', url: 'https://example.com/b', dateAdded: '2024-02-01T00:00:00Z' },
      { title: 'First steps', url: 'https://example.com/a', dateAdded: '2024-01-01T00:00:00Z' },
    ]);
  });

  it('reads an empty list', async () => {
    expect(await (await sourceWith('[]')).load()).toEqual([]);
  });

  it('fails when the file is missing', async () => {
    const source = new FileReadingSource(path.join(dir, 'missing.json'));
    await expect(source.load()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('fails on malformed JSON', async () => {
    await expect((await sourceWith('[{"title": ')).load()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('fails when an entry is missing a field', async () => {
    const source = await sourceWith(JSON.stringify([{ title: 'No url', date_added: '2024-01-01' }]));
    await expect(source.load()).rejects.toThrow('unexpected shape');
  });
});
