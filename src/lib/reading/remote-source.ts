import { z } from 'zod';
import { SourceUnavailableError } from '@/lib/errors';
import { ReadingEntrySchema, toReadingItem } from './file-source';
import type { ReadingItem, ReadingSource } from './types';

const ReadingListResponseSchema = z.object({
  entries: z.array(ReadingEntrySchema),
  total_count: z.number().int().nonnegative(),
});

export interface RemoteSourceOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/** Reading list served by the mind-map service at `GET {baseUrl}/reading-list`. */
export class RemoteReadingSource implements ReadingSource {
  readonly kind = 'remote' as const;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(
    private readonly baseUrl: string,
    opts: RemoteSourceOptions = {},
  ) {
    this.fetchImpl = opts.fetch ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async load(): Promise<ReadingItem[]> {
    const url = `${this.baseUrl}/reading-list`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (cause) {
      throw new SourceUnavailableError(`mind-map service unreachable at ${url}`, { cause });
    }
    if (!res.ok) throw new SourceUnavailableError(`mind-map service answered ${res.status} for ${url}`);
    let body: unknown;
    try {
      body = await res.json();
    } catch (cause) {
      throw new SourceUnavailableError(`mind-map service sent invalid JSON from ${url}`, { cause });
    }
    const parsed = ReadingListResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(`mind-map service sent an unexpected body from ${url}`, { cause: parsed.error });
    }
    return parsed.data.entries.map(toReadingItem);
  }
}
