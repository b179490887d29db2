import { describe, expect, it } from 'vitest';
import { recordingSleep } from '../../__tests__/fakes.js';
import { Session } from '../../session/provider.js';
import { ALL_REGIONS } from '../../types.js';
import type { RawRecord, Region, SearchResponse } from '../../types.js';
import { HttpError, MalformedResponseError } from '../../utils/errors.js';
import { HttpClient } from '../../utils/http.js';
import { MemoryLogger } from '../../utils/logger.js';
import type { PageFetcher } from '../fetcher.js';
import { harvest } from '../harvester.js';

interface PageCall {
  regions: Region[];
  keyword: string | undefined;
  pageIndex: number;
}

function hits(count: number, page: number): RawRecord[] {
  return Array.from({ length: count }, (_, i) => ({ name: `Job ${page}-${i}` }));
}

function stubFetcher(pages: Array<number | Error>, repeatLast = false): { fetchPage: PageFetcher; calls: PageCall[] } {
  const calls: PageCall[] = [];
  const fetchPage: PageFetcher = async (_session, regions, keyword, pageIndex) => {
    calls.push({ regions, keyword, pageIndex });
    const entry = pageIndex < pages.length ? pages[pageIndex] : repeatLast ? pages[pages.length - 1] : 0;
    if (entry instanceof Error) {
      throw entry;
    }
    const response: SearchResponse = { results: [{ hits: hits(entry ?? 0, pageIndex) }] };
    return response;
  };
  return { fetchPage, calls };
}

const sessions = {
  getSession: async () => new Session(new HttpClient(), 0),
};

describe('harvest', () => {
  it('stops at the first empty page', async () => {
    const { fetchPage, calls } = stubFetcher([5, 5, 0]);
    const { sleep, delays } = recordingSleep();

    const result = await harvest({ keyword: 'sales', regions: ['Europe'] }, { sessions, fetchPage, sleep });

    expect(result.records).toHaveLength(10);
    expect(result.pages).toBe(2);
    expect(result.capped).toBe(false);
    expect(result.error).toBeUndefined();
    expect(calls.map((call) => call.pageIndex)).toEqual([0, 1, 2]);
    expect(delays).toEqual([500, 500]);
  });

  it('keeps page-then-hit order', async () => {
    const { fetchPage } = stubFetcher([2, 2, 0]);
    const { sleep } = recordingSleep();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep });

    expect(result.records.map((record) => record.name)).toEqual(['Job 0-0', 'Job 0-1', 'Job 1-0', 'Job 1-1']);
  });

  it('stops once more than the record cap has been gathered', async () => {
    const { fetchPage, calls } = stubFetcher([5001], true);
    const { sleep, delays } = recordingSleep();
    const logger = new MemoryLogger();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep, logger });

    expect(result.records).toHaveLength(5001);
    expect(result.capped).toBe(true);
    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
    expect(logger.lines).toContain('[WARN] Record cap of 5000 reached after 1 page(s); stopping');
  });

  it('keeps every hit of a very large page', async () => {
    const { fetchPage, calls } = stubFetcher([300000]);
    const { sleep } = recordingSleep();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep });

    expect(result.error).toBeUndefined();
    expect(result.records).toHaveLength(300000);
    expect(result.records[299999]).toEqual({ name: 'Job 0-299999' });
    expect(result.capped).toBe(true);
    expect(calls).toHaveLength(1);
  });

  it('stops just above the cap when the upstream never runs dry', async () => {
    const { fetchPage, calls } = stubFetcher([2000], true);
    const { sleep } = recordingSleep();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep });

    expect(result.records).toHaveLength(6000);
    expect(result.capped).toBe(true);
    expect(calls).toHaveLength(3);
  });

  it('does not cap at exactly the limit', async () => {
    const { fetchPage, calls } = stubFetcher([3, 2, 0]);
    const { sleep } = recordingSleep();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep, maxRecords: 5 });

    expect(result.records).toHaveLength(5);
    expect(result.capped).toBe(false);
    expect(calls).toHaveLength(3);
  });

  it('returns the records gathered before a failed page', async () => {
    const { fetchPage, calls } = stubFetcher([5, new HttpError('boom', 'https://careers.example.test/api/search', 503)]);
    const { sleep } = recordingSleep();
    const logger = new MemoryLogger();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep, logger });

    expect(result.records).toHaveLength(5);
    expect(result.pages).toBe(1);
    expect(result.error).toEqual({ kind: 'http', message: 'boom', status: 503 });
    expect(calls).toHaveLength(2);
    expect(logger.lines.at(-1)).toBe('[ERROR] Harvest stopped on page 1: boom');
  });

  it('treats a malformed response like a failed page', async () => {
    const { fetchPage } = stubFetcher([new MalformedResponseError('bad body')]);
    const { sleep } = recordingSleep();

    const result = await harvest({ regions: ['Europe'] }, { sessions, fetchPage, sleep });

    expect(result.records).toEqual([]);
    expect(result.error).toEqual({ kind: 'malformed_response', message: 'bad body' });
  });

  it('searches every region when none is selected', async () => {
    const { fetchPage, calls } = stubFetcher([0]);

    await harvest({ keyword: '  ', regions: [] }, { sessions, fetchPage });

    expect(calls[0]?.regions).toEqual([...ALL_REGIONS]);
    expect(calls[0]?.keyword).toBeUndefined();
  });

  it('reports clamped progress against the estimate after each page', async () => {
    const { fetchPage } = stubFetcher([1000, 1000, 1000, 0]);
    const { sleep } = recordingSleep();
    const progress: Array<[number, number]> = [];

    await harvest(
      { regions: ['Europe'] },
      { sessions, fetchPage, sleep, onProgress: (fraction, fetched) => progress.push([fraction, fetched]) },
    );

    expect(progress).toEqual([
      [0.4, 1000],
      [0.8, 2000],
      [1, 3000],
    ]);
  });

  it('asks for a session before every page', async () => {
    const { fetchPage } = stubFetcher([1, 1, 0]);
    const { sleep } = recordingSleep();
    let requested = 0;

    await harvest(
      { regions: ['Europe'] },
      {
        sessions: {
          getSession: async () => {
            requested += 1;
            return new Session(new HttpClient(), 0);
          },
        },
        fetchPage,
        sleep,
      },
    );

    expect(requested).toBe(3);
  });
});
