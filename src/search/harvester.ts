import type { SessionProvider } from '../session/provider.js';
import { regionsOrDefault } from '../types.js';
import type { HarvestResult, Query, RawRecord } from '../types.js';
import { sleep as defaultSleep } from '../utils/concurrency.js';
import { describeError } from '../utils/errors.js';
import type { HarvestLogger } from '../utils/logger.js';
import { MemoryLogger } from '../utils/logger.js';
import { extractHits } from './fetcher.js';
import type { PageFetcher } from './fetcher.js';

export const DEFAULT_MAX_RECORDS = 5000;
export const DEFAULT_PAGE_DELAY_MS = 500;
export const DEFAULT_PROGRESS_ESTIMATE = 2500;

export type ProgressObserver = (fraction: number, fetched: number) => void;

export interface HarvestDeps {
  sessions: Pick<SessionProvider, 'getSession'>;
  fetchPage: PageFetcher;
  logger?: HarvestLogger;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: ProgressObserver;
  maxRecords?: number;
  pageDelayMs?: number;
  progressEstimate?: number;
}

/**
 * Walks the result pages one at a time until a page comes back empty or the
 * record cap is passed. A failed page ends the harvest; whatever was gathered
 * before it is returned together with the error.
 */
export async function harvest(query: Query, deps: HarvestDeps): Promise<HarvestResult> {
  const logger = deps.logger ?? new MemoryLogger();
  const sleep = deps.sleep ?? defaultSleep;
  const maxRecords = deps.maxRecords ?? DEFAULT_MAX_RECORDS;
  const pageDelayMs = deps.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
  const progressEstimate = deps.progressEstimate ?? DEFAULT_PROGRESS_ESTIMATE;

  const regions = regionsOrDefault(query.regions);
  const keyword = query.keyword?.trim() || undefined;
  const records: RawRecord[] = [];
  let page = 0;
  let capped = false;

  await logger.info(`Harvest started keyword=${JSON.stringify(keyword ?? '')} regions=${regions.join('|')}`);

  try {
    for (;;) {
      const session = await deps.sessions.getSession();
      const response = await deps.fetchPage(session, regions, keyword, page);
      const hits = extractHits(response);
      if (hits.length === 0) {
        break;
      }

      for (const hit of hits) {
        records.push(hit);
      }
      page += 1;
      deps.onProgress?.(Math.min(records.length / progressEstimate, 1), records.length);
      await logger.info(`page=${page - 1} hits=${hits.length} total=${records.length}`);

      if (records.length > maxRecords) {
        capped = true;
        await logger.warn(`Record cap of ${maxRecords} reached after ${page} page(s); stopping`);
        break;
      }

      await sleep(pageDelayMs);
    }
  } catch (error) {
    const failure = describeError(error);
    await logger.error(`Harvest stopped on page ${page}: ${failure.message}`);
    return { records, pages: page, capped, error: failure };
  }

  await logger.info(`Harvest finished pages=${page} records=${records.length}`);
  return { records, pages: page, capped };
}
