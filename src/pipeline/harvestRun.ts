import type { Config } from '../config.js';
import { normalize } from '../normalize/normalizer.js';
import { HarvestCache } from '../search/cache.js';
import { createPageFetcher } from '../search/fetcher.js';
import type { PageFetcher } from '../search/fetcher.js';
import { harvest } from '../search/harvester.js';
import type { ProgressObserver } from '../search/harvester.js';
import { SessionProvider } from '../session/provider.js';
import type { HarvestFailure, NormalizedRecord, Query, RawTable } from '../types.js';
import type { HarvestLogger } from '../utils/logger.js';

export interface HarvestRunOptions {
  query: Query;
  config: Config;
  logger: HarvestLogger;
  sessions?: Pick<SessionProvider, 'getSession'>;
  cache?: HarvestCache;
  fetchPage?: PageFetcher;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: ProgressObserver;
}

export interface HarvestRunResult {
  raw: RawTable;
  normalized: NormalizedRecord[];
  pages: number;
  capped: boolean;
  fromCache: boolean;
  error?: HarvestFailure;
}

let sharedCache: HarvestCache | undefined;

// Calls without their own cache share one per process, rebuilt if the TTL changes.
function defaultCache(ttlMs: number): HarvestCache {
  if (!sharedCache || sharedCache.ttlMs !== ttlMs) {
    sharedCache = new HarvestCache(ttlMs);
  }
  return sharedCache;
}

export async function runHarvestPipeline(options: HarvestRunOptions): Promise<HarvestRunResult> {
  const { query, config, logger } = options;
  const cache = options.cache ?? defaultCache(config.cacheTtlMs);

  const cached = cache.get(query);
  if (cached) {
    await logger.info(`Cache hit: ${cached.length} record(s)`);
    return {
      raw: cached,
      normalized: normalize(cached),
      pages: 0,
      capped: false,
      fromCache: true,
    };
  }

  const sessions =
    options.sessions ?? new SessionProvider({ config, logger, sleep: options.sleep });
  const result = await harvest(query, {
    sessions,
    fetchPage: options.fetchPage ?? createPageFetcher(config),
    logger,
    sleep: options.sleep,
    onProgress: options.onProgress,
    maxRecords: config.maxRecords,
    pageDelayMs: config.pageDelayMs,
    progressEstimate: config.progressEstimateTotal,
  });

  if (!result.error) {
    cache.set(query, result.records);
  }

  const normalized = normalize(result.records);
  await logger.info(`Normalized ${normalized.length} record(s)`);

  return {
    raw: result.records,
    normalized,
    pages: result.pages,
    capped: result.capped,
    fromCache: false,
    error: result.error,
  };
}
