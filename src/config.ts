import { z } from 'zod';

/**
 * Runtime configuration, read from environment variables.
 * Every variable is optional; the defaults target the public careers site.
 */
const envSchema = z.object({
  SEARCH_API_URL: z.string().url().default('https://www.lvmh.com/api/search'),
  JOB_OFFERS_URL: z.string().url().default('https://www.lvmh.com/en/join-us/our-job-offers'),
  SEARCH_INDEX_NAME: z.string().min(1).default('PRD-en-us-timestamp-desc'),
  HITS_PER_PAGE: z.coerce.number().int().positive().default(50),
  HARVEST_MAX_RECORDS: z.coerce.number().int().positive().default(5000),
  HARVEST_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  PROGRESS_ESTIMATE_TOTAL: z.coerce.number().int().positive().default(2500),
  SESSION_MAX_AGE_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  HTTP_RETRIES: z.coerce.number().int().nonnegative().default(5),
  CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(60 * 60 * 1000),
  OUTPUT_DIR: z.string().min(1).default('reports'),
  LOG_DIR: z.string().min(1).default('logs'),
});

export interface Config {
  searchApiUrl: string;
  jobOffersUrl: string;
  indexName: string;
  hitsPerPage: number;
  maxRecords: number;
  pageDelayMs: number;
  progressEstimateTotal: number;
  sessionMaxAgeMs: number;
  requestTimeoutMs: number;
  httpRetries: number;
  cacheTtlMs: number;
  outputDir: string;
  logDir: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  // Blank values fall back to the defaults.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    searchApiUrl: vars.SEARCH_API_URL,
    jobOffersUrl: vars.JOB_OFFERS_URL,
    indexName: vars.SEARCH_INDEX_NAME,
    hitsPerPage: vars.HITS_PER_PAGE,
    maxRecords: vars.HARVEST_MAX_RECORDS,
    pageDelayMs: vars.HARVEST_PAGE_DELAY_MS,
    progressEstimateTotal: vars.PROGRESS_ESTIMATE_TOTAL,
    sessionMaxAgeMs: vars.SESSION_MAX_AGE_MS,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    httpRetries: vars.HTTP_RETRIES,
    cacheTtlMs: vars.CACHE_TTL_MS,
    outputDir: vars.OUTPUT_DIR,
    logDir: vars.LOG_DIR,
  };
}
