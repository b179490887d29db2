import { z } from 'zod';
import type { Config } from '../config.js';
import type { Session } from '../session/provider.js';
import type { RawRecord, Region, SearchResponse } from '../types.js';
import { HttpError, MalformedResponseError } from '../utils/errors.js';
import { HIGHLIGHT_POST_TAG, HIGHLIGHT_PRE_TAG } from '../utils/text.js';

export const REGION_FACET = 'geographicAreaFilter';
export const JOB_CATEGORY_FILTER = 'category:job';
export const SEARCH_FACETS = ['businessGroupFilter', 'cityFilter', 'contractFilter', 'countryRegionFilter'] as const;

export type SearchSettings = Pick<Config, 'searchApiUrl' | 'indexName' | 'hitsPerPage'>;

export interface SearchPayload {
  queries: Array<{
    indexName: string;
    params: {
      facetFilters: string[][];
      facets: string[];
      filters: string;
      highlightPostTag: string;
      highlightPreTag: string;
      hitsPerPage: number;
      maxValuesPerFacet: number;
      page: number;
      query: string;
    };
  }>;
}

export type PageFetcher = (
  session: Session,
  regions: Region[],
  keyword: string | undefined,
  pageIndex: number,
) => Promise<SearchResponse>;

const searchResponseSchema = z.object({
  results: z.array(
    z
      .object({
        hits: z.array(z.record(z.unknown())).optional(),
      })
      .passthrough(),
  ),
});

export function buildSearchPayload(
  settings: Pick<SearchSettings, 'indexName' | 'hitsPerPage'>,
  regions: Region[],
  keyword: string | undefined,
  pageIndex: number,
): SearchPayload {
  return {
    queries: [
      {
        indexName: settings.indexName,
        params: {
          // A single inner array is an OR-group.
          facetFilters: [regions.map((region) => `${REGION_FACET}:${region}`)],
          facets: [...SEARCH_FACETS],
          filters: JOB_CATEGORY_FILTER,
          highlightPostTag: HIGHLIGHT_POST_TAG,
          highlightPreTag: HIGHLIGHT_PRE_TAG,
          hitsPerPage: settings.hitsPerPage,
          maxValuesPerFacet: 100,
          page: pageIndex,
          query: keyword?.trim() ?? '',
        },
      },
    ],
  };
}

export function parseSearchResponse(body: string): SearchResponse {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError('Search response is not valid JSON', { cause: error });
  }

  const parsed = searchResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedResponseError(`Search response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return { results: parsed.data.results.map((result) => ({ hits: result.hits })) };
}

export function extractHits(response: SearchResponse): RawRecord[] {
  const hits: RawRecord[] = [];
  for (const result of response.results) {
    for (const hit of result.hits ?? []) {
      hits.push(hit);
    }
  }
  return hits;
}

export function createPageFetcher(settings: SearchSettings): PageFetcher {
  return async (session, regions, keyword, pageIndex) => {
    if (regions.length === 0) {
      throw new RangeError('At least one region is required');
    }
    if (!Number.isInteger(pageIndex) || pageIndex < 0) {
      throw new RangeError(`Invalid page index: ${pageIndex}`);
    }

    const payload = buildSearchPayload(settings, regions, keyword, pageIndex);
    const response = await session.client.request(settings.searchApiUrl, {
      method: 'POST',
      body: JSON.stringify(payload),
    });

    if (response.status >= 400) {
      throw new HttpError(
        `Search request for page ${pageIndex} failed with status ${response.status}`,
        settings.searchApiUrl,
        response.status,
      );
    }

    return parseSearchResponse(response.body);
  };
}
