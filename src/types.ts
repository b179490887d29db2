export const ALL_REGIONS = ['America', 'Asia Pacific', 'Europe', 'Middle East / Africa'] as const;

export type Region = (typeof ALL_REGIONS)[number];

export interface Query {
  keyword?: string;
  regions: Region[];
}

export type RawRecord = Record<string, unknown>;

export type RawTable = RawRecord[];

export const OUTPUT_COLUMNS = [
  'Name',
  'Slug',
  'Collection ID',
  'Item ID',
  'Archived',
  'Draft',
  'Created On',
  'Updated On',
  'Published On',
  'Company',
  'Type',
  'Description',
  'Location',
  'Industry',
  'Level',
  'Apply URL',
  'Salary Range',
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

export type NormalizedRecord = Record<OutputColumn, string>;

export interface SearchResult {
  hits?: RawRecord[];
}

export interface SearchResponse {
  results: SearchResult[];
}

export type HarvestFailureKind = 'connection' | 'http' | 'malformed_response' | 'unknown';

export interface HarvestFailure {
  kind: HarvestFailureKind;
  message: string;
  status?: number;
}

export interface HarvestResult {
  records: RawTable;
  pages: number;
  capped: boolean;
  error?: HarvestFailure;
}

export interface FetchResult {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
  contentType: string;
}

export interface DelimitedTable {
  columns: string[];
  rows: string[][];
}

export function isRegion(value: string): value is Region {
  return (ALL_REGIONS as readonly string[]).includes(value);
}

export function regionsOrDefault(regions: readonly Region[]): Region[] {
  return regions.length > 0 ? [...regions] : [...ALL_REGIONS];
}
