import Papa from 'papaparse';
import type { ListingResult, ListingRow } from '../types';
import type { ListingPageRequest } from './api';
import { FetchListingError, describeError } from './errors';

type CsvRow = Record<string, string | undefined>;

const REQUIRED_COLUMNS = ['manufacturername', 'name', 'letterdate', 'url'];

export type ListingPageSource = (request: ListingPageRequest) => Promise<string>;

/**
 * Parses one page of the letter listing. An empty body or a header-only
 * document yields no rows; anything papaparse cannot read, or a table
 * without the expected columns, throws.
 */
export const parseListingCsv = (body: string): ListingRow[] => {
  if (body.trim() === '') return [];

  const result = Papa.parse<CsvRow>(body.trim(), {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim().toLowerCase(),
  });

  if (result.errors.length > 0) {
    throw new Error(result.errors[0].message);
  }
  if (result.data.length === 0) return [];

  const fields = result.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new Error(`Missing columns: ${missing.join(', ')}`);
  }

  return result.data.map((row) => ({
    manufacturerName: (row.manufacturername ?? '').trim(),
    name: (row.name ?? '').trim(),
    letterDate: (row.letterdate ?? '').trim(),
    url: (row.url ?? '').trim(),
  }));
};

/**
 * Yields the rows of each listing page in order, starting at page 1, and
 * finishes on the first page without rows.
 */
export async function* listingPages(
  year: number,
  source: ListingPageSource,
): AsyncGenerator<ListingRow[], void, undefined> {
  for (let page = 1; ; page++) {
    let rows: ListingRow[];
    try {
      rows = parseListingCsv(await source({ year, page }));
    } catch (error) {
      throw new FetchListingError(year, page, describeError(error));
    }
    if (rows.length === 0) return;
    yield rows;
  }
}

export interface ListingFetcher {
  fetchListing(year: number): Promise<ListingResult>;
}

export const createListingFetcher = (source: ListingPageSource): ListingFetcher => {
  const cache = new Map<number, ListingResult>();

  return {
    async fetchListing(year: number): Promise<ListingResult> {
      const cached = cache.get(year);
      if (cached) {
        console.log(`📦 Using cached listing for ${year} (${cached.rows.length} rows)`);
        return cached;
      }

      console.log(`🔄 Fetching listing for ${year}`);
      const rows: ListingRow[] = [];
      let error: FetchListingError | null = null;
      try {
        for await (const page of listingPages(year, source)) {
          rows.push(...page);
        }
      } catch (caught) {
        if (!(caught instanceof FetchListingError)) throw caught;
        console.error(`❌ ${caught.message}`);
        error = caught;
      }

      const result: ListingResult = { year, rows: Object.freeze(rows), error };
      // failed listings stay uncached so that reselecting the year retries
      if (!error) {
        cache.set(year, result);
        console.log(`✅ Cached ${rows.length} rows for ${year}`);
      }
      return result;
    },
  };
};
