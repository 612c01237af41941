import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createListingFetcher, listingPages, parseListingCsv, type ListingPageSource } from './listing';
import { FetchListingError } from './errors';
import { LISTING_HEADER, letter, letterPage, toCsv } from '../test/fixtures';

const pagedSource = (pages: string[]) =>
  vi.fn<ListingPageSource>(async ({ page }) => pages[page - 1] ?? '');

describe('parseListingCsv', () => {
  it('maps the listing columns onto rows', () => {
    const body = `${LISTING_HEADER}\nTesla, Recall 23V-001 ,2023-05-01,https://x/a.pdf\n`;

    expect(parseListingCsv(body)).toEqual([
      { manufacturerName: 'Tesla', name: 'Recall 23V-001', letterDate: '2023-05-01', url: 'https://x/a.pdf' },
    ]);
  });

  it('reads quoted cells and ignores extra columns', () => {
    const body = `id,${LISTING_HEADER}\n7,"Ford Motor Company","Seat Belt, Rear",2023-02-01,https://x/f.pdf`;

    expect(parseListingCsv(body)).toEqual([
      { manufacturerName: 'Ford Motor Company', name: 'Seat Belt, Rear', letterDate: '2023-02-01', url: 'https://x/f.pdf' },
    ]);
  });

  it('treats an empty body or a header-only table as an empty page', () => {
    expect(parseListingCsv('')).toEqual([]);
    expect(parseListingCsv('  \n')).toEqual([]);
    expect(parseListingCsv(`${LISTING_HEADER}\n`)).toEqual([]);
  });

  it('rejects a table without the listing columns', () => {
    expect(() => parseListingCsv('foo,bar\n1,2')).toThrow('Missing columns: manufacturername, name, letterdate, url');
  });

  it('rejects malformed csv', () => {
    expect(() => parseListingCsv(`${LISTING_HEADER}\n"Tesla,Recall,2023-05-01,https://x/a.pdf`)).toThrow();
  });
});

describe('listingPages', () => {
  it('yields one batch per page and stops at the first empty page', async () => {
    const source = pagedSource([toCsv(letterPage(1, 2)), toCsv(letterPage(2, 1)), '']);

    const batches: number[] = [];
    for await (const rows of listingPages(2021, source)) {
      batches.push(rows.length);
    }

    expect(batches).toEqual([2, 1]);
    expect(source.mock.calls.map(([request]) => request)).toEqual([
      { year: 2021, page: 1 },
      { year: 2021, page: 2 },
      { year: 2021, page: 3 },
    ]);
  });
});

describe('createListingFetcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('concatenates every page before the first empty one', async () => {
    const source = pagedSource([toCsv(letterPage(1, 150)), toCsv(letterPage(2, 37)), '']);
    const fetcher = createListingFetcher(source);

    const result = await fetcher.fetchListing(2023);

    expect(result.rows).toHaveLength(187);
    expect(result.error).toBeNull();
    expect(result.rows[0].name).toBe('Letter 1-1');
    expect(result.rows[186].name).toBe('Letter 2-37');
    expect(source).toHaveBeenCalledTimes(3);
  });

  it('serves a second request for the same year from the cache', async () => {
    const source = pagedSource([toCsv([letter()])]);
    const fetcher = createListingFetcher(source);

    const first = await fetcher.fetchListing(2023);
    const second = await fetcher.fetchListing(2023);

    expect(second).toBe(first);
    expect(source).toHaveBeenCalledTimes(2);
  });

  it('keeps separate entries per year', async () => {
    const source = vi.fn<ListingPageSource>(async ({ year, page }) =>
      page === 1 ? toCsv([letter({ name: `Letter ${year}` })]) : '',
    );
    const fetcher = createListingFetcher(source);

    const older = await fetcher.fetchListing(2019);
    const newer = await fetcher.fetchListing(2020);

    expect(older.rows.map((row) => row.name)).toEqual(['Letter 2019']);
    expect(newer.rows.map((row) => row.name)).toEqual(['Letter 2020']);
  });

  it('returns and caches an empty table when the first page is empty', async () => {
    const source = pagedSource([]);
    const fetcher = createListingFetcher(source);

    const result = await fetcher.fetchListing(1950);
    await fetcher.fetchListing(1950);

    expect(result).toEqual({ year: 1950, rows: [], error: null });
    expect(source).toHaveBeenCalledTimes(1);
  });

  it('stops on a failing page and keeps the rows gathered so far', async () => {
    const source = vi.fn<ListingPageSource>(async ({ page }) => {
      if (page === 2) throw new Error('socket hang up');
      return toCsv(letterPage(page, 3));
    });
    const fetcher = createListingFetcher(source);

    const result = await fetcher.fetchListing(2023);

    expect(result.rows).toHaveLength(3);
    expect(result.error).toBeInstanceOf(FetchListingError);
    expect(result.error?.page).toBe(2);
    expect(result.error?.message).toBe('Failed to fetch listing for 2023 (page 2): socket hang up');
    expect(source).toHaveBeenCalledTimes(2);
  });

  it('does not cache a failed listing', async () => {
    const source = vi.fn<ListingPageSource>().mockRejectedValueOnce(new Error('timeout')).mockResolvedValue('');
    const fetcher = createListingFetcher(source);

    const failed = await fetcher.fetchListing(2023);
    const retried = await fetcher.fetchListing(2023);

    expect(failed.error?.page).toBe(1);
    expect(failed.rows).toEqual([]);
    expect(retried.error).toBeNull();
    expect(source).toHaveBeenCalledTimes(2);
  });
});
