import type { ListingResult, ListingRow } from '../types';

export const LISTING_HEADER = 'manufacturername,name,letterdate,url';

export const letter = (overrides: Partial<ListingRow> = {}): ListingRow => ({
  manufacturerName: 'Tesla',
  name: 'Recall 23V-001',
  letterDate: '2023-05-01',
  url: 'https://x/a.pdf',
  ...overrides,
});

export const toCsv = (rows: ListingRow[]): string =>
  [LISTING_HEADER, ...rows.map((row) => [row.manufacturerName, row.name, row.letterDate, row.url].join(','))].join('\n');

/** `count` distinct letters for one page of a listing. */
export const letterPage = (page: number, count: number): ListingRow[] =>
  Array.from({ length: count }, (_, index) =>
    letter({
      manufacturerName: index % 2 === 0 ? 'Ford Motor Company' : 'Honda',
      name: `Letter ${page}-${index + 1}`,
      url: `https://x/${page}-${index + 1}.pdf`,
    }),
  );

export const listingResult = (rows: ListingRow[], year = 2023): ListingResult => ({
  year,
  rows,
  error: null,
});
