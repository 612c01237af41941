import type { ListingRow, ListingTable, PdfDocument, ResolvedSelection } from '../types';
import type { ApiClient } from './api';
import { DocumentNotFoundError } from './errors';

const DATE_SUFFIX = / \([^()]*\)$/;

export const sanitize = (value: string): string =>
  value.replace(/[^A-Za-z0-9\s-]/g, '').replace(/\s+/g, '_');

/** Version label without its trailing " (<letter date>)". */
export const versionName = (label: string): string => label.replace(DATE_SUFFIX, '');

export const documentFilename = (year: number, make: string, name: string): string =>
  `${year}_${sanitize(make)}_${sanitize(name)}.pdf`;

export const findVersionRow = (
  table: ListingTable,
  make: string,
  label: string,
): ListingRow | undefined => {
  const name = versionName(label);
  return table.find((row) => row.manufacturerName === make && row.name === name);
};

export const resolveDocument = async (
  table: ListingTable,
  { year, make, versionLabel }: ResolvedSelection,
  api: Pick<ApiClient, 'getDocument'>,
): Promise<PdfDocument> => {
  const row = findVersionRow(table, make, versionLabel);
  if (!row) {
    throw new DocumentNotFoundError(make, versionLabel);
  }

  const bytes = await api.getDocument(row.url);
  console.log(`✅ Loaded ${bytes.byteLength} bytes for ${row.name}`);
  return {
    bytes,
    url: row.url,
    filename: documentFilename(year, make, row.name),
  };
};
