import type { FetchListingError } from '../services/errors';

export interface ListingRow {
  manufacturerName: string;
  name: string;
  letterDate: string;
  url: string;
}

export type ListingTable = readonly ListingRow[];

export interface ListingResult {
  year: number;
  rows: ListingTable;
  error: FetchListingError | null;
}

export interface PdfDocument {
  bytes: ArrayBuffer;
  filename: string;
  url: string;
}

export interface SelectionState {
  year: number | null;
  make: string | null;
  version: string | null;
  listing: ListingResult | null;
  document: PdfDocument | null;
}

export type SelectionStage = 'no-year' | 'year-selected' | 'make-selected' | 'version-selected';

export interface VersionOption {
  label: string;
  row: ListingRow;
}

export interface ResolvedSelection {
  year: number;
  make: string;
  versionLabel: string;
}
