import type {
  ListingRow,
  ListingTable,
  PdfDocument,
  ResolvedSelection,
  SelectionStage,
  SelectionState,
  VersionOption,
} from '../types';
import type { ListingFetcher } from './listing';

export const createSelectionState = (): SelectionState => ({
  year: null,
  make: null,
  version: null,
  listing: null,
  document: null,
});

export const activeTable = (state: SelectionState): ListingTable => state.listing?.rows ?? [];

export const selectionStage = (state: SelectionState): SelectionStage => {
  if (state.year === null) return 'no-year';
  if (state.make === null) return 'year-selected';
  if (state.version === null) return 'make-selected';
  return 'version-selected';
};

/** True once a year has been loaded and returned no rows. */
export const isEmptyListing = (state: SelectionState): boolean =>
  state.year !== null && state.listing !== null && state.listing.rows.length === 0;

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const makeOptions = (state: SelectionState): string[] => {
  const makes = new Set(activeTable(state).map((row) => row.manufacturerName));
  return Array.from(makes).sort(compareText);
};

export const versionLabel = (row: ListingRow): string => `${row.name} (${row.letterDate})`;

const compareLetterDates = (a: string, b: string): number => {
  const timeA = Date.parse(a);
  const timeB = Date.parse(b);
  if (!Number.isNaN(timeA) && !Number.isNaN(timeB)) {
    return timeA - timeB;
  }
  return compareText(a, b);
};

/**
 * Letters of the selected make, most recent first. Array#sort is stable, so
 * letters sharing a date keep the order they were fetched in.
 */
export const versionOptions = (state: SelectionState): VersionOption[] => {
  if (state.make === null) return [];
  return activeTable(state)
    .filter((row) => row.manufacturerName === state.make)
    .sort((a, b) => compareLetterDates(b.letterDate, a.letterDate))
    .map((row) => ({ label: versionLabel(row), row }));
};

export const selectYear = async (
  state: SelectionState,
  year: number | null,
  fetcher: ListingFetcher,
): Promise<SelectionState> => {
  if (year === state.year) return state;
  if (year === null) return createSelectionState();

  const listing = await fetcher.fetchListing(year);
  return { year, make: null, version: null, listing, document: null };
};

export const selectMake = (state: SelectionState, make: string | null): SelectionState => {
  if (state.year === null || activeTable(state).length === 0) return state;

  const next = make !== null && makeOptions(state).includes(make) ? make : null;
  if (next === state.make) return state;
  return { ...state, make: next, version: null, document: null };
};

export const selectVersion = (state: SelectionState, version: string | null): SelectionState => {
  if (state.make === null) return state;

  const known = versionOptions(state).some((option) => option.label === version);
  const next = known ? version : null;
  if (next === state.version) return state;
  return { ...state, version: next, document: null };
};

/**
 * Stores a fetched document, unless the selection moved on while it was
 * being fetched.
 */
export const attachDocument = (
  state: SelectionState,
  resolvedFor: ResolvedSelection,
  document: PdfDocument,
): SelectionState => {
  if (
    state.year !== resolvedFor.year ||
    state.make !== resolvedFor.make ||
    state.version !== resolvedFor.versionLabel
  ) {
    return state;
  }
  return { ...state, document };
};
