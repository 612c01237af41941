export class FetchListingError extends Error {
  constructor(
    public readonly year: number,
    public readonly page: number,
    reason: string,
  ) {
    super(`Failed to fetch listing for ${year} (page ${page}): ${reason}`);
    this.name = 'FetchListingError';
  }
}

export class DocumentNotFoundError extends Error {
  constructor(
    public readonly make: string,
    public readonly versionLabel: string,
  ) {
    super(`No document found for ${make} - ${versionLabel}`);
    this.name = 'DocumentNotFoundError';
  }
}

export class DocumentFetchError extends Error {
  constructor(
    public readonly status: number | null,
    public readonly url: string,
  ) {
    super(
      status === null
        ? `Could not fetch PDF from ${url}`
        : `Could not fetch PDF from URL. Status code: ${status}`,
    );
    this.name = 'DocumentFetchError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
