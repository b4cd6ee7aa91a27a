export class ListingNotFoundError extends Error {
  readonly listingId: string;

  constructor(listingId: string) {
    super(`Listing ${listingId} not found.`);
    this.name = 'ListingNotFoundError';
    this.listingId = listingId;
  }
}

/** Persistence failure. Always fatal to the calling request. */
export class ListingStoreError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`Listing store ${operation} failed: ${message}`, options);
    this.name = 'ListingStoreError';
    this.operation = operation;
  }
}

export const isNotFoundError = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};
