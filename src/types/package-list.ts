export interface PageRequest {
  readonly offset: number;
  readonly pageSize: number;
}

/**
 * Ordered package names, one per catalog entry, in fetch order.
 * Duplicates are passed through as found.
 */
export type PackageList = readonly string[];

/** Builds the search URL for a given result offset. */
export type UrlBuilder = (offset: number) => string;
