import type { ItemRecord } from '../types.js';

/** The subset of the global fetch the catalog client depends on. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * CatalogProvider: a remote listing source.
 * Implementations hold no mutable state and may be called concurrently.
 */
export interface CatalogProvider {
    /** Popular titles, in the order the service ranks them */
    listPopular(page?: number): Promise<ItemRecord[]>;

    /** Search by title; a blank query resolves to [] without a request */
    search(query: string, page?: number): Promise<ItemRecord[]>;
}
