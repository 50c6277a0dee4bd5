import { assertApiKey, DEFAULT_LANGUAGE, DEFAULT_TMDB_BASE } from '../config.js';
import { HttpStatusError, NetworkError, SchemaError } from '../errors.js';
import { fromPayload } from '../models/item.js';
import type { ItemRecord, TMDBPage } from '../types.js';
import type { CatalogProvider, FetchFn } from './types.js';

export interface TmdbClientOptions {
    /** Checked on every call, so a missing key fails per request rather than at startup */
    apiKey: string | undefined;
    language?: string;
    baseUrl?: string;
    fetch?: FetchFn;
}

/**
 * TMDB movie catalog client.
 * No caching and no retries: every call is one request, errors surface as-is.
 */
export class TmdbCatalogClient implements CatalogProvider {
    private readonly apiKey: string | undefined;
    private readonly language: string;
    private readonly baseUrl: string;
    private readonly fetchFn: FetchFn;

    constructor(options: TmdbClientOptions) {
        this.apiKey = options.apiKey;
        this.language = options.language ?? DEFAULT_LANGUAGE;
        this.baseUrl = options.baseUrl ?? DEFAULT_TMDB_BASE;
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    }

    async listPopular(page = 1): Promise<ItemRecord[]> {
        const body = await this.request('/movie/popular', { page: pageParam(page) });
        return parseResults(body);
    }

    async search(query: string, page = 1): Promise<ItemRecord[]> {
        if (query.trim() === '') return [];
        const body = await this.request('/search/movie', { query, page: pageParam(page) });
        return parseResults(body);
    }

    private async request(endpoint: string, params: Record<string, string>): Promise<unknown> {
        const url = new URL(`${this.baseUrl}${endpoint}`);
        url.searchParams.set('api_key', assertApiKey(this.apiKey));
        url.searchParams.set('language', this.language);
        for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

        let res: Response;
        try {
            res = await this.fetchFn(url.toString());
        } catch (err) {
            throw new NetworkError(`Could not reach TMDB (${endpoint})`, { cause: err });
        }

        if (!res.ok) throw new HttpStatusError(res.status, res.statusText);

        // A reset while the body streams in is still a transport failure
        let text: string;
        try {
            text = await res.text();
        } catch (err) {
            throw new NetworkError(`Connection to TMDB dropped while reading ${endpoint}`, { cause: err });
        }

        try {
            return JSON.parse(text);
        } catch {
            throw new SchemaError('body', `TMDB returned a body that is not JSON (${endpoint})`);
        }
    }
}

/** Validate a TMDB list envelope and map every entry, preserving order. */
export function parseResults(body: unknown): ItemRecord[] {
    if (!isPage(body)) throw new SchemaError('results', 'TMDB response has no results array');
    return body.results.map(fromPayload);
}

function isPage(body: unknown): body is TMDBPage {
    return typeof body === 'object' && body !== null && 'results' in body && Array.isArray(body.results);
}

function pageParam(page: number): string {
    if (!Number.isInteger(page) || page < 1) throw new RangeError(`page must be a positive integer, got ${page}`);
    return String(page);
}
