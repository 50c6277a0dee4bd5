import { ConfigError } from './errors.js';

/** Value shipped in .env.example; treated the same as a missing key. */
export const API_KEY_PLACEHOLDER = 'YOUR_TMDB_API_KEY';

export const DEFAULT_LANGUAGE = 'es-ES';
export const DEFAULT_TMDB_BASE = 'https://api.themoviedb.org/3';
export const DEFAULT_DEBOUNCE_MS = 500;

export interface AppConfig {
    readonly tmdbApiKey: string | undefined;
    readonly language: string;
    readonly tmdbBaseUrl: string;
    readonly port: number;
    /** undefined means the repository's default location */
    readonly dbPath: string | undefined;
    readonly searchDebounceMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const {
        TMDB_API_KEY,
        TMDB_LANGUAGE = DEFAULT_LANGUAGE,
        TMDB_BASE_URL = DEFAULT_TMDB_BASE,
        PORT = '3000',
        FAVORITES_DB_PATH,
        SEARCH_DEBOUNCE_MS = String(DEFAULT_DEBOUNCE_MS),
    } = env;

    return Object.freeze({
        tmdbApiKey: TMDB_API_KEY,
        language: TMDB_LANGUAGE,
        tmdbBaseUrl: TMDB_BASE_URL.replace(/\/+$/, ''),
        port: parseNonNegativeInt('PORT', PORT),
        dbPath: FAVORITES_DB_PATH || undefined,
        searchDebounceMs: parseNonNegativeInt('SEARCH_DEBOUNCE_MS', SEARCH_DEBOUNCE_MS),
    });
}

/** Returns the key when usable, otherwise throws ConfigError. */
export function assertApiKey(key: string | undefined): string {
    if (!key || key.trim() === '' || key === API_KEY_PLACEHOLDER) {
        throw new ConfigError(`TMDB_API_KEY not set. Replace '${API_KEY_PLACEHOLDER}' in your .env file.`);
    }
    return key;
}

function parseNonNegativeInt(name: string, raw: string): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}
