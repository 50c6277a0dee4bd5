import { SchemaError } from '../errors.js';
import { getBackdropUrl, getPosterUrl } from '../providers/images.js';
import type { ItemPayload, ItemRecord, ItemView } from '../types.js';

export const DEFAULT_TITLE = 'Untitled';
export const DEFAULT_OVERVIEW = 'No synopsis';
export const DEFAULT_RELEASE_DATE = 'Unknown date';

/**
 * Build an ItemRecord from an untyped TMDB (or persisted) payload.
 *
 * Optional text fields fall back to placeholders; `vote_average` has no default
 * and a missing or non-numeric value throws SchemaError.
 */
export function fromPayload(json: unknown): ItemRecord {
    if (!isObject(json)) throw new SchemaError('item', 'Item payload must be an object');

    const id = json.id;
    if (typeof id !== 'number' || !Number.isInteger(id)) throw new SchemaError('id');

    const score = json.vote_average;
    if (typeof score !== 'number' || !Number.isFinite(score)) throw new SchemaError('vote_average');

    return Object.freeze({
        id,
        title: optionalString(json, 'title') ?? DEFAULT_TITLE,
        overview: optionalString(json, 'overview') ?? DEFAULT_OVERVIEW,
        posterPath: optionalString(json, 'poster_path'),
        backdropPath: optionalString(json, 'backdrop_path'),
        score,
        releaseDate: optionalString(json, 'release_date') ?? DEFAULT_RELEASE_DATE,
        genreIds: Object.freeze(parseGenreIds(json.genre_ids)),
    });
}

export function toPayload(item: ItemRecord): ItemPayload {
    return {
        id: item.id,
        title: item.title,
        overview: item.overview,
        poster_path: item.posterPath,
        backdrop_path: item.backdropPath,
        vote_average: item.score,
        release_date: item.releaseDate,
        genre_ids: [...item.genreIds],
    };
}

/** Membership identity: records with the same id are the same item. */
export function sameItem(a: Pick<ItemRecord, 'id'>, b: Pick<ItemRecord, 'id'>): boolean {
    return a.id === b.id;
}

export function posterUrl(item: ItemRecord): string {
    return getPosterUrl(item.posterPath);
}

export function backdropUrl(item: ItemRecord): string {
    return getBackdropUrl(item.backdropPath, item.posterPath);
}

/** Score with one decimal, e.g. 7 → "7.0" */
export function formatScore(item: ItemRecord): string {
    return item.score.toFixed(1);
}

export function toItemView(item: ItemRecord): ItemView {
    return {
        ...item,
        genreIds: [...item.genreIds],
        posterUrl: posterUrl(item),
        backdropUrl: backdropUrl(item),
        scoreLabel: formatScore(item),
    };
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// null and undefined both mean "absent"; any other non-string is a schema violation
function optionalString(json: Record<string, unknown>, field: string): string | null {
    const value = json[field];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string') throw new SchemaError(field);
    return value;
}

function parseGenreIds(value: unknown): number[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) throw new SchemaError('genre_ids');
    return value.map((genreId: unknown) => {
        if (typeof genreId !== 'number' || !Number.isInteger(genreId)) throw new SchemaError('genre_ids');
        return genreId;
    });
}
