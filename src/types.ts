/**
 * Shared types for the catalog core.
 * ItemPayload is the TMDB wire shape; ItemRecord is the immutable in-app value.
 */

/** A movie entry as TMDB returns it and as it is persisted in the favorites blob. */
export interface ItemPayload {
    id: number;
    title: string;
    overview: string;
    poster_path: string | null;
    backdrop_path: string | null;
    vote_average: number;
    release_date: string;
    genre_ids: number[];
}

export interface ItemRecord {
    readonly id: number;
    readonly title: string;
    readonly overview: string;
    readonly posterPath: string | null;
    readonly backdropPath: string | null;
    /** TMDB vote average, 0–10 */
    readonly score: number;
    readonly releaseDate: string;
    readonly genreIds: readonly number[];
}

/** ItemRecord plus everything a renderer needs without further derivation. */
export interface ItemView extends ItemRecord {
    posterUrl: string;
    backdropUrl: string;
    scoreLabel: string;
}

/** TMDB list envelope for /movie/popular and /search/movie. */
export interface TMDBPage {
    page?: number;
    results: unknown[];
    total_pages?: number;
    total_results?: number;
}
