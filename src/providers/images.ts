const TMDB_IMG = 'https://image.tmdb.org/t/p/w500';

export const POSTER_PLACEHOLDER = 'https://placehold.co/500x750/333/FFF?text=No+Image';
export const BACKDROP_PLACEHOLDER = 'https://placehold.co/780x439/333/FFF?text=No+Image';

/** Relative TMDB path → CDN URL. Full URLs pass through; absent stays null. */
export function resolveImageUrl(imagePath: string | null): string | null {
    if (!imagePath) return null;
    if (imagePath.startsWith('http')) return imagePath;
    return `${TMDB_IMG}${imagePath}`;
}

export function getPosterUrl(posterPath: string | null): string {
    return resolveImageUrl(posterPath) ?? POSTER_PLACEHOLDER;
}

/**
 * Resolves the best available backdrop.
 * Priority:
 * 1. Backdrop path
 * 2. Poster path (wide layouts still get artwork)
 * 3. Generic placeholder
 */
export function getBackdropUrl(backdropPath: string | null, posterPath: string | null): string {
    return resolveImageUrl(backdropPath) ?? resolveImageUrl(posterPath) ?? BACKDROP_PLACEHOLDER;
}
