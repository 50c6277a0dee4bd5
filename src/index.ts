import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SQLitePreferences } from './db/sqlite.js';
import { TmdbCatalogClient } from './providers/tmdb.js';
import { FavoritesStore } from './state/favorites.js';

const config = loadConfig();

// Initialize repository
const repo = new SQLitePreferences(config.dbPath);
repo.init();

const catalog = new TmdbCatalogClient({
    apiKey: config.tmdbApiKey,
    language: config.language,
    baseUrl: config.tmdbBaseUrl,
});
const favorites = new FavoritesStore(repo);

const app = createApp({ catalog, favorites });

const server = app.listen(config.port, () => {
    console.log(`Catalog server listening on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
    console.log(`${signal} received, flushing favorites`);
    server.close();
    favorites.whenIdle().then(
        () => {
            repo.close();
            process.exit(0);
        },
        (err: unknown) => {
            console.error('Shutdown error:', err);
            process.exit(1);
        },
    );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
