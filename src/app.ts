import express from 'express';
import cors from 'cors';
import type { Response } from 'express';
import {
    ConfigError,
    describeError,
    HttpStatusError,
    NetworkError,
    PersistenceError,
    SchemaError,
} from './errors.js';
import { fromPayload, toItemView } from './models/item.js';
import type { CatalogProvider } from './providers/types.js';
import type { FavoritesStore } from './state/favorites.js';
import type { ItemRecord } from './types.js';

export interface AppDeps {
    catalog: CatalogProvider;
    favorites: FavoritesStore;
}

export function createApp({ catalog, favorites }: AppDeps): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    // ---------- catalog routes ----------

    app.get('/api/popular', async (req, res) => {
        try {
            const page = parsePage(req.query.page);
            const items = await catalog.listPopular(page);
            res.json({ results: items.map(toItemView) });
        } catch (err) {
            sendError(res, 'Popular list error', err);
        }
    });

    app.get('/api/search', async (req, res) => {
        const query = typeof req.query.q === 'string' ? req.query.q : '';

        try {
            const page = parsePage(req.query.page);
            const items = await catalog.search(query, page);
            res.json({ results: items.map(toItemView) });
        } catch (err) {
            sendError(res, 'Search error', err);
        }
    });

    // ---------- favorites routes ----------

    app.get('/api/favorites', (_req, res) => {
        res.json({
            initialized: favorites.isInitialized(),
            results: favorites.favorites().map(toItemView),
        });
    });

    app.get('/api/favorites/:id', (req, res) => {
        const id = Number(req.params.id);
        if (!Number.isInteger(id)) {
            res.status(400).json({ error: 'id must be an integer' });
            return;
        }
        res.json({ id, favorite: favorites.isFavorite(id) });
    });

    app.post('/api/favorites/toggle', async (req, res) => {
        let item: ItemRecord;
        try {
            item = fromPayload(req.body);
        } catch (err) {
            res.status(400).json({ error: describeError(err) });
            return;
        }

        try {
            await favorites.toggle(item);
            res.json({
                favorite: favorites.isFavorite(item.id),
                results: favorites.favorites().map(toItemView),
            });
        } catch (err) {
            sendError(res, 'Toggle favorite error', err);
        }
    });

    return app;
}

function parsePage(raw: unknown): number {
    if (raw === undefined) return 1;
    const page = Number(raw);
    if (!Number.isInteger(page) || page < 1) throw new RangeError('page must be a positive integer');
    return page;
}

function statusFor(err: unknown): number {
    if (err instanceof RangeError) return 400;
    if (err instanceof ConfigError) return 500;
    if (err instanceof HttpStatusError || err instanceof NetworkError || err instanceof SchemaError) return 502;
    if (err instanceof PersistenceError) return 503;
    return 500;
}

function sendError(res: Response, context: string, err: unknown): void {
    console.error(`${context}:`, err);
    res.status(statusFor(err)).json({ error: describeError(err) });
}
