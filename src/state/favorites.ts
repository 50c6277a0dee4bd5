import { describeError, PersistenceError, toPersistenceError } from '../errors.js';
import { fromPayload, sameItem, toPayload } from '../models/item.js';
import type { PreferencesRepository } from '../db/db.js';
import type { ItemRecord } from '../types.js';
import { Listeners, type Listener, type Subscription } from './listeners.js';

export const FAVORITES_KEY = 'favorites';

export type FavoritesStatus = 'uninitialized' | 'loading' | 'ready';

export interface FavoritesSnapshot {
    status: FavoritesStatus;
    initialized: boolean;
    favorites: readonly ItemRecord[];
}

export interface FavoritesStoreOptions {
    /** Preference key holding the serialized set */
    key?: string;
    /** Diagnostic channel for storage failures */
    onError?: (err: PersistenceError) => void;
}

/**
 * FavoritesStore: the persisted list of bookmarked items, unique by id.
 *
 * Loading starts in the constructor and reaches `ready` exactly once, even when the
 * stored blob cannot be read. Each toggle updates memory and notifies subscribers
 * before its write is queued; writes run one at a time in toggle order, each
 * replacing the whole stored list. A crash between notify and write loses only
 * that last toggle.
 */
export class FavoritesStore {
    readonly ready: Promise<void>;

    private readonly repo: PreferencesRepository;
    private readonly key: string;
    private readonly onError: (err: PersistenceError) => void;
    private readonly listeners = new Listeners<FavoritesSnapshot>();
    private status: FavoritesStatus = 'uninitialized';
    private items: readonly ItemRecord[] = [];
    private writes: Promise<void> = Promise.resolve();

    constructor(repo: PreferencesRepository, options: FavoritesStoreOptions = {}) {
        this.repo = repo;
        this.key = options.key ?? FAVORITES_KEY;
        this.onError = options.onError ?? ((err) => console.error('Favorites persistence error:', err));
        this.ready = this.load();
    }

    isInitialized(): boolean {
        return this.status === 'ready';
    }

    /** Current favorites in insertion order; empty until ready. */
    favorites(): readonly ItemRecord[] {
        return this.items;
    }

    isFavorite(id: number): boolean {
        return this.items.some((fav) => fav.id === id);
    }

    snapshot(): FavoritesSnapshot {
        return {
            status: this.status,
            initialized: this.isInitialized(),
            favorites: this.items,
        };
    }

    subscribe(listener: Listener<FavoritesSnapshot>): Subscription {
        return this.listeners.subscribe(listener);
    }

    /**
     * Remove the item if present, otherwise append it.
     * Memory and subscribers are updated before this returns (once ready); the
     * returned promise settles with this toggle's write. Calls made before ready
     * are applied, in order, right after loading finishes.
     */
    toggle(item: ItemRecord): Promise<void> {
        const result = this.isInitialized() ? this.apply(item) : this.ready.then(() => this.apply(item));
        // Failures already reached onError; an un-awaited toggle must not become an unhandled rejection
        result.catch(() => undefined);
        return result;
    }

    /** Resolves once every queued write has settled. */
    whenIdle(): Promise<void> {
        return this.writes;
    }

    private apply(item: ItemRecord): Promise<void> {
        this.items = this.isFavorite(item.id)
            ? this.items.filter((fav) => !sameItem(fav, item))
            : [...this.items, item];
        this.notify();
        return this.persist(this.items);
    }

    private async load(): Promise<void> {
        this.status = 'loading';

        let entries: string[] = [];
        try {
            entries = (await this.repo.getStringList(this.key)) ?? [];
        } catch (err) {
            this.report(toPersistenceError('read', err));
        }

        const loaded: ItemRecord[] = [];
        entries.forEach((entry, index) => {
            try {
                const item = fromPayload(JSON.parse(entry));
                if (!loaded.some((fav) => sameItem(fav, item))) loaded.push(item);
            } catch (err) {
                // One corrupt entry must not cost the rest of the list
                console.warn(`Skipping unreadable favorite #${index}: ${describeError(err)}`);
            }
        });

        this.items = loaded;
        this.status = 'ready';
        this.notify();
    }

    private persist(snapshot: readonly ItemRecord[]): Promise<void> {
        const values = snapshot.map((item) => JSON.stringify(toPayload(item)));
        const write = this.writes.then(() => this.repo.setStringList(this.key, values));
        this.writes = write.then(
            () => undefined,
            () => undefined,
        );
        return write.catch((err: unknown) => {
            const error = toPersistenceError('write', err);
            this.report(error);
            throw error;
        });
    }

    private report(error: PersistenceError): void {
        try {
            this.onError(error);
        } catch (err) {
            console.error('Favorites onError handler threw:', err, 'while reporting:', error);
        }
    }

    private notify(): void {
        this.listeners.emit(this.snapshot());
    }
}
