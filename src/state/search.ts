import { DEFAULT_DEBOUNCE_MS } from '../config.js';
import { describeError } from '../errors.js';
import type { CatalogProvider } from '../providers/types.js';
import type { ItemRecord } from '../types.js';
import { Listeners, type Listener, type Subscription } from './listeners.js';
import { PendingTask, timerScheduler, type Scheduler } from './scheduler.js';

export type SearchStatus = 'idle' | 'debouncing' | 'fetching' | 'success' | 'failed';

export interface SearchState {
    query: string;
    status: SearchStatus;
    loading: boolean;
    results: readonly ItemRecord[];
    error: Error | null;
    /** Sequence number of the response currently shown; 0 before the first one */
    appliedSequence: number;
}

export interface SearchControllerOptions {
    /** Quiet period after the last keystroke before a request goes out */
    debounceMs?: number;
    scheduler?: Scheduler;
}

const INITIAL_STATE: SearchState = {
    query: '',
    status: 'idle',
    loading: false,
    results: [],
    error: null,
    appliedSequence: 0,
};

/**
 * Turns keystrokes into catalog searches.
 *
 * Input is debounced, and every request carries a sequence number. A response is
 * applied only while its number is still the latest; any later keystroke or
 * dispatch supersedes it, so slow responses can never overwrite newer state.
 */
export class SearchController {
    private readonly catalog: Pick<CatalogProvider, 'search'>;
    private readonly debounceMs: number;
    private readonly pending: PendingTask;
    private readonly listeners = new Listeners<SearchState>();
    private current: SearchState = INITIAL_STATE;
    private sequence = 0;
    private disposed = false;

    constructor(catalog: Pick<CatalogProvider, 'search'>, options: SearchControllerOptions = {}) {
        this.catalog = catalog;
        this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
        this.pending = new PendingTask(options.scheduler ?? timerScheduler);
    }

    get state(): SearchState {
        return this.current;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    subscribe(listener: Listener<SearchState>): Subscription {
        return this.listeners.subscribe(listener);
    }

    onQueryChanged(text: string): void {
        if (this.disposed) return;

        this.pending.cancel();
        this.sequence++;

        if (text.trim() === '') {
            this.update({ query: text, status: 'idle', loading: false, results: [], error: null });
            return;
        }

        this.update({ query: text, status: 'debouncing', loading: false });
        this.pending.schedule(this.debounceMs, () => {
            void this.dispatch(text);
        });
    }

    /** Re-run the current query immediately, e.g. after a failure. */
    retry(): void {
        if (this.disposed || this.current.query.trim() === '') return;
        this.pending.cancel();
        void this.dispatch(this.current.query);
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        this.pending.cancel();
        this.sequence++;
        this.listeners.clear();
    }

    private async dispatch(query: string): Promise<void> {
        if (this.disposed) return;

        const seq = ++this.sequence;
        this.update({ status: 'fetching', loading: true, error: null });

        try {
            const results = await this.catalog.search(query);
            if (!this.isLatest(seq)) return;
            this.update({ status: 'success', loading: false, results, error: null, appliedSequence: seq });
        } catch (err) {
            if (!this.isLatest(seq)) return;
            this.update({ status: 'failed', loading: false, results: [], error: toError(err), appliedSequence: seq });
        }
    }

    private isLatest(seq: number): boolean {
        return !this.disposed && seq === this.sequence;
    }

    private update(patch: Partial<SearchState>): void {
        this.current = { ...this.current, ...patch };
        this.listeners.emit(this.current);
    }
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(describeError(err));
}
