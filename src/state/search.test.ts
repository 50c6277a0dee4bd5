import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { HttpStatusError } from '../errors.js';
import { fromPayload } from '../models/item.js';
import { Deferred, flushPromises } from '../testing/fakes.js';
import type { ItemRecord } from '../types.js';
import { SearchController, type SearchState } from './search.js';

const inception = fromPayload({ id: 27205, title: 'Inception', vote_average: 8.4 });
const interstellar = fromPayload({ id: 157336, title: 'Interstellar', vote_average: 8.5 });

type SearchFn = (query: string) => Promise<ItemRecord[]>;

describe('SearchController', () => {
    let search: Mock<SearchFn>;
    let responses: Map<string, Deferred<ItemRecord[]>>;
    let controller: SearchController;

    /** Each query gets its own deferred response, settled by the test. */
    function respond(query: string): Deferred<ItemRecord[]> {
        const pending = responses.get(query);
        if (!pending) throw new Error(`No request for "${query}"`);
        return pending;
    }

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
        responses = new Map();
        search = vi.fn<SearchFn>((query) => {
            const response = new Deferred<ItemRecord[]>();
            responses.set(query, response);
            return response.promise;
        });
        controller = new SearchController({ search });
    });

    afterEach(() => {
        controller.dispose();
        vi.useRealTimers();
    });

    it('starts idle and empty', () => {
        expect(controller.state).toEqual({
            query: '',
            status: 'idle',
            loading: false,
            results: [],
            error: null,
            appliedSequence: 0,
        });
    });

    describe('debounce', () => {
        it('collapses a burst of keystrokes into one request for the last text', () => {
            for (const text of ['i', 'in', 'inc', 'ince', 'incep']) {
                controller.onQueryChanged(text);
                vi.advanceTimersByTime(100);
            }
            expect(controller.state.status).toBe('debouncing');
            expect(search).not.toHaveBeenCalled();

            vi.advanceTimersByTime(399);
            expect(search).not.toHaveBeenCalled();

            vi.advanceTimersByTime(1);
            expect(search).toHaveBeenCalledTimes(1);
            expect(search).toHaveBeenCalledWith('incep');
        });

        it('honours a custom quiet period', () => {
            const quick = new SearchController({ search }, { debounceMs: 100 });
            quick.onQueryChanged('dune');

            vi.advanceTimersByTime(100);

            expect(search).toHaveBeenCalledWith('dune');
            quick.dispose();
        });

        it('clears synchronously and never requests when the text is emptied in time', () => {
            controller.onQueryChanged('incep');
            vi.advanceTimersByTime(200);
            controller.onQueryChanged('');

            expect(controller.state).toMatchObject({ query: '', status: 'idle', loading: false, results: [], error: null });

            vi.advanceTimersByTime(2000);
            expect(search).toHaveBeenCalledTimes(0);
        });

        it('treats whitespace as empty', () => {
            controller.onQueryChanged('   ');
            vi.advanceTimersByTime(2000);

            expect(controller.state.status).toBe('idle');
            expect(search).not.toHaveBeenCalled();
        });
    });

    describe('results', () => {
        it('moves through fetching to success', async () => {
            controller.onQueryChanged('inception');
            vi.advanceTimersByTime(500);

            expect(controller.state.status).toBe('fetching');
            expect(controller.state.loading).toBe(true);

            respond('inception').resolve([inception]);
            await flushPromises();

            expect(controller.state.status).toBe('success');
            expect(controller.state.loading).toBe(false);
            expect(controller.state.results).toEqual([inception]);
            expect(controller.state.appliedSequence).toBeGreaterThan(0);
        });

        it('keeps the newest result when an older response arrives later', async () => {
            controller.onQueryChanged('incep');
            vi.advanceTimersByTime(500);
            controller.onQueryChanged('inter');
            vi.advanceTimersByTime(500);
            expect(search).toHaveBeenCalledTimes(2);

            respond('inter').resolve([interstellar]);
            await flushPromises();
            const applied = controller.state.appliedSequence;

            respond('incep').resolve([inception]);
            await flushPromises();

            expect(controller.state.query).toBe('inter');
            expect(controller.state.results).toEqual([interstellar]);
            expect(controller.state.appliedSequence).toBe(applied);
        });

        it('discards a stale failure', async () => {
            controller.onQueryChanged('incep');
            vi.advanceTimersByTime(500);
            controller.onQueryChanged('inter');
            vi.advanceTimersByTime(500);

            respond('inter').resolve([interstellar]);
            respond('incep').reject(new HttpStatusError(500, 'Internal Server Error'));
            await flushPromises();

            expect(controller.state.status).toBe('success');
            expect(controller.state.error).toBeNull();
            expect(controller.state.results).toEqual([interstellar]);
        });

        it('ignores a response for text the user has since changed', async () => {
            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(500);
            controller.onQueryChanged('');

            respond('dune').resolve([inception]);
            await flushPromises();

            expect(controller.state.results).toEqual([]);
            expect(controller.state.status).toBe('idle');
        });
    });

    describe('errors', () => {
        it('turns a failed search into error state and clears loading', async () => {
            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(500);

            const failure = new HttpStatusError(401, 'Unauthorized');
            respond('dune').reject(failure);
            await flushPromises();

            expect(controller.state.status).toBe('failed');
            expect(controller.state.loading).toBe(false);
            expect(controller.state.error).toBe(failure);
            expect(controller.state.results).toEqual([]);
        });

        it('wraps non-Error rejections', async () => {
            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(500);

            respond('dune').reject('offline');
            await flushPromises();

            expect(controller.state.error).toBeInstanceOf(Error);
            expect(controller.state.error?.message).toBe('offline');
        });

        it('retries the current query immediately', async () => {
            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(500);
            respond('dune').reject(new Error('boom'));
            await flushPromises();

            controller.retry();
            expect(search).toHaveBeenCalledTimes(2);

            respond('dune').resolve([inception]);
            await flushPromises();
            expect(controller.state.status).toBe('success');
            expect(controller.state.error).toBeNull();
        });
    });

    describe('subscriptions and teardown', () => {
        it('publishes every state change until unsubscribed', async () => {
            const statuses: string[] = [];
            const subscription = controller.subscribe((state: SearchState) => statuses.push(state.status));

            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(500);
            respond('dune').resolve([]);
            await flushPromises();
            subscription.unsubscribe();
            controller.onQueryChanged('');

            expect(statuses).toEqual(['debouncing', 'fetching', 'success']);
        });

        it('cancels the pending dispatch on dispose', () => {
            controller.onQueryChanged('dune');
            controller.dispose();
            vi.advanceTimersByTime(2000);

            expect(search).not.toHaveBeenCalled();
            expect(controller.isDisposed).toBe(true);
        });

        it('leaves state untouched when a request finishes after dispose', async () => {
            const listener = vi.fn<(state: SearchState) => void>();
            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(500);
            controller.subscribe(listener);

            controller.dispose();
            respond('dune').resolve([inception]);
            await flushPromises();

            expect(controller.state.results).toEqual([]);
            expect(listener).not.toHaveBeenCalled();
        });

        it('ignores input after dispose', () => {
            controller.dispose();
            controller.onQueryChanged('dune');
            vi.advanceTimersByTime(2000);

            expect(controller.state.query).toBe('');
            expect(search).not.toHaveBeenCalled();
        });
    });
});
