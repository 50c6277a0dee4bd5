export type Listener<T> = (state: T) => void;

/** Handle returned by subscribe(); release it to stop receiving updates. */
export interface Subscription {
    unsubscribe(): void;
}

/** Publish/subscribe list owned by a single store. */
export class Listeners<T> {
    private readonly listeners = new Set<Listener<T>>();

    subscribe(listener: Listener<T>): Subscription {
        this.listeners.add(listener);
        return {
            unsubscribe: () => {
                this.listeners.delete(listener);
            },
        };
    }

    emit(state: T): void {
        // Copy so a listener may unsubscribe while being notified
        for (const listener of [...this.listeners]) {
            try {
                listener(state);
            } catch (err) {
                console.error('State listener threw:', err);
            }
        }
    }

    clear(): void {
        this.listeners.clear();
    }

    get size(): number {
        return this.listeners.size;
    }
}
