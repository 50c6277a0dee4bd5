/** A cancellable unit of deferred work. */
export interface ScheduledTask {
    readonly pending: boolean;
    cancel(): void;
}

export interface Scheduler {
    schedule(delayMs: number, run: () => void): ScheduledTask;
}

/** Scheduler backed by setTimeout. */
export const timerScheduler: Scheduler = {
    schedule(delayMs, run) {
        let pending = true;
        const handle = setTimeout(() => {
            pending = false;
            run();
        }, delayMs);
        return {
            get pending() {
                return pending;
            },
            cancel() {
                if (!pending) return;
                pending = false;
                clearTimeout(handle);
            },
        };
    },
};

/**
 * Holds at most one pending task. Scheduling always cancels the previous one,
 * so only the most recent request can ever run.
 */
export class PendingTask {
    private readonly scheduler: Scheduler;
    private current: ScheduledTask | null = null;

    constructor(scheduler: Scheduler = timerScheduler) {
        this.scheduler = scheduler;
    }

    schedule(delayMs: number, run: () => void): void {
        this.cancel();
        this.current = this.scheduler.schedule(delayMs, run);
    }

    cancel(): void {
        this.current?.cancel();
        this.current = null;
    }

    get pending(): boolean {
        return this.current?.pending ?? false;
    }
}
