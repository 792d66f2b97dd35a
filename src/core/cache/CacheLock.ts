import { ClientAbortError } from '../errors';

interface Pending<T> {
    promise: Promise<T>;
    controller: AbortController;
    waiters: number;
}

export interface LockResult<T> {
    value: T;
    /** True for the caller whose loader actually ran. */
    leader: boolean;
}

/**
 * Per-key single flight. The first caller for a key runs the loader; callers
 * arriving while it is in flight wait for the same result. The loader is
 * aborted only once every waiting caller has aborted.
 */
export class CacheLock<T> {
    private pending = new Map<string, Pending<T>>();

    isLocked(key: string): boolean {
        return this.pending.has(key);
    }

    get size(): number {
        return this.pending.size;
    }

    run(key: string, loader: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<LockResult<T>> {
        if (signal?.aborted) {
            return Promise.reject(new ClientAbortError());
        }

        let entry = this.pending.get(key);
        let leader = false;

        if (!entry) {
            const controller = new AbortController();
            const created: Pending<T> = {
                controller,
                waiters: 0,
                promise: loader(controller.signal).finally(() => {
                    if (this.pending.get(key) === created) {
                        this.pending.delete(key);
                    }
                })
            };
            this.pending.set(key, created);
            entry = created;
            leader = true;
        }

        entry.waiters++;
        return this.wait(entry, signal).then(value => ({ value, leader }));
    }

    abortAll(): void {
        for (const entry of this.pending.values()) {
            entry.controller.abort();
        }
    }

    private wait(entry: Pending<T>, signal?: AbortSignal): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            let settled = false;

            const onAbort = () => {
                if (settled) return;
                settled = true;
                entry.waiters--;
                if (entry.waiters <= 0) {
                    entry.controller.abort();
                }
                reject(new ClientAbortError());
            };

            signal?.addEventListener('abort', onAbort, { once: true });

            entry.promise.then((value) => {
                signal?.removeEventListener('abort', onAbort);
                if (settled) return;
                settled = true;
                entry.waiters--;
                resolve(value);
            }, (err: unknown) => {
                signal?.removeEventListener('abort', onAbort);
                if (settled) return;
                settled = true;
                entry.waiters--;
                reject(err);
            });
        });
    }
}
