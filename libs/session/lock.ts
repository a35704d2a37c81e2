/**
 * Per-key mutual exclusion inside one process.
 *
 * Each key holds the tail of a promise chain; a new holder waits for the
 * previous tail. Keys with no waiters are dropped so the map does not grow
 * with the number of sessions ever seen.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async acquire(key: string): Promise<() => void> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const held = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => held);
        this.tails.set(key, tail);

        await previous;

        let released = false;
        return () => {
            if (released) return;
            released = true;
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const release = await this.acquire(key);
        try {
            return await task();
        } finally {
            release();
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
