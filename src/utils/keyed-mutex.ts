/**
 * Per-key mutual exclusion for async work.
 *
 * Holders of the same key run one after another in arrival order; different
 * keys never wait for each other. The chain for a key is dropped once its
 * last holder releases.
 */
export class KeyedMutex<K = string | number> {
    private readonly tails = new Map<K, Promise<void>>();

    /**
     * Wait for the key and return its release function. Releasing twice is a no-op.
     */
    async acquire(key: K): Promise<() => void> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let resolveCurrent: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            resolveCurrent = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;

        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            resolveCurrent();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }

    async runExclusive<T>(key: K, work: () => Promise<T>): Promise<T> {
        const release = await this.acquire(key);
        try {
            return await work();
        } finally {
            release();
        }
    }

    isLocked(key: K): boolean {
        return this.tails.has(key);
    }
}
