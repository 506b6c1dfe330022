/**
 * @file Keyed Lock
 *
 * Serializes async work per key: tasks sharing a key run one at a time in
 * submission order, tasks on different keys run independently. A failed
 * task releases the key for the next one.
 *
 * @module core/lock
 */

export class KeyedLock {
    private readonly tails: Map<string, Promise<void>> = new Map();

    /**
     * Run `task` once every earlier task for `key` has settled.
     *
     * @returns The task's own result or rejection.
     */
    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous: Promise<void> = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => {};
        const current: Promise<void> = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail: Promise<void> = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** Whether any task currently holds or waits on `key`. */
    isHeld(key: string): boolean {
        return this.tails.has(key);
    }
}
