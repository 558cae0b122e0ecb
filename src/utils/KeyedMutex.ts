export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(res => {
        resolve = res;
    });
    return { promise, resolve };
};

/**
 * Serialises async tasks that share a key while letting tasks with different
 * keys run concurrently. Tasks for one key run in call order.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const gate = createDeferred<void>();
        const tail = previous.then(() => gate.promise);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            gate.resolve();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
