export type ReleaseLock = () => void;

/**
 * Advisory lock keyed by thread id. Holders of the same key run one after
 * another in acquisition order; different keys never wait on each other.
 */
export class ThreadLock {
    private readonly tails = new Map<string, Promise<void>>();

    async acquire(key: string): Promise<ReleaseLock> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: ReleaseLock = () => undefined;
        const held = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => held);
        this.tails.set(key, tail);
        await previous;

        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
