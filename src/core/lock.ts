/**
 * Serializes async critical sections per key. Callers on the same key run one
 * at a time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>()

    async withLock<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
        const prev = this.tails.get(key) ?? Promise.resolve()
        let release: () => void = () => {}
        const next = new Promise<void>((resolve) => {
            release = resolve
        })
        this.tails.set(key, next)

        await prev
        try {
            return await fn()
        } finally {
            release()
            if (this.tails.get(key) === next) {
                this.tails.delete(key)
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key)
    }
}
