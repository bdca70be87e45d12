// --- Immutable integer rolling window (ring buffer) ---

/**
 * Fixed-capacity ring buffer of integer samples.
 *
 * Every `push` returns a new window, so a tick can read the previous window
 * while it builds the next one. The running sum is maintained on push and
 * always equals the exact sum of the current contents.
 */
export class RollingWindow implements Iterable<number> {
    private constructor(
        private readonly buffer: readonly number[],
        private readonly pointer: number,
        private readonly filled: boolean,
        private readonly _sum: number
    ) {}

    public static empty(size: number): RollingWindow {
        if (!Number.isInteger(size) || size <= 0) {
            throw new RangeError(`RollingWindow size must be > 0, got ${size}`);
        }
        return new RollingWindow(new Array<number>(size).fill(0), 0, false, 0);
    }

    public push(value: number): RollingWindow {
        const sample = Math.trunc(value);
        // Unfilled slots hold 0, so evicting them is harmless.
        const evicted = this.buffer[this.pointer] ?? 0;
        const buffer = this.buffer.slice();
        buffer[this.pointer] = sample;
        const pointer = (this.pointer + 1) % buffer.length;
        return new RollingWindow(
            buffer,
            pointer,
            this.filled || pointer === 0,
            this._sum - evicted + sample
        );
    }

    public sum(): number {
        return this._sum;
    }

    /**
     * Floor of the mean of the current contents (0 when empty).
     */
    public average(): number {
        const count = this.count();
        return count === 0 ? 0 : Math.floor(this._sum / count);
    }

    public min(): number | undefined {
        if (this.count() === 0) return undefined;
        return Math.min(...this.toArray());
    }

    public max(): number | undefined {
        if (this.count() === 0) return undefined;
        return Math.max(...this.toArray());
    }

    /**
     * Sample `offset` positions back from the newest one (0 = newest).
     */
    public latest(offset = 0): number | undefined {
        const count = this.count();
        if (offset < 0 || offset >= count) return undefined;
        const capacity = this.buffer.length;
        return this.buffer[(this.pointer - 1 - offset + capacity) % capacity];
    }

    public toArray(): number[] {
        const count = this.count();
        if (!this.filled) return this.buffer.slice(0, count);
        // Order oldest->newest
        return this.buffer
            .slice(this.pointer)
            .concat(this.buffer.slice(0, this.pointer));
    }

    public count(): number {
        return this.filled ? this.buffer.length : this.pointer;
    }

    public isFull(): boolean {
        return this.filled;
    }

    *[Symbol.iterator](): IterableIterator<number> {
        for (const val of this.toArray()) yield val;
    }

    get size(): number {
        return this.buffer.length;
    }
}
