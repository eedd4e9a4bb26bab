/**
 * Fixed-capacity window of request outcomes (true = upstream 5xx).
 *
 * Backed by a ring buffer with a running error count, so observe() and
 * currentRate() are O(1). When full, the oldest outcome is evicted.
 */
export class ErrorWindow {
    private readonly outcomes: boolean[];
    private start: number = 0;
    private length: number = 0;
    private errors: number = 0;

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Window capacity must be an integer >= 1, got ${capacity}`);
        }
        this.outcomes = new Array<boolean>(capacity).fill(false);
    }

    /**
     * Number of outcomes currently held
     */
    public get size(): number {
        return this.length;
    }

    /**
     * Number of held outcomes that are errors
     */
    public get errorCount(): number {
        return this.errors;
    }

    /**
     * Append an outcome, evicting the oldest one at capacity
     */
    public observe(isError: boolean): void {
        if (this.length === this.capacity) {
            if (this.outcomes[this.start]) this.errors--;
            this.outcomes[this.start] = isError;
            this.start = (this.start + 1) % this.capacity;
        } else {
            this.outcomes[(this.start + this.length) % this.capacity] = isError;
            this.length++;
        }

        if (isError) this.errors++;
    }

    /**
     * Error percentage over the held outcomes, or null while empty
     */
    public currentRate(): number | null {
        if (this.length === 0) return null;
        return (this.errors / this.length) * 100;
    }

    /**
     * Held outcomes, oldest first
     */
    public toArray(): boolean[] {
        const result: boolean[] = [];
        for (let i = 0; i < this.length; i++) {
            result.push(this.outcomes[(this.start + i) % this.capacity]);
        }
        return result;
    }
}
