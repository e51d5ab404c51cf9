/**
 * Doubling reconnect delay: base, 2*base, 4*base, ... capped at max.
 */
export class ReconnectBackoff {
    private consecutiveFailures = 0;

    constructor(
        private readonly baseMs: number,
        private readonly maxMs: number
    ) {}

    /**
     * Delay before the next attempt; counts one more consecutive failure
     */
    public next(): number {
        const delay = this.peek();
        this.consecutiveFailures++;
        return delay;
    }

    /**
     * Delay the next call to `next()` would return
     */
    public peek(): number {
        return Math.min(this.baseMs * Math.pow(2, this.consecutiveFailures), this.maxMs);
    }

    public reset(): void {
        this.consecutiveFailures = 0;
    }

    public get failures(): number {
        return this.consecutiveFailures;
    }
}
