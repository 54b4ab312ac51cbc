export interface BackoffOptions {
    /** Delay after the first failure, in ms. */
    baseMs: number;
    /** Upper bound for any delay, in ms. */
    ceilingMs: number;
    /** Growth per consecutive failure (Default: 2) */
    factor?: number;
}

/**
 * ExponentialBackoff
 * * Delay policy between failed refresh attempts.
 * * The n-th consecutive failure waits `min(base * factor^(n-1), ceiling)`.
 * * A success resets the sequence.
 */
export class ExponentialBackoff {
    private attempts = 0;

    private readonly baseMs: number;
    private readonly ceilingMs: number;
    private readonly factor: number;

    constructor(options: BackoffOptions) {
        if (options.baseMs <= 0 || options.ceilingMs < options.baseMs) {
            throw new RangeError(`[Backoff] Invalid bounds: base=${options.baseMs}ms ceiling=${options.ceilingMs}ms`);
        }
        this.baseMs = options.baseMs;
        this.ceilingMs = options.ceilingMs;
        this.factor = options.factor ?? 2;
    }

    /**
     * Registers one more failure and returns the delay to wait before retrying.
     */
    public next(): number {
        const delay = Math.min(this.baseMs * Math.pow(this.factor, this.attempts), this.ceilingMs);
        this.attempts++;
        return delay;
    }

    /** Delay the next failure would produce, without registering it. */
    public peek(): number {
        return Math.min(this.baseMs * Math.pow(this.factor, this.attempts), this.ceilingMs);
    }

    public reset(): void {
        this.attempts = 0;
    }

    public get failures(): number {
        return this.attempts;
    }
}
