/**
 * src/utils/errorWindow.ts
 *
 * Sliding-window error counter behind the retry controller's cool-down.
 * Timestamps older than the window are pruned on every read.
 */

export class ErrorWindow {
    private timestamps: number[] = [];

    constructor(
        readonly windowMs = 5 * 60_000,
        private readonly now: () => number = Date.now
    ) {}

    record(): void {
        this.timestamps.push(this.now());
    }

    /** Errors observed within the last `windowMs`. */
    count(): number {
        const windowStart = this.now() - this.windowMs;
        this.timestamps = this.timestamps.filter((ts) => ts > windowStart);
        return this.timestamps.length;
    }

    reset(): void {
        this.timestamps = [];
    }
}
