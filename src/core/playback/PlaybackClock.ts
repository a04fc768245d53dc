export type TimeSource = () => number;

/**
 * Elapsed-time counter for one playback run. Pausing freezes the reading.
 */
export class PlaybackClock {
    private startedAt: number | null = null;
    private pausedAt: number | null = null;
    private pausedTotal = 0;

    constructor(private readonly now: TimeSource = () => performance.now()) { }

    public start() {
        this.startedAt = this.now();
        this.pausedAt = null;
        this.pausedTotal = 0;
    }

    public pause() {
        if (this.startedAt === null || this.pausedAt !== null) return;
        this.pausedAt = this.now();
    }

    public resume() {
        if (this.pausedAt === null) return;
        this.pausedTotal += this.now() - this.pausedAt;
        this.pausedAt = null;
    }

    public reset() {
        this.startedAt = null;
        this.pausedAt = null;
        this.pausedTotal = 0;
    }

    public isRunning(): boolean {
        return this.startedAt !== null;
    }

    /** Whole milliseconds elapsed, excluding paused time. */
    public elapsed(): number {
        if (this.startedAt === null) return 0;
        const end = this.pausedAt ?? this.now();
        return Math.max(0, Math.floor(end - this.startedAt - this.pausedTotal));
    }
}
