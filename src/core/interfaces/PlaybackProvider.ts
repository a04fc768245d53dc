import type { SyncResult } from "../models/SyncResult";

/**
 * Transport controls and elapsed-time reporting for one audio asset.
 * Playback itself happens elsewhere; the sync logic only reads the position.
 */
export interface PlaybackProvider {
    /**
     * Makes the file the active asset, stopping anything currently playing.
     * Fails with `NotFound` or `UnsupportedFormat`.
     */
    load(path: string): Promise<SyncResult<string>>;

    /** Starts from the beginning of the asset. No-op when nothing is loaded. */
    play(): void;

    /** Pauses or resumes, keeping the position while paused. No-op when nothing is loaded. */
    pauseToggle(): void;

    /** Halts playback; the next play starts from zero. */
    stop(): void;

    /** True while a playback run exists, paused or not. */
    isPlaying(): boolean;

    isPaused(): boolean;

    /** Whole milliseconds since the last play, frozen while paused, 0 when not playing. */
    positionMillis(): number;

    /** Releases the player at shutdown. */
    dispose(): void;
}
