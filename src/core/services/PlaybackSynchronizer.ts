import type { LyricsData } from "../models/LyricsData";

/**
 * Handles time-based lookup of the line playing at a given position.
 */
export class PlaybackSynchronizer {
    /**
     * Finds the active lyric line for the given time with a binary search.
     * Lines must be sorted by start time.
     * @returns The active line index, or -1 before the first line.
     */
    public findLineIndex(lyrics: LyricsData, currentTimeMs: number): number {
        const lines = lyrics.lines;
        if (lines.length === 0) return -1;

        let low = 0;
        let high = lines.length - 1;
        let result = -1;

        while (low <= high) {
            const mid = Math.floor((low + high) / 2);
            if (lines[mid].startTime <= currentTimeMs) {
                result = mid; // Candidate found
                low = mid + 1; // Try to find a later one that is still <= current
            } else {
                high = mid - 1;
            }
        }

        return result;
    }
}
