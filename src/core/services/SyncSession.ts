import type { LyricsData } from "../models/LyricsData";
import { type SyncResult, fail, ok } from "../models/SyncResult";
import { cleanLyricLines } from "../utils/LyricLines";
import { DEFAULT_TIMESTAMP_TAG, UNSYNCED_TAG, formatTimestamp, toTimestampMs } from "../utils/LrcTimestamp";

export type SessionState = 'empty' | 'ready' | 'complete';

export interface AdvanceOutcome {
    /** Index of the line that received the timestamp. */
    lineIndex: number;
    timestampMs: number;
    tag: string;
    /** True when an existing timestamp was replaced after a rewind. */
    overwritten: boolean;
    /** True when this advance stamped the last line. */
    complete: boolean;
}

export interface UndoOutcome {
    /** The removed timestamp, or null when there was nothing to undo. */
    removedMs: number | null;
    cursor: number;
}

/** One line of the exported document. */
export interface LrcRecord {
    tag: string;
    text: string;
}

export interface PreviewEntry {
    index: number;
    tag: string;
    text: string;
    isCursor: boolean;
}

/**
 * Line-synchronization state: the loaded lyric lines, the timestamps assigned so far,
 * and a cursor pointing at the next line awaiting a timestamp.
 *
 * The cursor equals the number of timestamps except after a rewind, where it may sit
 * below it; the next advance then overwrites instead of appending.
 * Nothing here touches playback. Callers read the position and stop the player themselves.
 */
export class SyncSession {
    private lines: string[] = [];
    private timestamps: number[] = [];
    private cursor = 0;
    private audioPath: string | null = null;

    /**
     * Records the active audio asset. Sync state is left as it is.
     */
    public attachAudio(path: string) {
        this.audioPath = path;
    }

    public getAudioPath(): string | null {
        return this.audioPath;
    }

    public hasAudio(): boolean {
        return this.audioPath !== null;
    }

    public hasLyrics(): boolean {
        return this.lines.length > 0;
    }

    public getState(): SessionState {
        if (this.lines.length === 0) return 'empty';
        return this.cursor === this.lines.length ? 'complete' : 'ready';
    }

    public getCursor(): number {
        return this.cursor;
    }

    public getLines(): readonly string[] {
        return this.lines;
    }

    public getTimestamps(): readonly number[] {
        return this.timestamps;
    }

    public getTimestampTags(): string[] {
        return this.timestamps.map(formatTimestamp);
    }

    /** Line awaiting the next timestamp, or '' once every line is stamped. */
    public getCurrentLine(): string {
        return this.lines[this.cursor] ?? '';
    }

    public getNextLine(): string {
        return this.lines[this.cursor + 1] ?? '';
    }

    /**
     * Replaces the lyric lines and clears all timestamps.
     * Lines are trimmed and blank ones dropped; nothing changes if none remain.
     * @returns the number of usable lines.
     */
    public loadLyrics(rawLines: readonly string[]): SyncResult<number> {
        const cleaned = cleanLyricLines(rawLines);
        if (cleaned.length === 0) {
            return fail('EmptyFile', 'The lyrics file has no non-blank lines.');
        }

        this.lines = cleaned;
        this.timestamps = [];
        this.cursor = 0;
        return ok(cleaned.length);
    }

    /**
     * Stamps the line under the cursor with the given playback position and moves on.
     */
    public advance(positionMs: number): SyncResult<AdvanceOutcome> {
        const notReady = this.checkReady();
        if (notReady) return notReady;

        if (this.cursor >= this.lines.length) {
            return fail('AlreadyComplete', 'Every line already has a timestamp.');
        }

        const timestampMs = toTimestampMs(positionMs);
        const lineIndex = this.cursor;
        const overwritten = lineIndex < this.timestamps.length;

        if (overwritten) {
            this.timestamps[lineIndex] = timestampMs;
        } else {
            this.timestamps.push(timestampMs);
        }
        this.cursor++;

        return ok({
            lineIndex,
            timestampMs,
            tag: formatTimestamp(timestampMs),
            overwritten,
            complete: this.cursor === this.lines.length
        });
    }

    /**
     * Moves the cursor back one line. Recorded timestamps are kept;
     * the next advance overwrites the one at the new cursor.
     * @returns the new cursor.
     */
    public rewind(): SyncResult<number> {
        const notReady = this.checkReady();
        if (notReady) return notReady;

        if (this.cursor > 0) {
            this.cursor--;
        }
        return ok(this.cursor);
    }

    /**
     * Drops the last recorded timestamp, pulling the cursor back if it ran past the end.
     */
    public undoLastTimestamp(): UndoOutcome {
        const removed = this.timestamps.pop();
        if (removed === undefined) {
            return { removedMs: null, cursor: this.cursor };
        }

        if (this.cursor > this.timestamps.length) {
            this.cursor = this.timestamps.length;
        }
        return { removedMs: removed, cursor: this.cursor };
    }

    /**
     * Produces one record per lyric line, in order.
     * Lines never stamped reuse the last recorded timestamp, or `[00:00.00]` when there is none,
     * so trailing records of a partial sync are approximate.
     */
    public exportRecords(): LrcRecord[] {
        const lastMs = this.timestamps.length > 0 ? this.timestamps[this.timestamps.length - 1] : null;
        const fallback = lastMs === null ? DEFAULT_TIMESTAMP_TAG : formatTimestamp(lastMs);

        return this.lines.map((text, i) => ({
            tag: i < this.timestamps.length ? formatTimestamp(this.timestamps[i]) : fallback,
            text: text.trim()
        }));
    }

    public previewEntries(): PreviewEntry[] {
        return this.lines.map((text, i) => ({
            index: i,
            tag: i < this.timestamps.length ? formatTimestamp(this.timestamps[i]) : UNSYNCED_TAG,
            text,
            isCursor: i === this.cursor
        }));
    }

    /**
     * The stamped lines as lyrics data, for following the alignment during playback.
     * Lines are ordered by time, since overwrites after a rewind can leave them out of order.
     */
    public toLyricsData(): LyricsData {
        const lines = this.timestamps
            .map((startTime, i) => ({
                startTime,
                text: this.lines[i],
                layer: 0,
                sourceIndex: i
            }))
            .sort((a, b) => a.startTime - b.startTime);

        return { lines, metadata: {} };
    }

    private checkReady(): SyncResult<never> | null {
        if (!this.hasAudio()) {
            return fail('NotReady', 'Load an audio file first.');
        }
        if (!this.hasLyrics()) {
            return fail('NotReady', 'Load a lyrics file first.');
        }
        return null;
    }
}
