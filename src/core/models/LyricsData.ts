/**
 * Represents a single line of lyrics.
 */
export interface LyricsLine {
    /** Absolute start time in ms */
    startTime: number;

    /** Text content */
    text: string;

    /**
     * Logical grouping of lines sharing the same start time
     * (0 = primary, 1 = translation, 2 = romanization).
     */
    layer: number;

    /** Position of the line in its source text, before any sorting by time. */
    sourceIndex: number;
}

/**
 * Represents the complete parsed lyrics data.
 */
export interface LyricsData {
    lines: LyricsLine[];

    /**
     * Metadata extracted from tags (e.g. [ti:Title], [ar:Artist]).
     * Key-value format.
     */
    metadata: Record<string, string>;
}
