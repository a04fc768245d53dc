import type { LyricsParser } from "../interfaces/LyricsParser";
import type { LyricsData } from "../models/LyricsData";
import { cleanLyricLines, splitLines } from "../utils/LyricLines";

/**
 * Parses untimed lyrics, one lyric per line.
 * Every line starts at 0 since the text carries no timing yet.
 */
export class PlainTextLyricsParser implements LyricsParser {
    public parse(rawText: string): LyricsData {
        return {
            lines: cleanLyricLines(splitLines(rawText)).map((text, index) => ({
                startTime: 0,
                text,
                layer: 0,
                sourceIndex: index
            })),
            metadata: {}
        };
    }
}
