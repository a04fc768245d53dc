import type { LyricsParser } from "../interfaces/LyricsParser";
import type { LyricsData, LyricsLine } from "../models/LyricsData";
import { splitLines } from "../utils/LyricLines";
import { parseTimestamp } from "../utils/LrcTimestamp";

/**
 * Parses standard LRC format `[mm:ss.xx]Text`.
 * Minutes may have any number of digits, matching what the exporter writes for long tracks.
 */
export class StandardLrcParser implements LyricsParser {
    private static TIMESTAMP_REGEX = /\[\d+:\d{2}(?:\.\d{2,3})?\]/g;
    private static HAS_TIMESTAMP_REGEX = /\[\d+:\d{2}(?:\.\d{2,3})?\]/;
    private static META_REGEX = /^\[([a-zA-Z]+):([^\]]*)\]$/;

    public parse(rawText: string): LyricsData {
        const lines: LyricsLine[] = [];
        const metadata: Record<string, string> = {};

        const parsedEntries: { time: number; text: string; rawIndex: number }[] = [];

        splitLines(rawText).forEach((rawLine, index) => {
            const line = rawLine.trim();
            if (!line) return;

            const metaMatch = line.match(StandardLrcParser.META_REGEX);
            if (metaMatch && !StandardLrcParser.HAS_TIMESTAMP_REGEX.test(line)) {
                metadata[metaMatch[1]] = metaMatch[2].trim();
                return;
            }

            // A line may carry several tags: [00:01.00][00:10.00]Repeated lyrics
            const tags = line.match(StandardLrcParser.TIMESTAMP_REGEX) ?? [];
            const text = line.replace(StandardLrcParser.TIMESTAMP_REGEX, '').trim();

            for (const tag of tags) {
                const time = parseTimestamp(tag);
                if (time === null) continue;
                parsedEntries.push({ time, text, rawIndex: index });
            }
        });

        // Stable on rawIndex so lines sharing a time keep their file order
        parsedEntries.sort((a, b) => a.time - b.time || a.rawIndex - b.rawIndex);

        let currentGroupTime = -1;
        let currentLayer = 0;

        for (const entry of parsedEntries) {
            if (entry.time === currentGroupTime) {
                currentLayer++;
            } else {
                currentGroupTime = entry.time;
                currentLayer = 0;
            }

            lines.push({
                startTime: entry.time,
                text: entry.text,
                layer: currentLayer,
                sourceIndex: entry.rawIndex
            });
        }

        return {
            lines,
            metadata
        };
    }
}
