import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { LyricsParser } from '../interfaces/LyricsParser';
import type { LyricsLine } from '../models/LyricsData';
import { type SyncResult, fail, ok } from '../models/SyncResult';
import { PlainTextLyricsParser } from '../parsers/PlainTextLyricsParser';
import { StandardLrcParser } from '../parsers/StandardLrcParser';
import { Logger } from '../utils/Logger';

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps one line per source line, in file order.
 * Repeated tags and out-of-order times in an `.lrc` file collapse back to the line that carried them.
 */
export function inSourceOrder(lines: readonly LyricsLine[]): string[] {
    const bySource = new Map<number, string>();
    for (const line of lines) {
        if (!bySource.has(line.sourceIndex)) bySource.set(line.sourceIndex, line.text);
    }
    return [...bySource.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, text]) => text);
}

/**
 * Reads a lyrics file and returns its lines of text.
 * `.lrc` files are stripped of their time and metadata tags so an existing
 * timed file can be synced again; everything else is read as plain text.
 * The file must be valid UTF-8.
 */
export class LyricsFileReader {
    private parsers: Record<string, LyricsParser> = {
        '.lrc': new StandardLrcParser()
    };
    private fallbackParser: LyricsParser = new PlainTextLyricsParser();
    private decoder = new TextDecoder('utf-8', { fatal: true });

    public parserFor(filePath: string): LyricsParser {
        return this.parsers[path.extname(filePath).toLowerCase()] ?? this.fallbackParser;
    }

    public async read(filePath: string): Promise<SyncResult<string[]>> {
        let bytes: Buffer;
        try {
            bytes = await readFile(filePath);
        } catch (error) {
            Logger.warn(`[LyricsFile] Could not read ${filePath}`, error);
            if (isMissingFile(error)) {
                return fail('NotFound', `Lyrics file not found: ${filePath}`, error);
            }
            const reason = error instanceof Error ? error.message : String(error);
            return fail('ReadFailed', `Could not read ${filePath}: ${reason}`, error);
        }

        let rawText: string;
        try {
            rawText = this.decoder.decode(bytes);
        } catch (error) {
            Logger.warn(`[LyricsFile] ${filePath} is not valid UTF-8`, error);
            return fail('InvalidEncoding', `Lyrics file is not valid UTF-8: ${filePath}`, error);
        }

        const data = this.parserFor(filePath).parse(rawText);
        Logger.info(`[LyricsFile] Parsed ${data.lines.length} lines from ${filePath}`);
        return ok(inSourceOrder(data.lines));
    }
}
