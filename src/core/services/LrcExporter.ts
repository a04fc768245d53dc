import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AudioInformation } from '../interfaces/AudioInformation';
import { type SyncResult, fail, ok } from '../models/SyncResult';
import { Logger } from '../utils/Logger';
import { formatLength } from '../utils/LrcTimestamp';
import type { LrcRecord } from './SyncSession';

export const LRC_EXTENSION = '.lrc';
export const FALLBACK_BASE_NAME = 'output';

export interface RenderOptions {
    /** When set, `[ti:]`, `[ar:]`, `[al:]` and `[length:]` tags are written first. */
    header?: AudioInformation;
}

/**
 * Builds the `[ti:]`/`[ar:]`/`[al:]`/`[length:]` block from whatever metadata is known.
 */
export function renderHeader(info: AudioInformation): string {
    const tags: string[] = [];
    if (info.title) tags.push(`[ti:${info.title}]`);
    if (info.artist) tags.push(`[ar:${info.artist}]`);
    if (info.album) tags.push(`[al:${info.album}]`);
    if (info.duration !== undefined) tags.push(`[length:${formatLength(info.duration)}]`);
    return tags.length > 0 ? tags.join('\n') + '\n\n' : '';
}

/**
 * Renders records as an LRC document: `[mm:ss.cc] text` per line, each ending in a newline.
 */
export function renderLrc(records: readonly LrcRecord[], options: RenderOptions = {}): string {
    const header = options.header ? renderHeader(options.header) : '';
    return header + records.map(record => `${record.tag} ${record.text}\n`).join('');
}

/**
 * Suggested output file name: the audio base name with the `.lrc` extension,
 * or `output.lrc` when no audio is loaded.
 */
export function defaultFileName(audioPath: string | null): string {
    if (!audioPath) return FALLBACK_BASE_NAME + LRC_EXTENSION;
    return path.basename(audioPath, path.extname(audioPath)) + LRC_EXTENSION;
}

/**
 * Suggested output path: beside the audio file, or in `cwd` when there is none.
 */
export function defaultOutputPath(audioPath: string | null, cwd: string = process.cwd()): string {
    const dir = audioPath ? path.dirname(audioPath) : cwd;
    return path.join(dir, defaultFileName(audioPath));
}

export class LrcExporter {
    /**
     * Writes the document as UTF-8, replacing any existing file.
     * @returns the path written.
     */
    public async save(filePath: string, records: readonly LrcRecord[], options: RenderOptions = {}): Promise<SyncResult<string>> {
        const content = renderLrc(records, options);
        try {
            await writeFile(filePath, content, 'utf-8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            Logger.error(`[Export] Failed to write ${filePath}`, error);
            return fail('WriteFailed', `Could not save ${filePath}: ${reason}`, error);
        }

        Logger.info(`[Export] Wrote ${records.length} lines to ${filePath}`);
        return ok(filePath);
    }
}
