import type { StatusSnapshot } from '../core/services/SyncController';

export interface VisibleRange {
    start: number;
    end: number;
}

/**
 * Picks the slice of preview rows to show so the cursor stays in view,
 * a few rows below the top of the window.
 */
export function visibleRange(total: number, cursor: number, maxRows: number, lead = 3): VisibleRange {
    if (total <= maxRows) return { start: 0, end: total };
    const start = Math.min(Math.max(0, cursor - lead), total - maxRows);
    return { start, end: start + maxRows };
}

/**
 * Strips the quotes terminals add around dragged-in paths.
 */
export function normalizePathInput(input: string): string {
    const trimmed = input.trim();
    const quoted = trimmed.match(/^(['"])(.*)\1$/);
    return quoted ? quoted[2] : trimmed;
}

/**
 * Text progress bar of synced lines, e.g. `[#####-----] 50%`.
 */
export function progressBar(done: number, total: number, width = 20): string {
    const ratio = total > 0 ? Math.min(done, total) / total : 0;
    const filled = Math.round(ratio * width);
    return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${Math.round(ratio * 100)}%`;
}

export function statusLine(status: StatusSnapshot): string {
    let line = `${status.position} | Lines: ${status.syncedLines}/${status.totalLines}`;
    if (status.audioName) line += ` | Audio: ${status.audioName}`;
    if (status.lyricsName) line += ` | Lyrics: ${status.lyricsName}`;
    if (status.paused) line += ' | PAUSED';
    return line;
}
