/**
 * Splits raw file content into lines, accepting both LF and CRLF endings.
 */
export function splitLines(rawText: string): string[] {
    return rawText.replace(/^\uFEFF/, '').split(/\r?\n/);
}

/**
 * Trims every line and drops the ones left blank. Blank lines are discarded
 * rather than kept as spacer entries.
 */
export function cleanLyricLines(rawLines: readonly string[]): string[] {
    return rawLines
        .map(line => line.trim())
        .filter(line => line !== '');
}
