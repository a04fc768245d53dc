import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { defaultFileName, defaultOutputPath, renderHeader, renderLrc } from './LrcExporter';

describe('renderLrc', () => {
    it('should write one tagged line per record', () => {
        const content = renderLrc([
            { tag: '[00:01.50]', text: 'Hello' },
            { tag: '[00:04.00]', text: 'Wörld ✨' }
        ]);
        expect(content).toBe('[00:01.50] Hello\n[00:04.00] Wörld ✨\n');
    });

    it('should produce an empty document for no records', () => {
        expect(renderLrc([])).toBe('');
    });

    it('should prepend the known metadata as a header', () => {
        const content = renderLrc([{ tag: '[00:00.00]', text: 'Intro' }], {
            header: { sourceId: '/music/song.mp3', title: 'Song', album: 'Album' }
        });
        expect(content).toBe('[ti:Song]\n[al:Album]\n\n[00:00.00] Intro\n');
    });
});

describe('renderHeader', () => {
    it('should write nothing when no metadata is known', () => {
        expect(renderHeader({ sourceId: '/music/song.mp3' })).toBe('');
    });

    it('should include the length tag', () => {
        expect(renderHeader({ sourceId: '/music/song.mp3', artist: 'Band', duration: 61_000 })).toBe('[ar:Band]\n[length:01:01]\n\n');
    });
});

describe('defaultFileName', () => {
    it('should replace the audio extension', () => {
        expect(defaultFileName('/music/My Song.wav')).toBe('My Song.lrc');
        expect(defaultFileName('/music/live.2024.mp3')).toBe('live.2024.lrc');
    });

    it('should fall back to output.lrc without audio', () => {
        expect(defaultFileName(null)).toBe('output.lrc');
    });
});

describe('defaultOutputPath', () => {
    it('should place the file beside the audio', () => {
        expect(defaultOutputPath('/music/song.mp3')).toBe(path.join('/music', 'song.lrc'));
    });

    it('should use the working directory without audio', () => {
        expect(defaultOutputPath(null, '/work')).toBe(path.join('/work', 'output.lrc'));
    });
});
