import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SyncController } from './SyncController';
import { MetadataService } from './MetadataService';
import type { PlaybackProvider } from '../interfaces/PlaybackProvider';
import { type SyncResult, fail, ok } from '../models/SyncResult';

class FakePlayback implements PlaybackProvider {
    public loaded: string | null = null;
    public playing = false;
    public paused = false;
    public position = 0;
    public calls: string[] = [];

    public async load(filePath: string): Promise<SyncResult<string>> {
        if (filePath.endsWith('.ogg')) return fail('UnsupportedFormat', 'Unsupported audio format: .ogg');
        this.loaded = filePath;
        return ok(filePath);
    }

    public play() {
        this.calls.push('play');
        if (!this.loaded) return;
        this.playing = true;
        this.paused = false;
    }

    public pauseToggle() {
        this.calls.push('pauseToggle');
        if (!this.playing) return;
        this.paused = !this.paused;
    }

    public stop() {
        this.calls.push('stop');
        this.playing = false;
        this.paused = false;
    }

    public isPlaying() { return this.playing; }
    public isPaused() { return this.paused; }
    public positionMillis() { return this.playing ? this.position : 0; }

    public dispose() {
        this.calls.push('dispose');
    }
}

const metadata = new MetadataService(async () => ({
    common: { title: 'Test Song', artist: 'Test Artist' },
    format: { duration: 185.4 }
}));

describe('SyncController', () => {
    let dir: string;
    let audioPath: string;
    let lyricsPath: string;
    let playback: FakePlayback;
    let controller: SyncController;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'lyricsync-'));
        audioPath = path.join(dir, 'song.mp3');
        lyricsPath = path.join(dir, 'lyrics.txt');
        await writeFile(lyricsPath, 'Hello\n\nWorld\n  \n', 'utf-8');

        playback = new FakePlayback();
        controller = new SyncController({ provider: playback, metadata });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    async function loadBoth() {
        await controller.loadAudio(audioPath);
        await controller.loadLyrics(lyricsPath);
    }

    it('should sync every line and save beside the audio file', async () => {
        expect(await controller.loadAudio(audioPath)).toEqual({
            ok: true,
            value: { sourceId: audioPath, title: 'Test Song', artist: 'Test Artist', duration: 185400 }
        });
        expect(await controller.loadLyrics(lyricsPath)).toEqual({ ok: true, value: 2 });

        expect(controller.play()).toEqual({ ok: true, value: null });
        expect(playback.calls).toEqual(['stop', 'play']);

        playback.position = 1500;
        const first = controller.nextLine();
        expect(first.ok && first.value.tag).toBe('[00:01.50]');
        expect(playback.playing).toBe(true);

        playback.position = 4000;
        const second = controller.nextLine();
        expect(second.ok && second.value.complete).toBe(true);
        expect(playback.playing).toBe(false);

        const saved = await controller.save();
        expect(saved).toEqual({ ok: true, value: path.join(dir, 'song.lrc') });
        expect(await readFile(path.join(dir, 'song.lrc'), 'utf-8')).toBe('[00:01.50] Hello\n[00:04.00] World\n');
    });

    it('should report AlreadyComplete after the last line', async () => {
        await loadBoth();
        controller.nextLine();
        controller.nextLine();

        const result = controller.nextLine();
        expect(result.ok || result.error.kind).toBe('AlreadyComplete');
    });

    it('should refuse to advance before anything is loaded', () => {
        const result = controller.nextLine();

        expect(result).toEqual({ ok: false, error: { kind: 'NotReady', message: 'Load an audio file first.' } });
        expect(controller.getSession().getTimestamps()).toEqual([]);
    });

    it('should refuse to play without audio', () => {
        const result = controller.play();
        expect(result.ok || result.error.kind).toBe('NotReady');
        expect(playback.calls).toEqual([]);
    });

    it('should start playback on pause toggle when idle', async () => {
        await loadBoth();

        controller.pauseToggle();
        expect(playback.calls).toEqual(['play']);
        expect(playback.playing).toBe(true);

        controller.pauseToggle();
        expect(playback.paused).toBe(true);
    });

    it('should ignore pause toggle without audio', () => {
        controller.pauseToggle();
        expect(playback.calls).toEqual([]);
    });

    it('should ask for confirmation before saving without timestamps', async () => {
        await loadBoth();

        const unconfirmed = await controller.save();
        expect(unconfirmed.ok || unconfirmed.error.kind).toBe('ConfirmationRequired');

        const confirmed = await controller.save({ confirmed: true });
        expect(confirmed.ok).toBe(true);
        expect(await readFile(path.join(dir, 'song.lrc'), 'utf-8')).toBe('[00:00.00] Hello\n[00:00.00] World\n');
    });

    it('should refuse to save without lyrics', async () => {
        await controller.loadAudio(audioPath);

        const result = await controller.save({ confirmed: true });
        expect(result).toEqual({ ok: false, error: { kind: 'NotReady', message: 'Load a lyrics file first.' } });
    });

    it('should write the metadata header when enabled', async () => {
        controller = new SyncController({ provider: playback, metadata, includeHeader: true });
        await loadBoth();
        controller.play();
        playback.position = 1500;
        controller.nextLine();

        await controller.save();
        expect(await readFile(path.join(dir, 'song.lrc'), 'utf-8')).toBe(
            '[ti:Test Song]\n[ar:Test Artist]\n[length:03:05]\n\n[00:01.50] Hello\n[00:01.50] World\n'
        );
    });

    it('should report a failed write and keep the session for a retry', async () => {
        controller = new SyncController({
            provider: playback,
            metadata,
            outputPath: path.join(dir, 'missing-dir', 'out.lrc')
        });
        await loadBoth();
        controller.play();
        playback.position = 2000;
        controller.nextLine();

        const failed = await controller.save();
        expect(failed.ok || failed.error.kind).toBe('WriteFailed');
        expect(controller.getSession().getTimestamps()).toEqual([2000]);
        expect(controller.getSession().getCursor()).toBe(1);

        const retryPath = path.join(dir, 'retry.lrc');
        expect(await controller.save({ path: retryPath })).toEqual({ ok: true, value: retryPath });
        expect(await readFile(retryPath, 'utf-8')).toBe('[00:02.00] Hello\n[00:02.00] World\n');
    });

    it('should surface audio load failures without attaching the file', async () => {
        const result = await controller.loadAudio(path.join(dir, 'song.ogg'));

        expect(result.ok || result.error.kind).toBe('UnsupportedFormat');
        expect(controller.getSession().hasAudio()).toBe(false);
    });

    it('should surface lyrics load failures', async () => {
        const missing = await controller.loadLyrics(path.join(dir, 'nope.txt'));
        expect(missing.ok || missing.error.kind).toBe('NotFound');

        const blankPath = path.join(dir, 'blank.txt');
        await writeFile(blankPath, '\n   \n', 'utf-8');
        const blank = await controller.loadLyrics(blankPath);
        expect(blank.ok || blank.error.kind).toBe('EmptyFile');
        expect(controller.status().lyricsName).toBeNull();
    });

    it('should re-sync the lines of an existing LRC file', async () => {
        const lrcPath = path.join(dir, 'old.lrc');
        await writeFile(lrcPath, '[ti:Old]\n[00:05.00]World\n[00:01.00]Hello\n', 'utf-8');

        expect(await controller.loadLyrics(lrcPath)).toEqual({ ok: true, value: 2 });
        expect(controller.getSession().getLines()).toEqual(['Hello', 'World']);
    });

    it('should keep sync state when new audio is loaded', async () => {
        await loadBoth();
        controller.play();
        playback.position = 700;
        controller.nextLine();

        await controller.loadAudio(path.join(dir, 'other.wav'));
        expect(controller.getSession().getTimestamps()).toEqual([700]);
        expect(controller.suggestedOutputPath()).toBe(path.join(dir, 'other.lrc'));
    });

    it('should rewind and undo through the session', async () => {
        await loadBoth();
        controller.play();
        playback.position = 1000;
        controller.nextLine();

        expect(controller.backLine()).toEqual({ ok: true, value: 0 });
        expect(controller.undo()).toEqual({ removedMs: 1000, cursor: 0 });
        expect(controller.undo()).toEqual({ removedMs: null, cursor: 0 });
    });

    it('should build a read-only status snapshot', async () => {
        await loadBoth();
        controller.play();
        playback.position = 1500;
        controller.nextLine();
        playback.position = 2000;

        const status = controller.status();
        controller.status();

        expect(status).toEqual({
            positionMs: 2000,
            position: '00:02.00',
            playing: true,
            paused: false,
            state: 'ready',
            cursor: 1,
            syncedLines: 1,
            totalLines: 2,
            currentLine: 'World',
            nextLine: '',
            reviewLine: 'Hello',
            audioName: 'song.mp3',
            lyricsName: 'lyrics.txt',
            audio: { sourceId: audioPath, title: 'Test Song', artist: 'Test Artist', duration: 185400 }
        });
        expect(controller.getSession().getTimestamps()).toEqual([1500]);
        expect(controller.getSession().getCursor()).toBe(1);
    });

    it('should show no review line before the first stamped line', async () => {
        await loadBoth();
        controller.play();
        playback.position = 1500;
        controller.nextLine();
        controller.play();
        playback.position = 1000;

        expect(controller.status().reviewLine).toBeNull();
    });

    it('should use a fixed output path when given and fall back to output.lrc', () => {
        expect(new SyncController({ provider: playback, outputPath: '/tmp/x.lrc' }).suggestedOutputPath()).toBe('/tmp/x.lrc');
        expect(controller.suggestedOutputPath()).toBe(path.join(process.cwd(), 'output.lrc'));
    });

    it('should release the player on dispose', () => {
        controller.dispose();
        expect(playback.calls).toEqual(['dispose']);
    });
});
