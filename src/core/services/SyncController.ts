import path from 'node:path';
import type { AudioInformation } from '../interfaces/AudioInformation';
import type { PlaybackProvider } from '../interfaces/PlaybackProvider';
import { type SyncResult, fail, ok } from '../models/SyncResult';
import { Logger } from '../utils/Logger';
import { formatClock } from '../utils/LrcTimestamp';
import { LrcExporter, defaultOutputPath } from './LrcExporter';
import { LyricsFileReader } from './LyricsFileReader';
import { MetadataService } from './MetadataService';
import { PlaybackSynchronizer } from './PlaybackSynchronizer';
import { type AdvanceOutcome, type SessionState, SyncSession, type UndoOutcome } from './SyncSession';

export interface SyncControllerOptions {
    provider: PlaybackProvider;
    session?: SyncSession;
    lyricsReader?: LyricsFileReader;
    exporter?: LrcExporter;
    metadata?: MetadataService;
    synchronizer?: PlaybackSynchronizer;
    /** Fixed output path; defaults to the audio name with `.lrc` beside the audio file. */
    outputPath?: string;
    /** Write `[ti:]`/`[ar:]`/`[al:]`/`[length:]` tags at the top of saved files. */
    includeHeader?: boolean;
}

export interface SaveOptions {
    /** The user agreed to save although no line has a timestamp yet. */
    confirmed?: boolean;
    path?: string;
}

/**
 * Read-only view of the tool, refreshed by the status tick.
 */
export interface StatusSnapshot {
    positionMs: number;
    /** `mm:ss.cc` */
    position: string;
    playing: boolean;
    paused: boolean;
    state: SessionState;
    cursor: number;
    syncedLines: number;
    totalLines: number;
    currentLine: string;
    nextLine: string;
    /** Stamped line active at the playback position, if any. */
    reviewLine: string | null;
    audioName: string | null;
    lyricsName: string | null;
    audio: AudioInformation | null;
}

/**
 * Command surface of the tool. Each command maps onto one playback or session operation
 * and performs the side effects the session leaves to its caller.
 */
export class SyncController {
    private readonly provider: PlaybackProvider;
    private readonly session: SyncSession;
    private readonly lyricsReader: LyricsFileReader;
    private readonly exporter: LrcExporter;
    private readonly metadata: MetadataService;
    private readonly synchronizer: PlaybackSynchronizer;
    private readonly outputPath?: string;
    private readonly includeHeader: boolean;

    private lyricsPath: string | null = null;
    private audioInfo: AudioInformation | null = null;

    constructor(options: SyncControllerOptions) {
        this.provider = options.provider;
        this.session = options.session ?? new SyncSession();
        this.lyricsReader = options.lyricsReader ?? new LyricsFileReader();
        this.exporter = options.exporter ?? new LrcExporter();
        this.metadata = options.metadata ?? new MetadataService();
        this.synchronizer = options.synchronizer ?? new PlaybackSynchronizer();
        this.outputPath = options.outputPath;
        this.includeHeader = options.includeHeader ?? false;
    }

    public getSession(): SyncSession {
        return this.session;
    }

    public async loadAudio(filePath: string): Promise<SyncResult<AudioInformation>> {
        const loaded = await this.provider.load(filePath);
        if (!loaded.ok) {
            Logger.warn(`[Controller] ${loaded.error.message}`);
            return loaded;
        }

        this.session.attachAudio(filePath);
        this.audioInfo = await this.metadata.parse(filePath);
        return ok(this.audioInfo);
    }

    /**
     * @returns the number of lyric lines loaded.
     */
    public async loadLyrics(filePath: string): Promise<SyncResult<number>> {
        const read = await this.lyricsReader.read(filePath);
        if (!read.ok) return read;

        const loaded = this.session.loadLyrics(read.value);
        if (!loaded.ok) {
            Logger.warn(`[Controller] ${filePath}: ${loaded.error.message}`);
            return loaded;
        }

        this.lyricsPath = filePath;
        Logger.info(`[Controller] Loaded ${loaded.value} lyric lines from ${filePath}`);
        return loaded;
    }

    /**
     * Restarts the track from zero so the first tap lines up with the first play.
     */
    public play(): SyncResult<null> {
        if (!this.session.hasAudio()) {
            return fail('NotReady', 'Load an audio file first.');
        }
        this.provider.stop();
        this.provider.play();
        return ok(null);
    }

    /**
     * Pauses or resumes; starts playback when nothing is running yet.
     */
    public pauseToggle() {
        if (!this.session.hasAudio()) return;

        if (!this.provider.isPlaying()) {
            this.provider.play();
        } else {
            this.provider.pauseToggle();
        }
    }

    public stop() {
        this.provider.stop();
    }

    /**
     * Stamps the current line with the playback position. Playback stops once the last line is stamped.
     */
    public nextLine(): SyncResult<AdvanceOutcome> {
        const result = this.session.advance(this.provider.positionMillis());
        if (result.ok) {
            Logger.debug(`[Controller] Line ${result.value.lineIndex + 1} at ${result.value.tag}`);
            if (result.value.complete) {
                this.provider.stop();
                Logger.info('[Controller] All lines synced');
            }
        }
        return result;
    }

    public backLine(): SyncResult<number> {
        return this.session.rewind();
    }

    public undo(): UndoOutcome {
        return this.session.undoLastTimestamp();
    }

    public suggestedOutputPath(): string {
        return this.outputPath ?? defaultOutputPath(this.session.getAudioPath());
    }

    /**
     * Writes the LRC file. Session state is left untouched, so a failed write can be retried.
     * @returns the path written.
     */
    public async save(options: SaveOptions = {}): Promise<SyncResult<string>> {
        if (!this.session.hasAudio()) {
            return fail('NotReady', 'Load an audio file first.');
        }
        if (!this.session.hasLyrics()) {
            return fail('NotReady', 'Load a lyrics file first.');
        }
        if (this.session.getTimestamps().length === 0 && !options.confirmed) {
            return fail('ConfirmationRequired', 'No timestamps recorded yet. Save anyway?');
        }

        const target = options.path ?? this.suggestedOutputPath();
        const header = this.includeHeader && this.audioInfo ? this.audioInfo : undefined;
        return this.exporter.save(target, this.session.exportRecords(), { header });
    }

    public status(): StatusSnapshot {
        const playing = this.provider.isPlaying();
        const positionMs = playing ? this.provider.positionMillis() : 0;
        const lines = this.session.getLines();
        const audioPath = this.session.getAudioPath();

        return {
            positionMs,
            position: formatClock(positionMs),
            playing,
            paused: this.provider.isPaused(),
            state: this.session.getState(),
            cursor: this.session.getCursor(),
            syncedLines: Math.min(this.session.getTimestamps().length, lines.length),
            totalLines: lines.length,
            currentLine: this.session.getCurrentLine(),
            nextLine: this.session.getNextLine(),
            reviewLine: playing ? this.findReviewLine(positionMs) : null,
            audioName: audioPath ? path.basename(audioPath) : null,
            lyricsName: this.lyricsPath ? path.basename(this.lyricsPath) : null,
            audio: this.audioInfo
        };
    }

    public dispose() {
        this.provider.dispose();
    }

    private findReviewLine(positionMs: number): string | null {
        const data = this.session.toLyricsData();
        const index = this.synchronizer.findLineIndex(data, positionMs);
        return index >= 0 ? data.lines[index].text : null;
    }
}
