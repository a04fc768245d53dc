import { spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { PlaybackProvider } from '../interfaces/PlaybackProvider';
import { type SyncResult, fail, ok } from '../models/SyncResult';
import { Logger } from '../utils/Logger';
import { PlaybackClock } from './PlaybackClock';

export const SUPPORTED_AUDIO_EXTENSIONS = ['.mp3', '.wav'] as const;

export const DEFAULT_PLAYER_COMMAND = 'ffplay';
export const DEFAULT_PLAYER_ARGS = ['-nodisp', '-autoexit', '-loglevel', 'quiet'];

/** Handle on a running player. */
export interface PlayerProcess {
    kill(signal: NodeJS.Signals): boolean;
}

export interface PlayerProcessEvents {
    onExit(code: number | null): void;
    onError(error: Error): void;
}

export type PlayerLauncher = (command: string, args: string[], events: PlayerProcessEvents) => PlayerProcess;

export interface FfplayPlaybackOptions {
    command?: string;
    /** Arguments placed before the file path. */
    args?: string[];
    launch?: PlayerLauncher;
    clock?: PlaybackClock;
    /** Resolves whether a path is an existing regular file. */
    fileExists?: (filePath: string) => Promise<boolean>;
}

export const spawnPlayer: PlayerLauncher = (command, args, events) => {
    const child = spawn(command, args, { stdio: 'ignore' });
    child.on('exit', code => events.onExit(code));
    child.on('error', error => events.onError(error));
    return {
        kill: signal => child.kill(signal)
    };
};

async function isRegularFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}

export function isSupportedAudio(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return SUPPORTED_AUDIO_EXTENSIONS.some(supported => supported === ext);
}

/**
 * Plays audio through an external player process (ffplay by default) and keeps its own
 * elapsed-time clock, since the player reports no position back.
 * Pause and resume suspend the process with SIGSTOP/SIGCONT.
 */
export class FfplayPlaybackProvider implements PlaybackProvider {
    private readonly command: string;
    private readonly args: string[];
    private readonly launch: PlayerLauncher;
    private readonly clock: PlaybackClock;
    private readonly fileExists: (filePath: string) => Promise<boolean>;

    private loadedPath: string | null = null;
    private current: PlayerProcess | null = null;
    private paused = false;

    constructor(options: FfplayPlaybackOptions = {}) {
        this.command = options.command ?? DEFAULT_PLAYER_COMMAND;
        this.args = options.args ?? DEFAULT_PLAYER_ARGS;
        this.launch = options.launch ?? spawnPlayer;
        this.clock = options.clock ?? new PlaybackClock();
        this.fileExists = options.fileExists ?? isRegularFile;
    }

    public getLoadedPath(): string | null {
        return this.loadedPath;
    }

    public async load(filePath: string): Promise<SyncResult<string>> {
        if (!(await this.fileExists(filePath))) {
            return fail('NotFound', `Audio file not found: ${filePath}`);
        }
        if (!isSupportedAudio(filePath)) {
            const ext = path.extname(filePath) || '(none)';
            return fail('UnsupportedFormat', `Unsupported audio format: ${ext}. Use ${SUPPORTED_AUDIO_EXTENSIONS.join(' or ')}.`);
        }

        this.stop();
        this.loadedPath = filePath;
        this.paused = false;
        Logger.info(`[Playback] Loaded ${filePath}`);
        return ok(filePath);
    }

    public play() {
        if (!this.loadedPath) return;

        this.stop();

        const args = [...this.args, this.loadedPath];
        Logger.debug(`[Playback] Starting ${this.command} ${args.join(' ')}`);

        let handle: PlayerProcess | null = null;
        const finish = () => {
            // Ignore exits of a run that was already replaced or stopped
            if (handle === null || this.current !== handle) return;
            this.current = null;
            this.paused = false;
            this.clock.reset();
        };

        handle = this.launch(this.command, args, {
            onExit: code => {
                Logger.debug(`[Playback] Player exited with code ${code}`);
                finish();
            },
            onError: error => {
                Logger.error(`[Playback] Could not run ${this.command}`, error);
                finish();
            }
        });

        this.current = handle;
        this.paused = false;
        this.clock.start();
    }

    public pauseToggle() {
        if (!this.loadedPath || !this.current) return;

        if (this.paused) {
            this.current.kill('SIGCONT');
            this.clock.resume();
            this.paused = false;
        } else {
            this.current.kill('SIGSTOP');
            this.clock.pause();
            this.paused = true;
        }
    }

    public stop() {
        const running = this.current;
        this.current = null;

        if (running) {
            // A stopped process only acts on SIGTERM once continued
            if (this.paused) running.kill('SIGCONT');
            running.kill('SIGTERM');
        }

        this.paused = false;
        this.clock.reset();
    }

    public isPlaying(): boolean {
        return this.current !== null;
    }

    public isPaused(): boolean {
        return this.paused;
    }

    public positionMillis(): number {
        return this.isPlaying() ? this.clock.elapsed() : 0;
    }

    public dispose() {
        this.stop();
    }
}
