import dotenv from 'dotenv';
import { type LogLevel, isLogLevel } from '../core/utils/Logger';
import { DEFAULT_PLAYER_ARGS, DEFAULT_PLAYER_COMMAND } from '../core/playback/FfplayPlaybackProvider';

dotenv.config();

function parseArgsList(value: string | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    return value.split(/\s+/).filter(arg => arg !== '');
}

function parseTickMs(value: string | undefined): number {
    const parsed = parseInt(value || '100', 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 100;
}

function parseLogLevel(value: string | undefined): LogLevel {
    const level = (value || 'warn').toLowerCase();
    return isLogLevel(level) ? level : 'warn';
}

export const config = {
    player: {
        command: process.env.LYRICSYNC_PLAYER || DEFAULT_PLAYER_COMMAND,
        args: parseArgsList(process.env.LYRICSYNC_PLAYER_ARGS) ?? DEFAULT_PLAYER_ARGS,
    },

    ui: {
        tickMs: parseTickMs(process.env.LYRICSYNC_TICK_MS),
    },

    export: {
        includeHeader: process.env.LYRICSYNC_LRC_HEADER === 'true',
    },

    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
    },
};

export default config;
