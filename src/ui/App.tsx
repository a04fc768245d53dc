import { useCallback, useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { SyncController, StatusSnapshot } from '../core/services/SyncController';
import type { PreviewEntry } from '../core/services/SyncSession';
import type { SyncError } from '../core/models/SyncResult';
import { Logger, type LogEntry } from '../core/utils/Logger';
import { type Notice, NOTICE_COLORS, noticeForError } from './notices';
import { StatusBar } from './components/StatusBar';
import { LinePanel } from './components/LinePanel';
import { SyncPreview } from './components/SyncPreview';
import { PathPrompt } from './components/PathPrompt';
import { ConfirmPrompt } from './components/ConfirmPrompt';

type Mode = 'keys' | 'audio-path' | 'lyrics-path' | 'confirm-save';

interface AppProps {
    controller: SyncController;
    tickMs: number;
    initialAudio?: string;
    initialLyrics?: string;
}

const HELP = 'Enter next · Backspace back · Space pause · p play · s stop · u undo · a audio · l lyrics · Ctrl+S save · q quit';
const MAX_LOGS = 3;

export default function App({ controller, tickMs, initialAudio, initialLyrics }: AppProps) {
    const { exit } = useApp();
    const [status, setStatus] = useState<StatusSnapshot>(() => controller.status());
    const [preview, setPreview] = useState<PreviewEntry[]>(() => controller.getSession().previewEntries());
    const [notice, setNotice] = useState<Notice | null>(null);
    const [mode, setMode] = useState<Mode>('keys');
    const [logs, setLogs] = useState<LogEntry[]>([]);

    const refresh = useCallback(() => {
        setStatus(controller.status());
        setPreview(controller.getSession().previewEntries());
    }, [controller]);

    const showError = useCallback((error: SyncError) => {
        setNotice(noticeForError(error));
    }, []);

    // Surface warnings and errors from the services
    useEffect(() => {
        return Logger.subscribe((entry) => {
            if (entry.level !== 'warn' && entry.level !== 'error') return;
            setLogs(prev => [...prev, entry].slice(-MAX_LOGS));
        });
    }, []);

    // Status tick: reads playback and session state only
    useEffect(() => {
        const timer = setInterval(refresh, tickMs);
        return () => clearInterval(timer);
    }, [refresh, tickMs]);

    const runTask = useCallback((task: () => Promise<void>): Promise<void> => {
        return task()
            .catch((error: unknown) => {
                Logger.error('[UI] Command failed', error);
                setNotice({ level: 'error', title: 'Error', message: String(error) });
            })
            .finally(refresh);
    }, [refresh]);

    const loadAudio = useCallback((filePath: string) => runTask(async () => {
        const result = await controller.loadAudio(filePath);
        if (!result.ok) return showError(result.error);
        const title = [result.value.artist, result.value.title].filter(Boolean).join(' - ');
        setNotice({ level: 'success', title: 'Audio loaded', message: title || filePath });
    }), [controller, runTask, showError]);

    const loadLyrics = useCallback((filePath: string) => runTask(async () => {
        const result = await controller.loadLyrics(filePath);
        if (!result.ok) return showError(result.error);
        setNotice({ level: 'success', title: 'Lyrics loaded', message: `${result.value} lines read.` });
    }), [controller, runTask, showError]);

    const save = useCallback((confirmed: boolean) => runTask(async () => {
        const result = await controller.save({ confirmed });
        if (result.ok) {
            setNotice({ level: 'success', title: 'Saved', message: result.value });
        } else if (result.error.kind === 'ConfirmationRequired') {
            setMode('confirm-save');
        } else {
            showError(result.error);
        }
    }), [controller, runTask, showError]);

    useEffect(() => {
        const loadInitial = async () => {
            if (initialAudio) await loadAudio(initialAudio);
            if (initialLyrics) await loadLyrics(initialLyrics);
        };
        void loadInitial();
        // Only on mount
    }, []);

    const nextLine = () => {
        const result = controller.nextLine();
        if (!result.ok) {
            showError(result.error);
        } else if (result.value.complete) {
            setNotice({ level: 'success', title: 'Done', message: 'Every line is marked. Save with Ctrl+S.' });
        } else {
            setNotice(null);
        }
    };

    const backLine = () => {
        const result = controller.backLine();
        if (!result.ok) showError(result.error);
    };

    const undo = () => {
        const outcome = controller.undo();
        if (outcome.removedMs === null) {
            setNotice({ level: 'info', title: 'Undo', message: 'Nothing to undo.' });
        }
    };

    useInput((input, key) => {
        if (key.return) {
            nextLine();
        } else if (key.backspace || key.delete || key.leftArrow) {
            backLine();
        } else if (input === ' ') {
            controller.pauseToggle();
        } else if ((key.ctrl && input === 's') || input === 'w') {
            void save(false);
            return;
        } else if (key.ctrl || key.meta) {
            return;
        } else if (input === 'p') {
            const result = controller.play();
            if (!result.ok) showError(result.error);
        } else if (input === 's') {
            controller.stop();
        } else if (input === 'u') {
            undo();
        } else if (input === 'a') {
            setMode('audio-path');
        } else if (input === 'l') {
            setMode('lyrics-path');
        } else if (input === 'q') {
            exit();
            return;
        } else {
            return;
        }
        refresh();
    }, { isActive: mode === 'keys' });

    return (
        <Box flexDirection="column">
            <Text bold>lyricsync</Text>
            <LinePanel current={status.currentLine} next={status.nextLine} />
            <SyncPreview entries={preview} cursor={status.cursor} />
            <StatusBar status={status} />

            {mode === 'audio-path' && (
                <PathPrompt
                    label="Audio file (.mp3/.wav)"
                    onSubmit={(filePath) => { setMode('keys'); void loadAudio(filePath); }}
                    onCancel={() => setMode('keys')}
                />
            )}
            {mode === 'lyrics-path' && (
                <PathPrompt
                    label="Lyrics file (.txt/.lrc)"
                    onSubmit={(filePath) => { setMode('keys'); void loadLyrics(filePath); }}
                    onCancel={() => setMode('keys')}
                />
            )}
            {mode === 'confirm-save' && (
                <ConfirmPrompt
                    question="No timestamps recorded yet. Save anyway?"
                    onAnswer={(confirmed) => {
                        setMode('keys');
                        if (confirmed) void save(true);
                    }}
                />
            )}

            {notice && (
                <Text color={NOTICE_COLORS[notice.level]}>
                    {notice.title}: {notice.message}
                </Text>
            )}
            {logs.map(entry => (
                <Text key={entry.timestamp + entry.message} dimColor color={entry.level === 'error' ? 'red' : 'yellow'}>
                    [{entry.level.toUpperCase()}] {entry.message}
                </Text>
            ))}
            <Text dimColor>{HELP}</Text>
        </Box>
    );
}
