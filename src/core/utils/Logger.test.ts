import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, type LogEntry, isLogLevel } from './Logger';

describe('Logger', () => {
    afterEach(() => {
        Logger.setLevel('info');
        Logger.setConsoleEnabled(true);
        vi.restoreAllMocks();
    });

    it('should notify listeners until they unsubscribe', () => {
        Logger.setConsoleEnabled(false);
        const entries: LogEntry[] = [];
        const unsubscribe = Logger.subscribe(entry => entries.push(entry));

        Logger.warn('first', { line: 1 });
        unsubscribe();
        Logger.warn('second');

        expect(entries).toHaveLength(1);
        expect(entries[0].level).toBe('warn');
        expect(entries[0].message).toBe('first');
        expect(entries[0].data).toEqual({ line: 1 });
    });

    it('should drop entries below the minimum level', () => {
        Logger.setConsoleEnabled(false);
        Logger.setLevel('warn');
        const levels: string[] = [];
        const unsubscribe = Logger.subscribe(entry => levels.push(entry.level));

        Logger.debug('d');
        Logger.info('i');
        Logger.warn('w');
        Logger.error('e');
        unsubscribe();

        expect(levels).toEqual(['warn', 'error']);
    });

    it('should write to the console unless disabled', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        Logger.error('visible');
        Logger.setConsoleEnabled(false);
        Logger.error('hidden');

        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy).toHaveBeenCalledWith('[ERROR] visible', '');
    });

    it('should recognise level names', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
        expect(isLogLevel('constructor')).toBe(false);
    });
});
