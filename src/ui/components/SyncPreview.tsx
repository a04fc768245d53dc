import React from 'react';
import { Box, Text } from 'ink';
import type { PreviewEntry } from '../../core/services/SyncSession';
import { visibleRange } from '../viewModel';

interface SyncPreviewProps {
    entries: PreviewEntry[];
    cursor: number;
    maxRows?: number;
}

export const SyncPreview: React.FC<SyncPreviewProps> = ({ entries, cursor, maxRows = 12 }) => {
    const { start, end } = visibleRange(entries.length, cursor, maxRows);
    const rows = entries.slice(start, end);

    return (
        <Box flexDirection="column" borderStyle="single" paddingX={1}>
            <Text bold>Sync preview</Text>
            {entries.length === 0 && <Text dimColor>No lyrics loaded.</Text>}
            {start > 0 && <Text dimColor>… {start} more above</Text>}
            {rows.map(entry => (
                <Text key={entry.index} inverse={entry.isCursor} wrap="truncate-end">
                    <Text color={entry.tag === '[-]' ? 'gray' : 'cyan'}>{entry.tag}</Text> {entry.text}
                </Text>
            ))}
            {end < entries.length && <Text dimColor>… {entries.length - end} more below</Text>}
        </Box>
    );
};
