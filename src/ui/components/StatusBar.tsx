import React from 'react';
import { Box, Text } from 'ink';
import type { StatusSnapshot } from '../../core/services/SyncController';
import { progressBar, statusLine } from '../viewModel';

interface StatusBarProps {
    status: StatusSnapshot;
}

export const StatusBar: React.FC<StatusBarProps> = ({ status }) => {
    const done = status.totalLines > 0 && status.syncedLines >= status.totalLines;

    return (
        <Box flexDirection="column">
            <Text>
                <Text color={status.playing ? 'green' : 'gray'}>{status.playing ? '▶' : '■'} </Text>
                {statusLine(status)}
            </Text>
            <Text color={done ? 'green' : 'cyan'}>{progressBar(status.syncedLines, status.totalLines)}</Text>
            {status.reviewLine !== null && (
                <Text dimColor>Playing: {status.reviewLine}</Text>
            )}
            {done && <Text color="green">All lines synced. Press Ctrl+S to save.</Text>}
        </Box>
    );
};
