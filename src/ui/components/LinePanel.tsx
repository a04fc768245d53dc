import React from 'react';
import { Box, Text } from 'ink';

interface LinePanelProps {
    current: string;
    next: string;
}

export const LinePanel: React.FC<LinePanelProps> = ({ current, next }) => (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
        <Text dimColor>Current line</Text>
        <Text bold wrap="wrap">{current || ' '}</Text>
        <Text dimColor>Next line</Text>
        <Text wrap="wrap">{next || ' '}</Text>
    </Box>
);
