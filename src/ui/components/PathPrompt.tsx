import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { normalizePathInput } from '../viewModel';

interface PathPromptProps {
    label: string;
    onSubmit: (path: string) => void;
    onCancel: () => void;
}

export const PathPrompt: React.FC<PathPromptProps> = ({ label, onSubmit, onCancel }) => {
    const [value, setValue] = useState('');

    useInput((input, key) => {
        if (key.escape) {
            onCancel();
            return;
        }
        if (key.return) {
            const filePath = normalizePathInput(value);
            if (filePath) {
                onSubmit(filePath);
            } else {
                onCancel();
            }
            return;
        }
        if (key.backspace || key.delete) {
            setValue(prev => prev.slice(0, -1));
            return;
        }
        if (key.ctrl || key.meta) return;
        setValue(prev => prev + input);
    });

    return (
        <Box>
            <Text color="cyan">{label}: </Text>
            <Text>{value}</Text>
            <Text inverse> </Text>
            <Text dimColor>  (Enter to load, Esc to cancel)</Text>
        </Box>
    );
};
