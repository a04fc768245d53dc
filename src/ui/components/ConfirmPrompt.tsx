import React from 'react';
import { Text, useInput } from 'ink';

interface ConfirmPromptProps {
    question: string;
    onAnswer: (confirmed: boolean) => void;
}

export const ConfirmPrompt: React.FC<ConfirmPromptProps> = ({ question, onAnswer }) => {
    useInput((input, key) => {
        if (input.toLowerCase() === 'y') onAnswer(true);
        else if (input.toLowerCase() === 'n' || key.escape) onAnswer(false);
    });

    return <Text color="yellow">{question} (y/n)</Text>;
};
