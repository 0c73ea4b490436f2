/**
 * CommandLine — Single-line prompt for commands and search
 *
 * Rendered only while the controller is in `command` or `search` state.
 * Esc is handled by the Dashboard's key map.
 */

import React from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

// ─── Types ────────────────────────────────────────────────────────

export type CommandLineMode = 'command' | 'search';

export interface CommandLineProps {
    readonly mode: CommandLineMode;
    readonly value: string;
    readonly onChange: (value: string) => void;
    readonly onSubmit: (value: string) => void;
}

const PROMPTS: Record<CommandLineMode, { symbol: string; color: string; placeholder: string }> = {
    command: { symbol: ':', color: 'yellow', placeholder: 'q to quit' },
    search: { symbol: '/', color: 'cyan', placeholder: 'filter by address or service' },
};

// ─── Component ────────────────────────────────────────────────────

export function CommandLine({ mode, value, onChange, onSubmit }: CommandLineProps): React.ReactElement {
    const prompt = PROMPTS[mode];

    return (
        <Box borderStyle="single" borderColor={prompt.color} paddingX={1}>
            <Text color={prompt.color} bold>{prompt.symbol} </Text>
            <TextInput
                value={value}
                onChange={onChange}
                onSubmit={onSubmit}
                placeholder={prompt.placeholder}
            />
            <Text dimColor color="gray">  Enter: submit  Esc: cancel</Text>
        </Box>
    );
}
