/**
 * HelpPanel — Key binding reference
 */

import React from 'react';
import { Box, Text } from 'ink';

export const KEY_BINDINGS: ReadonlyArray<readonly [string, string]> = [
    ['r', 'Refresh all applications'],
    [':', 'Open the command line (q + Enter quits)'],
    ['/', 'Filter by address or service id (empty clears)'],
    ['s', 'Cycle sort column'],
    ['S', 'Toggle sort direction'],
    ['↑ / k', 'Move cursor up'],
    ['↓ / j', 'Move cursor down'],
    ['g / G', 'Jump to first / last row'],
    ['h / ?', 'Toggle this help'],
    ['Esc', 'Close help or cancel input'],
    ['Ctrl+C', 'Quit'],
];

export function HelpPanel(): React.ReactElement {
    return (
        <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1}>
            <Text bold color="yellow">Keys</Text>
            {KEY_BINDINGS.map(([key, description]) => (
                <Box key={key}>
                    <Box width={10}>
                        <Text color="cyan" bold>{key}</Text>
                    </Box>
                    <Text>{description}</Text>
                </Box>
            ))}
        </Box>
    );
}
