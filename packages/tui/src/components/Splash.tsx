import React from 'react';
import { Box, Text } from 'ink';

export interface SplashProps {
    readonly art: string;
}

/** Placeholder shown while the first refresh is being scheduled */
export function Splash({ art }: SplashProps): React.ReactElement {
    return (
        <Box flexDirection="column" alignItems="center" paddingY={1}>
            {art.split('\n').map((line, i) => (
                <Text key={i} color="green" bold>{line}</Text>
            ))}
        </Box>
    );
}
