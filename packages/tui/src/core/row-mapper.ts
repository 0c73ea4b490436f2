/**
 * @stakewatch/tui — Row Mapper
 *
 * Turns one lookup outcome into exactly one table row. Failures become
 * placeholder rows; they never abort a refresh.
 */

import {
    EMPTY_CELL,
    ERROR_TOKEN,
    PARSE_ERROR_PREFIX,
    formatPokt,
} from '@stakewatch/shared';
import type { DisplayRow, QueryResult } from '@stakewatch/shared';

export function toDisplayRow(address: string, result: QueryResult, gateway: string): DisplayRow {
    switch (result.kind) {
        case 'ok': {
            const first = result.record.serviceConfigs[0];
            return {
                address,
                stake: formatPokt(result.record.stakeAmount),
                serviceId: first ? first.serviceId : EMPTY_CELL,
                gateway,
                status: 'ok',
                stakeAmount: result.record.stakeAmount,
            };
        }

        case 'field_missing':
            return {
                address,
                stake: `${PARSE_ERROR_PREFIX}${result.message}`,
                serviceId: EMPTY_CELL,
                gateway: EMPTY_CELL,
                status: 'parse_error',
                stakeAmount: null,
            };

        case 'invocation_failed':
        case 'parse_failed':
            return {
                address,
                stake: ERROR_TOKEN,
                serviceId: EMPTY_CELL,
                gateway: EMPTY_CELL,
                status: 'error',
                stakeAmount: null,
            };
    }
}
