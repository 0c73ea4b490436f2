import { describe, it, expect } from 'vitest';
import { toDisplayRow } from './row-mapper.js';

describe('toDisplayRow', () => {
    it('formats a healthy record', () => {
        const row = toDisplayRow('app-a', {
            kind: 'ok',
            record: { address: 'app-a', stakeAmount: 2500000n, serviceConfigs: [{ serviceId: 'eth' }, { serviceId: 'poly' }] },
        }, 'gw-1');

        expect(row).toEqual({
            address: 'app-a',
            stake: '2.50',
            serviceId: 'eth',
            gateway: 'gw-1',
            status: 'ok',
            stakeAmount: 2500000n,
        });
    });

    it('uses "-" when no service is configured', () => {
        const row = toDisplayRow('app-a', {
            kind: 'ok',
            record: { address: 'app-a', stakeAmount: 1n, serviceConfigs: [] },
        }, 'gw-1');
        expect(row.serviceId).toBe('-');
        expect(row.gateway).toBe('gw-1');
    });

    it.each(['invocation_failed', 'parse_failed'] as const)('renders %s as an Error row', (kind) => {
        const row = toDisplayRow('app-a', { kind, message: 'boom' }, 'gw-1');
        expect([row.stake, row.serviceId, row.gateway, row.status]).toEqual(['Error', '-', '-', 'error']);
        expect(row.stakeAmount).toBeNull();
    });

    it('embeds the field problem in a ParseErr row', () => {
        const row = toDisplayRow('app-a', { kind: 'field_missing', message: 'stake.amount: Required' }, 'gw-1');
        expect([row.stake, row.serviceId, row.gateway, row.status])
            .toEqual(['ParseErr: stake.amount: Required', '-', '-', 'parse_error']);
    });
});
