/**
 * @stakewatch/shared — Formatting helpers
 */

import { UPOKT_PER_POKT } from '../constants.js';

/**
 * upokt → POKT with two decimals, rounded half-up. Integer math keeps
 * large stakes exact ("2500000" → "2.50").
 */
export function formatPokt(upokt: bigint): string {
    const negative = upokt < 0n;
    const magnitude = negative ? -upokt : upokt;
    const cents = (magnitude * 100n + UPOKT_PER_POKT / 2n) / UPOKT_PER_POKT;
    const whole = cents / 100n;
    const fraction = (cents % 100n).toString().padStart(2, '0');
    return `${negative ? '-' : ''}${whole}.${fraction}`;
}

/** Shortens long addresses to `pokt1a...wxyz` */
export function truncateAddress(address: string, maxLen: number): string {
    if (address.length <= maxLen) return address;
    if (maxLen < 10) return address.slice(0, maxLen);
    return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

export function pluralize(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
