/**
 * @stakewatch/shared — Constants
 *
 * Central source of truth for defaults shared by the CLI and the TUI.
 */

export const APP_NAME = 'stakewatch';
export const APP_VERSION = '0.1.0';

export const DEFAULT_CONFIG_PATH = 'config.yaml';
export const CONFIG_PATH_ENV = 'STAKEWATCH_CONFIG';

export const DEFAULT_CLIENT_BINARY = 'pocketd';
export const DEFAULT_QUERY_TIMEOUT_MS = 30_000; // 30 seconds

/** 1 POKT = 1,000,000 upokt */
export const UPOKT_PER_POKT = 1_000_000n;

/** Cell placeholders */
export const ERROR_TOKEN = 'Error';
export const PARSE_ERROR_PREFIX = 'ParseErr: ';
export const EMPTY_CELL = '-';
