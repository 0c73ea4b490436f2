#!/usr/bin/env -S tsx
/**
 * @stakewatch/cli — Entry point for the `stakewatch` command
 */

import { main } from './router.js';

process.exitCode = await main(process.argv.slice(2));
