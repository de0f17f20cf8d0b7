#!/usr/bin/env node
/**
 * tunelog CLI
 * Spotify listening history: authenticate, fetch, preprocess
 */

import { Command } from 'commander';
import { setVerbose } from './utils/logger.js';
import { VERSION } from './version.js';
import { createAuthCommand } from './commands/auth.js';
import { createFetchCommand } from './commands/fetch.js';
import { createPreprocessCommand } from './commands/preprocess.js';
import { createTopCommand, createRecentCommand } from './commands/top.js';

const program = new Command();

program
    .name('tunelog')
    .description('tunelog — Spotify listening history toolkit')
    .version(VERSION)
    .option('--verbose', 'Print debug output')
    .hook('preAction', (thisCommand) => {
        if (thisCommand.opts<{ verbose?: boolean }>().verbose) setVerbose(true);
    });

program.addCommand(createAuthCommand());
program.addCommand(createFetchCommand());
program.addCommand(createPreprocessCommand());
program.addCommand(createTopCommand());
program.addCommand(createRecentCommand());

program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
