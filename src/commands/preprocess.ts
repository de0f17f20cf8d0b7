/**
 * Preprocess CLI Command
 * tunelog preprocess — flatten raw JSON into CSV tables
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { preprocessAll } from '../pipeline/preprocess.js';
import { fail, resolveConfig } from './shared.js';

export function createPreprocessCommand(): Command {
    return new Command('preprocess')
        .description('Flatten raw data into tracks.csv, artists.csv and recently_played.csv')
        .action(() => {
            try {
                const config = resolveConfig();
                log.header('Preprocessing data');
                preprocessAll(config.dataDir);
                console.log();
                log.success('Preprocessing complete!');
            } catch (error) {
                fail('Preprocessing failed', error);
            }
        });
}
