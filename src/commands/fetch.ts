/**
 * Fetch CLI Command
 * tunelog fetch — download listening data into <dataDir>/raw
 */

import { Command, Option } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { TIME_RANGES, type TimeRange } from '../types/spotify.js';
import { fetchAllData, type FetchReporter } from '../pipeline/fetch.js';
import { createClient, fail, resolveConfig } from './shared.js';

interface FetchCommandOptions {
    range?: TimeRange[];
    recent: boolean;
    recentLimit: number;
}

export function createFetchCommand(): Command {
    return new Command('fetch')
        .description('Fetch top tracks, top artists, audio features and recently played tracks')
        .addOption(
            new Option('-r, --range <ranges...>', 'Time ranges to fetch (default: all)').choices([...TIME_RANGES]),
        )
        .option('--no-recent', 'Skip recently played tracks')
        .option('--recent-limit <n>', 'Number of recently played tracks (max 50)', (v) => parseInt(v, 10), 50)
        .action(async (opts: FetchCommandOptions) => {
            const spinner = ora();
            const reporter: FetchReporter = {
                step: (message) => {
                    spinner.start(message);
                },
                done: (message) => {
                    spinner.succeed(message);
                },
                warn: (message) => {
                    spinner.warn(message);
                },
            };

            try {
                const config = resolveConfig();
                const client = createClient(config);

                log.header('Fetching Spotify data');
                const data = await fetchAllData(client, config.dataDir, {
                    timeRanges: opts.range,
                    includeRecentlyPlayed: opts.recent,
                    recentlyPlayedLimit: opts.recentLimit,
                    reporter,
                });

                console.log();
                log.success('Data fetch complete!');
                log.kv('Audio features', data.audioFeatures.length);
                log.kv('Recently played', data.recentlyPlayed?.length ?? 'skipped');
                log.dim('  Next: tunelog preprocess');
            } catch (error) {
                spinner.stop();
                fail('Fetch failed', error);
            }
        });
}
