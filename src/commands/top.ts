/**
 * Top / Recent CLI Commands
 * tunelog top tracks | artists, tunelog recent
 */

import { Command, Option } from 'commander';
import { log } from '../utils/logger.js';
import { formatDate, formatDuration, printTable, truncate } from '../utils/formatter.js';
import { TIME_RANGES, type TimeRange } from '../types/spotify.js';
import { createClient, fail } from './shared.js';

interface TopOptions {
    range: TimeRange;
    limit: number;
}

const rangeOption = () =>
    new Option('-r, --range <range>', 'Time range').choices([...TIME_RANGES]).default('medium_term');

const parseLimit = (value: string) => parseInt(value, 10);

export function createTopCommand(): Command {
    const top = new Command('top').description('Show your top tracks and artists');

    top.command('tracks')
        .description('List top tracks')
        .addOption(rangeOption())
        .option('-l, --limit <n>', 'Number of tracks to show', parseLimit, 20)
        .action(async (opts: TopOptions) => {
            try {
                const tracks = await createClient().personalization.getTopTracks(opts.range);
                const shown = tracks.slice(0, opts.limit);

                log.header(`Top tracks (${opts.range}) — ${shown.length} of ${tracks.length}`);
                printTable(
                    ['#', 'Track', 'Artists', 'Album', 'Length'],
                    shown.map((t, i) => [
                        String(i + 1),
                        truncate(t.name, 40),
                        truncate(t.artists.map((a) => a.name).join(', '), 30),
                        truncate(t.album?.name ?? '-', 30),
                        t.duration_ms !== undefined ? formatDuration(t.duration_ms) : '-',
                    ]),
                );
            } catch (error) {
                fail('Failed to fetch top tracks', error);
            }
        });

    top.command('artists')
        .description('List top artists')
        .addOption(rangeOption())
        .option('-l, --limit <n>', 'Number of artists to show', parseLimit, 20)
        .action(async (opts: TopOptions) => {
            try {
                const artists = await createClient().personalization.getTopArtists(opts.range);
                const shown = artists.slice(0, opts.limit);

                log.header(`Top artists (${opts.range}) — ${shown.length} of ${artists.length}`);
                printTable(
                    ['#', 'Artist', 'Genres', 'Popularity'],
                    shown.map((a, i) => [
                        String(i + 1),
                        truncate(a.name, 30),
                        truncate((a.genres ?? []).join(', ') || '-', 40),
                        a.popularity !== undefined ? String(a.popularity) : '-',
                    ]),
                );
            } catch (error) {
                fail('Failed to fetch top artists', error);
            }
        });

    return top;
}

export function createRecentCommand(): Command {
    return new Command('recent')
        .description('Show recently played tracks')
        .option('-l, --limit <n>', 'Number of tracks (max 50)', parseLimit, 20)
        .action(async (opts: { limit: number }) => {
            try {
                const plays = await createClient().player.getRecentlyPlayed(opts.limit);

                if (plays.length === 0) {
                    log.info('No recently played tracks');
                    return;
                }

                log.header(`Recently played (${plays.length})`);
                printTable(
                    ['Played', 'Track', 'Artists'],
                    plays.map((p) => [
                        formatDate(p.played_at),
                        truncate(p.track.name, 40),
                        truncate(p.track.artists.map((a) => a.name).join(', '), 40),
                    ]),
                );
            } catch (error) {
                fail('Failed to fetch recently played', error);
            }
        });
}
