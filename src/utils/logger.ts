/**
 * Logger utility
 * Chalk-based colored console output
 */

import chalk from 'chalk';

let verbose = Boolean(process.env.TUNELOG_DEBUG);

export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function isVerbose(): boolean {
    return verbose;
}

export const log = {
    info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
    success: (msg: string) => console.log(chalk.green('✔'), msg),
    warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
    error: (msg: string) => console.error(chalk.red('✖'), msg),
    dim: (msg: string) => console.log(chalk.dim(msg)),
    bold: (msg: string) => console.log(chalk.bold(msg)),

    debug: (msg: string) => {
        if (verbose) console.error(chalk.dim(`[debug] ${msg}`));
    },

    // Section header
    header: (title: string) => {
        console.log();
        console.log(chalk.bold.underline(title));
        console.log();
    },

    // Key-value pair
    kv: (key: string, value: string | number | boolean) => {
        console.log(`  ${chalk.dim(key + ':')} ${value}`);
    },
};
