/**
 * Formatter utility
 * Table output for CLI and CSV serialization for processed datasets
 */

import chalk from 'chalk';

/**
 * Print data as an aligned table
 */
export function printTable(headers: string[], rows: string[][]): void {
    const colWidths = headers.map((h, i) => {
        const maxData = rows.reduce((max, row) => Math.max(max, (row[i] || '').length), 0);
        return Math.max(h.length, maxData) + 2;
    });

    const headerLine = headers.map((h, i) => chalk.bold(h.padEnd(colWidths[i]))).join('');
    console.log(headerLine);
    console.log(chalk.dim('─'.repeat(colWidths.reduce((a, b) => a + b, 0))));

    for (const row of rows) {
        const line = row.map((cell, i) => (cell || '').padEnd(colWidths[i])).join('');
        console.log(line);
    }
}

/**
 * Format a track duration as m:ss
 */
export function formatDuration(ms: number): string {
    const totalSeconds = Math.round(ms / 1000);
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;
    return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Format a date as a short readable string
 */
export function formatDate(date: Date | string | number): string {
    const d = new Date(date);
    return d.toLocaleString('en-US', {
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
    });
}

/**
 * Truncate to a display width, adding an ellipsis
 */
export function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export type CsvValue = string | number | boolean | null | undefined;

function csvCell(value: CsvValue): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialize rows to RFC 4180 CSV with a header line.
 * Nullish values become empty cells.
 */
export function toCsv<K extends string>(columns: readonly K[], rows: ReadonlyArray<Record<K, CsvValue>>): string {
    const lines = [columns.map((c) => csvCell(c)).join(',')];
    for (const row of rows) {
        lines.push(columns.map((c) => csvCell(row[c])).join(','));
    }
    return lines.join('\n') + '\n';
}
