/**
 * Data directory layout and JSON file helpers shared by the pipelines
 */

import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { TunelogError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export function rawDir(dataDir: string): string {
    return path.join(dataDir, 'raw');
}

export function processedDir(dataDir: string): string {
    return path.join(dataDir, 'processed');
}

export function writeJson(filePath: string, data: unknown): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf8');
}

export function writeText(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf8');
}

/**
 * Read a raw JSON array. A missing file is an empty dataset; entries that do
 * not match the schema are skipped.
 */
export function readJsonArray<S extends z.ZodTypeAny>(filePath: string, schema: S): Array<z.output<S>> {
    if (!fs.existsSync(filePath)) {
        return [];
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        throw new TunelogError(`Malformed JSON in ${filePath}`, { cause: error });
    }
    if (!Array.isArray(raw)) {
        throw new TunelogError(`Expected a JSON array in ${filePath}`);
    }

    const items: Array<z.output<S>> = [];
    raw.forEach((entry: unknown, index) => {
        const parsed = schema.safeParse(entry);
        if (parsed.success) {
            items.push(parsed.data);
        } else {
            log.debug(`Skipping entry ${index} of ${path.basename(filePath)}: ${parsed.error.issues[0]?.message}`);
        }
    });
    return items;
}
