/**
 * Package version, read from package.json beside src/ (or dist/)
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));

export const VERSION = z
    .object({ version: z.string() })
    .parse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'))).version;
