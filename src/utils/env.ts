/**
 * Loads `.env` from the project root. Imported first by the logger and
 * the config module, so LOG_LEVEL from the file applies to the logger too.
 */

import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });
