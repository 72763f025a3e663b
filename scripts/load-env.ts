/**
 * Env bootstrap for scripts. Import before anything that reads process.env
 * at module load (e.g. @prepscout/db's pool):
 *
 *   import { runtimeConfig } from './load-env';
 *
 * .env.local wins over .env; neither overrides variables already set.
 */
import { config } from 'dotenv';
import path from 'path';
import { loadConfig, type AppConfig } from '@prepscout/core';

for (const file of ['.env.local', '.env']) {
  config({ path: path.resolve(process.cwd(), file) });
}

export const runtimeConfig: AppConfig = loadConfig();
