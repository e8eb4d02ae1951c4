import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import { createLogger } from './logger.js';

const logger = createLogger('dotenv');

/**
 * Where a .env may live, most specific first: DOTENV_PATH, the working
 * directory, then the package root (two levels above src/utils or dist/utils).
 */
export function getDotenvCandidatePaths(moduleDir: string, cwd: string): string[] {
  const candidates = [process.env.DOTENV_PATH, path.resolve(cwd, '.env'), path.resolve(moduleDir, '..', '..', '.env')];
  return [...new Set(candidates.filter((candidate): candidate is string => Boolean(candidate)))];
}

/**
 * Load the first .env found. Variables already in the environment win.
 */
export function loadDotenv(moduleDir: string = __dirname): string | undefined {
  const envPath = getDotenvCandidatePaths(moduleDir, process.cwd()).find((candidate) => fs.existsSync(candidate));
  if (!envPath) {
    logger.debug('No .env file found');
    return undefined;
  }

  const result = dotenv.config({ path: envPath, override: false });
  if (result.error) {
    logger.warn('Could not read .env file', { path: envPath, error: result.error.message });
    return undefined;
  }
  logger.debug('Loaded .env file', { path: envPath });
  return envPath;
}
