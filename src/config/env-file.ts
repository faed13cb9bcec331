import { Logger } from '@nestjs/common';
import { config } from 'dotenv';

/**
 * Loads a dotenv file into `process.env`. Variables already set in the
 * environment win over the file. A missing file is not an error.
 *
 * @returns the names the file defines
 */
export function loadEnvFile(path = '.env'): string[] {
  const { parsed, error } = config({ path });
  if (error) {
    if ('code' in error && error.code === 'ENOENT') return [];
    throw error;
  }
  const names = Object.keys(parsed ?? {});
  Logger.log(`Loaded ${names.length} variables from ${path}`, 'Config');
  return names;
}
