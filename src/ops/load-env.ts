import { config } from 'dotenv';
import { resolve } from 'path';
import fs from 'fs';

/**
 * Loads `.env.local` when present, otherwise `.env`, from the working directory.
 * Values already set in the process environment win.
 */
export const loadEnv = (cwd: string = process.cwd()): string | null => {
  const localPath = resolve(cwd, '.env.local');
  if (fs.existsSync(localPath)) {
    config({ path: localPath });
    return localPath;
  }

  const defaultPath = resolve(cwd, '.env');
  if (fs.existsSync(defaultPath)) {
    config({ path: defaultPath });
    return defaultPath;
  }

  return null;
};
