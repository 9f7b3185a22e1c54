/**
 * Inline `.env` loader. Lines are `KEY=value`; surrounding quotes are
 * stripped and variables already set in the environment win.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Load `<dir>/.env` into `env`. Returns the keys that were set; a missing
 * file sets nothing.
 */
export function loadDotenv(dir: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const envPath = path.resolve(dir, '.env');
  if (!fs.existsSync(envPath)) return [];

  const loaded: string[] = [];
  const content = fs.readFileSync(envPath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (env[key] === undefined) {
      env[key] = value;
      loaded.push(key);
    }
  }
  return loaded;
}
