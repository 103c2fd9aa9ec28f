/**
 * 版本資訊模組
 *
 * 從 package.json 讀取版本號，用於 User-Agent 與啟動訊息。
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));

function readVersion(pkg: unknown): string {
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION: string = readVersion(packageJson);

export const USER_AGENT = `health-notifier/${VERSION}`;
