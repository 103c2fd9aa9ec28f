import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import { SecretNotFoundError, SecretStoreUnavailableError } from '../errors.js';
import type { SecretStore } from './types.js';

/**
 * 本機 JSON 檔案來源（本機執行與 daemon 模式使用）
 *
 * secret id 即檔案路徑，相對路徑以 baseDir 為基準。
 */
export class FileSecretStore implements SecretStore {
  readonly name = 'file';
  private baseDir: string;

  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
  }

  async fetch(secretId: string, signal: AbortSignal): Promise<string> {
    const filePath = isAbsolute(secretId) ? secretId : resolve(this.baseDir, secretId);

    try {
      return await readFile(filePath, { encoding: 'utf-8', signal });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new SecretNotFoundError(secretId);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SecretStoreUnavailableError(message);
    }
  }
}
