import { readFile, writeFile, mkdir, rename } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import type { FailedProbeResult } from './types.js';

/**
 * 最近一次已送出的告警
 */
export interface AlertRecord {
  classification: string;
  notifiedAt: string;
}

/**
 * 重複告警抑制用的外部狀態（以目標 URL 為 key）
 */
export interface AlertStateStore {
  get(targetUrl: string): Promise<AlertRecord | undefined>;
  set(targetUrl: string, record: AlertRecord): Promise<void>;
  clear(targetUrl: string): Promise<void>;
}

/**
 * 告警分類：不同狀態碼視為不同狀況
 */
export function alertClassification(result: FailedProbeResult): string {
  return result.status === 'unhealthy' ? `unhealthy:${result.statusCode}` : 'unreachable';
}

function isAlertRecord(value: unknown): value is AlertRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'classification' in value &&
    typeof value.classification === 'string' &&
    'notifiedAt' in value &&
    typeof value.notifiedAt === 'string'
  );
}

/**
 * JSON 檔案實作
 *
 * 每次操作都重新讀檔，不在記憶體中保留跨次執行的狀態。
 */
export class FileAlertStateStore implements AlertStateStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  private async readAll(): Promise<Record<string, AlertRecord>> {
    if (!existsSync(this.filePath)) {
      return {};
    }

    const data = await readFile(this.filePath, 'utf-8');
    if (!data.trim()) {
      return {};
    }

    const parsed: unknown = JSON.parse(data);
    const records: Record<string, AlertRecord> = {};
    if (typeof parsed === 'object' && parsed !== null) {
      for (const [key, value] of Object.entries(parsed)) {
        if (isAlertRecord(value)) {
          records[key] = value;
        }
      }
    }
    return records;
  }

  private async writeAll(records: Record<string, AlertRecord>): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    // 先寫暫存檔再改名
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(records, null, 2), 'utf-8');
    await rename(tmpPath, this.filePath);
  }

  async get(targetUrl: string): Promise<AlertRecord | undefined> {
    const records = await this.readAll();
    return records[targetUrl];
  }

  async set(targetUrl: string, record: AlertRecord): Promise<void> {
    const records = await this.readAll();
    records[targetUrl] = record;
    await this.writeAll(records);
  }

  async clear(targetUrl: string): Promise<void> {
    const records = await this.readAll();
    if (!(targetUrl in records)) {
      return;
    }
    delete records[targetUrl];
    await this.writeAll(records);
  }
}
