/**
 * 統一的 Logger 工具
 *
 * 所有 log 輸出加上時間戳記與模組前綴，方便在排程平台的 log 收集器中追蹤。
 *
 * 特性：
 * - 時間格式：[YYYY-MM-DD HH:mm:ss]（依 TZ 環境變數，預設 UTC）
 * - 前綴慣例：[Probe]、[Dispatcher] 等
 * - record() 輸出單行 JSON，給 log 收集器解析用（無時間戳、無前綴）
 */

/**
 * 格式化時間戳記
 */
function formatTimestamp(): string {
  return new Date().toLocaleString('sv-SE', {
    timeZone: process.env.TZ || 'UTC',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export class Logger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  private format(message: string): string {
    return `[${formatTimestamp()}] [${this.prefix}] ${message}`;
  }

  info(message: string, ...args: unknown[]): void {
    console.log(this.format(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.format(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.format(message), ...args);
  }

  /**
   * Debug 訊息（僅在 DEBUG 環境變數啟用時輸出）
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG) {
      console.log(this.format(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * 原始輸出（無時間戳）
   */
  raw(message: string): void {
    console.log(message);
  }

  /**
   * 結構化紀錄：一個物件一行 JSON
   */
  record(entry: Record<string, unknown>): void {
    console.log(JSON.stringify(entry));
  }
}

export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}

export default Logger;
