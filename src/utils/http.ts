/**
 * 將傳輸層錯誤轉為簡短診斷字串（不含 stack）
 *
 * fetch 失敗時真正原因在 error.cause，例如 ECONNREFUSED、ENOTFOUND。
 */
export function describeTransportError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : null;
    const message = cause instanceof Error ? cause.message : null;
    if (code && message) {
      return message.includes(code) ? message : `${code}: ${message}`;
    }
    if (code) {
      return code;
    }
    if (message) {
      return message;
    }
  }

  return error.message;
}

/**
 * 截斷回應內容，避免把整頁 HTML 寫進錯誤訊息
 */
export async function readErrorBody(response: Response, maxLength = 200): Promise<string> {
  const text = (await response.text()).trim();
  return text.length > maxLength ? `${text.slice(0, maxLength)}…` : text;
}
