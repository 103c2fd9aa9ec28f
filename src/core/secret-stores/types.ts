/**
 * 機密儲存來源
 *
 * fetch() 回傳原始字串；找不到時丟 SecretNotFoundError，其餘上游失敗丟 SecretStoreUnavailableError。
 */
export interface SecretStore {
  readonly name: string;
  fetch(secretId: string, signal: AbortSignal): Promise<string>;
}
