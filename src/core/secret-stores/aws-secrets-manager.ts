import {
  SecretsManagerClient,
  GetSecretValueCommand,
  ResourceNotFoundException,
  type GetSecretValueCommandInput,
  type GetSecretValueCommandOutput,
} from '@aws-sdk/client-secrets-manager';
import { SecretNotFoundError, SecretStoreUnavailableError } from '../errors.js';
import type { SecretStore } from './types.js';

export type GetSecretValue = (
  input: GetSecretValueCommandInput,
  signal: AbortSignal
) => Promise<GetSecretValueCommandOutput>;

export interface AwsSecretsManagerStoreConfig {
  region?: string;
  /** 測試用：替換實際的 SDK 呼叫 */
  getSecretValue?: GetSecretValue;
}

/**
 * AWS Secrets Manager 來源
 *
 * SDK 內建重試關閉（maxAttempts: 1），每次執行只取一次。
 */
export class AwsSecretsManagerStore implements SecretStore {
  readonly name = 'aws-secrets-manager';
  private getSecretValue: GetSecretValue;

  constructor(config?: AwsSecretsManagerStoreConfig) {
    if (config?.getSecretValue) {
      this.getSecretValue = config.getSecretValue;
    } else {
      const client = new SecretsManagerClient({ region: config?.region, maxAttempts: 1 });
      this.getSecretValue = (input, signal) =>
        client.send(new GetSecretValueCommand(input), { abortSignal: signal });
    }
  }

  async fetch(secretId: string, signal: AbortSignal): Promise<string> {
    let output: GetSecretValueCommandOutput;
    try {
      output = await this.getSecretValue({ SecretId: secretId }, signal);
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        throw new SecretNotFoundError(secretId);
      }
      if (signal.aborted) {
        throw new SecretStoreUnavailableError('request aborted');
      }
      const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      throw new SecretStoreUnavailableError(message);
    }

    if (typeof output.SecretString === 'string') {
      return output.SecretString;
    }
    if (output.SecretBinary) {
      return Buffer.from(output.SecretBinary).toString('utf-8');
    }
    return '';
  }
}
