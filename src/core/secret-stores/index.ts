export { AwsSecretsManagerStore, type AwsSecretsManagerStoreConfig, type GetSecretValue } from './aws-secrets-manager.js';
export { FileSecretStore } from './file.js';
export type { SecretStore } from './types.js';
