export { MonitorOrchestrator, type OrchestratorDependencies, type InvocationInput } from './orchestrator.js';
export { runHealthCheck, createOrchestrator, type RunOptions } from './run.js';
export { loadConfig, type MonitorConfig } from './config.js';
export { HealthProbe, classifyStatus, type HealthProbeConfig } from './health-probe.js';
export { SecretResolver, decodeCredentials } from './secret-resolver.js';
export { AwsSecretsManagerStore, FileSecretStore, type SecretStore } from './secret-stores/index.js';
export { NotificationDispatcher, buildAlertMessage, type NotificationResult } from './notification/index.js';
export { FileAlertStateStore, type AlertStateStore, type AlertRecord } from './alert-state-store.js';
export { toOutcomeRecord } from './outcome.js';
export * from './errors.js';
export type * from './types.js';
