/**
 * Prometheus desired-state reconciler
 *
 * Resolves the desired configuration of a managed Prometheus from remote
 * repository indexes and reconciles it against the live cluster.
 *
 * ## What gets reconciled
 *
 * - **Federation**: match[] patterns from every index are merged into the
 *   `additional-scrape-configs` Secret, authenticated with the credentials
 *   from the Grafana datasources secret
 * - **Remote write**: one target per index, via Dex (direct to the
 *   Observatorium gateway) or Red Hat SSO (through a token refresher)
 * - **Prometheus**: the `monitoring.coreos.com/v1` Prometheus resource, with
 *   only the fields owned here overwritten
 *
 * ## Usage
 *
 * ```typescript
 * import { createBackend } from '@backstage/backend-defaults';
 *
 * const backend = createBackend();
 * backend.add(import('prometheus-desired-state-reconciler'));
 * backend.start();
 * ```
 *
 * @packageDocumentation
 */

// Backend plugin
export { observabilityPrometheusPlugin, default } from "./plugin";

// Reconciler
export { PrometheusReconciler, buildBlackboxConfigMap } from "./PrometheusReconciler";
export type {
  PrometheusReconcilerOptions,
  ReconcileResult,
} from "./PrometheusReconciler";

// Kubernetes client
export {
  ObservabilityClient,
  createObservabilityClient,
  objectKey,
} from "./ObservabilityClient";
export type {
  ObservabilityCluster,
  ObservabilityClientOptions,
  ClusterConnectionConfig,
} from "./ObservabilityClient";

// Fetching and parsing
export { HttpResourceFetcher, joinIndexUrl, withRef } from "./ResourceFetcher";
export type {
  ResourceFetcher,
  FetchRequest,
  FetchFn,
  FetchResponse,
} from "./ResourceFetcher";
export { parseFederationDoc, parseRemoteWriteDoc } from "./indexParser";

// Resolution
export {
  aggregateFederationPatterns,
  quotePattern,
  renderFederationScrapeConfig,
} from "./federation";
export {
  resolveFederationCredentials,
  decodeCredentials,
  CREDENTIAL_CANDIDATES,
} from "./credentials";
export type { CredentialCandidate, SecretReader } from "./credentials";
export {
  resolveRemoteWriteSpec,
  collectRemoteWrites,
  getObservatoriumTokenSecretName,
  getTokenRefresherName,
} from "./remoteWrite";
export type { ResolvedRemoteWrite } from "./remoteWrite";
export {
  buildDesiredPrometheus,
  assembleDesiredPrometheus,
  buildSecretList,
} from "./assembler";
export type { AssembleInputs, AssembledPrometheus } from "./assembler";
export {
  resolveRetention,
  resolveStorage,
  buildSelectors,
  renderBlackboxConfig,
} from "./model";
export type { StorageResolution, PrometheusSelectors } from "./model";

// Applying
export {
  applyPrometheus,
  applySecret,
  applyConfigMap,
  diffPrometheusSpec,
} from "./applier";
export type { ApplyOutcome } from "./applier";

// Configuration
export { readReconcilerConfig, readIndexes } from "./config";
export type { ReconcilerConfig } from "./config";

// Errors
export * from "./errors";

// Type exports
export type {
  RepositoryIndex,
  RepositoryConfig,
  RepositoryPrometheusConfig,
  ObservatoriumConfig,
  ObservatoriumAuthType,
  FederationIndexDoc,
  RemoteWriteIndexDoc,
  RelabelConfig,
  QueueConfig,
  Credentials,
  PrometheusSpec,
  PrometheusResource,
  RemoteWriteSpec,
  StorageSpec,
  ObservabilityResource,
  ObservabilitySpec,
  OpenShiftRoute,
  PrometheusSettings,
} from "./types";
export { DEFAULT_PROMETHEUS_SETTINGS } from "./types";
