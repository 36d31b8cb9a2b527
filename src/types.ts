/**
 * Observability and Prometheus resource types
 * Based on observability.redhat.com/v1 and monitoring.coreos.com/v1
 */

import type {
  V1Affinity,
  V1Container,
  V1LabelSelector,
  V1ObjectMeta,
  V1ResourceRequirements,
  V1Toleration,
  V1Volume,
} from "@kubernetes/client-node";

// ============================================================================
// Repository Index Types
// ============================================================================

export type ObservatoriumAuthType = "dex" | "redhat";

export interface ObservatoriumConfig {
  id: string;
  gateway: string;
  tenant: string;
  /** Anything other than "dex" or "redhat" is rejected at resolve time */
  authType: string;
}

export interface RepositoryPrometheusConfig {
  /** Path of the federation pattern document, relative to the index base URL */
  federation?: string;
  /** Path of the remote-write document, relative to the index base URL */
  remoteWrite?: string;
  /** Id of the Observatorium entry the remote-write target points at */
  observatorium?: string;
  /** Storage size requested for the Prometheus volume claim, e.g. "250Gi" */
  storageSize?: string;
  /** Value of the monitoring-key label selected by monitors and rules */
  monitoringKey?: string;
}

export interface RepositoryConfig {
  prometheus?: RepositoryPrometheusConfig;
  observatoria?: ObservatoriumConfig[];
}

export interface RepositoryIndex {
  id: string;
  baseUrl: string;
  tag?: string;
  accessToken?: string;
  config?: RepositoryConfig;
}

// ============================================================================
// Index Document Types
// ============================================================================

export interface FederationIndexDoc {
  "match[]"?: string[];
}

export interface RelabelConfig {
  sourceLabels?: string[];
  separator?: string;
  targetLabel?: string;
  regex?: string;
  modulus?: number;
  replacement?: string;
  action?: string;
}

export interface QueueConfig {
  capacity?: number;
  minShards?: number;
  maxShards?: number;
  maxSamplesPerSend?: number;
  batchSendDeadline?: string;
  maxRetries?: number;
  minBackoff?: string;
  maxBackoff?: string;
  retryOnRateLimit?: boolean;
}

export interface RemoteWriteIndexDoc {
  remoteTimeout?: string;
  writeRelabelConfigs?: RelabelConfig[];
  proxyUrl?: string;
  queueConfig?: QueueConfig;
}

export interface Credentials {
  user: string;
  password: string;
}

// ============================================================================
// Prometheus Types
// ============================================================================

export interface SafeTLSConfig {
  insecureSkipVerify?: boolean;
  serverName?: string;
}

export interface TLSConfig extends SafeTLSConfig {
  caFile?: string;
}

export interface RemoteWriteSpec {
  url: string;
  name?: string;
  remoteTimeout?: string;
  writeRelabelConfigs?: RelabelConfig[];
  bearerTokenFile?: string;
  tlsConfig?: TLSConfig;
  proxyUrl?: string;
  queueConfig?: QueueConfig;
}

export interface AlertmanagerEndpoints {
  namespace: string;
  name: string;
  port: string;
  scheme?: string;
  tlsConfig?: TLSConfig;
  bearerTokenFile?: string;
}

export interface AlertingSpec {
  alertmanagers: AlertmanagerEndpoints[];
}

export interface SecretKeySelector {
  name: string;
  key: string;
}

export interface StorageSpec {
  volumeClaimTemplate?: {
    metadata?: { name?: string };
    spec?: {
      storageClassName?: string;
      accessModes?: string[];
      resources?: {
        requests?: Record<string, string>;
      };
    };
  };
  emptyDir?: Record<string, unknown>;
}

export interface PrometheusSpec {
  image?: string;
  version?: string;
  priorityClassName?: string;
  serviceAccountName?: string;
  retention?: string;
  externalUrl?: string;
  additionalScrapeConfigs?: SecretKeySelector;
  externalLabels?: Record<string, string>;
  volumes?: V1Volume[];
  podMonitorSelector?: V1LabelSelector;
  podMonitorNamespaceSelector?: V1LabelSelector;
  serviceMonitorSelector?: V1LabelSelector;
  serviceMonitorNamespaceSelector?: V1LabelSelector;
  ruleSelector?: V1LabelSelector;
  ruleNamespaceSelector?: V1LabelSelector;
  probeSelector?: V1LabelSelector;
  probeNamespaceSelector?: V1LabelSelector;
  remoteWrite?: RemoteWriteSpec[];
  alerting?: AlertingSpec;
  secrets?: string[];
  containers?: V1Container[];
  resources?: V1ResourceRequirements;
  storage?: StorageSpec;
  tolerations?: V1Toleration[];
  affinity?: V1Affinity;
}

export interface PrometheusResource {
  apiVersion?: string;
  kind?: string;
  metadata?: V1ObjectMeta;
  spec?: PrometheusSpec;
}

// ============================================================================
// Observability CR Types
// ============================================================================

export interface SelfContainedSpec {
  disableRepoSync?: boolean;
  disableObservatorium?: boolean;
  disableBlackboxExporter?: boolean;
  federatedMetrics?: string[];
  podMonitorLabelSelector?: V1LabelSelector;
  podMonitorNamespaceSelector?: V1LabelSelector;
  serviceMonitorLabelSelector?: V1LabelSelector;
  serviceMonitorNamespaceSelector?: V1LabelSelector;
  ruleLabelSelector?: V1LabelSelector;
  ruleNamespaceSelector?: V1LabelSelector;
  probeLabelSelector?: V1LabelSelector;
  probeNamespaceSelector?: V1LabelSelector;
}

export interface ObservabilitySpec {
  retention?: string;
  prometheusVersion?: string;
  storage?: {
    prometheus?: StorageSpec;
  };
  resources?: {
    prometheus?: V1ResourceRequirements;
  };
  tolerations?: V1Toleration[];
  affinity?: V1Affinity;
  selfContained?: SelfContainedSpec;
}

export interface ObservabilityStatus {
  clusterId?: string;
}

export interface ObservabilityResource {
  apiVersion?: string;
  kind?: string;
  metadata?: V1ObjectMeta;
  spec?: ObservabilitySpec;
  status?: ObservabilityStatus;
}

// ============================================================================
// OpenShift Route Types
// ============================================================================

export interface RouteIngressCondition {
  type: string;
  status: "True" | "False" | "Unknown";
}

export interface OpenShiftRoute {
  apiVersion?: string;
  kind?: string;
  metadata?: V1ObjectMeta;
  spec?: {
    host?: string;
  };
  status?: {
    ingress?: Array<{
      host?: string;
      conditions?: RouteIngressCondition[];
    }>;
  };
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Values the assembler would otherwise read from process-wide constants.
 */
export interface PrometheusSettings {
  baseImage: string;
  defaultVersion: string;
  defaultRetention: string;
  oauthProxyImage: string;
  blackboxExporterImage: string;
  priorityClassName: string;
  credentialsNamespace: string;
}

export const DEFAULT_PROMETHEUS_SETTINGS: PrometheusSettings = {
  baseImage: "quay.io/prometheus/prometheus",
  defaultVersion: "v2.35.0",
  defaultRetention: "45d",
  oauthProxyImage: "quay.io/openshift/origin-oauth-proxy:4.8",
  blackboxExporterImage: "quay.io/prometheus/blackbox-exporter:v0.19.0",
  priorityClassName: "observability-priority",
  credentialsNamespace: "openshift-monitoring",
};

// ============================================================================
// Observability CR Utilities
// ============================================================================

export function isRepoSyncDisabled(cr: ObservabilityResource): boolean {
  return cr.spec?.selfContained?.disableRepoSync === true;
}

export function isObservatoriumDisabled(cr: ObservabilityResource): boolean {
  return cr.spec?.selfContained?.disableObservatorium === true;
}

export function isBlackboxExporterDisabled(
  cr: ObservabilityResource,
): boolean {
  return cr.spec?.selfContained?.disableBlackboxExporter === true;
}

export function getNamespace(cr: ObservabilityResource): string {
  return cr.metadata?.namespace ?? "default";
}
