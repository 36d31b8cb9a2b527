/**
 * Prometheus model
 * Names, fixed sub-specs and field resolvers used by the assembler
 */

import { createHash } from "crypto";
import type { V1Container, V1LabelSelector } from "@kubernetes/client-node";
import { stringify as stringifyYaml } from "yaml";
import { InvalidStorageQuantityError } from "./errors";
import {
  AlertingSpec,
  ObservabilityResource,
  OpenShiftRoute,
  PrometheusSettings,
  RepositoryIndex,
  SelfContainedSpec,
  StorageSpec,
  getNamespace,
  isRepoSyncDisabled,
} from "./types";

// ============================================================================
// Names
// ============================================================================

export const PROMETHEUS_NAME = "observability-prometheus";
export const PROMETHEUS_SERVICE_ACCOUNT = "observability-prometheus";
export const PROMETHEUS_PROXY_SECRET = "observability-prometheus-proxy";
export const PROMETHEUS_ROUTE = "observability-prometheus";
export const PROMETHEUS_TLS_SECRET = "prometheus-k8s-tls";
export const ALERTMANAGER_NAME = "observability-alertmanager";
export const ALERTMANAGER_SERVICE = "observability-alertmanager";
export const BLACKBOX_CONFIG_MAP = "black-box-config";
export const BLACKBOX_CONFIG_KEY = "black-box-config.yaml";
export const STORAGE_CLAIM_NAME = "managed-services";
export const DEFAULT_MONITORING_KEY = "middleware";

const SERVICE_ACCOUNT_DIR = "/var/run/secrets/kubernetes.io/serviceaccount";

// ============================================================================
// Retention
// ============================================================================

const RETENTION_PATTERN = /^[0-9]+((ms)|y|w|d|h|m|s)$/;

export function resolveRetention(
  retention: string | undefined,
  defaultRetention: string,
): string {
  if (retention !== undefined && RETENTION_PATTERN.test(retention)) {
    return retention;
  }
  return defaultRetention;
}

// ============================================================================
// Storage
// ============================================================================

// <signedNumber><suffix>, see k8s.io/apimachinery resource.Quantity
const QUANTITY_PATTERN =
  /^[+-]?(\d+(\.\d*)?|\.\d+)(Ki|Mi|Gi|Ti|Pi|Ei|m|k|M|G|T|P|E|[eE][+-]?\d+)?$/;

export function isValidQuantity(value: string): boolean {
  return QUANTITY_PATTERN.test(value);
}

export type StorageResolution =
  | {
      kind: "resolved";
      source: "override" | "observed" | "index";
      spec?: StorageSpec;
    }
  | {
      kind: "invalid";
      /** Best known spec, i.e. the one currently observed */
      spec?: StorageSpec;
      error: InvalidStorageQuantityError;
    };

/**
 * First storage size declared by an index, if any.
 */
export function getIndexStorageSize(
  indexes: RepositoryIndex[],
): string | undefined {
  for (const index of indexes) {
    const size = index.config?.prometheus?.storageSize;
    if (size) {
      return size;
    }
  }
  return undefined;
}

export function buildStorageSpec(size: string): StorageSpec {
  return {
    volumeClaimTemplate: {
      metadata: { name: STORAGE_CLAIM_NAME },
      spec: {
        resources: {
          requests: { storage: size },
        },
      },
    },
  };
}

export function resolveStorage(
  cr: ObservabilityResource,
  indexes: RepositoryIndex[],
  observed?: StorageSpec,
): StorageResolution {
  const override = cr.spec?.storage?.prometheus;
  if (override) {
    return { kind: "resolved", source: "override", spec: override };
  }

  if (isRepoSyncDisabled(cr)) {
    return { kind: "resolved", source: "observed", spec: observed };
  }

  const size = getIndexStorageSize(indexes);
  if (!size) {
    return { kind: "resolved", source: "observed", spec: observed };
  }

  if (!isValidQuantity(size)) {
    return {
      kind: "invalid",
      spec: observed,
      error: new InvalidStorageQuantityError(size),
    };
  }

  return { kind: "resolved", source: "index", spec: buildStorageSpec(size) };
}

// ============================================================================
// Selectors
// ============================================================================

export interface PrometheusSelectors {
  podMonitorSelector: V1LabelSelector;
  podMonitorNamespaceSelector: V1LabelSelector;
  serviceMonitorSelector: V1LabelSelector;
  serviceMonitorNamespaceSelector: V1LabelSelector;
  ruleSelector: V1LabelSelector;
  ruleNamespaceSelector: V1LabelSelector;
  probeSelector: V1LabelSelector;
  probeNamespaceSelector: V1LabelSelector;
}

export function getMonitoringKeys(indexes: RepositoryIndex[]): string[] {
  const keys: string[] = [];
  for (const index of indexes) {
    const key = index.config?.prometheus?.monitoringKey;
    if (key && !keys.includes(key)) {
      keys.push(key);
    }
  }
  return keys.length > 0 ? keys : [DEFAULT_MONITORING_KEY];
}

function monitoringKeySelector(keys: string[]): V1LabelSelector {
  return {
    matchExpressions: [
      { key: "monitoring-key", operator: "In", values: [...keys] },
    ],
  };
}

/**
 * Self-contained overrides apply only when repository sync is disabled.
 */
export function buildSelectors(
  cr: ObservabilityResource,
  indexes: RepositoryIndex[],
): PrometheusSelectors {
  const keys = getMonitoringKeys(indexes);
  const overrides: SelfContainedSpec = isRepoSyncDisabled(cr)
    ? (cr.spec?.selfContained ?? {})
    : {};
  const pick = (override?: V1LabelSelector) =>
    override ?? monitoringKeySelector(keys);

  return {
    podMonitorSelector: pick(overrides.podMonitorLabelSelector),
    podMonitorNamespaceSelector: pick(overrides.podMonitorNamespaceSelector),
    serviceMonitorSelector: pick(overrides.serviceMonitorLabelSelector),
    serviceMonitorNamespaceSelector: pick(
      overrides.serviceMonitorNamespaceSelector,
    ),
    ruleSelector: pick(overrides.ruleLabelSelector),
    ruleNamespaceSelector: pick(overrides.ruleNamespaceSelector),
    probeSelector: pick(overrides.probeLabelSelector),
    probeNamespaceSelector: pick(overrides.probeNamespaceSelector),
  };
}

// ============================================================================
// Alerting
// ============================================================================

export function buildAlerting(cr: ObservabilityResource): AlertingSpec {
  const namespace = getNamespace(cr);
  return {
    alertmanagers: [
      {
        namespace,
        name: ALERTMANAGER_NAME,
        port: "web",
        scheme: "https",
        tlsConfig: {
          caFile: `${SERVICE_ACCOUNT_DIR}/service-ca.crt`,
          serverName: `${ALERTMANAGER_SERVICE}.${namespace}.svc`,
        },
        bearerTokenFile: `${SERVICE_ACCOUNT_DIR}/token`,
      },
    ],
  };
}

// ============================================================================
// Sidecars
// ============================================================================

export function buildOAuthProxySidecar(settings: PrometheusSettings): V1Container {
  return {
    name: "oauth-proxy",
    image: settings.oauthProxyImage,
    args: [
      "-provider=openshift",
      "-https-address=:9091",
      "-http-address=",
      "-email-domain=*",
      "-upstream=http://localhost:9090",
      `-openshift-service-account=${PROMETHEUS_SERVICE_ACCOUNT}`,
      '-openshift-sar={"resource": "namespaces", "verb": "get"}',
      '-openshift-delegate-urls={"/": {"resource": "namespaces", "verb": "get"}}',
      "-tls-cert=/etc/tls/private/tls.crt",
      "-tls-key=/etc/tls/private/tls.key",
      `-client-secret-file=${SERVICE_ACCOUNT_DIR}/token`,
      "-cookie-secret-file=/etc/proxy/secrets/session_secret",
      "-openshift-ca=/etc/pki/tls/cert.pem",
      `-openshift-ca=${SERVICE_ACCOUNT_DIR}/ca.crt`,
      "-skip-auth-regex=^/metrics",
    ],
    env: [{ name: "HTTP_PROXY" }, { name: "HTTPS_PROXY" }, { name: "NO_PROXY" }],
    ports: [{ name: "proxy", containerPort: 9091 }],
    volumeMounts: [
      { name: `secret-${PROMETHEUS_TLS_SECRET}`, mountPath: "/etc/tls/private" },
      {
        name: `secret-${PROMETHEUS_PROXY_SECRET}`,
        mountPath: "/etc/proxy/secrets",
      },
    ],
  };
}

/**
 * The hash lands in the environment so a config change rolls the pod.
 */
export function buildBlackboxExporterSidecar(
  settings: PrometheusSettings,
  configHash: string,
): V1Container {
  return {
    name: "blackbox-exporter",
    image: settings.blackboxExporterImage,
    args: [`--config.file=/opt/config/${BLACKBOX_CONFIG_KEY}`],
    env: [{ name: "CONFIG_HASH", value: configHash }],
    ports: [{ name: "http", containerPort: 9115 }],
    volumeMounts: [
      { name: BLACKBOX_CONFIG_MAP, mountPath: "/opt/config/" },
      { name: `secret-${PROMETHEUS_TLS_SECRET}`, mountPath: "/etc/tls/private" },
    ],
  };
}

// ============================================================================
// Black-box exporter configuration
// ============================================================================

export interface BlackboxConfig {
  content: string;
  hash: string;
}

export function renderBlackboxConfig(): BlackboxConfig {
  const content = stringifyYaml({
    modules: {
      http_2xx: {
        prober: "http",
        timeout: "5s",
        http: {
          preferred_ip_protocol: "ip4",
          tls_config: {
            ca_file: `${SERVICE_ACCOUNT_DIR}/service-ca.crt`,
          },
        },
      },
      http_2xx_insecure: {
        prober: "http",
        timeout: "5s",
        http: {
          preferred_ip_protocol: "ip4",
          tls_config: {
            insecure_skip_verify: true,
          },
        },
      },
    },
  });
  return { content, hash: hashConfig(content) };
}

export function hashConfig(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

// ============================================================================
// Route
// ============================================================================

export function isRouteAdmitted(route?: OpenShiftRoute): boolean {
  const conditions = route?.status?.ingress?.[0]?.conditions ?? [];
  return conditions.some((c) => c.type === "Admitted" && c.status === "True");
}

/**
 * Host of the Prometheus route, or "" while it is not admitted yet.
 */
export function getRouteHost(route?: OpenShiftRoute): string {
  if (!isRouteAdmitted(route)) {
    return "";
  }
  return route?.spec?.host ?? "";
}
