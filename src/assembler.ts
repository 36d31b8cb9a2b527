/**
 * Desired-State Assembler
 * Composes the full Prometheus spec owned by this package
 */

import type { V1Volume } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import {
  PROMETHEUS_NAME,
  PROMETHEUS_PROXY_SECRET,
  PROMETHEUS_SERVICE_ACCOUNT,
  PROMETHEUS_TLS_SECRET,
  BLACKBOX_CONFIG_MAP,
  buildAlerting,
  buildBlackboxExporterSidecar,
  buildOAuthProxySidecar,
  buildSelectors,
  resolveRetention,
  resolveStorage,
  StorageResolution,
} from "./model";
import {
  ADDITIONAL_SCRAPE_CONFIG_KEY,
  ADDITIONAL_SCRAPE_CONFIG_SECRET,
} from "./federation";
import { ResourceFetcher } from "./ResourceFetcher";
import { ResolvedRemoteWrite, collectRemoteWrites } from "./remoteWrite";
import {
  ObservabilityResource,
  PrometheusResource,
  PrometheusSettings,
  PrometheusSpec,
  RepositoryIndex,
  StorageSpec,
  getNamespace,
  isBlackboxExporterDisabled,
  isObservatoriumDisabled,
} from "./types";

export const PROMETHEUS_API_VERSION = "monitoring.coreos.com/v1";
export const PROMETHEUS_LABELS: Readonly<Record<string, string>> = {
  app: "prometheus",
};

export interface AssembleInputs {
  cr: ObservabilityResource;
  indexes: RepositoryIndex[];
  settings: PrometheusSettings;
  /** Route host, empty while the route is not ready */
  host: string;
  /** Hash of the black-box exporter config, when the exporter runs */
  blackboxConfigHash?: string;
  remoteWrites: ResolvedRemoteWrite[];
  /** Storage spec of the live object, used as the fallback */
  observedStorage?: StorageSpec;
}

export interface AssembledPrometheus {
  resource: PrometheusResource;
  storage: StorageResolution;
}

/**
 * Ordered, duplicate-free list of secrets mounted into Prometheus.
 */
export function buildSecretList(remoteWrites: ResolvedRemoteWrite[]): string[] {
  const secrets = [PROMETHEUS_PROXY_SECRET, PROMETHEUS_TLS_SECRET];
  for (const rw of remoteWrites) {
    if (rw.tokenSecret && !secrets.includes(rw.tokenSecret)) {
      secrets.push(rw.tokenSecret);
    }
  }
  return secrets;
}

/**
 * Pure: equal inputs give structurally equal output.
 */
export function buildDesiredPrometheus(
  inputs: AssembleInputs,
): AssembledPrometheus {
  const { cr, indexes, settings, host, remoteWrites } = inputs;
  const version = cr.spec?.prometheusVersion ?? settings.defaultVersion;
  const selectors = buildSelectors(cr, indexes);
  const storage = resolveStorage(cr, indexes, inputs.observedStorage);

  // The config map volume exists only alongside the exporter that reads it
  const containers = [buildOAuthProxySidecar(settings)];
  const volumes: V1Volume[] = [];
  if (!isBlackboxExporterDisabled(cr)) {
    containers.push(
      buildBlackboxExporterSidecar(settings, inputs.blackboxConfigHash ?? ""),
    );
    volumes.push({
      name: BLACKBOX_CONFIG_MAP,
      configMap: { name: BLACKBOX_CONFIG_MAP },
    });
  }

  const spec: PrometheusSpec = {
    image: `${settings.baseImage}:${version}`,
    version,
    priorityClassName: settings.priorityClassName,
    serviceAccountName: PROMETHEUS_SERVICE_ACCOUNT,
    retention: resolveRetention(cr.spec?.retention, settings.defaultRetention),
    externalUrl: `https://${host}`,
    additionalScrapeConfigs: {
      name: ADDITIONAL_SCRAPE_CONFIG_SECRET,
      key: ADDITIONAL_SCRAPE_CONFIG_KEY,
    },
    externalLabels: { cluster_id: cr.status?.clusterId ?? "" },
    volumes,
    ...selectors,
    remoteWrite: remoteWrites.map((rw) => rw.spec),
    alerting: buildAlerting(cr),
    secrets: buildSecretList(remoteWrites),
    containers,
    resources: cr.spec?.resources?.prometheus ?? {},
  };

  if (storage.spec) {
    spec.storage = storage.spec;
  }
  if (cr.spec?.tolerations) {
    spec.tolerations = cr.spec.tolerations;
  }
  if (cr.spec?.affinity) {
    spec.affinity = cr.spec.affinity;
  }

  return {
    resource: {
      apiVersion: PROMETHEUS_API_VERSION,
      kind: "Prometheus",
      metadata: {
        name: PROMETHEUS_NAME,
        namespace: getNamespace(cr),
        labels: { ...PROMETHEUS_LABELS },
      },
      spec,
    },
    storage,
  };
}

export interface AssembleContext {
  fetcher: ResourceFetcher;
  logger: LoggerService;
}

/**
 * Resolve remote writes for the indexes, then build the desired Prometheus.
 */
export async function assembleDesiredPrometheus(
  inputs: Omit<AssembleInputs, "remoteWrites">,
  { fetcher, logger }: AssembleContext,
): Promise<AssembledPrometheus> {
  const remoteWrites = isObservatoriumDisabled(inputs.cr)
    ? []
    : await collectRemoteWrites(inputs.indexes, {
        fetcher,
        logger,
        namespace: getNamespace(inputs.cr),
      });

  const assembled = buildDesiredPrometheus({ ...inputs, remoteWrites });

  if (assembled.storage.kind === "invalid") {
    logger.warn(
      `[Assembler] ${assembled.storage.error.message}; keeping the current storage spec`,
    );
  }

  return assembled;
}
