/**
 * Reconcile Applier
 *
 * compute desired → diff against observed → write only when they differ.
 * Only fields present in the desired object are owned; everything else on
 * the live object is carried over untouched.
 */

import { isDeepStrictEqual } from "util";
import type { V1ConfigMap, V1Secret } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import { ObservabilityCluster, objectKey } from "./ObservabilityClient";
import { PrometheusResource, PrometheusSpec } from "./types";

export type ApplyOutcome = "created" | "updated" | "unchanged";

/** Drop undefined members so values compare the way they serialize */
function toJson(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}

function sameJson(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(toJson(a), toJson(b));
}

// ============================================================================
// Prometheus
// ============================================================================

const PROMETHEUS_SPEC_FIELDS: Record<keyof PrometheusSpec, true> = {
  image: true,
  version: true,
  priorityClassName: true,
  serviceAccountName: true,
  retention: true,
  externalUrl: true,
  additionalScrapeConfigs: true,
  externalLabels: true,
  volumes: true,
  podMonitorSelector: true,
  podMonitorNamespaceSelector: true,
  serviceMonitorSelector: true,
  serviceMonitorNamespaceSelector: true,
  ruleSelector: true,
  ruleNamespaceSelector: true,
  probeSelector: true,
  probeNamespaceSelector: true,
  remoteWrite: true,
  alerting: true,
  secrets: true,
  containers: true,
  resources: true,
  storage: true,
  tolerations: true,
  affinity: true,
};

function isSpecField(field: string): field is keyof PrometheusSpec {
  return Object.prototype.hasOwnProperty.call(PROMETHEUS_SPEC_FIELDS, field);
}

/**
 * Owned spec fields whose live value differs from the desired one.
 */
export function diffPrometheusSpec(
  desired: PrometheusSpec,
  observed: PrometheusSpec = {},
): Array<keyof PrometheusSpec> {
  const changed: Array<keyof PrometheusSpec> = [];
  for (const [field, value] of Object.entries(desired)) {
    if (value === undefined || !isSpecField(field)) {
      continue;
    }
    if (!sameJson(value, observed[field])) {
      changed.push(field);
    }
  }
  return changed;
}

export function diffLabels(
  desired: Record<string, string> = {},
  observed: Record<string, string> = {},
): string[] {
  return Object.keys(desired).filter((key) => desired[key] !== observed[key]);
}

/**
 * Live object with the owned fields overwritten by the desired values.
 */
export function mergePrometheus(
  observed: PrometheusResource,
  desired: PrometheusResource,
): PrometheusResource {
  return {
    ...observed,
    metadata: {
      ...observed.metadata,
      labels: {
        ...observed.metadata?.labels,
        ...desired.metadata?.labels,
      },
    },
    spec: {
      ...observed.spec,
      ...desired.spec,
    },
  };
}

export interface ApplyContext {
  cluster: ObservabilityCluster;
  logger: LoggerService;
}

export async function applyPrometheus(
  desired: PrometheusResource,
  { cluster, logger }: ApplyContext,
): Promise<ApplyOutcome> {
  const { namespace, name } = objectKey(desired.metadata);
  const observed = await cluster.getPrometheus(namespace, name);

  if (!observed) {
    await cluster.createPrometheus(desired);
    logger.info(`[Applier] created Prometheus ${namespace}/${name}`);
    return "created";
  }

  const changedFields = diffPrometheusSpec(desired.spec ?? {}, observed.spec);
  const changedLabels = diffLabels(
    desired.metadata?.labels,
    observed.metadata?.labels,
  );
  if (changedFields.length === 0 && changedLabels.length === 0) {
    logger.debug(`[Applier] Prometheus ${namespace}/${name} is up to date`);
    return "unchanged";
  }

  await cluster.replacePrometheus(mergePrometheus(observed, desired));
  logger.info(
    `[Applier] updated Prometheus ${namespace}/${name} (${[
      ...changedFields,
      ...changedLabels.map((l) => `label:${l}`),
    ].join(", ")})`,
  );
  return "updated";
}

// ============================================================================
// Secrets and ConfigMaps
// ============================================================================

export async function applySecret(
  desired: V1Secret,
  { cluster, logger }: ApplyContext,
): Promise<ApplyOutcome> {
  const { namespace, name } = objectKey(desired.metadata);
  const observed = await cluster.getSecret(namespace, name);

  if (!observed) {
    await cluster.createSecret(desired);
    logger.info(`[Applier] created Secret ${namespace}/${name}`);
    return "created";
  }

  if (observed.type === desired.type && sameJson(observed.data, desired.data)) {
    return "unchanged";
  }

  await cluster.replaceSecret({
    ...observed,
    type: desired.type,
    data: desired.data,
  });
  logger.info(`[Applier] updated Secret ${namespace}/${name}`);
  return "updated";
}

export async function applyConfigMap(
  desired: V1ConfigMap,
  { cluster, logger }: ApplyContext,
): Promise<ApplyOutcome> {
  const { namespace, name } = objectKey(desired.metadata);
  const observed = await cluster.getConfigMap(namespace, name);

  if (!observed) {
    await cluster.createConfigMap(desired);
    logger.info(`[Applier] created ConfigMap ${namespace}/${name}`);
    return "created";
  }

  if (sameJson(observed.data, desired.data)) {
    return "unchanged";
  }

  await cluster.replaceConfigMap({ ...observed, data: desired.data });
  logger.info(`[Applier] updated ConfigMap ${namespace}/${name}`);
  return "updated";
}
