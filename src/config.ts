/**
 * Configuration readers for `observability.prometheus`
 */

import { Duration } from "luxon";
import { Config } from "@backstage/config";
import { SchedulerServiceTaskScheduleDefinition } from "@backstage/backend-plugin-api";
import { z } from "zod";
import { ClusterConnectionConfig } from "./ObservabilityClient";
import {
  DEFAULT_PROMETHEUS_SETTINGS,
  PrometheusSettings,
  RepositoryConfig,
  RepositoryIndex,
} from "./types";

export const CONFIG_ROOT = "observability.prometheus";

export interface ReconcilerConfig {
  /** Location of the Observability custom resource */
  namespace: string;
  name: string;
  cluster: ClusterConnectionConfig;
  settings: PrometheusSettings;
  fetch: {
    timeoutMs: number;
    skipTLSVerify: boolean;
  };
  schedule: SchedulerServiceTaskScheduleDefinition;
  indexes: RepositoryIndex[];
}

const repositoryConfigSchema: z.ZodType<RepositoryConfig> = z.object({
  prometheus: z
    .object({
      federation: z.string().optional(),
      remoteWrite: z.string().optional(),
      observatorium: z.string().optional(),
      storageSize: z.string().optional(),
      monitoringKey: z.string().optional(),
    })
    .optional(),
  observatoria: z
    .array(
      z.object({
        id: z.string(),
        gateway: z.string(),
        tenant: z.string(),
        authType: z.string(),
      }),
    )
    .optional(),
});

export function readReconcilerConfig(
  config: Config,
): ReconcilerConfig | undefined {
  const root = config.getOptionalConfig(CONFIG_ROOT);
  if (!root) {
    return undefined;
  }

  return {
    namespace: root.getString("namespace"),
    name: root.getOptionalString("name") ?? "observability-stack",
    cluster: readCluster(root.getOptionalConfig("cluster")),
    settings: readSettings(root.getOptionalConfig("settings")),
    fetch: {
      timeoutMs:
        (root.getOptionalNumber("fetch.timeout.seconds") ?? 30) * 1000,
      skipTLSVerify: root.getOptionalBoolean("fetch.skipTLSVerify") ?? false,
    },
    schedule: readSchedule(root.getOptionalConfig("schedule")),
    indexes: readIndexes(root),
  };
}

function readCluster(config?: Config): ClusterConnectionConfig {
  return {
    name: config?.getOptionalString("name") ?? "local",
    url: config?.getOptionalString("url"),
    token: config?.getOptionalString("token"),
    caData: config?.getOptionalString("caData"),
    skipTLSVerify: config?.getOptionalBoolean("skipTLSVerify") ?? false,
  };
}

function readSettings(config?: Config): PrometheusSettings {
  const defaults = DEFAULT_PROMETHEUS_SETTINGS;
  return {
    baseImage: config?.getOptionalString("baseImage") ?? defaults.baseImage,
    defaultVersion:
      config?.getOptionalString("defaultVersion") ?? defaults.defaultVersion,
    defaultRetention:
      config?.getOptionalString("defaultRetention") ??
      defaults.defaultRetention,
    oauthProxyImage:
      config?.getOptionalString("oauthProxyImage") ?? defaults.oauthProxyImage,
    blackboxExporterImage:
      config?.getOptionalString("blackboxExporterImage") ??
      defaults.blackboxExporterImage,
    priorityClassName:
      config?.getOptionalString("priorityClassName") ??
      defaults.priorityClassName,
    credentialsNamespace:
      config?.getOptionalString("credentialsNamespace") ??
      defaults.credentialsNamespace,
  };
}

export function readIndexes(config: Config): RepositoryIndex[] {
  const entries = config.getOptionalConfigArray("indexes") ?? [];
  return entries.map((entry: Config) => {
    const id = entry.getString("id");
    const raw = entry.getOptional("config");
    let indexConfig: RepositoryConfig | undefined;
    if (raw !== undefined) {
      const parsed = repositoryConfigSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(
          `Invalid config for repository index ${id}: ${parsed.error.message}`,
        );
      }
      indexConfig = parsed.data;
    }

    return {
      id,
      baseUrl: entry.getString("baseUrl"),
      tag: entry.getOptionalString("tag"),
      accessToken: entry.getOptionalString("accessToken"),
      config: indexConfig,
    };
  });
}

function readSchedule(config?: Config): SchedulerServiceTaskScheduleDefinition {
  const frequencyMinutes = config?.getOptionalNumber("frequency.minutes") ?? 5;
  const timeoutMinutes = config?.getOptionalNumber("timeout.minutes") ?? 2;
  const initialDelaySeconds =
    config?.getOptionalNumber("initialDelay.seconds") ?? 15;

  return {
    frequency: Duration.fromObject({ minutes: frequencyMinutes }),
    timeout: Duration.fromObject({ minutes: timeoutMinutes }),
    initialDelay: Duration.fromObject({ seconds: initialDelaySeconds }),
  };
}
