/**
 * Federation
 * Aggregates match[] patterns from every index and renders the scrape job
 * that federates them from the cluster monitoring stack.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { stringify as stringifyYaml } from "yaml";
import { parseFederationDoc } from "./indexParser";
import { ResourceFetcher, joinIndexUrl } from "./ResourceFetcher";
import {
  Credentials,
  ObservabilityResource,
  RepositoryIndex,
  isRepoSyncDisabled,
} from "./types";

export const FEDERATION_JOB_NAME = "openshift-monitoring-federation";
export const ADDITIONAL_SCRAPE_CONFIG_SECRET = "additional-scrape-configs";
export const ADDITIONAL_SCRAPE_CONFIG_KEY = "additional-scrape-config.yaml";
export const FEDERATION_SOURCE_NAMESPACE = "openshift-monitoring";

export interface FederationContext {
  fetcher: ResourceFetcher;
  logger: LoggerService;
}

/**
 * Quote a match expression as a YAML single-quoted scalar.
 */
export function quotePattern(pattern: string): string {
  return `'${pattern.replace(/'/g, "''")}'`;
}

/**
 * Collect the quoted match[] patterns of all indexes, first seen first.
 *
 * With repository sync disabled, `selfContained.federatedMetrics` is used as
 * written: its entries must already be valid YAML flow scalars.
 * A failure on any index rejects the whole aggregation.
 */
export async function aggregateFederationPatterns(
  cr: ObservabilityResource,
  indexes: RepositoryIndex[],
  { fetcher, logger }: FederationContext,
): Promise<string[]> {
  if (isRepoSyncDisabled(cr)) {
    return [...(cr.spec?.selfContained?.federatedMetrics ?? [])];
  }

  const result: string[] = [];
  for (const index of indexes) {
    const path = index.config?.prometheus?.federation;
    if (!path) {
      continue;
    }

    const url = joinIndexUrl(index.baseUrl, path);
    const body = await fetcher.fetch({
      url,
      tag: index.tag,
      token: index.accessToken,
    });
    const doc = parseFederationDoc(url, body);

    const patterns = doc["match[]"] ?? [];
    logger.debug(
      `[Federation] index ${index.id} contributed ${patterns.length} pattern(s)`,
    );
    for (const pattern of patterns) {
      const quoted = quotePattern(pattern);
      if (!result.includes(quoted)) {
        result.push(quoted);
      }
    }
  }

  return result;
}

/**
 * Render the additional scrape config that federates the given patterns.
 *
 * Patterns are YAML flow scalars and go into `params` verbatim.
 */
export function renderFederationScrapeConfig(
  credentials: Credentials,
  patterns: string[],
): string {
  const job = {
    job_name: FEDERATION_JOB_NAME,
    honor_labels: true,
    kubernetes_sd_configs: [
      {
        role: "service",
        namespaces: { names: [FEDERATION_SOURCE_NAMESPACE] },
      },
    ],
    scrape_interval: "120s",
    scrape_timeout: "60s",
    metrics_path: "/federate",
    relabel_configs: [
      {
        action: "keep",
        source_labels: ["__meta_kubernetes_service_name"],
        regex: "prometheus-k8s",
      },
      {
        action: "keep",
        source_labels: ["__meta_kubernetes_service_port_name"],
        regex: "web",
      },
    ],
    scheme: "https",
    tls_config: { insecure_skip_verify: true },
    basic_auth: {
      username: credentials.user,
      password: credentials.password,
    },
  };

  return (
    stringifyYaml([job], { lineWidth: 0 }) +
    "  params:\n" +
    `    match[]: [${patterns.join(", ")}]\n`
  );
}
