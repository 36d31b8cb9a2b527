/**
 * Prometheus Reconciler
 *
 * One reconcile pass: federation scrape config, black-box exporter config,
 * then the Prometheus custom resource itself. Fatal errors reject; per-index
 * remote-write failures only shrink the remote-write list.
 */

import type { V1ConfigMap, V1Secret } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import { Config } from "@backstage/config";
import {
  ApplyOutcome,
  applyConfigMap,
  applyPrometheus,
  applySecret,
} from "./applier";
import { assembleDesiredPrometheus } from "./assembler";
import { readReconcilerConfig, ReconcilerConfig } from "./config";
import { resolveFederationCredentials } from "./credentials";
import {
  ADDITIONAL_SCRAPE_CONFIG_KEY,
  ADDITIONAL_SCRAPE_CONFIG_SECRET,
  aggregateFederationPatterns,
  renderFederationScrapeConfig,
} from "./federation";
import {
  BLACKBOX_CONFIG_KEY,
  BLACKBOX_CONFIG_MAP,
  PROMETHEUS_NAME,
  PROMETHEUS_ROUTE,
  getRouteHost,
  renderBlackboxConfig,
} from "./model";
import {
  ObservabilityCluster,
  createObservabilityClient,
} from "./ObservabilityClient";
import { HttpResourceFetcher, ResourceFetcher } from "./ResourceFetcher";
import {
  ObservabilityResource,
  PrometheusSettings,
  RepositoryIndex,
  getNamespace,
  isBlackboxExporterDisabled,
} from "./types";

export interface PrometheusReconcilerOptions {
  cluster: ObservabilityCluster;
  fetcher: ResourceFetcher;
  settings: PrometheusSettings;
  logger: LoggerService;
}

export interface ReconcileResult {
  patterns: number;
  remoteWrites: number;
  scrapeConfig: ApplyOutcome;
  blackboxConfig?: ApplyOutcome;
  prometheus: ApplyOutcome;
}

export class PrometheusReconciler {
  private readonly cluster: ObservabilityCluster;
  private readonly fetcher: ResourceFetcher;
  private readonly settings: PrometheusSettings;
  private readonly logger: LoggerService;

  /**
   * Create a reconciler talking to the configured cluster.
   */
  static fromConfig(
    config: Config,
    options: { logger: LoggerService },
  ): { reconciler: PrometheusReconciler; config: ReconcilerConfig } | undefined {
    const reconcilerConfig = readReconcilerConfig(config);
    if (!reconcilerConfig) {
      options.logger.info("No observability.prometheus configuration found");
      return undefined;
    }

    const reconciler = new PrometheusReconciler({
      cluster: createObservabilityClient(
        reconcilerConfig.cluster,
        options.logger,
      ),
      fetcher: new HttpResourceFetcher({
        logger: options.logger,
        timeoutMs: reconcilerConfig.fetch.timeoutMs,
        skipTLSVerify: reconcilerConfig.fetch.skipTLSVerify,
      }),
      settings: reconcilerConfig.settings,
      logger: options.logger,
    });

    return { reconciler, config: reconcilerConfig };
  }

  constructor(options: PrometheusReconcilerOptions) {
    this.cluster = options.cluster;
    this.fetcher = options.fetcher;
    this.settings = options.settings;
    this.logger = options.logger.child({ module: "prometheus-reconciler" });
  }

  /**
   * Reconcile the Observability resource stored at namespace/name.
   * Resolves to undefined when it does not exist (yet).
   */
  async reconcileResource(
    namespace: string,
    name: string,
    indexes: RepositoryIndex[],
  ): Promise<ReconcileResult | undefined> {
    const cr = await this.cluster.getObservability(namespace, name);
    if (!cr) {
      this.logger.info(
        `[PrometheusReconciler] Observability ${namespace}/${name} not found, nothing to reconcile`,
      );
      return undefined;
    }
    return this.reconcile(cr, indexes);
  }

  async reconcile(
    cr: ObservabilityResource,
    indexes: RepositoryIndex[],
  ): Promise<ReconcileResult> {
    const namespace = getNamespace(cr);
    const context = { cluster: this.cluster, logger: this.logger };

    try {
      const patterns = await aggregateFederationPatterns(cr, indexes, {
        fetcher: this.fetcher,
        logger: this.logger,
      });
      const scrapeConfig = await applySecret(
        await this.buildScrapeConfigSecret(namespace, patterns),
        context,
      );

      let blackboxConfig: ApplyOutcome | undefined;
      let blackboxConfigHash: string | undefined;
      if (!isBlackboxExporterDisabled(cr)) {
        const rendered = renderBlackboxConfig();
        blackboxConfigHash = rendered.hash;
        blackboxConfig = await applyConfigMap(
          buildBlackboxConfigMap(namespace, rendered.content),
          context,
        );
      }

      const route = await this.cluster.getRoute(namespace, PROMETHEUS_ROUTE);
      const observed = await this.cluster.getPrometheus(
        namespace,
        PROMETHEUS_NAME,
      );

      const assembled = await assembleDesiredPrometheus(
        {
          cr,
          indexes,
          settings: this.settings,
          host: getRouteHost(route),
          blackboxConfigHash,
          observedStorage: observed?.spec?.storage,
        },
        { fetcher: this.fetcher, logger: this.logger },
      );

      const prometheus = await applyPrometheus(assembled.resource, context);

      return {
        patterns: patterns.length,
        remoteWrites: assembled.resource.spec?.remoteWrite?.length ?? 0,
        scrapeConfig,
        blackboxConfig,
        prometheus,
      };
    } catch (error) {
      this.logger.error(
        `[PrometheusReconciler] reconcile of ${namespace}/${cr.metadata?.name} failed: ${error}`,
      );
      throw error;
    }
  }

  private async buildScrapeConfigSecret(
    namespace: string,
    patterns: string[],
  ): Promise<V1Secret> {
    const credentials = await resolveFederationCredentials({
      secrets: this.cluster,
      namespace: this.settings.credentialsNamespace,
      logger: this.logger,
    });

    const content = renderFederationScrapeConfig(credentials, patterns);
    return {
      apiVersion: "v1",
      kind: "Secret",
      metadata: { name: ADDITIONAL_SCRAPE_CONFIG_SECRET, namespace },
      type: "Opaque",
      data: {
        [ADDITIONAL_SCRAPE_CONFIG_KEY]: Buffer.from(content).toString("base64"),
      },
    };
  }
}

export function buildBlackboxConfigMap(
  namespace: string,
  content: string,
): V1ConfigMap {
  return {
    apiVersion: "v1",
    kind: "ConfigMap",
    metadata: { name: BLACKBOX_CONFIG_MAP, namespace },
    data: { [BLACKBOX_CONFIG_KEY]: content },
  };
}
