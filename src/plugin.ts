/**
 * Backstage Backend Plugin for the Prometheus reconciler
 *
 * Runs one reconcile pass per scheduler tick against the Observability
 * resource named in configuration.
 *
 * @packageDocumentation
 */

import {
  coreServices,
  createBackendPlugin,
} from "@backstage/backend-plugin-api";
import { PrometheusReconciler } from "./PrometheusReconciler";

/**
 * Backend plugin that keeps the managed Prometheus in sync.
 *
 * @example
 * Configuration in app-config.yaml:
 * ```yaml
 * observability:
 *   prometheus:
 *     namespace: managed-observability
 *     name: observability-stack
 *     schedule:
 *       frequency:
 *         minutes: 5
 *     indexes:
 *       - id: metrics-team
 *         baseUrl: https://raw.example.com/metrics-team/resources
 *         tag: v1.4.0
 *         accessToken: ${METRICS_TEAM_TOKEN}
 *         config:
 *           prometheus:
 *             federation: prometheus/federation-config.yaml
 *             remoteWrite: prometheus/remote-write.yaml
 *             observatorium: metrics-gateway
 *           observatoria:
 *             - id: metrics-gateway
 *               gateway: https://observatorium.example.com
 *               tenant: managed
 *               authType: dex
 * ```
 *
 * @public
 */
export const observabilityPrometheusPlugin = createBackendPlugin({
  pluginId: "observability-prometheus",
  register(env) {
    env.registerInit({
      deps: {
        config: coreServices.rootConfig,
        logger: coreServices.logger,
        scheduler: coreServices.scheduler,
      },
      async init({ config, logger, scheduler }) {
        const created = PrometheusReconciler.fromConfig(config, { logger });

        if (!created) {
          logger.info(
            "Prometheus reconciler not configured. " +
              "Add observability.prometheus to your app-config.yaml to enable.",
          );
          return;
        }

        const { reconciler, config: reconcilerConfig } = created;
        const { namespace, name, schedule, indexes } = reconcilerConfig;

        await scheduler.scheduleTask({
          id: `observability:prometheus:${namespace}/${name}`,
          frequency: schedule.frequency,
          timeout: schedule.timeout,
          initialDelay: schedule.initialDelay,
          fn: async () => {
            const result = await reconciler.reconcileResource(
              namespace,
              name,
              indexes,
            );
            if (result) {
              logger.info(
                `Reconciled Prometheus for ${namespace}/${name}: ` +
                  `prometheus=${result.prometheus} remoteWrites=${result.remoteWrites} ` +
                  `patterns=${result.patterns}`,
              );
            }
          },
        });

        logger.info(
          `Scheduled Prometheus reconciler for ${namespace}/${name} with ${indexes.length} index(es)`,
        );
      },
    });
  },
});

/**
 * Default export for convenience
 * @public
 */
export default observabilityPrometheusPlugin;
