/**
 * Observability Kubernetes Client
 * Wrapper around @kubernetes/client-node for the objects the reconciler owns
 */

import {
  CoreV1Api,
  CustomObjectsApi,
  KubeConfig,
  V1ConfigMap,
  V1ObjectMeta,
  V1Secret,
} from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import { isNotFoundError } from "./errors";
import { SecretReader } from "./credentials";
import {
  ObservabilityResource,
  OpenShiftRoute,
  PrometheusResource,
} from "./types";

const OBSERVABILITY_API_GROUP = "observability.redhat.com";
const OBSERVABILITY_API_VERSION = "v1";
const MONITORING_API_GROUP = "monitoring.coreos.com";
const MONITORING_API_VERSION = "v1";
const ROUTE_API_GROUP = "route.openshift.io";
const ROUTE_API_VERSION = "v1";

export interface ClusterConnectionConfig {
  name: string;
  /** API server URL; the in-cluster or kubeconfig default is used when unset */
  url?: string;
  token?: string;
  caData?: string;
  skipTLSVerify?: boolean;
}

/**
 * The cluster reads and writes a reconcile pass performs.
 */
export interface ObservabilityCluster extends SecretReader {
  getObservability(
    namespace: string,
    name: string,
  ): Promise<ObservabilityResource | undefined>;
  getRoute(namespace: string, name: string): Promise<OpenShiftRoute | undefined>;
  createSecret(secret: V1Secret): Promise<void>;
  replaceSecret(secret: V1Secret): Promise<void>;
  getConfigMap(namespace: string, name: string): Promise<V1ConfigMap | undefined>;
  createConfigMap(configMap: V1ConfigMap): Promise<void>;
  replaceConfigMap(configMap: V1ConfigMap): Promise<void>;
  getPrometheus(
    namespace: string,
    name: string,
  ): Promise<PrometheusResource | undefined>;
  createPrometheus(prometheus: PrometheusResource): Promise<void>;
  replacePrometheus(prometheus: PrometheusResource): Promise<void>;
}

export interface ObservabilityClientOptions {
  cluster: ClusterConnectionConfig;
  logger: LoggerService;
}

export class ObservabilityClient implements ObservabilityCluster {
  private readonly customApi: CustomObjectsApi;
  private readonly coreApi: CoreV1Api;
  private readonly logger: LoggerService;
  private readonly clusterName: string;

  constructor(options: ObservabilityClientOptions) {
    const kc = ObservabilityClient.createKubeConfig(options.cluster);
    this.customApi = kc.makeApiClient(CustomObjectsApi);
    this.coreApi = kc.makeApiClient(CoreV1Api);
    this.logger = options.logger.child({ module: "observability-client" });
    this.clusterName = options.cluster.name;
  }

  static createKubeConfig(cluster: ClusterConnectionConfig): KubeConfig {
    const kc = new KubeConfig();

    if (!cluster.url) {
      kc.loadFromDefault();
      return kc;
    }

    kc.loadFromOptions({
      clusters: [
        {
          name: cluster.name,
          server: cluster.url,
          skipTLSVerify: cluster.skipTLSVerify ?? false,
          caData: cluster.caData,
        },
      ],
      users: [
        {
          name: `${cluster.name}-user`,
          token: cluster.token,
        },
      ],
      contexts: [
        {
          name: `${cluster.name}-context`,
          user: `${cluster.name}-user`,
          cluster: cluster.name,
        },
      ],
      currentContext: `${cluster.name}-context`,
    });

    return kc;
  }

  // ============================================================================
  // Custom Resources
  // ============================================================================

  async getObservability(
    namespace: string,
    name: string,
  ): Promise<ObservabilityResource | undefined> {
    return this.readOptional(`Observability ${namespace}/${name}`, async () => {
      const res = await this.customApi.getNamespacedCustomObject(
        OBSERVABILITY_API_GROUP,
        OBSERVABILITY_API_VERSION,
        namespace,
        "observabilities",
        name,
      );
      return res.body as ObservabilityResource;
    });
  }

  async getRoute(
    namespace: string,
    name: string,
  ): Promise<OpenShiftRoute | undefined> {
    return this.readOptional(`Route ${namespace}/${name}`, async () => {
      const res = await this.customApi.getNamespacedCustomObject(
        ROUTE_API_GROUP,
        ROUTE_API_VERSION,
        namespace,
        "routes",
        name,
      );
      return res.body as OpenShiftRoute;
    });
  }

  async getPrometheus(
    namespace: string,
    name: string,
  ): Promise<PrometheusResource | undefined> {
    return this.readOptional(`Prometheus ${namespace}/${name}`, async () => {
      const res = await this.customApi.getNamespacedCustomObject(
        MONITORING_API_GROUP,
        MONITORING_API_VERSION,
        namespace,
        "prometheuses",
        name,
      );
      return res.body as PrometheusResource;
    });
  }

  async createPrometheus(prometheus: PrometheusResource): Promise<void> {
    const { namespace } = objectKey(prometheus.metadata);
    await this.customApi.createNamespacedCustomObject(
      MONITORING_API_GROUP,
      MONITORING_API_VERSION,
      namespace,
      "prometheuses",
      prometheus,
    );
  }

  async replacePrometheus(prometheus: PrometheusResource): Promise<void> {
    const { namespace, name } = objectKey(prometheus.metadata);
    await this.customApi.replaceNamespacedCustomObject(
      MONITORING_API_GROUP,
      MONITORING_API_VERSION,
      namespace,
      "prometheuses",
      name,
      prometheus,
    );
  }

  // ============================================================================
  // Core Resources
  // ============================================================================

  async getSecret(
    namespace: string,
    name: string,
  ): Promise<V1Secret | undefined> {
    return this.readOptional(`Secret ${namespace}/${name}`, async () => {
      const res = await this.coreApi.readNamespacedSecret(name, namespace);
      return res.body;
    });
  }

  async createSecret(secret: V1Secret): Promise<void> {
    const { namespace } = objectKey(secret.metadata);
    await this.coreApi.createNamespacedSecret(namespace, secret);
  }

  async replaceSecret(secret: V1Secret): Promise<void> {
    const { namespace, name } = objectKey(secret.metadata);
    await this.coreApi.replaceNamespacedSecret(name, namespace, secret);
  }

  async getConfigMap(
    namespace: string,
    name: string,
  ): Promise<V1ConfigMap | undefined> {
    return this.readOptional(`ConfigMap ${namespace}/${name}`, async () => {
      const res = await this.coreApi.readNamespacedConfigMap(name, namespace);
      return res.body;
    });
  }

  async createConfigMap(configMap: V1ConfigMap): Promise<void> {
    const { namespace } = objectKey(configMap.metadata);
    await this.coreApi.createNamespacedConfigMap(namespace, configMap);
  }

  async replaceConfigMap(configMap: V1ConfigMap): Promise<void> {
    const { namespace, name } = objectKey(configMap.metadata);
    await this.coreApi.replaceNamespacedConfigMap(name, namespace, configMap);
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Resolve to undefined on 404; every other failure propagates.
   */
  private async readOptional<T>(
    what: string,
    read: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await read();
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.debug(
          `[ObservabilityClient:${this.clusterName}] ${what} not found`,
        );
        return undefined;
      }
      this.logger.error(
        `[ObservabilityClient:${this.clusterName}] Failed to get ${what}: ${error}`,
      );
      throw error;
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function objectKey(metadata?: V1ObjectMeta): {
  namespace: string;
  name: string;
} {
  if (!metadata?.name || !metadata.namespace) {
    throw new Error("Object metadata must carry a name and a namespace");
  }
  return { namespace: metadata.namespace, name: metadata.name };
}

export function createObservabilityClient(
  cluster: ClusterConnectionConfig,
  logger: LoggerService,
): ObservabilityClient {
  return new ObservabilityClient({ cluster, logger });
}
