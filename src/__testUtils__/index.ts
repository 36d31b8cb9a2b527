import type { V1ConfigMap, V1Secret } from "@kubernetes/client-node";
import { FetchError } from "../errors";
import { ObservabilityCluster, objectKey } from "../ObservabilityClient";
import { FetchRequest, ResourceFetcher } from "../ResourceFetcher";
import {
  ObservabilityResource,
  OpenShiftRoute,
  PrometheusResource,
} from "../types";

// ============================================================================
// Mock Logger
// ============================================================================

export const createMockLogger = () => {
  const logger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
};

// ============================================================================
// Static Fetcher
// ============================================================================

/**
 * Serves documents from a URL → body map; unknown URLs fail with 404.
 */
export class StaticFetcher implements ResourceFetcher {
  readonly requests: FetchRequest[] = [];

  constructor(private readonly documents: Record<string, string>) {}

  async fetch(request: FetchRequest): Promise<string> {
    this.requests.push(request);
    const body = this.documents[request.url];
    if (body === undefined) {
      throw new FetchError(request.url, "unexpected status 404 Not Found", 404);
    }
    return body;
  }
}

// ============================================================================
// In-memory Cluster
// ============================================================================

/** Round-trip through JSON like the API server does */
function clone<T>(value: T): T {
  return JSON.parse(JSON.stringify(value));
}

/**
 * Stores objects by namespace/name and records every write.
 */
export class InMemoryCluster implements ObservabilityCluster {
  readonly observabilities = new Map<string, ObservabilityResource>();
  readonly routes = new Map<string, OpenShiftRoute>();
  readonly secrets = new Map<string, V1Secret>();
  readonly configMaps = new Map<string, V1ConfigMap>();
  readonly prometheuses = new Map<string, PrometheusResource>();
  readonly writes: string[] = [];

  static key(namespace: string, name: string): string {
    return `${namespace}/${name}`;
  }

  async getObservability(namespace: string, name: string) {
    const found = this.observabilities.get(InMemoryCluster.key(namespace, name));
    return found && clone(found);
  }

  async getRoute(namespace: string, name: string) {
    const found = this.routes.get(InMemoryCluster.key(namespace, name));
    return found && clone(found);
  }

  async getSecret(namespace: string, name: string) {
    const found = this.secrets.get(InMemoryCluster.key(namespace, name));
    return found && clone(found);
  }

  async createSecret(secret: V1Secret) {
    const { namespace, name } = objectKey(secret.metadata);
    this.writes.push(`create Secret ${namespace}/${name}`);
    this.secrets.set(InMemoryCluster.key(namespace, name), clone(secret));
  }

  async replaceSecret(secret: V1Secret) {
    const { namespace, name } = objectKey(secret.metadata);
    this.writes.push(`replace Secret ${namespace}/${name}`);
    this.secrets.set(InMemoryCluster.key(namespace, name), clone(secret));
  }

  async getConfigMap(namespace: string, name: string) {
    const found = this.configMaps.get(InMemoryCluster.key(namespace, name));
    return found && clone(found);
  }

  async createConfigMap(configMap: V1ConfigMap) {
    const { namespace, name } = objectKey(configMap.metadata);
    this.writes.push(`create ConfigMap ${namespace}/${name}`);
    this.configMaps.set(InMemoryCluster.key(namespace, name), clone(configMap));
  }

  async replaceConfigMap(configMap: V1ConfigMap) {
    const { namespace, name } = objectKey(configMap.metadata);
    this.writes.push(`replace ConfigMap ${namespace}/${name}`);
    this.configMaps.set(InMemoryCluster.key(namespace, name), clone(configMap));
  }

  async getPrometheus(namespace: string, name: string) {
    const found = this.prometheuses.get(InMemoryCluster.key(namespace, name));
    return found && clone(found);
  }

  async createPrometheus(prometheus: PrometheusResource) {
    const { namespace, name } = objectKey(prometheus.metadata);
    this.writes.push(`create Prometheus ${namespace}/${name}`);
    this.prometheuses.set(InMemoryCluster.key(namespace, name), clone(prometheus));
  }

  async replacePrometheus(prometheus: PrometheusResource) {
    const { namespace, name } = objectKey(prometheus.metadata);
    this.writes.push(`replace Prometheus ${namespace}/${name}`);
    this.prometheuses.set(InMemoryCluster.key(namespace, name), clone(prometheus));
  }
}

export function encodeBase64(value: string): string {
  return Buffer.from(value).toString("base64");
}
