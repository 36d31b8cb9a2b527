import { ConfigReader } from "@backstage/config";
import {
  PrometheusReconciler,
  buildBlackboxConfigMap,
} from "./PrometheusReconciler";
import { CredentialsError } from "./errors";
import { DEFAULT_PROMETHEUS_SETTINGS, RepositoryIndex } from "./types";
import {
  InMemoryCluster,
  StaticFetcher,
  createMockLogger,
  encodeBase64,
} from "./__testUtils__";

const NAMESPACE = "managed-observability";
const NAME = "observability-stack";

const indexes: RepositoryIndex[] = [
  {
    id: "kafka",
    baseUrl: "https://repo.example.com/kafka",
    tag: "v1",
    config: {
      prometheus: {
        federation: "prometheus/federation.yaml",
        remoteWrite: "prometheus/remote-write.yaml",
        observatorium: "gateway",
        storageSize: "250Gi",
        monitoringKey: "kafka",
      },
      observatoria: [
        {
          id: "gateway",
          gateway: "https://observatorium.example.com",
          tenant: "managed",
          authType: "dex",
        },
      ],
    },
  },
];

const documents = {
  "https://repo.example.com/kafka/prometheus/federation.yaml":
    "match[]:\n  - up\n",
  "https://repo.example.com/kafka/prometheus/remote-write.yaml":
    "remoteTimeout: 30s\n",
};

function seededCluster(): InMemoryCluster {
  const cluster = new InMemoryCluster();
  cluster.observabilities.set(InMemoryCluster.key(NAMESPACE, NAME), {
    metadata: { name: NAME, namespace: NAMESPACE },
    spec: { retention: "30d" },
    status: { clusterId: "cluster-1" },
  });
  cluster.routes.set(
    InMemoryCluster.key(NAMESPACE, "observability-prometheus"),
    {
      spec: { host: "prometheus.apps.example.com" },
      status: {
        ingress: [{ conditions: [{ type: "Admitted", status: "True" }] }],
      },
    },
  );
  cluster.secrets.set(
    InMemoryCluster.key("openshift-monitoring", "grafana-datasources-v2"),
    {
      metadata: {
        name: "grafana-datasources-v2",
        namespace: "openshift-monitoring",
      },
      data: {
        "prometheus.yaml": encodeBase64(
          JSON.stringify({
            datasources: [
              { basicAuthUser: "internal", basicAuthPassword: "test-secret" },
            ],
          }),
        ),
      },
    },
  );
  return cluster;
}

const createReconciler = (cluster: InMemoryCluster) => {
  const logger = createMockLogger();
  const reconciler = new PrometheusReconciler({
    cluster,
    fetcher: new StaticFetcher(documents),
    settings: DEFAULT_PROMETHEUS_SETTINGS,
    logger,
  });
  return { reconciler, logger };
};

describe("PrometheusReconciler", () => {
  it("should create every owned object on the first pass", async () => {
    const cluster = seededCluster();
    const { reconciler } = createReconciler(cluster);

    const result = await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    expect(result).toEqual({
      patterns: 1,
      remoteWrites: 1,
      scrapeConfig: "created",
      blackboxConfig: "created",
      prometheus: "created",
    });
    expect(cluster.writes).toEqual([
      `create Secret ${NAMESPACE}/additional-scrape-configs`,
      `create ConfigMap ${NAMESPACE}/black-box-config`,
      `create Prometheus ${NAMESPACE}/observability-prometheus`,
    ]);
  });

  it("should render the federation credentials into the scrape config", async () => {
    const cluster = seededCluster();
    const { reconciler } = createReconciler(cluster);

    await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    const secret = await cluster.getSecret(
      NAMESPACE,
      "additional-scrape-configs",
    );
    const encoded = secret?.data?.["additional-scrape-config.yaml"] ?? "";
    const content = Buffer.from(encoded, "base64").toString("utf-8");
    expect(content).toContain("    match[]: ['up']\n");
    expect(content).toContain("    password: test-secret\n");
  });

  it("should assemble the Prometheus from the resource and indexes", async () => {
    const cluster = seededCluster();
    const { reconciler } = createReconciler(cluster);

    await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    const prometheus = await cluster.getPrometheus(
      NAMESPACE,
      "observability-prometheus",
    );
    expect(prometheus?.spec?.retention).toBe("30d");
    expect(prometheus?.spec?.externalUrl).toBe(
      "https://prometheus.apps.example.com",
    );
    expect(prometheus?.spec?.externalLabels).toEqual({
      cluster_id: "cluster-1",
    });
    expect(
      prometheus?.spec?.storage?.volumeClaimTemplate?.spec?.resources?.requests,
    ).toEqual({ storage: "250Gi" });
    expect(prometheus?.spec?.secrets).toEqual([
      "observability-prometheus-proxy",
      "prometheus-k8s-tls",
      "obs-token-kafka",
    ]);

    const blackbox = prometheus?.spec?.containers?.find(
      (c) => c.name === "blackbox-exporter",
    );
    const configMap = await cluster.getConfigMap(NAMESPACE, "black-box-config");
    expect(configMap?.data?.["black-box-config.yaml"]).toContain("http_2xx:");
    expect(blackbox?.env?.[0]?.name).toBe("CONFIG_HASH");
    expect(blackbox?.env?.[0]?.value).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should not write anything on a second pass", async () => {
    const cluster = seededCluster();
    const { reconciler } = createReconciler(cluster);
    await reconciler.reconcileResource(NAMESPACE, NAME, indexes);
    const writes = [...cluster.writes];

    const result = await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    expect(result).toEqual({
      patterns: 1,
      remoteWrites: 1,
      scrapeConfig: "unchanged",
      blackboxConfig: "unchanged",
      prometheus: "unchanged",
    });
    expect(cluster.writes).toEqual(writes);
  });

  it("should skip the black-box config when the exporter is disabled", async () => {
    const cluster = seededCluster();
    cluster.observabilities.set(InMemoryCluster.key(NAMESPACE, NAME), {
      metadata: { name: NAME, namespace: NAMESPACE },
      spec: { selfContained: { disableBlackboxExporter: true } },
    });
    const { reconciler } = createReconciler(cluster);

    const result = await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    expect(result?.blackboxConfig).toBeUndefined();
    expect(cluster.configMaps.size).toBe(0);

    const prometheus = await cluster.getPrometheus(
      NAMESPACE,
      "observability-prometheus",
    );
    const mountedConfigMaps = (prometheus?.spec?.volumes ?? []).flatMap((v) =>
      v.configMap?.name ? [v.configMap.name] : [],
    );
    for (const name of mountedConfigMaps) {
      await expect(cluster.getConfigMap(NAMESPACE, name)).resolves.toBeDefined();
    }
    expect(prometheus?.spec?.volumes).toEqual([]);
  });

  it("should drop the black-box volume once the exporter is disabled", async () => {
    const cluster = seededCluster();
    const { reconciler } = createReconciler(cluster);
    await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    cluster.observabilities.set(InMemoryCluster.key(NAMESPACE, NAME), {
      metadata: { name: NAME, namespace: NAMESPACE },
      spec: { selfContained: { disableBlackboxExporter: true } },
      status: { clusterId: "cluster-1" },
    });
    const result = await reconciler.reconcileResource(NAMESPACE, NAME, indexes);

    expect(result?.prometheus).toBe("updated");
    const prometheus = await cluster.getPrometheus(
      NAMESPACE,
      "observability-prometheus",
    );
    expect(prometheus?.spec?.volumes).toEqual([]);
    expect(prometheus?.spec?.containers?.map((c) => c.name)).toEqual([
      "oauth-proxy",
    ]);
  });

  it("should resolve to undefined when the resource does not exist", async () => {
    const cluster = new InMemoryCluster();
    const { reconciler, logger } = createReconciler(cluster);

    await expect(
      reconciler.reconcileResource(NAMESPACE, NAME, indexes),
    ).resolves.toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith(
      `[PrometheusReconciler] Observability ${NAMESPACE}/${NAME} not found, nothing to reconcile`,
    );
    expect(cluster.writes).toEqual([]);
  });

  it("should fail without writing when credentials are missing", async () => {
    const cluster = seededCluster();
    cluster.secrets.clear();
    const { reconciler, logger } = createReconciler(cluster);

    await expect(
      reconciler.reconcileResource(NAMESPACE, NAME, indexes),
    ).rejects.toBeInstanceOf(CredentialsError);
    expect(cluster.writes).toEqual([]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("should fail when a federation document cannot be fetched", async () => {
    const cluster = seededCluster();
    const reconciler = new PrometheusReconciler({
      cluster,
      fetcher: new StaticFetcher({}),
      settings: DEFAULT_PROMETHEUS_SETTINGS,
      logger: createMockLogger(),
    });

    await expect(
      reconciler.reconcileResource(NAMESPACE, NAME, indexes),
    ).rejects.toThrow(
      "Failed to fetch https://repo.example.com/kafka/prometheus/federation.yaml",
    );
    expect(cluster.writes).toEqual([]);
  });
});

describe("PrometheusReconciler.fromConfig", () => {
  it("should return undefined without configuration", () => {
    const logger = createMockLogger();
    expect(
      PrometheusReconciler.fromConfig(new ConfigReader({}), { logger }),
    ).toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith(
      "No observability.prometheus configuration found",
    );
  });

  it("should build a reconciler for an explicit cluster", () => {
    const created = PrometheusReconciler.fromConfig(
      new ConfigReader({
        observability: {
          prometheus: {
            namespace: NAMESPACE,
            cluster: {
              name: "test",
              url: "https://kubernetes.example.com:6443",
              token: "test-token",
            },
          },
        },
      }),
      { logger: createMockLogger() },
    );

    expect(created?.reconciler).toBeInstanceOf(PrometheusReconciler);
    expect(created?.config.namespace).toBe(NAMESPACE);
  });
});

describe("buildBlackboxConfigMap", () => {
  it("should hold the content under the config key", () => {
    expect(buildBlackboxConfigMap(NAMESPACE, "modules: {}\n")).toEqual({
      apiVersion: "v1",
      kind: "ConfigMap",
      metadata: { name: "black-box-config", namespace: NAMESPACE },
      data: { "black-box-config.yaml": "modules: {}\n" },
    });
  });
});
