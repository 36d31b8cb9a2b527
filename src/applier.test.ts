import {
  applyConfigMap,
  applyPrometheus,
  applySecret,
  diffLabels,
  diffPrometheusSpec,
  mergePrometheus,
} from "./applier";
import { PrometheusResource } from "./types";
import { InMemoryCluster, createMockLogger } from "./__testUtils__";

const NAMESPACE = "managed-observability";

const desiredPrometheus = (retention = "45d"): PrometheusResource => ({
  apiVersion: "monitoring.coreos.com/v1",
  kind: "Prometheus",
  metadata: {
    name: "observability-prometheus",
    namespace: NAMESPACE,
    labels: { app: "prometheus" },
  },
  spec: {
    retention,
    secrets: ["observability-prometheus-proxy"],
    storage: undefined,
  },
});

describe("diffPrometheusSpec", () => {
  it("should list only the owned fields that differ", () => {
    expect(
      diffPrometheusSpec(
        { retention: "45d", version: "v2.35.0", storage: undefined },
        { retention: "30d", version: "v2.35.0", priorityClassName: "custom" },
      ),
    ).toEqual(["retention"]);
  });

  it("should treat every field as changed without an observed spec", () => {
    expect(diffPrometheusSpec({ retention: "45d", version: "v1" })).toEqual([
      "retention",
      "version",
    ]);
  });
});

describe("diffLabels", () => {
  it("should ignore labels the desired object does not carry", () => {
    expect(
      diffLabels({ app: "prometheus" }, { app: "prometheus", team: "sre" }),
    ).toEqual([]);
    expect(diffLabels({ app: "prometheus" }, { app: "other" })).toEqual(["app"]);
  });
});

describe("mergePrometheus", () => {
  it("should overwrite owned fields and keep the rest", () => {
    const observed: PrometheusResource = {
      metadata: {
        name: "observability-prometheus",
        namespace: NAMESPACE,
        resourceVersion: "42",
        labels: { team: "sre" },
      },
      spec: { retention: "30d", priorityClassName: "custom" },
    };

    expect(mergePrometheus(observed, desiredPrometheus())).toEqual({
      apiVersion: "monitoring.coreos.com/v1",
      kind: "Prometheus",
      metadata: {
        name: "observability-prometheus",
        namespace: NAMESPACE,
        resourceVersion: "42",
        labels: { team: "sre", app: "prometheus" },
      },
      spec: {
        retention: "45d",
        priorityClassName: "custom",
        secrets: ["observability-prometheus-proxy"],
        storage: undefined,
      },
    });
  });
});

describe("applyPrometheus", () => {
  it("should create the object when it is missing", async () => {
    const cluster = new InMemoryCluster();

    const outcome = await applyPrometheus(desiredPrometheus(), {
      cluster,
      logger: createMockLogger(),
    });

    expect(outcome).toBe("created");
    expect(cluster.writes).toEqual([
      `create Prometheus ${NAMESPACE}/observability-prometheus`,
    ]);
  });

  it("should not write when nothing changed", async () => {
    const cluster = new InMemoryCluster();
    const ctx = { cluster, logger: createMockLogger() };
    await applyPrometheus(desiredPrometheus(), ctx);

    const outcome = await applyPrometheus(desiredPrometheus(), ctx);

    expect(outcome).toBe("unchanged");
    expect(cluster.writes).toHaveLength(1);
  });

  it("should update changed fields and keep unrelated ones", async () => {
    const cluster = new InMemoryCluster();
    cluster.prometheuses.set(
      InMemoryCluster.key(NAMESPACE, "observability-prometheus"),
      {
        metadata: {
          name: "observability-prometheus",
          namespace: NAMESPACE,
          resourceVersion: "7",
          labels: { app: "prometheus" },
        },
        spec: {
          retention: "30d",
          secrets: ["observability-prometheus-proxy"],
          priorityClassName: "custom",
        },
      },
    );
    const logger = createMockLogger();

    const outcome = await applyPrometheus(desiredPrometheus(), {
      cluster,
      logger,
    });

    expect(outcome).toBe("updated");
    expect(cluster.writes).toEqual([
      `replace Prometheus ${NAMESPACE}/observability-prometheus`,
    ]);
    const stored = await cluster.getPrometheus(
      NAMESPACE,
      "observability-prometheus",
    );
    expect(stored?.spec?.retention).toBe("45d");
    expect(stored?.spec?.priorityClassName).toBe("custom");
    expect(stored?.metadata?.resourceVersion).toBe("7");
    expect(logger.info).toHaveBeenCalledWith(
      `[Applier] updated Prometheus ${NAMESPACE}/observability-prometheus (retention)`,
    );
  });
});

describe("applySecret", () => {
  const secret = (value: string) => ({
    metadata: { name: "additional-scrape-configs", namespace: NAMESPACE },
    type: "Opaque",
    data: { "additional-scrape-config.yaml": value },
  });

  it("should create, skip and then update", async () => {
    const cluster = new InMemoryCluster();
    const ctx = { cluster, logger: createMockLogger() };

    expect(await applySecret(secret("YQ=="), ctx)).toBe("created");
    expect(await applySecret(secret("YQ=="), ctx)).toBe("unchanged");
    expect(await applySecret(secret("Yg=="), ctx)).toBe("updated");
    expect(cluster.writes).toEqual([
      `create Secret ${NAMESPACE}/additional-scrape-configs`,
      `replace Secret ${NAMESPACE}/additional-scrape-configs`,
    ]);
  });
});

describe("applyConfigMap", () => {
  const configMap = (value: string) => ({
    metadata: { name: "black-box-config", namespace: NAMESPACE },
    data: { "black-box-config.yaml": value },
  });

  it("should keep metadata of the live object on update", async () => {
    const cluster = new InMemoryCluster();
    cluster.configMaps.set(InMemoryCluster.key(NAMESPACE, "black-box-config"), {
      metadata: {
        name: "black-box-config",
        namespace: NAMESPACE,
        annotations: { owner: "sre" },
      },
      data: { "black-box-config.yaml": "modules: {}\n" },
    });
    const ctx = { cluster, logger: createMockLogger() };

    expect(await applyConfigMap(configMap("modules: {}\n"), ctx)).toBe(
      "unchanged",
    );
    expect(await applyConfigMap(configMap("modules: []\n"), ctx)).toBe(
      "updated",
    );

    const stored = await cluster.getConfigMap(NAMESPACE, "black-box-config");
    expect(stored?.metadata?.annotations).toEqual({ owner: "sre" });
    expect(stored?.data).toEqual({ "black-box-config.yaml": "modules: []\n" });
  });
});
