import {
  aggregateFederationPatterns,
  quotePattern,
  renderFederationScrapeConfig,
} from "./federation";
import { parse as parseYaml } from "yaml";
import { FetchError } from "./errors";
import { ObservabilityResource, RepositoryIndex } from "./types";
import { StaticFetcher, createMockLogger } from "./__testUtils__";

const cr: ObservabilityResource = {
  metadata: { name: "observability-stack", namespace: "managed-observability" },
  spec: {},
};

const index = (id: string, federation?: string): RepositoryIndex => ({
  id,
  baseUrl: `https://repo.example.com/${id}`,
  tag: "v1",
  accessToken: "test-token",
  config: { prometheus: { federation } },
});

describe("quotePattern", () => {
  it("should single-quote and escape quotes", () => {
    expect(quotePattern("up")).toBe("'up'");
    expect(quotePattern("{job='kafka'}")).toBe("'{job=''kafka''}'");
  });
});

describe("aggregateFederationPatterns", () => {
  it("should keep the first occurrence of a pattern shared by two indexes", async () => {
    const fetcher = new StaticFetcher({
      "https://repo.example.com/a/federation.yaml":
        "match[]:\n  - up\n  - kafka_broker_up\n",
      "https://repo.example.com/b/federation.yaml":
        "match[]:\n  - strimzi_resources\n  - up\n",
    });

    const patterns = await aggregateFederationPatterns(
      cr,
      [index("a", "federation.yaml"), index("b", "federation.yaml")],
      { fetcher, logger: createMockLogger() },
    );

    expect(patterns).toEqual([
      "'up'",
      "'kafka_broker_up'",
      "'strimzi_resources'",
    ]);
  });

  it("should skip indexes without a federation path", async () => {
    const fetcher = new StaticFetcher({
      "https://repo.example.com/b/federation.yaml": "match[]:\n  - up\n",
    });

    const patterns = await aggregateFederationPatterns(
      cr,
      [index("a"), index("b", "federation.yaml")],
      { fetcher, logger: createMockLogger() },
    );

    expect(patterns).toEqual(["'up'"]);
    expect(fetcher.requests).toEqual([
      {
        url: "https://repo.example.com/b/federation.yaml",
        tag: "v1",
        token: "test-token",
      },
    ]);
  });

  it("should fail the whole aggregation when one index fails", async () => {
    const fetcher = new StaticFetcher({
      "https://repo.example.com/a/federation.yaml": "match[]:\n  - up\n",
    });

    await expect(
      aggregateFederationPatterns(
        cr,
        [index("a", "federation.yaml"), index("b", "federation.yaml")],
        { fetcher, logger: createMockLogger() },
      ),
    ).rejects.toBeInstanceOf(FetchError);
  });

  it("should use the federated metrics of the resource as written when sync is disabled", async () => {
    const fetcher = new StaticFetcher({});
    const selfContained: ObservabilityResource = {
      ...cr,
      spec: {
        selfContained: {
          disableRepoSync: true,
          federatedMetrics: ["'up'", "'{job=\"kafka\"}'", "node_load1"],
        },
      },
    };

    const patterns = await aggregateFederationPatterns(
      selfContained,
      [index("a", "federation.yaml")],
      { fetcher, logger: createMockLogger() },
    );

    expect(patterns).toEqual(["'up'", "'{job=\"kafka\"}'", "node_load1"]);
    expect(fetcher.requests).toHaveLength(0);
  });
});

describe("renderFederationScrapeConfig", () => {
  it("should render the federation job", () => {
    const rendered = renderFederationScrapeConfig(
      { user: "internal", password: "test-secret" },
      ["'up'", "'{job=''kafka''}'"],
    );

    const lines = rendered.split("\n");
    expect(lines[0]).toBe("- job_name: openshift-monitoring-federation");
    expect(lines.slice(-3)).toEqual([
      "  params:",
      "    match[]: ['up', '{job=''kafka''}']",
      "",
    ]);
    expect(parseYaml(rendered)).toEqual([
      {
        job_name: "openshift-monitoring-federation",
        honor_labels: true,
        kubernetes_sd_configs: [
          { role: "service", namespaces: { names: ["openshift-monitoring"] } },
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
        basic_auth: { username: "internal", password: "test-secret" },
        params: { "match[]": ["up", "{job='kafka'}"] },
      },
    ]);
  });

  it("should keep credentials that look like other YAML types as strings", () => {
    const rendered = renderFederationScrapeConfig(
      { user: "true", password: "a: b # c" },
      ["'up'"],
    );

    expect(parseYaml(rendered)[0].basic_auth).toEqual({
      username: "true",
      password: "a: b # c",
    });
  });

  it("should render an empty match list", () => {
    const rendered = renderFederationScrapeConfig(
      { user: "u", password: "p" },
      [],
    );
    expect(rendered.split("\n").slice(-2)).toEqual(["    match[]: []", ""]);
  });
});
