/**
 * Remote-Write Spec Resolver
 * Builds one remote-write target per repository index
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import {
  ObservatoriumConfigNotFoundError,
  UnknownAuthTypeError,
} from "./errors";
import { parseRemoteWriteDoc } from "./indexParser";
import { ResourceFetcher, joinIndexUrl } from "./ResourceFetcher";
import {
  ObservatoriumAuthType,
  ObservatoriumConfig,
  RemoteWriteIndexDoc,
  RemoteWriteSpec,
  RepositoryIndex,
} from "./types";

export const METRICS_TOKEN_REFRESHER = "metrics";

export interface ResolvedRemoteWrite {
  indexId: string;
  spec: RemoteWriteSpec;
  /** Secret holding the bearer token, when Prometheus has to mount one */
  tokenSecret?: string;
}

export interface RemoteWriteContext {
  fetcher: ResourceFetcher;
  logger: LoggerService;
  /** Namespace the Prometheus and its token refreshers run in */
  namespace: string;
}

// ============================================================================
// Naming
// ============================================================================

export function getObservatoriumTokenSecretName(index: RepositoryIndex): string {
  return `obs-token-${index.id}`;
}

export function getTokenRefresherName(
  observatoriumId: string,
  role: string,
): string {
  return `token-refresher-${observatoriumId}-${role}`;
}

export function findObservatoriumConfig(
  index: RepositoryIndex,
  id: string,
): ObservatoriumConfig | undefined {
  return index.config?.observatoria?.find((o) => o.id === id);
}

// ============================================================================
// Strategies
// ============================================================================

type RemoteWriteStrategy = (
  index: RepositoryIndex,
  observatorium: ObservatoriumConfig,
  doc: RemoteWriteIndexDoc,
  namespace: string,
) => ResolvedRemoteWrite;

function baseSpec(
  index: RepositoryIndex,
  url: string,
  doc: RemoteWriteIndexDoc,
): RemoteWriteSpec {
  return {
    url,
    name: index.id,
    remoteTimeout: doc.remoteTimeout,
    writeRelabelConfigs: doc.writeRelabelConfigs,
    // TODO: verify against the gateway CA once it is published to the cluster
    tlsConfig: { insecureSkipVerify: true },
    proxyUrl: doc.proxyUrl,
    queueConfig: doc.queueConfig,
  };
}

/** Send samples straight to the Observatorium gateway */
const dexStrategy: RemoteWriteStrategy = (index, observatorium, doc) => {
  const tokenSecret = getObservatoriumTokenSecretName(index);
  const url = `${observatorium.gateway}/api/metrics/v1/${observatorium.tenant}/api/v1/receive`;
  return {
    indexId: index.id,
    spec: {
      ...baseSpec(index, url, doc),
      bearerTokenFile: `/etc/prometheus/secrets/${tokenSecret}/token`,
    },
    tokenSecret,
  };
};

/** Proxy samples through the token refresher, which owns the token */
const redHatStrategy: RemoteWriteStrategy = (
  index,
  observatorium,
  doc,
  namespace,
) => {
  const refresher = getTokenRefresherName(
    observatorium.id,
    METRICS_TOKEN_REFRESHER,
  );
  return {
    indexId: index.id,
    spec: baseSpec(
      index,
      `http://${refresher}.${namespace}.svc.cluster.local`,
      doc,
    ),
  };
};

const STRATEGIES: Record<ObservatoriumAuthType, RemoteWriteStrategy> = {
  dex: dexStrategy,
  redhat: redHatStrategy,
};

function isKnownAuthType(value: string): value is ObservatoriumAuthType {
  return Object.prototype.hasOwnProperty.call(STRATEGIES, value);
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Select the auth strategy of the index's Observatorium and build its target.
 */
export function resolveRemoteWriteSpec(
  index: RepositoryIndex,
  doc: RemoteWriteIndexDoc,
  namespace: string,
): ResolvedRemoteWrite {
  const observatoriumId = index.config?.prometheus?.observatorium;
  if (!observatoriumId) {
    throw new ObservatoriumConfigNotFoundError(index.id);
  }

  const observatorium = findObservatoriumConfig(index, observatoriumId);
  if (!observatorium) {
    throw new ObservatoriumConfigNotFoundError(index.id, observatoriumId);
  }

  const authType = observatorium.authType.toLowerCase();
  if (!isKnownAuthType(authType)) {
    throw new UnknownAuthTypeError(index.id, observatorium.authType);
  }

  return STRATEGIES[authType](index, observatorium, doc, namespace);
}

export async function fetchRemoteWriteDoc(
  index: RepositoryIndex,
  path: string,
  fetcher: ResourceFetcher,
): Promise<RemoteWriteIndexDoc> {
  const url = joinIndexUrl(index.baseUrl, path);
  const body = await fetcher.fetch({
    url,
    tag: index.tag,
    token: index.accessToken,
  });
  return parseRemoteWriteDoc(url, body);
}

/**
 * Resolve the remote-write targets of all indexes that declare one.
 *
 * A failing index is logged and left out; the others are unaffected.
 */
export async function collectRemoteWrites(
  indexes: RepositoryIndex[],
  { fetcher, logger, namespace }: RemoteWriteContext,
): Promise<ResolvedRemoteWrite[]> {
  const resolved: ResolvedRemoteWrite[] = [];

  for (const index of indexes) {
    const path = index.config?.prometheus?.remoteWrite;
    if (!path) {
      logger.debug(`[RemoteWrite] index ${index.id} declares no remote write`);
      continue;
    }

    try {
      const doc = await fetchRemoteWriteDoc(index, path, fetcher);
      resolved.push(resolveRemoteWriteSpec(index, doc, namespace));
    } catch (error) {
      logger.warn(
        `[RemoteWrite] skipping remote write for index ${index.id}: ${error}`,
      );
    }
  }

  return resolved;
}
