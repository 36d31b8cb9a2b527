/**
 * Credential Resolver
 *
 * The basic-auth pair used to federate from the cluster monitoring stack
 * lives in the Grafana datasources secret. That secret exists under two
 * names with two payload shapes; candidates are tried in order.
 */

import type { V1Secret } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import { z } from "zod";
import { CredentialsError } from "./errors";
import { Credentials } from "./types";

export const DATASOURCES_PAYLOAD_KEY = "prometheus.yaml";

export interface SecretReader {
  getSecret(namespace: string, name: string): Promise<V1Secret | undefined>;
}

const datasourcesSchema = z.object({
  datasources: z
    .array(
      z.object({
        basicAuthUser: z.string(),
        basicAuthPassword: z.string().optional(),
        secureJsonData: z
          .object({ basicAuthPassword: z.string().optional() })
          .optional(),
      }),
    )
    .min(1),
});

type Datasource = z.infer<typeof datasourcesSchema>["datasources"][number];

export interface CredentialCandidate {
  secretName: string;
  password(datasource: Datasource): string | undefined;
}

export const CREDENTIAL_CANDIDATES: readonly CredentialCandidate[] = [
  {
    secretName: "grafana-datasources-v2",
    password: (ds) => ds.basicAuthPassword,
  },
  {
    secretName: "grafana-datasources",
    password: (ds) => ds.secureJsonData?.basicAuthPassword,
  },
];

export interface ResolveCredentialsOptions {
  secrets: SecretReader;
  namespace: string;
  logger: LoggerService;
  candidates?: readonly CredentialCandidate[];
}

export async function resolveFederationCredentials({
  secrets,
  namespace,
  logger,
  candidates = CREDENTIAL_CANDIDATES,
}: ResolveCredentialsOptions): Promise<Credentials> {
  for (const candidate of candidates) {
    const secret = await secrets.getSecret(namespace, candidate.secretName);
    if (!secret) {
      logger.debug(
        `[Credentials] secret ${namespace}/${candidate.secretName} not found`,
      );
      continue;
    }
    return decodeCredentials(secret, candidate);
  }

  throw new CredentialsError(
    `No datasources secret found in ${namespace} (tried ${candidates
      .map((c) => c.secretName)
      .join(", ")})`,
  );
}

export function decodeCredentials(
  secret: V1Secret,
  candidate: CredentialCandidate,
): Credentials {
  const name = candidate.secretName;
  const encoded = secret.data?.[DATASOURCES_PAYLOAD_KEY];
  if (!encoded) {
    throw new CredentialsError(
      `Secret ${name} has no ${DATASOURCES_PAYLOAD_KEY} key`,
    );
  }

  // The key says yaml but the payload is JSON
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(encoded, "base64").toString("utf8"));
  } catch (error) {
    throw new CredentialsError(
      `Secret ${name} does not hold valid JSON: ${error}`,
      error,
    );
  }

  const parsed = datasourcesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CredentialsError(
      `Secret ${name} has an unexpected datasources shape: ${parsed.error.message}`,
      parsed.error,
    );
  }

  const datasource = parsed.data.datasources[0];
  const password = candidate.password(datasource);
  if (password === undefined) {
    throw new CredentialsError(`Secret ${name} carries no basic auth password`);
  }

  return { user: datasource.basicAuthUser, password };
}
