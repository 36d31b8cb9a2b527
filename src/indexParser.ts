/**
 * Index Parser
 * Decodes fetched repository index documents
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { IndexParseError } from "./errors";
import {
  FederationIndexDoc,
  QueueConfig,
  RelabelConfig,
  RemoteWriteIndexDoc,
} from "./types";

const federationDocSchema: z.ZodType<FederationIndexDoc> = z.object({
  "match[]": z.array(z.string()).optional(),
});

const relabelConfigSchema: z.ZodType<RelabelConfig> = z.object({
  sourceLabels: z.array(z.string()).optional(),
  separator: z.string().optional(),
  targetLabel: z.string().optional(),
  regex: z.string().optional(),
  modulus: z.number().int().nonnegative().optional(),
  replacement: z.string().optional(),
  action: z.string().optional(),
});

const queueConfigSchema: z.ZodType<QueueConfig> = z.object({
  capacity: z.number().int().optional(),
  minShards: z.number().int().optional(),
  maxShards: z.number().int().optional(),
  maxSamplesPerSend: z.number().int().optional(),
  batchSendDeadline: z.string().optional(),
  maxRetries: z.number().int().optional(),
  minBackoff: z.string().optional(),
  maxBackoff: z.string().optional(),
  retryOnRateLimit: z.boolean().optional(),
});

const remoteWriteDocSchema: z.ZodType<RemoteWriteIndexDoc> = z.object({
  remoteTimeout: z.string().optional(),
  writeRelabelConfigs: z.array(relabelConfigSchema).optional(),
  proxyUrl: z.string().optional(),
  queueConfig: queueConfigSchema.optional(),
});

function decode<T>(source: string, body: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    // An empty document decodes to null; treat it as an empty mapping
    raw = parseYaml(body) ?? {};
  } catch (error) {
    throw new IndexParseError(source, `invalid YAML: ${error}`, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new IndexParseError(source, issues, result.error);
  }
  return result.data;
}

export function parseFederationDoc(
  source: string,
  body: string,
): FederationIndexDoc {
  return decode(source, body, federationDocSchema);
}

export function parseRemoteWriteDoc(
  source: string,
  body: string,
): RemoteWriteIndexDoc {
  return decode(source, body, remoteWriteDocSchema);
}
