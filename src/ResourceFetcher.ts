/**
 * Resource Fetcher
 * Retrieves repository index documents over HTTPS
 */

import fetch, { RequestInit } from "node-fetch";
import https from "https";
import { LoggerService } from "@backstage/backend-plugin-api";
import { FetchError } from "./errors";

export interface FetchRequest {
  url: string;
  tag?: string;
  token?: string;
}

/**
 * Anything able to turn a URL, tag and token into the document body.
 */
export interface ResourceFetcher {
  fetch(request: FetchRequest): Promise<string>;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<FetchResponse>;

export interface HttpResourceFetcherOptions {
  logger: LoggerService;
  timeoutMs?: number;
  skipTLSVerify?: boolean;
  fetchFn?: FetchFn;
}

export class HttpResourceFetcher implements ResourceFetcher {
  private readonly logger: LoggerService;
  private readonly timeoutMs: number;
  private readonly agent: https.Agent;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpResourceFetcherOptions) {
    this.logger = options.logger.child({ module: "resource-fetcher" });
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.agent = new https.Agent({
      rejectUnauthorized: options.skipTLSVerify === true ? false : true,
    });
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fetch(request: FetchRequest): Promise<string> {
    const url = withRef(request.url, request.tag);
    const headers: Record<string, string> = {
      Accept: "application/vnd.github.v3.raw",
    };
    if (request.token) {
      headers.Authorization = `Bearer ${request.token}`;
    }

    this.logger.debug(`[ResourceFetcher] GET ${url}`);

    let res: FetchResponse;
    try {
      res = await this.fetchFn(url, {
        method: "GET",
        headers,
        timeout: this.timeoutMs,
        agent: url.startsWith("https:") ? this.agent : undefined,
      });
    } catch (error) {
      throw new FetchError(url, `${error}`, undefined, error);
    }

    if (!res.ok) {
      throw new FetchError(
        url,
        `unexpected status ${res.status} ${res.statusText}`,
        res.status,
      );
    }

    return res.text();
  }
}

/**
 * Append the revision tag as the `ref` query parameter.
 */
export function withRef(url: string, tag?: string): string {
  if (!tag) {
    return url;
  }
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}ref=${encodeURIComponent(tag)}`;
}

/**
 * Join an index base URL with a path relative to it.
 */
export function joinIndexUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
