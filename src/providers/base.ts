/**
 * Shared provider plumbing
 */

import { EnumerationError } from "../core/errors";
import type { CompareMode, GitProvider, ProviderCommonConfig, Repository } from "../types";
import type { Logger } from "../utils/logger";
import { type HttpClient, type HttpHeaders, headerValue, parseLinkHeader } from "./http";

export const DEFAULT_RETAIN = 2;
export const DEFAULT_WORKERS = 5;

export interface ProviderSettings {
  compare: CompareMode;
  retain: number;
  workers: number;
}

export interface ProviderDeps {
  http: HttpClient;
  logger: Logger;
}

export function resolveSettings(
  config: ProviderCommonConfig,
  defaultWorkers: number = DEFAULT_WORKERS,
): ProviderSettings {
  return {
    compare: config.compare ?? "clone",
    retain: config.retain ?? DEFAULT_RETAIN,
    workers: config.workers ?? defaultWorkers,
  };
}

/**
 * Keep the first repository seen for each path
 */
export function dedupeRepositories(repos: Repository[]): Repository[] {
  const seen = new Set<string>();
  return repos.filter((repo) => {
    const key = `${repo.domain}/${repo.pathWithNamespace}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export abstract class BaseProvider implements GitProvider {
  abstract readonly name: string;
  readonly compare: CompareMode;
  readonly retain: number;
  readonly workers: number;
  protected readonly http: HttpClient;
  protected readonly logger: Logger;

  constructor(settings: ProviderSettings, deps: ProviderDeps) {
    this.compare = settings.compare;
    this.retain = settings.retain;
    this.workers = settings.workers;
    this.http = deps.http;
    this.logger = deps.logger;
  }

  abstract listRepositories(): Promise<Repository[]>;
  abstract credentialedCloneURL(repo: Repository): string;
  abstract secrets(): string[];

  protected fail(message: string, cause?: unknown): EnumerationError {
    return new EnumerationError(this.name, message, { cause });
  }

  /**
   * GET every page of a list endpoint that paginates with `Link: rel="next"`
   */
  protected async getAllPages<T>(firstUrl: string, headers: Record<string, string>): Promise<T[]> {
    const items: T[] = [];
    let url: string | null = firstUrl;

    while (url) {
      const page: { data: T[]; headers: HttpHeaders } = await this.http.getJson<T[]>(url, headers);
      if (!Array.isArray(page.data)) {
        throw this.fail(`Expected a list from ${new URL(url).pathname}`);
      }
      items.push(...page.data);
      const next: string | null = parseLinkHeader(headerValue(page.headers, "link"));
      url = next;
    }

    return items;
  }
}
