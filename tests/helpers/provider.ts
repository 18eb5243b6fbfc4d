import type { CompareMode, GitProvider, Repository } from "../../src/types";
import { urlWithToken } from "../../src/utils/url";

export const TEST_TOKEN = "test-token";

export function repository(pathWithNamespace: string, domain = "github.com"): Repository {
  const name = pathWithNamespace.split("/").pop() ?? pathWithNamespace;
  return {
    domain,
    name,
    pathWithNamespace,
    httpsUrl: `https://${domain}/${pathWithNamespace}`,
  };
}

export interface FakeProviderOptions {
  name?: string;
  repos?: Repository[];
  compare?: CompareMode;
  retain?: number;
  workers?: number;
  listError?: Error;
  /** Replaces the token-bearing https URL, e.g. with a local repository path */
  cloneUrl?: (repo: Repository) => string;
}

export class FakeProvider implements GitProvider {
  readonly name: string;
  readonly compare: CompareMode;
  readonly retain: number;
  readonly workers: number;
  private readonly repos: Repository[];
  private readonly listError: Error | undefined;
  private readonly cloneUrl: ((repo: Repository) => string) | undefined;

  constructor(options: FakeProviderOptions = {}) {
    this.name = options.name ?? "Fake";
    this.compare = options.compare ?? "clone";
    this.retain = options.retain ?? 0;
    this.workers = options.workers ?? 2;
    this.repos = options.repos ?? [];
    this.listError = options.listError;
    this.cloneUrl = options.cloneUrl;
  }

  async listRepositories(): Promise<Repository[]> {
    if (this.listError) throw this.listError;
    return this.repos;
  }

  credentialedCloneURL(repo: Repository): string {
    return this.cloneUrl ? this.cloneUrl(repo) : urlWithToken(repo.httpsUrl, TEST_TOKEN);
  }

  secrets(): string[] {
    return [TEST_TOKEN];
  }
}
