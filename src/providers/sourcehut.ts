/**
 * Sourcehut repository listing over the git.sr.ht GraphQL API
 */

import type { Repository, SourcehutConfig } from "../types";
import { hostnameOf, urlWithBasicAuth } from "../utils/url";
import { BaseProvider, dedupeRepositories, type ProviderDeps, resolveSettings } from "./base";

export const SOURCEHUT_DEFAULT_API_URL = "https://git.sr.ht";

const REPOSITORIES_QUERY =
  "query($cursor: Cursor) { me { canonicalName repositories(cursor: $cursor) { results { name } cursor } } }";

interface SourcehutRepositories {
  me: {
    canonicalName: string;
    repositories: { results: Array<{ name: string }>; cursor: string | null };
  };
}

interface GraphQLResult<T> {
  data?: T;
  errors?: Array<{ message: string }>;
}

export class SourcehutProvider extends BaseProvider {
  readonly name = "Sourcehut";
  private readonly apiUrl: string;

  constructor(
    private readonly config: SourcehutConfig,
    deps: ProviderDeps,
  ) {
    super(resolveSettings(config), deps);
    this.apiUrl = (config.apiUrl ?? SOURCEHUT_DEFAULT_API_URL).replace(/\/+$/, "");
  }

  secrets(): string[] {
    return [this.config.token];
  }

  credentialedCloneURL(repo: Repository): string {
    return urlWithBasicAuth(repo.httpsUrl, "token", this.config.token);
  }

  async listRepositories(): Promise<Repository[]> {
    const domain = hostnameOf(this.apiUrl);
    const repos: Repository[] = [];
    let cursor: string | null = null;

    do {
      const data: SourcehutRepositories = await this.query(cursor);
      const owner = data.me.canonicalName;

      for (const repo of data.me.repositories.results) {
        repos.push({
          domain,
          name: repo.name,
          pathWithNamespace: `${owner}/${repo.name}`,
          httpsUrl: `${this.apiUrl}/${owner}/${repo.name}`,
        });
      }

      cursor = data.me.repositories.cursor;
    } while (cursor);

    return dedupeRepositories(repos);
  }

  private async query(cursor: string | null): Promise<SourcehutRepositories> {
    const { data: result } = await this.http.postJson<GraphQLResult<SourcehutRepositories>>(
      `${this.apiUrl}/query`,
      { query: REPOSITORIES_QUERY, variables: { cursor } },
      { Authorization: `Bearer ${this.config.token}` },
    );

    if (result.errors && result.errors.length > 0) {
      throw this.fail(`Sourcehut GraphQL errors: ${result.errors.map((e) => e.message).join(", ")}`);
    }
    if (!result.data) {
      throw this.fail("Sourcehut GraphQL response had no data");
    }
    return result.data;
  }
}
