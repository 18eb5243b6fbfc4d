/**
 * GitHub repository listing over the GraphQL API
 */

import type { GitHubConfig, Repository } from "../types";
import { urlWithToken } from "../utils/url";
import { BaseProvider, dedupeRepositories, type ProviderDeps, resolveSettings } from "./base";

export const GITHUB_GRAPHQL_URL = "https://api.github.com/graphql";
export const GITHUB_DOMAIN = "github.com";
export const GITHUB_DEFAULT_WORKERS = 10;

const PAGE_SIZE = 100;

interface GitHubRepositoryNode {
  name: string;
  nameWithOwner: string;
  url: string;
  sshUrl: string;
}

interface RepositoryConnection {
  nodes: GitHubRepositoryNode[];
  pageInfo: { endCursor: string | null; hasNextPage: boolean };
}

interface GraphQLResult<T> {
  data?: T;
  errors?: Array<{ message: string }>;
}

const REPOSITORY_FIELDS = "nodes { name nameWithOwner url sshUrl } pageInfo { endCursor hasNextPage }";

function viewerRepositoriesQuery(ownedOnly: boolean): string {
  const affiliation = ownedOnly ? ", affiliations: OWNER, ownerAffiliations: OWNER" : "";
  return `query($first: Int!, $after: String) { viewer { repositories(first: $first, after: $after${affiliation}) { ${REPOSITORY_FIELDS} } } }`;
}

const ORGANIZATION_REPOSITORIES_QUERY = `query($login: String!, $first: Int!, $after: String) { organization(login: $login) { repositories(first: $first, after: $after) { ${REPOSITORY_FIELDS} } } }`;

const VIEWER_ORGANIZATIONS_QUERY = `query { viewer { organizations(first: ${PAGE_SIZE}) { nodes { login } } } }`;

export class GitHubProvider extends BaseProvider {
  readonly name = "GitHub";

  constructor(
    private readonly config: GitHubConfig,
    deps: ProviderDeps,
  ) {
    super(resolveSettings(config, GITHUB_DEFAULT_WORKERS), deps);
  }

  secrets(): string[] {
    return [this.config.token];
  }

  credentialedCloneURL(repo: Repository): string {
    return urlWithToken(repo.httpsUrl, this.config.token);
  }

  async listRepositories(): Promise<Repository[]> {
    const repos: Repository[] = [];

    if (!this.config.skipUserRepos) {
      repos.push(
        ...(await this.paginate("user", viewerRepositoriesQuery(this.config.limitUserOwned ?? false), {}, (data: {
          viewer: { repositories: RepositoryConnection };
        }) => data.viewer.repositories)),
      );
    }

    for (const org of await this.resolveOrganizations()) {
      repos.push(
        ...(await this.paginate(
          `organization ${org}`,
          ORGANIZATION_REPOSITORIES_QUERY,
          { login: org },
          (data: { organization: { repositories: RepositoryConnection } | null }) => {
            if (!data.organization) {
              throw this.fail(`Organization ${org} not found`);
            }
            return data.organization.repositories;
          },
        )),
      );
    }

    const unique = dedupeRepositories(repos);
    this.logger.debug(`Found ${unique.length} repositories`);
    return unique;
  }

  /**
   * Configured organisations, with "*" expanded to every org the token's user belongs to
   */
  private async resolveOrganizations(): Promise<string[]> {
    const configured = this.config.orgs ?? [];
    if (!configured.includes("*")) return configured;

    const data = await this.query<{ viewer: { organizations: { nodes: Array<{ login: string }> } } }>(
      VIEWER_ORGANIZATIONS_QUERY,
      {},
    );
    const all = data.viewer.organizations.nodes.map((node) => node.login);
    return [...new Set([...configured.filter((org) => org !== "*"), ...all])];
  }

  private async paginate<T>(
    label: string,
    query: string,
    variables: Record<string, unknown>,
    select: (data: T) => RepositoryConnection,
  ): Promise<Repository[]> {
    const repos: Repository[] = [];
    let after: string | null = null;

    for (;;) {
      const data: T = await this.query<T>(query, { ...variables, first: PAGE_SIZE, after });
      const connection = select(data);

      for (const node of connection.nodes) {
        repos.push({
          domain: GITHUB_DOMAIN,
          name: node.name,
          pathWithNamespace: node.nameWithOwner,
          httpsUrl: node.url,
          sshUrl: node.sshUrl,
        });
      }

      if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) break;
      after = connection.pageInfo.endCursor;
    }

    this.logger.debug(`Listed ${repos.length} ${label} repositories`);
    return repos;
  }

  private async query<T>(query: string, variables: Record<string, unknown>): Promise<T> {
    const { data: result } = await this.http.postJson<GraphQLResult<T>>(
      GITHUB_GRAPHQL_URL,
      { query, variables },
      { Authorization: `bearer ${this.config.token}` },
    );

    if (result.errors && result.errors.length > 0) {
      throw this.fail(`GitHub GraphQL errors: ${result.errors.map((e) => e.message).join(", ")}`);
    }
    if (!result.data) {
      throw this.fail("GitHub GraphQL response had no data");
    }
    return result.data;
  }
}
