/**
 * GitLab project listing over the REST API
 */

import type { GitLabConfig, Repository } from "../types";
import { hostnameOf, urlWithBasicAuth } from "../utils/url";
import { BaseProvider, dedupeRepositories, type ProviderDeps, resolveSettings } from "./base";
import { HttpError } from "./http";

export const GITLAB_DEFAULT_API_URL = "https://gitlab.com/api/v4";
export const GITLAB_DEFAULT_MIN_ACCESS_LEVEL = 20;

interface GitLabUser {
  id: number;
  username: string;
}

interface GitLabProject {
  path: string;
  path_with_namespace: string;
  http_url_to_repo: string;
  ssh_url_to_repo?: string;
}

export class GitLabProvider extends BaseProvider {
  readonly name = "GitLab";
  private readonly apiUrl: string;

  constructor(
    private readonly config: GitLabConfig,
    deps: ProviderDeps,
  ) {
    super(resolveSettings(config), deps);
    this.apiUrl = (config.apiUrl ?? GITLAB_DEFAULT_API_URL).replace(/\/+$/, "");
  }

  secrets(): string[] {
    return [this.config.token];
  }

  credentialedCloneURL(repo: Repository): string {
    return urlWithBasicAuth(repo.httpsUrl, "oauth2", this.config.token);
  }

  private get headers(): Record<string, string> {
    return { "Private-Token": this.config.token };
  }

  async listRepositories(): Promise<Repository[]> {
    const user = await this.currentUser();
    this.logger.debug(`Authenticated as ${user.username}`);

    const minAccessLevel = this.config.minAccessLevel ?? GITLAB_DEFAULT_MIN_ACCESS_LEVEL;
    const projects = await this.getAllPages<GitLabProject>(
      `${this.apiUrl}/projects?per_page=100&min_access_level=${minAccessLevel}`,
      this.headers,
    );

    const domain = hostnameOf(this.apiUrl);
    return dedupeRepositories(
      projects.map((project) => ({
        domain,
        name: project.path,
        pathWithNamespace: project.path_with_namespace,
        httpsUrl: project.http_url_to_repo,
        sshUrl: project.ssh_url_to_repo,
      })),
    );
  }

  private async currentUser(): Promise<GitLabUser> {
    try {
      const { data } = await this.http.getJson<GitLabUser>(`${this.apiUrl}/user`, this.headers);
      return data;
    } catch (error) {
      if (error instanceof HttpError && (error.statusCode === 401 || error.statusCode === 403)) {
        throw this.fail("GitLab rejected the token", error);
      }
      throw error;
    }
  }
}
