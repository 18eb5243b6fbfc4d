/**
 * Gitea repository listing
 *
 * Lists every user's repositories through the admin API, plus the
 * repositories of the configured organisations ("*" for all of them).
 */

import type { GiteaConfig, Repository } from "../types";
import { hostnameOf, urlWithToken } from "../utils/url";
import { BaseProvider, dedupeRepositories, type ProviderDeps, resolveSettings } from "./base";

const PAGE_LIMIT = 50;

interface GiteaUser {
  login: string;
}

interface GiteaOrganization {
  name?: string;
  username: string;
}

interface GiteaRepository {
  name: string;
  full_name: string;
  clone_url: string;
  ssh_url?: string;
}

export class GiteaProvider extends BaseProvider {
  readonly name = "Gitea";
  private readonly apiUrl: string;

  constructor(
    private readonly config: GiteaConfig,
    deps: ProviderDeps,
  ) {
    super(resolveSettings(config), deps);
    this.apiUrl = config.apiUrl.replace(/\/+$/, "");
  }

  secrets(): string[] {
    return [this.config.token];
  }

  credentialedCloneURL(repo: Repository): string {
    return urlWithToken(repo.httpsUrl, this.config.token);
  }

  private get headers(): Record<string, string> {
    return { Authorization: `token ${this.config.token}` };
  }

  private list<T>(endpoint: string): Promise<T[]> {
    const separator = endpoint.includes("?") ? "&" : "?";
    return this.getAllPages<T>(`${this.apiUrl}${endpoint}${separator}limit=${PAGE_LIMIT}`, this.headers);
  }

  async listRepositories(): Promise<Repository[]> {
    const domain = hostnameOf(this.apiUrl);
    const raw: GiteaRepository[] = [];

    const users = await this.list<GiteaUser>("/admin/users");
    for (const user of users) {
      raw.push(...(await this.list<GiteaRepository>(`/users/${encodeURIComponent(user.login)}/repos`)));
    }

    for (const org of await this.resolveOrganizations()) {
      raw.push(...(await this.list<GiteaRepository>(`/orgs/${encodeURIComponent(org)}/repos`)));
    }

    return dedupeRepositories(
      raw.map((repo) => ({
        domain,
        name: repo.name,
        pathWithNamespace: repo.full_name,
        httpsUrl: repo.clone_url,
        sshUrl: repo.ssh_url,
      })),
    );
  }

  private async resolveOrganizations(): Promise<string[]> {
    const configured = this.config.orgs ?? [];
    if (configured.length === 0) return [];

    if (configured.includes("*")) {
      const orgs = await this.list<GiteaOrganization>("/admin/orgs");
      return orgs.map((org) => org.username);
    }

    // Fail early on a misspelt organisation
    for (const org of configured) {
      await this.http.getJson<GiteaOrganization>(
        `${this.apiUrl}/orgs/${encodeURIComponent(org)}`,
        this.headers,
      );
    }
    return configured;
  }
}
