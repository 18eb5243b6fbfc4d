/**
 * Azure DevOps repository listing
 */

import type { AzureDevOpsConfig, Repository } from "../types";
import { urlWithBasicAuth } from "../utils/url";
import { BaseProvider, dedupeRepositories, type ProviderDeps, resolveSettings } from "./base";
import { basicAuthHeader } from "./bitbucket";

export const AZURE_DEVOPS_API_URL = "https://dev.azure.com";
export const AZURE_DEVOPS_DOMAIN = "dev.azure.com";
const API_VERSION = "7.1";

interface AzureList<T> {
  count: number;
  value: T[];
}

interface AzureProject {
  id: string;
  name: string;
}

interface AzureRepository {
  id: string;
  name: string;
  remoteUrl: string;
  sshUrl?: string;
  isDisabled?: boolean;
}

export class AzureDevOpsProvider extends BaseProvider {
  readonly name = "AzureDevOps";

  constructor(
    private readonly config: AzureDevOpsConfig,
    deps: ProviderDeps,
  ) {
    super(resolveSettings(config), deps);
  }

  secrets(): string[] {
    return [this.config.pat];
  }

  credentialedCloneURL(repo: Repository): string {
    return urlWithBasicAuth(repo.httpsUrl, this.config.userName, this.config.pat);
  }

  private get headers(): Record<string, string> {
    return { Authorization: basicAuthHeader(this.config.userName, this.config.pat) };
  }

  async listRepositories(): Promise<Repository[]> {
    const repos: Repository[] = [];

    for (const org of this.config.orgs) {
      const orgUrl = `${AZURE_DEVOPS_API_URL}/${encodeURIComponent(org)}`;
      const { data: projects } = await this.http.getJson<AzureList<AzureProject>>(
        `${orgUrl}/_apis/projects?api-version=${API_VERSION}`,
        this.headers,
      );

      for (const project of projects.value) {
        const { data: projectRepos } = await this.http.getJson<AzureList<AzureRepository>>(
          `${orgUrl}/${encodeURIComponent(project.name)}/_apis/git/repositories?api-version=${API_VERSION}`,
          this.headers,
        );

        for (const repo of projectRepos.value) {
          if (repo.isDisabled) {
            this.logger.debug(`Skipping disabled repository ${org}/${project.name}/${repo.name}`);
            continue;
          }
          repos.push({
            domain: AZURE_DEVOPS_DOMAIN,
            name: repo.name,
            pathWithNamespace: `${org}/${project.name}/${repo.name}`,
            httpsUrl: stripUserInfo(repo.remoteUrl),
            sshUrl: repo.sshUrl,
          });
        }
      }
    }

    return dedupeRepositories(repos);
  }
}

/**
 * remoteUrl comes back as https://org@dev.azure.com/...
 */
function stripUserInfo(url: string): string {
  const parsed = new URL(url);
  parsed.username = "";
  parsed.password = "";
  return parsed.toString();
}
