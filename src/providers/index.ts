/**
 * Provider registry
 */

import type { GitProvider, ProvidersConfig } from "../types";
import { AzureDevOpsProvider } from "./azure-devops";
import type { ProviderDeps } from "./base";
import { BitbucketProvider } from "./bitbucket";
import { GiteaProvider } from "./gitea";
import { GitHubProvider } from "./github";
import { GitLabProvider } from "./gitlab";
import { SourcehutProvider } from "./sourcehut";

export { AzureDevOpsProvider } from "./azure-devops";
export { BaseProvider, DEFAULT_RETAIN, DEFAULT_WORKERS, dedupeRepositories, type ProviderDeps } from "./base";
export { BitbucketProvider, basicAuthHeader } from "./bitbucket";
export { GiteaProvider } from "./gitea";
export { GitHubProvider } from "./github";
export { GitLabProvider } from "./gitlab";
export {
  API_RETRY_POLICY,
  HttpClient,
  type HttpClientOptions,
  HttpError,
  NOTIFY_RETRY_POLICY,
  parseLinkHeader,
  redactUrl,
  type RetryPolicy,
} from "./http";
export { SourcehutProvider } from "./sourcehut";

/**
 * Build a provider for every configured entry, in a fixed order
 */
export function createProviders(config: ProvidersConfig, deps: ProviderDeps): GitProvider[] {
  const providers: GitProvider[] = [];
  const scoped = (name: string): ProviderDeps => ({ ...deps, logger: deps.logger.child(name) });

  if (config.github) providers.push(new GitHubProvider(config.github, scoped("github")));
  if (config.gitlab) providers.push(new GitLabProvider(config.gitlab, scoped("gitlab")));
  if (config.bitbucket) providers.push(new BitbucketProvider(config.bitbucket, scoped("bitbucket")));
  if (config.gitea) providers.push(new GiteaProvider(config.gitea, scoped("gitea")));
  if (config.azureDevOps) providers.push(new AzureDevOpsProvider(config.azureDevOps, scoped("azure-devops")));
  if (config.sourcehut) providers.push(new SourcehutProvider(config.sourcehut, scoped("sourcehut")));

  return providers;
}
