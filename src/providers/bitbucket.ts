/**
 * Bitbucket Cloud repository listing
 *
 * Authenticates either with an Atlassian API token (email + token) or with
 * an OAuth consumer (key + secret, client credentials grant).
 */

import type { BitbucketConfig, Repository } from "../types";
import { urlWithBasicAuth } from "../utils/url";
import { BaseProvider, dedupeRepositories, type ProviderDeps, resolveSettings } from "./base";

export const BITBUCKET_DEFAULT_API_URL = "https://api.bitbucket.org/2.0";
export const BITBUCKET_TOKEN_URL = "https://bitbucket.org/site/oauth2/access_token";
export const BITBUCKET_DOMAIN = "bitbucket.org";

interface BitbucketRepository {
  name: string;
  slug?: string;
  full_name: string;
  scm: string;
}

interface BitbucketPage {
  values: BitbucketRepository[];
  next?: string;
}

interface AccessTokenResponse {
  access_token: string;
}

type BitbucketAuth =
  | { kind: "api-token"; email: string; apiToken: string }
  | { kind: "oauth"; key: string; secret: string };

export function basicAuthHeader(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString("base64")}`;
}

export class BitbucketProvider extends BaseProvider {
  readonly name = "Bitbucket";
  private readonly apiUrl: string;
  private readonly auth: BitbucketAuth;
  private accessToken: string | null = null;

  constructor(config: BitbucketConfig, deps: ProviderDeps) {
    super(resolveSettings(config), deps);
    this.apiUrl = (config.apiUrl ?? BITBUCKET_DEFAULT_API_URL).replace(/\/+$/, "");

    if (config.email && config.apiToken) {
      this.auth = { kind: "api-token", email: config.email, apiToken: config.apiToken };
    } else if (config.key && config.secret) {
      this.auth = { kind: "oauth", key: config.key, secret: config.secret };
    } else {
      throw this.fail("Bitbucket needs email and apiToken, or key and secret");
    }
  }

  secrets(): string[] {
    return this.auth.kind === "api-token"
      ? [this.auth.apiToken]
      : [this.auth.secret, ...(this.accessToken ? [this.accessToken] : [])];
  }

  credentialedCloneURL(repo: Repository): string {
    if (this.auth.kind === "api-token") {
      return urlWithBasicAuth(repo.httpsUrl, "x-bitbucket-api-token-auth", this.auth.apiToken);
    }
    if (!this.accessToken) {
      throw this.fail("No OAuth access token, list repositories first");
    }
    return urlWithBasicAuth(repo.httpsUrl, "x-token-auth", this.accessToken);
  }

  async listRepositories(): Promise<Repository[]> {
    const headers = { Authorization: await this.authorization() };
    const repos: Repository[] = [];
    let url: string | undefined = `${this.apiUrl}/repositories?role=member`;

    while (url) {
      const page: BitbucketPage = (await this.http.getJson<BitbucketPage>(url, headers)).data;

      for (const repo of page.values) {
        if (repo.scm !== "git") continue;
        repos.push({
          domain: BITBUCKET_DOMAIN,
          name: repo.slug ?? repo.name,
          pathWithNamespace: repo.full_name,
          httpsUrl: `https://${BITBUCKET_DOMAIN}/${repo.full_name}.git`,
          sshUrl: `git@${BITBUCKET_DOMAIN}:${repo.full_name}.git`,
        });
      }

      url = page.next;
    }

    return dedupeRepositories(repos);
  }

  private async authorization(): Promise<string> {
    if (this.auth.kind === "api-token") {
      return basicAuthHeader(this.auth.email, this.auth.apiToken);
    }

    const response = await this.http.send(BITBUCKET_TOKEN_URL, {
      method: "POST",
      headers: {
        Authorization: basicAuthHeader(this.auth.key, this.auth.secret),
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: "grant_type=client_credentials",
    });

    if (response.statusCode !== 200) {
      throw this.fail(`Bitbucket OAuth token request returned ${response.statusCode}`);
    }

    const token: AccessTokenResponse = JSON.parse(response.text);
    if (!token.access_token) {
      throw this.fail("Bitbucket OAuth response had no access_token");
    }

    this.accessToken = token.access_token;
    return `Bearer ${token.access_token}`;
  }
}
