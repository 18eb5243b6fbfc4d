/**
 * Remote repository and ref type definitions
 */

export interface Repository {
  /** Hosting hostname, e.g. github.com */
  domain: string;
  /** owner/repo, used as the on-disk directory key */
  pathWithNamespace: string;
  name: string;
  /** Plain HTTPS clone URL */
  httpsUrl: string;
  sshUrl?: string;
}

/** Ref name to commit SHA, pseudo-refs excluded */
export type GitRefs = Map<string, string>;

export type CompareMode = "clone" | "refs";

/**
 * A hosting product the backup pipeline can enumerate and clone from
 */
export interface GitProvider {
  readonly name: string;
  /** Worker pool size */
  readonly workers: number;
  readonly compare: CompareMode;
  /** Bundles to keep per repository, 0 for unlimited */
  readonly retain: number;
  listRepositories(): Promise<Repository[]>;
  /** Clone URL with credentials embedded */
  credentialedCloneURL(repo: Repository): string;
  /** Secrets to mask in logs and error messages */
  secrets(): string[];
}
