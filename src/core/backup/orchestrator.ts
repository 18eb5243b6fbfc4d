/**
 * Provider backup orchestration
 */

import type { GitClient } from "../../git/client";
import type { GitProvider, ProviderBackupResult, RepoBackupResult, Repository } from "../../types";
import { formatDuration } from "../../utils/format";
import type { Logger } from "../../utils/logger";
import { maskSecrets } from "../../utils/url";
import { EnumerationError, errorMessage } from "../errors";
import { AsyncQueue } from "./queue";
import { backupRepository, type WorkerContext } from "./worker";

export interface OrchestratorContext {
  backupRoot: string;
  git: GitClient;
  logger: Logger;
  now?: () => Date;
}

/**
 * Back up every repository of a provider on a pool of `provider.workers`
 * workers. One result per repository; a failing repository never stops
 * the others. Enumeration failure returns only the provider-level error.
 */
export async function backupProvider(
  provider: GitProvider,
  context: OrchestratorContext,
): Promise<ProviderBackupResult> {
  const startTime = Date.now();
  const log = context.logger.child(provider.name);
  const secrets = provider.secrets();

  let repos: Repository[];
  try {
    repos = await provider.listRepositories();
  } catch (error) {
    const enumerationError =
      error instanceof EnumerationError
        ? error
        : new EnumerationError(provider.name, errorMessage(error), { cause: error });
    const message = maskSecrets(enumerationError.message, secrets);
    log.error(`Failed to list repositories: ${message}`);
    return { results: [], error: message };
  }

  log.info(`Backing up ${repos.length} repositories with ${provider.workers} workers`);
  if (repos.length === 0) {
    return { results: [] };
  }

  const workerContext: WorkerContext = { ...context, provider, logger: log };
  const jobs = new AsyncQueue<Repository>(repos.length);
  const results = new AsyncQueue<RepoBackupResult>(provider.workers);

  const workers = Array.from({ length: provider.workers }, () =>
    runWorker(jobs, results, workerContext),
  );

  for (const repo of repos) {
    await jobs.put(repo);
  }
  jobs.close();

  const collected: RepoBackupResult[] = [];
  while (collected.length < repos.length) {
    const next = await results.take();
    if (next.done) break;
    collected.push(next.value);
  }

  await Promise.all(workers);

  const failed = collected.filter((r) => r.status === "failed").length;
  log.info(
    `Finished ${collected.length} repositories (${failed} failed) in ${formatDuration(Date.now() - startTime)}`,
  );

  return { results: collected };
}

async function runWorker(
  jobs: AsyncQueue<Repository>,
  results: AsyncQueue<RepoBackupResult>,
  context: WorkerContext,
): Promise<void> {
  for await (const repo of jobs) {
    let result: RepoBackupResult;
    try {
      result = await backupRepository(repo, context);
    } catch (error) {
      result = {
        repo: repo.pathWithNamespace,
        status: "failed",
        error: maskSecrets(errorMessage(error), context.provider.secrets()),
        durationMs: 0,
      };
    }
    await results.put(result);
  }
}
