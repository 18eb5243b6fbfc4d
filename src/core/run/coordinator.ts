/**
 * Run coordination across every configured provider
 */

import { rm } from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../../config/validator";
import { GitClient } from "../../git/client";
import { notifyAll } from "../../notify";
import { createProviders } from "../../providers";
import { HttpClient } from "../../providers/http";
import type { GitProvider, ProviderRunResult, RepovaultConfig, RunResult } from "../../types";
import { formatDuration } from "../../utils/format";
import type { Logger } from "../../utils/logger";
import { WORKING_DIR_NAME } from "../../utils/path";
import { backupProvider } from "../backup";
import { errorMessage } from "../errors";
import { computeStats } from "./stats";

export interface RunDeps {
  logger: Logger;
  git?: GitClient;
  http?: HttpClient;
  now?: () => Date;
  /** Overrides the providers built from config */
  providers?: GitProvider[];
}

/**
 * Back up every enabled provider in turn, clean the scratch area and send
 * notifications.
 */
export async function runBackups(config: RepovaultConfig, deps: RunDeps): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger;
  const http =
    deps.http ?? new HttpClient({ timeoutMs: config.http.timeoutSeconds * 1000, logger: logger.child("http") });
  const git = deps.git ?? new GitClient({ timeoutMs: config.git.timeoutSeconds * 1000 });
  const providers = deps.providers ?? createProviders(config.providers, { http, logger });

  if (providers.length === 0) {
    throw new ConfigError("No providers configured");
  }

  const startedAt = now();
  const results: ProviderRunResult[] = [];

  for (const provider of providers) {
    const result = await backupProvider(provider, {
      backupRoot: config.backupDir,
      git,
      logger,
      now: deps.now,
    });
    results.push({ provider: provider.name, result });
  }

  const workingRoot = path.join(config.backupDir, WORKING_DIR_NAME);
  await rm(workingRoot, { recursive: true, force: true }).catch((error: unknown) => {
    logger.warn(`Failed to remove ${workingRoot}: ${errorMessage(error)}`);
  });

  const run: RunResult = { startedAt, finishedAt: now(), providers: results };
  const stats = computeStats(run);
  logger.info(
    `Backups finished in ${formatDuration(run.finishedAt.getTime() - startedAt.getTime())}: ${stats.succeeded} succeeded, ${stats.failed} failed, ${stats.skipped} unchanged`,
  );

  await notifyAll(run, config.notify, { http, logger, now });

  return run;
}
