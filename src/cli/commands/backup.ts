import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { computeStats, runBackups } from "../../core/run";
import { logger } from "../../utils/logger";
import { formatDuration } from "../../utils/format";
import { COMMON_OPTIONS, loadCommandConfig } from "../config";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    ui.banner("backup");

    const run = await runBackups(config, { logger });
    const stats = computeStats(run);

    ui.note(
      formatSummary([
        { label: "Providers", value: run.providers.map((p) => p.provider).join(", ") },
        { label: "Succeeded", value: stats.succeeded },
        { label: "Failed", value: stats.failed > 0 ? color.red(String(stats.failed)) : 0 },
        { label: "Unchanged", value: stats.skipped },
        { label: "Duration", value: formatDuration(run.finishedAt.getTime() - run.startedAt.getTime()) },
        { label: "Backup dir", value: config.backupDir },
      ]),
      "Backup summary",
    );

    for (const { provider, result } of run.providers) {
      if (result.error) {
        ui.error(`${provider}: ${result.error}`);
      }
      for (const repo of result.results) {
        if (repo.status === "failed") {
          ui.error(`${provider} ${repo.repo}: ${repo.error ?? "unknown error"}`);
        }
      }
    }

    if (stats.failed > 0) {
      ui.outro(`Completed with ${stats.failed} failure(s)`);
      return 1;
    }

    ui.outro("Backup completed successfully");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("repovault backup")} - Back up every configured provider once

${color.dim("USAGE:")}
  repovault backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./repovault.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --backup-dir <path>     Backup root directory (overrides GIT_BACKUP_DIR)
      --retain <n>            Bundles to keep per repository, 0 keeps all
      --compare <mode>        clone (always clone) or refs (skip unchanged remotes)

${color.dim("DESCRIPTION:")}
  Lists the repositories of each provider, mirrors them and writes a
  timestamped git bundle per repository. A bundle identical to the previous
  one is removed. Exits with code 1 if any repository or provider failed.

${color.dim("EXAMPLES:")}
  repovault backup                              # Use ./repovault.config.yaml or env
  repovault backup --compare refs               # Skip repositories with no new refs
  GITHUB_TOKEN=... repovault backup --backup-dir /backups
`);
}
