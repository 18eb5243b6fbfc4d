import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { runCleanup } from "../../core/cleanup";
import { GitClient } from "../../git/client";
import { logger } from "../../utils/logger";
import { COMMON_OPTIONS, loadCommandConfig } from "../config";
import { color, formatSummary, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      retain: { type: "string", short: "n" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
      "provider-domain": { type: "string" },
      "backup-dir": INLINE_CONFIG_OPTIONS["backup-dir"],
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const retain = values.retain && /^\d+$/.test(values.retain) ? Number.parseInt(values.retain, 10) : 0;
  if (retain < 1) {
    ui.error("--retain must be a positive number");
    return 1;
  }

  try {
    // --retain here is the cleanup target, not a provider override
    const config = await loadCommandConfig(values, { backupDir: values["backup-dir"] });
    const git = new GitClient();

    ui.intro("repovault cleanup");

    const preview = await runCleanup({
      backupRoot: config.backupDir,
      retain,
      git,
      logger,
      dryRun: true,
      domain: values["provider-domain"],
    });

    if (preview.deletions.length === 0) {
      ui.success(`Every repository already has at most ${retain} bundle(s)`);
      ui.outro("Nothing to do");
      return 0;
    }

    ui.step(`Found ${preview.deletions.length} bundle(s) to delete:`);
    for (const deletion of preview.deletions) {
      ui.message(`  ${color.dim("•")} ${deletion.repo}/${deletion.bundle}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${preview.deletions.length} bundle(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Deleting old bundles...");
    const result = await runCleanup({
      backupRoot: config.backupDir,
      retain,
      git,
      logger,
      domain: values["provider-domain"],
    });
    s.stop("Cleanup complete");

    const failures = result.deletions.filter((d) => !d.success);
    for (const failure of failures) {
      ui.error(`${failure.repo}: ${failure.error ?? "unknown error"}`);
    }

    ui.note(
      formatSummary([
        { label: "Repositories", value: result.totalRepositories },
        { label: "Deleted", value: result.totalDeleted },
        { label: "Failed", value: failures.length > 0 ? color.red(String(failures.length)) : null },
      ]),
      "Summary",
    );

    ui.outro(failures.length > 0 ? "Cleanup completed with errors" : "Cleanup complete");
    return failures.length > 0 ? 1 : 0;
  } catch (error) {
    ui.error(`Cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("repovault cleanup")} - Delete old bundles beyond a retention count

${color.dim("USAGE:")}
  repovault cleanup --retain <n> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>            Path to config file (default: ./repovault.config.yaml)
      --backup-dir <path>        Backup root directory
  -n, --retain <n>               Bundles to keep per repository (required, at least 1)
      --provider-domain <host>   Only repositories from this host
      --dry-run                  Show what would be deleted without deleting
      --force                    Skip the confirmation prompt
  -v, --verbose                  Verbose output
  -h, --help                     Show this help message

${color.dim("DESCRIPTION:")}
  Keeps the newest bundles of each repository and deletes the rest, oldest
  first. Bundles renamed to .invalid are never touched.

${color.dim("EXAMPLES:")}
  repovault cleanup --retain 5 --dry-run   # Preview
  repovault cleanup --retain 5 --force     # Delete without prompting
`);
}
