import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { verifyBundles } from "../../core/verify";
import { GitClient } from "../../git/client";
import { logger } from "../../utils/logger";
import { COMMON_OPTIONS, loadCommandConfig } from "../config";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      all: { type: "boolean", default: false },
      "provider-domain": { type: "string" },
      "backup-dir": INLINE_CONFIG_OPTIONS["backup-dir"],
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    ui.intro("repovault verify");

    const s = ui.spinner();
    s.start(values.all ? "Verifying every bundle..." : "Verifying latest bundles...");

    const results = await verifyBundles({
      backupRoot: config.backupDir,
      git: new GitClient({ timeoutMs: config.git.timeoutSeconds * 1000 }),
      logger,
      all: values.all,
      domain: values["provider-domain"],
    });

    s.stop("Verification complete");

    if (results.length === 0) {
      ui.success("No bundles to verify");
      ui.outro("Done");
      return 0;
    }

    ui.step("Results:");
    for (const result of results) {
      const status = result.ok ? color.green("OK") : color.red("FAILED");
      ui.message(`  [${status}] ${result.repo}/${result.bundle}`);
      if (result.issue) {
        ui.message(`         ${color.dim(result.issue)}`);
      }
    }

    const failed = results.filter((r) => !r.ok).length;
    ui.note(
      formatSummary([
        { label: "Bundles checked", value: results.length },
        { label: "Valid", value: results.length - failed },
        { label: "Invalid", value: failed > 0 ? color.red(String(failed)) : 0 },
      ]),
      "Summary",
    );

    if (failed > 0) {
      ui.outro(`${failed} bundle(s) failed verification`);
      return 1;
    }

    ui.outro("All bundles verified");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("repovault verify")} - Check bundles with git bundle verify

${color.dim("USAGE:")}
  repovault verify [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>            Path to config file (default: ./repovault.config.yaml)
      --backup-dir <path>        Backup root directory
      --all                      Verify every bundle, not just the latest per repository
      --provider-domain <host>   Only repositories from this host
  -v, --verbose                  Verbose output
  -h, --help                     Show this help message

${color.dim("EXAMPLES:")}
  repovault verify                       # Latest bundle of each repository
  repovault verify --all                 # Every bundle
`);
}
