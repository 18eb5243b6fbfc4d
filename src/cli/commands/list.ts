import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { GitClient } from "../../git/client";
import { findRepositoryDirectories, openBundleStore } from "../../storage";
import { logger } from "../../utils/logger";
import { formatBytes } from "../../utils/format";
import { COMMON_OPTIONS, loadCommandConfig } from "../config";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export interface RepositoryListing {
  repository: string;
  latest: string | null;
  latestCreated: string | null;
  bundles: number;
  sizeBytes: number;
}

/**
 * Bundle summary for every repository under `backupRoot`
 */
export async function collectListings(backupRoot: string, domain?: string): Promise<RepositoryListing[]> {
  const git = new GitClient();
  const listings: RepositoryListing[] = [];

  for (const repository of await findRepositoryDirectories(backupRoot)) {
    if (domain && repository.domain !== domain) continue;

    const store = openBundleStore(repository, git, logger);
    const bundles = await store.listBundles();
    const sizes = await Promise.all(bundles.map((bundle) => store.sizeOf(bundle)));
    const [latest] = bundles;

    listings.push({
      repository: repository.key,
      latest: latest?.name ?? null,
      latestCreated: latest ? latest.created.toISOString() : null,
      bundles: bundles.length,
      sizeBytes: sizes.reduce((sum, size) => sum + size, 0),
    });
  }

  return listings;
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      format: { type: "string", default: "table" },
      "provider-domain": { type: "string" },
      "backup-dir": INLINE_CONFIG_OPTIONS["backup-dir"],
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.format !== "table" && values.format !== "json") {
    ui.error(`Unknown format: ${values.format}. Use table or json.`);
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    const listings = await collectListings(config.backupDir, values["provider-domain"]);

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(JSON.stringify(listings, null, 2));
      return 0;
    }

    ui.intro("repovault list");

    if (listings.length === 0) {
      ui.info(`No bundles found in ${config.backupDir}`);
      ui.outro("Done");
      return 0;
    }

    printTable(listings);

    const totalBundles = listings.reduce((sum, l) => sum + l.bundles, 0);
    const totalSize = listings.reduce((sum, l) => sum + l.sizeBytes, 0);
    ui.outro(`${listings.length} repositories, ${totalBundles} bundle(s), ${formatBytes(totalSize)}`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(listings: RepositoryListing[]): void {
  const widths = [TABLE_WIDTHS.repository, TABLE_WIDTHS.latest, TABLE_WIDTHS.bundles, TABLE_WIDTHS.size];

  ui.step("Repositories:");
  console.log(formatTableRow(["Repository", "Latest", "Bundles", "Size"], widths));
  console.log(formatTableSeparator(widths));

  for (const listing of listings) {
    console.log(
      formatTableRow(
        [
          listing.repository,
          listing.latestCreated ? listing.latestCreated.substring(0, 19) : color.yellow("none"),
          String(listing.bundles),
          formatBytes(listing.sizeBytes),
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printHelp(): void {
  console.log(`
${color.bold("repovault list")} - List bundles under the backup directory

${color.dim("USAGE:")}
  repovault list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>            Path to config file (default: ./repovault.config.yaml)
      --backup-dir <path>        Backup root directory
      --provider-domain <host>   Only repositories from this host, e.g. github.com
      --format <format>          Output format: table, json (default: table)
  -v, --verbose                  Verbose output
  -h, --help                     Show this help message

${color.dim("EXAMPLES:")}
  repovault list                              # All repositories
  repovault list --provider-domain gitlab.com # GitLab repositories only
  repovault list --format json                # Output as JSON (for scripting)
`);
}
