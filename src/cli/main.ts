import { backupCommand } from "./commands/backup";
import { cleanupCommand } from "./commands/cleanup";
import { listCommand } from "./commands/list";
import { startCommand } from "./commands/start";
import { verifyCommand } from "./commands/verify";
import { APP_NAME, color, VERSION } from "./ui";

export function printHelp(): void {
  console.log(`
${color.bold(color.cyan(APP_NAME))} ${color.dim(`v${VERSION}`)} - Back up git repositories from hosted providers as bundles

${color.dim("USAGE:")}
  repovault <command> [OPTIONS]

${color.dim("COMMANDS:")}
  ${color.cyan("backup")}      Back up every configured provider once
  ${color.cyan("start")}       Start the scheduler daemon
  ${color.cyan("list")}        List repositories and their bundles
  ${color.cyan("verify")}      Check bundles with git bundle verify
  ${color.cyan("cleanup")}     Delete bundles beyond a retention count

${color.dim("OPTIONS:")}
  -h, --help      Show this help message
  -V, --version   Show version

${color.dim("EXAMPLES:")}
  repovault backup                     ${color.dim("# One run with config file or env")}
  repovault start --interval 24h       ${color.dim("# Back up once a day")}
  repovault list --format json         ${color.dim("# Bundle inventory for scripts")}
  repovault verify --all               ${color.dim("# Verify every bundle")}
  repovault cleanup --retain 3         ${color.dim("# Keep the 3 newest bundles")}

Run ${color.cyan("repovault <command> --help")} for command details.
`);
}

export function printVersion(): void {
  console.log(`${APP_NAME} v${VERSION}`);
}

export async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const [command, ...commandArgs] = args;

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "-V":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("repovault --help")} for usage information.`);
      return 1;
  }
}
