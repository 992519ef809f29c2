#!/usr/bin/env tsx

import { cleanupCommand } from "./cli/commands/cleanup";
import { listCommand } from "./cli/commands/list";
import { banner, color, NAME, note, outro, VERSION } from "./cli/ui";

function printHelp(): void {
  banner("Chronos job reconciliation");

  note(
    `${color.cyan("cleanup")}     Delete jobs (and their tasks) that are no longer configured
${color.cyan("list")}        Show expected, running and orphaned jobs`,
    "Commands",
  );

  note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  note(
    `${NAME} cleanup --cluster norcal --server http://chronos:4400   ${color.dim("# Reconcile a cluster")}
${NAME} cleanup --dry-run                                       ${color.dim("# Preview deletions")}
${NAME} list --orphans                                          ${color.dim("# Show orphans only")}`,
    "Examples",
  );

  outro(`Run ${color.cyan(`${NAME} <command> --help`)} for command details`);
}

async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${NAME} --help`)} for usage information.`);
      return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
