import { parseArgs } from "node:util";
import { createChronosClient } from "../../chronos";
import { findAndLoadConfig } from "../../config/loader";
import { exitCodeFor, formatReport, runReconcile } from "../../core";
import { createSoaConfigSource } from "../../soa";
import { describeError } from "../../utils/errors";
import { color, formatSummary, reportSummaryItems, ui } from "../ui";
import {
  applyVerbosity,
  DISCOVERY_HELP,
  DISCOVERY_OPTIONS,
  discoveryOverrides,
  parseConcurrency,
} from "./options";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...DISCOVERY_OPTIONS,
      concurrency: { type: "string" },
      "dry-run": { type: "boolean" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbosity(values);

  try {
    const config = await findAndLoadConfig(values.config, {
      ...discoveryOverrides(values),
      concurrency: parseConcurrency(values.concurrency),
      dryRun: values["dry-run"],
    });

    ui.intro("chronos-reaper cleanup");

    const report = await runReconcile(
      {
        client: createChronosClient(config.chronos),
        configSource: createSoaConfigSource(config.cluster),
      },
      {
        soaDir: config.soaDir,
        dryRun: config.cleanup.dryRun,
        concurrency: config.cleanup.concurrency,
      },
    );

    for (const section of formatReport(report)) {
      console.log(section);
    }

    if (report.orphans.length === 0) {
      ui.outro("Nothing to do");
      return 0;
    }

    ui.note(formatSummary(reportSummaryItems(report)), "Cleanup Summary");

    const code = exitCodeFor(report);
    if (report.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
    } else if (code !== 0) {
      for (const failure of [...report.taskFailures, ...report.jobFailures]) {
        ui.error(`${failure.job}: ${failure.error}`);
      }
      ui.outro("Cleanup finished with failures");
    } else {
      ui.outro("Cleanup complete!");
    }

    return code;
  } catch (error) {
    ui.error(`Cleanup failed: ${describeError(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("chronos-reaper cleanup")} - Delete Chronos jobs that are no longer configured

${color.dim("USAGE:")}
  chronos-reaper cleanup [OPTIONS]

${color.dim("OPTIONS:")}
${DISCOVERY_HELP}
      --concurrency <n>   Orphaned jobs processed at once (default: 1)
      --dry-run           Show what would be deleted without doing it

${color.dim("BEHAVIOUR:")}
  Every job registered with Chronos that no service declares for the cluster is
  an orphan. For each orphan its running tasks are killed, then the job is
  deleted. A failure on one job does not stop the others.

${color.dim("EXIT STATUS:")}
  0  nothing to remove, or every deletion succeeded
  1  a task or job deletion failed, or the run could not start

${color.dim("EXAMPLES:")}
  chronos-reaper cleanup --cluster norcal --server http://chronos:4400
  chronos-reaper cleanup -d ./services --dry-run
  chronos-reaper cleanup --concurrency 4
`);
}
