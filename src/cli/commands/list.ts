import { parseArgs } from "node:util";
import { createChronosClient } from "../../chronos";
import { findAndLoadConfig } from "../../config/loader";
import { formatListOutput, planReconcile } from "../../core";
import { createSoaConfigSource } from "../../soa";
import { describeError } from "../../utils/errors";
import { color, formatSummary, ui } from "../ui";
import { applyVerbosity, DISCOVERY_HELP, DISCOVERY_OPTIONS, discoveryOverrides } from "./options";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...DISCOVERY_OPTIONS,
      orphans: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbosity(values);

  try {
    const config = await findAndLoadConfig(values.config, discoveryOverrides(values));

    ui.intro("chronos-reaper list");

    const plan = await planReconcile(
      {
        client: createChronosClient(config.chronos),
        configSource: createSoaConfigSource(config.cluster),
      },
      config.soaDir,
    );

    if (!values.orphans) {
      console.log(formatListOutput("Expected Jobs:", plan.expected));
      console.log(formatListOutput("Running Jobs:", plan.running));
    }
    console.log(formatListOutput("Orphaned Jobs:", plan.orphans));

    ui.note(
      formatSummary([
        { label: "Cluster", value: config.cluster },
        { label: "Expected", value: plan.expected.length },
        { label: "Running", value: plan.running.length },
        { label: "Orphaned", value: plan.orphans.length },
      ]),
      "Summary",
    );
    ui.outro("Done");
    return 0;
  } catch (error) {
    ui.error(`List failed: ${describeError(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("chronos-reaper list")} - Show expected, running and orphaned Chronos jobs

${color.dim("USAGE:")}
  chronos-reaper list [OPTIONS]

${color.dim("OPTIONS:")}
${DISCOVERY_HELP}
      --orphans           Only list orphaned jobs

${color.dim("EXAMPLES:")}
  chronos-reaper list --cluster norcal --server http://chronos:4400
  chronos-reaper list --orphans
`);
}
