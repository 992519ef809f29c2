/**
 * Summary formatting
 */

import color from "picocolors";
import type { CleanupReport } from "../../types";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function reportSummaryItems(report: CleanupReport): SummaryItem[] {
  if (report.dryRun) {
    return [{ label: "Orphaned", value: report.orphans.length }];
  }

  return [
    { label: "Orphaned", value: report.orphans.length },
    { label: "Tasks removed", value: report.taskSuccesses.length },
    { label: "Tasks failed", value: report.taskFailures.length },
    { label: "Jobs removed", value: report.jobSuccesses.length },
    { label: "Jobs failed", value: report.jobFailures.length },
  ];
}
