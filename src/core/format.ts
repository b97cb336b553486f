import { Plan } from "../types.js";
import { ReportSummary } from "./report.js";

export function formatPlan(plan: Plan): string {
  if (!plan.actions.length) return "Nothing requested.";
  const lines: string[] = [];
  for (const action of plan.actions) {
    const state = action.marker.state === "pending" ? "pending" : `skip (${action.marker.reason})`;
    lines.push(`- ${action.kind}: ${action.label} [${state}]${action.requiresPrivilege ? " (sudo)" : ""}`);
  }
  return lines.join("\n");
}

export function formatReport(summary: ReportSummary): string {
  const { counts } = summary;
  const lines = [`Succeeded: ${counts.succeeded}  Skipped: ${counts.skipped}  Failed: ${counts.failed}`];

  if (summary.skipped.length) {
    lines.push("", "Skipped:");
    for (const item of summary.skipped) {
      lines.push(`  ${item.label}: ${item.reason}`);
    }
  }

  if (summary.failed.length) {
    lines.push("", "Failed:");
    for (const item of summary.failed) {
      lines.push(`  ${item.label}: ${item.reason}${item.message ? ` (${item.message})` : ""}`);
    }
  }

  return lines.join("\n");
}
