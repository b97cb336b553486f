import { Action, ActionOutcome, ActionKind, FailureReason, SkipReason } from "../types.js";

export interface ReportEntry {
  id: string;
  label: string;
  kind: ActionKind;
  outcome: ActionOutcome;
}

export interface FailedItem {
  id: string;
  label: string;
  reason: FailureReason;
  message?: string;
}

export interface SkippedItem {
  id: string;
  label: string;
  reason: SkipReason;
}

export interface ReportSummary {
  counts: Record<ActionOutcome["status"], number>;
  failed: FailedItem[];
  skipped: SkippedItem[];
}

export class Report {
  private readonly entries: ReportEntry[] = [];
  private readonly recorded = new Set<string>();

  record(action: Action, outcome: ActionOutcome): void {
    if (this.recorded.has(action.id)) {
      throw new Error(`Outcome for ${action.id} was already recorded`);
    }
    this.recorded.add(action.id);
    this.entries.push({ id: action.id, label: action.label, kind: action.kind, outcome });
  }

  has(actionId: string): boolean {
    return this.recorded.has(actionId);
  }

  list(): readonly ReportEntry[] {
    return this.entries;
  }

  summary(): ReportSummary {
    const counts = { succeeded: 0, skipped: 0, failed: 0 };
    const failed: FailedItem[] = [];
    const skipped: SkippedItem[] = [];

    for (const entry of this.entries) {
      const { outcome } = entry;
      counts[outcome.status] += 1;
      if (outcome.status === "failed") {
        failed.push({ id: entry.id, label: entry.label, reason: outcome.reason, message: outcome.message });
      } else if (outcome.status === "skipped") {
        skipped.push({ id: entry.id, label: entry.label, reason: outcome.reason });
      }
    }

    return { counts, failed, skipped };
  }

  exitCode(): number {
    return this.entries.some((entry) => entry.outcome.status === "failed") ? 1 : 0;
  }
}
