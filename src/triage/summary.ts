import type { TriageEntry } from "../types/Triage.js";

export interface TriageSummary {
  entries: TriageEntry[];
  reproduced: string[];
  notReproduced: string[];
  failed: string[];
  // bug id -> "<stage>: <cause>" for every failed bug
  causes: Record<string, string>;
  // false when any bug failed or nothing was processed
  ok: boolean;
}

const RULE = "=".repeat(67);

export function summarize(entries: TriageEntry[]): TriageSummary {
  const reproduced: string[] = [];
  const notReproduced: string[] = [];
  const failed: string[] = [];
  const causes: Record<string, string> = {};

  for (const entry of entries) {
    if (entry.type === "failure") {
      const { reference, stage, error } = entry.failure;
      failed.push(reference.id);
      causes[reference.id] = `${stage}: ${error}`;
      continue;
    }
    const { result } = entry;
    switch (result.outcome) {
      case "reproduced":
        reproduced.push(result.reference.id);
        break;
      case "not-reproduced":
      case "dry-run":
        notReproduced.push(result.reference.id);
        break;
      case "execution-error":
        failed.push(result.reference.id);
        causes[result.reference.id] = `reproduce: ${result.detail ?? "execution error"}`;
        break;
    }
  }

  return {
    entries,
    reproduced,
    notReproduced,
    failed,
    causes,
    ok: entries.length > 0 && failed.length === 0,
  };
}

function section(heading: string, ids: string[]): string[] {
  return [RULE, heading, RULE, ...ids.map((id, i) => `${i + 1}. ${id}`), RULE];
}

export function formatSummary(summary: TriageSummary): string[] {
  if (!summary.entries.length) {
    return [RULE, "No bugs were processed!", RULE];
  }

  const lines: string[] = [];
  if (summary.failed.length) {
    lines.push(
      ...section(
        "Some errors happened during triage of the bugs!",
        summary.failed.map((id) =>
          summary.causes[id] ? `${id} (${summary.causes[id]})` : id
        )
      )
    );
  }
  if (summary.notReproduced.length) {
    lines.push(...section("Some bugs were not reproduced.", summary.notReproduced));
  }
  if (summary.reproduced.length) {
    lines.push(...section("Some bugs were reproduced.", summary.reproduced));
  }
  return lines;
}
