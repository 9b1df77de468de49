import fs from "node:fs";
import type { BugReference } from "../types/Triage.js";

export type BugSourceDefinition =
  | { kind: "external"; urls: string[] }
  | { kind: "internal"; bugs: Record<string, string> };

export interface BugSource {
  readonly kind: BugSourceDefinition["kind"];
  next(): BugReference | undefined;
}

// syzbot bug URLs carry their identity in ?extid= (or ?id=)
export function externalBugId(url: string): string {
  try {
    const parsed = new URL(url);
    return (
      parsed.searchParams.get("extid") ?? parsed.searchParams.get("id") ?? url
    );
  } catch {
    return url;
  }
}

class ListBugSource implements BugSource {
  private index = 0;

  constructor(
    public readonly kind: BugSourceDefinition["kind"],
    private readonly refs: BugReference[]
  ) {}

  next(): BugReference | undefined {
    const ref = this.refs[this.index];
    if (ref) this.index += 1;
    return ref;
  }
}

export function createBugSource(definition: BugSourceDefinition): BugSource {
  if (definition.kind === "external") {
    return new ListBugSource(
      "external",
      definition.urls.map((url) => ({
        id: externalBugId(url),
        kind: "external",
        location: url,
      }))
    );
  }

  return new ListBugSource(
    "internal",
    Object.entries(definition.bugs).map(([id, commit]) => ({
      id,
      kind: "internal",
      location: commit,
    }))
  );
}

/**
 * Reads the internal bug map (bug id -> commit hash) from a JSON file.
 */
export async function loadInternalBugs(
  filePath: string
): Promise<Record<string, string>> {
  const raw = await fs.promises.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON object of bug id -> commit`);
  }

  const bugs: Record<string, string> = {};
  for (const [id, commit] of Object.entries(parsed)) {
    if (typeof commit !== "string" || !commit.trim()) {
      throw new Error(`Internal bug ${id} in ${filePath} has no commit hash`);
    }
    bugs[id] = commit.trim();
  }
  return bugs;
}
