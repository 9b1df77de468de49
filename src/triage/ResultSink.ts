import { appendFile, mkdir } from "fs/promises";
import path from "path";
import type { TriageEntry } from "../types/Triage.js";

export interface ResultSink {
  append(entry: TriageEntry): Promise<void>;
}

export function resultsFileName(now: Date = new Date()): string {
  return `triage-${now.getTime()}.jsonl`;
}

/**
 * Appends one JSON line per triage entry. Appends are chained so entries
 * land in the file in the order `append` was called.
 */
export class JsonlResultSink implements ResultSink {
  private tail: Promise<void> = Promise.resolve();

  constructor(public readonly filePath: string) {}

  append(entry: TriageEntry): Promise<void> {
    const write = this.tail.then(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    });
    // a failed write must not block the ones queued after it
    this.tail = write.catch(() => undefined);
    return write;
  }
}

export class MemoryResultSink implements ResultSink {
  public readonly entries: TriageEntry[] = [];

  async append(entry: TriageEntry): Promise<void> {
    this.entries.push(entry);
  }
}
