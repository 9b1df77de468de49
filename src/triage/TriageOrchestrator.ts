import path from "node:path";
import type {
  BugReference,
  CrashRecord,
  RawReport,
  ReproductionResult,
  TriageEntry,
  TriageFailure,
  TriageStage,
} from "../types/Triage.js";
import type { BugSource } from "../sources/BugSource.js";
import type { ReproduceOptions } from "../repro/ReproductionRunner.js";
import { reproducerStem } from "../repro/ReproducerBuilder.js";
import {
  parseCrashTable,
  selectReproducibleCrash,
} from "../parser/CrashTableParser.js";
import { FetchError, TriageError } from "./errors.js";
import type { ResultSink } from "./ResultSink.js";
import { summarize, type TriageSummary } from "./summary.js";
import { createSilentLogger, type Logger } from "../util/logger.js";

export interface ReportSource {
  fetchReport(reference: BugReference): Promise<RawReport>;
}

export interface Reproducer {
  reproduce(
    reference: BugReference,
    crash: CrashRecord,
    options: ReproduceOptions
  ): Promise<ReproductionResult>;
}

export interface TriageOrchestratorOptions {
  fetcher: ReportSource;
  runner: Reproducer;
  sink: ResultSink;
  internalKernelConfigUrl: string;
  internalReproDir: string;
  logger?: Logger;
}

export interface RunOptions {
  dryRun: boolean;
}

export class TriageOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly options: TriageOrchestratorOptions) {
    this.logger = options.logger ?? createSilentLogger();
  }

  async run(source: BugSource, { dryRun }: RunOptions): Promise<TriageSummary> {
    const entries: TriageEntry[] = [];

    for (let ref = source.next(); ref; ref = source.next()) {
      this.logger.info(`Processing bug: ${ref.id}`);
      const entry = await this.triage(ref, dryRun);
      entries.push(entry);
      await this.options.sink.append(entry);
    }

    return summarize(entries);
  }

  /**
   * Runs one bug through its pipeline. Never throws: failures come back as
   * failure entries tagged with the stage they happened in.
   */
  async triage(reference: BugReference, dryRun: boolean): Promise<TriageEntry> {
    let stage: TriageStage = "fetch";

    try {
      let crash: CrashRecord;
      if (reference.kind === "internal") {
        crash = this.internalCrash(reference);
      } else {
        this.logger.info("Getting bug details.");
        const report = await this.options.fetcher.fetchReport(reference);
        stage = "parse";
        const records = parseCrashTable(report.content, reference.location);
        this.logger.debug(`Found ${records.length} crashes`);
        crash = selectReproducibleCrash(records);
      }

      stage = "reproduce";
      this.logger.debug(
        `Crash: ${crash.title} (commit ${crash.commit ?? "unknown"})`
      );
      this.logger.info("Reproducing bug.");
      const result = await this.options.runner.reproduce(reference, crash, {
        dryRun,
      });

      if (result.outcome === "execution-error") {
        this.logger.error(
          `Error during bug reproduction of ${reference.id}: ${result.detail ?? "unknown cause"}`
        );
      } else {
        this.logger.info(`Bug ${reference.id}: ${result.outcome}`);
      }
      this.logger.debug(result.output);
      return { type: "result", result };
    } catch (err) {
      return { type: "failure", failure: this.failure(reference, stage, err) };
    }
  }

  // internal bugs are known by commit and share one kernel config
  private internalCrash(reference: BugReference): CrashRecord {
    return {
      title: reference.id,
      commit: reference.location,
      configRef: this.options.internalKernelConfigUrl,
      reproducerRef: path.join(
        this.options.internalReproDir,
        `${reproducerStem(reference.id)}.c`
      ),
    };
  }

  private failure(
    reference: BugReference,
    stage: TriageStage,
    err: unknown
  ): TriageFailure {
    const failedStage = err instanceof TriageError ? err.stage : stage;
    const name = err instanceof Error ? err.name : "Error";
    const message = err instanceof Error ? err.message : String(err);

    this.logger.error(
      `Bug ${reference.id} failed at ${failedStage} stage: ${name}: ${message}`
    );
    if (err instanceof FetchError && err.report) {
      this.logger.debug(err.report.content);
    }

    return {
      reference,
      stage: failedStage,
      error: name,
      message,
      at: new Date(),
    };
  }
}
