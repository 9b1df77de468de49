export type BugKind = "external" | "internal";

export interface BugReference {
  readonly id: string;
  readonly kind: BugKind;
  // report URL for external bugs, commit hash for internal ones
  readonly location: string;
}

export interface RawReport {
  readonly reference: BugReference;
  readonly content: string;
  readonly fetchedAt: Date;
  readonly status: "ok" | "failed";
  readonly httpStatus: number;
}

export interface CrashRecord {
  readonly title: string;
  readonly reproducerRef?: string;
  readonly configRef?: string;
  readonly commit?: string;
}

export type ReproductionOutcome =
  | "reproduced"
  | "not-reproduced"
  | "execution-error"
  | "dry-run";

export interface ReproductionResult {
  readonly reference: BugReference;
  readonly crash: CrashRecord;
  readonly attemptedAt: Date;
  readonly outcome: ReproductionOutcome;
  readonly output: string;
  readonly truncated: boolean;
  readonly dryRun: boolean;
  readonly detail?: string;
  // `uname -r` of the VM the reproducer ran on
  readonly kernelRelease?: string;
  // undefined when the release or the crash carries no commit
  readonly kernelMatchesCommit?: boolean;
}

export type TriageStage = "fetch" | "parse" | "reproduce";

export interface TriageFailure {
  readonly reference: BugReference;
  readonly stage: TriageStage;
  readonly error: string;
  readonly message: string;
  readonly at: Date;
}

export type TriageEntry =
  | { readonly type: "result"; readonly result: ReproductionResult }
  | { readonly type: "failure"; readonly failure: TriageFailure };
