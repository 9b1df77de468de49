import type { RawReport, TriageStage } from "../types/Triage.js";

export class TriageError extends Error {
  public stage: TriageStage;

  constructor(stage: TriageStage, message: string) {
    super(message);
    this.name = "TriageError";
    this.stage = stage;
  }
}

export class InvalidURLError extends TriageError {
  public url: string;

  constructor(url: string, reason?: string) {
    super("fetch", `Invalid URL "${url}"${reason ? `: ${reason}` : ""}`);
    this.name = "InvalidURLError";
    this.url = url;
  }
}

export class FetchError extends TriageError {
  public url: string;
  public httpStatus?: number;
  public code?: string;
  // failure body, kept so it can be logged
  public report?: RawReport;

  constructor(
    url: string,
    message: string,
    details: { httpStatus?: number; code?: string; report?: RawReport } = {}
  ) {
    super("fetch", message);
    this.name = "FetchError";
    this.url = url;
    this.httpStatus = details.httpStatus;
    this.code = details.code;
    this.report = details.report;
  }
}

export class NotAReportError extends TriageError {
  constructor(message = "Content is not a syzbot bug report") {
    super("parse", message);
    this.name = "NotAReportError";
  }
}

export class NoCrashTableError extends TriageError {
  constructor(message = "Crash table not found in the bug report") {
    super("parse", message);
    this.name = "NoCrashTableError";
  }
}

export class NoValidCrashesError extends TriageError {
  constructor(message = "No valid crashes found") {
    super("parse", message);
    this.name = "NoValidCrashesError";
  }
}
