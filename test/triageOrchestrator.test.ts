import { describe, it, expect, vi } from "vitest";
import { ReportFetcher, type HttpClient } from "../src/fetcher/ReportFetcher.js";
import { ReproductionRunner } from "../src/repro/ReproductionRunner.js";
import { createBugSource } from "../src/sources/BugSource.js";
import { TriageOrchestrator } from "../src/triage/TriageOrchestrator.js";
import { MemoryResultSink } from "../src/triage/ResultSink.js";
import type { TriageEntry, TriageFailure } from "../src/types/Triage.js";
import { FakeBuilder, FakeRemoteShell, ok } from "./fakes.js";
import { fixture } from "./fixtures.js";

const GOOD_URL = "https://syzkaller.appspot.com/bug?extid=good0000000000000001";
const OTHER_URL = "https://syzkaller.appspot.com/bug?extid=good0000000000000002";
const DOWN_URL = "https://syzkaller.appspot.com/bug?extid=down0000000000000003";
const PAGE_URL = "https://example.com/not-a-bug";

function fakeHttp(pages: Record<string, { status: number; data: string }>) {
  const get = vi.fn(async (url: string) => {
    const page = pages[url];
    if (!page) throw new Error(`unexpected request to ${url}`);
    return page;
  });
  const http: HttpClient = { get };
  return { http, get };
}

function setup(pages: Record<string, { status: number; data: string }> = {}) {
  const { http, get } = fakeHttp(pages);
  const shell = new FakeRemoteShell({
    "uname -r": ok("6.8.0\n"),
    dmesg: ok("[  10.0] BUG: KASAN: use-after-free\n"),
  });
  const builder = new FakeBuilder();
  const sink = new MemoryResultSink();
  const orchestrator = new TriageOrchestrator({
    fetcher: new ReportFetcher({ timeoutMs: 1000, http }),
    runner: new ReproductionRunner({
      shell,
      builder,
      connectTimeoutMs: 1000,
      reproTimeoutMs: 1000,
      maxOutputChars: 10_000,
    }),
    sink,
    internalKernelConfigUrl: "https://syzkaller.appspot.com/text?tag=KernelConfig&x=internal",
    internalReproDir: "internal-repro",
  });
  return { orchestrator, sink, get, shell, builder };
}

function failureOf(entry: TriageEntry | undefined): TriageFailure {
  if (entry?.type !== "failure") throw new Error("expected a failure entry");
  return entry.failure;
}

describe("TriageOrchestrator", () => {
  it("keeps going after a bug fails", async () => {
    const { orchestrator, sink } = setup({
      [GOOD_URL]: { status: 200, data: fixture("bug-report.html") },
      [OTHER_URL]: { status: 200, data: fixture("bug-report.html") },
    });
    const source = createBugSource({
      kind: "external",
      urls: [GOOD_URL, "not a url", OTHER_URL],
    });

    const summary = await orchestrator.run(source, { dryRun: false });

    expect(sink.entries.map((e) => e.type)).toEqual(["result", "failure", "result"]);
    expect(failureOf(sink.entries[1])).toMatchObject({
      stage: "fetch",
      error: "InvalidURLError",
    });
    expect(summary.reproduced).toEqual([
      "good0000000000000001",
      "good0000000000000002",
    ]);
    expect(summary.failed).toEqual(["not a url"]);
    expect(summary.ok).toBe(false);
  });

  it("records an HTTP failure as a fetch error and continues", async () => {
    const { orchestrator, sink } = setup({
      [DOWN_URL]: { status: 500, data: "<html>Internal Server Error</html>" },
      [GOOD_URL]: { status: 200, data: fixture("bug-report.html") },
    });

    const summary = await orchestrator.run(
      createBugSource({ kind: "external", urls: [DOWN_URL, GOOD_URL] }),
      { dryRun: false }
    );

    expect(failureOf(sink.entries[0])).toMatchObject({
      stage: "fetch",
      error: "FetchError",
      message: "Fetching bug report failed with HTTP 500",
    });
    expect(summary.reproduced).toEqual(["good0000000000000001"]);
  });

  it("records a generic web page as not a report", async () => {
    const { orchestrator, sink, builder } = setup({
      [PAGE_URL]: { status: 200, data: fixture("error-page.html") },
    });

    await orchestrator.run(createBugSource({ kind: "external", urls: [PAGE_URL] }), {
      dryRun: false,
    });

    expect(failureOf(sink.entries[0])).toMatchObject({
      stage: "parse",
      error: "NotAReportError",
    });
    expect(builder.built).toHaveLength(0);
  });

  it("reproduces the first crash that has a C reproducer", async () => {
    const { orchestrator, builder } = setup({
      [GOOD_URL]: { status: 200, data: fixture("bug-report.html") },
    });

    await orchestrator.run(createBugSource({ kind: "external", urls: [GOOD_URL] }), {
      dryRun: false,
    });

    expect(builder.built[0]?.crash.reproducerRef).toBe(
      "https://syzkaller.appspot.com/text?tag=ReproC&x=c002"
    );
  });

  it("takes internal bugs straight to reproduction", async () => {
    const { orchestrator, get, builder, sink } = setup();

    const summary = await orchestrator.run(
      createBugSource({ kind: "internal", bugs: { "KERN-48": "34afb82a3c67" } }),
      { dryRun: false }
    );

    expect(get).not.toHaveBeenCalled();
    expect(builder.built[0]?.crash).toEqual({
      title: "KERN-48",
      commit: "34afb82a3c67",
      configRef: "https://syzkaller.appspot.com/text?tag=KernelConfig&x=internal",
      reproducerRef: "internal-repro/repro-KERN-48.c",
    });
    expect(sink.entries[0]?.type).toBe("result");
    expect(summary.ok).toBe(true);
  });

  it("keeps internal reproducer paths inside the reproducer directory", async () => {
    const { orchestrator, builder } = setup();

    await orchestrator.run(
      createBugSource({ kind: "internal", bugs: { "../../etc/KERN-9": "34afb82a3c67" } }),
      { dryRun: false }
    );

    expect(builder.built[0]?.crash.reproducerRef).toBe(
      "internal-repro/repro-_etc_KERN-9.c"
    );
  });

  it("passes dry run through to the runner", async () => {
    const { orchestrator, shell, builder } = setup({
      [GOOD_URL]: { status: 200, data: fixture("bug-report.html") },
    });

    const summary = await orchestrator.run(
      createBugSource({ kind: "external", urls: [GOOD_URL] }),
      { dryRun: true }
    );

    expect(shell.commands).toEqual(["uname -r"]);
    expect(builder.built).toHaveLength(0);
    expect(summary.notReproduced).toEqual(["good0000000000000001"]);
    expect(summary.ok).toBe(true);
  });

  it("reports a run without bugs as not ok", async () => {
    const { orchestrator, sink } = setup();

    const summary = await orchestrator.run(
      createBugSource({ kind: "external", urls: [] }),
      { dryRun: false }
    );

    expect(sink.entries).toHaveLength(0);
    expect(summary.ok).toBe(false);
  });

  it("attributes unexpected errors to the stage they happened in", async () => {
    const sink = new MemoryResultSink();
    const orchestrator = new TriageOrchestrator({
      fetcher: { fetchReport: vi.fn() },
      runner: {
        reproduce: vi.fn(async () => {
          throw new Error("runner exploded");
        }),
      },
      sink,
      internalKernelConfigUrl: "https://example.com/config",
      internalReproDir: "internal-repro",
    });

    const entry = await orchestrator.triage(
      { id: "KERN-1", kind: "internal", location: "abc" },
      false
    );

    expect(failureOf(entry)).toMatchObject({
      stage: "reproduce",
      error: "Error",
      message: "runner exploded",
    });
    expect(sink.entries).toHaveLength(0);
  });
});
