import { describe, it, expect } from "vitest";
import {
  parseCrashTable,
  selectReproducibleCrash,
} from "../src/parser/CrashTableParser.js";
import {
  NoCrashTableError,
  NotAReportError,
  NoValidCrashesError,
} from "../src/triage/errors.js";
import { fixture } from "./fixtures.js";

const BUG_URL = "https://syzkaller.appspot.com/bug?extid=0123456789abcdef0123";

describe("parseCrashTable", () => {
  it("returns one record per crash row in document order", () => {
    const records = parseCrashTable(fixture("bug-report.html"), BUG_URL);

    expect(records).toEqual([
      {
        title: "KASAN: use-after-free Read in test_sock_release",
        reproducerRef: undefined,
        configRef: "https://syzkaller.appspot.com/text?tag=KernelConfig&x=cfg001",
        commit: "aaaaaaaaaaaa",
      },
      {
        title: "KASAN: use-after-free Read in test_sock_release",
        reproducerRef: "https://syzkaller.appspot.com/text?tag=ReproC&x=c002",
        configRef: "https://syzkaller.appspot.com/text?tag=KernelConfig&x=cfg002",
        commit: "bbbbbbbbbbbb",
      },
      {
        title: "KASAN: use-after-free Read in test_sock_release (2)",
        reproducerRef: "https://syzkaller.appspot.com/text?tag=ReproC&x=c003",
        configRef: undefined,
        commit: "cccccccccccc",
      },
    ]);
  });

  it("leaves missing optional fields undefined rather than empty", () => {
    const [, empty] = parseCrashTable(fixture("minimal-columns.html"));

    expect(empty.reproducerRef).toBeUndefined();
    expect(empty.configRef).toBeUndefined();
    expect(empty.commit).toBeUndefined();
    expect("configRef" in empty).toBe(true);
  });

  it("tolerates missing and reordered columns", () => {
    const records = parseCrashTable(fixture("minimal-columns.html"));

    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      title: "general protection fault in test_ioctl",
      reproducerRef: "/text?tag=ReproC&x=min001",
      configRef: undefined,
      commit: "dddddddddddd",
    });
  });

  it("rejects content that is not a report before looking for a table", () => {
    expect(() => parseCrashTable(fixture("error-page.html"))).toThrow(
      NotAReportError
    );
    // a crash table alone does not make a report
    const tableOnly = "<table><caption>Crashes (1):</caption><tr><td>x</td></tr></table>";
    expect(() => parseCrashTable(tableOnly)).toThrow(NotAReportError);
    expect(() => parseCrashTable("Invalid")).toThrow(NotAReportError);
  });

  it("fails with NoCrashTableError when the report has no crash table", () => {
    expect(() => parseCrashTable(fixture("no-crash-table.html"))).toThrow(
      NoCrashTableError
    );
  });

  it("fails with NoValidCrashesError when the crash table is empty", () => {
    expect(() => parseCrashTable(fixture("empty-crash-table.html"))).toThrow(
      NoValidCrashesError
    );
  });
});

describe("selectReproducibleCrash", () => {
  it("picks the first crash that has a C reproducer", () => {
    const crash = selectReproducibleCrash(
      parseCrashTable(fixture("bug-report.html"), BUG_URL)
    );
    expect(crash.commit).toBe("bbbbbbbbbbbb");
  });

  it("fails when no crash has a reproducer", () => {
    expect(() =>
      selectReproducibleCrash([{ title: "t", commit: "abc" }])
    ).toThrow("None of the 1 crashes has a C reproducer");
  });
});
