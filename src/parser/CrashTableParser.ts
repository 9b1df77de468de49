import * as cheerio from "cheerio";
import type { CrashRecord } from "../types/Triage.js";
import {
  NoCrashTableError,
  NotAReportError,
  NoValidCrashesError,
} from "../triage/errors.js";

// every syzbot bug page links back to the dashboard
const REPORT_MARKER = 'a[href="/upstream"]';
const CRASH_TABLE_CAPTION = "Crashes";

type Column = "title" | "commit" | "config" | "cRepro";

const COLUMN_HEADERS: Record<string, Column> = {
  title: "title",
  commit: "commit",
  config: "config",
  "c repro": "cRepro",
};

function normalizeHeader(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

function resolveLink(href: string, baseUrl?: string): string {
  if (!baseUrl) return href;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

/**
 * Extracts the rows of a syzbot report's crash table.
 *
 * Links (config, C reproducer) are resolved against `baseUrl` when given.
 * Optional fields a row does not provide are left undefined.
 */
export function parseCrashTable(
  content: string,
  baseUrl?: string
): CrashRecord[] {
  const $ = cheerio.load(content);

  if ($(REPORT_MARKER).length === 0) {
    throw new NotAReportError();
  }

  const table = $("table")
    .filter(
      (_i, el) =>
        $(el)
          .children("caption")
          .first()
          .text()
          .trim()
          .startsWith(CRASH_TABLE_CAPTION)
    )
    .first();

  if (table.length === 0) {
    throw new NoCrashTableError();
  }

  const columns = new Map<Column, number>();
  table
    .find("tr")
    .filter((_i, tr) => $(tr).children("th").length > 0)
    .first()
    .children("th")
    .each((idx, th) => {
      const column = COLUMN_HEADERS[normalizeHeader($(th).text())];
      if (column && !columns.has(column)) columns.set(column, idx);
    });

  const documentTitle = $("title").first().text().trim();
  const records: CrashRecord[] = [];

  table
    .find("tr")
    .filter((_i, tr) => $(tr).children("td").length > 0)
    .each((_i, tr) => {
      const cells = $(tr).children("td");

      const cellOf = (column: Column) => {
        const idx = columns.get(column);
        return idx === undefined ? undefined : cells.eq(idx);
      };
      const textOf = (column: Column) => {
        const text = cellOf(column)?.text().replace(/\s+/g, " ").trim();
        return text || undefined;
      };
      const linkOf = (column: Column) => {
        const href = cellOf(column)?.find("a[href]").first().attr("href");
        return href ? resolveLink(href, baseUrl) : undefined;
      };

      records.push({
        title: textOf("title") ?? documentTitle,
        reproducerRef: linkOf("cRepro"),
        configRef: linkOf("config"),
        commit: textOf("commit"),
      });
    });

  if (records.length === 0) {
    throw new NoValidCrashesError("Crash table has no rows");
  }
  return records;
}

/**
 * Picks the first crash that comes with a C reproducer.
 */
export function selectReproducibleCrash(records: CrashRecord[]): CrashRecord {
  const crash = records.find((r) => r.reproducerRef !== undefined);
  if (!crash) {
    throw new NoValidCrashesError(
      `None of the ${records.length} crashes has a C reproducer`
    );
  }
  return crash;
}
