import axios, { type AxiosRequestConfig } from "axios";
import type { BugReference, RawReport } from "../types/Triage.js";
import { FetchError, InvalidURLError } from "../triage/errors.js";
import { createSilentLogger, type Logger } from "../util/logger.js";

export interface HttpClient {
  get(
    url: string,
    config: AxiosRequestConfig
  ): Promise<{ status: number; data: unknown }>;
}

export interface ReportFetcherOptions {
  timeoutMs: number;
  http?: HttpClient;
  logger?: Logger;
}

/**
 * Throws InvalidURLError unless `url` is an absolute http(s) URL.
 */
export function assertFetchableUrl(url: string): URL {
  if (!url.trim()) {
    throw new InvalidURLError(url, "empty URL");
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidURLError(url, "not an absolute URL");
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidURLError(url, `unsupported protocol ${parsed.protocol}`);
  }
  return parsed;
}

function bodyText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

export class ReportFetcher {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(private readonly options: ReportFetcherOptions) {
    this.http = options.http ?? axios;
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetchReport(reference: BugReference): Promise<RawReport> {
    const { status, content } = await this.get(reference.location);
    const report: RawReport = {
      reference,
      content,
      fetchedAt: new Date(),
      status: status >= 200 && status < 300 ? "ok" : "failed",
      httpStatus: status,
    };

    if (report.status === "failed") {
      throw new FetchError(
        reference.location,
        `Fetching bug report failed with HTTP ${status}`,
        { httpStatus: status, report }
      );
    }
    return report;
  }

  /**
   * Downloads a plain-text artifact such as a C reproducer or kernel config.
   */
  async fetchText(url: string): Promise<string> {
    const { status, content } = await this.get(url);
    if (status < 200 || status >= 300) {
      throw new FetchError(url, `Fetching ${url} failed with HTTP ${status}`, {
        httpStatus: status,
      });
    }
    return content;
  }

  private async get(url: string): Promise<{ status: number; content: string }> {
    assertFetchableUrl(url);
    this.logger.debug(`GET ${url}`);

    try {
      const resp = await this.http.get(url, {
        responseType: "text",
        timeout: this.options.timeoutMs,
        // status classification happens here, not in axios
        validateStatus: () => true,
        headers: { "User-Agent": "fuzz-triage" },
      });
      this.logger.debug(`GET ${url} -> ${resp.status}`);
      return { status: resp.status, content: bodyText(resp.data) };
    } catch (err) {
      const code = axios.isAxiosError(err) ? err.code : undefined;
      const reason = err instanceof Error ? err.message : String(err);
      throw new FetchError(url, `Fetching ${url} failed: ${reason}`, { code });
    }
  }
}
