import fs from "node:fs";
import path from "node:path";
import type { BugReference, CrashRecord } from "../types/Triage.js";
import { runCommand, type CommandRunner } from "./RemoteShell.js";
import { createSilentLogger, type Logger } from "../util/logger.js";

export interface ReproducerBuilder {
  /** Returns the path of a binary ready to be copied to the VM. */
  build(reference: BugReference, crash: CrashRecord): Promise<string>;
}

export interface TextFetcher {
  fetchText(url: string): Promise<string>;
}

export interface CReproducerBuilderOptions {
  workDir: string;
  compiler: string;
  fetcher: TextFetcher;
  run?: CommandRunner;
  logger?: Logger;
}

const COMPILE_TIMEOUT_MS = 120_000;

// keeps bug ids from naming paths outside the directory they are joined to
export function reproducerStem(id: string): string {
  return `repro-${id.replace(/[^A-Za-z0-9_-]+/g, "_")}`;
}

/**
 * Builds syzbot C reproducers into static binaries. Sources are downloaded
 * when the reference is an http(s) URL and read from disk otherwise.
 */
export class CReproducerBuilder implements ReproducerBuilder {
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: CReproducerBuilderOptions) {
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? createSilentLogger();
  }

  async build(reference: BugReference, crash: CrashRecord): Promise<string> {
    const ref = crash.reproducerRef;
    if (!ref) {
      throw new Error(`Crash "${crash.title}" has no C reproducer`);
    }

    await fs.promises.mkdir(this.options.workDir, { recursive: true });
    const stem = reproducerStem(reference.id);
    const binaryPath = path.join(this.options.workDir, stem);

    let sourcePath: string;
    if (/^https?:\/\//i.test(ref)) {
      sourcePath = path.join(this.options.workDir, `${stem}.c`);
      this.logger.debug(`Downloading C reproducer ${ref} -> ${sourcePath}`);
      const source = await this.options.fetcher.fetchText(ref);
      await fs.promises.writeFile(sourcePath, source, "utf8");
    } else {
      sourcePath = ref;
      if (!fs.existsSync(sourcePath)) {
        throw new Error(`C reproducer source not found at ${sourcePath}`);
      }
    }

    const args = ["-static", sourcePath, "-lpthread", "-o", binaryPath];
    this.logger.debug(`CMD: ${this.options.compiler} ${args.join(" ")}`);
    const result = await this.run(this.options.compiler, args, {
      timeoutMs: COMPILE_TIMEOUT_MS,
    });

    if (result.exitCode !== 0) {
      throw new Error(
        `Building C reproducer failed (exit ${result.exitCode}): ${result.stderr.trim()}`
      );
    }
    return binaryPath;
  }
}
