#!/usr/bin/env node
import path from "node:path";
import dotenv from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig, type TriageConfig } from "./config.js";
import {
  createBugSource,
  loadInternalBugs,
  type BugSourceDefinition,
} from "./sources/BugSource.js";
import { ReportFetcher } from "./fetcher/ReportFetcher.js";
import { CReproducerBuilder } from "./repro/ReproducerBuilder.js";
import { SshRemoteShell } from "./repro/RemoteShell.js";
import { ReproductionRunner } from "./repro/ReproductionRunner.js";
import { TriageOrchestrator } from "./triage/TriageOrchestrator.js";
import { JsonlResultSink, resultsFileName } from "./triage/ResultSink.js";
import { formatSummary } from "./triage/summary.js";
import { createLogger } from "./util/logger.js";

async function sourceDefinition(
  config: TriageConfig,
  internal: boolean
): Promise<BugSourceDefinition> {
  if (internal) {
    return { kind: "internal", bugs: await loadInternalBugs(config.internalBugsFile) };
  }
  return { kind: "external", urls: config.bugUrls };
}

async function main(argv: string[]): Promise<number> {
  const args = await yargs(argv)
    .scriptName("fuzz-triage")
    .usage("$0 [options]\n\nTriaging tool for syzbot kernel bugs.")
    .option("verbose", {
      alias: "v",
      type: "boolean",
      default: false,
      describe: "Increase logs verbosity level",
    })
    .option("dry-run", {
      alias: "d",
      type: "boolean",
      default: false,
      describe: "Check VM connectivity but do not run reproducers",
    })
    .option("internal-bugs", {
      alias: "i",
      type: "boolean",
      default: false,
      describe: "Triage internal bugs",
    })
    .help()
    .alias("help", "h")
    .strict()
    .parse();

  const dryRun = args["dry-run"];
  const internalBugs = args["internal-bugs"];

  dotenv.config();
  const config = loadConfig();
  const logger = createLogger("CLI", { verbose: args.verbose || dryRun });
  if (!config.vm.consoleLog) {
    logger.warn(
      "VM_CONSOLE_LOG is not set: panics are only detected through the lost session"
    );
  }

  const fetcher = new ReportFetcher({
    timeoutMs: config.fetchTimeoutMs,
    logger: logger.child("Fetcher"),
  });
  const runner = new ReproductionRunner({
    shell: new SshRemoteShell(config.vm, config.connectTimeoutMs),
    builder: new CReproducerBuilder({
      workDir: config.workDir,
      compiler: config.compiler,
      fetcher,
      logger: logger.child("Builder"),
    }),
    connectTimeoutMs: config.connectTimeoutMs,
    reproTimeoutMs: config.reproTimeoutMs,
    maxOutputChars: config.maxOutputChars,
    consoleLog: config.vm.consoleLog,
    logger: logger.child("Runner"),
  });
  const sink = new JsonlResultSink(path.join(config.resultsDir, resultsFileName()));
  const orchestrator = new TriageOrchestrator({
    fetcher,
    runner,
    sink,
    internalKernelConfigUrl: config.internalKernelConfigUrl,
    internalReproDir: config.internalReproDir,
    logger: logger.child("Orchestrator"),
  });

  const source = createBugSource(await sourceDefinition(config, internalBugs));
  const summary = await orchestrator.run(source, { dryRun });

  const lines = formatSummary(summary);
  for (const line of lines) {
    if (summary.ok) logger.info(line);
    else logger.error(line);
  }
  logger.info(`Results written to ${sink.filePath}`);

  return summary.ok ? 0 : 1;
}

main(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[Triage] Fatal error:", err);
    process.exit(1);
  });
