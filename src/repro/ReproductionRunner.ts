import fs from "node:fs";
import path from "node:path";
import type {
  BugReference,
  CrashRecord,
  ReproductionOutcome,
  ReproductionResult,
} from "../types/Triage.js";
import {
  SSH_TRANSPORT_EXIT_CODE,
  type RemoteShell,
  type ShellResult,
} from "./RemoteShell.js";
import type { ReproducerBuilder } from "./ReproducerBuilder.js";
import { createSilentLogger, type Logger } from "../util/logger.js";

export const CRASH_SIGNATURES = [
  "Rebooting in",
  "Kernel panic",
  "BUG:",
  "KASAN:",
  "KMSAN:",
  "UBSAN:",
  "general protection fault",
  "WARNING:",
  "INFO: task hung",
];

export const REMOTE_WORK_DIR = "/root/triage";

export const BOOT_ID_COMMAND = "cat /proc/sys/kernel/random/boot_id";
export const KILL_LEFTOVERS_COMMAND = `pkill -9 -f '^${REMOTE_WORK_DIR}/'`;
export const VM_WENT_DOWN = "VM went down";
export const VM_REBOOTED = "VM rebooted";

// coreutils timeout: 124 after sending the signal, 137 when killed by it
const REMOTE_TIMEOUT_EXIT_CODES = [124, 137];

interface KernelCheck {
  kernelRelease?: string;
  kernelMatchesCommit?: boolean;
}

export interface ReproductionRunnerOptions {
  shell: RemoteShell;
  builder: ReproducerBuilder;
  connectTimeoutMs: number;
  reproTimeoutMs: number;
  maxOutputChars: number;
  // file the VM's serial console is written to, if the host exposes one
  consoleLog?: string;
  logger?: Logger;
}

export interface ReproduceOptions {
  dryRun: boolean;
}

/**
 * Runs the reproducer under `timeout -s KILL` so it cannot outlive its time
 * limit on the VM.
 */
export function remoteRunCommand(remoteBinary: string, timeoutMs: number): string {
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return `timeout -s KILL ${seconds} ${remoteBinary}`;
}

/**
 * Compares a kernel release such as `6.8.0-rc1-00042-g1a2b3c4d5e6f` with a
 * commit hash. Undefined when the release carries no git hash.
 */
export function kernelMatchesCommit(
  release: string,
  commit: string
): boolean | undefined {
  const hash = /-g([0-9a-f]{7,40})\b/.exec(release)?.[1];
  if (!hash) return undefined;
  const wanted = commit.trim().toLowerCase();
  return wanted.startsWith(hash) || hash.startsWith(wanted);
}

export function findCrashSignature(output: string): string | undefined {
  return CRASH_SIGNATURES.find((signature) => output.includes(signature));
}

/**
 * Keeps the last `maxChars` characters, where kernel crash reports end up.
 */
export function truncateOutput(
  output: string,
  maxChars: number
): { output: string; truncated: boolean } {
  if (output.length <= maxChars) return { output, truncated: false };
  const dropped = output.length - maxChars;
  return {
    output: `[... ${dropped} characters truncated ...]\n${output.slice(-maxChars)}`,
    truncated: true,
  };
}

function describeFailure(result: ShellResult): string {
  if (result.timedOut) return "timed out";
  const stderr = result.stderr.trim();
  return stderr ? `exit ${result.exitCode}: ${stderr}` : `exit ${result.exitCode}`;
}

async function consoleSize(file: string): Promise<number> {
  const stat = await fs.promises.stat(file).catch(() => undefined);
  return stat?.size ?? 0;
}

async function readConsoleFrom(file: string, offset: number): Promise<string> {
  const content = await fs.promises.readFile(file).catch(() => undefined);
  return content ? content.subarray(offset).toString("utf8") : "";
}

export class ReproductionRunner {
  private readonly logger: Logger;

  constructor(private readonly options: ReproductionRunnerOptions) {
    this.logger = options.logger ?? createSilentLogger();
  }

  async reproduce(
    reference: BugReference,
    crash: CrashRecord,
    { dryRun }: ReproduceOptions
  ): Promise<ReproductionResult> {
    const attemptedAt = new Date();
    const { shell } = this.options;
    const finish = (
      outcome: ReproductionOutcome,
      rawOutput: string,
      detail?: string,
      kernel: KernelCheck = {}
    ): ReproductionResult => {
      const { output, truncated } = truncateOutput(
        rawOutput,
        this.options.maxOutputChars
      );
      return Object.freeze({
        reference,
        crash,
        attemptedAt,
        outcome,
        output,
        truncated,
        dryRun,
        detail,
        ...kernel,
      });
    };

    const target = `${shell.target.user}@${shell.target.host}:${shell.target.port}`;
    this.logger.debug(
      `Connecting to ${target}` +
        (shell.target.image ? ` (image ${shell.target.image})` : "")
    );
    const probe = await shell.exec("uname -r", {
      timeoutMs: this.options.connectTimeoutMs,
    });
    if (probe.exitCode !== 0) {
      return finish(
        "execution-error",
        probe.stderr,
        `VM ${target} unreachable (${describeFailure(probe)})`
      );
    }
    const kernelRelease = probe.stdout.trim();
    this.logger.debug(`VM kernel: ${kernelRelease}`);
    if (crash.configRef) this.logger.debug(`Kernel config: ${crash.configRef}`);

    const kernel: KernelCheck = {
      kernelRelease,
      kernelMatchesCommit: crash.commit
        ? kernelMatchesCommit(kernelRelease, crash.commit)
        : undefined,
    };
    if (kernel.kernelMatchesCommit === false) {
      this.logger.warn(
        `VM kernel ${kernelRelease} was not built from commit ${crash.commit}`
      );
    }

    if (dryRun) {
      return finish("dry-run", probe.stdout, undefined, kernel);
    }

    let binaryPath: string;
    try {
      binaryPath = await this.options.builder.build(reference, crash);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return finish(
        "execution-error",
        reason,
        "building the reproducer failed",
        kernel
      );
    }

    // the kernel log is cleared so that only this run's messages are classified
    const remoteBinary = `${REMOTE_WORK_DIR}/${path.basename(binaryPath)}`;
    const prepare = await shell.exec(
      `rm -rf ${REMOTE_WORK_DIR} && mkdir -p ${REMOTE_WORK_DIR} && dmesg -C`,
      { timeoutMs: this.options.connectTimeoutMs }
    );
    if (prepare.exitCode !== 0) {
      return finish(
        "execution-error",
        prepare.stderr,
        `cleaning the VM workspace failed (${describeFailure(prepare)})`,
        kernel
      );
    }

    const upload = await shell.upload(binaryPath, remoteBinary, {
      timeoutMs: this.options.connectTimeoutMs,
    });
    if (upload.exitCode !== 0) {
      return finish(
        "execution-error",
        upload.stderr,
        `copying the reproducer failed (${describeFailure(upload)})`,
        kernel
      );
    }

    const bootId = await this.bootId();
    const consoleLog = this.options.consoleLog;
    const consoleOffset = consoleLog ? await consoleSize(consoleLog) : 0;

    this.logger.info(`Starting C reproducer for ${reference.id}...`);
    const run = await shell.exec(
      remoteRunCommand(remoteBinary, this.options.reproTimeoutMs),
      {
        // leaves the remote timeout room to fire first
        timeoutMs: this.options.reproTimeoutMs + this.options.connectTimeoutMs,
      }
    );
    const timedOut = run.timedOut || REMOTE_TIMEOUT_EXIT_CODES.includes(run.exitCode);
    if (timedOut) {
      this.logger.info("The C reproducer has exceeded the time limit.");
      await this.killLeftovers();
    } else {
      this.logger.info(`The C reproducer returned with ${run.exitCode} code.`);
    }

    const sections = [run.stdout, run.stderr];
    const dmesg = await shell.exec("dmesg", {
      timeoutMs: this.options.connectTimeoutMs,
    });
    if (dmesg.exitCode === 0) sections.push(dmesg.stdout);
    if (consoleLog) sections.push(await readConsoleFrom(consoleLog, consoleOffset));

    const output = sections.filter(Boolean).join("\n");
    const signature = findCrashSignature(output);

    if (signature) {
      this.logger.debug(`Crash signature found: ${signature}`);
      return finish("reproduced", output, signature, kernel);
    }
    if (!timedOut && run.exitCode === SSH_TRANSPORT_EXIT_CODE) {
      const vmState = await this.vmStateAfterLostSession(bootId);
      if (vmState) {
        this.logger.debug(`Session lost and ${vmState}`);
        return finish("reproduced", output, vmState, kernel);
      }
      await this.killLeftovers();
      return finish(
        "execution-error",
        output,
        `remote session failed (${describeFailure(run)})`,
        kernel
      );
    }
    return finish("not-reproduced", output, undefined, kernel);
  }

  private async bootId(): Promise<string | undefined> {
    const result = await this.options.shell.exec(BOOT_ID_COMMAND, {
      timeoutMs: this.options.connectTimeoutMs,
    });
    return result.exitCode === 0 ? result.stdout.trim() || undefined : undefined;
  }

  /**
   * A panicking kernel takes the ssh session down with it. The VM being
   * unreachable or carrying a new boot id afterwards counts as the crash.
   */
  private async vmStateAfterLostSession(
    bootIdBefore: string | undefined
  ): Promise<string | undefined> {
    const after = await this.options.shell.exec(BOOT_ID_COMMAND, {
      timeoutMs: this.options.connectTimeoutMs,
    });
    if (after.exitCode !== 0) return VM_WENT_DOWN;
    if (bootIdBefore && after.stdout.trim() !== bootIdBefore) return VM_REBOOTED;
    return undefined;
  }

  // forked reproducer children outlive the remote timeout's kill
  private async killLeftovers(): Promise<void> {
    const kill = await this.options.shell.exec(KILL_LEFTOVERS_COMMAND, {
      timeoutMs: this.options.connectTimeoutMs,
    });
    // pkill exits 1 when nothing matched
    if (kill.exitCode > 1) {
      this.logger.warn(
        `Stopping leftover reproducer processes failed (${describeFailure(kill)})`
      );
    }
  }
}
