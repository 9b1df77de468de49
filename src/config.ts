import os from "node:os";
import path from "node:path";

export interface VmTarget {
  host: string;
  port: number;
  user: string;
  sshKey: string;
  image?: string;
  // serial console output of the VM, when the host writes it to a file
  consoleLog?: string;
}

export interface TriageConfig {
  vm: VmTarget;
  internalKernelConfigUrl: string;
  internalBugsFile: string;
  internalReproDir: string;
  bugUrls: string[];
  resultsDir: string;
  workDir: string;
  compiler: string;
  fetchTimeoutMs: number;
  connectTimeoutMs: number;
  reproTimeoutMs: number;
  maxOutputChars: number;
}

export const DEFAULT_INTERNAL_KERNEL_CONFIG_URL =
  "https://syzkaller.appspot.com/text?tag=KernelConfig&x=c3820d4fff43c7a3";

function getEnv(
  name: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const value = env[name] || fallback;
  if (!value) {
    throw new Error(`Missing required environment variable ${name}`);
  }
  return value;
}

function getNumberEnv(
  name: string,
  fallback: number,
  env: NodeJS.ProcessEnv
): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `Environment variable ${name} must be a positive integer, got "${raw}"`
    );
  }
  return value;
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s: string) => s.trim())
    .filter(Boolean);
}

/**
 * Builds the triage configuration from environment variables. Call
 * `dotenv.config()` first to pick up a local `.env` file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TriageConfig {
  return {
    vm: {
      host: getEnv("VM_HOST", "localhost", env),
      port: getNumberEnv("VM_PORT", 5555, env),
      user: getEnv("VM_USER", "root", env),
      sshKey: getEnv("VM_SSH_KEY", undefined, env),
      image: env.VM_IMAGE || undefined,
      consoleLog: env.VM_CONSOLE_LOG || undefined,
    },
    internalKernelConfigUrl: getEnv(
      "INTERNAL_KERNEL_CONFIG_URL",
      DEFAULT_INTERNAL_KERNEL_CONFIG_URL,
      env
    ),
    internalBugsFile: getEnv(
      "INTERNAL_BUGS_FILE",
      path.join("data", "internal_bugs.json"),
      env
    ),
    internalReproDir: getEnv("INTERNAL_REPRO_DIR", "internal-repro", env),
    bugUrls: splitList(env.TRIAGE_BUG_URLS),
    resultsDir: getEnv("TRIAGE_RESULTS_DIR", "data", env),
    workDir: getEnv(
      "TRIAGE_WORK_DIR",
      path.join(os.tmpdir(), "fuzz-triage"),
      env
    ),
    compiler: getEnv("REPRO_CC", "clang", env),
    fetchTimeoutMs: getNumberEnv("FETCH_TIMEOUT_MS", 30_000, env),
    connectTimeoutMs: getNumberEnv("CONNECT_TIMEOUT_MS", 15_000, env),
    // the reproducer is given this long before its output is collected
    reproTimeoutMs: getNumberEnv("REPRO_TIMEOUT_MS", 30_000, env),
    maxOutputChars: getNumberEnv("MAX_OUTPUT_CHARS", 65_536, env),
  };
}
