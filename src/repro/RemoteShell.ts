import { execa } from "execa";
import type { VmTarget } from "../config.js";

export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export interface ShellOptions {
  timeoutMs?: number;
}

export interface RemoteShell {
  readonly target: VmTarget;
  exec(command: string, options?: ShellOptions): Promise<ShellResult>;
  upload(
    localPath: string,
    remotePath: string,
    options?: ShellOptions
  ): Promise<ShellResult>;
}

/** ssh reports its own failures (unreachable host, auth) with this code. */
export const SSH_TRANSPORT_EXIT_CODE = 255;

export type CommandRunner = (
  file: string,
  args: string[],
  options: ShellOptions
) => Promise<ShellResult>;

export const runCommand: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    reject: false,
    timeout: options.timeoutMs,
    stdin: "ignore",
  });

  // no exit code when the process could not be spawned or was killed
  const exitCode = typeof result.exitCode === "number" ? result.exitCode : -1;
  const spawnFailed = exitCode === -1 && !result.timedOut;

  return {
    stdout: result.stdout,
    stderr: result.stderr || (spawnFailed ? `${file} could not be started` : ""),
    exitCode,
    timedOut: result.timedOut,
  };
};

export function sshOptions(target: VmTarget, connectTimeoutMs: number): string[] {
  return [
    "-i",
    target.sshKey,
    "-o",
    "IdentitiesOnly=yes",
    "-o",
    "BatchMode=yes",
    "-o",
    "NoHostAuthenticationForLocalhost=yes",
    "-o",
    `ConnectTimeout=${Math.max(1, Math.ceil(connectTimeoutMs / 1000))}`,
  ];
}

export class SshRemoteShell implements RemoteShell {
  constructor(
    public readonly target: VmTarget,
    private readonly connectTimeoutMs: number,
    private readonly run: CommandRunner = runCommand
  ) {}

  exec(command: string, options: ShellOptions = {}): Promise<ShellResult> {
    return this.run(
      "ssh",
      [
        "-p",
        String(this.target.port),
        ...sshOptions(this.target, this.connectTimeoutMs),
        `${this.target.user}@${this.target.host}`,
        command,
      ],
      options
    );
  }

  upload(
    localPath: string,
    remotePath: string,
    options: ShellOptions = {}
  ): Promise<ShellResult> {
    return this.run(
      "scp",
      [
        "-P",
        String(this.target.port),
        ...sshOptions(this.target, this.connectTimeoutMs),
        localPath,
        `${this.target.user}@${this.target.host}:${remotePath}`,
      ],
      options
    );
  }
}
