import { spawn } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args?: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string) {
    super(`Command failed (${exitCode}): ${command}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export async function runCommand(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
  const timeoutMs = options.timeoutMs ?? 60_000;
  const env = options.env ? { ...process.env, ...options.env } : process.env;

  return await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const timeoutHandle = setTimeout(() => {
      child.kill("SIGTERM");
      if (!settled) {
        settled = true;
        reject(new Error(`Command timed out after ${timeoutMs}ms: ${formatCommand(command, args)}`));
      }
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });

    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      clearTimeout(timeoutHandle);
      if (!settled) {
        settled = true;
        reject(error);
      }
    });

    child.on("close", (code) => {
      clearTimeout(timeoutHandle);
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode !== 0 && !options.allowNonZeroExit) {
        if (!settled) {
          settled = true;
          reject(new CommandError(formatCommand(command, args), exitCode, stdout.trim(), stderr.trim()));
        }
        return;
      }
      if (!settled) {
        settled = true;
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode });
      }
    });
  });
}

export async function runInteractive(command: string, args: string[] = []): Promise<number> {
  return await new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "inherit" });

    child.on("error", reject);
    child.on("close", (code) => {
      resolve(typeof code === "number" ? code : 1);
    });
  });
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export type SudoMode = "auto" | "always" | "never";

/**
 * Runs host tools, prefixing `sudo` for calls that touch libvirt or the
 * root-owned image directory.
 */
export class HostTools {
  private readonly run: CommandRunner;
  private readonly useSudo: boolean;

  constructor(run: CommandRunner, sudo: SudoMode, isRoot = process.getuid?.() === 0) {
    this.run = run;
    this.useSudo = sudo === "always" || (sudo === "auto" && !isRoot);
  }

  get sudo(): boolean {
    return this.useSudo;
  }

  async exec(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    return await this.run(command, args, options);
  }

  async privileged(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    const argv = this.privilegedArgv(command, args);
    return await this.run(argv.command, argv.args, options);
  }

  privilegedArgv(command: string, args: string[] = []): { command: string; args: string[] } {
    return this.useSudo ? { command: "sudo", args: [command, ...args] } : { command, args };
  }

  async commandExists(command: string): Promise<boolean> {
    const result = await this.run("which", [command], { allowNonZeroExit: true, timeoutMs: 5000 });
    return result.exitCode === 0 && result.stdout.length > 0;
  }
}
