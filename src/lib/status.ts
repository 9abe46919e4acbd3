import chalk from "chalk";
import { SETUP_SENTINEL_PATH } from "./constants";
import { errorMessage } from "./errors";
import type { HostTools } from "./exec";
import { isPrivateIPv4, listFleetDomains, type Hypervisor } from "./hypervisor";
import { silentLogger, type Logger } from "./log";
import { renderTable } from "./table";
import type { SetupStatus, VmStatus } from "./types";

export type StatusFormat = "table" | "json" | "list" | "ips";

export const STATUS_FORMATS: readonly StatusFormat[] = ["table", "json", "list", "ips"];

export interface SshSettings {
  keyPath: string;
  user: string;
}

export interface StatusDeps {
  hypervisor: Hypervisor;
  tools: HostTools;
  ssh: SshSettings;
  logger?: Logger;
}

export interface CollectOptions {
  probe?: boolean;
  /** Restrict to these names, e.g. the last fleet manifest. */
  only?: readonly string[];
}

export interface RenderOptions {
  colorize?: boolean;
}

export function buildSshArgs(ssh: SshSettings, ip: string, remote: string[] = [], batch = true): string[] {
  const args = ["-i", ssh.keyPath, "-o", "ConnectTimeout=5", "-o", "StrictHostKeyChecking=no"];
  if (batch) {
    args.push("-o", "BatchMode=yes");
  } else {
    args.push("-o", "UserKnownHostsFile=/dev/null");
  }
  args.push(`${ssh.user}@${ip}`, ...remote);
  return args;
}

export async function probeSetupStatus(ip: string, ssh: SshSettings, tools: HostTools): Promise<SetupStatus> {
  const attempt = async (remote: string[]): Promise<boolean> => {
    const result = await tools.exec("ssh", buildSshArgs(ssh, ip, remote), {
      allowNonZeroExit: true,
      timeoutMs: 15_000
    });
    return result.exitCode === 0;
  };

  try {
    if (await attempt(["test", "-f", SETUP_SENTINEL_PATH])) {
      return "ready";
    }
    return (await attempt(["true"])) ? "setup" : "unreachable";
  } catch {
    return "unreachable";
  }
}

export async function collectStatus(prefix: string, options: CollectOptions, deps: StatusDeps): Promise<VmStatus[]> {
  const logger = deps.logger ?? silentLogger;
  const listed = await listFleetDomains(deps.hypervisor, prefix);
  const names = options.only ? listed.filter((name) => options.only?.includes(name)) : listed;
  const rows: VmStatus[] = [];

  for (const name of names) {
    const state = await deps.hypervisor.domainState(name).catch((error: unknown) => {
      logger.debug(`State query for ${name} failed: ${errorMessage(error)}`);
      return "unknown";
    });
    const addresses = await deps.hypervisor.domainAddresses(name).catch(() => []);
    const ip = addresses.find(isPrivateIPv4);

    let setupStatus: SetupStatus = "unknown";
    if (options.probe && state === "running" && ip) {
      setupStatus = await probeSetupStatus(ip, deps.ssh, deps.tools);
    }
    rows.push({ name, state, ip, setupStatus });
  }
  return rows;
}

export function renderStatus(rows: VmStatus[], format: StatusFormat, options: RenderOptions = {}): string {
  switch (format) {
    case "json":
      return JSON.stringify(
        {
          vms: rows.map((row) => ({
            name: row.name,
            ip: row.ip ?? null,
            state: row.state,
            setup_status: row.setupStatus
          }))
        },
        null,
        2
      );
    case "list":
      return rows
        .filter((row) => row.ip)
        .map((row) => `${row.name}:${row.ip}`)
        .join("\n");
    case "ips":
      return rows.flatMap((row) => (row.ip ? [row.ip] : [])).join("\n");
    case "table":
      return renderStatusTable(rows, options.colorize ?? true);
  }
}

export function displayState(state: string): string {
  return state === "shut off" ? "stopped" : state;
}

function renderStatusTable(rows: VmStatus[], colorize: boolean): string {
  const body = rows.map((row) => [row.name, row.ip ?? "pending...", displayState(row.state), row.setupStatus]);
  return renderTable(["NAME", "IP", "STATE", "SETUP"], body, {
    formatCell: colorize
      ? (padded, raw, column) => {
          if (column !== 2) {
            return padded;
          }
          if (raw === "running") {
            return chalk.green(padded);
          }
          return raw === "stopped" ? chalk.yellow(padded) : chalk.red(padded);
        }
      : undefined
  });
}
