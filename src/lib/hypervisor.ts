import { DomainNotFoundError } from "./errors";
import type { HostTools } from "./exec";
import { matchesNamingConvention, sortDomainNames } from "./naming";
import type { DomainState } from "./types";

export interface DomainDefinition {
  name: string;
  memoryMb: number;
  vcpus: number;
  diskPath: string;
  diskGb: number;
  seedVolumePath: string;
  osVariant: string;
  network: string;
}

export interface UndefineOptions {
  removeAllStorage?: boolean;
}

/** The slice of libvirt the harness drives. */
export interface Hypervisor {
  listDomains(): Promise<string[]>;
  domainExists(name: string): Promise<boolean>;
  domainState(name: string): Promise<DomainState>;
  domainAddresses(name: string): Promise<string[]>;
  createDomain(definition: DomainDefinition): Promise<void>;
  start(name: string): Promise<void>;
  shutdown(name: string): Promise<void>;
  forceStop(name: string): Promise<void>;
  undefine(name: string, options?: UndefineOptions): Promise<void>;
}

export class VirshHypervisor implements Hypervisor {
  private readonly tools: HostTools;

  constructor(tools: HostTools) {
    this.tools = tools;
  }

  async listDomains(): Promise<string[]> {
    const result = await this.tools.privileged("virsh", ["list", "--all", "--name"], { timeoutMs: 20_000 });
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async domainExists(name: string): Promise<boolean> {
    const domains = await this.listDomains();
    return domains.includes(name);
  }

  async domainState(name: string): Promise<DomainState> {
    const result = await this.tools.privileged("virsh", ["domstate", name], {
      allowNonZeroExit: true,
      timeoutMs: 15_000
    });
    if (result.exitCode !== 0 || !result.stdout) {
      return "unknown";
    }
    return result.stdout.split("\n")[0].trim();
  }

  async domainAddresses(name: string): Promise<string[]> {
    const result = await this.tools.privileged("virsh", ["domifaddr", name], {
      allowNonZeroExit: true,
      timeoutMs: 15_000
    });
    if (result.exitCode !== 0) {
      return [];
    }
    return parseDomifaddr(result.stdout);
  }

  async createDomain(definition: DomainDefinition): Promise<void> {
    await this.tools.privileged("virt-install", buildVirtInstallArgs(definition), { timeoutMs: 300_000 });
  }

  async start(name: string): Promise<void> {
    await this.tools.privileged("virsh", ["start", name], { timeoutMs: 60_000 });
  }

  async shutdown(name: string): Promise<void> {
    await this.tools.privileged("virsh", ["shutdown", name], { timeoutMs: 60_000 });
  }

  async forceStop(name: string): Promise<void> {
    await this.tools.privileged("virsh", ["destroy", name], { timeoutMs: 60_000 });
  }

  async undefine(name: string, options: UndefineOptions = {}): Promise<void> {
    const args = ["undefine", name];
    if (options.removeAllStorage) {
      args.push("--remove-all-storage");
    }
    await this.tools.privileged("virsh", args, { timeoutMs: 60_000 });
  }
}

/** Fleet domains under the prefix, in natural order (`-2` before `-10`). */
export async function listFleetDomains(hypervisor: Hypervisor, prefix: string): Promise<string[]> {
  const domains = await hypervisor.listDomains();
  return sortDomainNames(domains.filter((name) => matchesNamingConvention(prefix, name)));
}

export type FleetSelector = { kind: "all"; prefix: string } | { kind: "one"; name: string; prefix: string };

/** Names a selector refers to. An explicit name that libvirt does not know is an error. */
export async function selectFleetDomains(hypervisor: Hypervisor, selector: FleetSelector): Promise<string[]> {
  if (selector.kind === "all") {
    return await listFleetDomains(hypervisor, selector.prefix);
  }
  const domains = await hypervisor.listDomains();
  if (!domains.includes(selector.name)) {
    throw new DomainNotFoundError(selector.name, await listFleetDomains(hypervisor, selector.prefix));
  }
  return [selector.name];
}

export function buildVirtInstallArgs(definition: DomainDefinition): string[] {
  return [
    "--name", definition.name,
    "--memory", String(definition.memoryMb),
    "--vcpus", String(definition.vcpus),
    "--disk", `${definition.diskPath},size=${definition.diskGb},format=qcow2`,
    "--disk", `${definition.seedVolumePath},device=cdrom,readonly=on`,
    "--os-variant", definition.osVariant,
    "--network", `network=${definition.network}`,
    "--graphics", "none",
    "--console", "pty,target_type=serial",
    "--import",
    "--noautoconsole",
    "--wait", "0"
  ];
}

/**
 * Extracts IPv4 addresses from `virsh domifaddr` output:
 *
 *   Name       MAC address          Protocol     Address
 *  -------------------------------------------------------------------------------
 *   vnet0      52:54:00:6b:3c:01    ipv4         192.168.122.45/24
 */
export function parseDomifaddr(output: string): string[] {
  const addresses: string[] = [];
  for (const line of output.split("\n")) {
    const columns = line.trim().split(/\s+/);
    if (columns.length < 4 || columns[2] !== "ipv4") {
      continue;
    }
    const address = columns[3].split("/")[0];
    if (isIPv4(address)) {
      addresses.push(address);
    }
  }
  return addresses;
}

export function isIPv4(value: string): boolean {
  const parts = value.split(".");
  return parts.length === 4 && parts.every((part) => /^[0-9]{1,3}$/.test(part) && Number(part) <= 255);
}

/** RFC 1918 ranges: the libvirt NAT networks hand these out. */
export function isPrivateIPv4(value: string): boolean {
  if (!isIPv4(value)) {
    return false;
  }
  const [a, b] = value.split(".").map(Number);
  return a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168);
}
