import fs from "node:fs";
import { REQUIRED_TOOLS } from "./constants";
import { EnvironmentError } from "./errors";
import type { HostTools } from "./exec";
import { publicKeyPath } from "./ssh-keys";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export interface PreflightOptions {
  sshKeyPath: string;
  platform?: NodeJS.Platform;
  nodeVersion?: string;
}

const TOOL_PACKAGES: Record<(typeof REQUIRED_TOOLS)[number], string> = {
  virsh: "libvirt-client",
  "virt-install": "virt-install",
  "qemu-img": "qemu-img",
  genisoimage: "genisoimage",
  curl: "curl",
  "ssh-keygen": "openssh-clients"
};

export async function checkTools(tools: HostTools): Promise<PreflightCheck[]> {
  const checks: PreflightCheck[] = [];
  for (const tool of REQUIRED_TOOLS) {
    const found = await tools.commandExists(tool);
    checks.push({
      key: `tool:${tool}`,
      ok: found,
      message: found ? `${tool} found` : `${tool} not found`,
      fix: found ? undefined : `Install the ${TOOL_PACKAGES[tool]} package.`,
      suggestedCommands: found ? undefined : [`sudo dnf install -y ${TOOL_PACKAGES[tool]}`]
    });
  }
  return checks;
}

export async function checkLibvirt(tools: HostTools): Promise<PreflightCheck> {
  const result = await tools.exec("systemctl", ["is-active", "--quiet", "libvirtd"], {
    allowNonZeroExit: true,
    timeoutMs: 10_000
  });
  const active = result.exitCode === 0;
  return {
    key: "libvirtd",
    ok: active,
    message: active ? "libvirtd is running" : "libvirtd is not running",
    fix: active ? undefined : "Start the libvirt daemon.",
    suggestedCommands: active ? undefined : ["sudo systemctl start libvirtd"]
  };
}

export async function runPreflight(tools: HostTools, options: PreflightOptions): Promise<PreflightReport> {
  const checks: PreflightCheck[] = [];

  const platform = options.platform ?? process.platform;
  checks.push({
    key: "host",
    ok: platform === "linux",
    message: platform === "linux" ? "Host platform is Linux" : `Unsupported host platform: ${platform}`,
    fix: platform === "linux" ? undefined : "Run the harness on a Linux host with KVM and libvirt."
  });

  const nodeVersion = options.nodeVersion ?? process.versions.node;
  const nodeMajor = Number(nodeVersion.split(".")[0] ?? "0");
  checks.push({
    key: "node",
    ok: Number.isFinite(nodeMajor) && nodeMajor >= 20,
    message: `Node.js v${nodeVersion}`,
    fix: nodeMajor >= 20 ? undefined : "Install Node.js 20 or newer."
  });

  checks.push(...(await checkTools(tools)));
  checks.push(await checkLibvirt(tools));

  const hasKey = fs.existsSync(options.sshKeyPath) && fs.existsSync(publicKeyPath(options.sshKeyPath));
  checks.push({
    key: "ssh-key",
    ok: true,
    message: hasKey ? `SSH key present at ${options.sshKeyPath}` : `SSH key will be generated at ${options.sshKeyPath} on create`
  });

  return { checks, ok: checks.every((check) => check.ok) };
}

/** Fails fast when the host cannot drive libvirt at all. */
export async function assertEnvironment(tools: HostTools): Promise<void> {
  const checks = [...(await checkTools(tools)), await checkLibvirt(tools)];
  const failed = checks.filter((check) => !check.ok);
  if (failed.length === 0) {
    return;
  }
  throw new EnvironmentError(
    failed.map((check) => check.message).join("; "),
    failed
      .map((check) => check.fix)
      .filter(Boolean)
      .join(" ")
  );
}
