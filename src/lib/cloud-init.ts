import {
  SETUP_SENTINEL_PATH,
  SNAIL_CONFIG_DIR,
  SNAIL_CONFIG_PATH,
  SNAIL_INSTALL_PATH,
  SNAIL_OUTPUT_DIR,
  SNAIL_VENV_PATH
} from "./constants";
import type { AgentSettings, Credentials, Distribution, VmInstance } from "./types";

export type PackageManager = "dnf" | "apt";
export type FailurePolicy = "ignore" | "abort";

export interface BootstrapStep {
  run: string;
  onFailure: FailurePolicy;
}

export interface BootstrapUser {
  name: string;
  sudo: string;
  groups: string[];
  shell: string;
  authorizedKeys: string[];
}

export interface WriteFile {
  path: string;
  permissions: string;
  content: string;
}

export interface BootstrapPayload {
  hostname: string;
  fqdn: string;
  user: BootstrapUser;
  password: string;
  packages: string[];
  steps: BootstrapStep[];
  writeFiles: WriteFile[];
  finalMessage: string;
}

const TRIVY_INSTALL =
  "curl -sfL https://raw.githubusercontent.com/aquasecurity/trivy/main/contrib/install.sh | sh -s -- -b /usr/local/bin";

const BASE_PACKAGES = ["python3", "python3-pip", "git", "curl", "vim", "lsof", "lshw", "pciutils", "usbutils"];

interface PackageManagerProfile {
  venvPackage: string;
  adminGroup: string;
  refresh: string;
  securityTools: string;
}

const PROFILES: Record<PackageManager, PackageManagerProfile> = {
  dnf: {
    venvPackage: "python3-virtualenv",
    adminGroup: "wheel",
    refresh: "dnf update -y",
    securityTools: "dnf install -y openscap-scanner scap-security-guide"
  },
  apt: {
    venvPackage: "python3-venv",
    adminGroup: "sudo",
    refresh: "apt-get update -y",
    securityTools: "DEBIAN_FRONTEND=noninteractive apt-get install -y lynis"
  }
};

export function packageManagerFor(distribution: Distribution): PackageManager {
  return distribution === "debian" || distribution === "ubuntu" ? "apt" : "dnf";
}

export function buildBootstrapPayload(
  instance: VmInstance,
  credentials: Credentials,
  agent: AgentSettings
): BootstrapPayload {
  const profile = PROFILES[packageManagerFor(instance.spec.distribution)];
  const snail = `${SNAIL_VENV_PATH}/bin/snail`;

  const steps: BootstrapStep[] = [
    abort(profile.refresh),
    ignore(profile.securityTools),
    ignore(TRIVY_INSTALL),
    abort(`git clone ${shellQuote(agent.repoUrl)} ${SNAIL_INSTALL_PATH}`),
    abort(`python3 -m venv ${SNAIL_VENV_PATH}`),
    abort(`${SNAIL_VENV_PATH}/bin/pip install --upgrade pip`),
    abort(`${SNAIL_VENV_PATH}/bin/pip install -e ${SNAIL_INSTALL_PATH}`),
    abort(`mkdir -p ${SNAIL_CONFIG_DIR}`),
    abort(heredoc(SNAIL_CONFIG_PATH, "SNAILCONFIG", renderAgentConfig(agent))),
    abort(heredoc("/etc/systemd/system/snail-core.service", "SNAILSERVICE", renderServiceUnit(agent))),
    abort(heredoc("/etc/systemd/system/snail-core.timer", "SNAILTIMER", renderTimerUnit())),
    abort(`mkdir -p ${SNAIL_OUTPUT_DIR}`),
    abort(`ln -sf ${snail} /usr/local/bin/snail`),
    abort("systemctl daemon-reload"),
    abort("systemctl enable snail-core.timer"),
    abort("systemctl start snail-core.timer"),
    ignore(`SNAIL_API_KEY=${shellQuote(agent.apiKey)} ${snail} run`),
    abort(`touch ${SETUP_SENTINEL_PATH}`)
  ];

  return {
    hostname: instance.name,
    fqdn: `${instance.name}.local`,
    user: {
      name: credentials.username,
      sudo: "ALL=(ALL) NOPASSWD:ALL",
      groups: [profile.adminGroup, "systemd-journal"],
      shell: "/bin/bash",
      authorizedKeys: credentials.sshPublicKey ? [credentials.sshPublicKey] : []
    },
    password: credentials.password,
    packages: [...BASE_PACKAGES.slice(0, 2), profile.venvPackage, ...BASE_PACKAGES.slice(2)],
    steps,
    writeFiles: [
      {
        path: "/etc/profile.d/snail.sh",
        permissions: "0644",
        content: `export SNAIL_API_KEY=${shellQuote(agent.apiKey)}\nalias snail="${snail}"\n`
      }
    ],
    finalMessage: `Snail Core VM ${instance.name} is ready! Setup took $UPTIME seconds.`
  };
}

export function renderAgentConfig(agent: AgentSettings): string {
  return [
    "upload:",
    `  url: ${JSON.stringify(agent.apiEndpoint)}`,
    "  enabled: true",
    "  timeout: 30",
    "  retries: 3",
    "auth:",
    `  api_key: ${JSON.stringify(agent.apiKey)}`,
    "collection:",
    "  enabled_collectors: []",
    "  disabled_collectors: []",
    "  timeout: 300",
    "output:",
    `  dir: ${SNAIL_OUTPUT_DIR}`,
    "  keep_local: true",
    "  compress: true",
    "logging:",
    `  level: ${agent.logLevel}`
  ].join("\n");
}

function renderServiceUnit(agent: AgentSettings): string {
  return [
    "[Unit]",
    "Description=Snail Core System Collection",
    "After=network-online.target",
    "Wants=network-online.target",
    "",
    "[Service]",
    "Type=oneshot",
    `ExecStart=${SNAIL_VENV_PATH}/bin/snail run`,
    `Environment="SNAIL_API_KEY=${agent.apiKey}"`,
    "",
    "[Install]",
    "WantedBy=multi-user.target"
  ].join("\n");
}

function renderTimerUnit(): string {
  return [
    "[Unit]",
    "Description=Run Snail Core periodically",
    "",
    "[Timer]",
    "OnBootSec=2min",
    "OnUnitActiveSec=5min",
    "",
    "[Install]",
    "WantedBy=timers.target"
  ].join("\n");
}

export function renderUserData(payload: BootstrapPayload): string {
  const lines = [
    "#cloud-config",
    `hostname: ${quote(payload.hostname)}`,
    `fqdn: ${quote(payload.fqdn)}`,
    "",
    "users:",
    `  - name: ${quote(payload.user.name)}`,
    `    sudo: ${quote(payload.user.sudo)}`,
    `    groups: ${quote(payload.user.groups.join(", "))}`,
    `    shell: ${quote(payload.user.shell)}`,
    "    lock_passwd: false",
    ...(payload.user.authorizedKeys.length > 0
      ? ["    ssh_authorized_keys:", ...payload.user.authorizedKeys.map((key) => `      - ${quote(key)}`)]
      : ["    ssh_authorized_keys: []"]),
    "",
    "chpasswd:",
    "  list: |",
    `    ${payload.user.name}:${payload.password}`,
    "  expire: false",
    "",
    "ssh_pwauth: true",
    "",
    "packages:",
    ...payload.packages.map((pkg) => `  - ${quote(pkg)}`),
    "",
    "runcmd:",
    ...payload.steps.flatMap(renderStep),
    "",
    "write_files:",
    ...payload.writeFiles.flatMap((file) => [
      `  - path: ${quote(file.path)}`,
      `    permissions: ${quote(file.permissions)}`,
      "    content: |",
      ...indentBlock(file.content.replace(/\n$/, ""), 6)
    ]),
    "",
    `final_message: ${quote(payload.finalMessage)}`
  ];
  return `${lines.join("\n")}\n`;
}

export function renderMetaData(instance: VmInstance): string {
  return `instance-id: ${instance.name}\nlocal-hostname: ${instance.name}\n`;
}

/**
 * runcmd items run as one plain sh script, so each step carries its own
 * policy: abort steps end the script, ignore steps swallow their status.
 */
export function renderStep(step: BootstrapStep): string[] {
  const suffix = step.onFailure === "ignore" ? "|| true" : "|| exit 1";
  if (!step.run.includes("\n")) {
    return [`  - ${quote(`${step.run} ${suffix}`)}`];
  }
  return ["  - |", ...indentBlock(`{\n${step.run}\n} ${suffix}`, 4)];
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}

function heredoc(target: string, delimiter: string, content: string): string {
  return `cat > ${target} << '${delimiter}'\n${content}\n${delimiter}`;
}

function indentBlock(text: string, width: number): string[] {
  const pad = " ".repeat(width);
  return text.split("\n").map((line) => (line ? `${pad}${line}` : ""));
}

function quote(value: string): string {
  return JSON.stringify(value);
}

function abort(run: string): BootstrapStep {
  return { run, onFailure: "abort" };
}

function ignore(run: string): BootstrapStep {
  return { run, onFailure: "ignore" };
}
