import path from "node:path";
import { DEFAULT_SPECS, DEFAULT_VM_PREFIX } from "./constants";
import { CliError } from "./errors";
import type { SudoMode } from "./exec";
import type { AgentSettings, VmResources } from "./types";
import { normalizeInputPath } from "./utils";

export interface HarnessConfig {
  prefix: string;
  countPerSpec: number;
  defaultSpecs: string;
  resources: VmResources;
  network: string;

  imageDir: string;
  seedDir: string;
  manifestPath: string;

  sshKeyPath: string;
  vmUser: string;
  vmPassword: string;

  agent: AgentSettings;

  sudo: SudoMode;
  concurrency: number;
  waitTimeoutMs: number;
  waitIntervalMs: number;
}

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
}

/**
 * Reads every tunable from the environment. This is the only place the
 * process environment is consulted; components receive the result.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: LoadConfigOptions = {}): HarnessConfig {
  const cwd = options.cwd ?? process.cwd();
  const resolvePath = (value: string) => path.resolve(cwd, normalizeInputPath(value, options.homeDir));

  return {
    prefix: env.VM_PREFIX || DEFAULT_VM_PREFIX,
    countPerSpec: positiveInt(env, "VM_COUNT", 5),
    defaultSpecs: env.VM_SPECS || DEFAULT_SPECS,
    resources: {
      memoryMb: positiveInt(env, "MEMORY_MB", 2048),
      vcpus: positiveInt(env, "VCPUS", 2),
      diskGb: positiveInt(env, "DISK_SIZE_GB", 15)
    },
    network: env.VM_NETWORK || "default",

    imageDir: resolvePath(env.IMAGE_DIR || "/var/lib/libvirt/images"),
    seedDir: resolvePath(env.CLOUDINIT_DIR || "/tmp/snail-test-cloudinit"),
    manifestPath: resolvePath(env.FLEET_MANIFEST || "vm-list.txt"),

    sshKeyPath: resolvePath(env.SSH_KEY_PATH || "~/.ssh/snail-test-key"),
    vmUser: env.VM_USER || "snail",
    vmPassword: env.VM_PASSWORD || "snailtest123",

    agent: {
      repoUrl: env.SNAIL_REPO || "https://github.com/sluggisty/snail-core",
      apiEndpoint: env.SNAIL_API_ENDPOINT || "http://192.168.122.1:8080/api/v1/ingest",
      apiKey: env.SNAIL_API_KEY || "test-api-key-12345",
      logLevel: (env.SNAIL_LOG_LEVEL || "INFO").toUpperCase()
    },

    sudo: sudoMode(env.HARNESS_SUDO),
    concurrency: positiveInt(env, "HARNESS_CONCURRENCY", 1),
    waitTimeoutMs: positiveInt(env, "WAIT_TIMEOUT_SEC", 300) * 1000,
    waitIntervalMs: positiveInt(env, "WAIT_INTERVAL_SEC", 10) * 1000
  };
}

export function parsePositiveInt(raw: string, label: string): number {
  const trimmed = raw.trim();
  const numeric = Number(trimmed);
  if (trimmed === "" || !Number.isInteger(numeric) || numeric < 1) {
    throw new CliError({
      kind: "validation",
      message: `${label} must be a positive integer (got '${raw}').`
    });
  }
  return numeric;
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  return parsePositiveInt(raw, key);
}

function sudoMode(raw?: string): SudoMode {
  const value = (raw || "auto").trim().toLowerCase();
  if (value === "auto" || value === "always" || value === "never") {
    return value;
  }
  throw new CliError({
    kind: "validation",
    message: `HARNESS_SUDO must be one of auto, always, never (got '${raw}').`
  });
}
