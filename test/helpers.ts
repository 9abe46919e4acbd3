import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CommandError, formatCommand, type CommandRunner, type RunOptions, type RunResult } from "../src/lib/exec";
import type { DomainDefinition, Hypervisor, UndefineOptions } from "../src/lib/hypervisor";
import type { Logger } from "../src/lib/log";
import type { Clock } from "../src/lib/poller";
import type { AgentSettings, Credentials, VmInstance } from "../src/lib/types";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Matcher = (call: RecordedCall) => boolean;
type Responder = (call: RecordedCall) => Partial<RunResult> | Promise<Partial<RunResult>>;

/** Stands in for `runCommand`: records every call and answers from registered handlers. */
export class FakeRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers: { match: Matcher; respond: Responder }[] = [];

  on(match: string | Matcher, result: Partial<RunResult> = {}): this {
    return this.handle(match, () => result);
  }

  handle(match: string | Matcher, respond: Responder): this {
    const matcher: Matcher = typeof match === "string" ? (call) => lineOf(call).startsWith(match) : match;
    this.handlers.push({ match: matcher, respond });
    return this;
  }

  lines(): string[] {
    return this.calls.map(lineOf);
  }

  readonly run: CommandRunner = async (command, args = [], options = {}) => {
    const call: RecordedCall = { command, args, options };
    this.calls.push(call);
    const handler = this.handlers.find((item) => item.match(call));
    const partial = handler ? await handler.respond(call) : {};
    const result: RunResult = { stdout: partial.stdout ?? "", stderr: partial.stderr ?? "", exitCode: partial.exitCode ?? 0 };
    if (result.exitCode !== 0 && !options.allowNonZeroExit) {
      throw new CommandError(formatCommand(command, args), result.exitCode, result.stdout, result.stderr);
    }
    return result;
  };
}

export function lineOf(call: RecordedCall): string {
  return formatCommand(call.command, call.args);
}

interface FakeDomain {
  state: string;
  addresses: string[];
}

/** In-memory libvirt. Queues let a test script what successive queries return. */
export class FakeHypervisor implements Hypervisor {
  readonly domains = new Map<string, FakeDomain>();
  readonly created: DomainDefinition[] = [];
  readonly calls: string[] = [];
  readonly addressQueue = new Map<string, string[][]>();
  readonly stateQueue = new Map<string, string[]>();
  readonly failures = new Map<string, Error>();
  readonly undefineOptions: UndefineOptions[] = [];

  add(name: string, state = "running", addresses: string[] = []): this {
    this.domains.set(name, { state, addresses });
    return this;
  }

  failOn(operation: string, name: string, error = new Error(`${operation} ${name} failed`)): this {
    this.failures.set(`${operation}:${name}`, error);
    return this;
  }

  async listDomains(): Promise<string[]> {
    this.calls.push("list");
    return [...this.domains.keys()];
  }

  async domainExists(name: string): Promise<boolean> {
    return this.domains.has(name);
  }

  async domainState(name: string): Promise<string> {
    this.calls.push(`state:${name}`);
    this.raise("state", name);
    const queued = this.stateQueue.get(name)?.shift();
    if (queued !== undefined) {
      return queued;
    }
    return this.domains.get(name)?.state ?? "unknown";
  }

  async domainAddresses(name: string): Promise<string[]> {
    this.calls.push(`addresses:${name}`);
    this.raise("addresses", name);
    const queued = this.addressQueue.get(name)?.shift();
    if (queued !== undefined) {
      return queued;
    }
    return this.domains.get(name)?.addresses ?? [];
  }

  async createDomain(definition: DomainDefinition): Promise<void> {
    this.calls.push(`create:${definition.name}`);
    this.raise("create", definition.name);
    this.created.push(definition);
    this.domains.set(definition.name, { state: "running", addresses: [] });
  }

  async start(name: string): Promise<void> {
    this.calls.push(`start:${name}`);
    this.raise("start", name);
    this.setState(name, "running");
  }

  async shutdown(name: string): Promise<void> {
    this.calls.push(`shutdown:${name}`);
    this.raise("shutdown", name);
    this.setState(name, "shut off");
  }

  async forceStop(name: string): Promise<void> {
    this.calls.push(`destroy:${name}`);
    this.raise("destroy", name);
    this.setState(name, "shut off");
  }

  async undefine(name: string, options: UndefineOptions = {}): Promise<void> {
    this.calls.push(`undefine:${name}`);
    this.raise("undefine", name);
    this.undefineOptions.push(options);
    this.domains.delete(name);
  }

  private setState(name: string, state: string): void {
    const domain = this.domains.get(name);
    if (domain) {
      domain.state = state;
    }
  }

  private raise(operation: string, name: string): void {
    const error = this.failures.get(`${operation}:${name}`);
    if (error) {
      throw error;
    }
  }
}

export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

export type LogLevel = keyof Logger;

export class RecordingLogger implements Logger {
  readonly entries: { level: LogLevel; message: string }[] = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  success(message: string): void {
    this.entries.push({ level: "success", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  step(message: string): void {
    this.entries.push({ level: "step", message });
  }

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export async function makeTempDir(prefix = "snail-harness-test-"): Promise<string> {
  return await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/** Value written after `-o` in a curl call, or undefined. */
export function curlOutputPath(call: RecordedCall): string | undefined {
  const idx = call.args.indexOf("-o");
  return idx === -1 ? undefined : call.args[idx + 1];
}

export function qcow2Bytes(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  Buffer.from([0x51, 0x46, 0x49, 0xfb]).copy(buffer, 0);
  return buffer;
}

export const testCredentials: Credentials = {
  username: "snail",
  password: "test-password",
  sshPublicKey: "ssh-ed25519 AAAATESTKEY snail-test-vms"
};

export const testAgent: AgentSettings = {
  repoUrl: "https://example.test/snail-core.git",
  apiEndpoint: "http://192.168.122.1:8080/api/v1/ingest",
  apiKey: "test-secret",
  logLevel: "INFO"
};

export function testInstance(overrides: Partial<VmInstance> = {}): VmInstance {
  return {
    name: "snail-test-fedora-42-1",
    spec: { distribution: "fedora", version: "42" },
    index: 1,
    diskPath: "/images/snail-test-fedora-42-1.qcow2",
    seedVolumePath: "/seeds/snail-test-fedora-42-1/cloud-init.iso",
    ...overrides
  };
}
