import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig, parsePositiveInt } from "../src/lib/config";
import { CliError } from "../src/lib/errors";

const location = { cwd: "/work", homeDir: "/home/tester" };

test("loadConfig applies defaults for an empty environment", () => {
  const config = loadConfig({}, location);
  assert.deepEqual(config, {
    prefix: "snail-test",
    countPerSpec: 5,
    defaultSpecs: "fedora:42",
    resources: { memoryMb: 2048, vcpus: 2, diskGb: 15 },
    network: "default",
    imageDir: "/var/lib/libvirt/images",
    seedDir: "/tmp/snail-test-cloudinit",
    manifestPath: "/work/vm-list.txt",
    sshKeyPath: "/home/tester/.ssh/snail-test-key",
    vmUser: "snail",
    vmPassword: "snailtest123",
    agent: {
      repoUrl: "https://github.com/sluggisty/snail-core",
      apiEndpoint: "http://192.168.122.1:8080/api/v1/ingest",
      apiKey: "test-api-key-12345",
      logLevel: "INFO"
    },
    sudo: "auto",
    concurrency: 1,
    waitTimeoutMs: 300_000,
    waitIntervalMs: 10_000
  });
});

test("loadConfig reads overrides from the environment", () => {
  const config = loadConfig(
    {
      VM_PREFIX: "ci",
      VM_COUNT: "2",
      MEMORY_MB: "4096",
      DISK_SIZE_GB: "20",
      IMAGE_DIR: "images",
      FLEET_MANIFEST: "~/fleet.txt",
      SNAIL_LOG_LEVEL: "debug",
      SNAIL_API_KEY: "test-secret",
      HARNESS_SUDO: "Never",
      WAIT_TIMEOUT_SEC: "60"
    },
    location
  );
  assert.equal(config.prefix, "ci");
  assert.equal(config.countPerSpec, 2);
  assert.deepEqual(config.resources, { memoryMb: 4096, vcpus: 2, diskGb: 20 });
  assert.equal(config.imageDir, "/work/images");
  assert.equal(config.manifestPath, "/home/tester/fleet.txt");
  assert.equal(config.agent.logLevel, "DEBUG");
  assert.equal(config.agent.apiKey, "test-secret");
  assert.equal(config.sudo, "never");
  assert.equal(config.waitTimeoutMs, 60_000);
});

test("loadConfig rejects invalid numbers", () => {
  assert.throws(
    () => loadConfig({ VM_COUNT: "zero" }, location),
    (error: unknown) =>
      error instanceof CliError &&
      error.kind === "validation" &&
      error.message === "VM_COUNT must be a positive integer (got 'zero')."
  );
  assert.throws(() => loadConfig({ VCPUS: "0" }, location), CliError);
  assert.throws(() => loadConfig({ MEMORY_MB: "1.5" }, location), CliError);
});

test("loadConfig rejects an unknown sudo mode", () => {
  assert.throws(
    () => loadConfig({ HARNESS_SUDO: "sometimes" }, location),
    (error: unknown) =>
      error instanceof CliError && error.message === "HARNESS_SUDO must be one of auto, always, never (got 'sometimes')."
  );
});

test("parsePositiveInt trims input", () => {
  assert.equal(parsePositiveInt(" 3 ", "--count"), 3);
  assert.throws(() => parsePositiveInt("", "--count"), CliError);
});
