import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { BaseImageMissingError, RegistrationFailedError } from "../src/lib/errors";
import { CommandError, HostTools } from "../src/lib/exec";
import { Provisioner } from "../src/lib/provisioner";
import type { BaseImage, VmInstance } from "../src/lib/types";
import { FakeHypervisor, FakeRunner, makeTempDir, removeTempDir, testAgent, testCredentials, testInstance } from "./helpers";

const GIB = 1024 ** 3;

interface Fixture {
  dir: string;
  instance: VmInstance;
  baseImage: BaseImage;
}

async function withFixture(body: (fixture: Fixture) => Promise<void>): Promise<void> {
  const dir = await makeTempDir();
  try {
    const baseImage: BaseImage = {
      distribution: "fedora",
      version: "42",
      localPath: path.join(dir, "fedora-cloud-base-42.qcow2")
    };
    await fs.promises.writeFile(baseImage.localPath, "base");
    const instance = testInstance({
      diskPath: path.join(dir, "snail-test-fedora-42-1.qcow2"),
      seedVolumePath: path.join(dir, "seeds", "snail-test-fedora-42-1", "cloud-init.iso")
    });
    await body({ dir, instance, baseImage });
  } finally {
    await removeTempDir(dir);
  }
}

function makeProvisioner(hypervisor: FakeHypervisor, runner: FakeRunner): Provisioner {
  return new Provisioner({
    hypervisor,
    tools: new HostTools(runner.run, "never"),
    resources: { memoryMb: 2048, vcpus: 2, diskGb: 15 },
    network: "default",
    credentials: testCredentials,
    agent: testAgent
  });
}

test("provision skips a domain that already exists without touching anything", async () => {
  await withFixture(async ({ instance, baseImage }) => {
    const hypervisor = new FakeHypervisor().add(instance.name, "shut off");
    const runner = new FakeRunner();

    const result = await makeProvisioner(hypervisor, runner).provision(instance, baseImage);

    assert.equal(result.outcome, "already-exists");
    assert.equal(runner.calls.length, 0);
    assert.equal(hypervisor.created.length, 0);
    assert.equal(fs.existsSync(path.dirname(instance.seedVolumePath)), false);
  });
});

test("provision requires a resolved base image on disk", async () => {
  await withFixture(async ({ dir, instance }) => {
    const provisioner = makeProvisioner(new FakeHypervisor(), new FakeRunner());
    await assert.rejects(provisioner.provision(instance, undefined), BaseImageMissingError);

    const missing = path.join(dir, "missing.qcow2");
    await assert.rejects(
      provisioner.provision(instance, { distribution: "fedora", version: "42", localPath: missing }),
      (error: unknown) =>
        error instanceof BaseImageMissingError &&
        error.message === `Base image for '${instance.name}' not found: ${missing}`
    );
  });
});

test("provision clones, grows, seeds and registers the domain in order", async () => {
  await withFixture(async ({ instance, baseImage }) => {
    const hypervisor = new FakeHypervisor();
    const runner = new FakeRunner().on("qemu-img info", {
      stdout: JSON.stringify({ format: "qcow2", "virtual-size": 5 * GIB })
    });

    const result = await makeProvisioner(hypervisor, runner).provision(instance, baseImage);
    const seedDir = path.dirname(instance.seedVolumePath);

    assert.equal(result.outcome, "created");
    assert.deepEqual(runner.lines(), [
      `cp --sparse=always ${baseImage.localPath} ${instance.diskPath}`,
      `qemu-img info --output=json ${instance.diskPath}`,
      `qemu-img resize ${instance.diskPath} 15G`,
      `genisoimage -output ${instance.seedVolumePath} -volid cidata -joliet -rock ${seedDir}/user-data ${seedDir}/meta-data`
    ]);
    assert.deepEqual(hypervisor.created, [
      {
        name: instance.name,
        memoryMb: 2048,
        vcpus: 2,
        diskPath: instance.diskPath,
        diskGb: 15,
        seedVolumePath: instance.seedVolumePath,
        osVariant: "fedora40",
        network: "default"
      }
    ]);

    const userData = await fs.promises.readFile(path.join(seedDir, "user-data"), "utf8");
    assert.equal(userData.split("\n")[0], "#cloud-config");
    assert.equal(
      await fs.promises.readFile(path.join(seedDir, "meta-data"), "utf8"),
      `instance-id: ${instance.name}\nlocal-hostname: ${instance.name}\n`
    );
  });
});

test("provision leaves a large enough disk alone", async () => {
  await withFixture(async ({ instance, baseImage }) => {
    const runner = new FakeRunner().on("qemu-img info", {
      stdout: JSON.stringify({ format: "qcow2", "virtual-size": 20 * GIB })
    });
    await makeProvisioner(new FakeHypervisor(), runner).provision(instance, baseImage);
    assert.equal(runner.lines().some((line) => line.startsWith("qemu-img resize")), false);
  });
});

test("provision does not register the domain when cloning fails", async () => {
  await withFixture(async ({ instance, baseImage }) => {
    const hypervisor = new FakeHypervisor();
    const runner = new FakeRunner().on("cp", { exitCode: 1, stderr: "No space left on device" });

    await assert.rejects(makeProvisioner(hypervisor, runner).provision(instance, baseImage), CommandError);
    assert.deepEqual(hypervisor.calls, []);
  });
});

test("provision wraps hypervisor rejections in RegistrationFailedError", async () => {
  await withFixture(async ({ instance, baseImage }) => {
    const hypervisor = new FakeHypervisor().failOn(
      "create",
      instance.name,
      new CommandError(`virt-install --name ${instance.name}`, 1, "", "ERROR    Requested operation is not valid")
    );
    const runner = new FakeRunner().on("qemu-img info", { stdout: '{"format":"qcow2","virtual-size":16106127360}' });

    await assert.rejects(
      makeProvisioner(hypervisor, runner).provision(instance, baseImage),
      (error: unknown) =>
        error instanceof RegistrationFailedError &&
        error.detail === `Command failed (1): virt-install --name ${instance.name}\nERROR    Requested operation is not valid`
    );
  });
});
