import test from "node:test";
import assert from "node:assert/strict";
import {
  diskPathFor,
  expandFleet,
  instanceName,
  matchesNamingConvention,
  seedDirFor,
  sortDomainNames,
  versionSlug
} from "../src/lib/naming";

const paths = { imageDir: "/var/lib/libvirt/images", seedDir: "/tmp/seeds" };

test("instanceName drops dots from the version", () => {
  assert.equal(versionSlug("24.04"), "2404");
  assert.equal(instanceName("snail-test", { distribution: "ubuntu", version: "24.04" }, 3), "snail-test-ubuntu-2404-3");
  assert.equal(instanceName("ci", { distribution: "fedora", version: "42" }, 1), "ci-fedora-42-1");
});

test("disk and seed paths derive from the instance name", () => {
  assert.equal(diskPathFor(paths.imageDir, "vm-1"), "/var/lib/libvirt/images/vm-1.qcow2");
  assert.equal(seedDirFor(paths.seedDir, "vm-1"), "/tmp/seeds/vm-1");
});

test("expandFleet creates countPerSpec instances per spec, spec-major", () => {
  const instances = expandFleet(
    {
      specs: [
        { distribution: "fedora", version: "42" },
        { distribution: "debian", version: "12" }
      ],
      countPerSpec: 2,
      namePrefix: "snail-test",
      resources: { memoryMb: 2048, vcpus: 2, diskGb: 15 }
    },
    paths
  );

  assert.deepEqual(
    instances.map((instance) => instance.name),
    ["snail-test-fedora-42-1", "snail-test-fedora-42-2", "snail-test-debian-12-1", "snail-test-debian-12-2"]
  );
  assert.deepEqual(instances[3], {
    name: "snail-test-debian-12-2",
    spec: { distribution: "debian", version: "12" },
    index: 2,
    diskPath: "/var/lib/libvirt/images/snail-test-debian-12-2.qcow2",
    seedVolumePath: "/tmp/seeds/snail-test-debian-12-2/cloud-init.iso"
  });
});

test("matchesNamingConvention accepts fleet names and rejects lookalikes", () => {
  assert.equal(matchesNamingConvention("snail-test", "snail-test-fedora-42-1"), true);
  assert.equal(matchesNamingConvention("snail-test", "snail-test-ubuntu-2404-12"), true);
  assert.equal(matchesNamingConvention("snail-test", "snail-test-42-3"), true);
  assert.equal(matchesNamingConvention("snail-test", "snail-test-db"), false);
  assert.equal(matchesNamingConvention("snail-test", "snail-test-fedora-42"), false);
  assert.equal(matchesNamingConvention("snail-test", "snail-test-arch-1-1"), false);
  assert.equal(matchesNamingConvention("snail-test", "snail-testing-fedora-42-1"), false);
  assert.equal(matchesNamingConvention("lab.v2", "labxv2-fedora-42-1"), false);
  assert.equal(matchesNamingConvention("lab.v2", "lab.v2-fedora-42-1"), true);
});

test("sortDomainNames orders numeric suffixes naturally", () => {
  assert.deepEqual(sortDomainNames(["vm-fedora-42-10", "vm-fedora-42-2", "vm-debian-12-1"]), [
    "vm-debian-12-1",
    "vm-fedora-42-2",
    "vm-fedora-42-10"
  ]);
});
