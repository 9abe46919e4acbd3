import test from "node:test";
import assert from "node:assert/strict";
import { InvalidSpecFormatError } from "../src/lib/errors";
import {
  codenameFor,
  expandVersions,
  formatSpec,
  knownVersions,
  osVariantFor,
  parseSpecs,
  parseSpecToken,
  resolveSpecInput,
  validateSpec
} from "../src/lib/specs";

test("parseSpecs reads mixed tokens left to right", () => {
  assert.deepEqual(parseSpecs("fedora:42, debian:12,ubuntu:24.04"), [
    { distribution: "fedora", version: "42" },
    { distribution: "debian", version: "12" },
    { distribution: "ubuntu", version: "24.04" }
  ]);
});

test("parseSpecs gives bare versions the default distribution", () => {
  assert.deepEqual(parseSpecs("41,42"), [
    { distribution: "fedora", version: "41" },
    { distribution: "fedora", version: "42" }
  ]);
  assert.deepEqual(parseSpecs("12", "debian"), [{ distribution: "debian", version: "12" }]);
});

test("parseSpecs keeps duplicates", () => {
  assert.equal(parseSpecs("fedora:42,fedora:42").length, 2);
});

test("parseSpecToken lowercases the distribution", () => {
  assert.deepEqual(parseSpecToken("Ubuntu:22.04"), { distribution: "ubuntu", version: "22.04" });
});

test("parseSpecToken rejects unknown distributions, empty tokens and missing versions", () => {
  assert.throws(() => parseSpecToken("arch:2024"), (error: unknown) =>
    error instanceof InvalidSpecFormatError && error.token === "arch:2024");
  assert.throws(() => parseSpecs("fedora:42,,debian:12"), (error: unknown) =>
    error instanceof InvalidSpecFormatError && error.message === "Invalid VM spec '': empty token");
  assert.throws(() => parseSpecToken("debian:"), (error: unknown) =>
    error instanceof InvalidSpecFormatError && error.message === "Invalid VM spec 'debian:': missing version");
});

test("expandVersions builds one spec per version", () => {
  assert.deepEqual(expandVersions("Debian", "12, 11"), [
    { distribution: "debian", version: "12" },
    { distribution: "debian", version: "11" }
  ]);
  assert.throws(() => expandVersions("gentoo", "1"), InvalidSpecFormatError);
});

test("validateSpec accepts known releases only", () => {
  assert.doesNotThrow(() => validateSpec({ distribution: "ubuntu", version: "24.04" }));
  assert.throws(
    () => validateSpec({ distribution: "debian", version: "9" }),
    (error: unknown) =>
      error instanceof InvalidSpecFormatError &&
      error.message === "Invalid VM spec 'debian:9': Debian 9 is not a known release (known: 13, 12, 11, 10)"
  );
});

test("validateSpec does not treat object prototype keys as releases", () => {
  assert.throws(() => validateSpec({ distribution: "fedora", version: "constructor" }), InvalidSpecFormatError);
});

test("knownVersions lists newest first", () => {
  assert.deepEqual(knownVersions("ubuntu"), ["24.04", "22.04", "20.04"]);
  assert.equal(knownVersions("fedora")[0], "42");
  assert.equal(knownVersions("fedora").at(-1), "33");
});

test("codenameFor maps releases to codenames", () => {
  assert.equal(codenameFor({ distribution: "debian", version: "12" }), "bookworm");
  assert.equal(codenameFor({ distribution: "ubuntu", version: "22.04" }), "jammy");
  assert.equal(codenameFor({ distribution: "debian", version: "99" }), "99");
});

test("osVariantFor picks the newest rule the version satisfies", () => {
  assert.equal(osVariantFor({ distribution: "fedora", version: "42" }), "fedora40");
  assert.equal(osVariantFor({ distribution: "fedora", version: "39" }), "fedora38");
  assert.equal(osVariantFor({ distribution: "fedora", version: "33" }), "fedora-unknown");
  assert.equal(osVariantFor({ distribution: "debian", version: "13" }), "debian12");
  assert.equal(osVariantFor({ distribution: "debian", version: "10" }), "debian10");
  assert.equal(osVariantFor({ distribution: "ubuntu", version: "22.04" }), "ubuntu22.04");
  assert.equal(osVariantFor({ distribution: "centos", version: "9" }), "centos-stream9");
  assert.equal(osVariantFor({ distribution: "rhel", version: "9" }), "rhel9.0");
});

test("formatSpec renders distro:version", () => {
  assert.equal(formatSpec({ distribution: "centos", version: "10" }), "centos:10");
});

test("resolveSpecInput prefers --specs, then --distro/--versions, then the default", () => {
  assert.deepEqual(resolveSpecInput({ specs: "debian:12", distro: "ubuntu", versions: "24.04" }, "fedora:42"), [
    { distribution: "debian", version: "12" }
  ]);
  assert.deepEqual(resolveSpecInput({ distro: "ubuntu", versions: "24.04,22.04" }, "fedora:42"), [
    { distribution: "ubuntu", version: "24.04" },
    { distribution: "ubuntu", version: "22.04" }
  ]);
  assert.deepEqual(resolveSpecInput({}, "fedora:42"), [{ distribution: "fedora", version: "42" }]);
  assert.throws(() => resolveSpecInput({ distro: "ubuntu" }, "fedora:42"), InvalidSpecFormatError);
});
