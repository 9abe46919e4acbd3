import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MIN_IMAGE_BYTES, QCOW2_MAGIC } from "./constants";
import { ImageInvalidError, ImageNotFoundError, errorMessage } from "./errors";
import type { HostTools } from "./exec";
import { silentLogger, type Logger } from "./log";
import { CATALOG, codenameFor, type ImageSource } from "./specs";
import type { BaseImage, VmSpec } from "./types";
import { isRecord, parseMaybeNumber } from "./utils";

const HTML_SIGNATURES = ["<!doctype", "<html", "<?xml", "<head"];

export interface ImageResolverOptions {
  imageDir: string;
  tools: HostTools;
  logger?: Logger;
  minImageBytes?: number;
  tmpRoot?: string;
}

export interface ResolveOptions {
  force?: boolean;
}

export interface ImageInfo {
  format: string;
  virtualSizeBytes?: number;
}

export function baseImagePath(imageDir: string, spec: VmSpec): string {
  const versionKey = spec.version.replace(/\./g, "_");
  return path.join(imageDir, `${spec.distribution}-cloud-base-${versionKey}.qcow2`);
}

export function fillTemplate(template: string, spec: VmSpec, escape = false): string {
  const quote = (value: string) => (escape ? value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&") : value);
  return template
    .replace(/\{version\}/g, quote(spec.version))
    .replace(/\{codename\}/g, quote(codenameFor(spec)));
}

/**
 * Picks an image file name from an index listing. A listed name that is also
 * one of the known fallback names wins over the first match.
 */
export function pickFromListing(listing: string, source: ImageSource, spec: VmSpec): string | undefined {
  const pattern = new RegExp(fillTemplate(source.listingPattern, spec, true), "g");
  const matches = [...new Set(listing.match(pattern) ?? [])];
  if (matches.length === 0) {
    return undefined;
  }
  const known = new Set(source.fallbackFiles.map((file) => fillTemplate(file, spec)));
  return matches.find((name) => known.has(name)) ?? matches[0];
}

export function detectImageProblem(header: Buffer, sizeBytes: number, minImageBytes = MIN_IMAGE_BYTES): string | undefined {
  const head = header.subarray(0, 512).toString("latin1").trimStart().toLowerCase();
  if (HTML_SIGNATURES.some((signature) => head.startsWith(signature))) {
    return "content looks like an HTML page";
  }
  if (sizeBytes < minImageBytes) {
    return `file is only ${sizeBytes} bytes (minimum ${minImageBytes})`;
  }
  if (header.length < QCOW2_MAGIC.length || !header.subarray(0, QCOW2_MAGIC.length).equals(QCOW2_MAGIC)) {
    return "missing QCOW2 magic bytes";
  }
  return undefined;
}

export function parseQemuImgInfo(stdout: string): ImageInfo {
  const parsed = JSON.parse(stdout) as unknown;
  if (!isRecord(parsed)) {
    return { format: "unknown" };
  }
  return {
    format: typeof parsed.format === "string" ? parsed.format : "unknown",
    virtualSizeBytes: parseMaybeNumber(parsed["virtual-size"])
  };
}

export async function inspectImage(tools: HostTools, imagePath: string): Promise<ImageInfo> {
  const result = await tools.privileged("qemu-img", ["info", "--output=json", imagePath], { timeoutMs: 30_000 });
  return parseQemuImgInfo(result.stdout);
}

export class ImageResolver {
  private readonly imageDir: string;
  private readonly tools: HostTools;
  private readonly logger: Logger;
  private readonly minImageBytes: number;
  private readonly tmpRoot: string;

  constructor(options: ImageResolverOptions) {
    this.imageDir = options.imageDir;
    this.tools = options.tools;
    this.logger = options.logger ?? silentLogger;
    this.minImageBytes = options.minImageBytes ?? MIN_IMAGE_BYTES;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
  }

  localPath(spec: VmSpec): string {
    return baseImagePath(this.imageDir, spec);
  }

  async hasLocal(spec: VmSpec): Promise<boolean> {
    const stat = await fs.promises.stat(this.localPath(spec)).catch(() => undefined);
    return Boolean(stat?.isFile());
  }

  async resolve(spec: VmSpec, options: ResolveOptions = {}): Promise<BaseImage> {
    const localPath = this.localPath(spec);
    if (!options.force && (await this.hasLocal(spec))) {
      this.logger.debug(`Using cached base image ${localPath}`);
      return { distribution: spec.distribution, version: spec.version, localPath };
    }

    const source = CATALOG[spec.distribution].image;
    if (!source) {
      throw new ImageNotFoundError(
        spec.distribution,
        spec.version,
        `${CATALOG[spec.distribution].label} images are not publicly downloadable. Place a qcow2 image at ${localPath}.`
      );
    }

    this.logger.info(`Finding ${CATALOG[spec.distribution].label} ${spec.version} cloud image...`);
    const sourceUrl = await this.locate(source, spec);
    if (!sourceUrl) {
      throw new ImageNotFoundError(spec.distribution, spec.version);
    }

    this.logger.info(`Downloading ${sourceUrl}`);
    const tmpDir = await fs.promises.mkdtemp(path.join(this.tmpRoot, "snail-image-"));
    try {
      const tmpFile = path.join(tmpDir, path.basename(localPath));
      await this.tools.exec("curl", ["-fsSL", "--connect-timeout", "30", "-o", tmpFile, sourceUrl], {
        timeoutMs: 3_600_000
      });
      await this.verify(tmpFile, sourceUrl);
      await this.place(tmpFile, localPath);
    } finally {
      await fs.promises.rm(tmpDir, { recursive: true, force: true });
    }

    this.logger.success(`Image downloaded to ${localPath}`);
    return { distribution: spec.distribution, version: spec.version, localPath, sourceUrl };
  }

  async locate(source: ImageSource, spec: VmSpec): Promise<string | undefined> {
    const indexUrl = fillTemplate(source.indexUrl, spec);
    const listing = await this.tools.exec("curl", ["-sL", "--connect-timeout", "15", indexUrl], {
      allowNonZeroExit: true,
      timeoutMs: 60_000
    });
    if (listing.exitCode === 0) {
      const listed = pickFromListing(listing.stdout, source, spec);
      if (listed) {
        return `${indexUrl}${listed}`;
      }
    }

    for (const file of source.fallbackFiles) {
      const candidate = `${indexUrl}${fillTemplate(file, spec)}`;
      const probe = await this.tools.exec("curl", ["-sIfL", "--connect-timeout", "15", candidate], {
        allowNonZeroExit: true,
        timeoutMs: 30_000
      });
      if (probe.exitCode === 0) {
        return candidate;
      }
      this.logger.debug(`Not found: ${candidate}`);
    }
    return undefined;
  }

  private async verify(file: string, sourceUrl: string): Promise<void> {
    const stat = await fs.promises.stat(file);
    const handle = await fs.promises.open(file, "r");
    let header: Buffer;
    try {
      const buffer = Buffer.alloc(512);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
      header = buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }

    const problem = detectImageProblem(header, stat.size, this.minImageBytes);
    if (problem) {
      throw new ImageInvalidError(sourceUrl, problem);
    }
  }

  // The canonical path only ever receives a complete file through rename.
  private async place(tmpFile: string, localPath: string): Promise<void> {
    const partial = `${localPath}.partial`;
    try {
      await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
      try {
        await fs.promises.rename(tmpFile, localPath);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== "EXDEV") {
          throw error;
        }
        await fs.promises.copyFile(tmpFile, partial);
        await fs.promises.rename(partial, localPath);
      }
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== "EACCES" && code !== "EPERM") {
        throw error;
      }
      this.logger.debug(`Image directory not writable (${errorMessage(error)}); retrying with sudo`);
      await this.tools.privileged("mkdir", ["-p", path.dirname(localPath)]);
      await this.tools.privileged("cp", [tmpFile, partial], { timeoutMs: 600_000 });
      await this.tools.privileged("chmod", ["644", partial]);
      await this.tools.privileged("mv", ["-f", partial, localPath]);
    }
  }
}
