import { CommandError } from "./exec";

export type CliErrorKind = "validation" | "not_found" | "dependency" | "resource" | "runtime";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

export class InvalidSpecFormatError extends CliError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super({
      kind: "validation",
      message: `Invalid VM spec '${token}': ${reason}`,
      hint: "Use comma-separated 'distro:version' tokens, e.g. fedora:42,debian:12,ubuntu:24.04."
    });
    this.name = "InvalidSpecFormatError";
    this.token = token;
  }
}

export class EnvironmentError extends CliError {
  constructor(message: string, hint?: string) {
    super({ kind: "dependency", message, hint });
    this.name = "EnvironmentError";
  }
}

export class ImageNotFoundError extends CliError {
  constructor(distribution: string, version: string, hint?: string) {
    super({
      kind: "resource",
      message: `No ${distribution} ${version} cloud image found locally or upstream.`,
      hint: hint ?? `Run \`snail-harness setup --distro ${distribution} --version ${version}\` or download the image manually.`
    });
    this.name = "ImageNotFoundError";
  }
}

export class ImageInvalidError extends CliError {
  constructor(source: string, reason: string) {
    super({
      kind: "resource",
      message: `Downloaded image is not a valid qcow2 disk: ${reason}`,
      hint: "The file might be an error page. Try downloading it manually.",
      detail: `source: ${source}`
    });
    this.name = "ImageInvalidError";
  }
}

export class BaseImageMissingError extends CliError {
  constructor(instanceName: string, expectedPath?: string) {
    super({
      kind: "resource",
      message: expectedPath
        ? `Base image for '${instanceName}' not found: ${expectedPath}`
        : `No base image was resolved for '${instanceName}'.`,
      hint: "Run `snail-harness setup` for this distribution and version first."
    });
    this.name = "BaseImageMissingError";
  }
}

export class RegistrationFailedError extends CliError {
  readonly instanceName: string;

  constructor(instanceName: string, cause: unknown) {
    super({
      kind: "runtime",
      message: `Hypervisor rejected domain '${instanceName}'.`,
      detail: describeCause(cause)
    });
    this.name = "RegistrationFailedError";
    this.instanceName = instanceName;
  }
}

export class DomainNotFoundError extends CliError {
  constructor(name: string, available: string[]) {
    super({
      kind: "not_found",
      message: formatDomainNotFoundMessage(name, available)
    });
    this.name = "DomainNotFoundError";
  }
}

export function formatDomainNotFoundMessage(name: string, available: string[]): string {
  if (available.length === 0) {
    return `VM '${name}' not found. No test VMs exist yet.`;
  }
  return `VM '${name}' not found. Available VMs: ${available.join(", ")}`;
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof CommandError) {
    return new CliError({
      kind: "runtime",
      message: error.message,
      detail: commandOutput(error)
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string | undefined {
  if (cause instanceof CommandError) {
    return [cause.message, commandOutput(cause)].filter(Boolean).join("\n");
  }
  return errorMessage(cause);
}

function commandOutput(error: CommandError): string | undefined {
  const detail = [error.stdout, error.stderr].filter(Boolean).join("\n");
  return detail || undefined;
}
