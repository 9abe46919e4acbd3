import { Command } from "commander";
import ora from "ora";
import { getCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { readManifest } from "../lib/manifest";
import { collectStatus, renderStatus, STATUS_FORMATS, type StatusFormat } from "../lib/status";

interface StatusOptions {
  format?: string;
  json?: boolean;
  list?: boolean;
  ips?: boolean;
  probe?: boolean;
  prefix?: string;
  manifest?: boolean;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .alias("list")
    .description("Show test VMs with their state, IP and setup progress")
    .option("--format <format>", `Output format (${STATUS_FORMATS.join(", ")})`)
    .option("--json", "Same as --format json")
    .option("--list", "Same as --format list (name:ip)")
    .option("--ips", "Same as --format ips")
    .option("--probe", "Check guest setup over SSH")
    .option("--prefix <prefix>", "VM name prefix")
    .option("--manifest", "Only VMs from the last create run")
    .action(async (options: StatusOptions) => {
      const format = resolveFormat(options);
      const { config, tools, hypervisor, logger, ssh } = await getCommandContext(program);
      const prefix = options.prefix ?? config.prefix;

      const only = options.manifest ? await readManifest(config.manifestPath) : undefined;

      const spinner = format === "table" && options.probe ? ora("Probing VMs over SSH...").start() : undefined;
      const rows = await collectStatus(prefix, { probe: options.probe, only }, { hypervisor, tools, ssh, logger }).finally(
        () => spinner?.stop()
      );

      if (rows.length === 0 && format === "table") {
        console.log(`No VMs found with prefix '${prefix}'.`);
        return;
      }
      const output = renderStatus(rows, format);
      if (output) {
        console.log(output);
      }
    });
}

function resolveFormat(options: StatusOptions): StatusFormat {
  if (options.json) {
    return "json";
  }
  if (options.list) {
    return "list";
  }
  if (options.ips) {
    return "ips";
  }
  const requested = options.format ?? "table";
  const format = STATUS_FORMATS.find((item) => item === requested);
  if (!format) {
    throw new CliError({
      kind: "validation",
      message: `Unknown format '${requested}'. Expected one of ${STATUS_FORMATS.join(", ")}.`
    });
  }
  return format;
}
